/**
 * Versioned prompt templates. Each template produces messages for the chat-completions
 * API and has an immutable version string recorded with every call.
 */
import type { CodeSystem, PredicateDomain } from '../criteria/types';
import type { AiMessage } from './types';

export interface PromptTemplate<TInput> {
    id: string;
    version: string;
    description: string;
    buildMessages(input: TInput): AiMessage[];
}

export interface InterpretCriteriaInput {
    studyId: string;
    criteriaText: string;
}

export interface ResolveConceptInput {
    label: string;
    domain: PredicateDomain;
    codeSystemHint?: CodeSystem;
}

// ─── INTERPRET_CRITERIA_V1 ─────────────────────────────────────

const INTERPRET_CRITERIA_SYSTEM = `You convert clinical-study inclusion and exclusion criteria into a structured criteria document.

RULES:
1. Respond with valid JSON ONLY. No markdown, no explanation, no code fences.
2. The response MUST match this schema:

{
  "studyId": string,
  "predicates": [{
    "id": "I01" | "E01" | ...,            // I = inclusion, E = exclusion, numbered in order
    "polarity": "inclusion" | "exclusion",
    "domain": "demographic" | "diagnosis" | "procedure" | "drug" | "lab" | "enrollment" | "observation",
    "concept": string,                    // short clinical label, e.g. "heart failure", "age", "HbA1c"
    "description": string,                // the criterion as written
    "temporalWindow": { "reference": string, "beforeDays"?: int, "afterDays"?: int, "during"?: "baseline" | "follow_up" | "enrollment" },
    "valueConstraint": { "operator": ">=" | "<=" | ">" | "<" | "=" | "between", "value": number | [low, high], "unit"?: string },
    "countConstraint": { "operator": ">=" | "<=" | ">" | "<" | "=" | "between", "count": int | [low, high], "withinDays"?: int, "proportion"?: number },
    "verifiability": "rwd" | "partial_rwd" | "non_rwd",
    "needsDefinition": boolean,
    "candidateDefinitions"?: [string]
  }],
  "anchorRules": [
    { "name": string, "kind": "enrollment_start" }
    | { "name": string, "kind": "first_event", "predicateId": string, "offsetDays"?: int }
  ],
  "indexAnchor": string
}

3. Omit temporalWindow, valueConstraint and countConstraint when the criterion has none.
4. "temporalWindow.reference" must name one of the anchorRules.
5. Use "non_rwd" for criteria that claims and lab data cannot show (consent, life expectancy, pregnancy plans).
6. Set "needsDefinition" for clinically ambiguous criteria and offer candidate definitions.
7. Do NOT resolve concepts to codes.`;

export const INTERPRET_CRITERIA_V1: PromptTemplate<InterpretCriteriaInput> = {
    id: 'INTERPRET_CRITERIA',
    version: 'v1',
    description: 'Structure free-text eligibility criteria into a criteria document',
    buildMessages(input: InterpretCriteriaInput): AiMessage[] {
        return [
            { role: 'system', content: INTERPRET_CRITERIA_SYSTEM },
            { role: 'user', content: `Study: ${input.studyId}\n\n## Criteria\n${input.criteriaText.trim()}\n\nReturn the criteria document as JSON.` },
        ];
    },
};

// ─── RESOLVE_CONCEPT_V1 ────────────────────────────────────────

const RESOLVE_CONCEPT_SYSTEM = `You map a clinical concept to codes of a standard code system.

RULES:
1. Respond with valid JSON ONLY.
2. The response MUST match this schema:

{
  "resolved": boolean,
  "codeSystem": "ICD10CM" | "ICD9CM" | "CPT" | "HCPCS" | "NDC" | "RxNorm" | "LOINC" | "SNOMED" | "local",
  "codeValues": [string],               // wildcard codes such as "E11*" are allowed
  "matchingLogic": "exact" | "wildcard" | "hierarchy" | "ingredient",
  "confidence": "high" | "medium" | "low",
  "alternatives"?: [{ "codeValues": [string], "description": string, "confidence": "high" | "medium" | "low", "matchingLogic"?: string }],
  "notes"?: string
}

3. For drugs use "ingredient" with lower-case generic names as codeValues.
4. When unsure, answer "resolved": false and list alternatives.`;

export const RESOLVE_CONCEPT_V1: PromptTemplate<ResolveConceptInput> = {
    id: 'RESOLVE_CONCEPT',
    version: 'v1',
    description: 'Resolve a clinical concept label to codes',
    buildMessages(input: ResolveConceptInput): AiMessage[] {
        const lines = [`Concept: ${input.label}`, `Domain: ${input.domain}`];
        if (input.codeSystemHint) {
            lines.push(`Preferred code system: ${input.codeSystemHint}`);
        }
        return [
            { role: 'system', content: RESOLVE_CONCEPT_SYSTEM },
            { role: 'user', content: lines.join('\n') },
        ];
    },
};
