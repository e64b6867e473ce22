export const PREDICATE_DOMAINS = [
    'demographic',
    'diagnosis',
    'procedure',
    'drug',
    'lab',
    'enrollment',
    'observation',
] as const;

export const CODE_SYSTEMS = [
    'ICD10CM',
    'ICD9CM',
    'CPT',
    'HCPCS',
    'NDC',
    'RxNorm',
    'LOINC',
    'SNOMED',
    'local',
] as const;

export const MATCHING_LOGIC = ['exact', 'wildcard', 'hierarchy', 'ingredient'] as const;
export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;
export const VALUE_OPERATORS = ['>=', '<=', '>', '<', '=', 'between'] as const;
export const NAMED_PERIODS = ['baseline', 'follow_up', 'enrollment'] as const;
export const GAP_KINDS = [
    'unresolved_concept',
    'non_rwd',
    'needs_definition',
    'resolver_timeout',
    'schema_demoted',
] as const;

export type Polarity = 'inclusion' | 'exclusion';
export type PredicateDomain = typeof PREDICATE_DOMAINS[number];
export type CodeSystem = typeof CODE_SYSTEMS[number];
export type MatchingLogic = typeof MATCHING_LOGIC[number];
export type Confidence = typeof CONFIDENCE_LEVELS[number];
export type ComparisonOperator = typeof VALUE_OPERATORS[number];
export type NamedPeriod = typeof NAMED_PERIODS[number];
export type Verifiability = 'rwd' | 'partial_rwd' | 'non_rwd';
export type GapKind = typeof GAP_KINDS[number];

export type NumericRange = readonly [number, number];

export interface AlternativeResolution {
    codeValues: readonly string[];
    description: string;
    confidence: Confidence;
    matchingLogic?: MatchingLogic;
}

export interface ConceptResolution {
    resolved: boolean;
    codeSystem: CodeSystem;
    /** Ordered; wildcard codes such as `I50*` are allowed. */
    codeValues: readonly string[];
    matchingLogic: MatchingLogic;
    confidence: Confidence;
    alternatives?: readonly AlternativeResolution[];
    notes?: string;
}

export interface TemporalWindow {
    /** Name of an anchor rule of the owning CriteriaSet. */
    reference: string;
    beforeDays?: number;
    afterDays?: number;
    during?: NamedPeriod;
}

export type ValueConstraint =
    | { operator: Exclude<ComparisonOperator, 'between'>; value: number; unit?: string }
    | { operator: 'between'; value: NumericRange; unit?: string };

export type CountConstraint =
    | { operator: Exclude<ComparisonOperator, 'between'>; count: number; withinDays?: number; proportion?: number }
    | { operator: 'between'; count: NumericRange; withinDays?: number; proportion?: number };

export interface Predicate {
    id: string;
    polarity: Polarity;
    domain: PredicateDomain;
    concept: string;
    description?: string;
    conceptResolution?: ConceptResolution;
    temporalWindow?: TemporalWindow;
    valueConstraint?: ValueConstraint;
    countConstraint?: CountConstraint;
    verifiability: Verifiability;
    needsDefinition: boolean;
    candidateDefinitions?: readonly string[];
}

export interface Gap {
    predicateId: string;
    kind: GapKind;
    issue: string;
    proposedResolution?: string;
    requiresUserInput: boolean;
}

export type AnchorRule =
    | { name: string; kind: 'enrollment_start'; description?: string }
    | { name: string; kind: 'column'; table: string; column: string; subjectColumn?: string; description?: string }
    | { name: string; kind: 'first_event'; predicateId: string; offsetDays?: number; description?: string };

export interface CriteriaSet {
    studyId: string;
    version: number;
    predicates: readonly Predicate[];
    anchorRules: readonly AnchorRule[];
    /** Anchor reported as the index date on the final projection; null when no anchor rule exists. */
    indexAnchor: string | null;
    gaps: readonly Gap[];
}

export type CriteriaEdit =
    | { type: 'upsert_predicate'; predicate: Predicate }
    | { type: 'remove_predicate'; predicateId: string }
    | { type: 'set_resolution'; predicateId: string; resolution: ConceptResolution }
    | { type: 'select_alternative'; predicateId: string; alternativeIndex: number }
    | { type: 'mark_non_rwd'; predicateId: string; reason: string }
    | { type: 'provide_definition'; predicateId: string; definition: string; resolution?: ConceptResolution }
    | { type: 'set_anchor_rules'; anchorRules: AnchorRule[]; indexAnchor?: string }
    | { type: 'record_gap'; gap: Gap }
    | { type: 'clear_gap'; predicateId: string };
