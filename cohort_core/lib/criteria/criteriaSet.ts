import { deepFreeze } from '../utils/deepFreeze';
import { CriteriaValidationError } from './errors';
import { CriteriaSetSchema } from './schema';
import type { ConceptResolution, CriteriaEdit, CriteriaSet, Gap, GapKind, Predicate } from './types';

const RESOLUTION_GAP_KINDS: readonly GapKind[] = ['unresolved_concept', 'resolver_timeout'];

/**
 * Validates raw criteria input and returns a deeply frozen CriteriaSet.
 * When no index anchor is named the first anchor rule is used.
 */
export function createCriteriaSet(input: unknown): CriteriaSet {
    const parsed = CriteriaSetSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        }));
        const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
        throw new CriteriaValidationError('INVALID_CRITERIA', `Invalid criteria set: ${summary}`, issues);
    }

    const data = parsed.data;
    const indexAnchor = data.indexAnchor ?? (data.anchorRules.length > 0 ? data.anchorRules[0].name : null);

    return deepFreeze<CriteriaSet>({
        studyId: data.studyId,
        version: data.version,
        predicates: data.predicates,
        anchorRules: data.anchorRules,
        indexAnchor,
        gaps: data.gaps,
    });
}

export function applyCriteriaEdit(set: CriteriaSet, edit: CriteriaEdit): CriteriaSet {
    const next = reduceEdit(set, edit);
    return createCriteriaSet({ ...next, version: set.version + 1 });
}

export function applyCriteriaEdits(set: CriteriaSet, edits: readonly CriteriaEdit[]): CriteriaSet {
    return edits.reduce((current, edit) => applyCriteriaEdit(current, edit), set);
}

function reduceEdit(set: CriteriaSet, edit: CriteriaEdit): CriteriaSet {
    switch (edit.type) {
        case 'upsert_predicate': {
            const exists = set.predicates.some((predicate) => predicate.id === edit.predicate.id);
            const predicates = exists
                ? set.predicates.map((predicate) => (predicate.id === edit.predicate.id ? edit.predicate : predicate))
                : [...set.predicates, edit.predicate];
            return { ...set, predicates };
        }
        case 'remove_predicate': {
            requirePredicate(set, edit.predicateId);
            return {
                ...set,
                predicates: set.predicates.filter((predicate) => predicate.id !== edit.predicateId),
                gaps: set.gaps.filter((gap) => gap.predicateId !== edit.predicateId),
            };
        }
        case 'set_resolution': {
            requirePredicate(set, edit.predicateId);
            return withResolution(set, edit.predicateId, edit.resolution);
        }
        case 'select_alternative': {
            const predicate = requirePredicate(set, edit.predicateId);
            const current = predicate.conceptResolution;
            const alternatives = current?.alternatives ?? [];
            const alternative = alternatives[edit.alternativeIndex];
            if (!current || alternative === undefined) {
                throw new CriteriaValidationError(
                    'INVALID_EDIT',
                    `Predicate ${edit.predicateId} has no alternative at index ${edit.alternativeIndex}.`,
                );
            }

            const selected: ConceptResolution = {
                resolved: alternative.codeValues.length > 0,
                codeSystem: current.codeSystem,
                codeValues: alternative.codeValues,
                matchingLogic: alternative.matchingLogic ?? current.matchingLogic,
                confidence: alternative.confidence,
                alternatives,
                notes: `Selected alternative ${edit.alternativeIndex}: ${alternative.description}`,
            };
            return withResolution(set, edit.predicateId, selected);
        }
        case 'mark_non_rwd': {
            requirePredicate(set, edit.predicateId);
            const gap: Gap = {
                predicateId: edit.predicateId,
                kind: 'non_rwd',
                issue: edit.reason,
                requiresUserInput: false,
            };
            return {
                ...set,
                predicates: updatePredicate(set, edit.predicateId, (predicate) => ({ ...predicate, verifiability: 'non_rwd' })),
                gaps: [...set.gaps.filter((entry) => entry.predicateId !== edit.predicateId), gap],
            };
        }
        case 'provide_definition': {
            requirePredicate(set, edit.predicateId);
            const predicates = updatePredicate(set, edit.predicateId, (predicate) => ({
                ...predicate,
                description: edit.definition,
                needsDefinition: false,
                conceptResolution: edit.resolution ?? predicate.conceptResolution,
            }));
            const gaps = set.gaps.filter((gap) => !(gap.predicateId === edit.predicateId && (
                gap.kind === 'needs_definition' || (edit.resolution?.resolved === true && RESOLUTION_GAP_KINDS.includes(gap.kind))
            )));
            return { ...set, predicates, gaps };
        }
        case 'set_anchor_rules':
            return {
                ...set,
                anchorRules: edit.anchorRules,
                indexAnchor: edit.indexAnchor ?? null,
            };
        case 'record_gap': {
            requirePredicate(set, edit.gap.predicateId);
            const gaps = set.gaps.filter((gap) => !(gap.predicateId === edit.gap.predicateId && gap.kind === edit.gap.kind));
            return { ...set, gaps: [...gaps, edit.gap] };
        }
        case 'clear_gap':
            return { ...set, gaps: set.gaps.filter((gap) => gap.predicateId !== edit.predicateId) };
    }
}

function withResolution(set: CriteriaSet, predicateId: string, resolution: ConceptResolution): CriteriaSet {
    const predicates = updatePredicate(set, predicateId, (predicate) => ({ ...predicate, conceptResolution: resolution }));
    const gaps = resolution.resolved
        ? set.gaps.filter((gap) => !(gap.predicateId === predicateId && RESOLUTION_GAP_KINDS.includes(gap.kind)))
        : set.gaps;
    return { ...set, predicates, gaps };
}

function updatePredicate(set: CriteriaSet, predicateId: string, update: (predicate: Predicate) => Predicate): Predicate[] {
    return set.predicates.map((predicate) => (predicate.id === predicateId ? update(predicate) : predicate));
}

function requirePredicate(set: CriteriaSet, predicateId: string): Predicate {
    const predicate = findPredicate(set, predicateId);
    if (!predicate) {
        throw new CriteriaValidationError('UNKNOWN_PREDICATE', `Unknown predicate id "${predicateId}".`);
    }
    return predicate;
}

export function findPredicate(set: CriteriaSet, predicateId: string): Predicate | undefined {
    return set.predicates.find((predicate) => predicate.id === predicateId);
}

/** Demographic value filters and enrollment checks compile without codes. */
export function requiresConceptResolution(predicate: Predicate): boolean {
    if (predicate.domain === 'enrollment') {
        return false;
    }
    return !(predicate.domain === 'demographic' && predicate.valueConstraint !== undefined);
}

export function hasUsableResolution(predicate: Predicate): boolean {
    if (!requiresConceptResolution(predicate)) {
        return true;
    }
    const resolution = predicate.conceptResolution;
    return resolution !== undefined && resolution.resolved && resolution.codeValues.length > 0;
}

export function gapsFor(set: CriteriaSet, predicateId: string): Gap[] {
    return set.gaps.filter((gap) => gap.predicateId === predicateId);
}

export function isSkipped(set: CriteriaSet, predicateId: string): boolean {
    return set.gaps.some((gap) => gap.predicateId === predicateId);
}

export function listInclusion(set: CriteriaSet): Predicate[] {
    return set.predicates.filter((predicate) => predicate.polarity === 'inclusion');
}

export function listExclusion(set: CriteriaSet): Predicate[] {
    return set.predicates.filter((predicate) => predicate.polarity === 'exclusion');
}
