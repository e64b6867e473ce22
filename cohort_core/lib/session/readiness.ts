import { hasUsableResolution, isSkipped } from '../criteria/criteriaSet';
import type { CriteriaSet, Predicate } from '../criteria/types';

/**
 * Predicates that still need a concept resolution before the query can compile:
 * verifiable, defined, without usable codes and without a recorded gap.
 */
export function pendingConceptPredicates(set: CriteriaSet): Predicate[] {
    return set.predicates.filter((predicate) => {
        if (predicate.verifiability === 'non_rwd' || predicate.needsDefinition) {
            return false;
        }
        if (hasUsableResolution(predicate)) {
            return false;
        }
        return !isSkipped(set, predicate.id);
    });
}

export function conceptsReady(set: CriteriaSet): boolean {
    return pendingConceptPredicates(set).length === 0;
}
