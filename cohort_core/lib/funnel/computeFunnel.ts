import { buildFunnelQuery } from '../compiler/planSql';
import type { PlanFragment, QueryPlan } from '../compiler/types';
import { FunnelComputeError } from './errors';
import { FragmentCache } from './fragmentCache';
import type { FunnelNote, FunnelOptions, FunnelReport, FunnelStep, FunnelWarning } from './types';

export const DEFAULT_SUSPICIOUS_DROP_THRESHOLD = 0.95;
export const DEFAULT_FUNNEL_HUGE_COHORT_CEILING = 1_000_000;

export const BASE_STEP_LABEL = 'Base population';
export const FINAL_STEP_LABEL = 'Final cohort';

/**
 * Stepwise attrition for an enabled subset of a plan's predicates. Steps are the base
 * population, each enabled inclusion in plan order, then the final cohort (inclusions
 * minus enabled exclusions) whenever any compiled predicate is enabled.
 *
 * Ids that are gaps in the plan are ignored with a note. Unknown ids are rejected.
 * Repeated calls on the same cache only load fragments and prefixes not seen before.
 */
export async function computeFunnel(
    plan: QueryPlan,
    enabledIds: Iterable<string>,
    cache: FragmentCache,
    options: FunnelOptions = {},
): Promise<FunnelReport> {
    cache.assertFor(plan);
    const threshold = options.suspiciousDropThreshold ?? DEFAULT_SUSPICIOUS_DROP_THRESHOLD;
    const ceiling = options.hugeCohortCeiling ?? DEFAULT_FUNNEL_HUGE_COHORT_CEILING;

    const { fragments, notes } = selectFragments(plan, enabledIds);
    const inclusion = fragments.filter((fragment) => fragment.polarity === 'inclusion');
    const exclusion = fragments.filter((fragment) => fragment.polarity === 'exclusion');

    const steps: FunnelStep[] = [];
    try {
        const base = await cache.getBase();
        const baseCount = base.size;
        const push = (step: Omit<FunnelStep, 'percentOfBase' | 'removedFromPrevious'>) => {
            const previous = steps.length > 0 ? steps[steps.length - 1].count : step.count;
            steps.push({
                ...step,
                percentOfBase: percentOf(step.count, baseCount),
                removedFromPrevious: previous - step.count,
            });
        };

        push({ stepLabel: BASE_STEP_LABEL, kind: 'base', predicateId: 'base', count: baseCount });

        const prefixIds: string[] = [];
        for (const fragment of inclusion) {
            prefixIds.push(fragment.predicateId);
            const subjects = await cache.getPrefix(prefixIds);
            push({
                stepLabel: `After ${fragment.predicateId} (${fragment.concept})`,
                kind: 'inclusion',
                predicateId: fragment.predicateId,
                count: subjects.size,
            });
        }

        if (fragments.length > 0) {
            const included = await cache.getPrefix(prefixIds);
            const excludedSets = await Promise.all(exclusion.map((fragment) => cache.getFragment(fragment.predicateId)));
            let finalCount = 0;
            for (const id of included) {
                if (!excludedSets.some((excluded) => excluded.has(id))) {
                    finalCount += 1;
                }
            }
            push({ stepLabel: FINAL_STEP_LABEL, kind: 'final', predicateId: 'final', count: finalCount });
        }
    } catch (error) {
        if (error instanceof FunnelComputeError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new FunnelComputeError('SOURCE_FAILED', `Funnel query failed: ${message}`);
    }

    const enabled = fragments.map((fragment) => fragment.predicateId);
    return {
        planId: plan.planId,
        planVersion: plan.version,
        enabledIds: enabled,
        steps,
        warnings: detectWarnings(steps, threshold, ceiling),
        notes,
        sql: buildFunnelQuery(plan, enabled),
    };
}

function selectFragments(plan: QueryPlan, enabledIds: Iterable<string>): { fragments: PlanFragment[]; notes: FunnelNote[] } {
    const requested = new Set(enabledIds);
    const gapIds = new Set(plan.gaps.map((gap) => gap.predicateId));
    const compiled = new Set(plan.fragments.map((fragment) => fragment.predicateId));

    const unknown = Array.from(requested).filter((id) => !compiled.has(id) && !gapIds.has(id));
    if (unknown.length > 0) {
        throw new FunnelComputeError('UNKNOWN_PREDICATE', `Unknown predicate ids: ${unknown.join(', ')}.`, unknown);
    }

    const notes: FunnelNote[] = [];
    for (const id of requested) {
        if (compiled.has(id)) {
            continue;
        }
        const gap = plan.gaps.find((entry) => entry.predicateId === id);
        notes.push({
            predicateId: id,
            note: 'ignored',
            reason: gap ? `Not compiled (${gap.kind}): ${gap.issue}` : 'Not compiled.',
        });
    }

    return {
        fragments: plan.fragments.filter((fragment) => requested.has(fragment.predicateId)),
        notes,
    };
}

export function percentOf(count: number, base: number): number {
    if (base <= 0) {
        return 0;
    }
    return Math.round((count / base) * 100 * 10) / 10;
}

function detectWarnings(steps: readonly FunnelStep[], threshold: number, ceiling: number): FunnelWarning[] {
    const warnings: FunnelWarning[] = [];

    for (let index = 1; index < steps.length; index += 1) {
        const previous = steps[index - 1].count;
        const step = steps[index];
        if (previous > 0 && (previous - step.count) / previous > threshold) {
            warnings.push({
                kind: 'suspicious_drop',
                stepLabel: step.stepLabel,
                predicateId: step.predicateId,
                message: `${step.stepLabel} removes ${previous - step.count} of ${previous} subjects; check the codes and window.`,
            });
        }
    }

    const last = steps[steps.length - 1];
    if (last && last.count === 0) {
        warnings.push({ kind: 'empty_cohort', stepLabel: last.stepLabel, predicateId: last.predicateId, message: 'The cohort is empty.' });
    }
    if (last && last.count > ceiling) {
        warnings.push({
            kind: 'huge_cohort',
            stepLabel: last.stepLabel,
            predicateId: last.predicateId,
            message: `The cohort has ${last.count} subjects, above ${ceiling}.`,
        });
    }
    return warnings;
}
