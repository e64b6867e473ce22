import type { CatalogAdapter } from '../catalog/types';
import { compileQueryPlan } from '../compiler/compileQueryPlan';
import type { QueryPlan } from '../compiler/types';
import type { CriteriaSet, Gap } from '../criteria/types';
import type { CohortStore } from '../store/types';
import { createPlanDiff } from '../utils/planDiff';
import { extractMissingIdentifier, isRepairable } from './classifyError';
import { executePlan } from './executePlan';
import type { ExecutionMode, ExecutionOptions, ExecutionResult, RepairAttempt, RepairOutcome } from './types';

export const DEFAULT_MAX_REPAIR_ATTEMPTS = 3;

export interface RepairLoopParams {
    store: CohortStore;
    catalog: CatalogAdapter;
    criteria: CriteriaSet;
    plan: QueryPlan;
    mode: ExecutionMode;
    options?: ExecutionOptions;
    maxRepairAttempts?: number;
    /** Result of a run the caller already made with `plan`; skips the first execution. */
    initialResult?: ExecutionResult;
    onAttempt?: (attempt: RepairAttempt) => void | Promise<void>;
}

/**
 * Executes a plan and, on syntax, schema or timeout failures, recompiles it against a
 * freshly fetched catalog and retries, at most `maxRepairAttempts` times. Predicates whose
 * table or column the refreshed catalog lacks are demoted to gaps instead of retried.
 * Every attempt carries the diff between the plan versions it moved between.
 */
export async function runRepairLoop(params: RepairLoopParams): Promise<RepairOutcome> {
    const maxAttempts = Math.max(0, Math.trunc(params.maxRepairAttempts ?? DEFAULT_MAX_REPAIR_ATTEMPTS));
    const attempts: RepairAttempt[] = [];
    let demoted: Gap[] = [];
    let plan = params.plan;
    let result = params.initialResult ?? await executePlan(params.store, plan, params.mode, params.options);

    while (result.status === 'error') {
        if (!isRepairable(result.errorKind)) {
            return { status: 'failed', reason: 'not_repairable', plan, result, attempts, demoted, compileError: null };
        }
        if (attempts.length >= maxAttempts) {
            return { status: 'failed', reason: 'attempts_exhausted', plan, result, attempts, demoted, compileError: null };
        }

        const trigger = {
            errorKind: result.errorKind,
            errorMessage: result.errorMessage,
            missingIdentifier: extractMissingIdentifier(result.errorMessage),
        };
        const schema = await params.catalog.getSchema();
        const compiled = compileQueryPlan(params.criteria, schema, {
            planVersion: plan.version + 1,
            demoteMissingReferences: true,
        });

        if (!compiled.ok) {
            const attempt: RepairAttempt = {
                attempt: attempts.length + 1,
                trigger,
                fromPlanId: plan.planId,
                fromVersion: plan.version,
                toPlanId: null,
                toVersion: null,
                plan: null,
                diff: null,
                demoted: [],
                result: null,
                compileError: compiled.error,
            };
            attempts.push(attempt);
            await params.onAttempt?.(attempt);
            return { status: 'failed', reason: 'compile_failed', plan, result, attempts, demoted, compileError: compiled.error };
        }

        const next = compiled.plan;
        const diff = createPlanDiff(
            `plan v${plan.version} (${plan.planId.slice(0, 12)})`,
            `plan v${next.version} (${next.planId.slice(0, 12)})`,
            plan.sql.cohort,
            next.sql.cohort,
        );
        result = await executePlan(params.store, next, params.mode, params.options);
        demoted = [...compiled.demoted];

        const attempt: RepairAttempt = {
            attempt: attempts.length + 1,
            trigger,
            fromPlanId: plan.planId,
            fromVersion: plan.version,
            toPlanId: next.planId,
            toVersion: next.version,
            plan: next,
            diff: diff.text,
            demoted: compiled.demoted,
            result,
            compileError: null,
        };
        attempts.push(attempt);
        await params.onAttempt?.(attempt);
        plan = next;
    }

    return { status: 'succeeded', plan, result, attempts, demoted };
}
