import { buildCountQuery, buildPreviewQuery } from '../compiler/planSql';
import type { QueryPlan } from '../compiler/types';
import { CohortStoreError } from '../store/errors';
import { readCount, readSubjectId } from '../store/rows';
import type { CohortStore, SqlRow } from '../store/types';
import { withTimeout } from '../utils/withTimeout';
import { classifyExecutionError, findSafetyViolation } from './classifyError';
import { PlanExecutionError } from './errors';
import type { CohortPreviewRow, ExecutionErrorKind, ExecutionFailure, ExecutionFlag, ExecutionMode, ExecutionOptions, ExecutionResult, ExecutionSuccess } from './types';

export const DEFAULT_PREVIEW_LIMIT = 10;
export const DEFAULT_HUGE_COHORT_CEILING = 1_000_000;

/**
 * Runs a plan count-first: the count query always completes before any row is read,
 * and preview mode then fetches at most `previewLimit` rows. Failures come back as
 * classified results, never as exceptions.
 */
export async function executePlan(
    store: CohortStore,
    plan: QueryPlan,
    mode: ExecutionMode,
    options: ExecutionOptions = {},
): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const previewLimit = Math.max(0, Math.trunc(options.previewLimit ?? DEFAULT_PREVIEW_LIMIT));
    const ceiling = options.hugeCohortCeiling ?? DEFAULT_HUGE_COHORT_CEILING;

    const countSql = buildCountQuery(plan);
    const previewSql = buildPreviewQuery(plan, previewLimit);
    const violation = findSafetyViolation(countSql) ?? (mode === 'preview' ? findSafetyViolation(previewSql) : null);
    if (violation) {
        return failure(plan, mode, 'safety_violation', violation, { countMs: 0, previewMs: null, totalMs: Date.now() - startedAt });
    }

    let rowCount: number;
    const countStartedAt = Date.now();
    try {
        const rows = await runQuery(store, countSql, options.timeoutMs);
        rowCount = readCount(rows[0]);
    } catch (error) {
        const classified = classifyExecutionError(error);
        const countMs = Date.now() - countStartedAt;
        return failure(plan, mode, classified.kind, classified.message, { countMs, previewMs: null, totalMs: Date.now() - startedAt });
    }
    const countMs = Date.now() - countStartedAt;

    let previewRows: CohortPreviewRow[] = [];
    let previewMs: number | null = null;
    if (mode === 'preview' && rowCount > 0 && previewLimit > 0) {
        const previewStartedAt = Date.now();
        try {
            const rows = await runQuery(store, previewSql, options.timeoutMs);
            previewRows = rows.slice(0, previewLimit).map(toPreviewRow);
        } catch (error) {
            const classified = classifyExecutionError(error);
            previewMs = Date.now() - previewStartedAt;
            return failure(plan, mode, classified.kind, classified.message, { countMs, previewMs, totalMs: Date.now() - startedAt });
        }
        previewMs = Date.now() - previewStartedAt;
    }

    const flags: ExecutionFlag[] = [];
    if (rowCount === 0) {
        flags.push('empty_cohort');
    }
    if (rowCount > ceiling) {
        flags.push('huge_cohort');
    }

    return {
        status: 'ok',
        planId: plan.planId,
        planVersion: plan.version,
        mode,
        rowCount,
        timing: { countMs, previewMs, totalMs: Date.now() - startedAt },
        previewRows,
        flags,
    };
}

function runQuery(store: CohortStore, sql: string, timeoutMs: number | undefined): Promise<SqlRow[]> {
    return withTimeout(
        store.query(sql, { timeoutMs }),
        timeoutMs,
        () => new CohortStoreError('TIMEOUT', `Query exceeded ${timeoutMs}ms.`),
    );
}

function toPreviewRow(row: SqlRow): CohortPreviewRow {
    const indexDate = row.index_date;
    return {
        subjectId: readSubjectId(row.subject_id) ?? '',
        indexDate: typeof indexDate === 'string' ? indexDate : null,
    };
}

function failure(
    plan: QueryPlan,
    mode: ExecutionMode,
    errorKind: ExecutionErrorKind,
    errorMessage: string,
    timing: ExecutionFailure['timing'],
): ExecutionFailure {
    return {
        status: 'error',
        planId: plan.planId,
        planVersion: plan.version,
        mode,
        rowCount: null,
        errorKind,
        errorMessage,
        timing,
        previewRows: [],
        flags: [],
    };
}

export function assertExecutionSucceeded(result: ExecutionResult): asserts result is ExecutionSuccess {
    if (result.status === 'error') {
        throw new PlanExecutionError(result.errorKind, result.errorMessage);
    }
}
