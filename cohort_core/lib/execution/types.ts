import type { CriteriaCompileError } from '../compiler/errors';
import type { QueryPlan } from '../compiler/types';
import type { Gap } from '../criteria/types';

export type ExecutionMode = 'count' | 'preview';

export type ExecutionErrorKind =
    | 'syntax_error'
    | 'schema_error'
    | 'timeout'
    | 'safety_violation'
    | 'database_error';

export type ExecutionFlag = 'empty_cohort' | 'huge_cohort';

export interface ExecutionTiming {
    countMs: number;
    previewMs: number | null;
    totalMs: number;
}

export interface CohortPreviewRow {
    subjectId: string;
    indexDate: string | null;
}

interface ExecutionResultBase {
    planId: string;
    planVersion: number;
    mode: ExecutionMode;
    timing: ExecutionTiming;
}

export interface ExecutionSuccess extends ExecutionResultBase {
    status: 'ok';
    rowCount: number;
    /** At most `previewLimit` rows; empty in count mode. */
    previewRows: readonly CohortPreviewRow[];
    flags: readonly ExecutionFlag[];
}

export interface ExecutionFailure extends ExecutionResultBase {
    status: 'error';
    rowCount: null;
    errorKind: ExecutionErrorKind;
    /** Verbatim message from the store. */
    errorMessage: string;
    previewRows: readonly [];
    flags: readonly [];
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export interface ExecutionOptions {
    timeoutMs?: number;
    previewLimit?: number;
    hugeCohortCeiling?: number;
}

export interface RepairAttempt {
    attempt: number;
    trigger: {
        errorKind: ExecutionErrorKind;
        errorMessage: string;
        missingIdentifier: string | null;
    };
    fromPlanId: string;
    fromVersion: number;
    toPlanId: string | null;
    toVersion: number | null;
    /** Recompiled plan; null when recompilation failed. */
    plan: QueryPlan | null;
    /** Line diff of the cohort query between the two plan versions. */
    diff: string | null;
    demoted: readonly Gap[];
    result: ExecutionResult | null;
    compileError: CriteriaCompileError | null;
}

export type RepairFailureReason = 'not_repairable' | 'attempts_exhausted' | 'compile_failed';

export type RepairOutcome =
    | {
        status: 'succeeded';
        plan: QueryPlan;
        result: ExecutionSuccess;
        attempts: readonly RepairAttempt[];
        demoted: readonly Gap[];
    }
    | {
        status: 'failed';
        reason: RepairFailureReason;
        plan: QueryPlan;
        result: ExecutionFailure;
        attempts: readonly RepairAttempt[];
        demoted: readonly Gap[];
        compileError: CriteriaCompileError | null;
    };
