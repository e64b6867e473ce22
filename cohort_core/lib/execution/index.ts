export { classifyExecutionError, extractMissingIdentifier, findSafetyViolation, isRepairable } from './classifyError';
export { PlanExecutionError } from './errors';
export { DEFAULT_HUGE_COHORT_CEILING, DEFAULT_PREVIEW_LIMIT, assertExecutionSucceeded, executePlan } from './executePlan';
export { DEFAULT_MAX_REPAIR_ATTEMPTS, runRepairLoop } from './repairLoop';
export type { RepairLoopParams } from './repairLoop';
export type {
    CohortPreviewRow,
    ExecutionErrorKind,
    ExecutionFailure,
    ExecutionFlag,
    ExecutionMode,
    ExecutionOptions,
    ExecutionResult,
    ExecutionSuccess,
    ExecutionTiming,
    RepairAttempt,
    RepairFailureReason,
    RepairOutcome,
} from './types';
