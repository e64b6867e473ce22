export {
    BASE_STEP_LABEL,
    DEFAULT_FUNNEL_HUGE_COHORT_CEILING,
    DEFAULT_SUSPICIOUS_DROP_THRESHOLD,
    FINAL_STEP_LABEL,
    computeFunnel,
    percentOf,
} from './computeFunnel';
export { FunnelComputeError } from './errors';
export type { FunnelComputeErrorCode } from './errors';
export { FragmentCache, intersect } from './fragmentCache';
export type { FragmentCacheStats } from './fragmentCache';
export { StoreSubjectSource } from './storeSubjectSource';
export type {
    FunnelNote,
    FunnelOptions,
    FunnelReport,
    FunnelStep,
    FunnelStepKind,
    FunnelWarning,
    FunnelWarningKind,
    SubjectSource,
} from './types';
