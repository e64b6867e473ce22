export { CohortSession, DEFAULT_RESOLVER_TIMEOUT_MS } from './cohortSession';
export { SessionStateError } from './errors';
export type { SessionStateErrorCode } from './errors';
export { conceptsReady, pendingConceptPredicates } from './readiness';
export { ALLOWED_TRANSITIONS, APPROVAL_TOKENS, SESSION_STATES, WAITING_STATES, canTransition, isApprovalToken } from './transitions';
export type { SessionState } from './transitions';
export type {
    CohortSessionOptions,
    PlanVersionSummary,
    ResultBundle,
    SessionError,
    SessionErrorStage,
    StateTransition,
} from './types';
