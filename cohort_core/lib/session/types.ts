import type { CatalogAdapter } from '../catalog/types';
import type { CriteriaInterpreter } from '../ai/criteriaInterpreter';
import type { QueryPlan } from '../compiler/types';
import type { ConceptResolver } from '../concepts/types';
import type { CriteriaSet, Gap } from '../criteria/types';
import type { ExecutionMode, ExecutionOptions, ExecutionResult, RepairAttempt } from '../execution/types';
import type { FunnelNote, FunnelOptions, FunnelStep, FunnelWarning } from '../funnel/types';
import type { RunLogSink } from '../runtime/runLogging';
import type { CohortStore } from '../store/types';
import type { SessionState } from './transitions';

export interface CohortSessionOptions {
    store: CohortStore;
    catalog: CatalogAdapter;
    resolver?: ConceptResolver;
    interpreter?: CriteriaInterpreter;
    logSink?: RunLogSink;
    /** Generated with uuid v4 when omitted. */
    sessionId?: string;
    mode?: ExecutionMode;
    maxRepairAttempts?: number;
    resolverTimeoutMs?: number;
    execution?: ExecutionOptions;
    funnel?: FunnelOptions;
}

export interface StateTransition {
    from: SessionState;
    to: SessionState;
    reason: string;
    at: string;
}

export type SessionErrorStage = 'criteria' | 'concepts' | 'compile' | 'execute' | 'repair' | 'funnel';

/** Failure waiting for the user in awaiting_feedback. */
export interface SessionError {
    stage: SessionErrorStage;
    kind: string;
    message: string;
    predicateIds: readonly string[];
}

export interface PlanVersionSummary {
    version: number;
    planId: string;
    criteriaVersion: number;
    origin: 'compile' | 'repair';
    fragmentIds: readonly string[];
    gapIds: readonly string[];
}

export interface ResultBundle {
    sessionId: string;
    studyId: string | null;
    state: SessionState;
    criteria: CriteriaSet | null;
    plan: QueryPlan | null;
    /** Cohort query of the current plan. */
    queryText: string | null;
    /** Attrition query for the current enabled set. */
    funnelQueryText: string | null;
    planHistory: readonly PlanVersionSummary[];
    execution: ExecutionResult | null;
    repairAttempts: readonly RepairAttempt[];
    enabledIds: readonly string[];
    funnel: readonly FunnelStep[];
    funnelNotes: readonly FunnelNote[];
    gaps: readonly Gap[];
    warnings: readonly FunnelWarning[];
    lastError: SessionError | null;
    transitions: readonly StateTransition[];
}
