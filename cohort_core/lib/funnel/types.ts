import type { QueryPlan } from '../compiler/types';

export type FunnelStepKind = 'base' | 'inclusion' | 'final';

export interface FunnelStep {
    stepLabel: string;
    kind: FunnelStepKind;
    /** Predicate id for inclusion steps, otherwise `base` or `final`. */
    predicateId: string;
    count: number;
    /** Percentage of the base population, one decimal; 0 when the base is empty. */
    percentOfBase: number;
    removedFromPrevious: number;
}

export type FunnelWarningKind = 'suspicious_drop' | 'empty_cohort' | 'huge_cohort';

export interface FunnelWarning {
    kind: FunnelWarningKind;
    stepLabel: string;
    predicateId: string;
    message: string;
}

export interface FunnelNote {
    predicateId: string;
    note: 'ignored';
    reason: string;
}

export interface FunnelReport {
    planId: string;
    planVersion: number;
    /** Enabled ids that have a compiled fragment, in plan order. */
    enabledIds: readonly string[];
    steps: readonly FunnelStep[];
    warnings: readonly FunnelWarning[];
    notes: readonly FunnelNote[];
    /** Parallel attrition query for the same enabled set. */
    sql: string;
}

export interface FunnelOptions {
    /** Fraction of the previous step; a larger drop is flagged. Default 0.95. */
    suspiciousDropThreshold?: number;
    hugeCohortCeiling?: number;
}

/** Subject ids behind the base population and each compiled fragment. */
export interface SubjectSource {
    fetchBase(plan: QueryPlan): Promise<ReadonlySet<string>>;
    fetchFragment(plan: QueryPlan, predicateId: string): Promise<ReadonlySet<string>>;
}
