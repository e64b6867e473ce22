import type { AnchorRule, Gap, Polarity, PredicateDomain } from '../criteria/types';
import type { CriteriaCompileError } from './errors';

export interface ColumnReference {
    table: string;
    column: string;
}

export interface PlanFragment {
    /** CTE name, `p_<predicateId>`. */
    name: string;
    predicateId: string;
    polarity: Polarity;
    domain: PredicateDomain;
    concept: string;
    /** Body of the CTE; selects DISTINCT subject_id. */
    sql: string;
    /** Anchor CTE names the body joins against. */
    anchors: readonly string[];
    references: readonly ColumnReference[];
}

export interface PlanAnchor {
    name: string;
    cteName: string;
    kind: AnchorRule['kind'];
    /** Body of the CTE; selects subject_id, anchor_date. */
    sql: string;
    /** Anchor CTE names this body joins against. */
    upstream: readonly string[];
    references: readonly ColumnReference[];
}

export interface CombinationRule {
    inclusion: readonly string[];
    exclusion: readonly string[];
    /** Always `included EXCEPT excluded`. */
    final: 'included_minus_excluded';
}

export interface PlanSql {
    base: string;
    cohort: string;
    count: string;
    funnel: string;
}

export interface QueryPlan {
    planId: string;
    version: number;
    studyId: string;
    criteriaVersion: number;
    population: { table: string; subjectColumn: string };
    indexAnchor: string | null;
    anchors: readonly PlanAnchor[];
    fragments: readonly PlanFragment[];
    gaps: readonly Gap[];
    combination: CombinationRule;
    sql: PlanSql;
}

export interface CompileOptions {
    /** Version stamped on the plan; the caller bumps it on every recompile. */
    planVersion?: number;
    /**
     * Predicates whose table or column is absent from the catalog become `schema_demoted`
     * gaps instead of failing compilation. Used when recompiling after a schema error.
     */
    demoteMissingReferences?: boolean;
}

export type CompileResult =
    | { ok: true; plan: QueryPlan; demoted: readonly Gap[] }
    | { ok: false; error: CriteriaCompileError };
