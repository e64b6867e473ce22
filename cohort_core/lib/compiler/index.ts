export { compileQueryPlan } from './compileQueryPlan';
export { CriteriaCompileError } from './errors';
export type { CompileErrorDetail, CompileErrorKind } from './errors';
export {
    BASE_CTE,
    EXCLUDED_CTE,
    FINAL_CTE,
    INCLUDED_CTE,
    buildBaseQuery,
    buildCountQuery,
    buildFragmentQuery,
    buildFunnelQuery,
    buildPreviewQuery,
} from './planSql';
export { stripWildcard } from './predicateSql';
export { fragmentName, anchorName } from './sqlText';
export type {
    ColumnReference,
    CombinationRule,
    CompileOptions,
    CompileResult,
    PlanAnchor,
    PlanFragment,
    PlanSql,
    QueryPlan,
} from './types';
