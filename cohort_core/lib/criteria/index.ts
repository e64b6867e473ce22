export {
    applyCriteriaEdit,
    applyCriteriaEdits,
    createCriteriaSet,
    findPredicate,
    gapsFor,
    hasUsableResolution,
    isSkipped,
    listExclusion,
    listInclusion,
    requiresConceptResolution,
} from './criteriaSet';
export { CriteriaValidationError } from './errors';
export type { CriteriaIssue, CriteriaValidationErrorCode } from './errors';
export { ConceptResolutionSchema, CriteriaSetSchema, PredicateSchema } from './schema';
export type { CriteriaSetInput } from './schema';
export {
    CODE_SYSTEMS,
    CONFIDENCE_LEVELS,
    GAP_KINDS,
    MATCHING_LOGIC,
    NAMED_PERIODS,
    PREDICATE_DOMAINS,
    VALUE_OPERATORS,
} from './types';
export type {
    AlternativeResolution,
    AnchorRule,
    CodeSystem,
    ComparisonOperator,
    ConceptResolution,
    Confidence,
    CountConstraint,
    CriteriaEdit,
    CriteriaSet,
    Gap,
    GapKind,
    MatchingLogic,
    NamedPeriod,
    NumericRange,
    Polarity,
    Predicate,
    PredicateDomain,
    TemporalWindow,
    ValueConstraint,
    Verifiability,
} from './types';
