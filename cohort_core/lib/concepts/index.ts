export { ConceptResolutionError } from './errors';
export type { ConceptResolutionErrorCode } from './errors';
export { LlmConceptResolver } from './llmConceptResolver';
export { ReferenceTableConceptResolver, scoreMatch } from './referenceTableResolver';
export type { ReferenceTableResolverOptions } from './referenceTableResolver';
export { resolveWithTimeout } from './resolveWithTimeout';
export type { ConceptMatch, ConceptOutcome, ConceptRequest, ConceptResolver, ResolveOptions } from './types';
