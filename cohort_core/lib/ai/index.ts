export { OpenAiCompatibleClient } from './client';
export type { ChatClientOptions, FetchLike } from './client';
export { LlmCriteriaInterpreter } from './criteriaInterpreter';
export type { CriteriaInterpreter, InterpretOptions } from './criteriaInterpreter';
export { AiClientError } from './errors';
export type { AiClientErrorCode } from './errors';
export { INTERPRET_CRITERIA_V1, RESOLVE_CONCEPT_V1 } from './prompts';
export type { InterpretCriteriaInput, PromptTemplate, ResolveConceptInput } from './prompts';
export { cleanJsonResponse, parseJsonAnswer } from './types';
export type { AiMessage, AiResponse, ChatCompletionClient, CompletionOptions, JsonAnswer } from './types';
