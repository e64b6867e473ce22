import { RESOLVE_CONCEPT_V1 } from '../ai/prompts';
import { parseJsonAnswer } from '../ai/types';
import type { ChatCompletionClient } from '../ai/types';
import { ConceptResolutionSchema } from '../criteria/schema';
import type { CodeSystem, ConceptResolution, PredicateDomain } from '../criteria/types';
import { ConceptResolutionError } from './errors';
import type { ConceptResolver, ResolveOptions } from './types';

/** Asks a chat-completions model for codes; the answer is validated before use. */
export class LlmConceptResolver implements ConceptResolver {
    private readonly client: ChatCompletionClient;

    constructor(client: ChatCompletionClient) {
        this.client = client;
    }

    async resolve(label: string, domain: PredicateDomain, codeSystemHint?: CodeSystem, options: ResolveOptions = {}): Promise<ConceptResolution> {
        if (options.signal?.aborted) {
            throw new ConceptResolutionError('ABORTED', `Resolution of "${label}" was aborted.`);
        }

        const messages = RESOLVE_CONCEPT_V1.buildMessages({ label, domain, codeSystemHint });
        const response = await this.client.complete(messages, { signal: options.signal });

        const answer = parseJsonAnswer(response.content, ConceptResolutionSchema);
        if (!answer.ok) {
            throw new ConceptResolutionError('INVALID_RESPONSE', `Concept "${label}": ${answer.error}`);
        }
        return answer.value;
    }
}
