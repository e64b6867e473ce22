import { z } from 'zod';
import { createCriteriaSet } from '../criteria/criteriaSet';
import type { CriteriaSet } from '../criteria/types';
import { AiClientError } from './errors';
import { INTERPRET_CRITERIA_V1 } from './prompts';
import { parseJsonAnswer } from './types';
import type { ChatCompletionClient } from './types';

const CriteriaDocumentSchema = z.record(z.unknown());

export interface InterpretOptions {
    studyId: string;
    signal?: AbortSignal;
}

/** Structures free-text criteria into a CriteriaSet. */
export interface CriteriaInterpreter {
    interpret(criteriaText: string, options: InterpretOptions): Promise<CriteriaSet>;
}

export class LlmCriteriaInterpreter implements CriteriaInterpreter {
    private readonly client: ChatCompletionClient;

    constructor(client: ChatCompletionClient) {
        this.client = client;
    }

    /** The answer is validated as a criteria document; the study id is always the caller's. */
    async interpret(criteriaText: string, options: InterpretOptions): Promise<CriteriaSet> {
        const messages = INTERPRET_CRITERIA_V1.buildMessages({ studyId: options.studyId, criteriaText });
        const response = await this.client.complete(messages, { signal: options.signal });

        const answer = parseJsonAnswer(response.content, CriteriaDocumentSchema);
        if (!answer.ok) {
            throw new AiClientError('INVALID_RESPONSE', `${INTERPRET_CRITERIA_V1.id}/${INTERPRET_CRITERIA_V1.version}: ${answer.error}`);
        }
        return createCriteriaSet({ ...answer.value, studyId: options.studyId });
    }
}
