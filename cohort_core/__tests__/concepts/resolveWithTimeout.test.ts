import { describe, expect, it } from 'vitest';
import { ConceptResolutionError, LlmConceptResolver, resolveWithTimeout } from '../../lib/concepts';
import { TableConceptResolver } from '../../lib/testing';
import { HEART_FAILURE_CODES } from '../criteriaFixtures';
import { ScriptedClient } from '../scriptedClient';

describe('resolveWithTimeout', () => {
    const resolver = new TableConceptResolver({
        'heart failure': HEART_FAILURE_CODES,
        'slow concept': 'hang',
        'broken concept': new Error('resolver exploded'),
    });

    it('passes resolved and unresolved answers through', async () => {
        const resolved = await resolveWithTimeout(resolver, { label: 'heart failure', domain: 'diagnosis' }, 100);
        const unresolved = await resolveWithTimeout(resolver, { label: 'frailty', domain: 'diagnosis', codeSystemHint: 'ICD10CM' }, 100);

        expect(resolved).toEqual({ status: 'resolved', resolution: HEART_FAILURE_CODES });
        expect(unresolved).toEqual({
            status: 'unresolved',
            resolution: {
                resolved: false,
                codeSystem: 'ICD10CM',
                codeValues: [],
                matchingLogic: 'exact',
                confidence: 'low',
                notes: 'No codes known for "frailty".',
            },
        });
    });

    it('turns a slow resolver into a timeout outcome and aborts it', async () => {
        const outcome = await resolveWithTimeout(resolver, { label: 'slow concept', domain: 'diagnosis' }, 20);

        expect(outcome).toEqual({ status: 'timeout', message: 'Concept resolution for "slow concept" exceeded 20ms.' });
    });

    it('turns a throwing resolver into a failed outcome', async () => {
        const outcome = await resolveWithTimeout(resolver, { label: 'broken concept', domain: 'drug' }, 100);

        expect(outcome).toEqual({ status: 'failed', message: 'resolver exploded' });
    });
});

describe('LlmConceptResolver', () => {
    it('validates the model answer', async () => {
        const client = new ScriptedClient([`\`\`\`json\n${JSON.stringify(HEART_FAILURE_CODES)}\n\`\`\``]);

        const resolution = await new LlmConceptResolver(client).resolve('heart failure', 'diagnosis', 'ICD10CM');

        expect(resolution).toEqual(HEART_FAILURE_CODES);
        expect(client.calls[0].messages[1]).toEqual({
            role: 'user',
            content: 'Concept: heart failure\nDomain: diagnosis\nPreferred code system: ICD10CM',
        });
    });

    it('rejects an answer of the wrong shape', async () => {
        const client = new ScriptedClient(['{"resolved": true}']);

        const error = await new LlmConceptResolver(client).resolve('heart failure', 'diagnosis').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ConceptResolutionError);
        expect(error).toMatchObject({ code: 'INVALID_RESPONSE' });
    });

    it('does not call the model once aborted', async () => {
        const client = new ScriptedClient([]);
        const controller = new AbortController();
        controller.abort();

        await expect(new LlmConceptResolver(client).resolve('x', 'lab', undefined, { signal: controller.signal }))
            .rejects.toMatchObject({ code: 'ABORTED' });
        expect(client.calls).toEqual([]);
    });
});
