import { describe, expect, it, vi } from 'vitest';
import { AiClientError, OpenAiCompatibleClient } from '../../lib/ai';
import type { FetchLike } from '../../lib/ai';

const ENDPOINT = 'http://localhost:8000/v1/chat/completions';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function recordingFetch(response: Response): { fetchImpl: FetchLike; requests: Array<{ url: string; init: RequestInit }> } {
    const requests: Array<{ url: string; init: RequestInit }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
        requests.push({ url, init });
        return response;
    };
    return { fetchImpl, requests };
}

describe('OpenAiCompatibleClient', () => {
    it('posts the messages and maps the completion', async () => {
        const { fetchImpl, requests } = recordingFetch(jsonResponse({
            model: 'served-model',
            choices: [{ message: { content: '{"ok":true}' } }],
            usage: { prompt_tokens: 12, completion_tokens: 5 },
        }));
        const client = new OpenAiCompatibleClient({ endpoint: ENDPOINT, model: 'test-model', apiKey: 'test-secret', fetchImpl });

        const response = await client.complete([{ role: 'user', content: 'hello' }]);

        expect(response).toEqual({ content: '{"ok":true}', model: 'served-model', usage: { promptTokens: 12, completionTokens: 5 } });
        expect(client.defaultModel).toBe('test-model');
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe(ENDPOINT);
        expect(requests[0].init.method).toBe('POST');
        expect(requests[0].init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
        const body = requests[0].init.body;
        expect(typeof body === 'string' ? JSON.parse(body) : null).toEqual({
            messages: [{ role: 'user', content: 'hello' }],
            model: 'test-model',
            temperature: 0,
            max_tokens: 2048,
            stream: false,
        });
    });

    it('sends per-call overrides and no auth header without a key', async () => {
        const { fetchImpl, requests } = recordingFetch(jsonResponse({ choices: [{ message: { content: null } }] }));
        const client = new OpenAiCompatibleClient({ endpoint: ENDPOINT, model: 'test-model', fetchImpl });

        const response = await client.complete([{ role: 'user', content: 'hi' }], { model: 'other-model', temperature: 0.5, maxTokens: 64 });

        expect(response).toEqual({ content: '', model: 'other-model', usage: undefined });
        expect(requests[0].init.headers).toEqual({ 'Content-Type': 'application/json' });
        const body = requests[0].init.body;
        expect(typeof body === 'string' ? JSON.parse(body) : null).toMatchObject({ model: 'other-model', temperature: 0.5, max_tokens: 64 });
    });

    it('reports HTTP failures with their status', async () => {
        const { fetchImpl } = recordingFetch(new Response('busy', { status: 503, statusText: 'Service Unavailable' }));
        const client = new OpenAiCompatibleClient({ endpoint: ENDPOINT, model: 'test-model', fetchImpl });

        const error = await client.complete([]).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(AiClientError);
        expect(error).toMatchObject({ code: 'HTTP_ERROR', status: 503, message: 'AI server responded with 503: Service Unavailable' });
    });

    it('rejects a body without choices', async () => {
        const { fetchImpl } = recordingFetch(jsonResponse({ choices: [] }));
        const client = new OpenAiCompatibleClient({ endpoint: ENDPOINT, model: 'test-model', fetchImpl });

        await expect(client.complete([])).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    });

    it('wraps transport errors', async () => {
        const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const fetchImpl: FetchLike = async () => {
            throw new Error('socket hang up');
        };
        const client = new OpenAiCompatibleClient({ endpoint: ENDPOINT, model: 'test-model', fetchImpl });

        await expect(client.complete([])).rejects.toMatchObject({ code: 'REQUEST_FAILED', message: 'AI request failed: socket hang up' });
        expect(logged).toHaveBeenCalledTimes(1);
    });
});
