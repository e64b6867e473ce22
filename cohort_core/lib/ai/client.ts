/**
 * Chat-completions client for an OpenAI-compatible endpoint (hosted API, vLLM,
 * llama.cpp). Model, temperature and timeout are configurable; callers may pass an
 * AbortSignal for cancellation.
 */
import { z } from 'zod';
import { AiClientError } from './errors';
import type { AiMessage, AiResponse, ChatCompletionClient, CompletionOptions } from './types';

const DEFAULT_TEMPERATURE = 0; // JSON answers; keep them repeatable
const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TIMEOUT_MS = 30_000;

const CompletionBodySchema = z.object({
    model: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable() }),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number(),
        completion_tokens: z.number(),
    }).optional(),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ChatClientOptions {
    /** Full chat-completions URL, e.g. `https://host/v1/chat/completions`. */
    endpoint: string;
    model: string;
    apiKey?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

export class OpenAiCompatibleClient implements ChatCompletionClient {
    private readonly endpoint: string;
    private readonly model: string;
    private readonly apiKey: string | undefined;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor(options: ChatClientOptions) {
        this.endpoint = options.endpoint;
        this.model = options.model;
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    /** Default model name for provenance tracking */
    get defaultModel(): string {
        return this.model;
    }

    async complete(messages: AiMessage[], opts: CompletionOptions = {}): Promise<AiResponse> {
        const {
            model = this.model,
            temperature = DEFAULT_TEMPERATURE,
            maxTokens = DEFAULT_MAX_TOKENS,
            signal,
            timeoutMs = this.timeoutMs,
        } = opts;

        const timeoutSignal = AbortSignal.timeout(timeoutMs);
        const combinedSignal = signal
            ? AbortSignal.any([signal, timeoutSignal])
            : timeoutSignal;

        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.apiKey) {
            headers.Authorization = `Bearer ${this.apiKey}`;
        }

        let res: Response;
        try {
            res = await this.fetchImpl(this.endpoint, {
                method: 'POST',
                headers,
                body: JSON.stringify({
                    messages,
                    model,
                    temperature,
                    max_tokens: maxTokens,
                    stream: false,
                }),
                signal: combinedSignal,
            });
        } catch (error) {
            console.error('[OpenAiCompatibleClient] Error:', error);
            const message = error instanceof Error ? error.message : String(error);
            throw new AiClientError('REQUEST_FAILED', `AI request failed: ${message}`);
        }

        if (!res.ok) {
            throw new AiClientError('HTTP_ERROR', `AI server responded with ${res.status}: ${res.statusText}`, res.status);
        }

        const body = CompletionBodySchema.safeParse(await res.json());
        if (!body.success) {
            throw new AiClientError('INVALID_RESPONSE', 'AI server returned an unexpected completion body.');
        }

        const data = body.data;
        return {
            content: data.choices[0].message.content ?? '',
            model: data.model ?? model,
            usage: data.usage
                ? { promptTokens: data.usage.prompt_tokens, completionTokens: data.usage.completion_tokens }
                : undefined,
        };
    }
}
