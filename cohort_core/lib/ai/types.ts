import type { z } from 'zod';

export interface AiMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface AiResponse {
    content: string;
    model: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
    };
}

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface ChatCompletionClient {
    readonly defaultModel: string;
    complete(messages: AiMessage[], options?: CompletionOptions): Promise<AiResponse>;
}

export type JsonAnswer<T> =
    | { ok: true; value: T }
    | { ok: false; error: string; raw: string };

/**
 * Strip common LLM artifacts from JSON output.
 * Handles: code fences, leading/trailing whitespace, markdown wrapping.
 */
export function cleanJsonResponse(raw: string): string {
    let cleaned = raw.trim();

    const fenceMatch = cleaned.match(/^```(?:json)?\s*\n?([\s\S]*?)```\s*$/);
    if (fenceMatch) {
        cleaned = fenceMatch[1].trim();
    }

    cleaned = cleaned.replace(/^```\s*/gm, '').replace(/\s*```$/gm, '');

    return cleaned;
}

/** Parses a model answer as JSON and validates it against `schema`. */
export function parseJsonAnswer<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): JsonAnswer<T> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(cleanJsonResponse(raw));
    } catch (error) {
        return { ok: false, error: `Answer is not JSON: ${error instanceof Error ? error.message : String(error)}`, raw };
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        return { ok: false, error: `Answer does not match the expected shape: ${issues.join('; ')}`, raw };
    }
    return { ok: true, value: result.data };
}
