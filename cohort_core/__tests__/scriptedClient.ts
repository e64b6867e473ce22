import type { AiMessage, AiResponse, ChatCompletionClient, CompletionOptions } from '../lib/ai';

/** Answers completions from a fixed list of replies and records the messages it received. */
export class ScriptedClient implements ChatCompletionClient {
    readonly defaultModel = 'test-model';
    readonly calls: Array<{ messages: AiMessage[]; options: CompletionOptions | undefined }> = [];

    constructor(private readonly replies: string[]) {}

    async complete(messages: AiMessage[], options?: CompletionOptions): Promise<AiResponse> {
        this.calls.push({ messages, options });
        const reply = this.replies.shift();
        if (reply === undefined) {
            throw new Error('No scripted reply left');
        }
        return { content: reply, model: this.defaultModel };
    }
}
