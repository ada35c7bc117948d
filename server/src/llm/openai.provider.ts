import OpenAI from "openai";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";
import { logger } from "../lib/logger/structured-logger.js";

export interface OpenAiProviderOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
}

export class OpenAiProvider implements LLMProvider {
    private readonly client: OpenAI;

    constructor(private readonly options: OpenAiProviderOptions) {
        // Retries are owned by the caller; the SDK's own would stack on top
        this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    }

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        const model = opts?.model || this.options.model;
        const timeoutMs = opts?.timeout ?? this.options.timeoutMs;
        const startTime = Date.now();

        const controller = new AbortController();
        const t = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const resp = await this.client.chat.completions.create({
                model,
                messages: messages.map(m => ({ role: m.role, content: m.content })),
                temperature: opts?.temperature ?? 0.4
            }, { signal: controller.signal });

            const text = resp.choices[0]?.message?.content ?? '';
            logger.info({
                provider: 'openai',
                model,
                durationMs: Date.now() - startTime,
                outputChars: text.length
            }, '[LLM] Completion finished');
            return text;
        } catch (e) {
            const aborted = controller.signal.aborted;
            logger.warn({
                provider: 'openai',
                model,
                aborted,
                durationMs: Date.now() - startTime,
                error: e instanceof Error ? e.message : String(e)
            }, '[LLM] Completion failed');
            throw e;
        } finally {
            clearTimeout(t);
        }
    }
}
