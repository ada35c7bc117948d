import type { LLMProvider } from "./types.js";
import { OpenAiProvider } from "./openai.provider.js";
import type { AppConfig } from "../config/env.js";

export function createLLMProvider(config: Pick<AppConfig, 'llmProvider' | 'openaiApiKey' | 'openaiModel' | 'llmTimeoutMs'>): LLMProvider | null {
    switch (config.llmProvider) {
        case "openai": {
            if (!config.openaiApiKey) return null;
            return new OpenAiProvider({
                apiKey: config.openaiApiKey,
                model: config.openaiModel,
                timeoutMs: config.llmTimeoutMs
            });
        }
        case "none":
            return null;
    }
}
