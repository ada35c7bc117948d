import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.string().default('development'),
    GOOGLE_API_KEY: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_PROVIDER: z.enum(['openai', 'none']).default('openai'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    GEOCODE_COUNTRY: z.string().length(2).default('US'),
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(30),
});

export type AppConfig = {
    port: number;
    nodeEnv: string;
    googleApiKey: string | undefined;
    openaiApiKey: string | undefined;
    openaiModel: string;
    llmProvider: 'openai' | 'none';
    llmTimeoutMs: number;
    geocodeCountry: string;
    sessionTtlMs: number;
};

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Empty strings from .env files mean "unset"
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = EnvSchema.parse(cleaned);

    return {
        port: parsed.PORT,
        nodeEnv: parsed.NODE_ENV,
        googleApiKey: parsed.GOOGLE_API_KEY,
        openaiApiKey: parsed.OPENAI_API_KEY,
        openaiModel: parsed.OPENAI_MODEL,
        llmProvider: parsed.LLM_PROVIDER,
        llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
        geocodeCountry: parsed.GEOCODE_COUNTRY.toUpperCase(),
        sessionTtlMs: parsed.SESSION_TTL_MINUTES * 60 * 1000,
    };
}
