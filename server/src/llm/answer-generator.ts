/**
 * generateAnswer: free-text answer for an Info topic.
 * Every failure surfaces as TextGenerationError so the caller has one thing to catch.
 */

import type { LLMProvider, Message } from "./types.js";
import { TextGenerationError } from "../lib/errors/upstream-error.js";
import { isTimeoutError, withTimeout } from "../lib/reliability/timeout-guard.js";

export type AnswerGenerator = (topicPrompt: string) => Promise<string>;

const SYSTEM_PROMPT = [
    'You are a knowledgeable bourbon and cigar guide.',
    'Answer in plain prose, at most five short sentences.',
    'Be concrete: name distilleries, proof ranges, wrappers and price tiers where relevant.',
    'If you are not sure about a fact, say so instead of guessing.'
].join(' ');

export function createAnswerGenerator(provider: LLMProvider | null, timeoutMs: number): AnswerGenerator {
    return async (topicPrompt: string): Promise<string> => {
        if (!provider) {
            throw new TextGenerationError('No text-generation provider configured', 'NOT_CONFIGURED');
        }

        const messages: Message[] = [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: topicPrompt }
        ];

        let answer: string;
        try {
            answer = await withTimeout(provider.complete(messages, { timeout: timeoutMs }), timeoutMs + 500, 'generate_answer');
        } catch (error) {
            const detail = isTimeoutError(error) ? 'timed out' : error instanceof Error ? error.message : String(error);
            throw new TextGenerationError(`Text generation failed: ${detail}`, 'PROVIDER_ERROR');
        }

        const trimmed = answer.trim();
        if (!trimmed) {
            throw new TextGenerationError('Text generation returned an empty answer', 'EMPTY_ANSWER');
        }
        return trimmed;
    };
}
