import { logger } from '../../../lib/logger/structured-logger.js';
import type { AnswerGenerator } from '../../../llm/answer-generator.js';
import type { InfoOutput } from '../dialogue.types.js';
import type { InfoSlots } from '../slot-gate.js';
import { classifyTurnError, TURN_FAILURE_MESSAGES } from '../turn-error-kinds.js';
import { pricingItems } from './pricing.js';

export function buildTopicPrompt(slots: InfoSlots): string {
  const lines = [`Question: ${slots.topic}`];
  if (slots.resolvedEntity) {
    lines.push(`"It" in the question refers to: ${slots.resolvedEntity}`);
  }
  return lines.join('\n');
}

/** Apology response for a failed answer; carries no data */
export function apologyOutput(): InfoOutput {
  return {
    mode: 'info',
    summary: TURN_FAILURE_MESSAGES.TEXT_GENERATION_FAILED,
    keyPoints: [],
    items: [],
    nextStep: 'Try again in a moment, or ask for a pairing or a local hunt plan.'
  };
}

export async function runInfo(slots: InfoSlots, generateAnswer: AnswerGenerator): Promise<InfoOutput> {
  let answer: string;
  try {
    answer = await generateAnswer(buildTopicPrompt(slots));
  } catch (error) {
    logger.warn({
      event: 'info_answer_failed',
      errorKind: classifyTurnError(error),
      error: error instanceof Error ? error.message : String(error)
    }, '[Info] Answer generation failed, returning apology');
    return apologyOutput();
  }

  return {
    mode: 'info',
    summary: answer,
    keyPoints: [],
    items: slots.resolvedEntity ? pricingItems(slots.resolvedEntity) : [],
    nextStep: 'If you want, ask for a pairing or a local hunt plan.'
  };
}
