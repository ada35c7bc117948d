/**
 * Turn failure taxonomy, used for logging only: every kind is recovered
 * before the response leaves processTurn.
 */

import { ZodError } from 'zod';
import { isUpstreamError, TextGenerationError } from '../../lib/errors/upstream-error.js';
import { isTimeoutError } from '../../lib/reliability/timeout-guard.js';

export type TurnErrorKind =
  | 'UPSTREAM_UNAVAILABLE'
  | 'SCHEMA_DRIFT'
  | 'TEXT_GENERATION_FAILED'
  | 'INTERNAL_ERROR';

export function classifyTurnError(error: unknown): TurnErrorKind {
  if (error instanceof TextGenerationError) return 'TEXT_GENERATION_FAILED';
  if (isUpstreamError(error) || isTimeoutError(error)) return 'UPSTREAM_UNAVAILABLE';
  if (error instanceof ZodError) return 'SCHEMA_DRIFT';
  return 'INTERNAL_ERROR';
}

export const TURN_FAILURE_MESSAGES: Record<TurnErrorKind, string> = {
  UPSTREAM_UNAVAILABLE: 'A lookup service is not responding right now.',
  SCHEMA_DRIFT: 'I got a garbled answer back and could not use it.',
  TEXT_GENERATION_FAILED: "Sorry, I couldn't put an answer together right now.",
  INTERNAL_ERROR: 'Something went wrong on my side handling that message.'
};
