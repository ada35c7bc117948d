/**
 * Fetch JSON
 *
 * Thin wrapper over native fetch used by the Google clients. Transport and HTTP
 * failures are mapped to UpstreamError; timeouts are enforced by the caller's
 * RetryPolicy through the abort signal.
 */

import { logger } from '../lib/logger/structured-logger.js';
import { UpstreamError } from '../lib/errors/upstream-error.js';

export interface FetchJsonConfig {
  provider: string;
  stage: string;
  signal?: AbortSignal;
}

export async function fetchJson(url: string, options: RequestInit, config: FetchJsonConfig): Promise<unknown> {
  const startTime = Date.now();
  const urlObj = new URL(url);
  // Never log query strings: they carry API keys
  const target = `${urlObj.host}${urlObj.pathname}`;

  let response: Response;
  try {
    response = await fetch(url, { ...options, ...(config.signal && { signal: config.signal }) });
  } catch (err) {
    const aborted = config.signal?.aborted === true || (err instanceof Error && err.name === 'AbortError');
    const kind = aborted ? 'TIMEOUT' : 'NETWORK_ERROR';
    logger.warn({
      provider: config.provider,
      stage: config.stage,
      target,
      errorKind: kind,
      durationMs: Date.now() - startTime,
      error: err instanceof Error ? err.message : String(err)
    }, '[FETCH] Request failed');
    throw new UpstreamError(`${config.provider} ${kind.toLowerCase()} calling ${target}`, {
      kind,
      provider: config.provider,
      stage: config.stage
    });
  }

  logger.debug({
    provider: config.provider,
    stage: config.stage,
    target,
    statusCode: response.status,
    durationMs: Date.now() - startTime
  }, '[FETCH] Response');

  if (!response.ok) {
    throw new UpstreamError(`${config.provider} returned HTTP ${response.status}`, {
      kind: 'HTTP_ERROR',
      provider: config.provider,
      stage: config.stage,
      statusCode: response.status
    });
  }

  try {
    return await response.json();
  } catch {
    throw new UpstreamError(`${config.provider} returned a non-JSON body`, {
      kind: 'HTTP_ERROR',
      provider: config.provider,
      stage: config.stage,
      statusCode: response.status
    });
  }
}
