/**
 * Upstream error types
 * Every failure talking to an external service is mapped to an UpstreamError
 * so callers can decide between retry, fallback and logging without sniffing messages.
 */

export type UpstreamErrorKind =
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'API_STATUS'
  | 'NOT_CONFIGURED';

export interface UpstreamErrorDetails {
  kind: UpstreamErrorKind;
  provider: string;
  stage: string;
  statusCode?: number;
  apiStatus?: string;
}

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly provider: string;
  readonly stage: string;
  readonly statusCode: number | undefined;
  readonly apiStatus: string | undefined;

  constructor(message: string, details: UpstreamErrorDetails) {
    super(message);
    this.name = 'UpstreamError';
    this.kind = details.kind;
    this.provider = details.provider;
    this.stage = details.stage;
    this.statusCode = details.statusCode;
    this.apiStatus = details.apiStatus;
  }

  /** Timeouts, transport failures, 429 and 5xx are worth another attempt */
  get isRetriable(): boolean {
    if (this.kind === 'TIMEOUT' || this.kind === 'NETWORK_ERROR') return true;
    if (this.kind === 'HTTP_ERROR' && this.statusCode !== undefined) {
      return this.statusCode === 429 || this.statusCode >= 500;
    }
    return this.apiStatus === 'OVER_QUERY_LIMIT' || this.apiStatus === 'UNKNOWN_ERROR';
  }
}

export function isUpstreamError(error: unknown): error is UpstreamError {
  return error instanceof UpstreamError;
}

/**
 * Raised by the text-generation collaborator when no usable answer comes back
 */
export class TextGenerationError extends Error {
  constructor(message: string, public readonly reason: 'NOT_CONFIGURED' | 'EMPTY_ANSWER' | 'PROVIDER_ERROR') {
    super(message);
    this.name = 'TextGenerationError';
  }
}
