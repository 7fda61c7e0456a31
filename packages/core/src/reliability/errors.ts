/**
 * Error Taxonomy
 *
 * Every error the client raises carries a code, knows whether a retry may
 * succeed, and maps to a CLI exit code:
 *
 * | Range | Category                          |
 * |-------|-----------------------------------|
 * | 10-19 | transient, retried by the client  |
 * | 20-29 | bad input                         |
 * | 30-39 | request refused by the service    |
 * | 40-49 | client-side faults                |
 *
 * @module @nowcast/core/reliability/errors
 */

const EXIT_CODES = {
  RATE_LIMITED: 10,
  TIMEOUT: 11,
  NETWORK_ERROR: 12,
  SERVICE_UNAVAILABLE: 13,
  UPSTREAM_ERROR: 14,

  VALIDATION_ERROR: 20,
  FREQUENCY_INFERENCE_ERROR: 21,
  PAYLOAD_TOO_LARGE: 22,

  BAD_REQUEST: 30,
  UNAUTHORIZED: 31,
  NOT_FOUND: 32,

  ASSEMBLY_ERROR: 40,
  CONFIGURATION_ERROR: 41,
  INTERNAL_ERROR: 42,
  UNHANDLED_ERROR: 43,
} as const;

export type NowcastErrorCode = keyof typeof EXIT_CODES;

export interface NowcastErrorOptions {
  code: NowcastErrorCode;
  retryable?: boolean;
  /** Server-suggested wait before the next attempt */
  retryAfterMs?: number;
  context?: Record<string, unknown>;
  cause?: Error;
}

export class NowcastError extends Error {
  readonly code: NowcastErrorCode;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly context?: Record<string, unknown>;
  readonly timestamp = new Date();

  constructor(message: string, options: NowcastErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'NowcastError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

const TRANSIENT_MESSAGES = ['timeout', 'econnreset', 'econnrefused', 'socket hang up'];

/**
 * Our errors say so themselves; foreign errors are judged by message
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof NowcastError) return error.retryable;
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
}

export function toExitCode(error: unknown): number {
  return error instanceof NowcastError ? EXIT_CODES[error.code] : 1;
}
