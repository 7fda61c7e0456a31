/**
 * Forecasting Errors
 *
 * Distinct error classes for every failure kind the client surfaces. All of
 * them extend `NowcastError`, so `isRetryable()` and `toExitCode()` work on
 * them unchanged.
 */

import { NowcastError, type NowcastErrorCode } from '@nowcast/core';

// =============================================================================
// Configuration
// =============================================================================

export class ConfigurationError extends NowcastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'CONFIGURATION_ERROR', retryable: false, context });
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// Input validation
// =============================================================================

export type DataValidationKind =
  | 'missing-column'
  | 'non-numeric'
  | 'missing-values'
  | 'invalid-time'
  | 'duplicate'
  | 'gap'
  | 'frequency-mismatch'
  | 'exogenous'
  | 'series-too-short'
  | 'invalid-argument';

export interface DataValidationDetails {
  seriesId?: string | number;
  column?: string;
  row?: number;
  /** Offending or missing timestamps, rendered in the input's time encoding */
  timestamps?: Array<string | number>;
}

export class DataValidationError extends NowcastError {
  readonly kind: DataValidationKind;
  readonly details: DataValidationDetails;

  constructor(kind: DataValidationKind, message: string, details: DataValidationDetails = {}) {
    super(message, {
      code: 'VALIDATION_ERROR',
      retryable: false,
      context: { kind, ...details },
    });
    this.name = 'DataValidationError';
    this.kind = kind;
    this.details = details;
  }
}

export class FrequencyInferenceError extends NowcastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'FREQUENCY_INFERENCE_ERROR', retryable: false, context });
    this.name = 'FrequencyInferenceError';
  }
}

export class PayloadTooLargeError extends NowcastError {
  readonly seriesId: string | number;
  readonly encodedBytes: number;
  readonly maxBatchBytes: number;

  constructor(seriesId: string | number, encodedBytes: number, maxBatchBytes: number) {
    super(
      `Series ${JSON.stringify(seriesId)} encodes to ${encodedBytes} bytes, ` +
        `above the batch limit of ${maxBatchBytes} bytes`,
      {
        code: 'PAYLOAD_TOO_LARGE',
        retryable: false,
        context: { seriesId, encodedBytes, maxBatchBytes },
      }
    );
    this.name = 'PayloadTooLargeError';
    this.seriesId = seriesId;
    this.encodedBytes = encodedBytes;
    this.maxBatchBytes = maxBatchBytes;
  }
}

// =============================================================================
// Transport
// =============================================================================

/**
 * HTTP statuses that are worth another attempt
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 409, 429, 500, 502, 503, 504];

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status) || (status >= 500 && status < 600);
}

function codeForStatus(status: number): NowcastErrorCode {
  if (status === 429) return 'RATE_LIMITED';
  if (status === 408) return 'TIMEOUT';
  if (status === 401 || status === 403) return 'UNAUTHORIZED';
  if (status === 404) return 'NOT_FOUND';
  if (status === 503) return 'SERVICE_UNAVAILABLE';
  if (status >= 500) return 'UPSTREAM_ERROR';
  return 'BAD_REQUEST';
}

export interface ApiErrorDetails {
  body?: unknown;
  /** Machine-readable error code from the service */
  errorCode?: string;
  /** Support contact reference from the service */
  supportContact?: string;
  requestId?: string;
  retryAfterMs?: number;
}

/**
 * Non-2xx answer from the service
 */
export class ApiError extends NowcastError {
  readonly statusCode: number;
  readonly body?: unknown;
  readonly errorCode?: string;
  readonly supportContact?: string;
  readonly requestId?: string;

  constructor(statusCode: number, message: string, details: ApiErrorDetails = {}) {
    super(message, {
      code: codeForStatus(statusCode),
      retryable: isRetryableStatus(statusCode),
      retryAfterMs: details.retryAfterMs,
      context: {
        statusCode,
        errorCode: details.errorCode,
        requestId: details.requestId,
      },
    });
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.body = details.body;
    this.errorCode = details.errorCode;
    this.supportContact = details.supportContact;
    this.requestId = details.requestId;
  }
}

/**
 * Connection failure or per-call timeout; always retryable
 */
export class TransportError extends NowcastError {
  constructor(message: string, code: 'NETWORK_ERROR' | 'TIMEOUT', cause?: Error) {
    super(message, { code, retryable: true, cause });
    this.name = 'TransportError';
  }
}

/**
 * One or more batches of a partitioned operation failed terminally
 */
export class BatchFailureError extends NowcastError {
  readonly failures: ReadonlyArray<{ batchIndex: number; error: unknown }>;
  readonly batchCount: number;

  constructor(failures: Array<{ batchIndex: number; error: unknown }>, batchCount: number) {
    const first = failures[0]?.error;
    const firstMessage = first instanceof Error ? first.message : String(first);
    super(`${failures.length} of ${batchCount} request batches failed: ${firstMessage}`, {
      code: first instanceof NowcastError ? first.code : 'UPSTREAM_ERROR',
      retryable: false,
      cause: first instanceof Error ? first : undefined,
      context: { failedBatches: failures.map((f) => f.batchIndex), batchCount },
    });
    this.name = 'BatchFailureError';
    this.failures = failures;
    this.batchCount = batchCount;
  }
}

// =============================================================================
// Assembly
// =============================================================================

export class AssemblyError extends NowcastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'ASSEMBLY_ERROR', retryable: false, context });
    this.name = 'AssemblyError';
  }
}
