/**
 * Transport
 *
 * HTTP calls against the forecasting service: JSON bodies, gzip above a
 * size threshold, bearer auth, per-call timeout, error mapping and retry.
 * Partitioned operations fan out over a bounded worker pool; each batch
 * owns its retry budget and results are kept in batch order.
 */

import { Buffer } from 'node:buffer';
import { gzipSync } from 'node:zlib';
import type { z } from 'zod';
import {
  NowcastError,
  createChildContext,
  createContext,
  createLogger,
  createPropagationHeaders,
  getCurrentContext,
  isRetryable,
  mapSettledWithConcurrency,
  resolveWorkerCount,
  retry,
  runWithContextAsync,
  systemClock,
  type Logger,
  type RetryClock,
  type TelemetryContext,
} from '@nowcast/core';
import { ApiErrorBodySchema } from './models/api.js';
import type { ClientConfig } from './models/config.js';
import { ApiError, AssemblyError, BatchFailureError, TransportError } from './errors.js';
import type { RequestBatch } from './partitioner.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface TransportOptions {
  config: Readonly<ClientConfig>;
  fetch?: FetchLike;
  clock?: RetryClock;
  logger?: Logger;
}

export interface RequestOptions<T> {
  body?: unknown;
  query?: Record<string, string | number>;
  /** Validates the unwrapped body; omitted for calls whose body is ignored */
  schema?: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface RawResponse {
  status: number;
  body: unknown;
}

const MAX_ERROR_BODY_CHARS = 2000;

/**
 * `Retry-After` as delay in ms: either delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function describeBody(body: unknown): string {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.length > MAX_ERROR_BODY_CHARS ? `${text.slice(0, MAX_ERROR_BODY_CHARS)}...` : text;
}

function toApiError(status: number, statusText: string, body: unknown, requestId: string | undefined, retryAfterMs: number | undefined): ApiError {
  const parsed = ApiErrorBodySchema.safeParse(body);
  const fields = parsed.success ? parsed.data : {};
  let detail: string | undefined;
  if (typeof fields.detail === 'string') detail = fields.detail;
  else if (fields.detail !== undefined) detail = describeBody(fields.detail);
  const message = fields.message ?? detail ?? (body === undefined ? statusText : describeBody(body));

  return new ApiError(status, `status_code: ${status}, ${message || 'request failed'}`, {
    body,
    errorCode: fields.code,
    supportContact: fields.support,
    requestId: requestId ?? fields.request_id ?? fields.requestID,
    retryAfterMs,
  });
}

function unwrap(body: unknown): unknown {
  if (body !== null && typeof body === 'object' && !Array.isArray(body) && 'data' in body) {
    return body.data;
  }
  return body;
}

export class Transport {
  private readonly config: Readonly<ClientConfig>;
  private readonly fetchImpl: FetchLike;
  private readonly clock: RetryClock;
  private readonly logger: Logger;
  private readonly baseUrl: string;

  constructor(options: TransportOptions) {
    this.config = options.config;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('nowcast-transport');
    this.baseUrl = this.config.baseUrl.endsWith('/') ? this.config.baseUrl : `${this.config.baseUrl}/`;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * One logical call with retries. Returns the validated, unwrapped body.
   */
  async request<T>(method: HttpMethod, endpoint: string, options: RequestOptions<T> = {}): Promise<T | undefined> {
    const ctx = this.childContext({});
    return runWithContextAsync(ctx, async () => {
      const raw = await this.withRetry(method, endpoint, options.body, options.query);
      return this.validate(endpoint, raw.body, options.schema);
    });
  }

  /**
   * Like `request` but fails when the service sends no body
   */
  async call<T>(method: HttpMethod, endpoint: string, options: RequestOptions<T> & { schema: z.ZodType<T, z.ZodTypeDef, unknown> }): Promise<T> {
    const body = await this.request(method, endpoint, options);
    if (body === undefined) {
      throw new AssemblyError(`Empty response from ${endpoint}`, { endpoint });
    }
    return body;
  }

  /**
   * Status and body of a call that may legitimately answer without content
   */
  async raw(method: HttpMethod, endpoint: string): Promise<RawResponse> {
    return runWithContextAsync(this.childContext({}), () => this.withRetry(method, endpoint, undefined));
  }

  /**
   * POST one body per batch with bounded concurrency. Results come back in
   * batch order whatever order the calls finish in. When any batch fails
   * terminally the whole call fails, after every sibling has settled.
   */
  async postBatches<T>(
    endpoint: string,
    batches: readonly RequestBatch[],
    buildBody: (batch: RequestBatch) => Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const workers = resolveWorkerCount(batches.length, this.config.maxWorkers);
    this.logger.info('Dispatching request batches', { endpoint, batches: batches.length, workers });

    const settled = await mapSettledWithConcurrency(batches, workers, (batch) =>
      runWithContextAsync(this.childContext({ batchIndex: batch.index }), () =>
        this.postBatch(endpoint, batch, buildBody(batch), schema)
      )
    );

    const failures: Array<{ batchIndex: number; error: unknown }> = [];
    const values: T[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        failures.push({ batchIndex: batches[result.index].index, error: result.reason });
      } else {
        values.push(result.value);
      }
    }

    if (failures.length > 0) {
      if (batches.length === 1) throw failures[0].error;
      throw new BatchFailureError(failures, batches.length);
    }
    return values;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private childContext(overrides: Partial<TelemetryContext>): TelemetryContext {
    const parent = getCurrentContext() ?? createContext('library');
    return createChildContext(parent, overrides);
  }

  private async postBatch<T>(
    endpoint: string,
    batch: RequestBatch,
    body: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const started = this.clock.now();
    this.logger.batchStart(endpoint, batch.index, { series: batch.series.length });
    try {
      const raw = await this.withRetry('POST', endpoint, body);
      const value = this.validate(endpoint, raw.body, schema);
      if (value === undefined) {
        throw new AssemblyError(`Empty response from ${endpoint} for batch ${batch.index}`, {
          endpoint,
          batchIndex: batch.index,
        });
      }
      this.logger.batchEnd(endpoint, batch.index, true, this.clock.now() - started);
      return value;
    } catch (error) {
      this.logger.batchEnd(endpoint, batch.index, false, this.clock.now() - started, {
        error: error instanceof Error ? { message: error.message, code: error instanceof NowcastError ? error.code : undefined } : String(error),
      });
      throw error;
    }
  }

  private validate<T>(endpoint: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown> | undefined): T | undefined {
    if (!schema || body === undefined) return undefined;
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AssemblyError(`Unexpected response shape from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`, {
        endpoint,
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  private encode(body: unknown): { content: string | Buffer; headers: Record<string, string> } {
    const json = JSON.stringify(body);
    const bytes = Buffer.byteLength(json, 'utf8');
    if (bytes > this.config.compressionThresholdBytes) {
      return { content: gzipSync(json), headers: { 'content-encoding': 'gzip' } };
    }
    return { content: json, headers: {} };
  }

  private async withRetry(
    method: HttpMethod,
    endpoint: string,
    body: unknown,
    query?: Record<string, string | number>
  ): Promise<RawResponse> {
    const encoded = body === undefined ? undefined : this.encode(body);
    return retry((attempt) => this.send(method, endpoint, encoded, query, attempt), {
      maxAttempts: this.config.maxRetries,
      initialDelayMs: this.config.retryIntervalMs,
      maxDelayMs: Math.max(this.config.retryIntervalMs, this.config.maxWaitTimeMs),
      backoffMultiplier: this.config.retryBackoffMultiplier,
      jitterFactor: 0,
      maxWaitTimeMs: this.config.maxWaitTimeMs,
      isRetryable,
      retryAfterMs: (error) => (error instanceof NowcastError ? error.retryAfterMs : undefined),
      onRetry: (attempt, error, delayMs) => this.logger.retryScheduled(attempt, delayMs, error, { endpoint }),
      clock: this.clock,
    });
  }

  private async fetchWithTimeout(
    endpoint: string,
    url: URL,
    init: RequestInit
  ): Promise<{ response: Response; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { response, text };
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (controller.signal.aborted) {
        throw new TransportError(`Request to ${endpoint} timed out after ${this.config.timeoutMs}ms`, 'TIMEOUT', cause);
      }
      throw new TransportError(
        `Request to ${endpoint} failed: ${cause?.message ?? String(error)}`,
        'NETWORK_ERROR',
        cause
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async send(
    method: HttpMethod,
    endpoint: string,
    encoded: { content: string | Buffer; headers: Record<string, string> } | undefined,
    query: Record<string, string | number> | undefined,
    attempt: number
  ): Promise<RawResponse> {
    const url = new URL(endpoint.replace(/^\//, ''), this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const ctx = getCurrentContext();
    const headers: Record<string, string> = {
      authorization: `Bearer ${this.config.apiKey}`,
      accept: 'application/json',
      ...(ctx ? createPropagationHeaders(ctx) : {}),
    };
    if (encoded) {
      headers['content-type'] = 'application/json';
      Object.assign(headers, encoded.headers);
    }

    const { response, text } = await this.fetchWithTimeout(endpoint, url, {
      method,
      headers,
      body: encoded?.content,
    });

    this.logger.debug('Response received', { endpoint, status: response.status, attempt });

    let parsed: unknown;
    if (text.length > 0) {
      try {
        parsed = JSON.parse(text);
      } catch {
        throw new ApiError(response.status, `status_code: ${response.status}, Could not parse JSON: ${describeBody(text)}`, {
          body: text,
          requestId: response.headers.get('x-request-id') ?? undefined,
        });
      }
    }

    if (!response.ok) {
      throw toApiError(
        response.status,
        response.statusText,
        parsed,
        response.headers.get('x-request-id') ?? undefined,
        parseRetryAfter(response.headers.get('retry-after'), this.clock.now())
      );
    }

    return { status: response.status, body: unwrap(parsed) };
  }
}
