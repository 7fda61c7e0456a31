/**
 * Telemetry Context
 *
 * Correlation state for one client operation. The operation gets a trace;
 * every HTTP request it sends gets a child span and its own request id.
 * The context lives in async local storage so batches dispatched
 * concurrently each log with their own ids.
 *
 * @module @nowcast/core/telemetry/context
 */

import { AsyncLocalStorage } from 'async_hooks';
import { generateRequestId, generateSpanId, generateTraceId, type SpanId, type TraceId } from './ids.js';

export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

/** Where an operation was started from */
export type TelemetrySource = 'library' | 'cli' | 'test';

export interface TelemetryContext {
  traceId: TraceId;
  spanId: SpanId;
  parentSpanId?: SpanId;
  /** Client operation, e.g. `forecast` or `cross_validation` */
  operation?: string;
  batchIndex?: number;
  /** Sent as `x-request-id` */
  requestId?: string;
  source: TelemetrySource;
  serviceVersion?: string;
  timestamp: Date;
}

export type PartialTelemetryContext = Partial<TelemetryContext>;

const store = new AsyncLocalStorage<TelemetryContext>();

export function getCurrentContext(): TelemetryContext | undefined {
  return store.getStore();
}

export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return store.run(ctx, fn);
}

export async function runWithContextAsync<T>(ctx: TelemetryContext, fn: () => Promise<T>): Promise<T> {
  return store.run(ctx, fn);
}

/**
 * Root context with a fresh trace
 */
export function createContext(source: TelemetrySource, overrides: PartialTelemetryContext = {}): TelemetryContext {
  const root: TelemetryContext = {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    source,
    serviceVersion: process.env.APP_VERSION || '0.0.0',
    timestamp: new Date(),
  };
  return { ...root, ...overrides };
}

/**
 * New span and request id under the parent's trace
 */
export function createChildContext(
  parent: TelemetryContext,
  overrides: PartialTelemetryContext = {}
): TelemetryContext {
  const child: TelemetryContext = {
    ...parent,
    parentSpanId: parent.spanId,
    spanId: generateSpanId(),
    requestId: generateRequestId(),
    timestamp: new Date(),
  };
  return { ...child, ...overrides };
}

/** W3C `traceparent`, always sampled */
export function createTraceparent(ctx: Pick<TelemetryContext, 'traceId' | 'spanId'>): string {
  return ['00', ctx.traceId, ctx.spanId, '01'].join('-');
}

/**
 * Headers that carry the context to the service
 */
export function createPropagationHeaders(ctx: TelemetryContext): Record<string, string> {
  return ctx.requestId
    ? { traceparent: createTraceparent(ctx), 'x-request-id': ctx.requestId }
    : { traceparent: createTraceparent(ctx) };
}
