/**
 * Correlation ids: W3C trace and span ids for the `traceparent` header and
 * UUID v4 request ids for `x-request-id`.
 *
 * @module @nowcast/core/telemetry/ids
 */

import { randomBytes, randomUUID } from 'crypto';

/** 32 lowercase hex characters */
export type TraceId = string & { readonly __brand: 'TraceId' };

/** 16 lowercase hex characters */
export type SpanId = string & { readonly __brand: 'SpanId' };

export type RequestId = string & { readonly __brand: 'RequestId' };

const TRACE_ID = /^[0-9a-f]{32}$/i;
const SPAN_ID = /^[0-9a-f]{16}$/i;
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isValidTraceId(id: string): id is TraceId {
  return TRACE_ID.test(id);
}

export function isValidSpanId(id: string): id is SpanId {
  return SPAN_ID.test(id);
}

export function isValidRequestId(id: string): id is RequestId {
  return UUID_V4.test(id);
}

/**
 * Hex id of `bytes` random bytes, drawn again in the all-zero case, which
 * W3C trace context treats as invalid
 */
function randomHex(bytes: number): string {
  const hex = randomBytes(bytes).toString('hex');
  return /^0+$/.test(hex) ? randomHex(bytes) : hex;
}

export function generateTraceId(): TraceId {
  const id = randomHex(16);
  if (!isValidTraceId(id)) throw new Error(`Generated an invalid trace id: ${id}`);
  return id;
}

export function generateSpanId(): SpanId {
  const id = randomHex(8);
  if (!isValidSpanId(id)) throw new Error(`Generated an invalid span id: ${id}`);
  return id;
}

export function generateRequestId(): RequestId {
  const id = randomUUID();
  if (!isValidRequestId(id)) throw new Error(`Generated an invalid request id: ${id}`);
  return id;
}
