/**
 * Telemetry
 *
 * Structured logging with async context correlation.
 *
 * @module @nowcast/core/telemetry
 */

export {
  type TraceId,
  type SpanId,
  type RequestId,
  generateTraceId,
  generateSpanId,
  generateRequestId,
  isValidTraceId,
  isValidSpanId,
  isValidRequestId,
} from './ids.js';

export {
  type TelemetrySource,
  type Severity,
  type TelemetryContext,
  type PartialTelemetryContext,
  getCurrentContext,
  runWithContext,
  runWithContextAsync,
  createContext,
  createChildContext,
  createTraceparent,
  createPropagationHeaders,
} from './context.js';

export {
  type LoggerConfig,
  type LogEntry,
  Logger,
  isSeverity,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
