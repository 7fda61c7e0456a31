/**
 * Structured Logger
 *
 * One JSON object per line. Entries pick up the trace, batch and request
 * ids of the active telemetry context, and credentials are masked in the
 * serialized line before it is written.
 *
 * @module @nowcast/core/telemetry/logger
 */

import { getCurrentContext, type Severity } from './context.js';

// =============================================================================
// Configuration
// =============================================================================

export interface LoggerConfig {
  /** Reported as `labels.service` */
  serviceName: string;
  minSeverity?: Severity;
  /** Indent entries; defaults to on when NODE_ENV is development */
  prettyPrint?: boolean;
  /** Merged into every entry */
  defaultFields?: Record<string, unknown>;
  /** Extra patterns masked on top of the built-in credential patterns */
  redactionPatterns?: RegExp[];
}

const RANK: Record<Severity, number> = {
  DEBUG: 10,
  INFO: 20,
  NOTICE: 30,
  WARNING: 40,
  ERROR: 50,
  CRITICAL: 60,
};

export function isSeverity(value: string | undefined): value is Severity {
  return value !== undefined && Object.prototype.hasOwnProperty.call(RANK, value);
}

const CREDENTIAL_PATTERNS: readonly RegExp[] = [
  /Bearer\s+[\w\-.~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
];

const REDACTED = '[REDACTED]';

type Sink = (line: string) => void;

/** stderr for warnings and worse, stdout otherwise */
function sinkFor(severity: Severity): Sink {
  if (RANK[severity] >= RANK.ERROR) return (line) => console.error(line);
  if (severity === 'WARNING') return (line) => console.warn(line);
  return (line) => console.log(line);
}

// =============================================================================
// Entries
// =============================================================================

export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  labels: {
    service: string;
    version?: string;
  };
  traceId?: string;
  spanId?: string;
  operation?: string;
  batchIndex?: number;
  requestId?: string;
  eventName?: string;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
  [key: string]: unknown;
}

type Fields = Record<string, unknown>;

function errorFields(error: unknown): Fields {
  if (error === undefined || error === null) return {};
  if (!(error instanceof Error)) return { error: { message: String(error) } };
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { error: { message: error.message, stack: error.stack, code } };
}

/** Correlation fields of the active context, if any */
function contextFields(): Fields {
  const ctx = getCurrentContext();
  if (!ctx) return {};
  const fields: Fields = { traceId: ctx.traceId, spanId: ctx.spanId };
  if (ctx.operation) fields.operation = ctx.operation;
  if (ctx.batchIndex !== undefined) fields.batchIndex = ctx.batchIndex;
  if (ctx.requestId) fields.requestId = ctx.requestId;
  if (ctx.serviceVersion) fields.version = ctx.serviceVersion;
  return fields;
}

// =============================================================================
// Logger
// =============================================================================

export class Logger {
  private readonly serviceName: string;
  private readonly minRank: number;
  private readonly indent: number | undefined;
  private readonly defaults: Fields;
  private readonly patterns: readonly RegExp[];
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.serviceName = config.serviceName;
    this.minRank = RANK[config.minSeverity ?? 'DEBUG'];
    this.indent = (config.prettyPrint ?? process.env.NODE_ENV === 'development') ? 2 : undefined;
    this.defaults = config.defaultFields ?? {};
    this.patterns = [...CREDENTIAL_PATTERNS, ...(config.redactionPatterns ?? [])];
  }

  debug(message: string, data?: Fields): void {
    this.write('DEBUG', message, data);
  }

  info(message: string, data?: Fields): void {
    this.write('INFO', message, data);
  }

  warn(message: string, data?: Fields): void {
    this.write('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Fields): void {
    this.write('ERROR', message, { ...data, ...errorFields(error) });
  }

  // ---------------------------------------------------------------------------
  // Request events
  // ---------------------------------------------------------------------------

  batchStart(endpoint: string, batchIndex: number, data?: Fields): void {
    this.debug('Batch request started', { eventName: 'batch.start', endpoint, batchIndex, ...data });
  }

  /**
   * DEBUG on success, ERROR on failure
   */
  batchEnd(endpoint: string, batchIndex: number, success: boolean, durationMs: number, data?: Fields): void {
    this.write(success ? 'DEBUG' : 'ERROR', success ? 'Batch request completed' : 'Batch request failed', {
      eventName: success ? 'batch.success' : 'batch.failure',
      endpoint,
      batchIndex,
      durationMs,
      ...data,
    });
  }

  retryScheduled(attempt: number, delayMs: number, error: unknown, data?: Fields): void {
    this.warn(`Attempt ${attempt} failed, retrying in ${delayMs}ms`, {
      eventName: 'retry.scheduled',
      attempt,
      delayMs,
      ...errorFields(error),
      ...data,
    });
  }

  /**
   * Logger that adds `fields` to every entry
   */
  child(fields: Fields): Logger {
    return new Logger({ ...this.config, defaultFields: { ...this.defaults, ...fields } });
  }

  private write(severity: Severity, message: string, data?: Fields): void {
    if (RANK[severity] < this.minRank) return;

    const { version, ...correlation } = contextFields();
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      labels: {
        service: this.serviceName,
        version: typeof version === 'string' ? version : process.env.APP_VERSION,
      },
      ...this.defaults,
      ...correlation,
      ...data,
    };

    const line = this.patterns.reduce(
      (text, pattern) => text.replace(pattern, REDACTED),
      JSON.stringify(entry, null, this.indent)
    );
    sinkFor(severity)(line);
  }
}

// =============================================================================
// Default logger
// =============================================================================

function envSeverity(): Severity {
  const level = process.env.LOG_LEVEL;
  return isSeverity(level) ? level : 'INFO';
}

let shared: Logger | undefined;

/**
 * Process-wide logger used when a caller passes none. LOG_LEVEL sets its
 * minimum severity.
 */
export function getLogger(): Logger {
  if (!shared) {
    shared = new Logger({ serviceName: process.env.APP_NAME || 'nowcast', minSeverity: envSeverity() });
  }
  return shared;
}

export function setLogger(logger: Logger): void {
  shared = logger;
}

export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ serviceName, minSeverity: envSeverity(), ...config });
}
