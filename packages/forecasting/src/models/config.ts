/**
 * Client Configuration
 *
 * Zod schema for everything the client reads after construction, plus the
 * resolution of explicit options over an environment source.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const MIB = 1024 * 1024;

export const DEFAULT_BASE_URL = 'https://api.nixtla.io';

/**
 * Server-side batch limits. The service does not publish exact values, so
 * these defaults stay well below what it accepts.
 */
export const ServiceLimitsSchema = z.object({
  maxSeriesPerBatch: z.number().int().min(1).default(1000),
  maxBatchBytes: z.number().int().min(1024).default(50 * MIB),
});

export type ServiceLimits = z.infer<typeof ServiceLimitsSchema>;

export const FractionalLabelPolicySchema = z.enum(['decimal', 'reject']);

export type FractionalLabelPolicy = z.infer<typeof FractionalLabelPolicySchema>;

export const ClientConfigSchema = z.object({
  /** Bearer token for the service */
  apiKey: z.string().min(1, 'API key is required'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  /** Per-call timeout */
  timeoutMs: z.number().int().min(1).default(60_000),
  /** Total attempts per batch, the first call included */
  maxRetries: z.number().int().min(1).default(6),
  retryIntervalMs: z.number().int().min(0).default(10_000),
  /** 1 keeps the wait fixed; above 1 grows it exponentially */
  retryBackoffMultiplier: z.number().min(1).default(1),
  /** Ceiling on the time a batch may spend across attempts and waits */
  maxWaitTimeMs: z.number().int().min(0).default(360_000),
  maxWorkers: z.number().int().min(1).default(10),
  limits: ServiceLimitsSchema.default({}),
  /** Request bodies above this size are gzip-compressed */
  compressionThresholdBytes: z.number().int().min(0).default(MIB),
  /** Name of the point forecast column */
  modelColumn: z.string().min(1).default('TimeGPT'),
  /** How levels like 99.5 appear in column names */
  fractionalLabelPolicy: FractionalLabelPolicySchema.default('decimal'),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/** What callers pass to the client; every field may come from the environment instead */
export type ClientOptions = Partial<z.input<typeof ClientConfigSchema>>;

/** Environment-like source of configuration, e.g. `process.env` */
export type ConfigSource = Readonly<Record<string, string | undefined>>;

function envNumber(env: ConfigSource, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, { variable: name });
  }
  return value;
}

/**
 * Merge explicit options over the environment source and validate the result.
 *
 * Recognized variables: `NIXTLA_API_KEY` (or `TIMEGPT_API_KEY`),
 * `NIXTLA_BASE_URL`, `NOWCAST_TIMEOUT_MS`, `NOWCAST_MAX_RETRIES`,
 * `NOWCAST_RETRY_INTERVAL_MS`, `NOWCAST_MAX_WAIT_TIME_MS`,
 * `NOWCAST_MAX_WORKERS`.
 */
export function resolveClientConfig(
  options: ClientOptions = {},
  env: ConfigSource = {}
): Readonly<ClientConfig> {
  const fromEnv: ClientOptions = {
    apiKey: env.NIXTLA_API_KEY ?? env.TIMEGPT_API_KEY,
    baseUrl: env.NIXTLA_BASE_URL,
    timeoutMs: envNumber(env, 'NOWCAST_TIMEOUT_MS'),
    maxRetries: envNumber(env, 'NOWCAST_MAX_RETRIES'),
    retryIntervalMs: envNumber(env, 'NOWCAST_RETRY_INTERVAL_MS'),
    maxWaitTimeMs: envNumber(env, 'NOWCAST_MAX_WAIT_TIME_MS'),
    maxWorkers: envNumber(env, 'NOWCAST_MAX_WORKERS'),
  };

  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fromEnv)) {
    if (value !== undefined) merged[key] = value;
  }
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = ClientConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigurationError(`Invalid client configuration: ${problems.join('; ')}`, {
      fields: result.error.issues.map((i) => i.path.join('.')),
    });
  }

  const config = result.data;
  Object.freeze(config.limits);
  return Object.freeze(config);
}

/**
 * Configuration as safe to print
 */
export function redactConfig(config: Readonly<ClientConfig>): ClientConfig {
  return {
    ...config,
    limits: { ...config.limits },
    apiKey: '***REDACTED***',
  };
}
