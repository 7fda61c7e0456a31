/**
 * @nowcast/core - Shared plumbing for the nowcast client
 *
 * - Telemetry: structured JSON logging with async context correlation
 * - Reliability: error taxonomy, retry with backoff, bounded concurrency
 */

export * from './telemetry/index.js';

export * from './reliability/index.js';
