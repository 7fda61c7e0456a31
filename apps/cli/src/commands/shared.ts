/**
 * Shared CLI plumbing: option parsers, table files and client construction
 *
 * @module @nowcast/cli/commands/shared
 */

import chalk from 'chalk';
import { readFileSync, writeFileSync } from 'node:fs';
import { InvalidArgumentError, type Command } from 'commander';
import { z } from 'zod';
import { createLogger, toExitCode } from '@nowcast/core';
import {
  BUILTIN_DATE_FEATURES,
  DataTable,
  createForecastClient,
  type BuiltinDateFeature,
  type ConfigSource,
  type FetchLike,
  type ForecastClient,
} from '@nowcast/forecasting';

// =============================================================================
// Global options
// =============================================================================

export interface GlobalOptions {
  apiKey?: string;
  baseUrl?: string;
  verbose?: boolean;
}

/** Seams the tests replace */
export interface CommandDeps {
  env?: ConfigSource;
  fetch?: FetchLike;
}

/**
 * Build the client for one CLI invocation. Below WARNING the logger writes
 * to stdout, so it is only enabled with `--verbose`.
 */
export function createClient(global: GlobalOptions, deps: CommandDeps = {}): ForecastClient {
  const logger = createLogger('nowcast-cli', {
    minSeverity: global.verbose ? 'DEBUG' : 'WARNING',
    prettyPrint: false,
  });
  return createForecastClient(
    { apiKey: global.apiKey, baseUrl: global.baseUrl },
    { env: deps.env ?? process.env, fetch: deps.fetch, logger }
  );
}

// =============================================================================
// Option parsers
// =============================================================================

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

/**
 * Comma-separated numbers, e.g. `80,95`
 */
export function parseNumberList(value: string): number[] {
  return value.split(',').map((part) => {
    const parsed = Number(part.trim());
    if (part.trim() === '' || !Number.isFinite(parsed)) {
      throw new InvalidArgumentError(`Expected comma-separated numbers, got "${value}".`);
    }
    return parsed;
  });
}

export function parseStringList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function parseDateFeatures(value: string): BuiltinDateFeature[] {
  return parseStringList(value).map((name) => {
    const feature = BUILTIN_DATE_FEATURES.find((f) => f === name);
    if (feature === undefined) {
      throw new InvalidArgumentError(
        `Unknown date feature "${name}"; expected one of ${BUILTIN_DATE_FEATURES.join(', ')}.`
      );
    }
    return feature;
  });
}

/**
 * `--freq` takes an alias or a positive integer step
 */
export function parseFrequencyOption(value: string): string | number {
  return /^\d+$/.test(value) ? Number(value) : value;
}

// =============================================================================
// Table files
// =============================================================================

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const RecordsSchema = z.array(z.record(CellSchema));

/**
 * Read a JSON array of row objects
 */
export function readTable(path: string): DataTable {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InvalidArgumentError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const records = RecordsSchema.safeParse(parsed);
  if (!records.success) {
    const issue = records.error.issues[0];
    throw new InvalidArgumentError(
      `${path} must hold an array of row objects (${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'})`
    );
  }
  return DataTable.fromRecords(records.data);
}

/**
 * Write JSON to `output`, or to stdout when no file is given
 */
export function writeJson(value: unknown, output?: string): void {
  const text = JSON.stringify(value, null, 2);
  if (output) {
    writeFileSync(output, `${text}\n`, 'utf-8');
    console.error(chalk.green(`Wrote ${output}`));
  } else {
    console.log(text);
  }
}

export function writeTable(table: DataTable, output?: string): void {
  writeJson(table.toRecords(), output);
}

// =============================================================================
// Failure reporting
// =============================================================================

/**
 * Print the error in red and exit with the code for its category
 */
export function exitWithError(error: unknown): void {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(toExitCode(error));
}

// =============================================================================
// Option groups
// =============================================================================

/**
 * Column, frequency and partitioning flags of the data commands
 */
export function addDataOptions(command: Command): Command {
  return command
    .option('--id-col <name>', 'Series id column (default: unique_id)')
    .option('--time-col <name>', 'Time column (default: ds)')
    .option('--target-col <name>', 'Target column (default: y)')
    .option('--freq <freq>', 'Series frequency, e.g. D, H, MS or an integer step (default: inferred)', parseFrequencyOption)
    .option('--model <name>', 'Model name (default: timegpt-1)')
    .option('--num-partitions <n>', 'Split the series into at least n requests', parseInteger)
    .option('--date-features <names>', 'Calendar features to add, e.g. month,weekday', parseDateFeatures)
    .option('--one-hot', 'One-hot encode the calendar features')
    .option('-o, --output <file>', 'Write JSON to a file instead of stdout');
}

export function addFinetuneOptions(command: Command): Command {
  return command
    .option('--finetune-steps <n>', 'Fine-tuning steps for this call', parseInteger)
    .option('--finetune-depth <n>', 'Fine-tuning depth, 1 to 5', parseInteger)
    .option('--finetune-loss <loss>', 'default, mae, mse, rmse, mape or smape');
}
