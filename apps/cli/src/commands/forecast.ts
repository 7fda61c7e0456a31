/**
 * nowcast forecast / cross-validate
 *
 * Read a JSON array of rows, call the service and write the assembled
 * rows back out as JSON.
 */

import type { BuiltinDateFeature, FinetuneDepth, FinetuneLoss, FinetuneParams } from '@nowcast/forecasting';
import {
  createClient,
  readTable,
  writeJson,
  writeTable,
  type CommandDeps,
  type GlobalOptions,
} from './shared.js';

/** Options every data command shares */
export interface DataOptions extends GlobalOptions {
  idCol?: string;
  timeCol?: string;
  targetCol?: string;
  freq?: string | number;
  model?: string;
  numPartitions?: number;
  dateFeatures?: BuiltinDateFeature[];
  oneHot?: boolean;
  output?: string;
}

export interface FinetuneFlags {
  finetuneSteps?: number;
  finetuneDepth?: number;
  finetuneLoss?: string;
}

export interface ForecastCommandOptions extends DataOptions, FinetuneFlags {
  h: number;
  level?: number[];
  quantiles?: number[];
  futureExog?: string;
  histExog?: string[];
  finetunedModelId?: string;
  cleanExFirst?: boolean;
  addHistory?: boolean;
  featureContributions?: boolean;
}

export interface CrossValidateCommandOptions extends DataOptions, FinetuneFlags {
  h: number;
  nWindows?: number;
  stepSize?: number;
  refit?: boolean;
  level?: number[];
  quantiles?: number[];
  histExog?: string[];
  finetunedModelId?: string;
  cleanExFirst?: boolean;
}

/**
 * Column and call options shared by the data commands. Unset flags stay
 * undefined so the client applies its own defaults.
 */
export function commonClientOptions(options: DataOptions) {
  return {
    idCol: options.idCol,
    timeCol: options.timeCol,
    targetCol: options.targetCol,
    freq: options.freq,
    model: options.model,
    numPartitions: options.numPartitions,
    dateFeatures: options.dateFeatures,
    dateFeaturesToOneHot: options.oneHot,
  };
}

/**
 * Depth and loss arrive as plain flag values and are checked here
 */
export function finetuneParams(flags: FinetuneFlags): FinetuneParams {
  const result: FinetuneParams = { finetuneSteps: flags.finetuneSteps };
  if (flags.finetuneDepth !== undefined) result.finetuneDepth = toDepth(flags.finetuneDepth);
  if (flags.finetuneLoss !== undefined) result.finetuneLoss = toLoss(flags.finetuneLoss);
  return result;
}

const DEPTHS: readonly FinetuneDepth[] = [1, 2, 3, 4, 5];
const LOSSES: readonly FinetuneLoss[] = ['default', 'mae', 'mse', 'rmse', 'mape', 'smape'];

function toDepth(value: number): FinetuneDepth {
  const depth = DEPTHS.find((d) => d === value);
  if (depth === undefined) throw new Error(`--finetune-depth must be an integer from 1 to 5, got ${value}`);
  return depth;
}

function toLoss(value: string): FinetuneLoss {
  const loss = LOSSES.find((l) => l === value);
  if (loss === undefined) throw new Error(`--finetune-loss must be one of ${LOSSES.join(', ')}, got "${value}"`);
  return loss;
}

export async function forecastCommand(
  input: string,
  options: ForecastCommandOptions,
  deps: CommandDeps = {}
): Promise<void> {
  const client = createClient(options, deps);
  const data = readTable(input);

  const result = await client.forecast(data, {
    ...commonClientOptions(options),
    ...finetuneParams(options),
    h: options.h,
    level: options.level,
    quantiles: options.quantiles,
    futureExog: options.futureExog ? readTable(options.futureExog) : undefined,
    histExogList: options.histExog,
    finetunedModelId: options.finetunedModelId,
    cleanExFirst: options.cleanExFirst,
    addHistory: options.addHistory,
    featureContributions: options.featureContributions,
  });

  if (!options.featureContributions) {
    writeTable(result.forecast, options.output);
    return;
  }

  writeJson(
    {
      forecast: result.forecast.toRecords(),
      featureContributions: result.featureContributions?.toRecords() ?? null,
      weightsX: result.weightsX?.toRecords() ?? null,
    },
    options.output
  );
}

export async function crossValidateCommand(
  input: string,
  options: CrossValidateCommandOptions,
  deps: CommandDeps = {}
): Promise<void> {
  const client = createClient(options, deps);
  const data = readTable(input);

  const table = await client.crossValidation(data, {
    ...commonClientOptions(options),
    ...finetuneParams(options),
    h: options.h,
    nWindows: options.nWindows,
    stepSize: options.stepSize,
    refit: options.refit,
    level: options.level,
    quantiles: options.quantiles,
    histExogList: options.histExog,
    finetunedModelId: options.finetunedModelId,
    cleanExFirst: options.cleanExFirst,
  });

  writeTable(table, options.output);
}
