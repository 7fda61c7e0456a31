/**
 * nowcast detect-anomalies
 *
 * Historic detection by default; `--online` scores only the last
 * `--detection-size` steps of each series.
 */

import { ThresholdMethodSchema } from '@nowcast/forecasting';
import { commonClientOptions, finetuneParams, type DataOptions, type FinetuneFlags } from './forecast.js';
import { createClient, readTable, writeTable, type CommandDeps } from './shared.js';

export interface DetectAnomaliesCommandOptions extends DataOptions, FinetuneFlags {
  level?: number;
  finetunedModelId?: string;
  cleanExFirst?: boolean;
  online?: boolean;
  h?: number;
  detectionSize?: number;
  thresholdMethod?: string;
  stepSize?: number;
  refit?: boolean;
  histExog?: string[];
}

export async function detectAnomaliesCommand(
  input: string,
  options: DetectAnomaliesCommandOptions,
  deps: CommandDeps = {}
): Promise<void> {
  const client = createClient(options, deps);
  const data = readTable(input);

  if (!options.online) {
    const table = await client.detectAnomalies(data, {
      ...commonClientOptions(options),
      level: options.level,
      finetunedModelId: options.finetunedModelId,
      cleanExFirst: options.cleanExFirst,
    });
    writeTable(table, options.output);
    return;
  }

  if (options.h === undefined || options.detectionSize === undefined) {
    throw new Error('--online requires --h and --detection-size');
  }
  const method = ThresholdMethodSchema.safeParse(options.thresholdMethod ?? 'univariate');
  if (!method.success) {
    throw new Error(`--threshold-method must be univariate or multivariate, got "${String(options.thresholdMethod)}"`);
  }

  const table = await client.detectAnomaliesOnline(data, {
    ...commonClientOptions(options),
    ...finetuneParams(options),
    h: options.h,
    detectionSize: options.detectionSize,
    thresholdMethod: method.data,
    level: options.level,
    stepSize: options.stepSize,
    refit: options.refit,
    histExogList: options.histExog,
    cleanExFirst: options.cleanExFirst,
  });
  writeTable(table, options.output);
}
