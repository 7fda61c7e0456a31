/**
 * nowcast finetune / models
 *
 * Train and manage saved fine-tuned models.
 *
 * @module @nowcast/cli/commands/finetune
 */

import chalk from 'chalk';
import type { FinetunedModel } from '@nowcast/forecasting';
import { commonClientOptions, finetuneParams, type DataOptions, type FinetuneFlags } from './forecast.js';
import { createClient, readTable, writeJson, type CommandDeps, type GlobalOptions } from './shared.js';

export interface FinetuneCommandOptions extends DataOptions, FinetuneFlags {
  outputModelId?: string;
  finetunedModelId?: string;
  json?: boolean;
}

export interface ModelsOptions extends GlobalOptions {
  json?: boolean;
}

export async function finetuneCommand(
  input: string,
  options: FinetuneCommandOptions,
  deps: CommandDeps = {}
): Promise<void> {
  const client = createClient(options, deps);
  const data = readTable(input);

  const id = await client.finetune(data, {
    ...commonClientOptions(options),
    ...finetuneParams(options),
    outputModelId: options.outputModelId,
    finetunedModelId: options.finetunedModelId,
  });

  if (options.json) {
    writeJson({ finetunedModelId: id }, options.output);
    return;
  }
  console.log(chalk.green('Fine-tuned model saved:'), chalk.bold(id));
}

function printModel(model: FinetunedModel): void {
  console.log(chalk.bold(model.id));
  console.log(chalk.dim(`  base:    ${model.baseModelId ?? model.model}`));
  console.log(chalk.dim(`  freq:    ${model.freq}`));
  console.log(chalk.dim(`  steps:   ${model.steps} (depth ${model.depth}, loss ${model.loss})`));
  console.log(chalk.dim(`  created: ${model.createdAt.toISOString()} by ${model.createdBy}`));
}

export async function modelsListCommand(options: ModelsOptions, deps: CommandDeps = {}): Promise<void> {
  const models = await createClient(options, deps).finetunedModels();

  if (options.json) {
    writeJson(models);
    return;
  }
  if (models.length === 0) {
    console.log(chalk.dim('No fine-tuned models.'));
    return;
  }
  console.log(chalk.bold(`${models.length} fine-tuned model(s)\n`));
  for (const model of models) {
    printModel(model);
  }
}

export async function modelsGetCommand(id: string, options: ModelsOptions, deps: CommandDeps = {}): Promise<void> {
  const model = await createClient(options, deps).finetunedModel(id);

  if (options.json) {
    writeJson(model);
    return;
  }
  printModel(model);
}

export async function modelsDeleteCommand(id: string, options: ModelsOptions, deps: CommandDeps = {}): Promise<void> {
  const deleted = await createClient(options, deps).deleteFinetunedModel(id);

  if (options.json) {
    writeJson({ id, deleted });
    return;
  }
  if (deleted) {
    console.log(chalk.green('Deleted'), chalk.bold(id));
  } else {
    console.log(chalk.yellow('Not deleted:'), chalk.bold(id));
  }
}
