/**
 * Command tree of the nowcast CLI
 */

import { Command } from 'commander';
import { auditCommand, parseAggregations, type AuditCommandOptions } from './commands/audit.js';
import { detectAnomaliesCommand, type DetectAnomaliesCommandOptions } from './commands/anomalies.js';
import {
  crossValidateCommand,
  forecastCommand,
  type CrossValidateCommandOptions,
  type ForecastCommandOptions,
} from './commands/forecast.js';
import {
  finetuneCommand,
  modelsDeleteCommand,
  modelsGetCommand,
  modelsListCommand,
  type FinetuneCommandOptions,
  type ModelsOptions,
} from './commands/finetune.js';
import { usageCommand, validateKeyCommand, type AccountOptions } from './commands/account.js';
import {
  addDataOptions,
  addFinetuneOptions,
  exitWithError,
  parseFrequencyOption,
  parseInteger,
  parseNumber,
  parseNumberList,
  parseStringList,
} from './commands/shared.js';

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    exitWithError(error);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('nowcast')
    .description('Forecasting, cross-validation and anomaly detection with TimeGPT')
    .version('0.1.0')
    .option('--api-key <key>', 'API key (default: NIXTLA_API_KEY)')
    .option('--base-url <url>', 'Service base URL (default: NIXTLA_BASE_URL or https://api.nixtla.io)')
    .option('-v, --verbose', 'Log request progress');

  // Forecast
  addFinetuneOptions(
    addDataOptions(
      program
        .command('forecast <input>')
        .description('Forecast the next h steps of every series')
        .requiredOption('--h <n>', 'Forecast horizon', parseInteger)
    )
  )
    .option('--level <levels>', 'Prediction interval levels, e.g. 80,95', parseNumberList)
    .option('--quantiles <qs>', 'Quantiles in (0, 1), e.g. 0.1,0.5,0.9', parseNumberList)
    .option('--future-exog <file>', 'JSON rows with future exogenous values')
    .option('--hist-exog <columns>', 'Columns that are historic exogenous only', parseStringList)
    .option('--finetuned-model-id <id>', 'Use a saved fine-tuned model')
    .option('--no-clean-ex-first', 'Forecast the raw target instead of one cleaned of exogenous effects')
    .option('--add-history', 'Include fitted in-sample values')
    .option('--feature-contributions', 'Also return per-feature contributions')
    .action(async (input: string, _options: unknown, command: Command) => {
      await run(() => forecastCommand(input, command.optsWithGlobals<ForecastCommandOptions>()));
    });

  // Cross-validation
  addFinetuneOptions(
    addDataOptions(
      program
        .command('cross-validate <input>')
        .description('Rolling-origin forecasts over the end of every series')
        .requiredOption('--h <n>', 'Forecast horizon per window', parseInteger)
    )
  )
    .option('--n-windows <n>', 'Number of windows (default: 1)', parseInteger)
    .option('--step-size <n>', 'Steps between window cutoffs (default: h)', parseInteger)
    .option('--no-refit', 'Fine-tune once instead of once per window')
    .option('--level <levels>', 'Prediction interval levels', parseNumberList)
    .option('--quantiles <qs>', 'Quantiles in (0, 1)', parseNumberList)
    .option('--hist-exog <columns>', 'Columns that are historic exogenous only', parseStringList)
    .option('--finetuned-model-id <id>', 'Use a saved fine-tuned model')
    .option('--no-clean-ex-first', 'Forecast the raw target instead of one cleaned of exogenous effects')
    .action(async (input: string, _options: unknown, command: Command) => {
      await run(() => crossValidateCommand(input, command.optsWithGlobals<CrossValidateCommandOptions>()));
    });

  // Anomaly detection
  addFinetuneOptions(
    addDataOptions(program.command('detect-anomalies <input>').description('Flag anomalous observations'))
  )
    .option('--level <level>', 'Confidence level for the anomaly bounds (default: 99)', parseNumber)
    .option('--finetuned-model-id <id>', 'Use a saved fine-tuned model')
    .option('--no-clean-ex-first', 'Score the raw target instead of one cleaned of exogenous effects')
    .option('--online', 'Score only the most recent steps of each series')
    .option('--h <n>', 'Forecast horizon of each online window', parseInteger)
    .option('--detection-size <n>', 'Steps scored online', parseInteger)
    .option('--threshold-method <method>', 'univariate or multivariate (default: univariate)')
    .option('--step-size <n>', 'Steps between online windows (default: h)', parseInteger)
    .option('--refit', 'Fine-tune once per online window')
    .option('--hist-exog <columns>', 'Columns that are historic exogenous only', parseStringList)
    .action(async (input: string, _options: unknown, command: Command) => {
      await run(() => detectAnomaliesCommand(input, command.optsWithGlobals<DetectAnomaliesCommandOptions>()));
    });

  // Fine-tuning
  addFinetuneOptions(
    addDataOptions(program.command('finetune <input>').description('Fine-tune a model and save it'))
  )
    .option('--output-model-id <id>', 'Id for the saved model')
    .option('--finetuned-model-id <id>', 'Continue training a saved model')
    .option('--json', 'Output as JSON')
    .action(async (input: string, _options: unknown, command: Command) => {
      await run(() => finetuneCommand(input, command.optsWithGlobals<FinetuneCommandOptions>()));
    });

  // Saved models
  const models = program.command('models').description('Manage fine-tuned models');

  models
    .command('list')
    .description('List saved fine-tuned models')
    .option('--json', 'Output as JSON')
    .action(async (_options: unknown, command: Command) => {
      await run(() => modelsListCommand(command.optsWithGlobals<ModelsOptions>()));
    });

  models
    .command('get <id>')
    .description('Show one saved model')
    .option('--json', 'Output as JSON')
    .action(async (id: string, _options: unknown, command: Command) => {
      await run(() => modelsGetCommand(id, command.optsWithGlobals<ModelsOptions>()));
    });

  models
    .command('delete <id>')
    .description('Delete a saved model')
    .option('--json', 'Output as JSON')
    .action(async (id: string, _options: unknown, command: Command) => {
      await run(() => modelsDeleteCommand(id, command.optsWithGlobals<ModelsOptions>()));
    });

  // Account
  program
    .command('validate-key')
    .description('Check that the service accepts the API key')
    .option('--json', 'Output as JSON')
    .action(async (_options: unknown, command: Command) => {
      await run(() => validateKeyCommand(command.optsWithGlobals<AccountOptions>()));
    });

  program
    .command('usage')
    .description('Show request usage and limits')
    .option('--json', 'Output as JSON')
    .action(async (_options: unknown, command: Command) => {
      await run(() => usageCommand(command.optsWithGlobals<AccountOptions>()));
    });

  // Data audit
  program
    .command('audit <input>')
    .description('Check a table for duplicates, gaps and suspicious values')
    .requiredOption('--freq <freq>', 'Series frequency, e.g. D, H, MS or an integer step', parseFrequencyOption)
    .option('--id-col <name>', 'Series id column (default: unique_id)')
    .option('--time-col <name>', 'Time column (default: ds)')
    .option('--target-col <name>', 'Target column (default: y)')
    .option('--start <bound>', 'Grid start: per-series, global or a timestamp')
    .option('--end <bound>', 'Grid end: per-series, global or a timestamp')
    .option('--clean', 'Fix failing checks and write the cleaned rows')
    .option('--clean-case-specific', 'Also fix negative values and leading zeros')
    .option('--agg <pairs>', 'Duplicate merge rules, e.g. y=mean,price=sum', parseAggregations)
    .option('-o, --output <file>', 'Write JSON to a file')
    .option('--json', 'Output as JSON')
    .action(async (input: string, _options: unknown, command: Command) => {
      await run(() => auditCommand(input, command.optsWithGlobals<AuditCommandOptions>()));
    });

  return program;
}
