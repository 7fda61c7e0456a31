/**
 * nowcast validate-key / usage
 */

import chalk from 'chalk';
import { createClient, writeJson, type CommandDeps, type GlobalOptions } from './shared.js';

export interface AccountOptions extends GlobalOptions {
  json?: boolean;
}

/**
 * Exits with code 1 when the key is rejected
 */
export async function validateKeyCommand(options: AccountOptions, deps: CommandDeps = {}): Promise<void> {
  const valid = await createClient(options, deps).validateApiKey();

  if (options.json) {
    writeJson({ valid });
  } else if (valid) {
    console.log(chalk.green('✓ API key is valid'));
  } else {
    console.log(chalk.red('✗ API key was rejected'));
  }

  if (!valid) {
    process.exit(1);
  }
}

export async function usageCommand(options: AccountOptions, deps: CommandDeps = {}): Promise<void> {
  const usage = await createClient(options, deps).usage();

  if (options.json) {
    writeJson(usage);
    return;
  }

  for (const [period, counters] of Object.entries(usage)) {
    console.log(chalk.bold(period));
    for (const [name, value] of Object.entries(counters)) {
      console.log(`  ${name.padEnd(20)} ${value === null ? chalk.dim('-') : String(value)}`);
    }
  }
}
