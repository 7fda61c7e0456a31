#!/usr/bin/env node

/**
 * nowcast CLI
 *
 * Command-line front end for the TimeGPT forecasting client. Data commands
 * read a JSON array of row objects and write JSON rows to stdout or
 * `--output`.
 *
 * Commands:
 *   nowcast forecast <input>          Forecast the next h steps of each series
 *   nowcast cross-validate <input>    Rolling-origin forecasts over the history
 *   nowcast detect-anomalies <input>  Flag anomalous observations
 *   nowcast finetune <input>          Fine-tune and save a model
 *   nowcast models <cmd>              List, show or delete saved models
 *   nowcast validate-key              Check the configured API key
 *   nowcast usage                     Show request usage
 *   nowcast audit <input>             Local data-quality checks
 *
 * The API key comes from --api-key, NIXTLA_API_KEY or TIMEGPT_API_KEY.
 */

import { createProgram } from './program.js';

createProgram().parse();
