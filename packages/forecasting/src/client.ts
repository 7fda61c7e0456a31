/**
 * Forecast Client
 *
 * Entry point for every service operation. Each call runs the same
 * pipeline: normalize the input, query the model's parameters, restrict the
 * history where the operation allows, partition into batches, dispatch them
 * concurrently and assemble the responses into one table.
 *
 * The client is safe to share: configuration is frozen at construction and
 * calls keep no state between them.
 */

import {
  createContext,
  createLogger,
  getCurrentContext,
  runWithContextAsync,
  type Logger,
  type RetryClock,
} from '@nowcast/core';
import {
  ANOMALY_COLUMN,
  assembleAnomalies,
  assembleCrossValidation,
  assembleForecast,
  assembleOnlineAnomalies,
  resolveLevels,
  type AssemblyInput,
  type ForecastAssembly,
  type LabelOptions,
} from './assembler.js';
import { auditData, cleanData, type AuditOptions, type AuditResult, type CleanOptions, type CleanResult } from './audit.js';
import type { DateFeatureSpec } from './date-features.js';
import { ApiError, AssemblyError, DataValidationError } from './errors.js';
import { serviceFrequency, type FrequencyInput } from './frequency.js';
import {
  FinetuneDepthSchema,
  FinetuneLossSchema,
  FinetuneResponseSchema,
  FinetunedModelListSchema,
  FinetunedModelSchema,
  ForecastResponseSchema,
  ModelParamsResponseSchema,
  UsageSchema,
  type FinetuneDepth,
  type FinetuneLoss,
  type FinetunedModel,
  type ForecastResponse,
  type ModelParams,
  type ThresholdMethod,
  type Usage,
} from './models/api.js';
import {
  redactConfig,
  resolveClientConfig,
  type ClientConfig,
  type ClientOptions,
  type ConfigSource,
} from './models/config.js';
import { normalize, tailDataset, type ColumnNames, type NormalizedDataset } from './normalizer.js';
import { envelopeBytes, partition, seriesPayload, type RequestBatch } from './partitioner.js';
import type { DataTable, TabularInput } from './tabular.js';
import { Transport, type FetchLike } from './transport.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MODEL = 'timegpt-1';

const SUPPORTED_MODEL = /^timegpt-.+$/;

const DEFAULT_ANOMALY_LEVEL = 99;
const DEFAULT_FINETUNE_STEPS_FOR_SAVED_MODEL = 10;

/** Online detection warns when no series is longer than this many detection windows */
const ONLINE_HISTORY_FACTOR = 6;

const ENDPOINTS = {
  forecast: 'v2/forecast',
  historicForecast: 'v2/historic_forecast',
  crossValidation: 'v2/cross_validation',
  anomalyDetection: 'v2/anomaly_detection',
  onlineAnomalyDetection: 'v2/online_anomaly_detection',
  finetune: 'v2/finetune',
  finetunedModels: 'v2/finetuned_models',
  modelParams: 'model_params',
  validateApiKey: 'validate_api_key',
  usage: 'usage',
} as const;

// =============================================================================
// Options
// =============================================================================

export interface ClientDependencies {
  /** HTTP implementation; defaults to the global `fetch` */
  fetch?: FetchLike;
  /** Time source for retry waits */
  clock?: RetryClock;
  logger?: Logger;
  /** Environment the configuration falls back on; nothing is read from `process.env` */
  env?: ConfigSource;
}

interface CommonOptions extends ColumnNames {
  freq?: FrequencyInput;
  model?: string;
  /** Split the series into at least this many request batches */
  numPartitions?: number;
  dateFeatures?: boolean | readonly DateFeatureSpec[];
  dateFeaturesToOneHot?: boolean | readonly string[];
}

export interface FinetuneParams {
  /** Fine-tuning steps run for this call only; 0 disables fine-tuning */
  finetuneSteps?: number;
  finetuneDepth?: FinetuneDepth;
  finetuneLoss?: FinetuneLoss;
}

export interface ForecastOptions extends CommonOptions, FinetuneParams {
  h: number;
  level?: readonly number[];
  quantiles?: readonly number[];
  futureExog?: TabularInput;
  histExogList?: readonly string[];
  finetunedModelId?: string;
  cleanExFirst?: boolean;
  /** Include fitted in-sample values before each series' forecast */
  addHistory?: boolean;
  featureContributions?: boolean;
}

export interface CrossValidationOptions extends CommonOptions, FinetuneParams {
  h: number;
  nWindows?: number;
  /** Defaults to `h` */
  stepSize?: number;
  refit?: boolean;
  level?: readonly number[];
  quantiles?: readonly number[];
  histExogList?: readonly string[];
  finetunedModelId?: string;
  cleanExFirst?: boolean;
}

export interface AnomalyOptions extends CommonOptions {
  level?: number;
  finetunedModelId?: string;
  cleanExFirst?: boolean;
}

export interface OnlineAnomalyOptions extends CommonOptions, FinetuneParams {
  h: number;
  detectionSize: number;
  thresholdMethod?: ThresholdMethod;
  level?: number;
  stepSize?: number;
  refit?: boolean;
  histExogList?: readonly string[];
  cleanExFirst?: boolean;
}

export interface FinetuneOptions extends CommonOptions, FinetuneParams {
  /** Id for the saved model; the service generates one when omitted */
  outputModelId?: string;
  /** Continue training from this saved model */
  finetunedModelId?: string;
}

export type ForecastResult = ForecastAssembly;

// =============================================================================
// Argument checks
// =============================================================================

function invalid(message: string): DataValidationError {
  return new DataValidationError('invalid-argument', message);
}

function positiveInt(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) throw invalid(`${name} must be a positive integer, got ${value}`);
  return value;
}

interface ResolvedFinetune {
  finetune_steps: number;
  finetune_depth: FinetuneDepth;
  finetune_loss: FinetuneLoss;
}

function resolveFinetune(params: FinetuneParams, defaultSteps = 0): ResolvedFinetune {
  const steps = params.finetuneSteps ?? defaultSteps;
  if (!Number.isInteger(steps) || steps < 0) {
    throw invalid(`finetuneSteps must be a non-negative integer, got ${steps}`);
  }
  const depth = FinetuneDepthSchema.safeParse(params.finetuneDepth ?? 1);
  if (!depth.success) throw invalid(`finetuneDepth must be an integer from 1 to 5, got ${String(params.finetuneDepth)}`);
  const loss = FinetuneLossSchema.safeParse(params.finetuneLoss ?? 'default');
  if (!loss.success) throw invalid(`Unknown finetuneLoss "${String(params.finetuneLoss)}"`);
  return { finetune_steps: steps, finetune_depth: depth.data, finetune_loss: loss.data };
}

function checkSeriesLength(dataset: NormalizedDataset, params: ModelParams): void {
  const minimum = params.inputSize + params.horizon;
  const short = dataset.series.find((s) => s.times.length < minimum);
  if (short) {
    throw new DataValidationError(
      'series-too-short',
      `Some series are too short: each series needs at least ${minimum} observations, ` +
        `series ${JSON.stringify(short.id)} has ${short.times.length}`,
      { seriesId: short.id }
    );
  }
}

/**
 * History kept when the input is restricted: the model's input size, or
 * enough extra context for conformal intervals when levels are requested
 */
export function restrictedInputSize(params: ModelParams, h: number, withLevels: boolean): number {
  return withLevels ? 3 * params.inputSize + Math.max(params.horizon, h) : params.inputSize;
}

function histExogIndices(dataset: NormalizedDataset): number[] | null {
  if (dataset.histExogColumns.length === 0) return null;
  return dataset.histExogColumns.map((c) => dataset.exogColumns.indexOf(c));
}

// =============================================================================
// Client
// =============================================================================

export class ForecastClient {
  private readonly config: Readonly<ClientConfig>;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly labels: LabelOptions;

  constructor(options: ClientOptions = {}, deps: ClientDependencies = {}) {
    this.config = resolveClientConfig(options, deps.env);
    this.logger = deps.logger ?? createLogger('nowcast');
    this.transport = new Transport({
      config: this.config,
      fetch: deps.fetch,
      clock: deps.clock,
      logger: this.logger,
    });
    this.labels = { model: this.config.modelColumn, fractionalLabelPolicy: this.config.fractionalLabelPolicy };
  }

  /**
   * Build a client from an environment source such as `process.env`
   */
  static fromEnv(env: ConfigSource, deps: Omit<ClientDependencies, 'env'> = {}): ForecastClient {
    return new ForecastClient({}, { ...deps, env });
  }

  /**
   * Effective configuration with the API key redacted
   */
  getConfig(): ClientConfig {
    return redactConfig(this.config);
  }

  // ===========================================================================
  // Forecasting
  // ===========================================================================

  /**
   * Forecast `h` steps past the end of every series
   */
  async forecast(input: TabularInput, options: ForecastOptions): Promise<ForecastResult> {
    return this.operation('forecast', async () => {
      const model = this.checkModel(options.model);
      const h = positiveInt(options.h, 'h');
      const finetune = resolveFinetune(options);
      const { levels, quantiles } = resolveLevels(options, this.labels);

      let dataset = normalize(input, {
        ...options,
        h,
        futureExog: options.futureExog,
        histExogList: options.histExogList,
        logger: this.logger,
      });
      const freq = serviceFrequency(dataset.freq);
      const params = await this.modelParams(model, freq);

      if (h > params.horizon) {
        this.logger.warn('Horizon exceeds the model horizon; forecasts may be less accurate', {
          h,
          modelHorizon: params.horizon,
        });
      }
      if (finetune.finetune_steps > 0 || options.addHistory) {
        checkSeriesLength(dataset, params);
      }
      if (finetune.finetune_steps === 0 && dataset.exogColumns.length === 0 && !options.addHistory) {
        dataset = tailDataset(dataset, restrictedInputSize(params, h, levels !== undefined));
      }

      const withContributions = options.featureContributions === true && dataset.exogColumns.length > 0;
      const body = {
        model,
        h,
        freq,
        clean_ex_first: options.cleanExFirst ?? true,
        level: levels ?? null,
        ...finetune,
        finetuned_model_id: options.finetunedModelId ?? null,
        feature_contributions: withContributions,
      };
      const batches = this.partition(dataset, body, options.numPartitions);

      const responses = await this.transport.postBatches(
        ENDPOINTS.forecast,
        batches,
        (batch) => ({ series: seriesPayload(batch, true), ...body }),
        ForecastResponseSchema
      );

      let historic: ForecastResponse[] | undefined;
      if (options.addHistory) {
        const inSample = {
          model,
          freq,
          clean_ex_first: body.clean_ex_first,
          level: body.level,
          finetune_depth: finetune.finetune_depth,
          finetuned_model_id: body.finetuned_model_id,
          feature_contributions: withContributions,
        };
        historic = await this.transport.postBatches(
          ENDPOINTS.historicForecast,
          batches,
          (batch) => ({ series: seriesPayload(batch, false), ...inSample }),
          ForecastResponseSchema
        );
      }

      return assembleForecast(this.assemblyInput(dataset, batches, levels, quantiles), responses, {
        historic,
        featureContributions: withContributions,
      });
    });
  }

  /**
   * Forecast `nWindows` rolling windows of `h` steps over the end of each
   * series, against the observed values
   */
  async crossValidation(input: TabularInput, options: CrossValidationOptions): Promise<DataTable> {
    return this.operation('cross_validation', async () => {
      const model = this.checkModel(options.model);
      const h = positiveInt(options.h, 'h');
      const nWindows = positiveInt(options.nWindows ?? 1, 'nWindows');
      const stepSize = positiveInt(options.stepSize ?? h, 'stepSize');
      const finetune = resolveFinetune(options);
      const { levels, quantiles } = resolveLevels(options, this.labels);

      let dataset = normalize(input, { ...options, h: 0, logger: this.logger });
      const freq = serviceFrequency(dataset.freq);
      const params = await this.modelParams(model, freq);

      if (finetune.finetune_steps === 0 && dataset.exogColumns.length === 0) {
        const size = restrictedInputSize(params, h, levels !== undefined) + h + stepSize * (nWindows - 1);
        dataset = tailDataset(dataset, size);
      }

      const body = {
        model,
        h,
        n_windows: nWindows,
        step_size: stepSize,
        freq,
        clean_ex_first: options.cleanExFirst ?? true,
        hist_exog: histExogIndices(dataset),
        level: levels ?? null,
        ...finetune,
        finetuned_model_id: options.finetunedModelId ?? null,
        refit: options.refit ?? true,
      };
      const batches = this.partition(dataset, body, options.numPartitions);
      const responses = await this.transport.postBatches(
        ENDPOINTS.crossValidation,
        batches,
        (batch) => ({ series: seriesPayload(batch, false), ...body }),
        ForecastResponseSchema
      );

      return assembleCrossValidation(this.assemblyInput(dataset, batches, levels, quantiles), responses, h);
    });
  }

  // ===========================================================================
  // Anomaly detection
  // ===========================================================================

  /**
   * Flag historical observations outside the model's prediction interval
   */
  async detectAnomalies(input: TabularInput, options: AnomalyOptions = {}): Promise<DataTable> {
    return this.operation('anomaly_detection', async () => {
      const model = this.checkModel(options.model);
      const { levels } = resolveLevels({ level: [options.level ?? DEFAULT_ANOMALY_LEVEL] }, this.labels);
      const dataset = normalize(input, { ...options, h: 0, logger: this.logger });

      const body = {
        model,
        freq: serviceFrequency(dataset.freq),
        finetuned_model_id: options.finetunedModelId ?? null,
        clean_ex_first: options.cleanExFirst ?? true,
        level: levels ?? null,
      };
      const batches = this.partition(dataset, body, options.numPartitions);
      const responses = await this.transport.postBatches(
        ENDPOINTS.anomalyDetection,
        batches,
        (batch) => ({ series: seriesPayload(batch, false), ...body }),
        ForecastResponseSchema
      );

      const table = assembleAnomalies(this.assemblyInput(dataset, batches, levels), responses);
      const flagged = table.column(ANOMALY_COLUMN).filter((v) => v === true).length;
      this.logger.info('Anomaly detection finished', { rows: table.rowCount, anomalies: flagged });
      return table;
    });
  }

  /**
   * Score the last `detectionSize` observations of each series with
   * rolling forecasts
   */
  async detectAnomaliesOnline(input: TabularInput, options: OnlineAnomalyOptions): Promise<DataTable> {
    return this.operation('online_anomaly_detection', async () => {
      const model = this.checkModel(options.model);
      const h = positiveInt(options.h, 'h');
      const detectionSize = positiveInt(options.detectionSize, 'detectionSize');
      const thresholdMethod = options.thresholdMethod ?? 'univariate';
      const multivariate = thresholdMethod === 'multivariate';
      if (multivariate && options.numPartitions !== undefined && options.numPartitions > 1) {
        throw invalid('Multivariate anomaly detection cannot be split into more than one batch');
      }
      const finetune = resolveFinetune(options);
      const { levels } = resolveLevels({ level: [options.level ?? DEFAULT_ANOMALY_LEVEL] }, this.labels);
      const dataset = normalize(input, { ...options, h: 0, logger: this.logger });

      if (dataset.series.every((s) => s.times.length <= ONLINE_HISTORY_FACTOR * detectionSize)) {
        this.logger.warn('Detection size is large; the whole series is used to compute the anomaly threshold', {
          detectionSize,
        });
      }

      const body = {
        h,
        detection_size: detectionSize,
        threshold_method: thresholdMethod,
        model,
        freq: serviceFrequency(dataset.freq),
        clean_ex_first: options.cleanExFirst ?? true,
        level: levels ?? null,
        step_size: options.stepSize ?? null,
        ...finetune,
        refit: options.refit ?? false,
        hist_exog: histExogIndices(dataset),
      };
      const batches = this.partition(dataset, body, options.numPartitions);
      if (multivariate && batches.length > 1) {
        throw invalid(
          `Multivariate anomaly detection needs all series in one request, but the data needs ${batches.length}; ` +
            "use thresholdMethod 'univariate'"
        );
      }
      const responses = await this.transport.postBatches(
        ENDPOINTS.onlineAnomalyDetection,
        batches,
        (batch) => ({ series: seriesPayload(batch, false), ...body }),
        ForecastResponseSchema
      );

      return assembleOnlineAnomalies(this.assemblyInput(dataset, batches, levels), responses, multivariate);
    });
  }

  // ===========================================================================
  // Fine-tuned models
  // ===========================================================================

  /**
   * Fine-tune a model on the input and save it on the service. Returns the
   * saved model's id.
   */
  async finetune(input: TabularInput, options: FinetuneOptions = {}): Promise<string> {
    return this.operation('finetune', async () => {
      const model = this.checkModel(options.model);
      const finetune = resolveFinetune(options, DEFAULT_FINETUNE_STEPS_FOR_SAVED_MODEL);
      const dataset = normalize(input, { ...options, exogColumns: [], dateFeatures: false, h: 0, logger: this.logger });
      const freq = serviceFrequency(dataset.freq);
      checkSeriesLength(dataset, await this.modelParams(model, freq));

      const body = {
        model,
        freq,
        ...finetune,
        output_model_id: options.outputModelId ?? null,
        finetuned_model_id: options.finetunedModelId ?? null,
      };
      const batches = this.partition(dataset, body, 1);
      if (batches.length > 1) {
        throw invalid(`Fine-tuning needs all series in one request, but the data needs ${batches.length}`);
      }
      const [response] = await this.transport.postBatches(
        ENDPOINTS.finetune,
        batches,
        (batch) => {
          const { y, sizes } = seriesPayload(batch, false);
          return { series: { y, sizes }, ...body };
        },
        FinetuneResponseSchema
      );
      this.logger.info('Fine-tuned model saved', { finetunedModelId: response.finetuned_model_id });
      return response.finetuned_model_id;
    });
  }

  async finetunedModels(): Promise<FinetunedModel[]> {
    return this.operation('finetuned_models', async () => {
      const body = await this.transport.call('GET', ENDPOINTS.finetunedModels, { schema: FinetunedModelListSchema });
      return body.finetuned_models;
    });
  }

  async finetunedModel(id: string): Promise<FinetunedModel> {
    return this.operation('finetuned_model', () =>
      this.transport.call('GET', `${ENDPOINTS.finetunedModels}/${encodeURIComponent(id)}`, {
        schema: FinetunedModelSchema,
      })
    );
  }

  /**
   * Delete a saved model. Models fine-tuned from it are kept.
   */
  async deleteFinetunedModel(id: string): Promise<boolean> {
    return this.operation('delete_finetuned_model', async () => {
      const response = await this.transport.raw('DELETE', `${ENDPOINTS.finetunedModels}/${encodeURIComponent(id)}`);
      return response.status === 204 || response.status === 200;
    });
  }

  // ===========================================================================
  // Account and metadata
  // ===========================================================================

  /**
   * Input size and horizon of a model at a frequency. Queried on every call.
   */
  async modelParams(model: string, freq: string): Promise<ModelParams> {
    this.logger.debug('Querying model parameters', { model, freq });
    const body = await this.transport.call('GET', ENDPOINTS.modelParams, {
      query: { model, freq },
      schema: ModelParamsResponseSchema,
    });
    return { inputSize: body.detail.input_size, horizon: body.detail.horizon };
  }

  /**
   * Whether the service accepts the configured key
   */
  async validateApiKey(): Promise<boolean> {
    return this.operation('validate_api_key', async () => {
      try {
        const response = await this.transport.raw('GET', ENDPOINTS.validateApiKey);
        return response.status === 200;
      } catch (error) {
        if (error instanceof ApiError && (error.statusCode === 401 || error.statusCode === 403)) {
          this.logger.warn('API key rejected', { statusCode: error.statusCode });
          return false;
        }
        throw error;
      }
    });
  }

  async usage(): Promise<Usage> {
    return this.operation('usage', () => this.transport.call('GET', ENDPOINTS.usage, { schema: UsageSchema }));
  }

  // ===========================================================================
  // Data quality
  // ===========================================================================

  auditData(input: TabularInput, options: AuditOptions): AuditResult {
    return auditData(input, { logger: this.logger, ...options });
  }

  cleanData(input: TabularInput, audit: AuditResult, options: CleanOptions): CleanResult {
    return cleanData(input, audit, { logger: this.logger, ...options });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private checkModel(model: string | undefined): string {
    const name = model ?? DEFAULT_MODEL;
    if (!SUPPORTED_MODEL.test(name)) {
      throw invalid(`Unsupported model "${name}"; expected a timegpt-* model`);
    }
    return name;
  }

  private partition(dataset: NormalizedDataset, body: Record<string, unknown>, numPartitions?: number): RequestBatch[] {
    const batches = partition(dataset, this.config.limits, {
      numPartitions,
      envelopeBytes: envelopeBytes(body),
    });
    if (batches.length === 0) throw new AssemblyError('No series to send');
    this.logger.info('Partitioned input', { series: dataset.series.length, batches: batches.length });
    return batches;
  }

  private assemblyInput(
    dataset: NormalizedDataset,
    batches: RequestBatch[],
    levels?: number[],
    quantiles?: number[]
  ): AssemblyInput {
    return { dataset, batches, labels: this.labels, levels, quantiles };
  }

  /**
   * Run one operation in its own trace, nested under the caller's if any
   */
  private async operation<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const parent = getCurrentContext();
    const ctx = parent ? { ...parent, operation: name } : createContext('library', { operation: name });
    return runWithContextAsync(ctx, fn);
  }
}

/**
 * Create a forecast client
 *
 * @example
 * const client = createForecastClient({ apiKey: 'test-key' });
 * const { forecast } = await client.forecast(table, { h: 12, level: [80, 95] });
 */
export function createForecastClient(options: ClientOptions = {}, deps: ClientDependencies = {}): ForecastClient {
  return new ForecastClient(options, deps);
}
