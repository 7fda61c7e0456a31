/**
 * @nowcast/forecasting
 *
 * Request orchestration for the TimeGPT forecasting service: input
 * validation, batching, retrying transport and response assembly.
 *
 * @example
 * ```typescript
 * import { DataTable, createForecastClient } from '@nowcast/forecasting';
 *
 * const client = createForecastClient({ apiKey: process.env.NIXTLA_API_KEY });
 * const table = DataTable.fromRecords([
 *   { unique_id: 'a', ds: '2024-01-01', y: 10 },
 *   { unique_id: 'a', ds: '2024-01-02', y: 12 },
 * ]);
 *
 * const { forecast } = await client.forecast(table, { h: 7, level: [80, 95] });
 * console.log(forecast.toRecords());
 * ```
 */

// Client
export {
  ForecastClient,
  createForecastClient,
  restrictedInputSize,
  DEFAULT_MODEL,
  type ClientDependencies,
  type ForecastOptions,
  type ForecastResult,
  type CrossValidationOptions,
  type AnomalyOptions,
  type OnlineAnomalyOptions,
  type FinetuneOptions,
  type FinetuneParams,
} from './client.js';

// Tabular data
export { DataTable, type CellValue, type Row, type TabularInput } from './tabular.js';

// Normalization
export {
  normalize,
  tailDataset,
  datasetToTable,
  futureExogToTable,
  DEFAULT_ID_COL,
  DEFAULT_TIME_COL,
  DEFAULT_TARGET_COL,
  IMPLICIT_SERIES_ID,
  type ColumnNames,
  type NormalizeOptions,
  type NormalizedDataset,
  type NormalizedSeries,
  type SeriesId,
} from './normalizer.js';

export {
  parseFrequency,
  inferFrequency,
  serviceFrequency,
  futureTimes,
  type Frequency,
  type FrequencyInput,
} from './frequency.js';

export { formatTime, parseTimeColumn, type TimeEncoding, type TimeKind } from './time.js';

export {
  BUILTIN_DATE_FEATURES,
  specialDates,
  computeDateFeatures,
  type BuiltinDateFeature,
  type DateFeatureFn,
  type DateFeatureSpec,
} from './date-features.js';

// Batching and transport
export { partition, seriesPayload, type PartitionLimits, type RequestBatch } from './partitioner.js';
export { Transport, parseRetryAfter, type FetchLike, type HttpMethod } from './transport.js';

// Assembly
export {
  formatLabel,
  intervalColumns,
  quantileColumn,
  resolveLevels,
  type LabelOptions,
} from './assembler.js';

// Data quality
export {
  auditData,
  cleanData,
  type AuditCheckId,
  type AuditOptions,
  type AuditResult,
  type Aggregation,
  type AggregationName,
  type CleanOptions,
  type CleanResult,
} from './audit.js';

// Errors
export {
  ConfigurationError,
  DataValidationError,
  FrequencyInferenceError,
  PayloadTooLargeError,
  ApiError,
  TransportError,
  BatchFailureError,
  AssemblyError,
  isRetryableStatus,
  type DataValidationKind,
} from './errors.js';

// Schemas
export * from './models/index.js';
