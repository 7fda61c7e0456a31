/**
 * Response Assembler
 *
 * Merges per-batch responses into one table. Rows follow batch order, then
 * series order within a batch, so output order depends only on input order.
 * Any disagreement between what was sent and what came back raises an
 * `AssemblyError`.
 */

import { AssemblyError, DataValidationError } from './errors.js';
import type { ForecastResponse } from './models/api.js';
import type { FractionalLabelPolicy } from './models/config.js';
import type { NormalizedDataset, NormalizedSeries } from './normalizer.js';
import type { RequestBatch } from './partitioner.js';
import { DataTable, type CellValue } from './tabular.js';
import { formatTime } from './time.js';

// =============================================================================
// Column naming
// =============================================================================

export interface LabelOptions {
  /** Point forecast column, e.g. `TimeGPT` */
  model: string;
  fractionalLabelPolicy: FractionalLabelPolicy;
}

export const BASE_VALUE_COLUMN = 'base_value';
export const CUTOFF_COLUMN = 'cutoff';
export const ANOMALY_COLUMN = 'anomaly';
export const ANOMALY_SCORE_COLUMN = 'anomaly_score';
export const ACCUMULATED_SCORE_COLUMN = 'accumulated_anomaly_score';

function roundLabel(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

/**
 * Render a level or percentile for a column name. Integers render bare;
 * fractions render as decimals or are rejected, depending on the policy.
 */
export function formatLabel(value: number, policy: FractionalLabelPolicy): string {
  const rounded = roundLabel(value);
  if (Number.isInteger(rounded)) return String(rounded);
  if (policy === 'reject') {
    throw new DataValidationError(
      'invalid-argument',
      `Level ${rounded} has a fractional part and cannot be used in a column name; ` +
        "use an integer level or set fractionalLabelPolicy to 'decimal'"
    );
  }
  return String(rounded);
}

export function intervalColumn(side: 'lo' | 'hi', level: number, labels: LabelOptions): string {
  return `${labels.model}-${side}-${formatLabel(level, labels.fractionalLabelPolicy)}`;
}

/**
 * Interval columns for each level: `lo` then `hi`, levels ascending
 */
export function intervalColumns(levels: readonly number[], labels: LabelOptions): string[] {
  return sortedLevels(levels).flatMap((level) => [
    intervalColumn('lo', level, labels),
    intervalColumn('hi', level, labels),
  ]);
}

export function quantileColumn(q: number, labels: LabelOptions): string {
  return `${labels.model}-q-${formatLabel(q * 100, labels.fractionalLabelPolicy)}`;
}

/**
 * Which forecast column carries quantile `q`: the point forecast for the
 * median, otherwise the lower or upper bound of level `|100 - 200q|`
 */
export function quantileSource(q: number): { side: 'point' } | { side: 'lo' | 'hi'; level: number } {
  const level = roundLabel(Math.abs(100 - 200 * q));
  if (level === 0) return { side: 'point' };
  return { side: q < 0.5 ? 'lo' : 'hi', level };
}

function sortedLevels(levels: readonly number[]): number[] {
  return [...new Set(levels.map(roundLabel))].sort((a, b) => a - b);
}

export interface LevelRequest {
  level?: readonly number[];
  quantiles?: readonly number[];
}

export interface ResolvedLevels {
  /** Levels to request from the service */
  levels?: number[];
  quantiles?: number[];
}

/**
 * Validate `level`/`quantiles` and derive the levels quantiles need
 */
export function resolveLevels(request: LevelRequest, labels: LabelOptions): ResolvedLevels {
  if (request.level !== undefined && request.quantiles !== undefined) {
    throw new DataValidationError('invalid-argument', 'Pass either level or quantiles, not both');
  }
  if (request.quantiles !== undefined) {
    const bad = request.quantiles.find((q) => !(q > 0 && q < 1));
    if (bad !== undefined) {
      throw new DataValidationError('invalid-argument', `Quantiles must lie strictly between 0 and 1, got ${bad}`);
    }
    const quantiles = [...new Set(request.quantiles)].sort((a, b) => a - b);
    quantiles.forEach((q) => quantileColumn(q, labels));
    const levels = sortedLevels(
      quantiles.flatMap((q) => {
        const source = quantileSource(q);
        return source.side === 'point' ? [] : [source.level];
      })
    );
    return { levels: levels.length > 0 ? levels : undefined, quantiles };
  }
  if (request.level !== undefined) {
    const bad = request.level.find((l) => !(l >= 0 && l < 100));
    if (bad !== undefined) {
      throw new DataValidationError('invalid-argument', `Levels must lie in [0, 100), got ${bad}`);
    }
    const levels = sortedLevels(request.level);
    levels.forEach((l) => intervalColumn('lo', l, labels));
    return { levels: levels.length > 0 ? levels : undefined };
  }
  return {};
}

// =============================================================================
// Response checks
// =============================================================================

interface IntervalArrays {
  level: number;
  lo: number[];
  hi: number[];
}

const INTERVAL_KEY = /^(lo|hi)-(\d+(?:\.\d+)?)$/;

function fail(message: string, batchIndex: number, extra: Record<string, unknown> = {}): never {
  throw new AssemblyError(message, { batchIndex, ...extra });
}

function expectLength(name: string, values: readonly unknown[] | undefined | null, expected: number, batchIndex: number): void {
  if (!values) fail(`Response for batch ${batchIndex} is missing "${name}"`, batchIndex);
  if (values.length !== expected) {
    fail(`Response for batch ${batchIndex} has ${values.length} "${name}" values, expected ${expected}`, batchIndex, {
      field: name,
    });
  }
}

/**
 * Match the response's interval arrays to the requested levels by value
 */
function readIntervals(
  response: ForecastResponse,
  levels: readonly number[] | undefined,
  rows: number,
  batchIndex: number
): IntervalArrays[] {
  if (!levels || levels.length === 0) return [];
  const intervals = response.intervals;
  if (!intervals) fail(`Response for batch ${batchIndex} has no intervals for levels ${levels.join(', ')}`, batchIndex);

  const byLevel = new Map<number, Partial<Record<'lo' | 'hi', number[]>>>();
  for (const [key, values] of Object.entries(intervals)) {
    const match = INTERVAL_KEY.exec(key);
    const side = match?.[1];
    if (!match || (side !== 'lo' && side !== 'hi')) {
      fail(`Response for batch ${batchIndex} has unexpected interval "${key}"`, batchIndex);
    }
    const level = roundLabel(Number(match[2]));
    if (!levels.includes(level)) {
      fail(`Response for batch ${batchIndex} has interval "${key}" that was not requested`, batchIndex);
    }
    const entry = byLevel.get(level) ?? {};
    entry[side] = values;
    byLevel.set(level, entry);
  }

  return levels.map((level) => {
    const entry = byLevel.get(level);
    const lo = entry?.lo;
    const hi = entry?.hi;
    if (!lo || !hi) fail(`Response for batch ${batchIndex} is missing the ${level} interval`, batchIndex);
    expectLength(`lo-${level}`, lo, rows, batchIndex);
    expectLength(`hi-${level}`, hi, rows, batchIndex);
    return { level, lo, hi };
  });
}

function readSizes(response: ForecastResponse, batch: RequestBatch, rows: number): number[] {
  const sizes = response.sizes;
  expectLength('sizes', sizes, batch.series.length, batch.index);
  if (!sizes) return [];
  const total = sizes.reduce((a, b) => a + b, 0);
  if (total !== rows) {
    fail(`Response for batch ${batch.index} has sizes summing to ${total}, expected ${rows}`, batch.index);
  }
  return sizes;
}

function checkTails(sizes: readonly number[], batch: RequestBatch): void {
  sizes.forEach((size, i) => {
    const series = batch.series[i];
    if (size > series.times.length) {
      fail(
        `Response for batch ${batch.index} has ${size} rows for series ${JSON.stringify(series.id)}, ` +
          `which only has ${series.times.length} observations`,
        batch.index,
        { seriesId: series.id }
      );
    }
  });
}

/**
 * Map a response row index into (series, position within series)
 */
function locateIndex(idx: number, batch: RequestBatch, starts: readonly number[], seriesIndex: number): number {
  const series = batch.series[seriesIndex];
  const local = idx - starts[seriesIndex];
  if (!Number.isInteger(local) || local < 0 || local >= series.times.length) {
    fail(
      `Response for batch ${batch.index} points at row ${idx}, outside series ${JSON.stringify(series.id)}`,
      batch.index,
      { seriesId: series.id }
    );
  }
  return local;
}

function seriesStarts(batch: RequestBatch): number[] {
  const starts: number[] = [];
  let offset = 0;
  for (const s of batch.series) {
    starts.push(offset);
    offset += s.times.length;
  }
  return starts;
}

// =============================================================================
// Table building
// =============================================================================

class TableBuilder {
  private readonly columns = new Map<string, CellValue[]>();

  constructor(names: readonly string[]) {
    for (const name of names) this.columns.set(name, []);
  }

  push(row: Record<string, CellValue>): void {
    for (const [name, values] of this.columns) {
      values.push(row[name]);
    }
  }

  build(): DataTable {
    return DataTable.fromColumns(Object.fromEntries(this.columns));
  }
}

interface Frame {
  dataset: NormalizedDataset;
  labels: LabelOptions;
}

function keyColumns(frame: Frame): string[] {
  const { dataset } = frame;
  return dataset.implicitId ? [dataset.timeCol] : [dataset.idCol, dataset.timeCol];
}

function keyRow(frame: Frame, series: NormalizedSeries, time: number): Record<string, CellValue> {
  const { dataset } = frame;
  const row: Record<string, CellValue> = { [dataset.timeCol]: formatTime(time, dataset.timeEncoding) };
  if (!dataset.implicitId) row[dataset.idCol] = series.id;
  return row;
}

function intervalValues(intervals: readonly IntervalArrays[], k: number, labels: LabelOptions): Record<string, number> {
  const row: Record<string, number> = {};
  for (const iv of intervals) {
    row[intervalColumn('lo', iv.level, labels)] = iv.lo[k];
    row[intervalColumn('hi', iv.level, labels)] = iv.hi[k];
  }
  return row;
}

/**
 * Replace interval columns with quantile columns; the point column stays
 */
export function applyQuantiles(
  table: DataTable,
  quantiles: readonly number[] | undefined,
  levels: readonly number[] | undefined,
  labels: LabelOptions
): DataTable {
  if (!quantiles) return table;
  const intervalNames = intervalColumns(levels ?? [], labels);
  const kept = table.columns.filter((c) => !intervalNames.includes(c));
  const columns: Record<string, readonly CellValue[]> = {};
  for (const name of kept) columns[name] = table.column(name);
  for (const q of quantiles) {
    const source = quantileSource(q);
    const from = source.side === 'point' ? labels.model : intervalColumn(source.side, source.level, labels);
    columns[quantileColumn(q, labels)] = table.column(from);
  }
  return DataTable.fromColumns(columns);
}

// =============================================================================
// Feature contributions and weights
// =============================================================================

function readContributions(
  response: ForecastResponse | undefined,
  frame: Frame,
  rows: number,
  batchIndex: number
): number[][] | undefined {
  if (!response) return undefined;
  const contributions = response.feature_contributions;
  if (!contributions) {
    fail(`Response for batch ${batchIndex} has no feature contributions`, batchIndex);
  }
  const expected = frame.dataset.exogColumns.length + 1;
  if (contributions.length !== expected) {
    fail(
      `Response for batch ${batchIndex} has ${contributions.length} contribution arrays, expected ${expected}`,
      batchIndex
    );
  }
  contributions.forEach((values, f) => expectLength(`feature_contributions[${f}]`, values, rows, batchIndex));
  return contributions;
}

function contributionValues(frame: Frame, contributions: readonly number[][], k: number): Record<string, number> {
  const row: Record<string, number> = {};
  frame.dataset.exogColumns.forEach((name, f) => {
    row[name] = contributions[f][k];
  });
  row[BASE_VALUE_COLUMN] = contributions[contributions.length - 1][k];
  return row;
}

/**
 * Exogenous weights reported by the service, one row per feature and batch
 */
export function assembleWeights(
  responses: readonly ForecastResponse[],
  exogColumns: readonly string[]
): DataTable | undefined {
  const builder = new TableBuilder(['batch', 'entry', 'features', 'weights']);
  let any = false;
  responses.forEach((response, batch) => {
    const weights = response.weights_x;
    if (!weights || weights.length === 0) return;
    const groups: number[][] = weights.map((w) => (typeof w === 'number' ? [] : w));
    const flat = weights.filter((w): w is number => typeof w === 'number');
    const entries = flat.length === weights.length ? [flat] : groups;
    entries.forEach((entry, e) => {
      entry.forEach((weight, f) => {
        builder.push({ batch, entry: e, features: exogColumns[f] ?? `x${f}`, weights: weight });
        any = true;
      });
    });
  });
  return any ? builder.build() : undefined;
}

// =============================================================================
// Per-operation assembly
// =============================================================================

export interface AssemblyInput {
  dataset: NormalizedDataset;
  batches: readonly RequestBatch[];
  labels: LabelOptions;
  levels?: number[];
  quantiles?: number[];
}

export interface ForecastAssembly {
  forecast: DataTable;
  featureContributions?: DataTable;
  weightsX?: DataTable;
}

function checkBatchCount(input: AssemblyInput, responses: readonly unknown[], what: string): void {
  if (responses.length !== input.batches.length) {
    throw new AssemblyError(`Got ${responses.length} ${what} responses for ${input.batches.length} batches`);
  }
}

/**
 * Forecast rows per series, with in-sample rows first when `historic`
 * responses are given
 */
export function assembleForecast(
  input: AssemblyInput,
  responses: readonly ForecastResponse[],
  options: { historic?: readonly ForecastResponse[]; featureContributions?: boolean } = {}
): ForecastAssembly {
  checkBatchCount(input, responses, 'forecast');
  if (options.historic) checkBatchCount(input, options.historic, 'historic forecast');
  const { dataset, labels } = input;
  const h = dataset.h;
  const frame: Frame = { dataset, labels };
  const keys = keyColumns(frame);

  const table = new TableBuilder([...keys, labels.model, ...intervalColumns(input.levels ?? [], labels)]);
  const wantContributions = options.featureContributions === true && dataset.exogColumns.length > 0;
  const shap = wantContributions
    ? new TableBuilder([...keys, labels.model, ...dataset.exogColumns, BASE_VALUE_COLUMN])
    : undefined;

  input.batches.forEach((batch, b) => {
    const future = responses[b];
    const futureRows = batch.series.length * h;
    expectLength('mean', future.mean, futureRows, batch.index);
    const futureIv = readIntervals(future, input.levels, futureRows, batch.index);
    const futureShap = shap ? readContributions(future, frame, futureRows, batch.index) : undefined;

    const hist = options.historic?.[b];
    let histSizes: number[] = [];
    let histIv: IntervalArrays[] = [];
    let histShap: number[][] | undefined;
    if (hist) {
      histSizes = readSizes(hist, batch, hist.mean.length);
      checkTails(histSizes, batch);
      histIv = readIntervals(hist, input.levels, hist.mean.length, batch.index);
      histShap = shap && hist.feature_contributions ? readContributions(hist, frame, hist.mean.length, batch.index) : undefined;
    }

    let histOffset = 0;
    batch.series.forEach((series, i) => {
      if (hist) {
        const n = histSizes[i];
        const start = series.times.length - n;
        for (let k = 0; k < n; k++) {
          const at = histOffset + k;
          const base = { ...keyRow(frame, series, series.times[start + k]), [labels.model]: hist.mean[at] };
          table.push({ ...base, ...intervalValues(histIv, at, labels) });
          if (shap && histShap) shap.push({ ...base, ...contributionValues(frame, histShap, at) });
        }
        histOffset += n;
      }
      for (let k = 0; k < h; k++) {
        const at = i * h + k;
        const base = { ...keyRow(frame, series, series.futureTimes[k]), [labels.model]: future.mean[at] };
        table.push({ ...base, ...intervalValues(futureIv, at, labels) });
        if (shap && futureShap) shap.push({ ...base, ...contributionValues(frame, futureShap, at) });
      }
    });
  });

  return {
    forecast: applyQuantiles(table.build(), input.quantiles, input.levels, labels),
    featureContributions: shap?.build(),
    weightsX: assembleWeights(responses, dataset.exogColumns),
  };
}

/**
 * Cross-validation rows: the service returns, per series, the indices of
 * the observations it forecast; each window's cutoff is the observation
 * just before the window starts
 */
export function assembleCrossValidation(
  input: AssemblyInput,
  responses: readonly ForecastResponse[],
  h: number
): DataTable {
  checkBatchCount(input, responses, 'cross-validation');
  const { dataset, labels } = input;
  const frame: Frame = { dataset, labels };
  const table = new TableBuilder([
    ...keyColumns(frame),
    CUTOFF_COLUMN,
    dataset.targetCol,
    labels.model,
    ...intervalColumns(input.levels ?? [], labels),
  ]);

  input.batches.forEach((batch, b) => {
    const response = responses[b];
    const rows = response.mean.length;
    const idxs = response.idxs;
    expectLength('idxs', idxs, rows, batch.index);
    if (!idxs) return;
    const sizes = readSizes(response, batch, rows);
    const iv = readIntervals(response, input.levels, rows, batch.index);
    const starts = seriesStarts(batch);

    let offset = 0;
    batch.series.forEach((series, i) => {
      for (let j = 0; j < sizes[i]; j++) {
        const k = offset + j;
        const local = locateIndex(idxs[k], batch, starts, i);
        const windowStart = offset + Math.floor(j / h) * h;
        const cutoffLocal = locateIndex(idxs[windowStart], batch, starts, i) - 1;
        if (cutoffLocal < 0) {
          fail(`Cross-validation window for series ${JSON.stringify(series.id)} starts at its first observation`, batch.index, {
            seriesId: series.id,
          });
        }
        table.push({
          ...keyRow(frame, series, series.times[local]),
          [CUTOFF_COLUMN]: formatTime(series.times[cutoffLocal], dataset.timeEncoding),
          [dataset.targetCol]: series.y[local],
          [labels.model]: response.mean[k],
          ...intervalValues(iv, k, labels),
        });
      }
      offset += sizes[i];
    });
  });

  return applyQuantiles(table.build(), input.quantiles, input.levels, labels);
}

/**
 * Historical anomaly rows: the last `sizes[i]` observations of each series
 */
export function assembleAnomalies(input: AssemblyInput, responses: readonly ForecastResponse[]): DataTable {
  checkBatchCount(input, responses, 'anomaly detection');
  const { dataset, labels } = input;
  const frame: Frame = { dataset, labels };
  const table = new TableBuilder([
    ...keyColumns(frame),
    dataset.targetCol,
    labels.model,
    ...intervalColumns(input.levels ?? [], labels),
    ANOMALY_COLUMN,
  ]);

  input.batches.forEach((batch, b) => {
    const response = responses[b];
    const rows = response.mean.length;
    const sizes = readSizes(response, batch, rows);
    checkTails(sizes, batch);
    expectLength(ANOMALY_COLUMN, response.anomaly, rows, batch.index);
    const anomaly = response.anomaly ?? [];
    const iv = readIntervals(response, input.levels, rows, batch.index);

    let offset = 0;
    batch.series.forEach((series, i) => {
      const start = series.times.length - sizes[i];
      for (let j = 0; j < sizes[i]; j++) {
        const k = offset + j;
        table.push({
          ...keyRow(frame, series, series.times[start + j]),
          [dataset.targetCol]: series.y[start + j],
          [labels.model]: response.mean[k],
          ...intervalValues(iv, k, labels),
          [ANOMALY_COLUMN]: Boolean(anomaly[k]),
        });
      }
      offset += sizes[i];
    });
  });

  return table.build();
}

/**
 * Online anomaly rows, located through the returned indices
 */
export function assembleOnlineAnomalies(
  input: AssemblyInput,
  responses: readonly ForecastResponse[],
  multivariate: boolean
): DataTable {
  checkBatchCount(input, responses, 'online anomaly detection');
  const { dataset, labels } = input;
  const frame: Frame = { dataset, labels };
  const table = new TableBuilder([
    ...keyColumns(frame),
    dataset.targetCol,
    labels.model,
    ANOMALY_COLUMN,
    ANOMALY_SCORE_COLUMN,
    ...(multivariate ? [ACCUMULATED_SCORE_COLUMN] : []),
    ...intervalColumns(input.levels ?? [], labels),
  ]);

  input.batches.forEach((batch, b) => {
    const response = responses[b];
    const rows = response.mean.length;
    const idxs = response.idxs;
    expectLength('idxs', idxs, rows, batch.index);
    expectLength(ANOMALY_COLUMN, response.anomaly, rows, batch.index);
    expectLength(ANOMALY_SCORE_COLUMN, response.anomaly_score, rows, batch.index);
    if (multivariate) {
      expectLength(ACCUMULATED_SCORE_COLUMN, response.accumulated_anomaly_score, rows, batch.index);
    }
    const sizes = readSizes(response, batch, rows);
    const iv = readIntervals(response, input.levels, rows, batch.index);
    const starts = seriesStarts(batch);
    const anomaly = response.anomaly ?? [];
    const score = response.anomaly_score ?? [];
    const accumulated = response.accumulated_anomaly_score ?? [];

    let offset = 0;
    batch.series.forEach((series, i) => {
      for (let j = 0; j < sizes[i]; j++) {
        const k = offset + j;
        const local = locateIndex((idxs ?? [])[k], batch, starts, i);
        const row: Record<string, CellValue> = {
          ...keyRow(frame, series, series.times[local]),
          [dataset.targetCol]: series.y[local],
          [labels.model]: response.mean[k],
          [ANOMALY_COLUMN]: Boolean(anomaly[k]),
          [ANOMALY_SCORE_COLUMN]: score[k],
          ...intervalValues(iv, k, labels),
        };
        if (multivariate) row[ACCUMULATED_SCORE_COLUMN] = accumulated[k];
        table.push(row);
      }
      offset += sizes[i];
    });
  });

  return table.build();
}
