/**
 * Input Normalizer
 *
 * Turns any `TabularInput` into a `NormalizedDataset`: series grouped in
 * order of first appearance, each sorted by time, validated against one
 * frequency grid, with exogenous columns resolved into history and future
 * matrices. Never mutates the caller's table and never imputes.
 */

import { getLogger, type Logger } from '@nowcast/core';
import { computeDateFeatures, type DateFeatureSpec } from './date-features.js';
import { DataValidationError } from './errors.js';
import {
  futureTimes as gridAfter,
  inferFrequency,
  parseFrequency,
  validateGrid,
  type Frequency,
  type FrequencyInput,
} from './frequency.js';
import { DataTable, type CellValue, type TabularInput } from './tabular.js';
import { describeTime, formatTime, parseTimeColumn, type TimeEncoding, type TimeKind } from './time.js';

// =============================================================================
// Types
// =============================================================================

export type SeriesId = string | number;

export const DEFAULT_ID_COL = 'unique_id';
export const DEFAULT_TIME_COL = 'ds';
export const DEFAULT_TARGET_COL = 'y';

/** Constant id given to the single series of a table without an id column */
export const IMPLICIT_SERIES_ID = 0;

export interface ColumnNames {
  idCol?: string;
  timeCol?: string;
  targetCol?: string;
}

export interface NormalizeOptions extends ColumnNames {
  /** Explicit frequency; inferred from the data when omitted */
  freq?: FrequencyInput;
  /**
   * Future steps the call will produce. With `h > 0` exogenous columns
   * need future values (`futureExog`) unless declared historic.
   */
  h?: number;
  /** Restrict the exogenous candidates to these columns */
  exogColumns?: readonly string[];
  /** Future values of exogenous features: id, time and feature columns, `h` rows per series */
  futureExog?: TabularInput;
  /** Exogenous columns known only for the past */
  histExogList?: readonly string[];
  dateFeatures?: boolean | readonly DateFeatureSpec[];
  dateFeaturesToOneHot?: boolean | readonly string[];
  logger?: Logger;
}

export interface NormalizedSeries {
  id: SeriesId;
  times: number[];
  y: number[];
  /** One array per entry of `exogColumns`, aligned with `times` */
  exog: number[][];
  /** The `h` grid points after the last observation */
  futureTimes: number[];
  /** One array per entry of `futureExogColumns`, aligned with `futureTimes` */
  futureExog: number[][];
}

export interface NormalizedDataset {
  idCol: string;
  timeCol: string;
  targetCol: string;
  timeKind: TimeKind;
  timeEncoding: TimeEncoding;
  freq: Frequency;
  h: number;
  series: NormalizedSeries[];
  /** Future exogenous columns first, then historic ones */
  exogColumns: string[];
  futureExogColumns: string[];
  histExogColumns: string[];
  /** The input had no id column */
  implicitId: boolean;
}

// =============================================================================
// Cell checks
// =============================================================================

function isMissing(value: CellValue): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

function readNumber(
  value: CellValue,
  column: string,
  row: number,
  missingKind: 'missing-values' | 'exogenous'
): number {
  if (isMissing(value)) {
    throw new DataValidationError(
      missingKind,
      `Column "${column}" has a missing value at row ${row}`,
      { column, row }
    );
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DataValidationError(
      'non-numeric',
      `Column "${column}" must be numeric, got ${JSON.stringify(value)} at row ${row}`,
      { column, row }
    );
  }
  return value;
}

function readId(value: CellValue, column: string, row: number): SeriesId {
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    return value;
  }
  throw new DataValidationError(
    isMissing(value) ? 'missing-values' : 'invalid-argument',
    `Id column "${column}" must hold strings or numbers, got ${JSON.stringify(value)} at row ${row}`,
    { column, row }
  );
}

function requireColumn(input: TabularInput, column: string, table: string): void {
  if (!input.hasColumn(column)) {
    throw new DataValidationError(
      'missing-column',
      `${table} is missing required column "${column}"`,
      { column }
    );
  }
}

// =============================================================================
// Grouping
// =============================================================================

interface RawSeries {
  id: SeriesId;
  rows: number[];
}

function groupRows(ids: readonly SeriesId[]): RawSeries[] {
  const groups = new Map<SeriesId, RawSeries>();
  const ordered: RawSeries[] = [];
  ids.forEach((id, row) => {
    let group = groups.get(id);
    if (!group) {
      group = { id, rows: [] };
      groups.set(id, group);
      ordered.push(group);
    }
    group.rows.push(row);
  });
  return ordered;
}

function resolveFrequency(
  freq: FrequencyInput | undefined,
  kind: TimeKind,
  seriesTimes: ReadonlyArray<readonly number[]>,
  logger: Logger
): Frequency {
  if (freq === undefined) {
    const inferred = inferFrequency(seriesTimes, kind);
    logger.info('Inferred frequency', { freq: inferred.alias });
    return inferred;
  }
  const parsed = parseFrequency(freq);
  if ((parsed.kind === 'integer') !== (kind === 'integer')) {
    throw new DataValidationError(
      'invalid-argument',
      kind === 'integer'
        ? `Integer time columns need an integer frequency, got "${String(freq)}"`
        : `Datetime columns need a frequency alias, got ${String(freq)}`
    );
  }
  return parsed;
}

// =============================================================================
// Exogenous resolution
// =============================================================================

interface ExogPlan {
  future: string[];
  hist: string[];
}

function planExogenous(
  input: TabularInput,
  baseCols: ReadonlySet<string>,
  options: NormalizeOptions,
  futureColumns: readonly string[] | undefined,
  needsFuture: boolean,
  logger: Logger
): ExogPlan {
  if (options.exogColumns) {
    for (const c of options.exogColumns) requireColumn(input, c, 'Input table');
  }
  const candidates = (options.exogColumns ?? input.columns).filter((c) => !baseCols.has(c));
  const hist = [...(options.histExogList ?? [])];
  const missingHist = hist.filter((c) => !candidates.includes(c));
  if (missingHist.length > 0) {
    throw new DataValidationError(
      'exogenous',
      `Columns declared historic are not in the input: ${missingHist.join(', ')}`,
      { column: missingHist[0] }
    );
  }

  if (!needsFuture) {
    return { future: candidates.filter((c) => !hist.includes(c)), hist };
  }

  if (futureColumns === undefined) {
    const ignored = candidates.filter((c) => !hist.includes(c));
    if (ignored.length > 0) {
      logger.warn('Exogenous columns without future values are ignored', {
        ignored,
        hint: 'Pass futureExog or declare them in histExogList',
      });
    }
    return { future: [], hist };
  }

  const missingFuture = futureColumns.filter((c) => !candidates.includes(c));
  if (missingFuture.length > 0) {
    throw new DataValidationError(
      'exogenous',
      `Future exogenous columns are missing from the input: ${missingFuture.join(', ')}`,
      { column: missingFuture[0] }
    );
  }
  const declared = new Set([...futureColumns, ...hist]);
  const ignored = candidates.filter((c) => !declared.has(c));
  if (ignored.length > 0) {
    logger.warn('Exogenous columns neither in futureExog nor declared historic are ignored', {
      ignored,
    });
  }
  const both = futureColumns.filter((c) => hist.includes(c));
  if (both.length > 0) {
    logger.warn('Columns declared historic but present in futureExog are treated as historic', {
      columns: both,
    });
  }
  return { future: futureColumns.filter((c) => !hist.includes(c)), hist };
}

function readFutureExog(
  table: TabularInput,
  dataset: Pick<NormalizedDataset, 'idCol' | 'timeCol' | 'timeKind'>,
  series: readonly NormalizedSeries[],
  columns: readonly string[],
  implicitId: boolean,
  h: number
): number[][][] {
  const { idCol, timeCol, timeKind } = dataset;
  requireColumn(table, timeCol, 'futureExog');
  if (!implicitId) requireColumn(table, idCol, 'futureExog');

  const times = parseTimeColumn(table.column(timeCol), timeCol);
  if (times.kind !== timeKind) {
    throw new DataValidationError(
      'exogenous',
      `futureExog time column "${timeCol}" does not match the input's time type`,
      { column: timeCol }
    );
  }
  const idValues = implicitId ? undefined : table.column(idCol);
  const ids: SeriesId[] = [];
  for (let row = 0; row < table.rowCount; row++) {
    ids.push(idValues ? readId(idValues[row], idCol, row) : IMPLICIT_SERIES_ID);
  }
  const groups = new Map(groupRows(ids).map((g) => [g.id, g.rows]));
  const known = new Set(series.map((s) => s.id));
  for (const id of groups.keys()) {
    if (!known.has(id)) {
      throw new DataValidationError('exogenous', `futureExog has rows for unknown series ${JSON.stringify(id)}`, {
        seriesId: id,
      });
    }
  }

  const valueColumns = columns.map((c) => table.column(c));
  return series.map((s) => {
    const rows = [...(groups.get(s.id) ?? [])].sort((a, b) => times.values[a] - times.values[b]);
    const rowTimes = rows.map((r) => times.values[r]);
    const expected = s.futureTimes;
    if (rows.length !== h || rowTimes.some((t, i) => t !== expected[i])) {
      throw new DataValidationError(
        'exogenous',
        `futureExog must hold exactly the ${h} timestamps after the end of series ${JSON.stringify(s.id)}, ` +
          `starting at ${expected.length > 0 ? describeTime(expected[0], timeKind) : 'n/a'}`,
        { seriesId: s.id, timestamps: expected.map((t) => describeTime(t, timeKind)) }
      );
    }
    return valueColumns.map((values, c) => rows.map((r) => readNumber(values[r], columns[c], r, 'exogenous')));
  });
}

// =============================================================================
// Normalize
// =============================================================================

/**
 * Validate and normalize a table of one or more series
 *
 * @throws DataValidationError for missing columns, non-numeric or missing
 *   targets, duplicate or off-grid timestamps, gaps and exogenous problems
 * @throws FrequencyInferenceError when no frequency was given and the series
 *   disagree on their spacing
 */
export function normalize(input: TabularInput, options: NormalizeOptions = {}): NormalizedDataset {
  const logger = options.logger ?? getLogger();
  const idCol = options.idCol ?? DEFAULT_ID_COL;
  const timeCol = options.timeCol ?? DEFAULT_TIME_COL;
  const targetCol = options.targetCol ?? DEFAULT_TARGET_COL;
  const h = options.h ?? 0;
  if (!Number.isInteger(h) || h < 0) {
    throw new DataValidationError('invalid-argument', `Horizon must be a non-negative integer, got ${h}`);
  }

  requireColumn(input, timeCol, 'Input table');
  requireColumn(input, targetCol, 'Input table');
  if (input.rowCount === 0) {
    throw new DataValidationError('invalid-argument', 'Input table has no rows');
  }
  const implicitId = !input.hasColumn(idCol);

  // Row-level checks
  const parsedTimes = parseTimeColumn(input.column(timeCol), timeCol);
  const targetValues = input.column(targetCol);
  const y = targetValues.map((v, row) => readNumber(v, targetCol, row, 'missing-values'));
  const idValues = implicitId ? undefined : input.column(idCol);
  const ids: SeriesId[] = [];
  for (let row = 0; row < input.rowCount; row++) {
    ids.push(idValues ? readId(idValues[row], idCol, row) : IMPLICIT_SERIES_ID);
  }

  // Group, sort, pick the frequency, check the grid
  const groups = groupRows(ids);
  for (const g of groups) {
    g.rows.sort((a, b) => parsedTimes.values[a] - parsedTimes.values[b]);
  }
  const seriesTimes = groups.map((g) => g.rows.map((r) => parsedTimes.values[r]));
  const freq = resolveFrequency(options.freq, parsedTimes.kind, seriesTimes, logger);
  groups.forEach((g, i) => validateGrid(seriesTimes[i], freq, parsedTimes.kind, g.id));

  // Exogenous columns
  const baseCols = new Set([idCol, timeCol, targetCol]);
  const futureTable = options.futureExog;
  const futureColumns = futureTable?.columns.filter((c) => !baseCols.has(c));
  const plan = planExogenous(input, baseCols, options, futureColumns, h > 0, logger);
  const exogColumns = [...plan.future, ...plan.hist];
  const exogValues = exogColumns.map((c) => input.column(c));

  const series: NormalizedSeries[] = groups.map((g, i) => {
    const times = seriesTimes[i];
    return {
      id: g.id,
      times,
      y: g.rows.map((r) => y[r]),
      exog: exogValues.map((values, c) =>
        g.rows.map((r) => readNumber(values[r], exogColumns[c], r, 'exogenous'))
      ),
      futureTimes: h > 0 ? gridAfter(times[times.length - 1], freq, h) : [],
      futureExog: [],
    };
  });

  if (h > 0 && futureTable && plan.future.length > 0) {
    const values = readFutureExog(
      futureTable,
      { idCol, timeCol, timeKind: parsedTimes.kind },
      series,
      plan.future,
      implicitId,
      h
    );
    series.forEach((s, i) => {
      s.futureExog = values[i];
    });
  }

  const dataset: NormalizedDataset = {
    idCol,
    timeCol,
    targetCol,
    timeKind: parsedTimes.kind,
    timeEncoding: parsedTimes.encoding,
    freq,
    h,
    series,
    exogColumns,
    futureExogColumns: h > 0 ? [...plan.future] : [],
    histExogColumns: plan.hist,
    implicitId,
  };

  if (options.dateFeatures) {
    appendDateFeatures(dataset, options, logger);
  }
  return dataset;
}

/**
 * Add date features as future exogenous columns, placed after the caller's
 * future columns and before the historic ones
 */
function appendDateFeatures(dataset: NormalizedDataset, options: NormalizeOptions, logger: Logger): void {
  const history = dataset.series.flatMap((s) => s.times);
  const future = dataset.series.flatMap((s) => s.futureTimes);
  const features = computeDateFeatures(
    history,
    future,
    dataset.freq,
    { features: options.dateFeatures ?? false, oneHot: options.dateFeaturesToOneHot ?? false },
    logger
  );
  if (features.names.length === 0) return;

  const clash = features.names.find((n) => dataset.exogColumns.includes(n) || n === dataset.targetCol);
  if (clash !== undefined) {
    throw new DataValidationError('invalid-argument', `Date feature "${clash}" clashes with an existing column`, {
      column: clash,
    });
  }

  const nFuture = dataset.exogColumns.length - dataset.histExogColumns.length;
  let historyOffset = 0;
  let futureOffset = 0;
  for (const s of dataset.series) {
    const hist = s.exog.slice(nFuture);
    const added = features.names.map((n) =>
      (features.history.get(n) ?? []).slice(historyOffset, historyOffset + s.times.length)
    );
    s.exog = [...s.exog.slice(0, nFuture), ...added, ...hist];
    if (dataset.h > 0) {
      s.futureExog = [
        ...s.futureExog,
        ...features.names.map((n) =>
          (features.future.get(n) ?? []).slice(futureOffset, futureOffset + s.futureTimes.length)
        ),
      ];
    }
    historyOffset += s.times.length;
    futureOffset += s.futureTimes.length;
  }

  dataset.exogColumns = [
    ...dataset.exogColumns.slice(0, nFuture),
    ...features.names,
    ...dataset.histExogColumns,
  ];
  if (dataset.h > 0) {
    dataset.futureExogColumns = [...dataset.futureExogColumns, ...features.names];
  }
}

// =============================================================================
// Derived datasets
// =============================================================================

/**
 * Keep the last `n` observations of every series. A non-positive `n`
 * keeps everything.
 */
export function tailDataset(dataset: NormalizedDataset, n: number): NormalizedDataset {
  if (n <= 0) return dataset;
  return {
    ...dataset,
    series: dataset.series.map((s) => {
      const start = Math.max(0, s.times.length - n);
      return {
        ...s,
        times: s.times.slice(start),
        y: s.y.slice(start),
        exog: s.exog.map((col) => col.slice(start)),
      };
    }),
  };
}

/**
 * Render the history part of a dataset back to a table, in the caller's
 * column names and time encoding
 */
export function datasetToTable(dataset: NormalizedDataset): DataTable {
  const columns: Record<string, CellValue[]> = {};
  if (!dataset.implicitId) {
    columns[dataset.idCol] = dataset.series.flatMap((s) => s.times.map(() => s.id));
  }
  columns[dataset.timeCol] = dataset.series.flatMap((s) =>
    s.times.map((t) => formatTime(t, dataset.timeEncoding))
  );
  columns[dataset.targetCol] = dataset.series.flatMap((s) => s.y);
  dataset.exogColumns.forEach((name, c) => {
    columns[name] = dataset.series.flatMap((s) => s.exog[c]);
  });
  return DataTable.fromColumns(columns);
}

/**
 * Render the future exogenous values of a dataset, or undefined when it has none
 */
export function futureExogToTable(dataset: NormalizedDataset): DataTable | undefined {
  if (dataset.h === 0 || dataset.futureExogColumns.length === 0) return undefined;
  const columns: Record<string, CellValue[]> = {};
  if (!dataset.implicitId) {
    columns[dataset.idCol] = dataset.series.flatMap((s) => s.futureTimes.map(() => s.id));
  }
  columns[dataset.timeCol] = dataset.series.flatMap((s) =>
    s.futureTimes.map((t) => formatTime(t, dataset.timeEncoding))
  );
  dataset.futureExogColumns.forEach((name, c) => {
    columns[name] = dataset.series.flatMap((s) => s.futureExog[c]);
  });
  return DataTable.fromColumns(columns);
}
