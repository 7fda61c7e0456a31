/**
 * Data Audit
 *
 * Local data-quality checks run before a forecast, and the matching fixes.
 *
 * | Check | Finding                   | Severity      |
 * |-------|---------------------------|---------------|
 * | D001  | duplicate (id, time) rows | fail          |
 * | D002  | missing grid timestamps   | fail          |
 * | F001  | categorical columns       | fail          |
 * | V001  | negative target values    | case-specific |
 * | V002  | leading zeros             | case-specific |
 */

import { getLogger, type Logger } from '@nowcast/core';
import { DataValidationError } from './errors.js';
import { addSteps, parseFrequency, type FrequencyInput } from './frequency.js';
import { DEFAULT_ID_COL, DEFAULT_TARGET_COL, DEFAULT_TIME_COL, type ColumnNames } from './normalizer.js';
import { DataTable, type CellValue, type TabularInput } from './tabular.js';
import { formatTime, parseIsoTimestamp, parseTimeColumn, type TimeEncoding } from './time.js';

export type AuditCheckId = 'D001' | 'D002' | 'F001' | 'V001' | 'V002';

export type AuditSeverity = 'pass' | 'fail' | 'case-specific';

/** Where each series' expected grid starts or ends */
export type GridBound = 'per-series' | 'global' | string | number | Date;

export interface AuditOptions extends ColumnNames {
  freq: FrequencyInput;
  /** Default `per-series` */
  start?: GridBound;
  /** Default `global` */
  end?: GridBound;
  logger?: Logger;
}

export interface AuditResult {
  allPass: boolean;
  /** Offending rows per failed check; `null` when the check could not run */
  failures: Partial<Record<AuditCheckId, DataTable | null>>;
  caseSpecific: Partial<Record<AuditCheckId, DataTable>>;
}

export type AggregationName = 'sum' | 'mean' | 'min' | 'max' | 'first' | 'last' | 'median' | 'count';

export type Aggregation = AggregationName | ((values: readonly CellValue[]) => CellValue);

export interface CleanOptions extends AuditOptions {
  /** Also fix V001 and V002 */
  cleanCaseSpecific?: boolean;
  /** How to merge duplicate rows; must cover every column but id and time */
  aggDict?: Record<string, Aggregation>;
}

export interface CleanResult {
  data: DataTable;
  audit: AuditResult;
}

const MAX_MISSING_POINTS = 10_000_000;

// =============================================================================
// Shared
// =============================================================================

interface Columns {
  idCol: string;
  timeCol: string;
  targetCol: string;
}

function columnsOf(options: ColumnNames): Columns {
  return {
    idCol: options.idCol ?? DEFAULT_ID_COL,
    timeCol: options.timeCol ?? DEFAULT_TIME_COL,
    targetCol: options.targetCol ?? DEFAULT_TARGET_COL,
  };
}

function requireColumns(input: TabularInput, cols: Columns): void {
  for (const c of [cols.idCol, cols.timeCol, cols.targetCol]) {
    if (!input.hasColumn(c)) {
      throw new DataValidationError('missing-column', `Input table is missing required column "${c}"`, { column: c });
    }
  }
}

function rowKey(id: CellValue, time: number): string {
  return JSON.stringify([id instanceof Date ? id.getTime() : id, time]);
}

function pickRows(table: DataTable, rows: readonly number[]): DataTable {
  const columns: Record<string, CellValue[]> = {};
  for (const name of table.columns) {
    const values = table.column(name);
    columns[name] = rows.map((r) => values[r]);
  }
  return DataTable.fromColumns(columns);
}

function groupBySeries(ids: readonly CellValue[]): Map<CellValue, number[]> {
  const groups = new Map<CellValue, number[]>();
  ids.forEach((id, row) => {
    const rows = groups.get(id);
    if (rows) rows.push(row);
    else groups.set(id, [row]);
  });
  return groups;
}

function extent(values: readonly number[]): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
}

function boundValue(bound: GridBound, name: string): number {
  if (bound instanceof Date) return bound.getTime();
  if (typeof bound === 'number') return bound;
  const parsed = parseIsoTimestamp(bound);
  if (parsed === undefined) {
    throw new DataValidationError('invalid-argument', `Invalid ${name} bound "${bound}"`);
  }
  return parsed;
}

// =============================================================================
// Checks
// =============================================================================

function auditDuplicates(table: DataTable, cols: Columns, times: readonly number[]): DataTable | undefined {
  const ids = table.column(cols.idCol);
  const counts = new Map<string, number>();
  ids.forEach((id, row) => {
    const key = rowKey(id, times[row]);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  });
  const rows = ids.flatMap((id, row) => ((counts.get(rowKey(id, times[row])) ?? 0) > 1 ? [row] : []));
  return rows.length > 0 ? pickRows(table, rows) : undefined;
}

function auditMissingDates(
  table: DataTable,
  cols: Columns,
  times: readonly number[],
  encoding: TimeEncoding,
  options: AuditOptions
): DataTable | undefined {
  const freq = parseFrequency(options.freq);
  const groups = groupBySeries(table.column(cols.idCol));
  const [globalStart, globalEnd] = extent(times);
  const start = options.start ?? 'per-series';
  const end = options.end ?? 'global';

  const missingIds: CellValue[] = [];
  const missingTimes: CellValue[] = [];
  for (const [id, rows] of groups) {
    const own = rows.map((r) => times[r]);
    const present = new Set(own);
    const [first, latest] = extent(own);
    let current = start === 'per-series' ? first : start === 'global' ? globalStart : boundValue(start, 'start');
    const last = end === 'per-series' ? latest : end === 'global' ? globalEnd : boundValue(end, 'end');
    while (current <= last) {
      if (!present.has(current)) {
        missingIds.push(id);
        missingTimes.push(formatTime(current, encoding));
        if (missingIds.length > MAX_MISSING_POINTS) {
          throw new DataValidationError('invalid-argument', 'Too many missing timestamps to list; check the frequency');
        }
      }
      current = addSteps(current, freq, 1);
    }
  }
  if (missingIds.length === 0) return undefined;
  return DataTable.fromColumns({ [cols.idCol]: missingIds, [cols.timeCol]: missingTimes });
}

function auditCategorical(table: DataTable, cols: Columns): DataTable | undefined {
  const categorical = table.columns.filter(
    (c) => c !== cols.idCol && c !== cols.timeCol && table.column(c).some((v) => typeof v === 'string')
  );
  return categorical.length > 0 ? table.select(categorical) : undefined;
}

function auditNegatives(table: DataTable, cols: Columns): DataTable | undefined {
  const rows = table.column(cols.targetCol).flatMap((v, row) => (typeof v === 'number' && v < 0 ? [row] : []));
  return rows.length > 0 ? pickRows(table, rows) : undefined;
}

function auditLeadingZeros(
  table: DataTable,
  cols: Columns,
  times: readonly number[],
  encoding: TimeEncoding
): DataTable | undefined {
  const target = table.column(cols.targetCol);
  const ids: CellValue[] = [];
  const firstTimes: CellValue[] = [];
  const firstNonzero: CellValue[] = [];
  const counts: number[] = [];
  for (const [id, rows] of groupBySeries(table.column(cols.idCol))) {
    const sorted = [...rows].sort((a, b) => times[a] - times[b]);
    const position = sorted.findIndex((r) => target[r] !== 0);
    if (position <= 0) continue;
    ids.push(id);
    firstTimes.push(formatTime(times[sorted[0]], encoding));
    firstNonzero.push(formatTime(times[sorted[position]], encoding));
    counts.push(position);
  }
  if (ids.length === 0) return undefined;
  return DataTable.fromColumns({
    [cols.idCol]: ids,
    first_time: firstTimes,
    first_nonzero_time: firstNonzero,
    leading_zeros: counts,
  });
}

/**
 * Run every check and report failures by severity. Missing dates are only
 * checked once there are no duplicates.
 */
export function auditData(input: TabularInput, options: AuditOptions): AuditResult {
  const logger = options.logger ?? getLogger();
  const cols = columnsOf(options);
  requireColumns(input, cols);
  const table = DataTable.from(input);
  const parsed = parseTimeColumn(table.column(cols.timeCol), cols.timeCol);

  logger.info('Running data quality checks', { rows: table.rowCount });

  const duplicates = auditDuplicates(table, cols, parsed.values);
  const results: Array<[AuditCheckId, AuditSeverity, DataTable | null]> = [
    ['D001', duplicates ? 'fail' : 'pass', duplicates ?? null],
  ];
  if (duplicates) {
    results.push(['D002', 'fail', null]);
  } else {
    const missing = table.rowCount > 0 ? auditMissingDates(table, cols, parsed.values, parsed.encoding, options) : undefined;
    results.push(['D002', missing ? 'fail' : 'pass', missing ?? null]);
  }
  const categorical = auditCategorical(table, cols);
  results.push(['F001', categorical ? 'fail' : 'pass', categorical ?? null]);
  const negatives = auditNegatives(table, cols);
  results.push(['V001', negatives ? 'case-specific' : 'pass', negatives ?? null]);
  const leading = auditLeadingZeros(table, cols, parsed.values, parsed.encoding);
  results.push(['V002', leading ? 'case-specific' : 'pass', leading ?? null]);

  const audit: AuditResult = { allPass: true, failures: {}, caseSpecific: {} };
  for (const [check, severity, rows] of results) {
    if (severity === 'fail') {
      audit.allPass = false;
      audit.failures[check] = rows;
      if (rows) logger.warn(`Check ${check} failed`, { check, rows: rows.rowCount });
      else logger.warn(`Check ${check} could not be performed`, { check });
    } else if (severity === 'case-specific' && rows) {
      audit.allPass = false;
      audit.caseSpecific[check] = rows;
      logger.warn(`Check ${check} found issues that may matter for this use case`, { check, rows: rows.rowCount });
    }
  }
  if (audit.allPass) logger.info('All data quality checks passed');
  return audit;
}

// =============================================================================
// Cleaning
// =============================================================================

function numbers(values: readonly CellValue[]): number[] {
  return values.filter((v): v is number => typeof v === 'number' && !Number.isNaN(v));
}

function aggregate(agg: Aggregation, values: readonly CellValue[]): CellValue {
  if (typeof agg === 'function') return agg(values);
  const nums = numbers(values);
  switch (agg) {
    case 'first':
      return values[0];
    case 'last':
      return values[values.length - 1];
    case 'count':
      return values.filter((v) => v !== null && v !== undefined).length;
    case 'sum':
      return nums.reduce((a, b) => a + b, 0);
    case 'mean':
      return nums.length > 0 ? nums.reduce((a, b) => a + b, 0) / nums.length : null;
    case 'min':
      return nums.length > 0 ? Math.min(...nums) : null;
    case 'max':
      return nums.length > 0 ? Math.max(...nums) : null;
    case 'median': {
      if (nums.length === 0) return null;
      const sorted = [...nums].sort((a, b) => a - b);
      const mid = Math.floor(sorted.length / 2);
      return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
    }
  }
}

function mergeDuplicates(table: DataTable, cols: Columns, aggDict: Record<string, Aggregation> | undefined): DataTable {
  if (!aggDict) {
    throw new DataValidationError('invalid-argument', 'aggDict is required to merge duplicate rows (D001)');
  }
  const others = table.columns.filter((c) => c !== cols.idCol && c !== cols.timeCol);
  const uncovered = others.filter((c) => !(c in aggDict));
  if (uncovered.length > 0) {
    throw new DataValidationError(
      'invalid-argument',
      `aggDict has no aggregation for columns: ${uncovered.join(', ')}`,
      { column: uncovered[0] }
    );
  }

  const times = parseTimeColumn(table.column(cols.timeCol), cols.timeCol).values;
  const ids = table.column(cols.idCol);
  const groups = new Map<string, number[]>();
  ids.forEach((id, row) => {
    const key = rowKey(id, times[row]);
    const rows = groups.get(key);
    if (rows) rows.push(row);
    else groups.set(key, [row]);
  });

  const firstRows = [...groups.values()].map((rows) => rows[0]);
  const columns: Record<string, CellValue[]> = {
    [cols.idCol]: firstRows.map((r) => ids[r]),
    [cols.timeCol]: firstRows.map((r) => table.column(cols.timeCol)[r]),
  };
  for (const name of others) {
    const values = table.column(name);
    columns[name] = [...groups.values()].map((rows) => aggregate(aggDict[name], rows.map((r) => values[r])));
  }
  return DataTable.fromColumns(columns).select(table.columns);
}

function appendMissingRows(table: DataTable, missing: DataTable): DataTable {
  const columns: Record<string, CellValue[]> = {};
  for (const name of table.columns) {
    const added = missing.hasColumn(name) ? missing.column(name) : missing.column(missing.columns[0]).map(() => null);
    columns[name] = [...table.column(name), ...added];
  }
  return DataTable.fromColumns(columns);
}

function clipNegatives(table: DataTable, cols: Columns): DataTable {
  const columns: Record<string, readonly CellValue[]> = {};
  for (const name of table.columns) {
    columns[name] =
      name === cols.targetCol ? table.column(name).map((v) => (typeof v === 'number' && v < 0 ? 0 : v)) : table.column(name);
  }
  return DataTable.fromColumns(columns);
}

function dropLeadingZeros(table: DataTable, cols: Columns, leading: DataTable): DataTable {
  const firstNonzero = new Map<CellValue, number>();
  const starts = parseTimeColumn(leading.column('first_nonzero_time'), 'first_nonzero_time').values;
  leading.column(cols.idCol).forEach((id, i) => firstNonzero.set(id, starts[i]));
  const times = parseTimeColumn(table.column(cols.timeCol), cols.timeCol).values;
  const ids = table.column(cols.idCol);
  const keep = ids.flatMap((id, row) => {
    const start = firstNonzero.get(id);
    return start === undefined || times[row] >= start ? [row] : [];
  });
  return pickRows(table, keep);
}

/**
 * Fix what an audit found, then audit again. Case-specific findings are
 * only fixed with `cleanCaseSpecific`.
 */
export function cleanData(input: TabularInput, audit: AuditResult, options: CleanOptions): CleanResult {
  const logger = options.logger ?? getLogger();
  const cols = columnsOf(options);
  requireColumns(input, cols);
  let table = DataTable.from(input);

  logger.info('Running data cleaning');
  if ('D001' in audit.failures) {
    logger.info('Merging duplicate rows (D001)');
    table = mergeDuplicates(table, cols, options.aggDict);
  }
  if ('D002' in audit.failures) {
    const missing = audit.failures.D002;
    if (missing) {
      logger.info('Adding missing timestamps (D002)', { rows: missing.rowCount });
      table = appendMissingRows(table, missing);
    } else {
      logger.warn('Missing dates could not be checked; not filling them (D002)');
    }
  }
  if (options.cleanCaseSpecific) {
    if (audit.caseSpecific.V001) {
      logger.info('Setting negative values to zero (V001)');
      table = clipNegatives(table, cols);
    }
    const leading = audit.caseSpecific.V002;
    if (leading) {
      logger.info('Dropping leading zeros (V002)');
      table = dropLeadingZeros(table, cols, leading);
    }
  }

  return { data: table, audit: auditData(table, options) };
}
