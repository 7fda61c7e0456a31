/**
 * Time values
 *
 * Timestamps are held internally as numbers: epoch milliseconds (UTC) for
 * datetime columns, the raw value for integer columns. The encoding of the
 * input column is remembered so results come back in the same form.
 */

import { DataValidationError } from './errors.js';
import type { CellValue } from './tabular.js';

export type TimeKind = 'datetime' | 'integer';

/**
 * How the caller wrote the time column
 * - `date`: `YYYY-MM-DD` strings
 * - `iso`: other ISO-8601 strings
 * - `date-object`: `Date` instances
 * - `integer`: integer steps
 */
export type TimeEncoding = 'date' | 'iso' | 'date-object' | 'integer';

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse an ISO-8601 string as UTC. Strings without a zone designator are
 * read as UTC rather than local time.
 */
export function parseIsoTimestamp(value: string): number | undefined {
  const trimmed = value.trim().replace(' ', 'T');
  let normalized: string;
  if (DATE_ONLY.test(trimmed)) {
    normalized = `${trimmed}T00:00:00Z`;
  } else if (HAS_ZONE.test(trimmed)) {
    normalized = trimmed;
  } else {
    normalized = `${trimmed}Z`;
  }
  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? undefined : ms;
}

export interface ParsedTimeColumn {
  kind: TimeKind;
  encoding: TimeEncoding;
  values: number[];
}

/**
 * Parse a whole time column, detecting its kind and encoding
 */
export function parseTimeColumn(values: readonly CellValue[], column: string): ParsedTimeColumn {
  if (values.length === 0) {
    return { kind: 'datetime', encoding: 'iso', values: [] };
  }

  const first = values[0];
  if (typeof first === 'number') {
    const parsed = values.map((v, row) => {
      if (typeof v !== 'number' || !Number.isInteger(v)) {
        throw new DataValidationError(
          'invalid-time',
          `Time column "${column}" mixes integer steps with other values (row ${row})`,
          { column, row }
        );
      }
      return v;
    });
    return { kind: 'integer', encoding: 'integer', values: parsed };
  }

  let encoding: TimeEncoding = first instanceof Date ? 'date-object' : 'date';
  const parsed = values.map((v, row) => {
    let ms: number | undefined;
    if (v instanceof Date) {
      if (encoding !== 'date-object') ms = undefined;
      else ms = Number.isNaN(v.getTime()) ? undefined : v.getTime();
    } else if (typeof v === 'string' && encoding !== 'date-object') {
      if (!DATE_ONLY.test(v.trim())) encoding = 'iso';
      ms = parseIsoTimestamp(v);
    }
    if (ms === undefined) {
      throw new DataValidationError(
        'invalid-time',
        `Time column "${column}" has an unparseable timestamp ${JSON.stringify(v)} at row ${row}`,
        { column, row }
      );
    }
    return ms;
  });

  return { kind: 'datetime', encoding, values: parsed };
}

/**
 * Render an internal timestamp in the caller's encoding
 */
export function formatTime(value: number, encoding: TimeEncoding): string | number | Date {
  switch (encoding) {
    case 'integer':
      return value;
    case 'date-object':
      return new Date(value);
    case 'date': {
      const iso = new Date(value).toISOString();
      return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
    }
    case 'iso':
      return new Date(value).toISOString();
  }
}

/**
 * Render a timestamp for messages and error details
 */
export function describeTime(value: number, kind: TimeKind): string | number {
  if (kind === 'integer') return value;
  const iso = new Date(value).toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}
