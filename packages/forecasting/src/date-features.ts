/**
 * Date Features
 *
 * Calendar attributes computed from the time column and appended to the
 * request as future exogenous features.
 */

import type { Logger } from '@nowcast/core';
import { DataValidationError } from './errors.js';
import { baseAlias, type Frequency } from './frequency.js';
import { MS_PER_DAY } from './time.js';

export const BUILTIN_DATE_FEATURES = [
  'year',
  'month',
  'day',
  'hour',
  'minute',
  'second',
  'millisecond',
  'weekday',
  'week',
  'quarter',
  'dayofyear',
] as const;

export type BuiltinDateFeature = (typeof BUILTIN_DATE_FEATURES)[number];

/**
 * User-supplied feature generator: one numeric array per named column, each
 * as long as `timestamps`. Called once, synchronously, with history and
 * future timestamps together.
 */
export type DateFeatureFn = (timestamps: readonly Date[]) => Record<string, number[]>;

export type DateFeatureSpec = BuiltinDateFeature | DateFeatureFn;

export interface DateFeatureOptions {
  /** `true` picks the defaults for the frequency */
  features: boolean | readonly DateFeatureSpec[];
  /** `true` one-hot encodes every built-in feature requested */
  oneHot: boolean | readonly string[];
}

const DEFAULTS_BY_FREQUENCY: Record<string, BuiltinDateFeature[]> = {
  B: ['year', 'month', 'day', 'weekday'],
  D: ['year', 'month', 'day', 'weekday'],
  W: ['year', 'week', 'weekday'],
  MS: ['year', 'month'],
  ME: ['year', 'month'],
  QS: ['year', 'quarter'],
  QE: ['year', 'quarter'],
  YS: ['year'],
  YE: ['year'],
  H: ['year', 'month', 'day', 'hour'],
  min: ['year', 'month', 'day', 'hour', 'minute'],
  S: ['year', 'month', 'day', 'hour', 'minute', 'second'],
  ms: ['year', 'month', 'day', 'hour', 'minute', 'second', 'millisecond'],
};

export function isBuiltinDateFeature(value: string): value is BuiltinDateFeature {
  return BUILTIN_DATE_FEATURES.some((f) => f === value);
}

export function defaultDateFeatures(freq: Frequency): BuiltinDateFeature[] {
  return DEFAULTS_BY_FREQUENCY[baseAlias(freq)] ?? [];
}

function isoWeek(d: Date): number {
  const target = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
  const weekday = (d.getUTCDay() + 6) % 7;
  const thursday = target - weekday * MS_PER_DAY + 3 * MS_PER_DAY;
  const yearStart = Date.UTC(new Date(thursday).getUTCFullYear(), 0, 1);
  return 1 + Math.floor((thursday - yearStart) / (7 * MS_PER_DAY));
}

/**
 * Value of a built-in feature. `weekday` counts Monday as 0.
 */
export function builtinDateFeature(name: BuiltinDateFeature, d: Date): number {
  switch (name) {
    case 'year':
      return d.getUTCFullYear();
    case 'month':
      return d.getUTCMonth() + 1;
    case 'day':
      return d.getUTCDate();
    case 'hour':
      return d.getUTCHours();
    case 'minute':
      return d.getUTCMinutes();
    case 'second':
      return d.getUTCSeconds();
    case 'millisecond':
      return d.getUTCMilliseconds();
    case 'weekday':
      return (d.getUTCDay() + 6) % 7;
    case 'week':
      return isoWeek(d);
    case 'quarter':
      return Math.floor(d.getUTCMonth() / 3) + 1;
    case 'dayofyear':
      return Math.round((Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()) - Date.UTC(d.getUTCFullYear(), 0, 1)) / MS_PER_DAY) + 1;
  }
}

/**
 * Indicator columns for caller-defined special dates, keyed by category.
 * A timestamp scores 1 when its UTC calendar day is listed.
 *
 * @example
 * specialDates({ black_friday: ['2023-11-24', '2024-11-29'] })
 */
export function specialDates(categories: Record<string, ReadonlyArray<string | Date>>): DateFeatureFn {
  const days = new Map<string, Set<string>>();
  for (const [category, dates] of Object.entries(categories)) {
    days.set(
      category,
      new Set(dates.map((d) => (typeof d === 'string' ? d.slice(0, 10) : d.toISOString().slice(0, 10))))
    );
  }
  return (timestamps) => {
    const out: Record<string, number[]> = {};
    for (const [category, set] of days) {
      out[category] = timestamps.map((t) => (set.has(t.toISOString().slice(0, 10)) ? 1 : 0));
    }
    return out;
  };
}

export interface DateFeatureColumns {
  names: string[];
  history: Map<string, number[]>;
  future: Map<string, number[]>;
}

/**
 * Compute the requested features for history rows and future rows.
 * Returns empty columns when no features are requested.
 */
export function computeDateFeatures(
  historyTimes: readonly number[],
  futureTimes: readonly number[],
  freq: Frequency,
  options: DateFeatureOptions,
  logger?: Logger
): DateFeatureColumns {
  const empty: DateFeatureColumns = { names: [], history: new Map(), future: new Map() };
  if (options.features === false || freq.kind === 'integer') return empty;

  let specs: readonly DateFeatureSpec[];
  if (options.features === true) {
    specs = defaultDateFeatures(freq);
    if (specs.length === 0) {
      logger?.warn('No default date features for this frequency; pass a list of features', {
        freq: freq.alias,
      });
      return empty;
    }
  } else {
    specs = options.features;
  }
  if (specs.length === 0) return empty;

  const dates = [...historyTimes, ...futureTimes].map((t) => new Date(t));
  const columns = new Map<string, number[]>();
  const builtinNames: string[] = [];

  for (const spec of specs) {
    if (typeof spec === 'string') {
      if (!isBuiltinDateFeature(spec)) {
        throw new DataValidationError('invalid-argument', `Unknown date feature "${spec}"`);
      }
      columns.set(spec, dates.map((d) => builtinDateFeature(spec, d)));
      builtinNames.push(spec);
      continue;
    }
    const generated = spec(dates);
    for (const [name, values] of Object.entries(generated)) {
      if (values.length !== dates.length || values.some((v) => !Number.isFinite(v))) {
        throw new DataValidationError(
          'exogenous',
          `Date feature "${name}" must return ${dates.length} finite numbers`,
          { column: name }
        );
      }
      columns.set(name, values);
    }
  }

  let oneHot: readonly string[];
  if (options.oneHot === true) oneHot = builtinNames;
  else if (options.oneHot === false) oneHot = [];
  else oneHot = options.oneHot;

  for (const name of oneHot) {
    if (!columns.has(name)) {
      throw new DataValidationError(
        'invalid-argument',
        `Cannot one-hot encode "${name}": it is not among the requested date features`,
        { column: name }
      );
    }
  }

  const encoded = new Map<string, number[]>();
  for (const [name, values] of columns) {
    if (!oneHot.includes(name)) encoded.set(name, values);
  }
  for (const name of oneHot) {
    const values = columns.get(name) ?? [];
    const levels = [...new Set(values)].sort((a, b) => a - b);
    for (const level of levels) {
      encoded.set(`${name}_${level}`, values.map((v) => (v === level ? 1 : 0)));
    }
  }

  const history = new Map<string, number[]>();
  const future = new Map<string, number[]>();
  for (const [name, values] of encoded) {
    history.set(name, values.slice(0, historyTimes.length));
    future.set(name, values.slice(historyTimes.length));
  }
  return { names: [...encoded.keys()], history, future };
}
