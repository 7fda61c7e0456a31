/**
 * Frequencies
 *
 * Parsing of offset aliases, stepping along a frequency grid, grid validation
 * and inference of the dataset frequency from observed spacing.
 */

import { DataValidationError, FrequencyInferenceError } from './errors.js';
import {
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  describeTime,
  type TimeKind,
} from './time.js';

// =============================================================================
// Types
// =============================================================================

export type FixedUnit = 'ms' | 'S' | 'min' | 'H' | 'D' | 'W';
export type CalendarUnit = 'month' | 'quarter' | 'year';

export type Frequency =
  | { kind: 'fixed'; alias: string; unit: FixedUnit; n: number; stepMs: number }
  | { kind: 'business-day'; alias: string; n: number }
  | {
      kind: 'calendar';
      alias: string;
      unit: CalendarUnit;
      anchor: 'start' | 'end';
      n: number;
    }
  | { kind: 'integer'; alias: string; step: number };

/** What callers may pass as `freq` */
export type FrequencyInput = string | number;

const FIXED_UNIT_MS: Record<FixedUnit, number> = {
  ms: 1,
  S: MS_PER_SECOND,
  min: MS_PER_MINUTE,
  H: MS_PER_HOUR,
  D: MS_PER_DAY,
  W: 7 * MS_PER_DAY,
};

const MONTHS_PER_UNIT: Record<CalendarUnit, number> = {
  month: 1,
  quarter: 3,
  year: 12,
};

const CALENDAR_ALIASES: Record<string, { unit: CalendarUnit; anchor: 'start' | 'end'; canonical: string }> = {
  MS: { unit: 'month', anchor: 'start', canonical: 'MS' },
  M: { unit: 'month', anchor: 'end', canonical: 'ME' },
  ME: { unit: 'month', anchor: 'end', canonical: 'ME' },
  QS: { unit: 'quarter', anchor: 'start', canonical: 'QS' },
  Q: { unit: 'quarter', anchor: 'end', canonical: 'QE' },
  QE: { unit: 'quarter', anchor: 'end', canonical: 'QE' },
  YS: { unit: 'year', anchor: 'start', canonical: 'YS' },
  AS: { unit: 'year', anchor: 'start', canonical: 'YS' },
  Y: { unit: 'year', anchor: 'end', canonical: 'YE' },
  A: { unit: 'year', anchor: 'end', canonical: 'YE' },
  YE: { unit: 'year', anchor: 'end', canonical: 'YE' },
};

const FIXED_ALIASES: Record<string, FixedUnit> = {
  ms: 'ms',
  L: 'ms',
  S: 'S',
  s: 'S',
  min: 'min',
  T: 'min',
  H: 'H',
  h: 'H',
  D: 'D',
  W: 'W',
  'W-SUN': 'W',
};

const ALIAS_PATTERN = /^(\d+)?([A-Za-z-]+)$/;

// =============================================================================
// Parsing
// =============================================================================

function withMultiple(n: number, base: string): string {
  return n === 1 ? base : `${n}${base}`;
}

export function fixedFrequency(unit: FixedUnit, n = 1): Frequency {
  return {
    kind: 'fixed',
    alias: withMultiple(n, unit),
    unit,
    n,
    stepMs: n * FIXED_UNIT_MS[unit],
  };
}

/**
 * Parse a frequency alias (`D`, `15min`, `MS`, ...) or an integer step
 */
export function parseFrequency(input: FrequencyInput): Frequency {
  if (typeof input === 'number') {
    if (!Number.isInteger(input) || input <= 0) {
      throw new DataValidationError(
        'invalid-argument',
        `Integer frequency must be a positive integer, got ${input}`
      );
    }
    return { kind: 'integer', alias: String(input), step: input };
  }

  const match = ALIAS_PATTERN.exec(input.trim());
  if (!match) {
    throw new DataValidationError('invalid-argument', `Unknown frequency "${input}"`);
  }
  const n = match[1] === undefined ? 1 : Number(match[1]);
  const base = match[2];
  if (n <= 0) {
    throw new DataValidationError('invalid-argument', `Frequency multiple must be positive in "${input}"`);
  }

  const fixed = FIXED_ALIASES[base];
  if (fixed !== undefined) {
    return fixedFrequency(fixed, n);
  }
  if (base === 'B') {
    return { kind: 'business-day', alias: withMultiple(n, 'B'), n };
  }
  const calendar = CALENDAR_ALIASES[base];
  if (calendar !== undefined) {
    return {
      kind: 'calendar',
      alias: withMultiple(n, calendar.canonical),
      unit: calendar.unit,
      anchor: calendar.anchor,
      n,
    };
  }

  throw new DataValidationError('invalid-argument', `Unknown frequency "${input}"`);
}

/**
 * The frequency string sent to the service. Integer time columns are
 * described to the service as month-start data.
 */
export function serviceFrequency(freq: Frequency): string {
  return freq.kind === 'integer' ? 'MS' : freq.alias;
}

/**
 * Alias without its multiple, used to look up default date features
 */
export function baseAlias(freq: Frequency): string {
  switch (freq.kind) {
    case 'fixed':
      return freq.unit;
    case 'business-day':
      return 'B';
    case 'calendar':
      return freq.alias.replace(/^\d+/, '');
    case 'integer':
      return '';
  }
}

// =============================================================================
// Stepping
// =============================================================================

function isWeekend(ms: number): boolean {
  const day = new Date(ms).getUTCDay();
  return day === 0 || day === 6;
}

function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

function addMonths(ms: number, months: number, anchor: 'start' | 'end'): number {
  const d = new Date(ms);
  const y = d.getUTCFullYear();
  const m = d.getUTCMonth() + months;
  const day = anchor === 'start' ? 1 : lastDayOfMonth(y, m);
  return Date.UTC(
    y,
    m,
    day,
    d.getUTCHours(),
    d.getUTCMinutes(),
    d.getUTCSeconds(),
    d.getUTCMilliseconds()
  );
}

function addBusinessDays(ms: number, days: number): number {
  let current = ms;
  let remaining = days;
  while (remaining > 0) {
    current += MS_PER_DAY;
    if (!isWeekend(current)) remaining--;
  }
  return current;
}

/**
 * Move `k` steps forward along the frequency grid
 */
export function addSteps(value: number, freq: Frequency, k: number): number {
  switch (freq.kind) {
    case 'fixed':
      return value + k * freq.stepMs;
    case 'integer':
      return value + k * freq.step;
    case 'business-day':
      return addBusinessDays(value, k * freq.n);
    case 'calendar':
      return addMonths(value, k * freq.n * MONTHS_PER_UNIT[freq.unit], freq.anchor);
  }
}

/**
 * The `count` grid points following `last`
 */
export function futureTimes(last: number, freq: Frequency, count: number): number[] {
  const out: number[] = [];
  let current = last;
  for (let i = 0; i < count; i++) {
    current = addSteps(current, freq, 1);
    out.push(current);
  }
  return out;
}

/**
 * Whether a timestamp sits on the anchor points a calendar or business-day
 * frequency allows. Fixed and integer grids are anchored at each series'
 * first timestamp, so every point qualifies here.
 */
export function isAnchored(value: number, freq: Frequency): boolean {
  if (freq.kind === 'business-day') return !isWeekend(value);
  if (freq.kind !== 'calendar') return true;

  const d = new Date(value);
  const month = d.getUTCMonth();
  const monthsPerUnit = MONTHS_PER_UNIT[freq.unit];
  if (freq.anchor === 'start') {
    return d.getUTCDate() === 1 && month % monthsPerUnit === 0;
  }
  return (
    d.getUTCDate() === lastDayOfMonth(d.getUTCFullYear(), month) &&
    month % monthsPerUnit === monthsPerUnit - 1
  );
}

// =============================================================================
// Grid validation
// =============================================================================

const MAX_GRID_POINTS = 10_000_000;

/**
 * Check that sorted `times` form a complete grid at `freq`. Duplicates,
 * off-grid points and missing grid points each raise a distinct
 * `DataValidationError`.
 */
export function validateGrid(
  times: readonly number[],
  freq: Frequency,
  kind: TimeKind,
  seriesId: string | number
): void {
  for (let i = 1; i < times.length; i++) {
    if (times[i] === times[i - 1]) {
      throw new DataValidationError(
        'duplicate',
        `Series ${JSON.stringify(seriesId)} has duplicate timestamp ${describeTime(times[i], kind)}`,
        { seriesId, timestamps: [describeTime(times[i], kind)] }
      );
    }
  }
  if (times.length === 0) return;

  if (!isAnchored(times[0], freq)) {
    throw new DataValidationError(
      'frequency-mismatch',
      `Series ${JSON.stringify(seriesId)} starts at ${describeTime(times[0], kind)}, ` +
        `which is not on the ${freq.alias} grid`,
      { seriesId, timestamps: [describeTime(times[0], kind)] }
    );
  }

  const missing: number[] = [];
  let expected = times[0];
  let generated = 0;
  for (let i = 1; i < times.length; i++) {
    expected = addSteps(expected, freq, 1);
    while (expected < times[i]) {
      missing.push(expected);
      expected = addSteps(expected, freq, 1);
      if (++generated > MAX_GRID_POINTS) {
        throw new DataValidationError(
          'frequency-mismatch',
          `Series ${JSON.stringify(seriesId)} spans too many ${freq.alias} steps`,
          { seriesId }
        );
      }
    }
    if (expected !== times[i]) {
      throw new DataValidationError(
        'frequency-mismatch',
        `Series ${JSON.stringify(seriesId)} has timestamp ${describeTime(times[i], kind)} ` +
          `that does not match frequency ${freq.alias}`,
        { seriesId, timestamps: [describeTime(times[i], kind)] }
      );
    }
  }

  if (missing.length > 0) {
    const rendered = missing.map((t) => describeTime(t, kind));
    const preview = rendered.slice(0, 5).join(', ');
    const more = rendered.length > 5 ? ` and ${rendered.length - 5} more` : '';
    throw new DataValidationError(
      'gap',
      `Series ${JSON.stringify(seriesId)} is missing timestamps ${preview}${more}. ` +
        'Fill the gaps explicitly (see cleanData) before calling the service.',
      { seriesId, timestamps: rendered }
    );
  }
}

// =============================================================================
// Inference
// =============================================================================

function modalDiff(times: readonly number[]): number {
  const counts = new Map<number, number>();
  for (let i = 1; i < times.length; i++) {
    const diff = times[i] - times[i - 1];
    counts.set(diff, (counts.get(diff) ?? 0) + 1);
  }
  let best = 0;
  let bestCount = 0;
  for (const [diff, count] of counts) {
    if (count > bestCount || (count === bestCount && diff < best)) {
      best = diff;
      bestCount = count;
    }
  }
  return best;
}

const CANONICAL_CALENDAR: Record<CalendarUnit, { start: string; end: string }> = {
  month: { start: 'MS', end: 'ME' },
  quarter: { start: 'QS', end: 'QE' },
  year: { start: 'YS', end: 'YE' },
};

function calendarCandidate(times: readonly number[], unit: CalendarUnit): Frequency | undefined {
  for (const anchor of ['start', 'end'] as const) {
    const candidate: Frequency = {
      kind: 'calendar',
      alias: CANONICAL_CALENDAR[unit][anchor],
      unit,
      anchor,
      n: 1,
    };
    if (times.every((t) => isAnchored(t, candidate))) return candidate;
  }
  return undefined;
}

/** Fewest distinct timestamps a series needs before its spacing counts */
const MIN_INFERENCE_POINTS = 3;

/**
 * Frequency suggested by one series' spacing, or undefined when the series
 * has fewer than three distinct timestamps. A single interval says nothing
 * about whether points are missing.
 */
export function inferSeriesFrequency(times: readonly number[], kind: TimeKind): Frequency | undefined {
  const sorted = [...new Set(times)].sort((a, b) => a - b);
  if (sorted.length < MIN_INFERENCE_POINTS) return undefined;
  const diff = modalDiff(sorted);
  if (diff <= 0) return undefined;

  if (kind === 'integer') {
    return { kind: 'integer', alias: String(diff), step: diff };
  }

  if (diff % MS_PER_DAY === 0) {
    const days = diff / MS_PER_DAY;
    if (days >= 28 && days <= 31) {
      const monthly = calendarCandidate(sorted, 'month');
      if (monthly) return monthly;
    }
    if (days >= 89 && days <= 92) {
      const quarterly = calendarCandidate(sorted, 'quarter');
      if (quarterly) return quarterly;
    }
    if (days === 365 || days === 366) {
      const yearly = calendarCandidate(sorted, 'year');
      if (yearly) return yearly;
    }
    if (days === 1 && !sorted.some(isWeekend)) {
      const hasWeekendJump = sorted.some(
        (t, i) => i > 0 && t - sorted[i - 1] === 3 * MS_PER_DAY
      );
      if (hasWeekendJump) return { kind: 'business-day', alias: 'B', n: 1 };
    }
    if (days % 7 === 0) return fixedFrequency('W', days / 7);
    return fixedFrequency('D', days);
  }

  const units: FixedUnit[] = ['H', 'min', 'S'];
  for (const unit of units) {
    if (diff % FIXED_UNIT_MS[unit] === 0) {
      return fixedFrequency(unit, diff / FIXED_UNIT_MS[unit]);
    }
  }
  return fixedFrequency('ms', diff);
}

/**
 * Infer the dataset frequency: the alias suggested by a strict majority of
 * the series that have at least three timestamps.
 */
export function inferFrequency(seriesTimes: ReadonlyArray<readonly number[]>, kind: TimeKind): Frequency {
  const votes = new Map<string, { freq: Frequency; count: number }>();
  let eligible = 0;
  for (const times of seriesTimes) {
    const freq = inferSeriesFrequency(times, kind);
    if (!freq) continue;
    eligible++;
    const entry = votes.get(freq.alias);
    if (entry) entry.count++;
    else votes.set(freq.alias, { freq, count: 1 });
  }

  if (eligible === 0) {
    throw new FrequencyInferenceError(
      'Could not infer the frequency: no series has three or more distinct timestamps. Pass `freq` explicitly.'
    );
  }

  let winner: { freq: Frequency; count: number } | undefined;
  for (const entry of votes.values()) {
    if (!winner || entry.count > winner.count) winner = entry;
  }
  if (!winner || winner.count * 2 <= eligible) {
    throw new FrequencyInferenceError(
      'Could not infer the frequency: series disagree on their spacing. ' +
        'Check for irregular timestamps or pass `freq` explicitly.',
      { candidates: Object.fromEntries([...votes].map(([alias, v]) => [alias, v.count])) }
    );
  }
  return winner.freq;
}
