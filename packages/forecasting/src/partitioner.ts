/**
 * Partitioner
 *
 * Greedy packing of whole series into request batches bounded by series
 * count and encoded bytes. Batches keep the dataset's series order.
 */

import { Buffer } from 'node:buffer';
import { DataValidationError, PayloadTooLargeError } from './errors.js';
import type { NormalizedDataset, NormalizedSeries } from './normalizer.js';

export interface PartitionLimits {
  maxSeriesPerBatch: number;
  maxBatchBytes: number;
}

export interface PartitionOptions {
  /** Split into at least this many batches where the series count allows */
  numPartitions?: number;
  /** Encoded size of everything in the request body except the series */
  envelopeBytes?: number;
}

export interface RequestBatch {
  index: number;
  /** Position of the batch's first series in the dataset */
  seriesOffset: number;
  series: NormalizedSeries[];
  /** Upper bound on the encoded request body */
  encodedBytes: number;
}

/**
 * The `series` object of a request body. Exogenous matrices are
 * feature-major: `X[f]` holds feature `f` for every row of every series.
 */
export interface SeriesPayload {
  y: number[];
  sizes: number[];
  X: number[][] | null;
  X_future?: number[][] | null;
}

/**
 * Bytes one series adds to a request body. Encoding each series on its own
 * repeats brackets the merged arrays share, so the sum over a batch bounds
 * the real size from above.
 */
export function encodedSeriesBytes(series: NormalizedSeries): number {
  return Buffer.byteLength(
    JSON.stringify([series.y, series.exog, series.futureExog, series.y.length]),
    'utf8'
  );
}

/**
 * Bytes of a request body without its series data
 */
export function envelopeBytes(params: Record<string, unknown>): number {
  return Buffer.byteLength(
    JSON.stringify({ ...params, series: { y: [], sizes: [], X: null, X_future: null } }),
    'utf8'
  );
}

/**
 * Split a dataset into request batches
 *
 * @throws PayloadTooLargeError when one series alone exceeds the byte limit
 */
export function partition(
  dataset: NormalizedDataset,
  limits: PartitionLimits,
  options: PartitionOptions = {}
): RequestBatch[] {
  const { maxBatchBytes } = limits;
  const envelope = options.envelopeBytes ?? 0;
  const total = dataset.series.length;

  let maxSeries = limits.maxSeriesPerBatch;
  if (options.numPartitions !== undefined) {
    if (!Number.isInteger(options.numPartitions) || options.numPartitions < 1) {
      throw new DataValidationError(
        'invalid-argument',
        `numPartitions must be a positive integer, got ${options.numPartitions}`
      );
    }
    maxSeries = Math.min(maxSeries, Math.max(1, Math.ceil(total / options.numPartitions)));
  }

  const batches: RequestBatch[] = [];
  let current: NormalizedSeries[] = [];
  let currentBytes = envelope;
  let offset = 0;

  const flush = (): void => {
    if (current.length === 0) return;
    batches.push({
      index: batches.length,
      seriesOffset: offset,
      series: current,
      encodedBytes: currentBytes,
    });
    offset += current.length;
    current = [];
    currentBytes = envelope;
  };

  for (const series of dataset.series) {
    const bytes = encodedSeriesBytes(series);
    if (envelope + bytes > maxBatchBytes) {
      throw new PayloadTooLargeError(series.id, envelope + bytes, maxBatchBytes);
    }
    if (current.length >= maxSeries || currentBytes + bytes > maxBatchBytes) {
      flush();
    }
    current.push(series);
    currentBytes += bytes;
  }
  flush();

  return batches;
}

/**
 * Build the wire `series` object for a batch
 */
export function seriesPayload(batch: RequestBatch, withFuture: boolean): SeriesPayload {
  const first = batch.series[0];
  const nExog = first ? first.exog.length : 0;
  const nFuture = first ? first.futureExog.length : 0;

  const y: number[] = [];
  const sizes: number[] = [];
  const X: number[][] = Array.from({ length: nExog }, () => []);
  const future: number[][] = Array.from({ length: nFuture }, () => []);

  for (const s of batch.series) {
    for (const v of s.y) y.push(v);
    sizes.push(s.y.length);
    s.exog.forEach((col, f) => {
      for (const v of col) X[f].push(v);
    });
    s.futureExog.forEach((col, f) => {
      for (const v of col) future[f].push(v);
    });
  }

  const payload: SeriesPayload = { y, sizes, X: nExog > 0 ? X : null };
  if (withFuture) payload.X_future = nFuture > 0 ? future : null;
  return payload;
}
