/**
 * Partitioner Tests
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from '@nowcast/core';
import { normalize, type NormalizedDataset } from '../normalizer.js';
import { encodedSeriesBytes, envelopeBytes, partition, seriesPayload } from '../partitioner.js';
import { PayloadTooLargeError } from '../errors.js';
import { DataTable, type Row } from '../tabular.js';

const logger = createLogger('partitioner-test', { minSeverity: 'CRITICAL', prettyPrint: false });

function dataset(ids: string[], length = 3, withExog = false): NormalizedDataset {
  const records: Row[] = [];
  ids.forEach((id, s) => {
    for (let t = 0; t < length; t++) {
      const row: Row = { unique_id: id, ds: t + 1, y: s * 10 + t };
      if (withExog) row.x = s + t / 10;
      records.push(row);
    }
  });
  return normalize(DataTable.fromRecords(records), { freq: 1, logger });
}

const generous = { maxSeriesPerBatch: 1000, maxBatchBytes: 1024 * 1024 };

describe('partition', () => {
  it('puts a small input in one batch', () => {
    const batches = partition(dataset(['a', 'b', 'c']), generous);
    expect(batches).toHaveLength(1);
    expect(batches[0].series.map((s) => s.id)).toEqual(['a', 'b', 'c']);
  });

  it('caps batches by series count and keeps series order', () => {
    const batches = partition(dataset(['a', 'b', 'c', 'd', 'e']), { ...generous, maxSeriesPerBatch: 2 });

    expect(batches.map((b) => b.series.length)).toEqual([2, 2, 1]);
    expect(batches.map((b) => b.index)).toEqual([0, 1, 2]);
    expect(batches.map((b) => b.seriesOffset)).toEqual([0, 2, 4]);
    expect(batches.flatMap((b) => b.series.map((s) => s.id))).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('splits into at least numPartitions batches', () => {
    const batches = partition(dataset(['a', 'b', 'c', 'd', 'e']), generous, { numPartitions: 3 });
    expect(batches.map((b) => b.series.length)).toEqual([2, 2, 1]);
  });

  it('caps batches by encoded bytes including the envelope', () => {
    const data = dataset(['a', 'b', 'c']);
    const firstTwo = encodedSeriesBytes(data.series[0]) + encodedSeriesBytes(data.series[1]);
    const batches = partition(data, { maxSeriesPerBatch: 1000, maxBatchBytes: 100 + firstTwo }, { envelopeBytes: 100 });

    expect(batches.map((b) => b.series.length)).toEqual([2, 1]);
    expect(batches[0].encodedBytes).toBe(100 + firstTwo);
  });

  it('is deterministic', () => {
    const data = dataset(['a', 'b', 'c', 'd']);
    const limits = { ...generous, maxSeriesPerBatch: 3 };
    expect(partition(data, limits)).toEqual(partition(data, limits));
  });

  it('fails when one series alone is too large', () => {
    const data = dataset(['big'], 50);
    expect(() => partition(data, { maxSeriesPerBatch: 10, maxBatchBytes: 64 })).toThrow(PayloadTooLargeError);
  });

  it('rejects a non-positive partition count', () => {
    expect(() => partition(dataset(['a']), generous, { numPartitions: 0 })).toThrow(/numPartitions/);
  });
});

describe('envelopeBytes', () => {
  it('measures the body around empty series data', () => {
    expect(envelopeBytes({ h: 1 })).toBe(
      JSON.stringify({ h: 1, series: { y: [], sizes: [], X: null, X_future: null } }).length
    );
  });
});

describe('seriesPayload', () => {
  it('concatenates targets and builds feature-major matrices', () => {
    const [batch] = partition(dataset(['a', 'b'], 2, true), generous);
    const payload = seriesPayload(batch, true);

    expect(payload.y).toEqual([0, 1, 10, 11]);
    expect(payload.sizes).toEqual([2, 2]);
    expect(payload.X).toEqual([[0, 0.1, 1, 1.1]]);
    expect(payload.X_future).toBeNull();
  });

  it('sends null matrices without exogenous features', () => {
    const [batch] = partition(dataset(['a']), generous);
    const payload = seriesPayload(batch, false);
    expect(payload.X).toBeNull();
    expect('X_future' in payload).toBe(false);
  });
});
