/**
 * Data Audit Tests
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from '@nowcast/core';
import { auditData, cleanData } from '../audit.js';
import { DataTable } from '../tabular.js';

const logger = createLogger('audit-test', { minSeverity: 'CRITICAL', prettyPrint: false });

const messy = DataTable.fromRecords([
  { unique_id: 'a', ds: '2024-01-01', y: 0 },
  { unique_id: 'a', ds: '2024-01-02', y: 0 },
  { unique_id: 'a', ds: '2024-01-03', y: 5 },
  { unique_id: 'a', ds: '2024-01-04', y: -1 },
  { unique_id: 'b', ds: '2024-01-02', y: 3 },
  { unique_id: 'b', ds: '2024-01-03', y: 4 },
]);

describe('auditData', () => {
  it('reports missing dates and case-specific findings', () => {
    const audit = auditData(messy, { freq: 'D', logger });

    expect(audit.allPass).toBe(false);
    expect(Object.keys(audit.failures)).toEqual(['D002']);
    expect(audit.failures.D002?.toRecords()).toEqual([{ unique_id: 'b', ds: '2024-01-04' }]);
    expect(audit.caseSpecific.V001?.toRecords()).toEqual([{ unique_id: 'a', ds: '2024-01-04', y: -1 }]);
    expect(audit.caseSpecific.V002?.toRecords()).toEqual([
      { unique_id: 'a', first_time: '2024-01-01', first_nonzero_time: '2024-01-03', leading_zeros: 2 },
    ]);
  });

  it('measures the grid from explicit bounds', () => {
    const table = DataTable.fromRecords([
      { unique_id: 'a', ds: '2024-01-02', y: 1 },
      { unique_id: 'a', ds: '2024-01-03', y: 1 },
    ]);

    const audit = auditData(table, { freq: 'D', start: '2024-01-01', end: 'per-series', logger });

    expect(audit.failures.D002?.toRecords()).toEqual([{ unique_id: 'a', ds: '2024-01-01' }]);
  });

  it('skips the missing-dates check when rows are duplicated', () => {
    const table = DataTable.fromRecords([
      { unique_id: 'a', ds: '2024-01-01', y: 1 },
      { unique_id: 'a', ds: '2024-01-01', y: 3 },
      { unique_id: 'a', ds: '2024-01-02', y: 2 },
    ]);

    const audit = auditData(table, { freq: 'D', logger });

    expect(audit.failures.D001?.rowCount).toBe(2);
    expect(audit.failures.D002).toBeNull();
  });

  it('flags categorical columns', () => {
    const table = DataTable.fromRecords([
      { unique_id: 'a', ds: '2024-01-01', y: 1, store: 'north' },
      { unique_id: 'a', ds: '2024-01-02', y: 2, store: 'north' },
    ]);

    const audit = auditData(table, { freq: 'D', logger });

    expect(audit.failures.F001?.columns).toEqual(['store']);
  });

  it('passes clean data', () => {
    const table = DataTable.fromRecords([
      { unique_id: 'a', ds: '2024-01-01', y: 1 },
      { unique_id: 'a', ds: '2024-01-02', y: 2 },
    ]);

    expect(auditData(table, { freq: 'D', logger })).toEqual({ allPass: true, failures: {}, caseSpecific: {} });
  });
});

describe('cleanData', () => {
  it('fills missing dates and fixes case-specific findings on request', () => {
    const audit = auditData(messy, { freq: 'D', logger });

    const { data, audit: after } = cleanData(messy, audit, { freq: 'D', cleanCaseSpecific: true, logger });

    expect(data.toRecords()).toEqual([
      { unique_id: 'a', ds: '2024-01-03', y: 5 },
      { unique_id: 'a', ds: '2024-01-04', y: 0 },
      { unique_id: 'b', ds: '2024-01-02', y: 3 },
      { unique_id: 'b', ds: '2024-01-03', y: 4 },
      { unique_id: 'b', ds: '2024-01-04', y: null },
    ]);
    expect(after.allPass).toBe(true);
  });

  it('leaves case-specific findings alone by default', () => {
    const audit = auditData(messy, { freq: 'D', logger });

    const { data, audit: after } = cleanData(messy, audit, { freq: 'D', logger });

    expect(data.rowCount).toBe(7);
    expect(Object.keys(after.failures)).toEqual([]);
    expect(Object.keys(after.caseSpecific)).toEqual(['V001', 'V002']);
  });

  it('merges duplicates with the given aggregations', () => {
    const table = DataTable.fromRecords([
      { unique_id: 'a', ds: '2024-01-01', y: 1 },
      { unique_id: 'a', ds: '2024-01-01', y: 3 },
      { unique_id: 'a', ds: '2024-01-02', y: 2 },
    ]);
    const audit = auditData(table, { freq: 'D', logger });

    expect(() => cleanData(table, audit, { freq: 'D', logger })).toThrow(/aggDict is required/);

    const { data, audit: after } = cleanData(table, audit, { freq: 'D', aggDict: { y: 'mean' }, logger });
    expect(data.toRecords()).toEqual([
      { unique_id: 'a', ds: '2024-01-01', y: 2 },
      { unique_id: 'a', ds: '2024-01-02', y: 2 },
    ]);
    expect(after.allPass).toBe(true);
  });
});
