/**
 * Tests for nowcast audit
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { auditCommand, parseAggregations } from '../audit.js';
import { tempDir } from './helpers.js';

const MESSY = [
  { unique_id: 'a', ds: '2024-01-01', y: 0 },
  { unique_id: 'a', ds: '2024-01-02', y: 0 },
  { unique_id: 'a', ds: '2024-01-03', y: 5 },
  { unique_id: 'a', ds: '2024-01-04', y: -1 },
  { unique_id: 'b', ds: '2024-01-02', y: 3 },
  { unique_id: 'b', ds: '2024-01-03', y: 4 },
];

describe('Audit CLI Command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let exitCode: number | undefined;
  let files: ReturnType<typeof tempDir>;

  beforeEach(() => {
    exitCode = undefined;
    files = tempDir();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null | undefined) => {
      exitCode = typeof code === 'number' ? code : 0;
      return undefined as never;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    files.cleanup();
  });

  it('prints a report and exits with 1 on failing checks', async () => {
    const input = files.write('messy.json', MESSY);

    await auditCommand(input, { freq: 'D' });

    const output = consoleLogSpy.mock.calls.map((c) => String(c[0])).join('\n');
    expect(output).toContain('D002 Missing timestamps');
    expect(output).toContain('V001 Negative values');
    expect(output).toContain('Issues found');
    expect(exitCode).toBe(1);
  });

  it('outputs findings as JSON', async () => {
    const input = files.write('messy.json', MESSY);

    await auditCommand(input, { freq: 'D', json: true });

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      audit: {
        allPass: false,
        failures: { D002: [{ unique_id: 'b', ds: '2024-01-04' }] },
        caseSpecific: {
          V001: [{ unique_id: 'a', ds: '2024-01-04', y: -1 }],
          V002: [{ unique_id: 'a', first_time: '2024-01-01', first_nonzero_time: '2024-01-03', leading_zeros: 2 }],
        },
      },
    });
  });

  it('writes cleaned rows and passes afterwards', async () => {
    const input = files.write('messy.json', MESSY);
    const output = files.path('clean.json');

    await auditCommand(input, { freq: 'D', clean: true, cleanCaseSpecific: true, output });

    expect(JSON.parse(readFileSync(output, 'utf-8'))).toEqual([
      { unique_id: 'a', ds: '2024-01-03', y: 5 },
      { unique_id: 'a', ds: '2024-01-04', y: 0 },
      { unique_id: 'b', ds: '2024-01-02', y: 3 },
      { unique_id: 'b', ds: '2024-01-03', y: 4 },
      { unique_id: 'b', ds: '2024-01-04', y: null },
    ]);
    expect(String(consoleLogSpy.mock.calls[0][0])).toContain('All checks passed');
    expect(exitCode).toBeUndefined();
  });

  it('merges duplicates with --agg', async () => {
    const input = files.write('dupes.json', [
      { unique_id: 'a', ds: '2024-01-01', y: 1 },
      { unique_id: 'a', ds: '2024-01-01', y: 3 },
      { unique_id: 'a', ds: '2024-01-02', y: 2 },
    ]);

    await auditCommand(input, { freq: 'D', clean: true, agg: parseAggregations('y=mean'), json: true });

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      audit: { allPass: true, failures: {}, caseSpecific: {} },
      data: [
        { unique_id: 'a', ds: '2024-01-01', y: 2 },
        { unique_id: 'a', ds: '2024-01-02', y: 2 },
      ],
    });
  });

  it('needs somewhere to write cleaned rows', async () => {
    const input = files.write('messy.json', MESSY);

    await expect(auditCommand(input, { freq: 'D', clean: true })).rejects.toThrow(
      '--clean needs --output or --json for the cleaned rows'
    );
  });
});

describe('parseAggregations', () => {
  it('reads column=aggregation pairs', () => {
    expect(parseAggregations('y=mean, price=sum')).toEqual({ y: 'mean', price: 'sum' });
  });

  it('rejects unknown aggregations', () => {
    expect(() => parseAggregations('y=avg')).toThrow(/got "y=avg"/);
  });
});
