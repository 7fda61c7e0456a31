/**
 * Tests for nowcast forecast, cross-validate and detect-anomalies
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigurationError } from '@nowcast/forecasting';
import { detectAnomaliesCommand } from '../anomalies.js';
import { crossValidateCommand, forecastCommand, finetuneParams } from '../forecast.js';
import { exitWithError } from '../shared.js';
import { json, stubFetch, tempDir, TEST_BASE_URL, TEST_ENV } from './helpers.js';

function dailyRows(ids: string[], length: number) {
  return ids.flatMap((id, s) =>
    Array.from({ length }, (_, t) => ({ unique_id: id, ds: `2024-01-0${t + 1}`, y: s * 10 + t }))
  );
}

function seriesSizes(body: unknown): unknown {
  if (body === null || typeof body !== 'object' || !('series' in body)) return undefined;
  const series = body.series;
  return series !== null && typeof series === 'object' && 'sizes' in series ? series.sizes : undefined;
}

function sentField(body: unknown, field: string): unknown {
  if (body === null || typeof body !== 'object') return undefined;
  return Object.entries(body).find(([key]) => key === field)?.[1];
}

describe('Forecast CLI Commands', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let exitCode: number | undefined;
  let files: ReturnType<typeof tempDir>;

  beforeEach(() => {
    exitCode = undefined;
    files = tempDir();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
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

  describe('forecastCommand', () => {
    it('prints forecast rows as JSON', async () => {
      const input = files.write('input.json', dailyRows(['a', 'b'], 5));
      const stub = stubFetch({
        'GET model_params': () => json({ detail: { input_size: 3, horizon: 10 } }),
        'POST v2/forecast': () => json({ mean: [0, 1, 100, 101], intervals: null }),
      });

      await forecastCommand(input, { h: 2, freq: 'D', baseUrl: TEST_BASE_URL }, { env: TEST_ENV, fetch: stub.fetch });

      const [, request] = stub.calls;
      expect(request.route).toBe('POST v2/forecast');
      expect(seriesSizes(request.body)).toEqual([3, 3]);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual([
        { unique_id: 'a', ds: '2024-01-06', TimeGPT: 0 },
        { unique_id: 'a', ds: '2024-01-07', TimeGPT: 1 },
        { unique_id: 'b', ds: '2024-01-06', TimeGPT: 100 },
        { unique_id: 'b', ds: '2024-01-07', TimeGPT: 101 },
      ]);
    });

    it('writes to --output instead of stdout', async () => {
      const input = files.write('input.json', dailyRows(['a'], 5));
      const output = files.path('out.json');
      const stub = stubFetch({
        'GET model_params': () => json({ detail: { input_size: 3, horizon: 10 } }),
        'POST v2/forecast': () => json({ mean: [7], intervals: null }),
      });

      await forecastCommand(
        input,
        { h: 1, freq: 'D', baseUrl: TEST_BASE_URL, output },
        { env: TEST_ENV, fetch: stub.fetch }
      );

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(String(consoleErrorSpy.mock.calls[0][0])).toContain(`Wrote ${output}`);
      expect(JSON.parse(readFileSync(output, 'utf-8'))).toEqual([{ unique_id: 'a', ds: '2024-01-06', TimeGPT: 7 }]);
    });

    it('sends clean_ex_first as given', async () => {
      const input = files.write('input.json', dailyRows(['a'], 5));
      const stub = stubFetch({
        'GET model_params': () => json({ detail: { input_size: 3, horizon: 10 } }),
        'POST v2/forecast': () => json({ mean: [7], intervals: null }),
      });

      await forecastCommand(
        input,
        { h: 1, freq: 'D', baseUrl: TEST_BASE_URL, cleanExFirst: false },
        { env: TEST_ENV, fetch: stub.fetch }
      );
      await forecastCommand(
        input,
        { h: 1, freq: 'D', baseUrl: TEST_BASE_URL, cleanExFirst: true },
        { env: TEST_ENV, fetch: stub.fetch }
      );

      const sent = stub.calls.filter((c) => c.route === 'POST v2/forecast').map((c) => sentField(c.body, 'clean_ex_first'));
      expect(sent).toEqual([false, true]);
    });

    it('fails without an API key', async () => {
      const input = files.write('input.json', dailyRows(['a'], 5));

      await expect(forecastCommand(input, { h: 1 }, { env: {} })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('rejects an input that is not an array of rows', async () => {
      const input = files.write('input.json', { unique_id: 'a' });

      await expect(forecastCommand(input, { h: 1 }, { env: TEST_ENV })).rejects.toThrow(
        'must hold an array of row objects'
      );
    });
  });

  describe('crossValidateCommand', () => {
    it('prints cutoffs and actuals next to the forecasts', async () => {
      const input = files.write('input.json', dailyRows(['a'], 6));
      const stub = stubFetch({
        'GET model_params': () => json({ detail: { input_size: 2, horizon: 10 } }),
        'POST v2/cross_validation': () => json({ mean: [50, 51], sizes: [2], idxs: [2, 3] }),
      });

      await crossValidateCommand(
        input,
        { h: 2, freq: 'D', baseUrl: TEST_BASE_URL },
        { env: TEST_ENV, fetch: stub.fetch }
      );

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual([
        { unique_id: 'a', ds: '2024-01-05', cutoff: '2024-01-04', y: 4, TimeGPT: 50 },
        { unique_id: 'a', ds: '2024-01-06', cutoff: '2024-01-04', y: 5, TimeGPT: 51 },
      ]);
    });
  });

  describe('detectAnomaliesCommand', () => {
    it('requires a horizon and detection size online', async () => {
      const input = files.write('input.json', dailyRows(['a'], 5));

      await expect(detectAnomaliesCommand(input, { online: true, h: 2 }, { env: TEST_ENV })).rejects.toThrow(
        '--online requires --h and --detection-size'
      );
    });

    it('rejects an unknown threshold method', async () => {
      const input = files.write('input.json', dailyRows(['a'], 5));

      await expect(
        detectAnomaliesCommand(
          input,
          { online: true, h: 2, detectionSize: 2, thresholdMethod: 'bivariate' },
          { env: TEST_ENV }
        )
      ).rejects.toThrow('--threshold-method must be univariate or multivariate, got "bivariate"');
    });
  });

  describe('finetuneParams', () => {
    it('passes valid depth and loss through', () => {
      expect(finetuneParams({ finetuneSteps: 5, finetuneDepth: 3, finetuneLoss: 'mae' })).toEqual({
        finetuneSteps: 5,
        finetuneDepth: 3,
        finetuneLoss: 'mae',
      });
    });

    it('rejects out-of-range values', () => {
      expect(() => finetuneParams({ finetuneDepth: 7 })).toThrow('--finetune-depth must be an integer from 1 to 5, got 7');
      expect(() => finetuneParams({ finetuneLoss: 'huber' })).toThrow(/--finetune-loss must be one of/);
    });
  });

  describe('exitWithError', () => {
    it('prints the message and exits with the category code', () => {
      exitWithError(new ConfigurationError('apiKey is required'));

      expect(consoleErrorSpy.mock.calls[0][1]).toBe('apiKey is required');
      expect(exitCode).toBe(41);
    });

    it('exits with 1 for unclassified errors', () => {
      exitWithError(new Error('boom'));

      expect(exitCode).toBe(1);
    });
  });
});
