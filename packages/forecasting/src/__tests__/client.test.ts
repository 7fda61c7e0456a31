/**
 * Forecast Client Tests
 *
 * End-to-end runs of every operation against an in-process fetch stub.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createLogger, type Logger } from '@nowcast/core';
import { ForecastClient, createForecastClient, restrictedInputSize } from '../client.js';
import { ApiError, DataValidationError } from '../errors.js';
import { DataTable, type Row } from '../tabular.js';
import {
  createApiMock,
  forecastHandler,
  json,
  modelParams,
  sentField,
  sentSizes,
  TEST_BASE_URL,
  type ApiMock,
} from './helpers/api-mock.js';
import { fakeClock } from './helpers/clock.js';

/**
 * Daily series from 2024-01-01; series `s` holds `s * 100 + t`
 */
function daily(ids: string[], length: number): DataTable {
  const records: Row[] = [];
  ids.forEach((id, s) => {
    for (let t = 0; t < length; t++) {
      records.push({ unique_id: id, ds: `2024-01-${String(t + 1).padStart(2, '0')}`, y: s * 100 + t });
    }
  });
  return DataTable.fromRecords(records);
}

function kindOf(error: unknown): string | undefined {
  return error instanceof DataValidationError ? error.kind : undefined;
}

describe('ForecastClient', () => {
  let mock: ApiMock;
  let logger: Logger;
  let client: ForecastClient;

  beforeEach(() => {
    mock = createApiMock();
    logger = createLogger('client-test', { minSeverity: 'CRITICAL', prettyPrint: false });
    client = createForecastClient(
      { apiKey: 'test-key', baseUrl: TEST_BASE_URL, retryIntervalMs: 10 },
      { fetch: mock.fetch, clock: fakeClock(), logger }
    );
  });

  describe('forecast', () => {
    it('sends small inputs in one batch and returns h rows per series', async () => {
      mock.on('GET model_params', modelParams(5, 10)).on('POST v2/forecast', forecastHandler(2));

      const { forecast } = await client.forecast(daily(['a', 'b', 'c'], 8), { h: 2 });

      const [params] = mock.callsTo('GET model_params');
      expect(params.query).toEqual({ model: 'timegpt-1', freq: 'D' });

      const calls = mock.callsTo('POST v2/forecast');
      expect(calls).toHaveLength(1);
      expect(sentSizes(calls[0])).toEqual([5, 5, 5]);
      expect(sentField(calls[0], 'h')).toBe(2);
      expect(sentField(calls[0], 'freq')).toBe('D');
      expect(sentField(calls[0], 'level')).toBeNull();
      expect(sentField(calls[0], 'finetune_steps')).toBe(0);
      expect(sentField(calls[0], 'clean_ex_first')).toBe(true);

      expect(forecast.rowCount).toBe(6);
      expect(forecast.toRecords().slice(0, 3)).toEqual([
        { unique_id: 'a', ds: '2024-01-09', TimeGPT: 0 },
        { unique_id: 'a', ds: '2024-01-10', TimeGPT: 1 },
        { unique_id: 'b', ds: '2024-01-09', TimeGPT: 100 },
      ]);
    });

    it('keeps enough history for intervals when levels are requested', async () => {
      mock.on('GET model_params', modelParams(2, 3)).on('POST v2/forecast', forecastHandler(1, [80]));

      const { forecast } = await client.forecast(daily(['a'], 20), { h: 1, level: [80] });

      expect(restrictedInputSize({ inputSize: 2, horizon: 3 }, 1, true)).toBe(9);
      expect(sentSizes(mock.callsTo('POST v2/forecast')[0])).toEqual([9]);
      expect(sentField(mock.callsTo('POST v2/forecast')[0], 'level')).toEqual([80]);
      expect(forecast.row(0)).toEqual({
        unique_id: 'a',
        ds: '2024-01-21',
        TimeGPT: 0,
        'TimeGPT-lo-80': -80,
        'TimeGPT-hi-80': 80,
      });
    });

    it('keeps series order when batches finish out of order', async () => {
      mock.on('GET model_params', modelParams(3, 10)).on('POST v2/forecast', async (call) => {
        const series = sentField(call, 'series');
        const first =
          series !== null && typeof series === 'object' && 'y' in series && Array.isArray(series.y) ? Number(series.y[0]) : 0;
        // later series answer first
        await new Promise((resolve) => setTimeout(resolve, 30 - first / 10));
        return json({ mean: [first] });
      });

      const { forecast } = await client.forecast(daily(['a', 'b', 'c'], 4), { h: 1, numPartitions: 3 });

      expect(mock.callsTo('POST v2/forecast')).toHaveLength(3);
      expect(forecast.column('unique_id')).toEqual(['a', 'b', 'c']);
      expect(forecast.column('TimeGPT')).toEqual([1, 101, 201]);
    });

    it('warns when h exceeds the model horizon', async () => {
      const warn = vi.spyOn(logger, 'warn');
      mock.on('GET model_params', modelParams(3, 2)).on('POST v2/forecast', forecastHandler(4));

      await client.forecast(daily(['a'], 5), { h: 4 });

      expect(warn).toHaveBeenCalledWith('Horizon exceeds the model horizon; forecasts may be less accurate', {
        h: 4,
        modelHorizon: 2,
      });
    });

    it('rejects series shorter than the model needs when fine-tuning', async () => {
      mock.on('GET model_params', modelParams(10, 5));

      const error = await client.forecast(daily(['a'], 8), { h: 1, finetuneSteps: 5 }).catch((e: unknown) => e);

      expect(kindOf(error)).toBe('series-too-short');
      expect(mock.callsTo('POST v2/forecast')).toHaveLength(0);
    });

    it('rejects unsupported models before any call', async () => {
      const error = await client.forecast(daily(['a'], 8), { h: 1, model: 'arima' }).catch((e: unknown) => e);

      expect(kindOf(error)).toBe('invalid-argument');
      expect(mock.calls).toHaveLength(0);
    });

    it('adds in-sample rows from the historic endpoint', async () => {
      mock
        .on('GET model_params', modelParams(3, 2))
        .on('POST v2/forecast', forecastHandler(1))
        .on('POST v2/historic_forecast', () => json({ mean: [-1, -2, -3, -4, -5, -6], sizes: [3, 3] }));

      const { forecast } = await client.forecast(daily(['a', 'b'], 8), { h: 1, addHistory: true });

      const [historic] = mock.callsTo('POST v2/historic_forecast');
      expect(sentSizes(historic)).toEqual([8, 8]);
      expect(sentField(historic, 'h')).toBeUndefined();
      expect(forecast.column('ds')).toEqual([
        '2024-01-06',
        '2024-01-07',
        '2024-01-08',
        '2024-01-09',
        '2024-01-06',
        '2024-01-07',
        '2024-01-08',
        '2024-01-09',
      ]);
      expect(forecast.column('TimeGPT')).toEqual([-1, -2, -3, 0, -4, -5, -6, 100]);
    });

    it('rethrows the service error of a single failed batch', async () => {
      mock
        .on('GET model_params', modelParams(3, 2))
        .on('POST v2/forecast', () => json({ detail: 'freq not supported' }, 400));

      await expect(client.forecast(daily(['a'], 4), { h: 1 })).rejects.toBeInstanceOf(ApiError);
    });
  });

  describe('crossValidation', () => {
    it('restricts the history to what the windows need and derives cutoffs', async () => {
      const records: Row[] = Array.from({ length: 10 }, (_, t) => ({ unique_id: 'a', ds: t + 1, y: t }));
      mock
        .on('GET model_params', modelParams(4, 4))
        .on('POST v2/cross_validation', () => json({ mean: [1, 2, 3, 4], sizes: [4], idxs: [4, 5, 5, 6] }));

      const table = await client.crossValidation(DataTable.fromRecords(records), { h: 2, nWindows: 2, stepSize: 1 });

      const [call] = mock.callsTo('POST v2/cross_validation');
      expect(mock.callsTo('GET model_params')[0].query.freq).toBe('MS');
      expect(sentSizes(call)).toEqual([7]);
      expect(sentField(call, 'n_windows')).toBe(2);
      expect(sentField(call, 'step_size')).toBe(1);
      expect(sentField(call, 'refit')).toBe(true);
      expect(table.column('ds')).toEqual([8, 9, 9, 10]);
      expect(table.column('cutoff')).toEqual([7, 7, 8, 8]);
      expect(table.column('y')).toEqual([7, 8, 8, 9]);
    });
  });

  describe('anomaly detection', () => {
    it('flags historical anomalies without querying model parameters', async () => {
      mock.on('POST v2/anomaly_detection', () =>
        json({
          mean: [1, 2, 101, 102],
          sizes: [2, 2],
          anomaly: [false, true, false, false],
          intervals: { 'lo-99': [0, 0, 0, 0], 'hi-99': [9, 9, 9, 9] },
        })
      );

      const table = await client.detectAnomalies(daily(['a', 'b'], 6));

      const [call] = mock.callsTo('POST v2/anomaly_detection');
      expect(mock.callsTo('GET model_params')).toHaveLength(0);
      expect(sentField(call, 'level')).toEqual([99]);
      expect(sentSizes(call)).toEqual([6, 6]);
      expect(table.column('ds')).toEqual(['2024-01-05', '2024-01-06', '2024-01-05', '2024-01-06']);
      expect(table.column('anomaly')).toEqual([false, true, false, false]);
    });

    it('warns when the detection size leaves little history', async () => {
      const warn = vi.spyOn(logger, 'warn');
      mock.on('POST v2/online_anomaly_detection', () =>
        json({
          mean: [5],
          sizes: [1],
          idxs: [7],
          anomaly: [true],
          anomaly_score: [4.2],
          intervals: { 'lo-99': [1], 'hi-99': [3] },
        })
      );

      const table = await client.detectAnomaliesOnline(daily(['a'], 8), { h: 1, detectionSize: 2 });

      expect(warn).toHaveBeenCalledWith(
        'Detection size is large; the whole series is used to compute the anomaly threshold',
        { detectionSize: 2 }
      );
      const [call] = mock.callsTo('POST v2/online_anomaly_detection');
      expect(sentField(call, 'threshold_method')).toBe('univariate');
      expect(sentField(call, 'refit')).toBe(false);
      expect(table.row(0)).toMatchObject({ ds: '2024-01-08', y: 7, anomaly: true, anomaly_score: 4.2 });
    });

    it('refuses to split multivariate detection', async () => {
      const error = await client
        .detectAnomaliesOnline(daily(['a', 'b'], 8), { h: 1, detectionSize: 2, thresholdMethod: 'multivariate', numPartitions: 2 })
        .catch((e: unknown) => e);

      expect(kindOf(error)).toBe('invalid-argument');
      expect(mock.calls).toHaveLength(0);
    });
  });

  describe('fine-tuned models', () => {
    const stored = {
      id: 'my-model',
      created_at: '2024-05-01T00:00:00Z',
      created_by: 'user',
      base_model_id: null,
      steps: 10,
      depth: 1,
      loss: 'default',
      model: 'timegpt-1',
      freq: 'D',
    };

    it('fine-tunes on targets only and returns the saved id', async () => {
      mock
        .on('GET model_params', modelParams(3, 2))
        .on('POST v2/finetune', () => json({ finetuned_model_id: 'my-model' }));

      const id = await client.finetune(daily(['a', 'b'], 6), { outputModelId: 'my-model' });

      expect(id).toBe('my-model');
      const [call] = mock.callsTo('POST v2/finetune');
      expect(sentField(call, 'series')).toEqual({
        y: [0, 1, 2, 3, 4, 5, 100, 101, 102, 103, 104, 105],
        sizes: [6, 6],
      });
      expect(sentField(call, 'finetune_steps')).toBe(10);
      expect(sentField(call, 'output_model_id')).toBe('my-model');
    });

    it('lists, reads and deletes saved models', async () => {
      mock
        .on('GET v2/finetuned_models', () => json({ finetuned_models: [stored] }))
        .on('GET v2/finetuned_models/my-model', () => json(stored))
        .on('DELETE v2/finetuned_models/my-model', () => new Response(null, { status: 204 }));

      const models = await client.finetunedModels();
      const model = await client.finetunedModel('my-model');
      const deleted = await client.deleteFinetunedModel('my-model');

      expect(models.map((m) => m.id)).toEqual(['my-model']);
      expect(model.createdAt.toISOString()).toBe('2024-05-01T00:00:00.000Z');
      expect(model.baseModelId).toBeNull();
      expect(deleted).toBe(true);
    });
  });

  describe('account', () => {
    it('reports whether the key is accepted', async () => {
      mock.on('GET validate_api_key', (_, nth) => (nth === 0 ? json({ detail: 'ok' }) : json({ detail: 'bad key' }, 401)));

      expect(await client.validateApiKey()).toBe(true);
      expect(await client.validateApiKey()).toBe(false);
    });

    it('returns usage figures', async () => {
      mock.on('GET usage', () => json({ minute: { limit: 100, used: 3 }, month: { limit: null, used: 40 } }));

      const usage = await client.usage();

      expect(usage.minute).toEqual({ limit: 100, used: 3 });
      expect(usage.month?.limit).toBeNull();
    });
  });

  describe('configuration', () => {
    it('reads the key from the environment source and redacts it', () => {
      const fromEnv = ForecastClient.fromEnv({ NIXTLA_API_KEY: 'test-secret', NOWCAST_MAX_RETRIES: '2' });
      const config = fromEnv.getConfig();

      expect(config.apiKey).toBe('***REDACTED***');
      expect(config.maxRetries).toBe(2);
    });
  });
});
