/**
 * Service Payload Schemas
 *
 * Zod schemas for the JSON bodies the service returns. Parsed at the
 * transport boundary so the assembler only sees validated shapes.
 */

import { z } from 'zod';

// =============================================================================
// Shared enums
// =============================================================================

export const FinetuneLossSchema = z.enum(['default', 'mae', 'mse', 'rmse', 'mape', 'smape']);

export type FinetuneLoss = z.infer<typeof FinetuneLossSchema>;

export const FinetuneDepthSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export type FinetuneDepth = z.infer<typeof FinetuneDepthSchema>;

export const ThresholdMethodSchema = z.enum(['univariate', 'multivariate']);

export type ThresholdMethod = z.infer<typeof ThresholdMethodSchema>;

// =============================================================================
// Functional responses
// =============================================================================

const NumberArray = z.array(z.number());

/**
 * Body of forecast, historic forecast, cross-validation and anomaly
 * detection responses. Intervals are keyed `lo-80`, `hi-80`, ...
 */
export const ForecastResponseSchema = z
  .object({
    mean: NumberArray,
    intervals: z.record(NumberArray).nullable().optional(),
    sizes: z.array(z.number().int().min(0)).optional(),
    idxs: z.array(z.number().int().min(0)).optional(),
    anomaly: z.array(z.union([z.boolean(), z.number()])).optional(),
    anomaly_score: NumberArray.optional(),
    accumulated_anomaly_score: NumberArray.optional(),
    weights_x: z.union([NumberArray, z.array(NumberArray)]).nullable().optional(),
    /** One array per feature plus a trailing base value array */
    feature_contributions: z.array(NumberArray).nullable().optional(),
  })
  .passthrough();

export type ForecastResponse = z.infer<typeof ForecastResponseSchema>;

export const FinetuneResponseSchema = z.object({
  finetuned_model_id: z.string().min(1),
});

export const ModelParamsResponseSchema = z.object({
  detail: z.object({
    input_size: z.number().int().min(1),
    horizon: z.number().int().min(1),
  }),
});

export interface ModelParams {
  inputSize: number;
  horizon: number;
}

// =============================================================================
// Fine-tuned models
// =============================================================================

export const FinetunedModelSchema = z
  .object({
    id: z.string(),
    created_at: z.coerce.date(),
    created_by: z.string(),
    base_model_id: z.string().nullable(),
    steps: z.number().int(),
    depth: z.number().int(),
    loss: FinetuneLossSchema,
    model: z.string(),
    freq: z.string(),
  })
  .passthrough()
  .transform((m) => ({
    id: m.id,
    createdAt: m.created_at,
    createdBy: m.created_by,
    baseModelId: m.base_model_id,
    steps: m.steps,
    depth: m.depth,
    loss: m.loss,
    model: m.model,
    freq: m.freq,
  }));

/**
 * Descriptive metadata of a server-side fine-tuned model. The client never
 * holds the weights, only this record and its id.
 */
export type FinetunedModel = z.output<typeof FinetunedModelSchema>;

export const FinetunedModelListSchema = z.object({
  finetuned_models: z.array(FinetunedModelSchema),
});

// =============================================================================
// Account
// =============================================================================

/** Consumed requests and limits, grouped by period */
export const UsageSchema = z.record(z.record(z.number().nullable()));

export type Usage = z.infer<typeof UsageSchema>;

export const ValidateKeyResponseSchema = z
  .object({
    detail: z.unknown().optional(),
  })
  .passthrough();

// =============================================================================
// Errors
// =============================================================================

/**
 * Structured error body; every field is optional because proxies in front
 * of the service answer with their own shapes.
 */
export const ApiErrorBodySchema = z
  .object({
    message: z.string().optional(),
    detail: z.unknown().optional(),
    code: z.string().optional(),
    support: z.string().optional(),
    request_id: z.string().optional(),
    requestID: z.string().optional(),
  })
  .passthrough();

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;
