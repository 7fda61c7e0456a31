/**
 * Forecasting Models
 *
 * Zod schemas and types for client configuration and service payloads.
 */

export {
  // Configuration
  ClientConfigSchema,
  ServiceLimitsSchema,
  FractionalLabelPolicySchema,
  DEFAULT_BASE_URL,
  resolveClientConfig,
  redactConfig,
  type ClientConfig,
  type ClientOptions,
  type ConfigSource,
  type FractionalLabelPolicy,
  type ServiceLimits,
} from './config.js';

export {
  // Request enums
  FinetuneLossSchema,
  FinetuneDepthSchema,
  ThresholdMethodSchema,
  // Responses
  ForecastResponseSchema,
  FinetuneResponseSchema,
  ModelParamsResponseSchema,
  FinetunedModelSchema,
  FinetunedModelListSchema,
  UsageSchema,
  ValidateKeyResponseSchema,
  ApiErrorBodySchema,
  type FinetuneLoss,
  type FinetuneDepth,
  type ThresholdMethod,
  type ForecastResponse,
  type ModelParams,
  type FinetunedModel,
  type Usage,
  type ApiErrorBody,
} from './api.js';
