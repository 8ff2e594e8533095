/**
 * LLM Module
 *
 * Single source of truth for:
 * - Model family detection
 * - Request body building
 * - Response parsing
 * - Runtime abstraction (Bedrock, Mock)
 */

// Core utilities
export * from './types';
export { getModelFamily } from './model-family';
export { buildRequestBody } from './request-builder';
export { parseResponse } from './response-parser';

// Runtime abstraction
export {
  type IModelRuntime,
  type ModelInvocationOutput,
  type ModelRuntimeProvider,
  type ModelRuntimeConfig,
  type BedrockAdapterConfig,
  type MockInvocation,
  ProviderError,
  ModelRuntimeFactory,
  BedrockAdapter,
  MockAdapter,
} from './client';
