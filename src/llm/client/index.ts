/**
 * Model Runtime Module
 *
 * Provides a single interface for the remote model call with swappable backends.
 *
 * Supported providers:
 * - bedrock: AWS Bedrock Runtime (default)
 * - mock: in-process stand-in
 */

// Types
export type {
  IModelRuntime,
  ModelInvocationOutput,
  ModelRuntimeProvider,
  ModelRuntimeConfig,
} from './types';

export { ProviderError } from './errors';

// Factory
export { ModelRuntimeFactory } from './ClientFactory';

// Adapters (for direct instantiation if needed)
export { BedrockAdapter, type BedrockAdapterConfig } from './BedrockAdapter';
export { MockAdapter, type MockInvocation } from './MockAdapter';
