/**
 * Model Runtime Types
 *
 * Defines the interface for the remote model-inference call, enabling:
 * - Swappable implementations (Bedrock, Mock)
 * - Easy testing with mock runtimes
 */

/**
 * Output of a single model invocation
 */
export interface ModelInvocationOutput {
  /** Decoded JSON response body */
  body: unknown;

  /** Provider request identifier, when the provider returns one */
  requestId?: string;
}

/**
 * Model Runtime Interface
 *
 * All runtime adapters must implement this interface.
 */
export interface IModelRuntime {
  /**
   * Invoke a model once with a JSON payload
   *
   * @throws ProviderError when the provider rejects the call with a classified error
   */
  invokeModel(modelId: string, payload: unknown): Promise<ModelInvocationOutput>;

  /**
   * Clean up resources (close connections, destroy SDK clients)
   */
  destroy(): void;
}

/**
 * Model runtime provider type
 */
export type ModelRuntimeProvider = 'bedrock' | 'mock';

/**
 * Runtime configuration
 */
export interface ModelRuntimeConfig {
  /** Provider type */
  provider?: ModelRuntimeProvider;

  /** AWS region for Bedrock */
  region?: string;

  /** Request timeout in milliseconds; unset leaves the SDK default */
  timeout?: number;
}
