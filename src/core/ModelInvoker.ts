import { Logger } from '../utils/logger';
import { applyInferenceDefaults, type InferenceOverrides } from '../utils/llmConfigDefaults';
import {
  buildRequestBody,
  getModelFamily,
  parseResponse,
  ProviderError,
  type IModelRuntime,
  type InferenceConfig,
  type ModelFamily,
} from '../llm';

export const INTERNAL_ERROR_CODE = 'InternalError';
export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

export interface InvocationError {
  code: string;
  message: string;
}

export type InvocationResult =
  | {
      success: true;
      content: string;
      modelId: string;
      usage: Record<string, unknown>;
      requestId?: string;
    }
  | {
      success: false;
      error: InvocationError;
    };

export interface ModelInvokerConfig {
  modelId: string;
  /** Defaults for parameters the caller leaves out */
  defaults: InferenceConfig;
}

/**
 * Sends one prompt to the configured model and normalizes the reply.
 *
 * The model family is resolved once here, not per call.
 */
export class ModelInvoker {
  readonly modelId: string;
  readonly modelFamily: ModelFamily;
  private readonly defaults: InferenceConfig;

  constructor(
    private readonly runtime: IModelRuntime,
    config: ModelInvokerConfig
  ) {
    this.modelId = config.modelId;
    this.defaults = config.defaults;
    this.modelFamily = getModelFamily(config.modelId);
    Logger.info(`[ModelInvoker] Model ${this.modelId} uses the ${this.modelFamily} format`);
  }

  /**
   * Invoke the model once. Never rejects: provider and internal failures come
   * back as `success: false`.
   */
  async invoke(prompt: string, overrides: InferenceOverrides = {}): Promise<InvocationResult> {
    try {
      const inferenceConfig = applyInferenceDefaults(overrides, this.defaults);
      const requestBody = buildRequestBody(this.modelFamily, prompt, inferenceConfig);

      Logger.info(`[ModelInvoker] Invoking model: ${this.modelId}`);
      Logger.debug(`[ModelInvoker] Request body: ${JSON.stringify(requestBody, null, 2)}`);

      const response = await this.runtime.invokeModel(this.modelId, requestBody);
      const { content, usage } = parseResponse(this.modelFamily, response.body);

      return {
        success: true,
        content,
        modelId: this.modelId,
        usage,
        requestId: response.requestId,
      };
    } catch (error) {
      if (error instanceof ProviderError) {
        Logger.error(`[ModelInvoker] ✗ Provider error: ${error.code} - ${error.message}`);
        return {
          success: false,
          error: { code: error.code, message: error.message },
        };
      }

      Logger.error(`[ModelInvoker] ✗ Unexpected error invoking ${this.modelId}`, error);
      return {
        success: false,
        error: { code: INTERNAL_ERROR_CODE, message: INTERNAL_ERROR_MESSAGE },
      };
    }
  }
}
