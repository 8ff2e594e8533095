/**
 * Bedrock Adapter
 *
 * AWS Bedrock Runtime implementation of IModelRuntime.
 * Sends the payload as-is; request shaping and response parsing live in llm/.
 */

import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import type { IModelRuntime, ModelInvocationOutput, ModelRuntimeConfig } from './types';
import { ProviderError } from './errors';
import { Logger } from '../../utils/logger';
import { DEFAULT_REGION } from '../../utils/llmConfigDefaults';

/**
 * Bedrock-specific configuration
 */
export interface BedrockAdapterConfig {
  region?: string;
  timeout?: number;
  /** Pre-built client, mainly for tests */
  client?: BedrockRuntimeClient;
}

/**
 * AWS Bedrock adapter implementing IModelRuntime interface
 */
export class BedrockAdapter implements IModelRuntime {
  private client: BedrockRuntimeClient;
  private region: string;

  constructor(config?: BedrockAdapterConfig | ModelRuntimeConfig) {
    this.region = config?.region || DEFAULT_REGION;
    const timeout = config?.timeout;

    if (config && 'client' in config && config.client) {
      this.client = config.client;
    } else {
      this.client = new BedrockRuntimeClient({
        region: this.region,
        ...(timeout
          ? {
              requestHandler: new NodeHttpHandler({
                requestTimeout: timeout,
                throwOnRequestTimeout: true,
              }),
            }
          : {}),
      });
    }

    Logger.info(
      `[BedrockAdapter] Initialized for region: ${this.region} (timeout: ${timeout ? `${timeout}ms` : 'none'})`
    );
  }

  /**
   * Invoke a Bedrock model once. No retry.
   *
   * Bedrock service exceptions are rethrown as ProviderError carrying the
   * exception name as code; anything else propagates unchanged.
   */
  async invokeModel(modelId: string, payload: unknown): Promise<ModelInvocationOutput> {
    const command = new InvokeModelCommand({
      modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(payload),
    });

    try {
      const response = await this.client.send(command);
      const body: unknown = JSON.parse(new TextDecoder().decode(response.body));

      return {
        body,
        requestId: response.$metadata.requestId,
      };
    } catch (error) {
      if (error instanceof BedrockRuntimeServiceException) {
        throw new ProviderError(error.name, error.message);
      }
      throw error;
    }
  }

  /**
   * The underlying SDK client
   */
  getClient(): BedrockRuntimeClient {
    return this.client;
  }

  /**
   * Clean up resources
   */
  destroy(): void {
    this.client.destroy();
    Logger.info('[BedrockAdapter] ✓ Client destroyed');
  }
}
