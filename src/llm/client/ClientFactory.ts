/**
 * Model Runtime Factory
 *
 * Creates the model runtime once at startup from the proxy configuration.
 *
 * Usage:
 *   const runtime = ModelRuntimeFactory.create({ provider: 'bedrock', region: 'us-east-1' });
 *
 *   // For local runs without AWS
 *   const mock = ModelRuntimeFactory.create({ provider: 'mock' });
 */

import type { IModelRuntime, ModelRuntimeConfig } from './types';
import { BedrockAdapter } from './BedrockAdapter';
import { MockAdapter } from './MockAdapter';
import { Logger } from '../../utils/logger';

export class ModelRuntimeFactory {
  /**
   * Create a model runtime. Defaults to Bedrock.
   */
  static create(config: ModelRuntimeConfig = {}): IModelRuntime {
    const provider = config.provider ?? 'bedrock';

    Logger.info(`[ModelRuntimeFactory] Creating runtime: provider=${provider}`);

    switch (provider) {
      case 'bedrock':
        return new BedrockAdapter(config);

      case 'mock':
        return new MockAdapter(config);
    }
  }
}
