import { ModelInvoker } from './core/ModelInvoker';
import { createRequestHandler, type RequestHandler } from './core/RequestHandler';
import { ModelRuntimeFactory, type IModelRuntime } from './llm';
import type { ProxyConfig } from './utils/ConfigLoader';
import { Logger } from './utils/logger';

export interface App {
  config: ProxyConfig;
  runtime: IModelRuntime;
  invoker: ModelInvoker;
  handler: RequestHandler;
}

/**
 * Wire the proxy from its configuration. `runtime` replaces the configured
 * model runtime, e.g. with a MockAdapter in tests.
 */
export function createApp(config: ProxyConfig, runtime?: IModelRuntime): App {
  Logger.setLevel(config.logLevel);

  const modelRuntime =
    runtime ??
    ModelRuntimeFactory.create({
      provider: config.runtimeProvider,
      region: config.region,
      timeout: config.requestTimeoutMs,
    });

  const invoker = new ModelInvoker(modelRuntime, {
    modelId: config.modelId,
    defaults: {
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      topP: config.topP,
    },
  });

  return {
    config,
    runtime: modelRuntime,
    invoker,
    handler: createRequestHandler({ invoker }),
  };
}
