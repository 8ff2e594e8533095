/**
 * Lambda entry point
 *
 * Configuration and the model runtime client are built once per process, at
 * module load, and shared read-only by every invocation.
 */

import { createApp } from './app';
import { ConfigLoader } from './utils/ConfigLoader';

const app = createApp(ConfigLoader.load());

export const handler = app.handler;

export { createApp, type App } from './app';
export { createRequestHandler, type RequestHandler, type ExecutionContext } from './core/RequestHandler';
export { ModelInvoker, type InvocationResult } from './core/ModelInvoker';
export { createResponse, CORS_HEADERS, type ResponseEnvelope } from './core/response';
export { validateRequest, type InboundRequest, type ValidationResult } from './validators';
export { ConfigLoader, type ProxyConfig } from './utils/ConfigLoader';
export * from './llm';
