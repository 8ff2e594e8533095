/**
 * Mock Adapter
 *
 * In-process implementation of IModelRuntime for tests and local runs.
 * Allows setting canned response bodies or failures and inspecting call history.
 */

import type { IModelRuntime, ModelInvocationOutput, ModelRuntimeConfig } from './types';
import { Logger } from '../../utils/logger';

/**
 * A recorded invocation
 */
export interface MockInvocation {
  modelId: string;
  payload: unknown;
}

const DEFAULT_KEY = '*';

/**
 * Mock adapter implementing IModelRuntime interface
 *
 * Features:
 * - Set canned response bodies per model or default
 * - Make calls fail with a given error
 * - Track all calls for assertions
 */
export class MockAdapter implements IModelRuntime {
  private responses: Map<string, unknown> = new Map();
  private failure: unknown = undefined;
  private callHistory: MockInvocation[] = [];
  private requestCounter = 0;

  constructor(_config?: ModelRuntimeConfig) {
    Logger.debug('[MockAdapter] Initialized');
  }

  /**
   * Set a canned response body for a specific model
   */
  setResponse(modelId: string, body: unknown): void {
    this.responses.set(modelId, body);
  }

  /**
   * Set a default response body for all models
   */
  setDefaultResponse(body: unknown): void {
    this.responses.set(DEFAULT_KEY, body);
  }

  /**
   * Make every following call reject with `error` until reset
   */
  setFailure(error: unknown): void {
    this.failure = error;
  }

  /**
   * Get all calls made to this adapter
   */
  getCalls(): MockInvocation[] {
    return [...this.callHistory];
  }

  /**
   * Get the last call made to this adapter
   */
  getLastCall(): MockInvocation | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  /**
   * Reset all state (responses, failure and call history)
   */
  reset(): void {
    this.responses.clear();
    this.failure = undefined;
    this.callHistory = [];
    this.requestCounter = 0;
  }

  async invokeModel(modelId: string, payload: unknown): Promise<ModelInvocationOutput> {
    this.callHistory.push({ modelId, payload });

    if (this.failure !== undefined) {
      throw this.failure;
    }

    const body = this.responses.has(modelId)
      ? this.responses.get(modelId)
      : this.responses.has(DEFAULT_KEY)
        ? this.responses.get(DEFAULT_KEY)
        : { completion: 'No mock response configured' };

    this.requestCounter += 1;
    Logger.debug(`[MockAdapter] ✓ Returned mock response for model: ${modelId}`);

    return {
      body,
      requestId: `mock-request-${this.requestCounter}`,
    };
  }

  destroy(): void {
    Logger.debug('[MockAdapter] ✓ Destroyed');
  }
}
