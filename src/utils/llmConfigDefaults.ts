/**
 * LLM Configuration Defaults
 *
 * Centralized default values used when the environment leaves a setting unset,
 * and the helper that fills per-request inference parameters from configuration.
 */

import type { InferenceConfig } from '../llm/types';

export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_MODEL_ID = 'anthropic.claude-3-sonnet-20240229-v1:0';

/**
 * Default inference configuration
 * - maxTokens: 1000
 * - temperature: 0.7
 * - topP: 0.9
 */
export const DEFAULT_INFERENCE_CONFIG = {
  maxTokens: 1000,
  temperature: 0.7,
  topP: 0.9,
} as const;

/**
 * Per-request overrides; any field left undefined falls back to the configured default
 */
export interface InferenceOverrides {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
}

/**
 * Apply configured defaults to request-level inference parameters.
 * Only `undefined` falls back, so an explicit 0 temperature is kept.
 */
export function applyInferenceDefaults(
  overrides: InferenceOverrides,
  defaults: InferenceConfig
): InferenceConfig {
  return {
    maxTokens: overrides.maxTokens ?? defaults.maxTokens,
    temperature: overrides.temperature ?? defaults.temperature,
    topP: overrides.topP ?? defaults.topP,
  };
}
