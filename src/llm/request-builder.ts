/**
 * Request Builder
 *
 * Build Bedrock request body based on model family.
 * Single source of truth for request format per model family.
 */

import type {
  AnthropicRequestBody,
  GenericRequestBody,
  InferenceConfig,
  ModelFamily,
  ModelRequestBody,
  TitanRequestBody,
} from './types';

/**
 * Build Bedrock request body based on model family
 *
 * Each model family has a different request format:
 * - Anthropic: Messages API with snake_case
 * - Titan: inputText with camelCase textGenerationConfig
 * - Generic: flat prompt with snake_case sampling fields
 *
 * The result depends only on its arguments.
 */
export function buildRequestBody(
  modelFamily: ModelFamily,
  prompt: string,
  config: InferenceConfig
): ModelRequestBody {
  switch (modelFamily) {
    case 'anthropic':
      return buildAnthropicRequest(prompt, config);

    case 'titan':
      return buildTitanRequest(prompt, config);

    case 'generic':
      return buildGenericRequest(prompt, config);
  }
}

/**
 * Anthropic Claude Messages API format (snake_case)
 */
function buildAnthropicRequest(
  prompt: string,
  { maxTokens, temperature, topP }: InferenceConfig
): AnthropicRequestBody {
  return {
    anthropic_version: 'bedrock-2023-05-31',
    max_tokens: maxTokens,
    temperature,
    top_p: topP,
    messages: [{ role: 'user', content: prompt }],
  };
}

/**
 * Amazon Titan Text format (camelCase in textGenerationConfig)
 */
function buildTitanRequest(
  prompt: string,
  { maxTokens, temperature, topP }: InferenceConfig
): TitanRequestBody {
  return {
    inputText: prompt,
    textGenerationConfig: {
      maxTokenCount: maxTokens,
      temperature,
      topP,
    },
  };
}

function buildGenericRequest(
  prompt: string,
  { maxTokens, temperature, topP }: InferenceConfig
): GenericRequestBody {
  return {
    prompt,
    max_tokens: maxTokens,
    temperature,
    top_p: topP,
  };
}
