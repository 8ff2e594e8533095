/**
 * LLM Module Types
 *
 * Shared types for model invocation.
 * Single source of truth for model families, request/response formats.
 */

/**
 * Supported model families for Bedrock
 * - anthropic: Claude Messages API
 * - titan: Amazon Titan Text
 * - generic: any other model, sent a flat prompt payload
 */
export type ModelFamily = 'anthropic' | 'titan' | 'generic';

/**
 * Inference configuration for LLM calls
 */
export interface InferenceConfig {
  maxTokens: number;
  temperature: number;
  topP: number;
}

export interface AnthropicRequestBody {
  anthropic_version: 'bedrock-2023-05-31';
  max_tokens: number;
  temperature: number;
  top_p: number;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface TitanRequestBody {
  inputText: string;
  textGenerationConfig: {
    maxTokenCount: number;
    temperature: number;
    topP: number;
  };
}

export interface GenericRequestBody {
  prompt: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
}

export type ModelRequestBody = AnthropicRequestBody | TitanRequestBody | GenericRequestBody;

/**
 * Parsed model response
 */
export interface ParsedModelResponse {
  content: string;
  /** Provider usage block, passed through untouched */
  usage: Record<string, unknown>;
}
