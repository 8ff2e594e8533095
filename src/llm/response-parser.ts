/**
 * Response Parser
 *
 * Parse Bedrock response based on model family.
 * Single source of truth for response format per model family.
 */

import { z } from 'zod';
import type { ModelFamily, ParsedModelResponse } from './types';

const ResponseObjectSchema = z.record(z.unknown());

const UsageSchema = z.record(z.unknown());

// Only the first element is read; later ones may have any shape
const AnthropicResponseSchema = z.object({
  content: z.tuple([z.object({ text: z.string() })]).rest(z.unknown()),
});

const TitanResponseSchema = z.object({
  results: z.tuple([z.object({ outputText: z.string() })]).rest(z.unknown()),
});

/**
 * Parse Bedrock response based on model family
 *
 * Each model family has a different response format:
 * - Anthropic: content[0].text
 * - Titan: results[0].outputText
 * - Generic: completion, then text, then the whole body serialized as JSON
 *
 * `usage` is copied from the body as-is, or `{}` when the body has none.
 *
 * @throws Error when the body does not match the family's response shape
 */
export function parseResponse(modelFamily: ModelFamily, responseBody: unknown): ParsedModelResponse {
  const body = ResponseObjectSchema.safeParse(responseBody);
  if (!body.success) {
    throw new Error(`Unexpected ${modelFamily} response: body is not a JSON object`);
  }

  const usage = UsageSchema.safeParse(body.data.usage);

  return {
    content: extractContent(modelFamily, body.data),
    usage: usage.success ? usage.data : {},
  };
}

function extractContent(modelFamily: ModelFamily, body: Record<string, unknown>): string {
  switch (modelFamily) {
    case 'anthropic': {
      const parsed = AnthropicResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error('Unexpected anthropic response: missing content[0].text');
      }
      return parsed.data.content[0].text;
    }

    case 'titan': {
      const parsed = TitanResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error('Unexpected titan response: missing results[0].outputText');
      }
      return parsed.data.results[0].outputText;
    }

    case 'generic':
      if (typeof body.completion === 'string') {
        return body.completion;
      }
      if (typeof body.text === 'string') {
        return body.text;
      }
      return JSON.stringify(body);
  }
}
