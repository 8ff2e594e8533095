/**
 * Model Family Detection
 *
 * Single source of truth for determining model family from model ID.
 */

import type { ModelFamily } from './types';

/**
 * Determine model family from a Bedrock model ID
 *
 * Matches by substring, so cross-region inference profiles resolve too:
 * - anthropic.claude-3-sonnet-20240229-v1:0 → anthropic
 * - us.anthropic.claude-3-5-haiku-20241022-v1:0 → anthropic
 * - amazon.titan-text-express-v1 → titan
 * - anything else → generic
 */
export function getModelFamily(modelId: string): ModelFamily {
  if (modelId.includes('anthropic')) {
    return 'anthropic';
  }
  if (modelId.includes('amazon.titan')) {
    return 'titan';
  }
  return 'generic';
}
