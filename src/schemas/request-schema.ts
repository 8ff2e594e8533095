import { z } from 'zod';

export const PROMPT_REQUIRED = 'Prompt is required';
export const MAX_TOKENS_INVALID = 'max_tokens must be a positive integer';
export const TEMPERATURE_INVALID = 'temperature must be a number between 0 and 1';
export const TOP_P_INVALID = 'top_p must be a number between 0 and 1';

const unitInterval = (message: string) =>
  z.number({ invalid_type_error: message }).min(0, message).max(1, message);

/**
 * Generation request body.
 *
 * Keys are checked in declaration order, so the first issue always names the
 * first offending field. Unknown keys are stripped.
 */
export const GenerationRequestSchema = z.object({
  prompt: z
    .string({ required_error: PROMPT_REQUIRED, invalid_type_error: PROMPT_REQUIRED })
    .min(1, PROMPT_REQUIRED),
  max_tokens: z
    .number({ invalid_type_error: MAX_TOKENS_INVALID })
    .int(MAX_TOKENS_INVALID)
    .positive(MAX_TOKENS_INVALID)
    .optional(),
  temperature: unitInterval(TEMPERATURE_INVALID).optional(),
  top_p: unitInterval(TOP_P_INVALID).optional(),
});

export type GenerationParams = z.infer<typeof GenerationRequestSchema>;
