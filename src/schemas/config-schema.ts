import { z } from 'zod';
import {
  DEFAULT_INFERENCE_CONFIG,
  DEFAULT_MODEL_ID,
  DEFAULT_REGION,
} from '../utils/llmConfigDefaults';

const LOG_LEVELS = ['ERROR', 'WARN', 'INFO', 'DEBUG'] as const;

// Accepts the usual spellings (e.g. "info", "WARNING") and normalizes to a Logger level
const LogLevelSchema = z
  .string()
  .transform(value => {
    const upper = value.trim().toUpperCase();
    return upper === 'WARNING' ? 'WARN' : upper;
  })
  .pipe(
    z.enum(LOG_LEVELS, {
      errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }),
    })
  );

function numberFromEnv(name: string, inner: z.ZodNumber) {
  return z
    .string()
    .trim()
    .pipe(z.coerce.number({ invalid_type_error: `${name} must be a number` }).pipe(inner));
}

export const EnvConfigSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('INFO'),
  AWS_REGION: z.string().trim().min(1, 'AWS_REGION must not be empty').default(DEFAULT_REGION),
  BEDROCK_MODEL_ID: z
    .string()
    .trim()
    .min(1, 'BEDROCK_MODEL_ID must not be empty')
    .default(DEFAULT_MODEL_ID),
  MAX_TOKENS: numberFromEnv(
    'MAX_TOKENS',
    z.number().int('MAX_TOKENS must be an integer').positive('MAX_TOKENS must be positive')
  ).default(String(DEFAULT_INFERENCE_CONFIG.maxTokens)),
  TEMPERATURE: numberFromEnv(
    'TEMPERATURE',
    z.number().min(0).max(1, 'TEMPERATURE must be between 0 and 1')
  ).default(String(DEFAULT_INFERENCE_CONFIG.temperature)),
  TOP_P: numberFromEnv('TOP_P', z.number().min(0).max(1, 'TOP_P must be between 0 and 1')).default(
    String(DEFAULT_INFERENCE_CONFIG.topP)
  ),
  MODEL_RUNTIME: z
    .enum(['bedrock', 'mock'], {
      errorMap: () => ({ message: 'MODEL_RUNTIME must be "bedrock" or "mock"' }),
    })
    .default('bedrock'),
  BEDROCK_TIMEOUT_MS: numberFromEnv(
    'BEDROCK_TIMEOUT_MS',
    z
      .number()
      .int('BEDROCK_TIMEOUT_MS must be an integer')
      .positive('BEDROCK_TIMEOUT_MS must be positive')
  ).optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;
