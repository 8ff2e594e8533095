import { EnvConfigSchema } from '../schemas';
import type { ModelRuntimeProvider } from '../llm/client/types';
import type { LogLevelName } from './logger';

/**
 * Process-wide configuration, read once at startup and never mutated.
 */
export interface ProxyConfig {
  readonly logLevel: LogLevelName;
  readonly region: string;
  readonly modelId: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly topP: number;
  readonly runtimeProvider: ModelRuntimeProvider;
  /** Request timeout for the model runtime; unset means the SDK default (none) */
  readonly requestTimeoutMs?: number;
}

const ENV_KEYS = [
  'LOG_LEVEL',
  'AWS_REGION',
  'BEDROCK_MODEL_ID',
  'MAX_TOKENS',
  'TEMPERATURE',
  'TOP_P',
  'MODEL_RUNTIME',
  'BEDROCK_TIMEOUT_MS',
] as const;

export class ConfigLoader {
  /**
   * Validate the environment and build the immutable proxy configuration.
   * Empty variables count as unset.
   *
   * @throws Error listing every invalid variable
   */
  static load(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
    const input: Record<string, string | undefined> = {};
    for (const key of ENV_KEYS) {
      const value = env[key];
      input[key] = value === undefined || value.trim() === '' ? undefined : value;
    }

    const result = EnvConfigSchema.safeParse(input);

    if (!result.success) {
      const errors = result.error.errors
        .map(err => `  [${err.path.join('.') || 'root'}]: ${err.message}`)
        .join('\n');
      throw new Error(`Invalid environment configuration:\n${errors}`);
    }

    const parsed = result.data;

    return Object.freeze({
      logLevel: parsed.LOG_LEVEL,
      region: parsed.AWS_REGION,
      modelId: parsed.BEDROCK_MODEL_ID,
      maxTokens: parsed.MAX_TOKENS,
      temperature: parsed.TEMPERATURE,
      topP: parsed.TOP_P,
      runtimeProvider: parsed.MODEL_RUNTIME,
      requestTimeoutMs: parsed.BEDROCK_TIMEOUT_MS,
    });
  }
}
