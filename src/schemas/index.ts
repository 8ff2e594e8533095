export { EnvConfigSchema, type EnvConfig } from './config-schema';
export {
  GenerationRequestSchema,
  PROMPT_REQUIRED,
  MAX_TOKENS_INVALID,
  TEMPERATURE_INVALID,
  TOP_P_INVALID,
  type GenerationParams,
} from './request-schema';
