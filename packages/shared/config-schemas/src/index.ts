// Constants
export {
  TEMPERATURE_MIN,
  TEMPERATURE_MAX,
  MAX_TOKENS_MIN,
  MAX_TOKENS_MAX,
  DEFAULT_CLASSIFIER_MODEL,
  DEFAULT_CLASSIFIER_TEMPERATURE,
  DEFAULT_CLASSIFIER_MAX_TOKENS,
  DEFAULT_GENERATOR_MODEL,
  DEFAULT_GENERATOR_TEMPERATURE,
  DEFAULT_GENERATOR_MAX_TOKENS,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  RICH_TEXT_DEFAULT,
  INTENTS,
  FALLBACK_INTENT
} from './constants'
export type { LogLevel, Intent, ResponseStyle } from './constants'

// Runtime settings schemas
export {
  IntentSchema,
  ConfidenceSchema,
  ThresholdOverridesSchema,
  RefinementOptionsSchema
} from './runtime-settings.schema'
export type { ThresholdOverrides, RefinementOptions } from './runtime-settings.schema'

// Environment config
export {
  EnvConfigSchema,
  parseEnvConfig,
  getResolvedConfig
} from './env-config.schema'
export type { EnvConfig, ResolvedConfig, CapabilityConfig } from './env-config.schema'
