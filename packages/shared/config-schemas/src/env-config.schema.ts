import { z } from 'zod'
import {
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
  type LogLevel
} from './constants'

/**
 * Transform string to number, returning undefined if invalid
 */
const toNumber = z.string().transform((val) => {
  const num = Number(val)
  return Number.isFinite(num) ? num : undefined
})

/**
 * Transform string to boolean
 */
const toBoolean = z.string().transform((val) => {
  if (val === 'true') return true
  if (val === 'false') return false
  return undefined
})

const temperature = (fallback: number) =>
  toNumber
    .pipe(z.number().min(TEMPERATURE_MIN).max(TEMPERATURE_MAX).optional())
    .default(String(fallback))

const maxTokens = (fallback: number) =>
  toNumber
    .pipe(z.number().int().min(MAX_TOKENS_MIN).max(MAX_TOKENS_MAX).optional())
    .default(String(fallback))

/**
 * Environment configuration schema with transforms
 * Used to parse and validate environment variables
 */
export const EnvConfigSchema = z.object({
  OPENROUTER_API_KEY: z.string().optional(),

  // Intent classification capability
  CLASSIFIER_MODEL: z.string().min(1).default(DEFAULT_CLASSIFIER_MODEL),
  CLASSIFIER_TEMPERATURE: temperature(DEFAULT_CLASSIFIER_TEMPERATURE),
  CLASSIFIER_MAX_TOKENS: maxTokens(DEFAULT_CLASSIFIER_MAX_TOKENS),

  // Answer generation capability
  GENERATOR_MODEL: z.string().min(1).default(DEFAULT_GENERATOR_MODEL),
  GENERATOR_TEMPERATURE: temperature(DEFAULT_GENERATOR_TEMPERATURE),
  GENERATOR_MAX_TOKENS: maxTokens(DEFAULT_GENERATOR_MAX_TOKENS),

  RICH_TEXT_ENABLED: toBoolean.pipe(z.boolean().optional()).default(String(RICH_TEXT_DEFAULT)),
  LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL)
})
export type EnvConfig = z.infer<typeof EnvConfigSchema>

/**
 * Parse environment variables into typed config
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvConfigSchema.parse(env)
}

export interface CapabilityConfig {
  model: string
  temperature: number
  maxTokens: number
}

/**
 * Resolved configuration after applying env vars and defaults
 */
export interface ResolvedConfig {
  apiKeys: {
    openRouter?: string
  }
  classifier: CapabilityConfig
  generator: CapabilityConfig
  runtime: {
    richText: boolean
    logLevel: LogLevel
  }
}

/**
 * Get resolved configuration from environment
 */
export function getResolvedConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const parsed = parseEnvConfig(env)

  return {
    apiKeys: {
      openRouter: parsed.OPENROUTER_API_KEY
    },
    classifier: {
      model: parsed.CLASSIFIER_MODEL,
      temperature: parsed.CLASSIFIER_TEMPERATURE ?? DEFAULT_CLASSIFIER_TEMPERATURE,
      maxTokens: parsed.CLASSIFIER_MAX_TOKENS ?? DEFAULT_CLASSIFIER_MAX_TOKENS
    },
    generator: {
      model: parsed.GENERATOR_MODEL,
      temperature: parsed.GENERATOR_TEMPERATURE ?? DEFAULT_GENERATOR_TEMPERATURE,
      maxTokens: parsed.GENERATOR_MAX_TOKENS ?? DEFAULT_GENERATOR_MAX_TOKENS
    },
    runtime: {
      richText: parsed.RICH_TEXT_ENABLED ?? RICH_TEXT_DEFAULT,
      logLevel: parsed.LOG_LEVEL
    }
  }
}
