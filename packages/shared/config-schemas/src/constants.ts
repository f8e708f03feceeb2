/**
 * Default configuration values and limits for the refinement copilot
 */

export const TEMPERATURE_MIN = 0
export const TEMPERATURE_MAX = 2

export const MAX_TOKENS_MIN = 1
export const MAX_TOKENS_MAX = 200000

export const DEFAULT_CLASSIFIER_MODEL = 'openai/gpt-4o-mini'
export const DEFAULT_CLASSIFIER_TEMPERATURE = 0
export const DEFAULT_CLASSIFIER_MAX_TOKENS = 300

export const DEFAULT_GENERATOR_MODEL = 'anthropic/claude-3-5-sonnet'
export const DEFAULT_GENERATOR_TEMPERATURE = 0.3
export const DEFAULT_GENERATOR_MAX_TOKENS = 2000

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'

export const RICH_TEXT_DEFAULT = false

/**
 * Closed set of refinement intents a question can be classified into.
 */
export const INTENTS = [
  'OBJECTIVE_INTENT',
  'SCOPE_DEFINITION',
  'ACCEPTANCE_CRITERIA',
  'UI_UX_BEHAVIOUR',
  'FIGMA_ALIGNMENT',
  'EDGE_CASE_RISK_ANALYSIS',
  'BUSINESS_RULE',
  'DEPENDENCY_IMPACT',
  'STORY_REFINEMENT',
  'DEVELOPMENT_READINESS'
] as const
export type Intent = (typeof INTENTS)[number]

/** Used whenever an intent is missing, unparseable or absent from a table. */
export const FALLBACK_INTENT: Intent = 'STORY_REFINEMENT'

const RESPONSE_STYLES = ['CONVERSATIONAL', 'STRUCTURED', 'HYBRID'] as const
export type ResponseStyle = (typeof RESPONSE_STYLES)[number]
