import type { Intent } from '@story-refiner/config-schemas'

/** Used when neither the intent nor the fallback intent has a threshold. */
export const DEFAULT_THRESHOLD = 0.6

/**
 * Minimum classifier confidence before the copilot answers instead of asking
 * a clarifying question.
 */
export const INTENT_THRESHOLDS: Readonly<Record<Intent, number>> = Object.freeze({
  OBJECTIVE_INTENT: 0.7,
  SCOPE_DEFINITION: 0.65,
  ACCEPTANCE_CRITERIA: 0.6,
  UI_UX_BEHAVIOUR: 0.6,
  FIGMA_ALIGNMENT: 0.65,
  // nuanced analysis tolerates lower certainty
  EDGE_CASE_RISK_ANALYSIS: 0.5,
  BUSINESS_RULE: 0.6,
  DEPENDENCY_IMPACT: 0.55,
  STORY_REFINEMENT: 0.5,
  DEVELOPMENT_READINESS: 0.6
})
