import type { Intent } from '@story-refiner/config-schemas'
import type { Context } from '../contracts'

/**
 * Whether the answer must spell out its assumptions: true for intents that
 * depend on information the question did not mention.
 */
export function needsAssumptions(intent: Intent, context: Context): boolean {
  switch (intent) {
    case 'ACCEPTANCE_CRITERIA':
    case 'DEVELOPMENT_READINESS':
      return !context.ui_related
    case 'FIGMA_ALIGNMENT':
      return !context.mentions_figma
    case 'SCOPE_DEFINITION':
      return !context.mentions_scope
    default:
      return false
  }
}
