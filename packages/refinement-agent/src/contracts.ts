import type { Intent, ResponseStyle } from '@story-refiner/config-schemas'
import type { ClassificationResult } from '@story-refiner/skills-intent'

export const CONTEXT_SIGNALS = [
  'ui_related',
  'mentions_figma',
  'mentions_scope',
  'mentions_ac',
  'mentions_ready',
  'mentions_edge_cases',
  'mentions_business_rules',
  'has_question_words'
] as const
export type ContextSignal = (typeof CONTEXT_SIGNALS)[number]

/**
 * Boolean signals derived once from the question text.
 */
export type Context = Readonly<Record<ContextSignal, boolean>>

export type ThresholdTable = Partial<Record<Intent, number>>
export type ClarifyingQuestionTable = Partial<Record<Intent, string>>
export type ModePromptTable = Partial<Record<Intent, string>>

export type RefinementState =
  | 'INIT'
  | 'CONTEXT_EXTRACTED'
  | 'STYLE_DETECTED'
  | 'INTENT_CLASSIFIED'
  | 'CLARIFY_TERMINAL'
  | 'ASSUMPTION_GATED'
  | 'PROMPT_COMPOSED'
  | 'RESPONSE_GENERATED'
  | 'SECONDARY_ANNOTATED'
  | 'DONE'
  | 'ERROR'

export type TerminalState = Extract<RefinementState, 'CLARIFY_TERMINAL' | 'DONE' | 'ERROR'>

export interface RefinementResult {
  text: string
  state: TerminalState
  /** Last non-terminal state reached; for ERROR this is where the fault happened. */
  lastState: RefinementState
  context?: Context
  style?: ResponseStyle
  classification?: ClassificationResult
  threshold?: number
  needsAssumptions?: boolean
  prompt?: string
  generationFailed?: boolean
}
