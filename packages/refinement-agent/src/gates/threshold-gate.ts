import { FALLBACK_INTENT, type Intent } from '@story-refiner/config-schemas'
import type { ClassificationResult } from '@story-refiner/skills-intent'
import { DEFAULT_THRESHOLD } from '../config/intent-thresholds'
import { CLARIFYING_QUESTIONS } from '../prompts/clarifying-questions'
import type { ClarifyingQuestionTable, ThresholdTable } from '../contracts'

export type ThresholdDecision =
  | { action: 'proceed'; threshold: number }
  | { action: 'clarify'; threshold: number; clarifyingQuestion: string }

export interface ThresholdGateTables {
  thresholds: ThresholdTable
  clarifyingQuestions: ClarifyingQuestionTable
}

export const resolveThreshold = (table: ThresholdTable, intent: Intent): number =>
  table[intent] ?? table[FALLBACK_INTENT] ?? DEFAULT_THRESHOLD

export const resolveClarifyingQuestion = (
  table: ClarifyingQuestionTable,
  intent: Intent
): string => table[intent] ?? table[FALLBACK_INTENT] ?? CLARIFYING_QUESTIONS[FALLBACK_INTENT]

/**
 * Only a confidence strictly below the bar asks for clarification; equality proceeds.
 */
export function evaluateThreshold(
  classification: Pick<ClassificationResult, 'primary' | 'confidence'>,
  tables: ThresholdGateTables
): ThresholdDecision {
  const threshold = resolveThreshold(tables.thresholds, classification.primary)

  if (classification.confidence < threshold) {
    return {
      action: 'clarify',
      threshold,
      clarifyingQuestion: resolveClarifyingQuestion(
        tables.clarifyingQuestions,
        classification.primary
      )
    }
  }

  return { action: 'proceed', threshold }
}
