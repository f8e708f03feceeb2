import { FALLBACK_INTENT, type Intent } from '@story-refiner/config-schemas'
import { safeLog, type DiagnosticLogger, type TextCapability } from '@story-refiner/agent-core'
import { buildIntentPrompt } from './prompt'
import { parseClassification } from './parser'

export type ClassificationOutcome = 'classified' | 'parse-failure' | 'capability-failure'

export interface ClassificationResult {
  primary: Intent
  /** Generation order is preserved; duplicates are kept. */
  secondary: Intent[]
  confidence: number
  outcome: ClassificationOutcome
}

export interface IntentClassifierSkillOptions {
  capability: TextCapability
  promptTemplate?: (question: string) => string
  logger?: DiagnosticLogger
}

export const DEFAULT_CONFIDENCE = 0.5
export const PARSE_FAILURE_CONFIDENCE = 0.4
export const CAPABILITY_FAILURE_CONFIDENCE = 0.3

const degradedResult = (outcome: Exclude<ClassificationOutcome, 'classified'>): ClassificationResult => ({
  primary: FALLBACK_INTENT,
  secondary: [],
  confidence:
    outcome === 'parse-failure' ? PARSE_FAILURE_CONFIDENCE : CAPABILITY_FAILURE_CONFIDENCE,
  outcome
})

export class IntentClassifierSkill {
  private readonly capability: TextCapability
  private readonly promptTemplate: (question: string) => string
  private readonly logger?: DiagnosticLogger

  constructor(options: IntentClassifierSkillOptions) {
    this.capability = options.capability
    this.promptTemplate = options.promptTemplate ?? buildIntentPrompt
    this.logger = options.logger
  }

  /**
   * Never rejects: capability errors and malformed output degrade to the
   * fallback intent with a confidence that identifies the failure mode.
   */
  async classify(question: string): Promise<ClassificationResult> {
    const prompt = this.promptTemplate(question)

    let raw: string
    try {
      raw = await this.capability(prompt)
    } catch (error) {
      safeLog(this.logger, 'error', '[intent-classifier] classification capability failed', error)
      return degradedResult('capability-failure')
    }

    const parsed = parseClassification(raw)
    if (!parsed.success) {
      safeLog(this.logger, 'error', '[intent-classifier] failed to parse classifier output', {
        reason: parsed.reason,
        preview: raw.slice(0, 200)
      })
      return degradedResult('parse-failure')
    }

    const result: ClassificationResult = {
      primary: parsed.data.primary_intent ?? FALLBACK_INTENT,
      secondary: parsed.data.secondary_intents ?? [],
      confidence: parsed.data.confidence ?? DEFAULT_CONFIDENCE,
      outcome: 'classified'
    }

    this.logger?.info?.(
      `[intent-classifier] Intent classified: ${result.primary} (confidence: ${result.confidence.toFixed(2)})`,
      { secondary: result.secondary }
    )

    return result
  }
}

export const classifyIntent = (
  capability: TextCapability,
  question: string,
  options: Omit<IntentClassifierSkillOptions, 'capability'> = {}
): Promise<ClassificationResult> =>
  new IntentClassifierSkill({ ...options, capability }).classify(question)

export { buildIntentPrompt } from './prompt'
export { parseClassification, CLASSIFICATION_SCHEMA } from './parser'
export type { ClassificationParseResult, RawClassification } from './parser'
