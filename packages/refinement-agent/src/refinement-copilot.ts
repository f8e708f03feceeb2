import {
  getResolvedConfig,
  RefinementOptionsSchema,
  type Intent,
  type RefinementOptions
} from '@story-refiner/config-schemas'
import {
  createConsoleLogger,
  safeLog,
  type DiagnosticLogger,
  type TextCapability
} from '@story-refiner/agent-core'
import { IntentClassifierSkill } from '@story-refiner/skills-intent'
import {
  createOpenRouterCapabilities,
  type TextGenerationClient
} from '@story-refiner/openrouter-client'
import { extractContext } from './analyzers/context-extractor'
import { detectStyle } from './analyzers/style-detector'
import { INTENT_THRESHOLDS } from './config/intent-thresholds'
import { evaluateThreshold } from './gates/threshold-gate'
import { needsAssumptions } from './gates/assumption-gate'
import { attemptGeneration } from './generation/response-generator'
import { CLARIFYING_QUESTIONS } from './prompts/clarifying-questions'
import { MASTER_PROMPT, PIPELINE_APOLOGY } from './prompts/master-prompt'
import { MODE_PROMPTS } from './prompts/mode-prompts'
import { composePrompt, resolveModePrompt } from './prompts/prompt-composer'
import { formatForJiraRichText } from './utils/jira-rich-text'
import type {
  RefinementResult,
  RefinementState,
  TerminalState,
  ThresholdTable
} from './contracts'

export interface RefinementCopilotOptions extends RefinementOptions {
  classifier: TextCapability
  generator: TextCapability
  logger?: DiagnosticLogger
}

type RefinementProgress = Omit<RefinementResult, 'text' | 'state' | 'lastState'> & {
  state: RefinementState
}

export const appendSecondaryOffer = (response: string, secondary: readonly Intent[]): string =>
  secondary.length > 0
    ? `${response}\n\nWould you also like help with: ${secondary.join(', ')}?`
    : response

/**
 * Runs a question through context extraction, style detection, intent
 * classification, the threshold and assumption gates, prompt composition and
 * generation. `run` and `refine` never reject; any unexpected fault becomes
 * the pipeline apology.
 */
export class RefinementCopilot {
  private readonly classifier: IntentClassifierSkill
  private readonly generator: TextCapability
  private readonly thresholds: ThresholdTable
  private readonly richText: boolean
  private readonly logger?: DiagnosticLogger

  constructor(options: RefinementCopilotOptions) {
    const settings = RefinementOptionsSchema.parse({
      thresholds: options.thresholds,
      richText: options.richText
    })

    this.logger = options.logger
    this.classifier = new IntentClassifierSkill({
      capability: options.classifier,
      logger: options.logger
    })
    this.generator = options.generator
    this.thresholds = Object.freeze({ ...INTENT_THRESHOLDS, ...(settings.thresholds ?? {}) })
    this.richText = settings.richText ?? false
  }

  async refine(question: string): Promise<string> {
    const result = await this.run(question)
    return result.text
  }

  async run(question: string): Promise<RefinementResult> {
    const progress: RefinementProgress = { state: 'INIT' }

    try {
      return await this.execute(question, progress)
    } catch (error) {
      safeLog(this.logger, 'error', '[refinement-copilot] Pipeline execution failed', {
        state: progress.state,
        error
      })
      return this.finish(progress, 'ERROR', PIPELINE_APOLOGY)
    }
  }

  private async execute(
    question: string,
    progress: RefinementProgress
  ): Promise<RefinementResult> {
    this.logger?.info?.(`[refinement-copilot] Processing question: ${question.slice(0, 100)}`)

    const context = extractContext(question, this.logger)
    progress.context = context
    progress.state = 'CONTEXT_EXTRACTED'

    const style = detectStyle(question, this.logger)
    progress.style = style
    progress.state = 'STYLE_DETECTED'

    const classification = await this.classifier.classify(question)
    progress.classification = classification
    progress.state = 'INTENT_CLASSIFIED'

    const decision = evaluateThreshold(classification, {
      thresholds: this.thresholds,
      clarifyingQuestions: CLARIFYING_QUESTIONS
    })
    progress.threshold = decision.threshold

    if (decision.action === 'clarify') {
      this.logger?.warn?.(
        `[refinement-copilot] Low confidence (${classification.confidence.toFixed(2)}) below threshold (${decision.threshold})`
      )
      return this.finish(progress, 'CLARIFY_TERMINAL', decision.clarifyingQuestion)
    }

    const requireAssumptions = needsAssumptions(classification.primary, context)
    progress.needsAssumptions = requireAssumptions
    progress.state = 'ASSUMPTION_GATED'

    const prompt = composePrompt({
      master: MASTER_PROMPT,
      modeTemplate: resolveModePrompt(MODE_PROMPTS, classification.primary),
      question,
      context,
      style,
      needsAssumptions: requireAssumptions
    })
    progress.prompt = prompt
    progress.state = 'PROMPT_COMPOSED'

    const generation = await attemptGeneration(this.generator, prompt, this.logger)
    progress.state = 'RESPONSE_GENERATED'

    if (!generation.ok) {
      progress.generationFailed = true
      return this.finish(progress, 'DONE', generation.text)
    }

    const answer = this.richText ? formatForJiraRichText(generation.text) : generation.text
    const text = appendSecondaryOffer(answer, classification.secondary)
    progress.state = 'SECONDARY_ANNOTATED'

    this.logger?.info?.('[refinement-copilot] Successfully generated response')
    return this.finish(progress, 'DONE', text)
  }

  private finish(
    progress: RefinementProgress,
    state: TerminalState,
    text: string
  ): RefinementResult {
    const { state: lastState, ...details } = progress
    return { ...details, text, state, lastState }
  }
}

export const refineQuestion = (
  classifier: TextCapability,
  generator: TextCapability,
  question: string,
  options: Omit<RefinementCopilotOptions, 'classifier' | 'generator'> = {}
): Promise<string> =>
  new RefinementCopilot({ ...options, classifier, generator }).refine(question)

/**
 * Wire a copilot to OpenRouter using environment configuration.
 */
export const createRefinementCopilotFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  client?: TextGenerationClient
): RefinementCopilot => {
  const config = getResolvedConfig(env)
  const { classifier, generator } = createOpenRouterCapabilities(config, client)

  return new RefinementCopilot({
    classifier,
    generator,
    richText: config.runtime.richText,
    logger: createConsoleLogger(config.runtime.logLevel)
  })
}
