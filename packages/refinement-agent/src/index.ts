export {
  RefinementCopilot,
  refineQuestion,
  createRefinementCopilotFromEnv,
  appendSecondaryOffer
} from './refinement-copilot'
export type { RefinementCopilotOptions } from './refinement-copilot'

export { extractContext, SIGNAL_KEYWORDS } from './analyzers/context-extractor'
export { detectStyle } from './analyzers/style-detector'

export {
  evaluateThreshold,
  resolveThreshold,
  resolveClarifyingQuestion
} from './gates/threshold-gate'
export type { ThresholdDecision, ThresholdGateTables } from './gates/threshold-gate'
export { needsAssumptions } from './gates/assumption-gate'

export {
  composePrompt,
  buildPromptSections,
  renderPromptSections,
  buildWarnings,
  resolveModePrompt,
  ASSUMPTION_INSTRUCTION,
  FIGMA_EMPHASIS,
  UI_FIGMA_SUGGESTION,
  EDGE_CASE_EMPHASIS
} from './prompts/prompt-composer'
export type { PromptSection, PromptSectionName, PromptComposerInput } from './prompts/prompt-composer'

export { generateResponse, attemptGeneration } from './generation/response-generator'
export type { GenerationOutcome } from './generation/response-generator'

export { formatForJiraRichText } from './utils/jira-rich-text'

export { INTENT_THRESHOLDS, DEFAULT_THRESHOLD } from './config/intent-thresholds'
export { CLARIFYING_QUESTIONS } from './prompts/clarifying-questions'
export { MODE_PROMPTS } from './prompts/mode-prompts'
export { MASTER_PROMPT, GENERATION_APOLOGY, PIPELINE_APOLOGY } from './prompts/master-prompt'

export { CONTEXT_SIGNALS } from './contracts'
export type {
  Context,
  ContextSignal,
  ThresholdTable,
  ClarifyingQuestionTable,
  ModePromptTable,
  RefinementState,
  TerminalState,
  RefinementResult
} from './contracts'
