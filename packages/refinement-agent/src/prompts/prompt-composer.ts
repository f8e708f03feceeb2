import { FALLBACK_INTENT, type Intent, type ResponseStyle } from '@story-refiner/config-schemas'
import { CONTEXT_SIGNALS, type Context, type ModePromptTable } from '../contracts'
import { MODE_PROMPTS } from './mode-prompts'

export const ASSUMPTION_INSTRUCTION = `If information is missing:
- List assumptions explicitly
- Ask clarification questions`

export const FIGMA_EMPHASIS =
  '⚠️ IMPORTANT: User mentioned Figma. Emphasize design alignment checks and verify against Figma mockups.'
export const UI_FIGMA_SUGGESTION =
  '⚠️ NOTE: This is UI-related. Consider suggesting Figma validation if designs exist.'
export const EDGE_CASE_EMPHASIS =
  '⚠️ FOCUS: User is concerned about edge cases. Provide comprehensive risk analysis.'

export type PromptSectionName =
  | 'master'
  | 'style'
  | 'task'
  | 'assumptions'
  | 'warnings'
  | 'context'
  | 'question'

export interface PromptSection {
  name: PromptSectionName
  body: string
}

export interface PromptComposerInput {
  master: string
  modeTemplate: string
  question: string
  context: Context
  style: ResponseStyle
  needsAssumptions: boolean
}

export const resolveModePrompt = (table: ModePromptTable, intent: Intent): string =>
  table[intent] ?? table[FALLBACK_INTENT] ?? MODE_PROMPTS[FALLBACK_INTENT]

/**
 * Figma emphasis and the UI suggestion are mutually exclusive; the edge-case
 * block is independent of both.
 */
export const buildWarnings = (context: Context): string[] => {
  const warnings: string[] = []

  if (context.mentions_figma) {
    warnings.push(FIGMA_EMPHASIS)
  } else if (context.ui_related) {
    warnings.push(UI_FIGMA_SUGGESTION)
  }

  if (context.mentions_edge_cases) {
    warnings.push(EDGE_CASE_EMPHASIS)
  }

  return warnings
}

const formatContext = (context: Context): string =>
  CONTEXT_SIGNALS.map(signal => `- ${signal}: ${context[signal]}`).join('\n')

/**
 * Named sections in render order. Optional sections are left out entirely
 * rather than rendered empty.
 */
export function buildPromptSections(input: PromptComposerInput): PromptSection[] {
  const sections: PromptSection[] = [
    { name: 'master', body: input.master.trim() },
    { name: 'style', body: `Response Style: ${input.style}` },
    { name: 'task', body: `Task:\n${input.modeTemplate}` }
  ]

  if (input.needsAssumptions) {
    sections.push({ name: 'assumptions', body: ASSUMPTION_INSTRUCTION })
  }

  const warnings = buildWarnings(input.context)
  if (warnings.length > 0) {
    sections.push({ name: 'warnings', body: warnings.join('\n') })
  }

  sections.push(
    { name: 'context', body: `Context Extracted:\n${formatContext(input.context)}` },
    { name: 'question', body: `User Question:\n${input.question}` }
  )

  return sections
}

export const renderPromptSections = (sections: PromptSection[]): string =>
  sections.map(section => section.body).join('\n\n')

export const composePrompt = (input: PromptComposerInput): string =>
  renderPromptSections(buildPromptSections(input))
