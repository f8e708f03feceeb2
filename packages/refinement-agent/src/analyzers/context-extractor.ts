import type { DiagnosticLogger } from '@story-refiner/agent-core'
import type { Context, ContextSignal } from '../contracts'

export const SIGNAL_KEYWORDS: Readonly<Record<ContextSignal, readonly string[]>> = Object.freeze({
  ui_related: ['button', 'screen', 'click', 'field', 'page', 'form', 'input', 'modal', 'popup'],
  mentions_figma: ['figma', 'mockup', 'design mockup', 'ui design'],
  mentions_scope: ['scope', 'in-scope', 'out of scope'],
  mentions_ac: ['acceptance', 'ac', 'criteria'],
  mentions_ready: ['ready', 'sprint', 'development'],
  mentions_edge_cases: ['edge', 'risk', 'error', 'failure', 'exception'],
  mentions_business_rules: ['rule', 'validation', 'condition', 'if then', 'if-then'],
  has_question_words: ['what', 'why', 'how', 'when', 'where', 'who']
})

/**
 * Derive the boolean context signals for a question. Matching is a
 * case-insensitive substring test, so flags are independent of each other.
 */
export function extractContext(question: string, logger?: DiagnosticLogger): Context {
  const normalized = question.toLowerCase()
  const matches = (signal: ContextSignal): boolean =>
    SIGNAL_KEYWORDS[signal].some(keyword => normalized.includes(keyword))

  const context: Context = Object.freeze({
    ui_related: matches('ui_related'),
    mentions_figma: matches('mentions_figma'),
    mentions_scope: matches('mentions_scope'),
    mentions_ac: matches('mentions_ac'),
    mentions_ready: matches('mentions_ready'),
    mentions_edge_cases: matches('mentions_edge_cases'),
    mentions_business_rules: matches('mentions_business_rules'),
    has_question_words: matches('has_question_words')
  })

  logger?.debug?.('[context-extractor] Extracted context', context)

  return context
}
