import type { ResponseStyle } from '@story-refiner/config-schemas'
import type { DiagnosticLogger } from '@story-refiner/agent-core'

const CONVERSATIONAL_KEYWORDS = [
  'just explain',
  'in simple terms',
  'what is',
  'why',
  'help me understand'
]

const STRUCTURED_KEYWORDS = ['acceptance', 'scope', 'ready', 'criteria', 'list', 'define']

/**
 * Pick how the answer should read.
 *
 * Priority when both keyword sets match: conversational > structured > hybrid
 */
export function detectStyle(question: string, logger?: DiagnosticLogger): ResponseStyle {
  const normalized = question.toLowerCase()
  const includesAny = (keywords: string[]) => keywords.some(keyword => normalized.includes(keyword))

  let style: ResponseStyle
  if (includesAny(CONVERSATIONAL_KEYWORDS)) {
    style = 'CONVERSATIONAL'
  } else if (includesAny(STRUCTURED_KEYWORDS)) {
    style = 'STRUCTURED'
  } else {
    style = 'HYBRID'
  }

  logger?.debug?.(`[style-detector] Detected response style: ${style}`)
  return style
}
