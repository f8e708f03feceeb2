import { safeLog, type DiagnosticLogger, type TextCapability } from '@story-refiner/agent-core'
import { GENERATION_APOLOGY } from '../prompts/master-prompt'

export type GenerationOutcome =
  | { ok: true; text: string }
  | { ok: false; text: string; error: unknown }

export async function attemptGeneration(
  capability: TextCapability,
  prompt: string,
  logger?: DiagnosticLogger
): Promise<GenerationOutcome> {
  try {
    const text = (await capability(prompt)).trim()
    logger?.info?.('[response-generator] Response generated successfully')
    return { ok: true, text }
  } catch (error) {
    safeLog(logger, 'error', '[response-generator] Response generation failed', error)
    return { ok: false, text: GENERATION_APOLOGY, error }
  }
}

/**
 * Returns the trimmed generated text, or the fixed apology when the
 * capability fails. Never rejects.
 */
export async function generateResponse(
  capability: TextCapability,
  prompt: string,
  logger?: DiagnosticLogger
): Promise<string> {
  const outcome = await attemptGeneration(capability, prompt, logger)
  return outcome.text
}
