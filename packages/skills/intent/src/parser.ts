import { z } from 'zod'
import { ConfidenceSchema, IntentSchema } from '@story-refiner/config-schemas'

const IntentNameSchema = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  IntentSchema
)

/**
 * Recognized classifier fields. Absent fields are allowed and defaulted later;
 * present fields must be well formed or the whole payload is rejected.
 */
export const CLASSIFICATION_SCHEMA = z.object({
  primary_intent: IntentNameSchema.optional(),
  secondary_intents: z.array(IntentNameSchema).optional(),
  confidence: ConfidenceSchema.optional()
})
export type RawClassification = z.infer<typeof CLASSIFICATION_SCHEMA>

export type ClassificationParseResult =
  | { success: true; data: RawClassification }
  | { success: false; reason: string }

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i

const unwrapCodeFence = (text: string): string => {
  const trimmed = text.trim()
  const match = CODE_FENCE.exec(trimmed)
  return match?.[1] ?? trimmed
}

export const parseClassification = (text: string): ClassificationParseResult => {
  let payload: unknown
  try {
    payload = JSON.parse(unwrapCodeFence(text))
  } catch (error) {
    return {
      success: false,
      reason: error instanceof Error ? error.message : String(error)
    }
  }

  const parsed = CLASSIFICATION_SCHEMA.safeParse(payload)
  if (!parsed.success) {
    return {
      success: false,
      reason: parsed.error.issues
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')
    }
  }

  return { success: true, data: parsed.data }
}
