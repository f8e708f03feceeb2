import { z } from 'zod'
import { INTENTS } from './constants'

export const IntentSchema = z.enum(INTENTS)

export const ConfidenceSchema = z.number().min(0).max(1)

/**
 * Per-intent confidence bars; any intent left out keeps its default
 */
export const ThresholdOverridesSchema = z.record(IntentSchema, ConfidenceSchema)
export type ThresholdOverrides = z.infer<typeof ThresholdOverridesSchema>

/**
 * Runtime options accepted by the refinement copilot - all fields optional
 */
export const RefinementOptionsSchema = z.object({
  thresholds: ThresholdOverridesSchema.optional(),
  richText: z.boolean().optional()
})
export type RefinementOptions = z.infer<typeof RefinementOptionsSchema>
