import { INTENTS } from '@story-refiner/config-schemas'

export const buildIntentPrompt = (question: string): string => `
You are an intent classifier for a Jira Refinement Copilot.

Identify:
- Primary intent
- Secondary intents (if any)
- Confidence score (0.0 to 1.0)

Possible intents:
${INTENTS.join('\n')}

Return JSON ONLY, with exactly these fields:
- primary_intent: one of the possible intents
- secondary_intents: list of other possible intents that also apply, most relevant first (may be empty)
- confidence: number between 0 and 1 for the primary intent

User Question:
${question}
`
