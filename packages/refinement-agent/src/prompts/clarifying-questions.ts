import type { Intent } from '@story-refiner/config-schemas'

const question = (lead: string, ...points: string[]): string =>
  [lead, ...points.map(point => `- ${point}`)].join('\n')

/**
 * Returned verbatim when classification confidence falls below the intent's threshold.
 */
export const CLARIFYING_QUESTIONS: Readonly<Record<Intent, string>> = Object.freeze({
  OBJECTIVE_INTENT: question(
    'I need a bit more clarity. Could you specify:',
    'What business goal does this feature support?',
    'Who are the primary users?',
    'What problem does this solve?'
  ),
  SCOPE_DEFINITION: question(
    'To define the scope clearly, please clarify:',
    'What functionality is included?',
    'What is explicitly out of scope?',
    'Are there any phase requirements?'
  ),
  ACCEPTANCE_CRITERIA: question(
    'To create clear acceptance criteria, I need:',
    'What are the specific conditions to be met?',
    'What are the expected outcomes?',
    'Are there UI/UX or data validation requirements?'
  ),
  UI_UX_BEHAVIOUR: question(
    'For UI/UX behavior, please specify:',
    'What user actions trigger this behavior?',
    'What visual feedback should users see?',
    'Are there error or loading states?'
  ),
  FIGMA_ALIGNMENT: question(
    'To ensure Figma alignment, I need:',
    'Which Figma design/mockup should be referenced?',
    'Are there specific components or flows to validate?',
    'Are there any design system requirements?'
  ),
  EDGE_CASE_RISK_ANALYSIS: question(
    'For edge case analysis, help me understand:',
    'What are the expected normal conditions?',
    'What unusual inputs or scenarios concern you?',
    'Are there integration or data quality risks?'
  ),
  BUSINESS_RULE: question(
    'To extract business rules clearly:',
    'What conditions must be met?',
    'What are the validation requirements?',
    'Are there any exceptions or special cases?'
  ),
  DEPENDENCY_IMPACT: question(
    'To identify dependencies, clarify:',
    'What other systems or features are affected?',
    'Are there API or data dependencies?',
    "What's the impact on existing functionality?"
  ),
  STORY_REFINEMENT: question(
    'To refine this story, I need more context:',
    'What aspect needs refinement (clarity, completeness, readiness)?',
    'Are there specific concerns or gaps?',
    'What level of detail is needed?'
  ),
  DEVELOPMENT_READINESS: question(
    'To assess development readiness:',
    'Have all dependencies been identified?',
    'Are acceptance criteria defined?',
    'Are there any open questions or blockers?'
  )
})
