import type { Intent } from '@story-refiner/config-schemas'

/**
 * Intent-specific task instructions placed under the `Task:` heading.
 */
export const MODE_PROMPTS: Readonly<Record<Intent, string>> = Object.freeze({
  OBJECTIVE_INTENT: `Explain the objective and business purpose.
Focus on: WHY this feature exists, WHO benefits, and WHAT problem it solves.`,

  SCOPE_DEFINITION: `Define in-scope and out-of-scope items.
Structure: IN SCOPE (what's included), OUT OF SCOPE (what's excluded), ASSUMPTIONS (what's assumed but unconfirmed).`,

  ACCEPTANCE_CRITERIA: `Generate clear Given/When/Then acceptance criteria.

Template:
- GIVEN [precondition/context]
- WHEN [action/trigger]
- THEN [expected outcome]

Example:
- GIVEN a user is on the login page
- WHEN they enter valid credentials and click 'Login'
- THEN they should be redirected to the dashboard`,

  UI_UX_BEHAVIOUR: `Describe expected UI behaviour and states.
Include: Default state, Loading state, Success state, Error state, Edge cases (empty, disabled, etc.)`,

  FIGMA_ALIGNMENT: `List Figma design checks for alignment.
Verify: Component spacing, Typography, Colors, Icons, Interaction states (hover, active, disabled), Responsive behavior`,

  EDGE_CASE_RISK_ANALYSIS: `Identify edge cases and risks.
Consider: Invalid inputs, Boundary conditions, System failures, Integration issues, Performance constraints, Security vulnerabilities`,

  BUSINESS_RULE: `Extract business rules.
Format: IF [condition] THEN [action/outcome] ELSE [alternative]`,

  DEPENDENCY_IMPACT: `Identify dependencies and impacts.
Categories: System dependencies, Data dependencies, Feature dependencies, API dependencies, Impact on existing features`,

  STORY_REFINEMENT: `Improve clarity and readiness of the requirement.
Check: Clear objective, Defined scope, Acceptance criteria, Dependencies identified, Assumptions documented`,

  DEVELOPMENT_READINESS: `Assess if ready for development and list gaps.
Checklist: ✓/✗ Clear requirements, ✓/✗ Acceptance criteria defined, ✓/✗ Dependencies identified, ✓/✗ Designs available, ✓/✗ Technical approach agreed`
})
