import test from 'node:test'
import assert from 'node:assert/strict'

import {
  IntentClassifierSkill,
  classifyIntent,
  type ClassificationResult
} from '../src/index'

class FakeCapability {
  public readonly prompts: string[] = []

  constructor(private readonly response: string | Error) {}

  readonly invoke = async (prompt: string): Promise<string> => {
    this.prompts.push(prompt)
    if (this.response instanceof Error) {
      throw this.response
    }
    return this.response
  }
}

const fallback = (confidence: number, outcome: ClassificationResult['outcome']): ClassificationResult => ({
  primary: 'STORY_REFINEMENT',
  secondary: [],
  confidence,
  outcome
})

test('intent classifier returns the parsed classification', async () => {
  const question = 'What is the objective of the forgot password submit button?'
  const capability = new FakeCapability(
    '{"primary_intent":"OBJECTIVE_INTENT","secondary_intents":[],"confidence":0.9}'
  )

  const result = await classifyIntent(capability.invoke, question)

  assert.deepEqual(result, {
    primary: 'OBJECTIVE_INTENT',
    secondary: [],
    confidence: 0.9,
    outcome: 'classified'
  })
  assert.equal(capability.prompts.length, 1)
  assert.ok(capability.prompts[0]?.includes(`User Question:\n${question}`))
  assert.ok(capability.prompts[0]?.includes('DEVELOPMENT_READINESS'))
})

test('secondary intents keep generation order and duplicates', async () => {
  const capability = new FakeCapability(
    JSON.stringify({
      primary_intent: 'ACCEPTANCE_CRITERIA',
      secondary_intents: ['SCOPE_DEFINITION', 'BUSINESS_RULE', 'SCOPE_DEFINITION'],
      confidence: 0.8
    })
  )

  const result = await classifyIntent(capability.invoke, 'List the acceptance criteria')

  assert.deepEqual(result.secondary, ['SCOPE_DEFINITION', 'BUSINESS_RULE', 'SCOPE_DEFINITION'])
})

test('unparseable output degrades to story refinement at 0.4', async () => {
  const capability = new FakeCapability('Not valid JSON')

  const result = await classifyIntent(capability.invoke, 'What is the objective?')

  assert.deepEqual(result, fallback(0.4, 'parse-failure'))
})

test('capability failures degrade to story refinement at 0.3', async (t) => {
  await t.test('rejected promise', async () => {
    const capability = new FakeCapability(new Error('model unavailable'))
    const result = await classifyIntent(capability.invoke, 'What is the objective?')
    assert.deepEqual(result, fallback(0.3, 'capability-failure'))
  })

  await t.test('synchronous throw', async () => {
    const result = await classifyIntent(() => {
      throw new Error('socket closed')
    }, 'What is the objective?')
    assert.deepEqual(result, fallback(0.3, 'capability-failure'))
  })
})

test('absent fields fall back to defaults', async (t) => {
  await t.test('empty object', async () => {
    const result = await classifyIntent(new FakeCapability('{}').invoke, 'Refine this story')
    assert.deepEqual(result, {
      primary: 'STORY_REFINEMENT',
      secondary: [],
      confidence: 0.5,
      outcome: 'classified'
    })
  })

  await t.test('only primary intent', async () => {
    const result = await classifyIntent(
      new FakeCapability('{"primary_intent":"BUSINESS_RULE"}').invoke,
      'What validation rules apply?'
    )
    assert.equal(result.primary, 'BUSINESS_RULE')
    assert.deepEqual(result.secondary, [])
    assert.equal(result.confidence, 0.5)
  })
})

test('accepts fenced JSON, loose intent casing and extra fields', async () => {
  const capability = new FakeCapability(
    [
      '```json',
      '{"primary_intent":" figma_alignment ","secondary_intents":["ui_ux_behaviour"],"confidence":0.8,"rationale":"mentions Figma"}',
      '```'
    ].join('\n')
  )

  const result = await classifyIntent(capability.invoke, 'Does the submit button match the Figma design?')

  assert.deepEqual(result, {
    primary: 'FIGMA_ALIGNMENT',
    secondary: ['UI_UX_BEHAVIOUR'],
    confidence: 0.8,
    outcome: 'classified'
  })
})

test('malformed recognized fields fail closed', async () => {
  const malformed = [
    '{"primary_intent":"SMALL_TALK","confidence":0.9}',
    '{"primary_intent":"SCOPE_DEFINITION","confidence":"0.9"}',
    '{"primary_intent":"SCOPE_DEFINITION","confidence":1.5}',
    '{"primary_intent":null,"confidence":0.9}',
    '{"primary_intent":"SCOPE_DEFINITION","secondary_intents":"BUSINESS_RULE"}',
    '["SCOPE_DEFINITION"]',
    '0.9'
  ]

  for (const response of malformed) {
    const result = await classifyIntent(new FakeCapability(response).invoke, 'Define the scope')
    assert.deepEqual(result, fallback(0.4, 'parse-failure'), `Expected parse failure for: ${response}`)
  }
})

test('reports failures to the injected logger', async () => {
  const errors: unknown[][] = []
  const skill = new IntentClassifierSkill({
    capability: new FakeCapability(new Error('model unavailable')).invoke,
    logger: { error: (...args) => errors.push(args) }
  })

  await skill.classify('What is the objective?')

  assert.equal(errors.length, 1)
  assert.equal(errors[0]?.[0], '[intent-classifier] classification capability failed')
})

test('keeps degraded results when the logger itself throws', async (t) => {
  const closedSink = {
    error: () => {
      throw new Error('sink closed')
    }
  }

  await t.test('capability failure', async () => {
    const skill = new IntentClassifierSkill({
      capability: new FakeCapability(new Error('model unavailable')).invoke,
      logger: closedSink
    })
    assert.deepEqual(await skill.classify('What is the objective?'), fallback(0.3, 'capability-failure'))
  })

  await t.test('parse failure', async () => {
    const skill = new IntentClassifierSkill({
      capability: new FakeCapability('Not valid JSON').invoke,
      logger: closedSink
    })
    assert.deepEqual(await skill.classify('What is the objective?'), fallback(0.4, 'parse-failure'))
  })
})

test('uses a custom prompt template when provided', async () => {
  const capability = new FakeCapability('{"primary_intent":"DEPENDENCY_IMPACT","confidence":0.7}')
  const skill = new IntentClassifierSkill({
    capability: capability.invoke,
    promptTemplate: question => `classify: ${question}`
  })

  const result = await skill.classify('Which APIs are affected?')

  assert.equal(result.primary, 'DEPENDENCY_IMPACT')
  assert.deepEqual(capability.prompts, ['classify: Which APIs are affected?'])
})
