import test from 'node:test'
import assert from 'node:assert/strict'

import { attemptGeneration, generateResponse } from '../src/generation/response-generator'
import { GENERATION_APOLOGY } from '../src/prompts/master-prompt'
import { formatForJiraRichText } from '../src/utils/jira-rich-text'

test('generateResponse', async (t) => {
  await t.test('returns the trimmed capability text', async () => {
    const prompts: string[] = []
    const text = await generateResponse(async prompt => {
      prompts.push(prompt)
      return '  answer \n'
    }, 'PROMPT')
    assert.equal(text, 'answer')
    assert.deepEqual(prompts, ['PROMPT'])
  })

  await t.test('accepts a synchronous capability', async () => {
    assert.equal(await generateResponse(() => 'sync answer', 'PROMPT'), 'sync answer')
  })

  await t.test('returns the apology when the capability rejects', async () => {
    const errors: unknown[][] = []
    const failure = new Error('quota exceeded')
    const text = await generateResponse(
      async () => {
        throw failure
      },
      'PROMPT',
      { error: (...args) => errors.push(args) }
    )
    assert.equal(text, GENERATION_APOLOGY)
    assert.deepEqual(errors, [['[response-generator] Response generation failed', failure]])
  })
})

test('generateResponse returns the apology when the logger throws too', async () => {
  const text = await generateResponse(
    async () => {
      throw new Error('quota exceeded')
    },
    'PROMPT',
    {
      error: () => {
        throw new Error('sink closed')
      }
    }
  )
  assert.equal(text, GENERATION_APOLOGY)
})

test('attemptGeneration reports the outcome', async () => {
  assert.deepEqual(await attemptGeneration(() => 'ok ', 'PROMPT'), { ok: true, text: 'ok' })

  const failure = new Error('timeout')
  const outcome = await attemptGeneration(() => {
    throw failure
  }, 'PROMPT')
  assert.deepEqual(outcome, { ok: false, text: GENERATION_APOLOGY, error: failure })
})

test('formatForJiraRichText', async (t) => {
  await t.test('flattens headings, keeps bullets and merges paragraphs', () => {
    const input = 'Intro line one\nline two\n\n1. **Scope**:\n- item A\n- item B\n\nClosing   words'
    assert.equal(
      formatForJiraRichText(input),
      'Intro line one line two\nScope:\n- item A\n- item B\nClosing words'
    )
  })

  await t.test('drops carriage returns and text after a heading colon', () => {
    assert.equal(
      formatForJiraRichText('2. Risks: none identified\r\n- timeout on save\r\n'),
      'Risks:\n- timeout on save'
    )
  })

  await t.test('returns an empty string for blank input', () => {
    assert.equal(formatForJiraRichText('  \n \n'), '')
  })
})
