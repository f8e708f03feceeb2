import type { TextCapability } from '@story-refiner/agent-core'
import { CONTEXT_SIGNALS, type Context, type ContextSignal } from '../src/contracts'

export const makeContext = (signals: Partial<Record<ContextSignal, boolean>> = {}): Context => {
  const context: Record<ContextSignal, boolean> = {
    ui_related: false,
    mentions_figma: false,
    mentions_scope: false,
    mentions_ac: false,
    mentions_ready: false,
    mentions_edge_cases: false,
    mentions_business_rules: false,
    has_question_words: false
  }
  CONTEXT_SIGNALS.forEach(signal => {
    context[signal] = signals[signal] ?? false
  })
  return Object.freeze(context)
}

export const classifierReturning = (payload: Record<string, unknown>): TextCapability =>
  async () => JSON.stringify(payload)

export class RecordingGenerator {
  public readonly prompts: string[] = []

  constructor(private readonly reply: string | Error) {}

  readonly invoke = async (prompt: string): Promise<string> => {
    this.prompts.push(prompt)
    if (this.reply instanceof Error) {
      throw this.reply
    }
    return this.reply
  }
}
