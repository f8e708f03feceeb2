/**
 * Text-in/text-out function supplied from outside the pipeline (an LLM call,
 * a fake in tests). Failure is signalled by throwing or rejecting.
 */
export type TextCapability = (prompt: string) => string | Promise<string>

export * from './logger'
