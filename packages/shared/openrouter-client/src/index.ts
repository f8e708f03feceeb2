import { createOpenRouter } from '@openrouter/ai-sdk-provider'
import { generateText } from 'ai'
import type { TextCapability } from '@story-refiner/agent-core'
import type { CapabilityConfig, ResolvedConfig } from '@story-refiner/config-schemas'

export interface GenerateTextParams {
  model: string
  prompt: string
  temperature?: number
  maxTokens?: number
}

/**
 * OpenRouter client for plain text generation
 */
export class OpenRouterClient {
  private readonly provider: ReturnType<typeof createOpenRouter>

  /**
   * @param apiKey - Optional API key, defaults to environment variable
   */
  constructor(apiKey?: string) {
    this.provider = createOpenRouter({
      apiKey: apiKey || process.env.OPENROUTER_API_KEY || '',
      baseURL: 'https://openrouter.ai/api/v1'
    })
  }

  getModel(modelName: string) {
    return this.provider(modelName)
  }

  async generateText(params: GenerateTextParams): Promise<string> {
    const { text } = await generateText({
      model: this.getModel(params.model),
      prompt: params.prompt,
      temperature: params.temperature ?? 0.7,
      maxTokens: params.maxTokens ?? 2000
    })

    return text
  }
}

export type TextGenerationClient = Pick<OpenRouterClient, 'generateText'>

export interface OpenRouterCapabilities {
  classifier: TextCapability
  generator: TextCapability
}

const bindCapability = (
  client: TextGenerationClient,
  settings: CapabilityConfig
): TextCapability => prompt =>
  client.generateText({
    model: settings.model,
    prompt,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens
  })

/**
 * Build the classifier and generator capabilities from resolved configuration.
 * Errors from the provider propagate to the caller unchanged.
 */
export const createOpenRouterCapabilities = (
  config: ResolvedConfig,
  client: TextGenerationClient = new OpenRouterClient(config.apiKeys.openRouter)
): OpenRouterCapabilities => ({
  classifier: bindCapability(client, config.classifier),
  generator: bindCapability(client, config.generator)
})
