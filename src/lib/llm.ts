/**
 * SUPPLYMESH — LLM integration (Anthropic Messages API)
 *
 * Used for two jobs:
 * 1. Extracting an entity list from a prose search answer
 * 2. Structuring the enriched entities into the graph JSON
 *
 * The model is treated as an untrusted formatter. Callers validate output.
 */

import type { SupplyMeshConfig } from './config'
import { ProviderError } from './errors'
import { requestJson } from './http'

const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages'
const ANTHROPIC_VERSION = '2023-06-01'

export interface CompletionRequest {
  system: string
  prompt: string
  maxTokens: number
  temperature?: number
}

export interface LlmClient {
  readonly model: string
  complete(request: CompletionRequest): Promise<string>
}

interface MessagesResponse {
  content?: Array<{ type: string; text?: string }>
  stop_reason?: string
}

function isMessagesResponse(value: unknown): value is MessagesResponse {
  return typeof value === 'object' && value !== null && 'content' in value && Array.isArray(value.content)
}

export function createAnthropicClient(
  config: Pick<SupplyMeshConfig, 'anthropicApiKey' | 'anthropicModel' | 'requestTimeoutMs'>
): LlmClient {
  const model = config.anthropicModel

  return {
    model,
    async complete({ system, prompt, maxTokens, temperature }) {
      console.info('[llm] calling', { model, maxTokens })
      const data = await requestJson('llm', ANTHROPIC_API_URL, {
        headers: {
          'x-api-key': config.anthropicApiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
        body: {
          model,
          max_tokens: maxTokens,
          temperature: temperature ?? 0.1,
          system,
          messages: [{ role: 'user', content: prompt }],
        },
        timeoutMs: config.requestTimeoutMs,
      })

      if (!isMessagesResponse(data)) {
        throw new ProviderError('llm', 'LLM response had no content blocks')
      }
      const text = (data.content ?? [])
        .filter((block) => block.type === 'text' && typeof block.text === 'string')
        .map((block) => block.text)
        .join('')
        .trim()
      if (!text) throw new ProviderError('llm', 'LLM returned empty content')
      if (data.stop_reason === 'max_tokens') {
        console.warn('[llm] response hit max_tokens, output may be truncated')
      }
      return text
    },
  }
}
