/**
 * SUPPLYMESH — Perplexity search/answer integration
 *
 * Answers open questions with web-grounded text plus citation URLs.
 * Every failure surfaces as SearchProviderError.
 */

import type { SupplyMeshConfig } from './config'
import { ProviderError, SearchProviderError } from './errors'
import { requestJson } from './http'

const PERPLEXITY_API_URL = 'https://api.perplexity.ai/chat/completions'

const DEFAULT_SYSTEM = `You are a precise business research assistant. Answer factually and concisely. When asked for JSON, return only JSON.`

export interface SearchQuery {
  question: string
  system?: string
  maxTokens?: number
}

export interface SearchAnswer {
  answer: string
  sources: string[]
}

export interface SearchClient {
  ask(query: SearchQuery): Promise<SearchAnswer>
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string } }>
  citations?: string[]
}

function isChatCompletion(value: unknown): value is ChatCompletionResponse {
  return typeof value === 'object' && value !== null && 'choices' in value && Array.isArray(value.choices)
}

export function createPerplexityClient(
  config: Pick<SupplyMeshConfig, 'perplexityApiKey' | 'perplexityModel' | 'requestTimeoutMs'>
): SearchClient {
  return {
    async ask({ question, system, maxTokens }) {
      let data: unknown
      try {
        data = await requestJson('search', PERPLEXITY_API_URL, {
          headers: { Authorization: `Bearer ${config.perplexityApiKey}` },
          body: {
            model: config.perplexityModel,
            temperature: 0.1,
            max_tokens: maxTokens ?? 800,
            messages: [
              { role: 'system', content: system ?? DEFAULT_SYSTEM },
              { role: 'user', content: question },
            ],
          },
          timeoutMs: config.requestTimeoutMs,
        })
      } catch (err) {
        if (err instanceof ProviderError) {
          throw new SearchProviderError(err.message, { status: err.status, cause: err })
        }
        throw err
      }

      if (!isChatCompletion(data)) {
        throw new SearchProviderError('Search API response had no choices')
      }
      const answer = data.choices?.[0]?.message?.content?.trim() ?? ''
      if (!answer) throw new SearchProviderError('Search API returned an empty answer')

      const sources = Array.isArray(data.citations)
        ? data.citations.filter((s): s is string => typeof s === 'string')
        : []
      return { answer, sources }
    },
  }
}
