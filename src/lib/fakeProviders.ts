/**
 * In-process stand-ins for the three providers, used by the tests.
 * Each one answers from a handler and records what it was asked.
 */

import type { SupplyMeshConfig } from './config'
import type { CompletionRequest, LlmClient } from './llm'
import type { SearchAnswer, SearchClient, SearchQuery } from './perplexity'
import type { NewsClient } from './serpNews'
import type { NewsItem } from './types'

export const TEST_CONFIG: SupplyMeshConfig = Object.freeze({
  anthropicApiKey: 'test-anthropic-key',
  perplexityApiKey: 'test-perplexity-key',
  serpApiKey: 'test-serp-key',
  anthropicModel: 'test-model',
  perplexityModel: 'sonar',
  requestTimeoutMs: 1000,
  structuringRetries: 1,
  maxEntitiesPerSide: 6,
  newsPerEntity: 3,
  enrichmentConcurrency: 4,
  port: 0,
})

type Reply<T> = T | Error

function settle<T>(reply: Reply<T>): Promise<T> {
  return reply instanceof Error ? Promise.reject(reply) : Promise.resolve(reply)
}

export interface FakeSearch extends SearchClient {
  questions: string[]
}

export function fakeSearch(
  respond: (question: string) => Reply<string>,
  sources: string[] = []
): FakeSearch {
  const questions: string[] = []
  return {
    questions,
    async ask(query: SearchQuery): Promise<SearchAnswer> {
      questions.push(query.question)
      return { answer: await settle(respond(query.question)), sources }
    },
  }
}

export interface FakeNews extends NewsClient {
  queries: string[]
}

export function fakeNews(respond: (query: string) => Reply<NewsItem[]>): FakeNews {
  const queries: string[] = []
  return {
    queries,
    async search(query: string, limit: number): Promise<NewsItem[]> {
      queries.push(query)
      return (await settle(respond(query))).slice(0, limit)
    },
  }
}

export interface FakeLlm extends LlmClient {
  requests: CompletionRequest[]
}

/** Replies are consumed in order; the last one repeats */
export function fakeLlm(...replies: Reply<string>[]): FakeLlm {
  const requests: CompletionRequest[] = []
  return {
    model: 'test-model',
    requests,
    async complete(request: CompletionRequest): Promise<string> {
      requests.push(request)
      const reply = replies[Math.min(requests.length - 1, replies.length - 1)]
      if (reply === undefined) throw new Error('fakeLlm has no replies')
      return settle(reply)
    },
  }
}

export function newsItem(title: string, source = 'Example Wire'): NewsItem {
  return {
    title,
    link: `https://news.example.com/${encodeURIComponent(title)}`,
    source,
    date: '2026-10-01',
    snippet: `${title} snippet`,
  }
}
