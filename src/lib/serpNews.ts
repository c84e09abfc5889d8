/**
 * SUPPLYMESH — Google News via SerpAPI
 *
 * Returns the latest articles for an entity as plain NewsItem records.
 */

import { z } from 'zod'
import type { SupplyMeshConfig } from './config'
import { ProviderError } from './errors'
import { requestJson } from './http'
import type { NewsItem } from './types'

const SERPAPI_URL = 'https://serpapi.com/search.json'

export interface NewsClient {
  search(query: string, limit: number): Promise<NewsItem[]>
}

const articleSchema = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  date: z.string().optional(),
  snippet: z.string().optional(),
  source: z.union([z.string(), z.object({ name: z.string().optional() })]).optional(),
})

// Story clusters nest their articles under `stories`
const resultSchema = articleSchema.extend({
  stories: z.array(articleSchema).optional(),
})

const responseSchema = z.object({
  news_results: z.array(z.unknown()).optional(),
  error: z.string().optional(),
})

type SerpArticle = z.infer<typeof articleSchema>
type SerpResult = z.infer<typeof resultSchema>

function sourceName(source: SerpArticle['source']): string {
  if (typeof source === 'string') return source
  return source?.name ?? ''
}

/** Flattens story clusters and drops results without a title or link */
export function toNewsItems(results: SerpResult[], limit: number): NewsItem[] {
  const items: NewsItem[] = []
  const flat = results.flatMap((r): SerpArticle[] => (r.title && r.link ? [r] : r.stories ?? []))
  for (const r of flat) {
    if (!r.title || !r.link) continue
    items.push({
      title: r.title,
      link: r.link,
      source: sourceName(r.source),
      date: r.date ?? '',
      snippet: r.snippet ?? '',
    })
    if (items.length >= limit) break
  }
  return items
}

export function createSerpNewsClient(
  config: Pick<SupplyMeshConfig, 'serpApiKey' | 'requestTimeoutMs'>
): NewsClient {
  return {
    async search(query, limit) {
      const params = new URLSearchParams({
        engine: 'google_news',
        q: query.trim(),
        gl: 'us',
        hl: 'en',
        api_key: config.serpApiKey,
      })
      const raw = await requestJson('news', `${SERPAPI_URL}?${params.toString()}`, {
        timeoutMs: config.requestTimeoutMs,
      })
      const parsed = responseSchema.safeParse(raw)
      if (!parsed.success) throw new ProviderError('news', 'News API returned an unexpected shape')
      // SerpAPI reports "no results" as an error string with HTTP 200
      if (parsed.data.error && !parsed.data.news_results) {
        if (/hasn't returned any results/i.test(parsed.data.error)) return []
        throw new ProviderError('news', `News API error: ${parsed.data.error}`)
      }

      const results = (parsed.data.news_results ?? []).flatMap((item) => {
        const r = resultSchema.safeParse(item)
        return r.success ? [r.data] : []
      })
      return toNewsItems(results, limit)
    },
  }
}
