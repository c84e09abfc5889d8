/**
 * SUPPLYMESH — Node enrichment
 *
 * Attaches news, market and trade facts to each identified entity.
 * Each source is optional: a failed or timed-out lookup leaves that field
 * empty and adds a warning, the node itself always comes back.
 */

import { extractErrorMessage } from './errors'
import { extractJson } from './json'
import type { SearchClient } from './perplexity'
import { marketDataSchema, tradeDataSchema } from './schema'
import type { NewsClient } from './serpNews'
import type { Entity, GraphNode, MarketData, NewsItem, Position, Side, TradeData } from './types'

export interface EnrichDeps {
  search: SearchClient
  news: NewsClient
  newsPerEntity: number
}

export interface EnrichedNode {
  node: GraphNode
  warnings: string[]
}

export interface SideEntities {
  side: Side
  entities: Entity[]
}

const COLUMN_X = 300
const ROW_SPACING = 120

const FACT_SYSTEM = `You are a financial data assistant. Reply with ONLY a JSON object, no prose. Use null for anything you cannot verify.`

/** Dependencies stack left of the root, dependents right, centered on y = 0 */
export function layoutPosition(side: Side, index: number, count: number): Position {
  return {
    x: side === 'dependency' ? -COLUMN_X : COLUMN_X,
    y: Math.round((index - (count - 1) / 2) * ROW_SPACING),
  }
}

export function nodeId(side: Side, index: number): string {
  return `${side}_${index + 1}`
}

async function fetchMarketData(entity: Entity, search: SearchClient): Promise<MarketData | null> {
  const { answer } = await search.ask({
    system: FACT_SYSTEM,
    question: `Latest stock market data for ${entity.entity_name}. JSON keys: "stock_ticker", "stock_price" (with currency), "52_week_high", "52_week_low". Use null for all values if it is not publicly traded.`,
    maxTokens: 200,
  })
  const parsed = marketDataSchema.safeParse(extractJson(answer))
  if (!parsed.success) throw new Error('market data answer was not JSON')
  const data = parsed.data
  return Object.values(data).some((v) => v !== null) ? data : null
}

async function fetchTradeData(entity: Entity, search: SearchClient): Promise<TradeData | null> {
  const { answer } = await search.ask({
    system: FACT_SYSTEM,
    question: `Recent export/import statistics relevant to ${entity.entity_name} (${entity.category}) in India, the US and China. JSON keys: "india", "us", "china", each one short sentence of figures, or null.`,
    maxTokens: 400,
  })
  const parsed = tradeDataSchema.safeParse(extractJson(answer))
  if (!parsed.success) throw new Error('trade data answer was not JSON')
  const data = parsed.data
  return Object.values(data).some((v) => v !== null) ? data : null
}

export function buildHoverInfo(
  name: string,
  relationship: string,
  news: NewsItem[],
  market: MarketData | null
): string {
  const parts = [relationship ? `${name}: ${relationship}` : name]
  if (market?.stock_ticker) {
    parts.push(
      market.stock_price
        ? `${market.stock_ticker} trades at ${market.stock_price}`
        : `Ticker ${market.stock_ticker}`
    )
  }
  if (news.length > 0) parts.push(`Latest: ${news[0].title}`)
  return parts.join(' | ')
}

/** Runs one optional lookup; failures become a warning and the fallback value */
async function optional<T>(
  label: string,
  entityName: string,
  fallback: T,
  warnings: string[],
  run: () => Promise<T>
): Promise<T> {
  try {
    return await run()
  } catch (err) {
    const message = `${label} unavailable for ${entityName}: ${extractErrorMessage(err)}`
    console.warn(`[enrich] ${message}`)
    warnings.push(message)
    return fallback
  }
}

export async function enrichEntity(
  entity: Entity,
  side: Side,
  index: number,
  count: number,
  deps: EnrichDeps
): Promise<EnrichedNode> {
  const warnings: string[] = []
  const name = entity.entity_name

  const [news, market, trade] = await Promise.all([
    optional<NewsItem[]>('news', name, [], warnings, () => deps.news.search(name, deps.newsPerEntity)),
    entity.entity_type === 'company'
      ? optional<MarketData | null>('market data', name, null, warnings, () =>
          fetchMarketData(entity, deps.search)
        )
      : Promise.resolve(null),
    optional<TradeData | null>('trade data', name, null, warnings, () =>
      fetchTradeData(entity, deps.search)
    ),
  ])

  return {
    node: {
      id: nodeId(side, index),
      name,
      type: side,
      category: entity.category,
      position: layoutPosition(side, index, count),
      relationship: entity.relationship,
      news,
      market_data: market,
      trade_data: trade,
      hover_info: buildHoverInfo(name, entity.relationship, news, market),
    },
    warnings,
  }
}

/**
 * Enriches every entity on both sides, `concurrency` at a time.
 * Output order: dependencies first, then dependents, each in input order.
 */
export async function enrichAll(
  groups: SideEntities[],
  deps: EnrichDeps,
  concurrency: number
): Promise<EnrichedNode[]> {
  const jobs = groups.flatMap(({ side, entities }) =>
    entities.map((entity, index) => () => enrichEntity(entity, side, index, entities.length, deps))
  )

  const results: EnrichedNode[] = []
  const batchSize = Math.max(1, concurrency)
  for (let i = 0; i < jobs.length; i += batchSize) {
    const batch = jobs.slice(i, i + batchSize)
    console.info(`[enrich] batch ${i / batchSize + 1}: ${batch.length} entities`)
    results.push(...(await Promise.all(batch.map((job) => job()))))
  }
  return results
}
