/**
 * SUPPLYMESH — Centralized types for the knowledge graph
 *
 * Field names are snake_case on purpose: they are the wire contract
 * consumed by graph visualizations downstream.
 */

// ── Request / response ──────────────────────────────────────────────────────

export interface KnowledgeGraphRequest {
  startup_text: string
  company_name?: string
}

export interface ErrorEnvelope {
  error: string
}

export type KnowledgeGraphResult = KnowledgeGraph | ErrorEnvelope

export function isErrorEnvelope(result: KnowledgeGraphResult): result is ErrorEnvelope {
  return 'error' in result
}

// ── Graph ───────────────────────────────────────────────────────────────────

export type NodeType = 'dependency' | 'dependent' | 'company'

/** Which side of the root an identified entity sits on */
export type Side = Exclude<NodeType, 'company'>

export interface Position {
  x: number
  y: number
}

export interface NewsItem {
  title: string
  link: string
  source: string
  date: string
  snippet: string
}

export interface MarketData {
  stock_ticker: string | null
  stock_price: string | null
  '52_week_high': string | null
  '52_week_low': string | null
}

/** Per-country free-text import/export statistics */
export interface TradeData {
  india: string | null
  us: string | null
  china: string | null
}

export interface GraphNode {
  id: string
  name: string
  type: NodeType
  category: string
  position: Position
  relationship: string
  news: NewsItem[]
  market_data: MarketData | null
  trade_data: TradeData | null
  hover_info: string
}

export interface RootNode {
  id: string
  name: string
  type: 'company'
  category: string
  description: string
  position: Position
  hover_info: string
}

export interface GraphEdge {
  source: string
  target: string
  relationship: string
  /** 0..1 */
  strength: number
}

export interface GraphMetadata {
  company_name: string
  total_dependencies: number
  total_dependents: number
  total_nodes: number
  total_edges: number
  llm_processed: boolean
  model: string
  generated_at: string
  /** Recovered provider failures (missing fields, skipped sides) */
  warnings: string[]
}

export interface KnowledgeGraph {
  root: RootNode
  nodes: GraphNode[]
  edges: GraphEdge[]
  metadata: GraphMetadata
}

// ── Pipeline intermediates ──────────────────────────────────────────────────

/** An entity named by the search engine, before enrichment */
export interface Entity {
  entity_name: string
  entity_type: string
  category: string
  relationship: string
}

export interface IdentifiedEntities {
  entities: Entity[]
  /** The search engine's raw answer, forwarded to the structuring prompt */
  rawAnswer: string
  /** Citation URLs behind the answer */
  sources: string[]
}
