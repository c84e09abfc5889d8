/**
 * SUPPLYMESH — Graph structuring
 *
 * Sends the enriched entities to the LLM with a fixed response shape,
 * validates the answer against the graph contract and repairs it:
 * - ids are mapped back to the enriched nodes (by id, then by name)
 * - news / market / trade / position always come from enrichment
 * - invented nodes are dropped, omitted ones are re-added
 * - edges to unknown ids are dropped, unconnected nodes get a root edge
 *
 * A response that is not valid JSON or fails the contract is retried;
 * after the last attempt a StructuringError is thrown.
 */

import { StructuringError, extractErrorMessage } from './errors'
import { normalizeName } from './identify'
import { extractJson } from './json'
import type { LlmClient } from './llm'
import { llmGraphSchema, type LlmGraph } from './schema'
import type { GraphEdge, GraphNode, RootNode } from './types'

export const ROOT_ID = 'company_root'

const MAX_DESCRIPTION_CHARS = 3000
const MAX_RELATIONSHIP_TEXT_CHARS = 6000
const DEFAULT_STRENGTH = 0.5

const GRAPH_SYSTEM = `You are a knowledge-graph formatter. You receive a company, its description, a list of entities with ids, and research notes. Produce ONE JSON object wrapped in <JSON></JSON> tags with EXACTLY this shape:

{
  "root": { "id": "${ROOT_ID}", "name": string, "category": string, "description": string, "hover_info": string },
  "nodes": [ { "id": string, "name": string, "type": "dependency" | "dependent", "category": string, "relationship": string, "hover_info": string } ],
  "edges": [ { "source": string, "target": string, "relationship": string, "strength": number } ]
}

Rules:
- Use the entity ids exactly as given. Do not add entities that are not in the list.
- For a dependency, the edge goes from the entity to "${ROOT_ID}". For a dependent, from "${ROOT_ID}" to the entity.
- "strength" is between 0 and 1: how critical the relationship is.
- "relationship" is one specific sentence. "hover_info" is a short tooltip summary.
- Output nothing outside the <JSON></JSON> tags.`

export interface StructureInput {
  companyName: string
  startupText: string
  nodes: GraphNode[]
  /** Raw search answers, forwarded as research notes */
  relationshipText: string
}

export interface StructureOptions {
  llm: LlmClient
  /** Extra attempts after the first */
  retries: number
}

export interface StructuredGraph {
  root: RootNode
  nodes: GraphNode[]
  edges: GraphEdge[]
  /** Repairs applied to the model output */
  warnings: string[]
}

function summarizeForPrompt(node: GraphNode) {
  return {
    id: node.id,
    name: node.name,
    type: node.type,
    category: node.category,
    relationship: node.relationship,
    headline: node.news[0]?.title ?? null,
    ticker: node.market_data?.stock_ticker ?? null,
  }
}

export function buildStructuringPrompt(input: StructureInput): string {
  return `Company: ${input.companyName}
Description: ${input.startupText.slice(0, MAX_DESCRIPTION_CHARS)}

Entities:
${JSON.stringify(input.nodes.map(summarizeForPrompt), null, 2)}

Research notes:
${input.relationshipText.slice(0, MAX_RELATIONSHIP_TEXT_CHARS)}`
}

/** Parses model text against the graph contract; returns the reason on failure */
export function parseGraphResponse(text: string): { graph: LlmGraph } | { reason: string } {
  const json = extractJson(text)
  if (json === undefined) return { reason: 'response was not valid JSON' }
  const parsed = llmGraphSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return { reason: `response failed schema at ${issue.path.join('.') || '(root)'}: ${issue.message}` }
  }
  return { graph: parsed.data }
}

export function buildRoot(
  companyName: string,
  startupText: string,
  nodes: GraphNode[],
  fromModel?: LlmGraph['root']
): RootNode {
  const deps = nodes.filter((n) => n.type === 'dependency').length
  const dependents = nodes.filter((n) => n.type === 'dependent').length
  return {
    id: ROOT_ID,
    name: companyName,
    type: 'company',
    category: fromModel?.category || 'Company',
    description: fromModel?.description || startupText.trim().slice(0, 300),
    position: { x: 0, y: 0 },
    hover_info:
      fromModel?.hover_info || `${companyName}: ${deps} dependencies, ${dependents} dependents`,
  }
}

/** Edge every node gets when the model left it unconnected */
export function defaultEdge(node: GraphNode): GraphEdge {
  const relationship = node.relationship || (node.type === 'dependency' ? 'supplies' : 'relies on')
  return node.type === 'dependency'
    ? { source: node.id, target: ROOT_ID, relationship, strength: DEFAULT_STRENGTH }
    : { source: ROOT_ID, target: node.id, relationship, strength: DEFAULT_STRENGTH }
}

/**
 * Merges a validated model graph with the enriched nodes.
 * The result satisfies: unique ids, every edge endpoint exists, every node connected.
 */
export function repairGraph(input: StructureInput, model: LlmGraph): StructuredGraph {
  const warnings: string[] = []
  const byId = new Map(input.nodes.map((n) => [n.id, n]))
  const byName = new Map(input.nodes.map((n) => [normalizeName(n.name), n]))

  // model id / name → final id
  const idMap = new Map<string, string>([[ROOT_ID, ROOT_ID]])
  if (model.root.id) idMap.set(model.root.id, ROOT_ID)
  if (model.root.name) idMap.set(normalizeName(model.root.name), ROOT_ID)
  idMap.set(normalizeName(input.companyName), ROOT_ID)

  const patched = new Map<string, GraphNode>()
  for (const m of model.nodes) {
    const enriched = byId.get(m.id) ?? byName.get(normalizeName(m.name))
    if (!enriched) {
      // The model's own copy of the root
      if (m.type === 'company' || idMap.get(normalizeName(m.name)) === ROOT_ID) {
        idMap.set(m.id, ROOT_ID)
        continue
      }
      warnings.push(`dropped node "${m.name}" not present in enrichment`)
      continue
    }
    idMap.set(m.id, enriched.id)
    idMap.set(normalizeName(m.name), enriched.id)
    if (patched.has(enriched.id)) continue
    patched.set(enriched.id, {
      ...enriched,
      category: enriched.category && enriched.category !== 'Other' ? enriched.category : m.category || enriched.category,
      relationship: enriched.relationship || m.relationship || '',
      hover_info: m.hover_info || enriched.hover_info,
    })
  }

  const nodes = input.nodes.map((n) => {
    const p = patched.get(n.id)
    if (!p) warnings.push(`re-added node "${n.name}" omitted by the model`)
    return p ?? n
  })
  const known = new Set([ROOT_ID, ...nodes.map((n) => n.id)])
  const resolve = (ref: string) => idMap.get(ref) ?? idMap.get(normalizeName(ref)) ?? (known.has(ref) ? ref : undefined)

  const edges: GraphEdge[] = []
  const seen = new Set<string>()
  for (const e of model.edges) {
    const source = resolve(e.source)
    const target = resolve(e.target)
    if (!source || !target || source === target) {
      warnings.push(`dropped edge ${e.source} → ${e.target}`)
      continue
    }
    const key = `${source}|${target}`
    if (seen.has(key)) continue
    seen.add(key)
    edges.push({ source, target, relationship: e.relationship, strength: e.strength })
  }

  const connected = new Set(edges.flatMap((e) => [e.source, e.target]))
  for (const node of nodes) {
    if (!connected.has(node.id)) edges.push(defaultEdge(node))
  }

  return {
    root: buildRoot(input.companyName, input.startupText, nodes, model.root),
    nodes,
    edges,
    warnings,
  }
}

export async function structureGraph(
  input: StructureInput,
  options: StructureOptions
): Promise<StructuredGraph> {
  const attempts = 1 + Math.max(0, options.retries)
  const prompt = buildStructuringPrompt(input)
  let lastReason = 'no attempt made'

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const text = await options.llm.complete({
        system: GRAPH_SYSTEM,
        prompt,
        maxTokens: 4000,
        temperature: 0,
      })
      const result = parseGraphResponse(text)
      if ('graph' in result) {
        console.info(`[structure] attempt ${attempt} produced a valid graph`)
        return repairGraph(input, result.graph)
      }
      lastReason = result.reason
    } catch (err) {
      lastReason = extractErrorMessage(err)
    }
    console.warn(`[structure] attempt ${attempt}/${attempts} failed: ${lastReason}`)
  }

  throw new StructuringError(
    `Graph structuring failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastReason}`,
    attempts
  )
}
