/**
 * SUPPLYMESH — Knowledge graph builder
 *
 * Straight-line pipeline for one startup description:
 *   company name → dependencies → dependents → enrichment → structuring
 *
 * `generate` never throws: it resolves to a finished graph or `{ error }`.
 */

import { loadConfig, type SupplyMeshConfig } from './config'
import {
  ConfigurationError,
  ProviderError,
  RequestValidationError,
  extractErrorMessage,
} from './errors'
import { enrichAll, type EnrichDeps } from './enrich'
import { identifyEntities, resolveCompanyName, type IdentifyContext } from './identify'
import { createAnthropicClient, type LlmClient } from './llm'
import { createPerplexityClient, type SearchClient } from './perplexity'
import { knowledgeGraphRequestSchema } from './schema'
import { createSerpNewsClient, type NewsClient } from './serpNews'
import { buildRoot, structureGraph, type StructuredGraph } from './structure'
import type {
  GraphNode,
  IdentifiedEntities,
  KnowledgeGraph,
  KnowledgeGraphRequest,
  KnowledgeGraphResult,
  Side,
} from './types'

export interface Providers {
  search: SearchClient
  news: NewsClient
  llm: LlmClient
}

export interface KnowledgeGraphBuilder {
  readonly config: SupplyMeshConfig
  generate(request: unknown): Promise<KnowledgeGraphResult>
}

const CREDENTIALS = [
  ['anthropicApiKey', 'ANTHROPIC_API_KEY'],
  ['perplexityApiKey', 'PERPLEXITY_API_KEY'],
  ['serpApiKey', 'SERPAPI_API_KEY'],
] as const

function assertCredentials(config: SupplyMeshConfig): void {
  const missing = CREDENTIALS.filter(([field]) => !config[field]?.trim()).map(([, env]) => env)
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required credentials: ${missing.join(', ')}`, missing)
  }
}

export function createProviders(config: SupplyMeshConfig): Providers {
  return {
    search: createPerplexityClient(config),
    news: createSerpNewsClient(config),
    llm: createAnthropicClient(config),
  }
}

/** Validates an untrusted request body. Throws RequestValidationError. */
export function parseRequest(body: unknown): KnowledgeGraphRequest {
  const parsed = knowledgeGraphRequestSchema.safeParse(body ?? {})
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.') || 'body'
    throw new RequestValidationError(
      issue.code === 'invalid_type' && issue.received === 'undefined'
        ? `Missing '${field}' in request body`
        : `Invalid '${field}': ${issue.message}`
    )
  }
  return parsed.data
}

/** Search answers plus their citations, for the structuring prompt */
export function buildResearchNotes(sides: IdentifiedEntities[]): string {
  const answers = sides.map((s) => s.rawAnswer).filter(Boolean)
  const sources = [...new Set(sides.flatMap((s) => s.sources))]
  if (sources.length > 0) answers.push(`Sources:\n${sources.map((url) => `- ${url}`).join('\n')}`)
  return answers.join('\n\n')
}

/**
 * Builds the pipeline. Credentials are checked here, before any network call.
 * Pass `providers` to swap the HTTP clients (tests, alternative vendors).
 */
export function createKnowledgeGraphBuilder(
  config: SupplyMeshConfig,
  providers?: Providers
): KnowledgeGraphBuilder {
  assertCredentials(config)
  const { search, news, llm } = providers ?? createProviders(config)

  const enrichDeps: EnrichDeps = { search, news, newsPerEntity: config.newsPerEntity }

  async function identifySide(
    side: Side,
    ctx: IdentifyContext,
    warnings: string[]
  ): Promise<IdentifiedEntities> {
    try {
      const result = await identifyEntities(side, ctx, {
        search,
        llm,
        maxEntities: config.maxEntitiesPerSide,
      })
      console.info(`[graph] ${side}: ${result.entities.length} entities`)
      return result
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err
      const message = `${side} identification failed: ${extractErrorMessage(err)}`
      console.warn(`[graph] ${message}`)
      warnings.push(message)
      return { entities: [], rawAnswer: '', sources: [] }
    }
  }

  async function build(request: KnowledgeGraphRequest): Promise<KnowledgeGraph> {
    const started = Date.now()
    const warnings: string[] = []

    const companyName =
      request.company_name ?? (await resolveCompanyName(request.startup_text, search))
    const ctx: IdentifyContext = { companyName, startupText: request.startup_text }
    console.info(`[graph] building for "${companyName}"`)

    const dependencies = await identifySide('dependency', ctx, warnings)
    const dependents = await identifySide('dependent', ctx, warnings)

    const enriched = await enrichAll(
      [
        { side: 'dependency', entities: dependencies.entities },
        { side: 'dependent', entities: dependents.entities },
      ],
      enrichDeps,
      config.enrichmentConcurrency
    )
    warnings.push(...enriched.flatMap((e) => e.warnings))
    const nodes: GraphNode[] = enriched.map((e) => e.node)

    // Nothing to structure: the graph is the root alone
    let structured: StructuredGraph
    let llmProcessed = false
    if (nodes.length === 0) {
      structured = {
        root: buildRoot(companyName, request.startup_text, nodes),
        nodes: [],
        edges: [],
        warnings: [],
      }
    } else {
      structured = await structureGraph(
        {
          companyName,
          startupText: request.startup_text,
          nodes,
          relationshipText: buildResearchNotes([dependencies, dependents]),
        },
        { llm, retries: config.structuringRetries }
      )
      llmProcessed = true
    }
    warnings.push(...structured.warnings)

    const graph: KnowledgeGraph = {
      root: structured.root,
      nodes: structured.nodes,
      edges: structured.edges,
      metadata: {
        company_name: companyName,
        total_dependencies: structured.nodes.filter((n) => n.type === 'dependency').length,
        total_dependents: structured.nodes.filter((n) => n.type === 'dependent').length,
        total_nodes: structured.nodes.length,
        total_edges: structured.edges.length,
        llm_processed: llmProcessed,
        model: llm.model,
        generated_at: new Date().toISOString(),
        warnings,
      },
    }
    console.info(
      `[graph] done in ${Date.now() - started}ms: ${graph.metadata.total_nodes} nodes, ${graph.metadata.total_edges} edges`
    )
    return graph
  }

  return {
    config,
    async generate(body) {
      try {
        return await build(parseRequest(body))
      } catch (err) {
        console.error('[graph] generation failed:', extractErrorMessage(err))
        return { error: extractErrorMessage(err) }
      }
    },
  }
}

/**
 * One-shot helper: loads config from the environment and generates.
 * A missing credential comes back as the error envelope.
 */
export async function generateKnowledgeGraph(
  request: KnowledgeGraphRequest,
  env: Record<string, string | undefined> = process.env
): Promise<KnowledgeGraphResult> {
  try {
    return await createKnowledgeGraphBuilder(loadConfig(env)).generate(request)
  } catch (err) {
    console.error('[graph] configuration error:', extractErrorMessage(err))
    return { error: extractErrorMessage(err) }
  }
}
