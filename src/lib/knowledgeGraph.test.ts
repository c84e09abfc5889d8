import { describe, it, expect } from 'vitest'
import { ConfigurationError, ProviderError } from './errors'
import { TEST_CONFIG, fakeLlm, fakeNews, fakeSearch, newsItem } from './fakeProviders'
import { buildResearchNotes, createKnowledgeGraphBuilder, generateKnowledgeGraph } from './knowledgeGraph'
import { ROOT_ID } from './structure'
import { isErrorEnvelope, type KnowledgeGraph, type KnowledgeGraphResult } from './types'

const STARTUP_TEXT = 'CyberSwarm is a cybersecurity AI company using NVIDIA GPUs'

const DEPENDENCIES = JSON.stringify([
  {
    entity_name: 'NVIDIA',
    entity_type: 'company',
    category: 'Hardware',
    relationship: 'Supplies the GPUs that run threat detection models',
  },
])

const DEPENDENTS = JSON.stringify([
  {
    entity_name: 'Financial institutions',
    entity_type: 'sector',
    category: 'Customers',
    relationship: 'Rely on CyberSwarm for network protection',
  },
])

const MARKET = JSON.stringify({
  stock_ticker: 'NVDA',
  stock_price: '$450.25',
  '52_week_high': '$502.66',
  '52_week_low': '$222.97',
})

const TRADE = JSON.stringify({ india: 'Imports rising', us: 'Net exporter', china: 'Export controls apply' })

function scriptedSearch(overrides: { dependencies?: string | Error; dependents?: string | Error } = {}) {
  return fakeSearch((q) => {
    if (q.startsWith('What is the name')) return 'CyberSwarm'
    if (q.includes('DEPENDS ON')) return overrides.dependencies ?? DEPENDENCIES
    if (q.includes('DEPEND ON')) return overrides.dependents ?? DEPENDENTS
    if (q.includes('stock market data')) return MARKET
    return TRADE
  })
}

const STRUCTURED = `<JSON>${JSON.stringify({
  root: { id: ROOT_ID, name: 'CyberSwarm', category: 'Cybersecurity' },
  nodes: [
    { id: 'dependency_1', name: 'NVIDIA', type: 'dependency', category: 'Semiconductors' },
    { id: 'dependent_1', name: 'Financial institutions', type: 'dependent' },
  ],
  edges: [
    { source: 'dependency_1', target: ROOT_ID, relationship: 'GPU supply', strength: 0.9 },
    { source: ROOT_ID, target: 'dependent_1', relationship: 'Threat protection', strength: 0.7 },
    { source: 'dependency_1', target: 'ghost_node', relationship: 'bogus', strength: 0.2 },
  ],
})}</JSON>`

function expectGraph(result: KnowledgeGraphResult): KnowledgeGraph {
  if (isErrorEnvelope(result)) throw new Error(`expected a graph, got error: ${result.error}`)
  return result
}

describe('createKnowledgeGraphBuilder', () => {
  it('builds the CyberSwarm graph with NVIDIA as a dependency', async () => {
    const search = scriptedSearch()
    const llm = fakeLlm(STRUCTURED)
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search,
      llm,
      news: fakeNews(() => [newsItem('NVIDIA Q3 earnings')]),
    })

    const graph = expectGraph(await builder.generate({ startup_text: STARTUP_TEXT }))

    const nvidia = graph.nodes.find((n) => n.name === 'NVIDIA')
    expect(nvidia?.type).toBe('dependency')
    expect(nvidia?.relationship).toBe('Supplies the GPUs that run threat detection models')
    expect(nvidia?.market_data?.stock_ticker).toBe('NVDA')
    expect(nvidia?.news).toHaveLength(1)
    expect(graph.root).toMatchObject({ id: ROOT_ID, name: 'CyberSwarm', type: 'company' })
    expect(graph.metadata).toMatchObject({
      company_name: 'CyberSwarm',
      total_dependencies: 1,
      total_dependents: 1,
      total_nodes: 2,
      total_edges: 2,
      llm_processed: true,
      model: 'test-model',
      warnings: ['dropped edge dependency_1 → ghost_node'],
    })
    expect(search.questions[0]).toContain('What is the name of the company')
    expect(llm.requests).toHaveLength(1)
  })

  it('keeps referential integrity and unique ids', async () => {
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search: scriptedSearch(),
      llm: fakeLlm(STRUCTURED),
      news: fakeNews(() => []),
    })

    const graph = expectGraph(await builder.generate({ startup_text: STARTUP_TEXT, company_name: 'CyberSwarm' }))

    const ids = [graph.root.id, ...graph.nodes.map((n) => n.id)]
    expect(new Set(ids).size).toBe(ids.length)
    for (const edge of graph.edges) {
      expect(ids).toContain(edge.source)
      expect(ids).toContain(edge.target)
    }
  })

  it('skips the name lookup when company_name is given', async () => {
    const search = scriptedSearch()
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search,
      llm: fakeLlm(STRUCTURED),
      news: fakeNews(() => []),
    })

    await builder.generate({ startup_text: STARTUP_TEXT, company_name: 'CyberSwarm' })

    expect(search.questions[0]).toContain('CyberSwarm DEPENDS ON')
  })

  it('returns an empty graph, not an error, when nothing is identified', async () => {
    const llm = fakeLlm(STRUCTURED)
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search: scriptedSearch({ dependencies: '[]', dependents: '[]' }),
      llm,
      news: fakeNews(() => []),
    })

    const graph = expectGraph(await builder.generate({ startup_text: STARTUP_TEXT, company_name: 'CyberSwarm' }))

    expect(graph.nodes).toEqual([])
    expect(graph.edges).toEqual([])
    expect(graph.metadata.total_dependencies).toBe(0)
    expect(graph.metadata.total_dependents).toBe(0)
    expect(graph.metadata.llm_processed).toBe(false)
    expect(llm.requests).toHaveLength(0)
  })

  it('keeps a node whose news fetch failed, with news: [] and other fields intact', async () => {
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search: scriptedSearch(),
      llm: fakeLlm(STRUCTURED),
      news: fakeNews((q) =>
        q === 'NVIDIA' ? new ProviderError('news', 'news API error: HTTP 503') : [newsItem('Banks adopt AI security')]
      ),
    })

    const graph = expectGraph(await builder.generate({ startup_text: STARTUP_TEXT, company_name: 'CyberSwarm' }))

    const nvidia = graph.nodes.find((n) => n.name === 'NVIDIA')
    expect(nvidia?.news).toEqual([])
    expect(nvidia?.market_data?.stock_price).toBe('$450.25')
    expect(nvidia?.trade_data?.china).toBe('Export controls apply')
    expect(graph.nodes.find((n) => n.type === 'dependent')?.news).toHaveLength(1)
    expect(graph.metadata.warnings).toContain('news unavailable for NVIDIA: news API error: HTTP 503')
  })

  it('degrades a failed identification to an empty side', async () => {
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search: scriptedSearch({ dependencies: new ProviderError('search', 'search API error: HTTP 500') }),
      llm: fakeLlm(STRUCTURED),
      news: fakeNews(() => []),
    })

    const graph = expectGraph(await builder.generate({ startup_text: STARTUP_TEXT, company_name: 'CyberSwarm' }))

    expect(graph.nodes.map((n) => n.type)).toEqual(['dependent'])
    expect(graph.metadata.warnings[0]).toBe('dependency identification failed: search API error: HTTP 500')
  })

  it('retries structuring once, then returns only the error envelope', async () => {
    const llm = fakeLlm('definitely not json', 'still not json')
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search: scriptedSearch(),
      llm,
      news: fakeNews(() => []),
    })

    const result = await builder.generate({ startup_text: STARTUP_TEXT, company_name: 'CyberSwarm' })

    expect(result).toEqual({ error: 'Graph structuring failed after 2 attempts: response was not valid JSON' })
    expect(llm.requests).toHaveLength(2)
  })

  it('returns an envelope for invalid requests', async () => {
    const builder = createKnowledgeGraphBuilder(TEST_CONFIG, {
      search: scriptedSearch(),
      llm: fakeLlm(STRUCTURED),
      news: fakeNews(() => []),
    })

    await expect(builder.generate({})).resolves.toEqual({ error: "Missing 'startup_text' in request body" })
    await expect(builder.generate(null)).resolves.toEqual({ error: "Missing 'startup_text' in request body" })
    await expect(builder.generate({ startup_text: '   ' })).resolves.toEqual({
      error: "Invalid 'startup_text': 'startup_text' must be a non-empty string",
    })
  })

  it('fails fast on missing credentials before any call', () => {
    const search = scriptedSearch()
    expect(() =>
      createKnowledgeGraphBuilder(
        { ...TEST_CONFIG, serpApiKey: '', anthropicApiKey: ' ' },
        { search, llm: fakeLlm(STRUCTURED), news: fakeNews(() => []) }
      )
    ).toThrow(new ConfigurationError('Missing required credentials: ANTHROPIC_API_KEY, SERPAPI_API_KEY'))
    expect(search.questions).toEqual([])
  })
})

describe('generateKnowledgeGraph', () => {
  it('returns a configuration error envelope when credentials are missing', async () => {
    await expect(generateKnowledgeGraph({ startup_text: STARTUP_TEXT }, {})).resolves.toEqual({
      error: 'Missing required environment variables: ANTHROPIC_API_KEY, PERPLEXITY_API_KEY, SERPAPI_API_KEY',
    })
  })
})

describe('buildResearchNotes', () => {
  it('joins the answers and lists each citation once', () => {
    const notes = buildResearchNotes([
      { entities: [], rawAnswer: 'NVIDIA supplies GPUs.', sources: ['https://example.com/a'] },
      { entities: [], rawAnswer: '', sources: [] },
      { entities: [], rawAnswer: 'Banks buy protection.', sources: ['https://example.com/a', 'https://example.com/b'] },
    ])

    expect(notes).toBe(
      'NVIDIA supplies GPUs.\n\nBanks buy protection.\n\nSources:\n- https://example.com/a\n- https://example.com/b'
    )
  })

  it('leaves out the sources block when there are no citations', () => {
    expect(buildResearchNotes([{ entities: [], rawAnswer: 'Only text.', sources: [] }])).toBe('Only text.')
  })
})
