import { afterEach, describe, it, expect, vi } from 'vitest'
import { ProviderError } from './errors'
import { TEST_CONFIG } from './fakeProviders'
import { createSerpNewsClient, toNewsItems } from './serpNews'

describe('toNewsItems', () => {
  it('flattens story clusters and skips incomplete results', () => {
    const items = toNewsItems(
      [
        { title: 'NVIDIA earnings beat', link: 'https://a.example/1', source: { name: 'Reuters' }, date: '10/14/2026' },
        { title: 'No link' },
        {
          stories: [
            { title: 'GPU demand surges', link: 'https://a.example/2', source: 'Bloomberg' },
            { title: 'Third story', link: 'https://a.example/3' },
          ],
        },
      ],
      2
    )

    expect(items).toEqual([
      { title: 'NVIDIA earnings beat', link: 'https://a.example/1', source: 'Reuters', date: '10/14/2026', snippet: '' },
      { title: 'GPU demand surges', link: 'https://a.example/2', source: 'Bloomberg', date: '', snippet: '' },
    ])
  })
})

describe('createSerpNewsClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('queries the google_news engine with the API key', async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(
          JSON.stringify({
            news_results: [{ title: 'AWS outage', link: 'https://a.example/aws', source: { name: 'The Verge' } }],
          })
        )
    )
    vi.stubGlobal('fetch', fetchMock)

    const items = await createSerpNewsClient(TEST_CONFIG).search(' AWS ', 3)

    expect(items).toEqual([
      { title: 'AWS outage', link: 'https://a.example/aws', source: 'The Verge', date: '', snippet: '' },
    ])
    const [url] = fetchMock.mock.calls[0]
    const params = new URL(url).searchParams
    expect(params.get('engine')).toBe('google_news')
    expect(params.get('q')).toBe('AWS')
    expect(params.get('api_key')).toBe('test-serp-key')
  })

  it('treats the "no results" error as an empty list', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ error: "Google hasn't returned any results for this query." })))
    )

    await expect(createSerpNewsClient(TEST_CONFIG).search('obscure', 3)).resolves.toEqual([])
  })

  it('raises ProviderError for other API errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ error: 'Invalid API key.' }))))

    const err = await createSerpNewsClient(TEST_CONFIG)
      .search('x', 3)
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ProviderError)
    if (!(err instanceof ProviderError)) return
    expect(err.provider).toBe('news')
    expect(err.message).toBe('News API error: Invalid API key.')
  })

  it('keeps the API key out of network error messages', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new TypeError('fetch failed'))))

    await expect(createSerpNewsClient(TEST_CONFIG).search('x', 3)).rejects.toThrow(
      'news request to https://serpapi.com/search.json?engine=google_news&q=x&gl=us&hl=en&api_key=*** failed: fetch failed'
    )
  })
})
