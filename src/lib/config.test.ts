import { describe, it, expect } from 'vitest'
import { CONFIG_DEFAULTS, loadConfig } from './config'
import { ConfigurationError } from './errors'

const KEYS = {
  ANTHROPIC_API_KEY: 'test-anthropic-key',
  PERPLEXITY_API_KEY: 'test-perplexity-key',
  SERPAPI_API_KEY: 'test-serp-key',
}

describe('loadConfig', () => {
  it('applies defaults when only credentials are set', () => {
    const config = loadConfig(KEYS)
    expect(config.anthropicApiKey).toBe('test-anthropic-key')
    expect(config.anthropicModel).toBe(CONFIG_DEFAULTS.anthropicModel)
    expect(config.requestTimeoutMs).toBe(20_000)
    expect(config.structuringRetries).toBe(1)
    expect(config.maxEntitiesPerSide).toBe(6)
    expect(config.port).toBe(3001)
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...KEYS,
      SUPPLYMESH_TIMEOUT_MS: '5000',
      SUPPLYMESH_STRUCTURING_RETRIES: '0',
      SUPPLYMESH_CONCURRENCY: '2',
      PERPLEXITY_MODEL: 'sonar-pro',
    })
    expect(config.requestTimeoutMs).toBe(5000)
    expect(config.structuringRetries).toBe(0)
    expect(config.enrichmentConcurrency).toBe(2)
    expect(config.perplexityModel).toBe('sonar-pro')
  })

  it('names every missing credential', () => {
    try {
      loadConfig({ PERPLEXITY_API_KEY: 'test-perplexity-key', ANTHROPIC_API_KEY: '  ' })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError)
      if (!(err instanceof ConfigurationError)) return
      expect(err.keys).toEqual(['ANTHROPIC_API_KEY', 'SERPAPI_API_KEY'])
      expect(err.message).toBe(
        'Missing required environment variables: ANTHROPIC_API_KEY, SERPAPI_API_KEY'
      )
    }
  })

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ ...KEYS, SUPPLYMESH_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid configuration values: SUPPLYMESH_TIMEOUT_MS'
    )
  })

  it('treats blank optional values as unset', () => {
    expect(loadConfig({ ...KEYS, PORT: '' }).port).toBe(3001)
  })
})
