/**
 * SUPPLYMESH — Configuration
 *
 * Read once at startup and passed explicitly to the builder.
 * Entry points load .env through `dotenv/config` before calling loadConfig.
 */

import { z } from 'zod'
import { ConfigurationError } from './errors'

export interface SupplyMeshConfig {
  anthropicApiKey: string
  perplexityApiKey: string
  serpApiKey: string
  anthropicModel: string
  perplexityModel: string
  /** Per outbound call */
  requestTimeoutMs: number
  /** Extra attempts for the structuring step after the first one */
  structuringRetries: number
  maxEntitiesPerSide: number
  newsPerEntity: number
  enrichmentConcurrency: number
  port: number
}

export const CONFIG_DEFAULTS = {
  anthropicModel: 'claude-sonnet-4-5-20250929',
  perplexityModel: 'sonar',
  requestTimeoutMs: 20_000,
  structuringRetries: 1,
  maxEntitiesPerSide: 6,
  newsPerEntity: 3,
  enrichmentConcurrency: 4,
  port: 3001,
} as const

const REQUIRED_KEYS = ['ANTHROPIC_API_KEY', 'PERPLEXITY_API_KEY', 'SERPAPI_API_KEY'] as const

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  ANTHROPIC_MODEL: z.string().trim().min(1).default(CONFIG_DEFAULTS.anthropicModel),
  PERPLEXITY_MODEL: z.string().trim().min(1).default(CONFIG_DEFAULTS.perplexityModel),
  SUPPLYMESH_TIMEOUT_MS: positiveInt.default(CONFIG_DEFAULTS.requestTimeoutMs),
  SUPPLYMESH_STRUCTURING_RETRIES: z.coerce
    .number()
    .int()
    .min(0)
    .max(5)
    .default(CONFIG_DEFAULTS.structuringRetries),
  SUPPLYMESH_MAX_ENTITIES: positiveInt.max(20).default(CONFIG_DEFAULTS.maxEntitiesPerSide),
  SUPPLYMESH_NEWS_PER_ENTITY: positiveInt.max(10).default(CONFIG_DEFAULTS.newsPerEntity),
  SUPPLYMESH_CONCURRENCY: positiveInt.max(16).default(CONFIG_DEFAULTS.enrichmentConcurrency),
  PORT: positiveInt.default(CONFIG_DEFAULTS.port),
})

type Env = Record<string, string | undefined>

/** Blank strings count as unset so `FOO=` in .env falls back to the default */
function withoutBlanks(env: Env): Env {
  const out: Env = {}
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') out[k] = v
  }
  return out
}

/**
 * Builds the config from an environment map (normally `process.env`).
 * Throws ConfigurationError naming every missing credential or invalid value.
 */
export function loadConfig(env: Env = process.env): SupplyMeshConfig {
  const clean = withoutBlanks(env)

  const missing = REQUIRED_KEYS.filter((k) => !clean[k])
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      [...missing]
    )
  }

  const parsed = envSchema.safeParse(clean)
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join('.'))
    throw new ConfigurationError(`Invalid configuration values: ${keys.join(', ')}`, keys)
  }
  const opts = parsed.data

  return Object.freeze({
    anthropicApiKey: clean.ANTHROPIC_API_KEY ?? '',
    perplexityApiKey: clean.PERPLEXITY_API_KEY ?? '',
    serpApiKey: clean.SERPAPI_API_KEY ?? '',
    anthropicModel: opts.ANTHROPIC_MODEL,
    perplexityModel: opts.PERPLEXITY_MODEL,
    requestTimeoutMs: opts.SUPPLYMESH_TIMEOUT_MS,
    structuringRetries: opts.SUPPLYMESH_STRUCTURING_RETRIES,
    maxEntitiesPerSide: opts.SUPPLYMESH_MAX_ENTITIES,
    newsPerEntity: opts.SUPPLYMESH_NEWS_PER_ENTITY,
    enrichmentConcurrency: opts.SUPPLYMESH_CONCURRENCY,
    port: opts.PORT,
  })
}
