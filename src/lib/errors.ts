/**
 * SUPPLYMESH — Error taxonomy
 *
 * ConfigurationError: fatal, raised before any outbound call.
 * ProviderError: one upstream call failed or timed out. Recovered locally.
 * StructuringError: the final LLM shaping step produced nothing usable.
 */

export class SupplyMeshError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigurationError extends SupplyMeshError {
  /** Environment variables that were missing or invalid */
  readonly keys: string[]

  constructor(message: string, keys: string[] = []) {
    super(message)
    this.keys = keys
  }
}

export type ProviderName = 'search' | 'news' | 'llm'

export class ProviderError extends SupplyMeshError {
  readonly provider: ProviderName
  readonly status?: number

  constructor(
    provider: ProviderName,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause })
    this.provider = provider
    this.status = options?.status
  }
}

/** Search/answer engine failed or answered with something we could not parse */
export class SearchProviderError extends ProviderError {
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('search', message, options)
  }
}

export class StructuringError extends SupplyMeshError {
  readonly attempts: number

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options)
    this.attempts = attempts
  }
}

export class RequestValidationError extends SupplyMeshError {}

/**
 * Extract a detailed error message from any thrown value.
 *
 * Node's `fetch` (undici) throws `TypeError("fetch failed")` and hides the
 * real cause (DNS, TCP, TLS, timeout …) in a nested `.cause` chain.
 */
export function extractErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return String(error)

  const parts: string[] = [error.message]
  let current: unknown = error.cause
  const seen = new Set<unknown>()

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current)
    const errno = 'code' in current && typeof current.code === 'string' ? current.code : undefined
    parts.push(errno ? `${current.message} [${errno}]` : current.message)
    current = current.cause
  }

  return parts.join(' → ')
}
