/**
 * SUPPLYMESH — Outbound HTTP helper
 *
 * One place that applies the per-call timeout and turns every failure
 * (network, timeout, non-2xx, bad JSON) into a ProviderError.
 */

import { ProviderError, extractErrorMessage, type ProviderName } from './errors'

export interface RequestJsonOptions {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: unknown
  timeoutMs: number
}

const truncate = (s: string, n: number) => (s.length <= n ? s : s.slice(0, n - 1) + '…')

/** Strip credentials from URLs before they reach logs or error messages */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:api_key|key|token)=)[^&]*/gi, '$1***')
}

export async function requestJson(
  provider: ProviderName,
  url: string,
  options: RequestJsonOptions
): Promise<unknown> {
  const method = options.method ?? (options.body === undefined ? 'GET' : 'POST')
  const headers: Record<string, string> = { Accept: 'application/json', ...options.headers }
  if (options.body !== undefined) headers['Content-Type'] = 'application/json'

  let res: Response
  try {
    res = await fetch(url, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: AbortSignal.timeout(options.timeoutMs),
    })
  } catch (err) {
    const timedOut = err instanceof Error && err.name === 'TimeoutError'
    throw new ProviderError(
      provider,
      timedOut
        ? `${provider} request timed out after ${options.timeoutMs}ms`
        : `${provider} request to ${redactUrl(url)} failed: ${extractErrorMessage(err)}`,
      { cause: err }
    )
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '')
    throw new ProviderError(
      provider,
      `${provider} API error: HTTP ${res.status}${text ? ` ${truncate(text, 200)}` : ''}`,
      { status: res.status }
    )
  }

  try {
    return await res.json()
  } catch (err) {
    throw new ProviderError(provider, `${provider} API returned invalid JSON`, { cause: err })
  }
}
