/**
 * SUPPLYMESH — Lenient JSON extraction from model output
 *
 * Models wrap JSON in <JSON> tags, markdown fences, or prose.
 * Tried in order: tagged block, fenced block, whole text, first {...} / [...] span.
 */

const TAGGED = /<JSON>([\s\S]*?)<\/JSON>/i
const FENCED = /```(?:json)?\s*([\s\S]*?)```/i

function tryParse(text: string | undefined): unknown {
  if (!text) return undefined
  try {
    return JSON.parse(text.trim())
  } catch {
    return undefined
  }
}

function outermostSpan(text: string, open: string, close: string): string | undefined {
  const start = text.indexOf(open)
  const end = text.lastIndexOf(close)
  return start >= 0 && end > start ? text.slice(start, end + 1) : undefined
}

/** Returns the parsed value, or undefined when nothing in the text parses */
export function extractJson(text: string): unknown {
  if (!text?.trim()) return undefined

  const candidates = [
    text.match(TAGGED)?.[1],
    text.match(FENCED)?.[1],
    text,
    outermostSpan(text, '{', '}'),
    outermostSpan(text, '[', ']'),
  ]

  for (const candidate of candidates) {
    const value = tryParse(candidate)
    if (value !== undefined) return value
  }
  return undefined
}
