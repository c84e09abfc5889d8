/**
 * SUPPLYMESH — Dependency / dependent identification
 *
 * Asks the search engine who the company depends on (and who depends on it),
 * then turns the answer into a clean, deduplicated entity list.
 * Prose answers go through the LLM for extraction before giving up.
 */

import { SearchProviderError, extractErrorMessage } from './errors'
import { extractJson } from './json'
import type { LlmClient } from './llm'
import type { SearchClient } from './perplexity'
import { entityListSchema, entitySchema } from './schema'
import type { Entity, IdentifiedEntities, Side } from './types'

export interface IdentifyContext {
  companyName: string
  startupText: string
}

export interface IdentifyDeps {
  search: SearchClient
  llm: LlmClient
  maxEntities: number
}

const MAX_DESCRIPTION_CHARS = 4000

const ENTITY_EXTRACTION_SYSTEM = `You extract business entities from research text. Return ONLY a JSON array wrapped in <JSON></JSON> tags. Each item: {"entity_name": string, "entity_type": "company" | "sector" | "commodity" | "regulator" | "technology", "category": string, "relationship": string}. Use real, specific names. Return <JSON>[]</JSON> when none are named.`

const SIDE_PROMPTS: Record<Side, { label: string; ask: (name: string) => string }> = {
  dependency: {
    label: 'dependencies',
    ask: (name) =>
      `List the key external entities that ${name} DEPENDS ON: suppliers, hardware vendors, cloud and infrastructure providers, platforms, raw materials and regulators.`,
  },
  dependent: {
    label: 'dependents',
    ask: (name) =>
      `List the key entities that DEPEND ON ${name}: customer segments, downstream industries, partners and companies that rely on its products.`,
  },
}

/** Normalize entity names so "NVIDIA Corp." and "nvidia" collapse together */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[,.'"()]/g, ' ')
    .replace(/\b(inc|corp|co|ltd|llc|plc|company|corporation)\b/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function buildQuestion(side: Side, ctx: IdentifyContext, maxEntities: number): string {
  const { ask } = SIDE_PROMPTS[side]
  return `Company: ${ctx.companyName}
Description: ${ctx.startupText.slice(0, MAX_DESCRIPTION_CHARS)}

${ask(ctx.companyName)}
Return ONLY a JSON array of at most ${maxEntities} objects with keys:
entity_name, entity_type (company | sector | commodity | regulator | technology), category, relationship (one sentence on the link to ${ctx.companyName}).`
}

/** Returns null when the text holds no recognizable entity list */
export function parseEntities(text: string): Entity[] | null {
  const list = entityListSchema.safeParse(extractJson(text))
  if (!list.success) return null
  const entities = list.data.flatMap((item) => {
    const parsed = entitySchema.safeParse(item)
    return parsed.success && parsed.data.entity_name ? [parsed.data] : []
  })
  // A non-empty list with no usable entity is a citation marker like "[1]", not an answer
  return list.data.length > 0 && entities.length === 0 ? null : entities
}

/** Dedupe by normalized name, drop the company itself, cap the count */
export function cleanEntities(entities: Entity[], companyName: string, max: number): Entity[] {
  const self = normalizeName(companyName)
  const seen = new Set<string>()
  const out: Entity[] = []
  for (const entity of entities) {
    const key = normalizeName(entity.entity_name)
    if (!key || key === self || seen.has(key)) continue
    seen.add(key)
    out.push(entity)
    if (out.length >= max) break
  }
  return out
}

async function extractWithLlm(answer: string, side: Side, llm: LlmClient): Promise<Entity[] | null> {
  const text = await llm.complete({
    system: ENTITY_EXTRACTION_SYSTEM,
    prompt: `Extract the ${SIDE_PROMPTS[side].label} named in this research answer:\n\n${answer}`,
    maxTokens: 1200,
  })
  return parseEntities(text)
}

/**
 * Identifies entities on one side of the company.
 * Throws SearchProviderError when the search call fails or nothing parseable comes back.
 */
export async function identifyEntities(
  side: Side,
  ctx: IdentifyContext,
  deps: IdentifyDeps
): Promise<IdentifiedEntities> {
  const { answer, sources } = await deps.search.ask({
    question: buildQuestion(side, ctx, deps.maxEntities),
    maxTokens: 1200,
  })

  let entities = parseEntities(answer)
  if (!entities) {
    console.info(`[search] ${side} answer is prose, extracting with LLM`)
    try {
      entities = await extractWithLlm(answer, side, deps.llm)
    } catch (err) {
      throw new SearchProviderError(
        `Could not extract ${SIDE_PROMPTS[side].label} from search answer: ${extractErrorMessage(err)}`,
        { cause: err }
      )
    }
  }
  if (!entities) {
    throw new SearchProviderError(`Search answer for ${SIDE_PROMPTS[side].label} was unparseable`)
  }

  return {
    entities: cleanEntities(entities, ctx.companyName, deps.maxEntities),
    rawAnswer: answer,
    sources,
  }
}

export function identifyDependencies(ctx: IdentifyContext, deps: IdentifyDeps) {
  return identifyEntities('dependency', ctx, deps)
}

export function identifyDependents(ctx: IdentifyContext, deps: IdentifyDeps) {
  return identifyEntities('dependent', ctx, deps)
}

// --- Company name ------------------------------------------------------------

const NAME_PATTERNS = [
  /^\s*(?:company\s+)?name\s*:\s*([^\n]+)/im,
  /^\s*([A-Z][\w&.-]*(?:\s+[A-Z][\w&.-]*){0,3})\s+(?:is|are)\b/m,
]

/** Reads the company name from the description itself, or "Startup" */
export function guessCompanyName(startupText: string): string {
  for (const pattern of NAME_PATTERNS) {
    const name = startupText.match(pattern)?.[1]?.trim()
    if (name) return name.replace(/[.,;]+$/, '')
  }
  return 'Startup'
}

const REFUSAL = /^(i|it|this|sorry|unknown|unclear|none|n\/a)\b/i
const CONNECTORS = new Set(['of', 'and', 'the', 'for', 'de', 'la', 'von'])

/** A name, not a sentence about one: "The company is X" and "I don't know" fail */
export function isPlausibleName(answer: string): boolean {
  if (!answer || answer.length > 60 || answer.includes('\n') || REFUSAL.test(answer)) return false
  const lowercaseWords = answer.split(/\s+/).filter((w) => /^[a-z]/.test(w) && !CONNECTORS.has(w))
  return lowercaseWords.length < 2
}

/**
 * Asks the search engine for the company's name.
 * Falls back to the description heuristic when the call fails or rambles.
 */
export async function resolveCompanyName(startupText: string, search: SearchClient): Promise<string> {
  try {
    const { answer } = await search.ask({
      question: `What is the name of the company described below? Reply with the name only.\n\n${startupText.slice(0, MAX_DESCRIPTION_CHARS)}`,
      maxTokens: 30,
    })
    const name = answer.replace(/^["'`*\s]+|["'`*.\s]+$/g, '')
    if (isPlausibleName(name)) return name
    console.warn('[search] company name answer was not a name, using heuristic')
  } catch (err) {
    console.warn('[search] company name lookup failed:', extractErrorMessage(err))
  }
  return guessCompanyName(startupText)
}
