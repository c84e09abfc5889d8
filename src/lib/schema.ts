/**
 * SUPPLYMESH — Validation contracts
 *
 * Everything that crosses a trust boundary (HTTP body, search answers,
 * model output) is checked against one of these.
 */

import { z } from 'zod'

// ── Request ─────────────────────────────────────────────────────────────────

export const knowledgeGraphRequestSchema = z.object({
  startup_text: z.string().trim().min(1, "'startup_text' must be a non-empty string"),
  company_name: z
    .string()
    .trim()
    .nullish()
    .transform((v) => (v ? v : undefined)),
})

// ── Entities from the search engine / extraction model ─────────────────────

const looseString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())

export const entitySchema = z
  .object({
    entity_name: looseString.optional(),
    name: looseString.optional(),
    entity_type: looseString.optional(),
    type: looseString.optional(),
    category: looseString.optional(),
    relationship: looseString.optional(),
    description: looseString.optional(),
  })
  .transform((e) => ({
    entity_name: e.entity_name || e.name || '',
    entity_type: (e.entity_type || e.type || 'company').toLowerCase(),
    category: e.category || 'Other',
    relationship: e.relationship || e.description || '',
  }))

/** Accepts a bare array or `{ entities: [...] }` */
export const entityListSchema = z.union([
  z.array(z.unknown()),
  z.object({ entities: z.array(z.unknown()) }).transform((o) => o.entities),
])

// ── Enrichment answers ─────────────────────────────────────────────────────

const nullableFact = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((v) => {
    if (v === null || v === undefined) return null
    const s = String(v).trim()
    return s && !/^(n\/?a|null|none|unknown|not applicable)$/i.test(s) ? s : null
  })

export const marketDataSchema = z.object({
  stock_ticker: nullableFact,
  stock_price: nullableFact,
  '52_week_high': nullableFact,
  '52_week_low': nullableFact,
})

export const tradeDataSchema = z.object({
  india: nullableFact,
  us: nullableFact,
  china: nullableFact,
})

// ── Graph contract for the structuring model ───────────────────────────────

// null and '' mean "not given", not 0
const strength = z
  .preprocess((v) => (v === null || v === '' ? undefined : v), z.coerce.number().catch(0.5))
  .transform((n) => (Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : 0.5))

// Off-list types are dropped: repair takes the type from enrichment
const nodeType = z
  .preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
    z.enum(['dependency', 'dependent', 'company'])
  )
  .optional()
  .catch(undefined)

export const llmNodeSchema = z
  .object({
    id: looseString.optional(),
    name: looseString,
    type: nodeType,
    category: looseString.optional(),
    relationship: looseString.optional(),
    hover_info: looseString.optional(),
  })
  .transform((n) => ({ ...n, id: n.id || n.name }))

export const llmEdgeSchema = z
  .object({
    source: looseString.optional(),
    target: looseString.optional(),
    from: looseString.optional(),
    to: looseString.optional(),
    relationship: looseString.optional(),
    label: looseString.optional(),
    strength: strength.optional(),
  })
  .transform((e, ctx) => {
    const source = e.source || e.from
    const target = e.target || e.to
    if (!source || !target) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'edge needs source and target' })
      return z.NEVER
    }
    return {
      source,
      target,
      relationship: e.relationship || e.label || '',
      strength: e.strength ?? 0.5,
    }
  })

export const llmGraphSchema = z.object({
  // Rebuilt from the company anyway, so a missing root is not a failure
  root: z.preprocess(
    (v) => v ?? {},
    z.object({
      id: looseString.optional(),
      name: looseString.optional(),
      category: looseString.optional(),
      description: looseString.optional(),
      hover_info: looseString.optional(),
    })
  ),
  nodes: z.array(llmNodeSchema),
  edges: z.array(llmEdgeSchema),
})

export type LlmGraph = z.infer<typeof llmGraphSchema>
