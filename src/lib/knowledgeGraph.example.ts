/**
 * Example: knowledge graph JSON output
 *
 * Run: npx tsx src/lib/knowledgeGraph.example.ts [ai|coffee|fintech|"<description>"]
 * Loads .env for ANTHROPIC_API_KEY, PERPLEXITY_API_KEY, SERPAPI_API_KEY
 */

import 'dotenv/config'
import { generateKnowledgeGraph } from './knowledgeGraph'
import { isErrorEnvelope, type KnowledgeGraphRequest } from './types'

const SAMPLES: Record<string, KnowledgeGraphRequest> = {
  ai: {
    company_name: 'NeuralTech AI',
    startup_text: `NeuralTech AI builds large language models for enterprise customer service.
Training and inference run on NVIDIA H100 GPUs hosted on AWS.
Customers include hospitals, banks and e-commerce platforms.`,
  },
  coffee: {
    company_name: 'BrewCraft',
    startup_text: `BrewCraft is a specialty coffee chain with 25 US locations.
Beans are sourced directly from farms in Ethiopia, Colombia and Brazil and roasted on Probat machines.
Payments run on Square; milk comes from local dairy cooperatives.`,
  },
  fintech: {
    company_name: 'PayFlow',
    startup_text: `PayFlow offers instant B2B payments and invoicing for small businesses.
It integrates Stripe for processing, Plaid for bank connections and runs on Google Cloud.
Retailers, restaurants and logistics firms use it to improve cash flow.`,
  },
}

async function main() {
  const arg = process.argv[2] || 'ai'
  const request = SAMPLES[arg] ?? { startup_text: arg }
  console.log(`Building knowledge graph for ${request.company_name ?? 'custom description'}...\n`)

  const result = await generateKnowledgeGraph(request)
  if (isErrorEnvelope(result)) {
    console.error('Error:', result.error)
    process.exitCode = 1
    return
  }

  const { metadata } = result
  console.log('=== Summary ===')
  console.log('Company:', result.root.name)
  console.log('Dependencies:', metadata.total_dependencies)
  console.log('Dependents:', metadata.total_dependents)
  console.log('Edges:', metadata.total_edges)
  if (metadata.warnings.length > 0) console.log('Warnings:', metadata.warnings)
  console.log('\n=== Graph ===')
  console.log(JSON.stringify(result, null, 2))
}

main().catch((err) => {
  console.error(err)
  process.exitCode = 1
})
