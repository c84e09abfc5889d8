/**
 * SUPPLYMESH — API server for startup dependency knowledge graphs
 *
 * Run: npx tsx server/index.ts
 * Requires: ANTHROPIC_API_KEY, PERPLEXITY_API_KEY, SERPAPI_API_KEY
 */

import 'dotenv/config'
import { loadConfig } from '../src/lib/config'
import { ConfigurationError } from '../src/lib/errors'
import { createKnowledgeGraphBuilder, type KnowledgeGraphBuilder } from '../src/lib/knowledgeGraph'
import { createApp } from './app'

/** Fails fast on missing credentials, before the port is even opened */
function createBuilderOrExit(): KnowledgeGraphBuilder {
  try {
    return createKnowledgeGraphBuilder(loadConfig())
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}. Set them in .env (see .env.example).`)
      process.exit(1)
    }
    throw err
  }
}

function start() {
  const builder = createBuilderOrExit()
  const { port } = builder.config
  createApp(builder)
    .listen(port, () => {
      console.log(`SUPPLYMESH API running on http://localhost:${port}`)
    })
    .on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        console.error(`Port ${port} is in use. Stop the other process or set PORT=3002`)
      } else {
        console.error('Server error:', err)
      }
      process.exit(1)
    })
}

start()
