/**
 * SUPPLYMESH — Express app (routes only; see index.ts for startup)
 */

import express from 'express'
import cors from 'cors'
import { parseRequest, type KnowledgeGraphBuilder } from '../src/lib/knowledgeGraph'
import { RequestValidationError, extractErrorMessage } from '../src/lib/errors'
import { isErrorEnvelope } from '../src/lib/types'

const USAGE = {
  message: "Send POST with JSON body containing 'startup_text' string.",
  example_body: {
    startup_text: 'CyberSwarm is a cybersecurity AI company using NVIDIA GPUs',
    company_name: 'CyberSwarm',
  },
}

export function createApp(builder: KnowledgeGraphBuilder): express.Express {
  const app = express()
  app.use(cors())
  app.use(express.json({ limit: '1mb' }))

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', service: 'supplymesh' })
  })

  app.get('/api/knowledge-graph', (_req, res) => {
    res.json(USAGE)
  })

  /** Bare graph, or { error } */
  app.post('/api/knowledge-graph', async (req, res) => {
    try {
      const request = parseRequest(req.body)
      const result = await builder.generate(request)
      res.status(isErrorEnvelope(result) ? 502 : 200).json(result)
    } catch (err) {
      if (err instanceof RequestValidationError) {
        return res.status(400).json({ error: err.message })
      }
      console.error('[server] knowledge-graph error:', err)
      res.status(500).json({ error: extractErrorMessage(err) })
    }
  })

  /** Graph embedded under `knowledge_graph`, the shape of a full analysis run */
  app.post('/api/analyze', async (req, res) => {
    try {
      const request = parseRequest(req.body)
      const knowledgeGraph = await builder.generate(request)
      res.json({
        analysis_timestamp: new Date().toISOString(),
        knowledge_graph: knowledgeGraph,
      })
    } catch (err) {
      if (err instanceof RequestValidationError) {
        return res.status(400).json({ error: err.message })
      }
      console.error('[server] analyze error:', err)
      res.status(500).json({ error: extractErrorMessage(err) })
    }
  })

  // Malformed JSON bodies land here from express.json()
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : 500
    if (status === 500) console.error('[server] unhandled error:', err)
    res.status(status).json({ error: status === 400 ? 'Request body must be valid JSON' : extractErrorMessage(err) })
  })

  return app
}
