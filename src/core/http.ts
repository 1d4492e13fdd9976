import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import { silentLogger, type Logger } from './logger.js'
import { toPersonaView, type PersonaCatalog } from './personas.js'
import type { SessionRegistry } from './registry.js'

export interface HttpAppOptions {
  catalog: PersonaCatalog
  registry: SessionRegistry
  /** Directory served as static files (browser bundle, worklet) */
  staticDir?: string
  logger?: Logger
}

/**
 * Read-only REST endpoints plus optional static hosting
 */
export function createHttpApp(options: HttpAppOptions): Express {
  const { catalog, registry } = options
  const logger = options.logger ?? silentLogger
  const app = express()

  app.disable('x-powered-by')

  app.get('/api/personas', (_req: Request, res: Response) => {
    res.json({ personas: catalog.list().map(toPersonaView) })
  })

  app.get('/api/personas/:id', (req: Request, res: Response) => {
    const result = catalog.lookup(req.params.id)
    if (!result.found) {
      res.status(404).json({ error: 'Persona not found' })
      return
    }
    res.json({ persona: toPersonaView(result.persona) })
  })

  app.get('/api/stats', (_req: Request, res: Response) => {
    const snapshot = registry.snapshot()
    res.json({
      active_connections: snapshot.activeSessions,
      connected_clients: snapshot.clients,
      available_personas: catalog.size,
      persona_usage: snapshot.personaUsage
    })
  })

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' })
  })

  if (options.staticDir) {
    app.use(express.static(options.staticDir))
  }

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' })
  })

  // Express recognizes error middleware by its four parameters
  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('HTTP request failed:', error)
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
