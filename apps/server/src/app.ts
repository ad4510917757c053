import { Hono } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { cors } from 'hono/cors'
import { createNodeWebSocket } from '@hono/node-ws'
import type { Env } from './lib/env'
import { requestLogger } from './lib/request-logger'
import { issueSessionId, resolveSessionId } from './auth/session-cookie'
import { relaySocketEvents, type RelayDeps } from './socket/connection'

export const API_INFO = { name: 'GPU Relay', version: '0.1.0' } as const

export interface AppOptions extends RelayDeps {
  env: Pick<Env, 'NODE_ENV' | 'SESSION_SECRET' | 'CORS_ORIGINS'>
}

export function createApp(options: AppOptions) {
  const { env, logger, client, stats } = options
  const app = new Hono()
  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app })

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500
    if (status >= 500) {
      logger.error('unhandled_error', {
        method: c.req.method,
        path: c.req.path,
        error: err.message,
        stack: env.NODE_ENV !== 'production' ? err.stack : undefined,
      })
    }
    return c.json(
      { error: status >= 500 ? 'Internal server error.' : err.message },
      { status: status as ContentfulStatusCode },
    )
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware
  // ---------------------------------------------------------------------------

  app.use('*', requestLogger(logger))
  app.use(
    '*',
    cors({
      origin: env.CORS_ORIGINS,
      credentials: true,
      allowMethods: ['GET', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // ---------------------------------------------------------------------------
  // HTTP routes
  // ---------------------------------------------------------------------------

  app.get('/', (c) => c.json(API_INFO))

  app.get('/health', (c) => {
    const gpu = client.configured ? 'configured' : 'missing'
    const healthy = client.configured
    return c.json({ status: healthy ? 'healthy' : 'degraded', checks: { gpu } }, healthy ? 200 : 503)
  })

  app.get('/gpu-stats', (c) => c.json(stats.snapshot()))

  app.get('/session', async (c) => {
    const sessionId = await issueSessionId(c, env.SESSION_SECRET, env.NODE_ENV === 'production')
    return c.json({ sessionId })
  })

  // ---------------------------------------------------------------------------
  // Relay socket: one session per connection
  // ---------------------------------------------------------------------------

  app.get(
    '/ws',
    upgradeWebSocket(async (c) => relaySocketEvents(await resolveSessionId(c, env.SESSION_SECRET), options)),
  )

  return { app, injectWebSocket }
}
