import { serve } from '@hono/node-server'
import { loadEnv } from './lib/env'
import { logger } from './lib/logger'
import { createApp } from './app'
import { systemClock } from './relay/clock'
import { RemoteComputeClient } from './relay/remote-compute-client'
import { RelayStats } from './relay/stats'

const env = loadEnv()

const client = new RemoteComputeClient({
  apiKey: env.RUNPOD_API_KEY,
  endpointId: env.RUNPOD_ENDPOINT_ID,
  baseUrl: env.RUNPOD_API_URL,
})

if (!client.configured) {
  logger.warn('gpu_not_configured', {
    detail: 'RUNPOD_API_KEY and RUNPOD_ENDPOINT_ID must be set; generation requests will be refused.',
  })
}

const { app, injectWebSocket } = createApp({
  env,
  client,
  clock: systemClock,
  logger,
  stats: new RelayStats(),
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server_started', { port: info.port, env: env.NODE_ENV, gpu: client.configured })
})
injectWebSocket(server)

function shutdown(signal: string) {
  logger.info('shutdown', { signal })
  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
