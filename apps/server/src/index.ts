import { serve } from '@hono/node-server'
import { env } from './lib/env'
import { jsonLogger } from './lib/logger'
import { createApp } from './app'

const app = createApp()

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  jsonLogger.info({ event: 'server_started', port: info.port, env: env.NODE_ENV })
})

function shutdown(signal: string) {
  jsonLogger.info({ event: 'shutdown', signal })
  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
