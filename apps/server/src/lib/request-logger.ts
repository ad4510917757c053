/**
 * Request logging middleware: one `request` line per HTTP request with
 * method, path, response status and duration in ms.
 */

import type { Context, Next } from 'hono'
import type { Logger } from './logger'

export function requestLogger(log: Logger) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = Number((performance.now() - start).toFixed(1))

    log.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms,
    })
  }
}
