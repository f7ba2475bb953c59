import type { Context, MiddlewareHandler } from 'hono'
import { httpRequestDuration, httpRequestsTotal } from './metrics'

const UNMETERED_PATHS = new Set(['/health', '/metrics'])

/**
 * Route label for a finished request: the matched pattern
 * (`/api/escrows/:id/fund`), never the concrete path, so escrow ids
 * stay out of label values. Requests no route claimed share one label.
 */
export function routeLabel(c: Context): string {
  const pattern = c.req.routePath
  return pattern === '*' || pattern === '/*' ? 'unmatched' : pattern
}

function observe(c: Context, startedAt: number, statusCode: number): void {
  const labels = { method: c.req.method, route: routeLabel(c), status_code: String(statusCode) }
  httpRequestDuration.observe(labels, (performance.now() - startedAt) / 1000)
  httpRequestsTotal.inc(labels)
}

export function httpMetricsMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    if (UNMETERED_PATHS.has(c.req.path)) {
      return next()
    }

    const startedAt = performance.now()
    try {
      await next()
    } catch (err) {
      observe(c, startedAt, 500)
      throw err
    }
    observe(c, startedAt, c.res.status)
  }
}
