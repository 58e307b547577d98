import { randomUUID } from 'node:crypto';
import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { createChildLogger, round, type Logger } from '@marketdesk/utils';
import type { HttpMetrics } from '../routes/metrics';

export const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Label requests by route pattern rather than raw path, so /api/stocks/TCS
 * and /api/stocks/INFY share a series. After next() the route index points
 * at the handler that produced the response.
 */
function routeLabel(c: Context): string {
  const route = c.req.matchedRoutes[c.req.routeIndex];
  return route && route.method !== 'ALL' ? route.path : 'unmatched';
}

/**
 * Tag each request with an id, log it on completion and record metrics
 */
export function requestLogger(logger: Logger, metrics: HttpMetrics) {
  return createMiddleware(async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    const log = createChildLogger(logger, { requestId });
    const start = performance.now();

    c.header(REQUEST_ID_HEADER, requestId);

    await next();

    const durationMs = round(performance.now() - start);
    const status = c.res.status;
    const route = routeLabel(c);

    log.info(
      { method: c.req.method, path: c.req.path, route, status, durationMs },
      'Request completed'
    );

    metrics.httpRequestsTotal.inc({ method: c.req.method, route, status: String(status) });
    metrics.httpRequestDuration.observe({ method: c.req.method, route }, durationMs / 1000);
  });
}
