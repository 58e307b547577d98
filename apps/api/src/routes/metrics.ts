import { Hono } from 'hono';
import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from 'prom-client';
import type { CatalogSnapshot } from '@marketdesk/catalog';

export interface HttpMetrics {
  register: Registry;
  httpRequestsTotal: Counter<'method' | 'route' | 'status'>;
  httpRequestDuration: Histogram<'method' | 'route'>;
}

/**
 * One registry per app instance, so several apps can live in one process
 */
export function createHttpMetrics(catalog: CatalogSnapshot): HttpMetrics {
  const register = new Registry();

  // Default Node.js metrics (memory, CPU, event loop)
  collectDefaultMetrics({ register });

  const httpRequestsTotal = new Counter({
    name: 'marketdesk_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [register],
  });

  const httpRequestDuration = new Histogram({
    name: 'marketdesk_http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route'] as const,
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    registers: [register],
  });

  const catalogStocks = new Gauge({
    name: 'marketdesk_catalog_stocks',
    help: 'Number of stocks in the loaded catalog',
    registers: [register],
  });
  catalogStocks.set(catalog.stocks.length);

  const catalogStartups = new Gauge({
    name: 'marketdesk_catalog_startups',
    help: 'Number of startups in the loaded catalog',
    registers: [register],
  });
  catalogStartups.set(catalog.startups.length);

  return { register, httpRequestsTotal, httpRequestDuration };
}

export function createMetricsRouter(metrics: HttpMetrics): Hono {
  const router = new Hono();

  /**
   * GET /metrics - Prometheus metrics endpoint
   */
  router.get('/', async (c) => {
    const body = await metrics.register.metrics();
    return c.text(body, 200, { 'Content-Type': metrics.register.contentType });
  });

  return router;
}
