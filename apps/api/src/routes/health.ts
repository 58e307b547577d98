import { Hono } from 'hono';
import type { CatalogSnapshot } from '@marketdesk/catalog';
import type { HealthStatus } from '@marketdesk/types';

export function createHealthRouter(catalog: CatalogSnapshot): Hono {
  const health = new Hono();

  /**
   * GET /health - Liveness plus the size of the loaded catalog
   */
  health.get('/', (c) => {
    const result: HealthStatus = {
      status: 'ok',
      uptime: process.uptime(),
      catalog: {
        asOf: catalog.asOf,
        stocks: catalog.stocks.length,
        startups: catalog.startups.length,
      },
    };

    return c.json(result);
  });

  return health;
}
