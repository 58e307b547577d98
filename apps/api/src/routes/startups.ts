import { Hono } from 'hono';
import type { CatalogQueries } from '@marketdesk/catalog';

export function createStartupsRouter(queries: CatalogQueries): Hono {
  const startups = new Hono();

  /**
   * GET /api/startups - List all startups
   */
  startups.get('/', (c) => {
    return c.json(queries.listStartups());
  });

  /**
   * GET /api/startups/:startupId - Startup details with momentum
   */
  startups.get('/:startupId', (c) => {
    const { startupId } = c.req.param();
    return c.json(queries.getStartup(startupId));
  });

  return startups;
}
