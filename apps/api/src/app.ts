import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { prettyJSON } from 'hono/pretty-json';
import { createCatalogQueries, type CatalogSnapshot } from '@marketdesk/catalog';
import type { ApiInfo } from '@marketdesk/types';
import type { Logger } from '@marketdesk/utils';

import { createErrorHandler, notFoundHandler } from './middleware/error';
import { requestLogger, REQUEST_ID_HEADER } from './middleware/request-logger';

import { createStocksRouter } from './routes/stocks';
import { createStartupsRouter } from './routes/startups';
import { createHealthRouter } from './routes/health';
import { createHttpMetrics, createMetricsRouter } from './routes/metrics';

export const API_NAME = 'Market Desk API';
export const API_VERSION = '0.1.0';

export interface AppDependencies {
  catalog: CatalogSnapshot;
  logger: Logger;
}

export function createApp({ catalog, logger }: AppDependencies): Hono {
  const queries = createCatalogQueries(catalog);
  const metrics = createHttpMetrics(catalog);

  const app = new Hono();

  // Global middleware
  // Request logging comes first so it sees the final status of every response
  app.use('*', requestLogger(logger, metrics));
  app.use('*', prettyJSON());
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'OPTIONS'],
    allowHeaders: ['Content-Type', REQUEST_ID_HEADER],
  }));

  app.get('/', (c) => {
    const info: ApiInfo = {
      name: API_NAME,
      version: API_VERSION,
      status: 'operational',
      timestamp: new Date().toISOString(),
    };
    return c.json(info);
  });

  app.route('/health', createHealthRouter(catalog));
  app.route('/metrics', createMetricsRouter(metrics));

  // API routes
  app.route('/api/stocks', createStocksRouter(queries));
  app.route('/api/startups', createStartupsRouter(queries));

  app.notFound(notFoundHandler);
  app.onError(createErrorHandler(logger));

  return app;
}
