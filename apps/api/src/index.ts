import { serve } from '@hono/node-server';
import { createLogger, validateEnv } from '@marketdesk/utils';
import { loadCatalog, type CatalogSnapshot } from '@marketdesk/catalog';
import { createApp } from './app';

const env = validateEnv();
const logger = createLogger({ service: 'api' });

function loadCatalogOrExit(): CatalogSnapshot {
  try {
    return loadCatalog(env.CATALOG_PATH);
  } catch (err) {
    logger.fatal({ err }, 'Failed to load catalog');
    process.exit(1);
  }
}

const catalog = loadCatalogOrExit();
logger.info(
  { asOf: catalog.asOf, stocks: catalog.stocks.length, startups: catalog.startups.length },
  'Catalog loaded'
);

const app = createApp({ catalog, logger });

// Track shutdown state to prevent double shutdown
let isShuttingDown = false;

const server = serve({
  fetch: app.fetch,
  port: env.API_PORT,
});

server.on('listening', () => {
  logger.info({ port: env.API_PORT, pid: process.pid }, 'API server running');
  logger.info('REST Endpoints:');
  logger.info('  GET  /                       - API info');
  logger.info('  GET  /health                 - Health check');
  logger.info('  GET  /metrics                - Prometheus metrics');
  logger.info('  GET  /api/stocks/overview    - Market overview');
  logger.info('  GET  /api/stocks             - List stocks');
  logger.info('  GET  /api/stocks/watchlist   - Watchlisted stocks');
  logger.info('  GET  /api/stocks/:ticker     - Get stock');
  logger.info('  GET  /api/startups           - List startups');
  logger.info('  GET  /api/startups/:id       - Get startup');
});

function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.info({ signal }, 'Shutdown already in progress, ignoring signal');
    return;
  }
  isShuttingDown = true;

  logger.info({ signal, pid: process.pid }, 'Shutting down gracefully...');

  // Stop accepting new connections; in-flight requests finish first
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error closing HTTP server');
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
