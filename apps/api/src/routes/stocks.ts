import { Hono } from 'hono';
import type { CatalogQueries } from '@marketdesk/catalog';

export function createStocksRouter(queries: CatalogQueries): Hono {
  const stocks = new Hono();

  // Static paths first so they are never read as a ticker

  /**
   * GET /api/stocks/overview - Aggregate summary over all stocks
   */
  stocks.get('/overview', (c) => {
    return c.json(queries.listStocksOverview());
  });

  /**
   * GET /api/stocks/watchlist - Watchlisted stocks, in catalog order
   */
  stocks.get('/watchlist', (c) => {
    return c.json(queries.listWatchlist());
  });

  /**
   * GET /api/stocks - List all stocks
   */
  stocks.get('/', (c) => {
    return c.json(queries.listStocks());
  });

  /**
   * GET /api/stocks/:ticker - Stock details with price series
   */
  stocks.get('/:ticker', (c) => {
    const { ticker } = c.req.param();
    return c.json(queries.getStock(ticker));
  });

  return stocks;
}
