import type {
  MarketOverview,
  SectorPerformance,
  Startup,
  StartupSummary,
  Stock,
  StockSummary,
} from '@marketdesk/types';
import { NotFoundError, mean, round } from '@marketdesk/utils';
import type { CatalogSnapshot } from './snapshot';
import { toStartupSummary, toStockSummary } from './mappers';

export interface CatalogQueries {
  listStocksOverview(): MarketOverview;
  listStocks(): StockSummary[];
  getStock(ticker: string): Stock;
  listWatchlist(): StockSummary[];
  listStartups(): StartupSummary[];
  getStartup(id: string): Startup;
}

function summarizeSectors(stocks: readonly Stock[]): SectorPerformance[] {
  // Map keeps first-appearance order
  const bySector = new Map<string, number[]>();
  for (const stock of stocks) {
    const changes = bySector.get(stock.sector) ?? [];
    changes.push(stock.changePct);
    bySector.set(stock.sector, changes);
  }

  return Array.from(bySector, ([sector, changes]) => ({
    sector,
    changePct: round(mean(changes)),
    stockCount: changes.length,
  }));
}

/**
 * Read-only lookups over a catalog snapshot
 */
export function createCatalogQueries(catalog: CatalogSnapshot): CatalogQueries {
  const stocksByTicker = new Map(catalog.stocks.map((stock) => [stock.ticker, stock] as const));
  const startupsById = new Map(catalog.startups.map((startup) => [startup.id, startup] as const));

  return {
    listStocksOverview() {
      const changes = catalog.stocks.map((stock) => stock.changePct);

      return {
        asOf: catalog.asOf,
        currency: catalog.currency,
        indices: [...catalog.indices],
        stockCount: catalog.stocks.length,
        averageChangePct: round(mean(changes)),
        advances: changes.filter((change) => change > 0).length,
        declines: changes.filter((change) => change < 0).length,
        unchanged: changes.filter((change) => change === 0).length,
        watchlistCount: catalog.stocks.filter((stock) => stock.watchlisted).length,
        sectors: summarizeSectors(catalog.stocks),
      };
    },

    listStocks() {
      return catalog.stocks.map(toStockSummary);
    },

    getStock(ticker) {
      const stock = stocksByTicker.get(ticker);
      if (!stock) {
        throw new NotFoundError('Stock', ticker);
      }
      return stock;
    },

    listWatchlist() {
      return catalog.stocks.filter((stock) => stock.watchlisted).map(toStockSummary);
    },

    listStartups() {
      return catalog.startups.map(toStartupSummary);
    },

    getStartup(id) {
      const startup = startupsById.get(id);
      if (!startup) {
        throw new NotFoundError('Startup', id);
      }
      return startup;
    },
  };
}
