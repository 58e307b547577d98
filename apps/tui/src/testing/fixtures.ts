import type { MarketOverview, Startup, StartupSummary, Stock, StockSummary } from '@marketdesk/types';

export function makeStock(overrides: Partial<Stock> = {}): Stock {
  return {
    ticker: 'ACME',
    name: 'Acme Corp',
    sector: 'Industrials',
    price: 1250.5,
    changePct: 1.5,
    watchlisted: true,
    marketCap: '₹1.2T',
    pe: 21.25,
    trend: 'Up',
    series: {
      oneMonth: [
        { date: '2026-09-18', price: 1200 },
        { date: '2026-10-16', price: 1250.5 },
      ],
      sixMonth: [
        { date: '2026-05-16', price: 1000 },
        { date: '2026-08-16', price: 1100 },
        { date: '2026-10-16', price: 1250.5 },
      ],
      oneYear: [
        { date: '2025-10-16', price: 900 },
        { date: '2026-10-16', price: 1250.5 },
      ],
    },
    ...overrides,
  };
}

export function toSummary(stock: Stock): StockSummary {
  return {
    ticker: stock.ticker,
    name: stock.name,
    sector: stock.sector,
    price: stock.price,
    changePct: stock.changePct,
    trend: stock.trend,
    watchlisted: stock.watchlisted,
  };
}

export function makeStartup(overrides: Partial<Startup> = {}): Startup {
  return {
    id: 'orbit-labs',
    name: 'Orbit Labs',
    sector: 'SpaceTech',
    stage: 'Seed',
    country: 'India',
    description: 'Small satellite buses',
    status: 'Watch',
    signalScore: 12.5,
    overview: 'Builds buses for cubesats.',
    momentum: [
      { month: '2026-07', hiring: 5, buzz: 10 },
      { month: '2026-08', hiring: 7, buzz: 12, events: ['Won a launch slot'] },
      { month: '2026-09', hiring: 9, buzz: 15, events: ['Hired a CTO', 'Opened Pune office'] },
    ],
    notes: 'Early but moving.',
    ...overrides,
  };
}

export function toStartupSummary(startup: Startup): StartupSummary {
  return {
    id: startup.id,
    name: startup.name,
    sector: startup.sector,
    stage: startup.stage,
    country: startup.country,
    status: startup.status,
    signalScore: startup.signalScore,
    description: startup.description,
  };
}

export function makeOverview(overrides: Partial<MarketOverview> = {}): MarketOverview {
  return {
    asOf: '2026-10-16',
    currency: 'INR',
    indices: [{ name: 'NIFTY 50', value: 24781.35, changePct: 0.64 }],
    stockCount: 3,
    averageChangePct: 0.5,
    advances: 2,
    declines: 1,
    unchanged: 0,
    watchlistCount: 2,
    sectors: [{ sector: 'Industrials', changePct: 0.5, stockCount: 3 }],
    ...overrides,
  };
}
