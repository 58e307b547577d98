import type { MomentumPoint, Startup, StartupSummary, Stock, StockSummary } from '@marketdesk/types';
import { clamp, mean, round } from '@marketdesk/utils';

const HIRING_WEIGHT = 0.5;
const BUZZ_WEIGHT = 0.3;
const EVENT_POINTS = 4;

export function toStockSummary(stock: Stock): StockSummary {
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

/**
 * Mock composite of hiring, buzz and event signals, bounded to 0-100.
 * Stands in for a real signal model until one exists.
 */
export function computeSignalScore(momentum: readonly MomentumPoint[]): number {
  const avgHiring = mean(momentum.map((point) => point.hiring));
  const avgBuzz = mean(momentum.map((point) => point.buzz));
  const eventCount = momentum.reduce((sum, point) => sum + (point.events?.length ?? 0), 0);

  const raw = HIRING_WEIGHT * avgHiring + BUZZ_WEIGHT * avgBuzz + EVENT_POINTS * eventCount;
  return round(clamp(raw, 0, 100), 1);
}
