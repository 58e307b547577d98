import { describe, it, expect } from 'vitest';
import type { Startup, Stock } from '@marketdesk/types';
import { computeSignalScore, toStartupSummary, toStockSummary } from './mappers';

const stock: Stock = {
  ticker: 'RELIANCE',
  name: 'Reliance Industries',
  sector: 'Energy',
  price: 2945.1,
  changePct: 1.12,
  watchlisted: true,
  marketCap: '₹19.9T',
  pe: 28.4,
  trend: 'Up',
  series: {
    oneMonth: [{ date: '2026-10-16', price: 2945.1 }],
    sixMonth: [],
    oneYear: [],
  },
};

const startup: Startup = {
  id: 'airship-ml',
  name: 'Airship ML',
  sector: 'AI Infrastructure',
  stage: 'Series A',
  country: 'India',
  description: 'Managed inference',
  status: 'Interesting',
  signalScore: 42.5,
  overview: 'Hosts small language models',
  momentum: [{ month: '2026-09', hiring: 10, buzz: 20 }],
  notes: 'Hiring GPU platform roles',
};

describe('toStockSummary', () => {
  it('should keep the table fields and drop detail fields', () => {
    expect(toStockSummary(stock)).toEqual({
      ticker: 'RELIANCE',
      name: 'Reliance Industries',
      sector: 'Energy',
      price: 2945.1,
      changePct: 1.12,
      trend: 'Up',
      watchlisted: true,
    });
  });
});

describe('toStartupSummary', () => {
  it('should keep the table fields and drop detail fields', () => {
    expect(toStartupSummary(startup)).toEqual({
      id: 'airship-ml',
      name: 'Airship ML',
      sector: 'AI Infrastructure',
      stage: 'Series A',
      country: 'India',
      status: 'Interesting',
      signalScore: 42.5,
      description: 'Managed inference',
    });
  });
});

describe('computeSignalScore', () => {
  it('should be 0 for an empty series', () => {
    expect(computeSignalScore([])).toBe(0);
  });

  it('should weight average hiring, average buzz and events', () => {
    const score = computeSignalScore([
      { month: '2026-08', hiring: 10, buzz: 20 },
      { month: '2026-09', hiring: 20, buzz: 40, events: ['Closed seed round'] },
    ]);
    // 0.5 * 15 + 0.3 * 30 + 4 * 1
    expect(score).toBe(20.5);
  });

  it('should cap the score at 100', () => {
    expect(computeSignalScore([{ month: '2026-09', hiring: 200, buzz: 200 }])).toBe(100);
  });
});
