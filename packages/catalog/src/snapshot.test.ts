import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createCatalog, loadCatalog, CatalogLoadError } from './snapshot';

const baseInput = {
  asOf: '2026-10-16',
  currency: 'INR',
  indices: [],
  stocks: [
    {
      ticker: 'TCS',
      name: 'Tata Consultancy Services',
      sector: 'IT Services',
      price: 3890.55,
      changePct: -0.35,
      watchlisted: true,
      marketCap: '₹14.1T',
      pe: 31.2,
      trend: 'Flat',
      series: { oneMonth: [], sixMonth: [], oneYear: [] },
    },
  ],
  startups: [
    {
      id: 'voltgrid',
      name: 'Voltgrid',
      sector: 'Energy Storage',
      stage: 'Seed',
      country: 'India',
      description: 'Battery management software',
      status: 'Watch',
      overview: 'Dispatch scheduling',
      momentum: [{ month: '2026-07', hiring: 8, buzz: 20, events: ['Signed MOU'] }],
      notes: '',
    },
  ],
};

describe('createCatalog', () => {
  it('should derive the startup signal score', () => {
    const catalog = createCatalog(baseInput);
    // 0.5 * 8 + 0.3 * 20 + 4 * 1
    expect(catalog.startups[0].signalScore).toBe(14);
  });

  it('should freeze the snapshot deeply', () => {
    const catalog = createCatalog(baseInput);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.stocks)).toBe(true);
    expect(Object.isFrozen(catalog.stocks[0])).toBe(true);
    expect(Object.isFrozen(catalog.stocks[0].series.oneMonth)).toBe(true);
    expect(Object.isFrozen(catalog.startups[0].momentum[0])).toBe(true);
  });

  it('should reject duplicate tickers', () => {
    const input = { ...baseInput, stocks: [baseInput.stocks[0], baseInput.stocks[0]] };
    expect(() => createCatalog(input)).toThrow('Duplicate stock ticker: TCS');
  });

  it('should reject duplicate startup ids', () => {
    const input = { ...baseInput, startups: [baseInput.startups[0], baseInput.startups[0]] };
    expect(() => createCatalog(input)).toThrow('Duplicate startup id: voltgrid');
  });

  it('should reject an invalid shape with the failing path', () => {
    const input = { ...baseInput, stocks: [{ ...baseInput.stocks[0], price: 'high' }] };
    expect(() => createCatalog(input)).toThrow(CatalogLoadError);
    expect(() => createCatalog(input)).toThrow(/stocks\.0\.price/);
  });
});

describe('loadCatalog', () => {
  it('should load the bundled catalog', () => {
    const catalog = loadCatalog();
    expect(catalog.asOf).toBe('2026-10-16');
    expect(catalog.currency).toBe('INR');
    expect(catalog.stocks).toHaveLength(8);
    expect(catalog.startups).toHaveLength(6);
  });

  it('should load a catalog from a given path', () => {
    const dir = mkdtempSync(join(tmpdir(), 'catalog-'));
    const path = join(dir, 'catalog.json');
    writeFileSync(path, JSON.stringify(baseInput));

    const catalog = loadCatalog(path);
    expect(catalog.stocks.map((stock) => stock.ticker)).toEqual(['TCS']);
  });

  it('should wrap unreadable files in CatalogLoadError', () => {
    const missing = join(tmpdir(), 'does-not-exist', 'catalog.json');
    try {
      loadCatalog(missing);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CatalogLoadError);
      expect(error).toMatchObject({ source: missing });
    }
  });
});
