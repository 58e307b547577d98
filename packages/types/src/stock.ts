export type Trend = 'Up' | 'Flat' | 'Down';

export type Timeframe = '1M' | '6M' | '1Y';

export interface PricePoint {
  date: string;
  price: number;
}

export interface StockSeries {
  oneMonth: PricePoint[];
  sixMonth: PricePoint[];
  oneYear: PricePoint[];
}

export interface Stock {
  ticker: string;
  name: string;
  sector: string;
  price: number;
  /** Daily change in percent */
  changePct: number;
  watchlisted: boolean;
  marketCap: string;
  pe: number;
  trend: Trend;
  series: StockSeries;
}

/**
 * Row shape for stock tables and the watchlist
 */
export interface StockSummary {
  ticker: string;
  name: string;
  sector: string;
  price: number;
  changePct: number;
  trend: Trend;
  watchlisted: boolean;
}
