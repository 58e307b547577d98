export interface IndexSnapshot {
  name: string;
  value: number;
  changePct: number;
}

export interface SectorPerformance {
  sector: string;
  changePct: number;
  stockCount: number;
}

export interface MarketOverview {
  asOf: string;
  /** ISO 4217 code prices are quoted in */
  currency: string;
  indices: IndexSnapshot[];
  stockCount: number;
  averageChangePct: number;
  advances: number;
  declines: number;
  unchanged: number;
  watchlistCount: number;
  sectors: SectorPerformance[];
}
