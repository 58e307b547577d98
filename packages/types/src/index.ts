// Stock types
export type {
  Trend,
  Timeframe,
  PricePoint,
  StockSeries,
  Stock,
  StockSummary,
} from './stock';

// Startup types
export type {
  StartupStatus,
  MomentumPoint,
  Startup,
  StartupSummary,
} from './startup';

// Market types
export type {
  IndexSnapshot,
  SectorPerformance,
  MarketOverview,
} from './market';

// API types
export type {
  ApiErrorBody,
  ApiErrorDetail,
  ApiInfo,
  HealthStatus,
} from './api';
