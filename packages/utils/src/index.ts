// Validation schemas
export {
  TrendSchema,
  TickerSchema,
  PricePointSchema,
  StockSeriesSchema,
  StockSchema,
  StockSummarySchema,
  StartupStatusSchema,
  StartupIdSchema,
  MomentumPointSchema,
  StartupSchema,
  StartupSummarySchema,
  IndexSnapshotSchema,
  SectorPerformanceSchema,
  MarketOverviewSchema,
  ApiErrorBodySchema,
  EnvSchema,
  LogLevelSchema,
  validateEnv,
  safeValidateEnv,
} from './validation';

export type { EnvConfig } from './validation';

// Formatting utilities
export {
  formatCurrency,
  formatNumber,
  formatPercent,
  round,
  clamp,
  mean,
  fitCell,
  asciiSparkline,
} from './formatting';

// Errors
export { NotFoundError } from './errors';

// Logger utilities
export {
  createLogger,
  createChildLogger,
  getLogLevel,
  isValidLogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_LEVELS,
} from './logger';

export type {
  Logger,
  Level,
  LoggerConfig,
  LogLevel,
  Environment,
} from './logger';
