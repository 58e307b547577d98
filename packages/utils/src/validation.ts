import { z } from 'zod';
import type {
  ApiErrorBody,
  IndexSnapshot,
  MarketOverview,
  MomentumPoint,
  PricePoint,
  SectorPerformance,
  Startup,
  StartupSummary,
  Stock,
  StockSeries,
  StockSummary,
} from '@marketdesk/types';

// Stock validation schemas
export const TrendSchema = z.enum(['Up', 'Flat', 'Down']);

export const TickerSchema = z.string().min(1).max(20).regex(/^[A-Z0-9&.-]+$/, 'Ticker must be upper case');

export const PricePointSchema: z.ZodType<PricePoint> = z.object({
  date: z.string().min(1),
  price: z.number().nonnegative(),
});

export const StockSeriesSchema: z.ZodType<StockSeries> = z.object({
  oneMonth: z.array(PricePointSchema),
  sixMonth: z.array(PricePointSchema),
  oneYear: z.array(PricePointSchema),
});

export const StockSchema: z.ZodType<Stock> = z.object({
  ticker: TickerSchema,
  name: z.string().min(1),
  sector: z.string().min(1),
  price: z.number().nonnegative(),
  changePct: z.number(),
  watchlisted: z.boolean(),
  marketCap: z.string(),
  pe: z.number(),
  trend: TrendSchema,
  series: StockSeriesSchema,
});

export const StockSummarySchema: z.ZodType<StockSummary> = z.object({
  ticker: TickerSchema,
  name: z.string(),
  sector: z.string(),
  price: z.number(),
  changePct: z.number(),
  trend: TrendSchema,
  watchlisted: z.boolean(),
});

// Startup validation schemas
export const StartupStatusSchema = z.enum(['Ignore', 'Watch', 'Interesting']);

export const StartupIdSchema = z.string().min(1).max(64).regex(/^[a-z0-9-]+$/, 'Startup id must be a lower-case slug');

export const MomentumPointSchema: z.ZodType<MomentumPoint> = z.object({
  month: z.string().min(1),
  hiring: z.number().int().nonnegative(),
  buzz: z.number().int().nonnegative(),
  events: z.array(z.string()).optional(),
});

export const StartupSchema: z.ZodType<Startup> = z.object({
  id: StartupIdSchema,
  name: z.string().min(1),
  sector: z.string().min(1),
  stage: z.string().min(1),
  country: z.string(),
  description: z.string(),
  status: StartupStatusSchema,
  signalScore: z.number().min(0).max(100),
  overview: z.string(),
  momentum: z.array(MomentumPointSchema),
  notes: z.string(),
});

export const StartupSummarySchema: z.ZodType<StartupSummary> = z.object({
  id: StartupIdSchema,
  name: z.string(),
  sector: z.string(),
  stage: z.string(),
  country: z.string(),
  status: StartupStatusSchema,
  signalScore: z.number(),
  description: z.string(),
});

// Market overview schemas
export const IndexSnapshotSchema: z.ZodType<IndexSnapshot> = z.object({
  name: z.string().min(1),
  value: z.number(),
  changePct: z.number(),
});

export const SectorPerformanceSchema: z.ZodType<SectorPerformance> = z.object({
  sector: z.string(),
  changePct: z.number(),
  stockCount: z.number().int().nonnegative(),
});

export const MarketOverviewSchema: z.ZodType<MarketOverview> = z.object({
  asOf: z.string(),
  currency: z.string().length(3),
  indices: z.array(IndexSnapshotSchema),
  stockCount: z.number().int().nonnegative(),
  averageChangePct: z.number(),
  advances: z.number().int().nonnegative(),
  declines: z.number().int().nonnegative(),
  unchanged: z.number().int().nonnegative(),
  watchlistCount: z.number().int().nonnegative(),
  sectors: z.array(SectorPerformanceSchema),
});

export const ApiErrorBodySchema: z.ZodType<ApiErrorBody> = z.object({
  error: z.string(),
  details: z
    .array(
      z.object({
        path: z.string(),
        message: z.string(),
      })
    )
    .optional(),
});

// Log level validation
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// Environment validation
export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Data service
  API_PORT: z.coerce.number().int().positive().default(8000),
  CATALOG_PATH: z.string().min(1).optional(),

  // Terminal client
  API_BASE_URL: z.string().url().default('http://localhost:8000'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TUI_LOG_FILE: z.string().min(1).default('logs/tui.log'),

  // Logging configuration
  LOG_LEVEL: LogLevelSchema.optional(),
  LOG_LEVEL_API: LogLevelSchema.optional(),
  LOG_LEVEL_TUI: LogLevelSchema.optional(),
});

/**
 * Validate environment variables at application startup.
 * Throws a ZodError if validation fails.
 *
 * @example
 * ```typescript
 * import { validateEnv } from '@marketdesk/utils';
 *
 * const env = validateEnv();
 * serve({ fetch: app.fetch, port: env.API_PORT });
 * ```
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

/**
 * Validate environment variables without throwing.
 */
export function safeValidateEnv(env: NodeJS.ProcessEnv = process.env): z.SafeParseReturnType<z.input<typeof EnvSchema>, EnvConfig> {
  return EnvSchema.safeParse(env);
}

export type EnvConfig = z.infer<typeof EnvSchema>;
