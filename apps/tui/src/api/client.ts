import { z } from 'zod';
import type {
  MarketOverview,
  Startup,
  StartupSummary,
  Stock,
  StockSummary,
} from '@marketdesk/types';
import {
  ApiErrorBodySchema,
  MarketOverviewSchema,
  StartupSchema,
  StartupSummarySchema,
  StockSchema,
  StockSummarySchema,
} from '@marketdesk/utils';
import type { Logger } from '@marketdesk/utils';
import { ConnectionFailureError, HttpError, NotFoundError, ResponseShapeError } from './errors';

/**
 * Read side of the data service as the terminal client sees it.
 * Every call accepts a signal so a newer load can cancel a stale one.
 */
export interface MarketApi {
  getStocksOverview(signal?: AbortSignal): Promise<MarketOverview>;
  listStocks(signal?: AbortSignal): Promise<StockSummary[]>;
  getStock(ticker: string, signal?: AbortSignal): Promise<Stock>;
  listWatchlist(signal?: AbortSignal): Promise<StockSummary[]>;
  listStartups(signal?: AbortSignal): Promise<StartupSummary[]>;
  getStartup(startupId: string, signal?: AbortSignal): Promise<Startup>;
}

export interface MarketApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

interface NotFoundTarget {
  resource: NotFoundError['resource'];
  key: string;
}

const StockSummaryListSchema = z.array(StockSummarySchema);
const StartupSummaryListSchema = z.array(StartupSummarySchema);

export class MarketApiClient implements MarketApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: MarketApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ component: 'api-client' });
  }

  getStocksOverview(signal?: AbortSignal): Promise<MarketOverview> {
    return this.request('/api/stocks/overview', MarketOverviewSchema, signal);
  }

  listStocks(signal?: AbortSignal): Promise<StockSummary[]> {
    return this.request('/api/stocks', StockSummaryListSchema, signal);
  }

  getStock(ticker: string, signal?: AbortSignal): Promise<Stock> {
    return this.request(`/api/stocks/${encodeURIComponent(ticker)}`, StockSchema, signal, {
      resource: 'Stock',
      key: ticker,
    });
  }

  listWatchlist(signal?: AbortSignal): Promise<StockSummary[]> {
    return this.request('/api/stocks/watchlist', StockSummaryListSchema, signal);
  }

  listStartups(signal?: AbortSignal): Promise<StartupSummary[]> {
    return this.request('/api/startups', StartupSummaryListSchema, signal);
  }

  getStartup(startupId: string, signal?: AbortSignal): Promise<Startup> {
    return this.request(`/api/startups/${encodeURIComponent(startupId)}`, StartupSchema, signal, {
      resource: 'Startup',
      key: startupId,
    });
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T>,
    signal?: AbortSignal,
    notFound?: NotFoundTarget
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: combined,
      });
    } catch (error) {
      throw this.abortFailure(error, url, signal, timeout) ?? this.unreachable(error, url);
    }

    this.logger.debug({ url, status: response.status, durationMs: Date.now() - startedAt }, 'Response received');

    if (response.status === 404 && notFound) {
      throw new NotFoundError(notFound.resource, notFound.key);
    }

    if (!response.ok) {
      const detail = await this.readErrorMessage(response, url, signal, timeout);
      this.logger.warn({ url, status: response.status, detail }, 'Request failed');
      throw new HttpError(response.status, url, detail);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const aborted = this.abortFailure(error, url, signal, timeout);
      if (aborted) throw aborted;
      this.logger.warn({ err: error, url }, 'Response body is not JSON');
      throw new ResponseShapeError(url);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ url, issues: parsed.error.issues }, 'Response failed validation');
      throw new ResponseShapeError(url, parsed.error);
    }
    return parsed.data;
  }

  /**
   * Classify a failure while the request or its body was in flight.
   * A caller abort passes through unchanged; a timeout counts as unreachable.
   * Anything else yields undefined.
   */
  private abortFailure(
    error: unknown,
    url: string,
    signal: AbortSignal | undefined,
    timeout: AbortSignal
  ): unknown {
    if (signal?.aborted) {
      return error;
    }
    if (timeout.aborted) {
      return this.unreachable(error, url);
    }
    return undefined;
  }

  private unreachable(error: unknown, url: string): ConnectionFailureError {
    this.logger.warn({ err: error, url }, 'Data service unreachable');
    return new ConnectionFailureError(url, { cause: error });
  }

  private async readErrorMessage(
    response: Response,
    url: string,
    signal: AbortSignal | undefined,
    timeout: AbortSignal
  ): Promise<string | undefined> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const aborted = this.abortFailure(error, url, signal, timeout);
      if (aborted) throw aborted;
      return response.statusText || undefined;
    }
    const parsed = ApiErrorBodySchema.safeParse(body);
    return parsed.success ? parsed.data.error : response.statusText || undefined;
  }
}
