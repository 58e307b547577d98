import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ZodError } from 'zod';
import type { IndexSnapshot, Startup, Stock } from '@marketdesk/types';
import { CatalogFileSchema } from './schema';
import { computeSignalScore } from './mappers';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/catalog.json', import.meta.url));

/**
 * Immutable catalog, built once at startup and passed to the query layer
 */
export interface CatalogSnapshot {
  readonly asOf: string;
  readonly currency: string;
  readonly indices: readonly IndexSnapshot[];
  readonly stocks: readonly Stock[];
  readonly startups: readonly Startup[];
}

export class CatalogLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CatalogLoadError';
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function findDuplicate(keys: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) return key;
    seen.add(key);
  }
  return undefined;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate raw catalog data and freeze it into a snapshot
 */
export function createCatalog(input: unknown, source: string = '(memory)'): CatalogSnapshot {
  const parsed = CatalogFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogLoadError(`Invalid catalog: ${describeIssues(parsed.error)}`, source, {
      cause: parsed.error,
    });
  }

  const file = parsed.data;

  const duplicateTicker = findDuplicate(file.stocks.map((stock) => stock.ticker));
  if (duplicateTicker !== undefined) {
    throw new CatalogLoadError(`Duplicate stock ticker: ${duplicateTicker}`, source);
  }

  const duplicateId = findDuplicate(file.startups.map((startup) => startup.id));
  if (duplicateId !== undefined) {
    throw new CatalogLoadError(`Duplicate startup id: ${duplicateId}`, source);
  }

  return deepFreeze({
    asOf: file.asOf,
    currency: file.currency,
    indices: file.indices,
    stocks: file.stocks,
    startups: file.startups.map((entry) => ({
      ...entry,
      signalScore: computeSignalScore(entry.momentum),
    })),
  });
}

/**
 * Read and validate the catalog JSON file
 */
export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): CatalogSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Cannot read catalog: ${reason}`, path, { cause: error });
  }
  return createCatalog(raw, path);
}
