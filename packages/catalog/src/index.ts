export {
  createCatalog,
  loadCatalog,
  CatalogLoadError,
  DEFAULT_CATALOG_PATH,
} from './snapshot';
export type { CatalogSnapshot } from './snapshot';

export { createCatalogQueries } from './queries';
export type { CatalogQueries } from './queries';

export { toStockSummary, toStartupSummary, computeSignalScore } from './mappers';

export { CatalogFileSchema, StartupEntrySchema } from './schema';
export type { CatalogFile, StartupEntry } from './schema';
