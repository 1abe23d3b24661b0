/**
 * Library entry point.
 */
export * from './types/index.js';
export { InvalidUrlError, ExtractionError, LineageError, CrawlError, LoadError } from './utils/errors.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { parsePokedexPage, scrapePage, assertCatalogUrl, type ScrapedPage } from './scraper/page-scraper.js';
export { assemblePokemon, type PageParts } from './scraper/assembler.js';
export { parseLineage, lineageEdges, normalizeLineage } from './normalize/lineage.js';
export { walkCatalog, crawlCatalog, type CrawlOptions, type CrawlReport, type WalkOptions } from './crawler/crawler.js';
export { loadPokedex, loadAbilities, loadPokemon, type LoadReport } from './loader/loader.js';
export { PokedexDatabase } from './storage/database.js';
export { StagingStore } from './storage/staging-store.js';
