import type { PageFetcher, StagingSink } from '../types/index.js';
import { CrawlError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { canonicalUrl } from '../scraper/fields.js';
import { assertCatalogUrl, scrapePage, type ScrapedPage } from '../scraper/page-scraper.js';

export interface WalkOptions {
    startUrl: string;
    catalogPrefix: string;

    /** Hard bound on pages fetched before the walk must have wrapped around */
    maxPages: number;

    /** Upper bound of the random pause before each fetch */
    delayMs: number;

    fetcher: PageFetcher;

    /** Injection points for tests */
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export interface CrawlOptions extends WalkOptions {
    sink: StagingSink;
}

export interface CrawlReport {
    pages: number;
    newAbilities: number;
    warnings: number;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Follow "next" links from the start page until they lead back to it.
 *
 * Stops with a CrawlError when `maxPages` pages have been fetched without
 * wrapping around, or when a next link points at a page already visited
 * other than the start page.
 */
export async function* walkCatalog(options: WalkOptions): AsyncGenerator<ScrapedPage> {
    const { catalogPrefix, maxPages, delayMs, fetcher } = options;
    const pause = options.sleep ?? sleep;
    const random = options.random ?? Math.random;

    assertCatalogUrl(options.startUrl, catalogPrefix);
    if (!Number.isInteger(maxPages) || maxPages <= 0) {
        throw new CrawlError(`maxPages must be a positive integer, got ${maxPages}`, options.startUrl);
    }
    const startUrl = canonicalUrl(options.startUrl);

    const visited = new Set<string>();
    let url = startUrl;

    for (;;) {
        if (visited.size >= maxPages) {
            throw new CrawlError(`Fetched ${maxPages} pages without returning to ${startUrl}`, url);
        }
        visited.add(url);

        const delay = Math.floor(random() * delayMs);
        getLogger().debug({ delayMs: delay }, 'Waiting before next request');
        await pause(delay);

        const page = await scrapePage(url, fetcher, catalogPrefix);
        yield page;

        if (page.nextUrl === startUrl) {
            return;
        }
        if (visited.has(page.nextUrl)) {
            throw new CrawlError(`Next link of ${url} loops back to ${page.nextUrl}`, page.nextUrl);
        }
        url = page.nextUrl;
    }
}

/**
 * Walk the whole catalog into the staging store.
 */
export async function crawlCatalog(options: CrawlOptions): Promise<CrawlReport> {
    const report: CrawlReport = { pages: 0, newAbilities: 0, warnings: 0 };

    getLogger().info({ startUrl: options.startUrl, maxPages: options.maxPages }, 'Starting crawl');

    for await (const page of walkCatalog(options)) {
        const { newAbilities } = options.sink.savePage(page.pokemon, page.abilities);

        report.pages++;
        report.newAbilities += newAbilities;
        report.warnings += page.warnings.length;

        getLogger().info(
            {
                number: page.pokemon.number,
                name: page.pokemon.name,
                url: page.pokemon.url,
                forms: page.pokemon.forms.length,
                newAbilities,
            },
            'Scraped page'
        );
    }

    getLogger().info(report, 'Crawl complete');
    return report;
}
