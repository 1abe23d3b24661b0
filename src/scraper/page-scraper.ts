import * as cheerio from 'cheerio';
import type { Ability, PageFetcher, Pokemon } from '../types/index.js';
import { ExtractionError, InvalidUrlError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { assemblePokemon } from './assembler.js';
import {
    extractAbilities,
    extractAttributes,
    extractDescriptions,
    extractFormLabels,
    extractImages,
    extractLineage,
    extractName,
    extractNextUrl,
    extractNumber,
    extractTypes,
} from './fields.js';

/**
 * Result of scraping one pokédex page.
 */
export interface ScrapedPage {
    pokemon: Pokemon;
    abilities: Ability[];
    nextUrl: string;

    /** Data-integrity anomalies that did not abort the page */
    warnings: string[];
}

/**
 * Throws unless the URL lives under the catalog prefix.
 */
export function assertCatalogUrl(url: string, prefix: string): void {
    if (!url.startsWith(prefix)) {
        throw new InvalidUrlError(url, prefix);
    }
}

/**
 * Run every field extractor over the markup and assemble the record.
 */
export function parsePokedexPage(html: string, url: string): ScrapedPage {
    const $ = cheerio.load(html);
    const warnings: string[] = [];

    try {
        const name = extractName($);
        const forms = extractFormLabels($, name);

        const pokemon = assemblePokemon({
            url,
            name,
            number: extractNumber($),
            forms,
            images: extractImages($, forms.labels),
            descriptions: extractDescriptions($, forms.labels),
            types: extractTypes($, forms.labels, (message, context) => {
                getLogger().warn({ url, ...context }, message);
                warnings.push(message);
            }),
            attributes: extractAttributes($, forms.labels),
            evolutions: extractLineage($),
        });

        return {
            pokemon,
            abilities: extractAbilities($),
            nextUrl: extractNextUrl($, url),
            warnings,
        };
    } catch (error) {
        if (error instanceof ExtractionError) {
            throw error.withUrl(url);
        }
        throw error;
    }
}

/**
 * Validate, fetch, and parse one page.
 */
export async function scrapePage(url: string, fetcher: PageFetcher, catalogPrefix: string): Promise<ScrapedPage> {
    assertCatalogUrl(url, catalogPrefix);
    const html = await fetcher.fetchPage(url);
    return parsePokedexPage(html, url);
}
