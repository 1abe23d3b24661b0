import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { crawlCatalog, walkCatalog, type WalkOptions } from '../crawler/crawler.js';
import { StagingStore } from '../storage/staging-store.js';
import { CrawlError, InvalidUrlError } from '../utils/errors.js';
import { CATALOG_PREFIX, catalogUrl, FakeFetcher, renderPage, type PageSpec } from './helpers/pages.js';

function site(specs: Array<PageSpec & { slug: string }>): FakeFetcher {
    return new FakeFetcher(new Map(specs.map((spec) => [catalogUrl(spec.slug), renderPage(spec)])));
}

const threePageCycle = () =>
    site([
        { slug: 'alpha', name: 'Alpha', number: 1, next: catalogUrl('beta') },
        { slug: 'beta', name: 'Beta', number: 2, next: catalogUrl('gamma') },
        { slug: 'gamma', name: 'Gamma', number: 3, next: catalogUrl('alpha') },
    ]);

function options(fetcher: FakeFetcher, overrides: Partial<WalkOptions> = {}): WalkOptions {
    return {
        startUrl: catalogUrl('alpha'),
        catalogPrefix: CATALOG_PREFIX,
        maxPages: 10,
        delayMs: 1000,
        fetcher,
        sleep: () => Promise.resolve(),
        random: () => 0,
        ...overrides,
    };
}

async function collect(walk: AsyncGenerator<{ pokemon: { name: string } }>): Promise<string[]> {
    const names: string[] = [];
    for await (const page of walk) {
        names.push(page.pokemon.name);
    }
    return names;
}

describe('Catalog crawler', () => {
    describe('walkCatalog', () => {
        it('should follow next links until they return to the start page', async () => {
            const fetcher = threePageCycle();

            const names = await collect(walkCatalog(options(fetcher)));

            expect(names).toEqual(['Alpha', 'Beta', 'Gamma']);
            expect(fetcher.requests).toEqual([catalogUrl('alpha'), catalogUrl('beta'), catalogUrl('gamma')]);
        });

        it('should pause a random fraction of the delay before each fetch', async () => {
            const sleep = vi.fn((_ms: number) => Promise.resolve());

            await collect(walkCatalog(options(threePageCycle(), { sleep, random: () => 0.5 })));

            expect(sleep).toHaveBeenCalledTimes(3);
            expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 500, 500]);
        });

        it('should stop after maxPages pages without wrapping around', async () => {
            const fetcher = threePageCycle();

            await expect(collect(walkCatalog(options(fetcher, { maxPages: 2 })))).rejects.toThrow(
                `Fetched 2 pages without returning to ${catalogUrl('alpha')}`
            );
            expect(fetcher.requests).toHaveLength(2);
        });

        it('should refuse to walk without a usable page bound', async () => {
            const fetcher = threePageCycle();

            await expect(
                collect(walkCatalog(options(fetcher, { maxPages: Number.parseInt('abc', 10) })))
            ).rejects.toThrow('maxPages must be a positive integer, got NaN');
            await expect(collect(walkCatalog(options(fetcher, { maxPages: 0 })))).rejects.toThrow(CrawlError);
            expect(fetcher.requests).toEqual([]);
        });

        it('should recognize the start page when the start URL carries a fragment', async () => {
            const fetcher = threePageCycle();

            const names = await collect(walkCatalog(options(fetcher, { startUrl: `${catalogUrl('alpha')}#top` })));

            expect(names).toEqual(['Alpha', 'Beta', 'Gamma']);
            expect(fetcher.requests[0]).toBe(catalogUrl('alpha'));
        });

        it('should reject a next link that revisits a page other than the start', async () => {
            const fetcher = site([
                { slug: 'alpha', name: 'Alpha', number: 1, next: catalogUrl('beta') },
                { slug: 'beta', name: 'Beta', number: 2, next: catalogUrl('beta') },
            ]);

            await expect(collect(walkCatalog(options(fetcher)))).rejects.toThrow(CrawlError);
            expect(fetcher.requests).toEqual([catalogUrl('alpha'), catalogUrl('beta')]);
        });

        it('should reject a start URL outside the catalog before fetching', async () => {
            const fetcher = threePageCycle();

            await expect(
                collect(walkCatalog(options(fetcher, { startUrl: 'https://example.com/pokedex/alpha' })))
            ).rejects.toThrow(InvalidUrlError);
            expect(fetcher.requests).toEqual([]);
        });

        it('should resolve relative next links against the current page', async () => {
            const fetcher = site([
                { slug: 'alpha', name: 'Alpha', number: 1, next: '/us/pokedex/beta' },
                { slug: 'beta', name: 'Beta', number: 2, next: '/us/pokedex/alpha' },
            ]);

            expect(await collect(walkCatalog(options(fetcher)))).toEqual(['Alpha', 'Beta']);
        });

        it('should propagate fetch failures', async () => {
            const fetcher = site([{ slug: 'alpha', name: 'Alpha', number: 1, next: catalogUrl('missing') }]);

            await expect(collect(walkCatalog(options(fetcher)))).rejects.toThrow(
                `No page for ${catalogUrl('missing')}`
            );
        });
    });

    describe('crawlCatalog', () => {
        let store: StagingStore;

        beforeEach(() => {
            store = new StagingStore(':memory:');
        });

        afterEach(() => {
            store.close();
        });

        it('should stage every page and count new abilities', async () => {
            const fetcher = site([
                {
                    slug: 'alpha',
                    name: 'Alpha',
                    number: 1,
                    next: catalogUrl('beta'),
                    abilityDetails: [{ name: 'Overgrow', description: 'Grass boost.' }],
                },
                {
                    slug: 'beta',
                    name: 'Beta',
                    number: 2,
                    next: catalogUrl('alpha'),
                    abilityDetails: [
                        { name: 'Overgrow', description: 'Grass boost.' },
                        { name: 'Blaze', description: 'Fire boost.' },
                    ],
                },
            ]);

            const report = await crawlCatalog({ ...options(fetcher), sink: store });

            expect(report).toEqual({ pages: 2, newAbilities: 2, warnings: 0 });
            expect(store.getCounts()).toEqual({ pokemon: 2, abilities: 2 });
            expect([...store.pokemon()].map((p) => p.name)).toEqual(['Alpha', 'Beta']);
        });

        it('should count type warnings without stopping', async () => {
            const fetcher = site([
                {
                    slug: 'alpha',
                    name: 'Alpha',
                    number: 1,
                    next: catalogUrl('alpha'),
                    forms: [{ label: 'Alpha', types: ['Fire', 'Water', 'Grass'] }],
                },
            ]);

            const report = await crawlCatalog({ ...options(fetcher), sink: store });

            expect(report).toEqual({ pages: 1, newAbilities: 0, warnings: 1 });
            expect([...store.pokemon()][0]?.forms[0]?.types).toEqual(['Fire', 'Water']);
        });
    });
});
