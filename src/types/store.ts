import type { Ability, Pokemon } from './pokemon.js';

/**
 * Retrieves page markup. Implementations fail with an HttpError on transport problems.
 */
export interface PageFetcher {
    fetchPage(url: string): Promise<string>;
}

/**
 * Read side of the intermediate store, consumed by the relational loader.
 */
export interface StagedRecords {
    abilities(): Iterable<Ability>;
    pokemon(): Iterable<Pokemon>;
}

/**
 * Write side of the intermediate store, fed by the crawler.
 */
export interface StagingSink {
    /**
     * Store one page and the abilities it lists. Fails if the page's number is
     * already stored; abilities already stored by name are left untouched.
     */
    savePage(pokemon: Pokemon, abilities: readonly Ability[]): { newAbilities: number };
}
