/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PokedexConfig {
    // Crawl
    startUrl: string;
    catalogPrefix: string;
    maxPages: number;
    delayMs: number;
    timeout: number;

    // Stores
    staging: string;
    out: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PokedexConfig = {
    startUrl: 'https://www.pokemon.com/us/pokedex/bulbasaur',
    catalogPrefix: 'https://www.pokemon.com/us/pokedex/',
    maxPages: 2000,
    delayMs: 1000,
    timeout: 30000,
    staging: './pokedex-staging.db',
    out: './pokedex.db',
    logLevel: 'info',
    jsonLogs: false,
};
