import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type LogLevel, type PokedexConfig } from '../types/index.js';
import { InvalidUrlError } from './errors.js';
import { getLogger } from './logger.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

/**
 * Shape accepted from pokedex.config.json, environment variables and CLI
 * flags. Every key is optional; a present key must hold a usable value.
 */
const configSchema = z
    .object({
        startUrl: z.string().url(),
        catalogPrefix: z.string().url(),
        maxPages: z.number().int().positive(),
        delayMs: z.number().int().nonnegative(),
        timeout: z.number().int().positive(),
        staging: z.string().min(1),
        out: z.string().min(1),
        logLevel: z.enum(LOG_LEVELS),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

/**
 * Load configuration from pokedex.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PokedexConfig> | null> {
    const explorer = cosmiconfig('pokedex', {
        searchPlaces: ['pokedex.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return configSchema.parse(result.config);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Partial<PokedexConfig> {
    const config: Partial<PokedexConfig> = {};

    const level = env['POKEDEX_LOG_LEVEL'];
    if (level) {
        if (isLogLevel(level)) {
            config.logLevel = level;
        } else {
            getLogger().warn({ level }, 'Ignoring unknown POKEDEX_LOG_LEVEL');
        }
    }

    const startUrl = env['POKEDEX_START_URL'];
    if (startUrl) {
        config.startUrl = startUrl;
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PokedexConfig>,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<PokedexConfig> {
    const cliConfig: Partial<PokedexConfig> = configSchema.parse(cliFlags);
    const fileConfig = (await loadConfigFile(options.searchFrom)) ?? {};
    const envConfig: Partial<PokedexConfig> = configSchema.parse(loadEnvVars(options.env ?? process.env));

    const pick = <K extends keyof PokedexConfig>(key: K): PokedexConfig[K] =>
        cliConfig[key] ?? envConfig[key] ?? fileConfig[key] ?? DEFAULT_CONFIG[key];

    const merged: PokedexConfig = {
        startUrl: pick('startUrl'),
        catalogPrefix: pick('catalogPrefix'),
        maxPages: pick('maxPages'),
        delayMs: pick('delayMs'),
        timeout: pick('timeout'),
        staging: pick('staging'),
        out: pick('out'),
        logLevel: pick('logLevel'),
        jsonLogs: pick('jsonLogs'),
    };

    if (!merged.startUrl.startsWith(merged.catalogPrefix)) {
        throw new InvalidUrlError(merged.startUrl, merged.catalogPrefix);
    }

    return merged;
}
