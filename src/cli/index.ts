#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { crawlCatalog } from '../crawler/crawler.js';
import { loadPokedex } from '../loader/loader.js';
import { PokedexDatabase } from '../storage/database.js';
import { StagingStore } from '../storage/staging-store.js';
import type { LogLevel, PokedexConfig } from '../types/index.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('pokedex-etl')
    .description('Crawl the online pokédex and normalize it into a relational SQLite database.')
    .version(VERSION);

function parseOptionalInt(value: string | undefined): number | undefined {
    return value === undefined ? undefined : parseInt(value, 10);
}

// ─── CRAWL command ────────────────────────────────────────

program
    .command('crawl')
    .description('Walk the pokédex page by page into the staging store')
    .option('--start-url <url>', 'First page; the crawl ends when the next link returns here')
    .option('-s, --staging <path>', 'Staging database path')
    .option('--max-pages <n>', 'Hard limit on pages fetched')
    .option('--delay <ms>', 'Upper bound of the random pause between requests')
    .option('--timeout <ms>', 'Per-request timeout')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        const cliConfig: Partial<PokedexConfig> = {
            startUrl: opts.startUrl,
            staging: opts.staging,
            maxPages: parseOptionalInt(opts.maxPages),
            delayMs: parseOptionalInt(opts.delay),
            timeout: parseOptionalInt(opts.timeout),
            logLevel: opts.logLevel as LogLevel | undefined,
            jsonLogs: opts.jsonLogs,
        };

        let store: StagingStore | undefined;
        try {
            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            store = new StagingStore(config.staging);
            const report = await crawlCatalog({
                startUrl: config.startUrl,
                catalogPrefix: config.catalogPrefix,
                maxPages: config.maxPages,
                delayMs: config.delayMs,
                fetcher: createHttpClient({ timeout: config.timeout, version: VERSION }),
                sink: store,
            });
            getLogger().info({ staging: config.staging, ...report }, 'Crawl finished');
        } catch (error) {
            getLogger().error({ error }, 'Crawl failed');
            process.exitCode = 1;
        } finally {
            store?.close();
        }
    });

// ─── LOAD command ─────────────────────────────────────────

program
    .command('load')
    .description('Build the relational database from the staging store')
    .option('-s, --staging <path>', 'Staging database path')
    .option('-o, --out <path>', 'Output database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        const cliConfig: Partial<PokedexConfig> = {
            staging: opts.staging,
            out: opts.out,
            logLevel: opts.logLevel as LogLevel | undefined,
            jsonLogs: opts.jsonLogs,
        };

        let store: StagingStore | undefined;
        let db: PokedexDatabase | undefined;
        try {
            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            store = new StagingStore(config.staging);
            db = new PokedexDatabase(config.out);
            const report = loadPokedex(db, store);
            getLogger().info({ out: config.out, ...report }, 'Load complete!');
        } catch (error) {
            getLogger().error({ error }, 'Load failed');
            process.exitCode = 1;
        } finally {
            db?.close();
            store?.close();
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts) => {
        try {
            const db = new PokedexDatabase(opts.input);
            const stats = db.getStats();
            db.close();

            console.log('\n📊 Pokédex Database Statistics\n');
            console.log(`  Pokémon:           ${stats.pokemon}`);
            console.log(`  Formes:            ${stats.formes}`);
            console.log(`  Form descriptions: ${stats.formDescriptions}`);
            console.log(`  Abilities:         ${stats.abilities}`);
            console.log(`  Form abilities:    ${stats.formAbilities}`);
            console.log(`  Evolutions:        ${stats.evolutions}`);
            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

await program.parseAsync();
