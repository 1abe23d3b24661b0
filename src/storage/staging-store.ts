import Database from 'better-sqlite3';
import type { Ability, Pokemon, StagedRecords, StagingSink } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { abilitySchema, pokemonSchema } from './staging-schema.js';

/**
 * Staging schema v1: two JSON document collections.
 */
const MIGRATION_V1 = `
-- One document per scraped page, keyed by pokédex number
CREATE TABLE IF NOT EXISTS pokemon_documents (
  number INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  document TEXT NOT NULL,
  scraped_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- One document per ability name; rowid keeps first-seen order
CREATE TABLE IF NOT EXISTS ability_documents (
  ability TEXT NOT NULL UNIQUE,
  document TEXT NOT NULL
);
`;

/**
 * Intermediate document store between the crawler and the loader,
 * backed by a SQLite file.
 */
export class StagingStore implements StagingSink, StagedRecords {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.migrate();

        getLogger().debug({ dbPath }, 'Staging store initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Staging store migrated to v1');
        }
    }

    // ─── Writes ───────────────────────────────────────────────

    insertPokemon(pokemon: Pokemon): void {
        this.db
            .prepare('INSERT INTO pokemon_documents (number, name, document) VALUES (?, ?, ?)')
            .run(pokemon.number, pokemon.name, JSON.stringify(pokemon));
    }

    /**
     * Upsert keyed by name. An existing document is kept as is so the first
     * description seen for a name is the one that survives.
     */
    upsertAbility(ability: Ability): boolean {
        const result = this.db
            .prepare('INSERT INTO ability_documents (ability, document) VALUES (?, ?) ON CONFLICT(ability) DO NOTHING')
            .run(ability.ability, JSON.stringify(ability));
        return result.changes > 0;
    }

    /**
     * Store one page's records atomically.
     */
    savePage(pokemon: Pokemon, abilities: readonly Ability[]): { newAbilities: number } {
        const save = this.db.transaction(() => {
            this.insertPokemon(pokemon);
            let newAbilities = 0;
            for (const ability of abilities) {
                if (this.upsertAbility(ability)) newAbilities++;
            }
            return { newAbilities };
        });
        return save();
    }

    // ─── Reads ────────────────────────────────────────────────

    *pokemon(): IterableIterator<Pokemon> {
        const stmt = this.db.prepare('SELECT document FROM pokemon_documents ORDER BY number');
        for (const row of stmt.iterate() as IterableIterator<{ document: string }>) {
            yield pokemonSchema.parse(JSON.parse(row.document));
        }
    }

    *abilities(): IterableIterator<Ability> {
        const stmt = this.db.prepare('SELECT document FROM ability_documents ORDER BY rowid');
        for (const row of stmt.iterate() as IterableIterator<{ document: string }>) {
            yield abilitySchema.parse(JSON.parse(row.document));
        }
    }

    hasPokemon(number: number): boolean {
        return this.db.prepare('SELECT 1 FROM pokemon_documents WHERE number = ?').get(number) !== undefined;
    }

    getCounts(): { pokemon: number; abilities: number } {
        const count = (table: string): number =>
            (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;
        return { pokemon: count('pokemon_documents'), abilities: count('ability_documents') };
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Staging store closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
