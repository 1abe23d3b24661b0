import Database from 'better-sqlite3';
import type {
    AbilityRow,
    EvolutionEdge,
    EvolutionRow,
    ForeignKeyViolation,
    FormAbilityRow,
    FormDescriptionRow,
    FormRow,
    PokemonRow,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Tables holding a foreign key; each names its Pokémon in a `pokemon` column.
 */
const CHILD_TABLES = ['formes', 'form_descriptions', 'form_abilities', 'evolutions'] as const;

function isChildTable(table: string): table is (typeof CHILD_TABLES)[number] {
    return CHILD_TABLES.some((child) => child === table);
}

/**
 * SQLite schema migration v1.
 * Creates the six tables of the normalized pokédex.
 */
const MIGRATION_V1 = `
-- Pokémon: one row per catalog entry
CREATE TABLE IF NOT EXISTS pokemon(
  name TEXT NOT NULL PRIMARY KEY,
  number INTEGER NOT NULL
);

-- Formes: one row per variant of a Pokémon
CREATE TABLE IF NOT EXISTS formes(
  pokemon TEXT NOT NULL,
  form TEXT NOT NULL,
  height TEXT NOT NULL,
  weight TEXT NOT NULL,
  category TEXT NOT NULL,
  type_1 TEXT NOT NULL,
  type_2 TEXT,
  male INTEGER NOT NULL,
  female INTEGER NOT NULL,
  PRIMARY KEY(pokemon, form),
  FOREIGN KEY(pokemon) REFERENCES pokemon(name)
);

-- Form descriptions: pokédex entries per form
CREATE TABLE IF NOT EXISTS form_descriptions(
  pokemon TEXT NOT NULL,
  form TEXT NOT NULL,
  description TEXT NOT NULL,
  PRIMARY KEY(pokemon, form, description),
  FOREIGN KEY(pokemon, form) REFERENCES formes(pokemon, form)
);

-- Abilities: catalog-wide, first description wins
CREATE TABLE IF NOT EXISTS abilities(
  ability TEXT NOT NULL PRIMARY KEY,
  info TEXT NOT NULL
);

-- Form-Ability junction
CREATE TABLE IF NOT EXISTS form_abilities(
  pokemon TEXT NOT NULL,
  form TEXT NOT NULL,
  ability TEXT NOT NULL,
  PRIMARY KEY(pokemon, form, ability),
  FOREIGN KEY(pokemon, form) REFERENCES formes(pokemon, form),
  FOREIGN KEY(ability) REFERENCES abilities(ability)
);

-- Evolutions: directed edges between Pokémon
CREATE TABLE IF NOT EXISTS evolutions(
  pokemon TEXT NOT NULL,
  evolves_to TEXT NOT NULL,
  PRIMARY KEY(pokemon, evolves_to),
  FOREIGN KEY(pokemon) REFERENCES pokemon(name),
  FOREIGN KEY(evolves_to) REFERENCES pokemon(name)
);
`;

/**
 * Relational pokédex wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and row writes.
 */
export class PokedexDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Pokémon & formes ─────────────────────────────────────

    insertPokemon(row: PokemonRow): void {
        this.db.prepare('INSERT INTO pokemon (name, number) VALUES (@name, @number)').run(row);
    }

    insertForm(row: FormRow): void {
        this.db
            .prepare(`
      INSERT INTO formes (pokemon, form, height, weight, category, type_1, type_2, male, female)
      VALUES (@pokemon, @form, @height, @weight, @category, @type_1, @type_2, @male, @female)
    `)
            .run(row);
    }

    insertFormDescription(row: FormDescriptionRow): void {
        this.db
            .prepare('INSERT INTO form_descriptions (pokemon, form, description) VALUES (@pokemon, @form, @description)')
            .run(row);
    }

    getPokemon(name: string): PokemonRow | undefined {
        return this.db.prepare('SELECT * FROM pokemon WHERE name = ?').get(name) as PokemonRow | undefined;
    }

    getAllPokemon(): PokemonRow[] {
        return this.db.prepare('SELECT * FROM pokemon ORDER BY number').all() as PokemonRow[];
    }

    getForms(pokemon: string): FormRow[] {
        return this.db.prepare('SELECT * FROM formes WHERE pokemon = ? ORDER BY rowid').all(pokemon) as FormRow[];
    }

    getFormDescriptions(pokemon: string, form: string): string[] {
        const rows = this.db
            .prepare('SELECT * FROM form_descriptions WHERE pokemon = ? AND form = ? ORDER BY rowid')
            .all(pokemon, form) as FormDescriptionRow[];
        return rows.map((row) => row.description);
    }

    // ─── Abilities ────────────────────────────────────────────

    /**
     * Insert an ability unless its name is already stored.
     * Returns true when a row was written.
     */
    insertAbilityIfAbsent(row: AbilityRow): boolean {
        const result = this.db
            .prepare('INSERT INTO abilities (ability, info) VALUES (@ability, @info) ON CONFLICT(ability) DO NOTHING')
            .run(row);
        return result.changes > 0;
    }

    abilityExists(ability: string): boolean {
        const row = this.db.prepare('SELECT 1 FROM abilities WHERE ability = ?').get(ability);
        return row !== undefined;
    }

    getAllAbilities(): AbilityRow[] {
        return this.db.prepare('SELECT * FROM abilities ORDER BY ability').all() as AbilityRow[];
    }

    insertFormAbility(row: FormAbilityRow): void {
        this.db.prepare('INSERT INTO form_abilities (pokemon, form, ability) VALUES (@pokemon, @form, @ability)').run(row);
    }

    getFormAbilities(pokemon: string, form: string): string[] {
        const rows = this.db
            .prepare('SELECT * FROM form_abilities WHERE pokemon = ? AND form = ? ORDER BY rowid')
            .all(pokemon, form) as FormAbilityRow[];
        return rows.map((row) => row.ability);
    }

    // ─── Evolutions ───────────────────────────────────────────

    /**
     * Insert a lineage's edges unless some edge already mentions `member`.
     * The check and the inserts run in one transaction.
     * Returns the number of edges written.
     */
    insertLineageIfAbsent(member: string, edges: readonly EvolutionEdge[]): number {
        const existsStmt = this.db.prepare('SELECT 1 FROM evolutions WHERE pokemon = ? OR evolves_to = ? LIMIT 1');
        const insertStmt = this.db.prepare('INSERT INTO evolutions (pokemon, evolves_to) VALUES (?, ?)');

        const insertAll = this.db.transaction((edges: readonly EvolutionEdge[]): number => {
            if (existsStmt.get(member, member) !== undefined) {
                return 0;
            }
            for (const edge of edges) {
                insertStmt.run(edge.pokemon, edge.evolvesTo);
            }
            return edges.length;
        });

        return insertAll(edges);
    }

    getAllEvolutions(): EvolutionRow[] {
        return this.db.prepare('SELECT * FROM evolutions ORDER BY rowid').all() as EvolutionRow[];
    }

    // ─── Foreign keys ─────────────────────────────────────────

    /**
     * Postpone foreign key enforcement to the end of the current transaction.
     * Only meaningful inside `transaction()`; SQLite resets it on commit.
     */
    deferForeignKeys(): void {
        this.db.pragma('defer_foreign_keys = ON');
    }

    foreignKeyViolations(): ForeignKeyViolation[] {
        return this.db.pragma('foreign_key_check') as ForeignKeyViolation[];
    }

    /**
     * Pokémon column of the child row a violation points at.
     */
    violationOwner(violation: ForeignKeyViolation): string | undefined {
        if (!isChildTable(violation.table)) {
            return undefined;
        }
        const row = this.db
            .prepare(`SELECT pokemon FROM ${violation.table} WHERE rowid = ?`)
            .get(violation.rowid) as { pokemon: string } | undefined;
        return row?.pokemon;
    }

    getEvolutionByRowid(rowid: number): EvolutionRow | undefined {
        return this.db.prepare('SELECT pokemon, evolves_to FROM evolutions WHERE rowid = ?').get(rowid) as
            | EvolutionRow
            | undefined;
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        pokemon: number;
        formes: number;
        formDescriptions: number;
        abilities: number;
        formAbilities: number;
        evolutions: number;
    } {
        const count = (table: string): number =>
            (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

        return {
            pokemon: count('pokemon'),
            formes: count('formes'),
            formDescriptions: count('form_descriptions'),
            abilities: count('abilities'),
            formAbilities: count('form_abilities'),
            evolutions: count('evolutions'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
