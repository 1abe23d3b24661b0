import type { Ability, ForeignKeyViolation, FormRow, Pokemon, PokemonForm, StagedRecords } from '../types/index.js';
import { normalizeLineage } from '../normalize/lineage.js';
import type { PokedexDatabase } from '../storage/database.js';
import { LoadError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Counts for one load run. Created by `loadPokedex` and returned to the caller.
 */
export interface LoadReport {
    abilitiesInserted: number;
    abilitiesSkipped: number;
    pokemon: number;
    formes: number;
    formDescriptions: number;
    formAbilities: number;
    evolutions: number;
    lineagesSkipped: number;
}

function emptyReport(): LoadReport {
    return {
        abilitiesInserted: 0,
        abilitiesSkipped: 0,
        pokemon: 0,
        formes: 0,
        formDescriptions: 0,
        formAbilities: 0,
        evolutions: 0,
        lineagesSkipped: 0,
    };
}

/**
 * Description rows for a form. Identical entries collapse to one row so the
 * (pokemon, form, description) key holds.
 */
export function uniqueDescriptions(descriptions: readonly string[]): string[] {
    return [...new Set(descriptions)];
}

export function toFormRow(pokemon: string, form: PokemonForm): FormRow {
    const [type1, type2] = form.types;
    return {
        pokemon,
        form: form.form,
        height: form.height,
        weight: form.weight,
        category: form.category,
        type_1: type1,
        type_2: type2 ?? null,
        male: form.gender.includes('male') ? 1 : 0,
        female: form.gender.includes('female') ? 1 : 0,
    };
}

/**
 * Insert abilities, first occurrence of a name wins.
 */
export function loadAbilities(db: PokedexDatabase, abilities: Iterable<Ability>, report: LoadReport = emptyReport()): LoadReport {
    db.transaction(() => {
        for (const ability of abilities) {
            if (db.insertAbilityIfAbsent({ ability: ability.ability, info: ability.description })) {
                report.abilitiesInserted++;
            } else {
                report.abilitiesSkipped++;
                getLogger().debug({ ability: ability.ability }, 'Ability already loaded, skipping');
            }
        }
    });
    return report;
}

/**
 * Pokémon whose page contributed each evolution edge, keyed by `edgeKey`.
 */
type LineageOwners = Map<string, string>;

function edgeKey(pokemon: string, evolvesTo: string): string {
    return JSON.stringify([pokemon, evolvesTo]);
}

/**
 * Write every row derived from one Pokémon, in table order.
 */
function loadOne(db: PokedexDatabase, pokemon: Pokemon, report: LoadReport, owners: LineageOwners): void {
    let table = 'pokemon';
    try {
        db.insertPokemon({ name: pokemon.name, number: pokemon.number });
        report.pokemon++;

        for (const form of pokemon.forms) {
            table = 'formes';
            db.insertForm(toFormRow(pokemon.name, form));
            report.formes++;

            table = 'form_descriptions';
            for (const description of uniqueDescriptions(form.descriptions)) {
                db.insertFormDescription({ pokemon: pokemon.name, form: form.form, description });
                report.formDescriptions++;
            }

            table = 'form_abilities';
            for (const ability of form.abilities) {
                if (!db.abilityExists(ability)) {
                    throw new LoadError(`Form "${form.form}" of ${pokemon.name} references unknown ability "${ability}"`, {
                        pokemon: pokemon.name,
                        table,
                    });
                }
                db.insertFormAbility({ pokemon: pokemon.name, form: form.form, ability });
                report.formAbilities++;
            }
        }

        table = 'evolutions';
        const edges = normalizeLineage(pokemon.evolutions);
        if (edges.length > 0) {
            const inserted = db.insertLineageIfAbsent(pokemon.name, edges);
            if (inserted === 0) {
                report.lineagesSkipped++;
            } else {
                for (const edge of edges) {
                    owners.set(edgeKey(edge.pokemon, edge.evolvesTo), pokemon.name);
                }
            }
            report.evolutions += inserted;
        }
    } catch (error) {
        if (error instanceof LoadError) throw error;
        throw new LoadError(
            `Failed to load #${pokemon.number} ${pokemon.name} into ${table}: ${error instanceof Error ? error.message : String(error)}`,
            { pokemon: pokemon.name, table, cause: error }
        );
    }
}

/**
 * Error for the first deferred foreign key violation, naming the Pokémon
 * whose record produced the dangling row.
 */
function violationError(
    db: PokedexDatabase,
    violation: ForeignKeyViolation,
    more: number,
    owners: LineageOwners
): LoadError {
    const suffix = more > 0 ? ` (and ${more} more)` : '';
    const edge = violation.table === 'evolutions' ? db.getEvolutionByRowid(violation.rowid) : undefined;

    if (edge) {
        const owner = owners.get(edgeKey(edge.pokemon, edge.evolves_to)) ?? edge.pokemon;
        return new LoadError(
            `Evolution ${edge.pokemon} -> ${edge.evolves_to} in the lineage of ${owner} references a Pokémon that was never loaded${suffix}`,
            { pokemon: owner, table: violation.table }
        );
    }

    const owner = db.violationOwner(violation);
    return new LoadError(
        `Foreign key violation in ${violation.table} (rowid ${violation.rowid}) of ${owner ?? 'an unknown Pokémon'} referencing ${violation.parent}${suffix}`,
        { pokemon: owner, table: violation.table }
    );
}

/**
 * Insert Pokémon with their formes, descriptions, ability links and evolutions.
 *
 * Runs in one transaction. Evolution edges may point at Pokémon that appear
 * later in the pass, so foreign keys are checked once, before commit.
 */
export function loadPokemon(db: PokedexDatabase, pokemon: Iterable<Pokemon>, report: LoadReport = emptyReport()): LoadReport {
    const owners: LineageOwners = new Map();

    db.transaction(() => {
        db.deferForeignKeys();

        for (const entry of pokemon) {
            loadOne(db, entry, report, owners);
            getLogger().debug({ number: entry.number, name: entry.name }, 'Loaded Pokémon');
        }

        const [violation, ...others] = db.foreignKeyViolations();
        if (violation) {
            throw violationError(db, violation, others.length, owners);
        }
    });
    return report;
}

/**
 * Materialize the relational schema from staged records:
 * all abilities first, then every Pokémon.
 */
export function loadPokedex(db: PokedexDatabase, records: StagedRecords): LoadReport {
    const report = emptyReport();

    loadAbilities(db, records.abilities(), report);
    getLogger().info({ inserted: report.abilitiesInserted, skipped: report.abilitiesSkipped }, 'Abilities loaded');

    loadPokemon(db, records.pokemon(), report);
    getLogger().info(
        { pokemon: report.pokemon, formes: report.formes, evolutions: report.evolutions },
        'Pokémon loaded'
    );

    return report;
}
