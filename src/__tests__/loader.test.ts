import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadAbilities, loadPokedex, loadPokemon, toFormRow, uniqueDescriptions } from '../loader/loader.js';
import { parsePokedexPage } from '../scraper/page-scraper.js';
import { PokedexDatabase } from '../storage/database.js';
import { StagingStore } from '../storage/staging-store.js';
import type { Ability, Pokemon, RawLineage, StagedRecords } from '../types/index.js';
import { LineageError, LoadError } from '../utils/errors.js';
import { catalogUrl, loadFixture, makeForm, makePokemon } from './helpers/pages.js';

function records(pokemon: Pokemon[], abilities: Ability[] = []): StagedRecords {
    return {
        abilities: () => abilities,
        pokemon: () => pokemon,
    };
}

const starterLine: RawLineage = [
    { position: 'first', names: ['Bulbasaur'] },
    { position: 'middle', names: ['Ivysaur'] },
    { position: 'last', names: ['Venusaur'] },
];

describe('Relational loader', () => {
    let db: PokedexDatabase;

    beforeEach(() => {
        db = new PokedexDatabase(':memory:');
    });

    afterEach(() => {
        db.close();
    });

    describe('helpers', () => {
        it('should collapse identical descriptions', () => {
            expect(uniqueDescriptions(['Same.', 'Same.'])).toEqual(['Same.']);
            expect(uniqueDescriptions(['One.', 'Two.'])).toEqual(['One.', 'Two.']);
        });

        it('should map a form to its row', () => {
            const row = toFormRow('Porygon', makeForm({ form: 'Porygon', types: ['Normal'], gender: [], genderLabel: 'Unknown' }));

            expect(row).toEqual({
                pokemon: 'Porygon',
                form: 'Porygon',
                height: `1' 00"`,
                weight: '10.0 lbs',
                category: 'Test',
                type_1: 'Normal',
                type_2: null,
                male: 0,
                female: 0,
            });
        });

        it('should map two types and a single gender', () => {
            const row = toFormRow('Nidoking', makeForm({ form: 'Nidoking', types: ['Poison', 'Ground'], gender: ['male'] }));

            expect(row).toMatchObject({ type_1: 'Poison', type_2: 'Ground', male: 1, female: 0 });
        });
    });

    describe('abilities pass', () => {
        it('should keep the first description of a repeated ability', () => {
            const report = loadAbilities(db, [
                { ability: 'Overgrow', description: 'first' },
                { ability: 'Overgrow', description: 'later' },
            ]);

            expect(db.getAllAbilities()).toEqual([{ ability: 'Overgrow', info: 'first' }]);
            expect(report.abilitiesInserted).toBe(1);
            expect(report.abilitiesSkipped).toBe(1);
        });

        it('should store one row for an ability seen on two Pokémon', () => {
            const overgrow = { ability: 'Overgrow', description: "Powers up Grass-type moves when the Pokémon's HP is low." };
            const bulbasaur = makePokemon('Bulbasaur', 1, { forms: [makeForm({ form: 'Bulbasaur', abilities: ['Overgrow'] })] });
            const chikorita = makePokemon('Chikorita', 152, { forms: [makeForm({ form: 'Chikorita', abilities: ['Overgrow'] })] });

            loadPokedex(db, records([bulbasaur, chikorita], [overgrow, overgrow]));

            expect(db.getAllAbilities()).toEqual([{ ability: 'Overgrow', info: overgrow.description }]);
            expect(db.getFormAbilities('Bulbasaur', 'Bulbasaur')).toEqual(['Overgrow']);
            expect(db.getFormAbilities('Chikorita', 'Chikorita')).toEqual(['Overgrow']);
        });
    });

    describe('entity pass', () => {
        it('should load a first-only Pokémon without evolution rows', () => {
            const eevee = makePokemon('Eevee', 133, { evolutions: [{ position: 'first', names: ['Eevee'] }] });

            const report = loadPokedex(db, records([eevee]));

            expect(db.getAllPokemon()).toEqual([{ name: 'Eevee', number: 133 }]);
            expect(db.getAllEvolutions()).toEqual([]);
            expect(report.evolutions).toBe(0);
        });

        it('should write one description row when both entries match', () => {
            const pokemon = makePokemon('Venusaur', 3, {
                forms: [
                    makeForm({ form: 'Venusaur', descriptions: ['Blooms.', 'Smells.'] }),
                    makeForm({ form: 'Mega Venusaur', descriptions: ['Stronger.', 'Stronger.'] }),
                ],
            });

            const report = loadPokedex(db, records([pokemon]));

            expect(db.getFormDescriptions('Venusaur', 'Venusaur')).toEqual(['Blooms.', 'Smells.']);
            expect(db.getFormDescriptions('Venusaur', 'Mega Venusaur')).toEqual(['Stronger.']);
            expect(report.formDescriptions).toBe(3);
        });

        it('should insert a shared lineage once across its members', () => {
            const line = ['Bulbasaur', 'Ivysaur', 'Venusaur'].map((name, i) =>
                makePokemon(name, i + 1, { evolutions: starterLine })
            );

            const report = loadPokedex(db, records(line));

            expect(db.getAllEvolutions()).toEqual([
                { pokemon: 'Bulbasaur', evolves_to: 'Ivysaur' },
                { pokemon: 'Ivysaur', evolves_to: 'Venusaur' },
            ]);
            expect(report.evolutions).toBe(2);
            expect(report.lineagesSkipped).toBe(2);
        });

        it('should not re-insert a lineage on a second load of the same member', () => {
            const line = ['Bulbasaur', 'Ivysaur', 'Venusaur'].map((name, i) =>
                makePokemon(name, i + 1, { evolutions: starterLine })
            );
            loadPokemon(db, line);

            expect(db.insertLineageIfAbsent('Ivysaur', [{ pokemon: 'Bulbasaur', evolvesTo: 'Ivysaur' }])).toBe(0);
            expect(db.getAllEvolutions()).toHaveLength(2);
        });

        it('should fail when an evolution points at a Pokémon never loaded', () => {
            const pichu = makePokemon('Pichu', 172, {
                evolutions: [
                    { position: 'first', names: ['Pichu'] },
                    { position: 'last', names: ['Pikachu'] },
                ],
            });

            try {
                loadPokedex(db, records([pichu]));
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(LoadError);
                expect(error).toMatchObject({ pokemon: 'Pichu', table: 'evolutions' });
                expect(error instanceof Error && error.message).toBe(
                    'Evolution Pichu -> Pikachu in the lineage of Pichu references a Pokémon that was never loaded'
                );
            }
            expect(db.getStats().pokemon).toBe(0);
        });

        it('should name the Pokémon whose lineage carried a missing predecessor', () => {
            const pikachu = makePokemon('Pikachu', 25, {
                evolutions: [
                    { position: 'first', names: ['Pichu'] },
                    { position: 'last', names: ['Pikachu'] },
                ],
            });

            try {
                loadPokedex(db, records([pikachu]));
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(LoadError);
                expect(error).toMatchObject({ pokemon: 'Pikachu', table: 'evolutions' });
                expect(error instanceof Error && error.message).toBe(
                    'Evolution Pichu -> Pikachu in the lineage of Pikachu references a Pokémon that was never loaded'
                );
            }
        });

        it('should fail on a reference to an unknown ability and roll back', () => {
            const ditto = makePokemon('Ditto', 132, { forms: [makeForm({ form: 'Ditto', abilities: ['Limber'] })] });

            expect(() => loadPokedex(db, records([ditto]))).toThrow(
                'Form "Ditto" of Ditto references unknown ability "Limber"'
            );
            expect(db.getStats()).toMatchObject({ pokemon: 0, formes: 0 });
        });

        it('should name the Pokémon and table on a constraint violation', () => {
            try {
                loadPokedex(db, records([makePokemon('Eevee', 133), makePokemon('Eevee', 134)]));
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(LoadError);
                expect(error).toMatchObject({ pokemon: 'Eevee', table: 'pokemon' });
                expect(error instanceof Error && error.message).toBe(
                    'Failed to load #134 Eevee into pokemon: UNIQUE constraint failed: pokemon.name'
                );
            }
        });

        it('should surface a malformed lineage as a load error', () => {
            const broken = makePokemon('Missingno', 0, { evolutions: [{ position: 'second', names: ['Missingno'] }] });

            try {
                loadPokedex(db, records([broken]));
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(LoadError);
                expect(error instanceof LoadError && error.cause).toBeInstanceOf(LineageError);
            }
        });
    });

    describe('end to end from scraped pages', () => {
        it('should normalize staged pages into every table', () => {
            const store = new StagingStore(':memory:');
            try {
                const bulbasaur = parsePokedexPage(loadFixture('bulbasaur.html'), catalogUrl('bulbasaur'));
                const venusaur = parsePokedexPage(loadFixture('venusaur.html'), catalogUrl('venusaur'));
                const ivysaur = makePokemon('Ivysaur', 2, { evolutions: starterLine });

                store.savePage(bulbasaur.pokemon, bulbasaur.abilities);
                store.savePage(venusaur.pokemon, venusaur.abilities);
                store.savePage(ivysaur, []);

                const report = loadPokedex(db, store);

                expect(db.getStats()).toEqual({
                    pokemon: 3,
                    formes: 4,
                    formDescriptions: 6,
                    abilities: 2,
                    formAbilities: 3,
                    evolutions: 2,
                });
                expect(report).toEqual({
                    abilitiesInserted: 2,
                    abilitiesSkipped: 0,
                    pokemon: 3,
                    formes: 4,
                    formDescriptions: 6,
                    formAbilities: 3,
                    evolutions: 2,
                    lineagesSkipped: 2,
                });
                expect(db.getForms('Venusaur').map((f) => f.form)).toEqual(['Venusaur', 'Mega Venusaur']);
                expect(db.getFormAbilities('Venusaur', 'Mega Venusaur')).toEqual(['Thick Fat']);
            } finally {
                store.close();
            }
        });
    });
});
