/**
 * Gender markers a form can carry. An empty list means genderless or unknown.
 */
export type Gender = 'male' | 'female';

/**
 * One visually or statistically distinct variant of a Pokémon.
 * Identity is the (pokemon name, form label) pair.
 */
export interface PokemonForm {
    /** Form label; the Pokémon's own name when the page declares no forms */
    form: string;

    /** Image URL shown for this form */
    image: string;

    /** Short pokédex entries. The two may be textually identical. */
    descriptions: [string] | [string, string];

    /** Elemental types, primary first */
    types: [string] | [string, string];

    height: string;
    weight: string;
    category: string;

    gender: Gender[];

    /** Raw text when the page spells out gender instead of using icons (e.g. "Unknown") */
    genderLabel: string | null;

    /** Ability names referenced by this form (may be empty) */
    abilities: string[];
}

/**
 * One lineage position as it appears on the page, before validation.
 * `position` is the raw class name of the slot ("first", "middle", "last").
 */
export interface LineageSlot {
    position: string;
    names: string[];
}

/**
 * Evolution line exactly as scraped: one slot per position group, page order.
 */
export type RawLineage = LineageSlot[];

/**
 * A catalog entry: one page of the pokédex.
 */
export interface Pokemon {
    /** National pokédex number (unique) */
    number: number;

    /** Display name (unique, natural key downstream) */
    name: string;

    /** Page the record was scraped from */
    url: string;

    /** Non-empty, page order */
    forms: PokemonForm[];

    evolutions: RawLineage;
}

/**
 * A named trait shared across forms. Globally deduplicated by name.
 */
export interface Ability {
    ability: string;
    description: string;
}
