/**
 * Row shapes of the relational schema. Column names match the tables.
 */

export interface PokemonRow {
    name: string;
    number: number;
}

export interface FormRow {
    pokemon: string;
    form: string;
    height: string;
    weight: string;
    category: string;
    type_1: string;
    type_2: string | null;
    /** 1 when the form can be male */
    male: 0 | 1;
    /** 1 when the form can be female */
    female: 0 | 1;
}

export interface FormDescriptionRow {
    pokemon: string;
    form: string;
    description: string;
}

export interface AbilityRow {
    ability: string;
    info: string;
}

export interface FormAbilityRow {
    pokemon: string;
    form: string;
    ability: string;
}

export interface EvolutionRow {
    pokemon: string;
    evolves_to: string;
}

/**
 * Row of `PRAGMA foreign_key_check`.
 */
export interface ForeignKeyViolation {
    table: string;
    rowid: number;
    parent: string;
    fkid: number;
}
