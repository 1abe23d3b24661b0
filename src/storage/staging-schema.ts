import { z } from 'zod';
import type { Ability, Pokemon, PokemonForm } from '../types/index.js';

/**
 * Schemas for documents read back from the staging store.
 */

const oneOrTwo = z.union([z.tuple([z.string()]), z.tuple([z.string(), z.string()])]);

export const formSchema: z.ZodType<PokemonForm> = z.object({
    form: z.string().min(1),
    image: z.string(),
    descriptions: oneOrTwo,
    types: oneOrTwo,
    height: z.string(),
    weight: z.string(),
    category: z.string(),
    gender: z.array(z.enum(['male', 'female'])),
    genderLabel: z.string().nullable(),
    abilities: z.array(z.string()),
});

export const pokemonSchema: z.ZodType<Pokemon> = z.object({
    number: z.number().int(),
    name: z.string().min(1),
    url: z.string(),
    forms: z.array(formSchema).nonempty(),
    evolutions: z.array(
        z.object({
            position: z.string(),
            names: z.array(z.string()),
        })
    ),
});

export const abilitySchema: z.ZodType<Ability> = z.object({
    ability: z.string().min(1),
    description: z.string(),
});
