import type { Pokemon, PokemonForm, RawLineage } from '../types/index.js';
import { ExtractionError } from '../utils/errors.js';
import type { FormAttributes, FormKeyed, FormLabels } from './fields.js';

/**
 * Everything the field extractors produced for one page.
 */
export interface PageParts {
    url: string;
    name: string;
    number: number;
    forms: FormLabels;
    images: FormKeyed<string>;
    descriptions: FormKeyed<[string] | [string, string]>;
    types: FormKeyed<[string] | [string, string]>;
    attributes: FormKeyed<FormAttributes>;
    evolutions: RawLineage;
}

/**
 * Fails unless the map is keyed by exactly the declared labels.
 */
function requireCoverage<T>(field: string, labels: readonly string[], keyed: FormKeyed<T>): void {
    const missing = labels.filter((label) => !keyed.has(label));
    const extra = [...keyed.keys()].filter((key) => !labels.includes(key));

    if (missing.length > 0 || extra.length > 0) {
        const parts = [
            missing.length > 0 ? `missing ${missing.join(', ')}` : '',
            extra.length > 0 ? `unexpected ${extra.join(', ')}` : '',
        ].filter(Boolean);
        throw new ExtractionError(field, `forms do not line up: ${parts.join('; ')}`);
    }
}

function valueFor<T>(field: string, keyed: FormKeyed<T>, label: string): T {
    const value = keyed.get(label);
    if (value === undefined) {
        throw new ExtractionError(field, `no entry for form "${label}"`);
    }
    return value;
}

/**
 * Build one Pokémon record from the per-field outputs. Pure.
 */
export function assemblePokemon(parts: PageParts): Pokemon {
    const { labels } = parts.forms;

    if (parts.forms.kind === 'implicit' && parts.forms.labels[0] !== parts.name) {
        throw new ExtractionError('forms', `implicit form must be named "${parts.name}", got "${parts.forms.labels[0]}"`);
    }

    requireCoverage('images', labels, parts.images);
    requireCoverage('descriptions', labels, parts.descriptions);
    requireCoverage('types', labels, parts.types);
    requireCoverage('attributes', labels, parts.attributes);

    const forms = labels.map((label): PokemonForm => {
        const attributes = valueFor('attributes', parts.attributes, label);
        return {
            form: label,
            image: valueFor('images', parts.images, label),
            descriptions: valueFor('descriptions', parts.descriptions, label),
            types: valueFor('types', parts.types, label),
            height: attributes.height,
            weight: attributes.weight,
            category: attributes.category,
            gender: attributes.gender,
            genderLabel: attributes.genderLabel,
            abilities: attributes.abilities,
        };
    });

    return {
        number: parts.number,
        name: parts.name,
        url: parts.url,
        forms,
        evolutions: parts.evolutions,
    };
}
