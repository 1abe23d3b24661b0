import type { CheerioAPI } from 'cheerio';
import type { Ability, Gender, RawLineage } from '../types/index.js';
import { ExtractionError } from '../utils/errors.js';

/**
 * Field extractors for a single pokédex page.
 *
 * Each rule reads one region of the markup into one typed field. Form-scoped
 * rules return a map keyed by form label and must cover every declared form;
 * a count mismatch throws instead of silently zipping short.
 */

/**
 * Value per form label, in declared form order.
 */
export type FormKeyed<T> = Map<string, T>;

/**
 * Outcome of form discovery. Pages without a form selector describe a single
 * anonymous form that takes the Pokémon's name.
 */
export type FormLabels =
    | { kind: 'declared'; labels: string[] }
    | { kind: 'implicit'; labels: [string] };

/**
 * Per-form values from the attribute block (height, weight, gender, category, abilities).
 */
export interface FormAttributes {
    height: string;
    weight: string;
    category: string;
    gender: Gender[];
    genderLabel: string | null;
    abilities: string[];
}

/**
 * Callback for data-integrity anomalies that should not abort the page.
 */
export type WarningHandler = (message: string, context: Record<string, unknown>) => void;

/**
 * Collapse whitespace runs and trim.
 */
export function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of an element minus the text of its child elements.
 */
function ownText(full: string, nested: string): string {
    return cleanText(nested ? full.replace(nested, '') : full);
}

function keyByForm<T>(field: string, labels: readonly string[], values: readonly T[]): FormKeyed<T> {
    if (values.length !== labels.length) {
        throw new ExtractionError(field, `found ${values.length} entries for ${labels.length} form(s)`);
    }

    const keyed: FormKeyed<T> = new Map();
    for (const [index, label] of labels.entries()) {
        const value = values[index];
        if (value === undefined) {
            throw new ExtractionError(field, `no entry for form "${label}"`);
        }
        keyed.set(label, value);
    }
    return keyed;
}

// ─── Identity ─────────────────────────────────────────────

function paginationTitle($: CheerioAPI) {
    const title = $('.pokedex-pokemon-pagination-title > div').first();
    if (title.length === 0) {
        throw new ExtractionError('name', 'pagination title not found');
    }
    return title;
}

export function extractName($: CheerioAPI): string {
    const title = paginationTitle($);
    const name = ownText(title.text(), title.children().text());
    if (!name) {
        throw new ExtractionError('name', 'pagination title has no name');
    }
    return name;
}

export function extractNumber($: CheerioAPI): number {
    const raw = cleanText(paginationTitle($).find('.pokemon-number').first().text());
    const digits = raw.replace(/^#/, '');
    if (!/^\d+$/.test(digits)) {
        throw new ExtractionError('number', `cannot read a number from "${raw}"`);
    }
    return Number.parseInt(digits, 10);
}

// ─── Forms ────────────────────────────────────────────────

export function extractFormLabels($: CheerioAPI, name: string): FormLabels {
    const selector = $('#formes');
    if (selector.length === 0) {
        return { kind: 'implicit', labels: [name] };
    }

    const labels = selector
        .children()
        .toArray()
        .map((option) => cleanText($(option).text()));

    if (labels.length === 0) {
        throw new ExtractionError('forms', 'form selector has no options');
    }
    if (labels.some((label) => label === '')) {
        throw new ExtractionError('forms', 'form selector has an empty option');
    }
    if (new Set(labels).size !== labels.length) {
        throw new ExtractionError('forms', `duplicate form labels: ${labels.join(', ')}`);
    }

    return { kind: 'declared', labels };
}

export function extractImages($: CheerioAPI, labels: readonly string[]): FormKeyed<string> {
    const sources = $('.profile-images img')
        .toArray()
        .map((img) => {
            const src = $(img).attr('src');
            if (!src) {
                throw new ExtractionError('images', 'image without src');
            }
            return src;
        });

    return keyByForm('images', labels, sources);
}

export function extractDescriptions(
    $: CheerioAPI,
    labels: readonly string[]
): FormKeyed<[string] | [string, string]> {
    const blocks = $('.version-descriptions')
        .toArray()
        .map((block): [string] | [string, string] => {
            const texts = $(block)
                .find('p')
                .toArray()
                .map((p) => cleanText($(p).text()));

            const [first, second, ...rest] = texts;
            if (first === undefined || rest.length > 0) {
                throw new ExtractionError('descriptions', `expected one or two descriptions, found ${texts.length}`);
            }
            return second === undefined ? [first] : [first, second];
        });

    return keyByForm('descriptions', labels, blocks);
}

export function extractTypes(
    $: CheerioAPI,
    labels: readonly string[],
    warn: WarningHandler
): FormKeyed<[string] | [string, string]> {
    const blocks = $('.dtm-type')
        .toArray()
        .map((block, index): [string] | [string, string] => {
            const types = $(block)
                .find('li')
                .toArray()
                .map((li) => cleanText($(li).text()));

            const [primary, secondary] = types;
            if (primary === undefined) {
                throw new ExtractionError('types', 'type list is empty');
            }
            if (types.length > 2) {
                warn('More than two types listed, keeping the first two', {
                    form: labels[index],
                    types,
                });
            }
            return secondary === undefined ? [primary] : [primary, secondary];
        });

    return keyByForm('types', labels, blocks);
}

// ─── Attributes ───────────────────────────────────────────

function classifyGenderIcon(classAttr: string): Gender {
    const classes = classAttr.split(/\s+/);
    // "female" contains "male", so test it first
    if (classes.some((c) => c.includes('female'))) return 'female';
    if (classes.some((c) => c.includes('male'))) return 'male';
    throw new ExtractionError('gender', `unrecognized gender icon "${classAttr}"`);
}

function genderFromLabel(label: string): Gender[] {
    switch (label.toLowerCase()) {
        case 'male':
            return ['male'];
        case 'female':
            return ['female'];
        default:
            return [];
    }
}

export function extractAttributes($: CheerioAPI, labels: readonly string[]): FormKeyed<FormAttributes> {
    const blocks = $('.pokemon-ability-info')
        .toArray()
        .map((block): FormAttributes => {
            const titles = $(block).find('.attribute-title').toArray();
            const values = $(block)
                .find('.attribute-value')
                .toArray()
                .map((value) => $(value));

            const [height, weight, gender, category] = values;
            if (!height || !weight || !gender || !category) {
                throw new ExtractionError('attributes', `expected at least 4 attribute values, found ${values.length}`);
            }

            // Gender is either icons or a text label, never both
            const icons = gender.find('.icon').toArray();
            let genders: Gender[];
            let genderLabel: string | null;
            if (icons.length > 0) {
                if (cleanText(gender.text()) !== '') {
                    throw new ExtractionError('gender', 'gender mixes icon and text markers');
                }
                genders = [...new Set(icons.map((icon) => classifyGenderIcon($(icon).attr('class') ?? '')))];
                genderLabel = null;
            } else {
                const label = cleanText(gender.text());
                genders = genderFromLabel(label);
                genderLabel = label || null;
            }

            const abilities =
                titles.length > 4 && values.length > 4
                    ? values.slice(4).map((value) => cleanText(value.text()))
                    : [];

            return {
                height: cleanText(height.text()),
                weight: cleanText(weight.text()),
                category: cleanText(category.text()),
                gender: genders,
                genderLabel,
                abilities,
            };
        });

    return keyByForm('attributes', labels, blocks);
}

// ─── Page-level fields ────────────────────────────────────

/**
 * Raw lineage slots in page order. Positions are validated later by the normalizer.
 */
export function extractLineage($: CheerioAPI): RawLineage {
    const profile = $('.evolution-profile').first();
    if (profile.length === 0) {
        return [];
    }

    return profile
        .children()
        .toArray()
        .map((slot) => {
            const position = ($(slot).attr('class') ?? '').trim().split(/\s+/)[0] ?? '';
            const names = $(slot)
                .find('h3')
                .toArray()
                .map((h3) => ownText($(h3).text(), $(h3).children().text()));
            return { position, names };
        });
}

/**
 * Ability name/description pairs on the page. Duplicates across forms keep the first.
 */
export function extractAbilities($: CheerioAPI): Ability[] {
    const abilities = new Map<string, string>();

    $('.pokemon-ability-info-detail').each((_, element) => {
        const name = cleanText($(element).find('h3').first().text());
        if (!name) {
            throw new ExtractionError('abilities', 'ability detail without a name');
        }
        if (!abilities.has(name)) {
            abilities.set(name, cleanText($(element).find('p').first().text()));
        }
    });

    return [...abilities].map(([ability, description]) => ({ ability, description }));
}

/**
 * Absolute form of a page URL without its fragment, so equal pages compare equal.
 */
export function canonicalUrl(url: string, base?: string): string {
    const parsed = new URL(url, base);
    parsed.hash = '';
    return parsed.toString();
}

export function extractNextUrl($: CheerioAPI, pageUrl: string): string {
    const href = $('a.next').first().attr('href');
    if (!href) {
        throw new ExtractionError('next', 'no link to the next page');
    }
    return canonicalUrl(href, pageUrl);
}
