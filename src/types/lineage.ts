/**
 * Valid lineage position keys, in chain order.
 */
export const LINEAGE_POSITIONS = ['first', 'middle', 'last'] as const;

export type LineagePosition = (typeof LINEAGE_POSITIONS)[number];

/**
 * A validated evolution line. Three shapes are legal:
 * `{first}`, `{first, last}` and `{first, middle, last}`.
 */
export type Lineage =
    | { shape: 'single'; first: string[] }
    | { shape: 'two-stage'; first: string[]; last: string[] }
    | { shape: 'three-stage'; first: string[]; middle: string[]; last: string[] };

/**
 * Directed evolution relation, mirrored by the `evolutions` table.
 */
export interface EvolutionEdge {
    pokemon: string;
    evolvesTo: string;
}
