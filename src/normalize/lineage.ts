import { LINEAGE_POSITIONS } from '../types/index.js';
import type { EvolutionEdge, Lineage, LineagePosition, RawLineage } from '../types/index.js';
import { LineageError } from '../utils/errors.js';

function isLineagePosition(position: string): position is LineagePosition {
    return LINEAGE_POSITIONS.some((known) => known === position);
}

/**
 * Validate raw lineage slots into one of the three legal shapes.
 * Returns null when the page carries no evolution section at all.
 */
export function parseLineage(raw: RawLineage): Lineage | null {
    if (raw.length === 0) {
        return null;
    }

    const positions = raw.map((slot) => slot.position);
    const slots = new Map<LineagePosition, string[]>();

    for (const slot of raw) {
        if (!isLineagePosition(slot.position)) {
            throw new LineageError(`Unknown lineage position "${slot.position}"`, positions);
        }
        if (slots.has(slot.position)) {
            throw new LineageError(`Lineage position "${slot.position}" appears twice`, positions);
        }
        slots.set(slot.position, slot.names);
    }

    const first = slots.get('first');
    const middle = slots.get('middle');
    const last = slots.get('last');

    if (first && !middle && !last) {
        return { shape: 'single', first };
    }
    if (first && !middle && last) {
        return { shape: 'two-stage', first, last };
    }
    if (first && middle && last) {
        return { shape: 'three-stage', first, middle, last };
    }

    throw new LineageError('Malformed lineage', positions);
}

function crossProduct(from: readonly string[], to: readonly string[]): EvolutionEdge[] {
    return from.flatMap((pokemon) => to.map((evolvesTo) => ({ pokemon, evolvesTo })));
}

function chainedEdges(lineage: Lineage): EvolutionEdge[] {
    switch (lineage.shape) {
        case 'single':
            return [];
        case 'two-stage':
            return crossProduct(lineage.first, lineage.last);
        case 'three-stage':
            return [...crossProduct(lineage.first, lineage.middle), ...crossProduct(lineage.middle, lineage.last)];
    }
}

/**
 * Directed edges of a lineage. Two-stage lines pair every first with every last;
 * three-stage lines chain first→middle and middle→last, never first→last.
 */
export function lineageEdges(lineage: Lineage): EvolutionEdge[] {
    const seen = new Set<string>();
    return chainedEdges(lineage).filter((edge) => {
        const key = JSON.stringify([edge.pokemon, edge.evolvesTo]);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/**
 * Raw slots straight to an edge set.
 */
export function normalizeLineage(raw: RawLineage): EvolutionEdge[] {
    const lineage = parseLineage(raw);
    return lineage ? lineageEdges(lineage) : [];
}
