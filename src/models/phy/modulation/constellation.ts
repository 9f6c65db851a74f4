/**
 * @module modulation/constellation
 * @description Constellations and symbol mapping for PSK, QAM and APSK
 *
 * ## Mapping conventions
 * - PSK: Gray-coded around the circle. BPSK and 8PSK start at 0 rad, QPSK at π/4.
 * - Square QAM (16/64/256): the high half of the symbol bits picks the I level,
 *   the low half the Q level; each half is Gray-coded, levels run -(L-1)..(L-1).
 * - Cross QAM (32/128): a 6×6 / 12×12 grid with 1×1 / 2×2 corners removed,
 *   numbered row-major from the top-left point.
 * - APSK: rings from the inside out, points evenly spaced with a π/n offset,
 *   numbered ring by ring then by angle.
 *
 * Every constellation is scaled to unit average energy over equiprobable symbols.
 *
 * ## References
 * - Proakis, J. G. (2008). Digital Communications
 * - ETSI EN 302 307-1 (DVB-S2), EN 302 307-2 (DVB-S2X) for APSK ring ratios
 */

import { InvalidParameterError, UnsupportedModulationError } from '../../../core/errors';
import { requireInteger } from '../../../core/guards';
import type { Constellation, ConstellationPoint, ModulationScheme, SymbolStream } from './types';

// ==================== Scheme Table ====================

interface ApskRing {
    count: number;
    radius: number;
}

type SchemeDefinition =
    | { family: 'psk'; order: number; offset: number }
    | { family: 'square-qam'; order: number }
    | { family: 'cross-qam'; order: number; side: number; corner: number }
    | { family: 'apsk'; order: number; rings: readonly ApskRing[] };

const SCHEMES: Record<ModulationScheme, SchemeDefinition> = {
    bpsk: { family: 'psk', order: 2, offset: 0 },
    qpsk: { family: 'psk', order: 4, offset: Math.PI / 4 },
    '8psk': { family: 'psk', order: 8, offset: 0 },
    '16qam': { family: 'square-qam', order: 16 },
    '32qam': { family: 'cross-qam', order: 32, side: 6, corner: 1 },
    '64qam': { family: 'square-qam', order: 64 },
    '128qam': { family: 'cross-qam', order: 128, side: 12, corner: 2 },
    '256qam': { family: 'square-qam', order: 256 },
    '16apsk': {
        family: 'apsk',
        order: 16,
        rings: [{ count: 4, radius: 1 }, { count: 12, radius: 2.53 }],
    },
    '32apsk': {
        family: 'apsk',
        order: 32,
        rings: [{ count: 4, radius: 1 }, { count: 12, radius: 2.84 }, { count: 16, radius: 5.27 }],
    },
    '64apsk': {
        family: 'apsk',
        order: 64,
        rings: [
            { count: 4, radius: 1 },
            { count: 12, radius: 2.4 },
            { count: 20, radius: 4.3 },
            { count: 28, radius: 7.0 },
        ],
    },
};

/**
 * All supported schemes, in table order
 */
export const MODULATION_SCHEMES: readonly ModulationScheme[] = [
    'bpsk', 'qpsk', '8psk',
    '16qam', '32qam', '64qam', '128qam', '256qam',
    '16apsk', '32apsk', '64apsk',
];

function isModulationScheme(name: string): name is ModulationScheme {
    return MODULATION_SCHEMES.some(scheme => scheme === name);
}

// ==================== Helpers ====================

/**
 * Binary-reflected Gray code
 */
export function grayCode(n: number): number {
    return n ^ (n >> 1);
}

/**
 * Inverse of {@link grayCode}
 */
export function grayDecode(g: number): number {
    let n = g;
    for (let shift = g >> 1; shift !== 0; shift >>= 1) {
        n ^= shift;
    }
    return n;
}

/**
 * Normalize Constellation to Unit Average Energy
 */
export function normalizeConstellation(points: readonly ConstellationPoint[]): ConstellationPoint[] {
    let avgEnergy = 0;
    for (const p of points) {
        avgEnergy += p.i * p.i + p.q * p.q;
    }
    avgEnergy /= points.length;

    const factor = 1 / Math.sqrt(avgEnergy);
    return points.map(p => ({ i: p.i * factor, q: p.q * factor }));
}

function pskPoints(order: number, offset: number): ConstellationPoint[] {
    const points: ConstellationPoint[] = new Array(order);
    for (let p = 0; p < order; p++) {
        const angle = 2 * Math.PI * p / order + offset;
        points[grayCode(p)] = { i: Math.cos(angle), q: Math.sin(angle) };
    }
    return points;
}

function squareQamPoints(order: number): ConstellationPoint[] {
    const halfBits = Math.log2(order) / 2;
    const side = 1 << halfBits;
    const points: ConstellationPoint[] = [];

    for (let s = 0; s < order; s++) {
        const iIndex = grayDecode(s >> halfBits);
        const qIndex = grayDecode(s & (side - 1));
        points.push({
            i: 2 * iIndex - (side - 1),
            q: 2 * qIndex - (side - 1),
        });
    }
    return points;
}

function crossQamPoints(side: number, corner: number): ConstellationPoint[] {
    const points: ConstellationPoint[] = [];
    const inCorner = (k: number) => k < corner || k >= side - corner;

    for (let row = 0; row < side; row++) {
        for (let col = 0; col < side; col++) {
            if (inCorner(row) && inCorner(col)) continue;
            points.push({
                i: 2 * col - (side - 1),
                q: (side - 1) - 2 * row,
            });
        }
    }
    return points;
}

function apskPoints(rings: readonly ApskRing[]): ConstellationPoint[] {
    const points: ConstellationPoint[] = [];
    for (const ring of rings) {
        for (let k = 0; k < ring.count; k++) {
            const angle = 2 * Math.PI * k / ring.count + Math.PI / ring.count;
            points.push({ i: ring.radius * Math.cos(angle), q: ring.radius * Math.sin(angle) });
        }
    }
    return points;
}

function rawPoints(def: SchemeDefinition): ConstellationPoint[] {
    switch (def.family) {
        case 'psk':
            return pskPoints(def.order, def.offset);
        case 'square-qam':
            return squareQamPoints(def.order);
        case 'cross-qam':
            return crossQamPoints(def.side, def.corner);
        case 'apsk':
            return apskPoints(def.rings);
    }
}

// ==================== Public API ====================

/**
 * Resolve a user-facing scheme name.
 *
 * Accepts canonical names and the reversed spellings (`qam16`, `psk8`, `apsk32`),
 * case-insensitive, ignoring `-`, `_` and spaces.
 */
export function parseModulationScheme(name: string): ModulationScheme {
    const compact = name.toLowerCase().replace(/[\s_-]/g, '');
    const reversed = /^(psk|qam|apsk)(\d+)$/.exec(compact);
    const canonical = reversed ? `${reversed[2]}${reversed[1]}` : compact;

    if (isModulationScheme(canonical)) {
        return canonical;
    }
    throw new UnsupportedModulationError(name, MODULATION_SCHEMES);
}

/**
 * Build the normalized constellation for a scheme.
 *
 * @example
 * ```typescript
 * const { points } = getConstellation('16qam');
 * // points[0] = { i: -3/√10, q: -3/√10 }
 * ```
 */
export function getConstellation(scheme: ModulationScheme): Constellation {
    if (!isModulationScheme(scheme)) {
        throw new UnsupportedModulationError(String(scheme), MODULATION_SCHEMES);
    }
    const def = SCHEMES[scheme];

    const raw = rawPoints(def);

    return {
        scheme,
        order: def.order,
        bitsPerSymbol: Math.log2(def.order),
        points: normalizeConstellation(raw),
    };
}

/**
 * Map symbol indices onto constellation points.
 */
export function mapSymbols(indices: ArrayLike<number>, scheme: ModulationScheme): SymbolStream {
    const { order, points } = getConstellation(scheme);
    const i = new Float64Array(indices.length);
    const q = new Float64Array(indices.length);

    for (let n = 0; n < indices.length; n++) {
        const s = indices[n];
        if (!Number.isInteger(s) || s < 0 || s >= order) {
            throw new InvalidParameterError(
                'symbols',
                `index ${s} at position ${n} is outside [0, ${order})`
            );
        }
        i[n] = points[s].i;
        q[n] = points[s].q;
    }

    return { i, q };
}

/**
 * Pack a bit sequence into symbol indices, MSB first.
 * Trailing bits that do not fill a whole symbol are dropped.
 *
 * @example
 * ```typescript
 * bitsToSymbols([1, 0, 1, 1], 2); // [2, 3]
 * ```
 */
export function bitsToSymbols(bits: ArrayLike<number>, bitsPerSymbol: number): number[] {
    requireInteger('bitsPerSymbol', bitsPerSymbol);
    const count = Math.floor(bits.length / bitsPerSymbol);
    const symbols: number[] = new Array(count);

    for (let s = 0; s < count; s++) {
        let index = 0;
        for (let b = 0; b < bitsPerSymbol; b++) {
            index = (index << 1) | (bits[s * bitsPerSymbol + b] ? 1 : 0);
        }
        symbols[s] = index;
    }
    return symbols;
}
