/**
 * @module modulation/types
 * @description Type definitions for pulse shaping and symbol mapping
 */

/**
 * Pulse-shaping filter family
 */
export type FilterKind = 'raised-cosine' | 'root-raised-cosine';

/**
 * Pulse-shaping filter parameters
 */
export interface FilterDescriptor {
    kind: FilterKind;
    /** Excess bandwidth α, 0 ≤ α ≤ 1 */
    rollOff: number;
    /** Integer oversampling factor */
    samplesPerSymbol: number;
    /** Filter span in symbols (default 10) */
    spanSymbols?: number;
}

/**
 * Closed set of supported digital modulations
 */
export type ModulationScheme =
    | 'bpsk'
    | 'qpsk'
    | '8psk'
    | '16qam'
    | '32qam'
    | '64qam'
    | '128qam'
    | '256qam'
    | '16apsk'
    | '32apsk'
    | '64apsk';

/**
 * Constellation point
 */
export interface ConstellationPoint {
    /** In-phase component */
    i: number;
    /** Quadrature component */
    q: number;
}

/**
 * A normalized constellation; `points[s]` is the point for symbol index s
 */
export interface Constellation {
    scheme: ModulationScheme;
    order: number;
    bitsPerSymbol: number;
    points: readonly ConstellationPoint[];
}

/**
 * Mapped baseband symbols
 */
export interface SymbolStream {
    i: Float64Array;
    q: Float64Array;
}
