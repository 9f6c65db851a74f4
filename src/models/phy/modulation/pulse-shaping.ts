/**
 * @module modulation/pulse-shaping
 * @description Pulse Shaping Filters (Raised Cosine, Root Raised Cosine)
 *
 * ## Theoretical Background
 * Pulse shaping limits signal bandwidth and controls Inter-Symbol Interference (ISI).
 * The raised cosine satisfies the Nyquist ISI criterion; a matched pair of root
 * raised cosine filters (transmit + receive) yields a raised cosine overall.
 *
 * Coefficients from {@link designFilter} are scaled to unit energy (Σh² = 1).
 *
 * ## References
 * - Proakis, J. G. (2008). Digital Communications
 */

import { InvalidParameterError, UnsupportedModulationError } from '../../../core/errors';
import { requireInteger } from '../../../core/guards';
import type { FilterDescriptor, FilterKind } from './types';

export const FILTER_KINDS: readonly FilterKind[] = ['raised-cosine', 'root-raised-cosine'];

/** Total span of the designed filter, in symbols */
export const DEFAULT_FILTER_SPAN_SYMBOLS = 10;

const SINGULARITY_TOL = 1e-9;

/**
 * sinc function, sin(πx)/(πx)
 */
export function sinc(x: number): number {
    if (Math.abs(x) < 1e-10) return 1;
    return Math.sin(Math.PI * x) / (Math.PI * x);
}

/**
 * Raised Cosine Pulse
 *
 * h(t) = sinc(t/T) * cos(π*α*t/T) / (1 - (2*α*t/T)²)
 *
 * At t = ±T/(2α) the limit is (π/4)·sinc(1/(2α)).
 *
 * @param t - Time
 * @param symbolPeriod - Symbol period T
 * @param rolloff - Rolloff factor α (0 ≤ α ≤ 1)
 */
export function raisedCosine(t: number, symbolPeriod: number, rolloff: number): number {
    const x = t / symbolPeriod;
    const alpha = rolloff;

    if (Math.abs(x) < SINGULARITY_TOL) {
        return 1;
    }

    if (alpha > 0 && Math.abs(Math.abs(x) - 1 / (2 * alpha)) < SINGULARITY_TOL) {
        return (Math.PI / 4) * sinc(1 / (2 * alpha));
    }

    const denominator = 1 - Math.pow(2 * alpha * x, 2);
    return sinc(x) * Math.cos(Math.PI * alpha * x) / denominator;
}

/**
 * Root Raised Cosine Pulse (unnormalized, h(0) = 1 + α(4/π - 1))
 *
 * @param t - Time
 * @param symbolPeriod - Symbol period T
 * @param rolloff - Rolloff factor α
 */
export function rootRaisedCosine(t: number, symbolPeriod: number, rolloff: number): number {
    const x = t / symbolPeriod;
    const alpha = rolloff;

    // Special case t = 0
    if (Math.abs(x) < SINGULARITY_TOL) {
        return 1 + alpha * (4 / Math.PI - 1);
    }

    // Special case t = ±T/(4α)
    if (alpha > 0 && Math.abs(Math.abs(x) - 1 / (4 * alpha)) < SINGULARITY_TOL) {
        const a = (1 + 2 / Math.PI) * Math.sin(Math.PI / (4 * alpha));
        const b = (1 - 2 / Math.PI) * Math.cos(Math.PI / (4 * alpha));
        return (alpha / Math.SQRT2) * (a + b);
    }

    const piX = Math.PI * x;
    const fourAlphaX = 4 * alpha * x;

    const numerator = Math.sin(piX * (1 - alpha)) + fourAlphaX * Math.cos(piX * (1 + alpha));
    const denominator = piX * (1 - fourAlphaX * fourAlphaX);

    return numerator / denominator;
}

/**
 * Design a pulse-shaping FIR filter.
 *
 * The filter has `spanSymbols * samplesPerSymbol + 1` taps (rounded down to an
 * odd count so a tap sits on t = 0) and unit energy.
 *
 * @example
 * ```typescript
 * const h = designFilter({ kind: 'root-raised-cosine', rollOff: 0.35, samplesPerSymbol: 4 });
 * // h.length === 41
 * ```
 */
export function designFilter(descriptor: FilterDescriptor): Float64Array {
    const { kind, rollOff, samplesPerSymbol } = descriptor;
    const spanSymbols = descriptor.spanSymbols ?? DEFAULT_FILTER_SPAN_SYMBOLS;

    if (!FILTER_KINDS.includes(kind)) {
        throw new UnsupportedModulationError(String(kind), FILTER_KINDS, 'filter kind');
    }
    if (!Number.isFinite(rollOff) || rollOff < 0 || rollOff > 1) {
        throw new InvalidParameterError('rollOff', `must be within [0, 1], got ${rollOff}`);
    }
    requireInteger('samplesPerSymbol', samplesPerSymbol);
    requireInteger('spanSymbols', spanSymbols);

    const pulse = kind === 'raised-cosine' ? raisedCosine : rootRaisedCosine;
    const taps = 2 * Math.floor(spanSymbols * samplesPerSymbol / 2) + 1;
    const center = (taps - 1) / 2;
    const h = new Float64Array(taps);

    for (let n = 0; n < taps; n++) {
        h[n] = pulse((n - center) / samplesPerSymbol, 1, rollOff);
    }

    let energy = 0;
    for (const v of h) energy += v * v;
    const factor = 1 / Math.sqrt(energy);
    for (let n = 0; n < taps; n++) {
        h[n] *= factor;
    }

    return h;
}

/**
 * Calculate Raised Cosine Signal Bandwidth
 *
 * B = (1 + α) / (2T)
 */
export function raisedCosineBandwidth(symbolPeriod: number, rolloff: number): number {
    return (1 + rolloff) / (2 * symbolPeriod);
}
