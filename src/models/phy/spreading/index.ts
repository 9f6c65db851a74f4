/**
 * @module spreading
 * @description Pseudo-random and pulse-compression code sequences
 *
 * ## Supported Sequence Types
 * - PN Sequence (m-sequence) from a Fibonacci LFSR, used as PRBS test data
 * - Barker codes for binary phase-coded radar pulses
 *
 * ## References
 * - Peterson, R. L. (1995). Introduction to Spread Spectrum Communications
 * - Levanon, N. & Mozeson, E. (2004). Radar Signals
 */

import { InvalidParameterError, UnsupportedModulationError } from '../../../core/errors'
import { requireInteger } from '../../../core/guards'

// ==================== PN Sequence (m-sequence) ====================

/**
 * Feedback taps of a primitive polynomial per register length
 */
export const PRIMITIVE_TAPS: Readonly<Record<number, readonly number[]>> = {
    3: [3, 2],
    4: [4, 3],
    5: [5, 3],
    6: [6, 5],
    7: [7, 6],
    8: [8, 6, 5, 4],
    9: [9, 5],
    10: [10, 7],
    11: [11, 9],
    12: [12, 6, 4, 1],
    13: [13, 4, 3, 1],
    14: [14, 5, 3, 1],
    15: [15, 14],
    16: [16, 15, 13, 4],
    17: [17, 14],
    18: [18, 11],
    19: [19, 6, 2, 1],
    20: [20, 17],
    21: [21, 19],
    22: [22, 21],
    23: [23, 18],
}

/**
 * Linear Feedback Shift Register (LFSR) output bits (0/1)
 *
 * @param taps - Feedback tap positions (polynomial exponents)
 * @param length - Output sequence length
 * @param initialState - Initial state (default all 1s)
 */
export function lfsrBits(taps: readonly number[], length: number, initialState?: readonly number[]): Uint8Array {
    const n = Math.max(...taps)  // Register length
    const state = initialState ? Uint8Array.from(initialState) : new Uint8Array(n).fill(1)

    const bits = new Uint8Array(length)

    for (let i = 0; i < length; i++) {
        bits[i] = state[n - 1]

        let feedback = 0
        for (const tap of taps) {
            feedback ^= state[tap - 1]
        }

        // Shift
        state.copyWithin(1, 0, n - 1)
        state[0] = feedback
    }

    return bits
}

/**
 * LFSR m-sequence represented as ±1 (0 -> -1, 1 -> +1)
 */
export function mSequence(taps: readonly number[], length: number, initialState?: readonly number[]): number[] {
    return Array.from(lfsrBits(taps, length, initialState), bit => (bit === 0 ? -1 : 1))
}

/**
 * First `length` bits of the maximal-length sequence of the given order.
 * The sequence repeats with period 2^order - 1.
 *
 * @example
 * ```typescript
 * prbsBits(9, 1024); // PRBS9 test data
 * ```
 */
export function prbsBits(order: number, length: number): Uint8Array {
    const taps = PRIMITIVE_TAPS[order]
    if (!taps) {
        throw new InvalidParameterError('prbsOrder', `must be an integer within [3, 23], got ${order}`)
    }
    requireInteger('length', length, 0)
    return lfsrBits(taps, length)
}

/**
 * Full period of an m-sequence (±1)
 *
 * @param degree - Polynomial degree (3-23)
 */
export function pnSequence(degree: number): number[] {
    const period = (1 << degree) - 1
    return Array.from(prbsBits(degree, period), bit => (bit === 0 ? -1 : 1))
}

// ==================== Barker Codes ====================

export type BarkerCode = 'b2' | 'b3' | 'b41' | 'b42' | 'b5' | 'b7' | 'b11' | 'b13'

/**
 * Barker sequences (±1). `b41`/`b42` are the two length-4 codes.
 */
export const BARKER_CODES: Readonly<Record<BarkerCode, readonly number[]>> = {
    b2: [1, -1],
    b3: [1, 1, -1],
    b41: [1, 1, -1, 1],
    b42: [1, 1, 1, -1],
    b5: [1, 1, 1, -1, 1],
    b7: [1, 1, 1, -1, -1, 1, -1],
    b11: [1, 1, 1, -1, -1, -1, 1, -1, -1, 1, -1],
    b13: [1, 1, 1, 1, 1, -1, -1, 1, 1, -1, 1, -1, 1],
}

export const BARKER_CODE_NAMES: readonly BarkerCode[] = ['b2', 'b3', 'b41', 'b42', 'b5', 'b7', 'b11', 'b13']

/**
 * Look up a Barker code by name
 */
export function barkerCode(name: string): readonly number[] {
    const match = BARKER_CODE_NAMES.find(code => code === name.toLowerCase())
    if (!match) {
        throw new UnsupportedModulationError(name, BARKER_CODE_NAMES, 'Barker code')
    }
    return BARKER_CODES[match]
}

/**
 * Aperiodic autocorrelation of a ±1 sequence, lags 0..N-1
 */
export function aperiodicAutocorrelation(code: readonly number[]): number[] {
    const N = code.length
    const result: number[] = []
    for (let lag = 0; lag < N; lag++) {
        let sum = 0
        for (let i = 0; i + lag < N; i++) {
            sum += code[i] * code[i + lag]
        }
        result.push(sum)
    }
    return result
}
