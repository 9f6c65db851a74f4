/**
 * @module utils/conversion
 * @description Unit conversion and rational-number helpers
 */

/**
 * Convert linear value to dB (decibels)
 *
 * @example
 * ```typescript
 * linearToDb(10);   // returns 10
 * linearToDb(0.5);  // returns -3.01
 * ```
 */
export function linearToDb(linear: number): number {
    if (linear <= 0) {
        throw new Error('Linear value must be positive');
    }
    return 10 * Math.log10(linear);
}

/**
 * Convert dB (decibels) to linear value
 */
export function dbToLinear(db: number): number {
    return Math.pow(10, db / 10);
}

/**
 * Greatest common divisor of two non-negative integers
 */
export function gcd(a: number, b: number): number {
    let x = Math.abs(a);
    let y = Math.abs(b);
    while (y !== 0) {
        const t = x % y;
        x = y;
        y = t;
    }
    return x;
}

/**
 * Least common multiple of two positive integers
 */
export function lcm(a: number, b: number): number {
    return (a / gcd(a, b)) * b;
}

/**
 * Reduced fraction p/q
 */
export interface Fraction {
    numerator: number;
    denominator: number;
}

/**
 * Best rational approximation of a positive number by continued fractions.
 *
 * Returns `undefined` when no fraction with denominator ≤ `maxDenominator`
 * matches within `relTol`.
 *
 * @example
 * ```typescript
 * rationalApproximation(100e6 / 3e6); // { numerator: 100, denominator: 3 }
 * ```
 */
export function rationalApproximation(
    value: number,
    maxDenominator = 1_000_000,
    relTol = 1e-9
): Fraction | undefined {
    if (!Number.isFinite(value) || value <= 0) {
        return undefined;
    }

    let h0 = 0, h1 = 1;
    let k0 = 1, k1 = 0;
    let x = value;

    for (let iter = 0; iter < 64; iter++) {
        const a = Math.floor(x);
        const h2 = a * h1 + h0;
        const k2 = a * k1 + k0;
        if (k2 > maxDenominator) {
            break;
        }
        h0 = h1; h1 = h2;
        k0 = k1; k1 = k2;

        if (Math.abs(h1 / k1 - value) <= relTol * value) {
            return { numerator: h1, denominator: k1 };
        }
        const frac = x - a;
        if (frac < 1e-15) {
            break;
        }
        x = 1 / frac;
    }

    if (k1 > 0 && Math.abs(h1 / k1 - value) <= relTol * value) {
        return { numerator: h1, denominator: k1 };
    }
    return undefined;
}

/**
 * Seconds to a whole sample count, absorbing floating-point residue
 * (10e-6 s at 100 MSa/s is exactly 1000 samples, not 1001).
 */
export function secondsToSamples(
    seconds: number,
    sampleRate: number,
    mode: 'ceil' | 'round' = 'round'
): number {
    const exact = seconds * sampleRate;
    const nearest = Math.round(exact);
    if (Math.abs(exact - nearest) < 1e-6) {
        return nearest;
    }
    return mode === 'ceil' ? Math.ceil(exact) : nearest;
}
