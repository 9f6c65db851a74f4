/**
 * @module utils
 * @description General utility functions module
 *
 * Provides dB conversion, sample-count conversion and rational approximation.
 */

export {
    linearToDb,
    dbToLinear,
    gcd,
    lcm,
    rationalApproximation,
    secondsToSamples,
    type Fraction,
} from './conversion';
