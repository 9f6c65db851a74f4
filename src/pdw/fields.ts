/**
 * @module pdw/fields
 * @description Range checks, fixed-point scalings and word I/O shared by the PDW codecs
 *
 * Every encoder returns the raw unsigned field value; the codecs place it with
 * shifts. JavaScript bitwise operators are signed 32-bit, so packed words are
 * brought back to unsigned with `>>> 0` before they are written.
 */

import { InvalidParameterError, PdwFieldOutOfRangeError } from '../core/errors';
import { PDW_OPERATION_CODES, type PdwOperation } from './types';

// ==================== Constants ====================

export const TWO_POW_32 = 2 ** 32;

/** Frequency LSB is 1/1024 Hz */
const FREQUENCY_SCALE = 1024;
/** 4096 phase steps per turn */
const PHASE_STEPS = 4096;
/** Vector power LSB and offset */
const POWER_STEP_DB = 0.005;
const POWER_OFFSET_DB = 140;
const POWER_BITS = 15;

/** Agile relative power: 10-bit mantissa, 5-bit exponent, exponent offset -26 */
const REL_POWER_MANTISSA_BITS = 10;
const REL_POWER_EXPONENT_BITS = 5;
const REL_POWER_EXPONENT_OFFSET = -26;

/** Chirp rate unit per mantissa LSB, Hz/µs */
export const CHIRP_RATE_UNIT = 21.822;
const CHIRP_MANTISSA_BITS = 13;
const CHIRP_EXPONENT_BITS = 4;

// ==================== Range Checks ====================

/**
 * Value must be finite and inside [min, max]
 */
export function checkRange(field: string, value: number, min: number, max: number): number {
    if (!Number.isFinite(value) || value < min || value > max) {
        throw new PdwFieldOutOfRangeError(field, value, min, max);
    }
    return value;
}

/**
 * Unsigned integer that fits in `bits` bits
 */
export function checkBits(field: string, value: number, bits: number): number {
    const max = 2 ** bits - 1;
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new PdwFieldOutOfRangeError(field, value, 0, max);
    }
    return value;
}

/**
 * Name → wire code for an enumerated field; unknown names are out of range
 */
export function enumCode<T extends string>(field: string, names: readonly T[], name: T): number {
    const code = names.indexOf(name);
    if (code < 0) {
        throw new PdwFieldOutOfRangeError(field, Number.NaN, 0, names.length - 1);
    }
    return code;
}

/**
 * Wire code → name; codes past the table are out of range
 */
export function enumName<T extends string>(field: string, names: readonly T[], code: number): T {
    if (code >= names.length) {
        throw new PdwFieldOutOfRangeError(field, code, 0, names.length - 1);
    }
    return names[code];
}

export function flag(value: boolean): number {
    return value ? 1 : 0;
}

// ==================== Operation ====================

const OPERATIONS: readonly PdwOperation[] = ['none', 'first-after-reset', 'reset'];

export function encodeOperation(operation: PdwOperation): number {
    const code = PDW_OPERATION_CODES[operation];
    if (code === undefined) {
        throw new PdwFieldOutOfRangeError('operation', Number.NaN, 0, OPERATIONS.length - 1);
    }
    return code;
}

export function decodeOperation(code: number): PdwOperation {
    return enumName('operation', OPERATIONS, code);
}

// ==================== Fixed-point Fields ====================

export function encodeFrequency(hz: number, min: number, max: number): number {
    return Math.round(checkRange('frequency', hz, min, max) * FREQUENCY_SCALE);
}

export function decodeFrequency(raw: number): number {
    return raw / FREQUENCY_SCALE;
}

/**
 * 360° wraps to 0
 */
export function encodePhase(deg: number): number {
    return Math.round(checkRange('phase', deg, 0, 360) * PHASE_STEPS / 360) % PHASE_STEPS;
}

export function decodePhase(raw: number): number {
    return raw * 360 / PHASE_STEPS;
}

/**
 * Seconds → integer count of `resolution`-second ticks, bounded by `maxTicks`
 */
export function encodeTicks(field: string, seconds: number, resolution: number, maxTicks: number): number {
    checkRange(field, seconds, 0, maxTicks * resolution);
    return Math.min(Math.round(seconds / resolution), maxTicks);
}

export function encodeDbm(field: string, dbm: number): number {
    const max = (2 ** POWER_BITS - 1) * POWER_STEP_DB - POWER_OFFSET_DB;
    checkRange(field, dbm, -POWER_OFFSET_DB, max);
    return Math.min(Math.round((dbm + POWER_OFFSET_DB) / POWER_STEP_DB), 2 ** POWER_BITS - 1);
}

export function decodeDbm(raw: number): number {
    // rounded to the step so 23.835 reads back as 23.835, not 23.834999...
    return Math.round((raw * POWER_STEP_DB - POWER_OFFSET_DB) * 1000) / 1000;
}

/**
 * Relative power as (1 + m/1024) · 2^(e - 26)
 */
export function encodeRelativePower(linear: number): number {
    const maxExponent = 2 ** REL_POWER_EXPONENT_BITS - 1;
    const mantissaScale = 2 ** REL_POWER_MANTISSA_BITS;
    const min = 2 ** REL_POWER_EXPONENT_OFFSET;
    const max = (2 - 1 / mantissaScale) * 2 ** (maxExponent + REL_POWER_EXPONENT_OFFSET);
    checkRange('relativePower', linear, min, max);

    let exponent = Math.floor(Math.log2(linear));
    // log2 can land one off near powers of two
    if (linear / 2 ** exponent >= 2) exponent += 1;
    if (linear / 2 ** exponent < 1) exponent -= 1;

    let biased = exponent - REL_POWER_EXPONENT_OFFSET;
    let mantissa = Math.round((linear / 2 ** exponent - 1) * mantissaScale);
    if (mantissa === mantissaScale) {
        mantissa = 0;
        biased += 1;
    }
    return (biased << REL_POWER_MANTISSA_BITS) | mantissa;
}

export function decodeRelativePower(raw: number): number {
    const mantissaScale = 2 ** REL_POWER_MANTISSA_BITS;
    const mantissa = raw & (mantissaScale - 1);
    const biased = raw >>> REL_POWER_MANTISSA_BITS;
    return (1 + mantissa / mantissaScale) * 2 ** (biased + REL_POWER_EXPONENT_OFFSET);
}

/**
 * Chirp rate as m · 4^e in units of 21.822 Hz/µs.
 *
 * The value is first fitted as m · 2^n with a 13-bit mantissa; an odd n is
 * folded into base 4 by halving the mantissa.
 */
export function encodeChirpRate(hzPerUs: number): number {
    const maxMantissa = 2 ** CHIRP_MANTISSA_BITS - 1;
    const maxExponent = 2 ** CHIRP_EXPONENT_BITS - 1;
    checkRange('chirpRate', hzPerUs, 0, maxMantissa * 4 ** maxExponent * CHIRP_RATE_UNIT);
    const clocks = hzPerUs / CHIRP_RATE_UNIT;

    let mantissa: number;
    let exponent: number;
    if (clocks < maxMantissa + 0.5) {
        mantissa = Math.min(Math.round(clocks), maxMantissa);
        exponent = 0;
    } else {
        exponent = Math.floor(Math.log2(clocks)) + 1 - CHIRP_MANTISSA_BITS;
        const fraction = clocks / 2 ** exponent;
        if (fraction > maxMantissa + 0.5 - 1e-9) {
            mantissa = 2 ** (CHIRP_MANTISSA_BITS - 1);
            exponent += 1;
        } else {
            mantissa = Math.min(Math.round(fraction), maxMantissa);
        }
    }

    if (exponent % 2 === 1) {
        exponent = (exponent + 1) / 2;
        mantissa = Math.floor(mantissa / 2);
    } else {
        exponent /= 2;
    }
    return (exponent << CHIRP_MANTISSA_BITS) | mantissa;
}

export function decodeChirpRate(raw: number): number {
    const mantissa = raw & (2 ** CHIRP_MANTISSA_BITS - 1);
    const exponent = raw >>> CHIRP_MANTISSA_BITS;
    return mantissa * 4 ** exponent * CHIRP_RATE_UNIT;
}

// ==================== Word I/O ====================

/**
 * Split a non-negative integer below 2^53 into low and high 32-bit words
 */
export function splitU64(value: number): [number, number] {
    return [value % TWO_POW_32, Math.floor(value / TWO_POW_32)];
}

export function joinU64(low: number, high: number): number {
    return high * TWO_POW_32 + low;
}

/**
 * Little-endian 32-bit words to bytes
 */
export function packWords(words: readonly number[]): Uint8Array {
    const bytes = new Uint8Array(words.length * 4);
    const view = new DataView(bytes.buffer);
    words.forEach((word, k) => view.setUint32(k * 4, word >>> 0, true));
    return bytes;
}

export function unpackWords(bytes: Uint8Array, count: number): number[] {
    if (bytes.length !== count * 4) {
        throw new InvalidParameterError('bytes', `expected a ${count * 4}-byte record, got ${bytes.length} bytes`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return Array.from({ length: count }, (_, k) => view.getUint32(k * 4, true));
}

/**
 * Check the format and operation bits of word 0 and return the operation
 */
export function readHeaderWord(word0: number, formatCode: number): PdwOperation {
    const format = word0 & 0x7;
    if (format !== formatCode) {
        throw new PdwFieldOutOfRangeError('format', format, formatCode, formatCode);
    }
    return decodeOperation((word0 >>> 3) & 0x3);
}

/**
 * Word 0 and word 1 layout shared by every variant:
 * format (3) | operation (2) | frequency[0:27] ; frequency[27:47] | phase (12)
 */
export function frequencyPhaseWords(
    formatCode: number,
    operation: number,
    frequency: number,
    phase: number
): [number, number] {
    const low = frequency % 2 ** 27;
    const high = Math.floor(frequency / 2 ** 27);
    return [
        (formatCode | operation << 3 | low << 5) >>> 0,
        (high | phase << 20) >>> 0,
    ];
}

export function readFrequencyPhase(word0: number, word1: number): { frequency: number; phase: number } {
    return {
        frequency: (word1 & 0xFFFFF) * 2 ** 27 + (word0 >>> 5),
        phase: word1 >>> 20,
    };
}
