/**
 * PHY Spreading Module Tests
 * Tests for PRBS m-sequences and Barker codes
 */

import { describe, it, expect } from 'vitest';
import {
    aperiodicAutocorrelation,
    BARKER_CODE_NAMES,
    BARKER_CODES,
    barkerCode,
    mSequence,
    pnSequence,
    prbsBits,
} from '../src/models/phy/spreading';
import { InvalidParameterError, UnsupportedModulationError } from '../src/core/errors';
import { arraysClose } from './test-utils';

// ==================== M-Sequence ====================

describe('mSequence', () => {
    it('should generate sequence of correct length', () => {
        expect(mSequence([3, 2], 7)).toHaveLength(7);
    });

    it('should generate a ±1 sequence', () => {
        for (const chip of mSequence([4, 3], 15)) {
            expect(chip === 1 || chip === -1).toBe(true);
        }
    });

    it('should be deterministic with same taps', () => {
        expect(arraysClose(mSequence([5, 3], 31), mSequence([5, 3], 31))).toBe(true);
    });
});

// ==================== PRBS ====================

describe('prbsBits', () => {
    it('should repeat with period 2^order - 1', () => {
        const bits = prbsBits(9, 1022);
        for (let k = 0; k < 511; k++) {
            expect(bits[k + 511]).toBe(bits[k]);
        }
    });

    it('should hold one more one than zero per period', () => {
        for (const order of [7, 9]) {
            const period = 2 ** order - 1;
            const ones = prbsBits(order, period).reduce((sum, bit) => sum + bit, 0);
            expect(ones).toBe(2 ** (order - 1));
        }
    });

    it('should reject unsupported orders', () => {
        expect(() => prbsBits(2, 10)).toThrow(InvalidParameterError);
        expect(() => prbsBits(24, 10)).toThrow(InvalidParameterError);
    });
});

describe('pnSequence', () => {
    it('should have maximal length', () => {
        expect(pnSequence(4)).toHaveLength(15);
    });

    it('should have a two-valued periodic autocorrelation', () => {
        const seq = pnSequence(5);
        const N = seq.length;
        for (let lag = 1; lag < N; lag++) {
            let sum = 0;
            for (let n = 0; n < N; n++) sum += seq[n] * seq[(n + lag) % N];
            expect(sum).toBe(-1);
        }
    });
});

// ==================== Barker Codes ====================

describe('Barker codes', () => {
    it('should have sidelobes no larger than 1', () => {
        for (const name of BARKER_CODE_NAMES) {
            const code = BARKER_CODES[name];
            const acf = aperiodicAutocorrelation(code);
            expect(acf[0]).toBe(code.length);
            for (const sidelobe of acf.slice(1)) {
                expect(Math.abs(sidelobe)).toBeLessThanOrEqual(1);
            }
        }
    });

    it('should look codes up case-insensitively', () => {
        expect(barkerCode('B13')).toHaveLength(13);
        expect(barkerCode('b42')).toEqual([1, 1, 1, -1]);
    });

    it('should reject unknown codes', () => {
        expect(() => barkerCode('b6')).toThrow(UnsupportedModulationError);
    });
});
