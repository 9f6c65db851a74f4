/**
 * Signal Processing Module Tests
 * Tests for Complex class, exact-length FFT/IFFT and periodic helpers
 */

import { describe, it, expect } from 'vitest';
import {
    Complex,
    circularConvolve,
    fft,
    fftReIm,
    ifft,
    ifftReIm,
    linspace,
    resamplePeriodic,
    upsample,
} from '../src/models/phy/signal-processing';
import { arraysClose, isClose, naiveDft } from './test-utils';

function testSignal(N: number): { re: Float64Array; im: Float64Array } {
    return {
        re: Float64Array.from({ length: N }, (_, n) => Math.cos(0.7 * n) + 0.1 * n),
        im: Float64Array.from({ length: N }, (_, n) => Math.sin(1.3 * n) - 0.05 * n),
    };
}

// ==================== Complex Class Tests ====================

describe('Complex class', () => {
    it('should create from polar coordinates', () => {
        const z = Complex.fromPolar(5, Math.PI / 4);
        expect(isClose(z.magnitude(), 5)).toBe(true);
        expect(isClose(z.phase(), Math.PI / 4)).toBe(true);
    });

    it('should multiply complex numbers correctly', () => {
        // (1+2j) * (3+4j) = -5 + 10j
        const result = new Complex(1, 2).multiply(new Complex(3, 4));
        expect(result.real).toBe(-5);
        expect(result.imag).toBe(10);
    });

    it('should conjugate', () => {
        const z = new Complex(1, 2).conjugate();
        expect(z.imag).toBe(-2);
    });
});

// ==================== FFT Tests ====================

describe('FFT', () => {
    it('should match the direct DFT for power-of-2 lengths', () => {
        const x = testSignal(16);
        const X = fftReIm(x.re, x.im);
        const ref = naiveDft(x.re, x.im);
        expect(arraysClose(X.re, ref.re, 1e-9, 1e-9)).toBe(true);
        expect(arraysClose(X.im, ref.im, 1e-9, 1e-9)).toBe(true);
    });

    it('should match the direct DFT for other lengths without padding', () => {
        for (const N of [7, 12, 100]) {
            const x = testSignal(N);
            const X = fftReIm(x.re, x.im);
            const ref = naiveDft(x.re, x.im);
            expect(X.re).toHaveLength(N);
            expect(arraysClose(X.re, ref.re, 1e-8, 1e-8)).toBe(true);
            expect(arraysClose(X.im, ref.im, 1e-8, 1e-8)).toBe(true);
        }
    });

    it('should invert with ifftReIm', () => {
        const x = testSignal(10);
        const X = fftReIm(x.re, x.im);
        const back = ifftReIm(X.re, X.im);
        expect(arraysClose(back.re, x.re, 1e-10, 1e-10)).toBe(true);
        expect(arraysClose(back.im, x.im, 1e-10, 1e-10)).toBe(true);
    });

    it('should put a DC signal in bin 0', () => {
        const X = fft([1, 1, 1, 1, 1].map(v => new Complex(v, 0)));
        expect(isClose(X[0].real, 5)).toBe(true);
        expect(isClose(X[1].magnitude(), 0, 1e-10, 1e-10)).toBe(true);
    });

    it('should invert on Complex arrays', () => {
        const input = [new Complex(1, 0), new Complex(0, 1), new Complex(-1, 0)];
        const back = ifft(fft(input));
        back.forEach((z, k) => {
            expect(isClose(z.real, input[k].real, 1e-10, 1e-10)).toBe(true);
            expect(isClose(z.imag, input[k].imag, 1e-10, 1e-10)).toBe(true);
        });
    });

    it('should reject mismatched rails', () => {
        expect(() => fftReIm(new Float64Array(4), new Float64Array(3))).toThrow();
    });
});

// ==================== Time-domain Helpers ====================

describe('upsample', () => {
    it('should insert zeros between samples', () => {
        expect(Array.from(upsample(Float64Array.from([1, 2]), 3))).toEqual([1, 0, 0, 2, 0, 0]);
    });
});

describe('circularConvolve', () => {
    it('should wrap the kernel tails around the ends', () => {
        const y = circularConvolve(Float64Array.from([1, 0, 0, 0, 0]), Float64Array.from([1, 2, 3]));
        expect(Array.from(y)).toEqual([2, 3, 0, 0, 1]);
    });

    it('should keep the signal length', () => {
        const y = circularConvolve(new Float64Array(8).fill(1), Float64Array.from([0.5, 0.5, 0.5]));
        expect(y).toHaveLength(8);
        expect(arraysClose(y, new Float64Array(8).fill(1.5))).toBe(true);
    });
});

describe('resamplePeriodic', () => {
    it('should resample a periodic tone exactly', () => {
        const tone = (N: number) => ({
            re: Float64Array.from({ length: N }, (_, n) => Math.cos(2 * Math.PI * 2 * n / N)),
            im: Float64Array.from({ length: N }, (_, n) => Math.sin(2 * Math.PI * 2 * n / N)),
        });
        const out = resamplePeriodic(tone(16), 24);
        const expected = tone(24);
        expect(arraysClose(out.re, expected.re, 1e-9, 1e-9)).toBe(true);
        expect(arraysClose(out.im, expected.im, 1e-9, 1e-9)).toBe(true);
    });

    it('should copy when the length is unchanged', () => {
        const x = testSignal(6);
        const out = resamplePeriodic(x, 6);
        expect(out.re).not.toBe(x.re);
        expect(Array.from(out.re)).toEqual(Array.from(x.re));
    });
});

describe('linspace', () => {
    it('should exclude the stop value', () => {
        expect(Array.from(linspace(0, 1, 4))).toEqual([0, 0.25, 0.5, 0.75]);
    });
});
