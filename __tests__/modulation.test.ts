/**
 * Modulation Module Tests
 * Tests for pulse-shaping filters and constellations
 */

import { describe, it, expect } from 'vitest';
import {
    bitsToSymbols,
    designFilter,
    getConstellation,
    grayCode,
    grayDecode,
    mapSymbols,
    MODULATION_SCHEMES,
    parseModulationScheme,
    raisedCosine,
    raisedCosineBandwidth,
    rootRaisedCosine,
    sinc,
} from '../src/models/phy/modulation';
import { InvalidParameterError, UnsupportedModulationError } from '../src/core/errors';
import { energy, isClose } from './test-utils';

// ==================== Pulse Shaping ====================

describe('Pulse Shaping', () => {
    const T = 1; // Symbol period for testing

    describe('sinc function', () => {
        it('should return 1 at t=0', () => {
            expect(sinc(0)).toBe(1);
        });

        it('should return 0 at integer multiples', () => {
            expect(isClose(sinc(1), 0, 1e-10, 1e-12)).toBe(true);
            expect(isClose(sinc(-2), 0, 1e-10, 1e-12)).toBe(true);
        });
    });

    describe('raisedCosine', () => {
        it('should return 1 at t=0', () => {
            expect(raisedCosine(0, T, 0.5)).toBe(1);
        });

        it('should cross zero at other symbol instants', () => {
            for (const k of [1, 2, 3]) {
                expect(Math.abs(raisedCosine(k, T, 0.35))).toBeLessThan(1e-12);
            }
        });

        it('should match sinc for roll-off = 0', () => {
            for (const t of [0.3, 0.5, 0.7]) {
                expect(isClose(raisedCosine(t, T, 0), sinc(t), 1e-10)).toBe(true);
            }
        });

        it('should be continuous through the t = T/(2α) singularity', () => {
            const t = 1 / (2 * 0.35);
            const atSingularity = raisedCosine(t, T, 0.35);
            expect(Number.isFinite(atSingularity)).toBe(true);
            expect(Math.abs(raisedCosine(t + 1e-6, T, 0.35) - atSingularity)).toBeLessThan(1e-4);
        });
    });

    describe('rootRaisedCosine', () => {
        it('should peak at 1 + α(4/π - 1)', () => {
            expect(isClose(rootRaisedCosine(0, T, 0.5), 1 + 0.5 * (4 / Math.PI - 1), 1e-12)).toBe(true);
        });

        it('should be symmetric', () => {
            expect(isClose(rootRaisedCosine(0.5, T, 0.5), rootRaisedCosine(-0.5, T, 0.5), 1e-10)).toBe(true);
        });

        it('should be continuous through the t = T/(4α) singularity', () => {
            const atSingularity = rootRaisedCosine(1, T, 0.25);
            expect(isClose(atSingularity, -(0.25 / Math.SQRT2) * (1 - 2 / Math.PI), 1e-9)).toBe(true);
            expect(Math.abs(rootRaisedCosine(1 + 1e-6, T, 0.25) - atSingularity)).toBeLessThan(1e-4);
        });
    });

    describe('designFilter', () => {
        it('should have span × samples-per-symbol + 1 taps', () => {
            const h = designFilter({ kind: 'root-raised-cosine', rollOff: 0.35, samplesPerSymbol: 4 });
            expect(h).toHaveLength(41);
        });

        it('should round the tap count down to an odd number', () => {
            const h = designFilter({ kind: 'raised-cosine', rollOff: 0.35, samplesPerSymbol: 3, spanSymbols: 5 });
            expect(h).toHaveLength(15);
        });

        it('should have unit energy', () => {
            for (const kind of ['raised-cosine', 'root-raised-cosine'] as const) {
                const h = designFilter({ kind, rollOff: 0.22, samplesPerSymbol: 8 });
                expect(isClose(energy(h), 1, 1e-12)).toBe(true);
            }
        });

        it('should give finite, unit-energy root-raised-cosine taps across roll-off and oversampling', () => {
            for (const rollOff of [0, 0.35, 0.5, 1]) {
                for (const samplesPerSymbol of [4, 8, 16]) {
                    const h = designFilter({ kind: 'root-raised-cosine', rollOff, samplesPerSymbol });
                    expect(h.every(Number.isFinite)).toBe(true);
                    expect(isClose(energy(h), 1, 1e-12)).toBe(true);
                }
            }
        });

        it('should peak at the centre tap and be symmetric', () => {
            const h = designFilter({ kind: 'root-raised-cosine', rollOff: 0.5, samplesPerSymbol: 4 });
            const centre = (h.length - 1) / 2;
            expect(h.indexOf(Math.max(...h))).toBe(centre);
            for (let k = 1; k <= centre; k++) {
                expect(isClose(h[centre - k], h[centre + k], 1e-12)).toBe(true);
            }
        });

        it('should reject roll-off outside [0, 1]', () => {
            expect(() => designFilter({ kind: 'root-raised-cosine', rollOff: 1.5, samplesPerSymbol: 4 }))
                .toThrow(InvalidParameterError);
        });
    });

    describe('raisedCosineBandwidth', () => {
        it('should calculate bandwidth correctly', () => {
            // BW = (1 + alpha) / (2*T) = 1.5 / 2e-6 = 750 kHz
            expect(isClose(raisedCosineBandwidth(1e-6, 0.5), 750000)).toBe(true);
        });
    });
});

// ==================== Constellations ====================

describe('Constellations', () => {
    it('should have unit average energy for every scheme', () => {
        for (const scheme of MODULATION_SCHEMES) {
            const { points, order } = getConstellation(scheme);
            const avg = points.reduce((sum, p) => sum + p.i * p.i + p.q * p.q, 0) / points.length;
            expect(points).toHaveLength(order);
            expect(isClose(avg, 1, 1e-12)).toBe(true);
        }
    });

    it('should report bits per symbol', () => {
        expect(getConstellation('8psk').bitsPerSymbol).toBe(3);
        expect(getConstellation('128qam').bitsPerSymbol).toBe(7);
    });

    it('should place QPSK on the diagonals', () => {
        const { points } = getConstellation('qpsk');
        expect(isClose(points[0].i, Math.SQRT1_2, 1e-12)).toBe(true);
        expect(isClose(points[0].q, Math.SQRT1_2, 1e-12)).toBe(true);
        expect(isClose(points[3].i, -Math.SQRT1_2, 1e-12)).toBe(true);
        expect(isClose(points[3].q, -Math.SQRT1_2, 1e-12)).toBe(true);
    });

    it('should Gray-code the 16QAM levels', () => {
        const { points } = getConstellation('16qam');
        const unit = 1 / Math.sqrt(10);
        expect(isClose(points[0].i, -3 * unit, 1e-12)).toBe(true);
        expect(isClose(points[0].q, -3 * unit, 1e-12)).toBe(true);
        // low bits 10 are Gray index 3, the top Q level
        expect(isClose(points[2].q, 3 * unit, 1e-12)).toBe(true);
    });

    it('should give distinct points', () => {
        for (const scheme of MODULATION_SCHEMES) {
            const keys = new Set(getConstellation(scheme).points.map(p => `${p.i.toFixed(9)},${p.q.toFixed(9)}`));
            expect(keys.size).toBe(getConstellation(scheme).order);
        }
    });

    describe('parseModulationScheme', () => {
        it('should accept canonical names and aliases', () => {
            expect(parseModulationScheme('16qam')).toBe('16qam');
            expect(parseModulationScheme('QAM16')).toBe('16qam');
            expect(parseModulationScheme('psk8')).toBe('8psk');
            expect(parseModulationScheme('16-APSK')).toBe('16apsk');
        });

        it('should reject unknown schemes', () => {
            expect(() => parseModulationScheme('ofdm')).toThrow(UnsupportedModulationError);
            expect(() => parseModulationScheme('qam12')).toThrow(UnsupportedModulationError);
        });
    });

    describe('mapSymbols', () => {
        it('should look up each index', () => {
            const { i, q } = mapSymbols([0, 1], 'bpsk');
            expect(i[0]).toBe(1);
            expect(isClose(i[1], -1, 1e-12)).toBe(true);
            expect(q[0]).toBe(0);
        });

        it('should reject indices outside the alphabet', () => {
            expect(() => mapSymbols([0, 16], '16qam')).toThrow(InvalidParameterError);
        });
    });

    describe('bitsToSymbols', () => {
        it('should pack bits MSB first', () => {
            expect(bitsToSymbols([1, 0, 1, 1], 2)).toEqual([2, 3]);
        });

        it('should drop trailing bits', () => {
            expect(bitsToSymbols([1, 0, 1], 2)).toEqual([2]);
        });
    });

    describe('Gray code', () => {
        it('should change one bit between neighbours', () => {
            for (let n = 0; n < 255; n++) {
                const diff = grayCode(n) ^ grayCode(n + 1);
                expect(diff & (diff - 1)).toBe(0);
            }
        });

        it('should invert with grayDecode', () => {
            for (let n = 0; n < 256; n++) {
                expect(grayDecode(grayCode(n))).toBe(n);
            }
        });
    });
});
