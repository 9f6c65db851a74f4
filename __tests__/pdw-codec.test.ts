/**
 * PDW Codec Tests
 * Tests for the agile, vector and vector rev3b record formats
 */

import { describe, it, expect } from 'vitest';
import {
    decodePdw,
    defaultAgilePdw,
    defaultVectorPdw,
    defaultVectorRev3bPdw,
    encodePdw,
    getPdwCodec,
    isPdwVariant,
    PDW_CODECS,
    resetPdw,
} from '../src/pdw';
import {
    decodeChirpRate,
    decodeDbm,
    decodeRelativePower,
    encodeChirpRate,
    encodeDbm,
    encodePhase,
    encodeRelativePower,
    packWords,
    splitU64,
    joinU64,
} from '../src/pdw/fields';
import {
    InvalidParameterError,
    PdwFieldOutOfRangeError,
} from '../src/core/errors';
import { readU32 } from './test-utils';

function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

// ==================== Field Encodings ====================

describe('PDW field encodings', () => {
    it('should wrap 360 degrees to phase code 0', () => {
        expect(encodePhase(360)).toBe(0);
        expect(encodePhase(90)).toBe(1024);
        expect(encodePhase(180)).toBe(2048);
    });

    it('should reject negative phase', () => {
        expect(() => encodePhase(-1)).toThrow(PdwFieldOutOfRangeError);
    });

    it('should encode power in 0.005 dB steps above -140 dBm', () => {
        expect(encodeDbm('power', -140)).toBe(0);
        expect(encodeDbm('power', 0)).toBe(28000);
        expect(decodeDbm(28000)).toBe(0);
        expect(decodeDbm(0)).toBe(-140);
    });

    it('should reject power above the 15-bit range', () => {
        expect(() => encodeDbm('power', 24)).toThrow(PdwFieldOutOfRangeError);
        expect(encodeDbm('power', 23.83)).toBe(32766);
    });

    it('should encode relative power as mantissa and biased exponent', () => {
        expect(encodeRelativePower(1)).toBe(26 << 10);
        expect(encodeRelativePower(0.5)).toBe(25 << 10);
        expect(encodeRelativePower(1.5)).toBe((26 << 10) | 512);
        expect(decodeRelativePower(26 << 10)).toBe(1);
        expect(decodeRelativePower(0)).toBe(2 ** -26);
    });

    it('should reject relative power below 2^-26', () => {
        expect(() => encodeRelativePower(0)).toThrow(PdwFieldOutOfRangeError);
    });

    it('should encode small chirp rates with a zero exponent', () => {
        expect(encodeChirpRate(100 * 21.822)).toBe(100);
        expect(decodeChirpRate(100)).toBeCloseTo(2182.2, 6);
    });

    it('should fold large chirp rates into a base-4 exponent', () => {
        const raw = encodeChirpRate(1e6);
        expect(raw >>> 13).toBe(2);
        expect(raw & 0x1FFF).toBe(2864);
        expect(Math.abs(decodeChirpRate(raw) - 1e6) / 1e6).toBeLessThan(1e-3);
    });

    it('should split and join 64-bit values', () => {
        const value = 5 * 2 ** 32 + 7;
        expect(splitU64(value)).toEqual([7, 5]);
        expect(joinU64(7, 5)).toBe(value);
    });
});

// ==================== Vector ====================

describe('Vector PDW', () => {
    it('should use 24-byte records', () => {
        expect(PDW_CODECS.vector.recordSize).toBe(24);
        expect(encodePdw(defaultVectorPdw({ frequencyHz: 1e9 }))).toHaveLength(24);
    });

    it('should pack format, operation, frequency and phase into words 0 and 1', () => {
        const bytes = encodePdw(defaultVectorPdw({
            operation: 'first-after-reset',
            frequencyHz: 1e9,
            phaseDeg: 90,
        }));
        const word0 = readU32(bytes, 0);
        const word1 = readU32(bytes, 4);

        expect(word0 & 0x7).toBe(1);
        expect((word0 >>> 3) & 0x3).toBe(1);
        expect(word0 >>> 5).toBe(52953088);
        expect(word1 & 0xFFFFF).toBe(7629);
        expect(word1 >>> 20).toBe(1024);
    });

    it('should pack power, markers and flags into word 4', () => {
        const bytes = encodePdw(defaultVectorPdw({
            frequencyHz: 1e9,
            powerDbm: 0,
            markers: 0x3,
            phaseMode: 'continuous',
            rfOff: true,
        }));
        const word4 = readU32(bytes, 16);

        expect(word4 & 0x7FFF).toBe(28000);
        expect((word4 >>> 15) & 0xFFF).toBe(0x3);
        expect((word4 >>> 27) & 0x1).toBe(1);
        expect((word4 >>> 28) & 0x1).toBe(1);
    });

    it('should round-trip every field', () => {
        const pdw = defaultVectorPdw({
            operation: 'first-after-reset',
            frequencyHz: 1e9,
            phaseDeg: 90,
            startTimeSec: 10e-6,
            powerDbm: -10,
            markers: 0x5,
            phaseMode: 'continuous',
            rfOff: true,
            waveformIndex: 3,
            waveformMarkers: 0x9,
        });
        const decoded = decodePdw('vector', encodePdw(pdw));

        expect(decoded.operation).toBe('first-after-reset');
        expect(decoded.frequencyHz).toBe(1e9);
        expect(decoded.phaseDeg).toBe(90);
        expect(decoded.startTimeSec).toBeCloseTo(10e-6, 15);
        expect(decoded.powerDbm).toBe(-10);
        expect(decoded.markers).toBe(0x5);
        expect(decoded.phaseMode).toBe('continuous');
        expect(decoded.rfOff).toBe(true);
        expect(decoded.waveformIndex).toBe(3);
        expect(decoded.waveformMarkers).toBe(0x9);
    });

    it('should reject +30 dBm naming the power field', () => {
        const error = catchError(() => encodePdw(defaultVectorPdw({ frequencyHz: 1e9, powerDbm: 30 })));
        expect(error).toBeInstanceOf(PdwFieldOutOfRangeError);
        expect(error).toMatchObject({ field: 'power', value: 30 });
    });

    it('should reject frequencies outside 50 MHz to 20 GHz', () => {
        const error = catchError(() => encodePdw(defaultVectorPdw({ frequencyHz: 30e9 })));
        expect(error).toMatchObject({ field: 'frequency', min: 50e6, max: 20e9 });
    });

    it('should reject a waveform index wider than 16 bits', () => {
        const error = catchError(() => encodePdw(defaultVectorPdw({ frequencyHz: 1e9, waveformIndex: 65536 })));
        expect(error).toMatchObject({ field: 'waveformIndex', max: 65535 });
    });
});

// ==================== Agile ====================

describe('Agile PDW', () => {
    it('should use 28-byte records', () => {
        expect(PDW_CODECS.agile.recordSize).toBe(28);
    });

    it('should round-trip every field', () => {
        const pdw = defaultAgilePdw({
            operation: 'first-after-reset',
            frequencyHz: 2.5e9,
            phaseDeg: 45,
            startTimeSec: 1e-6,
            widthSec: 1e-6,
            relativePower: 0.5,
            markers: 0xABC,
            pulseMode: 'pulsed',
            phaseMode: 'continuous',
            bandAdjust: 'lower',
            chirpShape: 'ramp',
            codingIndex: 300,
            chirpRateHzPerUs: 100 * 21.822,
            frequencyBandMap: 5,
        });
        const decoded = decodePdw('agile', encodePdw(pdw));

        expect(decoded.frequencyHz).toBe(2.5e9);
        expect(decoded.phaseDeg).toBe(45);
        expect(decoded.startTimeSec).toBeCloseTo(1e-6, 15);
        expect(decoded.widthSec).toBeCloseTo(1e-6, 15);
        expect(decoded.relativePower).toBe(0.5);
        expect(decoded.markers).toBe(0xABC);
        expect(decoded.pulseMode).toBe('pulsed');
        expect(decoded.phaseMode).toBe('continuous');
        expect(decoded.bandAdjust).toBe('lower');
        expect(decoded.chirpShape).toBe('ramp');
        expect(decoded.codingIndex).toBe(300);
        expect(decoded.chirpRateHzPerUs).toBeCloseTo(2182.2, 6);
        expect(decoded.frequencyBandMap).toBe(5);
    });

    it('should place band adjust in the top bits of word 5', () => {
        const bytes = encodePdw(defaultAgilePdw({ frequencyHz: 1e9, relativePower: 1, bandAdjust: 'lower' }));
        const word5 = readU32(bytes, 20);
        expect(word5 >>> 30).toBe(2);
        expect(word5 & 0x7FFF).toBe(26 << 10);
    });

    it('should reject a coding index wider than 9 bits', () => {
        const error = catchError(() => encodePdw(defaultAgilePdw({
            frequencyHz: 1e9,
            relativePower: 1,
            codingIndex: 512,
        })));
        expect(error).toMatchObject({ field: 'codingIndex', max: 511 });
    });
});

// ==================== Vector rev3b ====================

describe('Vector rev3b PDW', () => {
    it('should use 48-byte records with format code 3', () => {
        const bytes = encodePdw(defaultVectorRev3bPdw({ frequencyHz: 1e9 }));
        expect(bytes).toHaveLength(48);
        expect(readU32(bytes, 0) & 0x7).toBe(3);
    });

    it('should default to auto-blank and a new waveform per pulse', () => {
        const pdw = defaultVectorRev3bPdw();
        expect(pdw.autoBlank).toBe(true);
        expect(pdw.newWaveform).toBe(true);
    });

    it('should round-trip every field', () => {
        const pdw = defaultVectorRev3bPdw({
            operation: 'first-after-reset',
            frequencyHz: 3e9,
            startTimeSec: 2e-6,
            widthSec: 1e-6,
            maxPowerDbm: 10,
            markers: 0x3,
            powerDbm: 0,
            rfOff: false,
            autoBlank: true,
            newWaveform: true,
            zeroHold: 'hold',
            loLeadSec: 40e-9,
            waveformMarkers: 0xF,
            waveformType: 2,
            waveformIndex: 1234,
            power2Dbm: -20,
            maxPower2Dbm: -5,
            dopplerHz: 100000,
        });
        const decoded = decodePdw('vector-rev3b', encodePdw(pdw));

        expect(decoded.frequencyHz).toBe(3e9);
        expect(decoded.startTimeSec).toBeCloseTo(2e-6, 15);
        expect(decoded.widthSec).toBeCloseTo(1e-6, 15);
        expect(decoded.maxPowerDbm).toBe(10);
        expect(decoded.markers).toBe(0x3);
        expect(decoded.powerDbm).toBe(0);
        expect(decoded.rfOff).toBe(false);
        expect(decoded.autoBlank).toBe(true);
        expect(decoded.newWaveform).toBe(true);
        expect(decoded.zeroHold).toBe('hold');
        expect(decoded.loLeadSec).toBeCloseTo(40e-9, 15);
        expect(decoded.waveformMarkers).toBe(0xF);
        expect(decoded.waveformType).toBe(2);
        expect(decoded.waveformIndex).toBe(1234);
        expect(decoded.power2Dbm).toBe(-20);
        expect(decoded.maxPower2Dbm).toBe(-5);
        expect(decoded.dopplerHz).toBe(100000);
    });

    it('should reject an LO lead longer than 255 ticks', () => {
        const error = catchError(() => encodePdw(defaultVectorRev3bPdw({ frequencyHz: 1e9, loLeadSec: 2e-6 })));
        expect(error).toMatchObject({ field: 'loLead' });
    });
});

// ==================== Reset and Decode Errors ====================

describe('Reset records', () => {
    it('should carry only format and operation bits', () => {
        const bytes = encodePdw(resetPdw('vector'));
        expect(readU32(bytes, 0)).toBe(1 | 2 << 3);
        expect(Array.from(bytes.subarray(4)).every(b => b === 0)).toBe(true);
    });

    it('should ignore payload fields', () => {
        const bytes = encodePdw(defaultAgilePdw({ operation: 'reset', frequencyHz: 5e9, markers: 0xFFF }));
        expect(Array.from(bytes.subarray(4)).every(b => b === 0)).toBe(true);
    });

    it('should decode to the default record', () => {
        const decoded = decodePdw('agile', encodePdw(resetPdw('agile')));
        expect(decoded).toEqual(defaultAgilePdw({ operation: 'reset' }));
        expect(decoded.relativePower).toBe(2 ** -26);

        const vector = decodePdw('vector-rev3b', encodePdw(resetPdw('vector-rev3b')));
        expect(vector.powerDbm).toBe(-140);
        expect(vector.maxPower2Dbm).toBe(-140);
    });
});

describe('PDW decode errors', () => {
    it('should reject a record of another format', () => {
        const rev3b = encodePdw(defaultVectorRev3bPdw({ frequencyHz: 1e9 }));
        const error = catchError(() => decodePdw('vector', rev3b.subarray(0, 24)));
        expect(error).toBeInstanceOf(PdwFieldOutOfRangeError);
        expect(error).toMatchObject({ field: 'format', value: 3 });
    });

    it('should reject operation code 3', () => {
        const error = catchError(() => decodePdw('vector', packWords([1 | 3 << 3, 0, 0, 0, 0, 0])));
        expect(error).toMatchObject({ field: 'operation', value: 3, min: 0, max: 2 });
    });

    it('should reject a record of the wrong length', () => {
        const error = catchError(() => decodePdw('vector', new Uint8Array(28)));
        expect(error).toBeInstanceOf(InvalidParameterError);
        expect(error).toMatchObject({ parameter: 'bytes' });
    });
});

describe('Codec registry', () => {
    it('should recognise variant names', () => {
        expect(isPdwVariant('agile')).toBe(true);
        expect(isPdwVariant('vector-rev3b')).toBe(true);
        expect(isPdwVariant('vector-rev2')).toBe(false);
    });

    it('should return the codec of a variant', () => {
        expect(getPdwCodec('vector-rev3b').formatCode).toBe(3);
    });
});
