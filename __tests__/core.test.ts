/**
 * Core Module Tests
 * Tests for error types, loggers, guards and the seeded RNG
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    ArbkitError,
    ConsoleLogger,
    createLogger,
    createRng,
    ErrorCodes,
    hasErrorCode,
    InvalidParameterError,
    InvalidPdwSequenceError,
    isArbkitError,
    MemoryLogger,
    MultiLogger,
    PdwFieldOutOfRangeError,
    requireInRange,
    requireInteger,
    requirePositive,
    UnsupportedModulationError,
    WaveformConstraintViolationError,
    wrapError,
} from '../src/core';

const CORRECTION = {
    source: 'sine',
    requestedLength: 1000,
    finalLength: 6000,
    strategy: 'repeat' as const,
    granularity: 48,
    minLength: 240,
};

// ==================== Errors ====================

describe('Errors', () => {
    it('should carry a code per class', () => {
        expect(new InvalidParameterError('rollOff', 'too big').code).toBe(ErrorCodes.INVALID_PARAMETER);
        expect(new UnsupportedModulationError('ofdm', ['bpsk']).code).toBe(ErrorCodes.UNSUPPORTED_MODULATION);
        expect(new WaveformConstraintViolationError('granularity', 'too long').code)
            .toBe(ErrorCodes.WAVEFORM_CONSTRAINT_VIOLATION);
        expect(new PdwFieldOutOfRangeError('phase', 400, 0, 360).code).toBe(ErrorCodes.PDW_FIELD_OUT_OF_RANGE);
        expect(new InvalidPdwSequenceError(0, 'empty').code).toBe(ErrorCodes.INVALID_PDW_SEQUENCE);
    });

    it('should prefix the parameter name', () => {
        const error = new InvalidParameterError('rollOff', 'must be within [0, 1], got 2');
        expect(error.message).toBe('rollOff: must be within [0, 1], got 2');
        expect(error.name).toBe('InvalidParameterError');
        expect(error).toBeInstanceOf(ArbkitError);
        expect(error).toBeInstanceOf(Error);
    });

    it('should list the supported choices', () => {
        const error = new UnsupportedModulationError('ofdm', ['bpsk', 'qpsk']);
        expect(error.message).toBe("Unsupported modulation 'ofdm'. Supported: bpsk, qpsk");
        expect(error.supported).toEqual(['bpsk', 'qpsk']);
    });

    it('should describe the offending PDW field', () => {
        const error = new PdwFieldOutOfRangeError('codingIndex', 600, 0, 511);
        expect(error.message).toBe("PDW field 'codingIndex' = 600 is outside [0, 511]");
        expect(error).toMatchObject({ field: 'codingIndex', value: 600, min: 0, max: 511 });
    });

    it('should serialize to JSON', () => {
        const json = new InvalidPdwSequenceError(3, 'reset in the middle').toJSON();
        expect(json).toMatchObject({
            name: 'InvalidPdwSequenceError',
            code: 'INVALID_PDW_SEQUENCE',
            message: 'reset in the middle',
            details: { index: 3 },
        });
        expect(typeof json.timestamp).toBe('number');
    });

    it('should recognise and wrap errors', () => {
        const native = new RangeError('bad');
        expect(isArbkitError(native)).toBe(false);
        expect(hasErrorCode(new InvalidParameterError('x', 'y'), ErrorCodes.INVALID_PARAMETER)).toBe(true);

        const wrapped = wrapError(native);
        expect(wrapped.code).toBe(ErrorCodes.INVALID_PARAMETER);
        expect(wrapped.message).toBe('bad');
        expect(wrapped.details).toEqual({ originalError: 'RangeError' });

        const original = new InvalidParameterError('x', 'y');
        expect(wrapError(original)).toBe(original);
        expect(wrapError('plain', ErrorCodes.INVALID_PDW_SEQUENCE).message).toBe('plain');
    });
});

// ==================== Guards ====================

describe('Guards', () => {
    it('should return accepted values', () => {
        expect(requirePositive('width', 2)).toBe(2);
        expect(requireInteger('count', 0, 0)).toBe(0);
        expect(requireInRange('depth', 100, 0, 100)).toBe(100);
    });

    it('should name the rejected argument', () => {
        expect(() => requirePositive('width', 0)).toThrow('width: must be > 0, got 0');
        expect(() => requireInteger('count', 1.5)).toThrow('count: must be an integer >= 1, got 1.5');
        expect(() => requireInRange('depth', Number.NaN, 0, 100)).toThrow(InvalidParameterError);
    });
});

// ==================== Logging ====================

describe('MemoryLogger', () => {
    it('should keep entries by type with schema and timestamp', () => {
        const logger = new MemoryLogger();
        logger.logSynthesis({ source: 'sine', format: 'iq', sampleRate: 1e9, length: 6000 });
        logger.logCorrection(CORRECTION);
        logger.logPdwFile({ source: 'buildPdwFile', variant: 'vector', pdwCount: 2, recordSize: 16, byteLength: 4112 });

        expect(logger.syntheses[0]).toMatchObject({ logType: 'synthesis', schemaVersion: '1.0.0', length: 6000 });
        expect(logger.corrections[0]).toMatchObject({ logType: 'correction', finalLength: 6000 });
        expect(logger.pdwFiles[0]).toMatchObject({ logType: 'pdw-file', pdwCount: 2 });
        expect(logger.getAllLogs()).toHaveLength(3);
    });

    it('should export JSONL one entry per line', () => {
        const logger = new MemoryLogger({ schemaVersion: '2.0.0' });
        logger.logCorrection(CORRECTION);
        logger.logCorrection({ ...CORRECTION, source: 'am' });

        const lines = logger.toJSONL().split('\n');
        expect(lines).toHaveLength(2);
        expect(JSON.parse(lines[1])).toMatchObject({ source: 'am', schemaVersion: '2.0.0' });
    });

    it('should clear', () => {
        const logger = new MemoryLogger();
        logger.logCorrection(CORRECTION);
        logger.clear();
        expect(logger.getAllLogs()).toEqual([]);
    });
});

describe('ConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should print corrections at info level', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        new ConsoleLogger('info').logCorrection(CORRECTION);
        expect(spy).toHaveBeenCalledWith(
            '[CORRECTION] sine: 1000 -> 6000 samples (repeat, granularity=48, minLength=240)'
        );
    });

    it('should stay quiet below its level', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger('warn');
        logger.logCorrection(CORRECTION);
        logger.logSynthesis({ source: 'sine', format: 'iq', sampleRate: 1e9, length: 6000 });
        expect(spy).not.toHaveBeenCalled();
    });
});

describe('MultiLogger', () => {
    it('should forward to every logger', () => {
        const a = new MemoryLogger();
        const b = new MemoryLogger();
        new MultiLogger([a, b]).logCorrection(CORRECTION);
        expect(a.corrections).toHaveLength(1);
        expect(b.corrections).toHaveLength(1);
    });
});

describe('createLogger', () => {
    it('should build the requested logger', () => {
        expect(createLogger('memory')).toBeInstanceOf(MemoryLogger);
        expect(createLogger('console', { level: 'error' })).toBeInstanceOf(ConsoleLogger);
    });
});

// ==================== Seeded RNG ====================

describe('SeededRandom', () => {
    it('should repeat a sequence for the same seed', () => {
        const a = createRng(42);
        const b = createRng(42);
        for (let k = 0; k < 10; k++) {
            expect(a.random()).toBe(b.random());
        }
    });

    it('should resume from a saved state', () => {
        const rng = createRng(9);
        rng.random();
        const saved = rng.getState();
        const first = [rng.random(), rng.random()];

        rng.setState(saved);
        expect([rng.random(), rng.random()]).toEqual(first);
    });

    it('should keep randint inside [min, max)', () => {
        const rng = createRng(1);
        for (let k = 0; k < 1000; k++) {
            const v = rng.randint(0, 4);
            expect(v >= 0 && v < 4 && Number.isInteger(v)).toBe(true);
        }
    });
});
