/**
 * @module core/errors
 * @description Error types and error codes shared by the synthesis and PDW layers
 *
 * Every failure is raised synchronously at call entry, before output is allocated.
 * Callers branch on `code` (or `instanceof`) rather than on message text.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for arbkit
 */
export const ErrorCodes = {
    /** Numeric argument outside its documented domain */
    INVALID_PARAMETER: 'INVALID_PARAMETER',
    /** Unknown modulation, filter kind, Barker code or phase relationship */
    UNSUPPORTED_MODULATION: 'UNSUPPORTED_MODULATION',
    /** Length cannot be brought to the device granularity/min-length within bounds */
    WAVEFORM_CONSTRAINT_VIOLATION: 'WAVEFORM_CONSTRAINT_VIOLATION',
    /** PDW field exceeds its bit-field range */
    PDW_FIELD_OUT_OF_RANGE: 'PDW_FIELD_OUT_OF_RANGE',
    /** PDW list breaks the reset/first-after-reset ordering */
    INVALID_PDW_SEQUENCE: 'INVALID_PDW_SEQUENCE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Device constraint that could not be satisfied
 */
export type WaveformConstraint = 'granularity' | 'minLength' | 'maxLength' | 'sampleRate';

// ==================== Error Classes ====================

/**
 * Base error class for arbkit
 */
export class ArbkitError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'ArbkitError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ArbkitError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * A numeric argument is outside its domain (negative width, roll-off > 1, Nyquist violation...)
 */
export class InvalidParameterError extends ArbkitError {
    readonly parameter: string;

    constructor(parameter: string, message: string, details?: unknown) {
        super(ErrorCodes.INVALID_PARAMETER, `${parameter}: ${message}`, details);
        this.name = 'InvalidParameterError';
        this.parameter = parameter;
    }
}

/**
 * The requested scheme (or code, filter kind, phase law) is not in the closed set
 */
export class UnsupportedModulationError extends ArbkitError {
    readonly requested: string;
    readonly supported: readonly string[];

    constructor(requested: string, supported: readonly string[], kind = 'modulation') {
        super(
            ErrorCodes.UNSUPPORTED_MODULATION,
            `Unsupported ${kind} '${requested}'. Supported: ${supported.join(', ')}`,
            { requested, supported, kind }
        );
        this.name = 'UnsupportedModulationError';
        this.requested = requested;
        this.supported = supported;
    }
}

/**
 * Length correction would exceed its bound, or the device rejects the result
 */
export class WaveformConstraintViolationError extends ArbkitError {
    readonly constraint: WaveformConstraint;

    constructor(constraint: WaveformConstraint, message: string, details?: unknown) {
        super(ErrorCodes.WAVEFORM_CONSTRAINT_VIOLATION, message, details);
        this.name = 'WaveformConstraintViolationError';
        this.constraint = constraint;
    }
}

/**
 * A PDW field does not fit its wire representation
 */
export class PdwFieldOutOfRangeError extends ArbkitError {
    readonly field: string;
    readonly value: number;
    readonly min: number;
    readonly max: number;

    constructor(field: string, value: number, min: number, max: number) {
        super(
            ErrorCodes.PDW_FIELD_OUT_OF_RANGE,
            `PDW field '${field}' = ${value} is outside [${min}, ${max}]`,
            { field, value, min, max }
        );
        this.name = 'PdwFieldOutOfRangeError';
        this.field = field;
        this.value = value;
        this.min = min;
        this.max = max;
    }
}

/**
 * PDW list ordering rule broken
 */
export class InvalidPdwSequenceError extends ArbkitError {
    /** Position of the offending record (0 for an empty list) */
    readonly index: number;

    constructor(index: number, message: string) {
        super(ErrorCodes.INVALID_PDW_SEQUENCE, message, { index });
        this.name = 'InvalidPdwSequenceError';
        this.index = index;
    }
}

// ==================== Utility Functions ====================

/**
 * Check if an error is an ArbkitError
 */
export function isArbkitError(error: unknown): error is ArbkitError {
    return error instanceof ArbkitError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isArbkitError(error) && error.code === code;
}

/**
 * Wrap an unknown error into an ArbkitError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCodes.INVALID_PARAMETER): ArbkitError {
    if (isArbkitError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new ArbkitError(code, error.message, { originalError: error.name });
    }

    return new ArbkitError(code, String(error));
}
