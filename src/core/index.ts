/**
 * @module core
 * @description Shared infrastructure for the synthesis and PDW layers
 *
 * ## Modules
 * - `errors`: Error taxonomy and codes
 * - `guards`: Argument checks
 * - `logging`: Structured loggers
 * - `repro`: Seeded RNG
 */

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    SynthesisLogEntry,
    CorrectionLogEntry,
    PdwFileLogEntry,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    MultiLogger,
    ConsoleLogger,
    MemoryLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export type { ValidationResult } from './repro';

export { SeededRandom, createRng } from './repro';

// ==================== Guards ====================

export {
    requireFinite,
    requirePositive,
    requireNonNegative,
    requireInteger,
    requireInRange,
} from './guards';

// ==================== Errors ====================

export {
    ErrorCodes,
    ArbkitError,
    InvalidParameterError,
    UnsupportedModulationError,
    WaveformConstraintViolationError,
    PdwFieldOutOfRangeError,
    InvalidPdwSequenceError,
    isArbkitError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode, WaveformConstraint } from './errors';
