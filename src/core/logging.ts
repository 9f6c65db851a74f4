/**
 * @module core/logging
 * @description Structured logging for waveform synthesis and PDW file assembly
 *
 * Loggers are passed in through the synthesis config or PDW file options;
 * no module owns a global instance. ConsoleLogger and MemoryLogger work in
 * any JavaScript runtime.
 */

import type { WaveformFormat } from '../waveform/types';
import type { PdwVariant } from '../pdw/types';

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Fields carried by every entry
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Operation that produced the entry (e.g. 'chirp', 'buildPdwFile') */
    source: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * A generator finished
 */
export interface SynthesisLogEntry extends BaseLogEntry {
    logType: 'synthesis';
    format: WaveformFormat;
    sampleRate: number;
    length: number;
}

/**
 * The sample count was changed to satisfy a device profile
 */
export interface CorrectionLogEntry extends BaseLogEntry {
    logType: 'correction';
    requestedLength: number;
    finalLength: number;
    strategy: 'repeat' | 'pad' | 'symbols';
    granularity: number;
    minLength: number;
}

/**
 * A PDW file was assembled
 */
export interface PdwFileLogEntry extends BaseLogEntry {
    logType: 'pdw-file';
    variant: PdwVariant;
    pdwCount: number;
    recordSize: number;
    byteLength: number;
}

/**
 * Union of all log entry types
 */
export type LogEntry = SynthesisLogEntry | CorrectionLogEntry | PdwFileLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void;
    logCorrection(entry: EntryInput<CorrectionLogEntry>): void;
    logPdwFile(entry: EntryInput<PdwFileLogEntry>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Minimum console level (console logger only) */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

// ==================== Console Logger ====================

/**
 * Console Logger: synthesis at debug, corrections and files at info
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        this.level = typeof levelOrConfig === 'string'
            ? levelOrConfig
            : levelOrConfig.level ?? 'info';
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void {
        if (this.enabled('debug')) {
            console.log(
                `[SYNTH] ${entry.source}: ${entry.format} ${entry.length} samples @ ${entry.sampleRate} Sa/s`
            );
        }
    }

    logCorrection(entry: EntryInput<CorrectionLogEntry>): void {
        if (this.enabled('info')) {
            console.log(
                `[CORRECTION] ${entry.source}: ${entry.requestedLength} -> ${entry.finalLength} samples ` +
                `(${entry.strategy}, granularity=${entry.granularity}, minLength=${entry.minLength})`
            );
        }
    }

    logPdwFile(entry: EntryInput<PdwFileLogEntry>): void {
        if (this.enabled('info')) {
            console.log(
                `[PDW] ${entry.source}: ${entry.pdwCount} ${entry.variant} records, ${entry.byteLength} bytes`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: keeps every entry, for tests and for callers that
 * want to inspect what happened after the fact
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    public syntheses: SynthesisLogEntry[] = [];
    public corrections: CorrectionLogEntry[] = [];
    public pdwFiles: PdwFileLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
    }

    private stamp(): Pick<BaseLogEntry, 'schemaVersion' | 'timestamp'> {
        return { schemaVersion: this.schemaVersion, timestamp: Date.now() };
    }

    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void {
        this.syntheses.push({ ...this.stamp(), logType: 'synthesis', ...entry });
    }

    logCorrection(entry: EntryInput<CorrectionLogEntry>): void {
        this.corrections.push({ ...this.stamp(), logType: 'correction', ...entry });
    }

    logPdwFile(entry: EntryInput<PdwFileLogEntry>): void {
        this.pdwFiles.push({ ...this.stamp(), logType: 'pdw-file', ...entry });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.syntheses, ...this.corrections, ...this.pdwFiles];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            syntheses: this.syntheses,
            corrections: this.corrections,
            pdwFiles: this.pdwFiles,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.syntheses = [];
        this.corrections = [];
        this.pdwFiles = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logSynthesis(entry);
        }
    }

    logCorrection(entry: EntryInput<CorrectionLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logCorrection(entry);
        }
    }

    logPdwFile(entry: EntryInput<PdwFileLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logPdwFile(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
