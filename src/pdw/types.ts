/**
 * @module pdw/types
 * @description Pulse descriptor word records, one type per wire format
 *
 * The agile and vector sources share field names (frequency, phase, markers)
 * but not layouts, so each variant is its own record type tagged by `variant`.
 */

import type { Logger } from '../core/logging';

// ==================== Shared Enumerations ====================

export type PdwVariant = 'agile' | 'vector' | 'vector-rev3b';

/**
 * Operation code carried in bits 3-4 of word 0
 */
export type PdwOperation = 'none' | 'first-after-reset' | 'reset';

export const PDW_OPERATION_CODES: Readonly<Record<PdwOperation, number>> = {
    none: 0,
    'first-after-reset': 1,
    reset: 2,
};

export type PhaseMode = 'coherent' | 'continuous';

/** Agile pulse mode: 0 CW, 1 RF off, 2 pulsed */
export type PulseMode = 'cw' | 'rf-off' | 'pulsed';

/** Agile band adjust: 0 CW switch points, 1 upper band, 2 lower band */
export type BandAdjust = 'cw-switch-points' | 'upper' | 'lower';

/** Agile chirp shape: 0 stitched ramp, 1 triangle, 2 ramp */
export type ChirpShape = 'stitched-ramp' | 'triangle' | 'ramp';

/** Rev B waveform output between pulses */
export type ZeroHold = 'zero' | 'hold';

// ==================== Records ====================

/**
 * Format 1 analog PDW for the agile (non-vector) source. 28-byte record.
 */
export interface AgilePdw {
    variant: 'agile';
    operation: PdwOperation;
    /** Carrier in Hz, [10 MHz, 40 GHz], 1/1024 Hz resolution */
    frequencyHz: number;
    /** [0, 360] degrees, 4096 steps */
    phaseDeg: number;
    /** Start of the 50 % rising edge, picosecond resolution */
    startTimeSec: number;
    /** 50 % to 50 % width, nanosecond resolution */
    widthSec: number;
    /** Linear power relative to full scale */
    relativePower: number;
    /** 12-bit marker mask */
    markers: number;
    pulseMode: PulseMode;
    phaseMode: PhaseMode;
    bandAdjust: BandAdjust;
    chirpShape: ChirpShape;
    /** Row of the frequency/phase coding table, 0 for none */
    codingIndex: number;
    /** Hz per microsecond */
    chirpRateHzPerUs: number;
    /** 3-bit band map selector (0 map A, 6 map B) */
    frequencyBandMap: number;
}

/**
 * Format 1 vector PDW for the vector adapter. 24-byte record.
 */
export interface VectorPdw {
    variant: 'vector';
    operation: PdwOperation;
    /** Carrier in Hz, [50 MHz, 20 GHz] */
    frequencyHz: number;
    phaseDeg: number;
    startTimeSec: number;
    /** [-140, 23.835] dBm, 0.005 dB steps */
    powerDbm: number;
    markers: number;
    phaseMode: PhaseMode;
    rfOff: boolean;
    /** Entry of the waveform index file */
    waveformIndex: number;
    /** 4-bit waveform marker mask */
    waveformMarkers: number;
}

/**
 * Format 3 revision B vector PDW. 48-byte record.
 */
export interface VectorRev3bPdw {
    variant: 'vector-rev3b';
    operation: PdwOperation;
    frequencyHz: number;
    phaseDeg: number;
    startTimeSec: number;
    /** Half-nanosecond resolution, 37 bits */
    widthSec: number;
    maxPowerDbm: number;
    markers: number;
    powerDbm: number;
    phaseMode: PhaseMode;
    rfOff: boolean;
    autoBlank: boolean;
    /** Start with all new settings rather than continuing the prior waveform */
    newWaveform: boolean;
    zeroHold: ZeroHold;
    /** LO switching lead before the start time, 4 ns steps up to 1020 ns */
    loLeadSec: number;
    waveformMarkers: number;
    /** 2-bit waveform type */
    waveformType: number;
    waveformIndex: number;
    /** Alternate power */
    power2Dbm: number;
    maxPower2Dbm: number;
    /** 21-bit unsigned, 1 Hz steps */
    dopplerHz: number;
}

export type Pdw = AgilePdw | VectorPdw | VectorRev3bPdw;

export type PdwByVariant<V extends PdwVariant> = Extract<Pdw, { variant: V }>;

// ==================== Codec ====================

export interface PdwCodec<V extends PdwVariant> {
    variant: V;
    /** Value of bits 0-2 of word 0 */
    formatCode: number;
    recordSize: number;
    encode(pdw: PdwByVariant<V>): Uint8Array;
    decode(bytes: Uint8Array): PdwByVariant<V>;
}

// ==================== Frequency/Phase Coding ====================

export type CodingType = 'phase' | 'frequency';

/**
 * One row of the agile source's frequency/phase coding (FPC) table
 */
export interface CodingEntry {
    enabled: boolean;
    /** Only 1 is supported */
    bitsPerSubpulse: number;
    codingType: CodingType;
    /** Phase (deg) or frequency offset (Hz) for each of the 2^bits states */
    stateMapping: readonly number[];
    /** Pattern bytes as hex, e.g. '2A61D327' */
    hexPattern: string;
    /** At most 60 characters */
    comment: string;
}

// ==================== File ====================

export interface PdwFileOptions {
    /** FPC table written ahead of the records; agile only */
    codingEntries?: readonly CodingEntry[];
    /**
     * Data size written in the PDW block header. 'count' writes
     * records × record size; 'to-end' writes all ones (records run to end of
     * file). Defaults to 'count' for agile and 'to-end' for vector variants.
     */
    pdwBlockSize?: 'count' | 'to-end';
    logger?: Logger;
}

/**
 * Assembled PDW file
 */
export interface PdwFile {
    variant: PdwVariant;
    bytes: Uint8Array;
    pdwCount: number;
    recordSize: number;
    /** Byte offset of the first record, always 4096 */
    pdwOffset: number;
}

/**
 * Result of walking a PDW file's blocks
 */
export interface ParsedPdwFile {
    variant: PdwVariant;
    pdws: Pdw[];
    codingEntries: CodingEntry[];
}
