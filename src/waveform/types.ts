/**
 * @module waveform/types
 * @description Waveform, device profile and generator parameter types
 */

import type { Logger } from '../core/logging';
import type { FilterKind, ModulationScheme } from '../models/phy/modulation/types';

// ==================== Waveform ====================

/**
 * Output sample format
 */
export type WaveformFormat = 'iq' | 'real';

/**
 * How the sample count was brought in line with the device profile
 */
export type CorrectionStrategy = 'none' | 'repeat' | 'pad' | 'symbols';

/**
 * Record of the length correction applied to a waveform
 */
export interface LengthCorrection {
    /** Sample count the generator produced before correction */
    requestedLength: number;
    /** Sample count after correction */
    finalLength: number;
    /** True when finalLength !== requestedLength */
    applied: boolean;
    strategy: CorrectionStrategy;
    /** Whole copies of the content (1 unless strategy is 'repeat') */
    repeats: number;
}

interface WaveformBase {
    sampleRate: number;
    length: number;
    correction: LengthCorrection;
}

/**
 * Real-valued samples (direct IF/RF output)
 */
export interface RealWaveform extends WaveformBase {
    format: 'real';
    samples: Float64Array;
}

/**
 * Complex baseband samples as separate I and Q rails
 */
export interface IqWaveform extends WaveformBase {
    format: 'iq';
    i: Float64Array;
    q: Float64Array;
}

/**
 * Synthesizer output. Invariant: `length >= minLength` and
 * `length % granularity === 0` for the device profile it was built for.
 */
export type Waveform = RealWaveform | IqWaveform;

// ==================== Configuration ====================

/**
 * Target instrument waveform-memory constraints
 */
export interface DeviceProfile {
    /** Display name */
    name: string;
    /** Minimum segment length in samples */
    minLength: number;
    /** Segment lengths must be a multiple of this */
    granularity: number;
    /** Lowest accepted sample rate (Sa/s) */
    minSampleRate: number;
    /** Highest accepted sample rate (Sa/s) */
    maxSampleRate: number;
    /** Largest segment in samples, when the memory size is known */
    maxLength?: number;
}

/**
 * Settings shared by every generator
 */
export interface SynthesisConfig {
    device: DeviceProfile;
    /**
     * Upper bound on correction growth, relative to
     * max(requested length, smallest legal length)
     */
    maxExtensionFactor: number;
    /** Seed for random symbol data and random multitone phases */
    seed: number;
    logger: Logger;
}

// ==================== Generator Parameters ====================

interface FormatParams {
    /** Default 'iq' */
    format?: WaveformFormat;
}

export interface ZeroParams extends FormatParams {
    sampleRate: number;
    length: number;
}

export interface SineParams extends FormatParams {
    sampleRate: number;
    frequency: number;
    initialPhaseDeg?: number;
    zeroLastSample?: boolean;
}

export interface AmParams extends FormatParams {
    sampleRate: number;
    /** Modulation depth, 0-100 % */
    depthPercent: number;
    modRateHz: number;
    /** Carrier for 'real' output; ignored for 'iq' */
    carrierHz?: number;
    zeroLastSample?: boolean;
}

interface PulseParams extends FormatParams {
    sampleRate: number;
    pulseWidthSec: number;
    /** Pulse repetition interval; dead time fills the remainder */
    priSec?: number;
    /** Carrier for 'real' output; ignored for 'iq' */
    carrierHz?: number;
    zeroLastSample?: boolean;
}

export interface CwPulseParams extends PulseParams {
    freqOffsetHz?: number;
    /** Pulse amplitude, 0-100 % of full scale */
    ampScalePercent?: number;
}

export interface ChirpParams extends PulseParams {
    /** Swept bandwidth; a negative value sweeps downwards */
    chirpBandwidthHz: number;
}

export interface BarkerParams extends PulseParams {
    /** One of b2, b3, b41, b42, b5, b7, b11, b13 */
    code: string;
}

/**
 * Multitone phase law
 */
export type PhaseRelationship = 'random' | 'zero' | 'increasing' | 'parabolic';

export interface MultitoneParams extends FormatParams {
    sampleRate: number;
    toneSpacingHz: number;
    numTones: number;
    phaseRelationship?: PhaseRelationship;
    /** Centre of the tone comb for 'real' output; ignored for 'iq' */
    carrierHz?: number;
}

/**
 * Symbol data source for digital modulation
 */
export type SymbolSource = 'random' | 'prbs';

export interface DigitalModulationParams extends FormatParams {
    sampleRate: number;
    symbolRateHz: number;
    /** Scheme name; aliases such as 'qam16' are accepted */
    scheme: ModulationScheme | (string & {});
    /** Minimum number of symbols; extended to satisfy the device profile */
    numSymbols: number;
    /** Default 'root-raised-cosine' */
    filterKind?: FilterKind;
    /** Default 0.35 */
    rollOff?: number;
    /** Default 10 */
    filterSpanSymbols?: number;
    /** Carrier for 'real' output; ignored for 'iq' */
    carrierHz?: number;
    zeroLastSample?: boolean;
    /** Default 'random' */
    dataSource?: SymbolSource;
    /** PRBS register length for dataSource 'prbs' (default 9) */
    prbsOrder?: number;
}
