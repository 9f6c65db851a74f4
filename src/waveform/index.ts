/**
 * @module waveform
 * @description Waveform synthesis for arbitrary waveform generators and vector signal generators
 *
 * ## Generators
 * - `zero`, `sine`, `am`, `multitone`: periodic content, corrected by tiling
 * - `cwPulse`, `chirp`, `barker`: pulsed content, corrected by padding dead time
 * - `digitalModulation`: pulse-shaped symbols, corrected by symbol count
 *
 * Every generator honours the device profile in its `SynthesisConfig`:
 * the output length is a multiple of the granularity and at least the minimum length.
 */

// ==================== Types ====================

export type {
    WaveformFormat,
    CorrectionStrategy,
    LengthCorrection,
    RealWaveform,
    IqWaveform,
    Waveform,
    DeviceProfile,
    SynthesisConfig,
    ZeroParams,
    SineParams,
    AmParams,
    CwPulseParams,
    ChirpParams,
    BarkerParams,
    PhaseRelationship,
    MultitoneParams,
    SymbolSource,
    DigitalModulationParams,
} from './types';

// ==================== Configuration ====================

export {
    DEVICE_PROFILES,
    DEFAULT_SYNTHESIS_CONFIG,
    getDeviceProfile,
    validateDeviceProfile,
    resolveSynthesisConfig,
} from './config';

export type { DeviceProfileName } from './config';

// ==================== Length Correction ====================

export {
    minimumLegalLength,
    assertWithinBounds,
    planLength,
    finalizeWaveform,
    conformWaveform,
} from './correction';

export type { RawSignal, LengthPlan } from './correction';

// ==================== Generators ====================

export { zero, sine, am, multitone, PHASE_RELATIONSHIPS } from './tones';
export { cwPulse, chirp, barker } from './pulses';
export { digitalModulation, planSymbolCount, DEFAULT_ROLL_OFF, DEFAULT_PRBS_ORDER } from './digital';

// ==================== Helpers ====================

export { interleaveIq, peakToAverageDb, wholeCycleLength } from './shared';
