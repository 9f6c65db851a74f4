/**
 * @packageDocumentation
 * @module arbkit
 *
 * arbkit: waveform synthesis and pulse descriptor word (PDW) encoding for
 * arbitrary waveform generators and agile vector signal generators.
 *
 * ## Modules
 *
 * - `waveform` - Generators (sine, AM, multitone, CW pulse, chirp, Barker,
 *   digital modulation) with device-profile length correction
 * - `pdw` - PDW record codecs, FPC block, streaming file assembly, text table
 * - `phy` - Pulse shaping, constellations, PRBS and Barker codes, FFT
 * - `core` - Errors, loggers, seeded RNG, argument guards
 *
 * ## Usage Example
 * ```typescript
 * import { waveform, pdw, core } from 'arbkit';
 *
 * const logger = core.createLogger('memory');
 * const wfm = waveform.digitalModulation(
 *     { sampleRate: 100e6, symbolRateHz: 20e6, scheme: 'qpsk', numSymbols: 1000 },
 *     { device: waveform.getDeviceProfile('vsg'), logger }
 * );
 *
 * const file = pdw.buildPdwFile('vector', [
 *     pdw.defaultVectorPdw({ operation: 'first-after-reset', frequencyHz: 1e9 }),
 * ]);
 * ```
 *
 * @license MIT
 */

// ==================== Modules ====================
export * as core from './src/core';
export * as waveform from './src/waveform';
export * as pdw from './src/pdw';

// ==================== Signal Models ====================
export * as phy from './src/models/phy';
export * as utils from './src/models/utils';

// ==================== Direct Exports ====================
export {
    zero,
    sine,
    am,
    multitone,
    cwPulse,
    chirp,
    barker,
    digitalModulation,
    conformWaveform,
    getDeviceProfile,
    DEVICE_PROFILES,
} from './src/waveform';

export type { Waveform, DeviceProfile, SynthesisConfig } from './src/waveform';

export {
    buildPdwFile,
    parsePdwFile,
    buildRawPdwBlock,
    encodePdw,
    decodePdw,
    parsePdwTable,
    tableToPdws,
    formatPdwTable,
} from './src/pdw';

export type { Pdw, AgilePdw, VectorPdw, VectorRev3bPdw, PdwFile } from './src/pdw';

export {
    ArbkitError,
    InvalidParameterError,
    UnsupportedModulationError,
    WaveformConstraintViolationError,
    PdwFieldOutOfRangeError,
    InvalidPdwSequenceError,
    createLogger,
} from './src/core';
