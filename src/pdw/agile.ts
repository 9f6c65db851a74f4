/**
 * @module pdw/agile
 * @description Format 1 analog PDW: seven little-endian 32-bit words
 *
 * | word | bits |
 * |---|---|
 * | 0 | format (3), operation (2), frequency low 27 |
 * | 1 | frequency high 20, phase (12) |
 * | 2, 3 | start time in ps, low then high |
 * | 4 | pulse width in ns |
 * | 5 | relative power (15), markers (12), pulse mode (2), phase mode (1), band adjust (2) |
 * | 6 | chirp shape (3), coding index (9), chirp rate (17), band map (3) |
 */

import {
    checkBits,
    decodeChirpRate,
    decodeFrequency,
    decodePhase,
    decodeRelativePower,
    encodeChirpRate,
    encodeFrequency,
    encodeOperation,
    encodePhase,
    encodeRelativePower,
    encodeTicks,
    enumCode,
    enumName,
    frequencyPhaseWords,
    joinU64,
    packWords,
    readFrequencyPhase,
    readHeaderWord,
    splitU64,
    TWO_POW_32,
    unpackWords,
} from './fields';
import type { AgilePdw, BandAdjust, ChirpShape, PdwCodec, PhaseMode, PulseMode } from './types';

export const AGILE_FORMAT_CODE = 1;
export const AGILE_WORDS = 7;

export const AGILE_MIN_FREQUENCY = 10e6;
export const AGILE_MAX_FREQUENCY = 40e9;

/** Wire order of each enumerated field */
export const PULSE_MODES: readonly PulseMode[] = ['cw', 'rf-off', 'pulsed'];
export const PHASE_MODES: readonly PhaseMode[] = ['coherent', 'continuous'];
export const BAND_ADJUSTS: readonly BandAdjust[] = ['cw-switch-points', 'upper', 'lower'];
export const CHIRP_SHAPES: readonly ChirpShape[] = ['stitched-ramp', 'triangle', 'ramp'];

const MAX_START_TIME_PS = Number.MAX_SAFE_INTEGER;

/**
 * Record with default payload, as decoded from a reset PDW
 */
export function defaultAgilePdw(overrides: Partial<Omit<AgilePdw, 'variant'>> = {}): AgilePdw {
    return {
        variant: 'agile',
        operation: 'none',
        frequencyHz: 0,
        phaseDeg: 0,
        startTimeSec: 0,
        widthSec: 0,
        relativePower: decodeRelativePower(0),
        markers: 0,
        pulseMode: 'cw',
        phaseMode: 'coherent',
        bandAdjust: 'cw-switch-points',
        chirpShape: 'stitched-ramp',
        codingIndex: 0,
        chirpRateHzPerUs: 0,
        frequencyBandMap: 0,
        ...overrides,
    };
}

export function encodeAgilePdw(pdw: AgilePdw): Uint8Array {
    const operation = encodeOperation(pdw.operation);
    if (pdw.operation === 'reset') {
        return packWords([AGILE_FORMAT_CODE | operation << 3, 0, 0, 0, 0, 0, 0]);
    }

    const frequency = encodeFrequency(pdw.frequencyHz, AGILE_MIN_FREQUENCY, AGILE_MAX_FREQUENCY);
    const phase = encodePhase(pdw.phaseDeg);
    const [timeLow, timeHigh] = splitU64(encodeTicks('startTime', pdw.startTimeSec, 1e-12, MAX_START_TIME_PS));
    const width = encodeTicks('width', pdw.widthSec, 1e-9, TWO_POW_32 - 1);
    const power = encodeRelativePower(pdw.relativePower);
    const markers = checkBits('markers', pdw.markers, 12);
    const pulseMode = enumCode('pulseMode', PULSE_MODES, pdw.pulseMode);
    const phaseMode = enumCode('phaseMode', PHASE_MODES, pdw.phaseMode);
    const bandAdjust = enumCode('bandAdjust', BAND_ADJUSTS, pdw.bandAdjust);
    const chirpShape = enumCode('chirpShape', CHIRP_SHAPES, pdw.chirpShape);
    const codingIndex = checkBits('codingIndex', pdw.codingIndex, 9);
    const chirpRate = encodeChirpRate(pdw.chirpRateHzPerUs);
    const bandMap = checkBits('frequencyBandMap', pdw.frequencyBandMap, 3);

    const [word0, word1] = frequencyPhaseWords(AGILE_FORMAT_CODE, operation, frequency, phase);
    return packWords([
        word0,
        word1,
        timeLow,
        timeHigh,
        width,
        power | markers << 15 | pulseMode << 27 | phaseMode << 29 | bandAdjust << 30,
        chirpShape | codingIndex << 3 | chirpRate << 12 | bandMap << 29,
    ]);
}

export function decodeAgilePdw(bytes: Uint8Array): AgilePdw {
    const words = unpackWords(bytes, AGILE_WORDS);
    const operation = readHeaderWord(words[0], AGILE_FORMAT_CODE);
    if (operation === 'reset') {
        return defaultAgilePdw({ operation });
    }

    const { frequency, phase } = readFrequencyPhase(words[0], words[1]);
    return {
        variant: 'agile',
        operation,
        frequencyHz: decodeFrequency(frequency),
        phaseDeg: decodePhase(phase),
        startTimeSec: joinU64(words[2], words[3]) / 1e12,
        widthSec: words[4] / 1e9,
        relativePower: decodeRelativePower(words[5] & 0x7FFF),
        markers: (words[5] >>> 15) & 0xFFF,
        pulseMode: enumName('pulseMode', PULSE_MODES, (words[5] >>> 27) & 0x3),
        phaseMode: enumName('phaseMode', PHASE_MODES, (words[5] >>> 29) & 0x1),
        bandAdjust: enumName('bandAdjust', BAND_ADJUSTS, words[5] >>> 30),
        chirpShape: enumName('chirpShape', CHIRP_SHAPES, words[6] & 0x7),
        codingIndex: (words[6] >>> 3) & 0x1FF,
        chirpRateHzPerUs: decodeChirpRate((words[6] >>> 12) & 0x1FFFF),
        frequencyBandMap: words[6] >>> 29,
    };
}

export const agileCodec: PdwCodec<'agile'> = {
    variant: 'agile',
    formatCode: AGILE_FORMAT_CODE,
    recordSize: AGILE_WORDS * 4,
    encode: encodeAgilePdw,
    decode: decodeAgilePdw,
};
