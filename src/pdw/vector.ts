/**
 * @module pdw/vector
 * @description Format 1 vector PDW: six little-endian 32-bit words
 *
 * | word | bits |
 * |---|---|
 * | 0, 1 | as the agile record |
 * | 2, 3 | start time in ps |
 * | 4 | power (15), markers (12), phase mode (1), RF off (1) |
 * | 5 | waveform index (16), reserved (12), waveform markers (4) |
 */

import { PHASE_MODES } from './agile';
import {
    checkBits,
    decodeDbm,
    decodeFrequency,
    decodePhase,
    encodeDbm,
    encodeFrequency,
    encodeOperation,
    encodePhase,
    encodeTicks,
    enumCode,
    enumName,
    flag,
    frequencyPhaseWords,
    joinU64,
    packWords,
    readFrequencyPhase,
    readHeaderWord,
    splitU64,
    unpackWords,
} from './fields';
import type { PdwCodec, VectorPdw } from './types';

export const VECTOR_FORMAT_CODE = 1;
export const VECTOR_WORDS = 6;

export const VECTOR_MIN_FREQUENCY = 50e6;
export const VECTOR_MAX_FREQUENCY = 20e9;

export function defaultVectorPdw(overrides: Partial<Omit<VectorPdw, 'variant'>> = {}): VectorPdw {
    return {
        variant: 'vector',
        operation: 'none',
        frequencyHz: 0,
        phaseDeg: 0,
        startTimeSec: 0,
        powerDbm: decodeDbm(0),
        markers: 0,
        phaseMode: 'coherent',
        rfOff: false,
        waveformIndex: 0,
        waveformMarkers: 0,
        ...overrides,
    };
}

export function encodeVectorPdw(pdw: VectorPdw): Uint8Array {
    const operation = encodeOperation(pdw.operation);
    if (pdw.operation === 'reset') {
        return packWords([VECTOR_FORMAT_CODE | operation << 3, 0, 0, 0, 0, 0]);
    }

    const frequency = encodeFrequency(pdw.frequencyHz, VECTOR_MIN_FREQUENCY, VECTOR_MAX_FREQUENCY);
    const phase = encodePhase(pdw.phaseDeg);
    const [timeLow, timeHigh] = splitU64(encodeTicks('startTime', pdw.startTimeSec, 1e-12, Number.MAX_SAFE_INTEGER));
    const power = encodeDbm('power', pdw.powerDbm);
    const markers = checkBits('markers', pdw.markers, 12);
    const phaseMode = enumCode('phaseMode', PHASE_MODES, pdw.phaseMode);
    const waveformIndex = checkBits('waveformIndex', pdw.waveformIndex, 16);
    const waveformMarkers = checkBits('waveformMarkers', pdw.waveformMarkers, 4);

    const [word0, word1] = frequencyPhaseWords(VECTOR_FORMAT_CODE, operation, frequency, phase);
    return packWords([
        word0,
        word1,
        timeLow,
        timeHigh,
        power | markers << 15 | phaseMode << 27 | flag(pdw.rfOff) << 28,
        waveformIndex | waveformMarkers << 28,
    ]);
}

export function decodeVectorPdw(bytes: Uint8Array): VectorPdw {
    const words = unpackWords(bytes, VECTOR_WORDS);
    const operation = readHeaderWord(words[0], VECTOR_FORMAT_CODE);
    if (operation === 'reset') {
        return defaultVectorPdw({ operation });
    }

    const { frequency, phase } = readFrequencyPhase(words[0], words[1]);
    return {
        variant: 'vector',
        operation,
        frequencyHz: decodeFrequency(frequency),
        phaseDeg: decodePhase(phase),
        startTimeSec: joinU64(words[2], words[3]) / 1e12,
        powerDbm: decodeDbm(words[4] & 0x7FFF),
        markers: (words[4] >>> 15) & 0xFFF,
        phaseMode: enumName('phaseMode', PHASE_MODES, (words[4] >>> 27) & 0x1),
        rfOff: ((words[4] >>> 28) & 0x1) === 1,
        waveformIndex: words[5] & 0xFFFF,
        waveformMarkers: words[5] >>> 28,
    };
}

export const vectorCodec: PdwCodec<'vector'> = {
    variant: 'vector',
    formatCode: VECTOR_FORMAT_CODE,
    recordSize: VECTOR_WORDS * 4,
    encode: encodeVectorPdw,
    decode: decodeVectorPdw,
};
