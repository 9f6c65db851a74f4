/**
 * @module pdw/vector-rev3b
 * @description Format 3 revision B vector PDW: twelve little-endian 32-bit words
 *
 * Adds pulse width, max power, blanking, LO lead, a second power pair and
 * Doppler to the format 1 vector fields.
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
    TWO_POW_32,
    unpackWords,
} from './fields';
import type { PdwCodec, VectorRev3bPdw, ZeroHold } from './types';
import { VECTOR_MAX_FREQUENCY, VECTOR_MIN_FREQUENCY } from './vector';

export const REV3B_FORMAT_CODE = 3;
export const REV3B_WORDS = 12;

export const ZERO_HOLD_MODES: readonly ZeroHold[] = ['zero', 'hold'];

const WIDTH_RESOLUTION = 0.5e-9;
const LO_LEAD_RESOLUTION = 4e-9;
const MAX_WIDTH_TICKS = 2 ** 37 - 1;
const MAX_DOPPLER_HZ = 2 ** 21 - 1;

export function defaultVectorRev3bPdw(overrides: Partial<Omit<VectorRev3bPdw, 'variant'>> = {}): VectorRev3bPdw {
    const zeroPower = decodeDbm(0);
    return {
        variant: 'vector-rev3b',
        operation: 'none',
        frequencyHz: 0,
        phaseDeg: 0,
        startTimeSec: 0,
        widthSec: 0,
        maxPowerDbm: zeroPower,
        markers: 0,
        powerDbm: zeroPower,
        phaseMode: 'coherent',
        rfOff: false,
        autoBlank: true,
        newWaveform: true,
        zeroHold: 'zero',
        loLeadSec: 0,
        waveformMarkers: 0,
        waveformType: 0,
        waveformIndex: 0,
        power2Dbm: zeroPower,
        maxPower2Dbm: zeroPower,
        dopplerHz: 0,
        ...overrides,
    };
}

export function encodeVectorRev3bPdw(pdw: VectorRev3bPdw): Uint8Array {
    const operation = encodeOperation(pdw.operation);
    if (pdw.operation === 'reset') {
        const words = new Array<number>(REV3B_WORDS).fill(0);
        words[0] = REV3B_FORMAT_CODE | operation << 3;
        return packWords(words);
    }

    const frequency = encodeFrequency(pdw.frequencyHz, VECTOR_MIN_FREQUENCY, VECTOR_MAX_FREQUENCY);
    const phase = encodePhase(pdw.phaseDeg);
    const [timeLow, timeHigh] = splitU64(encodeTicks('startTime', pdw.startTimeSec, 1e-12, Number.MAX_SAFE_INTEGER));
    const width = encodeTicks('width', pdw.widthSec, WIDTH_RESOLUTION, MAX_WIDTH_TICKS);
    const maxPower = encodeDbm('maxPower', pdw.maxPowerDbm);
    const markers = checkBits('markers', pdw.markers, 12);
    const power = encodeDbm('power', pdw.powerDbm);
    const phaseMode = enumCode('phaseMode', PHASE_MODES, pdw.phaseMode);
    const zeroHold = enumCode('zeroHold', ZERO_HOLD_MODES, pdw.zeroHold);
    const loLead = encodeTicks('loLead', pdw.loLeadSec, LO_LEAD_RESOLUTION, 0xFF);
    const waveformMarkers = checkBits('waveformMarkers', pdw.waveformMarkers, 4);
    const waveformType = checkBits('waveformType', pdw.waveformType, 2);
    const waveformIndex = checkBits('waveformIndex', pdw.waveformIndex, 16);
    const power2 = encodeDbm('power2', pdw.power2Dbm);
    const maxPower2 = encodeDbm('maxPower2', pdw.maxPower2Dbm);
    const doppler = encodeTicks('doppler', pdw.dopplerHz, 1, MAX_DOPPLER_HZ);

    const [word0, word1] = frequencyPhaseWords(REV3B_FORMAT_CODE, operation, frequency, phase);
    const [widthLow, widthHigh] = splitU64(width);
    return packWords([
        word0,
        word1,
        timeLow,
        timeHigh,
        widthLow,
        widthHigh | maxPower << 5 | markers << 20,
        power
            | phaseMode << 15
            | flag(pdw.rfOff) << 16
            | flag(pdw.autoBlank) << 17
            | flag(pdw.newWaveform) << 18
            | zeroHold << 19
            | loLead << 20
            | waveformMarkers << 28,
        waveformType << 8 | waveformIndex << 10 | (power2 & 0x3F) << 26,
        power2 >>> 6 | maxPower2 << 9,
        0,
        (doppler & 0x1FF) << 23,
        doppler >>> 9,
    ]);
}

export function decodeVectorRev3bPdw(bytes: Uint8Array): VectorRev3bPdw {
    const words = unpackWords(bytes, REV3B_WORDS);
    const operation = readHeaderWord(words[0], REV3B_FORMAT_CODE);
    if (operation === 'reset') {
        return defaultVectorRev3bPdw({ operation });
    }

    const { frequency, phase } = readFrequencyPhase(words[0], words[1]);
    const widthTicks = (words[5] & 0x1F) * TWO_POW_32 + words[4];
    return {
        variant: 'vector-rev3b',
        operation,
        frequencyHz: decodeFrequency(frequency),
        phaseDeg: decodePhase(phase),
        startTimeSec: joinU64(words[2], words[3]) / 1e12,
        widthSec: widthTicks * WIDTH_RESOLUTION,
        maxPowerDbm: decodeDbm((words[5] >>> 5) & 0x7FFF),
        markers: (words[5] >>> 20) & 0xFFF,
        powerDbm: decodeDbm(words[6] & 0x7FFF),
        phaseMode: enumName('phaseMode', PHASE_MODES, (words[6] >>> 15) & 0x1),
        rfOff: ((words[6] >>> 16) & 0x1) === 1,
        autoBlank: ((words[6] >>> 17) & 0x1) === 1,
        newWaveform: ((words[6] >>> 18) & 0x1) === 1,
        zeroHold: enumName('zeroHold', ZERO_HOLD_MODES, (words[6] >>> 19) & 0x1),
        loLeadSec: ((words[6] >>> 20) & 0xFF) * LO_LEAD_RESOLUTION,
        waveformMarkers: words[6] >>> 28,
        waveformType: (words[7] >>> 8) & 0x3,
        waveformIndex: (words[7] >>> 10) & 0xFFFF,
        power2Dbm: decodeDbm((words[7] >>> 26) | (words[8] & 0x1FF) << 6),
        maxPower2Dbm: decodeDbm((words[8] >>> 9) & 0x7FFF),
        dopplerHz: (words[10] >>> 23) | (words[11] & 0xFFF) << 9,
    };
}

export const vectorRev3bCodec: PdwCodec<'vector-rev3b'> = {
    variant: 'vector-rev3b',
    formatCode: REV3B_FORMAT_CODE,
    recordSize: REV3B_WORDS * 4,
    encode: encodeVectorRev3bPdw,
    decode: decodeVectorRev3bPdw,
};
