/**
 * @module waveform/shared
 * @description Argument checks and sample-level helpers used by the generators
 */

import { InvalidParameterError, WaveformConstraintViolationError } from '../core/errors';
import { requireFinite, requirePositive } from '../core/guards';
import { lcm, rationalApproximation } from '../models/utils/conversion';
import type { SynthesisConfig, Waveform, WaveformFormat } from './types';

/** Longest natural period searched before falling back to 100 cycles */
const MAX_PERIOD_SAMPLES = 10_000_000;

export function resolveFormat(format: WaveformFormat | undefined): WaveformFormat {
    const resolved = format ?? 'iq';
    if (resolved !== 'iq' && resolved !== 'real') {
        throw new InvalidParameterError('format', `must be 'iq' or 'real', got '${String(resolved)}'`);
    }
    return resolved;
}

/**
 * Sample rate must be positive and inside the device's range
 */
export function checkSampleRate(sampleRate: number, config: SynthesisConfig): number {
    requirePositive('sampleRate', sampleRate);
    const { minSampleRate, maxSampleRate, name } = config.device;
    if (sampleRate < minSampleRate || sampleRate > maxSampleRate) {
        throw new WaveformConstraintViolationError(
            'sampleRate',
            `${sampleRate} Sa/s is outside the ${name} range [${minSampleRate}, ${maxSampleRate}]`,
            { sampleRate, minSampleRate, maxSampleRate }
        );
    }
    return sampleRate;
}

/**
 * Baseband frequency within ±fs/2
 */
export function checkNyquist(name: string, frequency: number, sampleRate: number): number {
    requireFinite(name, frequency);
    if (Math.abs(frequency) > sampleRate / 2) {
        throw new InvalidParameterError(
            name,
            `|${frequency}| Hz violates Nyquist for ${sampleRate} Sa/s`
        );
    }
    return frequency;
}

/**
 * Real-output band [low, high] must sit inside (0, fs/2)
 */
export function checkRealBand(name: string, low: number, high: number, sampleRate: number): void {
    requireFinite(name, low);
    requireFinite(name, high);
    if (low <= 0 || high >= sampleRate / 2) {
        throw new InvalidParameterError(
            name,
            `real output occupies [${low}, ${high}] Hz, which must lie within (0, ${sampleRate / 2}) Hz`
        );
    }
}

export function degToRad(deg: number): number {
    return deg * Math.PI / 180;
}

/**
 * Shortest sample count holding a whole number of cycles of every frequency.
 * Falls back to 100 cycles of the lowest frequency when the ratios do not
 * resolve to a period under ten million samples.
 */
export function wholeCycleLength(frequencies: readonly number[], sampleRate: number): number {
    const active = frequencies.map(Math.abs).filter(f => f > 0);
    if (active.length === 0) return 1;

    let length = 1;
    for (const f of active) {
        const ratio = rationalApproximation(f / sampleRate, MAX_PERIOD_SAMPLES);
        if (!ratio) {
            length = 0;
            break;
        }
        length = lcm(length, ratio.denominator);
        if (length > MAX_PERIOD_SAMPLES) {
            length = 0;
            break;
        }
    }
    if (length > 0) return length;

    return Math.max(1, Math.round(100 * sampleRate / Math.min(...active)));
}

/**
 * First sample count in [start, start + span] whose last sample index
 * satisfies `isZero`, or undefined.
 */
export function findZeroEndingLength(
    start: number,
    span: number,
    isZero: (lastIndex: number) => boolean
): number | undefined {
    for (let length = start; length <= start + span; length++) {
        if (isZero(length - 1)) {
            return length;
        }
    }
    return undefined;
}

/**
 * True when `x` is within 1e-9 of an integer
 */
export function nearInteger(x: number): boolean {
    return Math.abs(x - Math.round(x)) < 1e-9;
}

/**
 * Scale in place so the largest |I + jQ| (or |x|) is 1. All-zero input is left alone.
 */
export function normalizePeak(i: Float64Array, q?: Float64Array): void {
    let peak = 0;
    for (let n = 0; n < i.length; n++) {
        const mag = q ? Math.hypot(i[n], q[n]) : Math.abs(i[n]);
        if (mag > peak) peak = mag;
    }
    if (peak === 0) return;
    for (let n = 0; n < i.length; n++) {
        i[n] /= peak;
        if (q) q[n] /= peak;
    }
}

/**
 * Interleave I and Q (I0, Q0, I1, Q1, ...) as instrument segment downloads expect
 */
export function interleaveIq(waveform: Waveform): Float64Array {
    if (waveform.format === 'real') {
        return Float64Array.from(waveform.samples);
    }
    const out = new Float64Array(2 * waveform.length);
    for (let n = 0; n < waveform.length; n++) {
        out[2 * n] = waveform.i[n];
        out[2 * n + 1] = waveform.q[n];
    }
    return out;
}

/**
 * Peak-to-average power ratio in dB
 */
export function peakToAverageDb(waveform: Waveform): number {
    let peak = 0;
    let total = 0;
    for (let n = 0; n < waveform.length; n++) {
        const power = waveform.format === 'real'
            ? waveform.samples[n] ** 2
            : waveform.i[n] ** 2 + waveform.q[n] ** 2;
        peak = Math.max(peak, power);
        total += power;
    }
    if (total === 0) {
        throw new InvalidParameterError('waveform', 'has no energy');
    }
    return 10 * Math.log10(peak / (total / waveform.length));
}
