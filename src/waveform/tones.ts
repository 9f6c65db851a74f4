/**
 * @module waveform/tones
 * @description Continuous generators: zero, sine, AM and multitone
 *
 * These produce periodic content, so device length correction tiles whole
 * copies ('repeat'). `zero` pads instead.
 */

import { InvalidParameterError, UnsupportedModulationError } from '../core/errors';
import { requireInRange, requireInteger, requirePositive } from '../core/guards';
import { createRng } from '../core/repro';
import { ifftReIm } from '../models/phy/signal-processing';
import { resolveSynthesisConfig } from './config';
import { finalizeWaveform, type RawSignal } from './correction';
import {
    checkNyquist,
    checkRealBand,
    checkSampleRate,
    degToRad,
    findZeroEndingLength,
    nearInteger,
    normalizePeak,
    resolveFormat,
    wholeCycleLength,
} from './shared';
import type {
    AmParams,
    MultitoneParams,
    PhaseRelationship,
    SineParams,
    SynthesisConfig,
    Waveform,
    ZeroParams,
} from './types';

// ==================== Zero ====================

/**
 * All-zero waveform (idle segment)
 */
export function zero(params: ZeroParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    checkSampleRate(params.sampleRate, config);
    requireInteger('length', params.length);

    const signal: RawSignal = format === 'real'
        ? { format, samples: new Float64Array(params.length) }
        : { format, i: new Float64Array(params.length), q: new Float64Array(params.length) };

    return finalizeWaveform('zero', params.sampleRate, signal, 'pad', config);
}

// ==================== Sine ====================

/**
 * Single tone.
 *
 * 'iq' gives exp(j(2πft + φ)), 'real' gives cos(2πft + φ). The natural
 * length is the shortest whole number of cycles. With `zeroLastSample`,
 * the count is extended (within one more cycle) until the last sample
 * falls on a zero crossing of the output, or of I for 'iq'.
 *
 * @example
 * ```typescript
 * const tone = sine({ sampleRate: 100e6, frequency: 1e6 });
 * // tone.length === 100
 * ```
 */
export function sine(params: SineParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const f = checkNyquist('frequency', params.frequency, fs);
    if (format === 'real' && (f < 0 || f === fs / 2)) {
        throw new InvalidParameterError('frequency', `real output needs 0 <= f < fs/2, got ${f}`);
    }
    const phi = degToRad(params.initialPhaseDeg ?? 0);

    let length = wholeCycleLength([f], fs);
    if (params.zeroLastSample) {
        // cos(2πfn/fs + φ) = 0  <=>  2fn/fs + φ/π - 1/2 is an integer
        const found = findZeroEndingLength(
            length,
            f === 0 ? 0 : Math.ceil(fs / Math.abs(f)),
            n => nearInteger(2 * f * n / fs + phi / Math.PI - 0.5)
        );
        if (found === undefined) {
            throw new InvalidParameterError(
                'zeroLastSample',
                `no sample of a ${f} Hz tone at ${fs} Sa/s with phase ${params.initialPhaseDeg ?? 0} deg lands on a zero crossing`
            );
        }
        length = found;
    }

    const cosine = new Float64Array(length);
    const sineRail = new Float64Array(length);
    for (let n = 0; n < length; n++) {
        const theta = 2 * Math.PI * f * n / fs + phi;
        cosine[n] = Math.cos(theta);
        sineRail[n] = Math.sin(theta);
    }
    if (params.zeroLastSample) {
        // floating-point residue of cos(±π/2)
        cosine[length - 1] = 0;
    }

    const signal: RawSignal = format === 'real'
        ? { format, samples: cosine }
        : { format, i: cosine, q: sineRail };
    return finalizeWaveform('sine', fs, signal, 'repeat', config);
}

// ==================== AM ====================

/**
 * Amplitude modulation with envelope (d/2)·cos(2π·fm·t) + 1 - d/2,
 * peaking at 1 with a floor of 1 - d.
 *
 * 'iq' carries the envelope on I; 'real' multiplies it onto cos(2π·fc·t).
 */
export function am(params: AmParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const depth = requireInRange('depthPercent', params.depthPercent, 0, 100) / 100;
    const fm = requirePositive('modRateHz', params.modRateHz);
    checkNyquist('modRateHz', fm, fs);

    const fc = format === 'real' ? params.carrierHz ?? 0 : 0;
    if (format === 'real') {
        checkRealBand('carrierHz', fc - fm, fc + fm, fs);
    }

    const envelope = (n: number) => (depth / 2) * Math.cos(2 * Math.PI * fm * n / fs) + 1 - depth / 2;
    const carrier = (n: number) => Math.cos(2 * Math.PI * fc * n / fs);

    let length = wholeCycleLength(format === 'real' ? [fm, fc] : [fm], fs);
    if (params.zeroLastSample) {
        if (format === 'iq' && depth < 1) {
            throw new InvalidParameterError(
                'zeroLastSample',
                'an iq AM envelope only reaches zero at 100 % depth'
            );
        }
        const isZero = format === 'real'
            ? (n: number) => nearInteger(2 * fc * n / fs - 0.5) || (depth === 1 && nearInteger(fm * n / fs - 0.5))
            : (n: number) => nearInteger(fm * n / fs - 0.5);
        const found = findZeroEndingLength(length, Math.ceil(fs / fm), isZero);
        if (found === undefined) {
            throw new InvalidParameterError('zeroLastSample', 'no sample within one modulation cycle lands on a zero');
        }
        length = found;
    }

    const samples = new Float64Array(length);
    for (let n = 0; n < length; n++) {
        samples[n] = format === 'real' ? envelope(n) * carrier(n) : envelope(n);
    }
    if (params.zeroLastSample) {
        samples[length - 1] = 0;
    }

    const signal: RawSignal = format === 'real'
        ? { format, samples }
        : { format, i: samples, q: new Float64Array(length) };
    return finalizeWaveform('am', fs, signal, 'repeat', config);
}

// ==================== Multitone ====================

export const PHASE_RELATIONSHIPS: readonly PhaseRelationship[] = ['random', 'zero', 'increasing', 'parabolic'];

function tonePhases(relationship: PhaseRelationship, count: number, seed: number): Float64Array {
    const phases = new Float64Array(count);
    const rng = createRng(seed);
    for (let k = 0; k < count; k++) {
        switch (relationship) {
            case 'zero':
                phases[k] = 0;
                break;
            case 'random':
                phases[k] = rng.uniform(0, 2 * Math.PI);
                break;
            case 'increasing':
                phases[k] = 2 * Math.PI * k / count;
                break;
            case 'parabolic':
                phases[k] = Math.PI * k * k / count;
                break;
        }
    }
    return phases;
}

/**
 * Comb of equally spaced, equal-amplitude tones synthesized on FFT bins.
 *
 * The inverse FFT length is exactly fs / resolution, where resolution is the
 * tone spacing (odd tone count) or half of it (even count, tones sit on
 * half-spacing offsets). Output is scaled to unit peak.
 */
export function multitone(params: MultitoneParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const spacing = requirePositive('toneSpacingHz', params.toneSpacingHz);
    const numTones = requireInteger('numTones', params.numTones);
    const relationship = params.phaseRelationship ?? 'random';
    if (!PHASE_RELATIONSHIPS.includes(relationship)) {
        throw new UnsupportedModulationError(String(relationship), PHASE_RELATIONSHIPS, 'phase relationship');
    }

    const resolution = numTones % 2 === 1 ? spacing : spacing / 2;
    const exactBins = fs / resolution;
    const N = Math.round(exactBins);
    if (Math.abs(exactBins - N) > 1e-6 * Math.max(1, exactBins)) {
        throw new InvalidParameterError(
            'toneSpacingHz',
            `sample rate ${fs} is not an integer multiple of the tone grid ${resolution} Hz`
        );
    }

    // Bin offsets relative to the comb centre, in units of `resolution`
    const offsets = Array.from({ length: numTones }, (_, k) =>
        numTones % 2 === 1 ? k - (numTones - 1) / 2 : 2 * k - (numTones - 1)
    );
    const span = (numTones - 1) * spacing / 2;
    const phases = tonePhases(relationship, numTones, config.seed);
    const re = new Float64Array(N);
    const im = new Float64Array(N);

    if (format === 'iq') {
        if (span >= fs / 2) {
            throw new InvalidParameterError('numTones', `comb span ±${span} Hz reaches Nyquist (${fs / 2} Hz)`);
        }
        offsets.forEach((offset, k) => {
            const bin = ((offset % N) + N) % N;
            re[bin] = Math.cos(phases[k]);
            im[bin] = Math.sin(phases[k]);
        });
    } else {
        const fc = params.carrierHz ?? 0;
        const centre = fc / resolution;
        if (!nearInteger(centre)) {
            throw new InvalidParameterError(
                'carrierHz',
                `must be an integer multiple of the tone grid ${resolution} Hz for real output`
            );
        }
        checkRealBand('carrierHz', fc - span, fc + span, fs);
        offsets.forEach((offset, k) => {
            const bin = Math.round(centre) + offset;
            re[bin] += 0.5 * Math.cos(phases[k]);
            im[bin] += 0.5 * Math.sin(phases[k]);
            re[N - bin] += 0.5 * Math.cos(phases[k]);
            im[N - bin] -= 0.5 * Math.sin(phases[k]);
        });
    }

    const time = ifftReIm(re, im);
    let signal: RawSignal;
    if (format === 'iq') {
        normalizePeak(time.re, time.im);
        signal = { format, i: time.re, q: time.im };
    } else {
        // Hermitian spectrum: the imaginary part is rounding noise
        normalizePeak(time.re);
        signal = { format, samples: time.re };
    }

    return finalizeWaveform('multitone', fs, signal, 'repeat', config);
}
