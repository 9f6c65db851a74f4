/**
 * @module waveform/correction
 * @description Length correction against a device profile's granularity and minimum length
 *
 * Periodic content is tiled with whole copies so loop playback stays seamless;
 * pulsed content gets extra dead time. Growth is bounded by
 * `maxExtensionFactor × max(requested, smallest legal length)`.
 */

import { InvalidParameterError, WaveformConstraintViolationError } from '../core/errors';
import { requireInteger } from '../core/guards';
import { gcd } from '../models/utils/conversion';
import { resolveSynthesisConfig } from './config';
import type { CorrectionStrategy, SynthesisConfig, Waveform } from './types';

/**
 * Generator output before correction
 */
export type RawSignal =
    | { format: 'real'; samples: Float64Array }
    | { format: 'iq'; i: Float64Array; q: Float64Array };

export interface LengthPlan {
    finalLength: number;
    repeats: number;
}

function signalLength(signal: RawSignal): number {
    return signal.format === 'real' ? signal.samples.length : signal.i.length;
}

/**
 * Smallest legal length at or above minLength
 */
export function minimumLegalLength(config: SynthesisConfig): number {
    const { granularity, minLength } = config.device;
    return Math.ceil(minLength / granularity) * granularity;
}

/**
 * Throw if `finalLength` breaks the extension bound or the device maximum
 */
export function assertWithinBounds(requestedLength: number, finalLength: number, config: SynthesisConfig): void {
    const limit = config.maxExtensionFactor * Math.max(requestedLength, minimumLegalLength(config));
    if (finalLength > limit) {
        throw new WaveformConstraintViolationError(
            'granularity',
            `Meeting granularity ${config.device.granularity} needs ${finalLength} samples ` +
            `from ${requestedLength}, beyond the limit of ${limit}`,
            { requestedLength, finalLength, limit }
        );
    }
    const { maxLength } = config.device;
    if (maxLength !== undefined && finalLength > maxLength) {
        throw new WaveformConstraintViolationError(
            'maxLength',
            `${finalLength} samples exceed the device maximum of ${maxLength}`,
            { finalLength, maxLength }
        );
    }
}

/**
 * Work out the corrected length for a strategy
 */
export function planLength(
    length: number,
    strategy: 'repeat' | 'pad',
    config: SynthesisConfig
): LengthPlan {
    requireInteger('length', length);
    const { granularity, minLength } = config.device;

    let plan: LengthPlan;
    if (strategy === 'repeat') {
        const step = granularity / gcd(length, granularity);
        const repeats = step * Math.max(1, Math.ceil(minLength / (step * length)));
        plan = { finalLength: repeats * length, repeats };
    } else {
        plan = {
            finalLength: Math.max(Math.ceil(length / granularity) * granularity, minimumLegalLength(config)),
            repeats: 1,
        };
    }

    assertWithinBounds(length, plan.finalLength, config);
    return plan;
}

function tile(data: Float64Array, repeats: number): Float64Array {
    if (repeats === 1) return data;
    const out = new Float64Array(data.length * repeats);
    for (let r = 0; r < repeats; r++) {
        out.set(data, r * data.length);
    }
    return out;
}

function padTo(data: Float64Array, length: number): Float64Array {
    if (length === data.length) return data;
    const out = new Float64Array(length);
    out.set(data);
    return out;
}

/**
 * Apply length correction, log it and wrap the samples as a Waveform.
 *
 * With strategy 'symbols' or 'none' the signal must already conform;
 * `requestedLength` then records what the caller asked for.
 */
export function finalizeWaveform(
    source: string,
    sampleRate: number,
    signal: RawSignal,
    strategy: CorrectionStrategy,
    config: SynthesisConfig,
    requestedLength = signalLength(signal)
): Waveform {
    const length = signalLength(signal);
    let shaped = signal;
    let repeats = 1;

    if (strategy === 'repeat' || strategy === 'pad') {
        const plan = planLength(length, strategy, config);
        repeats = plan.repeats;
        const fit = (data: Float64Array) =>
            strategy === 'repeat' ? tile(data, plan.repeats) : padTo(data, plan.finalLength);
        shaped = signal.format === 'real'
            ? { format: 'real', samples: fit(signal.samples) }
            : { format: 'iq', i: fit(signal.i), q: fit(signal.q) };
    }

    const finalLength = signalLength(shaped);
    const { granularity, minLength } = config.device;
    if (finalLength % granularity !== 0 || finalLength < minLength) {
        throw new WaveformConstraintViolationError(
            finalLength < minLength ? 'minLength' : 'granularity',
            `${finalLength} samples do not satisfy granularity ${granularity} / minLength ${minLength}`
        );
    }

    const applied = finalLength !== requestedLength;
    if (applied && strategy !== 'none') {
        config.logger.logCorrection({
            source,
            requestedLength,
            finalLength,
            strategy,
            granularity,
            minLength,
        });
    }
    config.logger.logSynthesis({ source, format: shaped.format, sampleRate, length: finalLength });

    const correction = { requestedLength, finalLength, applied, strategy, repeats };
    return shaped.format === 'real'
        ? { format: 'real', sampleRate, length: finalLength, samples: shaped.samples, correction }
        : { format: 'iq', sampleRate, length: finalLength, i: shaped.i, q: shaped.q, correction };
}

/**
 * Bring an externally supplied waveform (an imported array, say) in line with
 * a device profile by tiling whole copies. The result never shares buffers
 * with the input.
 */
export function conformWaveform(waveform: Waveform, overrides: Partial<SynthesisConfig> = {}): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const railLength = waveform.format === 'real' ? waveform.samples.length : waveform.i.length;
    if (waveform.format === 'iq' && waveform.q.length !== railLength) {
        throw new InvalidParameterError(
            'waveform',
            `I and Q rails differ in length (${railLength} vs ${waveform.q.length})`
        );
    }
    if (waveform.length !== railLength) {
        throw new InvalidParameterError(
            'waveform',
            `length ${waveform.length} does not match the ${railLength} samples it holds`
        );
    }
    requireInteger('length', railLength);

    const signal: RawSignal = waveform.format === 'real'
        ? { format: 'real', samples: Float64Array.from(waveform.samples) }
        : { format: 'iq', i: Float64Array.from(waveform.i), q: Float64Array.from(waveform.q) };
    return finalizeWaveform('conformWaveform', waveform.sampleRate, signal, 'repeat', config);
}
