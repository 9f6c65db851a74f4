/**
 * @module waveform/pulses
 * @description Pulsed generators: CW pulse, linear FM chirp and Barker phase code
 *
 * A pulse occupies ceil(pulseWidth · fs) samples, never fewer than requested,
 * followed by dead time up to round(pri · fs). Length correction pads dead time.
 */

import { InvalidParameterError } from '../core/errors';
import { requireFinite, requireInRange, requirePositive } from '../core/guards';
import { barkerCode } from '../models/phy/spreading';
import { secondsToSamples } from '../models/utils/conversion';
import { resolveSynthesisConfig } from './config';
import { finalizeWaveform, type RawSignal } from './correction';
import { checkNyquist, checkRealBand, checkSampleRate, resolveFormat } from './shared';
import type {
    BarkerParams,
    ChirpParams,
    CwPulseParams,
    SynthesisConfig,
    Waveform,
    WaveformFormat,
} from './types';

interface PulseFrame {
    pulseSamples: number;
    totalSamples: number;
}

/**
 * Pulse and PRI sample counts. With `zeroLastSample` and no dead time,
 * one zero sample is appended so the segment ends at zero.
 */
function pulseFrame(
    pulseSamples: number,
    sampleRate: number,
    priSec: number | undefined,
    zeroLastSample: boolean | undefined
): PulseFrame {
    let totalSamples = pulseSamples;
    if (priSec !== undefined) {
        requirePositive('priSec', priSec);
        const priSamples = secondsToSamples(priSec, sampleRate);
        if (priSamples < pulseSamples) {
            throw new InvalidParameterError(
                'priSec',
                `PRI of ${priSamples} samples is shorter than the ${pulseSamples}-sample pulse`
            );
        }
        totalSamples = priSamples;
    }
    if (zeroLastSample && totalSamples === pulseSamples) {
        totalSamples += 1;
    }
    return { pulseSamples, totalSamples };
}

function widthToSamples(pulseWidthSec: number, sampleRate: number): number {
    requirePositive('pulseWidthSec', pulseWidthSec);
    return Math.max(1, secondsToSamples(pulseWidthSec, sampleRate, 'ceil'));
}

/**
 * Fill a pulse frame from a baseband law: `phase(n)` and `amplitude(n)` for
 * n inside the pulse. 'real' output mixes onto `carrierHz` directly:
 * a(n)·cos(2π·fc·n/fs + phase(n)).
 */
function renderPulse(
    format: WaveformFormat,
    frame: PulseFrame,
    sampleRate: number,
    carrierHz: number,
    amplitude: (n: number) => number,
    phase: (n: number) => number
): RawSignal {
    const { pulseSamples, totalSamples } = frame;
    if (format === 'real') {
        const samples = new Float64Array(totalSamples);
        for (let n = 0; n < pulseSamples; n++) {
            samples[n] = amplitude(n) * Math.cos(2 * Math.PI * carrierHz * n / sampleRate + phase(n));
        }
        return { format, samples };
    }

    const i = new Float64Array(totalSamples);
    const q = new Float64Array(totalSamples);
    for (let n = 0; n < pulseSamples; n++) {
        const a = amplitude(n);
        const theta = phase(n);
        i[n] = a * Math.cos(theta);
        q[n] = a * Math.sin(theta);
    }
    return { format, i, q };
}

// ==================== CW Pulse ====================

/**
 * Unmodulated (CW) pulse at `freqOffsetHz` from the carrier.
 *
 * @example
 * ```typescript
 * const p = cwPulse({ sampleRate: 100e6, pulseWidthSec: 10e-6, priSec: 100e-6 });
 * // p.length === 10000, samples 0..999 carry the pulse
 * ```
 */
export function cwPulse(params: CwPulseParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const offset = requireFinite('freqOffsetHz', params.freqOffsetHz ?? 0);
    const amplitude = requireInRange('ampScalePercent', params.ampScalePercent ?? 100, 0, 100) / 100;
    const carrier = format === 'real' ? params.carrierHz ?? 0 : 0;

    if (format === 'real') {
        checkRealBand('carrierHz', carrier + offset, carrier + offset, fs);
    } else {
        checkNyquist('freqOffsetHz', offset, fs);
    }

    const frame = pulseFrame(widthToSamples(params.pulseWidthSec, fs), fs, params.priSec, params.zeroLastSample);
    const signal = renderPulse(
        format,
        frame,
        fs,
        carrier,
        () => amplitude,
        n => 2 * Math.PI * offset * n / fs
    );
    return finalizeWaveform('cwPulse', fs, signal, 'pad', config);
}

// ==================== Chirp ====================

/**
 * Linear FM pulse: phase π·k·t² with k = BW / T and t centred on the pulse,
 * so the instantaneous frequency sweeps -BW/2 → +BW/2 (reversed for BW < 0).
 */
export function chirp(params: ChirpParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const bandwidth = requireFinite('chirpBandwidthHz', params.chirpBandwidthHz);
    const carrier = format === 'real' ? params.carrierHz ?? 0 : 0;

    if (format === 'real') {
        checkRealBand('chirpBandwidthHz', carrier - Math.abs(bandwidth) / 2, carrier + Math.abs(bandwidth) / 2, fs);
    } else {
        checkNyquist('chirpBandwidthHz', bandwidth / 2, fs);
    }

    const frame = pulseFrame(widthToSamples(params.pulseWidthSec, fs), fs, params.priSec, params.zeroLastSample);
    const duration = frame.pulseSamples / fs;
    const rate = bandwidth / duration;
    const centre = frame.pulseSamples / 2;

    const signal = renderPulse(
        format,
        frame,
        fs,
        carrier,
        () => 1,
        n => {
            const t = (n - centre) / fs;
            return Math.PI * rate * t * t;
        }
    );
    return finalizeWaveform('chirp', fs, signal, 'pad', config);
}

// ==================== Barker ====================

/**
 * Binary phase-coded pulse: chip +1 → 0°, chip -1 → 180°.
 * Each chip spans ceil(pulseWidth · fs / codeLength) samples.
 */
export function barker(params: BarkerParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const code = barkerCode(params.code);
    const carrier = format === 'real' ? params.carrierHz ?? 0 : 0;

    if (format === 'real') {
        checkRealBand('carrierHz', carrier, carrier, fs);
    }

    requirePositive('pulseWidthSec', params.pulseWidthSec);
    const chipSamples = Math.max(1, secondsToSamples(params.pulseWidthSec / code.length, fs, 'ceil'));
    const frame = pulseFrame(chipSamples * code.length, fs, params.priSec, params.zeroLastSample);

    const signal = renderPulse(
        format,
        frame,
        fs,
        carrier,
        // a -1 chip is the 180° state: negated amplitude, no phase term
        n => code[Math.floor(n / chipSamples)],
        () => 0
    );
    return finalizeWaveform('barker', fs, signal, 'pad', config);
}
