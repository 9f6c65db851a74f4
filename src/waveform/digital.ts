/**
 * @module waveform/digital
 * @description Pulse-shaped digital modulation with exact loop wraparound
 *
 * ## Pipeline
 * 1. Symbols from the seeded RNG (or a PRBS), mapped onto the constellation
 * 2. Impulse upsampling to an integer oversampling factor
 * 3. Circular convolution with the pulse-shaping filter, so the last symbol's
 *    tail wraps onto the first and the segment loops without a splice
 * 4. FFT resampling to the target rate when fs / symbolRate is fractional
 * 5. Scaling to unit peak magnitude
 *
 * The symbol count is raised to the smallest value whose sample count meets the
 * device granularity and minimum length, so no tiling or padding is needed.
 */

import { InvalidParameterError } from '../core/errors';
import { requireInRange, requireInteger, requirePositive } from '../core/guards';
import { createRng } from '../core/repro';
import { bitsToSymbols, getConstellation, mapSymbols, parseModulationScheme } from '../models/phy/modulation/constellation';
import { designFilter } from '../models/phy/modulation/pulse-shaping';
import { circularConvolve, resamplePeriodic, upsample } from '../models/phy/signal-processing';
import { prbsBits } from '../models/phy/spreading';
import { gcd, rationalApproximation } from '../models/utils/conversion';
import { resolveSynthesisConfig } from './config';
import { assertWithinBounds, finalizeWaveform, type RawSignal } from './correction';
import { checkRealBand, checkSampleRate, normalizePeak, resolveFormat } from './shared';
import type { DigitalModulationParams, SynthesisConfig, Waveform } from './types';

/** Largest denominator accepted for fs / symbolRate */
const MAX_RATE_DENOMINATOR = 1000;

export const DEFAULT_ROLL_OFF = 0.35;
export const DEFAULT_PRBS_ORDER = 9;

/**
 * Symbol count and sample count that satisfy the device profile.
 *
 * With fs / Rs = p / q, N symbols give N·p/q samples, so N must be a multiple
 * of q and N·p/q a multiple of the granularity.
 */
export function planSymbolCount(
    numSymbols: number,
    ratio: { numerator: number; denominator: number },
    config: SynthesisConfig
): { symbols: number; samples: number } {
    const { numerator: p, denominator: q } = ratio;
    const { granularity, minLength } = config.device;
    const step = granularity / gcd(p, granularity);

    let blocks = Math.max(Math.ceil(numSymbols / q), Math.ceil(minLength / p));
    blocks = Math.ceil(blocks / step) * step;

    return { symbols: blocks * q, samples: blocks * p };
}

function drawSymbols(
    count: number,
    order: number,
    bitsPerSymbol: number,
    params: DigitalModulationParams,
    seed: number
): number[] {
    const source = params.dataSource ?? 'random';
    if (source === 'prbs') {
        const bits = prbsBits(params.prbsOrder ?? DEFAULT_PRBS_ORDER, count * bitsPerSymbol);
        return bitsToSymbols(bits, bitsPerSymbol);
    }
    if (source !== 'random') {
        throw new InvalidParameterError('dataSource', `must be 'random' or 'prbs', got '${String(source)}'`);
    }
    const rng = createRng(seed);
    return Array.from({ length: count }, () => rng.randint(0, order));
}

/**
 * Pulse-shaped digital modulation.
 *
 * @example
 * ```typescript
 * const wfm = digitalModulation({
 *     sampleRate: 100e6, symbolRateHz: 20e6, scheme: '16qam', numSymbols: 1000,
 * });
 * // wfm.length === 5000
 * ```
 */
export function digitalModulation(params: DigitalModulationParams, overrides?: Partial<SynthesisConfig>): Waveform {
    const config = resolveSynthesisConfig(overrides);
    const format = resolveFormat(params.format);
    const fs = checkSampleRate(params.sampleRate, config);
    const symbolRate = requirePositive('symbolRateHz', params.symbolRateHz);
    const scheme = parseModulationScheme(params.scheme);
    const numSymbols = requireInteger('numSymbols', params.numSymbols);
    const rollOff = requireInRange('rollOff', params.rollOff ?? DEFAULT_ROLL_OFF, 0, 1);

    if (symbolRate > fs) {
        throw new InvalidParameterError('symbolRateHz', `${symbolRate} Sym/s exceeds the sample rate ${fs}`);
    }
    const ratio = rationalApproximation(fs / symbolRate, MAX_RATE_DENOMINATOR);
    if (!ratio) {
        throw new InvalidParameterError(
            'symbolRateHz',
            `sample rate / symbol rate = ${fs / symbolRate} is not a ratio of integers with denominator <= ${MAX_RATE_DENOMINATOR}`
        );
    }

    const carrier = format === 'real' ? params.carrierHz ?? 0 : 0;
    if (format === 'real') {
        const halfBand = symbolRate * (1 + rollOff) / 2;
        checkRealBand('carrierHz', carrier - halfBand, carrier + halfBand, fs);
    }

    const plan = planSymbolCount(numSymbols, ratio, config);
    const tail = params.zeroLastSample ? config.device.granularity : 0;
    const requestedLength = Math.ceil(numSymbols * ratio.numerator / ratio.denominator);
    assertWithinBounds(requestedLength, plan.samples + tail, config);

    // Symbols and mapping
    const { order, bitsPerSymbol } = getConstellation(scheme);
    const indices = drawSymbols(plan.symbols, order, bitsPerSymbol, params, config.seed);
    const mapped = mapSymbols(indices, scheme);

    // Shaping at an integer oversampling factor
    const oversample = ratio.denominator === 1
        ? ratio.numerator
        : Math.max(2, Math.ceil(ratio.numerator / ratio.denominator));
    const filter = designFilter({
        kind: params.filterKind ?? 'root-raised-cosine',
        rollOff,
        samplesPerSymbol: oversample,
        spanSymbols: params.filterSpanSymbols,
    });
    let baseband = {
        re: circularConvolve(upsample(mapped.i, oversample), filter),
        im: circularConvolve(upsample(mapped.q, oversample), filter),
    };
    if (baseband.re.length !== plan.samples) {
        baseband = resamplePeriodic(baseband, plan.samples);
    }
    normalizePeak(baseband.re, baseband.im);

    const total = plan.samples + tail;
    let signal: RawSignal;
    if (format === 'real') {
        const samples = new Float64Array(total);
        for (let n = 0; n < plan.samples; n++) {
            const w = 2 * Math.PI * carrier * n / fs;
            samples[n] = baseband.re[n] * Math.cos(w) - baseband.im[n] * Math.sin(w);
        }
        signal = { format, samples };
    } else {
        const i = new Float64Array(total);
        const q = new Float64Array(total);
        i.set(baseband.re);
        q.set(baseband.im);
        signal = { format, i, q };
    }

    return finalizeWaveform('digitalModulation', fs, signal, 'symbols', config, requestedLength);
}
