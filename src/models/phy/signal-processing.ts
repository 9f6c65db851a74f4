/**
 * Signal Processing Utilities
 *
 * Complex numbers, exact-length FFT/IFFT, upsampling, circular convolution
 * and periodic resampling on split real/imaginary Float64Arrays.
 */

// ==================== Complex Number Class ====================

export class Complex {
    constructor(public real: number, public imag: number) { }

    static fromPolar(magnitude: number, phase: number): Complex {
        return new Complex(
            magnitude * Math.cos(phase),
            magnitude * Math.sin(phase)
        )
    }

    static exp(phase: number): Complex {
        return Complex.fromPolar(1, phase)
    }

    add(other: Complex): Complex {
        return new Complex(this.real + other.real, this.imag + other.imag)
    }

    multiply(other: Complex): Complex {
        return new Complex(
            this.real * other.real - this.imag * other.imag,
            this.real * other.imag + this.imag * other.real
        )
    }

    scale(factor: number): Complex {
        return new Complex(this.real * factor, this.imag * factor)
    }

    conjugate(): Complex {
        return new Complex(this.real, -this.imag)
    }

    magnitude(): number {
        return Math.sqrt(this.real * this.real + this.imag * this.imag)
    }

    phase(): number {
        return Math.atan2(this.imag, this.real)
    }

    toString(): string {
        const sign = this.imag >= 0 ? '+' : '-'
        return `${this.real.toFixed(4)} ${sign} ${Math.abs(this.imag).toFixed(4)}j`
    }
}

/**
 * Split real/imaginary buffers
 */
export interface ComplexArray {
    re: Float64Array
    im: Float64Array
}

// ==================== FFT/IFFT ====================

export function isPowerOfTwo(n: number): boolean {
    return n > 0 && (n & (n - 1)) === 0
}

export function nextPowerOfTwo(n: number): number {
    let p = 1
    while (p < n) p *= 2
    return p
}

/**
 * In-place iterative radix-2 FFT (unscaled). Length must be a power of 2.
 */
function radix2InPlace(re: Float64Array, im: Float64Array): void {
    const N = re.length
    if (N <= 1) return

    // Bit-reversal permutation
    for (let i = 1, j = 0; i < N; i++) {
        let bit = N >> 1
        for (; j & bit; bit >>= 1) {
            j ^= bit
        }
        j ^= bit
        if (i < j) {
            let t = re[i]; re[i] = re[j]; re[j] = t
            t = im[i]; im[i] = im[j]; im[j] = t
        }
    }

    for (let size = 2; size <= N; size *= 2) {
        const half = size / 2
        const step = -2 * Math.PI / size
        for (let start = 0; start < N; start += size) {
            for (let k = 0; k < half; k++) {
                const wr = Math.cos(step * k)
                const wi = Math.sin(step * k)
                const a = start + k
                const b = a + half
                const tr = re[b] * wr - im[b] * wi
                const ti = re[b] * wi + im[b] * wr
                re[b] = re[a] - tr
                im[b] = im[a] - ti
                re[a] += tr
                im[a] += ti
            }
        }
    }
}

/**
 * Bluestein chirp-z transform for lengths that are not a power of 2
 */
function bluestein(re: Float64Array, im: Float64Array): ComplexArray {
    const N = re.length
    const M = nextPowerOfTwo(2 * N - 1)

    // w[n] = exp(-jπn²/N); n² reduced mod 2N keeps the angle accurate
    const wr = new Float64Array(N)
    const wi = new Float64Array(N)
    for (let n = 0; n < N; n++) {
        const angle = Math.PI * ((n * n) % (2 * N)) / N
        wr[n] = Math.cos(angle)
        wi[n] = -Math.sin(angle)
    }

    const ar = new Float64Array(M)
    const ai = new Float64Array(M)
    for (let n = 0; n < N; n++) {
        ar[n] = re[n] * wr[n] - im[n] * wi[n]
        ai[n] = re[n] * wi[n] + im[n] * wr[n]
    }

    const br = new Float64Array(M)
    const bi = new Float64Array(M)
    br[0] = wr[0]
    bi[0] = -wi[0]
    for (let n = 1; n < N; n++) {
        br[n] = br[M - n] = wr[n]
        bi[n] = bi[M - n] = -wi[n]
    }

    radix2InPlace(ar, ai)
    radix2InPlace(br, bi)
    for (let k = 0; k < M; k++) {
        const r = ar[k] * br[k] - ai[k] * bi[k]
        const i = ar[k] * bi[k] + ai[k] * br[k]
        // conjugate for the inverse pass through the forward kernel
        ar[k] = r
        ai[k] = -i
    }
    radix2InPlace(ar, ai)

    const outRe = new Float64Array(N)
    const outIm = new Float64Array(N)
    for (let k = 0; k < N; k++) {
        const cr = ar[k] / M
        const ci = -ai[k] / M
        outRe[k] = cr * wr[k] - ci * wi[k]
        outIm[k] = cr * wi[k] + ci * wr[k]
    }
    return { re: outRe, im: outIm }
}

/**
 * Forward DFT of exactly `re.length` points (no zero padding)
 */
export function fftReIm(re: Float64Array, im: Float64Array): ComplexArray {
    if (re.length !== im.length) {
        throw new Error('Real and imaginary parts must have the same length')
    }
    if (isPowerOfTwo(re.length) || re.length <= 1) {
        const outRe = Float64Array.from(re)
        const outIm = Float64Array.from(im)
        radix2InPlace(outRe, outIm)
        return { re: outRe, im: outIm }
    }
    return bluestein(re, im)
}

/**
 * Inverse DFT, scaled by 1/N
 */
export function ifftReIm(re: Float64Array, im: Float64Array): ComplexArray {
    const N = re.length
    const conj = Float64Array.from(im, v => -v)
    const out = fftReIm(re, conj)
    for (let k = 0; k < N; k++) {
        out.re[k] /= N
        out.im[k] = -out.im[k] / N
    }
    return out
}

/**
 * Forward FFT on Complex values, exact length
 */
export function fft(input: Complex[]): Complex[] {
    const { re, im } = fftReIm(
        Float64Array.from(input, c => c.real),
        Float64Array.from(input, c => c.imag)
    )
    return Array.from(re, (r, k) => new Complex(r, im[k]))
}

/**
 * Inverse FFT on Complex values, exact length
 */
export function ifft(input: Complex[]): Complex[] {
    const { re, im } = ifftReIm(
        Float64Array.from(input, c => c.real),
        Float64Array.from(input, c => c.imag)
    )
    return Array.from(re, (r, k) => new Complex(r, im[k]))
}

// ==================== Time-domain Helpers ====================

/**
 * Zero-stuffing upsampler: one input sample followed by (factor - 1) zeros
 */
export function upsample(signal: Float64Array, factor: number): Float64Array {
    const result = new Float64Array(signal.length * factor)
    for (let i = 0; i < signal.length; i++) {
        result[i * factor] = signal[i]
    }
    return result
}

/**
 * Circular convolution of a periodic signal with a centred FIR kernel.
 *
 * y[n] = Σ_k h[k] · x[(n - k + center) mod N]
 */
export function circularConvolve(
    signal: Float64Array,
    kernel: Float64Array,
    center = Math.floor((kernel.length - 1) / 2)
): Float64Array {
    const N = signal.length
    const result = new Float64Array(N)
    for (let m = 0; m < N; m++) {
        const x = signal[m]
        if (x === 0) continue
        // x[m] lands on y[m + k - center]
        for (let k = 0; k < kernel.length; k++) {
            let n = (m + k - center) % N
            if (n < 0) n += N
            result[n] += kernel[k] * x
        }
    }
    return result
}

/**
 * Band-limited resampling of one period of a periodic complex signal
 * to `newLength` samples (spectrum truncation / zero-fill).
 */
export function resamplePeriodic(signal: ComplexArray, newLength: number): ComplexArray {
    const N = signal.re.length
    if (newLength === N) {
        return { re: Float64Array.from(signal.re), im: Float64Array.from(signal.im) }
    }

    const spectrum = fftReIm(signal.re, signal.im)
    const re = new Float64Array(newLength)
    const im = new Float64Array(newLength)
    const keep = Math.min(N, newLength)
    const positive = Math.ceil(keep / 2)
    const negative = keep - positive

    for (let k = 0; k < positive; k++) {
        re[k] = spectrum.re[k]
        im[k] = spectrum.im[k]
    }
    for (let k = 1; k <= negative; k++) {
        re[newLength - k] = spectrum.re[N - k]
        im[newLength - k] = spectrum.im[N - k]
    }

    const out = ifftReIm(re, im)
    const gain = newLength / N
    for (let n = 0; n < newLength; n++) {
        out.re[n] *= gain
        out.im[n] *= gain
    }
    return out
}

/**
 * Linearly spaced values over [start, stop)
 */
export function linspace(start: number, stop: number, num: number): Float64Array {
    const step = (stop - start) / num
    return Float64Array.from({ length: num }, (_, i) => start + i * step)
}
