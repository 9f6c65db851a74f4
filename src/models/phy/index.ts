/**
 * @module src/models/phy
 * @description Physical Layer Signal Processing
 *
 * Contains:
 * - Modulation: pulse shaping, PSK/QAM/APSK constellations
 * - Spreading: PRBS m-sequences, Barker codes
 * - Signal processing: complex numbers, exact-length FFT, circular convolution
 */

import * as modulation from './modulation';
import * as spreading from './spreading';
import * as signalProcessing from './signal-processing';

// Re-export as namespaces
export { modulation, spreading, signalProcessing };

// Direct exports for convenience
export * from './modulation';
