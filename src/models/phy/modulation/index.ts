/**
 * @module modulation
 * @description Digital modulation building blocks
 *
 * - Pulse Shaping (Raised Cosine, Root Raised Cosine)
 * - Constellations and symbol mapping (PSK, QAM, APSK)
 */

export * from './constellation';
export * from './pulse-shaping';
export type {
    FilterKind,
    FilterDescriptor,
    ModulationScheme,
    ConstellationPoint,
    Constellation,
    SymbolStream,
} from './types';

// Namespace exports for organized access
export * as pulseShaping from './pulse-shaping';
export * as constellation from './constellation';
