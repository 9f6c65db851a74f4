/**
 * @module pdw/codec
 * @description Variant dispatch for PDW encode/decode
 *
 * @example
 * ```typescript
 * const bytes = encodePdw(defaultVectorPdw({ operation: 'first-after-reset', frequencyHz: 1e9 }));
 * const pdw = decodePdw('vector', bytes);
 * ```
 */

import { UnsupportedModulationError } from '../core/errors';
import { agileCodec, defaultAgilePdw } from './agile';
import type { Pdw, PdwByVariant, PdwCodec, PdwOperation, PdwVariant } from './types';
import { defaultVectorPdw, vectorCodec } from './vector';
import { defaultVectorRev3bPdw, vectorRev3bCodec } from './vector-rev3b';

export const PDW_CODECS: { readonly [V in PdwVariant]: PdwCodec<V> } = {
    agile: agileCodec,
    vector: vectorCodec,
    'vector-rev3b': vectorRev3bCodec,
};

export const PDW_VARIANTS: readonly PdwVariant[] = ['agile', 'vector', 'vector-rev3b'];

export function isPdwVariant(name: string): name is PdwVariant {
    return PDW_VARIANTS.some(variant => variant === name);
}

export function getPdwCodec<V extends PdwVariant>(variant: V): PdwCodec<V> {
    if (!isPdwVariant(variant)) {
        throw new UnsupportedModulationError(String(variant), PDW_VARIANTS, 'PDW variant');
    }
    return PDW_CODECS[variant];
}

/**
 * Encode one PDW with the codec of its own variant
 */
export function encodePdw(pdw: Pdw): Uint8Array {
    switch (pdw.variant) {
        case 'agile':
            return agileCodec.encode(pdw);
        case 'vector':
            return vectorCodec.encode(pdw);
        case 'vector-rev3b':
            return vectorRev3bCodec.encode(pdw);
    }
}

export function decodePdw<V extends PdwVariant>(variant: V, bytes: Uint8Array): PdwByVariant<V> {
    return getPdwCodec(variant).decode(bytes);
}

/**
 * The canonical reset record of a variant: operation 'reset', zero payload
 */
export function resetPdw(variant: PdwVariant): Pdw {
    const operation: PdwOperation = 'reset';
    switch (variant) {
        case 'agile':
            return defaultAgilePdw({ operation });
        case 'vector':
            return defaultVectorPdw({ operation });
        case 'vector-rev3b':
            return defaultVectorRev3bPdw({ operation });
    }
}
