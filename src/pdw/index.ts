/**
 * @module pdw
 * @description Pulse descriptor word codecs and streaming file assembly
 *
 * ## Modules
 * - `agile`, `vector`, `vector-rev3b`: one record codec per wire format
 * - `codec`: variant dispatch (`PDW_CODECS`, `encodePdw`, `decodePdw`)
 * - `coding-block`: frequency/phase coding table for agile files
 * - `file`: file assembly with the 4096-byte record offset, and parsing
 * - `text-table`: delimited-text front end with field defaults
 */

// ==================== Types ====================

export type {
    PdwVariant,
    PdwOperation,
    PhaseMode,
    PulseMode,
    BandAdjust,
    ChirpShape,
    ZeroHold,
    AgilePdw,
    VectorPdw,
    VectorRev3bPdw,
    Pdw,
    PdwByVariant,
    PdwCodec,
    CodingType,
    CodingEntry,
    PdwFileOptions,
    PdwFile,
    ParsedPdwFile,
} from './types';

export { PDW_OPERATION_CODES } from './types';

// ==================== Codecs ====================

export {
    AGILE_FORMAT_CODE,
    AGILE_MIN_FREQUENCY,
    AGILE_MAX_FREQUENCY,
    PULSE_MODES,
    PHASE_MODES,
    BAND_ADJUSTS,
    CHIRP_SHAPES,
    defaultAgilePdw,
    encodeAgilePdw,
    decodeAgilePdw,
    agileCodec,
} from './agile';

export {
    VECTOR_FORMAT_CODE,
    VECTOR_MIN_FREQUENCY,
    VECTOR_MAX_FREQUENCY,
    defaultVectorPdw,
    encodeVectorPdw,
    decodeVectorPdw,
    vectorCodec,
} from './vector';

export {
    REV3B_FORMAT_CODE,
    ZERO_HOLD_MODES,
    defaultVectorRev3bPdw,
    encodeVectorRev3bPdw,
    decodeVectorRev3bPdw,
    vectorRev3bCodec,
} from './vector-rev3b';

export {
    PDW_CODECS,
    PDW_VARIANTS,
    isPdwVariant,
    getPdwCodec,
    encodePdw,
    decodePdw,
    resetPdw,
} from './codec';

export { CHIRP_RATE_UNIT } from './fields';

// ==================== Files ====================

export {
    CODING_BLOCK_ID,
    encodeCodingBlock,
    decodeCodingBlock,
} from './coding-block';

export {
    PDW_OFFSET,
    validatePdwSequence,
    buildRawPdwBlock,
    buildPdwFile,
    parsePdwFile,
} from './file';

// ==================== Text Table ====================

export type { PdwTextKey, PdwTextValue, PdwTextField, PdwTableRow, PdwTable } from './text-table';

export {
    PDW_TEXT_FIELDS,
    findTextField,
    parsePdwTable,
    tableToPdws,
    formatPdwTable,
} from './text-table';
