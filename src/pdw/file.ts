/**
 * @module pdw/file
 * @description Streaming PDW file assembly and parsing
 *
 * ## Layout
 * | offset | block |
 * |---|---|
 * | 0 | file header, 48 bytes |
 * | 48 | FPC block (agile, optional) |
 * | ... | padding block: id 1, filler size, zeros |
 * | 4080 | PDW block header: id 16, data size |
 * | 4096 | records in input order |
 * | end | agile only: zero fill to 16 bytes, 16-byte end block |
 */

import { InvalidParameterError, InvalidPdwSequenceError } from '../core/errors';
import { ConsoleLogger, type Logger } from '../core/logging';
import { CODING_BLOCK_ID, decodeCodingBlock, encodeCodingBlock } from './coding-block';
import { encodePdw, getPdwCodec, PDW_CODECS } from './codec';
import { joinU64, splitU64 } from './fields';
import type { CodingEntry, ParsedPdwFile, Pdw, PdwFile, PdwFileOptions, PdwVariant } from './types';

// ==================== Constants ====================

/** Byte offset of the first record */
export const PDW_OFFSET = 4096;

export const FILE_HEADER_BYTES = 48;
const BLOCK_HEADER_BYTES = 16;

const FILE_ID = 'STRM';
const FILE_MAGIC = 'KEYS';
const FILE_VERSION = 1;
/** Offset to the PDW data in 4096-byte blocks, stored shifted left by one */
const BLOCK_OFFSET_FIELD = 1 << 1;

const PADDING_BLOCK_ID = 1;
const PDW_BLOCK_ID = 16;
const ALL_ONES = 0xFFFFFFFF;

const DATA_IDS: Readonly<Record<PdwVariant, number>> = {
    agile: 16,
    vector: 64,
    'vector-rev3b': 64,
};

// ==================== Sequence Validation ====================

/**
 * Check variant membership and operation ordering.
 *
 * The first record must be 'reset' or 'first-after-reset', and every 'reset'
 * must be followed directly by 'first-after-reset'. Start-time ordering is
 * the caller's responsibility.
 */
export function validatePdwSequence(variant: PdwVariant, pdws: readonly Pdw[]): void {
    if (pdws.length === 0) {
        throw new InvalidPdwSequenceError(0, 'PDW list is empty');
    }
    pdws.forEach((pdw, index) => {
        if (pdw.variant !== variant) {
            throw new InvalidPdwSequenceError(index, `record ${index} is a '${pdw.variant}' PDW in a '${variant}' file`);
        }
    });

    const first = pdws[0].operation;
    if (first !== 'reset' && first !== 'first-after-reset') {
        throw new InvalidPdwSequenceError(0, `first PDW must be 'reset' or 'first-after-reset', got '${first}'`);
    }
    pdws.forEach((pdw, index) => {
        if (pdw.operation !== 'reset') return;
        const next = pdws[index + 1];
        if (next === undefined || next.operation !== 'first-after-reset') {
            throw new InvalidPdwSequenceError(
                index + 1,
                `'reset' at ${index} must be followed by 'first-after-reset'`
            );
        }
    });
}

// ==================== Assembly ====================

function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
    const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
    let p = 0;
    for (const part of parts) {
        out.set(part, p);
        p += part.length;
    }
    return out;
}

function writeAscii(view: DataView, offset: number, text: string): void {
    for (let k = 0; k < text.length; k++) {
        view.setUint8(offset + k, text.charCodeAt(k));
    }
}

function readAscii(bytes: Uint8Array, offset: number, length: number): string {
    return String.fromCharCode(...bytes.subarray(offset, offset + length));
}

function fileHeader(variant: PdwVariant): Uint8Array {
    const out = new Uint8Array(FILE_HEADER_BYTES);
    const view = new DataView(out.buffer);
    writeAscii(view, 0, FILE_ID);
    view.setUint32(4, FILE_VERSION, true);
    view.setUint32(8, BLOCK_OFFSET_FIELD, true);
    writeAscii(view, 12, FILE_MAGIC);
    // 16..31 reserved, 32 flags, 36 unique id
    view.setUint32(40, DATA_IDS[variant], true);
    return out;
}

/**
 * Block id, reserved word and 64-bit size
 */
function blockHeader(id: number, size: number | 'to-end'): Uint8Array {
    const out = new Uint8Array(BLOCK_HEADER_BYTES);
    const view = new DataView(out.buffer);
    const [low, high] = size === 'to-end' ? [ALL_ONES, ALL_ONES] : splitU64(size);
    view.setUint32(0, id, true);
    view.setUint32(8, low, true);
    view.setUint32(12, high, true);
    return out;
}

function paddingBlock(totalBytes: number): Uint8Array {
    const filler = totalBytes - BLOCK_HEADER_BYTES;
    return concatBytes([blockHeader(PADDING_BLOCK_ID, filler), new Uint8Array(filler)]);
}

/**
 * Encoded records back to back, no file structure. For LAN streaming.
 */
export function buildRawPdwBlock(pdws: readonly Pdw[]): Uint8Array {
    if (pdws.length === 0) {
        return new Uint8Array(0);
    }
    const variant = pdws[0].variant;
    return concatBytes(pdws.map((pdw, index) => {
        if (pdw.variant !== variant) {
            throw new InvalidPdwSequenceError(index, `record ${index} is a '${pdw.variant}' PDW in a '${variant}' block`);
        }
        return encodePdw(pdw);
    }));
}

/**
 * Assemble a complete PDW file.
 *
 * @example
 * ```typescript
 * const file = buildPdwFile('vector', [
 *     defaultVectorPdw({ operation: 'first-after-reset', frequencyHz: 1e9 }),
 *     defaultVectorPdw({ operation: 'none', frequencyHz: 1e9, startTimeSec: 10e-6 }),
 * ]);
 * // file.bytes.length === 4096 + 2 * 24
 * ```
 */
export function buildPdwFile(
    variant: PdwVariant,
    pdws: readonly Pdw[],
    options: PdwFileOptions = {}
): PdwFile {
    const codec = getPdwCodec(variant);
    validatePdwSequence(variant, pdws);

    const codingEntries = options.codingEntries ?? [];
    if (codingEntries.length > 0 && variant !== 'agile') {
        throw new InvalidParameterError('codingEntries', `coding tables apply to agile files only, not '${variant}'`);
    }
    const codingBlock = codingEntries.length > 0 ? encodeCodingBlock(codingEntries) : new Uint8Array(0);

    const paddingBytes = PDW_OFFSET - FILE_HEADER_BYTES - codingBlock.length - BLOCK_HEADER_BYTES;
    if (paddingBytes < BLOCK_HEADER_BYTES) {
        throw new InvalidParameterError(
            'codingEntries',
            `coding block of ${codingBlock.length} bytes leaves no room for the padding block before byte ${PDW_OFFSET}`
        );
    }

    const records = pdws.map(encodePdw);
    const dataBytes = records.length * codec.recordSize;
    const sizeMode = options.pdwBlockSize ?? (variant === 'agile' ? 'count' : 'to-end');

    const parts = [
        fileHeader(variant),
        codingBlock,
        paddingBlock(paddingBytes),
        blockHeader(PDW_BLOCK_ID, sizeMode === 'count' ? dataBytes : 'to-end'),
        ...records,
    ];
    if (variant === 'agile') {
        parts.push(new Uint8Array((16 - dataBytes % 16) % 16), new Uint8Array(BLOCK_HEADER_BYTES));
    }
    const bytes = concatBytes(parts);

    const logger: Logger = options.logger ?? new ConsoleLogger('warn');
    logger.logPdwFile({
        source: 'buildPdwFile',
        variant,
        pdwCount: records.length,
        recordSize: codec.recordSize,
        byteLength: bytes.length,
    });

    return {
        variant,
        bytes,
        pdwCount: records.length,
        recordSize: codec.recordSize,
        pdwOffset: PDW_OFFSET,
    };
}

// ==================== Parsing ====================

/**
 * Walk the blocks of a PDW file and decode its records.
 *
 * Vector files carry the same data id for both record formats; the format
 * code of the first record tells them apart.
 */
export function parsePdwFile(bytes: Uint8Array): ParsedPdwFile {
    if (bytes.length < PDW_OFFSET || readAscii(bytes, 0, 4) !== FILE_ID || readAscii(bytes, 12, 4) !== FILE_MAGIC) {
        throw new InvalidParameterError('bytes', `not a PDW file (expected '${FILE_ID}' ... '${FILE_MAGIC}' header)`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const dataId = view.getUint32(40, true);

    let codingEntries: CodingEntry[] = [];
    let p = FILE_HEADER_BYTES;
    let dataSize: number | 'to-end' | undefined;
    while (dataSize === undefined) {
        if (p + BLOCK_HEADER_BYTES > bytes.length) {
            throw new InvalidParameterError('bytes', 'file ends before the PDW block');
        }
        const id = view.getUint32(p, true);
        const low = view.getUint32(p + 8, true);
        const high = view.getUint32(p + 12, true);
        if (id === CODING_BLOCK_ID) {
            const block = decodeCodingBlock(bytes, p);
            codingEntries = block.entries;
            p += block.byteLength;
        } else if (id === PADDING_BLOCK_ID) {
            p += BLOCK_HEADER_BYTES + joinU64(low, high);
        } else if (id === PDW_BLOCK_ID) {
            p += BLOCK_HEADER_BYTES;
            dataSize = low === ALL_ONES && high === ALL_ONES ? 'to-end' : joinU64(low, high);
        } else {
            throw new InvalidParameterError('bytes', `unknown block id ${id} at offset ${p}`);
        }
    }

    let variant: PdwVariant;
    if (dataId === DATA_IDS.agile) {
        variant = 'agile';
    } else if (dataId === DATA_IDS.vector) {
        const formatCode = p < bytes.length ? bytes[p] & 0x7 : PDW_CODECS.vector.formatCode;
        variant = formatCode === PDW_CODECS['vector-rev3b'].formatCode ? 'vector-rev3b' : 'vector';
    } else {
        throw new InvalidParameterError('bytes', `unknown data id ${dataId}`);
    }

    const codec = getPdwCodec(variant);
    const available = bytes.length - p;
    // agile files end with zero fill and a 16-byte end block
    const trailer = variant === 'agile' ? BLOCK_HEADER_BYTES : 0;
    const count = dataSize === 'to-end'
        ? Math.floor((available - trailer) / codec.recordSize)
        : dataSize / codec.recordSize;
    if (!Number.isInteger(count) || count * codec.recordSize > available) {
        throw new InvalidParameterError('bytes', `PDW block of ${String(dataSize)} bytes does not hold whole ${codec.recordSize}-byte records`);
    }

    const pdws: Pdw[] = [];
    for (let k = 0; k < count; k++) {
        const start = p + k * codec.recordSize;
        pdws.push(codec.decode(bytes.subarray(start, start + codec.recordSize)));
    }
    return { variant, pdws, codingEntries };
}
