/**
 * @module pdw/coding-block
 * @description Frequency/phase coding (FPC) table block for agile PDW files
 *
 * Block layout: id 13 (u32), reserved (u32), size (u64, counted from the
 * version field), version 2 (u32), entry count (u32), entries, zero fill to
 * a 16-byte boundary.
 *
 * Entry layout: enabled (u8), bits per sub-pulse (u8), coding type (u8),
 * comment length (u8), pattern length in bits (u32), one float64 per state,
 * pattern bytes, comment bytes (UTF-8).
 */

import { InvalidParameterError } from '../core/errors';
import { joinU64, splitU64 } from './fields';
import type { CodingEntry, CodingType } from './types';

export const CODING_BLOCK_ID = 13;
export const CODING_BLOCK_VERSION = 2;

const CODING_TYPES: readonly CodingType[] = ['phase', 'frequency'];
const MAX_PATTERN_BYTES = 8192;
const MAX_COMMENT_CHARS = 60;
const BLOCK_HEADER_BYTES = 16;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Parse an even-length hex string into bytes
 */
export function hexToBytes(field: string, hex: string): Uint8Array {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new InvalidParameterError(field, `'${hex}' is not an even-length hex string`);
    }
    const bytes = new Uint8Array(hex.length / 2);
    for (let k = 0; k < bytes.length; k++) {
        bytes[k] = parseInt(hex.slice(2 * k, 2 * k + 2), 16);
    }
    return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
    return Array.from(bytes, b => b.toString(16).padStart(2, '0').toUpperCase()).join('');
}

function validateEntry(entry: CodingEntry, index: number): { pattern: Uint8Array; comment: Uint8Array } {
    const name = `codingEntries[${index}]`;
    if (entry.bitsPerSubpulse !== 1) {
        throw new InvalidParameterError(`${name}.bitsPerSubpulse`, `only 1 bit per sub-pulse is supported, got ${entry.bitsPerSubpulse}`);
    }
    if (!CODING_TYPES.includes(entry.codingType)) {
        throw new InvalidParameterError(`${name}.codingType`, `must be 'phase' or 'frequency', got '${String(entry.codingType)}'`);
    }
    const states = 2 ** entry.bitsPerSubpulse;
    if (entry.stateMapping.length !== states || !entry.stateMapping.every(Number.isFinite)) {
        throw new InvalidParameterError(`${name}.stateMapping`, `needs ${states} finite values`);
    }
    const pattern = hexToBytes(`${name}.hexPattern`, entry.hexPattern);
    if (pattern.length > MAX_PATTERN_BYTES) {
        throw new InvalidParameterError(`${name}.hexPattern`, `${pattern.length} bytes exceeds ${MAX_PATTERN_BYTES}`);
    }
    if (entry.comment.length > MAX_COMMENT_CHARS) {
        throw new InvalidParameterError(`${name}.comment`, `${entry.comment.length} characters exceeds ${MAX_COMMENT_CHARS}`);
    }
    return { pattern, comment: encoder.encode(entry.comment) };
}

function encodeEntry(entry: CodingEntry, index: number): Uint8Array {
    const { pattern, comment } = validateEntry(entry, index);
    const out = new Uint8Array(8 + 8 * entry.stateMapping.length + pattern.length + comment.length);
    const view = new DataView(out.buffer);

    view.setUint8(0, entry.enabled ? 1 : 0);
    view.setUint8(1, entry.bitsPerSubpulse);
    view.setUint8(2, CODING_TYPES.indexOf(entry.codingType));
    view.setUint8(3, comment.length);
    view.setUint32(4, 8 * pattern.length, true);
    let p = 8;
    for (const state of entry.stateMapping) {
        view.setFloat64(p, state, true);
        p += 8;
    }
    out.set(pattern, p);
    out.set(comment, p + pattern.length);
    return out;
}

/**
 * Complete FPC block, zero-padded to a multiple of 16 bytes
 */
export function encodeCodingBlock(entries: readonly CodingEntry[]): Uint8Array {
    const encoded = entries.map(encodeEntry);
    const payload = 8 + encoded.reduce((sum, e) => sum + e.length, 0);
    const unpadded = 8 + 8 + payload;
    const out = new Uint8Array(unpadded + (16 - unpadded % 16) % 16);
    const view = new DataView(out.buffer);

    const [sizeLow, sizeHigh] = splitU64(payload);
    view.setUint32(0, CODING_BLOCK_ID, true);
    view.setUint32(8, sizeLow, true);
    view.setUint32(12, sizeHigh, true);
    view.setUint32(16, CODING_BLOCK_VERSION, true);
    view.setUint32(20, entries.length, true);
    let p = 24;
    for (const e of encoded) {
        out.set(e, p);
        p += e.length;
    }
    return out;
}

/**
 * Read an FPC block starting at `offset`; returns the entries and the padded block length
 */
export function decodeCodingBlock(bytes: Uint8Array, offset: number): { entries: CodingEntry[]; byteLength: number } {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    if (view.getUint32(offset, true) !== CODING_BLOCK_ID) {
        throw new InvalidParameterError('bytes', `no coding block at offset ${offset}`);
    }
    const payload = joinU64(view.getUint32(offset + 8, true), view.getUint32(offset + 12, true));
    const version = view.getUint32(offset + 16, true);
    if (version !== CODING_BLOCK_VERSION) {
        throw new InvalidParameterError('bytes', `coding block version ${version} is not supported`);
    }
    const count = view.getUint32(offset + 20, true);

    const entries: CodingEntry[] = [];
    let p = offset + 24;
    for (let k = 0; k < count; k++) {
        const enabled = view.getUint8(p) === 1;
        const bitsPerSubpulse = view.getUint8(p + 1);
        const typeCode = view.getUint8(p + 2);
        const commentBytes = view.getUint8(p + 3);
        const patternBytes = view.getUint32(p + 4, true) / 8;
        const codingType = CODING_TYPES[typeCode];
        if (codingType === undefined) {
            throw new InvalidParameterError('bytes', `coding entry ${k} has unknown type ${typeCode}`);
        }
        p += 8;

        const stateMapping: number[] = [];
        for (let s = 0; s < 2 ** bitsPerSubpulse; s++) {
            stateMapping.push(view.getFloat64(p, true));
            p += 8;
        }
        const hexPattern = bytesToHex(bytes.subarray(p, p + patternBytes));
        p += patternBytes;
        const comment = decoder.decode(bytes.subarray(p, p + commentBytes));
        p += commentBytes;

        entries.push({
            enabled,
            bitsPerSubpulse,
            codingType,
            stateMapping,
            hexPattern,
            comment,
        });
    }

    const unpadded = BLOCK_HEADER_BYTES + payload;
    return { entries, byteLength: unpadded + (16 - unpadded % 16) % 16 };
}
