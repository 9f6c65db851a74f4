/**
 * @module pdw/text-table
 * @description Delimited-text PDW description: named optional columns with documented defaults
 *
 * The first line names the columns; each further line is one PDW. Columns
 * that are left out take the default from `PDW_TEXT_FIELDS`.
 *
 * @example
 * ```typescript
 * const table = parsePdwTable('Operation,Time,Frequency,Zero/Hold,Markers,Name\n' +
 *     '1,0,1e9,Hold,0x1,CHIRP_1US\n' +
 *     '0,10e-6,1e9,Hold,0x0,CHIRP_1US\n');
 * const pdws = tableToPdws('vector-rev3b', table, { waveformNames: ['CHIRP_1US'] });
 * ```
 */

import { InvalidParameterError } from '../core/errors';
import { BAND_ADJUSTS, CHIRP_SHAPES, defaultAgilePdw, PHASE_MODES, PULSE_MODES } from './agile';
import type { Pdw, PdwOperation, PdwVariant } from './types';
import { defaultVectorPdw } from './vector';
import { defaultVectorRev3bPdw, ZERO_HOLD_MODES } from './vector-rev3b';

// ==================== Field Table ====================

export type PdwTextKey =
    | 'operation'
    | 'time'
    | 'pulseWidth'
    | 'frequency'
    | 'phase'
    | 'relativePower'
    | 'power'
    | 'maxPower'
    | 'markers'
    | 'pulseMode'
    | 'phaseMode'
    | 'bandAdjust'
    | 'chirpShape'
    | 'chirpRate'
    | 'code'
    | 'freqBandMap'
    | 'rfOff'
    | 'waveformIndex'
    | 'name'
    | 'waveformMarkers'
    | 'zeroHold'
    | 'autoBlank'
    | 'newWaveform'
    | 'loLead'
    | 'doppler'
    | 'waveformType'
    | 'power2'
    | 'maxPower2';

export type PdwTextValue = number | string | boolean;

interface TextFieldBase {
    key: PdwTextKey;
    /** Column header */
    name: string;
    unit: string;
    variants: readonly PdwVariant[];
}

export type PdwTextField =
    | (TextFieldBase & { kind: 'number'; default: number })
    | (TextFieldBase & { kind: 'mask'; default: number })
    | (TextFieldBase & { kind: 'flag'; default: boolean })
    | (TextFieldBase & { kind: 'choice'; default: string; choices: readonly string[] })
    | (TextFieldBase & { kind: 'text'; default: string });

export type PdwTableRow = Partial<Record<PdwTextKey, PdwTextValue>>;

export interface PdwTable {
    /** Columns present in the text, in order */
    fields: PdwTextField[];
    /** One entry per data line, every field filled */
    rows: PdwTableRow[];
}

const OPERATIONS: readonly PdwOperation[] = ['none', 'first-after-reset', 'reset'];

const ALL: readonly PdwVariant[] = ['agile', 'vector', 'vector-rev3b'];
const AGILE: readonly PdwVariant[] = ['agile'];
const VECTOR: readonly PdwVariant[] = ['vector', 'vector-rev3b'];
const REV3B: readonly PdwVariant[] = ['vector-rev3b'];
const TIMED: readonly PdwVariant[] = ['agile', 'vector-rev3b'];

/**
 * Every column the text format knows, in canonical order
 */
export const PDW_TEXT_FIELDS: readonly PdwTextField[] = [
    { key: 'operation', name: 'Operation', unit: '', variants: ALL, kind: 'choice', default: 'none', choices: OPERATIONS },
    { key: 'time', name: 'Time', unit: 's', variants: ALL, kind: 'number', default: 0 },
    { key: 'pulseWidth', name: 'Pulse Width', unit: 's', variants: TIMED, kind: 'number', default: 0 },
    { key: 'frequency', name: 'Frequency', unit: 'Hz', variants: ALL, kind: 'number', default: 1e9 },
    { key: 'phase', name: 'Phase', unit: 'deg', variants: ALL, kind: 'number', default: 0 },
    { key: 'relativePower', name: 'Relative Power', unit: '', variants: AGILE, kind: 'number', default: 1 },
    { key: 'power', name: 'Power', unit: 'dBm', variants: VECTOR, kind: 'number', default: 0 },
    { key: 'maxPower', name: 'Max Power', unit: 'dBm', variants: REV3B, kind: 'number', default: 0 },
    { key: 'markers', name: 'Markers', unit: '', variants: ALL, kind: 'mask', default: 0 },
    { key: 'pulseMode', name: 'Pulse Mode', unit: '', variants: AGILE, kind: 'choice', default: 'pulsed', choices: PULSE_MODES },
    { key: 'phaseMode', name: 'Phase Mode', unit: '', variants: ALL, kind: 'choice', default: 'coherent', choices: PHASE_MODES },
    { key: 'bandAdjust', name: 'Band Adjust', unit: '', variants: AGILE, kind: 'choice', default: 'cw-switch-points', choices: BAND_ADJUSTS },
    { key: 'chirpShape', name: 'Chirp Shape', unit: '', variants: AGILE, kind: 'choice', default: 'stitched-ramp', choices: CHIRP_SHAPES },
    { key: 'chirpRate', name: 'Chirp Rate', unit: 'Hz/us', variants: AGILE, kind: 'number', default: 0 },
    { key: 'code', name: 'Code', unit: '', variants: AGILE, kind: 'number', default: 0 },
    { key: 'freqBandMap', name: 'Freq Band Map', unit: '', variants: AGILE, kind: 'number', default: 0 },
    { key: 'rfOff', name: 'RF Off', unit: '', variants: VECTOR, kind: 'flag', default: false },
    { key: 'waveformIndex', name: 'Waveform Index', unit: '', variants: VECTOR, kind: 'number', default: 0 },
    { key: 'name', name: 'Name', unit: '', variants: VECTOR, kind: 'text', default: '' },
    { key: 'waveformMarkers', name: 'Waveform Markers', unit: '', variants: VECTOR, kind: 'mask', default: 0 },
    { key: 'zeroHold', name: 'Zero/Hold', unit: '', variants: REV3B, kind: 'choice', default: 'zero', choices: ZERO_HOLD_MODES },
    { key: 'autoBlank', name: 'Auto Blank', unit: '', variants: REV3B, kind: 'flag', default: true },
    { key: 'newWaveform', name: 'New Waveform', unit: '', variants: REV3B, kind: 'flag', default: true },
    { key: 'loLead', name: 'LO Lead', unit: 's', variants: REV3B, kind: 'number', default: 0 },
    { key: 'doppler', name: 'Doppler', unit: 'Hz', variants: REV3B, kind: 'number', default: 0 },
    { key: 'waveformType', name: 'Waveform Type', unit: '', variants: REV3B, kind: 'number', default: 0 },
    { key: 'power2', name: 'Power 2', unit: 'dBm', variants: REV3B, kind: 'number', default: 0 },
    { key: 'maxPower2', name: 'Max Power 2', unit: 'dBm', variants: REV3B, kind: 'number', default: 0 },
];

function normalizeName(name: string): string {
    return name.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

export function findTextField(name: string): PdwTextField | undefined {
    const wanted = normalizeName(name);
    return PDW_TEXT_FIELDS.find(field => normalizeName(field.name) === wanted || normalizeName(field.key) === wanted);
}

function fieldByKey(key: PdwTextKey): PdwTextField {
    const field = PDW_TEXT_FIELDS.find(f => f.key === key);
    if (!field) {
        throw new InvalidParameterError('key', `unknown PDW text field '${key}'`);
    }
    return field;
}

// ==================== Parsing ====================

function parseValue(field: PdwTextField, text: string, where: string): PdwTextValue {
    const value = text.trim();
    switch (field.kind) {
        case 'number':
        case 'mask': {
            // Number() accepts 0x.. and 0b.. as well as decimal and exponent forms
            const n = value === '' ? Number.NaN : Number(value);
            if (!Number.isFinite(n) || (field.kind === 'mask' && (!Number.isInteger(n) || n < 0))) {
                throw new InvalidParameterError(field.name, `${where}: cannot read '${value}' as a ${field.kind === 'mask' ? 'bit mask' : 'number'}`);
            }
            return n;
        }
        case 'flag': {
            const lowered = value.toLowerCase();
            if (['1', 'true', 'on', 'yes'].includes(lowered)) return true;
            if (['0', 'false', 'off', 'no'].includes(lowered)) return false;
            throw new InvalidParameterError(field.name, `${where}: cannot read '${value}' as on/off`);
        }
        case 'choice': {
            if (/^\d+$/.test(value)) {
                const code = Number(value);
                if (code < field.choices.length) return field.choices[code];
            }
            const wanted = value.toLowerCase().replace(/[\s_]+/g, '-');
            const match = field.choices.find(choice => choice === wanted);
            if (match === undefined) {
                throw new InvalidParameterError(
                    field.name,
                    `${where}: '${value}' is not one of ${field.choices.join(', ')} or their codes 0-${field.choices.length - 1}`
                );
            }
            return match;
        }
        case 'text':
            return value;
    }
}

/**
 * Parse delimited text into rows with every field filled.
 * Blank lines are skipped.
 */
export function parsePdwTable(text: string, options: { delimiter?: string } = {}): PdwTable {
    const delimiter = options.delimiter ?? ',';
    const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');
    if (lines.length === 0) {
        throw new InvalidParameterError('text', 'no header line');
    }

    const fields = lines[0].split(delimiter).map(name => {
        const field = findTextField(name);
        if (!field) {
            throw new InvalidParameterError('header', `unknown PDW field '${name.trim()}'`);
        }
        return field;
    });

    const rows = lines.slice(1).map((line, r) => {
        const cells = line.split(delimiter);
        if (cells.length !== fields.length) {
            throw new InvalidParameterError('text', `row ${r + 1} has ${cells.length} values for ${fields.length} columns`);
        }
        const row: PdwTableRow = {};
        for (const field of PDW_TEXT_FIELDS) {
            row[field.key] = field.default;
        }
        fields.forEach((field, c) => {
            row[field.key] = parseValue(field, cells[c], `row ${r + 1}`);
        });
        return row;
    });

    return { fields, rows };
}

// ==================== Conversion ====================

function numberAt(row: PdwTableRow, key: PdwTextKey): number {
    const value = row[key] ?? fieldByKey(key).default;
    if (typeof value !== 'number') {
        throw new InvalidParameterError(fieldByKey(key).name, `expected a number, got '${String(value)}'`);
    }
    return value;
}

function flagAt(row: PdwTableRow, key: PdwTextKey): boolean {
    const value = row[key] ?? fieldByKey(key).default;
    if (typeof value !== 'boolean') {
        throw new InvalidParameterError(fieldByKey(key).name, `expected on/off, got '${String(value)}'`);
    }
    return value;
}

function textAt(row: PdwTableRow, key: PdwTextKey): string {
    const value = row[key] ?? fieldByKey(key).default;
    if (typeof value !== 'string') {
        throw new InvalidParameterError(fieldByKey(key).name, `expected text, got '${String(value)}'`);
    }
    return value;
}

function choiceAt<T extends string>(row: PdwTableRow, key: PdwTextKey, choices: readonly T[]): T {
    const value = row[key] ?? fieldByKey(key).default;
    const match = choices.find(choice => choice === value);
    if (match === undefined) {
        throw new InvalidParameterError(fieldByKey(key).name, `'${String(value)}' is not one of ${choices.join(', ')}`);
    }
    return match;
}

function waveformIndexAt(row: PdwTableRow, waveformNames: readonly string[]): number {
    const name = textAt(row, 'name');
    if (name === '') {
        return numberAt(row, 'waveformIndex');
    }
    const index = waveformNames.indexOf(name);
    if (index < 0) {
        throw new InvalidParameterError('Name', `waveform '${name}' is not in the waveform index list`);
    }
    return index;
}

function rowToPdw(variant: PdwVariant, row: PdwTableRow, waveformNames: readonly string[]): Pdw {
    const common = {
        operation: choiceAt(row, 'operation', OPERATIONS),
        frequencyHz: numberAt(row, 'frequency'),
        phaseDeg: numberAt(row, 'phase'),
        startTimeSec: numberAt(row, 'time'),
        markers: numberAt(row, 'markers'),
        phaseMode: choiceAt(row, 'phaseMode', PHASE_MODES),
    };
    switch (variant) {
        case 'agile':
            return defaultAgilePdw({
                ...common,
                widthSec: numberAt(row, 'pulseWidth'),
                relativePower: numberAt(row, 'relativePower'),
                pulseMode: choiceAt(row, 'pulseMode', PULSE_MODES),
                bandAdjust: choiceAt(row, 'bandAdjust', BAND_ADJUSTS),
                chirpShape: choiceAt(row, 'chirpShape', CHIRP_SHAPES),
                codingIndex: numberAt(row, 'code'),
                chirpRateHzPerUs: numberAt(row, 'chirpRate'),
                frequencyBandMap: numberAt(row, 'freqBandMap'),
            });
        case 'vector':
            return defaultVectorPdw({
                ...common,
                powerDbm: numberAt(row, 'power'),
                rfOff: flagAt(row, 'rfOff'),
                waveformIndex: waveformIndexAt(row, waveformNames),
                waveformMarkers: numberAt(row, 'waveformMarkers'),
            });
        case 'vector-rev3b':
            return defaultVectorRev3bPdw({
                ...common,
                widthSec: numberAt(row, 'pulseWidth'),
                maxPowerDbm: numberAt(row, 'maxPower'),
                powerDbm: numberAt(row, 'power'),
                rfOff: flagAt(row, 'rfOff'),
                autoBlank: flagAt(row, 'autoBlank'),
                newWaveform: flagAt(row, 'newWaveform'),
                zeroHold: choiceAt(row, 'zeroHold', ZERO_HOLD_MODES),
                loLeadSec: numberAt(row, 'loLead'),
                waveformMarkers: numberAt(row, 'waveformMarkers'),
                waveformType: numberAt(row, 'waveformType'),
                waveformIndex: waveformIndexAt(row, waveformNames),
                power2Dbm: numberAt(row, 'power2'),
                maxPower2Dbm: numberAt(row, 'maxPower2'),
                dopplerHz: numberAt(row, 'doppler'),
            });
    }
}

/**
 * Convert parsed rows to structured PDWs of one variant.
 *
 * Columns that do not apply to the variant are rejected. A non-empty `Name`
 * resolves to its position in `waveformNames` and takes precedence over
 * `Waveform Index`. Field ranges are checked when the records are encoded.
 */
export function tableToPdws(
    variant: PdwVariant,
    table: PdwTable,
    options: { waveformNames?: readonly string[] } = {}
): Pdw[] {
    for (const field of table.fields) {
        if (!field.variants.includes(variant)) {
            throw new InvalidParameterError(field.name, `column does not apply to '${variant}' PDWs`);
        }
    }
    const waveformNames = options.waveformNames ?? [];
    return table.rows.map(row => rowToPdw(variant, row, waveformNames));
}

// ==================== Formatting ====================

function formatValue(field: PdwTextField, value: PdwTextValue): string {
    if (typeof value === 'boolean') {
        return value ? '1' : '0';
    }
    if (field.kind === 'mask' && typeof value === 'number') {
        return `0x${value.toString(16).toUpperCase()}`;
    }
    return String(value);
}

/**
 * Delimited text with a header line; every line ends in a newline.
 * Missing cells are written as the field default.
 */
export function formatPdwTable(
    fields: readonly PdwTextField[],
    rows: readonly PdwTableRow[],
    delimiter = ','
): string {
    const header = fields.map(field => field.name).join(delimiter);
    const lines = rows.map(row =>
        fields.map(field => formatValue(field, row[field.key] ?? field.default)).join(delimiter)
    );
    return [header, ...lines].map(line => `${line}\n`).join('');
}
