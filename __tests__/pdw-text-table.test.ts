/**
 * PDW Text Table Tests
 * Tests for the delimited-text PDW description
 */

import { describe, it, expect } from 'vitest';
import {
    buildPdwFile,
    findTextField,
    formatPdwTable,
    parsePdwFile,
    parsePdwTable,
    PDW_TEXT_FIELDS,
    tableToPdws,
} from '../src/pdw';
import { InvalidParameterError } from '../src/core/errors';
import { MemoryLogger } from '../src/core/logging';

function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

const REV3B_TEXT =
    'Operation,Time,Frequency,Zero/Hold,Markers,Name\n' +
    '1,0,1e9,Hold,0x1,CHIRP_1US\n' +
    '0,10e-6,1e9,Hold,0x0,CHIRP_1US\n';

// ==================== Field Table ====================

describe('PDW text fields', () => {
    it('should give every field a unique key and column name', () => {
        const keys = new Set(PDW_TEXT_FIELDS.map(field => field.key));
        const names = new Set(PDW_TEXT_FIELDS.map(field => field.name));
        expect(keys.size).toBe(PDW_TEXT_FIELDS.length);
        expect(names.size).toBe(PDW_TEXT_FIELDS.length);
    });

    it('should match column names ignoring case and separators', () => {
        expect(findTextField('zero/hold')?.key).toBe('zeroHold');
        expect(findTextField('PULSE_WIDTH')?.key).toBe('pulseWidth');
        expect(findTextField('waveformIndex')?.key).toBe('waveformIndex');
        expect(findTextField('Pulse Count')).toBeUndefined();
    });
});

// ==================== Parsing ====================

describe('parsePdwTable', () => {
    it('should read the header and one row per line', () => {
        const table = parsePdwTable(REV3B_TEXT);

        expect(table.fields.map(field => field.key)).toEqual(['operation', 'time', 'frequency', 'zeroHold', 'markers', 'name']);
        expect(table.rows).toHaveLength(2);
        expect(table.rows[0]).toMatchObject({
            operation: 'first-after-reset',
            time: 0,
            frequency: 1e9,
            zeroHold: 'hold',
            markers: 1,
            name: 'CHIRP_1US',
        });
        expect(table.rows[1]).toMatchObject({ operation: 'none', time: 1e-5 });
    });

    it('should fill absent columns with their defaults', () => {
        const table = parsePdwTable(REV3B_TEXT);
        expect(table.rows[0]).toMatchObject({
            autoBlank: true,
            newWaveform: true,
            power: 0,
            rfOff: false,
            phaseMode: 'coherent',
        });
    });

    it('should accept choice names with spaces and flag words', () => {
        const table = parsePdwTable('Chirp Shape;RF Off\nStitched Ramp;on\ntriangle;No\n', { delimiter: ';' });
        expect(table.rows[0]).toMatchObject({ chirpShape: 'stitched-ramp', rfOff: true });
        expect(table.rows[1]).toMatchObject({ chirpShape: 'triangle', rfOff: false });
    });

    it('should skip blank lines', () => {
        expect(parsePdwTable('Time\n\n1e-6\n\n').rows).toHaveLength(1);
    });

    it('should reject unknown columns', () => {
        const error = catchError(() => parsePdwTable('Time,Pulse Count\n0,1\n'));
        expect(error).toBeInstanceOf(InvalidParameterError);
        expect(error).toMatchObject({ parameter: 'header' });
    });

    it('should reject rows with the wrong number of cells', () => {
        const error = catchError(() => parsePdwTable('Time,Frequency\n0\n'));
        expect(error).toMatchObject({ parameter: 'text' });
    });

    it('should name the column of an unreadable value', () => {
        expect(catchError(() => parsePdwTable('RF Off\nmaybe\n'))).toMatchObject({ parameter: 'RF Off' });
        expect(catchError(() => parsePdwTable('Markers\n-1\n'))).toMatchObject({ parameter: 'Markers' });
        expect(catchError(() => parsePdwTable('Operation\n3\n'))).toMatchObject({ parameter: 'Operation' });
    });
});

// ==================== Conversion ====================

describe('tableToPdws', () => {
    it('should resolve waveform names to their index', () => {
        const pdws = tableToPdws('vector-rev3b', parsePdwTable(REV3B_TEXT), {
            waveformNames: ['PULSE_10US', 'CHIRP_1US'],
        });

        expect(pdws).toHaveLength(2);
        expect(pdws[0]).toMatchObject({
            variant: 'vector-rev3b',
            operation: 'first-after-reset',
            frequencyHz: 1e9,
            zeroHold: 'hold',
            markers: 1,
            waveformIndex: 1,
            autoBlank: true,
            newWaveform: true,
            powerDbm: 0,
        });
        expect(pdws[1]).toMatchObject({ operation: 'none', startTimeSec: 1e-5 });
    });

    it('should produce records that assemble into a file', () => {
        const pdws = tableToPdws('vector-rev3b', parsePdwTable(REV3B_TEXT), {
            waveformNames: ['CHIRP_1US'],
        });
        const parsed = parsePdwFile(buildPdwFile('vector-rev3b', pdws, { logger: new MemoryLogger() }).bytes);

        expect(parsed.variant).toBe('vector-rev3b');
        expect(parsed.pdws).toHaveLength(2);
        expect(parsed.pdws[0]).toMatchObject({ waveformIndex: 0, zeroHold: 'hold' });
    });

    it('should reject waveform names missing from the list', () => {
        const error = catchError(() => tableToPdws('vector-rev3b', parsePdwTable(REV3B_TEXT)));
        expect(error).toMatchObject({ parameter: 'Name' });
    });

    it('should use the waveform index column when no name is given', () => {
        const pdws = tableToPdws('vector', parsePdwTable('Operation,Waveform Index,Power\n1,7,-10\n'));
        expect(pdws[0]).toMatchObject({ variant: 'vector', waveformIndex: 7, powerDbm: -10 });
    });

    it('should reject columns that do not apply to the variant', () => {
        const error = catchError(() => tableToPdws('vector', parsePdwTable('Relative Power\n1\n')));
        expect(error).toMatchObject({ parameter: 'Relative Power' });
    });

    it('should build agile records with agile defaults', () => {
        const table = parsePdwTable('Operation,Frequency,Pulse Width,Relative Power\n1,2e9,1e-6,0.5\n');
        const [pdw] = tableToPdws('agile', table);

        expect(pdw).toMatchObject({
            variant: 'agile',
            frequencyHz: 2e9,
            widthSec: 1e-6,
            relativePower: 0.5,
            pulseMode: 'pulsed',
            bandAdjust: 'cw-switch-points',
            chirpShape: 'stitched-ramp',
        });
    });
});

// ==================== Formatting ====================

describe('formatPdwTable', () => {
    it('should write names, hex masks and newline-terminated lines', () => {
        const table = parsePdwTable(REV3B_TEXT);
        expect(formatPdwTable(table.fields, table.rows)).toBe(
            'Operation,Time,Frequency,Zero/Hold,Markers,Name\n' +
            'first-after-reset,0,1000000000,hold,0x1,CHIRP_1US\n' +
            'none,0.00001,1000000000,hold,0x0,CHIRP_1US\n'
        );
    });

    it('should write flags as 1 and 0', () => {
        const fields = PDW_TEXT_FIELDS.filter(field => field.key === 'autoBlank' || field.key === 'rfOff');
        expect(formatPdwTable(fields, [{ rfOff: true, autoBlank: false }], '\t')).toBe('RF Off\tAuto Blank\n1\t0\n');
    });

    it('should read back what it writes', () => {
        const table = parsePdwTable(REV3B_TEXT);
        const again = parsePdwTable(formatPdwTable(table.fields, table.rows));
        expect(again.rows).toEqual(table.rows);
    });
});
