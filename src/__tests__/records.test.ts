import { describe, it, expect } from 'vitest';
import { coerceMeasurement, coerceMeasurements, parseNumeric, unwrapRecords } from '../extract/records.js';
import { buildUserPrompt, truncateText } from '../extract/prompts.js';

const RECORD_A = { material: 'Mg-2Y-0.6Nd', property_name: 'UTS', value: 245, unit: 'MPa' };
const RECORD_B = { material: 'Pure Cu', property_name: 'Hardness', value: 112, unit: 'HV' };

describe('parseNumeric', () => {
    it('should drop thousands separators', () => {
        expect(parseNumeric('1,234.5')).toBe(1234.5);
        expect(parseNumeric(' 12 ')).toBe(12);
    });

    it('should pass through values it cannot parse', () => {
        expect(parseNumeric('n/a')).toBe('n/a');
        expect(parseNumeric('')).toBe('');
        expect(parseNumeric(7)).toBe(7);
        expect(parseNumeric(null)).toBeNull();
    });
});

describe('coerceMeasurement', () => {
    it('should fill optional fields with null and additional_info with {}', () => {
        expect(coerceMeasurement(RECORD_A)).toEqual({
            material: 'Mg-2Y-0.6Nd',
            condition: null,
            property_name: 'UTS',
            value: 245,
            unit: 'MPa',
            temperature: null,
            temperature_unit: null,
            strain_rate: null,
            additional_info: {},
        });
    });

    it('should coerce numeric strings', () => {
        const property = coerceMeasurement({
            ...RECORD_A,
            value: '1,234.5',
            temperature: '25',
            temperature_unit: 'C',
            strain_rate: '0.001',
        });

        expect(property).toMatchObject({ value: 1234.5, temperature: 25, temperature_unit: 'C', strain_rate: 0.001 });
    });

    it('should keep additional_info and drop unknown keys', () => {
        const property = coerceMeasurement({
            ...RECORD_A,
            condition: 'ECAP 4 passes',
            additional_info: { passes: 4 },
            confidence: 'high',
        });

        expect(property).toEqual({
            material: 'Mg-2Y-0.6Nd',
            condition: 'ECAP 4 passes',
            property_name: 'UTS',
            value: 245,
            unit: 'MPa',
            temperature: null,
            temperature_unit: null,
            strain_rate: null,
            additional_info: { passes: 4 },
        });
    });

    it('should map a null additional_info to {}', () => {
        expect(coerceMeasurement({ ...RECORD_A, additional_info: null })?.additional_info).toEqual({});
    });

    it('should reject records without a numeric value', () => {
        expect(coerceMeasurement({ ...RECORD_A, value: 'n/a' })).toBeNull();
        expect(coerceMeasurement({ material: 'X', property_name: 'UTS', unit: 'MPa' })).toBeNull();
    });

    it('should reject records missing required strings', () => {
        expect(coerceMeasurement({ property_name: 'UTS', value: 1, unit: 'MPa' })).toBeNull();
        expect(coerceMeasurement('not a record')).toBeNull();
    });
});

describe('coerceMeasurements', () => {
    it('should keep valid records in order', () => {
        const properties = coerceMeasurements([RECORD_A, { material: 'broken' }, RECORD_B]);

        expect(properties.map((p) => p.material)).toEqual(['Mg-2Y-0.6Nd', 'Pure Cu']);
    });
});

describe('unwrapRecords', () => {
    it('should parse {data}, {properties} and bare arrays identically', () => {
        const records = [RECORD_A, RECORD_B];

        expect(unwrapRecords({ data: records })).toEqual(records);
        expect(unwrapRecords({ properties: records })).toEqual(records);
        expect(unwrapRecords(records)).toEqual(records);
    });

    it('should prefer properties over data', () => {
        expect(unwrapRecords({ data: [RECORD_B], properties: [RECORD_A] })).toEqual([RECORD_A]);
    });

    it('should skip a non-array properties key', () => {
        expect(unwrapRecords({ properties: 'none', data: [RECORD_B] })).toEqual([RECORD_B]);
    });

    it('should fall back to the first array-valued key', () => {
        expect(unwrapRecords({ note: 'tables 1-2', mechanical_properties: [RECORD_A] })).toEqual([RECORD_A]);
    });

    it('should return [] for any other shape', () => {
        expect(unwrapRecords({ message: 'no tables found' })).toEqual([]);
        expect(unwrapRecords(null)).toEqual([]);
        expect(unwrapRecords('text')).toEqual([]);
        expect(unwrapRecords(undefined)).toEqual([]);
    });
});

describe('Prompts', () => {
    it('should fall back to "Unknown" for an empty title', () => {
        expect(buildUserPrompt('', 'body').startsWith('Paper Title: Unknown\n')).toBe(true);
        expect(buildUserPrompt('Copper SMAT', 'body').startsWith('Paper Title: Copper SMAT\n')).toBe(true);
    });

    it('should embed the paper text', () => {
        expect(buildUserPrompt('T', 'TABLE 1 UTS 245 MPa')).toContain('Paper text:\nTABLE 1 UTS 245 MPa\n\nReturn');
    });

    it('should truncate long text', () => {
        expect(truncateText('abcdef', 3)).toBe('abc');
        expect(truncateText('abc', 3)).toBe('abc');
    });
});
