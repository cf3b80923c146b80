import { z } from 'zod';
import type { MechanicalProperty } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Turn numeric strings into numbers, dropping thousands separators.
 * "1,234.5" → 1234.5. Anything unparseable is passed through for the schema to reject.
 */
export function parseNumeric(value: unknown): unknown {
    if (typeof value !== 'string') return value;

    const cleaned = value.replace(/,/g, '').trim();
    if (cleaned === '') return value;

    const parsed = Number(cleaned);
    return Number.isNaN(parsed) ? value : parsed;
}

const requiredNumber = z.preprocess(parseNumeric, z.number().finite());
const optionalNumber = z
    .preprocess(parseNumeric, z.number().finite().nullish())
    .transform((value) => value ?? null);
const optionalString = z
    .string()
    .nullish()
    .transform((value) => value ?? null);

/**
 * Validation schema for one measurement record. Unknown keys are dropped.
 */
export const mechanicalPropertySchema: z.ZodType<MechanicalProperty, z.ZodTypeDef, unknown> = z.object({
    material: z.string(),
    condition: optionalString,
    property_name: z.string(),
    value: requiredNumber,
    unit: z.string(),
    temperature: optionalNumber,
    temperature_unit: optionalString,
    strain_rate: optionalNumber,
    additional_info: z
        .record(z.unknown())
        .nullish()
        .transform((value) => value ?? {}),
});

/**
 * Find the record array in a parsed LLM response.
 *
 * Accepts a bare array, or an object holding the array under `properties`,
 * then `data`, then the first array-valued key. Any other shape gives [].
 */
export function unwrapRecords(parsed: unknown): unknown[] {
    if (Array.isArray(parsed)) return parsed;
    if (typeof parsed !== 'object' || parsed === null) return [];

    const entries = Object.entries(parsed);
    for (const key of ['properties', 'data']) {
        const match = entries.find(([name]) => name === key);
        if (match && Array.isArray(match[1])) return match[1];
    }

    for (const [, value] of entries) {
        if (Array.isArray(value)) return value;
    }

    return [];
}

/**
 * Validate one raw record. Returns null (and logs at debug) when it does not fit.
 */
export function coerceMeasurement(raw: unknown): MechanicalProperty | null {
    const result = mechanicalPropertySchema.safeParse(raw);
    if (result.success) return result.data;

    getLogger().debug(
        { record: raw, issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
        'Dropping invalid property record'
    );
    return null;
}

/**
 * Validate a batch of raw records, keeping the valid ones in order.
 */
export function coerceMeasurements(raw: readonly unknown[]): MechanicalProperty[] {
    const properties: MechanicalProperty[] = [];
    for (const record of raw) {
        const property = coerceMeasurement(record);
        if (property) properties.push(property);
    }
    return properties;
}
