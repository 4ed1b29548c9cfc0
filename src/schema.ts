/**
 * Response field schemas.
 *
 * Firmware variants report a different number of fields for the same
 * query. Rather than editing a field list in place, each known shape is a
 * tagged variant picked by the value token count of the latest response.
 */

import { coerce } from './codec';

export type FieldName =
    | 'pressure'
    | 'temperature'
    | 'volumetric_flow'
    | 'mass_flow'
    | 'setpoint'
    | 'total_flow'
    | 'gas';

export type SchemaTag = 'standard' | 'meter' | 'totalizer' | 'minimal';

export interface FieldSchema {
    tag: SchemaTag;
    fields: readonly FieldName[];
}

export type FieldValues = Partial<Record<FieldName, number | string>>;

export const SCHEMAS: Record<SchemaTag, FieldSchema> = {
    // Controller: pressure, temperature, flows, setpoint, gas
    standard: {
        tag: 'standard',
        fields: ['pressure', 'temperature', 'volumetric_flow', 'mass_flow', 'setpoint', 'gas'],
    },
    // Meter without setpoint
    meter: {
        tag: 'meter',
        fields: ['pressure', 'temperature', 'volumetric_flow', 'mass_flow', 'gas'],
    },
    // Totalizer adds accumulated flow before the gas
    totalizer: {
        tag: 'totalizer',
        fields: ['pressure', 'temperature', 'volumetric_flow', 'mass_flow', 'setpoint', 'total_flow', 'gas'],
    },
    minimal: {
        tag: 'minimal',
        fields: ['pressure', 'setpoint'],
    },
};

const BY_COUNT = new Map<number, FieldSchema>(
    Object.values(SCHEMAS).map(schema => [schema.fields.length, schema])
);

/**
 * Pick the schema matching a token count, or keep the current one when
 * the count matches no known shape.
 */
export function selectSchema(count: number, current: FieldSchema = SCHEMAS.standard): FieldSchema {
    return BY_COUNT.get(count) ?? current;
}

/**
 * Zip schema fields against tokens. Extra fields or tokens are dropped.
 */
export function mapFields(schema: FieldSchema, tokens: string[]): FieldValues {
    const values: FieldValues = {};
    const n = Math.min(schema.fields.length, tokens.length);
    for (let i = 0; i < n; i++) {
        values[schema.fields[i]] = coerce(tokens[i]);
    }
    return values;
}

export function hasSetpoint(schema: FieldSchema): boolean {
    return schema.fields.includes('setpoint');
}
