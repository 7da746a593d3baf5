import { z } from 'zod';
import { type CaveObject } from '../types/cave-object.js';
import { COORDINATE_LIMIT, coord } from '../types/coordinate.js';
import { ELEMENTS } from '../types/element.js';
import { type PropertyDescriptor, type PropertyValue } from '../types/property.js';
import { type CaveObjectKind } from './kind.js';
import * as errors from '../errors.js';

/**
 * Editor-side field access through the Property Descriptor Table.
 *
 * Values arrive as untyped JSON from tool calls and are validated against the
 * descriptor's property type before they reach the object.
 */

const componentSchema = z.number().int().min(-COORDINATE_LIMIT).max(COORDINATE_LIMIT);

const coordinateSchema = z.object({
    x: componentSchema,
    y: componentSchema,
});

const elementSchema = z.enum(ELEMENTS);

function integerSchema(min: number | undefined, max: number | undefined) {
    let schema = z.number().int().safe();
    if (min !== undefined) schema = schema.min(min);
    if (max !== undefined) schema = schema.max(max);
    return schema;
}

function describeExpected<T>(descriptor: PropertyDescriptor<T>): string {
    switch (descriptor.type) {
        case 'coordinate':
            return `a coordinate { x, y } of integers from ${String(-COORDINATE_LIMIT)} to ${String(COORDINATE_LIMIT)}`;
        case 'element':
            return 'an element name';
        case 'integer': {
            const bounds = [
                descriptor.min !== undefined ? `>= ${String(descriptor.min)}` : null,
                descriptor.max !== undefined ? `<= ${String(descriptor.max)}` : null,
            ].filter((b) => b !== null);
            return bounds.length > 0 ? `an integer ${bounds.join(' and ')}` : 'an integer';
        }
    }
}

function findField<T extends CaveObject>(kind: CaveObjectKind<T>, name: string): PropertyDescriptor<T> {
    const descriptor = kind.fields.find((field) => field.name === name);
    if (descriptor === undefined) {
        throw new Error(errors.unknownField(kind.tag, name).content[0].text);
    }
    return descriptor;
}

/**
 * Validates `value` for the descriptor and writes it. Throws `invalidFieldValue`.
 */
function applyValue<T>(tag: string, descriptor: PropertyDescriptor<T>, object: T, value: unknown): void {
    const invalid = () => new Error(errors.invalidFieldValue(tag, descriptor.name, describeExpected(descriptor)).content[0].text);

    switch (descriptor.type) {
        case 'coordinate': {
            const parsed = coordinateSchema.safeParse(value);
            if (!parsed.success) throw invalid();
            descriptor.set(object, coord(parsed.data.x, parsed.data.y));
            return;
        }
        case 'element': {
            const parsed = elementSchema.safeParse(value);
            if (!parsed.success) throw invalid();
            descriptor.set(object, parsed.data);
            return;
        }
        case 'integer': {
            const parsed = integerSchema(descriptor.min, descriptor.max).safeParse(value);
            if (!parsed.success) throw invalid();
            descriptor.set(object, parsed.data);
            return;
        }
    }
}

export function getFieldWith<T extends CaveObject>(kind: CaveObjectKind<T>, object: T, name: string): PropertyValue {
    return findField(kind, name).get(object);
}

/**
 * Replaces one field of the object. Throws `unknownField` or `invalidFieldValue`.
 */
export function setFieldWith<T extends CaveObject>(kind: CaveObjectKind<T>, object: T, name: string, value: unknown): void {
    applyValue(kind.tag, findField(kind, name), object, value);
}

/**
 * Builds a new object from a field-name keyed record. Every field of the
 * table must be present; extra keys are rejected.
 */
export function buildWith<T extends CaveObject>(kind: CaveObjectKind<T>, values: Readonly<Record<string, unknown>>): T {
    for (const key of Object.keys(values)) {
        findField(kind, key);
    }

    const object = kind.template();
    for (const field of kind.fields) {
        if (!(field.name in values)) {
            throw new Error(errors.missingField(kind.tag, field.name).content[0].text);
        }
        applyValue(kind.tag, field, object, values[field.name]);
    }
    return object;
}

/**
 * Every field value of the object, keyed by field name, in table order.
 */
export function fieldValuesWith<T extends CaveObject>(kind: CaveObjectKind<T>, object: T): Record<string, PropertyValue> {
    const values: Record<string, PropertyValue> = {};
    for (const field of kind.fields) {
        values[field.name] = field.get(object);
    }
    return values;
}
