import { type CaveObject } from '../types/cave-object.js';
import { coord, isCoordinateComponent } from '../types/coordinate.js';
import { parseElement } from '../types/element.js';
import { type PropertyDescriptor, type PropertyType } from '../types/property.js';
import { type CaveObjectKind } from './kind.js';

/**
 * Line-oriented text encoding of cave objects.
 *
 * An object line is `<Tag> <field values...>`, whitespace separated, with the
 * fields in descriptor-table order. Coordinates take two tokens (x then y),
 * elements and integers one.
 */

export const TOKENS_PER_TYPE: Readonly<Record<PropertyType, number>> = Object.freeze({
    coordinate: 2,
    element: 1,
    integer: 1,
});

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Splits a line into whitespace-separated tokens.
 */
export function tokenize(line: string): string[] {
    return line.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Parses a base-10 integer token. Rejects fractions, exponents and hex.
 */
export function parseIntegerToken(token: string): number | null {
    if (!INTEGER_TOKEN.test(token)) return null;
    const value = Number.parseInt(token, 10);
    return Number.isSafeInteger(value) ? value : null;
}

/**
 * Number of value tokens an object line of this kind must carry.
 */
export function expectedTokenCount<T extends CaveObject>(kind: CaveObjectKind<T>): number {
    return kind.fields.reduce((sum, field) => sum + TOKENS_PER_TYPE[field.type], 0);
}

function formatField<T>(descriptor: PropertyDescriptor<T>, object: T): string[] {
    switch (descriptor.type) {
        case 'coordinate': {
            const c = descriptor.get(object);
            return [String(c.x), String(c.y)];
        }
        case 'element':
            return [descriptor.get(object)];
        case 'integer':
            return [String(descriptor.get(object))];
    }
}

/**
 * Canonical one-line encoding of an object.
 */
export function serializeWith<T extends CaveObject>(kind: CaveObjectKind<T>, object: T): string {
    const tokens = [kind.tag];
    for (const field of kind.fields) {
        tokens.push(...formatField(field, object));
    }
    return tokens.join(' ');
}

function inRange(value: number, min: number | undefined, max: number | undefined): boolean {
    return (min === undefined || value >= min) && (max === undefined || value <= max);
}

/**
 * Reads one field's tokens and returns a setter that applies the value, or
 * null if the tokens do not hold a valid value.
 */
function readField<T>(descriptor: PropertyDescriptor<T>, tokens: readonly string[]): ((object: T) => void) | null {
    switch (descriptor.type) {
        case 'coordinate': {
            const x = parseIntegerToken(tokens[0]);
            const y = parseIntegerToken(tokens[1]);
            if (x === null || y === null || !isCoordinateComponent(x) || !isCoordinateComponent(y)) return null;
            const field = descriptor;
            const value = coord(x, y);
            return (object) => field.set(object, value);
        }
        case 'element': {
            const field = descriptor;
            const value = parseElement(tokens[0]);
            if (value === null) return null;
            return (object) => field.set(object, value);
        }
        case 'integer': {
            const value = parseIntegerToken(tokens[0]);
            const field = descriptor;
            if (value === null || !inRange(value, field.min, field.max)) return null;
            return (object) => field.set(object, value);
        }
    }
}

/**
 * Parses the value tokens that follow a type tag.
 *
 * Every token is checked before an object is created, so a failure never
 * leaves a partly initialized object behind. Returns null on a wrong token
 * count, a malformed integer, a coordinate beyond `COORDINATE_LIMIT`, an
 * integer out of its field's range, or an unknown element name.
 */
export function parseWith<T extends CaveObject>(kind: CaveObjectKind<T>, tokens: readonly string[]): T | null {
    if (tokens.length !== expectedTokenCount(kind)) return null;

    const setters: Array<(object: T) => void> = [];
    let offset = 0;
    for (const field of kind.fields) {
        const width = TOKENS_PER_TYPE[field.type];
        const setter = readField(field, tokens.slice(offset, offset + width));
        if (setter === null) return null;
        setters.push(setter);
        offset += width;
    }

    const object = kind.template();
    for (const apply of setters) apply(object);
    return object;
}
