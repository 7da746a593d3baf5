import { type CaveObject, type CaveObjectOf, type CaveObjectType } from '../types/cave-object.js';
import { type Element } from '../types/element.js';
import { type PropertyDescriptor, type PropertyInfo, type PropertyValue, propertyInfo } from '../types/property.js';
import { type RenderedCaveClass } from '../classes/rendered-cave.js';
import { type CaveObjectKind } from './kind.js';
import { parseWith, serializeWith, tokenize } from './codec.js';
import { buildWith, fieldValuesWith, getFieldWith, setFieldWith } from './fields.js';
import { pointKind } from './point.js';
import { lineKind } from './line.js';
import { rectangleKind } from './rectangle.js';
import { fillRectKind } from './fill-rect.js';
import { rasterKind } from './raster.js';
import * as errors from '../errors.js';

/**
 * Dispatch over the closed set of object variants.
 *
 * Everything outside src/objects works with the `CaveObject` union and the
 * functions below; only this module knows which kind handles which type.
 */

const KINDS: { readonly [K in CaveObjectType]: CaveObjectKind<CaveObjectOf<K>> } = Object.freeze({
    point: pointKind,
    line: lineKind,
    rectangle: rectangleKind,
    fillrect: fillRectKind,
    raster: rasterKind,
});

/**
 * A kind with its object type erased, for callers that only know a tag or a
 * type name at run time.
 */
export interface RegisteredKind {
    readonly type: CaveObjectType;
    readonly tag: string;
    readonly fields: readonly PropertyInfo[];
    parse(tokens: readonly string[]): CaveObject | null;
    build(values: Readonly<Record<string, unknown>>): CaveObject;
}

function register<T extends CaveObject>(kind: CaveObjectKind<T>): RegisteredKind {
    return Object.freeze({
        type: kind.type,
        tag: kind.tag,
        fields: Object.freeze(kind.fields.map((field) => propertyInfo<T>(field))),
        parse: (tokens: readonly string[]) => parseWith(kind, tokens),
        build: (values: Readonly<Record<string, unknown>>) => buildWith(kind, values),
    });
}

/** Every variant, in the order editors list them */
const REGISTRY: readonly RegisteredKind[] = Object.freeze([
    register(pointKind),
    register(lineKind),
    register(rectangleKind),
    register(fillRectKind),
    register(rasterKind),
]);

const BY_TAG: ReadonlyMap<string, RegisteredKind> = new Map<string, RegisteredKind>(REGISTRY.map((kind) => [kind.tag, kind]));

/**
 * The typed capability table of one variant.
 */
export function kindOf<K extends CaveObjectType>(type: K): CaveObjectKind<CaveObjectOf<K>> {
    return KINDS[type];
}

export function listKinds(): readonly RegisteredKind[] {
    return REGISTRY;
}

/**
 * Looks up a variant by its text tag (e.g. "Rectangle"). Tags are case-sensitive.
 */
export function findKindByTag(tag: string): RegisteredKind | undefined {
    return BY_TAG.get(tag);
}

export function findKindByType(type: string): RegisteredKind | undefined {
    return REGISTRY.find((kind) => kind.type === type);
}

/**
 * The ordered Property Descriptor Table of a variant.
 */
export function describeFields<K extends CaveObjectType>(type: K): readonly PropertyDescriptor<CaveObjectOf<K>>[] {
    return kindOf(type).fields;
}

// ---------------------------------------------------------------------------
// Per-object dispatch
// ---------------------------------------------------------------------------

/**
 * An object paired with its own kind, so that the generic operations can be
 * called without re-checking the variant.
 */
interface BoundObject {
    readonly tag: string;
    clone(): CaveObject;
    draw(cave: RenderedCaveClass): void;
    serialize(): string;
    characteristicElement(): Element;
    describe(): string;
    getField(name: string): PropertyValue;
    setField(name: string, value: unknown): void;
    fieldValues(): Record<string, PropertyValue>;
}

function bindTo<T extends CaveObject>(kind: CaveObjectKind<T>, object: T): BoundObject {
    return {
        tag: kind.tag,
        clone: () => kind.clone(object),
        draw: (cave) => kind.draw(object, cave),
        serialize: () => serializeWith(kind, object),
        characteristicElement: () => kind.characteristicElement(object),
        describe: () => kind.describe(object),
        getField: (name) => getFieldWith(kind, object, name),
        setField: (name, value) => setFieldWith(kind, object, name, value),
        fieldValues: () => fieldValuesWith(kind, object),
    };
}

function bind(object: CaveObject): BoundObject {
    switch (object.type) {
        case 'point':
            return bindTo(pointKind, object);
        case 'line':
            return bindTo(lineKind, object);
        case 'rectangle':
            return bindTo(rectangleKind, object);
        case 'fillrect':
            return bindTo(fillRectKind, object);
        case 'raster':
            return bindTo(rasterKind, object);
    }
}

/**
 * Deep copy; the copy shares no mutable storage with the original.
 */
export function cloneObject(object: CaveObject): CaveObject {
    return bind(object).clone();
}

export function drawObject(object: CaveObject, cave: RenderedCaveClass): void {
    bind(object).draw(cave);
}

export function serializeObject(object: CaveObject): string {
    return bind(object).serialize();
}

export function objectTag(object: CaveObject): string {
    return bind(object).tag;
}

export function characteristicElement(object: CaveObject): Element {
    return bind(object).characteristicElement();
}

export function describeObject(object: CaveObject): string {
    return bind(object).describe();
}

export function getField(object: CaveObject, name: string): PropertyValue {
    return bind(object).getField(name);
}

/**
 * Replaces one field in place. Throws `unknownField` or `invalidFieldValue`.
 */
export function setField(object: CaveObject, name: string, value: unknown): void {
    bind(object).setField(name, value);
}

export function objectFieldValues(object: CaveObject): Record<string, PropertyValue> {
    return bind(object).fieldValues();
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Parses the remainder of an object line for the variant named by `tag`.
 * Returns null for an unknown tag or malformed fields; reporting is up to
 * the caller.
 */
export function tryParseObject(tag: string, rest: string): CaveObject | null {
    const kind = findKindByTag(tag);
    if (kind === undefined) return null;
    return kind.parse(tokenize(rest));
}

/**
 * Parses a whole object line, e.g. `Rectangle 2 2 5 4 Wall`.
 */
export function parseObjectLine(line: string): CaveObject | null {
    const trimmed = line.trim();
    const split = trimmed.search(/\s/);
    const tag = split === -1 ? trimmed : trimmed.slice(0, split);
    const rest = split === -1 ? '' : trimmed.slice(split);
    return tryParseObject(tag, rest);
}

/**
 * Builds an object of the given type from field values keyed by field name.
 * Throws `unknownObjectType`, `unknownField`, `missingField` or `invalidFieldValue`.
 */
export function buildObject(type: string, values: Readonly<Record<string, unknown>>): CaveObject {
    const kind = findKindByType(type);
    if (kind === undefined) {
        throw new Error(errors.unknownObjectType(type).content[0].text);
    }
    return kind.build(values);
}
