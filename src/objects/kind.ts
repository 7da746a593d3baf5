import { type CaveObject } from '../types/cave-object.js';
import { type Element } from '../types/element.js';
import { type PropertyDescriptor } from '../types/property.js';
import { type RenderedCaveClass } from '../classes/rendered-cave.js';

/**
 * Capability table of one cave object variant.
 *
 * Each variant module exports a single frozen kind. Serialization, parsing and
 * field access are not part of the table: they are generated from `fields`
 * (see codec.ts and fields.ts), so the text encoding cannot drift from the
 * descriptor order.
 */
export interface CaveObjectKind<T extends CaveObject> {
    readonly type: T['type'];
    /** Type tag at the start of the object's text line */
    readonly tag: string;
    /** Ordered Property Descriptor Table, shared by every instance */
    readonly fields: readonly PropertyDescriptor<T>[];

    /**
     * A valid instance to start from when parsing or when an editor adds a
     * new object. Always a fresh object.
     */
    template(): T;
    clone(object: T): T;
    draw(object: T, cave: RenderedCaveClass): void;
    characteristicElement(object: T): Element;
    describe(object: T): string;
}

/**
 * Freezes a kind and its descriptor table.
 */
export function defineKind<T extends CaveObject>(kind: CaveObjectKind<T>): CaveObjectKind<T> {
    Object.freeze(kind.fields);
    for (const field of kind.fields) Object.freeze(field);
    return Object.freeze(kind);
}
