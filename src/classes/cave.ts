import { type CaveObject } from '../types/cave-object.js';
import { type Element } from '../types/element.js';
import { RenderedCaveClass } from './rendered-cave.js';
import { cloneObject, drawObject, serializeObject } from '../objects/registry.js';
import * as errors from '../errors.js';

export const MAX_CAVE_SIZE = 1000;

export function isValidCaveSize(width: number, height: number): boolean {
    return Number.isInteger(width) && Number.isInteger(height)
        && width >= 1 && height >= 1
        && width <= MAX_CAVE_SIZE && height <= MAX_CAVE_SIZE;
}

/**
 * The plain data of a cave document.
 */
export interface CaveData {
    name: string;
    width: number;
    height: number;
    /** Element every cell holds before the first object is drawn */
    initialFill: Element;
    objects: CaveObject[];
}

/**
 * Stateful wrapper for one cave: its size, its initial fill and the ordered
 * object list that is drawn over it.
 *
 * The document owns its objects exclusively. Objects handed in are stored as
 * given; objects handed out by `getObject` are live and may be edited in
 * place by the caller, which must then call `markDirty()`.
 */
export class CaveDocumentClass {
    /** Tracks whether the cave has unsaved changes */
    public isDirty: boolean = false;

    private _name: string;
    private _width: number;
    private _height: number;
    private _initialFill: Element;
    private _objects: CaveObject[];

    constructor(data: CaveData) {
        if (!isValidCaveSize(data.width, data.height)) {
            throw new Error(errors.invalidCaveSize(data.width, data.height).content[0].text);
        }
        this._name = data.name;
        this._width = data.width;
        this._height = data.height;
        this._initialFill = data.initialFill;
        this._objects = [...data.objects];
    }

    // ------------------------------------------------------------------------
    // Getters & Meta
    // ------------------------------------------------------------------------

    get name(): string {
        return this._name;
    }

    get width(): number {
        return this._width;
    }

    get height(): number {
        return this._height;
    }

    get initialFill(): Element {
        return this._initialFill;
    }

    get objectCount(): number {
        return this._objects.length;
    }

    /**
     * The object list. The array is a copy; the objects are live.
     */
    get objects(): CaveObject[] {
        return [...this._objects];
    }

    setInitialFill(element: Element): void {
        this._initialFill = element;
        this.markDirty();
    }

    resize(width: number, height: number): void {
        if (!isValidCaveSize(width, height)) {
            throw new Error(errors.invalidCaveSize(width, height).content[0].text);
        }
        this._width = width;
        this._height = height;
        this.markDirty();
    }

    // ------------------------------------------------------------------------
    // Object list
    // ------------------------------------------------------------------------

    getObject(index: number): CaveObject {
        this.validateIndex(index);
        return this._objects[index];
    }

    /**
     * Inserts an object at `index` (appends when omitted). Returns its index.
     */
    addObject(object: CaveObject, index?: number): number {
        const at = index ?? this._objects.length;
        if (!Number.isInteger(at) || at < 0 || at > this._objects.length) {
            throw new Error(errors.objectIndexOutOfRange(at, this._name, this._objects.length).content[0].text);
        }
        this._objects.splice(at, 0, object);
        this.markDirty();
        return at;
    }

    removeObject(index: number): CaveObject {
        this.validateIndex(index);
        const [removed] = this._objects.splice(index, 1);
        this.markDirty();
        return removed;
    }

    replaceObject(index: number, object: CaveObject): void {
        this.validateIndex(index);
        this._objects[index] = object;
        this.markDirty();
    }

    /**
     * Moves an object so that it ends up at index `to`. Drawing order follows
     * list order, so this changes which object wins where they overlap.
     */
    moveObject(from: number, to: number): void {
        this.validateIndex(from);
        this.validateIndex(to);
        const [object] = this._objects.splice(from, 1);
        this._objects.splice(to, 0, object);
        this.markDirty();
    }

    // ------------------------------------------------------------------------
    // Rendering & Serialization
    // ------------------------------------------------------------------------

    /**
     * Draws every object, in list order, over a grid filled with the initial
     * element.
     */
    render(): RenderedCaveClass {
        const cave = new RenderedCaveClass(this._width, this._height, this._initialFill);
        for (const object of this._objects) {
            drawObject(object, cave);
        }
        return cave;
    }

    /**
     * One text line per object, in list order.
     */
    objectLines(): string[] {
        return this._objects.map(serializeObject);
    }

    /**
     * Deep copy of the object list, for undo snapshots.
     */
    snapshot(): CaveObject[] {
        return this._objects.map(cloneObject);
    }

    /**
     * Replaces the object list with a copy of a snapshot.
     */
    restore(objects: readonly CaveObject[]): void {
        this._objects = objects.map(cloneObject);
        this.markDirty();
    }

    toData(): CaveData {
        return {
            name: this._name,
            width: this._width,
            height: this._height,
            initialFill: this._initialFill,
            objects: this.snapshot(),
        };
    }

    info() {
        return {
            name: this._name,
            width: this._width,
            height: this._height,
            initial_fill: this._initialFill,
            objects: this._objects.length,
            isDirty: this.isDirty,
        };
    }

    markDirty(): void {
        this.isDirty = true;
    }

    markClean(): void {
        this.isDirty = false;
    }

    // ------------------------------------------------------------------------
    // Private Helpers
    // ------------------------------------------------------------------------

    private validateIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this._objects.length) {
            throw new Error(errors.objectIndexOutOfRange(index, this._name, this._objects.length).content[0].text);
        }
    }
}
