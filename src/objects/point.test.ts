import { describe, it, expect } from 'vitest';
import { type PointObject } from '../types/cave-object.js';
import { coord } from '../types/coordinate.js';
import { RenderedCaveClass } from '../classes/rendered-cave.js';
import { cloneObject, describeFields, describeObject, drawObject, parseObjectLine, serializeObject } from './registry.js';

const diamond: PointObject = { type: 'point', p: coord(3, 4), element: 'Diamond' };

describe('point object', () => {
    it('draws a single cell', () => {
        const cave = new RenderedCaveClass(5, 5, 'Dirt');
        drawObject(diamond, cave);
        expect(cave.toRows()).toEqual(['.....', '.....', '.....', '.....', '...d.']);
    });

    it('draws nothing outside the grid', () => {
        const cave = new RenderedCaveClass(3, 3, 'Dirt');
        drawObject({ type: 'point', p: coord(3, 0), element: 'Wall' }, cave);
        expect(cave.toRows()).toEqual(['...', '...', '...']);
    });

    it('serializes and parses', () => {
        expect(serializeObject(diamond)).toBe('Point 3 4 Diamond');
        expect(parseObjectLine('Point 3 4 Diamond')).toEqual(diamond);
        expect(parseObjectLine('Point 3 4')).toBeNull();
        expect(parseObjectLine('Point 3 x Diamond')).toBeNull();
    });

    it('clones into an equal, separate object', () => {
        const copy = cloneObject(diamond);
        expect(copy).toEqual(diamond);
        expect(copy).not.toBe(diamond);
    });

    it('has a position and an element field', () => {
        expect(describeFields('point').map((field) => [field.name, field.label, field.type])).toEqual([
            ['p', 'Position', 'coordinate'],
            ['element', 'Element', 'element'],
        ]);
    });

    it('describes itself', () => {
        expect(describeObject(diamond)).toBe('Point of Diamond at (3,4)');
    });
});
