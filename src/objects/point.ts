import { type PointObject } from '../types/cave-object.js';
import { coord } from '../types/coordinate.js';
import { defineKind } from './kind.js';

/**
 * POINT: a single cell.
 *
 * Text: `Point <x> <y> <element>`
 */
export const pointKind = defineKind<PointObject>({
    type: 'point',
    tag: 'Point',
    fields: [
        {
            name: 'p',
            label: 'Position',
            type: 'coordinate',
            get: (object) => object.p,
            set: (object, value) => {
                object.p = value;
            },
        },
        {
            name: 'element',
            label: 'Element',
            type: 'element',
            get: (object) => object.element,
            set: (object, value) => {
                object.element = value;
            },
        },
    ],

    template: () => ({ type: 'point', p: coord(0, 0), element: 'Wall' }),

    clone: (object) => ({ ...object }),

    draw(object, cave) {
        cave.set(object.p, object.element);
    },

    characteristicElement: (object) => object.element,

    describe: (object) => `Point of ${object.element} at (${String(object.p.x)},${String(object.p.y)})`,
});
