import { type RectangleObject } from '../types/cave-object.js';
import { boundingBox, clipBox, copyGeometry, formatCorners, geometryFrom, perimeterCells, rectangularFields } from './geometry.js';
import { defineKind } from './kind.js';

/**
 * RECTANGLE: the outline of the box spanned by p1 and p2.
 *
 * Only the perimeter is drawn; interior cells keep whatever was there. A box
 * with zero width or height draws as the line or point it collapses to.
 *
 * Text: `Rectangle <x1> <y1> <x2> <y2> <element>`
 */
export const rectangleKind = defineKind<RectangleObject>({
    type: 'rectangle',
    tag: 'Rectangle',
    fields: [
        ...rectangularFields<RectangleObject>(),
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

    template: () => ({ type: 'rectangle', corners: geometryFrom(0, 0, 0, 0), element: 'Wall' }),

    clone: (object) => ({ ...object, corners: copyGeometry(object.corners) }),

    draw(object, cave) {
        const box = boundingBox(object.corners);
        const visible = clipBox(box, cave.width, cave.height);
        if (visible === null) return;
        for (const cell of perimeterCells(box, visible)) {
            cave.set(cell, object.element);
        }
    },

    characteristicElement: (object) => object.element,

    describe: (object) => `Rectangle of ${object.element} ${formatCorners(object.corners)}`,
});
