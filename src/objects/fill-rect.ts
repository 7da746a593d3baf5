import { type FillRectObject } from '../types/cave-object.js';
import { coord } from '../types/coordinate.js';
import { boundingBox, clipBox, copyGeometry, formatCorners, geometryFrom, perimeterCells, rectangularFields } from './geometry.js';
import { defineKind } from './kind.js';

/**
 * FILLRECT: a box with a border element on its outline and a fill element
 * inside. The border is the characteristic element.
 *
 * Text: `FillRect <x1> <y1> <x2> <y2> <border> <fill>`
 */
export const fillRectKind = defineKind<FillRectObject>({
    type: 'fillrect',
    tag: 'FillRect',
    fields: [
        ...rectangularFields<FillRectObject>(),
        {
            name: 'border',
            label: 'Border element',
            type: 'element',
            get: (object) => object.border,
            set: (object, value) => {
                object.border = value;
            },
        },
        {
            name: 'fill',
            label: 'Fill element',
            type: 'element',
            get: (object) => object.fill,
            set: (object, value) => {
                object.fill = value;
            },
        },
    ],

    template: () => ({ type: 'fillrect', corners: geometryFrom(0, 0, 0, 0), border: 'Wall', fill: 'Empty' }),

    clone: (object) => ({ ...object, corners: copyGeometry(object.corners) }),

    draw(object, cave) {
        const box = boundingBox(object.corners);
        const interior = clipBox(
            { left: box.left + 1, top: box.top + 1, right: box.right - 1, bottom: box.bottom - 1 },
            cave.width,
            cave.height,
        );
        if (interior !== null) {
            for (let y = interior.top; y <= interior.bottom; y++) {
                for (let x = interior.left; x <= interior.right; x++) {
                    cave.set(coord(x, y), object.fill);
                }
            }
        }
        const visible = clipBox(box, cave.width, cave.height);
        if (visible === null) return;
        for (const cell of perimeterCells(box, visible)) {
            cave.set(cell, object.border);
        }
    },

    characteristicElement: (object) => object.border,

    describe: (object) => `Filled rectangle of ${object.border}, filled with ${object.fill} ${formatCorners(object.corners)}`,
});
