import { type LineObject } from '../types/cave-object.js';
import { bresenhamLine } from '../algorithms/bresenham.js';
import { copyGeometry, formatCorners, geometryFrom, rectangularFields } from './geometry.js';
import { defineKind } from './kind.js';

/**
 * LINE: a rasterized segment from p1 to p2.
 *
 * Unlike the box variants, the path depends on which corner is p1, so the
 * corners are used as stored, not normalized.
 *
 * Text: `Line <x1> <y1> <x2> <y2> <element>`
 */
export const lineKind = defineKind<LineObject>({
    type: 'line',
    tag: 'Line',
    fields: [
        ...rectangularFields<LineObject>({ p1: 'Start', p2: 'End' }),
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

    template: () => ({ type: 'line', corners: geometryFrom(0, 0, 0, 0), element: 'Wall' }),

    clone: (object) => ({ ...object, corners: copyGeometry(object.corners) }),

    draw(object, cave) {
        const grid = { left: 0, top: 0, right: cave.width - 1, bottom: cave.height - 1 };
        for (const cell of bresenhamLine(object.corners.p1, object.corners.p2, grid)) {
            cave.set(cell, object.element);
        }
    },

    characteristicElement: (object) => object.element,

    describe: (object) => `Line of ${object.element} ${formatCorners(object.corners)}`,
});
