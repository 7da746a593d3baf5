import { type RasterObject } from '../types/cave-object.js';
import { coord } from '../types/coordinate.js';
import { boundingBox, clipBox, copyGeometry, formatCorners, geometryFrom, rectangularFields } from './geometry.js';
import { defineKind } from './kind.js';

/**
 * RASTER: a grid of single cells inside the box, starting at its top-left
 * corner and repeating every dx columns and dy rows.
 *
 * Text: `Raster <x1> <y1> <x2> <y2> <dx> <dy> <element>`
 */
export const rasterKind = defineKind<RasterObject>({
    type: 'raster',
    tag: 'Raster',
    fields: [
        ...rectangularFields<RasterObject>(),
        {
            name: 'dx',
            label: 'Column step',
            type: 'integer',
            min: 1,
            get: (object) => object.dx,
            set: (object, value) => {
                object.dx = value;
            },
        },
        {
            name: 'dy',
            label: 'Row step',
            type: 'integer',
            min: 1,
            get: (object) => object.dy,
            set: (object, value) => {
                object.dy = value;
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

    template: () => ({ type: 'raster', corners: geometryFrom(0, 0, 0, 0), dx: 1, dy: 1, element: 'Wall' }),

    clone: (object) => ({ ...object, corners: copyGeometry(object.corners) }),

    draw(object, cave) {
        const box = boundingBox(object.corners);
        const visible = clipBox(box, cave.width, cave.height);
        if (visible === null) return;
        const dx = Math.max(1, object.dx);
        const dy = Math.max(1, object.dy);
        // First grid column and row on the raster at or after the visible edge
        const startX = box.left + Math.ceil((visible.left - box.left) / dx) * dx;
        const startY = box.top + Math.ceil((visible.top - box.top) / dy) * dy;
        for (let y = startY; y <= visible.bottom; y += dy) {
            for (let x = startX; x <= visible.right; x += dx) {
                cave.set(coord(x, y), object.element);
            }
        }
    },

    characteristicElement: (object) => object.element,

    describe: (object) =>
        `Raster of ${object.element} ${formatCorners(object.corners)}, every ${String(object.dx)}x${String(object.dy)}`,
});
