import { type BoundingBox, type Coordinate, coord } from '../types/coordinate.js';
import { type RectangularGeometry } from '../types/cave-object.js';
import { type PropertyDescriptor } from '../types/property.js';

/**
 * Shared corner-pair logic for every two-corner object variant.
 *
 * Corners are stored in the order they were given. Line objects depend on
 * that order, and the text encoding must reproduce it, so only the bounding
 * box is normalized.
 */

export function boundingBox(geometry: RectangularGeometry): BoundingBox {
    const { p1, p2 } = geometry;
    return {
        left: Math.min(p1.x, p2.x),
        top: Math.min(p1.y, p2.y),
        right: Math.max(p1.x, p2.x),
        bottom: Math.max(p1.y, p2.y),
    };
}

export function copyGeometry(geometry: RectangularGeometry): RectangularGeometry {
    return { p1: geometry.p1, p2: geometry.p2 };
}

export function geometryFrom(x1: number, y1: number, x2: number, y2: number): RectangularGeometry {
    return { p1: coord(x1, y1), p2: coord(x2, y2) };
}

/**
 * The part of `box` that lies on a `width` x `height` grid, or null when
 * they do not overlap.
 */
export function clipBox(box: BoundingBox, width: number, height: number): BoundingBox | null {
    const clipped = {
        left: Math.max(box.left, 0),
        top: Math.max(box.top, 0),
        right: Math.min(box.right, width - 1),
        bottom: Math.min(box.bottom, height - 1),
    };
    if (clipped.left > clipped.right || clipped.top > clipped.bottom) return null;
    return clipped;
}

/**
 * Every cell on the outline of the box, each once. Degenerate boxes yield the
 * line or point they collapse to.
 *
 * With `clip`, only cells inside it are listed. Edges are still those of the
 * whole box, so a clipped box does not grow a new outline at the clip edge.
 */
export function perimeterCells(box: BoundingBox, clip: BoundingBox = box): Coordinate[] {
    const cells: Coordinate[] = [];
    const rows = box.bottom !== box.top ? [box.top, box.bottom] : [box.top];
    for (const y of rows) {
        if (y < clip.top || y > clip.bottom) continue;
        for (let x = Math.max(box.left, clip.left); x <= Math.min(box.right, clip.right); x++) {
            cells.push(coord(x, y));
        }
    }
    const columns = box.right !== box.left ? [box.left, box.right] : [box.left];
    for (const x of columns) {
        if (x < clip.left || x > clip.right) continue;
        for (let y = Math.max(box.top + 1, clip.top); y <= Math.min(box.bottom - 1, clip.bottom); y++) {
            cells.push(coord(x, y));
        }
    }
    return cells;
}

/**
 * The two corner descriptors, in text order. Every two-corner variant puts
 * these first in its table.
 */
export function rectangularFields<T extends { corners: RectangularGeometry }>(
    labels: { p1: string; p2: string } = { p1: 'Corner 1', p2: 'Corner 2' },
): PropertyDescriptor<T>[] {
    return [
        {
            name: 'p1',
            label: labels.p1,
            type: 'coordinate',
            get: (object) => object.corners.p1,
            set: (object, value) => {
                object.corners = { p1: value, p2: object.corners.p2 };
            },
        },
        {
            name: 'p2',
            label: labels.p2,
            type: 'coordinate',
            get: (object) => object.corners.p2,
            set: (object, value) => {
                object.corners = { p1: object.corners.p1, p2: value };
            },
        },
    ];
}

export function formatCorners(geometry: RectangularGeometry): string {
    const { p1, p2 } = geometry;
    return `(${String(p1.x)},${String(p1.y)})-(${String(p2.x)},${String(p2.y)})`;
}
