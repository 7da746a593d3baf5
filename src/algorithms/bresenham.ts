import { type BoundingBox, type Coordinate, coord } from '../types/coordinate.js';

/**
 * Cells of the segment from `from` to `to`, both ends included, in drawing
 * order. Consecutive cells are 8-connected.
 *
 * With `clip`, only cells inside it are returned and the walk stops once it
 * has passed the clip box. The path itself is the same as without it.
 */
export function bresenhamLine(from: Coordinate, to: Coordinate, clip?: BoundingBox): Coordinate[] {
  const cells: Coordinate[] = [];

  let { x, y } = from;
  const dx = Math.abs(to.x - x);
  const dy = Math.abs(to.y - y);
  const sx = x < to.x ? 1 : -1;
  const sy = y < to.y ? 1 : -1;

  let err = dx - dy;

  for (;;) {
    if (clip === undefined) {
      cells.push(coord(x, y));
    } else {
      if (x >= clip.left && x <= clip.right && y >= clip.top && y <= clip.bottom) {
        cells.push(coord(x, y));
      } else if (
        (sx > 0 ? x > clip.right : x < clip.left) ||
        (sy > 0 ? y > clip.bottom : y < clip.top)
      ) {
        break;
      }
    }
    if (x === to.x && y === to.y) break;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }

  return cells;
}
