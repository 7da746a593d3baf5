/**
 * Core types for cave grid positions.
 *
 * Coordinates are immutable values. Objects may share them freely; editing a
 * position always replaces the whole coordinate.
 */

/**
 * A cell position on the cave grid. (0, 0) is the top-left cell.
 */
export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

/**
 * Creates a frozen coordinate.
 */
export function coord(x: number, y: number): Coordinate {
  return Object.freeze({ x, y });
}

/**
 * Inclusive, normalized box of cells.
 */
export interface BoundingBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Largest absolute value of a coordinate component. Both the text codec and
 * field edits reject positions beyond it.
 */
export const COORDINATE_LIMIT = 1_000_000;

export function isCoordinateComponent(value: number): boolean {
  return Number.isInteger(value) && Math.abs(value) <= COORDINATE_LIMIT;
}
