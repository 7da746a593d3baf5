import { type Coordinate } from '../types/coordinate.js';
import { type Element, elementGlyph } from '../types/element.js';

/**
 * Mutable grid of elements that cave objects draw into.
 *
 * Width and height are fixed for the lifetime of the grid. Writes outside the
 * grid are dropped, so objects can draw without clipping themselves.
 */
export class RenderedCaveClass {
  readonly width: number;
  readonly height: number;

  /** Cells indexed [y][x] */
  private cells: Element[][];

  constructor(width: number, height: number, fill: Element) {
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: height }, () => new Array<Element>(width).fill(fill));
  }

  contains(c: Coordinate): boolean {
    return Number.isInteger(c.x) && Number.isInteger(c.y) && c.x >= 0 && c.y >= 0 && c.x < this.width && c.y < this.height;
  }

  /**
   * Returns the element at the cell, or undefined outside the grid.
   */
  get(c: Coordinate): Element | undefined {
    if (!this.contains(c)) return undefined;
    return this.cells[c.y][c.x];
  }

  /**
   * Sets the element at the cell. A no-op outside the grid.
   */
  set(c: Coordinate, element: Element): void {
    if (!this.contains(c)) return;
    this.cells[c.y][c.x] = element;
  }

  /**
   * Returns a copy of the grid rows.
   */
  toElements(): Element[][] {
    return this.cells.map((row) => [...row]);
  }

  /**
   * One glyph string per row, for text previews.
   */
  toRows(): string[] {
    return this.cells.map((row) => row.map(elementGlyph).join(''));
  }
}
