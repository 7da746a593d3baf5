import type { Coordinate } from './coordinate.js';
import type { Element } from './element.js';

/**
 * Core types for Cave Objects.
 *
 * A cave is described by an ordered list of objects. Drawing them in order
 * onto a grid filled with the cave's initial element produces the playable
 * map; later objects overwrite earlier ones where they overlap.
 */

/**
 * Two opposite corners of an axis-aligned box, stored in the order given.
 * Consumers that need the box itself normalize through `boundingBox()`.
 */
export interface RectangularGeometry {
  p1: Coordinate;
  p2: Coordinate;
}

/**
 * A single cell.
 */
export interface PointObject {
  type: 'point';
  p: Coordinate;
  element: Element;
}

/**
 * A straight line from p1 to p2, both ends included.
 */
export interface LineObject {
  type: 'line';
  corners: RectangularGeometry;
  element: Element;
}

/**
 * The outline of a box.
 */
export interface RectangleObject {
  type: 'rectangle';
  corners: RectangularGeometry;
  element: Element;
}

/**
 * A box with its outline drawn in `border` and its interior in `fill`.
 */
export interface FillRectObject {
  type: 'fillrect';
  corners: RectangularGeometry;
  border: Element;
  fill: Element;
}

/**
 * Cells of a box spaced `dx` columns and `dy` rows apart.
 */
export interface RasterObject {
  type: 'raster';
  corners: RectangularGeometry;
  /** Column step, at least 1 */
  dx: number;
  /** Row step, at least 1 */
  dy: number;
  element: Element;
}

/**
 * A CaveObject is a discriminated union of every drawable object variant.
 */
export type CaveObject = PointObject | LineObject | RectangleObject | FillRectObject | RasterObject;

export type CaveObjectType = CaveObject['type'];

/**
 * Narrows the union to the variant with the given type tag.
 */
export type CaveObjectOf<K extends CaveObjectType> = Extract<CaveObject, { type: K }>;
