import type { Coordinate } from './coordinate.js';
import type { Element } from './element.js';

/**
 * Core types for the Property Descriptor Table.
 *
 * Each object variant publishes an ordered, read-only list of descriptors.
 * The list drives the text encoding (field order) and lets an editor build an
 * attribute form for any variant without knowing the variant.
 */

/**
 * Maps each semantic property type to the value it carries.
 */
export interface PropertyValueMap {
  coordinate: Coordinate;
  element: Element;
  integer: number;
}

export type PropertyType = keyof PropertyValueMap;

export type PropertyValue = PropertyValueMap[PropertyType];

/**
 * A descriptor for one field of type K on objects of type T.
 */
export interface TypedPropertyDescriptor<T, K extends PropertyType> {
  /** Identifier used by the editor and the tool API (e.g. "p1") */
  readonly name: string;
  /** Human-readable field name (e.g. "Start point") */
  readonly label: string;
  readonly type: K;
  /** Inclusive lower bound, integers only */
  readonly min?: number;
  /** Inclusive upper bound, integers only */
  readonly max?: number;
  get(object: T): PropertyValueMap[K];
  set(object: T, value: PropertyValueMap[K]): void;
}

/**
 * A PropertyDescriptor is a union over every property type, so that a switch
 * on `type` narrows the accessor signatures.
 */
export type PropertyDescriptor<T> = {
  [K in PropertyType]: TypedPropertyDescriptor<T, K>;
}[PropertyType];

/**
 * The serializable part of a descriptor, as reported to editor clients.
 */
export interface PropertyInfo {
  name: string;
  label: string;
  type: PropertyType;
  min?: number;
  max?: number;
}

export function propertyInfo<T>(descriptor: PropertyDescriptor<T>): PropertyInfo {
  const info: PropertyInfo = { name: descriptor.name, label: descriptor.label, type: descriptor.type };
  if (descriptor.min !== undefined) info.min = descriptor.min;
  if (descriptor.max !== undefined) info.max = descriptor.max;
  return info;
}
