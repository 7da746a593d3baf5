/**
 * Core types for cave elements.
 *
 * An element names the kind of tile occupying a cell. The object model only
 * compares elements for equality; what an element does during play is not
 * its concern.
 */

/**
 * Every element with its canonical text name and the glyph used when a
 * rendered cave is previewed as text.
 */
export const ELEMENT_DEFINITIONS = [
  { name: 'Empty', glyph: ' ' },
  { name: 'Dirt', glyph: '.' },
  { name: 'Wall', glyph: 'w' },
  { name: 'SteelWall', glyph: 'W' },
  { name: 'MagicWall', glyph: 'M' },
  { name: 'ExpandingWall', glyph: 'x' },
  { name: 'Boulder', glyph: 'r' },
  { name: 'Diamond', glyph: 'd' },
  { name: 'Firefly', glyph: 'q' },
  { name: 'Butterfly', glyph: 'B' },
  { name: 'Amoeba', glyph: 'a' },
  { name: 'Slime', glyph: 's' },
  { name: 'Acid', glyph: '%' },
  { name: 'Water', glyph: '~' },
  { name: 'Lava', glyph: '^' },
  { name: 'Key', glyph: 'k' },
  { name: 'Door', glyph: 'D' },
  { name: 'Inbox', glyph: 'P' },
  { name: 'Outbox', glyph: 'X' },
  { name: 'PreOutbox', glyph: 'H' },
  { name: 'Bladder', glyph: 'o' },
  { name: 'Voodoo', glyph: 'V' },
] as const;

/**
 * A tile kind, by its canonical text name.
 * There is no "none" member: a constructed object always names a real element.
 */
export type Element = (typeof ELEMENT_DEFINITIONS)[number]['name'];

export const ELEMENTS: readonly [Element, ...Element[]] = [
  ELEMENT_DEFINITIONS[0].name,
  ...ELEMENT_DEFINITIONS.slice(1).map((def) => def.name),
];

const GLYPHS: ReadonlyMap<string, string> = new Map<string, string>(
  ELEMENT_DEFINITIONS.map((def) => [def.name, def.glyph]),
);

/**
 * Returns true if the string is the canonical name of an element.
 * Names are case-sensitive.
 */
export function isElement(name: string): name is Element {
  return GLYPHS.has(name);
}

/**
 * Parses a canonical element name. Returns null for unknown names.
 */
export function parseElement(name: string): Element | null {
  return isElement(name) ? name : null;
}

export function elementGlyph(element: Element): string {
  return GLYPHS.get(element) ?? '?';
}
