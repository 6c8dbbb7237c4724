// ── Element / Table model ──

import type { Vector2 } from './vector2';
import { ZERO } from './vector2';

/** Icons are 48×48 with a 1px margin on each side of the box */
export const ELEMENT_SIZE = 48;
export const ELEMENT_HALF: Vector2 = { x: ELEMENT_SIZE / 2, y: ELEMENT_SIZE / 2 };
export const HIT_INSET = 0.5;

export interface ElementInfo {
  name: string;
  symbol: string;
  pronouns: string;
  authors: string[];
  embedColor: number;          // 0xRRGGBB
  atomicNumber: number | null;
}

/** An element placed on a table. `position` is the integer top-left of its box. */
export interface TableElement extends ElementInfo {
  id: string;
  position: Vector2;
}

export interface Table {
  name: string;
  path: string;                // image path relative to the image base URL
  size: Vector2;               // canvas size, known once the image has loaded
  elements: TableElement[];
}

/** Standalone icon loaded from its own image file */
export interface ExtraElement extends ElementInfo {
  id: string;
  path: string;
}

export type ElementSource =
  | { kind: 'sliced'; table: string; position: Vector2 }
  | { kind: 'embedded'; path: string };

export type ElementPatch = Partial<ElementInfo>;

// ── Helpers ──

export function generateId(prefix: string = ''): string {
  if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
    return `${prefix}${crypto.randomUUID().slice(0, 8)}`;
  }
  return `${prefix}${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 7)}`;
}

export function createTable(name: string, path: string): Table {
  return { name, path, size: ZERO, elements: [] };
}

/** Blank element as inserted from the keyboard */
export function createBlankElement(position: Vector2): TableElement {
  return {
    id: generateId('el_'),
    name: '',
    symbol: '',
    pronouns: '',
    authors: [],
    embedColor: 0xff0000,
    atomicNumber: null,
    position,
  };
}

/** id → index; -1 once the element has been deleted */
export function findElementIndex(table: Table, id: string | null): number {
  if (id === null) return -1;
  return table.elements.findIndex(el => el.id === id);
}

export function getElement(table: Table, id: string | null): TableElement | undefined {
  const idx = findElementIndex(table, id);
  return idx < 0 ? undefined : table.elements[idx];
}

export function getTable(tables: Table[], name: string): Table | undefined {
  return tables.find(t => t.name === name);
}

/** Returns a new table with one element replaced; unknown ids leave it untouched */
export function replaceElement(
  table: Table,
  id: string,
  update: (el: TableElement) => TableElement,
): Table {
  const idx = findElementIndex(table, id);
  if (idx < 0) return table;
  const elements = table.elements.slice();
  elements[idx] = update(elements[idx]);
  return { ...table, elements };
}

// ── Symbol editing ──
// Symbols use subscript digits, "•" and "×", which are awkward to type,
// so the edit field shows plain ASCII stand-ins.

const SYMBOL_GLYPHS = '₀₁₂₃₄₅₆₇₈₉•×';
const SYMBOL_ASCII = '0123456789+@';

function translate(text: string, from: string, to: string): string {
  let out = '';
  for (const ch of text) {
    const idx = from.indexOf(ch);
    out += idx < 0 ? ch : to[idx];
  }
  return out;
}

export function symbolToEditable(symbol: string): string {
  return translate(symbol, SYMBOL_GLYPHS, SYMBOL_ASCII);
}

export function symbolFromEditable(text: string): string {
  return translate(text, SYMBOL_ASCII, SYMBOL_GLYPHS);
}
