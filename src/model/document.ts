/**
 * document.ts: Element document (JSON) ↔ editor tables.
 *
 * File layout:
 *   { "tables":   [{ "name", "path" }],
 *     "elements": [{ "name", "symbol", "pronouns", "author", "embed_color",
 *                    "atomic_number"?, "table"?, "coordinates"?, "path"? }] }
 *
 * Elements with `table` are sliced from that table's image at `coordinates`;
 * elements with `path` are standalone icons.
 */

import type { ElementInfo, ElementSource, ExtraElement, Table, TableElement } from './elements';
import { createTable, generateId } from './elements';
import type { Vector2 } from './vector2';

export interface DocumentTable {
  name: string;
  path: string;
}

export interface DocumentElement {
  name: string;
  symbol: string;
  pronouns: string;
  author: string;              // comma-separated
  embed_color: number;
  atomic_number?: number;
  table?: string;
  coordinates?: Vector2;
  path?: string;
}

export interface ElementDocument {
  tables: DocumentTable[];
  elements: DocumentElement[];
}

export interface DocumentEntry {
  info: ElementInfo;
  source: ElementSource;
}

export interface ParsedDocument {
  tables: DocumentTable[];
  entries: DocumentEntry[];
}

export interface LoadedDocument {
  tables: Table[];
  extras: ExtraElement[];
}

export class DocumentError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid element document: ${problems.join('; ')}`);
    this.name = 'DocumentError';
    this.problems = problems;
  }
}

const AUTHOR_SEPARATOR = ', ';

// ── Parsing ──

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function readString(obj: Record<string, unknown>, key: string, where: string, problems: string[]): string {
  const v = obj[key];
  if (typeof v !== 'string') {
    problems.push(`${where}: "${key}" must be a string`);
    return '';
  }
  return v;
}

function readInteger(v: unknown): number | null {
  return typeof v === 'number' && Number.isInteger(v) ? v : null;
}

function readCoordinates(v: unknown): Vector2 | null {
  if (!isRecord(v)) return null;
  const x = readInteger(v.x);
  const y = readInteger(v.y);
  return x === null || y === null ? null : { x, y };
}

function parseEntry(raw: unknown, index: number, tableNames: Set<string>, problems: string[]): DocumentEntry | null {
  const where = `elements[${index}]`;
  if (!isRecord(raw)) {
    problems.push(`${where}: expected an object`);
    return null;
  }
  const before = problems.length;
  const name = readString(raw, 'name', where, problems);
  const symbol = readString(raw, 'symbol', where, problems);
  const pronouns = readString(raw, 'pronouns', where, problems);
  const author = readString(raw, 'author', where, problems);

  const embedColor = readInteger(raw.embed_color);
  if (embedColor === null || embedColor < 0 || embedColor > 0xffffff) {
    problems.push(`${where}: "embed_color" must be a 24-bit integer`);
  }

  let atomicNumber: number | null = null;
  if (raw.atomic_number !== undefined) {
    atomicNumber = readInteger(raw.atomic_number);
    if (atomicNumber === null) problems.push(`${where}: "atomic_number" must be an integer`);
  }

  const { table, path } = raw;
  let source: ElementSource | null = null;
  if (typeof table === 'string') {
    const position = readCoordinates(raw.coordinates);
    if (!tableNames.has(table)) {
      problems.push(`${where}: unknown table "${table}"`);
    } else if (!position) {
      problems.push(`${where}: "coordinates" must be { x, y } integers`);
    } else {
      source = { kind: 'sliced', table, position };
    }
  } else if (typeof path === 'string') {
    source = { kind: 'embedded', path };
  } else {
    problems.push(`${where}: needs either "table" or "path"`);
  }

  if (problems.length > before || !source || embedColor === null) return null;
  return {
    info: {
      name,
      symbol,
      pronouns,
      authors: author === '' ? [] : author.split(AUTHOR_SEPARATOR),
      embedColor,
      atomicNumber,
    },
    source,
  };
}

/** Validate raw JSON. Throws DocumentError listing every problem found. */
export function parseDocument(raw: unknown): ParsedDocument {
  const problems: string[] = [];
  if (!isRecord(raw)) throw new DocumentError(['document must be an object']);
  if (!Array.isArray(raw.tables)) problems.push('"tables" must be an array');
  if (!Array.isArray(raw.elements)) problems.push('"elements" must be an array');
  if (problems.length) throw new DocumentError(problems);

  const tables: DocumentTable[] = [];
  const rawTables: unknown[] = Array.isArray(raw.tables) ? raw.tables : [];
  rawTables.forEach((t, i) => {
    if (!isRecord(t)) {
      problems.push(`tables[${i}]: expected an object`);
      return;
    }
    const name = readString(t, 'name', `tables[${i}]`, problems);
    const path = readString(t, 'path', `tables[${i}]`, problems);
    if (tables.some(existing => existing.name === name)) {
      problems.push(`tables[${i}]: duplicate table "${name}"`);
    }
    tables.push({ name, path });
  });

  const tableNames = new Set(tables.map(t => t.name));
  const rawElements: unknown[] = Array.isArray(raw.elements) ? raw.elements : [];
  const entries: DocumentEntry[] = [];
  rawElements.forEach((e, i) => {
    const entry = parseEntry(e, i, tableNames, problems);
    if (entry) entries.push(entry);
  });

  if (problems.length) throw new DocumentError(problems);
  return { tables, entries };
}

// ── Editor model ──

/** Group parsed entries into tables (document order kept) and extras. */
export function buildTables(doc: ParsedDocument): LoadedDocument {
  const tables = doc.tables.map(t => createTable(t.name, t.path));
  const extras: ExtraElement[] = [];

  for (const { info, source } of doc.entries) {
    if (source.kind === 'embedded') {
      extras.push({ ...info, id: generateId('x_'), path: source.path });
      continue;
    }
    const table = tables.find(t => t.name === source.table);
    if (!table) continue;
    const el: TableElement = { ...info, id: generateId('el_'), position: source.position };
    table.elements.push(el);
  }
  return { tables, extras };
}

export function readElementDocument(raw: unknown): LoadedDocument {
  return buildTables(parseDocument(raw));
}

// ── Serialization ──

function toDocumentElement(info: ElementInfo): DocumentElement {
  const out: DocumentElement = {
    name: info.name,
    symbol: info.symbol,
    pronouns: info.pronouns,
    author: info.authors.join(AUTHOR_SEPARATOR),
    embed_color: info.embedColor,
  };
  if (info.atomicNumber !== null) out.atomic_number = info.atomicNumber;
  return out;
}

/** Tables in order, each table's elements in order, then extras. */
export function serializeDocument(tables: readonly Table[], extras: readonly ExtraElement[]): ElementDocument {
  const elements: DocumentElement[] = [];
  for (const table of tables) {
    for (const el of table.elements) {
      elements.push({
        ...toDocumentElement(el),
        table: table.name,
        coordinates: { x: el.position.x, y: el.position.y },
      });
    }
  }
  for (const extra of extras) {
    elements.push({ ...toDocumentElement(extra), path: extra.path });
  }
  return {
    tables: tables.map(t => ({ name: t.name, path: t.path })),
    elements,
  };
}

export function stringifyDocument(doc: ElementDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}
