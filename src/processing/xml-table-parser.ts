/**
 * Information tables in XML: the stand-alone infotable document of modern
 * filings, and the <XML> payload inside an SGML-wrapped submission.
 *
 * Nested elements flatten to the flat XBRL-style names used downstream:
 *   <shrsOrPrnAmt><sshPrnamt>      -> sshPrnamt
 *   <votingAuthority><Sole>        -> votingAuthoritySole
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '../core/errors.js';
import type { RawTable, StrategyName } from '../core/types.js';

export interface SgmlDocument {
  type: string;
  filename: string | null;
  xml: string | null;
  text: string;
}

type XmlNode = Record<string, unknown>;

/** Table locations tried in order; the first non-empty one wins */
export const INFO_TABLE_QUERIES = [
  'informationTable/infoTable',
  '//infoTable',
  'informationTable/informationTable/*',
] as const;

export type InfoTableQuery = (typeof INFO_TABLE_QUERIES)[number];

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  // CUSIPs and other managers keep their leading zeros
  parseTagValue: false,
  trimValues: true,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Every value stored under `key` anywhere below `root` */
function descendants(root: unknown, key: string): unknown[] {
  const found: unknown[] = [];
  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isNode(node)) return;
    for (const [k, v] of Object.entries(node)) {
      if (k === key) found.push(...asList(v));
      visit(v);
    }
  };
  visit(root);
  return found;
}

function childrenOf(node: unknown, key: string): unknown[] {
  return isNode(node) ? asList(node[key]) : [];
}

function allChildren(node: unknown): unknown[] {
  if (!isNode(node)) return [];
  return Object.entries(node)
    .filter(([k]) => !k.startsWith('?'))
    .flatMap(([, v]) => asList(v));
}

export function runQuery(doc: unknown, query: InfoTableQuery): unknown[] {
  switch (query) {
    case 'informationTable/infoTable':
      return descendants(doc, 'informationTable').flatMap(t => childrenOf(t, 'infoTable'));
    case '//infoTable':
      return descendants(doc, 'infoTable');
    case 'informationTable/informationTable/*':
      return descendants(doc, 'informationTable')
        .flatMap(t => childrenOf(t, 'informationTable'))
        .flatMap(allChildren);
  }
}

function flattenInto(row: Record<string, string>, node: XmlNode, parent: string | null): void {
  for (const [key, value] of Object.entries(node)) {
    // <votingAuthority><Sole> reads as votingAuthoritySole; lower-case children keep their name
    const name = parent !== null && /^[A-Z]/.test(key) ? `${parent}${key}` : key;
    if (isNode(value)) {
      flattenInto(row, value, key);
    } else if (Array.isArray(value)) {
      const first = value[0];
      if (isNode(first)) {
        flattenInto(row, first, key);
      } else if (first !== undefined && !(name in row)) {
        row[name] = String(first);
      }
    } else if (!(name in row)) {
      row[name] = value === undefined || value === null ? '' : String(value);
    }
  }
}

export function flattenRow(entry: unknown): Record<string, string> | null {
  if (!isNode(entry)) return null;
  const row: Record<string, string> = {};
  flattenInto(row, entry, null);
  return Object.keys(row).length > 0 ? row : null;
}

function toTable(entries: unknown[]): RawTable {
  const rows = entries.map(flattenRow).filter((r): r is Record<string, string> => r !== null);
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return { columns, rows };
}

/**
 * Parse an information-table XML document. Returns an empty table when
 * none of the known locations hold rows; throws ParseError on bad XML.
 */
export function parseInformationTableXml(xml: string, strategy: StrategyName = 'sgml-xml'): RawTable {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ParseError(strategy, `Malformed XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const doc: unknown = parser.parse(xml);
  for (const query of INFO_TABLE_QUERIES) {
    const table = toTable(runQuery(doc, query));
    if (table.rows.length > 0) return table;
  }
  return { columns: [], rows: [] };
}

// ── SGML ───────────────────────────────────────────────────────────────

function tagLine(section: string, tag: string): string | null {
  const match = section.match(new RegExp(`<${tag}>([^\\r\\n<]*)`, 'i'));
  return match ? match[1].trim() : null;
}

/** Split an SGML submission into its <DOCUMENT> sections */
export function splitSgmlDocuments(text: string): SgmlDocument[] {
  const docs: SgmlDocument[] = [];
  for (const match of text.matchAll(/<DOCUMENT>([\s\S]*?)<\/DOCUMENT>/gi)) {
    const section = match[1];
    const body = section.match(/<TEXT>([\s\S]*?)<\/TEXT>/i);
    const xml = (body ? body[1] : section).match(/<XML>([\s\S]*?)<\/XML>/i);
    docs.push({
      type: (tagLine(section, 'TYPE') ?? '').toUpperCase(),
      filename: tagLine(section, 'FILENAME'),
      xml: xml ? xml[1].trim() : null,
      text: body ? body[1] : section,
    });
  }
  return docs;
}

/**
 * The XML payload holding the information table: the document typed
 * INFORMATION TABLE, else any payload mentioning infoTable.
 */
export function sgmlToXml(text: string): string | null {
  const docs = splitSgmlDocuments(text).filter(d => d.xml);
  const typed = docs.find(d => d.type === 'INFORMATION TABLE');
  if (typed?.xml) return typed.xml;
  const anyTable = docs.find(d => d.xml !== null && /<(\w+:)?infoTable\b/i.test(d.xml));
  return anyTable?.xml ?? null;
}
