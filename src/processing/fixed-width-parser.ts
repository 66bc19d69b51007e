/**
 * Fixed-width information-table parser, the last fallback for pre-XML
 * filings. Columns are character spans taken from the header offsets.
 */

import type { RawTable } from '../core/types.js';
import { extractInfoTableBlock, splitLines } from './info-table-block.js';
import { locateHeader, stripSeparatorLines, type FixedWidthField, type FieldOffset, type HeaderLocation } from './header-locator.js';

export interface FieldSpan {
  field: FixedWidthField;
  start: number;
  /** Exclusive; null runs to end of line */
  end: number | null;
}

export interface FixedWidthOptions {
  margin?: number;
}

export function computeSpans(fields: readonly FieldOffset[]): FieldSpan[] {
  const ordered = [...fields].sort((a, b) => a.start - b.start);
  return ordered.map((f, i) => ({
    field: f.field,
    start: f.start,
    end: i + 1 < ordered.length ? ordered[i + 1].start : null,
  }));
}

function sliceSpan(line: string, span: FieldSpan): string {
  const raw = span.end === null ? line.slice(span.start) : line.slice(span.start, span.end);
  return raw.trim();
}

/**
 * Slice the data lines under a located header. Stops at GRAND TOTAL and
 * drops lines whose CUSIP and value slices are both empty.
 */
export function parseFixedWidthRows(lines: readonly string[], location: HeaderLocation): Array<Record<string, string>> {
  const spans = computeSpans(location.fields);
  const rows: Array<Record<string, string>> = [];

  for (const line of lines.slice(location.dataStartIndex)) {
    if (!line.trim()) continue;
    if (line.toUpperCase().includes('GRAND TOTAL')) break;

    const row: Record<string, string> = {};
    for (const span of spans) {
      row[span.field] = sliceSpan(line, span);
    }
    if (!row.cusip && !row.value) continue;
    rows.push(row);
  }

  return rows;
}

/**
 * Parse the fixed-width table out of a submission (or an already
 * narrowed block). Throws HeaderNotFoundError when no header exists.
 */
export function parseFixedWidthTable(text: string, options: FixedWidthOptions = {}): RawTable {
  const lines = stripSeparatorLines(splitLines(extractInfoTableBlock(text)));
  const location = locateHeader(lines, { margin: options.margin });
  return {
    columns: location.fields.map(f => f.field),
    rows: parseFixedWidthRows(lines, location),
  };
}

/**
 * Integer or null. Thousands separators are stripped; anything that is
 * not a plain non-negative integer afterwards is missing.
 */
export function toInteger(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const cleaned = text.replace(/,/g, '').trim();
  if (!/^\d+$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isSafeInteger(value) ? value : null;
}
