/**
 * Recovers an information table from HTML fragments embedded in a text
 * submission (mid-2000s filers often pasted an HTML table into the .txt).
 */

import * as cheerio from 'cheerio';
import type { RawTable } from '../core/types.js';
import { toInteger } from './fixed-width-parser.js';

const TABLE_MARKERS = ['information table', 'name of issuer'];
const MAX_COLSPAN = 20;

const REPEATED_HEADER = /^(NAME OF ISSUER|TITLE OF CLASS|CUSIP|MARKET VALUE)\b/;
const VOTING_SUB_HEADERS = new Set(['SOLE', 'SHARED', 'NONE']);
const SEPARATOR_CELL = /^[-=_]+$/;
const CUSIP_CELL = /^[0-9A-Z]{6}[-\s]?[0-9A-Z]{2}[-\s]?[0-9]$/;

type Grid = string[][];

function normalizeCell(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isEmptyRow(row: readonly string[]): boolean {
  return row.every(cell => cell === '');
}

function isVotingCell(cell: string): boolean {
  return VOTING_SUB_HEADERS.has(cell.toUpperCase());
}

/** Second header row: names voting sub-columns, carries no CUSIP and no amounts */
function isVotingSubHeader(row: readonly string[]): boolean {
  if (!row.some(isVotingCell)) return false;
  return !row.some(cell => CUSIP_CELL.test(cell.toUpperCase()) || toInteger(cell) !== null);
}

/**
 * Fold a sub-header row into the header labels. Voting cells under a
 * voting group (or under nothing) become `VOTING AUTHORITY <X>`; any other
 * text is appended to its group's label, as in `VALUE (X$1000)`.
 */
function mergeSubHeader(labels: string[], subHeader: readonly string[]): void {
  // Label of the nearest header cell at or left of the current one (colspan groups)
  let group = '';
  const width = Math.max(labels.length, subHeader.length);
  while (labels.length < width) labels.push('');
  for (let i = 0; i < width; i++) {
    const above = labels[i];
    if (above) group = above;
    const cell = subHeader[i] ?? '';
    if (!cell) continue;

    if (isVotingCell(cell) && (group === '' || group.toUpperCase().includes('VOTING'))) {
      labels[i] = `VOTING AUTHORITY ${cell.toUpperCase()}`;
    } else {
      labels[i] = group ? `${group} ${cell}` : cell;
    }
  }
}

function isRepeatedHeader(row: readonly string[]): boolean {
  return isVotingSubHeader(row) || row.some(cell => REPEATED_HEADER.test(cell.toUpperCase()));
}

function isSeparatorRow(row: readonly string[]): boolean {
  const filled = row.filter(cell => cell !== '');
  return filled.length > 0 && filled.every(cell => SEPARATOR_CELL.test(cell));
}

function uniqueColumns(labels: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return labels.map((label, i) => {
    const base = label || `column_${i + 1}`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

/**
 * Turn a grid of cell texts into a table. The header is the first row with
 * a CUSIP cell (else the first row); a row right under it with SOLE,
 * SHARED or NONE cells is a second header line.
 */
export function gridToTable(grid: Grid): RawTable | null {
  const rows = grid.filter(row => !isEmptyRow(row));
  if (rows.length === 0) return null;

  let headerIndex = rows.findIndex(row => row.some(cell => cell.toUpperCase().includes('CUSIP')));
  if (headerIndex === -1) headerIndex = 0;

  const labels = [...rows[headerIndex]];
  let bodyStart = headerIndex + 1;

  const subHeader = rows[headerIndex + 1];
  if (subHeader && isVotingSubHeader(subHeader)) {
    mergeSubHeader(labels, subHeader);
    bodyStart++;
  }

  const body = rows.slice(bodyStart).filter(row => !isRepeatedHeader(row) && !isSeparatorRow(row));
  const width = Math.max(labels.length, ...body.map(row => row.length));
  while (labels.length < width) labels.push('');
  const columns = uniqueColumns(labels);

  const records = body.map(row => {
    const record: Record<string, string> = {};
    columns.forEach((col, i) => {
      record[col] = row[i] ?? '';
    });
    return record;
  });

  if (records.length === 0 || columns.length === 0) return null;
  return { columns, rows: records };
}

/**
 * Find the markup table that holds the holdings and parse it. Returns null
 * when the block carries no such table or nothing survives filtering.
 */
export function parseEmbeddedMarkupTable(block: string): RawTable | null {
  const $ = cheerio.load(block, { xml: false });

  const candidates = $('table')
    .toArray()
    .filter(el => {
      const text = $(el).text().toLowerCase();
      return TABLE_MARKERS.some(marker => text.includes(marker));
    });

  // Innermost tables first: layout wrappers also contain the marker text
  candidates.sort((a, b) => $(a).find('table').length - $(b).find('table').length);

  const readGrid = (tableEl: (typeof candidates)[number]): Grid => {
    const grid: Grid = [];
    $(tableEl).find('tr').each((_, tr) => {
      // Rows of nested tables belong to those tables
      if ($(tr).closest('table').get(0) !== tableEl) return;

      const cells: string[] = [];
      $(tr)
        .children('td, th')
        .each((_, cell) => {
          cells.push(normalizeCell($(cell).text()));
          const span = parseInt($(cell).attr('colspan') ?? '1', 10);
          for (let i = 1; i < Math.min(Number.isNaN(span) ? 1 : span, MAX_COLSPAN); i++) {
            cells.push('');
          }
        });
      grid.push(cells);
    });
    return grid;
  };

  for (const el of candidates) {
    const table = gridToTable(readGrid(el));
    if (table) return table;
  }
  return null;
}
