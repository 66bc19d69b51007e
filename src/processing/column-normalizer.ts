/**
 * Maps each strategy's native column names onto the canonical holdings
 * schema and coerces the numeric fields.
 */

import { CANONICAL_COLUMNS } from '../core/types.js';
import type { CanonicalColumn, HoldingRecord, RawTable, StrategyName } from '../core/types.js';
import { toInteger } from './fixed-width-parser.js';

/** Element names of the XML information table */
export const XBRL_COLUMN_MAP: Record<string, CanonicalColumn> = {
  nameOfIssuer: 'name',
  titleOfClass: 'title',
  cusip: 'cusip',
  value: 'value_x1000',
  sshPrnamt: 'shares',
  sshPrnamtType: 'share_unit',
  putCall: 'put_call',
  investmentDiscretion: 'discretion',
  otherManager: 'other_managers',
  votingAuthoritySole: 'voting_sole',
  votingAuthorityShared: 'voting_shared',
  votingAuthorityNone: 'voting_none',
};

/** Legacy fixed-width abbreviations */
export const FIXED_WIDTH_COLUMN_MAP: Record<string, CanonicalColumn> = {
  name: 'name',
  title: 'title',
  cusip: 'cusip',
  value: 'value_x1000',
  shares: 'shares',
  sh_prn: 'share_unit',
  putcall: 'put_call',
  discr: 'discretion',
  mgrs: 'other_managers',
  v_sole: 'voting_sole',
  v_shared: 'voting_shared',
  v_none: 'voting_none',
};

/**
 * Printed headers of markup tables vary per filer agent, so they are
 * matched by keyword (first rule wins).
 */
export const MARKUP_HEADER_RULES: Array<[RegExp, CanonicalColumn]> = [
  [/NAME OF ISSUER|^ISSUER$/, 'name'],
  [/TITLE/, 'title'],
  [/CUSIP/, 'cusip'],
  [/VOTING.*SOLE|^SOLE$/, 'voting_sole'],
  [/VOTING.*SHARED|^SHARED$/, 'voting_shared'],
  [/VOTING.*NONE|^NONE$/, 'voting_none'],
  [/PUT\s*\/?\s*CALL/, 'put_call'],
  [/SH\s*\/\s*PRN|^PRN$|SHARE TYPE/, 'share_unit'],
  [/SHRS|SHARES|PRN AMT|AMOUNT/, 'shares'],
  [/VALUE/, 'value_x1000'],
  [/DISCRETION|DSCRETN|INVSTMT/, 'discretion'],
  [/MANAGER/, 'other_managers'],
];

function markupColumnFor(header: string): CanonicalColumn | null {
  const upper = header.toUpperCase().trim();
  for (const [pattern, column] of MARKUP_HEADER_RULES) {
    if (pattern.test(upper)) return column;
  }
  return null;
}

function canonicalFor(column: string, strategy: StrategyName): CanonicalColumn | null {
  switch (strategy) {
    case 'structured-object':
    case 'sgml-xml':
      return XBRL_COLUMN_MAP[column] ?? null;
    case 'fixed-width':
      return FIXED_WIDTH_COLUMN_MAP[column] ?? null;
    case 'embedded-markup':
      return markupColumnFor(column);
  }
}

/**
 * Rename the columns this strategy is known to produce. Unrecognized
 * columns keep their name; the first column claiming a canonical name wins.
 */
export function renameColumns(table: RawTable, strategy: StrategyName): RawTable {
  const mapping = new Map<string, string>();
  const claimed = new Set<string>();
  for (const column of table.columns) {
    const canonical = canonicalFor(column, strategy);
    if (canonical && !claimed.has(canonical)) {
      claimed.add(canonical);
      mapping.set(column, canonical);
    } else {
      mapping.set(column, column);
    }
  }

  return {
    columns: table.columns.map(c => mapping.get(c) ?? c),
    rows: table.rows.map(row => {
      const renamed: Record<string, string> = {};
      for (const [key, value] of Object.entries(row)) {
        renamed[mapping.get(key) ?? key] = value;
      }
      return renamed;
    }),
  };
}

export interface NormalizedTable {
  columns: CanonicalColumn[];
  records: HoldingRecord[];
  unmappedColumns: string[];
}

const CANONICAL_SET: ReadonlySet<string> = new Set(CANONICAL_COLUMNS);
const TOTAL_ROW = /^(GRAND\s+)?TOTALS?\b/i;

function toRecord(row: Record<string, string>): HoldingRecord {
  const text = (column: CanonicalColumn): string => (row[column] ?? '').trim();
  const record: HoldingRecord = {
    name: text('name'),
    title: text('title'),
    cusip: text('cusip'),
    value_x1000: toInteger(row.value_x1000),
    shares: toInteger(row.shares),
    share_unit: text('share_unit'),
    put_call: text('put_call'),
    discretion: text('discretion'),
    other_managers: text('other_managers'),
    voting_sole: toInteger(row.voting_sole),
    voting_shared: toInteger(row.voting_shared),
    voting_none: toInteger(row.voting_none),
    low_confidence: false,
  };
  record.low_confidence = record.voting_sole === null && record.voting_shared === null && record.voting_none === null;
  return record;
}

/**
 * Rows of a markup table that are not holdings: blank continuation lines
 * (no CUSIP, no value) and total lines without a CUSIP.
 */
export function isNoiseRecord(record: HoldingRecord): boolean {
  if (record.cusip) return false;
  return record.value_x1000 === null || TOTAL_ROW.test(record.name);
}

/**
 * Project a strategy's table onto the canonical schema. The column list is
 * the same whichever strategy produced the table.
 */
export function normalizeTable(table: RawTable, strategy: StrategyName): NormalizedTable {
  const renamed = renameColumns(table, strategy);
  const records = renamed.rows.map(toRecord);
  return {
    columns: [...CANONICAL_COLUMNS],
    // Fixed-width rows are filtered while slicing; XML rows are never noise
    records: strategy === 'embedded-markup' ? records.filter(r => !isNoiseRecord(r)) : records,
    unmappedColumns: renamed.columns.filter(c => !CANONICAL_SET.has(c)),
  };
}
