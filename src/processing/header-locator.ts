/**
 * Header discovery for legacy fixed-width information tables.
 *
 * Finds the column-header line and infers where each field starts. Offsets
 * are character positions in the header (or its voting sub-header) line;
 * data lines are assumed to be aligned to them.
 */

import { DEFAULT_COLUMN_MARGIN } from '../core/config.js';
import { HeaderNotFoundError } from '../core/errors.js';

export const FIXED_WIDTH_FIELDS = [
  'name',
  'title',
  'cusip',
  'value',
  'shares',
  'sh_prn',
  'putcall',
  'discr',
  'mgrs',
  'v_sole',
  'v_shared',
  'v_none',
] as const;

export type FixedWidthField = (typeof FIXED_WIDTH_FIELDS)[number];

export interface FieldOffset {
  field: FixedWidthField;
  start: number;
  /** Offset was guessed from the previous column plus the margin */
  inferred: boolean;
}

export interface HeaderLocation {
  headerIndex: number;
  subHeaderIndex: number | null;
  dataStartIndex: number;
  /** Sorted ascending by start offset */
  fields: FieldOffset[];
}

export interface HeaderLocatorOptions {
  /** Spacing assumed for a missing voting sub-column */
  margin?: number;
}

const HEADER_KEYWORDS: Array<[FixedWidthField, string[]]> = [
  ['name', ['NAME OF ISSUER']],
  ['title', ['TITLE OF']],
  ['cusip', ['CUSIP']],
  ['value', ['VALUE']],
  ['shares', ['SHRS OR PRN AMT', 'SHRS OR']],
  ['sh_prn', ['SH/']],
  ['putcall', ['PUT/CALL']],
  ['discr', ['INVESTMENT DISCRETION']],
  ['mgrs', ['OTHER MANAGERS']],
];

const SEPARATOR_ONLY = /^[-=<>_\s]*$/;
const SGML_TAGS_ONLY = /^(\s*<\/?(S|C|TABLE|CAPTION|PAGE|FN)>\s*)+$/i;
const SUB_HEADER_VOCABULARY = /\b(SOLE|SHARED|NONE|VOTING|AUTHORITY|PRN|AMT|DISCRETION|DSCRETN|MANAGERS|CLASS|CALL)\b|X\$1000/;
const CUSIP_TOKEN = /\b[0-9A-Z]{8}[0-9]\b|\b[0-9A-Z]{6}([ -])[0-9A-Z]{2}\1[0-9]\b/;

/**
 * Drop lines made only of separator characters (- = < > _), blank
 * lines, and lines holding nothing but legacy SGML column tags.
 */
export function stripSeparatorLines(lines: readonly string[]): string[] {
  return lines.filter(line => !SEPARATOR_ONLY.test(line) && !SGML_TAGS_ONLY.test(line));
}

function findOffset(line: string, needle: string): number | null {
  const idx = line.toUpperCase().indexOf(needle);
  return idx === -1 ? null : idx;
}

export function isHeaderLine(line: string): boolean {
  const upper = line.toUpperCase();
  return upper.includes('NAME OF ISSUER') && upper.includes('CUSIP') && upper.includes('VALUE');
}

/** Continuation of a header: header vocabulary and no CUSIP-shaped token */
export function isSubHeaderLine(line: string): boolean {
  const upper = line.toUpperCase();
  if (upper.includes('GRAND TOTAL')) return false;
  return SUB_HEADER_VOCABULARY.test(upper) && !CUSIP_TOKEN.test(upper);
}

export function locateHeader(lines: readonly string[], options: HeaderLocatorOptions = {}): HeaderLocation {
  const margin = options.margin ?? DEFAULT_COLUMN_MARGIN;

  const headerIndex = lines.findIndex(isHeaderLine);
  if (headerIndex === -1) {
    throw new HeaderNotFoundError(lines.length);
  }

  const header = lines[headerIndex];
  const next = headerIndex + 1 < lines.length ? lines[headerIndex + 1] : '';
  const subHeaderIndex = next && isSubHeaderLine(next) ? headerIndex + 1 : null;
  // Voting sub-columns live on the sub-header when there is one
  const votingLine = subHeaderIndex !== null ? next : header;

  const fields: FieldOffset[] = [];
  for (const [field, needles] of HEADER_KEYWORDS) {
    for (const needle of needles) {
      const start = findOffset(header, needle);
      if (start !== null) {
        fields.push({ field, start, inferred: false });
        break;
      }
    }
  }

  const votingBlock = findOffset(header, 'VOTING AUTHORITY') ?? (subHeaderIndex !== null ? findOffset(next, 'VOTING AUTHORITY') : null);
  const soleOffset = findOffset(votingLine, 'SOLE');
  if (votingBlock !== null || (subHeaderIndex !== null && soleOffset !== null)) {
    const sole = soleOffset ?? votingBlock ?? 0;
    fields.push({ field: 'v_sole', start: sole, inferred: soleOffset === null });

    const sharedOffset = findOffset(votingLine, 'SHARED');
    const shared = sharedOffset ?? sole + margin;
    fields.push({ field: 'v_shared', start: shared, inferred: sharedOffset === null });

    const noneOffset = findOffset(votingLine, 'NONE');
    fields.push({ field: 'v_none', start: noneOffset ?? shared + margin, inferred: noneOffset === null });
  }

  fields.sort((a, b) => a.start - b.start);

  return {
    headerIndex,
    subHeaderIndex,
    dataStartIndex: (subHeaderIndex ?? headerIndex) + 1,
    fields,
  };
}
