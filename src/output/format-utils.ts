/**
 * Column padding for the terminal tables and CSV cell quoting for the
 * holdings files.
 */

const ANSI_SGR = /\x1b\[[0-9;]*m/g;
const NEEDS_QUOTES = /[",\r\n]|^\s|\s$/;

/** Pad to a visible width; colour codes take no columns */
export function padRight(str: string, len: number): string {
  const visible = str.replace(ANSI_SGR, '').length;
  return str + ' '.repeat(Math.max(0, len - visible));
}

/** Quote a CSV cell holding CSV syntax or leading/trailing whitespace */
export function csvEscape(value: string): string {
  if (!NEEDS_QUOTES.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/** One CSV line; null cells are empty */
export function csvLine(values: ReadonlyArray<string | number | boolean | null>): string {
  return values.map(value => (value === null ? '' : csvEscape(String(value)))).join(',');
}
