/**
 * Narrows a raw submission down to the information-table section.
 */

const START_MARKER = 'form 13f information table';
const END_MARKER = 'grand total';

/**
 * Text between "form 13f information table" and "grand total"
 * (case-insensitive, end marker included). Without the start marker the
 * whole text is the block; without the end marker the block runs to EOF.
 */
export function extractInfoTableBlock(text: string): string {
  const lower = text.toLowerCase();
  const start = lower.indexOf(START_MARKER);
  if (start === -1) return text;
  const end = lower.indexOf(END_MARKER, start);
  return end === -1 ? text.slice(start) : text.slice(start, end + END_MARKER.length);
}

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
