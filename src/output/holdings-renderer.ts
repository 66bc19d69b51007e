/**
 * Renders extracted holdings as CSV for spreadsheet import, and names the
 * files they are written to.
 */

import { CANONICAL_COLUMNS } from '../core/types.js';
import type { HoldingRecord, Period } from '../core/types.js';
import { csvLine } from './format-utils.js';

export interface PeriodHoldings {
  period: Period;
  records: readonly HoldingRecord[];
}

export const HOLDINGS_CSV_HEADER = ['period_of_report', ...CANONICAL_COLUMNS, 'low_confidence'];

/** One CSV over any number of periods; each row starts with its period */
export function renderHoldingsCsv(tables: readonly PeriodHoldings[]): string {
  const lines: string[] = [csvLine(HOLDINGS_CSV_HEADER)];

  for (const { period, records } of tables) {
    for (const record of records) {
      lines.push(csvLine([period, ...CANONICAL_COLUMNS.map(column => record[column]), record.low_confidence]));
    }
  }

  return lines.join('\n');
}

// ── File names ────────────────────────────────────────────────────────

/** Lower-case, at most 15 characters, safe in a file name */
export function companyFileStem(companyName: string): string {
  const stem = companyName.toLowerCase().replace(/[^a-z0-9._-]/g, '').slice(0, 15);
  return stem || 'filer';
}

/** 2013-03-31 -> Q12013 */
export function quarterLabel(period: Period): string {
  const year = period.slice(0, 4);
  const month = parseInt(period.slice(5, 7), 10);
  return `Q${Math.floor((month - 1) / 3) + 1}${year}`;
}

export function periodCsvFileName(companyName: string, period: Period): string {
  return `${companyFileStem(companyName)}_${quarterLabel(period)}_${period.replace(/-/g, '')}.csv`;
}

export function yearCsvFileName(companyName: string, year: string): string {
  return `${companyFileStem(companyName)}_${year}.csv`;
}

export function masterCsvFileName(companyName: string): string {
  return `${companyFileStem(companyName)}_MASTER.csv`;
}

export function failedTextFileName(companyName: string, period: Period): string {
  return `${companyFileStem(companyName)}_${period}.txt`;
}

export function reportFileName(companyName: string): string {
  return `${companyFileStem(companyName)}_REPORT.txt`;
}
