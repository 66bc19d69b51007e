/**
 * Picks the single authoritative filing for each reporting period.
 *
 * Amendments supersede originals; among filings of the same kind the
 * most recently filed one wins.
 */

import { AMENDMENT_FORM, BASE_FORM } from '../core/types.js';
import type { Filing, Period } from '../core/types.js';
import type { PeriodFilter } from './period-filter.js';

function compareFilings(a: Filing, b: Filing): number {
  if (a.filingDate !== b.filingDate) return a.filingDate < b.filingDate ? -1 : 1;
  if (a.accessionNumber !== b.accessionNumber) return a.accessionNumber < b.accessionNumber ? -1 : 1;
  return 0;
}

function formIs(filing: Filing, form: string): boolean {
  return filing.formType.trim().toUpperCase() === form;
}

/** Ascending by (filingDate, accessionNumber); stable for exact ties */
export function sortFilings(filings: readonly Filing[]): Filing[] {
  return [...filings].sort(compareFilings);
}

export function pickAuthoritativeFiling(filings: readonly Filing[]): Filing {
  if (filings.length === 0) {
    throw new Error('Cannot pick an authoritative filing from an empty period bucket');
  }
  const sorted = sortFilings(filings);

  const amendments = sorted.filter(f => formIs(f, AMENDMENT_FORM));
  if (amendments.length > 0) return amendments[amendments.length - 1];

  const originals = sorted.filter(f => formIs(f, BASE_FORM));
  if (originals.length > 0) return originals[originals.length - 1];

  return sorted[sorted.length - 1];
}

/**
 * Group wanted filings by period of report, in ascending period order.
 * Filings with no period are dropped.
 */
export function bucketFilingsByPeriod(filings: readonly Filing[], filter: PeriodFilter): Map<Period, Filing[]> {
  const buckets = new Map<Period, Filing[]>();
  for (const filing of filings) {
    const period = filing.periodOfReport;
    if (!period || !filter.matches(period)) continue;
    const bucket = buckets.get(period);
    if (bucket) {
      bucket.push(filing);
    } else {
      buckets.set(period, [filing]);
    }
  }
  return new Map([...buckets.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export interface ResolvedFiling {
  filing: Filing;
  /** The filing chosen for its period */
  authoritative: boolean;
}

/**
 * Every filing with a flag marking the one that speaks for its period.
 * Ordered by period, then by filing date.
 */
export function markAuthoritativeFilings(filings: readonly Filing[]): ResolvedFiling[] {
  const byPeriod = new Map<Period, Filing[]>();
  for (const filing of filings) {
    const bucket = byPeriod.get(filing.periodOfReport);
    if (bucket) {
      bucket.push(filing);
    } else {
      byPeriod.set(filing.periodOfReport, [filing]);
    }
  }

  const resolved: ResolvedFiling[] = [];
  for (const period of [...byPeriod.keys()].sort()) {
    const bucket = byPeriod.get(period) ?? [];
    const chosen = pickAuthoritativeFiling(bucket);
    for (const filing of sortFilings(bucket)) {
      resolved.push({ filing, authoritative: filing === chosen });
    }
  }
  return resolved;
}
