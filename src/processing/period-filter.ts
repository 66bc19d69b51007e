/**
 * Reporting-period selection.
 *
 * Turns the user's year / quarter / date-range filters into a predicate
 * over quarter-end dates. A period is wanted only when it satisfies every
 * filter that was supplied.
 */

import { ConfigError } from '../core/errors.js';
import type { Period } from '../core/types.js';

const QUARTER_ENDS: Record<string, string> = {
  '1': '03-31',
  '2': '06-30',
  '3': '09-30',
  '4': '12-31',
};

const QUARTER_TOKEN = /^\d{4}Q[1-4]$/;
const YEAR_TOKEN = /^\d{4}$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface PeriodFilterOptions {
  years?: string[];
  quarters?: string[];
  from?: string;
  to?: string;
}

export interface PeriodFilter {
  years: ReadonlySet<string> | null;
  /** Quarter tokens already mapped to their period-end dates */
  quarterPeriods: ReadonlySet<Period> | null;
  from: string | null;
  to: string | null;
  matches(period: string | null | undefined): boolean;
}

/**
 * Map a YYYYQn token to its quarter-end date.
 * Lower-case `q` and surrounding whitespace are tolerated.
 */
export function quarterToPeriodEnd(token: string): Period {
  const normalized = token.trim().toUpperCase();
  if (normalized.length !== 6 || !QUARTER_TOKEN.test(normalized)) {
    throw new ConfigError(`Invalid quarter token: "${token}". Use YYYYQn (e.g., 2013Q1)`, token);
  }
  return `${normalized.slice(0, 4)}-${QUARTER_ENDS[normalized[5]]}`;
}

export function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function parseDateBound(value: string | undefined, label: string): string | null {
  if (value === undefined || value.trim() === '') return null;
  const trimmed = value.trim();
  if (!isValidIsoDate(trimmed)) {
    throw new ConfigError(`Invalid ${label} date: "${value}". Use YYYY-MM-DD`, value);
  }
  return trimmed;
}

function parseYears(years: string[] | undefined): Set<string> | null {
  if (!years || years.length === 0) return null;
  const result = new Set<string>();
  for (const y of years) {
    const trimmed = y.trim();
    if (!YEAR_TOKEN.test(trimmed)) {
      throw new ConfigError(`Invalid year: "${y}". Use a four-digit year (e.g., 2013)`, y);
    }
    result.add(trimmed);
  }
  return result;
}

/**
 * Build a period filter. At least one of years, quarters or a date bound
 * must be given; selecting everything by omission is a usage error.
 */
export function buildPeriodFilter(options: PeriodFilterOptions): PeriodFilter {
  const years = parseYears(options.years);
  const quarterPeriods = options.quarters && options.quarters.length > 0
    ? new Set(options.quarters.map(quarterToPeriodEnd))
    : null;
  const from = parseDateBound(options.from, 'from');
  const to = parseDateBound(options.to, 'to');

  if (!years && !quarterPeriods && !from && !to) {
    throw new ConfigError('Provide at least one filter: years, quarters, or a from/to date range');
  }
  if (from && to && from > to) {
    throw new ConfigError(`Invalid date range: from ${from} is after to ${to}`, `${from}..${to}`);
  }

  return {
    years,
    quarterPeriods,
    from,
    to,
    matches(period) {
      if (!period || !isValidIsoDate(period)) return false;
      if (years && !years.has(period.slice(0, 4))) return false;
      if (quarterPeriods && !quarterPeriods.has(period)) return false;
      if (from && period < from) return false;
      if (to && period > to) return false;
      return true;
    },
  };
}

export function describePeriodFilter(filter: PeriodFilter): string {
  const parts: string[] = [];
  if (filter.years) parts.push(`years ${[...filter.years].sort().join(', ')}`);
  if (filter.quarterPeriods) parts.push(`periods ${[...filter.quarterPeriods].sort().join(', ')}`);
  if (filter.from || filter.to) parts.push(`range ${filter.from ?? '…'} to ${filter.to ?? '…'}`);
  return parts.join(' and ');
}
