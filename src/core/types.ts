/**
 * Core data model for edgar-13f-holdings.
 *
 * Design principles:
 * - Filings are immutable once retrieved
 * - One authoritative filing per reporting period
 * - Every extracted table carries the strategy that produced it
 * - Numeric holdings fields are an integer or null, never an unparsed string
 */

export const FORM_TYPES = ['13F-HR', '13F-HR/A', '13F-NT', '13F-NT/A'] as const;
export type FormType = (typeof FORM_TYPES)[number];

export const BASE_FORM: FormType = '13F-HR';
export const AMENDMENT_FORM: FormType = '13F-HR/A';

export interface Filing {
  readonly cik: string;
  readonly accessionNumber: string;
  readonly filingDate: string;
  readonly formType: FormType;
  /** Quarter-end date (YYYY-MM-DD) the filing reports on */
  readonly periodOfReport: string;
  readonly companyName?: string;
}

/** Quarter-end date string, YYYY-MM-DD */
export type Period = string;

export interface CikLookup {
  cik: string;
  ticker: string;
  name: string;
}

// ── Holdings ───────────────────────────────────────────────────────────

export const CANONICAL_COLUMNS = [
  'name',
  'title',
  'cusip',
  'value_x1000',
  'shares',
  'share_unit',
  'put_call',
  'discretion',
  'other_managers',
  'voting_sole',
  'voting_shared',
  'voting_none',
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

export const NUMERIC_COLUMNS = ['value_x1000', 'shares', 'voting_sole', 'voting_shared', 'voting_none'] as const;
export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];
export type TextColumn = Exclude<CanonicalColumn, NumericColumn>;

export type HoldingRecord = { [K in TextColumn]: string } & { [K in NumericColumn]: number | null } & {
  /** All three voting-authority fields are missing */
  low_confidence: boolean;
};

/** A strategy's native table, before column normalization */
export interface RawTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

// ── Strategies ─────────────────────────────────────────────────────────

export const STRATEGY_ORDER = ['structured-object', 'sgml-xml', 'embedded-markup', 'fixed-width'] as const;
export type StrategyName = (typeof STRATEGY_ORDER)[number];

export type StrategyOutcome =
  | { status: 'not_applicable'; strategy: StrategyName; reason: string }
  | { status: 'failed'; strategy: StrategyName; reason: string }
  | { status: 'succeeded'; strategy: StrategyName; table: RawTable };

/** Outcome of one strategy attempt, without the table payload */
export interface StrategyAttempt {
  strategy: StrategyName;
  status: StrategyOutcome['status'];
  reason: string | null;
  rows: number;
}

export interface ExtractionResult {
  filing: Filing;
  period: Period;
  /** Strategy that produced the table */
  strategy: StrategyName;
  columns: CanonicalColumn[];
  records: HoldingRecord[];
  attempts: StrategyAttempt[];
  unmapped_columns: string[];
  low_confidence_rows: number;
}
