/**
 * Batch extraction engine.
 *
 * Buckets filings by reporting period, picks one authoritative filing per
 * period and extracts it. Periods run one after another, never
 * concurrently (EDGAR fair access), and a failure in one period is
 * recorded without stopping the rest.
 *
 * Returns data, never prints; used by the CLI, the MCP server and the
 * web API.
 */

import { ConfigError, ExtractionExhaustedError } from './errors.js';
import { extractFiling, type ExtractionOptions, type FilingSource } from './extraction-chain.js';
import { createSecFilingSource } from './filing-source.js';
import type { Logger } from './logger.js';
import { resolveCompanyWithSuggestions } from './resolver.js';
import type { SecClient } from './sec-client.js';
import type { CikLookup, ExtractionResult, Filing, Period, StrategyAttempt } from './types.js';
import { bucketFilingsByPeriod, markAuthoritativeFilings, pickAuthoritativeFiling, type ResolvedFiling } from '../processing/amendment-resolver.js';
import { buildPeriodFilter, type PeriodFilter, type PeriodFilterOptions } from '../processing/period-filter.js';

export interface PeriodSuccess {
  period: Period;
  filing: Filing;
  /** Filings found for the period before amendment resolution */
  candidates: number;
  result: ExtractionResult;
}

export interface PeriodFailure {
  period: Period;
  filing: Filing | null;
  candidates: number;
  reason: string;
  /** Strategy attempts, when the chain ran to exhaustion */
  attempts: StrategyAttempt[];
}

export interface RunSummary {
  periods: Period[];
  successes: PeriodSuccess[];
  failures: PeriodFailure[];
}

export interface RunParams {
  filings: readonly Filing[];
  filter: PeriodFilter;
  openSource: (filing: Filing) => FilingSource;
  logger: Logger;
  options?: ExtractionOptions;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function runExtraction(params: RunParams): Promise<RunSummary> {
  const { filings, filter, openSource, logger, options } = params;
  const buckets = bucketFilingsByPeriod(filings, filter);
  const summary: RunSummary = { periods: [...buckets.keys()], successes: [], failures: [] };

  logger.info({ periods: summary.periods.length, filings: filings.length }, 'starting extraction run');

  for (const [period, bucket] of buckets) {
    let filing: Filing | null = null;
    try {
      filing = pickAuthoritativeFiling(bucket);
      logger.info({ period, accessionNumber: filing.accessionNumber, formType: filing.formType, candidates: bucket.length }, 'processing period');

      const outcome = await extractFiling(filing, openSource(filing), logger, options);
      if (outcome.success) {
        summary.successes.push({ period, filing, candidates: bucket.length, result: outcome.result });
      } else {
        summary.failures.push({
          period,
          filing,
          candidates: bucket.length,
          reason: outcome.error.message,
          attempts: outcome.error.attempts,
        });
      }
    } catch (err) {
      // Anything unexpected stays confined to this period
      logger.error({ period, err }, 'period failed');
      summary.failures.push({
        period,
        filing,
        candidates: bucket.length,
        reason: describeError(err),
        attempts: err instanceof ExtractionExhaustedError ? err.attempts : [],
      });
    }
  }

  logger.info({ succeeded: summary.successes.length, failed: summary.failures.length }, 'extraction run finished');
  return summary;
}

// ── Company-level entry point ─────────────────────────────────────────

export interface CompanyExtractionParams extends PeriodFilterOptions {
  company: string;
  client: SecClient;
  logger: Logger;
  options?: ExtractionOptions;
}

export interface EngineError {
  type: 'invalid_filter' | 'company_not_found' | 'company_ambiguous' | 'no_filings';
  message: string;
  suggestions?: CikLookup[];
}

export type CompanyExtractionResult =
  | { success: true; company: CikLookup; filter: PeriodFilter; filings: Filing[]; summary: RunSummary }
  | { success: false; error: EngineError };

export type CompanyFilingsResult =
  | { success: true; company: CikLookup; filings: ResolvedFiling[] }
  | { success: false; error: EngineError };

type FilerLookup =
  | { success: true; company: CikLookup; filings: Filing[] }
  | { success: false; error: EngineError };

/** Resolve the filer and list its 13F filings; the name falls back to the submissions record */
async function lookupFiler(client: SecClient, query: string): Promise<FilerLookup> {
  const resolved = await resolveCompanyWithSuggestions(client, query);
  if (!resolved.company) {
    return resolved.suggestions.length > 0
      ? { success: false, error: { type: 'company_ambiguous', message: `Ambiguous company: "${query}"`, suggestions: resolved.suggestions } }
      : { success: false, error: { type: 'company_not_found', message: `Could not find company: "${query}". Try its CIK.` } };
  }

  const filings = await client.list13fFilings(resolved.company.cik);
  const company: CikLookup = {
    ...resolved.company,
    name: resolved.company.name || filings[0]?.companyName || `CIK ${resolved.company.cik}`,
  };
  return { success: true, company, filings };
}

/** A filer's 13F filings, each flagged when it is the one used for its period */
export async function listFilingsForCompany(client: SecClient, query: string): Promise<CompanyFilingsResult> {
  const lookup = await lookupFiler(client, query);
  if (!lookup.success) return lookup;
  return { success: true, company: lookup.company, filings: markAuthoritativeFilings(lookup.filings) };
}

/**
 * Resolve a filer, list its 13F filings and extract every wanted period.
 * Filters are validated before anything is fetched.
 */
export async function extractHoldingsForCompany(params: CompanyExtractionParams): Promise<CompanyExtractionResult> {
  const { company: query, client, logger, options } = params;

  let filter: PeriodFilter;
  try {
    filter = buildPeriodFilter({ years: params.years, quarters: params.quarters, from: params.from, to: params.to });
  } catch (err) {
    if (err instanceof ConfigError) {
      return { success: false, error: { type: 'invalid_filter', message: err.message } };
    }
    throw err;
  }

  const lookup = await lookupFiler(client, query);
  if (!lookup.success) return lookup;
  const { company, filings } = lookup;

  if (filings.length === 0) {
    return { success: false, error: { type: 'no_filings', message: `No 13F-HR filings found for ${company.name}` } };
  }

  const summary = await runExtraction({
    filings,
    filter,
    openSource: filing => createSecFilingSource(client, filing, logger),
    logger: logger.child({ cik: company.cik }),
    options,
  });

  return { success: true, company, filter, filings, summary };
}
