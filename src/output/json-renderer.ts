import type { RunSummary } from '../core/holdings-engine.js';
import type { CikLookup, Filing, StrategyAttempt } from '../core/types.js';
import type { OutputFiles } from './file-writer.js';

/**
 * Renders extraction runs as structured JSON for programmatic use.
 * Shared by the CLI (--json), the MCP server and the web API.
 */

export interface SerializeOptions {
  /** Include the holdings rows themselves, not just counts */
  includeRecords?: boolean;
  files?: OutputFiles | null;
}

function serializeFiling(filing: Filing) {
  return {
    accession_number: filing.accessionNumber,
    form_type: filing.formType,
    filing_date: filing.filingDate,
    period_of_report: filing.periodOfReport,
  };
}

function serializeAttempts(attempts: readonly StrategyAttempt[]) {
  return attempts.map(a => ({ strategy: a.strategy, status: a.status, reason: a.reason, rows: a.rows }));
}

export function serializeRun(company: CikLookup, summary: RunSummary, options: SerializeOptions = {}) {
  const { includeRecords = false, files = null } = options;

  return {
    company: { cik: company.cik, ticker: company.ticker || null, name: company.name },
    totals: {
      periods: summary.periods.length,
      succeeded: summary.successes.length,
      failed: summary.failures.length,
    },
    periods: summary.successes.map(s => ({
      period: s.period,
      filing: serializeFiling(s.filing),
      candidates: s.candidates,
      strategy: s.result.strategy,
      holdings: s.result.records.length,
      low_confidence_rows: s.result.low_confidence_rows,
      unmapped_columns: s.result.unmapped_columns,
      attempts: serializeAttempts(s.result.attempts),
      file: files?.periods[s.period] ?? null,
      records: includeRecords ? s.result.records : undefined,
    })),
    failures: summary.failures.map(f => ({
      period: f.period,
      filing: f.filing ? serializeFiling(f.filing) : null,
      candidates: f.candidates,
      reason: f.reason,
      attempts: serializeAttempts(f.attempts),
      saved_text: files?.failed[f.period] ?? null,
    })),
    files: files
      ? { outdir: files.outdir, years: files.years, master: files.master, report: files.report }
      : null,
  };
}

export function renderRunJson(company: CikLookup, summary: RunSummary, options: SerializeOptions = {}): string {
  return JSON.stringify(serializeRun(company, summary, options), null, 2);
}
