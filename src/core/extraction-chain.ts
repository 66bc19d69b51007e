/**
 * Per-filing extraction with ordered fallback.
 *
 * Strategies run in one fixed order over the enabled set:
 *   structured-object -> sgml-xml -> embedded-markup -> fixed-width
 * Each yields an explicit outcome (not applicable / failed / succeeded).
 * A thrown error or an empty table is a soft failure and the chain moves
 * on; only running out of strategies is reported to the caller.
 */

import { ExtractionExhaustedError, ParseError } from './errors.js';
import type { Logger } from './logger.js';
import { STRATEGY_ORDER } from './types.js';
import type { ExtractionResult, Filing, RawTable, StrategyAttempt, StrategyName, StrategyOutcome } from './types.js';
import { normalizeTable } from '../processing/column-normalizer.js';
import { parseFixedWidthTable } from '../processing/fixed-width-parser.js';
import { extractInfoTableBlock } from '../processing/info-table-block.js';
import { parseEmbeddedMarkupTable } from '../processing/markup-table-parser.js';
import { parseInformationTableXml, sgmlToXml } from '../processing/xml-table-parser.js';

/** Where a filing's raw material comes from; supplied by the caller */
export interface FilingSource {
  /** Pre-parsed information table, or null when the filing has none */
  structuredTable(): Promise<RawTable | null>;
  /** Full submission text (SGML envelope included) */
  submissionText(): Promise<string>;
}

export interface ExtractionOptions {
  /** Enabled strategies; order is always STRATEGY_ORDER. Defaults to all. */
  strategies?: readonly StrategyName[];
  /** Margin for missing voting sub-columns in fixed-width headers */
  columnMargin?: number;
}

export type ExtractionOutcome =
  | { success: true; result: ExtractionResult }
  | { success: false; error: ExtractionExhaustedError };

interface StrategyContext {
  source: FilingSource;
  options: ExtractionOptions;
  /** Submission text, fetched at most once per filing */
  text(): Promise<string>;
}

type Strategy = (ctx: StrategyContext) => Promise<StrategyOutcome>;

function tableOutcome(strategy: StrategyName, table: RawTable | null, emptyReason: string): StrategyOutcome {
  if (!table || table.rows.length === 0 || table.columns.length === 0) {
    return { status: 'failed', strategy, reason: emptyReason };
  }
  return { status: 'succeeded', strategy, table };
}

const STRATEGIES: Record<StrategyName, Strategy> = {
  'structured-object': async ({ source }) => {
    const table = await source.structuredTable();
    if (table === null) {
      return { status: 'not_applicable', strategy: 'structured-object', reason: 'no structured information table' };
    }
    return tableOutcome('structured-object', table, 'structured table is empty');
  },

  'sgml-xml': async ({ text }) => {
    const xml = sgmlToXml(await text());
    if (xml === null) {
      return { status: 'not_applicable', strategy: 'sgml-xml', reason: 'no XML payload in submission' };
    }
    return tableOutcome('sgml-xml', parseInformationTableXml(xml, 'sgml-xml'), 'no rows at known table locations');
  },

  'embedded-markup': async ({ text }) => {
    const block = extractInfoTableBlock(await text());
    if (!/<table\b/i.test(block)) {
      return { status: 'not_applicable', strategy: 'embedded-markup', reason: 'no markup table in text block' };
    }
    return tableOutcome('embedded-markup', parseEmbeddedMarkupTable(block), 'no markup table with holdings rows');
  },

  'fixed-width': async ({ text, options }) => {
    const block = extractInfoTableBlock(await text());
    return tableOutcome('fixed-width', parseFixedWidthTable(block, { margin: options.columnMargin }), 'no data lines under header');
  },
};

export const STRATEGY_DESCRIPTIONS: Record<StrategyName, string> = {
  'structured-object': 'Stand-alone information table XML published with the filing (2013 onward)',
  'sgml-xml': 'XML information table embedded in the SGML submission text',
  'embedded-markup': 'HTML <TABLE> inside the information table text block',
  'fixed-width': 'Column-aligned plain text table, sliced by header keyword offsets',
};

/** Enabled strategies in the fixed total order */
export function orderedStrategies(enabled?: readonly StrategyName[]): StrategyName[] {
  if (!enabled) return [...STRATEGY_ORDER];
  const wanted = new Set(enabled);
  return STRATEGY_ORDER.filter(s => wanted.has(s));
}

function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

function toAttempt(outcome: StrategyOutcome): StrategyAttempt {
  return outcome.status === 'succeeded'
    ? { strategy: outcome.strategy, status: outcome.status, reason: null, rows: outcome.table.rows.length }
    : { strategy: outcome.strategy, status: outcome.status, reason: outcome.reason, rows: 0 };
}

/** Run one strategy, folding anything it throws into a failed outcome */
async function runStrategy(name: StrategyName, ctx: StrategyContext): Promise<StrategyOutcome> {
  try {
    return await STRATEGIES[name](ctx);
  } catch (err) {
    const reason = err instanceof ParseError ? err.message : describeError(err);
    return { status: 'failed', strategy: name, reason };
  }
}

/**
 * Extract one filing's holdings. Never throws for strategy-level problems;
 * exhaustion comes back as a tagged error.
 */
export async function extractFiling(
  filing: Filing,
  source: FilingSource,
  logger: Logger,
  options: ExtractionOptions = {}
): Promise<ExtractionOutcome> {
  const log = logger.child({ cik: filing.cik, accessionNumber: filing.accessionNumber, period: filing.periodOfReport });

  let pendingText: Promise<string> | null = null;
  const ctx: StrategyContext = {
    source,
    options,
    text: () => {
      if (!pendingText) pendingText = source.submissionText();
      return pendingText;
    },
  };

  const attempts: StrategyAttempt[] = [];
  for (const name of orderedStrategies(options.strategies)) {
    const outcome = await runStrategy(name, ctx);

    if (outcome.status !== 'succeeded') {
      attempts.push(toAttempt(outcome));
      log.debug({ strategy: name, status: outcome.status, reason: outcome.reason }, 'strategy did not produce a table');
      continue;
    }

    const normalized = normalizeTable(outcome.table, name);
    if (normalized.records.length === 0) {
      const reason = 'no holdings rows left after normalization';
      attempts.push(toAttempt({ status: 'failed', strategy: name, reason }));
      log.debug({ strategy: name, status: 'failed', reason }, 'strategy did not produce a table');
      continue;
    }
    attempts.push({ ...toAttempt(outcome), rows: normalized.records.length });

    const lowConfidence = normalized.records.filter(r => r.low_confidence).length;
    if (lowConfidence > 0) {
      log.warn({ strategy: name, rows: lowConfidence }, 'rows without any voting-authority values');
    }
    log.info({ strategy: name, rows: normalized.records.length }, 'information table extracted');

    return {
      success: true,
      result: {
        filing,
        period: filing.periodOfReport,
        strategy: name,
        columns: normalized.columns,
        records: normalized.records,
        attempts,
        unmapped_columns: normalized.unmappedColumns,
        low_confidence_rows: lowConfidence,
      },
    };
  }

  const error = new ExtractionExhaustedError(filing, attempts);
  log.warn({ strategies: error.strategiesAttempted }, 'all extraction strategies failed');
  return { success: false, error };
}
