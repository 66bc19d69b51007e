import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunSummary } from '../core/holdings-engine.js';
import type { Logger } from '../core/logger.js';
import type { CikLookup, Filing, Period } from '../core/types.js';
import {
  failedTextFileName,
  masterCsvFileName,
  periodCsvFileName,
  renderHoldingsCsv,
  reportFileName,
  yearCsvFileName,
  type PeriodHoldings,
} from './holdings-renderer.js';
import { renderReportText } from './report-renderer.js';

/**
 * Writes an extraction run to disk:
 *   <outdir>/<company>_Q<q><yyyy>_<yyyymmdd>.csv   one per successful period
 *   <outdir>/<company>_<yyyy>.csv                  with perYearCombined
 *   <outdir>/<company>_MASTER.csv                  with masterCombined
 *   <outdir>/failed/<company>_<period>.txt         raw text of failed filings
 *   <outdir>/<company>_REPORT.txt
 */

/** Paths relative to outdir */
export interface OutputFiles {
  outdir: string;
  periods: Record<Period, string>;
  failed: Record<Period, string>;
  years: string[];
  master: string | null;
  report: string | null;
}

export interface WriteOptions {
  outdir: string;
  logger: Logger;
  /** Human description of the period filter, for the report */
  filter: string;
  perYearCombined?: boolean;
  masterCombined?: boolean;
  /** Raw submission text of a failed filing, saved for inspection */
  failedText?: (filing: Filing) => Promise<string>;
}

function csvBody(tables: readonly PeriodHoldings[]): string {
  return renderHoldingsCsv(tables) + '\n';
}

export async function writeRunOutputs(company: CikLookup, summary: RunSummary, options: WriteOptions): Promise<OutputFiles> {
  const { outdir, logger } = options;
  const files: OutputFiles = { outdir, periods: {}, failed: {}, years: [], master: null, report: null };

  await mkdir(outdir, { recursive: true });

  const byYear = new Map<string, PeriodHoldings[]>();
  const all: PeriodHoldings[] = [];

  for (const success of summary.successes) {
    const table: PeriodHoldings = { period: success.period, records: success.result.records };
    const name = periodCsvFileName(company.name, success.period);
    await writeFile(join(outdir, name), csvBody([table]), 'utf-8');
    files.periods[success.period] = name;
    logger.info({ period: success.period, file: name, holdings: table.records.length }, 'saved holdings');

    all.push(table);
    const year = success.period.slice(0, 4);
    const yearTables = byYear.get(year);
    if (yearTables) {
      yearTables.push(table);
    } else {
      byYear.set(year, [table]);
    }
  }

  if (options.perYearCombined) {
    for (const [year, tables] of byYear) {
      const name = yearCsvFileName(company.name, year);
      await writeFile(join(outdir, name), csvBody(tables), 'utf-8');
      files.years.push(name);
    }
  }

  if (options.masterCombined && all.length > 0) {
    const name = masterCsvFileName(company.name);
    await writeFile(join(outdir, name), csvBody(all), 'utf-8');
    files.master = name;
  }

  if (options.failedText) {
    for (const failure of summary.failures) {
      if (!failure.filing) continue;
      try {
        const text = await options.failedText(failure.filing);
        await mkdir(join(outdir, 'failed'), { recursive: true });
        const name = `failed/${failedTextFileName(company.name, failure.period)}`;
        await writeFile(join(outdir, name), text, 'latin1');
        files.failed[failure.period] = name;
      } catch (err) {
        // The report still lists the failure; only the raw copy is missing
        logger.warn({ period: failure.period, err }, 'could not save failed filing text');
      }
    }
  }

  const reportName = reportFileName(company.name);
  files.report = reportName;
  await writeFile(
    join(outdir, reportName),
    renderReportText({ company, filter: options.filter, summary, files }) + '\n',
    'utf-8'
  );

  return files;
}
