import chalk from 'chalk';
import type { RunSummary } from '../core/holdings-engine.js';
import type { CikLookup } from '../core/types.js';
import type { OutputFiles } from './file-writer.js';
import { padRight } from './format-utils.js';

/**
 * Processing report for an extraction run: totals, then each successful
 * period with its strategy and row count, then each failed period with
 * the reason and the strategies that were tried.
 */

export interface RunReport {
  company: CikLookup;
  /** Human description of the period filter */
  filter: string;
  summary: RunSummary;
  files: OutputFiles | null;
}

interface Palette {
  bold(text: string): string;
  dim(text: string): string;
  ok(text: string): string;
  fail(text: string): string;
  warn(text: string): string;
}

const PLAIN: Palette = {
  bold: t => t,
  dim: t => t,
  ok: t => t,
  fail: t => t,
  warn: t => t,
};

const COLOR: Palette = {
  bold: t => chalk.bold(t),
  dim: t => chalk.dim(t),
  ok: t => chalk.green(t),
  fail: t => chalk.red(t),
  warn: t => chalk.yellow(t),
};

const RULE_WIDTH = 80;

function companyLabel(company: CikLookup): string {
  const ticker = company.ticker ? `, ${company.ticker}` : '';
  return `${company.name} (CIK ${company.cik}${ticker})`;
}

function reportLines(report: RunReport, p: Palette): string[] {
  const { summary, files } = report;
  const lines: string[] = [];

  lines.push(p.dim('='.repeat(RULE_WIDTH)));
  lines.push(p.bold('13F FILINGS PROCESSING REPORT'));
  lines.push(p.dim('='.repeat(RULE_WIDTH)));
  lines.push('');
  lines.push(`Company: ${companyLabel(report.company)}`);
  lines.push(`Filter: ${report.filter}`);
  lines.push(`Total periods processed: ${summary.successes.length + summary.failures.length}`);
  lines.push(`Successful: ${summary.successes.length} quarterly filings`);
  lines.push(`Failed: ${summary.failures.length} quarterly filings`);
  lines.push('');

  if (summary.successes.length > 0) {
    lines.push(p.bold('SUCCESSFUL PERIODS:'));
    lines.push(p.dim('-'.repeat(RULE_WIDTH)));
    for (const s of summary.successes) {
      const holdings = `${s.result.records.length} holdings`;
      lines.push(`  ${p.ok('[OK]')} ${s.period}  ${padRight(s.result.strategy, 18)}${padRight(holdings, 16)}${s.filing.formType} ${p.dim(s.filing.accessionNumber)}`);
      if (s.result.low_confidence_rows > 0) {
        lines.push(`         ${p.warn(`${s.result.low_confidence_rows} rows without voting authority values`)}`);
      }
      const file = files?.periods[s.period];
      if (file) lines.push(`         ${p.dim(`Saved to: ${file}`)}`);
    }
    lines.push('');
  }

  if (summary.failures.length > 0) {
    lines.push(p.bold('FAILED PERIODS:'));
    lines.push(p.dim('-'.repeat(RULE_WIDTH)));
    for (const f of summary.failures) {
      lines.push(`  ${p.fail('[FAIL]')} ${f.period}: ${f.reason}`);
      const saved = files?.failed[f.period];
      if (saved) lines.push(`         ${p.dim(`Saved to: ${saved}`)}`);
    }
    lines.push('');
  }

  if (files && (files.years.length > 0 || files.master)) {
    lines.push(p.bold('COMBINED FILES:'));
    lines.push(p.dim('-'.repeat(RULE_WIDTH)));
    for (const year of files.years) lines.push(`  ${year}`);
    if (files.master) lines.push(`  ${files.master}`);
    lines.push('');
  }

  lines.push(p.dim('='.repeat(RULE_WIDTH)));
  return lines;
}

/** Plain report, as written to the report file */
export function renderReportText(report: RunReport): string {
  return reportLines(report, PLAIN).join('\n');
}

/** Colored report for the terminal */
export function renderReportTable(report: RunReport): string {
  return reportLines(report, COLOR).join('\n');
}
