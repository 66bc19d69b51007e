import chalk from 'chalk';
import type { CikLookup } from '../core/types.js';
import type { ResolvedFiling } from '../processing/amendment-resolver.js';
import { padRight } from './format-utils.js';

export interface FilingListResult {
  company: CikLookup;
  filings: ResolvedFiling[];
}

export function renderFilingTable(result: FilingListResult): string {
  const lines: string[] = [];

  const header = `${result.company.name} (CIK ${result.company.cik}): 13F Filings`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (result.filings.length === 0) {
    lines.push(chalk.dim('  No 13F filings found.'));
    return lines.join('\n');
  }

  lines.push(`  ${chalk.underline(padRight('Period', 13))}${chalk.underline(padRight('Filed', 13))}${chalk.underline(padRight('Form', 11))}${chalk.underline(padRight('Accession', 23))}${chalk.underline('Used')}`);

  for (const { filing, authoritative } of result.filings) {
    const form = filing.formType.endsWith('/A') ? chalk.yellow(filing.formType) : chalk.cyan(filing.formType);
    const used = authoritative ? chalk.green('*') : '';
    const accession = authoritative ? filing.accessionNumber : chalk.dim(filing.accessionNumber);
    lines.push(`  ${padRight(filing.periodOfReport || '-', 13)}${padRight(filing.filingDate, 13)}${padRight(form, 11)}${padRight(accession, 23)}${used}`);
  }

  const periods = result.filings.filter(f => f.authoritative).length;
  lines.push('');
  lines.push(chalk.dim(`  ${result.filings.length} filings over ${periods} periods; * marks the filing used for each period`));

  return lines.join('\n');
}

export function serializeFilingList(result: FilingListResult) {
  return {
    company: {
      cik: result.company.cik,
      ticker: result.company.ticker || null,
      name: result.company.name,
    },
    filings: result.filings.map(({ filing, authoritative }) => ({
      period_of_report: filing.periodOfReport,
      filing_date: filing.filingDate,
      form_type: filing.formType,
      accession_number: filing.accessionNumber,
      authoritative,
    })),
  };
}

export function renderFilingJson(result: FilingListResult): string {
  return JSON.stringify(serializeFilingList(result), null, 2);
}
