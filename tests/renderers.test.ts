import { describe, it, expect } from 'vitest';
import {
  HOLDINGS_CSV_HEADER,
  companyFileStem,
  failedTextFileName,
  masterCsvFileName,
  periodCsvFileName,
  quarterLabel,
  renderHoldingsCsv,
  yearCsvFileName,
} from '../src/output/holdings-renderer.js';
import { renderReportTable, renderReportText } from '../src/output/report-renderer.js';
import { renderRunJson, serializeRun } from '../src/output/json-renderer.js';
import { renderFilingTable, serializeFilingList } from '../src/output/filing-renderer.js';
import { csvEscape, csvLine, padRight } from '../src/output/format-utils.js';
import { markAuthoritativeFilings } from '../src/processing/amendment-resolver.js';
import type { HoldingRecord } from '../src/core/types.js';
import { BERKSHIRE, makeFiling, sampleRun } from './helpers.js';

const stripAnsi = (s: string) => s.replace(/\x1b\[[0-9;]*m/g, '');

describe('format utils', () => {
  it('pads ignoring ANSI escapes', () => {
    expect(padRight('\x1b[32mok\x1b[39m', 4)).toBe('\x1b[32mok\x1b[39m  ');
    expect(padRight('toolong', 3)).toBe('toolong');
  });

  it('quotes CSV values with separators or quotes', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('SMITH, JONES & CO')).toBe('"SMITH, JONES & CO"');
    expect(csvEscape('5" NOTE')).toBe('"5"" NOTE"');
  });

  it('quotes carriage returns and surrounding whitespace', () => {
    expect(csvEscape('LINE ONE\rLINE TWO')).toBe('"LINE ONE\rLINE TWO"');
    expect(csvEscape(' ACME CORP')).toBe('" ACME CORP"');
    expect(csvEscape('ACME CORP  ')).toBe('"ACME CORP  "');
    expect(csvEscape('ACME  CORP')).toBe('ACME  CORP');
  });

  it('joins a CSV line with empty cells for nulls', () => {
    expect(csvLine(['2013-03-31', 'SMITH, JONES', null, 1234, false])).toBe('2013-03-31,"SMITH, JONES",,1234,false');
  });
});

describe('file names', () => {
  it('derives a short lower-case stem from the company name', () => {
    expect(companyFileStem('BERKSHIRE HATHAWAY INC')).toBe('berkshirehathaw');
    expect(companyFileStem('T. Rowe Price')).toBe('t.roweprice');
    expect(companyFileStem('!!!')).toBe('filer');
  });

  it('labels quarters by their end month', () => {
    expect(quarterLabel('2013-03-31')).toBe('Q12013');
    expect(quarterLabel('2013-06-30')).toBe('Q22013');
    expect(quarterLabel('2013-09-30')).toBe('Q32013');
    expect(quarterLabel('2013-12-31')).toBe('Q42013');
  });

  it('names each output file', () => {
    expect(periodCsvFileName('BERKSHIRE HATHAWAY INC', '2013-03-31')).toBe('berkshirehathaw_Q12013_20130331.csv');
    expect(yearCsvFileName('BERKSHIRE HATHAWAY INC', '2013')).toBe('berkshirehathaw_2013.csv');
    expect(masterCsvFileName('BERKSHIRE HATHAWAY INC')).toBe('berkshirehathaw_MASTER.csv');
    expect(failedTextFileName('BERKSHIRE HATHAWAY INC', '2013-06-30')).toBe('berkshirehathaw_2013-06-30.txt');
  });
});

describe('renderHoldingsCsv', () => {
  it('writes the canonical header and one line per holding', async () => {
    const summary = await sampleRun();
    const csv = renderHoldingsCsv([{ period: '2013-03-31', records: summary.successes[0].result.records }]);
    expect(csv.split('\n')).toEqual([
      'period_of_report,name,title,cusip,value_x1000,shares,share_unit,put_call,discretion,other_managers,voting_sole,voting_shared,voting_none,low_confidence',
      '2013-03-31,APPLE INC,COM,037833100,1234,10000,SH,,SOLE,,10000,0,0,false',
      '2013-03-31,MICROSOFT CORP,COM,594918104,567,20000,SH,,DEFINED,1,15000,5000,0,false',
    ]);
    expect(HOLDINGS_CSV_HEADER).toHaveLength(14);
  });

  it('leaves missing numbers empty and quotes names with commas', () => {
    const record: HoldingRecord = {
      name: 'SMITH, JONES & CO',
      title: 'COM',
      cusip: '00123X104',
      value_x1000: 250,
      shares: null,
      share_unit: '',
      put_call: '',
      discretion: '',
      other_managers: '',
      voting_sole: null,
      voting_shared: null,
      voting_none: null,
      low_confidence: true,
    };
    const csv = renderHoldingsCsv([{ period: '2004-12-31', records: [record] }]);
    expect(csv.split('\n')[1]).toBe('2004-12-31,"SMITH, JONES & CO",COM,00123X104,250,,,,,,,,,true');
  });

  it('is just the header without records', () => {
    expect(renderHoldingsCsv([])).toBe(HOLDINGS_CSV_HEADER.join(','));
  });
});

describe('report', () => {
  it('lists successful and failed periods', async () => {
    const summary = await sampleRun();
    const lines = renderReportText({ company: BERKSHIRE, filter: 'years 2013', summary, files: null }).split('\n');

    expect(lines.slice(0, 13)).toEqual([
      '='.repeat(80),
      '13F FILINGS PROCESSING REPORT',
      '='.repeat(80),
      '',
      'Company: BERKSHIRE HATHAWAY INC (CIK 1067983, BRK-B)',
      'Filter: years 2013',
      'Total periods processed: 2',
      'Successful: 1 quarterly filings',
      'Failed: 1 quarterly filings',
      '',
      'SUCCESSFUL PERIODS:',
      '-'.repeat(80),
      '  [OK] 2013-03-31  fixed-width       2 holdings      13F-HR 0000950123-13-000001',
    ]);
    expect(lines.slice(13)).toEqual([
      '',
      'FAILED PERIODS:',
      '-'.repeat(80),
      `  [FAIL] 2013-06-30: ${summary.failures[0].reason}`,
      '',
      '='.repeat(80),
    ]);
  });

  it('points at saved files', async () => {
    const summary = await sampleRun();
    const text = renderReportText({
      company: BERKSHIRE,
      filter: 'years 2013',
      summary,
      files: {
        outdir: 'out',
        periods: { '2013-03-31': 'berkshirehathaw_Q12013_20130331.csv' },
        failed: { '2013-06-30': 'failed/berkshirehathaw_2013-06-30.txt' },
        years: ['berkshirehathaw_2013.csv'],
        master: null,
        report: 'berkshirehathaw_REPORT.txt',
      },
    });
    const lines = text.split('\n');
    expect(lines).toContain('         Saved to: berkshirehathaw_Q12013_20130331.csv');
    expect(lines).toContain('         Saved to: failed/berkshirehathaw_2013-06-30.txt');
    expect(lines.slice(-4)).toEqual(['-'.repeat(80), '  berkshirehathaw_2013.csv', '', '='.repeat(80)]);
  });

  it('renders the same text in color', async () => {
    const summary = await sampleRun();
    const report = { company: BERKSHIRE, filter: 'years 2013', summary, files: null };
    expect(stripAnsi(renderReportTable(report))).toBe(renderReportText(report));
  });
});

describe('serializeRun', () => {
  it('summarizes periods, attempts and failures', async () => {
    const summary = await sampleRun();
    const json = serializeRun(BERKSHIRE, summary);

    expect(json.company).toEqual({ cik: '1067983', ticker: 'BRK-B', name: 'BERKSHIRE HATHAWAY INC' });
    expect(json.totals).toEqual({ periods: 2, succeeded: 1, failed: 1 });
    expect(json.periods[0]).toMatchObject({
      period: '2013-03-31',
      filing: { accession_number: '0000950123-13-000001', form_type: '13F-HR', filing_date: '2013-05-14', period_of_report: '2013-03-31' },
      candidates: 1,
      strategy: 'fixed-width',
      holdings: 2,
      low_confidence_rows: 0,
      unmapped_columns: [],
      file: null,
    });
    expect(json.periods[0].records).toBeUndefined();
    expect(json.failures[0].attempts.map(a => a.status)).toEqual(['not_applicable', 'not_applicable', 'not_applicable', 'failed']);
    expect(json.failures[0].saved_text).toBeNull();
    expect(json.files).toBeNull();
  });

  it('includes records on request', async () => {
    const summary = await sampleRun();
    const parsed: { periods: Array<{ records: Array<{ cusip: string }> }> } = JSON.parse(
      renderRunJson(BERKSHIRE, summary, { includeRecords: true })
    );
    expect(parsed.periods[0].records.map(r => r.cusip)).toEqual(['037833100', '594918104']);
  });
});

describe('filing list', () => {
  const filings = markAuthoritativeFilings([
    makeFiling({ accessionNumber: '0000950123-13-000001', filingDate: '2013-05-14' }),
    makeFiling({ accessionNumber: '0000950123-13-000003', filingDate: '2013-09-02', formType: '13F-HR/A' }),
  ]);
  const result = { company: { cik: '1234567', ticker: '', name: 'EXAMPLE CAPITAL MANAGEMENT LLC' }, filings };

  it('serializes each filing with its flag', () => {
    expect(serializeFilingList(result)).toEqual({
      company: { cik: '1234567', ticker: null, name: 'EXAMPLE CAPITAL MANAGEMENT LLC' },
      filings: [
        { period_of_report: '2013-03-31', filing_date: '2013-05-14', form_type: '13F-HR', accession_number: '0000950123-13-000001', authoritative: false },
        { period_of_report: '2013-03-31', filing_date: '2013-09-02', form_type: '13F-HR/A', accession_number: '0000950123-13-000003', authoritative: true },
      ],
    });
  });

  it('marks the filing used for the period', () => {
    const lines = stripAnsi(renderFilingTable(result)).split('\n');
    expect(lines[0]).toBe('EXAMPLE CAPITAL MANAGEMENT LLC (CIK 1234567): 13F Filings');
    expect(lines).toContain('  2013-03-31   2013-09-02   13F-HR/A   0000950123-13-000003   *');
    expect(lines[lines.length - 1]).toBe('  2 filings over 1 periods; * marks the filing used for each period');
  });
});
