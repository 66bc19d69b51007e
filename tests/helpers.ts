import { readFileSync } from 'node:fs';
import pino from 'pino';
import { vi } from 'vitest';
import type { Logger } from '../src/core/logger.js';
import { SecClient } from '../src/core/sec-client.js';
import type { CikLookup, Filing, FormType } from '../src/core/types.js';
import { createStaticFilingSource } from '../src/core/filing-source.js';
import { runExtraction, type RunSummary } from '../src/core/holdings-engine.js';
import { buildPeriodFilter } from '../src/processing/period-filter.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

export function makeFiling(overrides: Partial<Filing> & { accessionNumber: string }): Filing {
  const formType: FormType = overrides.formType ?? '13F-HR';
  return {
    cik: '1234567',
    filingDate: '2013-05-14',
    periodOfReport: '2013-03-31',
    companyName: 'EXAMPLE CAPITAL MANAGEMENT LLC',
    ...overrides,
    formType,
  };
}

const ARCHIVE = 'https://www.sec.gov/Archives/edgar/data/1234567';

/** EDGAR as seen by the client: URL -> body; anything else is a 404 */
const ROUTES: Record<string, () => string> = {
  'https://data.sec.gov/submissions/CIK0001234567.json': () => readFixture('submissions.json'),
  [`${ARCHIVE}/000095012313000003/index.json`]: () =>
    JSON.stringify({ directory: { item: [{ name: 'primary_doc.xml' }, { name: 'form13fInfoTable.xml' }] } }),
  [`${ARCHIVE}/000095012313000003/form13fInfoTable.xml`]: () => readFixture('infotable.xml'),
  [`${ARCHIVE}/000095012313000002/index.json`]: () =>
    JSON.stringify({ directory: { item: [{ name: '0000950123-13-000002.txt' }] } }),
  [`${ARCHIVE}/000095012313000002/0000950123-13-000002.txt`]: () => readFixture('legacy-fixed-width.txt'),
};

export function edgarFetch() {
  return vi.fn(async (input: string | URL | Request) => {
    const route = ROUTES[String(input)];
    return route ? new Response(route(), { status: 200 }) : new Response('Not Found', { status: 404, statusText: 'Not Found' });
  });
}

export function newClient(): SecClient {
  return new SecClient({ logger: silentLogger, userAgent: 'test-agent test@example.com', requestsPerSecond: 10 });
}

export const BERKSHIRE: CikLookup = { cik: '1067983', ticker: 'BRK-B', name: 'BERKSHIRE HATHAWAY INC' };

/** One legacy period that extracts and one that fails */
export function sampleRun(): Promise<RunSummary> {
  const q1 = makeFiling({ cik: '1067983', accessionNumber: '0000950123-13-000001' });
  const q2 = makeFiling({ cik: '1067983', accessionNumber: '0000950123-13-000002', filingDate: '2013-08-14', periodOfReport: '2013-06-30' });
  const texts: Record<string, string> = {
    [q1.accessionNumber]: readFixture('legacy-fixed-width.txt'),
    [q2.accessionNumber]: 'no holdings in this one',
  };
  return runExtraction({
    filings: [q1, q2],
    filter: buildPeriodFilter({ years: ['2013'] }),
    openSource: filing => createStaticFilingSource({ text: texts[filing.accessionNumber] }),
    logger: silentLogger,
  });
}
