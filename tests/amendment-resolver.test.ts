import { describe, it, expect } from 'vitest';
import {
  bucketFilingsByPeriod,
  markAuthoritativeFilings,
  pickAuthoritativeFiling,
  sortFilings,
} from '../src/processing/amendment-resolver.js';
import { buildPeriodFilter } from '../src/processing/period-filter.js';
import { makeFiling } from './helpers.js';

describe('pickAuthoritativeFiling', () => {
  it('prefers an amendment over the original', () => {
    const original = makeFiling({ accessionNumber: '0000950123-13-000001', filingDate: '2013-05-14' });
    const amendment = makeFiling({ accessionNumber: '0000950123-13-000200', filingDate: '2013-06-01', formType: '13F-HR/A' });
    expect(pickAuthoritativeFiling([original, amendment])).toBe(amendment);
    expect(pickAuthoritativeFiling([amendment, original])).toBe(amendment);
  });

  it('takes the latest amendment when there are several', () => {
    const first = makeFiling({ accessionNumber: '0000950123-13-000300', filingDate: '2013-06-01', formType: '13F-HR/A' });
    const second = makeFiling({ accessionNumber: '0000950123-13-000400', filingDate: '2013-08-20', formType: '13F-HR/A' });
    const original = makeFiling({ accessionNumber: '0000950123-13-000001', filingDate: '2013-05-14' });
    expect(pickAuthoritativeFiling([second, original, first])).toBe(second);
  });

  it('takes the latest original when nothing was amended', () => {
    const early = makeFiling({ accessionNumber: '0000950123-13-000001', filingDate: '2013-05-10' });
    const late = makeFiling({ accessionNumber: '0000950123-13-000002', filingDate: '2013-05-14' });
    expect(pickAuthoritativeFiling([late, early])).toBe(late);
  });

  it('breaks filing-date ties by accession number', () => {
    const a = makeFiling({ accessionNumber: '0000950123-13-000005', filingDate: '2013-05-14' });
    const b = makeFiling({ accessionNumber: '0000950123-13-000009', filingDate: '2013-05-14' });
    expect(pickAuthoritativeFiling([b, a])).toBe(b);
  });

  it('falls back to the latest filing of any form', () => {
    const notice = makeFiling({ accessionNumber: '0000950123-13-000001', filingDate: '2013-05-10', formType: '13F-NT' });
    const noticeAmendment = makeFiling({ accessionNumber: '0000950123-13-000002', filingDate: '2013-05-12', formType: '13F-NT/A' });
    expect(pickAuthoritativeFiling([noticeAmendment, notice])).toBe(noticeAmendment);
  });

  it('throws on an empty bucket', () => {
    expect(() => pickAuthoritativeFiling([])).toThrow('Cannot pick an authoritative filing from an empty period bucket');
  });
});

describe('sortFilings', () => {
  it('orders by filing date without mutating the input', () => {
    const input = [
      makeFiling({ accessionNumber: 'b', filingDate: '2013-08-01' }),
      makeFiling({ accessionNumber: 'a', filingDate: '2013-05-01' }),
    ];
    expect(sortFilings(input).map(f => f.accessionNumber)).toEqual(['a', 'b']);
    expect(input.map(f => f.accessionNumber)).toEqual(['b', 'a']);
  });
});

describe('bucketFilingsByPeriod', () => {
  it('groups wanted filings by period in ascending order', () => {
    const filter = buildPeriodFilter({ years: ['2013'] });
    const filings = [
      makeFiling({ accessionNumber: 'q3', periodOfReport: '2013-09-30' }),
      makeFiling({ accessionNumber: 'q1', periodOfReport: '2013-03-31' }),
      makeFiling({ accessionNumber: 'q1a', periodOfReport: '2013-03-31', formType: '13F-HR/A' }),
      makeFiling({ accessionNumber: 'old', periodOfReport: '2012-12-31' }),
      makeFiling({ accessionNumber: 'none', periodOfReport: '' }),
    ];

    const buckets = bucketFilingsByPeriod(filings, filter);
    expect([...buckets.keys()]).toEqual(['2013-03-31', '2013-09-30']);
    expect(buckets.get('2013-03-31')?.map(f => f.accessionNumber)).toEqual(['q1', 'q1a']);
    expect(buckets.get('2013-09-30')?.map(f => f.accessionNumber)).toEqual(['q3']);
  });
});

describe('markAuthoritativeFilings', () => {
  it('flags exactly one filing per period', () => {
    const filings = [
      makeFiling({ accessionNumber: 'q2', periodOfReport: '2013-06-30', filingDate: '2013-08-14' }),
      makeFiling({ accessionNumber: 'q1a', periodOfReport: '2013-03-31', filingDate: '2013-06-01', formType: '13F-HR/A' }),
      makeFiling({ accessionNumber: 'q1', periodOfReport: '2013-03-31', filingDate: '2013-05-14' }),
    ];

    expect(markAuthoritativeFilings(filings).map(r => [r.filing.accessionNumber, r.authoritative])).toEqual([
      ['q1', false],
      ['q1a', true],
      ['q2', true],
    ]);
  });
});

describe('amendment precedence over later originals', () => {
  it('keeps the amendment even when an original was filed after it', () => {
    const filings = [
      makeFiling({ accessionNumber: '1', filingDate: '2021-01-01', periodOfReport: '2020-12-31' }),
      makeFiling({ accessionNumber: '2', filingDate: '2021-02-01', periodOfReport: '2020-12-31', formType: '13F-HR/A' }),
      makeFiling({ accessionNumber: '3', filingDate: '2021-01-15', periodOfReport: '2020-12-31' }),
    ];
    expect(pickAuthoritativeFiling(filings).accessionNumber).toBe('2');
  });
});
