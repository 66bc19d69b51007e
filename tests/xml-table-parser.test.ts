import { describe, it, expect } from 'vitest';
import { flattenRow, parseInformationTableXml, sgmlToXml, splitSgmlDocuments } from '../src/processing/xml-table-parser.js';
import { ParseError } from '../src/core/errors.js';
import { readFixture } from './helpers.js';

const APPLE_ROW = {
  nameOfIssuer: 'APPLE INC',
  titleOfClass: 'COM',
  cusip: '037833100',
  value: '1234',
  sshPrnamt: '10000',
  sshPrnamtType: 'SH',
  investmentDiscretion: 'SOLE',
  votingAuthoritySole: '10000',
  votingAuthorityShared: '0',
  votingAuthorityNone: '0',
};

describe('parseInformationTableXml', () => {
  it('flattens nested share and voting elements', () => {
    const table = parseInformationTableXml(readFixture('infotable.xml'), 'structured-object');
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]).toEqual(APPLE_ROW);
    expect(table.rows[1]).toEqual({
      nameOfIssuer: 'EXAMPLE HOLDINGS CORP',
      titleOfClass: 'CALL',
      cusip: '00123X104',
      value: '89',
      sshPrnamt: '500',
      sshPrnamtType: 'SH',
      putCall: 'Call',
      investmentDiscretion: 'DFND',
      otherManager: '01',
      votingAuthoritySole: '0',
      votingAuthorityShared: '500',
      votingAuthorityNone: '0',
    });
  });

  it('collects columns in first-seen order', () => {
    const table = parseInformationTableXml(readFixture('infotable.xml'));
    expect(table.columns).toEqual([
      'nameOfIssuer',
      'titleOfClass',
      'cusip',
      'value',
      'sshPrnamt',
      'sshPrnamtType',
      'investmentDiscretion',
      'votingAuthoritySole',
      'votingAuthorityShared',
      'votingAuthorityNone',
      'putCall',
      'otherManager',
    ]);
  });

  it('finds infoTable rows anywhere in the document', () => {
    const xml = '<holdings><section><infoTable><cusip>00123X104</cusip></infoTable></section></holdings>';
    expect(parseInformationTableXml(xml).rows).toEqual([{ cusip: '00123X104' }]);
  });

  it('reads rows of a nested informationTable', () => {
    const xml = '<informationTable><informationTable><row><cusip>A</cusip></row><row><cusip>B</cusip></row></informationTable></informationTable>';
    expect(parseInformationTableXml(xml).rows).toEqual([{ cusip: 'A' }, { cusip: 'B' }]);
  });

  it('returns an empty table when no location holds rows', () => {
    expect(parseInformationTableXml('<informationTable></informationTable>')).toEqual({ columns: [], rows: [] });
  });

  it('throws ParseError on malformed XML', () => {
    const bad = '<informationTable><infoTable></informationTable>';
    expect(() => parseInformationTableXml(bad, 'sgml-xml')).toThrow(ParseError);
    expect(() => parseInformationTableXml(bad, 'sgml-xml')).toThrow(/^Malformed XML at line 1: /);
  });
});

describe('flattenRow', () => {
  it('ignores non-element entries', () => {
    expect(flattenRow('text')).toBeNull();
    expect(flattenRow(null)).toBeNull();
  });
});

describe('splitSgmlDocuments', () => {
  it('splits a submission into typed documents', () => {
    const docs = splitSgmlDocuments(readFixture('sgml-xml-submission.txt'));
    expect(docs.map(d => [d.type, d.filename, d.xml !== null])).toEqual([
      ['13F-HR', 'primary_doc.xml', true],
      ['INFORMATION TABLE', 'infotable.xml', true],
    ]);
  });

  it('has no XML payload in a legacy text filing', () => {
    const docs = splitSgmlDocuments(readFixture('legacy-fixed-width.txt'));
    expect(docs).toHaveLength(1);
    expect(docs[0].xml).toBeNull();
  });
});

describe('sgmlToXml', () => {
  it('prefers the INFORMATION TABLE document', () => {
    const xml = sgmlToXml(readFixture('sgml-xml-submission.txt'));
    expect(xml).not.toBeNull();
    expect(parseInformationTableXml(xml ?? '').rows).toEqual([APPLE_ROW]);
  });

  it('falls back to any payload holding infoTable rows', () => {
    const text = [
      '<DOCUMENT>', '<TYPE>EX-99', '<TEXT>', '<XML>', '<note/>', '</XML>', '</TEXT>', '</DOCUMENT>',
      '<DOCUMENT>', '<TYPE>13F-HR', '<TEXT>', '<XML>',
      '<informationTable><infoTable><cusip>1</cusip></infoTable></informationTable>',
      '</XML>', '</TEXT>', '</DOCUMENT>',
    ].join('\n');
    expect(sgmlToXml(text)).toBe('<informationTable><infoTable><cusip>1</cusip></infoTable></informationTable>');
  });

  it('returns null without an XML payload', () => {
    expect(sgmlToXml(readFixture('legacy-fixed-width.txt'))).toBeNull();
  });
});
