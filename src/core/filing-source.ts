import type { FilingSource } from './extraction-chain.js';
import type { Logger } from './logger.js';
import type { SecClient } from './sec-client.js';
import type { Filing, RawTable } from './types.js';
import { parseInformationTableXml } from '../processing/xml-table-parser.js';

/**
 * FilingSource backed by EDGAR. The structured table is the filing's
 * stand-alone information-table XML; the text is the full .txt
 * submission. Both come through the client's URL cache.
 */
export function createSecFilingSource(client: SecClient, filing: Filing, logger: Logger): FilingSource {
  const { cik, accessionNumber } = filing;

  return {
    async structuredTable(): Promise<RawTable | null> {
      const xml = await client.getInformationTableXml(cik, accessionNumber);
      if (xml === null) {
        logger.debug({ cik, accessionNumber }, 'filing has no information table document');
        return null;
      }
      return parseInformationTableXml(xml, 'structured-object');
    },

    submissionText(): Promise<string> {
      return client.getSubmissionText(cik, accessionNumber);
    },
  };
}

/** Source over content the caller already holds (tests, local files) */
export function createStaticFilingSource(content: { table?: RawTable | null; text?: string }): FilingSource {
  return {
    async structuredTable() {
      return content.table ?? null;
    },
    async submissionText() {
      if (content.text === undefined) {
        throw new Error('No submission text available for this filing');
      }
      return content.text;
    },
  };
}
