import { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import { getCached, setCache } from './cache.js';
import { getConfig } from './config.js';
import { SecApiError, NotFoundError, RateLimitError, DataParseError } from './errors.js';
import type { Logger } from './logger.js';
import { FORM_TYPES } from './types.js';
import type { Filing, FormType } from './types.js';

/**
 * SEC EDGAR client for 13F filings.
 *
 * Uses the free EDGAR endpoints:
 * - data.sec.gov/submissions/ for a filer's filing history
 * - www.sec.gov/Archives/edgar/data/ for filing indexes and full submissions
 *
 * Rate limited per SEC fair access policy, exponential backoff for 429
 * and 5xx. Every body is cached by URL; filings are immutable, so a
 * cached submission is reused indefinitely.
 */

const BASE_URL = 'https://data.sec.gov';
const ARCHIVES_URL = 'https://www.sec.gov/Archives/edgar/data';
const MAX_RETRIES = 3;

const FILING_TTL_HOURS = 24 * 365;
const SUBMISSIONS_TTL_HOURS = 24;

export const THIRTEEN_F_FORMS: readonly FormType[] = ['13F-HR', '13F-HR/A'];

// ── Response shapes ───────────────────────────────────────────────────

const filingColumnsSchema = z.object({
  accessionNumber: z.array(z.string()),
  filingDate: z.array(z.string()),
  form: z.array(z.string()),
  reportDate: z.array(z.string()).default([]),
  primaryDocument: z.array(z.string()).default([]),
});

const submissionsSchema = z.object({
  cik: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  tickers: z.array(z.string()).default([]),
  filings: z.object({
    recent: filingColumnsSchema,
    files: z.array(z.object({ name: z.string(), filingCount: z.number().optional() })).default([]),
  }),
});

const filingIndexSchema = z.object({
  directory: z.object({
    item: z.array(z.object({ name: z.string(), type: z.string().optional(), size: z.union([z.string(), z.number()]).optional() })),
  }),
});

export type FilingColumns = z.infer<typeof filingColumnsSchema>;
export type CompanySubmissions = z.infer<typeof submissionsSchema>;

export interface SecClientOptions {
  logger: Logger;
  userAgent?: string;
  requestsPerSecond?: number;
}

interface FetchOptions {
  cacheTtlHours: number;
  accept: string;
  encoding: 'utf-8' | 'latin1';
}

/** Exponential backoff with jitter: 1s, 2s, 4s */
function backoffMs(attempt: number): number {
  const base = 1000 * Math.pow(2, attempt);
  const jitter = Math.random() * 500;
  return base + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** CIK without leading zeros, as used in Archives paths */
export function archiveCik(cik: string): string {
  return String(parseInt(cik, 10));
}

export function submissionTextUrl(cik: string, accessionNumber: string): string {
  return `${ARCHIVES_URL}/${archiveCik(cik)}/${accessionNumber.replace(/-/g, '')}/${accessionNumber}.txt`;
}

export function filingIndexUrl(cik: string, accessionNumber: string): string {
  return `${ARCHIVES_URL}/${archiveCik(cik)}/${accessionNumber.replace(/-/g, '')}/index.json`;
}

export function toFormType(form: string): FormType | null {
  const normalized = form.trim().toUpperCase();
  return FORM_TYPES.find(f => f === normalized) ?? null;
}

/** Filings of the given forms out of the submissions API's column arrays */
export function filingsFromColumns(
  cik: string,
  columns: FilingColumns,
  forms: readonly FormType[] = THIRTEEN_F_FORMS,
  companyName?: string
): Filing[] {
  const filings: Filing[] = [];
  for (let i = 0; i < columns.form.length; i++) {
    const formType = toFormType(columns.form[i]);
    if (!formType || !forms.includes(formType)) continue;
    filings.push({
      cik,
      accessionNumber: columns.accessionNumber[i],
      filingDate: columns.filingDate[i],
      formType,
      periodOfReport: columns.reportDate[i] ?? '',
      companyName,
    });
  }
  return filings;
}

/**
 * Pick the information-table document out of a filing index. Modern 13F
 * filings carry primary_doc.xml (cover page) plus the table as a second
 * XML file; older ones have no XML at all.
 */
export function pickInformationTableDocument(names: readonly string[]): string | null {
  const xml = names.filter(n => n.toLowerCase().endsWith('.xml') && n.toLowerCase() !== 'primary_doc.xml');
  const named = xml.find(n => /info|table/i.test(n));
  if (named) return named;
  return xml.length === 1 ? xml[0] : null;
}

export class SecClient {
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly rateLimiter: RateLimiter;

  constructor(options: SecClientOptions) {
    this.logger = options.logger.child({ component: 'sec-client' });
    this.userAgent = options.userAgent ?? getConfig().SEC_USER_AGENT;
    this.rateLimiter = new RateLimiter(options.requestsPerSecond ?? getConfig().SEC_REQUESTS_PER_SECOND);
  }

  private readCache(url: string): string | null {
    try {
      return getCached(url);
    } catch (err) {
      // Corrupt or locked cache: fall through to the network
      this.logger.warn({ url, err }, 'cache read failed');
      return null;
    }
  }

  private writeCache(url: string, body: string, ttlHours: number): void {
    try {
      setCache(url, body, ttlHours);
    } catch (err) {
      this.logger.warn({ url, err }, 'cache write failed');
    }
  }

  async fetchText(url: string, options: Partial<FetchOptions> = {}): Promise<string> {
    const { cacheTtlHours = SUBMISSIONS_TTL_HOURS, accept = 'application/json', encoding = 'utf-8' } = options;

    const cached = this.readCache(url);
    if (cached !== null) {
      this.logger.debug({ url }, 'cache hit');
      return cached;
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      let response: Response;
      try {
        response = await this.rateLimiter.schedule(() => fetch(url, {
          headers: {
            'User-Agent': this.userAgent,
            'Accept': accept,
          },
        }));
      } catch (err) {
        lastError = new SecApiError(
          `Network error fetching ${url}: ${err instanceof Error ? err.message : String(err)}`,
          0,
          url
        );
        await sleep(backoffMs(attempt));
        continue;
      }

      if (response.ok) {
        const body = new TextDecoder(encoding).decode(await response.arrayBuffer());
        this.logger.debug({ url, bytes: body.length }, 'fetched');
        this.writeCache(url, body, cacheTtlHours);
        return body;
      }

      if (response.status === 404) {
        throw new NotFoundError(url);
      }

      if (response.status === 429) {
        lastError = new RateLimitError(url);
        await sleep(backoffMs(attempt));
        continue;
      }

      if (response.status === 403) {
        throw new SecApiError(
          'SEC rejected the request (403 Forbidden). Set SEC_USER_AGENT to a name and contact email; SEC requires one.',
          403,
          url
        );
      }

      if (response.status >= 500) {
        lastError = new SecApiError(`SEC server error: ${response.status}`, response.status, url);
        await sleep(backoffMs(attempt));
        continue;
      }

      throw new SecApiError(`SEC API error: ${response.status} ${response.statusText}`, response.status, url);
    }

    throw lastError ?? new SecApiError(`Failed after ${MAX_RETRIES} retries`, 0, url);
  }

  private async fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, ttlHours: number): Promise<T> {
    const body = await this.fetchText(url, { cacheTtlHours: ttlHours });
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new DataParseError(`Failed to parse SEC response from ${url}. Try clearing the cache.`, url);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new DataParseError(`Unexpected response shape from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, url);
    }
    return parsed.data;
  }

  /** Filing history for a filer. CIK is zero-padded to 10 digits. */
  getCompanySubmissions(cik: string): Promise<CompanySubmissions> {
    const url = `${BASE_URL}/submissions/CIK${cik.padStart(10, '0')}.json`;
    return this.fetchJson(url, submissionsSchema, SUBMISSIONS_TTL_HOURS);
  }

  /**
   * Every 13F-HR and 13F-HR/A a filer has made, including the older
   * pages the submissions API splits off from `recent`.
   */
  async list13fFilings(cik: string): Promise<Filing[]> {
    const submissions = await this.getCompanySubmissions(cik);
    const filings = filingsFromColumns(cik, submissions.filings.recent, THIRTEEN_F_FORMS, submissions.name);

    for (const page of submissions.filings.files) {
      const columns = await this.fetchJson(`${BASE_URL}/submissions/${page.name}`, filingColumnsSchema, SUBMISSIONS_TTL_HOURS);
      filings.push(...filingsFromColumns(cik, columns, THIRTEEN_F_FORMS, submissions.name));
    }

    this.logger.debug({ cik, count: filings.length }, 'listed 13F filings');
    return filings;
  }

  /** Full submission text (.txt), decoded as latin-1 like EDGAR serves it */
  getSubmissionText(cik: string, accessionNumber: string): Promise<string> {
    return this.fetchText(submissionTextUrl(cik, accessionNumber), {
      cacheTtlHours: FILING_TTL_HOURS,
      accept: 'text/plain, */*',
      encoding: 'latin1',
    });
  }

  /** Raw information-table XML, or null when the filing has none */
  async getInformationTableXml(cik: string, accessionNumber: string): Promise<string | null> {
    let index: z.infer<typeof filingIndexSchema>;
    try {
      index = await this.fetchJson(filingIndexUrl(cik, accessionNumber), filingIndexSchema, FILING_TTL_HOURS);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }

    const document = pickInformationTableDocument(index.directory.item.map(i => i.name));
    if (!document) return null;

    const url = `${ARCHIVES_URL}/${archiveCik(cik)}/${accessionNumber.replace(/-/g, '')}/${document}`;
    return this.fetchText(url, { cacheTtlHours: FILING_TTL_HOURS, accept: 'application/xml, text/xml' });
  }
}
