/**
 * Custom error types for EDGAR access and holdings extraction.
 * Enables callers to handle different failure modes appropriately.
 */

import type { Filing, Period, StrategyAttempt, StrategyName } from './types.js';

export class SecApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'SecApiError';
  }
}

export class NotFoundError extends SecApiError {
  constructor(url: string, detail: string = '') {
    super(
      `Not found: ${detail || url}`,
      404,
      url
    );
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends SecApiError {
  constructor(url: string) {
    super(
      'SEC API rate limit exceeded. Requests are throttled to the SEC fair access policy (10 req/s). Please wait a moment and retry.',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

// ── Extraction ─────────────────────────────────────────────────────────

/** Bad user input: malformed quarter token, year or date, or no filter at all */
export class ConfigError extends Error {
  constructor(message: string, public readonly detail: string | null = null) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class HeaderNotFoundError extends Error {
  constructor(public readonly linesScanned: number) {
    super(`Could not locate header line (scanned ${linesScanned} lines for NAME OF ISSUER, CUSIP and VALUE)`);
    this.name = 'HeaderNotFoundError';
  }
}

export class ParseError extends Error {
  constructor(public readonly strategy: StrategyName, message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ExtractionExhaustedError extends Error {
  public readonly period: Period;

  constructor(
    public readonly filing: Filing,
    public readonly attempts: StrategyAttempt[]
  ) {
    const tried = attempts.length > 0
      ? attempts.map(a => `${a.strategy} (${a.reason ?? a.status})`).join('; ')
      : 'no strategies enabled';
    super(`All extraction strategies failed for ${filing.accessionNumber} (period ${filing.periodOfReport}): ${tried}`);
    this.name = 'ExtractionExhaustedError';
    this.period = filing.periodOfReport;
  }

  get strategiesAttempted(): StrategyName[] {
    return this.attempts.map(a => a.strategy);
  }
}
