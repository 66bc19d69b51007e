/**
 * Shared helpers for the web API layer: query-string parsing and mapping
 * error types to HTTP status codes.
 */

import { z } from 'zod';
import { NotFoundError, RateLimitError, SecApiError } from '../core/errors.js';
import { STRATEGY_ORDER } from '../core/types.js';

// ── Error Mapping ─────────────────────────────────────────────────────

const ERROR_STATUS_MAP: Record<string, number> = {
  validation: 400,
  invalid_filter: 400,
  company_ambiguous: 400,
  company_not_found: 404,
  no_filings: 404,
  not_found: 404,
  rate_limited: 429,
  api_error: 502,
};

export function errorToHttpStatus(errorType: string): number {
  return ERROR_STATUS_MAP[errorType] ?? 500;
}

/** Error type for an exception thrown while talking to EDGAR */
export function classifyError(err: unknown): { type: string; message: string } {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof NotFoundError) return { type: 'not_found', message };
  if (err instanceof RateLimitError) return { type: 'rate_limited', message };
  if (err instanceof SecApiError) return { type: 'api_error', message };
  return { type: 'internal', message: 'Internal server error' };
}

// ── Query Strings ─────────────────────────────────────────────────────

/** "2013,2014" -> ["2013", "2014"]; absent or blank -> undefined */
const commaList = z
  .string()
  .optional()
  .transform(v => {
    const items = (v ?? '').split(',').map(s => s.trim()).filter(Boolean);
    return items.length > 0 ? items : undefined;
  });

export const holdingsQuerySchema = z.object({
  company: z.string().trim().min(1, 'company is required'),
  years: commaList,
  quarters: commaList,
  from: z.string().optional(),
  to: z.string().optional(),
  strategies: commaList.pipe(z.array(z.enum(STRATEGY_ORDER)).optional()),
  include_records: z.enum(['true', 'false']).optional().transform(v => v !== 'false'),
});

export const filingsQuerySchema = z.object({
  company: z.string().trim().min(1, 'company is required'),
});

export function validationMessage(error: z.ZodError): string {
  return error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}
