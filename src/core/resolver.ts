import { z } from 'zod';
import type { SecClient } from './sec-client.js';
import type { CikLookup } from './types.js';

/**
 * Filer resolver: CIK, ticker or name -> CIK.
 *
 * Most 13F filers are private investment managers without a ticker, so a
 * numeric query is taken as a CIK as-is. Otherwise SEC's company tickers
 * file is used (cached for a week).
 *
 * Resolution order:
 * 1. Numeric CIK (1067983)
 * 2. Exact ticker match (BRK-B)
 * 3. Exact company name match
 * 4. Fuzzy name match (substring)
 */

const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';

const tickerFileSchema = z.record(z.object({
  cik_str: z.union([z.number(), z.string()]).transform(String),
  ticker: z.string(),
  title: z.string(),
}));

let tickerMap: Map<string, CikLookup> | null = null;
let nameMap: Map<string, CikLookup> | null = null;

async function loadTickers(client: SecClient): Promise<{ byTicker: Map<string, CikLookup>; byName: Map<string, CikLookup> }> {
  if (tickerMap && nameMap) return { byTicker: tickerMap, byName: nameMap };

  const body = await client.fetchText(TICKERS_URL, { cacheTtlHours: 168 });
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new Error('Failed to parse SEC company tickers data. The response may be corrupted; try clearing the cache with: edgar-13f-holdings cache --clear');
  }
  const parsed = tickerFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error('SEC company tickers data has an unexpected shape.');
  }

  const byTicker = new Map<string, CikLookup>();
  const byName = new Map<string, CikLookup>();
  for (const entry of Object.values(parsed.data)) {
    const lookup: CikLookup = {
      cik: entry.cik_str,
      ticker: entry.ticker.toUpperCase(),
      name: entry.title,
    };
    byTicker.set(lookup.ticker, lookup);
    byName.set(entry.title.toLowerCase(), lookup);
  }

  tickerMap = byTicker;
  nameMap = byName;
  return { byTicker, byName };
}

export interface ResolveResult {
  company: CikLookup | null;
  suggestions: CikLookup[];
}

/**
 * Resolve a query, with suggestions when it is ambiguous.
 */
export async function resolveCompanyWithSuggestions(client: SecClient, query: string): Promise<ResolveResult> {
  const trimmed = query.trim();
  if (/^\d{1,10}$/.test(trimmed)) {
    return { company: { cik: String(parseInt(trimmed, 10)), ticker: '', name: '' }, suggestions: [] };
  }

  const { byTicker, byName } = await loadTickers(client);
  const upper = trimmed.toUpperCase();
  const lower = trimmed.toLowerCase();

  const ticker = byTicker.get(upper) ?? byTicker.get(upper.replace('.', '-'));
  if (ticker) return { company: ticker, suggestions: [] };

  const byExactName = byName.get(lower);
  if (byExactName) return { company: byExactName, suggestions: [] };

  const matches: CikLookup[] = [];
  for (const [name, lookup] of byName) {
    if (name.includes(lower)) {
      matches.push(lookup);
    }
  }

  if (matches.length === 1) {
    return { company: matches[0], suggestions: [] };
  }

  // Several candidates: suggest, never auto-pick
  return { company: null, suggestions: matches.slice(0, 5) };
}
