#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for edgar-13f-holdings.
 *
 * Exposes 13F holdings extraction as MCP tools for any MCP client.
 *
 * Tools:
 *   - extract_13f_holdings: holdings for a filer's matching reporting periods
 *   - list_13f_filings: a filer's 13F filings and the one used per period
 *   - list_strategies: extraction strategies in the order they are tried
 *
 * Resources:
 *   - edgar-13f-holdings://cache/stats: cache statistics
 *
 * Logs go to stderr; stdout carries the protocol.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { getCacheStats } from './core/cache.js';
import { getConfig } from './core/config.js';
import { STRATEGY_DESCRIPTIONS } from './core/extraction-chain.js';
import { extractHoldingsForCompany, listFilingsForCompany, type EngineError } from './core/holdings-engine.js';
import { createLogger } from './core/logger.js';
import { SecClient } from './core/sec-client.js';
import { STRATEGY_ORDER } from './core/types.js';
import { serializeFilingList } from './output/filing-renderer.js';
import { serializeRun } from './output/json-renderer.js';

const config = getConfig();
const logger = createLogger(config);
const client = new SecClient({
  logger,
  userAgent: config.SEC_USER_AGENT,
  requestsPerSecond: config.SEC_REQUESTS_PER_SECOND,
});

const server = new McpServer(
  { name: 'edgar-13f-holdings', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {} } }
);

function errorText(err: EngineError): string {
  let text = err.message;
  if (err.suggestions?.length) {
    text += '\n\nDid you mean:\n' + err.suggestions.map(s => `  CIK ${s.cik}: ${s.name}`).join('\n');
  }
  return text;
}

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'extract_13f_holdings',
  'Extract the holdings table of an investment manager\'s 13F-HR filings from SEC EDGAR, one table per reporting quarter. Amendments supersede originals. At least one filter (years, quarters, from/to) is required; a period must match all of them.',
  {
    company: z.string().describe('Filer CIK (e.g., 1067983), ticker, or name'),
    years: z.array(z.string().regex(/^\d{4}$/)).optional().describe('Calendar years of the period end (e.g., ["2013"])'),
    quarters: z.array(z.string()).optional().describe('Quarters as YYYYQn (e.g., ["2013Q1", "2013Q3"])'),
    from: z.string().optional().describe('Earliest period end, YYYY-MM-DD'),
    to: z.string().optional().describe('Latest period end, YYYY-MM-DD'),
    strategies: z.array(z.enum(STRATEGY_ORDER)).optional().describe('Enabled strategies; always run in the fixed order'),
    include_records: z.boolean().optional().default(true).describe('Return the holdings rows, not only counts'),
    max_rows: z.number().int().min(1).max(5000).optional().default(500).describe('Maximum holdings rows returned per period'),
  },
  async ({ company, years, quarters, from, to, strategies, include_records, max_rows }) => {
    const result = await extractHoldingsForCompany({
      company,
      years,
      quarters,
      from,
      to,
      client,
      logger,
      options: { strategies, columnMargin: config.FIXED_WIDTH_COLUMN_MARGIN },
    });

    if (!result.success) {
      return { content: [{ type: 'text', text: errorText(result.error) }], isError: true };
    }

    const output = serializeRun(result.company, result.summary, { includeRecords: include_records });
    const periods = output.periods.map(p => ({
      ...p,
      ...(p.records && p.records.length > max_rows
        ? { records: p.records.slice(0, max_rows), records_truncated: true }
        : {}),
    }));

    return { content: [{ type: 'text', text: JSON.stringify({ ...output, periods }, null, 2) }] };
  }
);

server.tool(
  'list_13f_filings',
  'List an investment manager\'s 13F-HR and 13F-HR/A filings with their reporting periods, marking the filing used for each period.',
  {
    company: z.string().describe('Filer CIK (e.g., 1067983), ticker, or name'),
  },
  async ({ company }) => {
    const result = await listFilingsForCompany(client, company);
    if (!result.success) {
      return { content: [{ type: 'text', text: errorText(result.error) }], isError: true };
    }
    return { content: [{ type: 'text', text: JSON.stringify(serializeFilingList(result), null, 2) }] };
  }
);

server.tool(
  'list_strategies',
  'List the holdings-table extraction strategies in the order they are tried.',
  {},
  async () => {
    const strategies = STRATEGY_ORDER.map((name, i) => ({
      order: i + 1,
      name,
      description: STRATEGY_DESCRIPTIONS[name],
    }));
    return { content: [{ type: 'text', text: JSON.stringify({ strategies }, null, 2) }] };
  }
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'cache-stats',
  'edgar-13f-holdings://cache/stats',
  { description: 'Current cache size, entry count, and location', mimeType: 'application/json' },
  async (uri) => {
    const stats = getCacheStats();
    return {
      contents: [{
        uri: uri.href,
        mimeType: 'application/json',
        text: JSON.stringify({
          entries: stats.entries,
          size_bytes: stats.sizeBytes,
          size_mb: (stats.sizeBytes / 1024 / 1024).toFixed(1),
          location: stats.location,
        }, null, 2),
      }],
    };
  }
);

// ── Start Server ───────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
