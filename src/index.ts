#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { closeCache, clearCache, getCacheStats } from './core/cache.js';
import { getConfig, type AppConfig } from './core/config.js';
import { ConfigError } from './core/errors.js';
import { STRATEGY_DESCRIPTIONS } from './core/extraction-chain.js';
import { extractHoldingsForCompany, listFilingsForCompany, type EngineError } from './core/holdings-engine.js';
import { createLogger, type Logger } from './core/logger.js';
import { SecClient } from './core/sec-client.js';
import { STRATEGY_ORDER, type StrategyName } from './core/types.js';
import { writeRunOutputs } from './output/file-writer.js';
import { renderFilingJson, renderFilingTable } from './output/filing-renderer.js';
import { renderRunJson } from './output/json-renderer.js';
import { renderReportTable } from './output/report-renderer.js';
import { describePeriodFilter } from './processing/period-filter.js';

interface ExtractOptions {
  company: string;
  years?: string[];
  quarters?: string[];
  from?: string;
  to?: string;
  outdir: string;
  perYearCombined?: boolean;
  masterCombined?: boolean;
  strategies?: string[];
  columnMargin?: string;
  identity?: string;
  json?: boolean;
}

/** Accept both `--years 2013 2014` and `--years 2013,2014` */
function splitList(values: string[] | undefined): string[] | undefined {
  if (!values) return undefined;
  return values.flatMap(v => v.split(',')).map(v => v.trim()).filter(Boolean);
}

function parseStrategies(values: string[] | undefined): StrategyName[] | undefined {
  const names = splitList(values);
  if (!names || names.length === 0) return undefined;
  return names.map(name => {
    const match = STRATEGY_ORDER.find(s => s === name.toLowerCase());
    if (!match) {
      throw new ConfigError(`Unknown strategy: "${name}". Choose from: ${STRATEGY_ORDER.join(', ')}`, name);
    }
    return match;
  });
}

function parseMargin(value: string | undefined, config: AppConfig): number {
  if (value === undefined) return config.FIXED_WIDTH_COLUMN_MARGIN;
  const margin = Number(value);
  if (!Number.isInteger(margin) || margin < 1) {
    throw new ConfigError(`Invalid column margin: "${value}". Use a positive whole number of characters`, value);
  }
  return margin;
}

function createClient(config: AppConfig, logger: Logger, identity?: string): SecClient {
  return new SecClient({
    logger,
    userAgent: identity ?? config.SEC_USER_AGENT,
    requestsPerSecond: config.SEC_REQUESTS_PER_SECOND,
  });
}

function reportEngineError(err: EngineError): void {
  switch (err.type) {
    case 'company_ambiguous':
      console.error(chalk.red(`${err.message}. Did you mean:`));
      for (const s of err.suggestions ?? []) {
        console.error(`  ${chalk.cyan(s.cik.padEnd(10))} ${s.ticker.padEnd(8)} ${s.name}`);
      }
      break;
    case 'invalid_filter':
      console.error(chalk.red(err.message));
      console.error('Usage: edgar-13f-holdings extract --company 1067983 --quarters 2013Q1 2013Q2');
      break;
    default:
      console.error(chalk.red(err.message));
  }
}

function reportError(err: unknown): void {
  if (err instanceof ConfigError) {
    console.error(chalk.red(err.message));
    return;
  }
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
}

async function executeExtract(options: ExtractOptions): Promise<void> {
  try {
    const config = getConfig();
    const logger = createLogger(config);
    const client = createClient(config, logger, options.identity);

    const result = await extractHoldingsForCompany({
      company: options.company,
      years: splitList(options.years),
      quarters: splitList(options.quarters),
      from: options.from,
      to: options.to,
      client,
      logger,
      options: {
        strategies: parseStrategies(options.strategies),
        columnMargin: parseMargin(options.columnMargin, config),
      },
    });

    if (!result.success) {
      reportEngineError(result.error);
      process.exitCode = 1;
      return;
    }

    const { company, summary } = result;
    const filter = describePeriodFilter(result.filter);

    if (summary.periods.length === 0) {
      console.error(chalk.yellow(`No 13F filings of ${company.name} matched ${filter}.`));
      return;
    }

    const files = await writeRunOutputs(company, summary, {
      outdir: options.outdir,
      logger,
      filter,
      perYearCombined: options.perYearCombined,
      masterCombined: options.masterCombined,
      failedText: filing => client.getSubmissionText(filing.cik, filing.accessionNumber),
    });

    if (options.json) {
      console.log(renderRunJson(company, summary, { files }));
    } else {
      console.log('');
      console.log(renderReportTable({ company, filter, summary, files }));
      console.log(chalk.dim(`\nReport saved to: ${options.outdir}/${files.report ?? ''}\n`));
    }

    if (summary.successes.length === 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    reportError(err);
    process.exitCode = 1;
  } finally {
    closeCache();
  }
}

const program = new Command();

program
  .name('edgar-13f-holdings')
  .description('Extract 13F-HR holdings tables from SEC EDGAR, one CSV per reporting quarter')
  .version('0.1.0');

program
  .command('extract')
  .description('Extract holdings for the reporting periods matching every filter given')
  .requiredOption('-c, --company <company>', 'CIK, ticker or filer name (e.g., 1067983)')
  .option('--years <years...>', 'Calendar years of the period end (e.g., 2013 2014)')
  .option('--quarters <quarters...>', 'Quarters as YYYYQn (e.g., 2013Q1 2013Q3)')
  .option('--from <date>', 'Earliest period end, YYYY-MM-DD')
  .option('--to <date>', 'Latest period end, YYYY-MM-DD')
  .option('-o, --outdir <dir>', 'Output directory', '13f_outputs')
  .option('--per-year-combined', 'Also write one combined CSV per year')
  .option('--master-combined', 'Also write a single CSV with every period')
  .option('--strategies <names...>', `Enabled strategies, run in fixed order (${STRATEGY_ORDER.join(', ')})`)
  .option('--column-margin <n>', 'Width assumed for voting sub-columns missing from a fixed-width header')
  .option('--identity <identity>', 'SEC User-Agent, "Name email" (overrides SEC_USER_AGENT)')
  .option('-j, --json', 'Print the run summary as JSON')
  .action(async (options: ExtractOptions) => {
    await executeExtract(options);
  });

program
  .command('filings')
  .description('List a filer\'s 13F filings and the one used for each period')
  .argument('<company>', 'CIK, ticker or filer name')
  .option('-j, --json', 'Output as JSON')
  .action(async (companyArg: string, options: { json?: boolean }) => {
    try {
      const config = getConfig();
      const logger = createLogger(config);
      const result = await listFilingsForCompany(createClient(config, logger), companyArg);

      if (!result.success) {
        reportEngineError(result.error);
        process.exitCode = 1;
        return;
      }

      if (options.json) {
        console.log(renderFilingJson(result));
      } else {
        console.log('');
        console.log(renderFilingTable(result));
        console.log('');
      }
    } catch (err) {
      reportError(err);
      process.exitCode = 1;
    } finally {
      closeCache();
    }
  });

program
  .command('strategies')
  .description('List extraction strategies in the order they are tried')
  .action(() => {
    console.log(chalk.bold('\nExtraction Strategies\n'));
    STRATEGY_ORDER.forEach((name, i) => {
      console.log(`  ${i + 1}. ${chalk.cyan(name.padEnd(18))} ${STRATEGY_DESCRIPTIONS[name]}`);
    });
    console.log('');
  });

program
  .command('cache')
  .description('Manage the local cache')
  .option('--clear', 'Clear all cached data')
  .option('--stats', 'Show cache statistics')
  .action((options: { clear?: boolean; stats?: boolean }) => {
    try {
      if (options.clear) {
        clearCache();
        console.log(chalk.green('Cache cleared.'));
      } else if (options.stats) {
        const stats = getCacheStats();
        const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
        console.log(`\n  Cache entries: ${stats.entries}`);
        console.log(`  Cache size:    ${sizeMb} MB`);
        console.log(`  Location:      ${stats.location}\n`);
      } else {
        const stats = getCacheStats();
        const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
        console.log(`\n  Cache: ${stats.entries} entries, ${sizeMb} MB`);
        console.log(`  Use --clear to reset, --stats for details\n`);
      }
    } catch (err) {
      reportError(err);
      process.exitCode = 1;
    } finally {
      closeCache();
    }
  });

await program.parseAsync();

// If no args at all, show help
if (process.argv.length <= 2) {
  program.help();
}
