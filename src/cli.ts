#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import pLimit from 'p-limit';
import { SentimentInvestorClient } from './clients/sentimentInvestor.js';
import { SentimentInvestorError } from './clients/errors.js';
import { writeTickersCsv } from './csv/writer.js';
import {
  createLogger,
  determineEpoch,
  parseCommaList,
  parseOptionalPositiveInteger,
  parsePositiveInteger,
  toPrintable,
} from './cliOptions.js';
import { epochSecondsNow } from './utils/time.js';
import type { TickerData } from './types/index.js';

dotenv.config();

type GlobalOptions = {
  timeout?: string;
  verbose?: boolean;
};

interface EnrichOptions {
  enrich?: boolean;
}

interface ExportOptions extends EnrichOptions {
  output?: string;
}

const program = new Command();
program
  .name('sentiment-investor')
  .description('Query the Sentiment Investor API for social sentiment metrics on stocks.')
  .option('--timeout <ms>', 'Abort requests that take longer than this many milliseconds.')
  .option('-v, --verbose', 'Log each request to stderr.');

program
  .command('parsed')
  .description('Core metrics (sentiment, AHI, RHI, SGP) for one stock.')
  .argument('<symbol>', 'Ticker symbol.')
  .action(async (symbol: string) => {
    print(await createClient().parsed(symbol));
  });

program
  .command('raw')
  .description('Raw per-platform metrics for one stock.')
  .argument('<symbol>', 'Ticker symbol.')
  .action(async (symbol: string) => {
    print(await createClient().raw(symbol));
  });

program
  .command('quote')
  .description('Realtime quote data for one or more stocks.')
  .argument('<symbols...>', 'Ticker symbols.')
  .option('--enrich', 'Include the per-subreddit breakdown.')
  .option('--concurrency <number>', 'Concurrent quote requests (default 4).')
  .action(async (symbols: string[], options: EnrichOptions & { concurrency?: string }) => {
    const client = createClient();
    const limit = pLimit(parsePositiveInteger(options.concurrency, 4, 'concurrency'));
    const quotes = await Promise.all(symbols.map((symbol) => limit(() => client.quote(symbol, options.enrich ?? false))));
    print(symbols.length === 1 ? quotes[0] : quotes);
  });

program
  .command('sort')
  .description('Stocks ranked by a metric.')
  .argument('<metric>', 'Metric to rank by, e.g. AHI.')
  .option('--limit <number>', 'Maximum number of stocks (default 10).')
  .option('--output <path>', 'Write the ranking to a CSV file instead of stdout.')
  .action(async (metric: string, options: ExportOptions & { limit?: string }) => {
    const limit = parsePositiveInteger(options.limit, 10, 'limit');
    await emitTickers(await createClient().sort(metric, limit), options.output);
  });

program
  .command('historical')
  .description('Historical values of a metric for one stock.')
  .argument('<symbol>', 'Ticker symbol.')
  .argument('<metric>', 'Metric to look up.')
  .requiredOption('--start <time>', 'Range start (ISO date or epoch seconds).')
  .option('--end <time>', 'Range end (ISO date or epoch seconds, default now).')
  .action(async (symbol: string, metric: string, options: { start: string; end?: string }) => {
    const start = determineEpoch(options.start, 0, 'start');
    const end = determineEpoch(options.end, epochSecondsNow(), 'end');
    if (end <= start) {
      throw new Error('End must be later than start.');
    }
    print(await createClient().historical(symbol, metric, start, end));
  });

program
  .command('bulk')
  .description('Data for several stocks in one request.')
  .argument('<symbols>', 'Comma-separated ticker symbols.')
  .option('--enrich', 'Request enriched data.')
  .option('--output <path>', 'Write the results to a CSV file instead of stdout.')
  .action(async (rawSymbols: string, options: ExportOptions) => {
    const symbols = parseCommaList(rawSymbols);
    if (symbols.length === 0) {
      throw new Error('Provide at least one symbol.');
    }
    await emitTickers(await createClient().bulk(symbols, options.enrich ?? false), options.output);
  });

program
  .command('all')
  .description('Data for every tracked stock. This request is slow.')
  .option('--enrich', 'Request enriched data.')
  .option('--output <path>', 'Write the results to a CSV file instead of stdout.')
  .action(async (options: ExportOptions) => {
    await emitTickers(await createClient().all(options.enrich ?? false), options.output);
  });

program
  .command('supported')
  .description('Whether the service has data for a stock.')
  .argument('<symbol>', 'Ticker symbol.')
  .action(async (symbol: string) => {
    const supported = await createClient().supported(symbol);
    console.log(`${symbol} ${supported ? 'is' : 'is not'} supported.`);
  });

program
  .command('all-stocks')
  .description('Every symbol the service tracks.')
  .action(async () => {
    print(await createClient().allStocks());
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof SentimentInvestorError) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});

function createClient(): SentimentInvestorClient {
  const globals = program.opts<GlobalOptions>();
  const timeoutMs = parseOptionalPositiveInteger(globals.timeout, 'timeout');
  return SentimentInvestorClient.fromEnv(process.env, {
    timeoutMs,
    logger: createLogger('sentiment-investor', globals.verbose ?? false),
  });
}

async function emitTickers(tickers: TickerData[], output: string | undefined) {
  if (!output) {
    print(tickers);
    return;
  }
  const outputPath = path.resolve(output);
  const written = await writeTickersCsv(outputPath, tickers);
  console.log(`Wrote ${written} rows to ${outputPath}`);
}

function print(value: unknown) {
  console.log(JSON.stringify(toPrintable(value), null, 2));
}
