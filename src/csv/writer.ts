import { once } from 'node:events';
import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { TickerData } from '../types/index.js';

export interface CsvRow {
  rank: number;
  symbol: string;
  sentiment: number | null;
  AHI: number | null;
  RHI: number | null;
  SGP: number | null;
}

const HEADER: ReadonlyArray<keyof CsvRow> = ['rank', 'symbol', 'sentiment', 'AHI', 'RHI', 'SGP'];

export function tickerToRow(ticker: TickerData, rank: number): CsvRow {
  return {
    rank,
    symbol: ticker.symbol,
    sentiment: ticker.sentiment,
    AHI: ticker.AHI,
    RHI: ticker.RHI,
    SGP: ticker.SGP,
  } satisfies CsvRow;
}

export class CsvStreamWriter {
  private failure: Error | undefined;

  private constructor(private readonly destination: string, private readonly stream: WriteStream) {
    stream.on('error', (error) => {
      this.failure = error;
    });
  }

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    const writer = new CsvStreamWriter(destination, stream);
    stream.write(`${HEADER.join(',')}\n`);
    return writer;
  }

  async writeRow(row: CsvRow): Promise<void> {
    this.throwIfFailed();
    const line = HEADER.map((key) => csvEscape(String(row[key] ?? ''))).join(',');
    if (!this.stream.write(`${line}\n`)) {
      // rejects when the stream emits 'error' instead of 'drain'
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

/** Writes tickers in the given order, ranked from 1. */
export async function writeTickersCsv(destination: string, tickers: readonly TickerData[]): Promise<number> {
  const writer = await CsvStreamWriter.create(destination);
  let written = 0;
  for (const ticker of tickers) {
    written += 1;
    await writer.writeRow(tickerToRow(ticker, written));
  }
  await writer.close();
  return written;
}

function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
