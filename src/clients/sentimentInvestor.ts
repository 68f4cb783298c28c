import {
  buildHistoricalSeries,
  buildQuoteData,
  buildTickerData,
  buildTickerList,
  isJsonObject,
  readString,
} from '../mapping/responses.js';
import type { HistoricalSeries, JsonObject, QuoteData, TickerData } from '../types/index.js';
import { AuthenticationError, ConfigurationError, ProtocolError, RequestError } from './errors.js';

export interface HttpResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<HttpResponse>;

export interface SentimentInvestorClientOptions {
  token: string | undefined;
  key: string | undefined;
  baseUrl?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: (message: string) => void;
}

type Endpoint =
  | 'parsed'
  | 'raw'
  | 'quote'
  | 'sort'
  | 'historical'
  | 'bulk'
  | 'all'
  | 'supported'
  | 'all-stocks';

type QueryValue = string | number | boolean | undefined;

export const DEFAULT_BASE_URL = 'https://api.sentimentinvestor.com/v4/';
const CREDENTIAL_FAILURES = new Set(['invalid_parameter', 'incorrect_key']);

export class SentimentInvestorClient {
  private readonly token: string;
  private readonly key: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number | undefined;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(options: SentimentInvestorClientOptions) {
    if (!options.token || !options.key) {
      throw new ConfigurationError(
        'Please provide a token and key. Both are issued on the Sentiment Investor developer dashboard.',
      );
    }
    this.token = options.token;
    this.key = options.key;
    const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: Omit<SentimentInvestorClientOptions, 'token' | 'key'> = {},
  ): SentimentInvestorClient {
    return new SentimentInvestorClient({
      ...options,
      token: env.SENTIMENT_INVESTOR_TOKEN,
      key: env.SENTIMENT_INVESTOR_KEY,
      baseUrl: options.baseUrl ?? (env.SENTIMENT_INVESTOR_BASE_URL || undefined),
    });
  }

  /** Core metrics for a stock: AHI, RHI, SGP and sentiment. */
  async parsed(symbol: string): Promise<TickerData | null> {
    const payload = await this.request('parsed', { symbol });
    if (payload.success !== true) {
      return null;
    }
    return buildTickerData(readString(payload, 'symbol') ?? symbol, objectResults(payload, 'parsed'));
  }

  /** Raw per-platform metrics for a stock. */
  async raw(symbol: string): Promise<QuoteData | null> {
    const payload = await this.request('raw', { symbol });
    if (payload.success !== true) {
      return null;
    }
    return buildQuoteData(readString(payload, 'symbol') ?? symbol, objectResults(payload, 'raw'));
  }

  /**
   * Realtime data for a stock. Enriched quotes also carry the per-subreddit
   * breakdown under `reddit.subreddits`.
   */
  async quote(symbol: string, enrich = false): Promise<QuoteData | null> {
    const payload = await this.request('quote', { symbol, enrich });
    if (payload.success !== true) {
      return null;
    }
    return buildQuoteData(readString(payload, 'symbol') ?? symbol, objectResults(payload, 'quote'));
  }

  /** Stocks ranked by `metric`, in the order the service returns them. */
  async sort(metric: string, limit: number): Promise<TickerData[]> {
    const payload = await this.request('sort', { metric, limit });
    if (payload.success !== true) {
      return [];
    }
    return buildTickerList(arrayResults(payload, 'sort'));
  }

  /**
   * Historical values of `metric` between two Unix timestamps (seconds),
   * keyed by timestamp.
   */
  async historical(symbol: string, metric: string, start: number, end: number): Promise<HistoricalSeries> {
    const payload = await this.request('historical', { symbol, metric, start, end });
    if (payload.success !== true) {
      return new Map();
    }
    return buildHistoricalSeries(arrayResults(payload, 'historical'));
  }

  async bulk(symbols: readonly string[], enrich = false): Promise<TickerData[]> {
    const payload = await this.request('bulk', { symbols: symbols.join(','), enrich });
    if (payload.success !== true) {
      return [];
    }
    return buildTickerList(arrayResults(payload, 'bulk'));
  }

  /** Every tracked stock in one response. Slow: the payload is large. */
  async all(enrich = false): Promise<TickerData[]> {
    const payload = await this.request('all', { enrich });
    if (payload.success !== true) {
      return [];
    }
    return buildTickerList(arrayResults(payload, 'all'));
  }

  async supported(symbol: string): Promise<boolean> {
    const payload = await this.request('supported', { symbol });
    if (payload.success !== true) {
      return false;
    }
    return payload.result === true;
  }

  async allStocks(): Promise<Set<string>> {
    const payload = await this.request('all-stocks');
    if (payload.success !== true) {
      return new Set();
    }
    const symbols = arrayResults(payload, 'all-stocks').filter(
      (entry): entry is string => typeof entry === 'string',
    );
    return new Set(symbols);
  }

  private async request(endpoint: Endpoint, params: Record<string, QueryValue> = {}): Promise<JsonObject> {
    const query = new URLSearchParams();
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined) {
        query.set(name, String(value));
      }
    }
    const described = query.toString();
    this.logger?.(`GET ${endpoint}${described ? ` ${described}` : ''}`);

    query.set('token', this.token);
    query.set('key', this.key);
    const url = `${this.baseUrl}${endpoint}?${query.toString()}`;

    const response = await this.fetchImpl(
      url,
      this.timeoutMs !== undefined ? { signal: AbortSignal.timeout(this.timeoutMs) } : undefined,
    );
    const text = await response.text();

    if (CREDENTIAL_FAILURES.has(text)) {
      throw new AuthenticationError(text);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ProtocolError(`Sentiment Investor returned a non-JSON response (status ${response.status})`, text);
    }

    if (!response.ok) {
      const message = isJsonObject(body) ? readString(body, 'message') : null;
      throw new RequestError(response.status, message ?? undefined);
    }

    if (!isJsonObject(body)) {
      throw new ProtocolError(`Expected a JSON object from ${endpoint}`, text);
    }

    this.logger?.(`GET ${endpoint} -> ${response.status} success=${String(body.success)}`);
    return body;
  }
}

function objectResults(payload: JsonObject, endpoint: Endpoint): JsonObject {
  const results = payload.results;
  if (!isJsonObject(results)) {
    throw new ProtocolError(`Expected "results" to be an object in the ${endpoint} response`, JSON.stringify(payload));
  }
  return results;
}

function arrayResults(payload: JsonObject, endpoint: Endpoint): unknown[] {
  const results: unknown = payload.results;
  if (!Array.isArray(results)) {
    throw new ProtocolError(`Expected "results" to be an array in the ${endpoint} response`, JSON.stringify(payload));
  }
  return results;
}
