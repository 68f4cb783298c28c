import type {
  HistoricalSeries,
  JsonObject,
  Platform,
  QuoteData,
  RedditBreakdown,
  SocialData,
  Subreddit,
  TickerData,
} from '../types/index.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNumber(fields: JsonObject, key: string): number | null {
  const value = fields[key];
  return typeof value === 'number' ? value : null;
}

export function readString(fields: JsonObject, key: string): string | null {
  const value = fields[key];
  return typeof value === 'string' ? value : null;
}

export function extractSocialData(fields: JsonObject, platform: Platform): SocialData {
  return {
    mentions: readNumber(fields, `${platform}_mentions`),
    sentiment: readNumber(fields, `${platform}_sentiment`),
    relativeHype: readNumber(fields, `${platform}_relative_hype`),
  };
}

/**
 * Joins the per-subreddit mention and sentiment maps of an enriched response.
 * A subreddit appears in the result only when both maps carry its name.
 */
export function extractSubreddits(fields: JsonObject): Record<string, Subreddit> | null {
  if (!('subreddits' in fields)) {
    return null;
  }

  const subreddits = fields.subreddits;
  if (!isJsonObject(subreddits)) {
    return null;
  }

  const mentions = subreddits.reddit_subreddit_mentions;
  const sentiment = subreddits.reddit_subreddit_sentiment;
  if (!isJsonObject(mentions) || !isJsonObject(sentiment)) {
    return null;
  }

  const result: Record<string, Subreddit> = {};
  for (const name of Object.keys(mentions)) {
    if (!Object.hasOwn(sentiment, name)) {
      continue;
    }
    result[name] = { mentions: readNumber(mentions, name), sentiment: readNumber(sentiment, name) };
  }
  return result;
}

export function buildTickerData(symbol: string, fields: JsonObject): TickerData {
  return {
    symbol,
    sentiment: readNumber(fields, 'sentiment'),
    AHI: readNumber(fields, 'AHI'),
    RHI: readNumber(fields, 'RHI'),
    SGP: readNumber(fields, 'SGP'),
  };
}

export function buildRedditBreakdown(fields: JsonObject): RedditBreakdown {
  return {
    posts: extractSocialData(fields, 'reddit_post'),
    comments: extractSocialData(fields, 'reddit_comment'),
    subreddits: extractSubreddits(fields),
  };
}

export function buildQuoteData(symbol: string, fields: JsonObject): QuoteData {
  return {
    ...buildTickerData(symbol, fields),
    tweets: extractSocialData(fields, 'tweet'),
    stocktwitsPosts: extractSocialData(fields, 'stocktwits_post'),
    yahooFinanceComments: extractSocialData(fields, 'yahoo_finance_comment'),
    reddit: buildRedditBreakdown(fields),
  };
}

/** List entries carry their own symbol; entries without one map to an empty symbol. */
export function buildTickerList(entries: readonly unknown[]): TickerData[] {
  return entries.map((entry) => {
    const fields = isJsonObject(entry) ? entry : {};
    return buildTickerData(readString(fields, 'symbol') ?? '', fields);
  });
}

export function buildHistoricalSeries(points: readonly unknown[]): HistoricalSeries {
  const series: HistoricalSeries = new Map();
  for (const point of points) {
    if (!isJsonObject(point)) {
      continue;
    }
    const timestamp = readNumber(point, 'timestamp');
    const data = readNumber(point, 'data');
    if (timestamp === null || data === null) {
      continue;
    }
    series.set(timestamp, data);
  }
  return series;
}
