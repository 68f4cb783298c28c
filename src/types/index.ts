export type JsonObject = Record<string, unknown>;

export type Platform =
  | 'reddit_post'
  | 'reddit_comment'
  | 'tweet'
  | 'stocktwits_post'
  | 'yahoo_finance_comment';

export interface SocialData {
  /** Times the stock was mentioned on the platform. */
  readonly mentions: number | null;
  /** Average sentiment score of the mentioning remarks. */
  readonly sentiment: number | null;
  /** How much more often the stock was mentioned than others. */
  readonly relativeHype: number | null;
}

export interface Subreddit {
  readonly mentions: number | null;
  readonly sentiment: number | null;
}

export interface RedditBreakdown {
  readonly posts: SocialData;
  readonly comments: SocialData;
  /** Only present on enriched responses. */
  readonly subreddits: Readonly<Record<string, Subreddit>> | null;
}

export interface TickerData {
  readonly symbol: string;
  /** Positive sentiment (%). */
  readonly sentiment: number | null;
  /** Average Hype Index. */
  readonly AHI: number | null;
  /** Relative Hype Index. */
  readonly RHI: number | null;
  /** Standard General Perception. */
  readonly SGP: number | null;
}

export interface QuoteData extends TickerData {
  readonly reddit: RedditBreakdown;
  readonly tweets: SocialData;
  readonly stocktwitsPosts: SocialData;
  readonly yahooFinanceComments: SocialData;
}

export type HistoricalSeries = Map<number, number>;
