export {
  SentimentInvestorClient,
  DEFAULT_BASE_URL,
  type FetchLike,
  type HttpResponse,
  type SentimentInvestorClientOptions,
} from './clients/sentimentInvestor.js';
export {
  SentimentInvestorError,
  ConfigurationError,
  AuthenticationError,
  ProtocolError,
  RequestError,
} from './clients/errors.js';
export {
  buildHistoricalSeries,
  buildQuoteData,
  buildRedditBreakdown,
  buildTickerData,
  buildTickerList,
  extractSocialData,
  extractSubreddits,
  isJsonObject,
} from './mapping/responses.js';
export type * from './types/index.js';
