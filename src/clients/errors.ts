export class SentimentInvestorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SentimentInvestorError';
  }
}

export class ConfigurationError extends SentimentInvestorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The service answers bad credentials with a bare string instead of JSON. */
export class AuthenticationError extends SentimentInvestorError {
  constructor(public readonly body: string) {
    super(`Sentiment Investor rejected the token or key (${body})`);
    this.name = 'AuthenticationError';
  }
}

export class ProtocolError extends SentimentInvestorError {
  constructor(message: string, public readonly body: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class RequestError extends SentimentInvestorError {
  constructor(
    public readonly status: number,
    public readonly serviceMessage: string | undefined,
  ) {
    super(serviceMessage ?? `Sentiment Investor request failed with status ${status}`);
    this.name = 'RequestError';
  }
}
