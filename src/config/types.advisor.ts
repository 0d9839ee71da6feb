export type DatabaseConfig = {
  path?: string;
};

export type RedditCredentialsConfig = {
  clientId?: string;
  clientSecret?: string;
  userAgent?: string;
};

export type RedditConfig = {
  subreddits?: string[];
  tickers?: string[];
  minDays?: number;
  maxDays?: number;
  channelDelayMs?: number;
  pageSize?: number;
  fetchTimeoutMs?: number;
  rateLimitPerHostPerMinute?: number;
  credentials?: RedditCredentialsConfig;
};

export type AnalysisConfig = {
  sentimentThresholdBuy?: number;
  sentimentThresholdSell?: number;
  minMentions?: number;
};

export type AdvisorConfig = {
  database?: DatabaseConfig;
  reddit?: RedditConfig;
  analysis?: AnalysisConfig;
};
