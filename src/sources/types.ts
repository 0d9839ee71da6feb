export type ScrapeOptions = {
  signal?: AbortSignal;
};

export type ItemCounts = {
  stored: number;
  skipped: number;
  skippedNoTicker: number;
  skippedDuplicate: number;
  skippedUntracked: number;
};

export type ChannelSummary = ItemCounts & {
  channel: string;
  visited: number;
  stoppedEarly: boolean;
  error?: string;
};

export type ScrapeSummary = ItemCounts & {
  source: string;
  failures: number;
  aborted: boolean;
  channels: ChannelSummary[];
};

/**
 * A feed that can be scraped into the mention store. Implementations receive the store
 * and their feed client from the caller.
 */
export type DataSource = {
  sourceName: () => string;
  validateConfig: () => void;
  scrape: (options?: ScrapeOptions) => Promise<ScrapeSummary>;
};

export function emptyCounts(): ItemCounts {
  return { stored: 0, skipped: 0, skippedNoTicker: 0, skippedDuplicate: 0, skippedUntracked: 0 };
}
