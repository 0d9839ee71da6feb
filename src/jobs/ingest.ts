import type { FeedClient } from "../feed/types.js";
import type { ScrapeSummary } from "../sources/types.js";
import type { MentionStore } from "../store/types.js";
import { resolveStorePath, type AdvisorConfig } from "../config/config.js";
import { createRedditDataSource } from "../sources/reddit.js";
import { createMentionStore } from "../store/store.js";

export type IngestParams = {
  cfg: AdvisorConfig;
  env?: NodeJS.ProcessEnv;
  /** When omitted a store is opened at the configured path and closed afterwards. */
  store?: MentionStore;
  client?: FeedClient;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
  logger?: Pick<Console, "log" | "warn">;
  verbose?: boolean;
  signal?: AbortSignal;
};

export async function runMentionIngest(params: IngestParams): Promise<ScrapeSummary> {
  const store =
    params.store ?? createMentionStore({ storePath: resolveStorePath(params.cfg, params.env) });
  try {
    const source = createRedditDataSource({
      cfg: params.cfg,
      store,
      client: params.client,
      sleep: params.sleep,
      now: params.now,
      logger: params.logger,
      verbose: params.verbose,
    });
    return await source.scrape({ signal: params.signal });
  } finally {
    if (!params.store) {
      await store.close();
    }
  }
}

export function summaryCounts(summary: ScrapeSummary): Record<string, number> {
  return {
    channels: summary.channels.length,
    stored: summary.stored,
    skipped: summary.skipped,
    skippedNoTicker: summary.skippedNoTicker,
    skippedDuplicate: summary.skippedDuplicate,
    skippedUntracked: summary.skippedUntracked,
    failures: summary.failures,
  };
}
