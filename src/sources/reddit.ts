import { setTimeout as delay } from "node:timers/promises";
import type { FeedClient, FeedItem, FeedItemKind } from "../feed/types.js";
import type { MentionStore } from "../store/types.js";
import type { ChannelSummary, DataSource, ScrapeOptions, ScrapeSummary } from "./types.js";
import {
  resolveRedditCredentials,
  resolveRedditSettings,
  type AdvisorConfig,
  type RedditSettings,
} from "../config/config.js";
import { createRedditClient, RedditApiError } from "../feed/reddit/client.js";
import { createExternalId, walkFeed } from "../feed/walker.js";
import { serializeMentionMetadata } from "../pipeline/metadata.js";
import { createMentionPipeline, type MentionPipeline } from "../pipeline/process.js";
import { createTickerExtractor } from "../tickers/extract.js";
import { emptyCounts } from "./types.js";

export const REDDIT_SOURCE = "reddit";

export type RedditDataSourceParams = {
  cfg: AdvisorConfig;
  store: MentionStore;
  /** Defaults to an OAuth client built from the configured credentials. */
  client?: FeedClient;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
  logger?: Pick<Console, "log" | "warn">;
  verbose?: boolean;
};

function emptyChannel(channel: string): ChannelSummary {
  return { channel, visited: 0, stoppedEarly: false, ...emptyCounts() };
}

export function createRedditDataSource(params: RedditDataSourceParams): DataSource {
  const { cfg, store } = params;
  const sleep = params.sleep ?? delay;
  const now = params.now ?? (() => new Date());
  const logger = params.logger ?? console;

  function validateConfig(): void {
    resolveRedditSettings(cfg);
    if (!params.client) {
      resolveRedditCredentials(cfg);
    }
  }

  validateConfig();

  const client =
    params.client ??
    createRedditClient({
      credentials: resolveRedditCredentials(cfg),
      pageSize: cfg.reddit?.pageSize,
      timeoutMs: cfg.reddit?.fetchTimeoutMs,
      rateLimitPerHostPerMinute: cfg.reddit?.rateLimitPerHostPerMinute,
    });

  async function walkSequence(paramsWalk: {
    channel: ChannelSummary;
    kind: FeedItemKind;
    items: AsyncIterable<FeedItem>;
    settings: RedditSettings;
    pipeline: MentionPipeline;
    signal?: AbortSignal;
  }): Promise<boolean> {
    const { channel, pipeline } = paramsWalk;
    const tally = await walkFeed(
      paramsWalk.items,
      {
        minDays: paramsWalk.settings.minDays,
        maxDays: paramsWalk.settings.maxDays,
        now,
        signal: paramsWalk.signal,
      },
      async (item, text, ageDays) => {
        const externalId = createExternalId(REDDIT_SOURCE, item.kind, item.id);
        const result = await pipeline.process({
          content: text,
          url: item.url,
          externalId,
          metadata: (tickers) =>
            serializeMentionMetadata({
              type: item.kind,
              subreddit: channel.channel,
              author: item.author,
              ageDays,
              tickers,
            }),
        });
        if (result.storedCount > 0) {
          channel.stored += result.storedCount;
          if (params.verbose) {
            logger.log(`✓ Stored ${paramsWalk.kind} ${item.id} for ${result.tickers.join(", ")}`);
          }
          return;
        }
        channel.skipped += 1;
        if (result.outcome === "no-ticker") {
          channel.skippedNoTicker += 1;
        } else if (result.outcome === "duplicate") {
          channel.skippedDuplicate += 1;
        } else {
          channel.skippedUntracked += 1;
        }
      },
    );
    channel.visited += tally.visited;
    channel.stoppedEarly = channel.stoppedEarly || tally.stoppedEarly;
    return tally.aborted;
  }

  async function scrape(options: ScrapeOptions = {}): Promise<ScrapeSummary> {
    const settings = resolveRedditSettings(cfg);
    const extractor = createTickerExtractor(settings.tickers);
    for (const ticker of extractor.tickers) {
      await store.upsertStock(ticker);
    }
    const pipeline = createMentionPipeline({ store, extractor });
    const summary: ScrapeSummary = {
      source: REDDIT_SOURCE,
      failures: 0,
      aborted: false,
      channels: [],
      ...emptyCounts(),
    };

    for (const subreddit of settings.subreddits) {
      if (options.signal?.aborted) {
        summary.aborted = true;
        break;
      }
      logger.log(`Scanning r/${subreddit}...`);
      const channel = emptyChannel(subreddit);
      try {
        const shared = { channel, settings, pipeline, signal: options.signal };
        const abortedInSubmissions = await walkSequence({
          ...shared,
          kind: "submission",
          items: client.submissions(subreddit),
        });
        if (abortedInSubmissions) {
          summary.aborted = true;
        } else {
          summary.aborted = await walkSequence({
            ...shared,
            kind: "comment",
            items: client.comments(subreddit),
          });
        }
      } catch (err) {
        // Upstream failures stay scoped to the channel; store errors propagate.
        if (!(err instanceof RedditApiError)) {
          throw err;
        }
        channel.error = err.message;
        summary.failures += 1;
        logger.warn(`r/${subreddit}: ${err.message}`);
      }
      summary.channels.push(channel);
      summary.stored += channel.stored;
      summary.skipped += channel.skipped;
      summary.skippedNoTicker += channel.skippedNoTicker;
      summary.skippedDuplicate += channel.skippedDuplicate;
      summary.skippedUntracked += channel.skippedUntracked;
      if (summary.aborted) {
        break;
      }
      await sleep(settings.channelDelayMs);
    }

    logger.log(`Scraping complete! Stored: ${summary.stored}, Skipped: ${summary.skipped}`);
    return summary;
  }

  return {
    sourceName: () => REDDIT_SOURCE,
    validateConfig,
    scrape,
  };
}
