import type { FeedItem, FeedItemKind } from "./types.js";

const SECONDS_PER_DAY = 86_400;

export type WalkWindow = {
  minDays: number;
  maxDays: number;
  now: () => Date;
  signal?: AbortSignal;
};

export type WalkTally = {
  visited: number;
  tooNew: number;
  empty: number;
  handled: number;
  stoppedEarly: boolean;
  aborted: boolean;
};

export type FeedItemHandler = (item: FeedItem, text: string, ageDays: number) => Promise<void>;

export function ageInDays(createdUtc: number, now: Date): number {
  return (now.getTime() / 1000 - createdUtc) / SECONDS_PER_DAY;
}

export function createExternalId(source: string, kind: FeedItemKind, nativeId: string): string {
  return `${source}_${kind}_${nativeId}`;
}

export function extractItemText(item: FeedItem): string {
  if (item.kind === "submission") {
    return `${item.title ?? ""}\n${item.body}`.trim();
  }
  return item.body.trim();
}

/**
 * Visits a newest-first sequence. The first item older than `maxDays` ends the walk, since
 * every later item is older still; items younger than `minDays` are skipped.
 */
export async function walkFeed(
  items: AsyncIterable<FeedItem>,
  window: WalkWindow,
  handle: FeedItemHandler,
): Promise<WalkTally> {
  const tally: WalkTally = {
    visited: 0,
    tooNew: 0,
    empty: 0,
    handled: 0,
    stoppedEarly: false,
    aborted: false,
  };
  for await (const item of items) {
    if (window.signal?.aborted) {
      tally.aborted = true;
      break;
    }
    tally.visited += 1;
    const age = ageInDays(item.createdUtc, window.now());
    if (age > window.maxDays) {
      tally.stoppedEarly = true;
      break;
    }
    if (age < window.minDays) {
      tally.tooNew += 1;
      continue;
    }
    const text = extractItemText(item);
    if (!text) {
      tally.empty += 1;
      continue;
    }
    await handle(item, text, age);
    tally.handled += 1;
    // Checked here too so an abort does not pull the next page.
    if (window.signal?.aborted) {
      tally.aborted = true;
      break;
    }
  }
  return tally;
}
