import type { MentionStore } from "../store/types.js";
import type { TickerExtractor } from "../tickers/extract.js";

export type ProcessOutcome = "stored" | "duplicate" | "no-ticker" | "untracked";

export type MentionCandidate = {
  content: string;
  url: string | null;
  externalId: string;
  /** A serialized blob, or a builder given the tickers matched in `content`. */
  metadata: string | null | ((tickers: string[]) => string);
};

export type ProcessResult = {
  storedCount: number;
  outcome: ProcessOutcome;
  /** Tickers the content mentions, whether or not a row was written for them. */
  tickers: string[];
};

export type MentionPipeline = {
  process: (candidate: MentionCandidate) => Promise<ProcessResult>;
};

export function createMentionPipeline(params: {
  store: MentionStore;
  extractor: TickerExtractor;
}): MentionPipeline {
  const { store, extractor } = params;

  async function process(candidate: MentionCandidate): Promise<ProcessResult> {
    const tickers = Array.from(extractor.extract(candidate.content)).sort();
    if (tickers.length === 0) {
      return { storedCount: 0, outcome: "no-ticker", tickers };
    }
    // Checked once per item rather than per ticker.
    if (await store.existsByExternalId(candidate.externalId)) {
      return { storedCount: 0, outcome: "duplicate", tickers };
    }
    const metadata =
      typeof candidate.metadata === "function" ? candidate.metadata(tickers) : candidate.metadata;
    let storedCount = 0;
    let rejected = 0;
    for (const ticker of tickers) {
      const stockId = await store.findStockId(ticker);
      if (stockId === null) {
        continue;
      }
      const inserted = await store.insertMention({
        stockId,
        content: candidate.content,
        url: candidate.url,
        externalId: candidate.externalId,
        metadata,
      });
      if (inserted) {
        storedCount += 1;
      } else {
        rejected += 1;
      }
    }
    if (storedCount > 0) {
      return { storedCount, outcome: "stored", tickers };
    }
    return { storedCount: 0, outcome: rejected > 0 ? "duplicate" : "untracked", tickers };
  }

  return { process };
}
