import type { AnalysisThresholds } from "../config/config.js";
import type { Mention, MentionStore } from "../store/types.js";
import { parseMentionMetadata } from "../pipeline/metadata.js";
import { normalizeSymbol } from "../store/store.js";
import { scoreSentiment, type SentimentScorer } from "./scorer.js";

export type Recommendation = "BUY" | "SELL" | "HOLD";

export type StockAnalysis = {
  averageSentiment: number;
  totalMentions: number;
  analyzedCount: number;
  /** Mention counts keyed by item kind ("submission", "comment" or "unknown"). */
  byType: Record<string, number>;
};

export type StockReport = StockAnalysis & {
  symbol: string;
  recommendation: Recommendation;
};

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  buy: 0.7,
  sell: 0.3,
  minMentions: 5,
};

export function recommend(
  averageSentiment: number,
  mentionCount: number,
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS,
): Recommendation {
  if (mentionCount < thresholds.minMentions) {
    return "HOLD";
  }
  // With sell above buy the BUY branch still wins first.
  if (averageSentiment >= thresholds.buy) {
    return "BUY";
  }
  if (averageSentiment <= thresholds.sell) {
    return "SELL";
  }
  return "HOLD";
}

export function createSentimentAnalyzer(params: {
  store: MentionStore;
  thresholds?: AnalysisThresholds;
  scorer?: SentimentScorer;
}) {
  const { store } = params;
  const thresholds = params.thresholds ?? DEFAULT_THRESHOLDS;
  const scorer = params.scorer ?? scoreSentiment;

  async function aggregate(symbol: string, mentions: Mention[]): Promise<StockAnalysis> {
    const ticker = normalizeSymbol(symbol);
    const byType: Record<string, number> = {};
    let total = 0;
    let analyzedCount = 0;
    for (const mention of mentions) {
      const metadata = parseMentionMetadata(mention.metadata);
      const type = metadata?.type ?? "unknown";
      byType[type] = (byType[type] ?? 0) + 1;
      if (mention.sentimentScore !== null) {
        total += mention.sentimentScore;
        analyzedCount += 1;
        continue;
      }
      const score = scorer(mention.content, ticker);
      if (mention.externalId !== null) {
        await store.setSentiment(mention.externalId, score, mention.stockId);
      }
      total += score;
      analyzedCount += 1;
    }
    return {
      averageSentiment: analyzedCount > 0 ? total / analyzedCount : 0,
      totalMentions: mentions.length,
      analyzedCount,
      byType,
    };
  }

  async function analyzeStock(symbol: string, limit?: number): Promise<StockReport> {
    const ticker = normalizeSymbol(symbol);
    const mentions = await store.mentionsForStock(ticker, limit);
    const analysis = await aggregate(ticker, mentions);
    return {
      symbol: ticker,
      ...analysis,
      recommendation: recommend(analysis.averageSentiment, analysis.totalMentions, thresholds),
    };
  }

  async function analyzeAllStocks(limit?: number): Promise<StockReport[]> {
    const symbols = Array.from(await store.allStockSymbols()).sort();
    const reports: StockReport[] = [];
    for (const symbol of symbols) {
      reports.push(await analyzeStock(symbol, limit));
    }
    return reports;
  }

  return {
    aggregate,
    analyzeStock,
    analyzeAllStocks,
    recommend: (averageSentiment: number, mentionCount: number) =>
      recommend(averageSentiment, mentionCount, thresholds),
  };
}

export type SentimentAnalyzer = ReturnType<typeof createSentimentAnalyzer>;
