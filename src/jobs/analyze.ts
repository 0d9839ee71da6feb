import type { DataSummary } from "../report/format.js";
import type { MentionStore } from "../store/types.js";
import {
  resolveAnalysisThresholds,
  resolveStorePath,
  type AdvisorConfig,
} from "../config/config.js";
import { createSentimentAnalyzer, type StockReport } from "../sentiment/analyzer.js";
import { createMentionStore } from "../store/store.js";

export type AnalyzeParams = {
  cfg: AdvisorConfig;
  env?: NodeJS.ProcessEnv;
  store?: MentionStore;
  /** Restrict the run to one symbol; every tracked stock otherwise. */
  symbol?: string;
  limit?: number;
};

async function withStore<T>(
  params: { cfg: AdvisorConfig; env?: NodeJS.ProcessEnv; store?: MentionStore },
  work: (store: MentionStore) => Promise<T>,
): Promise<T> {
  const store =
    params.store ?? createMentionStore({ storePath: resolveStorePath(params.cfg, params.env) });
  try {
    return await work(store);
  } finally {
    if (!params.store) {
      await store.close();
    }
  }
}

export async function runSentimentAnalysis(params: AnalyzeParams): Promise<StockReport[]> {
  return await withStore(params, async (store) => {
    const analyzer = createSentimentAnalyzer({
      store,
      thresholds: resolveAnalysisThresholds(params.cfg),
    });
    if (params.symbol) {
      return [await analyzer.analyzeStock(params.symbol, params.limit)];
    }
    return await analyzer.analyzeAllStocks(params.limit);
  });
}

export async function buildDataSummary(params: {
  cfg: AdvisorConfig;
  env?: NodeJS.ProcessEnv;
  store?: MentionStore;
  recentLimit?: number;
}): Promise<DataSummary> {
  const recentLimit = params.recentLimit ?? 5;
  return await withStore(params, async (store) => {
    const stocks = await store.listStocks();
    const perStock: DataSummary["stocks"] = [];
    const recent: DataSummary["recent"] = [];
    for (const stock of stocks) {
      perStock.push({ symbol: stock.symbol, mentions: await store.countMentions(stock.id) });
      for (const mention of await store.mentionsForStock(stock.symbol, recentLimit)) {
        recent.push({ symbol: stock.symbol, content: mention.content, createdAt: mention.createdAt });
      }
    }
    recent.sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
    return {
      stocks: perStock,
      totalMentions: await store.countMentions(),
      recent: recent.slice(0, recentLimit),
    };
  });
}
