import { clamp } from "../utils.js";

const POSITIVE_WORDS = [
  "buy",
  "bullish",
  "moon",
  "rocket",
  "gains",
  "up",
  "rise",
  "good",
  "great",
  "excellent",
  "strong",
  "beat",
  "winning",
  "profit",
  "growth",
  "increase",
  "bull",
  "positive",
  "optimistic",
  "upgrade",
];
const NEGATIVE_WORDS = [
  "sell",
  "bearish",
  "crash",
  "dump",
  "loss",
  "down",
  "fall",
  "bad",
  "terrible",
  "weak",
  "miss",
  "losing",
  "decline",
  "decrease",
  "bear",
  "negative",
  "pessimistic",
  "downgrade",
  "short",
];

export type SentimentScorer = (text: string, ticker: string) => number;

function countPresent(haystack: string, words: readonly string[]): number {
  return words.reduce((acc, word) => acc + (haystack.includes(word) ? 1 : 0), 0);
}

/**
 * Keyword sentiment for `ticker` in `text`, in [-1, 1]. Words are matched as substrings and
 * each word counts once. Text that never names the ticker scores 0.
 */
export const scoreSentiment: SentimentScorer = (text, ticker) => {
  const haystack = text.toLowerCase();
  if (!haystack.includes(ticker.toLowerCase())) {
    return 0;
  }
  const pos = countPresent(haystack, POSITIVE_WORDS);
  const neg = countPresent(haystack, NEGATIVE_WORDS);
  const total = pos + neg;
  if (total === 0) {
    return 0;
  }
  return clamp((pos - neg) / Math.max(total, 1), -1, 1);
};
