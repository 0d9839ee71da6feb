import { describe, expect, it } from "vitest";
import { formatAnalysisReport, formatDataSummary } from "./format.js";

describe("formatAnalysisReport", () => {
  it("renders one aligned line per stock", () => {
    const text = formatAnalysisReport([
      {
        symbol: "AAPL",
        recommendation: "BUY",
        averageSentiment: 0.8125,
        totalMentions: 12,
        analyzedCount: 12,
        byType: { submission: 4, comment: 8 },
      },
      {
        symbol: "GO",
        recommendation: "SELL",
        averageSentiment: -0.25,
        totalMentions: 6,
        analyzedCount: 5,
        byType: { comment: 6 },
      },
    ]);
    expect(text.split("\n")).toEqual([
      "=== Sentiment Analysis ===",
      "AAPL  BUY   avg +0.813  analyzed 12/12",
      "GO    SELL  avg -0.250  analyzed 5/6",
    ]);
  });

  it("says so when nothing is tracked", () => {
    expect(formatAnalysisReport([])).toBe("=== Sentiment Analysis ===\nNo tracked stocks.");
  });
});

describe("formatDataSummary", () => {
  it("lists stocks and truncated recent mentions", () => {
    const text = formatDataSummary({
      stocks: [
        { symbol: "AAPL", mentions: 2 },
        { symbol: "TSLA", mentions: 1 },
      ],
      totalMentions: 3,
      recent: [
        {
          symbol: "AAPL",
          content: "AAPL\nis going to rip after earnings, loading up on calls this week",
          createdAt: "2024-06-01T00:00:00.000Z",
        },
        { symbol: "TSLA", content: "TSLA short", createdAt: "2024-05-31T00:00:00.000Z" },
      ],
    });
    expect(text.split("\n")).toEqual([
      "=== Data Summary ===",
      "Tracked stocks: 2",
      "Total mentions: 3",
      "",
      "Stocks:",
      "  AAPL: 2 mentions",
      "  TSLA: 1 mentions",
      "",
      "Recent mentions:",
      "  [AAPL] AAPL is going to rip after earnings, loading up on...",
      "  [TSLA] TSLA short",
    ]);
  });
});
