import type { StockReport } from "../sentiment/analyzer.js";

export type DataSummary = {
  stocks: Array<{ symbol: string; mentions: number }>;
  totalMentions: number;
  recent: Array<{ symbol: string; content: string; createdAt: string }>;
};

const PREVIEW_LENGTH = 50;

function formatSigned(value: number): string {
  const fixed = value.toFixed(3);
  return value >= 0 ? `+${fixed}` : fixed;
}

function preview(content: string): string {
  const flat = content.replace(/\s+/g, " ").trim();
  if (flat.length <= PREVIEW_LENGTH) {
    return flat;
  }
  return `${flat.slice(0, PREVIEW_LENGTH)}...`;
}

export function formatAnalysisReport(reports: StockReport[]): string {
  const lines = ["=== Sentiment Analysis ==="];
  if (reports.length === 0) {
    lines.push("No tracked stocks.");
    return lines.join("\n");
  }
  const width = Math.max(...reports.map((report) => report.symbol.length));
  for (const report of reports) {
    lines.push(
      `${report.symbol.padEnd(width)}  ${report.recommendation.padEnd(4)}  avg ${formatSigned(
        report.averageSentiment,
      )}  analyzed ${report.analyzedCount}/${report.totalMentions}`,
    );
  }
  return lines.join("\n");
}

export function formatDataSummary(summary: DataSummary): string {
  const lines = [
    "=== Data Summary ===",
    `Tracked stocks: ${summary.stocks.length}`,
    `Total mentions: ${summary.totalMentions}`,
  ];
  if (summary.stocks.length > 0) {
    lines.push("", "Stocks:");
    for (const stock of summary.stocks) {
      lines.push(`  ${stock.symbol}: ${stock.mentions} mentions`);
    }
  }
  if (summary.recent.length > 0) {
    lines.push("", "Recent mentions:");
    for (const mention of summary.recent) {
      lines.push(`  [${mention.symbol}] ${preview(mention.content)}`);
    }
  }
  return lines.join("\n");
}
