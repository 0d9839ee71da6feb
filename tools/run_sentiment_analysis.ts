import crypto from "node:crypto";
import { loadConfig } from "../src/config/config.js";
import { runSentimentAnalysis } from "../src/jobs/analyze.js";
import { appendRunRecord, buildRunRecord } from "../src/ops/runs.js";
import { formatAnalysisReport } from "../src/report/format.js";

const cfg = loadConfig({ configPath: process.argv[2] });

const runId = `sent-${crypto.randomUUID()}`;
const startedAt = new Date().toISOString();
const reports = await runSentimentAnalysis({ cfg });
const finishedAt = new Date().toISOString();

const counts: Record<string, number> = {
  stocks: reports.length,
  mentions: 0,
  analyzed: 0,
  buy: 0,
  sell: 0,
  hold: 0,
};
for (const report of reports) {
  counts.mentions += report.totalMentions;
  counts.analyzed += report.analyzedCount;
  counts[report.recommendation.toLowerCase()] += 1;
}

await appendRunRecord(
  buildRunRecord({ runId, job: "sentiment_analysis", startedAt, finishedAt, counts }),
);
console.log(formatAnalysisReport(reports));
