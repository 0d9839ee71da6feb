import crypto from "node:crypto";
import { loadConfig } from "../src/config/config.js";
import { runMentionIngest, summaryCounts } from "../src/jobs/ingest.js";
import { appendRunRecord, buildRunRecord } from "../src/ops/runs.js";

const cfg = loadConfig({ configPath: process.argv[2] });

const runId = `ingest-${crypto.randomUUID()}`;
const startedAt = new Date().toISOString();
const summary = await runMentionIngest({ cfg });
const finishedAt = new Date().toISOString();

const record = buildRunRecord({
  runId,
  job: "mention_ingest",
  startedAt,
  finishedAt,
  counts: summaryCounts(summary),
});
await appendRunRecord(record);

console.log(
  `Mention ingest summary\nchannels: ${summary.channels.length}\nstored: ${summary.stored}\nskipped: ${summary.skipped}\nfailures: ${summary.failures}`,
);
if (summary.failures > 0) {
  process.exitCode = 2;
}
