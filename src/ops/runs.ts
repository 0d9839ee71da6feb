import fs from "node:fs";
import path from "node:path";
import { resolveStateDir } from "../config/paths.js";
import { VERSION } from "../version.js";

export type RunRecord = {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  counts?: Record<string, number>;
  provenance: { runId: string; agent: string; version: string };
};

export const OPS_RUNS_PATH = path.join("ops", "runs.ndjson");

export function resolveOpsRunsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), OPS_RUNS_PATH);
}

async function ensureDir(filePath: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function appendRunRecord(
  record: RunRecord,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const filePath = resolveOpsRunsPath(env);
  await ensureDir(filePath);
  await fs.promises.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export function buildRunRecord(params: {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  counts?: Record<string, number>;
}): RunRecord {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    runId: params.runId,
    job: params.job,
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    durationMs: Math.max(0, durationMs),
    counts: params.counts,
    provenance: {
      runId: params.runId,
      agent: params.job,
      version: VERSION,
    },
  };
}
