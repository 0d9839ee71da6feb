import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  loadConfig,
  mergeConfig,
  resolveAnalysisThresholds,
  resolveRedditCredentials,
  resolveRedditSettings,
  resolveStorePath,
} from "./config.js";

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "advisor-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(body: string): Promise<string> {
    const configPath = path.join(tempDir, "config.json");
    await fs.writeFile(configPath, body, "utf-8");
    return configPath;
  }

  it("returns the defaults without a file", () => {
    const cfg = loadConfig({ env: {} });
    expect(cfg.reddit?.subreddits).toEqual(["WallStreetBets"]);
    expect(cfg.reddit?.tickers).toEqual(["AAPL", "TSLA", "GOOG"]);
    expect(cfg.analysis).toEqual({
      sentimentThresholdBuy: 0.7,
      sentimentThresholdSell: 0.3,
      minMentions: 5,
    });
  });

  it("ignores a config path that does not exist", () => {
    const cfg = loadConfig({ configPath: path.join(tempDir, "missing.json"), env: {} });
    expect(cfg.reddit?.maxDays).toBe(3);
  });

  it("merges file sections over the defaults one level deep", async () => {
    const configPath = await writeConfig(
      JSON.stringify({ reddit: { tickers: ["MSFT"] }, analysis: { minMentions: 2 } }),
    );
    const cfg = loadConfig({ configPath, env: {} });
    expect(cfg.reddit?.tickers).toEqual(["MSFT"]);
    expect(cfg.reddit?.subreddits).toEqual(["WallStreetBets"]);
    expect(cfg.analysis?.minMentions).toBe(2);
    expect(cfg.analysis?.sentimentThresholdBuy).toBe(0.7);
  });

  it("overlays credentials from the environment", () => {
    const cfg = loadConfig({
      env: { CLIENT_ID: "test-client", CLIENT_SECRET: "test-secret", USER_AGENT: "advisor/1.0" },
    });
    expect(resolveRedditCredentials(cfg)).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      userAgent: "advisor/1.0",
    });
  });

  it("reads credentials from a dotenv file with the environment taking precedence", async () => {
    const envPath = path.join(tempDir, ".env");
    await fs.writeFile(
      envPath,
      "CLIENT_ID=file-client\nCLIENT_SECRET=test-secret\nUSER_AGENT=\"advisor file/1.0\"\n",
      "utf-8",
    );
    const cfg = loadConfig({ envPath, env: { CLIENT_ID: "env-client" } });
    expect(resolveRedditCredentials(cfg)).toEqual({
      clientId: "env-client",
      clientSecret: "test-secret",
      userAgent: "advisor file/1.0",
    });
  });

  it("treats a missing dotenv file as empty", () => {
    const cfg = loadConfig({ envPath: path.join(tempDir, "absent.env"), env: {} });
    expect(cfg.reddit?.credentials).toEqual({});
  });

  it("rejects malformed files", async () => {
    const configPath = await writeConfig("{oops");
    expect(() => loadConfig({ configPath, env: {} })).toThrow(ConfigError);
    const arrayPath = await writeConfig("[1, 2]");
    expect(() => loadConfig({ configPath: arrayPath, env: {} })).toThrow(
      "must contain a JSON object",
    );
  });

  it("rejects values that fail validation", async () => {
    const configPath = await writeConfig(JSON.stringify({ reddit: { tickers: ["BRK.B"] } }));
    expect(() => loadConfig({ configPath, env: {} })).toThrow(
      "Invalid configuration: reddit.tickers.0: ticker must be alphanumeric",
    );
    const unknownPath = await writeConfig(JSON.stringify({ telemetry: true }));
    expect(() => loadConfig({ configPath: unknownPath, env: {} })).toThrow(ConfigError);
  });
});

describe("mergeConfig", () => {
  it("replaces non-map values wholesale", () => {
    expect(mergeConfig({ a: { x: 1, y: 2 }, b: [1] }, { a: { y: 3 }, b: [2, 3] })).toEqual({
      a: { x: 1, y: 3 },
      b: [2, 3],
    });
    expect(mergeConfig({ a: { x: 1 } }, { a: 5 })).toEqual({ a: 5 });
  });
});

describe("resolvers", () => {
  it("names every missing credential", () => {
    expect(() =>
      resolveRedditCredentials({ reddit: { credentials: { clientId: "test-client" } } }),
    ).toThrow("Missing Reddit API credential: CLIENT_SECRET, USER_AGENT");
  });

  it("requires subreddits, tickers and maxDays", () => {
    expect(() => resolveRedditSettings({ reddit: { tickers: ["AAPL"], maxDays: 2 } })).toThrow(
      "Missing required config field: reddit.subreddits",
    );
    expect(
      resolveRedditSettings({ reddit: { subreddits: ["stocks"], tickers: ["aapl"], maxDays: 2 } }),
    ).toEqual({
      subreddits: ["stocks"],
      tickers: ["AAPL"],
      minDays: 0,
      maxDays: 2,
      channelDelayMs: 2_000,
    });
  });

  it("falls back to default thresholds", () => {
    expect(resolveAnalysisThresholds({})).toEqual({ buy: 0.7, sell: 0.3, minMentions: 5 });
    expect(resolveAnalysisThresholds({ analysis: { sentimentThresholdSell: 0.1 } })).toEqual({
      buy: 0.7,
      sell: 0.1,
      minMentions: 5,
    });
  });

  it("places the store under the state dir unless a path is configured", () => {
    expect(resolveStorePath({}, { ADVISOR_STATE_DIR: "/var/lib/advisor" })).toBe(
      path.join("/var/lib/advisor", "advisor", "store.json"),
    );
    expect(resolveStorePath({ database: { path: "/data/store.json" } }, {})).toBe(
      "/data/store.json",
    );
  });
});
