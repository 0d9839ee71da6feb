import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import type { AdvisorConfig } from "./types.advisor.js";
import { resolveDefaultStorePath } from "./paths.js";
import { AdvisorConfigSchema } from "./zod-schema.advisor.js";

export type { AdvisorConfig } from "./types.advisor.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_CONFIG: AdvisorConfig = {
  database: {},
  reddit: {
    subreddits: ["WallStreetBets"],
    tickers: ["AAPL", "TSLA", "GOOG"],
    minDays: 1,
    maxDays: 3,
    channelDelayMs: 2_000,
  },
  analysis: {
    sentimentThresholdBuy: 0.7,
    sentimentThresholdSell: 0.3,
    minMentions: 5,
  },
};

/** Environment variables that carry the Reddit API credentials. */
export const CREDENTIAL_ENV = {
  clientId: "CLIENT_ID",
  clientSecret: "CLIENT_SECRET",
  userAgent: "USER_AGENT",
} as const;

const CREDENTIAL_FIELDS = ["clientId", "clientSecret", "userAgent"] as const;

export type RedditCredentials = {
  clientId: string;
  clientSecret: string;
  userAgent: string;
};

export type RedditSettings = {
  subreddits: string[];
  tickers: string[];
  minDays: number;
  maxDays: number;
  channelDelayMs: number;
};

export type AnalysisThresholds = {
  buy: number;
  sell: number;
  minMentions: number;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Overlays `overlay` onto `base` one level deep: when both sides hold a map for a key the
 * maps are merged key-by-key, any other value replaces the base value wholesale.
 */
export function mergeConfig(
  base: Record<string, unknown>,
  overlay: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = merged[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      merged[key] = { ...current, ...value };
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

function readConfigFile(configPath: string): Record<string, unknown> | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Unable to read config file ${configPath}: ${String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${String(err)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

function applyCredentialEnv(
  merged: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const reddit = merged.reddit;
  if (!isPlainObject(reddit)) {
    return merged;
  }
  const credentials: Record<string, unknown> = isPlainObject(reddit.credentials)
    ? { ...reddit.credentials }
    : {};
  for (const [field, envName] of Object.entries(CREDENTIAL_ENV)) {
    const value = env[envName]?.trim();
    if (value) {
      credentials[field] = value;
    }
  }
  return { ...merged, reddit: { ...reddit, credentials } };
}

/** Default location of the optional dotenv file with API credentials. */
export const DEFAULT_ENV_FILE = ".env";

/** Reads a dotenv file; a missing file yields no variables. */
export function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    return {};
  }
  try {
    return dotenv.parse(fs.readFileSync(envPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Unable to read env file ${envPath}: ${String(err)}`);
  }
}

export function loadConfig(
  params: { configPath?: string; env?: NodeJS.ProcessEnv; envPath?: string } = {},
): AdvisorConfig {
  // Variables already in the environment win over the dotenv file.
  const env: NodeJS.ProcessEnv = {
    ...readEnvFile(path.resolve(params.envPath ?? DEFAULT_ENV_FILE)),
    ...(params.env ?? process.env),
  };
  let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG);
  if (params.configPath) {
    const fileConfig = readConfigFile(params.configPath);
    if (fileConfig) {
      merged = mergeConfig(merged, fileConfig);
    }
  }
  merged = applyCredentialEnv(merged, env);
  const result = AdvisorConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

export function resolveStorePath(
  cfg: AdvisorConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const configured = cfg.database?.path?.trim();
  if (!configured) {
    return resolveDefaultStorePath(env);
  }
  if (configured.startsWith("~/")) {
    return path.join(os.homedir(), configured.slice(2));
  }
  return path.resolve(configured);
}

export function resolveRedditSettings(cfg: AdvisorConfig): RedditSettings {
  const reddit = cfg.reddit ?? {};
  for (const field of ["subreddits", "tickers", "maxDays"] as const) {
    if (reddit[field] === undefined) {
      throw new ConfigError(`Missing required config field: reddit.${field}`);
    }
  }
  return {
    subreddits: reddit.subreddits ?? [],
    tickers: (reddit.tickers ?? []).map((ticker) => ticker.trim().toUpperCase()),
    minDays: reddit.minDays ?? 0,
    maxDays: reddit.maxDays ?? 7,
    channelDelayMs: reddit.channelDelayMs ?? 2_000,
  };
}

export function resolveRedditCredentials(cfg: AdvisorConfig): RedditCredentials {
  const credentials = cfg.reddit?.credentials ?? {};
  const missing = CREDENTIAL_FIELDS.filter((field) => !credentials[field]);
  if (missing.length > 0) {
    const names = missing.map((field) => CREDENTIAL_ENV[field]).join(", ");
    throw new ConfigError(
      `Missing Reddit API credential: ${names} (set in the environment or a .env file)`,
    );
  }
  return {
    clientId: credentials.clientId ?? "",
    clientSecret: credentials.clientSecret ?? "",
    userAgent: credentials.userAgent ?? "",
  };
}

export function resolveAnalysisThresholds(cfg: AdvisorConfig): AnalysisThresholds {
  const analysis = cfg.analysis ?? {};
  return {
    buy: analysis.sentimentThresholdBuy ?? 0.7,
    sell: analysis.sentimentThresholdSell ?? 0.3,
    minMentions: analysis.minMentions ?? 5,
  };
}
