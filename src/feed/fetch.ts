import { setTimeout as delay } from "node:timers/promises";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchLimits = {
  timeoutMs: number;
  maxBytes: number;
  userAgent: string;
};

export type FetchRequest = {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
};

export type FetchResult = {
  ok: boolean;
  status: number;
  body: string;
  bytes: number;
  error?: string;
};

type RateLimitEntry = {
  lastFetchAt: number;
};

function resolveMinIntervalMs(rateLimitPerHostPerMinute: number): number {
  if (!Number.isFinite(rateLimitPerHostPerMinute) || rateLimitPerHostPerMinute <= 0) {
    return 0;
  }
  return Math.ceil(60_000 / rateLimitPerHostPerMinute);
}

export function createRateLimiter(sleep: (ms: number) => Promise<unknown> = delay) {
  const hosts = new Map<string, RateLimitEntry>();
  return async (url: URL, rateLimitPerHostPerMinute: number) => {
    const host = url.host;
    if (!host) {
      return;
    }
    const minInterval = resolveMinIntervalMs(rateLimitPerHostPerMinute);
    if (minInterval === 0) {
      return;
    }
    const entry = hosts.get(host);
    const now = Date.now();
    if (entry) {
      const elapsed = now - entry.lastFetchAt;
      if (elapsed < minInterval) {
        await sleep(minInterval - elapsed);
      }
    }
    hosts.set(host, { lastFetchAt: Date.now() });
  };
}

export async function fetchWithLimits(
  url: string,
  limits: FetchLimits,
  request: FetchRequest = {},
  fetchImpl: FetchLike = fetch,
): Promise<FetchResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), limits.timeoutMs);
  try {
    const res = await fetchImpl(url, {
      method: request.method ?? "GET",
      body: request.body,
      signal: controller.signal,
      headers: {
        "user-agent": limits.userAgent,
        ...request.headers,
      },
    });
    const arrayBuf = await res.arrayBuffer();
    const bytes = arrayBuf.byteLength;
    const sliced = bytes > limits.maxBytes ? arrayBuf.slice(0, limits.maxBytes) : arrayBuf;
    const body = Buffer.from(sliced).toString("utf8");
    return {
      ok: res.ok,
      status: res.status,
      body,
      bytes,
    };
  } catch (err) {
    return {
      ok: false,
      status: 0,
      body: "",
      bytes: 0,
      error: String(err),
    };
  } finally {
    clearTimeout(timeout);
  }
}
