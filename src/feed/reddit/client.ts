import { z } from "zod";
import type { RedditCredentials } from "../../config/config.js";
import type { FeedClient, FeedItem } from "../types.js";
import { resolveBodyText } from "../extract.js";
import { createRateLimiter, fetchWithLimits, type FetchLike, type FetchResult } from "../fetch.js";

export const REDDIT_TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
export const REDDIT_API_BASE = "https://oauth.reddit.com";
export const REDDIT_PERMALINK_BASE = "https://reddit.com";

export class RedditApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "RedditApiError";
    this.status = status;
  }
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

const ListingSchema = z.object({
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
  }),
});

const SubmissionSchema = z.object({
  id: z.string(),
  created_utc: z.number(),
  title: z.string(),
  selftext: z.string().optional(),
  selftext_html: z.string().nullable().optional(),
  url: z.string().optional(),
  permalink: z.string(),
  author: z.string().optional(),
});

const CommentSchema = z.object({
  id: z.string(),
  created_utc: z.number(),
  body: z.string(),
  body_html: z.string().nullable().optional(),
  permalink: z.string(),
  author: z.string().optional(),
});

type ListingKind = "new" | "comments";

const CHILD_KIND: Record<ListingKind, string> = {
  new: "t3",
  comments: "t1",
};

export type RedditClientParams = {
  credentials: RedditCredentials;
  fetchImpl?: FetchLike;
  pageSize?: number;
  maxPages?: number;
  timeoutMs?: number;
  rateLimitPerHostPerMinute?: number;
  now?: () => number;
};

function parseJson(result: FetchResult, what: string): unknown {
  try {
    return JSON.parse(result.body);
  } catch {
    throw new RedditApiError(`${what}: response is not JSON`, result.status);
  }
}

function toSubmission(data: unknown): FeedItem {
  const parsed = SubmissionSchema.safeParse(data);
  if (!parsed.success) {
    throw new RedditApiError(`unexpected submission payload: ${parsed.error.message}`, 200);
  }
  const post = parsed.data;
  return {
    kind: "submission",
    id: post.id,
    createdUtc: post.created_utc,
    author: post.author ?? "[deleted]",
    title: post.title,
    body: resolveBodyText(post.selftext, post.selftext_html),
    url: post.url || `${REDDIT_PERMALINK_BASE}${post.permalink}`,
  };
}

function toComment(data: unknown): FeedItem {
  const parsed = CommentSchema.safeParse(data);
  if (!parsed.success) {
    throw new RedditApiError(`unexpected comment payload: ${parsed.error.message}`, 200);
  }
  const comment = parsed.data;
  return {
    kind: "comment",
    id: comment.id,
    createdUtc: comment.created_utc,
    author: comment.author ?? "[deleted]",
    body: resolveBodyText(comment.body, comment.body_html),
    url: `${REDDIT_PERMALINK_BASE}${comment.permalink}`,
  };
}

/**
 * Application-only OAuth client for subreddit listings. Listings are exposed as lazy,
 * newest-first async generators that page with Reddit's `after` cursor.
 */
export function createRedditClient(params: RedditClientParams): FeedClient {
  const fetchImpl = params.fetchImpl ?? fetch;
  const pageSize = params.pageSize ?? 100;
  const maxPages = params.maxPages ?? 10;
  const rateLimit = params.rateLimitPerHostPerMinute ?? 60;
  const now = params.now ?? (() => Date.now());
  const limits = {
    timeoutMs: params.timeoutMs ?? 15_000,
    maxBytes: 5_000_000,
    userAgent: params.credentials.userAgent,
  };
  const rateLimiter = createRateLimiter();
  let token: { value: string; expiresAt: number } | null = null;

  async function getAccessToken(): Promise<string> {
    if (token && now() < token.expiresAt) {
      return token.value;
    }
    const basic = Buffer.from(
      `${params.credentials.clientId}:${params.credentials.clientSecret}`,
    ).toString("base64");
    await rateLimiter(new URL(REDDIT_TOKEN_URL), rateLimit);
    const res = await fetchWithLimits(
      REDDIT_TOKEN_URL,
      limits,
      {
        method: "POST",
        headers: {
          authorization: `Basic ${basic}`,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: "grant_type=client_credentials",
      },
      fetchImpl,
    );
    if (!res.ok) {
      throw new RedditApiError(
        `token request failed (${res.status})${res.error ? `: ${res.error}` : ""}`,
        res.status,
      );
    }
    const parsed = TokenResponseSchema.safeParse(parseJson(res, "token request"));
    if (!parsed.success) {
      throw new RedditApiError("token response missing access_token", res.status);
    }
    // Refresh a minute early.
    token = {
      value: parsed.data.access_token,
      expiresAt: now() + Math.max(0, parsed.data.expires_in - 60) * 1000,
    };
    return token.value;
  }

  async function fetchPage(
    channel: string,
    kind: ListingKind,
    after: string | null,
  ): Promise<{ children: Array<{ kind: string; data?: unknown }>; after: string | null }> {
    const url = new URL(`${REDDIT_API_BASE}/r/${encodeURIComponent(channel)}/${kind}`);
    url.searchParams.set("limit", String(pageSize));
    url.searchParams.set("raw_json", "1");
    if (after) {
      url.searchParams.set("after", after);
    }
    const accessToken = await getAccessToken();
    await rateLimiter(url, rateLimit);
    const res = await fetchWithLimits(
      url.toString(),
      limits,
      { headers: { authorization: `bearer ${accessToken}` } },
      fetchImpl,
    );
    if (!res.ok) {
      throw new RedditApiError(
        `listing r/${channel}/${kind} failed (${res.status})${res.error ? `: ${res.error}` : ""}`,
        res.status,
      );
    }
    const parsed = ListingSchema.safeParse(parseJson(res, `listing r/${channel}/${kind}`));
    if (!parsed.success) {
      throw new RedditApiError(`listing r/${channel}/${kind} has an unexpected shape`, res.status);
    }
    return { children: parsed.data.data.children, after: parsed.data.data.after ?? null };
  }

  async function* listing(channel: string, kind: ListingKind): AsyncGenerator<FeedItem> {
    let after: string | null = null;
    for (let page = 0; page < maxPages; page += 1) {
      const result = await fetchPage(channel, kind, after);
      for (const child of result.children) {
        if (child.kind !== CHILD_KIND[kind]) {
          continue;
        }
        yield kind === "new" ? toSubmission(child.data) : toComment(child.data);
      }
      if (!result.after || result.children.length === 0) {
        return;
      }
      after = result.after;
    }
  }

  return {
    submissions: (channel) => listing(channel, "new"),
    comments: (channel) => listing(channel, "comments"),
  };
}
