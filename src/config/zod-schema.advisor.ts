import { z } from "zod";

const DatabaseSchema = z
  .object({
    path: z.string().min(1).optional(),
  })
  .strict()
  .optional();

const RedditCredentialsSchema = z
  .object({
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    userAgent: z.string().optional(),
  })
  .strict()
  .optional();

const RedditSchema = z
  .object({
    subreddits: z.array(z.string().min(1)).optional(),
    tickers: z.array(z.string().regex(/^[A-Za-z0-9]+$/, "ticker must be alphanumeric")).optional(),
    minDays: z.number().nonnegative().optional(),
    maxDays: z.number().nonnegative().optional(),
    channelDelayMs: z.number().int().nonnegative().optional(),
    pageSize: z.number().int().min(1).max(100).optional(),
    fetchTimeoutMs: z.number().int().positive().optional(),
    rateLimitPerHostPerMinute: z.number().nonnegative().optional(),
    credentials: RedditCredentialsSchema,
  })
  .strict()
  .optional();

const AnalysisSchema = z
  .object({
    sentimentThresholdBuy: z.number().optional(),
    sentimentThresholdSell: z.number().optional(),
    minMentions: z.number().int().nonnegative().optional(),
  })
  .strict()
  .optional();

export const AdvisorConfigSchema = z
  .object({
    database: DatabaseSchema,
    reddit: RedditSchema,
    analysis: AnalysisSchema,
  })
  .strict();
