import { z } from "zod";
import type { FeedItemKind } from "../feed/types.js";

/**
 * Metadata is free-form once stored. Known keys are read when they have the expected type;
 * anything else is carried through untouched.
 */
export const MentionMetadataSchema = z
  .object({
    type: z.string().optional().catch(undefined),
    subreddit: z.string().optional().catch(undefined),
    author: z.string().optional().catch(undefined),
    ageDays: z.number().optional().catch(undefined),
    tickers: z.array(z.string()).optional().catch(undefined),
  })
  .passthrough();

export type MentionMetadata = z.infer<typeof MentionMetadataSchema>;

/** The blob the ingest path writes. */
export type MentionMetadataRecord = {
  type: FeedItemKind;
  subreddit: string;
  author: string;
  ageDays: number;
  tickers: string[];
};

export class MalformedMetadataError extends Error {
  constructor(reason: string) {
    super(`malformed mention metadata: ${reason}`);
    this.name = "MalformedMetadataError";
  }
}

export function serializeMentionMetadata(metadata: MentionMetadataRecord): string {
  return JSON.stringify(metadata);
}

/** Mentions stored without metadata yield null; a blob that is not a JSON object is corruption. */
export function parseMentionMetadata(raw: string | null): MentionMetadata | null {
  if (raw === null) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MalformedMetadataError(String(err));
  }
  const result = MentionMetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedMetadataError("expected a JSON object");
  }
  return result.data;
}
