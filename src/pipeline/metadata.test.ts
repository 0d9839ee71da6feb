import { describe, expect, it } from "vitest";
import {
  MalformedMetadataError,
  parseMentionMetadata,
  serializeMentionMetadata,
} from "./metadata.js";

describe("parseMentionMetadata", () => {
  it("reads the blob the ingest path writes", () => {
    const raw = serializeMentionMetadata({
      type: "comment",
      subreddit: "stocks",
      author: "bob",
      ageDays: 1.5,
      tickers: ["AAPL"],
    });
    expect(parseMentionMetadata(raw)).toEqual({
      type: "comment",
      subreddit: "stocks",
      author: "bob",
      ageDays: 1.5,
      tickers: ["AAPL"],
    });
  });

  it("keeps unknown keys and drops known keys of the wrong type", () => {
    expect(parseMentionMetadata('{"type":7,"age_days":1.2,"subreddit":"stocks"}')).toEqual({
      subreddit: "stocks",
      age_days: 1.2,
    });
    expect(parseMentionMetadata("{}")).toEqual({});
  });

  it("returns null for a missing blob", () => {
    expect(parseMentionMetadata(null)).toBeNull();
  });

  it("rejects blobs that are not JSON objects", () => {
    expect(() => parseMentionMetadata("{oops")).toThrow(MalformedMetadataError);
    expect(() => parseMentionMetadata("[1, 2]")).toThrow(
      "malformed mention metadata: expected a JSON object",
    );
    expect(() => parseMentionMetadata("null")).toThrow(MalformedMetadataError);
    expect(() => parseMentionMetadata('"text"')).toThrow(MalformedMetadataError);
  });
});
