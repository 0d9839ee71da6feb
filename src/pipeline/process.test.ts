import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MentionStore } from "../store/types.js";
import { createMentionStore } from "../store/store.js";
import { createTickerExtractor } from "../tickers/extract.js";
import { createMentionPipeline } from "./process.js";

describe("mention pipeline", () => {
  let tempDir: string;
  let store: MentionStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "advisor-pipeline-"));
    store = createMentionStore({ storePath: path.join(tempDir, "store.json") });
    await store.upsertStock("AAPL");
    await store.upsertStock("TSLA");
  });

  afterEach(async () => {
    await store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function candidate(content: string, externalId = "reddit_submission_abc123") {
    return { content, url: "https://example.com/post", externalId, metadata: null };
  }

  it("stores one row per matched ticker", async () => {
    const pipeline = createMentionPipeline({
      store,
      extractor: createTickerExtractor(["AAPL", "TSLA"]),
    });
    const result = await pipeline.process(candidate("Rotating out of TSLA into AAPL"));
    expect(result).toEqual({ storedCount: 2, outcome: "stored", tickers: ["AAPL", "TSLA"] });

    const aapl = await store.mentionsForStock("AAPL");
    const tsla = await store.mentionsForStock("TSLA");
    expect(aapl).toHaveLength(1);
    expect(tsla).toHaveLength(1);
    expect(aapl[0]?.externalId).toBe("reddit_submission_abc123");
    expect(tsla[0]?.externalId).toBe("reddit_submission_abc123");
    expect(aapl[0]?.stockId).not.toBe(tsla[0]?.stockId);
  });

  it("reports content without configured tickers separately from duplicates", async () => {
    const pipeline = createMentionPipeline({
      store,
      extractor: createTickerExtractor(["AAPL", "TSLA"]),
    });
    expect(await pipeline.process(candidate("nothing to see"))).toEqual({
      storedCount: 0,
      outcome: "no-ticker",
      tickers: [],
    });
    await pipeline.process(candidate("AAPL"));
    expect(await pipeline.process(candidate("AAPL"))).toEqual({
      storedCount: 0,
      outcome: "duplicate",
      tickers: ["AAPL"],
    });
  });

  it("checks for duplicates once per item", async () => {
    const existsSpy = vi.spyOn(store, "existsByExternalId");
    const pipeline = createMentionPipeline({
      store,
      extractor: createTickerExtractor(["AAPL", "TSLA"]),
    });
    await pipeline.process(candidate("AAPL TSLA"));
    expect(existsSpy).toHaveBeenCalledTimes(1);
  });

  it("drops tickers that have no stock row", async () => {
    const pipeline = createMentionPipeline({
      store,
      extractor: createTickerExtractor(["AAPL", "MSFT"]),
    });
    expect(await pipeline.process(candidate("MSFT and AAPL", "reddit_comment_1"))).toEqual({
      storedCount: 1,
      outcome: "stored",
      tickers: ["AAPL", "MSFT"],
    });
    expect(await pipeline.process(candidate("only MSFT", "reddit_comment_2"))).toEqual({
      storedCount: 0,
      outcome: "untracked",
      tickers: ["MSFT"],
    });
  });

  it("builds metadata from the tickers it matched", async () => {
    const pipeline = createMentionPipeline({
      store,
      extractor: createTickerExtractor(["AAPL", "TSLA"]),
    });
    const build = vi.fn((tickers: string[]) => JSON.stringify({ tickers }));
    await pipeline.process({
      content: "tsla then aapl",
      url: null,
      externalId: "reddit_comment_9",
      metadata: build,
    });
    expect(build).toHaveBeenCalledTimes(1);
    expect(build).toHaveBeenCalledWith(["AAPL", "TSLA"]);
    const [aapl] = await store.mentionsForStock("AAPL");
    expect(aapl?.metadata).toBe('{"tickers":["AAPL","TSLA"]}');
  });

  it("does not build metadata for skipped items", async () => {
    const pipeline = createMentionPipeline({
      store,
      extractor: createTickerExtractor(["AAPL"]),
    });
    const build = vi.fn(() => "{}");
    await pipeline.process({ content: "nothing", url: null, externalId: "x", metadata: build });
    expect(build).not.toHaveBeenCalled();
  });
});
