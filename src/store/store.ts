import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";
import type { Mention, MentionStore, NewMention, Stock, StoreDocument } from "./types.js";
import { StoreCorruptError, StoreNotInitializedError } from "./errors.js";
import { StoreDocumentSchema } from "./types.js";

const STORE_LOCK_OPTIONS = {
  retries: {
    retries: 8,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 5000,
    randomize: true,
  },
  stale: 30_000,
} as const;

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

type SessionResult<T> = {
  result: T;
  changed: boolean;
};

function createEmptyDocument(): StoreDocument {
  return { version: 1, nextStockId: 1, nextMentionId: 1, stocks: [], mentions: [] };
}

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

async function readStoreFile(filePath: string): Promise<StoreDocument> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return createEmptyDocument();
    }
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new StoreCorruptError(filePath, "invalid JSON");
  }
  const result = StoreDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new StoreCorruptError(
      filePath,
      issue ? `${issue.path.join(".")}: ${issue.message}` : "schema mismatch",
    );
  }
  return result.data;
}

async function writeStoreFile(filePath: string, value: StoreDocument): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.promises.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf-8",
  });
  await fs.promises.chmod(tmp, 0o600);
  await fs.promises.rename(tmp, filePath);
}

async function ensureStoreFile(filePath: string): Promise<void> {
  try {
    await fs.promises.access(filePath);
  } catch {
    await writeStoreFile(filePath, createEmptyDocument());
  }
}

function sortNewestFirst(a: Mention, b: Mention): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return b.id - a.id;
}

/**
 * Opens the JSON-backed mention store at `storePath`. Every operation takes the file lock,
 * reads the document, applies its unit of work and writes the document back atomically
 * before releasing the lock.
 */
export function createMentionStore(params: {
  storePath: string;
  now?: () => Date;
  logger?: Pick<Console, "warn">;
}): MentionStore {
  const filePath = params.storePath;
  const now = params.now ?? (() => new Date());
  const logger = params.logger ?? console;
  let open = true;

  async function withSession<T>(work: (doc: StoreDocument) => SessionResult<T>): Promise<T> {
    if (!open) {
      throw new StoreNotInitializedError(filePath);
    }
    if (!fs.existsSync(filePath)) {
      // Reads on a fresh store see the empty document and leave nothing behind.
      const dry = work(createEmptyDocument());
      if (!dry.changed) {
        return dry.result;
      }
      await ensureStoreFile(filePath);
    }
    let release: (() => Promise<void>) | undefined;
    try {
      release = await lockfile.lock(filePath, STORE_LOCK_OPTIONS);
      const doc = await readStoreFile(filePath);
      const { result, changed } = work(doc);
      if (changed) {
        await writeStoreFile(filePath, doc);
      }
      return result;
    } finally {
      if (release) {
        try {
          await release();
        } catch (err) {
          logger.warn(`mention store: failed to release lock on ${filePath}: ${String(err)}`);
        }
      }
    }
  }

  function findStock(doc: StoreDocument, symbol: string): Stock | undefined {
    const normalized = normalizeSymbol(symbol);
    return doc.stocks.find((stock) => stock.symbol === normalized);
  }

  async function upsertStock(symbol: string): Promise<number> {
    const normalized = normalizeSymbol(symbol);
    if (!SYMBOL_PATTERN.test(normalized)) {
      throw new RangeError(`invalid ticker symbol: "${symbol}"`);
    }
    return await withSession((doc) => {
      const existing = findStock(doc, normalized);
      if (existing) {
        return { result: existing.id, changed: false };
      }
      const id = doc.nextStockId;
      doc.stocks.push({ id, symbol: normalized, createdAt: now().toISOString() });
      doc.nextStockId = id + 1;
      return { result: id, changed: true };
    });
  }

  async function findStockId(symbol: string): Promise<number | null> {
    return await withSession((doc) => ({
      result: findStock(doc, symbol)?.id ?? null,
      changed: false,
    }));
  }

  async function insertMention(mention: NewMention): Promise<boolean> {
    const externalId = mention.externalId ?? null;
    return await withSession((doc) => {
      // Rows without an external id are never deduplicated.
      if (
        externalId !== null &&
        doc.mentions.some(
          (row) => row.externalId === externalId && row.stockId === mention.stockId,
        )
      ) {
        return { result: false, changed: false };
      }
      const id = doc.nextMentionId;
      doc.mentions.push({
        id,
        stockId: mention.stockId,
        content: mention.content,
        url: mention.url ?? null,
        externalId,
        metadata: mention.metadata ?? null,
        sentimentScore: null,
        createdAt: now().toISOString(),
      });
      doc.nextMentionId = id + 1;
      return { result: true, changed: true };
    });
  }

  async function existsByExternalId(externalId: string): Promise<boolean> {
    return await withSession((doc) => ({
      result: doc.mentions.some((row) => row.externalId === externalId),
      changed: false,
    }));
  }

  async function mentionsForStock(symbol: string, limit?: number): Promise<Mention[]> {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    return await withSession((doc) => {
      const stock = findStock(doc, symbol);
      if (!stock) {
        return { result: [], changed: false };
      }
      const rows = doc.mentions.filter((row) => row.stockId === stock.id).sort(sortNewestFirst);
      return { result: limit === undefined ? rows : rows.slice(0, limit), changed: false };
    });
  }

  async function setSentiment(
    externalId: string,
    score: number,
    stockId?: number,
  ): Promise<boolean> {
    if (!Number.isFinite(score) || score < -1 || score > 1) {
      throw new RangeError(`sentiment score must be within [-1, 1], got ${score}`);
    }
    return await withSession((doc) => {
      let updated = 0;
      for (const row of doc.mentions) {
        if (row.externalId !== externalId || row.sentimentScore !== null) {
          continue;
        }
        if (stockId !== undefined && row.stockId !== stockId) {
          continue;
        }
        row.sentimentScore = score;
        updated += 1;
      }
      return { result: updated > 0, changed: updated > 0 };
    });
  }

  async function allStockSymbols(): Promise<Set<string>> {
    return await withSession((doc) => ({
      result: new Set(doc.stocks.map((stock) => stock.symbol)),
      changed: false,
    }));
  }

  async function listStocks(): Promise<Stock[]> {
    return await withSession((doc) => ({
      result: [...doc.stocks].sort((a, b) => a.symbol.localeCompare(b.symbol)),
      changed: false,
    }));
  }

  async function countMentions(stockId?: number): Promise<number> {
    return await withSession((doc) => ({
      result:
        stockId === undefined
          ? doc.mentions.length
          : doc.mentions.filter((row) => row.stockId === stockId).length,
      changed: false,
    }));
  }

  async function close(): Promise<void> {
    open = false;
  }

  return {
    path: filePath,
    upsertStock,
    findStockId,
    insertMention,
    existsByExternalId,
    mentionsForStock,
    setSentiment,
    allStockSymbols,
    listStocks,
    countMentions,
    close,
    isOpen: () => open,
  };
}
