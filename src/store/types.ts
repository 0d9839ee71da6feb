import { z } from "zod";

export const StockSchema = z.object({
  id: z.number().int().positive(),
  symbol: z.string().min(1),
  createdAt: z.string(),
});

export const MentionSchema = z.object({
  id: z.number().int().positive(),
  stockId: z.number().int(),
  content: z.string(),
  url: z.string().nullable(),
  externalId: z.string().nullable(),
  metadata: z.string().nullable(),
  sentimentScore: z.number().min(-1).max(1).nullable(),
  createdAt: z.string(),
});

export const StoreDocumentSchema = z.object({
  version: z.literal(1),
  nextStockId: z.number().int().positive(),
  nextMentionId: z.number().int().positive(),
  stocks: z.array(StockSchema),
  mentions: z.array(MentionSchema),
});

export type Stock = z.infer<typeof StockSchema>;
export type Mention = z.infer<typeof MentionSchema>;
export type StoreDocument = z.infer<typeof StoreDocumentSchema>;

export type NewMention = {
  stockId: number;
  content: string;
  url?: string | null;
  externalId?: string | null;
  metadata?: string | null;
};

export type MentionStore = {
  readonly path: string;
  upsertStock: (symbol: string) => Promise<number>;
  findStockId: (symbol: string) => Promise<number | null>;
  insertMention: (mention: NewMention) => Promise<boolean>;
  existsByExternalId: (externalId: string) => Promise<boolean>;
  mentionsForStock: (symbol: string, limit?: number) => Promise<Mention[]>;
  setSentiment: (externalId: string, score: number, stockId?: number) => Promise<boolean>;
  allStockSymbols: () => Promise<Set<string>>;
  listStocks: () => Promise<Stock[]>;
  countMentions: (stockId?: number) => Promise<number>;
  close: () => Promise<void>;
  isOpen: () => boolean;
};
