import { z } from "zod";

const sourceKindSchema = z.enum(["regulatory-filing", "broker-report", "industry-report"]);

export const cacheEntrySchema = z.object({
  documentId: z.string(),
  companyId: z.string(),
  sourceKind: sourceKindSchema,
  title: z.string(),
  publishedAt: z.string(),
  keywords: z.array(z.string()),
  chunkIds: z.array(z.string()),
  charCount: z.number().int().nonnegative(),
  storedAt: z.string()
});

export const storedCacheSchema = z.object({
  version: z.literal(1),
  entries: z.array(cacheEntrySchema),
  /** Full text per document id, kept so the index can be rebuilt without refetching. */
  texts: z.record(z.string()).default({})
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

export type StoredCache = z.infer<typeof storedCacheSchema>;

export type CachedChunk = {
  chunkId: string;
  ordinal: number;
  start: number;
  text: string;
};

export type LoadedDocument = {
  entry: CacheEntry;
  /** Undefined for entries written before full text was kept. */
  rawText: string | undefined;
  chunks: CachedChunk[];
};

export type RebuildSummary = {
  documents: number;
  chunks: number;
  /** Entries dropped because no full text was stored for them. */
  skipped: string[];
};

export type CacheStats = {
  totalDocuments: number;
  totalChunks: number;
  totalCharacters: number;
  distinctCompanies: number;
  companies: string[];
};
