import { z } from "zod";

export const storedChunkSchema = z.object({
  id: z.string(),
  documentId: z.string(),
  ordinal: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  text: z.string(),
  embedding: z.array(z.number())
});

export const storedIndexSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string(),
  embeddingDimension: z.number().int().positive().optional(),
  chunks: z.array(storedChunkSchema)
});

export type StoredChunk = z.infer<typeof storedChunkSchema>;

export type StoredIndex = z.infer<typeof storedIndexSchema>;

export type ScoredChunk = {
  chunk: StoredChunk;
  score: number;
};
