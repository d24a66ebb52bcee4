import type { ScoredChunk, StoredChunk } from "./types.js";
import { cosineSimilarity } from "./similarity.js";

/**
 * Ranks every chunk against the query, keeps the top `k`, then drops scores
 * below `scoreThreshold`. Equal scores keep index order (the sort is stable).
 */
export function topKSimilarChunks(params: {
  queryEmbedding: number[];
  chunks: readonly StoredChunk[];
  k: number;
  scoreThreshold: number;
}): ScoredChunk[] {
  if (params.k <= 0 || params.chunks.length === 0) return [];

  const expectedDim = params.queryEmbedding.length;
  const mismatched = params.chunks.find((c) => c.embedding.length !== expectedDim);
  if (expectedDim === 0 || mismatched) {
    throw new Error(
      `Embedding dimension mismatch: query=${expectedDim} index=${mismatched?.embedding.length ?? 0}`
    );
  }

  return params.chunks
    .map((chunk) => ({ chunk, score: cosineSimilarity(params.queryEmbedding, chunk.embedding) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, params.k)
    .filter((r) => r.score >= params.scoreThreshold);
}
