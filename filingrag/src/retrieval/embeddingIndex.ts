import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Chunk } from "../documents/types.js";
import { InvalidConfigError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { emptyIndex, loadIndex, saveIndex } from "./indexStore.js";
import { topKSimilarChunks } from "./search.js";
import { normalizeVector } from "./similarity.js";
import type { ScoredChunk, StoredChunk, StoredIndex } from "./types.js";

export type EmbeddingIndexOptions = {
  embeddings: EmbeddingsInterface;
  embeddingModel: string;
  filePath: string;
  logger?: Logger;
};

/**
 * Vector index over every cached chunk, persisted as one JSON file.
 *
 * Construction is cheap; `ensureReady()` loads the file once. Mutations build
 * the next state, write it, and only then swap it in, so a search sees either
 * the old chunk array or the new one and never a state that failed to persist.
 */
export class EmbeddingIndex {
  private readonly embeddings: EmbeddingsInterface;
  private readonly logger: Logger;
  readonly embeddingModel: string;
  readonly filePath: string;

  private state: StoredIndex;
  private initPromise: Promise<void> | null = null;
  private epoch = 0;

  constructor(options: EmbeddingIndexOptions) {
    this.embeddings = options.embeddings;
    this.embeddingModel = options.embeddingModel;
    this.filePath = options.filePath;
    this.logger = options.logger ?? silentLogger;
    this.state = emptyIndex(options.embeddingModel);
  }

  async ensureReady(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.load().catch((err: unknown) => {
        this.initPromise = null;
        throw err;
      });
    }
    await this.initPromise;
  }

  private async load(): Promise<void> {
    const epoch = this.epoch;
    const stored = await loadIndex(this.filePath);
    // a state adopted meanwhile is newer than the file we read
    if (epoch !== this.epoch) return;
    if (!stored) {
      this.logger.debug(`No index at ${this.filePath}, starting empty`);
      return;
    }
    if (stored.embeddingModel !== this.embeddingModel) {
      throw new InvalidConfigError(
        `Embedding model mismatch.\nIndex: ${stored.embeddingModel}\nCurrent: ${this.embeddingModel}\nRebuild or reset the cache to re-embed it.`
      );
    }
    this.state = stored;
    this.logger.info(`Loaded index: ${stored.chunks.length} chunks`);
  }

  get size(): number {
    return this.state.chunks.length;
  }

  get dimension(): number | undefined {
    return this.state.embeddingDimension;
  }

  chunks(): readonly StoredChunk[] {
    return this.state.chunks;
  }

  chunkMap(): Map<string, StoredChunk> {
    return new Map(this.state.chunks.map((c) => [c.id, c]));
  }

  /**
   * Embeds chunks without touching the index. Vectors must match the index's
   * dimension, or with `fresh` only each other.
   */
  async embed(chunks: readonly Chunk[], options: { fresh?: boolean } = {}): Promise<StoredChunk[]> {
    if (chunks.length === 0) return [];

    const vectors = await this.embeddings.embedDocuments(chunks.map((c) => c.text));
    if (vectors.length !== chunks.length) {
      throw new Error(
        `Embedding count mismatch: texts=${chunks.length} embeddings=${vectors.length}`
      );
    }

    const known = options.fresh ? undefined : this.state.embeddingDimension;
    const expectedDim = known ?? vectors[0]?.length ?? 0;
    if (expectedDim <= 0) {
      throw new Error(
        `Embedding dimension invalid (${expectedDim}). Check embedding model: ${this.embeddingModel}`
      );
    }

    return chunks.map((chunk, i) => {
      const vector = vectors[i] ?? [];
      if (vector.length !== expectedDim) {
        throw new Error(
          `Embedding dimension mismatch at chunk ${chunk.chunkId}: expected=${expectedDim} actual=${vector.length}`
        );
      }
      return {
        id: chunk.chunkId,
        documentId: chunk.documentId,
        ordinal: chunk.ordinal,
        start: chunk.start,
        text: chunk.text,
        embedding: normalizeVector(vector)
      };
    });
  }

  /** The index with a document's chunks swapped for `stored`, appended at the end. Does not touch this index. */
  withDocument(documentId: string, stored: readonly StoredChunk[]): StoredIndex {
    const foreign = stored.find((c) => c.documentId !== documentId);
    if (foreign) {
      throw new Error(`Chunk ${foreign.id} does not belong to ${documentId}`);
    }
    const kept = this.state.chunks.filter((c) => c.documentId !== documentId);
    return {
      ...this.state,
      embeddingDimension: this.state.embeddingDimension ?? stored[0]?.embedding.length,
      chunks: [...kept, ...stored]
    };
  }

  withoutDocument(documentId: string): StoredIndex {
    return { ...this.state, chunks: this.state.chunks.filter((c) => c.documentId !== documentId) };
  }

  /** A fresh index under the current model holding only `stored`. */
  fromChunks(stored: readonly StoredChunk[]): StoredIndex {
    return {
      ...emptyIndex(this.embeddingModel),
      embeddingDimension: stored[0]?.embedding.length,
      chunks: [...stored]
    };
  }

  current(): StoredIndex {
    return this.state;
  }

  /** Writes `next` to disk without adopting it. */
  async write(next: StoredIndex): Promise<void> {
    await saveIndex(this.filePath, next);
  }

  /** Makes `next` the live state. Call only once `next` is on disk. */
  adopt(next: StoredIndex): void {
    this.state = next;
    this.epoch += 1;
    this.initPromise = Promise.resolve();
  }

  async replaceWith(next: StoredIndex): Promise<void> {
    await this.write(next);
    this.adopt(next);
  }

  /** Embeds, indexes and persists chunks. Chunks already present under the same id are replaced. */
  async add(chunks: readonly Chunk[]): Promise<void> {
    await this.ensureReady();
    const stored = await this.embed(chunks);
    const incoming = new Set(stored.map((c) => c.id));
    await this.replaceWith({
      ...this.state,
      embeddingDimension: this.state.embeddingDimension ?? stored[0]?.embedding.length,
      chunks: [...this.state.chunks.filter((c) => !incoming.has(c.id)), ...stored]
    });
  }

  /**
   * Writes an empty index under the current model. Never reads the old file, so
   * it also recovers an index built with another embedding model.
   */
  async removeAll(): Promise<void> {
    await this.replaceWith(emptyIndex(this.embeddingModel));
  }

  async search(queryText: string, k: number, scoreThreshold: number): Promise<ScoredChunk[]> {
    await this.ensureReady();
    if (k <= 0 || this.state.chunks.length === 0) return [];
    const queryEmbedding = normalizeVector(await this.embeddings.embedQuery(queryText));
    return this.searchByVector(queryEmbedding, k, scoreThreshold);
  }

  searchByVector(queryEmbedding: number[], k: number, scoreThreshold: number): ScoredChunk[] {
    return topKSimilarChunks({
      queryEmbedding,
      chunks: this.state.chunks,
      k,
      scoreThreshold
    });
  }
}
