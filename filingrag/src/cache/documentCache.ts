import { Mutex } from "async-mutex";

import { normalizeCompanyId, sharedKeywordCount } from "../documents/identity.js";
import type { Chunk, FinancialDocument } from "../documents/types.js";
import { CacheInconsistencyError, CachePersistenceError, describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { Chunker } from "../rag/chunker.js";
import type { EmbeddingIndex } from "../retrieval/embeddingIndex.js";
import type { StoredIndex } from "../retrieval/types.js";
import { readJsonFile, writeJsonAtomic } from "../storage/jsonFile.js";
import {
  storedCacheSchema,
  type CacheEntry,
  type CacheStats,
  type LoadedDocument,
  type RebuildSummary,
  type StoredCache
} from "./types.js";

export type DocumentCacheOptions = {
  index: EmbeddingIndex;
  metadataPath: string;
  logger?: Logger;
  now?: () => Date;
};

type CacheState = {
  index: StoredIndex;
  entries: Map<string, CacheEntry>;
  texts: Map<string, string>;
};

function toStoredCache(state: CacheState): StoredCache {
  return { version: 1, entries: [...state.entries.values()], texts: Object.fromEntries(state.texts) };
}

/**
 * Document-level cache over the embedding index: one entry per document id,
 * holding the ids of that document's chunks in the index.
 *
 * Writes (store, evict, reset, rebuild) are serialized by one lock. Each write
 * builds the next entry map and index state, persists both files, and only
 * then swaps both in with one synchronous step. Readers never see an entry
 * whose chunks are only partly indexed, nor a state that failed to persist.
 */
export class DocumentCache {
  readonly index: EmbeddingIndex;
  readonly metadataPath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly writeLock = new Mutex();

  private entries = new Map<string, CacheEntry>();
  private texts = new Map<string, string>();
  private initPromise: Promise<void> | null = null;
  /** Bumped on every adopted write; an open that started earlier discards what it read. */
  private epoch = 0;

  constructor(options: DocumentCacheOptions) {
    this.index = options.index;
    this.metadataPath = options.metadataPath;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async ensureReady(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.open().catch((err: unknown) => {
        this.initPromise = null;
        throw err;
      });
    }
    await this.initPromise;
  }

  private async open(): Promise<void> {
    const epoch = this.epoch;
    await this.index.ensureReady();
    const stored = await readJsonFile(this.metadataPath, storedCacheSchema);
    if (epoch !== this.epoch) return;
    this.entries = new Map((stored?.entries ?? []).map((e) => [e.documentId, e]));
    this.texts = new Map(Object.entries(stored?.texts ?? {}));
    this.verify();
    this.logger.info(`Cache ready: ${this.entries.size} documents, ${this.index.size} chunks`);
  }

  /** Throws CacheInconsistencyError unless entries and index chunks reference each other one-to-one. */
  verify(): void {
    const indexed = this.index.chunkMap();
    const owned = new Set<string>();
    const problems: string[] = [];

    for (const entry of this.entries.values()) {
      for (const chunkId of entry.chunkIds) {
        const chunk = indexed.get(chunkId);
        if (!chunk) {
          problems.push(`${entry.documentId} references missing chunk ${chunkId}`);
        } else if (chunk.documentId !== entry.documentId) {
          problems.push(`chunk ${chunkId} belongs to ${chunk.documentId}, not ${entry.documentId}`);
        }
        if (owned.has(chunkId)) {
          problems.push(`chunk ${chunkId} is referenced twice`);
        }
        owned.add(chunkId);
      }
    }
    for (const chunk of this.index.chunks()) {
      if (!owned.has(chunk.id)) {
        problems.push(`chunk ${chunk.id} has no cache entry`);
      }
    }

    if (problems.length > 0) {
      throw new CacheInconsistencyError(
        `Cache metadata and index disagree (${problems.length} problems): ${problems.slice(0, 5).join("; ")}`
      );
    }
  }

  async exists(documentId: string): Promise<boolean> {
    await this.ensureReady();
    return this.entries.has(documentId);
  }

  async get(documentId: string): Promise<CacheEntry | undefined> {
    await this.ensureReady();
    return this.entries.get(documentId);
  }

  /** Current entry for a document; call after ensureReady(). */
  entryFor(documentId: string): CacheEntry | undefined {
    return this.entries.get(documentId);
  }

  /**
   * Industry-report entries sharing at least one keyword with `keywords`, most
   * shared keywords first; ties keep the order the entries were first stored.
   */
  async findAllMatching(keywords: readonly string[]): Promise<CacheEntry[]> {
    await this.ensureReady();
    return [...this.entries.values()]
      .filter((entry) => entry.sourceKind === "industry-report")
      .map((entry) => ({ entry, shared: sharedKeywordCount(keywords, entry.keywords) }))
      .filter((m) => m.shared > 0)
      .sort((a, b) => b.shared - a.shared)
      .map((m) => m.entry);
  }

  async findMatching(keywords: readonly string[]): Promise<CacheEntry | undefined> {
    const matches = await this.findAllMatching(keywords);
    return matches[0];
  }

  async store(document: FinancialDocument, chunks: readonly Chunk[]): Promise<CacheEntry> {
    const foreign = chunks.find((c) => c.documentId !== document.documentId);
    if (foreign) {
      throw new Error(`Chunk ${foreign.chunkId} does not belong to ${document.documentId}`);
    }
    await this.ensureReady();

    return this.writeLock.runExclusive(async () => {
      const stored = await this.index.embed(chunks);
      const entry: CacheEntry = {
        documentId: document.documentId,
        companyId: document.companyId,
        sourceKind: document.sourceKind,
        title: document.title,
        publishedAt: document.publishedAt,
        keywords: [...document.keywords],
        chunkIds: stored.map((c) => c.id),
        charCount: document.rawText.length,
        storedAt: this.now().toISOString()
      };

      const replacing = this.entries.has(document.documentId);
      await this.commit(`Storing ${document.documentId}`, {
        index: this.index.withDocument(document.documentId, stored),
        entries: new Map(this.entries).set(document.documentId, entry),
        texts: new Map(this.texts).set(document.documentId, document.rawText)
      });

      this.logger.info(
        `${replacing ? "Replaced" : "Stored"} ${document.documentId} (${document.title}): ${stored.length} chunks, ${entry.charCount} chars`
      );
      return entry;
    });
  }

  async load(documentId: string): Promise<LoadedDocument | undefined> {
    await this.ensureReady();
    const entry = this.entries.get(documentId);
    if (!entry) return undefined;

    const indexed = this.index.chunkMap();
    const chunks = entry.chunkIds.map((chunkId) => {
      const chunk = indexed.get(chunkId);
      if (!chunk) {
        throw new CacheInconsistencyError(`${documentId} references missing chunk ${chunkId}`);
      }
      return { chunkId, ordinal: chunk.ordinal, start: chunk.start, text: chunk.text };
    });
    return { entry, rawText: this.texts.get(documentId), chunks };
  }

  /** The full text a document was stored with. */
  async text(documentId: string): Promise<string | undefined> {
    await this.ensureReady();
    return this.entries.has(documentId) ? this.texts.get(documentId) : undefined;
  }

  /** Removes one document and its chunks. Returns false when it was not cached. */
  async evict(documentId: string): Promise<boolean> {
    await this.ensureReady();
    return this.writeLock.runExclusive(async () => {
      if (!this.entries.has(documentId)) return false;
      const entries = new Map(this.entries);
      entries.delete(documentId);
      const texts = new Map(this.texts);
      texts.delete(documentId);
      await this.commit(`Evicting ${documentId}`, {
        index: this.index.withoutDocument(documentId),
        entries,
        texts
      });
      this.logger.info(`Evicted ${documentId}`);
      return true;
    });
  }

  /** A company's cached documents, newest publication first. */
  async listCompany(companyId: string): Promise<CacheEntry[]> {
    await this.ensureReady();
    const wanted = normalizeCompanyId(companyId);
    return [...this.entries.values()]
      .filter((entry) => normalizeCompanyId(entry.companyId) === wanted)
      .sort((a, b) => b.publishedAt.localeCompare(a.publishedAt));
  }

  async stats(): Promise<CacheStats> {
    await this.ensureReady();
    const companies = new Map<string, string>();
    let totalChunks = 0;
    let totalCharacters = 0;
    for (const entry of this.entries.values()) {
      totalChunks += entry.chunkIds.length;
      totalCharacters += entry.charCount;
      const key = normalizeCompanyId(entry.companyId);
      if (!companies.has(key)) companies.set(key, entry.companyId);
    }
    return {
      totalDocuments: this.entries.size,
      totalChunks,
      totalCharacters,
      distinctCompanies: companies.size,
      companies: [...companies.values()]
    };
  }

  /**
   * Clears entries and index together without reading either file first, so it
   * also recovers a cache that fails to open (another embedding model, or
   * metadata and index that disagree).
   */
  async reset(): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      await this.settleOpen();
      const documents = this.entries.size;
      await this.overwrite("Resetting cache", {
        index: this.index.fromChunks([]),
        entries: new Map(),
        texts: new Map()
      });
      this.logger.info(`Cache reset (${documents} documents removed)`);
    });
  }

  /**
   * Re-chunks every stored document from its full text and re-embeds it under
   * the current embedding model, replacing the whole index. Works from the
   * metadata file alone, so an index built with another model can be rebuilt.
   * Entries stored without full text are dropped.
   */
  async rebuild(chunker: Chunker): Promise<RebuildSummary> {
    return this.writeLock.runExclusive(async () => {
      await this.settleOpen();
      const stored = await readJsonFile(this.metadataPath, storedCacheSchema);
      const storedTexts = stored?.texts ?? {};

      const entries = new Map<string, CacheEntry>();
      const texts = new Map<string, string>();
      const chunks: Chunk[] = [];
      const skipped: string[] = [];
      for (const entry of stored?.entries ?? []) {
        const rawText = storedTexts[entry.documentId];
        if (rawText === undefined) {
          skipped.push(entry.documentId);
          continue;
        }
        const pieces = await chunker.split({ documentId: entry.documentId, rawText });
        chunks.push(...pieces);
        entries.set(entry.documentId, { ...entry, chunkIds: pieces.map((c) => c.chunkId) });
        texts.set(entry.documentId, rawText);
      }
      if (skipped.length > 0) {
        this.logger.warn(`Rebuild dropped ${skipped.length} documents without stored text: ${skipped.join(", ")}`);
      }

      const embedded = await this.index.embed(chunks, { fresh: true });
      await this.overwrite("Rebuilding index", { index: this.index.fromChunks(embedded), entries, texts });
      this.logger.info(`Rebuilt index: ${entries.size} documents, ${embedded.length} chunks`);
      return { documents: entries.size, chunks: embedded.length, skipped };
    });
  }

  /** Lets an open in flight finish so it cannot overwrite what a reset or rebuild writes. */
  private async settleOpen(): Promise<void> {
    if (!this.initPromise) return;
    try {
      await this.initPromise;
    } catch (err: unknown) {
      this.logger.warn(`Cache could not be opened, replacing it: ${describeError(err)}`);
    }
  }

  /**
   * Persists `next` over whatever is on disk, then adopts it. Metadata is
   * written before the index: if only the metadata write fails nothing changed,
   * if the index write fails the files disagree until the next reset or rebuild.
   * Either way the next access reopens from disk.
   */
  private async overwrite(action: string, next: CacheState): Promise<void> {
    try {
      await writeJsonAtomic(this.metadataPath, toStoredCache(next));
    } catch (err: unknown) {
      this.initPromise = null;
      throw new CachePersistenceError(`${action} failed: ${describeError(err)}`, { cause: err });
    }
    try {
      await this.index.write(next.index);
    } catch (err: unknown) {
      this.initPromise = null;
      this.logger.error(`${action} wrote the metadata but not the index: ${describeError(err)}`);
      throw new CacheInconsistencyError(
        `${action} failed after the metadata was written (${describeError(err)}); reset the cache`,
        { cause: err }
      );
    }
    this.adopt(next);
  }

  /**
   * Persists `next`, then swaps it in. On a failed write the previous state is
   * written back; if that fails too the files may disagree.
   */
  private async commit(action: string, next: CacheState): Promise<void> {
    try {
      await this.write(next);
    } catch (err: unknown) {
      try {
        await this.write({ index: this.index.current(), entries: this.entries, texts: this.texts });
      } catch (rollbackErr: unknown) {
        this.logger.error(`${action} failed and rollback could not be written: ${describeError(rollbackErr)}`);
        throw new CacheInconsistencyError(
          `${action} failed (${describeError(err)}) and the previous cache state could not be written back (${describeError(rollbackErr)})`,
          { cause: err }
        );
      }
      this.logger.warn(`${action} failed, previous state restored: ${describeError(err)}`);
      throw new CachePersistenceError(`${action} failed: ${describeError(err)}`, { cause: err });
    }
    this.adopt(next);
  }

  private async write(state: CacheState): Promise<void> {
    await this.index.write(state.index);
    await writeJsonAtomic(this.metadataPath, toStoredCache(state));
  }

  private adopt(next: CacheState): void {
    this.index.adopt(next.index);
    this.entries = next.entries;
    this.texts = next.texts;
    this.epoch += 1;
    this.initPromise = Promise.resolve();
  }
}
