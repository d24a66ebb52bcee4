import type { DocumentCache } from "../cache/documentCache.js";
import { normalizeCompanyId } from "../documents/identity.js";
import type { SourceKind } from "../documents/types.js";
import { InvalidConfigError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export type Passage = {
  chunkId: string;
  documentId: string;
  companyId: string;
  title: string;
  publishedAt: string;
  sourceKind: SourceKind;
  ordinal: number;
  totalChunks: number;
  text: string;
  score: number;
};

export type RetrieveOptions = {
  companyFilter?: string;
  k?: number;
  scoreThreshold?: number;
};

export function assertRetrievalParams(k: number, scoreThreshold: number): void {
  if (!Number.isInteger(k) || k < 0) {
    throw new InvalidConfigError(`k must be a non-negative integer, got ${k}`);
  }
  if (!Number.isFinite(scoreThreshold) || scoreThreshold < -1 || scoreThreshold > 1) {
    throw new InvalidConfigError(`scoreThreshold must be within [-1, 1], got ${scoreThreshold}`);
  }
}

export class Retriever {
  private readonly cache: DocumentCache;
  private readonly logger: Logger;
  readonly defaultK: number;
  readonly defaultScoreThreshold: number;

  constructor(options: {
    cache: DocumentCache;
    k?: number;
    scoreThreshold?: number;
    logger?: Logger;
  }) {
    this.cache = options.cache;
    this.logger = options.logger ?? silentLogger;
    this.defaultK = options.k ?? 20;
    this.defaultScoreThreshold = options.scoreThreshold ?? 0.7;
    assertRetrievalParams(this.defaultK, this.defaultScoreThreshold);
  }

  /**
   * Ranks globally, then narrows to the company. A filtered result can hold
   * fewer than `k` passages even when the company has more chunks further down
   * the unfiltered ranking.
   */
  async retrieve(queryText: string, options: RetrieveOptions = {}): Promise<Passage[]> {
    const k = options.k ?? this.defaultK;
    const scoreThreshold = options.scoreThreshold ?? this.defaultScoreThreshold;
    assertRetrievalParams(k, scoreThreshold);

    const company =
      options.companyFilter !== undefined ? normalizeCompanyId(options.companyFilter) : undefined;
    if (company === "") {
      throw new InvalidConfigError("companyFilter must not be empty; omit it to search every company");
    }

    await this.cache.ensureReady();
    const ranked = await this.cache.index.search(queryText, k, scoreThreshold);

    const passages: Passage[] = [];
    for (const { chunk, score } of ranked) {
      const entry = this.cache.entryFor(chunk.documentId);
      // evicted after the search ran
      if (!entry) continue;
      if (company !== undefined && normalizeCompanyId(entry.companyId) !== company) continue;
      passages.push({
        chunkId: chunk.id,
        documentId: entry.documentId,
        companyId: entry.companyId,
        title: entry.title,
        publishedAt: entry.publishedAt,
        sourceKind: entry.sourceKind,
        ordinal: chunk.ordinal,
        totalChunks: entry.chunkIds.length,
        text: chunk.text,
        score
      });
    }

    this.logger.debug(
      `Retrieved ${passages.length}/${ranked.length} passages for "${queryText.slice(0, 50)}"${company !== undefined ? ` (company ${company})` : ""}`
    );
    return passages;
  }
}
