import { promises as fs } from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DocumentCache } from "../src/cache/documentCache.js";
import { storedCacheSchema } from "../src/cache/types.js";
import { CacheInconsistencyError, CachePersistenceError, InvalidConfigError } from "../src/errors.js";
import { Chunker } from "../src/rag/chunker.js";
import { EmbeddingIndex } from "../src/retrieval/embeddingIndex.js";
import {
  KeywordEmbeddings,
  documentWithChunks,
  makeCache,
  makeDocument,
  makeTempDir,
  removeDir
} from "./helpers.js";

const EMPTY_STATS = {
  totalDocuments: 0,
  totalChunks: 0,
  totalCharacters: 0,
  distinctCompanies: 0,
  companies: []
};

function cacheUnderModel(dir: string, embeddingModel: string, embeddings = new KeywordEmbeddings()) {
  const index = new EmbeddingIndex({ embeddings, embeddingModel, filePath: path.join(dir, "index.json") });
  return { index, cache: new DocumentCache({ index, metadataPath: path.join(dir, "metadata.json") }) };
}

function industryReport(documentId: string, keywords: string[]) {
  return documentWithChunks(
    { documentId, companyId: "INDUSTRY", sourceKind: "industry-report", keywords },
    [`${documentId} revenue outlook`]
  );
}

describe("DocumentCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("stores a document once per id", async () => {
    const { index, cache } = makeCache(dir);
    const { document, chunks } = documentWithChunks({ documentId: "20250315000123" }, [
      "revenue rose",
      "margin fell"
    ]);

    const entry = await cache.store(document, chunks);
    expect(entry).toEqual({
      documentId: "20250315000123",
      companyId: "00126380",
      sourceKind: "regulatory-filing",
      title: "Report 20250315000123",
      publishedAt: "2025-03-15",
      keywords: [],
      chunkIds: ["20250315000123#0", "20250315000123#1"],
      charCount: "revenue rose margin fell".length,
      storedAt: "2026-03-01T00:00:00.000Z"
    });
    expect(await cache.exists("20250315000123")).toBe(true);

    await cache.store(document, chunks);
    expect(index.size).toBe(2);
    expect(await cache.stats()).toEqual({
      totalDocuments: 1,
      totalChunks: 2,
      totalCharacters: 24,
      distinctCompanies: 1,
      companies: ["00126380"]
    });
  });

  it("counts a 12,000 character filing and clears it on reset", async () => {
    const { index, cache } = makeCache(dir);
    const rawText = [...Array.from({ length: 12 }, () => "A".repeat(922)), "A".repeat(912)].join("\n\n");
    const document = makeDocument({ documentId: "20250324000901", rawText });
    const chunks = await new Chunker({ chunkSize: 1000, chunkOverlap: 200 }).split(document);

    await cache.store(document, chunks);
    expect(await cache.stats()).toEqual({
      totalDocuments: 1,
      totalChunks: 13,
      totalCharacters: 12000,
      distinctCompanies: 1,
      companies: ["00126380"]
    });

    await cache.reset();
    expect(await cache.stats()).toEqual(EMPTY_STATS);
    expect(index.size).toBe(0);

    const reopened = makeCache(dir).cache;
    expect(await reopened.stats()).toEqual(EMPTY_STATS);
  });

  it("reloads entries and chunks from disk", async () => {
    const { cache } = makeCache(dir);
    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue", "debt"]);
    await cache.store(document, chunks);

    const reopened = makeCache(dir).cache;
    const loaded = await reopened.load("d1");
    expect(loaded?.entry.chunkIds).toEqual(["d1#0", "d1#1"]);
    expect(loaded?.chunks).toEqual([
      { chunkId: "d1#0", ordinal: 0, start: 0, text: "revenue" },
      { chunkId: "d1#1", ordinal: 1, start: 8, text: "debt" }
    ]);
    expect(loaded?.rawText).toBe("revenue debt");
    expect(await reopened.text("d1")).toBe("revenue debt");
    expect(await reopened.load("missing")).toBeUndefined();
    expect(await reopened.text("missing")).toBeUndefined();
  });

  it("keeps one chunk set when the same id is stored concurrently", async () => {
    const { index, cache } = makeCache(dir);
    const versions = ["revenue", "debt", "margin"].map((word) =>
      documentWithChunks({ documentId: "d1" }, [word, `${word} outlook`])
    );

    await Promise.all(versions.map(({ document, chunks }) => cache.store(document, chunks)));

    expect(index.chunks().map((c) => c.id)).toEqual(["d1#0", "d1#1"]);
    expect((await cache.stats()).totalChunks).toBe(2);
    expect(() => cache.verify()).not.toThrow();
  });

  it("matches industry reports by shared keywords", async () => {
    const { cache } = makeCache(dir);
    for (const [id, keywords] of [
      ["ind-chips", ["AI", "semiconductor"]],
      ["ind-cells", ["AI", "batteries"]],
      ["ind-shops", ["retail", "logistics"]]
    ] as const) {
      const { document, chunks } = industryReport(id, [...keywords]);
      await cache.store(document, chunks);
    }

    const ranked = await cache.findAllMatching(["ai", "Semiconductor"]);
    expect(ranked.map((e) => e.documentId)).toEqual(["ind-chips", "ind-cells"]);

    const tied = await cache.findAllMatching(["AI"]);
    expect(tied.map((e) => e.documentId)).toEqual(["ind-chips", "ind-cells"]);

    expect((await cache.findMatching(["Logistics"]))?.documentId).toBe("ind-shops");
    expect(await cache.findMatching(["shipbuilding"])).toBeUndefined();
  });

  it("ignores keywords on filings and broker reports", async () => {
    const { cache } = makeCache(dir);
    const { document, chunks } = documentWithChunks(
      { documentId: "broker-report:00126380:memory", sourceKind: "broker-report", keywords: ["memory"] },
      ["revenue"]
    );
    await cache.store(document, chunks);
    expect(await cache.findAllMatching(["memory"])).toEqual([]);
  });

  it("evicts a document and its chunks", async () => {
    const { index, cache } = makeCache(dir);
    const first = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    const second = documentWithChunks({ documentId: "d2" }, ["debt"]);
    await cache.store(first.document, first.chunks);
    await cache.store(second.document, second.chunks);

    expect(await cache.evict("d1")).toBe(true);
    expect(await cache.evict("d1")).toBe(false);
    expect(index.chunks().map((c) => c.id)).toEqual(["d2#0"]);
    expect(await cache.exists("d1")).toBe(false);
  });

  it("lists a company's documents newest first", async () => {
    const { cache } = makeCache(dir);
    const docs = [
      documentWithChunks({ documentId: "old", publishedAt: "2023-03-10" }, ["revenue"]),
      documentWithChunks({ documentId: "new", publishedAt: "2025-03-12" }, ["margin"]),
      documentWithChunks({ documentId: "other", companyId: "00164779" }, ["debt"])
    ];
    for (const { document, chunks } of docs) {
      await cache.store(document, chunks);
    }

    const listed = await cache.listCompany(" 00126380 ");
    expect(listed.map((e) => e.documentId)).toEqual(["new", "old"]);
  });

  it("restores the previous state when a write fails", async () => {
    const { index, cache } = makeCache(dir);
    const kept = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await cache.store(kept.document, kept.chunks);

    vi.spyOn(index, "write").mockRejectedValueOnce(new Error("disk full"));
    const failing = documentWithChunks({ documentId: "d2" }, ["debt"]);
    await expect(cache.store(failing.document, failing.chunks)).rejects.toBeInstanceOf(
      CachePersistenceError
    );

    expect(await cache.exists("d2")).toBe(false);
    expect(index.chunks().map((c) => c.id)).toEqual(["d1#0"]);
    expect((await cache.stats()).totalDocuments).toBe(1);

    const reopened = makeCache(dir).cache;
    expect(await reopened.exists("d1")).toBe(true);
    expect(await reopened.exists("d2")).toBe(false);
  });

  it("reports an inconsistency when the rollback cannot be written either", async () => {
    const { index, cache } = makeCache(dir);
    await cache.ensureReady();
    vi.spyOn(index, "write").mockRejectedValue(new Error("read-only filesystem"));

    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await expect(cache.store(document, chunks)).rejects.toBeInstanceOf(CacheInconsistencyError);
  });

  it("hides a store from readers until it is persisted", async () => {
    const { index, cache } = makeCache(dir);
    const kept = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await cache.store(kept.document, kept.chunks);

    const seenDuringWrite: string[][] = [];
    vi.spyOn(index, "write").mockImplementationOnce(async () => {
      seenDuringWrite.push(index.chunks().map((c) => c.id));
      seenDuringWrite.push((await cache.listCompany("00126380")).map((e) => e.documentId));
      throw new Error("disk full");
    });
    const failing = documentWithChunks({ documentId: "d2" }, ["debt"]);
    await expect(cache.store(failing.document, failing.chunks)).rejects.toBeInstanceOf(
      CachePersistenceError
    );

    expect(seenDuringWrite).toEqual([["d1#0"], ["d1"]]);
  });

  it("resets a cache whose index was built with another embedding model", async () => {
    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await makeCache(dir).cache.store(document, chunks);

    const { cache } = cacheUnderModel(dir, "new-model");
    await expect(cache.stats()).rejects.toBeInstanceOf(InvalidConfigError);

    await cache.reset();
    expect(await cache.stats()).toEqual(EMPTY_STATS);
    expect(await cacheUnderModel(dir, "new-model").cache.stats()).toEqual(EMPTY_STATS);
  });

  it("resets a cache whose metadata and index disagree", async () => {
    const { cache } = makeCache(dir);
    const first = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await cache.store(first.document, first.chunks);
    const metadataPath = path.join(dir, "metadata.json");
    const beforeSecond = await fs.readFile(metadataPath, "utf-8");
    const second = documentWithChunks({ documentId: "d2" }, ["debt"]);
    await cache.store(second.document, second.chunks);
    // index.json still holds d2#0, which no entry references now
    await fs.writeFile(metadataPath, beforeSecond);

    const reopened = makeCache(dir).cache;
    await expect(reopened.ensureReady()).rejects.toBeInstanceOf(CacheInconsistencyError);

    await reopened.reset();
    expect(await reopened.stats()).toEqual(EMPTY_STATS);
    expect(await makeCache(dir).cache.stats()).toEqual(EMPTY_STATS);
  });

  it("rebuilds the index from stored text with new chunking", async () => {
    const { index, cache } = makeCache(dir);
    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue rose", "margin fell"]);
    await cache.store(document, chunks);

    const summary = await cache.rebuild(new Chunker({ chunkSize: 1000, chunkOverlap: 0 }));
    expect(summary).toEqual({ documents: 1, chunks: 1, skipped: [] });
    expect(index.chunks().map((c) => [c.id, c.text])).toEqual([["d1#0", "revenue rose margin fell"]]);
    expect((await cache.get("d1"))?.chunkIds).toEqual(["d1#0"]);

    const reopened = makeCache(dir).cache;
    expect((await reopened.load("d1"))?.chunks).toEqual([
      { chunkId: "d1#0", ordinal: 0, start: 0, text: "revenue rose margin fell" }
    ]);
  });

  it("rebuilds an index built with another embedding model", async () => {
    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue", "margin"]);
    await makeCache(dir).cache.store(document, chunks);

    const { index, cache } = cacheUnderModel(dir, "new-model", new KeywordEmbeddings(["revenue", "margin"]));
    await cache.rebuild(new Chunker({ chunkSize: 8, chunkOverlap: 0 }));

    expect(index.current().embeddingModel).toBe("new-model");
    expect(index.dimension).toBe(2);
    expect(index.chunks().map((c) => c.text)).toEqual(["revenue", "margin"]);
    expect((await cache.stats()).totalDocuments).toBe(1);
  });

  it("drops entries without stored text on rebuild", async () => {
    const { cache } = makeCache(dir);
    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await cache.store(document, chunks);
    const metadataPath = path.join(dir, "metadata.json");
    const stored = storedCacheSchema.parse(JSON.parse(await fs.readFile(metadataPath, "utf-8")));
    await fs.writeFile(metadataPath, JSON.stringify({ version: 1, entries: stored.entries }));

    const reopened = makeCache(dir).cache;
    expect(await reopened.rebuild(new Chunker())).toEqual({ documents: 0, chunks: 0, skipped: ["d1"] });
    expect(await reopened.stats()).toEqual(EMPTY_STATS);
  });

  it("refuses to open when metadata references chunks the index lacks", async () => {
    const { cache } = makeCache(dir);
    const { document, chunks } = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    await cache.store(document, chunks);
    await fs.rm(path.join(dir, "index.json"));

    const reopened = makeCache(dir).cache;
    await expect(reopened.ensureReady()).rejects.toBeInstanceOf(CacheInconsistencyError);
  });

  it("refuses chunks belonging to another document", async () => {
    const { cache } = makeCache(dir);
    const { document } = documentWithChunks({ documentId: "d1" }, ["revenue"]);
    const foreign = documentWithChunks({ documentId: "d2" }, ["debt"]).chunks;
    await expect(cache.store(document, foreign)).rejects.toThrow("Chunk d2#0 does not belong to d1");
  });
});
