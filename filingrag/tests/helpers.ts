import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { DocumentCache } from "../src/cache/documentCache.js";
import type { Chunk, FinancialDocument, SourceKind } from "../src/documents/types.js";
import type { GenerationProvider, ProviderCapabilities } from "../src/generation/types.js";
import { EmbeddingIndex } from "../src/retrieval/embeddingIndex.js";

export const VOCABULARY = ["revenue", "margin", "debt", "inventory"];

/** One dimension per vocabulary word, valued by how often the word occurs. */
export class KeywordEmbeddings implements EmbeddingsInterface {
  documentCalls = 0;
  queryCalls = 0;

  constructor(private readonly vocabulary: readonly string[] = VOCABULARY) {}

  vectorFor(text: string): number[] {
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/);
    return this.vocabulary.map((term) => tokens.filter((t) => t === term).length);
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    this.documentCalls += 1;
    return documents.map((d) => this.vectorFor(d));
  }

  async embedQuery(document: string): Promise<number[]> {
    this.queryCalls += 1;
    return this.vectorFor(document);
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "filingrag-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const TEST_MODEL = "test-embedding";

export function makeIndex(dir: string, embeddings: EmbeddingsInterface = new KeywordEmbeddings()): EmbeddingIndex {
  return new EmbeddingIndex({
    embeddings,
    embeddingModel: TEST_MODEL,
    filePath: path.join(dir, "index.json")
  });
}

export function makeCache(
  dir: string,
  embeddings: EmbeddingsInterface = new KeywordEmbeddings()
): { index: EmbeddingIndex; cache: DocumentCache } {
  const index = makeIndex(dir, embeddings);
  const cache = new DocumentCache({
    index,
    metadataPath: path.join(dir, "metadata.json"),
    now: () => new Date("2026-03-01T00:00:00.000Z")
  });
  return { index, cache };
}

export function makeDocument(params: {
  documentId: string;
  companyId?: string;
  sourceKind?: SourceKind;
  title?: string;
  publishedAt?: string;
  rawText: string;
  keywords?: string[];
}): FinancialDocument {
  return {
    documentId: params.documentId,
    companyId: params.companyId ?? "00126380",
    sourceKind: params.sourceKind ?? "regulatory-filing",
    title: params.title ?? `Report ${params.documentId}`,
    publishedAt: params.publishedAt ?? "2025-03-15",
    rawText: params.rawText,
    keywords: params.keywords ?? []
  };
}

/** Chunks laid end to end, one per text, separated by a single space. */
export function chunksOf(documentId: string, texts: readonly string[]): Chunk[] {
  let start = 0;
  return texts.map((text, ordinal) => {
    const chunk = { chunkId: `${documentId}#${ordinal}`, documentId, ordinal, start, text };
    start += text.length + 1;
    return chunk;
  });
}

/** A document whose raw text is its chunks joined by spaces. */
export function documentWithChunks(
  params: Omit<Parameters<typeof makeDocument>[0], "rawText">,
  texts: readonly string[]
): { document: FinancialDocument; chunks: Chunk[] } {
  return {
    document: makeDocument({ ...params, rawText: texts.join(" ") }),
    chunks: chunksOf(params.documentId, texts)
  };
}

export const LONG_CONTEXT: ProviderCapabilities = {
  contextWindow: 1_000_000,
  supportsLongContext: true,
  languages: ["ko", "en"],
  relativeCost: "medium",
  relativeSpeed: "fast"
};

export const SHORT_CONTEXT: ProviderCapabilities = {
  contextWindow: 4096,
  supportsLongContext: false,
  languages: ["ko", "en"],
  relativeCost: "low",
  relativeSpeed: "very_fast"
};

export class FakeProvider implements GenerationProvider {
  readonly prompts: string[] = [];

  constructor(
    readonly name: string,
    private readonly capabilities: ProviderCapabilities,
    private readonly respond: (prompt: string) => string
  ) {}

  async produceText(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }

  declareCapabilities(): ProviderCapabilities {
    return this.capabilities;
  }
}
