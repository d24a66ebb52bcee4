import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { DocumentCache } from "./cache/documentCache.js";
import type { CacheEntry, CacheStats, RebuildSummary } from "./cache/types.js";
import type { Settings } from "./config/settings.js";
import { brokerReportId } from "./documents/identity.js";
import type { FetchedDocument } from "./documents/types.js";
import { createProviders, createRouter } from "./generation/providers.js";
import type { GenerationRouter } from "./generation/router.js";
import type { GenerationProvider, TaskType } from "./generation/types.js";
import { createEmbeddings } from "./integrations/gemini/models.js";
import { createLogger, type Logger } from "./logging/logger.js";
import {
  AnalysisPipeline,
  type AnalysisPipelineOptions
} from "./pipeline/analysisPipeline.js";
import type { CompanyResolver, DocumentSource } from "./pipeline/collaborators.js";
import { PromptManager } from "./prompts/promptManager.js";
import { answerQuestion, type Answer } from "./rag/answer.js";
import { Chunker } from "./rag/chunker.js";
import { ingestDocument } from "./rag/ingest.js";
import { EmbeddingIndex } from "./retrieval/embeddingIndex.js";
import { Retriever } from "./retrieval/retriever.js";

export type FilingLookup = { sourceKind: "regulatory-filing"; receiptNumber: string };
export type BrokerReportLookup = { sourceKind: "broker-report"; companyId: string; title: string };
export type IndustryReportLookup = { sourceKind: "industry-report"; keywords: readonly string[] };
export type CacheLookup = FilingLookup | BrokerReportLookup | IndustryReportLookup;

export type FilingRagParts = {
  settings: Settings;
  cache: DocumentCache;
  chunker: Chunker;
  retriever: Retriever;
  router: GenerationRouter;
  prompts: PromptManager;
  logger: Logger;
};

/** Replacements for the parts that talk to model APIs. */
export type FilingRagOverrides = {
  embeddings?: EmbeddingsInterface;
  providers?: readonly GenerationProvider[];
  logger?: Logger;
};

export type AskOptions = {
  /** Answer from facts only, leaving out broker opinions, ratings and target prices. */
  excludeOpinions?: boolean;
};

export type PipelineCollaborators = {
  resolver: CompanyResolver;
  sources: readonly DocumentSource[];
} & Pick<AnalysisPipelineOptions, "now">;

export class FilingRag {
  readonly settings: Settings;
  readonly cache: DocumentCache;
  readonly chunker: Chunker;
  readonly retriever: Retriever;
  readonly router: GenerationRouter;
  readonly prompts: PromptManager;
  private readonly logger: Logger;

  constructor(parts: FilingRagParts) {
    this.settings = parts.settings;
    this.cache = parts.cache;
    this.chunker = parts.chunker;
    this.retriever = parts.retriever;
    this.router = parts.router;
    this.prompts = parts.prompts;
    this.logger = parts.logger;
  }

  /** Chunks, embeds and caches a document. Resubmitting the same identity replaces it. */
  async submitDocument(fetched: FetchedDocument): Promise<CacheEntry> {
    return ingestDocument({ fetched, chunker: this.chunker, cache: this.cache });
  }

  checkCached(lookup: FilingLookup | BrokerReportLookup): Promise<boolean>;
  checkCached(lookup: IndustryReportLookup): Promise<CacheEntry | null>;
  async checkCached(lookup: CacheLookup): Promise<boolean | CacheEntry | null> {
    switch (lookup.sourceKind) {
      case "regulatory-filing":
        return this.cache.exists(lookup.receiptNumber.trim());
      case "broker-report":
        return this.cache.exists(brokerReportId(lookup.companyId, lookup.title));
      case "industry-report":
        return (await this.cache.findMatching(lookup.keywords)) ?? null;
    }
  }

  async ask(
    companyId: string,
    query: string,
    taskType?: TaskType,
    options: AskOptions = {}
  ): Promise<Answer> {
    return answerQuestion({
      companyId,
      question: query,
      taskType,
      excludeOpinions: options.excludeOpinions,
      retriever: this.retriever,
      router: this.router,
      prompts: this.prompts,
      logger: this.logger
    });
  }

  async cacheStats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  /** Full text a document was cached with, or undefined when it is not cached. */
  async cachedText(documentId: string): Promise<string | undefined> {
    return this.cache.text(documentId);
  }

  async resetCache(): Promise<void> {
    await this.cache.reset();
  }

  /** Re-chunks and re-embeds every cached document with the current chunker and embedding model. */
  async rebuildIndex(): Promise<RebuildSummary> {
    return this.cache.rebuild(this.chunker);
  }

  createPipeline(collaborators: PipelineCollaborators): AnalysisPipeline {
    return new AnalysisPipeline({
      ...collaborators,
      cache: this.cache,
      chunker: this.chunker,
      retriever: this.retriever,
      router: this.router,
      prompts: this.prompts,
      limits: {
        "regulatory-filing": this.settings.maxFilings,
        "broker-report": this.settings.maxBrokerReports,
        "industry-report": this.settings.maxIndustryReports
      },
      defaultYears: this.settings.defaultYears,
      maxYears: this.settings.maxYears,
      logger: this.logger.child("pipeline")
    });
  }
}

export async function createFilingRag(
  settings: Settings,
  overrides: FilingRagOverrides = {}
): Promise<FilingRag> {
  const logger = overrides.logger ?? createLogger({ level: settings.logLevel });

  const index = new EmbeddingIndex({
    embeddings: overrides.embeddings ?? createEmbeddings(settings),
    embeddingModel: settings.embeddingModel,
    filePath: settings.indexPath,
    logger: logger.child("index")
  });
  const cache = new DocumentCache({
    index,
    metadataPath: settings.metadataPath,
    logger: logger.child("cache")
  });

  const router = createRouter({
    providers: overrides.providers ?? createProviders(settings),
    defaultProvider: settings.defaultProvider,
    taskRoutes: settings.taskRoutes,
    logger: logger.child("router")
  });

  const prompts = settings.promptsPath
    ? await PromptManager.fromFile(settings.promptsPath)
    : new PromptManager();

  return new FilingRag({
    settings,
    cache,
    chunker: new Chunker({ chunkSize: settings.chunkSize, chunkOverlap: settings.chunkOverlap }),
    retriever: new Retriever({
      cache,
      k: settings.retrievalK,
      scoreThreshold: settings.scoreThreshold,
      logger: logger.child("retriever")
    }),
    router,
    prompts,
    logger
  });
}
