import type { DocumentCache } from "../cache/documentCache.js";
import type { CacheEntry } from "../cache/types.js";
import { documentIdFor } from "../documents/identity.js";
import type { DocumentReference, FetchedDocument, SourceKind } from "../documents/types.js";
import { CompanyNotResolvedError } from "../errors.js";
import type { GenerationRouter } from "../generation/router.js";
import { TASK_TYPES, type TaskType } from "../generation/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { PromptManager } from "../prompts/promptManager.js";
import { buildAnswerPrompt, generateWithFallback } from "../rag/answer.js";
import type { Chunker } from "../rag/chunker.js";
import { ingestDocument } from "../rag/ingest.js";
import type { Passage, Retriever } from "../retrieval/retriever.js";
import type {
  CompanyResolver,
  DocumentSource,
  FilingReportType,
  ResolvedCompany,
  SearchFilters
} from "./collaborators.js";
import { extractIndustryKeywords, extractTimeRange, recommendReportTypes } from "./queryAnalysis.js";
import type { PipelineStage, StageSignalBus, WorkStage } from "./signals.js";

export type AnalysisInput = {
  companyName: string;
  query: string;
  taskType?: TaskType;
  /** Answer from facts only, leaving out broker opinions, ratings and target prices. */
  excludeOpinions?: boolean;
};

export type DocumentRecord = {
  documentId: string;
  sourceKind: SourceKind;
  title: string;
  publishedAt: string;
  chunkCount: number;
  /** True when the document came from the cache and nothing was fetched. */
  cached: boolean;
};

type Gathered = {
  company?: ResolvedCompany;
  years?: number;
  keywords: string[];
  reportTypes: FilingReportType[];
  documents: DocumentRecord[];
  passages: Passage[];
  messages: string[];
};

export type AnalysisSuccess = Gathered & {
  status: "done";
  company: ResolvedCompany;
  years: number;
  generatedText: string;
  providerUsed: string;
  fallbackFrom?: string;
};

export type AnalysisFailure = Gathered & {
  status: "failed";
  failedStage: WorkStage;
  lastCompletedStage: WorkStage | null;
  reason: string;
  error: Error;
};

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export type SourceLimits = Record<SourceKind, number>;

export type AnalysisPipelineOptions = {
  resolver: CompanyResolver;
  sources: readonly DocumentSource[];
  cache: DocumentCache;
  chunker: Chunker;
  retriever: Retriever;
  router: GenerationRouter;
  prompts: PromptManager;
  limits?: Partial<SourceLimits>;
  defaultYears?: number;
  maxYears?: number;
  logger?: Logger;
  now?: () => Date;
};

type PlannedFetch = {
  source: DocumentSource;
  references: DocumentReference[];
};

const DEFAULT_LIMITS: SourceLimits = {
  "regulatory-filing": 5,
  "broker-report": 3,
  "industry-report": 2
};

export function sinceDate(now: Date, years: number): string {
  const since = new Date(now.getTime());
  since.setUTCFullYear(since.getUTCFullYear() - years);
  return since.toISOString().slice(0, 10);
}

function recordOf(entry: CacheEntry, cached: boolean): DocumentRecord {
  return {
    documentId: entry.documentId,
    sourceKind: entry.sourceKind,
    title: entry.title,
    publishedAt: entry.publishedAt,
    chunkCount: entry.chunkIds.length,
    cached
  };
}

/**
 * Company question → resolved company → documents through the cache →
 * retrieved passages → generated answer.
 *
 * The pipeline object only holds its collaborators; every `run` keeps its own
 * state, so one instance serves concurrent requests. A failing stage ends the
 * run with a failure result that still carries everything gathered before it.
 */
export class AnalysisPipeline {
  private readonly options: AnalysisPipelineOptions;
  private readonly limits: SourceLimits;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: AnalysisPipelineOptions) {
    this.options = options;
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async run(input: AnalysisInput, signals?: StageSignalBus): Promise<AnalysisResult> {
    const gathered: Gathered = {
      keywords: [],
      reportTypes: [],
      documents: [],
      passages: [],
      messages: []
    };
    let stage: WorkStage = "ResolvingCompany";
    let lastCompleted: WorkStage | null = null;

    const signal = (at: PipelineStage, detail: string): void => {
      gathered.messages.push(detail);
      this.logger.info(`[${at}] ${detail}`);
      signals?.emit({ stage: at, detail, timestamp: this.now() });
    };
    const complete = (done: WorkStage, detail: string): void => {
      lastCompleted = done;
      signal(done, detail);
    };

    try {
      stage = "ResolvingCompany";
      const company = await this.options.resolver.resolve(input.companyName);
      if (!company) {
        throw new CompanyNotResolvedError(input.companyName);
      }
      gathered.company = company;
      complete(stage, `Resolved ${input.companyName} to ${company.name} (${company.companyId})`);

      stage = "SearchingDocuments";
      const years = await extractTimeRange({
        router: this.options.router,
        prompts: this.options.prompts,
        query: input.query,
        defaultYears: this.options.defaultYears ?? 3,
        maxYears: this.options.maxYears ?? 10,
        logger: this.logger
      });
      gathered.years = years;
      const { planned, cachedIndustry } = await this.searchDocuments(company, input.query, years, gathered);
      const candidates = planned.reduce((n, p) => n + p.references.length, 0);
      complete(
        stage,
        `Found ${candidates} candidate documents over ${years} years` +
          (cachedIndustry.length > 0 ? `, ${cachedIndustry.length} industry reports already cached` : "")
      );

      stage = "FetchingOrCached";
      for (const entry of cachedIndustry) {
        gathered.documents.push(recordOf(entry, true));
      }
      for (const { source, references } of planned) {
        for (const reference of references) {
          gathered.documents.push(await this.fetchOrReuse(source, reference, gathered.keywords));
        }
      }
      const fetched = gathered.documents.filter((d) => !d.cached).length;
      complete(
        stage,
        `${gathered.documents.length} documents ready (${fetched} fetched, ${gathered.documents.length - fetched} from cache)`
      );

      stage = "Retrieving";
      gathered.passages = await this.options.retriever.retrieve(input.query, {
        companyFilter: company.companyId
      });
      complete(stage, `Retrieved ${gathered.passages.length} passages`);

      stage = "Generating";
      const prompt = buildAnswerPrompt({
        prompts: this.options.prompts,
        companyName: company.name,
        question: input.query,
        passages: gathered.passages,
        excludeOpinions: input.excludeOpinions
      });
      const result = await generateWithFallback({
        router: this.options.router,
        taskType: input.taskType ?? TASK_TYPES.longContextAnalysis,
        prompt,
        logger: this.logger
      });
      complete(stage, `Generated ${result.text.length} chars with ${result.providerName}`);

      signal("Done", "Analysis complete");
      return {
        ...gathered,
        status: "done",
        company,
        years,
        generatedText: result.text,
        providerUsed: result.providerName,
        ...(result.fallbackFrom ? { fallbackFrom: result.fallbackFrom } : {})
      };
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      signal("Failed", `${stage} failed: ${error.message}`);
      return {
        ...gathered,
        status: "failed",
        failedStage: stage,
        lastCompletedStage: lastCompleted,
        reason: error.message,
        error
      };
    }
  }

  private async searchDocuments(
    company: ResolvedCompany,
    query: string,
    years: number,
    gathered: Gathered
  ): Promise<{ planned: PlannedFetch[]; cachedIndustry: CacheEntry[] }> {
    const { sources, cache } = this.options;

    if (sources.some((s) => s.kind === "industry-report")) {
      gathered.keywords = await extractIndustryKeywords({
        router: this.options.router,
        prompts: this.options.prompts,
        query,
        company,
        logger: this.logger
      });
    }

    if (sources.some((s) => s.kind === "regulatory-filing")) {
      gathered.reportTypes = await recommendReportTypes({
        router: this.options.router,
        prompts: this.options.prompts,
        query,
        logger: this.logger
      });
    }

    const planned: PlannedFetch[] = [];
    const cachedIndustry: CacheEntry[] = [];
    for (const source of sources) {
      const limit = this.limits[source.kind];
      if (source.kind === "industry-report") {
        if (gathered.keywords.length === 0) {
          gathered.messages.push("No industry keywords, industry reports skipped");
          continue;
        }
        const cached = await cache.findAllMatching(gathered.keywords);
        if (cached.length >= limit) {
          cachedIndustry.push(...cached.slice(0, limit));
          continue;
        }
      }

      const filters: SearchFilters = {
        years,
        since: sinceDate(this.now(), years),
        keywords: source.kind === "industry-report" ? [...gathered.keywords] : [],
        reportTypes: source.kind === "regulatory-filing" ? [...gathered.reportTypes] : [],
        limit
      };
      const references = await source.search(company, filters);
      planned.push({ source, references: references.slice(0, limit) });
    }
    return { planned, cachedIndustry };
  }

  private async fetchOrReuse(
    source: DocumentSource,
    reference: DocumentReference,
    keywords: readonly string[]
  ): Promise<DocumentRecord> {
    const cached = await this.options.cache.get(documentIdFor(reference));
    if (cached) {
      return recordOf(cached, true);
    }

    const fetched = await source.fetch(reference);
    const entry = await ingestDocument({
      fetched: withQueryKeywords(fetched, keywords),
      chunker: this.options.chunker,
      cache: this.options.cache
    });
    return recordOf(entry, false);
  }
}

/** Industry reports fetched without keywords of their own are filed under the query's keywords. */
function withQueryKeywords(fetched: FetchedDocument, keywords: readonly string[]): FetchedDocument {
  if (fetched.sourceKind !== "industry-report" || fetched.keywords.length > 0) return fetched;
  return { ...fetched, keywords: [...keywords] };
}
