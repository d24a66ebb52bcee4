export {
  FilingRag,
  createFilingRag,
  type AskOptions,
  type BrokerReportLookup,
  type CacheLookup,
  type FilingLookup,
  type FilingRagOverrides,
  type FilingRagParts,
  type IndustryReportLookup,
  type PipelineCollaborators
} from "./core.js";
export { loadSettings, parseTaskRoutes, type Settings } from "./config/settings.js";
export * from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/logger.js";

export type {
  BrokerReportReference,
  Chunk,
  DocumentReference,
  FetchedDocument,
  FilingReference,
  FinancialDocument,
  IndustryReportReference,
  SourceKind
} from "./documents/types.js";
export { SOURCE_KINDS } from "./documents/types.js";
export { brokerReportId, documentIdFor, industryReportId } from "./documents/identity.js";

export { DocumentCache } from "./cache/documentCache.js";
export type { CacheEntry, CacheStats, LoadedDocument, RebuildSummary } from "./cache/types.js";
export { EmbeddingIndex } from "./retrieval/embeddingIndex.js";
export { Retriever, type Passage, type RetrieveOptions } from "./retrieval/retriever.js";
export { Chunker } from "./rag/chunker.js";
export type { Answer } from "./rag/answer.js";

export { GenerationRouter } from "./generation/router.js";
export { ChatModelProvider } from "./generation/chatModelProvider.js";
export {
  TASK_TYPES,
  type GenerationProvider,
  type ProviderCapabilities,
  type TaskType
} from "./generation/types.js";
export { PromptManager } from "./prompts/promptManager.js";
export { PROMPT_NAMES } from "./prompts/templates.js";

export {
  AnalysisPipeline,
  type AnalysisFailure,
  type AnalysisInput,
  type AnalysisResult,
  type AnalysisSuccess,
  type DocumentRecord
} from "./pipeline/analysisPipeline.js";
export {
  DEFAULT_REPORT_TYPES,
  FILING_REPORT_TYPES,
  type CompanyResolver,
  type DocumentSource,
  type FilingReportType,
  type ResolvedCompany,
  type SearchFilters
} from "./pipeline/collaborators.js";
export {
  StageSignalBus,
  type PipelineStage,
  type StageHandler,
  type StageSignal
} from "./pipeline/signals.js";
