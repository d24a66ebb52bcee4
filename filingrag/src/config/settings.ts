import path from "node:path";

import { InvalidConfigError } from "../errors.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

const DEFAULT_SYSTEM_PROMPT = `Role
- You are an equity research assistant working from regulatory filings and broker research.
- Answer in the language of the question. Korean questions get Korean answers.

Rules
1) Ground every claim in the supplied references. Name the report and its date.
2) When the references do not cover the question, say so instead of guessing.
3) Keep figures exactly as written in the source, including units and periods.
4) Lead with the conclusion, then the supporting evidence.
5) No investment advice phrased as a recommendation to buy or sell.`;

export type TaskRoutes = Record<string, string>;

export type FriendliSettings = {
  token: string;
  baseUrl: string;
  endpointId: string;
};

export type PerplexitySettings = {
  apiKey: string;
  model: string;
};

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  dataDir: string;
  indexPath: string;
  metadataPath: string;
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  scoreThreshold: number;
  friendli?: FriendliSettings;
  perplexity?: PerplexitySettings;
  defaultProvider?: string;
  taskRoutes: TaskRoutes;
  providerTimeoutMs: number;
  systemPrompt: string;
  promptsPath?: string;
  logLevel: LogLevel;
  maxFilings: number;
  maxBrokerReports: number;
  maxIndustryReports: number;
  defaultYears: number;
  maxYears: number;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/** Parses `task=provider,task=provider`. */
export function parseTaskRoutes(raw: string | undefined): TaskRoutes {
  const routes: TaskRoutes = {};
  if (!raw) return routes;
  for (const pair of raw.split(",")) {
    const trimmed = pair.trim();
    if (!trimmed) continue;
    const [task, provider, ...rest] = trimmed.split("=").map((s) => s.trim());
    if (!task || !provider || rest.length > 0) {
      throw new InvalidConfigError(`Invalid task route "${trimmed}" (expected task=provider)`);
    }
    routes[task] = provider;
  }
  return routes;
}

export function loadSettings(env: Env = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new InvalidConfigError("GOOGLE_API_KEY is required");
  }

  const dataDir = env.FILINGRAG_DATA_DIR ?? ".filingrag";

  const chunkSize = readInt(env, "FILINGRAG_CHUNK_SIZE", 1000);
  const chunkOverlap = readInt(env, "FILINGRAG_CHUNK_OVERLAP", 200);
  if (chunkSize <= 0 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new InvalidConfigError(
      `Chunk overlap must be smaller than chunk size (size=${chunkSize} overlap=${chunkOverlap})`
    );
  }

  const friendli =
    env.FRIENDLI_TOKEN && env.FRIENDLI_ENDPOINT_ID
      ? {
          token: env.FRIENDLI_TOKEN,
          baseUrl: env.FRIENDLI_BASE_URL ?? "https://api.friendli.ai/dedicated/v1",
          endpointId: env.FRIENDLI_ENDPOINT_ID
        }
      : undefined;

  const perplexity = env.PERPLEXITY_API_KEY
    ? {
        apiKey: env.PERPLEXITY_API_KEY,
        model: env.FILINGRAG_PERPLEXITY_MODEL ?? "sonar"
      }
    : undefined;

  const logLevelRaw = (env.FILINGRAG_LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new InvalidConfigError(`Unknown FILINGRAG_LOG_LEVEL "${logLevelRaw}"`);
  }

  return {
    googleApiKey,
    chatModel: env.FILINGRAG_GEMINI_MODEL ?? "gemini-2.5-pro",
    embeddingModel: env.FILINGRAG_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    dataDir,
    indexPath: path.join(dataDir, "index.json"),
    metadataPath: path.join(dataDir, "metadata.json"),
    chunkSize,
    chunkOverlap,
    retrievalK: readInt(env, "FILINGRAG_RETRIEVAL_K", 20),
    scoreThreshold: readNumber(env, "FILINGRAG_SCORE_THRESHOLD", 0.7),
    friendli,
    perplexity,
    defaultProvider: env.FILINGRAG_DEFAULT_PROVIDER || undefined,
    taskRoutes: parseTaskRoutes(env.FILINGRAG_TASK_ROUTES),
    providerTimeoutMs: readInt(env, "FILINGRAG_PROVIDER_TIMEOUT_MS", 120_000),
    systemPrompt: env.FILINGRAG_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    promptsPath: env.FILINGRAG_PROMPTS_PATH || undefined,
    logLevel: logLevelRaw,
    maxFilings: 5,
    maxBrokerReports: 3,
    maxIndustryReports: 2,
    defaultYears: 3,
    maxYears: 10
  };
}
