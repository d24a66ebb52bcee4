import { z } from "zod";

import { cleanKeywords } from "../documents/identity.js";
import { GenerationFailedError, describeError } from "../errors.js";
import type { GenerationRouter } from "../generation/router.js";
import { TASK_TYPES } from "../generation/types.js";
import type { Logger } from "../logging/logger.js";
import type { PromptManager } from "../prompts/promptManager.js";
import { PROMPT_NAMES } from "../prompts/templates.js";
import {
  DEFAULT_REPORT_TYPES,
  isFilingReportType,
  type FilingReportType,
  type ResolvedCompany
} from "./collaborators.js";

const timeRangeReply = z.object({
  years: z.number(),
  reason: z.string().optional()
});

const keywordsReply = z.object({
  keywords: z.array(z.string())
});

const reportTypesReply = z.object({
  recommended_types: z.array(z.string()),
  reason: z.string().optional(),
  need_historical_reports: z.boolean().optional()
});

const MAX_KEYWORDS = 3;

/** First `{...}` block of a model reply parsed as JSON, or undefined. */
export function parseJsonObject(reply: string): unknown {
  const match = /\{[\s\S]*\}/.exec(reply);
  if (!match) return undefined;
  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}

export function parseTimeRange(reply: string, fallback: number, maxYears: number): number {
  const parsed = timeRangeReply.safeParse(parseJsonObject(reply));
  if (!parsed.success || !Number.isFinite(parsed.data.years)) return fallback;
  return Math.min(maxYears, Math.max(1, Math.round(parsed.data.years)));
}

export function parseKeywords(reply: string): string[] {
  const parsed = keywordsReply.safeParse(parseJsonObject(reply));
  if (!parsed.success) return [];
  return cleanKeywords(parsed.data.keywords).slice(0, MAX_KEYWORDS);
}

/** Known filing types from a recommendation reply, in reply order; the defaults when none are usable. */
export function parseReportTypes(reply: string): FilingReportType[] {
  const parsed = reportTypesReply.safeParse(parseJsonObject(reply));
  if (!parsed.success) return [...DEFAULT_REPORT_TYPES];
  const known = parsed.data.recommended_types
    .map((t) => t.trim().toLowerCase())
    .filter(isFilingReportType);
  return known.length > 0 ? [...new Set(known)] : [...DEFAULT_REPORT_TYPES];
}

/** Filing types the question needs. A failed generation gives the defaults. */
export async function recommendReportTypes(params: {
  router: GenerationRouter;
  prompts: PromptManager;
  query: string;
  logger: Logger;
}): Promise<FilingReportType[]> {
  const prompt = params.prompts.render(PROMPT_NAMES.reportTypes, { user_query: params.query });
  try {
    const { text } = await params.router.generate(TASK_TYPES.queryAnalysis, prompt);
    const reportTypes = parseReportTypes(text);
    params.logger.info(`Report types: ${reportTypes.join(", ")}`);
    return reportTypes;
  } catch (err: unknown) {
    if (!(err instanceof GenerationFailedError)) throw err;
    params.logger.warn(`Report type recommendation failed, using defaults: ${describeError(err)}`);
    return [...DEFAULT_REPORT_TYPES];
  }
}

/** Years of documents the question needs. A failed or unusable reply gives `defaultYears`. */
export async function extractTimeRange(params: {
  router: GenerationRouter;
  prompts: PromptManager;
  query: string;
  defaultYears: number;
  maxYears: number;
  logger: Logger;
}): Promise<number> {
  const prompt = params.prompts.render(PROMPT_NAMES.timeRange, { user_query: params.query });
  try {
    const { text } = await params.router.generate(TASK_TYPES.queryAnalysis, prompt);
    const years = parseTimeRange(text, params.defaultYears, params.maxYears);
    params.logger.info(`Time range: ${years} years`);
    return years;
  } catch (err: unknown) {
    if (!(err instanceof GenerationFailedError)) throw err;
    params.logger.warn(`Time range extraction failed, using ${params.defaultYears} years: ${describeError(err)}`);
    return params.defaultYears;
  }
}

/** Industry keywords for the question, falling back to the company's registered industry. */
export async function extractIndustryKeywords(params: {
  router: GenerationRouter;
  prompts: PromptManager;
  query: string;
  company: ResolvedCompany;
  logger: Logger;
}): Promise<string[]> {
  const fallback = params.company.industry ? cleanKeywords([params.company.industry]) : [];
  const prompt = params.prompts.render(PROMPT_NAMES.industryKeywords, {
    user_query: params.query,
    company_name: params.company.name,
    base_industry: params.company.industry ?? "unknown"
  });
  try {
    const { text } = await params.router.generate(TASK_TYPES.queryAnalysis, prompt);
    const keywords = parseKeywords(text);
    return keywords.length > 0 ? keywords : fallback;
  } catch (err: unknown) {
    if (!(err instanceof GenerationFailedError)) throw err;
    params.logger.warn(`Keyword extraction failed, using registered industry: ${describeError(err)}`);
    return fallback;
  }
}
