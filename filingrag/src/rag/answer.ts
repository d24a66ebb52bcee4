import { GenerationFailedError } from "../errors.js";
import type { GenerationResult, GenerationRouter } from "../generation/router.js";
import { TASK_TYPES, type TaskType } from "../generation/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { PromptManager } from "../prompts/promptManager.js";
import { EXCLUDE_OPINIONS_INSTRUCTION, PROMPT_NAMES } from "../prompts/templates.js";
import type { Passage, Retriever } from "../retrieval/retriever.js";
import { buildContext } from "./context.js";

export type Answer = {
  passages: Passage[];
  generatedText: string;
  providerUsed: string;
  /** Provider that failed before `providerUsed` answered. */
  fallbackFrom?: string;
};

export type FallbackResult = GenerationResult & { fallbackFrom?: string };

export function buildAnswerPrompt(params: {
  prompts: PromptManager;
  companyName: string;
  question: string;
  passages: readonly Passage[];
  /** Ask for an answer from facts only, without broker opinions or ratings. */
  excludeOpinions?: boolean;
}): string {
  return params.prompts.render(PROMPT_NAMES.ragAnalysis, {
    company_name: params.companyName,
    user_query: params.question,
    num_chunks: params.passages.length,
    context: buildContext(params.passages),
    exclude_opinions_instruction: params.excludeOpinions ? EXCLUDE_OPINIONS_INSTRUCTION : ""
  });
}

/** Generates once; on provider failure, tries exactly one alternative provider. */
export async function generateWithFallback(params: {
  router: GenerationRouter;
  taskType: TaskType | undefined;
  prompt: string;
  logger?: Logger;
}): Promise<FallbackResult> {
  const logger = params.logger ?? silentLogger;
  try {
    return await params.router.generate(params.taskType, params.prompt);
  } catch (err: unknown) {
    if (!(err instanceof GenerationFailedError)) throw err;
    const alternative = params.router.selectAlternative(params.taskType, err.providerName);
    if (!alternative) throw err;
    logger.warn(`${err.providerName} failed, falling back to ${alternative.name}`);
    const result = await params.router.generateWith(alternative, params.prompt);
    return { ...result, fallbackFrom: err.providerName };
  }
}

export async function answerQuestion(params: {
  companyId: string;
  companyName?: string;
  question: string;
  taskType?: TaskType;
  excludeOpinions?: boolean;
  retriever: Retriever;
  router: GenerationRouter;
  prompts: PromptManager;
  logger?: Logger;
}): Promise<Answer> {
  const passages = await params.retriever.retrieve(params.question, {
    companyFilter: params.companyId
  });

  const prompt = buildAnswerPrompt({
    prompts: params.prompts,
    companyName: params.companyName ?? params.companyId,
    question: params.question,
    passages,
    excludeOpinions: params.excludeOpinions
  });

  const result = await generateWithFallback({
    router: params.router,
    taskType: params.taskType ?? TASK_TYPES.longContextAnalysis,
    prompt,
    logger: params.logger
  });

  return {
    passages,
    generatedText: result.text,
    providerUsed: result.providerName,
    ...(result.fallbackFrom ? { fallbackFrom: result.fallbackFrom } : {})
  };
}
