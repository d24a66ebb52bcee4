import { ChatOpenAI } from "@langchain/openai";

import type { FriendliSettings, PerplexitySettings, Settings } from "../../config/settings.js";
import { ChatModelProvider } from "../../generation/chatModelProvider.js";
import type { ProviderCapabilities } from "../../generation/types.js";

export const FRIENDLI_PROVIDER_NAME = "friendli";
export const PERPLEXITY_PROVIDER_NAME = "perplexity";

export const FRIENDLI_CAPABILITIES: ProviderCapabilities = {
  contextWindow: 4096,
  supportsLongContext: false,
  languages: ["ko", "en"],
  relativeCost: "low",
  relativeSpeed: "very_fast"
};

export const PERPLEXITY_CAPABILITIES: ProviderCapabilities = {
  contextWindow: 127_000,
  supportsLongContext: false,
  languages: ["ko", "en"],
  relativeCost: "medium",
  relativeSpeed: "fast"
};

/** Chat model for any endpoint speaking the OpenAI chat-completions protocol. */
export function createOpenAICompatibleChatModel(params: {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
  maxTokens?: number;
  temperature?: number;
}): ChatOpenAI {
  return new ChatOpenAI({
    apiKey: params.apiKey,
    model: params.model,
    temperature: params.temperature ?? 0.7,
    maxTokens: params.maxTokens,
    timeout: params.timeoutMs,
    maxRetries: 0,
    configuration: { baseURL: params.baseURL }
  });
}

/** Dedicated Friendli endpoint: small context, fast and cheap. */
export function createFriendliProvider(
  friendli: FriendliSettings,
  settings: Pick<Settings, "providerTimeoutMs" | "systemPrompt">
): ChatModelProvider {
  return new ChatModelProvider({
    name: FRIENDLI_PROVIDER_NAME,
    model: createOpenAICompatibleChatModel({
      apiKey: friendli.token,
      baseURL: friendli.baseUrl.replace(/\/+$/, ""),
      model: friendli.endpointId,
      timeoutMs: settings.providerTimeoutMs,
      maxTokens: 512,
      temperature: 0.7
    }),
    capabilities: FRIENDLI_CAPABILITIES,
    systemPrompt: settings.systemPrompt
  });
}

export function createPerplexityProvider(
  perplexity: PerplexitySettings,
  settings: Pick<Settings, "providerTimeoutMs" | "systemPrompt">
): ChatModelProvider {
  return new ChatModelProvider({
    name: PERPLEXITY_PROVIDER_NAME,
    model: createOpenAICompatibleChatModel({
      apiKey: perplexity.apiKey,
      baseURL: "https://api.perplexity.ai",
      model: perplexity.model,
      timeoutMs: settings.providerTimeoutMs,
      temperature: 0.2
    }),
    capabilities: PERPLEXITY_CAPABILITIES,
    systemPrompt: settings.systemPrompt
  });
}
