import { ChatGoogleGenerativeAI, GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";
import { ChatModelProvider } from "../../generation/chatModelProvider.js";
import type { ProviderCapabilities } from "../../generation/types.js";

export const GEMINI_PROVIDER_NAME = "gemini";

export const GEMINI_CAPABILITIES: ProviderCapabilities = {
  contextWindow: 1_000_000,
  supportsLongContext: true,
  languages: ["ko", "en"],
  relativeCost: "medium",
  relativeSpeed: "fast"
};

export function createEmbeddings(settings: Settings): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: settings.googleApiKey,
    model: settings.embeddingModel
  });
}

export function createChatModel(settings: Settings): ChatGoogleGenerativeAI {
  return new ChatGoogleGenerativeAI({
    apiKey: settings.googleApiKey,
    model: settings.chatModel,
    temperature: 0.3,
    maxRetries: 0
  });
}

/** Long-context provider; the whole retrieved context fits in one request. */
export function createGeminiProvider(settings: Settings): ChatModelProvider {
  return new ChatModelProvider({
    name: GEMINI_PROVIDER_NAME,
    model: createChatModel(settings),
    capabilities: GEMINI_CAPABILITIES,
    systemPrompt: settings.systemPrompt
  });
}
