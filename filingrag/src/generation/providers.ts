import type { Settings } from "../config/settings.js";
import { InvalidConfigError } from "../errors.js";
import { createGeminiProvider } from "../integrations/gemini/models.js";
import {
  createFriendliProvider,
  createPerplexityProvider
} from "../integrations/openaiCompatible/models.js";
import type { Logger } from "../logging/logger.js";
import { GenerationRouter } from "./router.js";
import type { GenerationProvider } from "./types.js";

/** Providers enabled by the settings, in registration order. Gemini is always present. */
export function createProviders(settings: Settings): GenerationProvider[] {
  const providers: GenerationProvider[] = [createGeminiProvider(settings)];
  if (settings.friendli) {
    providers.push(createFriendliProvider(settings.friendli, settings));
  }
  if (settings.perplexity) {
    providers.push(createPerplexityProvider(settings.perplexity, settings));
  }
  return providers;
}

/** Registers providers, marks the configured default, and applies task routes. */
export function createRouter(params: {
  providers: readonly GenerationProvider[];
  defaultProvider?: string;
  taskRoutes?: Readonly<Record<string, string>>;
  logger?: Logger;
}): GenerationRouter {
  const router = new GenerationRouter({ logger: params.logger });
  for (const provider of params.providers) {
    router.register(provider, provider.name === params.defaultProvider);
  }
  if (params.defaultProvider && !router.has(params.defaultProvider)) {
    throw new InvalidConfigError(`Default provider "${params.defaultProvider}" is not configured`);
  }
  for (const [taskType, providerName] of Object.entries(params.taskRoutes ?? {})) {
    router.setRoute(taskType, providerName);
  }
  return router;
}
