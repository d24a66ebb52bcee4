import {
  GenerationFailedError,
  InvalidConfigError,
  NoProviderRegisteredError,
  describeError
} from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import {
  TASK_REQUIREMENTS,
  type CapabilityRequirement,
  type GenerationProvider,
  type ProviderCapabilities,
  type ProviderInfo,
  type TaskType
} from "./types.js";

export type GenerationResult = {
  text: string;
  providerName: string;
};

export function meetsRequirement(
  capabilities: ProviderCapabilities,
  requirement: CapabilityRequirement
): boolean {
  if (requirement.requiresLongContext && !capabilities.supportsLongContext) return false;
  return true;
}

/**
 * Registry of generation backends. Selection for a task type, in order:
 * an explicit route, the first provider (by registration) meeting the task's
 * capability requirement, then the default provider.
 *
 * Provider failures are not retried here; they surface as GenerationFailedError
 * and the caller decides whether to try `selectAlternative`.
 */
export class GenerationRouter {
  private readonly providers = new Map<string, GenerationProvider>();
  private readonly routes = new Map<TaskType, string>();
  private readonly requirements: Readonly<Record<TaskType, CapabilityRequirement | undefined>>;
  private readonly logger: Logger;
  private defaultName: string | undefined;

  constructor(
    options: {
      requirements?: Readonly<Record<TaskType, CapabilityRequirement | undefined>>;
      logger?: Logger;
    } = {}
  ) {
    this.requirements = options.requirements ?? TASK_REQUIREMENTS;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.providers.size;
  }

  /** The first registered provider is the default until one is registered with makeDefault. */
  register(provider: GenerationProvider, makeDefault = false): void {
    this.providers.set(provider.name, provider);
    this.logger.info(`Registered generation provider: ${provider.name}`);
    if (makeDefault || this.defaultName === undefined) {
      this.defaultName = provider.name;
      this.logger.debug(`Default provider: ${provider.name}`);
    }
  }

  setRoute(taskType: TaskType, providerName: string): void {
    if (!this.providers.has(providerName)) {
      throw new InvalidConfigError(
        `Cannot route "${taskType}" to unregistered provider "${providerName}"`
      );
    }
    this.routes.set(taskType, providerName);
    this.logger.debug(`Route: ${taskType} -> ${providerName}`);
  }

  has(providerName: string): boolean {
    return this.providers.has(providerName);
  }

  select(taskType?: TaskType): GenerationProvider {
    if (this.providers.size === 0) {
      throw new NoProviderRegisteredError();
    }

    if (taskType !== undefined) {
      const routed = this.routes.get(taskType);
      const provider = routed === undefined ? undefined : this.providers.get(routed);
      if (provider) return provider;

      const requirement = this.requirementFor(taskType);
      if (requirement) {
        for (const candidate of this.providers.values()) {
          if (meetsRequirement(candidate.declareCapabilities(), requirement)) return candidate;
        }
      }
    }

    return this.defaultProvider();
  }

  /**
   * A provider other than `excludedName` for the task: the first capability
   * match, else the default, else the first registered. Undefined when none is left.
   */
  selectAlternative(taskType: TaskType | undefined, excludedName: string): GenerationProvider | undefined {
    const others = [...this.providers.values()].filter((p) => p.name !== excludedName);
    if (others.length === 0) return undefined;

    const requirement = taskType === undefined ? undefined : this.requirementFor(taskType);
    if (requirement) {
      const match = others.find((p) => meetsRequirement(p.declareCapabilities(), requirement));
      if (match) return match;
    }
    return others.find((p) => p.name === this.defaultName) ?? others[0];
  }

  async generate(taskType: TaskType | undefined, prompt: string): Promise<GenerationResult> {
    return this.generateWith(this.select(taskType), prompt);
  }

  async generateWith(provider: GenerationProvider, prompt: string): Promise<GenerationResult> {
    this.logger.info(`Generating with ${provider.name} (${prompt.length} chars of prompt)`);
    try {
      const text = await provider.produceText(prompt);
      return { text, providerName: provider.name };
    } catch (err: unknown) {
      this.logger.warn(`Provider ${provider.name} failed: ${describeError(err)}`);
      throw new GenerationFailedError(provider.name, err);
    }
  }

  listProviders(): ProviderInfo[] {
    return [...this.providers.values()].map((provider) => ({
      name: provider.name,
      capabilities: provider.declareCapabilities(),
      isDefault: provider.name === this.defaultName
    }));
  }

  private requirementFor(taskType: TaskType): CapabilityRequirement | undefined {
    return Object.hasOwn(this.requirements, taskType) ? this.requirements[taskType] : undefined;
  }

  private defaultProvider(): GenerationProvider {
    const provider = this.defaultName === undefined ? undefined : this.providers.get(this.defaultName);
    if (provider) return provider;
    const [first] = this.providers.values();
    if (!first) throw new NoProviderRegisteredError();
    return first;
  }
}
