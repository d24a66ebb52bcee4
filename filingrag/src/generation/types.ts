export type RelativeCost = "low" | "medium" | "high";

export type RelativeSpeed = "medium" | "fast" | "very_fast";

export type ProviderCapabilities = {
  contextWindow: number;
  supportsLongContext: boolean;
  /** BCP 47 language tags the provider handles well. */
  languages: string[];
  relativeCost: RelativeCost;
  relativeSpeed: RelativeSpeed;
};

export type GenerationProvider = {
  readonly name: string;
  produceText(prompt: string): Promise<string>;
  declareCapabilities(): ProviderCapabilities;
};

export const TASK_TYPES = {
  queryAnalysis: "query_analysis",
  longContextAnalysis: "long_context_analysis",
  quickAnalysis: "quick_analysis"
} as const;

/** Task types are open: unknown ones route explicitly or fall to the default provider. */
export type TaskType = string;

export type CapabilityRequirement = {
  requiresLongContext?: boolean;
};

export const TASK_REQUIREMENTS: Readonly<Record<TaskType, CapabilityRequirement | undefined>> = {
  long_context_analysis: { requiresLongContext: true }
};

export type ProviderInfo = {
  name: string;
  capabilities: ProviderCapabilities;
  isDefault: boolean;
};
