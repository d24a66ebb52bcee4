import { z } from "zod";

import { InvalidConfigError } from "../errors.js";
import { readJsonFile } from "../storage/jsonFile.js";
import { DEFAULT_PROMPTS, type PromptTemplates } from "./templates.js";

const promptTemplatesSchema = z.record(
  z.object({
    description: z.string().default(""),
    variables: z.array(z.string()).default([]),
    template: z.string()
  })
);

export type PromptVariables = Record<string, string | number>;

export class PromptManager {
  private readonly prompts: PromptTemplates;

  constructor(prompts: PromptTemplates = DEFAULT_PROMPTS) {
    this.prompts = prompts;
  }

  /** Default templates overlaid with the ones in `filePath`. */
  static async fromFile(filePath: string): Promise<PromptManager> {
    const overrides = await readJsonFile(filePath, promptTemplatesSchema);
    if (!overrides) {
      throw new InvalidConfigError(`Prompt file not found: ${filePath}`);
    }
    return new PromptManager({ ...DEFAULT_PROMPTS, ...overrides });
  }

  names(): string[] {
    return Object.keys(this.prompts);
  }

  /** Fills `{name}` placeholders; every declared variable must be supplied. */
  render(name: string, variables: PromptVariables): string {
    const prompt = Object.hasOwn(this.prompts, name) ? this.prompts[name] : undefined;
    if (!prompt) {
      throw new InvalidConfigError(`Unknown prompt: ${name}`);
    }

    const missing = prompt.variables.filter((v) => !Object.hasOwn(variables, v));
    if (missing.length > 0) {
      throw new InvalidConfigError(`Prompt ${name} is missing variables: ${missing.join(", ")}`);
    }

    return prompt.template.replace(/\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g, (match, key: string) =>
      Object.hasOwn(variables, key) ? String(variables[key]) : match
    );
  }
}
