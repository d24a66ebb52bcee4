import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";

import type { GenerationProvider, ProviderCapabilities } from "./types.js";

/** A LangChain chat model exposed as a generation provider. */
export class ChatModelProvider implements GenerationProvider {
  readonly name: string;
  private readonly model: BaseChatModel;
  private readonly capabilities: ProviderCapabilities;
  private readonly systemPrompt: string | undefined;

  constructor(params: {
    name: string;
    model: BaseChatModel;
    capabilities: ProviderCapabilities;
    systemPrompt?: string;
  }) {
    this.name = params.name;
    this.model = params.model;
    this.capabilities = params.capabilities;
    this.systemPrompt = params.systemPrompt;
  }

  async produceText(prompt: string): Promise<string> {
    const messages: BaseMessage[] = [];
    if (this.systemPrompt) {
      messages.push(new SystemMessage(this.systemPrompt));
    }
    messages.push(new HumanMessage(prompt));

    const result = await this.model.invoke(messages);
    const text = result.text.trim();
    if (!text) {
      throw new Error(`Empty response from ${this.name}`);
    }
    return text;
  }

  declareCapabilities(): ProviderCapabilities {
    return { ...this.capabilities, languages: [...this.capabilities.languages] };
  }
}
