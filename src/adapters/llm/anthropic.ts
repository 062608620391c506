/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
  temperature: number;
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs = messages
      .filter((m): m is Message & { role: "user" | "assistant" } => m.role !== "system")
      .map((m) => ({ role: m.role, content: m.content }));
    const response = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? 256,
      temperature: options?.temperature ?? this.cfg.temperature,
      system: system || undefined,
      messages: msgs,
    });
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text };
  }
}
