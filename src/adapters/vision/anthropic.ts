/**
 * Anthropic vision adapter (base64 image block + text block).
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ClassifyOptions, IVisionClassifier } from "./types";
import { detectMediaType } from "./types";

export interface AnthropicVisionConfig {
  apiKey: string;
  model: string;
}

export class AnthropicVisionClassifier implements IVisionClassifier {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicVisionConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async classify(image: Buffer, prompt: string, options?: ClassifyOptions): Promise<string> {
    const response = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? 300,
      temperature: 0,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: { type: "base64", media_type: detectMediaType(image), data: image.toString("base64") },
            },
            { type: "text", text: prompt },
          ],
        },
      ],
    });
    const textBlock = response.content.find((b) => b.type === "text");
    return textBlock && textBlock.type === "text" ? textBlock.text : "";
  }
}
