/**
 * OpenAI vision adapter (chat completions with an image_url part, JSON mode).
 */

import OpenAI from "openai";
import type { ClassifyOptions, IVisionClassifier } from "./types";
import { detectMediaType } from "./types";

export interface OpenAIVisionConfig {
  apiKey: string;
  model: string;
}

export class OpenAIVisionClassifier implements IVisionClassifier {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAIVisionConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey });
  }

  async classify(image: Buffer, prompt: string, options?: ClassifyOptions): Promise<string> {
    const dataUrl = `data:${detectMediaType(image)};base64,${image.toString("base64")}`;
    const response = await this.client.chat.completions.create({
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? 300,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        {
          role: "user",
          content: [
            { type: "image_url", image_url: { url: dataUrl } },
            { type: "text", text: prompt },
          ],
        },
      ],
    });
    return response.choices[0]?.message?.content ?? "";
  }
}
