/**
 * Vision adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IVisionClassifier } from "./types";
import { StubVisionClassifier } from "./stub";
import { OpenAIVisionClassifier } from "./openai";
import { AnthropicVisionClassifier } from "./anthropic";

export type { IVisionClassifier, ClassifyOptions, ImageMediaType } from "./types";
export { detectMediaType } from "./types";
export { StubVisionClassifier } from "./stub";
export { OpenAIVisionClassifier } from "./openai";
export { AnthropicVisionClassifier } from "./anthropic";

export function createVisionClassifier(config: AppConfig): IVisionClassifier {
  const { provider, model } = config.vision;
  const { openaiApiKey, anthropicApiKey } = config.llm;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAIVisionClassifier({ apiKey: openaiApiKey, model });
  }
  if (provider === "anthropic" && anthropicApiKey) {
    return new AnthropicVisionClassifier({ apiKey: anthropicApiKey, model });
  }
  return new StubVisionClassifier();
}
