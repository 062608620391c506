/**
 * LLM adapter factory: returns one handle per pipeline role based on config.
 */

import type { AppConfig, LlmRoleConfig } from "../../config";
import type { ILLM, LlmHandles } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, LlmHandles, Message, ChatOptions, ChatResponse } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export function createLLM(config: AppConfig, role: LlmRoleConfig): ILLM {
  const { provider, openaiApiKey, anthropicApiKey } = config.llm;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAILLM({ apiKey: openaiApiKey, model: role.model, temperature: role.temperature });
  }
  if (provider === "anthropic" && anthropicApiKey) {
    return new AnthropicLLM({ apiKey: anthropicApiKey, model: role.model, temperature: role.temperature });
  }
  return new StubLLM();
}

export function createLlmHandles(config: AppConfig): LlmHandles {
  return {
    main: createLLM(config, config.llm.main),
    validation: createLLM(config, config.llm.validation),
    session: createLLM(config, config.llm.session),
    summary: createLLM(config, config.llm.summary),
    decision: createLLM(config, config.llm.decision),
  };
}
