/**
 * LLM adapter types.
 * Implementations can be swapped via config (e.g. OpenAI, Anthropic, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** Max tokens to generate. */
  maxTokens?: number;
  /** Overrides the handle's configured temperature for this call. */
  temperature?: number;
  /** Ask the provider for a JSON object when it supports a JSON mode. */
  responseFormat?: "text" | "json";
}

export interface ChatResponse {
  /** Full text of the assistant reply. */
  text: string;
}

/**
 * LLM adapter interface: messages in, assistant reply out.
 * Each instance is bound to one model and temperature.
 */
export interface ILLM {
  /**
   * Get assistant reply for the given messages.
   * @param messages - Prompt (system + user turns).
   */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/** One injected handle per pipeline role, so each can run its own model and temperature. */
export interface LlmHandles {
  main: ILLM;
  validation: ILLM;
  session: ILLM;
  summary: ILLM;
  decision: ILLM;
}
