/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Returns a fixed response (empty by default), which every caller treats as "no answer".
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  constructor(private readonly reply: string = "") {}

  async chat(_messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    return { text: this.reply };
  }
}
