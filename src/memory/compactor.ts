/**
 * History Compactor: keeps long conversations within the classifiers' context.
 * `shorten` drops the middle of the history; `summarize` replaces it with a model-written summary.
 * Both keep the system preamble and return a strictly shorter history whenever they act.
 */

import type pino from "pino";
import type { ILLM } from "../adapters/llm";
import type { HistoryMode } from "../config";
import { withTimeout } from "../concurrency/timeout";
import { errorMessage } from "../errors";
import { logger as rootLogger, logLlmCall } from "../logging";
import { PromptManager } from "../prompts/prompt-manager";
import { SHORTEN_MARKER } from "../prompts/gate";
import { stripThinking } from "../pipeline/response-parsing";
import type { ChatMessage } from "../session/types";
import type { IHistoryCompactor } from "./types";

/** Messages kept verbatim after the summary. */
export const SUMMARY_KEEP_LAST = 4;

export interface CompactorOptions {
  /** No-op below this many messages. */
  minMessages: number;
  now?: () => number;
}

function splitPreamble(messages: ChatMessage[]): { head: ChatMessage[]; rest: ChatMessage[] } {
  if (messages[0]?.role === "system") return { head: [messages[0]], rest: messages.slice(1) };
  return { head: [], rest: messages };
}

export class ShortenCompactor implements IHistoryCompactor {
  readonly mode: HistoryMode = "shorten";
  private readonly now: () => number;

  constructor(
    private readonly opts: CompactorOptions & { keepLast: number }
  ) {
    this.now = opts.now ?? Date.now;
  }

  async compact(messages: ChatMessage[]): Promise<ChatMessage[]> {
    if (messages.length < this.opts.minMessages) return messages;
    const { head, rest } = splitPreamble(messages);
    // head + marker + kept must come out shorter than the input
    const keep = Math.min(this.opts.keepLast, rest.length - 2);
    if (keep < 1) return messages;
    const marker: ChatMessage = { role: "system", content: SHORTEN_MARKER, timestamp: this.now() };
    return [...head, marker, ...rest.slice(-keep)];
  }
}

export interface SummarizeCompactorDeps {
  llm: ILLM;
  prompts: PromptManager;
  timeoutMs: number;
  log?: pino.Logger;
}

export class SummarizeCompactor implements IHistoryCompactor {
  readonly mode: HistoryMode = "summarize";
  private readonly now: () => number;
  private readonly log: pino.Logger;

  constructor(
    private readonly deps: SummarizeCompactorDeps,
    private readonly opts: CompactorOptions
  ) {
    this.now = opts.now ?? Date.now;
    this.log = deps.log ?? rootLogger;
  }

  async compact(messages: ChatMessage[]): Promise<ChatMessage[]> {
    if (messages.length < this.opts.minMessages) return messages;
    const { head, rest } = splitPreamble(messages);
    const older = rest.slice(0, -SUMMARY_KEEP_LAST);
    // Replacing fewer than two messages with one summary would not shorten anything.
    if (older.length < 2) return messages;
    const recent = rest.slice(-SUMMARY_KEEP_LAST);

    let summary: string;
    const prompt = this.deps.prompts.summary(older);
    const started = Date.now();
    try {
      const res = await withTimeout(this.deps.llm.chat(prompt, { maxTokens: 300 }), this.deps.timeoutMs, "Summary");
      summary = stripThinking(res.text);
      logLlmCall(this.log, "summary", prompt[0]?.content.length ?? 0, res.text.length, Date.now() - started);
    } catch (err) {
      this.log.warn({ event: "COMPACT_FAILED", err: errorMessage(err) }, "Summarization failed; history left as is");
      return messages;
    }
    if (!summary) {
      this.log.warn({ event: "COMPACT_FAILED", err: "empty summary" }, "Summarization failed; history left as is");
      return messages;
    }
    const summaryMessage: ChatMessage = {
      role: "system",
      content: `[CONVERSATION SUMMARY: ${summary}]`,
      timestamp: this.now(),
    };
    return [...head, summaryMessage, ...recent];
  }
}

export function createCompactor(
  mode: HistoryMode,
  deps: SummarizeCompactorDeps,
  opts: CompactorOptions & { keepLast: number }
): IHistoryCompactor {
  if (mode === "shorten") return new ShortenCompactor(opts);
  return new SummarizeCompactor(deps, opts);
}
