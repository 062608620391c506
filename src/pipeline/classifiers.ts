/**
 * Yes/no style classifiers over visitor input. Both fail toward letting the conversation
 * continue: a failed relevance check counts as valid, a failed visitor check as "same".
 */

import type pino from "pino";
import type { ILLM, Message } from "../adapters/llm";
import { withTimeout } from "../concurrency/timeout";
import { errorMessage } from "../errors";
import { logLlmCall } from "../logging";
import type { PromptManager } from "../prompts/prompt-manager";
import type { ChatMessage } from "../session/types";
import { stripThinking } from "./response-parsing";

export type RelevanceVerdict = "valid" | "unrelated";
export type VisitorVerdict = "same" | "new";

export interface ClassifierDeps {
  llm: ILLM;
  prompts: PromptManager;
  timeoutMs: number;
  log: pino.Logger;
}

async function ask(deps: ClassifierDeps, role: string, prompt: Message[]): Promise<string> {
  const started = Date.now();
  const res = await withTimeout(deps.llm.chat(prompt, { maxTokens: 10 }), deps.timeoutMs, role);
  logLlmCall(deps.log, role, prompt[0]?.content.length ?? 0, res.text.length, Date.now() - started);
  return stripThinking(res.text).toLowerCase();
}

export async function classifyRelevance(deps: ClassifierDeps, input: string): Promise<RelevanceVerdict> {
  try {
    const answer = await ask(deps, "validation", deps.prompts.validation(input));
    if (answer.includes("unrelated")) return "unrelated";
    if (!answer.includes("valid")) {
      deps.log.debug({ event: "VALIDATION_UNCLEAR", answer }, "Unclear relevance verdict; treating as valid");
    }
    return "valid";
  } catch (err) {
    deps.log.warn({ event: "VALIDATION_FAILED", err: errorMessage(err) }, "Relevance check failed; treating as valid");
    return "valid";
  }
}

export async function detectNewVisitor(deps: ClassifierDeps, messages: ChatMessage[]): Promise<VisitorVerdict> {
  try {
    const answer = await ask(deps, "session", deps.prompts.sessionDetection(messages));
    return answer.includes("new") && !answer.includes("same") ? "new" : "same";
  } catch (err) {
    deps.log.warn({ event: "SESSION_DETECT_FAILED", err: errorMessage(err) }, "New-visitor check failed; assuming same visitor");
    return "same";
  }
}
