/**
 * Unit tests for the relevance and new-visitor classifiers.
 */

import { logger } from "../../../src/logging";
import { classifyRelevance, detectNewVisitor } from "../../../src/pipeline/classifiers";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import type { ChatMessage } from "../../../src/session/types";
import { FailingLLM, ScriptedLLM } from "../../helpers/fakes";

const prompts = new PromptManager();

function deps(llm: ScriptedLLM | FailingLLM) {
  return { llm, prompts, timeoutMs: 1000, log: logger };
}

const history: ChatMessage[] = [
  { role: "system", content: "preamble", timestamp: 0 },
  { role: "human", content: "Hi, I'm Bob Stone", timestamp: 1 },
  { role: "human", content: "Hi, I'm Alice", timestamp: 2 },
];

describe("classifyRelevance", () => {
  it("returns unrelated when the model says so", async () => {
    await expect(classifyRelevance(deps(new ScriptedLLM(() => "Unrelated.")), "asdfgh")).resolves.toBe("unrelated");
  });

  it("returns valid for a valid answer", async () => {
    const llm = new ScriptedLLM(() => "VALID");
    await expect(classifyRelevance(deps(llm), "I'm Maria")).resolves.toBe("valid");
    expect(llm.prompts[0]).toContain('Input to validate: "I\'m Maria"');
  });

  it("reads the answer after a think block", async () => {
    const llm = new ScriptedLLM(() => "<think>could be unrelated</think>valid");
    await expect(classifyRelevance(deps(llm), "hello")).resolves.toBe("valid");
  });

  it("treats a failed call as valid", async () => {
    await expect(classifyRelevance(deps(new FailingLLM()), "hello")).resolves.toBe("valid");
  });
});

describe("detectNewVisitor", () => {
  it("returns new only for a clear new answer", async () => {
    await expect(detectNewVisitor(deps(new ScriptedLLM(() => "New")), history)).resolves.toBe("new");
    await expect(detectNewVisitor(deps(new ScriptedLLM(() => "not new, same")), history)).resolves.toBe("same");
    await expect(detectNewVisitor(deps(new ScriptedLLM(() => "")), history)).resolves.toBe("same");
  });

  it("assumes the same visitor when the call fails", async () => {
    await expect(detectNewVisitor(deps(new FailingLLM()), history)).resolves.toBe("same");
  });
});
