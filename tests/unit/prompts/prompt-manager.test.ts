import { DECISION_CONTEXT_MESSAGES, PromptManager, transcriptOf } from "../../../src/prompts/prompt-manager";
import { GATE_SYSTEM_PREAMBLE } from "../../../src/prompts/gate";
import { emptyProfile, fieldValue } from "../../../src/session/profile";
import type { ChatMessage } from "../../../src/session/types";

function messages(count: number): ChatMessage[] {
  const out: ChatMessage[] = [{ role: "system", content: "preamble", timestamp: 0 }];
  for (let i = 1; i < count; i++) out.push({ role: "human", content: `line ${i}`, timestamp: i });
  return out;
}

describe("PromptManager", () => {
  const pm = new PromptManager();

  it("defaults to the gate preamble", () => {
    expect(pm.systemPrompt).toBe(GATE_SYSTEM_PREAMBLE);
    expect(new PromptManager({ systemPrompt: "custom" }).systemPrompt).toBe("custom");
  });

  it("renders transcripts one role-prefixed line per message", () => {
    expect(transcriptOf(messages(3))).toBe("system: preamble\nhuman: line 1\nhuman: line 2");
  });

  it("embeds the visitor input in the validation prompt", () => {
    const msgs = pm.validation("I'm Maria");
    expect(msgs).toHaveLength(1);
    expect(msgs[0]?.role).toBe("user");
    expect(msgs[0]?.content).toContain('Input to validate: "I\'m Maria"');
  });

  it("skips the preamble in short session-detection context", () => {
    const content = pm.sessionDetection(messages(3))[0]?.content ?? "";
    expect(content).not.toContain("system: preamble");
    expect(content).toContain("LATEST MESSAGE: line 2");
  });

  it("lists known contacts only in the contact prompt", () => {
    const contact = pm.extraction("contactPerson", messages(2), ["David Smith", "Alice Kimble"])[0]?.content ?? "";
    expect(contact).toContain("KNOWN CONTACTS:\n- David Smith\n- Alice Kimble");
    expect(contact.endsWith("Contact person:")).toBe(true);
    const name = pm.extraction("name", messages(2), ["David Smith"])[0]?.content ?? "";
    expect(name).not.toContain("KNOWN CONTACTS");
    expect(name.endsWith("Extract name:")).toBe(true);
  });

  it("uses snake_case labels for multi-word fields", () => {
    const content = pm.extraction("threatLevel", messages(2), [])[0]?.content ?? "";
    expect(content.endsWith("Extract threat_level:")).toBe(true);
  });

  it("gives the decision prompt the profile and only recent messages", () => {
    const profile = { ...emptyProfile(), name: fieldValue("Maria Garcia") };
    const content = pm.decision(profile, messages(DECISION_CONTEXT_MESSAGES + 2))[0]?.content ?? "";
    expect(content).toContain("- Name: Maria Garcia");
    expect(content).toContain("- Purpose: unknown");
    expect(content).toContain("1. allow_request - ");
    expect(content).not.toContain("human: line 1\n");
    expect(content).toContain("human: line 11");
  });

  it("asks the vision model for the snake_case schema", () => {
    expect(pm.vision()).toContain('"threat_level": "low" | "medium" | "high"');
  });
});
