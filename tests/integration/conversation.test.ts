/**
 * Integration tests: full visitor turns through the orchestrator, state machine and store,
 * with scripted model handles.
 */

import { logger } from "../../src/logging";
import { Orchestrator } from "../../src/pipeline/orchestrator";
import type { OrchestratorCallbacks } from "../../src/pipeline/orchestrator";
import {
  DECISION_MESSAGES,
  REPROMPT_MESSAGE,
  STEP_IN_FRONT_MESSAGE,
  fieldQuestion,
  notifySuccessMessage,
} from "../../src/prompts/gate";
import { emptyProfile, fieldValue } from "../../src/session/profile";
import { SessionStore } from "../../src/session/store";
import { fakeHandles, RecordingNotifier, ScriptedLLM } from "../helpers/fakes";
import type { NodeHarnessOptions } from "../helpers/gate";
import { buildNodes } from "../helpers/gate";

const CONTACT_NAMES = ["David Smith", "Alice Kimble", "Michael Chen"];

async function harness(
  opts: NodeHarnessOptions & { initialActive?: boolean; doorId?: string; stepLimit?: number; callbacks?: OrchestratorCallbacks } = {}
) {
  const store = new SessionStore({ initialActive: opts.initialActive ?? true });
  await store.create("s1", opts.doorId);
  const orchestrator = new Orchestrator(store, buildNodes(opts), { stepLimit: opts.stepLimit }, opts.callbacks, logger);
  return { store, orchestrator };
}

describe("visitor conversation", () => {
  it("reprompts on empty input without touching the session", async () => {
    const llm = fakeHandles();
    const { store, orchestrator } = await harness({ llm });
    const result = await orchestrator.handleTurn("s1", "   ");
    expect(result.path).toEqual(["receive_input"]);
    expect(result.replies).toEqual([REPROMPT_MESSAGE]);
    expect(result.invalidInput).toBe(true);
    expect(llm.validation.prompts).toHaveLength(0);
    const state = store.requireSession("s1");
    expect(state.messages).toHaveLength(1);
    expect(state.visitorProfile).toEqual(emptyProfile());
  });

  it("reprompts on unrelated input and keeps it out of history", async () => {
    const { store, orchestrator } = await harness({ llm: fakeHandles({ validation: "unrelated" }) });
    const result = await orchestrator.handleTurn("s1", "zxcv qwer");
    expect(result.path).toEqual(["receive_input", "validate", "route_after_input"]);
    expect(result.reply).toBe(REPROMPT_MESSAGE);
    expect(store.requireSession("s1").messages).toHaveLength(1);
  });

  it("collects the profile over several turns, decides and notifies the contact", async () => {
    const notifier = new RecordingNotifier();
    const { store, orchestrator } = await harness({ notifier });

    const first = await orchestrator.handleTurn("s1", "Hi, I'm Maria Garcia");
    expect(first.path).toEqual([
      "receive_input",
      "validate",
      "route_after_input",
      "extract_profile",
      "validate_contact",
      "check_profile",
      "ask_question",
    ]);
    expect(first.reply).toBe(fieldQuestion("purpose", CONTACT_NAMES));
    expect(store.requireSession("s1").visitorProfile.name).toEqual(fieldValue("Maria Garcia"));

    const second = await orchestrator.handleTurn("s1", "I'm here for a meeting");
    expect(second.reply).toBe(fieldQuestion("contactPerson", CONTACT_NAMES));
    expect(second.reply).toBe("Who is your contact? (Known contacts include: David Smith, Alice Kimble, Michael Chen)");

    const third = await orchestrator.handleTurn("s1", "I'm meeting David Smith, I'm from Acme and I have no restricted items");
    expect(third.path.slice(-4)).toEqual(["check_profile", "decide", "notify", "reset_for_next_visitor"]);
    expect(third.replies).toEqual([DECISION_MESSAGES.allow_request, notifySuccessMessage("David Smith")]);
    expect(third.sessionComplete).toBe(true);
    expect(third.decision).toEqual({
      type: "decision",
      decision: "allow_request",
      confidence: 0.9,
      reasoning: "Expected visitor",
      source: "classifier",
      profile: {
        name: "Maria Garcia",
        purpose: "meeting",
        threatLevel: "low",
        affiliation: "Acme",
        contactPerson: "David Smith",
        idVerified: true,
        authenticated: false,
      },
    });
    expect(notifier.sent.map((n) => [n.contactName, n.subject])).toEqual([
      ["David Smith", "Visitor Arrival Notification - Maria Garcia"],
    ]);

    const after = store.requireSession("s1");
    expect(after.messages).toHaveLength(1);
    expect(after.visitorProfile).toEqual(emptyProfile());
    expect(after.decision).toBe("none");
  });

  it("starts over when a new visitor speaks", async () => {
    const { store, orchestrator } = await harness({ llm: fakeHandles({ session: "new" }) });
    await store.mutate("s1", (s) => {
      s.state.messages.push(
        { role: "human", content: "I'm Bob Stone", timestamp: 1 },
        { role: "agent", content: "What is the purpose of your visit today?", timestamp: 2 },
        { role: "human", content: "delivery", timestamp: 3 }
      );
      s.state.visitorProfile = { ...s.state.visitorProfile, name: fieldValue("Bob Stone"), purpose: fieldValue("delivery") };
    });

    const result = await orchestrator.handleTurn("s1", "Hi, I'm Alice");
    expect(result.path.slice(0, 5)).toEqual(["receive_input", "validate", "route_after_input", "reset", "extract_profile"]);
    expect(result.effects).toContainEqual({ type: "session_reset", reason: "new_visitor" });

    const state = store.requireSession("s1");
    expect(state.messages.map((m) => [m.role, m.content])).toEqual([
      ["system", store.systemPrompt],
      ["human", "Hi, I'm Alice"],
      ["agent", fieldQuestion("purpose", CONTACT_NAMES)],
    ]);
    expect(state.visitorProfile.name).toEqual(fieldValue("Alice"));
    expect(state.visitorProfile.purpose).toEqual({ kind: "unknown" });
  });

  it("calls security on a camera threat regardless of the profile", async () => {
    const llm = fakeHandles();
    const { store, orchestrator } = await harness({ llm });
    await store.mutate("s1", (s) => {
      s.state.visionSchema = { faceDetected: true, angryFace: true, dangerousObject: true, threatLevel: "high", details: "knife" };
    });
    const result = await orchestrator.handleTurn("s1", "hello");
    expect(result.path).toEqual(["receive_input", "validate", "route_after_input", "decide", "reset_for_next_visitor"]);
    expect(result.replies).toEqual([DECISION_MESSAGES.call_security]);
    expect(result.decision?.decision).toBe("call_security");
    expect(result.decision?.confidence).toBe(1);
    expect(result.sessionComplete).toBe(true);
    expect(llm.decision.prompts).toHaveLength(0);
  });

  it("greets an employee at an authorized door without notifying anyone", async () => {
    const notifier = new RecordingNotifier();
    const { orchestrator } = await harness({ notifier, doorId: "front-gate" });
    const result = await orchestrator.handleTurn("s1", "Hi, I'm Alice Kimble");
    expect(result.path.slice(-3)).toEqual(["check_profile", "decide", "reset_for_next_visitor"]);
    expect(result.replies).toEqual(["Good to see you, Alice."]);
    expect(result.decision?.source).toBe("employee");
    expect(notifier.sent).toHaveLength(0);
  });

  it("asks the visitor to step in front of the camera while nobody is present", async () => {
    const { orchestrator } = await harness({ initialActive: false });
    const result = await orchestrator.handleTurn("s1", "hello");
    expect(result.path).toEqual(["receive_input", "validate", "route_after_input", "reset"]);
    expect(result.replies).toEqual([STEP_IN_FRONT_MESSAGE]);
    expect(result.effects).toContainEqual({ type: "session_reset", reason: "inactive" });
  });

  it("compacts history once the visitor has sent too many messages", async () => {
    const { orchestrator } = await harness({ maxHumanMessages: 2 });
    await orchestrator.handleTurn("s1", "Hi, I'm Maria Garcia");
    const second = await orchestrator.handleTurn("s1", "I'm here for a meeting");
    expect(second.path).not.toContain("compact");
    const third = await orchestrator.handleTurn("s1", "I'm from Acme");
    expect(third.path.slice(0, 5)).toEqual(["receive_input", "validate", "route_after_input", "compact", "extract_profile"]);
  });

  it("drops the turn's writes when the session is reset mid-turn", async () => {
    const store = new SessionStore({ initialActive: true });
    await store.create("s1");
    const validation = new ScriptedLLM(async () => {
      await store.mutate("s1", (s) => s.reset());
      return "valid";
    });
    const orchestrator = new Orchestrator(store, buildNodes({ llm: { ...fakeHandles(), validation } }), {}, {}, logger);
    const result = await orchestrator.handleTurn("s1", "Hi, I'm Maria Garcia");
    expect(result.committed).toBe(false);
    expect(result.replies).toEqual([]);
    expect(result.reply).toBe("");
    expect(result.decision).toBeUndefined();
    const state = store.requireSession("s1");
    expect(state.messages).toHaveLength(1);
    expect(state.visitorProfile.name).toEqual({ kind: "unset" });
  });

  it("keeps the turn moving when a node throws", async () => {
    const store = new SessionStore({ initialActive: true });
    await store.create("s1");
    const nodes = buildNodes();
    const broken = {
      ...nodes,
      check_profile: () => Promise.reject(new Error("bug")),
    };
    const result = await new Orchestrator(store, broken, {}, {}, logger).handleTurn("s1", "Hi, I'm Maria Garcia");
    expect(result.path.slice(-2)).toEqual(["check_profile", "ask_question"]);
    expect(result.reply).toBe(fieldQuestion("purpose", CONTACT_NAMES));
  });

  it("stops at the step limit", async () => {
    const { orchestrator } = await harness({ stepLimit: 3 });
    const result = await orchestrator.handleTurn("s1", "Hi, I'm Maria Garcia");
    expect(result.path).toEqual(["receive_input", "validate", "route_after_input"]);
    expect(result.replies).toEqual([]);
  });

  it("reports replies and decisions through callbacks", async () => {
    const replies: string[] = [];
    const decisions: string[] = [];
    const { orchestrator } = await harness({
      doorId: "lab-east",
      callbacks: {
        onAgentReply: (_id, text) => replies.push(text),
        onDecision: (_id, d) => decisions.push(d.decision),
      },
    });
    await orchestrator.handleTurn("s1", "Hi, I'm Alice Kimble");
    expect(decisions).toEqual(["deny_request"]);
    expect(replies).toEqual(["Sorry, you are not authorized to use this door. Please contact reception for assistance."]);
  });
});
