/**
 * Work done at each state of the conversation machine. Each node takes a working copy of the
 * session and returns the updated copy, the signal for `transition`, and any effects.
 * Nodes handle their collaborators' failures themselves and always return a usable state.
 */

import type pino from "pino";
import type { LlmHandles } from "../adapters/llm";
import type { INotifier } from "../adapters/notify";
import type { ContactDirectory } from "../directory/contacts";
import type { EmployeeDirectory } from "../directory/employees";
import { errorMessage } from "../errors";
import { logDecision } from "../logging";
import type { IHistoryCompactor } from "../memory/types";
import {
  FALLBACK_QUESTION,
  fieldQuestion,
  notifyFailureMessage,
  notifySuccessMessage,
} from "../prompts/gate";
import type { PromptManager } from "../prompts/prompt-manager";
import type { SessionLog } from "../session/log";
import { emptyProfile, isComplete, nextQuestionField, profileSnapshot, valueOf } from "../session/profile";
import { preambleMessage, resetSessionFields } from "../session/store";
import type { ChatMessage, SessionState } from "../session/types";
import { classifyRelevance, detectNewVisitor } from "./classifiers";
import type { ClassifierDeps } from "./classifiers";
import { validateContact } from "./contact-validator";
import type { DecisionEngine } from "./decision";
import { isHighThreat } from "./decision";
import { extractProfile } from "./extraction";
import type { SafetyGate } from "./safety";
import type { ActiveNode, Signal, TurnEffect } from "./types";

export interface NodeResult {
  state: SessionState;
  signal: Signal;
  effects: TurnEffect[];
}

export type NodeFn = (state: SessionState) => Promise<NodeResult>;

export type GateNodes = Record<ActiveNode, NodeFn>;

export interface NodeDeps {
  llm: LlmHandles;
  prompts: PromptManager;
  contacts: ContactDirectory;
  employees: EmployeeDirectory;
  compactor: IHistoryCompactor;
  decisions: DecisionEngine;
  notifier: INotifier;
  safety: SafetyGate;
  sessionLog?: SessionLog;
  /** Human messages allowed before history is compacted. */
  maxHumanMessages: number;
  timeoutMs: number;
  log: pino.Logger;
  now?: () => number;
}

function ok(state: SessionState, ...effects: TurnEffect[]): NodeResult {
  return { state, signal: "ok", effects };
}

export function humanMessageCount(messages: ChatMessage[]): number {
  return messages.filter((m) => m.role === "human").length;
}

export function createNodes(deps: NodeDeps): GateNodes {
  const now = deps.now ?? Date.now;
  const classifierDeps = (role: "validation" | "session"): ClassifierDeps => ({
    llm: deps.llm[role],
    prompts: deps.prompts,
    timeoutMs: deps.timeoutMs,
    log: deps.log,
  });

  const say = (state: SessionState, text: string): { state: SessionState; effect: TurnEffect } => ({
    state: { ...state, messages: [...state.messages, { role: "agent", content: text, timestamp: now() }] },
    effect: { type: "agent_message", text },
  });

  return {
    async receive_input(state) {
      const input = state.userInput.trim();
      if (!input) return { state: { ...state, userInput: "", invalidInput: true }, signal: "empty", effects: [] };
      return ok({ ...state, userInput: input, invalidInput: false });
    },

    async validate(state) {
      const safe = deps.safety.sanitizeVisitorInput(state.userInput);
      if (safe.reason && safe.reason !== "empty") {
        deps.log.info({ event: "INPUT_SANITIZED", sessionId: state.sessionId, reason: safe.reason }, "Visitor input sanitized");
      }
      const verdict = await classifyRelevance(classifierDeps("validation"), safe.text);
      if (verdict === "unrelated") return ok({ ...state, invalidInput: true });
      const message: ChatMessage = { role: "human", content: safe.text, timestamp: now() };
      return ok({ ...state, userInput: safe.text, messages: [...state.messages, message] });
    },

    async route_after_input(state) {
      const route = (signal: Signal): NodeResult => ({ state, signal, effects: [] });
      if (state.invalidInput) return route("invalid");
      if (!state.sessionActive) return route("inactive");
      if (isHighThreat(state)) return route("threat");
      if ((await detectNewVisitor(classifierDeps("session"), state.messages)) === "new") return route("new_visitor");
      if (humanMessageCount(state.messages) > deps.maxHumanMessages) return route("over_limit");
      return route("ok");
    },

    async reset(state) {
      const trigger = [...state.messages].reverse().find((m) => m.role === "human");
      const messages = [preambleMessage(deps.prompts.systemPrompt, now())];
      if (trigger) messages.push(trigger);
      return ok(
        {
          ...state,
          messages,
          visitorProfile: emptyProfile(),
          decision: "none",
          decisionConfidence: 0,
          decisionReasoning: "",
          visionSchema: undefined,
        },
        { type: "session_reset", reason: state.sessionActive ? "new_visitor" : "inactive" }
      );
    },

    async compact(state) {
      const before = state.messages.length;
      const messages = await deps.compactor.compact(state.messages);
      deps.log.info(
        { event: "HISTORY_COMPACTED", sessionId: state.sessionId, mode: deps.compactor.mode, before, after: messages.length },
        "History compacted"
      );
      return ok({ ...state, messages });
    },

    async extract_profile(state) {
      const { profile } = await extractProfile(
        { llm: deps.llm.main, prompts: deps.prompts, timeoutMs: deps.timeoutMs, log: deps.log },
        state.visitorProfile,
        state.messages,
        deps.contacts.names()
      );
      return ok({ ...state, visitorProfile: profile });
    },

    async validate_contact(state) {
      return ok({ ...state, visitorProfile: validateContact(state.visitorProfile, deps.contacts, deps.log) });
    },

    async check_profile(state) {
      const name = valueOf(state.visitorProfile.name);
      const authenticated = name !== undefined && deps.employees.find(name) !== undefined;
      return ok({
        ...state,
        visitorProfile: { ...state.visitorProfile, idVerified: isComplete(state.visitorProfile), authenticated },
      });
    },

    async ask_question(state) {
      const field = nextQuestionField(state.visitorProfile);
      const question = field ? fieldQuestion(field, deps.contacts.names()) : FALLBACK_QUESTION;
      const asked = say(state, question);
      return ok(asked.state, asked.effect);
    },

    async decide(state) {
      const outcome = await deps.decisions.decide(state);
      logDecision(deps.log, state.sessionId, outcome.decision, outcome.confidence, outcome.source);
      if (deps.sessionLog) {
        try {
          await deps.sessionLog.append(state.sessionId, {
            type: "decision",
            decision: outcome.decision,
            confidence: outcome.confidence,
            reasoning: outcome.reasoning,
          });
        } catch (err) {
          deps.log.warn({ event: "SESSION_LOG_FAILED", sessionId: state.sessionId, err: errorMessage(err) }, "Could not record decision");
        }
      }
      const decided: SessionState = {
        ...state,
        decision: outcome.decision,
        decisionConfidence: outcome.confidence,
        decisionReasoning: outcome.reasoning,
      };
      const announced = say(decided, outcome.message);
      return ok(announced.state, {
        type: "decision",
        decision: outcome.decision,
        confidence: outcome.confidence,
        reasoning: outcome.reasoning,
        source: outcome.source,
        profile: profileSnapshot(decided.visitorProfile),
      }, announced.effect);
    },

    async notify(state) {
      const contactName = valueOf(state.visitorProfile.contactPerson);
      if (contactName === undefined) return ok(state);
      const p = profileSnapshot(state.visitorProfile);
      const visitor = p.name ?? "Unknown visitor";
      const subject = `Visitor Arrival Notification - ${visitor}`;
      const body = [
        `Hello ${contactName},`,
        "",
        "This is an automated notification that your visitor has arrived:",
        "",
        "Visitor Details:",
        `- Name: ${visitor}`,
        `- Purpose: ${p.purpose ?? "Unknown purpose"}`,
        `- Affiliation: ${p.affiliation ?? "Unknown affiliation"}`,
        "- Status: Access Granted",
        "",
        "The visitor has been cleared through security and is proceeding to the main entrance.",
      ].join("\n");

      let success: boolean;
      try {
        const res = await deps.notifier.send(contactName, subject, body);
        success = res.success;
        deps.log.info({ event: "NOTIFY", sessionId: state.sessionId, success, detail: res.message }, "Contact notification");
      } catch (err) {
        success = false;
        deps.log.warn({ event: "NOTIFY_FAILED", sessionId: state.sessionId, err: errorMessage(err) }, "Contact notification failed");
      }
      const told = say(state, success ? notifySuccessMessage(contactName) : notifyFailureMessage(contactName));
      return ok(told.state, { type: "notification", contactName, success }, told.effect);
    },

    async reset_for_next_visitor(state) {
      return ok(resetSessionFields(state, deps.prompts.systemPrompt, now()), {
        type: "session_reset",
        reason: "cycle_complete",
      });
    },
  };
}
