/**
 * Decision Engine. Priority:
 *   1. camera reports a high threat -> call_security
 *   2. visitor is an employee -> allow at an authorized door, deny elsewhere
 *   3. model classification of profile + recent conversation
 * Anything the classifier returns that does not parse fails closed to deny_request.
 */

import type pino from "pino";
import { z } from "zod";
import type { ILLM } from "../adapters/llm";
import { withTimeout } from "../concurrency/timeout";
import type { EmployeeDirectory } from "../directory/employees";
import { DecisionParseFailure, errorMessage } from "../errors";
import { logGateError, logLlmCall } from "../logging";
import type { FinalDecision } from "../prompts/gate";
import { DECISION_FALLBACK_MESSAGE, DECISION_MESSAGES, UNAUTHORIZED_DOOR_MESSAGE } from "../prompts/gate";
import type { PromptManager } from "../prompts/prompt-manager";
import { valueOf } from "../session/profile";
import type { SessionState } from "../session/types";
import { extractJsonObject } from "./response-parsing";

export type DecisionSource = "vision" | "employee" | "classifier" | "fallback";

export interface DecisionOutcome {
  decision: FinalDecision;
  confidence: number;
  reasoning: string;
  /** Reply shown to the visitor. */
  message: string;
  source: DecisionSource;
}

const classifierReplySchema = z.object({
  decision: z.enum(["allow_request", "call_security", "deny_request"]),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().default(""),
});

export interface DecisionEngineDeps {
  llm: ILLM;
  prompts: PromptManager;
  employees: EmployeeDirectory;
  timeoutMs: number;
  log: pino.Logger;
}

export function isHighThreat(state: SessionState): boolean {
  return state.visionSchema?.threatLevel === "high";
}

export class DecisionEngine {
  constructor(private readonly deps: DecisionEngineDeps) {}

  async decide(state: SessionState): Promise<DecisionOutcome> {
    if (isHighThreat(state)) {
      return {
        decision: "call_security",
        confidence: 1,
        reasoning: `Camera reported a high threat: ${state.visionSchema?.details || "no details"}`,
        message: DECISION_MESSAGES.call_security,
        source: "vision",
      };
    }

    const name = valueOf(state.visitorProfile.name);
    if (state.visitorProfile.authenticated && name !== undefined) {
      return this.decideForEmployee(name, state.doorId);
    }

    return this.classify(state);
  }

  private decideForEmployee(name: string, doorId: string | undefined): DecisionOutcome {
    const employee = this.deps.employees.find(name);
    if (employee && this.deps.employees.isAuthorized(name, doorId)) {
      return {
        decision: "allow_request",
        confidence: 1,
        reasoning: `Employee ${employee.name} is authorized for door ${doorId ?? "unknown"}`,
        message: employee.greeting,
        source: "employee",
      };
    }
    return {
      decision: "deny_request",
      confidence: 1,
      reasoning: `Employee ${name} is not authorized for door ${doorId ?? "unknown"}`,
      message: UNAUTHORIZED_DOOR_MESSAGE,
      source: "employee",
    };
  }

  private async classify(state: SessionState): Promise<DecisionOutcome> {
    const prompt = this.deps.prompts.decision(state.visitorProfile, state.messages);
    let raw: string;
    const started = Date.now();
    try {
      const res = await withTimeout(
        this.deps.llm.chat(prompt, { maxTokens: 200, responseFormat: "json" }),
        this.deps.timeoutMs,
        "Decision"
      );
      raw = res.text;
      logLlmCall(this.deps.log, "decision", prompt[0]?.content.length ?? 0, raw.length, Date.now() - started);
    } catch (err) {
      return this.failClosed(new DecisionParseFailure(`Decision call failed: ${errorMessage(err)}`), state.sessionId);
    }

    const parsed = classifierReplySchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
      return this.failClosed(
        new DecisionParseFailure(`Unusable decision reply: ${parsed.error.issues[0]?.message ?? "not JSON"}`, raw),
        state.sessionId
      );
    }
    const { decision, confidence, reasoning } = parsed.data;
    return { decision, confidence, reasoning, message: DECISION_MESSAGES[decision], source: "classifier" };
  }

  private failClosed(err: DecisionParseFailure, sessionId: string): DecisionOutcome {
    logGateError(this.deps.log, err, { sessionId });
    return {
      decision: "deny_request",
      confidence: 0,
      reasoning: err.message,
      message: DECISION_FALLBACK_MESSAGE,
      source: "fallback",
    };
  }
}
