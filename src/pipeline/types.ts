/**
 * Conversation state machine types.
 */

import type { FinalDecision } from "../prompts/gate";
import type { profileSnapshot } from "../session/profile";
import type { DecisionSource } from "./decision";

export type NodeName =
  | "receive_input"
  | "validate"
  | "route_after_input"
  | "reset"
  | "compact"
  | "extract_profile"
  | "validate_contact"
  | "check_profile"
  | "ask_question"
  | "decide"
  | "notify"
  | "reset_for_next_visitor"
  | "end";

/** Nodes that run work; `end` is terminal. */
export type ActiveNode = Exclude<NodeName, "end">;

/** Reasons route_after_input can leave the default path. */
export type RouteSignal = "invalid" | "inactive" | "threat" | "new_visitor" | "over_limit";

/** Node outcome fed to `transition`. "ok" is the default path out of every node. */
export type Signal = "ok" | "empty" | RouteSignal;

export type ProfileSnapshot = ReturnType<typeof profileSnapshot>;

export type TurnEffect =
  | { type: "agent_message"; text: string }
  | {
      type: "decision";
      decision: FinalDecision;
      confidence: number;
      reasoning: string;
      source: DecisionSource;
      profile: ProfileSnapshot;
    }
  | { type: "notification"; contactName: string; success: boolean }
  | { type: "session_reset"; reason: "new_visitor" | "inactive" | "cycle_complete" };

export type DecisionEffect = Extract<TurnEffect, { type: "decision" }>;

export interface TurnResult {
  sessionId: string;
  /** Agent messages in the order produced. */
  replies: string[];
  /** Replies joined for single-message transports. */
  reply: string;
  /** A decision cycle finished and the session is ready for the next visitor. */
  sessionComplete: boolean;
  decision?: DecisionEffect;
  path: NodeName[];
  invalidInput: boolean;
  effects: TurnEffect[];
  /** False when the session was reset or closed while the turn ran; its writes were dropped. */
  committed: boolean;
}
