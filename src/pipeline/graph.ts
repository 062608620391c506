/**
 * Conversation state machine: the transition table.
 *
 *   receive_input -> validate -> route_after_input -> {reset | compact | extract_profile | decide | end}
 *   reset -> extract_profile (visitor present) | end
 *   compact -> extract_profile -> validate_contact -> check_profile -> {decide | ask_question}
 *   decide -> {notify} -> reset_for_next_visitor -> end
 *   ask_question -> end
 *
 * `transition` is pure; node work lives in nodes.ts and the driver in orchestrator.ts.
 */

import { REPROMPT_MESSAGE, STEP_IN_FRONT_MESSAGE } from "../prompts/gate";
import { hasValue, isComplete } from "../session/profile";
import type { SessionState } from "../session/types";
import type { ActiveNode, NodeName, Signal, TurnEffect } from "./types";

export interface Transition {
  next: NodeName;
  /** Effects of taking the edge itself (not written to history). */
  effects: TurnEffect[];
}

function go(next: NodeName, ...effects: TurnEffect[]): Transition {
  return { next, effects };
}

const reprompt: TurnEffect = { type: "agent_message", text: REPROMPT_MESSAGE };

export function transition(node: ActiveNode, session: SessionState, signal: Signal): Transition {
  switch (node) {
    case "receive_input":
      return signal === "empty" ? go("end", reprompt) : go("validate");
    case "validate":
      return go("route_after_input");
    case "route_after_input":
      switch (signal) {
        case "invalid":
          return go("end", reprompt);
        case "inactive":
        case "new_visitor":
          return go("reset");
        case "threat":
          return go("decide");
        case "over_limit":
          return go("compact");
        default:
          return go("extract_profile");
      }
    case "reset":
      return session.sessionActive
        ? go("extract_profile")
        : go("end", { type: "agent_message", text: STEP_IN_FRONT_MESSAGE });
    case "compact":
      return go("extract_profile");
    case "extract_profile":
      return go("validate_contact");
    case "validate_contact":
      return go("check_profile");
    case "check_profile": {
      const profile = session.visitorProfile;
      return isComplete(profile) || profile.authenticated ? go("decide") : go("ask_question");
    }
    case "ask_question":
      return go("end");
    case "decide": {
      const profile = session.visitorProfile;
      const notifyContact =
        session.decision === "allow_request" && !profile.authenticated && hasValue(profile.contactPerson);
      return notifyContact ? go("notify") : go("reset_for_next_visitor");
    }
    case "notify":
      return go("reset_for_next_visitor");
    case "reset_for_next_visitor":
      return go("end");
  }
}
