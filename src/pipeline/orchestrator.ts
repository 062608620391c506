/**
 * Orchestrator: runs one visitor turn through the conversation state machine.
 * Works on a copy of the session and commits it back to the store when the machine ends,
 * so the bridge can keep writing vision updates while model calls are in flight.
 */

import type pino from "pino";
import { errorMessage } from "../errors";
import { logger as rootLogger, logTurn } from "../logging";
import { recordTurnMetrics } from "../metrics";
import type { SessionStore } from "../session/store";
import { transition } from "./graph";
import type { GateNodes } from "./nodes";
import type { DecisionEffect, NodeName, Signal, TurnEffect, TurnResult } from "./types";

const DEFAULT_STEP_LIMIT = 25;

export interface OrchestratorConfig {
  /** Max node executions per turn. */
  stepLimit?: number;
}

export interface OrchestratorCallbacks {
  onAgentReply?: (sessionId: string, text: string) => void;
  onDecision?: (sessionId: string, decision: DecisionEffect) => void;
}

export class Orchestrator {
  private readonly stepLimit: number;
  private readonly log: pino.Logger;

  constructor(
    private readonly store: SessionStore,
    private readonly nodes: GateNodes,
    config: OrchestratorConfig = {},
    private readonly callbacks: OrchestratorCallbacks = {},
    log: pino.Logger = rootLogger
  ) {
    this.stepLimit = config.stepLimit ?? DEFAULT_STEP_LIMIT;
    this.log = log;
  }

  /**
   * Run one turn for `sessionId` with the visitor's raw text.
   * Throws SessionNotFoundError for an unknown session. Turns for one session must not overlap;
   * the gateway serializes them.
   */
  async handleTurn(sessionId: string, input: string): Promise<TurnResult> {
    const base = this.store.snapshot(sessionId);
    const started = Date.now();
    logTurn(this.log, "start", sessionId);

    let state = { ...base.state, userInput: input };
    let node: NodeName = "receive_input";
    const path: NodeName[] = [];
    const effects: TurnEffect[] = [];

    while (node !== "end") {
      if (path.length >= this.stepLimit) {
        this.log.warn({ event: "STEP_LIMIT", sessionId, path }, "State machine step limit reached; ending turn");
        break;
      }
      path.push(node);
      let signal: Signal = "ok";
      try {
        const result = await this.nodes[node](state);
        state = result.state;
        signal = result.signal;
        effects.push(...result.effects);
      } catch (err) {
        // Nodes handle their own collaborator failures; anything here is a bug. Keep the turn moving.
        this.log.error({ event: "NODE_FAILED", sessionId, node, err: errorMessage(err) }, "Node failed");
      }
      const edge = transition(node, state, signal);
      effects.push(...edge.effects);
      node = edge.next;
    }

    const outcome = await this.store.commit(base, state);
    const committed = outcome === "committed";
    if (!committed) {
      this.log.info({ event: "TURN_DISCARDED", sessionId }, "Session was reset during the turn; results dropped");
    }

    // A discarded turn speaks for a session that no longer exists: no replies, no decision.
    const replies = committed ? effects.flatMap((e) => (e.type === "agent_message" ? [e.text] : [])) : [];
    const decision = committed ? effects.find((e): e is DecisionEffect => e.type === "decision") : undefined;
    for (const text of replies) this.callbacks.onAgentReply?.(sessionId, text);
    if (decision) this.callbacks.onDecision?.(sessionId, decision);

    const durationMs = Date.now() - started;
    logTurn(this.log, "end", sessionId, path);
    recordTurnMetrics({ sessionId, turnLatencyMs: durationMs, steps: path.length, decision: decision?.decision });

    return {
      sessionId,
      replies,
      reply: replies.join(" "),
      sessionComplete: committed && path.includes("reset_for_next_visitor"),
      decision,
      path,
      invalidInput: state.invalidInput,
      effects,
      committed,
    };
  }
}
