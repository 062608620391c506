/**
 * Session State Store: authoritative sessionId -> SessionState map.
 * Every mutation runs under one AsyncMutex; readers get deep copies.
 */

import { AsyncMutex } from "../concurrency/async-mutex";
import { SessionNotFoundError } from "../errors";
import { GATE_SYSTEM_PREAMBLE } from "../prompts/gate";
import { emptyProfile } from "./profile";
import type { ChatMessage, SessionState } from "./types";

export interface SessionStoreOptions {
  systemPrompt?: string;
  /** sessionActive for new sessions. False when a camera decides presence. */
  initialActive: boolean;
  now?: () => number;
}

/** A copy of one session plus the reset generation it was taken at. */
export interface SessionSnapshot {
  state: SessionState;
  generation: number;
}

export type CommitOutcome = "committed" | "discarded";

/** Handle passed to `mutate`; `state` may be modified in place. */
export interface MutableSession {
  state: SessionState;
  /** Full reset: profile, decision and vision cleared, history back to the preamble. */
  reset(): void;
}

interface Entry {
  state: SessionState;
  /** Bumped by every external reset so in-flight turns can detect that their snapshot is stale. */
  generation: number;
}

export function preambleMessage(systemPrompt: string, now: number): ChatMessage {
  return { role: "system", content: systemPrompt, timestamp: now };
}

export function newSessionState(
  sessionId: string,
  systemPrompt: string,
  opts: { doorId?: string; sessionActive: boolean; now: number }
): SessionState {
  return {
    sessionId,
    doorId: opts.doorId,
    messages: [preambleMessage(systemPrompt, opts.now)],
    visitorProfile: emptyProfile(),
    decision: "none",
    decisionConfidence: 0,
    decisionReasoning: "",
    visionSchema: undefined,
    userInput: "",
    invalidInput: false,
    sessionActive: opts.sessionActive,
  };
}

/** Return the session to intake-ready state. Keeps sessionId, doorId and sessionActive. */
export function resetSessionFields(state: SessionState, systemPrompt: string, now: number): SessionState {
  return newSessionState(state.sessionId, systemPrompt, {
    doorId: state.doorId,
    sessionActive: state.sessionActive,
    now,
  });
}

export class SessionStore {
  private readonly sessions = new Map<string, Entry>();
  private readonly mutex = new AsyncMutex();
  readonly systemPrompt: string;
  private readonly initialActive: boolean;
  private readonly now: () => number;

  constructor(opts: SessionStoreOptions) {
    this.systemPrompt = opts.systemPrompt ?? GATE_SYSTEM_PREAMBLE;
    this.initialActive = opts.initialActive;
    this.now = opts.now ?? Date.now;
  }

  /** Create (or return the existing) session. */
  create(sessionId: string, doorId?: string): Promise<SessionState> {
    return this.mutex.runExclusive(() => {
      const existing = this.sessions.get(sessionId);
      if (existing) return structuredClone(existing.state);
      const state = newSessionState(sessionId, this.systemPrompt, {
        doorId,
        sessionActive: this.initialActive,
        now: this.now(),
      });
      this.sessions.set(sessionId, { state, generation: 0 });
      return structuredClone(state);
    });
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get(sessionId: string): SessionState | undefined {
    const entry = this.sessions.get(sessionId);
    return entry ? structuredClone(entry.state) : undefined;
  }

  requireSession(sessionId: string): SessionState {
    const state = this.get(sessionId);
    if (!state) throw new SessionNotFoundError(sessionId);
    return state;
  }

  snapshot(sessionId: string): SessionSnapshot {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw new SessionNotFoundError(sessionId);
    return { state: structuredClone(entry.state), generation: entry.generation };
  }

  /**
   * Write back the result of a turn computed from `base`.
   * Discarded when the session was reset or removed since the snapshot. Bridge-owned fields
   * (visionSchema, sessionActive) keep the stored value when the bridge changed them meanwhile.
   */
  commit(base: SessionSnapshot, next: SessionState): Promise<CommitOutcome> {
    return this.mutex.runExclusive((): CommitOutcome => {
      const entry = this.sessions.get(base.state.sessionId);
      if (!entry || entry.generation !== base.generation) return "discarded";
      const merged = structuredClone(next);
      if (!sameVision(entry.state.visionSchema, base.state.visionSchema)) {
        merged.visionSchema = entry.state.visionSchema;
      }
      if (entry.state.sessionActive !== base.state.sessionActive) {
        merged.sessionActive = entry.state.sessionActive;
      }
      entry.state = merged;
      return "committed";
    });
  }

  /** Run `fn` against the live session under the store mutex. */
  mutate<T>(sessionId: string, fn: (session: MutableSession) => T): Promise<T> {
    return this.mutex.runExclusive(() => {
      const entry = this.sessions.get(sessionId);
      if (!entry) throw new SessionNotFoundError(sessionId);
      const handle: MutableSession = {
        state: entry.state,
        reset: () => {
          handle.state = resetSessionFields(handle.state, this.systemPrompt, this.now());
          entry.generation++;
        },
      };
      const result = fn(handle);
      entry.state = handle.state;
      return result;
    });
  }

  delete(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.sessions.delete(sessionId));
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /** Most recently created session bound to `doorId`. */
  findByDoor(doorId: string): string | undefined {
    let found: string | undefined;
    for (const [id, entry] of this.sessions) {
      if (entry.state.doorId === doorId) found = id;
    }
    return found;
  }

  get size(): number {
    return this.sessions.size;
  }
}

function sameVision(a: SessionState["visionSchema"], b: SessionState["visionSchema"]): boolean {
  if (a === undefined || b === undefined) return a === b;
  return (
    a.faceDetected === b.faceDetected &&
    a.angryFace === b.angryFace &&
    a.dangerousObject === b.dangerousObject &&
    a.threatLevel === b.threatLevel &&
    a.details === b.details
  );
}
