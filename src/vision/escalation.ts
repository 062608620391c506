/**
 * Escalation gate: a high-threat frame with a dangerous object escalates at most once per
 * cooldown window per session.
 */

import type { VisionSchema } from "../session/types";

export function isEscalation(vision: VisionSchema): boolean {
  return vision.threatLevel === "high" && vision.dangerousObject;
}

export class EscalationGate {
  private readonly lastEscalatedAtMs = new Map<string, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** True when this frame should escalate; records the escalation time when it does. */
  shouldEscalate(sessionId: string, vision: VisionSchema): boolean {
    if (!isEscalation(vision)) return false;
    const now = this.now();
    const last = this.lastEscalatedAtMs.get(sessionId);
    if (last !== undefined && this.cooldownMs > 0 && now - last < this.cooldownMs) return false;
    this.lastEscalatedAtMs.set(sessionId, now);
    return true;
  }

  forget(sessionId: string): void {
    this.lastEscalatedAtMs.delete(sessionId);
  }
}
