/**
 * Event dispatcher: drains vision events on the orchestrator side and hands them to handlers,
 * a capped batch per cycle.
 */

import type pino from "pino";
import type { BoundedQueue } from "../concurrency/bounded-queue";
import { errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import type { VisionEvent } from "../vision/types";

export interface EventHandlers {
  onNoFace?: (event: Extract<VisionEvent, { type: "no_face" }>) => void | Promise<void>;
  onEscalation?: (event: Extract<VisionEvent, { type: "escalation" }>) => void | Promise<void>;
}

export interface EventDispatcherConfig {
  batchSize: number;
  pollIntervalMs: number;
}

export class EventDispatcher {
  private timer: ReturnType<typeof setInterval> | null = null;
  private busy = false;
  private readonly log: pino.Logger;

  constructor(
    private readonly queue: BoundedQueue<VisionEvent>,
    private readonly handlers: EventHandlers,
    private readonly config: EventDispatcherConfig,
    log: pino.Logger = rootLogger
  ) {
    this.log = log;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.busy) return;
      this.busy = true;
      this.dispatchOnce()
        .catch((err: unknown) => this.log.error({ event: "DISPATCH_FAILED", err: errorMessage(err) }, "Event dispatch failed"))
        .finally(() => {
          this.busy = false;
        });
    }, this.config.pollIntervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** Handle up to batchSize events in order. Returns how many were handled. */
  async dispatchOnce(): Promise<number> {
    const batch = this.queue.drain(this.config.batchSize);
    for (const event of batch) {
      try {
        if (event.type === "no_face") await this.handlers.onNoFace?.(event);
        else await this.handlers.onEscalation?.(event);
      } catch (err) {
        this.log.warn({ event: "EVENT_HANDLER_FAILED", type: event.type, sessionId: event.sessionId, err: errorMessage(err) }, "Event handler failed");
      }
    }
    return batch.length;
  }
}
