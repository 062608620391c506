/**
 * Cross-context State Bridge: the single consumer of update requests. Requests from the vision
 * pipeline are queued; each cycle, whoever triggers it, applies a capped batch to the store under its mutex and
 * reports sessionActive edges exactly once.
 */

import type pino from "pino";
import { AsyncMutex } from "../concurrency/async-mutex";
import type { BoundedQueue } from "../concurrency/bounded-queue";
import { SessionNotFoundError, errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import { Heartbeat } from "../metrics";
import type { SessionStore } from "../session/store";
import type { ActivationEdge, UpdateRequest } from "./types";

export interface StateBridgeConfig {
  /** Max requests applied per cycle. */
  batchSize: number;
  /** Give up on a request after this many failed applies. */
  maxAttempts: number;
  pollIntervalMs: number;
}

export interface StateBridgeCallbacks {
  /** false->true (visitor arrived) or true->false (visitor left; session already reset). */
  onEdge?: (sessionId: string, edge: ActivationEdge) => void | Promise<void>;
}

export class StateBridge {
  readonly heartbeat = new Heartbeat();
  private timer: ReturnType<typeof setInterval> | null = null;
  private busy = false;
  private readonly drainLock = new AsyncMutex();
  private readonly log: pino.Logger;

  constructor(
    private readonly store: SessionStore,
    private readonly queue: BoundedQueue<UpdateRequest>,
    private readonly config: StateBridgeConfig,
    private readonly callbacks: StateBridgeCallbacks = {},
    log: pino.Logger = rootLogger
  ) {
    this.log = log;
  }

  submit(request: UpdateRequest): void {
    this.queue.enqueue(request);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.heartbeat.beat();
      if (this.busy) return;
      this.busy = true;
      this.drainOnce()
        .catch((err: unknown) => this.log.error({ event: "BRIDGE_CYCLE_FAILED", err: errorMessage(err) }, "Bridge cycle failed"))
        .finally(() => {
          this.busy = false;
        });
    }, this.config.pollIntervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Apply up to batchSize queued requests. Returns how many were applied.
   * Concurrent callers wait behind the drain in flight, so requests apply in submit order.
   */
  drainOnce(): Promise<number> {
    return this.drainLock.runExclusive(() => this.drainBatch());
  }

  private async drainBatch(): Promise<number> {
    const batch = this.queue.drain(this.config.batchSize);
    const retry: UpdateRequest[] = [];
    let applied = 0;

    for (const request of batch) {
      let edge: ActivationEdge | undefined;
      try {
        edge = await this.apply(request);
        applied++;
      } catch (err) {
        if (err instanceof SessionNotFoundError) {
          this.log.warn({ event: "BRIDGE_DROP", sessionId: request.sessionId }, "Update for unknown session dropped");
          continue;
        }
        const attempts = (request.attempts ?? 0) + 1;
        if (attempts < this.config.maxAttempts) {
          retry.push({ ...request, attempts });
        } else {
          this.log.error({ event: "BRIDGE_GIVE_UP", sessionId: request.sessionId, attempts, err: errorMessage(err) }, "Update abandoned");
        }
        continue;
      }
      if (edge) await this.notifyEdge(request.sessionId, edge);
    }

    // Retried requests go to the back of the queue and run next cycle.
    for (const request of retry) this.queue.enqueue(request);
    return applied;
  }

  private apply(request: UpdateRequest): Promise<ActivationEdge | undefined> {
    return this.store.mutate(request.sessionId, (session): ActivationEdge | undefined => {
      const wasActive = session.state.sessionActive;
      session.state = { ...session.state, ...request.fields };
      this.log.debug({ event: "BRIDGE_APPLY", sessionId: request.sessionId, fields: Object.keys(request.fields) }, "Update applied");
      const isActive = session.state.sessionActive;
      if (wasActive === isActive) return undefined;
      if (!isActive) {
        session.reset();
        return "deactivated";
      }
      return "activated";
    });
  }

  private async notifyEdge(sessionId: string, edge: ActivationEdge): Promise<void> {
    this.log.info({ event: "SESSION_EDGE", sessionId, edge }, edge === "activated" ? "Visitor arrived" : "Visitor left");
    try {
      await this.callbacks.onEdge?.(sessionId, edge);
    } catch (err) {
      this.log.warn({ event: "EDGE_CALLBACK_FAILED", sessionId, edge, err: errorMessage(err) }, "Edge callback failed");
    }
  }
}
