/**
 * High-signal metrics and watchdogs for production.
 * Counters and latencies are logged; watchdogs report stalled loops.
 */

import { QueueOverflow } from "../errors";
import { logGateError, logger } from "../logging";

/** Last turn timing and outcome. */
export interface TurnMetrics {
  sessionId?: string;
  /** Input received to turn committed (ms). */
  turnLatencyMs?: number;
  /** Nodes executed by the state machine. */
  steps?: number;
  decision?: string;
}

/** Last vision cycle. */
export interface VisionMetrics {
  sessionId?: string;
  classifyLatencyMs?: number;
  faceDetected?: boolean;
  threatLevel?: string;
  /** Older frames discarded by latest-wins in this cycle. */
  discardedFrames?: number;
}

export interface QueueCounters {
  /** Drops per queue name since start. */
  dropped: Record<string, number>;
}

let lastTurnMetrics: TurnMetrics = {};
let lastVisionMetrics: VisionMetrics = {};
let queueCounters: QueueCounters = { dropped: {} };

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...lastTurnMetrics, ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      session_id: metrics.sessionId,
      turn_latency_ms: metrics.turnLatencyMs,
      steps: metrics.steps,
      decision: metrics.decision,
    },
    "Turn latency"
  );
}

export function recordVisionMetrics(metrics: VisionMetrics): void {
  lastVisionMetrics = { ...lastVisionMetrics, ...metrics };
  logger.debug(
    {
      event: "VISION_METRICS",
      session_id: metrics.sessionId,
      classify_latency_ms: metrics.classifyLatencyMs,
      face_detected: metrics.faceDetected,
      threat_level: metrics.threatLevel,
      discarded_frames: metrics.discardedFrames,
    },
    "Vision cycle"
  );
}

/** Record a bounded-queue drop; `total` is the queue's running count. */
export function recordQueueDrop(queue: string, total: number): void {
  queueCounters.dropped[queue] = total;
  logGateError(logger, new QueueOverflow(queue, total), { queue, dropped_total: total });
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

export function getLastVisionMetrics(): VisionMetrics {
  return { ...lastVisionMetrics };
}

export function getQueueCounters(): QueueCounters {
  return { dropped: { ...queueCounters.dropped } };
}

/** Test helper: forget everything recorded so far. */
export function resetMetrics(): void {
  lastTurnMetrics = {};
  lastVisionMetrics = {};
  queueCounters = { dropped: {} };
}

/** Loop liveness: the loop calls beat() every cycle; the watchdog checks freshness. */
export class Heartbeat {
  private last: number;

  constructor(private readonly now: () => number = Date.now) {
    this.last = now();
  }

  beat(): void {
    this.last = this.now();
  }

  isFresh(maxAgeMs: number): boolean {
    return this.now() - this.last <= maxAgeMs;
  }
}

/** Watchdog check: returns true if healthy. */
export type HealthCheck = () => boolean;

export interface WatchdogConfig {
  /** Interval in ms. */
  intervalMs: number;
  /** Report a check as unhealthy after this many consecutive failures. */
  failCountBeforeAlert: number;
}

export interface WatchdogCallbacks {
  onUnhealthy?: (check: string, failCount: number) => void | Promise<void>;
}

const failCounts = new Map<string, number>();

/**
 * Run one watchdog tick: run every named check and call onUnhealthy when a threshold is reached.
 */
export function runWatchdogTick(
  config: WatchdogConfig,
  callbacks: WatchdogCallbacks,
  checks: Record<string, HealthCheck>
): void {
  for (const [name, check] of Object.entries(checks)) {
    if (check()) {
      failCounts.set(name, 0);
      continue;
    }
    const failCount = (failCounts.get(name) ?? 0) + 1;
    failCounts.set(name, failCount);
    if (failCount >= config.failCountBeforeAlert) {
      logger.warn({ event: "WATCHDOG_UNHEALTHY", check: name, failCount }, `${name} unhealthy`);
      failCounts.set(name, 0);
      void Promise.resolve(callbacks.onUnhealthy?.(name, failCount)).catch((e: unknown) =>
        logger.warn({ err: e }, "onUnhealthy error")
      );
    }
  }
}

/** Test helper: clear watchdog failure counters. */
export function resetWatchdog(): void {
  failCounts.clear();
}
