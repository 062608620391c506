/**
 * Vision Debounce Pipeline consumer. Each cycle drains the frame queue, analyzes only the
 * most recently enqueued frame per session, then turns the result into presence edges, escalation events,
 * bridge update requests and a session log entry. It never touches the session store.
 */

import type pino from "pino";
import type { BoundedQueue } from "../concurrency/bounded-queue";
import type { StateBridge } from "../bridge/state-bridge";
import { errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import { Heartbeat, recordVisionMetrics } from "../metrics";
import type { SessionLog } from "../session/log";
import type { VisionAnalyzer } from "./analyzer";
import { EscalationGate } from "./escalation";
import { PresenceTracker } from "./face-window";
import type { CapturedFrame, VisionEvent } from "./types";

export interface VisionPipelineConfig {
  /** Face window length per session. */
  faceWindowSize: number;
  escalationCooldownMs: number;
  pollIntervalMs: number;
}

export interface VisionPipelineDeps {
  frames: BoundedQueue<CapturedFrame>;
  events: BoundedQueue<VisionEvent>;
  analyzer: VisionAnalyzer;
  bridge: Pick<StateBridge, "submit">;
  sessionLog: SessionLog;
  log?: pino.Logger;
  now?: () => number;
}

export class VisionPipeline {
  readonly heartbeat: Heartbeat;
  private readonly trackers = new Map<string, PresenceTracker>();
  private readonly escalation: EscalationGate;
  private readonly log: pino.Logger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private busy = false;

  constructor(
    private readonly deps: VisionPipelineDeps,
    private readonly config: VisionPipelineConfig
  ) {
    this.now = deps.now ?? Date.now;
    this.log = deps.log ?? rootLogger;
    this.escalation = new EscalationGate(config.escalationCooldownMs, this.now);
    this.heartbeat = new Heartbeat(this.now);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.heartbeat.beat();
      if (this.busy) return;
      this.busy = true;
      this.runOnce()
        .catch((err: unknown) => this.log.error({ event: "VISION_CYCLE_FAILED", err: errorMessage(err) }, "Vision cycle failed"))
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
   * Drain the queue and process the last enqueued frame of each session.
   * Returns the frames processed.
   */
  async runOnce(): Promise<CapturedFrame[]> {
    const drained = this.deps.frames.drain();
    if (drained.length === 0) return [];
    const latest = new Map<string, CapturedFrame>();
    // Enqueue order decides, not capturedAt: upload timestamps come from the client clock.
    for (const frame of drained) latest.set(frame.sessionId, frame);
    const discarded = drained.length - latest.size;
    if (discarded > 0) {
      this.log.debug({ event: "FRAMES_DISCARDED", discarded }, "Older frames discarded");
    }
    const processed = [...latest.values()];
    for (const frame of processed) {
      await this.processFrame(frame, discarded);
    }
    return processed;
  }

  /** Forget per-session debounce state (session closed). */
  forget(sessionId: string): void {
    this.trackers.delete(sessionId);
    this.escalation.forget(sessionId);
  }

  private tracker(sessionId: string): PresenceTracker {
    let t = this.trackers.get(sessionId);
    if (!t) {
      t = new PresenceTracker(this.config.faceWindowSize);
      this.trackers.set(sessionId, t);
    }
    return t;
  }

  private async processFrame(frame: CapturedFrame, discarded: number): Promise<void> {
    const { sessionId } = frame;
    const started = this.now();
    const vision = await this.deps.analyzer.analyze(frame.image, sessionId);
    recordVisionMetrics({
      sessionId,
      classifyLatencyMs: this.now() - started,
      faceDetected: vision.faceDetected,
      threatLevel: vision.threatLevel,
      discardedFrames: discarded,
    });
    this.log.info(
      { event: "VISION_RESULT", sessionId, faceDetected: vision.faceDetected, threatLevel: vision.threatLevel, dangerousObject: vision.dangerousObject },
      "Frame analyzed"
    );

    const edge = this.tracker(sessionId).observe(vision.faceDetected);
    this.deps.bridge.submit({ action: "update", sessionId, fields: { visionSchema: vision } });

    if (edge === "departed") {
      this.deps.bridge.submit({ action: "update", sessionId, fields: { sessionActive: false } });
      await this.clearLog(sessionId);
      this.emit({ type: "no_face", sessionId, at: this.now() });
    } else if (edge === "arrived") {
      this.deps.bridge.submit({ action: "update", sessionId, fields: { sessionActive: true } });
    }

    if (this.escalation.shouldEscalate(sessionId, vision)) {
      this.log.warn({ event: "VISION_ESCALATION", sessionId, details: vision.details }, "Threat escalation");
      this.emit({ type: "escalation", sessionId, vision, at: this.now() });
    }

    if (edge !== "departed") {
      try {
        await this.deps.sessionLog.append(sessionId, { type: "vision", vision });
      } catch (err) {
        this.log.warn({ event: "SESSION_LOG_FAILED", sessionId, err: errorMessage(err) }, "Could not record vision result");
      }
    }
  }

  private emit(event: VisionEvent): void {
    this.deps.events.enqueue(event);
  }

  private async clearLog(sessionId: string): Promise<void> {
    try {
      await this.deps.sessionLog.clear(sessionId);
    } catch (err) {
      this.log.warn({ event: "SESSION_LOG_FAILED", sessionId, err: errorMessage(err) }, "Could not clear session log");
    }
  }
}
