/**
 * Capture producer: polls a frame source on a timer and enqueues frames for the session bound
 * to the camera's door. Uploads from the gateway go into the same queue.
 */

import { promises as fs } from "fs";
import type { Stats } from "fs";
import type pino from "pino";
import type { BoundedQueue } from "../concurrency/bounded-queue";
import { errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import type { CapturedFrame } from "./types";

export interface IFrameSource {
  /** Latest frame, or undefined when none is available yet. */
  read(): Promise<Buffer | undefined>;
}

/** Reads a file that a camera daemon keeps overwriting with the newest JPEG. Unchanged files are skipped. */
export class FileFrameSource implements IFrameSource {
  private lastMtimeMs = -1;

  constructor(private readonly filePath: string) {}

  async read(): Promise<Buffer | undefined> {
    let stat: Stats;
    try {
      stat = await fs.stat(this.filePath);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
      throw err;
    }
    if (stat.mtimeMs === this.lastMtimeMs) return undefined;
    this.lastMtimeMs = stat.mtimeMs;
    const image = await fs.readFile(this.filePath);
    return image.length > 0 ? image : undefined;
  }
}

export interface CaptureProducerDeps {
  source: IFrameSource;
  frames: BoundedQueue<CapturedFrame>;
  /** Session currently bound to this camera, if any. */
  resolveSession: () => string | undefined;
  log?: pino.Logger;
  now?: () => number;
}

export class CaptureProducer {
  private timer: ReturnType<typeof setInterval> | null = null;
  private busy = false;
  private readonly log: pino.Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: CaptureProducerDeps,
    private readonly intervalMs: number
  ) {
    this.log = deps.log ?? rootLogger;
    this.now = deps.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.busy) return;
      this.busy = true;
      this.captureOnce()
        .catch((err: unknown) => this.log.warn({ event: "CAPTURE_FAILED", err: errorMessage(err) }, "Frame capture failed"))
        .finally(() => {
          this.busy = false;
        });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** Returns true when a frame was enqueued. */
  async captureOnce(): Promise<boolean> {
    const sessionId = this.deps.resolveSession();
    if (!sessionId) return false;
    const image = await this.deps.source.read();
    if (!image) return false;
    this.deps.frames.enqueue({ sessionId, image, capturedAt: this.now() });
    return true;
  }
}
