/**
 * Session Log: bounded per-session record of vision analyses and decisions,
 * one JSON array per session under the logs directory.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { AsyncMutex } from "../concurrency/async-mutex";

const visionSchemaShape = z.object({
  faceDetected: z.boolean(),
  angryFace: z.boolean(),
  dangerousObject: z.boolean(),
  threatLevel: z.enum(["low", "medium", "high"]),
  details: z.string(),
});

const entrySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("vision"),
    sessionId: z.string(),
    timestamp: z.string(),
    vision: visionSchemaShape,
  }),
  z.object({
    type: z.literal("decision"),
    sessionId: z.string(),
    timestamp: z.string(),
    decision: z.enum(["allow_request", "call_security", "deny_request"]),
    confidence: z.number(),
    reasoning: z.string(),
  }),
]);

export type SessionLogEntry = z.infer<typeof entrySchema>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Entry without the fields the log fills in. */
export type SessionLogInput = DistributiveOmit<SessionLogEntry, "sessionId" | "timestamp">;

export interface SessionLogOptions {
  dir: string;
  /** Entries kept per session; older ones are dropped on append. */
  maxEntries: number;
  now?: () => Date;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class SessionLog {
  private readonly mutex = new AsyncMutex();
  private readonly now: () => Date;

  constructor(private readonly opts: SessionLogOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  filePath(sessionId: string): string {
    return path.join(this.opts.dir, `${sessionId.replace(/[^A-Za-z0-9_-]/g, "_")}.json`);
  }

  append(sessionId: string, input: SessionLogInput): Promise<SessionLogEntry> {
    return this.mutex.runExclusive(async () => {
      const entry = entrySchema.parse({ ...input, sessionId, timestamp: this.now().toISOString() });
      const entries = await this.readUnlocked(sessionId);
      entries.push(entry);
      await fs.mkdir(this.opts.dir, { recursive: true });
      await fs.writeFile(this.filePath(sessionId), JSON.stringify(entries.slice(-this.opts.maxEntries), null, 2));
      return entry;
    });
  }

  read(sessionId: string): Promise<SessionLogEntry[]> {
    return this.mutex.runExclusive(() => this.readUnlocked(sessionId));
  }

  /** Vision analyses for the session, oldest first. */
  async threatLogs(sessionId: string): Promise<Extract<SessionLogEntry, { type: "vision" }>[]> {
    const entries = await this.read(sessionId);
    return entries.filter((e): e is Extract<SessionLogEntry, { type: "vision" }> => e.type === "vision");
  }

  clear(sessionId: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      try {
        await fs.unlink(this.filePath(sessionId));
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    });
  }

  private async readUnlocked(sessionId: string): Promise<SessionLogEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath(sessionId), "utf8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    if (!content.trim()) return [];
    return z.array(entrySchema).parse(JSON.parse(content));
  }
}
