/**
 * Unit tests for the vision consumer: latest-wins, presence edges, escalation events and logging.
 */

import * as fs from "fs";
import type { UpdateRequest } from "../../../src/bridge/types";
import { BoundedQueue } from "../../../src/concurrency/bounded-queue";
import { logger } from "../../../src/logging";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import { SessionLog } from "../../../src/session/log";
import { VisionAnalyzer } from "../../../src/vision/analyzer";
import { VisionPipeline } from "../../../src/vision/pipeline";
import type { CapturedFrame, VisionEvent } from "../../../src/vision/types";
import { ScriptedVision, tempDir, visionReply } from "../../helpers/fakes";

describe("VisionPipeline", () => {
  let dir: string;
  let clock: number;
  let frames: BoundedQueue<CapturedFrame>;
  let events: BoundedQueue<VisionEvent>;
  let submitted: UpdateRequest[];
  let sessionLog: SessionLog;

  beforeEach(() => {
    dir = tempDir();
    clock = 0;
    frames = new BoundedQueue<CapturedFrame>({ name: "frames", capacity: 10 });
    events = new BoundedQueue<VisionEvent>({ name: "events", capacity: 20 });
    submitted = [];
    sessionLog = new SessionLog({ dir, maxEntries: 100 });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function pipeline(classifier: ScriptedVision): VisionPipeline {
    const analyzer = new VisionAnalyzer({ classifier, prompts: new PromptManager(), timeoutMs: 1000, log: logger });
    return new VisionPipeline(
      {
        frames,
        events,
        analyzer,
        bridge: { submit: (r) => void submitted.push(r) },
        sessionLog,
        log: logger,
        now: () => clock,
      },
      { faceWindowSize: 4, escalationCooldownMs: 10_000, pollIntervalMs: 200 }
    );
  }

  function frame(sessionId: string, label: string, capturedAt: number): CapturedFrame {
    return { sessionId, image: Buffer.from(label), capturedAt };
  }

  it("analyzes only the newest frame of each session", async () => {
    const classifier = new ScriptedVision([visionReply({ face: true })]);
    const p = pipeline(classifier);
    frames.enqueue(frame("s1", "s1-a", 1));
    frames.enqueue(frame("s2", "s2-a", 2));
    frames.enqueue(frame("s1", "s1-b", 3));
    frames.enqueue(frame("s1", "s1-c", 4));
    const processed = await p.runOnce();
    expect(processed.map((f) => f.image.toString())).toEqual(["s1-c", "s2-a"]);
    expect(classifier.images.map((b) => b.toString())).toEqual(["s1-c", "s2-a"]);
    expect(frames.size).toBe(0);
  });

  it("keeps the last enqueued frame even when its timestamp is older", async () => {
    const classifier = new ScriptedVision([visionReply({ face: true })]);
    const p = pipeline(classifier);
    frames.enqueue(frame("s1", "captured", 1_700_000_005_000));
    frames.enqueue(frame("s1", "uploaded-last", 1_700_000_000_000));
    const processed = await p.runOnce();
    expect(processed.map((f) => f.image.toString())).toEqual(["uploaded-last"]);
    expect(classifier.images.map((b) => b.toString())).toEqual(["uploaded-last"]);
  });

  it("does nothing on an empty queue", async () => {
    const classifier = new ScriptedVision([visionReply({})]);
    await expect(pipeline(classifier).runOnce()).resolves.toEqual([]);
    expect(classifier.images).toHaveLength(0);
  });

  it("submits vision and arrival updates for a face", async () => {
    const p = pipeline(new ScriptedVision([visionReply({ face: true, details: "visitor" })]));
    frames.enqueue(frame("s1", "f", 1));
    await p.runOnce();
    expect(submitted).toEqual([
      {
        action: "update",
        sessionId: "s1",
        fields: {
          visionSchema: { faceDetected: true, angryFace: false, dangerousObject: false, threatLevel: "low", details: "visitor" },
        },
      },
      { action: "update", sessionId: "s1", fields: { sessionActive: true } },
    ]);
    expect(await sessionLog.threatLogs("s1")).toHaveLength(1);
  });

  it("reports an empty scene once and clears the log", async () => {
    const p = pipeline(new ScriptedVision([visionReply({ face: false })]));
    for (let i = 1; i <= 4; i++) {
      frames.enqueue(frame("s1", `f${i}`, i));
      await p.runOnce();
    }
    await expect(sessionLog.read("s1")).resolves.toEqual([]);
    for (let i = 5; i <= 14; i++) {
      frames.enqueue(frame("s1", `f${i}`, i));
      await p.runOnce();
    }
    const emitted = events.drain();
    expect(emitted.filter((e) => e.type === "no_face")).toHaveLength(1);
    expect(submitted.filter((r) => r.fields.sessionActive === false)).toHaveLength(1);
    expect(await sessionLog.read("s1")).toHaveLength(10);
  });

  it("emits one escalation per cooldown window", async () => {
    const p = pipeline(new ScriptedVision([visionReply({ face: true, dangerous: true, threat: "high", details: "knife" })]));
    for (let i = 0; i < 3; i++) {
      clock = i * 1000;
      frames.enqueue(frame("s1", `f${i}`, clock));
      await p.runOnce();
    }
    clock = 10_000;
    frames.enqueue(frame("s1", "late", clock));
    await p.runOnce();
    const escalations = events.drain().filter((e) => e.type === "escalation");
    expect(escalations.map((e) => e.at)).toEqual([0, 10_000]);
  });

  it("treats classifier failures as an empty scene", async () => {
    const failing = new ScriptedVision(["not json"]);
    const p = pipeline(failing);
    frames.enqueue(frame("s1", "f", 1));
    await p.runOnce();
    expect(submitted[0]?.fields.visionSchema?.faceDetected).toBe(false);
    expect(submitted).toHaveLength(1);
  });
});
