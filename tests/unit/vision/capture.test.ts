/**
 * Unit tests for timed frame capture.
 */

import * as fs from "fs";
import * as path from "path";
import { BoundedQueue } from "../../../src/concurrency/bounded-queue";
import { logger } from "../../../src/logging";
import { CaptureProducer, FileFrameSource } from "../../../src/vision/capture";
import type { IFrameSource } from "../../../src/vision/capture";
import type { CapturedFrame } from "../../../src/vision/types";
import { tempDir } from "../../helpers/fakes";

describe("FileFrameSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns undefined while the file does not exist", async () => {
    await expect(new FileFrameSource(path.join(dir, "frame.jpg")).read()).resolves.toBeUndefined();
  });

  it("reads a new frame once", async () => {
    const file = path.join(dir, "frame.jpg");
    fs.writeFileSync(file, Buffer.from([0xff, 0xd8, 0xff]));
    const source = new FileFrameSource(file);
    expect((await source.read())?.length).toBe(3);
    await expect(source.read()).resolves.toBeUndefined();
  });
});

describe("CaptureProducer", () => {
  const image = Buffer.from("frame");
  const source: IFrameSource = { read: async () => image };

  it("enqueues frames for the bound session", async () => {
    const frames = new BoundedQueue<CapturedFrame>({ name: "frames", capacity: 5 });
    const producer = new CaptureProducer({ source, frames, resolveSession: () => "s1", log: logger, now: () => 42 }, 1000);
    await expect(producer.captureOnce()).resolves.toBe(true);
    expect(frames.drain()).toEqual([{ sessionId: "s1", image, capturedAt: 42 }]);
  });

  it("skips capture when no session is bound", async () => {
    const frames = new BoundedQueue<CapturedFrame>({ name: "frames", capacity: 5 });
    const producer = new CaptureProducer({ source, frames, resolveSession: () => undefined, log: logger }, 1000);
    await expect(producer.captureOnce()).resolves.toBe(false);
    expect(frames.size).toBe(0);
  });
});
