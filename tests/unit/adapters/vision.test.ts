/**
 * Unit tests for the vision adapters that run without a provider.
 */

import {
  StubVisionClassifier,
  OpenAIVisionClassifier,
  createVisionClassifier,
  detectMediaType,
} from "../../../src/adapters/vision";
import { testConfig } from "../../helpers/config";
import { parseVisionReply } from "../../../src/vision/schema";

describe("vision adapters", () => {
  it("stub reports an empty scene", async () => {
    const reply = await new StubVisionClassifier().classify(Buffer.alloc(0), "prompt");
    expect(parseVisionReply(reply).vision.faceDetected).toBe(false);
  });

  it("detects PNG by magic bytes and defaults to JPEG", () => {
    expect(detectMediaType(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d]))).toBe("image/png");
    expect(detectMediaType(Buffer.from([0xff, 0xd8, 0xff]))).toBe("image/jpeg");
  });

  it("falls back to the stub without an API key", () => {
    const config = testConfig({ logsDir: "unused" });
    config.vision.provider = "openai";
    expect(createVisionClassifier(config)).toBeInstanceOf(StubVisionClassifier);
    config.llm.openaiApiKey = "test-secret";
    expect(createVisionClassifier(config)).toBeInstanceOf(OpenAIVisionClassifier);
  });
});
