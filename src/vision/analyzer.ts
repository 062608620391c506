/**
 * VisionAnalyzer: one frame in, one VisionSchema out. Classifier failures and unusable replies
 * yield the defaults, which count as "no face, low threat".
 */

import type pino from "pino";
import type { IVisionClassifier } from "../adapters/vision";
import { withTimeout } from "../concurrency/timeout";
import { VisionFailure, errorMessage } from "../errors";
import { logGateError, logger as rootLogger } from "../logging";
import type { PromptManager } from "../prompts/prompt-manager";
import type { VisionSchema } from "../session/types";
import { DEFAULT_VISION, parseVisionReply } from "./schema";

export interface VisionAnalyzerDeps {
  classifier: IVisionClassifier;
  prompts: PromptManager;
  timeoutMs: number;
  log?: pino.Logger;
}

export class VisionAnalyzer {
  private readonly log: pino.Logger;

  constructor(private readonly deps: VisionAnalyzerDeps) {
    this.log = deps.log ?? rootLogger;
  }

  async analyze(image: Buffer, sessionId: string): Promise<VisionSchema> {
    let reply: string;
    try {
      reply = await withTimeout(
        this.deps.classifier.classify(image, this.deps.prompts.vision()),
        this.deps.timeoutMs,
        "Vision"
      );
    } catch (err) {
      logGateError(this.log, new VisionFailure(`Classification failed: ${errorMessage(err)}`, { cause: err }), { sessionId });
      return { ...DEFAULT_VISION };
    }
    const { vision, valid } = parseVisionReply(reply);
    if (!valid) {
      logGateError(this.log, new VisionFailure("No JSON object in classifier reply"), { sessionId });
    }
    return vision;
  }
}
