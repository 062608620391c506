/**
 * Stub vision adapter: always reports an empty scene (no face, low threat).
 */

import type { ClassifyOptions, IVisionClassifier } from "./types";

const EMPTY_SCENE = JSON.stringify({
  face_detected: false,
  angry_face: false,
  dangerous_object: false,
  threat_level: "low",
  details: "stub classifier",
});

export class StubVisionClassifier implements IVisionClassifier {
  constructor(private readonly reply: string = EMPTY_SCENE) {}

  async classify(_image: Buffer, _prompt: string, _options?: ClassifyOptions): Promise<string> {
    return this.reply;
  }
}
