import type { VisionSchema } from "../session/types";

export interface CapturedFrame {
  sessionId: string;
  /** Encoded image (JPEG or PNG). */
  image: Buffer;
  /** Epoch ms. */
  capturedAt: number;
}

export type VisionEvent =
  | { type: "no_face"; sessionId: string; at: number }
  | { type: "escalation"; sessionId: string; vision: VisionSchema; at: number };
