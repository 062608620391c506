/**
 * VisionSchema parsing. Models answer in snake_case or camelCase, sometimes with string booleans;
 * every field falls back to its default (false / "low" / "") instead of failing the frame.
 */

import { z } from "zod";
import { extractJsonObject } from "../pipeline/response-parsing";
import type { VisionSchema } from "../session/types";

export const DEFAULT_VISION: Readonly<VisionSchema> = Object.freeze({
  faceDetected: false,
  angryFace: false,
  dangerousObject: false,
  threatLevel: "low",
  details: "",
});

const boolish = z
  .preprocess((v) => (v === "true" ? true : v === "false" ? false : v), z.boolean())
  .catch(false);

export const visionSchemaParser = z.object({
  faceDetected: boolish,
  angryFace: boolish,
  dangerousObject: boolish,
  threatLevel: z
    .preprocess((v) => (typeof v === "string" ? v.trim().toLowerCase() : v), z.enum(["low", "medium", "high"]))
    .catch("low"),
  details: z.string().catch(""),
});

function camelize(key: string): string {
  return key.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase());
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export interface ParsedVision {
  vision: VisionSchema;
  /** False when no JSON object could be found; `vision` is then all defaults. */
  valid: boolean;
}

export function parseVisionReply(text: string): ParsedVision {
  const raw = extractJsonObject(text);
  if (!isRecord(raw)) return { vision: { ...DEFAULT_VISION }, valid: false };
  const normalized = Object.fromEntries(Object.entries(raw).map(([k, v]) => [camelize(k), v]));
  return { vision: visionSchemaParser.parse(normalized), valid: true };
}
