/**
 * Gateway wire protocol. Every WebSocket frame is JSON `{ event, data }`.
 */

import { z } from "zod";
import type { ProfileSnapshot } from "../pipeline/types";
import type { SessionLogEntry } from "../session/log";
import type { Decision } from "../session/types";

export const inboundFrameSchema = z.discriminatedUnion("event", [
  z.object({ event: z.literal("send_message"), data: z.object({ message: z.string() }) }),
  z.object({ event: z.literal("get_profile"), data: z.unknown().optional() }),
  z.object({
    event: z.literal("upload_image"),
    data: z.object({
      image: z.string().min(1),
      timestamp: z.union([z.number(), z.string()]).optional(),
    }),
  }),
  z.object({ event: z.literal("request_health_check"), data: z.unknown().optional() }),
  z.object({ event: z.literal("request_threat_logs"), data: z.unknown().optional() }),
]);

export type InboundFrame = z.infer<typeof inboundFrameSchema>;

export type OutboundFrame =
  | { event: "session_ready"; data: { session_id: string; session_active: boolean } }
  | { event: "status"; data: { message: string } }
  | { event: "chat_response"; data: { agent_response: string; session_complete: boolean } }
  | {
      event: "profile_data";
      data: { session_id: string; profile: ProfileSnapshot; decision: Decision; session_active: boolean };
    }
  | { event: "image_upload_response"; data: { success: boolean; message: string } }
  | {
      event: "health_status";
      data: { status: "ok"; active_sessions: number; vision_enabled: boolean; dropped: Record<string, number> };
    }
  | { event: "threat_logs"; data: SessionLogEntry[] }
  | { event: "camera_instruction"; data: { message: string } }
  | { event: "session_update"; data: { session_active: boolean } }
  | { event: "error"; data: { msg: string } };

export type ParseResult = { ok: true; frame: InboundFrame } | { ok: false; error: string };

export function parseInbound(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Frame is not valid JSON" };
  }
  const parsed = inboundFrameSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: `Unsupported frame: ${parsed.error.issues[0]?.message ?? "invalid"}` };
  }
  return { ok: true, frame: parsed.data };
}

/** Accepts raw base64 or a data URL. Returns undefined when nothing decodes. */
export function decodeImage(image: string): Buffer | undefined {
  const comma = image.startsWith("data:") ? image.indexOf(",") : -1;
  const b64 = comma >= 0 ? image.slice(comma + 1) : image;
  const buf = Buffer.from(b64, "base64");
  return buf.length > 0 ? buf : undefined;
}

export function frameTimestamp(ts: number | string | undefined, fallback: number): number {
  if (typeof ts === "number" && Number.isFinite(ts)) return ts;
  if (typeof ts === "string") {
    const parsed = Date.parse(ts);
    if (!Number.isNaN(parsed)) return parsed;
  }
  return fallback;
}
