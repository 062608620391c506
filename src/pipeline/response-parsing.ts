/**
 * Helpers for reading model replies: reasoning models prefix their answer with a
 * <think>…</think> block, and JSON answers often arrive wrapped in prose or code fences.
 */

/** Text after the closing </think> tag, trimmed; the whole reply when there is no think block. */
export function stripThinking(text: string): string {
  if (text.includes("<think>")) {
    const close = text.indexOf("</think>");
    if (close >= 0) return text.slice(close + "</think>".length).trim();
  }
  return text.trim();
}

/** Parse the reply as JSON, falling back to the outermost {...} span. Undefined when neither parses. */
export function extractJsonObject(text: string): unknown {
  const body = stripThinking(text);
  try {
    return JSON.parse(body);
  } catch {
    const start = body.indexOf("{");
    const end = body.lastIndexOf("}");
    if (start < 0 || end <= start) return undefined;
    try {
      return JSON.parse(body.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}
