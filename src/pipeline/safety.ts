/**
 * SafetyGate: lightweight guardrails for visitor input before it reaches a prompt.
 *
 * - cap input length so one message cannot flood the classifiers' context
 * - redact obvious prompt-injection phrases ("ignore previous instructions", "reveal prompt")
 *
 * Relevance (gibberish, profanity, off-topic) is judged by the validation classifier, not here.
 */

export interface SafetyGateConfig {
  /** Max characters of visitor input kept (truncate beyond). */
  maxInputChars?: number;
}

export interface SafetyResult {
  allowed: boolean;
  text: string;
  reason?: "empty" | "truncated" | "prompt_injection_redacted";
}

const DEFAULT_MAX_INPUT_CHARS = 1000;

const INJECTION_PATTERNS = [
  /ignore (all )?(previous|prior|earlier|above) instructions/gi,
  /reveal (the )?(system prompt|prompt)/gi,
  /disregard (the )?(rules|instructions)/gi,
  /you are now (a|an) /gi,
  /respond with (exactly )?["']?(allow_request|valid|new)["']?/gi,
];

export class SafetyGate {
  private readonly maxInputChars: number;

  constructor(cfg: SafetyGateConfig = {}) {
    this.maxInputChars = cfg.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
  }

  sanitizeVisitorInput(text: string): SafetyResult {
    const trimmed = (text || "").trim();
    if (!trimmed) return { allowed: false, text: "", reason: "empty" };

    const truncated = trimmed.length > this.maxInputChars ? trimmed.slice(0, this.maxInputChars) : trimmed;
    const cleaned = INJECTION_PATTERNS.reduce((acc, re) => acc.replace(re, "[redacted]"), truncated);
    if (cleaned !== truncated) {
      // Keep the rest of the message; the visitor may still have given useful details.
      return { allowed: true, text: cleaned, reason: "prompt_injection_redacted" };
    }
    if (truncated !== trimmed) return { allowed: true, text: truncated, reason: "truncated" };
    return { allowed: true, text: truncated };
  }
}
