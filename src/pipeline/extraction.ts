/**
 * Field Extractor: fills unset/unknown profile fields from the transcript, one model call per field.
 * A field that already holds a value is never queried again.
 */

import type pino from "pino";
import type { ILLM } from "../adapters/llm";
import { withTimeout } from "../concurrency/timeout";
import { ExtractionFailure, errorMessage } from "../errors";
import { logGateError, logLlmCall } from "../logging";
import type { PromptManager } from "../prompts/prompt-manager";
import { FIELD_LABELS } from "../prompts/gate";
import { UNKNOWN, fieldValue, hasValue, setField } from "../session/profile";
import type { ChatMessage, ProfileField, VisitorProfile } from "../session/types";
import { EXTRACTION_ORDER } from "../session/types";
import { stripThinking } from "./response-parsing";

/** What the model answers when the transcript does not contain the field. */
export const NOT_FOUND_SENTINEL = "-1";

/** Extracted values are cut to this many trailing words (contact names excepted). */
export const MAX_VALUE_WORDS = 3;

export interface ExtractorDeps {
  llm: ILLM;
  prompts: PromptManager;
  timeoutMs: number;
  log: pino.Logger;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function prefixesFor(field: ProfileField): string[] {
  const label = FIELD_LABELS[field];
  return [
    `${label}:`,
    `${capitalize(label)}:`,
    "Answer:",
    "Response:",
    "Value:",
    "Result:",
    `The ${label} is`,
    `Their ${label} is`,
  ];
}

/**
 * Turn a raw model answer into a field value.
 * Returns undefined for the sentinel or an empty answer.
 */
export function cleanExtractedValue(field: ProfileField, raw: string): string | undefined {
  let value = stripThinking(raw);
  for (const prefix of prefixesFor(field)) {
    if (value.startsWith(prefix)) value = value.slice(prefix.length).trim();
  }
  value = value.replace(/^["']+|["']+$/g, "").trim();
  if (field !== "contactPerson") {
    const words = value.split(/\s+/).filter(Boolean);
    if (words.length > MAX_VALUE_WORDS) value = words.slice(-MAX_VALUE_WORDS).join(" ");
  }
  if (!value || value === NOT_FOUND_SENTINEL) return undefined;
  return value;
}

export interface ExtractionResult {
  profile: VisitorProfile;
  /** Fields that were queried this pass. */
  queried: ProfileField[];
  failures: ExtractionFailure[];
}

/**
 * Query every field that is not yet a value, in extraction order.
 * A failed or empty answer marks the field `unknown`; it will be asked again next turn.
 */
export async function extractProfile(
  deps: ExtractorDeps,
  profile: VisitorProfile,
  messages: ChatMessage[],
  contactNames: string[]
): Promise<ExtractionResult> {
  let next = profile;
  const queried: ProfileField[] = [];
  const failures: ExtractionFailure[] = [];

  for (const field of EXTRACTION_ORDER) {
    if (hasValue(next[field])) continue;
    queried.push(field);
    const prompt = deps.prompts.extraction(field, messages, contactNames);
    const started = Date.now();
    try {
      const res = await withTimeout(deps.llm.chat(prompt, { maxTokens: 20 }), deps.timeoutMs, `Extract ${field}`);
      logLlmCall(deps.log, `extract:${field}`, prompt[0]?.content.length ?? 0, res.text.length, Date.now() - started);
      const value = cleanExtractedValue(field, res.text);
      next = setField(next, field, value === undefined ? UNKNOWN : fieldValue(value));
      if (value !== undefined) deps.log.debug({ event: "FIELD_EXTRACTED", field }, "Profile field extracted");
    } catch (err) {
      const failure = new ExtractionFailure(field, `Extraction of ${field} failed: ${errorMessage(err)}`, { cause: err });
      logGateError(deps.log, failure, { field });
      failures.push(failure);
      next = setField(next, field, UNKNOWN);
    }
  }
  return { profile: next, queried, failures };
}
