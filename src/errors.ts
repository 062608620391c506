/**
 * Error taxonomy for the gate pipeline.
 * Only SessionNotFoundError reaches callers; the rest are caught at the node that raised them
 * and logged with their `kind` so failures can be grouped.
 */

export type GateErrorKind =
  | "extraction_failure"
  | "contact_mismatch"
  | "vision_failure"
  | "decision_parse_failure"
  | "queue_overflow"
  | "session_not_found";

export class GateError extends Error {
  constructor(
    readonly kind: GateErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Field extraction call failed or returned nothing usable. Field stays unset/unknown. */
export class ExtractionFailure extends GateError {
  constructor(readonly field: string, message: string, options?: { cause?: unknown }) {
    super("extraction_failure", message, options);
  }
}

/** Extracted contact is not in the directory. Value is discarded, not retried. */
export class ContactMismatch extends GateError {
  constructor(readonly candidate: string) {
    super("contact_mismatch", `Contact "${candidate}" is not in the directory`);
  }
}

/** Image classification failed; the frame counts as no-face / low threat. */
export class VisionFailure extends GateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("vision_failure", message, options);
  }
}

/** Decision classifier returned something unusable; the decision fails closed. */
export class DecisionParseFailure extends GateError {
  constructor(message: string, readonly raw?: string) {
    super("decision_parse_failure", message);
  }
}

/** A bounded queue dropped its oldest item. */
export class QueueOverflow extends GateError {
  constructor(readonly queue: string, readonly dropped: number) {
    super("queue_overflow", `Queue "${queue}" full; dropped oldest item (total dropped: ${dropped})`);
  }
}

export class SessionNotFoundError extends GateError {
  constructor(readonly sessionId: string) {
    super("session_not_found", `Session not found: ${sessionId}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
