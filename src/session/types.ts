/**
 * Session data model.
 */

/** Extraction outcome for one profile field. `unknown` means asked but not usable; it may be asked again. */
export type FieldValue = { kind: "unset" } | { kind: "unknown" } | { kind: "value"; value: string };

/** Order in which fields are extracted. */
export const EXTRACTION_ORDER = ["name", "purpose", "threatLevel", "affiliation", "contactPerson"] as const;

/** Order in which missing fields are asked for. */
export const QUESTION_ORDER = ["name", "purpose", "contactPerson", "threatLevel", "affiliation"] as const;

export type ProfileField = (typeof EXTRACTION_ORDER)[number];

export type VisitorProfile = { [K in ProfileField]: FieldValue } & {
  idVerified: boolean;
  /** Visitor's name matched an employee record. */
  authenticated: boolean;
};

export type MessageRole = "system" | "human" | "agent";

export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** Epoch ms. */
  timestamp: number;
}

export type Decision = "none" | "allow_request" | "call_security" | "deny_request";

export type ThreatLevel = "low" | "medium" | "high";

export interface VisionSchema {
  faceDetected: boolean;
  angryFace: boolean;
  dangerousObject: boolean;
  threatLevel: ThreatLevel;
  details: string;
}

export interface SessionState {
  sessionId: string;
  /** Camera/door the session is bound to; used for employee door authorization. */
  doorId?: string;
  messages: ChatMessage[];
  visitorProfile: VisitorProfile;
  decision: Decision;
  decisionConfidence: number;
  decisionReasoning: string;
  visionSchema?: VisionSchema;
  userInput: string;
  invalidInput: boolean;
  sessionActive: boolean;
}

/** Fields the bridge may write from another context. */
export type SessionUpdateFields = Partial<Pick<SessionState, "visionSchema" | "sessionActive" | "doorId">>;
