import type { SessionUpdateFields } from "../session/types";

/** Request from another context to change session fields. */
export interface UpdateRequest {
  action: "update";
  sessionId: string;
  fields: SessionUpdateFields;
  /** Failed apply attempts so far. */
  attempts?: number;
}

export type ActivationEdge = "activated" | "deactivated";
