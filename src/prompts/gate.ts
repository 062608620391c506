/**
 * Gate assistant wording: the system preamble, per-field question text and the fixed
 * replies visitors hear. Prompt bodies for model calls live in prompt-manager.ts.
 */

import type { Decision, ProfileField } from "../session/types";

export const GATE_SYSTEM_PREAMBLE =
  "You are a helpful assistant at the gate. Ask necessary questions and decide on access.";

export const REPROMPT_MESSAGE =
  "I didn't understand that. Please provide relevant information for your visit. I need to know your name, purpose of visit, company/organization, and any security-related information.";

export const STEP_IN_FRONT_MESSAGE = "Please step in front of the camera so I can assist you.";

export const GREETING_MESSAGE = "Hello! Welcome to the gate. May I have your name, please?";

export const FAREWELL_MESSAGE = "Goodbye. The session has been closed.";

export const FALLBACK_QUESTION = "Can you tell me more about yourself?";

/** Line prepended to the shortened history in place of the dropped messages. */
export const SHORTEN_MARKER = "[Earlier conversation omitted]";

export const FIELD_DESCRIPTIONS: Record<ProfileField, string> = {
  name: "The visitor's full name (first and last name). Examples: 'John Smith', 'Maria Garcia', 'David Kim', '-1'",
  purpose:
    "The reason for the visit or what they want to do. Examples: 'meeting', 'delivery', 'tour', 'interview', 'maintenance', '-1'",
  contactPerson:
    "The visitor's contact inside the company. Examples: 'David Smith', 'Alice Kimble', 'CEO', 'CTO', '-1'",
  threatLevel:
    "Security risk assessment based on items carried, behavior, or concerns mentioned. Examples: 'low', 'medium', 'high', '-1'",
  affiliation:
    "Company, organization, or group they represent. Examples: 'Google', 'FedEx', 'University of XYZ', 'independent contractor', '-1'",
};

/** Snake-case field names as they appear in prompts. */
export const FIELD_LABELS: Record<ProfileField, string> = {
  name: "name",
  purpose: "purpose",
  contactPerson: "contact_person",
  threatLevel: "threat_level",
  affiliation: "affiliation",
};

export function fieldQuestion(field: ProfileField, contactNames: string[]): string {
  switch (field) {
    case "name":
      return "What is your name?";
    case "purpose":
      return "What is the purpose of your visit today?";
    case "contactPerson":
      return `Who is your contact? (Known contacts include: ${contactNames.join(", ")})`;
    case "threatLevel":
      return "Are you carrying any restricted items or have any security concerns I should know about?";
    case "affiliation":
      return "What company or organization are you with?";
  }
}

export type FinalDecision = Exclude<Decision, "none">;

export const DECISION_DESCRIPTIONS: Record<FinalDecision, string> = {
  allow_request: "Standard access granted - visitor approved and the related people notified.",
  call_security: "Call security immediately - high threat or suspicious behavior",
  deny_request: "Access denied - insufficient credentials or policy violation",
};

export const DECISION_MESSAGES: Record<FinalDecision, string> = {
  allow_request: "Access granted. Welcome! Please proceed to the main entrance.",
  call_security: "Please wait here. Security has been notified and will assist you shortly.",
  deny_request: "Access denied. Please contact the appropriate department to arrange your visit.",
};

/** Reply when the decision could not be reached (classifier failure). Outcome is still deny_request. */
export const DECISION_FALLBACK_MESSAGE =
  "I cannot process your request at this time. Please contact reception for assistance.";

export const UNAUTHORIZED_DOOR_MESSAGE =
  "Sorry, you are not authorized to use this door. Please contact reception for assistance.";

export function notifySuccessMessage(contactName: string): string {
  return `Notification sent to ${contactName} about your arrival.`;
}

export function notifyFailureMessage(contactName: string): string {
  return `Could not send notification to ${contactName}. Please contact them directly.`;
}

export const CAMERA_NO_FACE_INSTRUCTION = "No face detected. Please position yourself in front of the camera.";

/** Visitor input injected when the camera escalates, so the turn runs with the threat in view. */
export const ESCALATION_TURN_INPUT = "I am here to visit someone";
