import type { FieldValue, ProfileField, VisitorProfile } from "./types";
import { EXTRACTION_ORDER, QUESTION_ORDER } from "./types";

export const UNSET: FieldValue = { kind: "unset" };
export const UNKNOWN: FieldValue = { kind: "unknown" };

export function fieldValue(value: string): FieldValue {
  return { kind: "value", value };
}

export function emptyProfile(): VisitorProfile {
  return {
    name: UNSET,
    purpose: UNSET,
    threatLevel: UNSET,
    affiliation: UNSET,
    contactPerson: UNSET,
    idVerified: false,
    authenticated: false,
  };
}

export function hasValue(fv: FieldValue): fv is { kind: "value"; value: string } {
  return fv.kind === "value";
}

/** The field's text, or undefined when not a value. */
export function valueOf(fv: FieldValue): string | undefined {
  return fv.kind === "value" ? fv.value : undefined;
}

/**
 * Set a field unless it already holds a value.
 * Returns the same profile object when nothing changed.
 */
export function setField(profile: VisitorProfile, field: ProfileField, next: FieldValue): VisitorProfile {
  if (hasValue(profile[field])) return profile;
  if (next.kind !== "value" && profile[field].kind === next.kind) return profile;
  return { ...profile, [field]: next };
}

/** Complete iff all five fields hold values. */
export function isComplete(profile: VisitorProfile): boolean {
  return EXTRACTION_ORDER.every((f) => hasValue(profile[f]));
}

export function missingFields(profile: VisitorProfile): ProfileField[] {
  return EXTRACTION_ORDER.filter((f) => !hasValue(profile[f]));
}

/** First missing field in question order, or undefined when complete. */
export function nextQuestionField(profile: VisitorProfile): ProfileField | undefined {
  return QUESTION_ORDER.find((f) => !hasValue(profile[f]));
}

/** Flat view for prompts, logs and the profile_data frame. Non-values become null. */
export function profileSnapshot(profile: VisitorProfile): Record<ProfileField, string | null> & {
  idVerified: boolean;
  authenticated: boolean;
} {
  return {
    name: valueOf(profile.name) ?? null,
    purpose: valueOf(profile.purpose) ?? null,
    threatLevel: valueOf(profile.threatLevel) ?? null,
    affiliation: valueOf(profile.affiliation) ?? null,
    contactPerson: valueOf(profile.contactPerson) ?? null,
    idVerified: profile.idVerified,
    authenticated: profile.authenticated,
  };
}
