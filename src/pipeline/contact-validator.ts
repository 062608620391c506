/**
 * Contact Validator: the extracted contact must name someone in the Contact Directory.
 * A match is stored in the directory's spelling; anything else becomes `unknown`.
 */

import type pino from "pino";
import type { ContactDirectory } from "../directory/contacts";
import { ContactMismatch } from "../errors";
import { logGateError } from "../logging";
import { UNKNOWN, fieldValue, valueOf } from "../session/profile";
import type { VisitorProfile } from "../session/types";

export function validateContact(profile: VisitorProfile, directory: ContactDirectory, log: pino.Logger): VisitorProfile {
  const candidate = valueOf(profile.contactPerson);
  if (candidate === undefined) return profile;
  const canonical = directory.match(candidate);
  if (canonical === undefined) {
    logGateError(log, new ContactMismatch(candidate));
    return { ...profile, contactPerson: UNKNOWN };
  }
  if (canonical === candidate) return profile;
  return { ...profile, contactPerson: fieldValue(canonical) };
}
