/**
 * Unit tests for field extraction and contact validation.
 */

import { logger } from "../../../src/logging";
import { validateContact } from "../../../src/pipeline/contact-validator";
import { cleanExtractedValue, extractProfile } from "../../../src/pipeline/extraction";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import { UNKNOWN, UNSET, emptyProfile, fieldValue } from "../../../src/session/profile";
import type { ChatMessage } from "../../../src/session/types";
import { FailingLLM, patternExtractor, testContacts } from "../../helpers/fakes";

const prompts = new PromptManager();
const contacts = testContacts();

function transcript(...lines: string[]): ChatMessage[] {
  return [
    { role: "system", content: "preamble", timestamp: 0 },
    ...lines.map((content, i): ChatMessage => ({ role: "human", content, timestamp: i + 1 })),
  ];
}

describe("cleanExtractedValue", () => {
  it("strips answer prefixes and quotes", () => {
    expect(cleanExtractedValue("name", "Answer: John Smith")).toBe("John Smith");
    expect(cleanExtractedValue("purpose", '"meeting"')).toBe("meeting");
    expect(cleanExtractedValue("threatLevel", "threat_level: low")).toBe("low");
  });

  it("keeps the last three words of long answers", () => {
    expect(cleanExtractedValue("affiliation", "The affiliation is University of Northern Colorado")).toBe(
      "of Northern Colorado"
    );
  });

  it("keeps contact names whole", () => {
    expect(cleanExtractedValue("contactPerson", "Dr. Mary Ann Jones")).toBe("Dr. Mary Ann Jones");
  });

  it("maps the sentinel and empty answers to undefined", () => {
    expect(cleanExtractedValue("name", "<think>no name given</think>-1")).toBeUndefined();
    expect(cleanExtractedValue("name", "  ")).toBeUndefined();
  });
});

describe("extractProfile", () => {
  it("queries only fields without a value", async () => {
    const llm = patternExtractor();
    const profile = { ...emptyProfile(), name: fieldValue("Maria Garcia") };
    const result = await extractProfile(
      { llm, prompts, timeoutMs: 1000, log: logger },
      profile,
      transcript("I'm here for a delivery from FedEx"),
      contacts.names()
    );
    expect(result.queried).toEqual(["purpose", "threatLevel", "affiliation", "contactPerson"]);
    expect(llm.prompts.some((p) => p.includes("Extract name:"))).toBe(false);
    expect(result.profile).toEqual({
      ...profile,
      purpose: fieldValue("delivery"),
      threatLevel: UNKNOWN,
      affiliation: fieldValue("FedEx"),
      contactPerson: UNKNOWN,
    });
  });

  it("does nothing once every field holds a value", async () => {
    const llm = patternExtractor();
    const full = {
      ...emptyProfile(),
      name: fieldValue("Maria Garcia"),
      purpose: fieldValue("meeting"),
      threatLevel: fieldValue("low"),
      affiliation: fieldValue("Acme"),
      contactPerson: fieldValue("David Smith"),
    };
    const result = await extractProfile({ llm, prompts, timeoutMs: 1000, log: logger }, full, transcript("hi"), []);
    expect(result.profile).toBe(full);
    expect(llm.prompts).toHaveLength(0);
  });

  it("marks every field unknown when the model fails", async () => {
    const result = await extractProfile(
      { llm: new FailingLLM(), prompts, timeoutMs: 1000, log: logger },
      emptyProfile(),
      transcript("hello"),
      contacts.names()
    );
    expect(result.failures.map((f) => f.field)).toEqual([
      "name",
      "purpose",
      "threatLevel",
      "affiliation",
      "contactPerson",
    ]);
    expect(result.profile.name).toEqual(UNKNOWN);
    expect(result.profile.contactPerson).toEqual(UNKNOWN);
  });
});

describe("validateContact", () => {
  it("stores the directory spelling of a match", () => {
    const p = validateContact({ ...emptyProfile(), contactPerson: fieldValue("david smith") }, contacts, logger);
    expect(p.contactPerson).toEqual(fieldValue("David Smith"));
  });

  it("turns a name outside the directory into unknown", () => {
    const p = validateContact({ ...emptyProfile(), contactPerson: fieldValue("Bob Jones") }, contacts, logger);
    expect(p.contactPerson).toEqual(UNKNOWN);
  });

  it("leaves a profile without a contact alone", () => {
    const profile = emptyProfile();
    expect(validateContact(profile, contacts, logger)).toBe(profile);
    expect(profile.contactPerson).toEqual(UNSET);
  });
});
