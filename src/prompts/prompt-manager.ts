import type { Message } from "../adapters/llm";
import type { ChatMessage, ProfileField, VisitorProfile } from "../session/types";
import { profileSnapshot } from "../session/profile";
import { DECISION_DESCRIPTIONS, FIELD_DESCRIPTIONS, FIELD_LABELS, GATE_SYSTEM_PREAMBLE } from "./gate";

/** Messages the decision classifier sees. */
export const DECISION_CONTEXT_MESSAGES = 10;

/** Messages the new-visitor detector sees. */
const SESSION_CONTEXT_MESSAGES = 6;

export interface PromptManagerConfig {
  /** System preamble seeded into every new session. Defaults to GATE_SYSTEM_PREAMBLE. */
  systemPrompt?: string;
}

/** One `role: content` line per message, as the classifiers read history. */
export function transcriptOf(messages: ChatMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}

function single(content: string): Message[] {
  return [{ role: "user", content }];
}

/**
 * PromptManager
 *
 * Centralizes how prompts are built for each model role so wording can evolve
 * without touching the state machine.
 */
export class PromptManager {
  readonly systemPrompt: string;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? GATE_SYSTEM_PREAMBLE;
  }

  validation(input: string): Message[] {
    return single(`You are an input validator for a security gate system. Your job is to determine if user input is relevant and appropriate for a security checkpoint conversation.

VALID inputs include:
- Personal information (names, company names, purposes)
- Responses to security questions
- Regular conversation and greetings
- Questions about the facility or visit process
- Descriptions of belongings, appearance or mood

INVALID inputs include:
- Complete gibberish or random characters
- Curse words
- Spam or repetitive nonsense
- Completely irrelevant topics (sports, weather, unrelated subjects)

Respond with ONLY one word:
- "valid" if the input is appropriate for a security checkpoint
- "unrelated" if the input is gibberish, spam, offensive, or completely irrelevant

Input to validate: "${input}"

Response:`);
  }

  sessionDetection(messages: ChatMessage[]): Message[] {
    const latest = messages[messages.length - 1]?.content ?? "";
    const recent =
      messages.length >= SESSION_CONTEXT_MESSAGES ? messages.slice(-SESSION_CONTEXT_MESSAGES) : messages.slice(1);
    return single(`You are a session detector for a security gate system. Determine if the latest message indicates a NEW visitor has arrived or if it's the SAME visitor continuing the conversation. When it is not apparent, choose SAME.

NEW VISITOR indicators:
- Introductions with a different name than the current visitor
- Greetings that suggest a fresh start at an unexpected point
- References to being a different person

CONVERSATION CONTEXT:
${transcriptOf(recent)}

LATEST MESSAGE: ${latest}

Respond with ONLY one word:
- "new" if this appears to be a new visitor
- "same" if this is the same visitor continuing

Response:`);
  }

  extraction(field: ProfileField, messages: ChatMessage[], contactNames: string[]): Message[] {
    if (field === "contactPerson") return this.contactExtraction(messages, contactNames);
    const label = FIELD_LABELS[field];
    return single(`You are a data extraction tool. Your task is to extract ONLY the ${label} value from the conversation.

FIELD DESCRIPTION:
${label} = ${FIELD_DESCRIPTIONS[field]}

STRICT RULES:
- Respond with ONLY the ${label} value (no explanations, no sentences)
- If you cannot clearly determine the ${label} from the conversation, respond with exactly: -1
- Maximum 3 words for the response
- No punctuation except necessary hyphens or periods

Examples:
- If extracting "name" and conversation mentions "I'm John Smith" → respond: John Smith
- If extracting "purpose" and visitor says "here for the meeting" → respond: meeting
- If extracting "affiliation" and they say "I work at Google" → respond: Google
- If extracting "threat_level" and they say "I have no restricted items" → respond: low
- If cannot determine the value → respond: -1

Conversation:
${transcriptOf(messages)}

Extract ${label}:`);
  }

  private contactExtraction(messages: ChatMessage[], contactNames: string[]): Message[] {
    const known = contactNames.map((n) => `- ${n}`).join("\n");
    return single(`You are a strict contact person validator. Your task is to determine if the visitor is referring to any of the known contacts in our organization.

KNOWN CONTACTS:
${known}

STRICT MATCHING RULES:
- ONLY match if the visitor mentions a name that is clearly the SAME PERSON as one of the known contacts
- Match variations like a first name, "Mr./Ms." plus surname, or an initial plus surname
- DO NOT match similar sounding but different names
- If the visitor names nobody from the list, respond with -1
- Only respond with the EXACT name from the list if you are certain it's the same person
- When in doubt, respond with -1

Conversation:
${transcriptOf(messages)}

Contact person:`);
  }

  summary(messages: ChatMessage[]): Message[] {
    return single(`Summarize the following conversation between a security gate assistant and a visitor.
Focus ONLY on:
1. Key visitor information (name, purpose, affiliation)
2. Security-relevant details
3. Important context needed to continue the conversation

Keep the summary concise and focused on essential information.

Conversation:
${transcriptOf(messages)}

Summary:`);
  }

  decision(profile: VisitorProfile, messages: ChatMessage[]): Message[] {
    const p = profileSnapshot(profile);
    const options = Object.entries(DECISION_DESCRIPTIONS)
      .map(([id, description], i) => `${i + 1}. ${id} - ${description}`)
      .join("\n");
    return single(`You are a security gate decision system. Based on the visitor profile and conversation, choose the most appropriate security action.

VISITOR PROFILE:
- Name: ${p.name ?? "unknown"}
- Purpose: ${p.purpose ?? "unknown"}
- Contact Person: ${p.contactPerson ?? "unknown"}
- Threat Level: ${p.threatLevel ?? "unknown"}
- Affiliation: ${p.affiliation ?? "unknown"}
- ID Verified: ${p.idVerified}

AVAILABLE DECISIONS:
${options}

RECENT CONVERSATION:
${transcriptOf(messages.slice(-DECISION_CONTEXT_MESSAGES))}

Respond with ONLY a JSON object of the form:
{"decision": "<decision id>", "confidence": <number between 0 and 1>, "reasoning": "<one sentence>"}`);
  }

  vision(): string {
    return `You are a security camera analyst at a building gate. Look at the image and report what you see.

Respond with ONLY a JSON object matching this schema:
{
  "face_detected": boolean,     // a human face is clearly visible
  "angry_face": boolean,        // the visible face looks angry or aggressive
  "dangerous_object": boolean,  // a weapon or other dangerous object is visible
  "threat_level": "low" | "medium" | "high",
  "details": string             // one short sentence describing the scene
}`;
  }
}
