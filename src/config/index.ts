/**
 * Env-based configuration for the gate assistant.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type LlmProvider = "openai" | "anthropic" | "stub";
export type VisionProvider = "openai" | "anthropic" | "stub";
export type NotifyProvider = "log" | "webhook";
export type HistoryMode = "summarize" | "shorten";

/** One chat-model handle: which model and how creative it may be. */
export interface LlmRoleConfig {
  model: string;
  temperature: number;
}

export interface AppConfig {
  /** Natural-language capability: provider plus one handle per role. */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    anthropicApiKey?: string;
    /** Field extraction and general prompts. */
    main: LlmRoleConfig;
    /** Input relevance check. */
    validation: LlmRoleConfig;
    /** New-visitor detection. */
    session: LlmRoleConfig;
    /** History summarization. */
    summary: LlmRoleConfig;
    /** Access decision classification. */
    decision: LlmRoleConfig;
    /** Timeout for any single LLM call (ms). */
    timeoutMs: number;
  };

  /** Image-classification capability and debounce tuning. */
  vision: {
    enabled: boolean;
    provider: VisionProvider;
    model: string;
    /** Consumer loop wake interval (ms). */
    pollIntervalMs: number;
    /** Rolling face-presence window length (3-4). */
    faceWindowSize: number;
    /** Minimum gap between escalations for one session (ms). */
    escalationCooldownMs: number;
    frameQueueSize: number;
    /** Capture producer timer (ms). */
    captureIntervalMs: number;
    /** File a camera daemon keeps overwriting with the latest JPEG. Unset = no timed capture. */
    captureFramePath?: string;
    /** Door whose session receives timed captures. */
    captureDoorId?: string;
    timeoutMs: number;
  };

  conversation: {
    /** Human messages allowed before history is compacted. */
    maxHumanMessages: number;
    historyMode: HistoryMode;
    /** Compaction is a no-op below this many messages. */
    compactMinMessages: number;
    /** Messages kept verbatim by the shorten strategy. */
    shortenKeepLast: number;
    /** Max state-machine steps per turn. */
    stepLimit: number;
  };

  /** Cross-context bridge and event queues. */
  bridge: {
    pollIntervalMs: number;
    batchSize: number;
    queueSize: number;
    maxAttempts: number;
    eventQueueSize: number;
    eventBatchSize: number;
    eventPollIntervalMs: number;
  };

  notify: {
    provider: NotifyProvider;
    webhookUrl?: string;
  };

  data: {
    contactsPath: string;
    employeesPath: string;
    logsDir: string;
    sessionLogMaxEntries: number;
  };

  server: {
    port: number;
    healthPort: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloat(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isFinite(n) ? n : defaultValue;
}

function getBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "1" || v === "true" || v === "yes";
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const lower = value?.toLowerCase();
  return allowed.find((a) => a === lower) ?? fallback;
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER and VISION_PROVIDER select adapters (openai, anthropic, stub).
 */
export function loadConfig(): AppConfig {
  const provider = pick(getEnv("MODEL_PROVIDER") ?? getEnv("LLM_PROVIDER"), ["openai", "anthropic", "stub"] as const, "openai");
  const defaultModel =
    provider === "anthropic"
      ? getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022"
      : getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini";
  const decisionModel =
    provider === "anthropic"
      ? getEnv("ANTHROPIC_DECISION_MODEL_NAME") || defaultModel
      : getEnv("OPENAI_DECISION_MODEL_NAME") || defaultModel;
  const visionProvider = pick(getEnv("VISION_PROVIDER"), ["openai", "anthropic", "stub"] as const, provider);

  return {
    llm: {
      provider,
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      main: { model: defaultModel, temperature: getFloat("TEMPERATURE_MAIN", 0) },
      validation: { model: defaultModel, temperature: getFloat("TEMPERATURE_VALIDATION", 0.1) },
      session: { model: defaultModel, temperature: getFloat("TEMPERATURE_SESSION", 0.1) },
      summary: { model: defaultModel, temperature: getFloat("TEMPERATURE_SUMMARY", 0.1) },
      decision: { model: decisionModel, temperature: getFloat("TEMPERATURE_DECISION", 0) },
      timeoutMs: getInt("LLM_TIMEOUT_MS", 25_000, 1),
    },
    vision: {
      enabled: getBool("VISION_ENABLED", true),
      provider: visionProvider,
      model:
        getEnv("VISION_MODEL_NAME") ||
        (visionProvider === "anthropic" ? "claude-3-5-sonnet-20241022" : "gpt-4o-mini"),
      pollIntervalMs: getInt("VISION_POLL_INTERVAL_MS", 200, 1),
      faceWindowSize: Math.min(4, Math.max(3, getInt("FACE_WINDOW_SIZE", 4))),
      escalationCooldownMs: getInt("ESCALATION_COOLDOWN_MS", 10_000),
      frameQueueSize: getInt("FRAME_QUEUE_SIZE", 10, 1),
      captureIntervalMs: getInt("CAPTURE_INTERVAL_MS", 1000, 50),
      captureFramePath: getEnv("CAPTURE_FRAME_PATH"),
      captureDoorId: getEnv("CAPTURE_DOOR_ID"),
      timeoutMs: getInt("VISION_TIMEOUT_MS", 20_000, 1),
    },
    conversation: {
      maxHumanMessages: getInt("MAX_HUMAN_MESSAGES", 10, 1),
      historyMode: pick(getEnv("HISTORY_MODE"), ["summarize", "shorten"] as const, "summarize"),
      compactMinMessages: getInt("COMPACT_MIN_MESSAGES", 8, 4),
      shortenKeepLast: getInt("SHORTEN_KEEP_LAST", 5, 1),
      stepLimit: getInt("STEP_LIMIT", 25, 5),
    },
    bridge: {
      pollIntervalMs: getInt("BRIDGE_POLL_INTERVAL_MS", 50, 1),
      batchSize: getInt("BRIDGE_BATCH_SIZE", 10, 1),
      queueSize: getInt("BRIDGE_QUEUE_SIZE", 50, 1),
      maxAttempts: getInt("BRIDGE_MAX_ATTEMPTS", 3, 1),
      eventQueueSize: getInt("EVENT_QUEUE_SIZE", 20, 1),
      eventBatchSize: getInt("EVENT_BATCH_SIZE", 5, 1),
      eventPollIntervalMs: getInt("EVENT_POLL_INTERVAL_MS", 100, 1),
    },
    notify: {
      provider: pick(getEnv("NOTIFY_PROVIDER"), ["log", "webhook"] as const, "log"),
      webhookUrl: getEnv("NOTIFY_WEBHOOK_URL"),
    },
    data: {
      contactsPath: path.resolve(getEnv("CONTACTS_PATH") || "data/contacts.json"),
      employeesPath: path.resolve(getEnv("EMPLOYEES_PATH") || "data/employees.json"),
      logsDir: path.resolve(getEnv("SESSION_LOG_DIR") || "data/logs"),
      sessionLogMaxEntries: getInt("SESSION_LOG_MAX_ENTRIES", 100, 1),
    },
    server: {
      port: getInt("GATE_PORT", 8001, 1),
      healthPort: getInt("HEALTH_PORT", 8080, 1),
    },
  };
}
