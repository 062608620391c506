/**
 * Structured logging for the gate pipeline.
 * Logs turns, LLM calls, decisions, vision results and queue drops. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error (default: info)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";
import type { GateError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === undefined || raw === "") return process.env.NODE_ENV === "test" ? "silent" : "info";
  return LOG_LEVELS.find((l) => l === raw) ?? "info";
}

const defaultConfig: LoggerConfig = {
  level: envLevel(),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log LLM request/response (summary only; prompts may contain visitor PII). */
export function logLlmCall(log: pino.Logger, role: string, promptLength: number, responseLength: number, durationMs?: number): void {
  log.debug({ event: "LLM_CALL", role, promptLength, responseLength, durationMs }, "LLM completed");
}

/** Log turn start/end with the state path the machine walked. */
export function logTurn(log: pino.Logger, phase: "start" | "end", sessionId: string, path?: string[]): void {
  log.info({ event: "TURN", phase, sessionId, path }, phase === "start" ? "Turn start" : "Turn end");
}

export function logDecision(
  log: pino.Logger,
  sessionId: string,
  decision: string,
  confidence: number,
  source: string
): void {
  log.info({ event: "DECISION", sessionId, decision, confidence, source }, "Access decision");
}

/** Log a locally handled pipeline failure at warn level, tagged with its kind. */
export function logGateError(log: pino.Logger, err: GateError, context?: Record<string, unknown>): void {
  log.warn({ event: "GATE_ERROR", kind: err.kind, err: err.message, ...context }, err.name);
}

export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
