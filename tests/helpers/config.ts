import type { AppConfig } from "../../src/config";

/** Full config with stub providers and no capture, for wiring tests. */
export function testConfig(overrides: { logsDir: string; visionEnabled?: boolean }): AppConfig {
  return {
    llm: {
      provider: "stub",
      main: { model: "test-model", temperature: 0 },
      validation: { model: "test-model", temperature: 0.1 },
      session: { model: "test-model", temperature: 0.1 },
      summary: { model: "test-model", temperature: 0.1 },
      decision: { model: "test-model", temperature: 0 },
      timeoutMs: 1000,
    },
    vision: {
      enabled: overrides.visionEnabled ?? true,
      provider: "stub",
      model: "test-vision",
      pollIntervalMs: 200,
      faceWindowSize: 4,
      escalationCooldownMs: 10_000,
      frameQueueSize: 10,
      captureIntervalMs: 1000,
      timeoutMs: 1000,
    },
    conversation: {
      maxHumanMessages: 10,
      historyMode: "summarize",
      compactMinMessages: 8,
      shortenKeepLast: 5,
      stepLimit: 25,
    },
    bridge: {
      pollIntervalMs: 50,
      batchSize: 10,
      queueSize: 50,
      maxAttempts: 3,
      eventQueueSize: 20,
      eventBatchSize: 5,
      eventPollIntervalMs: 100,
    },
    notify: { provider: "log" },
    data: {
      contactsPath: "data/contacts.json",
      employeesPath: "data/employees.json",
      logsDir: overrides.logsDir,
      sessionLogMaxEntries: 100,
    },
    server: { port: 0, healthPort: 0 },
  };
}
