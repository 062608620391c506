/**
 * Entry point: load config, build the gate, start the gateway, loops and health server.
 */

import { loadConfig } from "./config";
import { createGateApp } from "./app";
import { startHealthServer } from "./health-server";
import { logger, logError } from "./logging";
import { runWatchdogTick } from "./metrics";

const WATCHDOG_INTERVAL_MS = 30_000;
/** A loop whose heartbeat is older than this counts as stalled. */
const LOOP_STALL_MS = 5_000;

async function main(): Promise<void> {
  const config = loadConfig();
  const app = createGateApp(config);
  await app.start();
  logger.info(
    { event: "GATE_STARTED", port: config.server.port, vision: config.vision.enabled, llm: config.llm.provider },
    "Gate assistant running"
  );

  const loopsAlive = (): boolean =>
    app.bridge.heartbeat.isFresh(LOOP_STALL_MS) && (app.vision?.heartbeat.isFresh(LOOP_STALL_MS) ?? true);

  const health = startHealthServer({
    port: config.server.healthPort,
    getReady: () => app.gateway.isListening && loopsAlive(),
    getDetails: () => ({ activeSessions: app.gateway.activeSessions }),
  });

  const watchdogInterval = setInterval(() => {
    runWatchdogTick(
      { intervalMs: WATCHDOG_INTERVAL_MS, failCountBeforeAlert: 3 },
      {
        onUnhealthy: (check) => {
          logger.warn({ event: "WATCHDOG", check }, "Watchdog: component unhealthy; consider restarting process.");
        },
      },
      {
        gateway: () => app.gateway.isListening,
        bridge: () => app.bridge.heartbeat.isFresh(LOOP_STALL_MS),
        ...(app.vision ? { vision: () => app.vision?.heartbeat.isFresh(LOOP_STALL_MS) ?? true } : {}),
      }
    );
  }, WATCHDOG_INTERVAL_MS);

  const shutdown = (): void => {
    clearInterval(watchdogInterval);
    health.close();
    app
      .stop()
      .catch((err: unknown) => logError(logger, err instanceof Error ? err : new Error(String(err))))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
