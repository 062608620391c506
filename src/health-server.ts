/**
 * Minimal HTTP health server for liveness and readiness (e.g. Kubernetes).
 * GET /health -> 200 if process is up.
 * GET /ready -> 200 only if getReady() returns true (gateway listening, loops alive), else 503.
 */

import * as http from "http";
import { logger } from "./logging";

const DEFAULT_PORT = 8080;

export interface HealthServerOptions {
  port?: number;
  /** Return true when the gate is ready to serve visitors. */
  getReady?: () => boolean;
  /** Extra fields for the /health body (e.g. active session count). */
  getDetails?: () => Record<string, unknown>;
}

export function startHealthServer(options: HealthServerOptions = {}): http.Server {
  const port = options.port ?? DEFAULT_PORT;
  const getReady = options.getReady ?? (() => false);
  const getDetails = options.getDetails ?? (() => ({}));

  const server = http.createServer((req, res) => {
    const url = req.url ?? "";
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: true, ...getDetails() }));
      return;
    }
    if (req.method === "GET" && url === "/ready") {
      const ready = getReady();
      res.writeHead(ready ? 200 : 503, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: ready, ready }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  server.listen(port, () => {
    logger.info({ event: "HEALTH_SERVER_STARTED", port }, "Health server listening");
  });

  return server;
}
