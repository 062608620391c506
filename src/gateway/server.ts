/**
 * Gateway: WebSocket server for gate clients (kiosk UI, dashboard).
 * One connection = one session. Turns for a session run one at a time.
 * Connect with ?door=<camera/door id> to bind the session to a door.
 */

import { randomUUID } from "crypto";
import type { IncomingMessage } from "http";
import type pino from "pino";
import WebSocket, { WebSocketServer } from "ws";
import type { BoundedQueue } from "../concurrency/bounded-queue";
import { AsyncMutex } from "../concurrency/async-mutex";
import { SessionNotFoundError, errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import { getQueueCounters } from "../metrics";
import type { Orchestrator } from "../pipeline/orchestrator";
import type { TurnResult } from "../pipeline/types";
import type { SessionLog } from "../session/log";
import { profileSnapshot } from "../session/profile";
import type { SessionStore } from "../session/store";
import type { CapturedFrame } from "../vision/types";
import type { InboundFrame, OutboundFrame } from "./protocol";
import { decodeImage, frameTimestamp, parseInbound } from "./protocol";

/** Anything that can carry outbound frames to one client. */
export interface ClientConnection {
  send(frame: OutboundFrame): void;
}

export interface GatewayDeps {
  store: SessionStore;
  orchestrator: Pick<Orchestrator, "handleTurn">;
  sessionLog: SessionLog;
  /** Frame queue for uploads; undefined when vision is disabled. */
  frames?: BoundedQueue<CapturedFrame>;
  /** Called after a session's connection closes and the session is removed. */
  onSessionClosed?: (sessionId: string) => void;
  log?: pino.Logger;
  now?: () => number;
}

export interface GatewayConfig {
  port: number;
  host?: string;
}

export class GateGateway {
  private wss: WebSocketServer | null = null;
  private listening = false;
  private readonly connections = new Map<string, ClientConnection>();
  private readonly turnLocks = new Map<string, AsyncMutex>();
  private readonly log: pino.Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: GatewayDeps,
    private readonly config: GatewayConfig
  ) {
    this.log = deps.log ?? rootLogger;
    this.now = deps.now ?? Date.now;
  }

  get isListening(): boolean {
    return this.listening;
  }

  get activeSessions(): number {
    return this.connections.size;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.config.port, host: this.config.host });
      this.wss = wss;
      wss.once("error", reject);
      wss.once("listening", () => {
        this.listening = true;
        wss.off("error", reject);
        wss.on("error", (err) => this.log.error({ event: "GATEWAY_ERROR", err: err.message }, "Gateway server error"));
        this.log.info({ event: "GATEWAY_STARTED", port: this.config.port }, "Gateway listening");
        resolve();
      });
      wss.on("connection", (ws, req) => {
        this.acceptSocket(ws, req).catch((err: unknown) => {
          this.log.error({ event: "GATEWAY_CONNECT_FAILED", err: errorMessage(err) }, "Could not open session");
          ws.close(1011, "session setup failed");
        });
      });
    });
  }

  stop(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    this.listening = false;
    if (!wss) return Promise.resolve();
    for (const client of wss.clients) client.close(1001, "server shutting down");
    return new Promise((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
  }

  /** Register a client and create its session. Returns the new session id. */
  async openSession(conn: ClientConnection, doorId?: string): Promise<string> {
    const sessionId = randomUUID();
    const state = await this.deps.store.create(sessionId, doorId);
    this.connections.set(sessionId, conn);
    this.log.info({ event: "SESSION_OPENED", sessionId, doorId }, "Session opened");
    conn.send({ event: "session_ready", data: { session_id: sessionId, session_active: state.sessionActive } });
    conn.send({
      event: "status",
      data: { message: state.sessionActive ? "Connected. Please introduce yourself." : "Connected. Waiting for a visitor." },
    });
    return sessionId;
  }

  async closeSession(sessionId: string): Promise<void> {
    this.connections.delete(sessionId);
    this.turnLocks.delete(sessionId);
    await this.deps.store.delete(sessionId);
    this.deps.onSessionClosed?.(sessionId);
    this.log.info({ event: "SESSION_CLOSED", sessionId }, "Session closed");
  }

  /** Send a frame to the session's client, if still connected. */
  send(sessionId: string, frame: OutboundFrame): void {
    this.connections.get(sessionId)?.send(frame);
  }

  /**
   * Run a turn after any in-flight turn for the session and push the reply to its client.
   * Resolves undefined when the session no longer exists. A turn whose writes were discarded
   * by a mid-turn reset sends nothing.
   */
  submitTurn(sessionId: string, text: string): Promise<TurnResult | undefined> {
    if (!this.connections.has(sessionId)) {
      this.log.debug({ event: "TURN_SKIPPED", sessionId }, "Turn for closed session skipped");
      return Promise.resolve(undefined);
    }
    return this.lockFor(sessionId).runExclusive(async () => {
      let result: TurnResult;
      try {
        result = await this.deps.orchestrator.handleTurn(sessionId, text);
      } catch (err) {
        if (err instanceof SessionNotFoundError) {
          this.send(sessionId, { event: "error", data: { msg: err.message } });
          return undefined;
        }
        throw err;
      }
      if (!result.committed) return result;
      this.send(sessionId, {
        event: "chat_response",
        data: { agent_response: result.reply, session_complete: result.sessionComplete },
      });
      return result;
    });
  }

  /** Handle one raw inbound frame for a session. */
  async handleMessage(sessionId: string, raw: string): Promise<void> {
    const parsed = parseInbound(raw);
    if (!parsed.ok) {
      this.send(sessionId, { event: "error", data: { msg: parsed.error } });
      return;
    }
    try {
      await this.dispatch(sessionId, parsed.frame);
    } catch (err) {
      this.log.error({ event: "GATEWAY_HANDLER_FAILED", sessionId, type: parsed.frame.event, err: errorMessage(err) }, "Handler failed");
      this.send(sessionId, { event: "error", data: { msg: "Internal error. Please try again." } });
    }
  }

  private async dispatch(sessionId: string, frame: InboundFrame): Promise<void> {
    switch (frame.event) {
      case "send_message":
        await this.submitTurn(sessionId, frame.data.message);
        return;
      case "get_profile": {
        const state = this.deps.store.get(sessionId);
        if (!state) {
          this.send(sessionId, { event: "error", data: { msg: new SessionNotFoundError(sessionId).message } });
          return;
        }
        this.send(sessionId, {
          event: "profile_data",
          data: {
            session_id: sessionId,
            profile: profileSnapshot(state.visitorProfile),
            decision: state.decision,
            session_active: state.sessionActive,
          },
        });
        return;
      }
      case "upload_image":
        this.send(sessionId, { event: "image_upload_response", data: this.acceptUpload(sessionId, frame.data) });
        return;
      case "request_health_check":
        this.send(sessionId, {
          event: "health_status",
          data: {
            status: "ok",
            active_sessions: this.activeSessions,
            vision_enabled: this.deps.frames !== undefined,
            dropped: getQueueCounters().dropped,
          },
        });
        return;
      case "request_threat_logs":
        this.send(sessionId, { event: "threat_logs", data: await this.deps.sessionLog.threatLogs(sessionId) });
        return;
    }
  }

  private acceptUpload(
    sessionId: string,
    data: { image: string; timestamp?: number | string }
  ): { success: boolean; message: string } {
    if (!this.deps.frames) return { success: false, message: "Vision is disabled" };
    const image = decodeImage(data.image);
    if (!image) return { success: false, message: "Image could not be decoded" };
    const dropped = this.deps.frames.enqueue({ sessionId, image, capturedAt: frameTimestamp(data.timestamp, this.now()) });
    return { success: true, message: dropped ? "Image queued (older frame dropped)" : "Image queued" };
  }

  private lockFor(sessionId: string): AsyncMutex {
    let lock = this.turnLocks.get(sessionId);
    if (!lock) {
      lock = new AsyncMutex();
      this.turnLocks.set(sessionId, lock);
    }
    return lock;
  }

  private async acceptSocket(ws: WebSocket, req: IncomingMessage): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const doorId = url.searchParams.get("door")?.trim() || undefined;
    const conn: ClientConnection = {
      send: (frame) => {
        if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(frame));
      },
    };
    const sessionId = await this.openSession(conn, doorId);
    ws.on("message", (data) => {
      this.handleMessage(sessionId, data.toString()).catch((err: unknown) =>
        this.log.error({ event: "GATEWAY_MESSAGE_FAILED", sessionId, err: errorMessage(err) }, "Message handling failed")
      );
    });
    ws.on("close", () => {
      this.closeSession(sessionId).catch((err: unknown) =>
        this.log.warn({ event: "GATEWAY_CLOSE_FAILED", sessionId, err: errorMessage(err) }, "Session close failed")
      );
    });
    ws.on("error", (err) => this.log.warn({ event: "WS_ERROR_EVENT", sessionId, err: err.message }, "WebSocket error"));
  }
}
