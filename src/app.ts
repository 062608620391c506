/**
 * Composition root: builds every component from config and wires the three contexts
 * (capture timer, vision consumer, orchestrator loop) together through bounded queues.
 */

import type pino from "pino";
import type { AppConfig } from "./config";
import type { LlmHandles } from "./adapters/llm";
import { createLlmHandles } from "./adapters/llm";
import type { INotifier } from "./adapters/notify";
import { createNotifier } from "./adapters/notify";
import type { IVisionClassifier } from "./adapters/vision";
import { createVisionClassifier } from "./adapters/vision";
import { EventDispatcher } from "./bridge/event-dispatcher";
import { StateBridge } from "./bridge/state-bridge";
import type { UpdateRequest } from "./bridge/types";
import { BoundedQueue } from "./concurrency/bounded-queue";
import { ContactDirectory } from "./directory/contacts";
import { EmployeeDirectory } from "./directory/employees";
import { GateGateway } from "./gateway/server";
import { logger as rootLogger } from "./logging";
import { createCompactor } from "./memory/compactor";
import { recordQueueDrop } from "./metrics";
import { DecisionEngine } from "./pipeline/decision";
import { createNodes } from "./pipeline/nodes";
import { Orchestrator } from "./pipeline/orchestrator";
import { SafetyGate } from "./pipeline/safety";
import {
  CAMERA_NO_FACE_INSTRUCTION,
  ESCALATION_TURN_INPUT,
  FAREWELL_MESSAGE,
  GREETING_MESSAGE,
} from "./prompts/gate";
import { PromptManager } from "./prompts/prompt-manager";
import { SessionLog } from "./session/log";
import { SessionStore } from "./session/store";
import { VisionAnalyzer } from "./vision/analyzer";
import type { IFrameSource } from "./vision/capture";
import { CaptureProducer, FileFrameSource } from "./vision/capture";
import { VisionPipeline } from "./vision/pipeline";
import type { CapturedFrame, VisionEvent } from "./vision/types";

/** Collaborators tests (or alternative deployments) can swap in. */
export interface GateAppOverrides {
  llm?: LlmHandles;
  visionClassifier?: IVisionClassifier;
  notifier?: INotifier;
  contacts?: ContactDirectory;
  employees?: EmployeeDirectory;
  frameSource?: IFrameSource;
  log?: pino.Logger;
}

export interface GateApp {
  store: SessionStore;
  sessionLog: SessionLog;
  orchestrator: Orchestrator;
  gateway: GateGateway;
  bridge: StateBridge;
  dispatcher: EventDispatcher;
  /** Present when vision is enabled. */
  vision?: VisionPipeline;
  frames?: BoundedQueue<CapturedFrame>;
  capture?: CaptureProducer;
  /** Start the loops and the gateway. */
  start(): Promise<void>;
  stop(): Promise<void>;
}

function queue<T>(name: string, capacity: number): BoundedQueue<T> {
  return new BoundedQueue<T>({ name, capacity, onDrop: (_item, total) => recordQueueDrop(name, total) });
}

export function createGateApp(config: AppConfig, overrides: GateAppOverrides = {}): GateApp {
  const log = overrides.log ?? rootLogger;
  const prompts = new PromptManager();
  const llm = overrides.llm ?? createLlmHandles(config);
  const contacts = overrides.contacts ?? ContactDirectory.fromFile(config.data.contactsPath);
  const employees = overrides.employees ?? EmployeeDirectory.fromFile(config.data.employeesPath);
  const notifier = overrides.notifier ?? createNotifier(config, contacts);
  const timeoutMs = config.llm.timeoutMs;

  const store = new SessionStore({ systemPrompt: prompts.systemPrompt, initialActive: !config.vision.enabled });
  const sessionLog = new SessionLog({ dir: config.data.logsDir, maxEntries: config.data.sessionLogMaxEntries });

  const compactor = createCompactor(
    config.conversation.historyMode,
    { llm: llm.summary, prompts, timeoutMs, log },
    { minMessages: config.conversation.compactMinMessages, keepLast: config.conversation.shortenKeepLast }
  );
  const decisions = new DecisionEngine({ llm: llm.decision, prompts, employees, timeoutMs, log });
  const nodes = createNodes({
    llm,
    prompts,
    contacts,
    employees,
    compactor,
    decisions,
    notifier,
    safety: new SafetyGate(),
    sessionLog,
    maxHumanMessages: config.conversation.maxHumanMessages,
    timeoutMs,
    log,
  });
  const orchestrator = new Orchestrator(store, nodes, { stepLimit: config.conversation.stepLimit }, {
    onAgentReply: (sessionId, text) => log.info({ event: "AGENT_REPLY", sessionId, textLength: text.length }, "Agent replied"),
  }, log);

  const frames = config.vision.enabled ? queue<CapturedFrame>("frames", config.vision.frameQueueSize) : undefined;
  const updates = queue<UpdateRequest>("bridge", config.bridge.queueSize);
  const events = queue<VisionEvent>("events", config.bridge.eventQueueSize);

  let vision: VisionPipeline | undefined;

  const gateway = new GateGateway(
    { store, orchestrator, sessionLog, frames, log, onSessionClosed: (sessionId) => vision?.forget(sessionId) },
    { port: config.server.port }
  );

  const bridge = new StateBridge(
    store,
    updates,
    {
      batchSize: config.bridge.batchSize,
      maxAttempts: config.bridge.maxAttempts,
      pollIntervalMs: config.bridge.pollIntervalMs,
    },
    {
      onEdge: (sessionId, edge) => {
        const active = edge === "activated";
        gateway.send(sessionId, { event: "session_update", data: { session_active: active } });
        gateway.send(sessionId, {
          event: "chat_response",
          data: { agent_response: active ? GREETING_MESSAGE : FAREWELL_MESSAGE, session_complete: !active },
        });
      },
    },
    log
  );

  const dispatcher = new EventDispatcher(
    events,
    {
      onNoFace: (event) => {
        gateway.send(event.sessionId, { event: "camera_instruction", data: { message: CAMERA_NO_FACE_INSTRUCTION } });
      },
      onEscalation: async (event) => {
        // The vision update that triggered this must be in the store before the turn reads it.
        await bridge.drainOnce();
        await gateway.submitTurn(event.sessionId, ESCALATION_TURN_INPUT);
      },
    },
    { batchSize: config.bridge.eventBatchSize, pollIntervalMs: config.bridge.eventPollIntervalMs },
    log
  );

  let capture: CaptureProducer | undefined;
  if (frames) {
    const analyzer = new VisionAnalyzer({
      classifier: overrides.visionClassifier ?? createVisionClassifier(config),
      prompts,
      timeoutMs: config.vision.timeoutMs,
      log,
    });
    vision = new VisionPipeline(
      { frames, events, analyzer, bridge, sessionLog, log },
      {
        faceWindowSize: config.vision.faceWindowSize,
        escalationCooldownMs: config.vision.escalationCooldownMs,
        pollIntervalMs: config.vision.pollIntervalMs,
      }
    );
    const framePath = config.vision.captureFramePath;
    const source = overrides.frameSource ?? (framePath ? new FileFrameSource(framePath) : undefined);
    if (source) {
      const doorId = config.vision.captureDoorId;
      capture = new CaptureProducer(
        {
          source,
          frames,
          log,
          resolveSession: () => {
            if (doorId) return store.findByDoor(doorId);
            const ids = store.sessionIds();
            return ids[ids.length - 1];
          },
        },
        config.vision.captureIntervalMs
      );
    }
  }

  return {
    store,
    sessionLog,
    orchestrator,
    gateway,
    bridge,
    dispatcher,
    vision,
    frames,
    capture,
    async start() {
      bridge.start();
      dispatcher.start();
      vision?.start();
      capture?.start();
      await gateway.start();
    },
    async stop() {
      capture?.stop();
      vision?.stop();
      dispatcher.stop();
      bridge.stop();
      await gateway.stop();
    },
  };
}
