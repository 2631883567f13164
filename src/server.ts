// Dictation daemon - Remote control surface (Express + WebSocket)
// HTTP endpoints and a WebSocket channel for starting and stopping dictation
// from other processes (a mouse-button helper, a phone, a status widget), plus
// a live feed of PTT lifecycle and gesture events.
//
// Privacy: no audio crosses this surface. Only states, events and the last
// transcription text are exposed, and the server binds wherever PORT says.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { TriggerSource } from "./types.js";
import type { ClientMessage, CommandResult, ServerMessage, TriggerKind } from "./types.js";
import type { NotificationHub, Unsubscribe } from "./notification-hub.js";
import { createCommand, type SessionOrchestrator } from "./session-orchestrator.js";
import type { MuteGate } from "./mute-gate.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

/** Mute gate owner used by POST /api/mute. */
export const MANUAL_MUTE_OWNER = "manual";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  orchestrator: SessionOrchestrator;
  hub: NotificationHub;
  /** Gate toggled by POST /api/mute; the endpoint answers 503 without one. */
  muteGate?: MuteGate;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { orchestrator, hub, muteGate, logger = createLogger("Server") } = options;

  const app = express();
  app.use(express.json());
  const httpServer = createServer(app);

  registerRoutes(app, orchestrator, muteGate, logger);

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });
  const connections = new Set<Unsubscribe>();
  let nextConnectionId = 1;

  wss.on("connection", (ws: WebSocket) => {
    const release = handleConnection(ws, nextConnectionId++, orchestrator, hub, logger);
    connections.add(release);
    ws.on("close", () => {
      release();
      connections.delete(release);
    });
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const release of connections) release();
        connections.clear();
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Routes ────────────────────────────────────────────────────────────────

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected handler promises; forward them to the error handler. */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function registerRoutes(app: Express, orchestrator: SessionOrchestrator, muteGate: MuteGate | undefined, logger: Logger): void {
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/recording/status", (_req, res) => {
    res.json(orchestrator.status());
  });

  const commandRoute = (kind: TriggerKind) =>
    asyncRoute(async (_req, res) => {
      const result = await orchestrator.execute(createCommand(kind, TriggerSource.REMOTE));
      res.status(result.occurred ? 200 : 409).json(result);
    });

  app.post("/api/recording/start", commandRoute("start"));
  app.post("/api/recording/stop", commandRoute("stop"));
  app.post("/api/recording/toggle", commandRoute("toggle"));

  app.post(
    "/api/recording/repeat",
    asyncRoute(async (_req, res) => {
      res.json({ repeated: await orchestrator.repeatLast() });
    }),
  );

  app.get("/api/transcription/last", (_req, res) => {
    const entry = orchestrator.lastTranscription();
    if (!entry) {
      res.status(404).json({ error: "No transcription yet" });
      return;
    }
    res.json(entry);
  });

  app.post(
    "/api/mute",
    asyncRoute(async (req, res) => {
      if (!muteGate) {
        res.status(503).json({ error: "No mute gate configured" });
        return;
      }
      const body: unknown = req.body;
      const muted = typeof body === "object" && body !== null && "muted" in body ? body.muted : undefined;
      if (typeof muted !== "boolean") {
        res.status(400).json({ error: "Body must be {\"muted\": boolean}" });
        return;
      }

      const changed = muted ? await muteGate.acquire(MANUAL_MUTE_OWNER) : await muteGate.release(MANUAL_MUTE_OWNER);
      const holder = await muteGate.holder();
      logger.info(`Manual mute ${muted ? "on" : "off"} requested (holder=${holder ?? "none"})`);
      res.status(muted && !changed ? 409 : 200).json({ muted: holder === MANUAL_MUTE_OWNER, holder });
    }),
  );

  // Express identifies error handlers by their four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = errorMessage(err);
    logger.error(`Request failed: ${message}`);
    res.status(500).json({ error: message });
  });
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

/** Subscribes the connection to the hub; returns the function that unsubscribes it. */
function handleConnection(
  ws: WebSocket,
  connectionId: number,
  orchestrator: SessionOrchestrator,
  hub: NotificationHub,
  logger: Logger,
): Unsubscribe {
  logger.info(`New WebSocket connection #${connectionId}`);

  // Send initial state
  sendMessage(ws, { type: "status", ...orchestrator.status() });

  const unsubscribers = [
    hub.ptt.subscribe((event) => sendMessage(ws, { type: "ptt_event", event }), `ws#${connectionId}`),
    hub.gestures.subscribe((event) => sendMessage(ws, { type: "gesture_event", event }), `ws#${connectionId}`),
  ];

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    if (isBinary) {
      sendMessage(ws, { type: "error", message: "Binary frames are not supported" });
      return;
    }

    let message: ClientMessage;
    try {
      message = parseClientMessage(data.toString());
    } catch (err) {
      sendMessage(ws, { type: "error", message: errorMessage(err) });
      return;
    }

    handleClientMessage(ws, message, orchestrator).catch((err: unknown) => {
      const msg = errorMessage(err);
      logger.error(`Error handling ${message.type} on connection #${connectionId}: ${msg}`);
      sendMessage(ws, { type: "error", message: msg });
    });
  });

  ws.on("close", () => {
    logger.info(`WebSocket #${connectionId} closed`);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error on connection #${connectionId}: ${err.message}`);
  });

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

/** @throws Error when the text is not a known client message. */
export function parseClientMessage(text: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new Error("Message is not valid JSON");
  }
  if (typeof data !== "object" || data === null || !("type" in data)) {
    throw new Error("Message must be an object with a \"type\" field");
  }

  const type = data.type;
  switch (type) {
    case "start_recording":
    case "stop_recording":
    case "toggle_recording":
      return { type };
    default:
      throw new Error(`Unknown message type: ${String(type)}`);
  }
}

async function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  orchestrator: SessionOrchestrator,
): Promise<void> {
  let kind: TriggerKind;
  switch (message.type) {
    case "start_recording":
      kind = "start";
      break;
    case "stop_recording":
      kind = "stop";
      break;
    case "toggle_recording":
      kind = "toggle";
      break;
    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unknown message type: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }

  const result: CommandResult = await orchestrator.execute(createCommand(kind, TriggerSource.REMOTE));
  sendMessage(ws, { type: "command_result", result });
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
