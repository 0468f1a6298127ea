// Interview Coach Engine - HTTP API and WebSocket Server
//
// Thin façade over CoachingEngine. REST callers address sessions by id; a
// WebSocket connection owns exactly one session for its lifetime, which keeps
// ticks for that session in arrival order.
//
// Session data lives in server memory only.

import express, { type ErrorRequestHandler, type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { CoachingEngine } from "./coaching-engine.js";
import type { ClientMessage, RuleConfig, ServerMessage } from "./types.js";
import { ConfigLoadError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";
import { errorMessage, isRecord } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Largest accepted request body. */
const MAX_BODY_SIZE = "256kb";

/** Default idle timeout before a session is dropped (15 minutes). */
const DEFAULT_IDLE_TIMEOUT_MS = 15 * 60 * 1000;

/** Default interval between idle-session sweeps (1 minute). */
const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  engine: CoachingEngine;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Loader used by POST /api/v1/rules/reload. The route answers 404 without one. */
  loadRules?: () => Promise<RuleConfig>;
  sessionIdleTimeoutMs?: number;
  sessionSweepIntervalMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  engine: CoachingEngine;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    engine,
    logger = defaultLogger,
    loadRules,
    sessionIdleTimeoutMs = DEFAULT_IDLE_TIMEOUT_MS,
    sessionSweepIntervalMs = DEFAULT_SWEEP_INTERVAL_MS,
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      sessions: engine.sessionCount,
      states: engine.currentConfig().states.length,
    });
  });

  app.post("/api/v1/sessions", (_req, res) => {
    res.status(201).json(engine.createSession());
  });

  app.post("/api/v1/sessions/:sessionId/ingest", (req, res) => {
    res.json(engine.ingest(req.params.sessionId, req.body));
  });

  app.delete("/api/v1/sessions/:sessionId", (req, res) => {
    if (engine.closeSession(req.params.sessionId)) {
      res.status(204).end();
    } else {
      res.status(404).json({ error: `Session not found: ${req.params.sessionId}` });
    }
  });

  app.post("/api/v1/rules/reload", (_req, res) => {
    if (!loadRules) {
      res.status(404).json({ error: "Rule reload is not enabled" });
      return;
    }
    engine.reloadRules(loadRules).then(
      (config) => {
        res.json({ states: config.states.length, defaultStateId: config.defaultStateId });
      },
      (err: unknown) => {
        if (err instanceof ConfigLoadError) {
          res.status(422).json({ error: err.message, stateId: err.stateId, field: err.field });
        } else {
          res.status(500).json({ error: errorMessage(err) });
        }
      },
    );
  });

  const handleError: ErrorRequestHandler = (err, req, res, _next) => {
    const status = isRecord(err) && typeof err.status === "number" ? err.status : 500;
    if (status >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
    } else {
      logger.warn(`${req.method} ${req.path} rejected (${status}): ${errorMessage(err)}`);
    }
    res.status(status).json({ error: status >= 500 ? "Internal server error" : errorMessage(err) });
  };
  app.use(handleError);

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, engine, logger);
  });

  let sweepTimer: ReturnType<typeof setInterval> | null = null;

  return {
    app,
    httpServer,
    wss,
    engine,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          sweepTimer = setInterval(() => {
            engine.pruneIdleSessions(sessionIdleTimeoutMs);
          }, sessionSweepIntervalMs);
          sweepTimer.unref();
          resolve();
        });
      });
    },
    close(): Promise<void> {
      if (sweepTimer) {
        clearInterval(sweepTimer);
        sweepTimer = null;
      }
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          if (!httpServer.listening) {
            resolve();
            return;
          }
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, engine: CoachingEngine, logger: Logger): void {
  // Each WebSocket connection gets its own session
  const opening = engine.createSession();
  const sessionId = opening.sessionId;
  let sessionOpen = true;

  logger.info(`New WebSocket connection, session ${sessionId}`);
  sendMessage(ws, { type: "session_started", sessionId, stateId: opening.stateId });

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    if (isBinary) {
      sendMessage(ws, {
        type: "error",
        message: "Binary frames are not supported; send signal samples as JSON text.",
        recoverable: true,
      });
      return;
    }

    try {
      const message = parseClientMessage(JSON.parse(rawDataToString(data)));
      if (message === null) {
        sendMessage(ws, {
          type: "error",
          message: 'Message must be a JSON object with a known "type" (signal_sample, close_session).',
          recoverable: true,
        });
        return;
      }
      handleClientMessage(ws, message, sessionId, engine, () => {
        sessionOpen = false;
      });
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Error handling message for session ${sessionId}: ${message}`);
      sendMessage(ws, { type: "error", message, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${sessionId}`);
    if (sessionOpen) engine.closeSession(sessionId);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionId}: ${err.message}`);
  });
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/** Validates an inbound frame; returns null for anything outside the protocol. */
export function parseClientMessage(value: unknown): ClientMessage | null {
  if (!isRecord(value)) return null;
  switch (value.type) {
    case "signal_sample":
      return { type: "signal_sample", sample: value.sample };
    case "close_session":
      return { type: "close_session" };
    default:
      return null;
  }
}

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  sessionId: string,
  engine: CoachingEngine,
  markClosed: () => void,
): void {
  switch (message.type) {
    case "signal_sample":
      sendMessage(ws, { type: "coaching", response: engine.ingest(sessionId, message.sample) });
      break;

    case "close_session":
      engine.closeSession(sessionId);
      markClosed();
      sendMessage(ws, { type: "session_closed", sessionId });
      ws.close();
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
