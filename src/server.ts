// Multimodal Risk Triage - HTTP API and WebSocket status push
//
// REST:
//   POST /api/requests               raw video body, X-Filename header → 202 {id, state} | 422
//   GET  /api/requests/:id           status (+ report once completed)
//   GET  /api/requests/:id/report    report | 409 while still in flight
//   GET  /api/requests/:id/frames/:f evidence frame image
//   POST /api/requests/:id/cancel
//   GET  /health
//
// WebSocket: clients send {type:"subscribe", requestId} and receive a
// {type:"status"} message on subscribe and after every persisted transition.

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { NotFoundError, PipelineError, ValidationError, errorMessage } from "./errors.js";
import type { IngestGate } from "./ingest-gate.js";
import { toStatus, type JobOrchestrator } from "./job-orchestrator.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { RequestStore } from "./request-store.js";
import type { PipelineScheduler } from "./scheduler.js";
import { RequestState, type ClientMessage, type ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Default upload ceiling for the raw body parser (matches the ingest default). */
const DEFAULT_BODY_LIMIT_BYTES = 500 * 1024 * 1024;

const FRAME_NAME = /^frame-\d{3}\.jpg$/;

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  VERSION_CONFLICT: 409,
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  ingest: Pick<IngestGate, "ingest">;
  store: Pick<RequestStore, "getReport" | "artifactPath">;
  orchestrator: Pick<JobOrchestrator, "getStatus" | "cancel" | "onTransition">;
  scheduler: Pick<PipelineScheduler, "schedule">;
  /** Largest accepted request body. */
  bodyLimitBytes?: number;
  /** Directory of static files to serve, if any. */
  staticDir?: string;
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
 * Creates the Express app, HTTP server and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { ingest, store, orchestrator, scheduler } = options;
  const logger = options.logger ?? createLogger("Server");

  const app = express();
  const httpServer = createServer(app);

  if (options.staticDir) {
    app.use(express.static(options.staticDir));
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/api/requests",
    express.raw({ type: () => true, limit: options.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES }),
    route(async (req, res) => {
      const filename = req.get("X-Filename")?.trim();
      if (!filename) {
        throw new ValidationError("X-Filename header is required");
      }
      const data = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const request = await ingest.ingest({ data, originalFilename: path.basename(filename) });

      if (request.state === RequestState.FAILED) {
        res.status(422).json({ id: request.id, state: request.state, failure: request.failure });
        return;
      }
      scheduler.schedule(request.id);
      res.status(202).json({ id: request.id, state: request.state });
    }),
  );

  app.get(
    "/api/requests/:id",
    route(async (req, res) => {
      const status = await orchestrator.getStatus(req.params.id);
      const report = status.state === RequestState.COMPLETED ? await store.getReport(status.id) : null;
      res.json({ status, report });
    }),
  );

  app.get(
    "/api/requests/:id/report",
    route(async (req, res) => {
      const status = await orchestrator.getStatus(req.params.id);
      const report = status.state === RequestState.COMPLETED ? await store.getReport(status.id) : null;
      if (report) {
        res.json(report);
        return;
      }
      res.status(409).json({
        error: "NOT_READY",
        message: `Request ${status.id} has no report (state "${status.state}")`,
      });
    }),
  );

  app.get(
    "/api/requests/:id/frames/:name",
    route(async (req, res) => {
      const { id, name } = req.params;
      if (!FRAME_NAME.test(name)) {
        throw new ValidationError(`Invalid frame name: "${name}"`);
      }
      const file = path.resolve(store.artifactPath(id, `frames/${name}`));
      await new Promise<void>((resolve, reject) => {
        res.sendFile(file, (err) => {
          if (err) reject(new NotFoundError(`Frame not found: ${id}/${name}`));
          else resolve();
        });
      });
    }),
  );

  app.post(
    "/api/requests/:id/cancel",
    route(async (req, res) => {
      const cancelled = await orchestrator.cancel(req.params.id);
      res.json({ status: toStatus(cancelled) });
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      logger.error(`Request failed: ${body.message}`);
    }
    res.status(status).json(body);
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });
  const subscriptions: Map<WebSocket, Set<string>> = new Map();

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, subscriptions, orchestrator, logger);
  });

  const unsubscribe = orchestrator.onTransition((request) => {
    const message: ServerMessage = { type: "status", status: toStatus(request) };
    for (const [ws, ids] of subscriptions) {
      if (ids.has(request.id)) sendMessage(ws, message);
    }
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      unsubscribe();
      return new Promise((resolve, reject) => {
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

// ─── HTTP helpers ───────────────────────────────────────────────────────────────

/** Forwards a rejected handler promise to the error middleware. */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export interface ErrorBody {
  error: string;
  message: string;
}

/** Maps an error to the HTTP status and `{error, message}` body. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof PipelineError) {
    return { status: STATUS_BY_CODE[err.code] ?? 500, body: { error: err.code, message: err.message } };
  }
  // body-parser errors carry their own status
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    if (err.status === 413) {
      return { status: 413, body: { error: "TOO_LARGE", message: "Upload exceeds the size limit" } };
    }
    if (err.status >= 400 && err.status < 500) {
      return { status: err.status, body: { error: "BAD_REQUEST", message: errorMessage(err) } };
    }
  }
  return { status: 500, body: { error: "INTERNAL_ERROR", message: errorMessage(err) } };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  subscriptions: Map<WebSocket, Set<string>>,
  orchestrator: Pick<JobOrchestrator, "getStatus">,
  logger: Logger,
): void {
  const ids: Set<string> = new Set();
  subscriptions.set(ws, ids);

  ws.on("message", (data: RawData, isBinary: boolean) => {
    let message: ClientMessage;
    try {
      if (isBinary) {
        throw new ValidationError("Binary frames are not accepted");
      }
      message = parseClientMessage(rawToText(data));
    } catch (err) {
      sendMessage(ws, { type: "error", message: errorMessage(err) });
      return;
    }

    const { requestId } = message;
    switch (message.type) {
      case "subscribe":
        ids.add(requestId);
        orchestrator
          .getStatus(requestId)
          .then((status) => sendMessage(ws, { type: "status", status }))
          .catch((err: unknown) => {
            ids.delete(requestId);
            sendMessage(ws, { type: "error", message: errorMessage(err) });
          });
        break;

      case "unsubscribe":
        ids.delete(requestId);
        break;
    }
  });

  ws.on("close", () => {
    subscriptions.delete(ws);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error: ${err.message}`);
    subscriptions.delete(ws);
  });
}

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/**
 * Parses and validates a client message.
 * @throws ValidationError for malformed JSON, an unknown type or a missing requestId.
 */
export function parseClientMessage(text: string): ClientMessage {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new ValidationError("Message is not valid JSON");
  }
  if (typeof value !== "object" || value === null || !("type" in value)) {
    throw new ValidationError("Message must be an object with a type");
  }
  const type = value.type;
  if (type !== "subscribe" && type !== "unsubscribe") {
    throw new ValidationError(`Unknown message type: ${String(type)}`);
  }
  const requestId = "requestId" in value ? value.requestId : undefined;
  if (typeof requestId !== "string" || requestId === "") {
    throw new ValidationError(`${type} requires a requestId`);
  }
  return { type, requestId };
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
