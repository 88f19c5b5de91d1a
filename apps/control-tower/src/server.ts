import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import {
  createApiErrorResponse,
  createNormalizedError,
  createWorkflowEvent,
  errorMessage,
  normalizeUnknownError,
  type RollingMetrics,
  type WorkflowRunStatus,
} from "@sct/contracts";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { WebSocketObserver, type EventBroadcaster } from "./broadcaster.js";
import type { ControlTowerConfig } from "./config.js";
import type { RunRegistry } from "./run-registry.js";
import type { WorkflowOrchestrator } from "./workflow.js";

const serviceName = "control-tower";

export type ServerConfig = Pick<
  ControlTowerConfig,
  | "serviceVersion"
  | "visionAgentUrl"
  | "supplierAgentUrl"
  | "uploadMaxBytes"
  | "observerHeartbeatMs"
  | "observerMaxBufferedBytes"
>;

export type ControlTowerServerDeps = {
  config: ServerConfig;
  orchestrator: WorkflowOrchestrator;
  broadcaster: EventBroadcaster;
  registry: RunRegistry;
  metrics: RollingMetrics;
};

export type ControlTowerServer = {
  server: Server;
  listen(port: number): Promise<number>;
  /** Stops accepting uploads; observers stay connected until `close`. */
  beginDrain(): void;
  close(): Promise<void>;
};

type UploadBody = { bytes: Buffer; tooLarge: boolean; receivedBytes: number };

function writeJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

function writeHttpError(
  res: ServerResponse,
  statusCode: number,
  params: { code: string; message: string; details?: unknown },
): void {
  writeJson(
    res,
    statusCode,
    createApiErrorResponse({
      error: createNormalizedError(params),
      service: serviceName,
    }),
  );
}

/** Reads the whole body but stops buffering once it passes `maxBytes`. */
async function readUpload(req: IncomingMessage, maxBytes: number): Promise<UploadBody> {
  const chunks: Buffer[] = [];
  let receivedBytes = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    receivedBytes += buffer.length;
    if (receivedBytes <= maxBytes) {
      chunks.push(buffer);
    }
  }
  const tooLarge = receivedBytes > maxBytes;
  return { bytes: tooLarge ? Buffer.alloc(0) : Buffer.concat(chunks), tooLarge, receivedBytes };
}

function normalizeHttpPath(pathname: string): string {
  if (pathname.startsWith("/api/runs/")) {
    return "/api/runs/:runId";
  }
  return pathname;
}

function parseRunStatus(value: string | null): WorkflowRunStatus | undefined {
  return value === "running" || value === "completed" || value === "failed" ? value : undefined;
}

function parseLimit(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : undefined;
}

function rawDataToText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

/**
 * HTTP upload/status routes plus the `/ws` observer channel, sharing one
 * listener. Uploads start a run in the background and answer 202 at once.
 */
export function createControlTowerServer(deps: ControlTowerServerDeps): ControlTowerServer {
  const { config, orchestrator, broadcaster, registry, metrics } = deps;
  let draining = false;

  const server = createServer((req, res) => {
    const startedAt = Date.now();
    let operation = `${req.method ?? "UNKNOWN"} /unknown`;
    res.once("finish", () => {
      metrics.record(operation, Date.now() - startedAt, res.statusCode < 500);
    });

    void handleRequest(req, res, (name) => {
      operation = name;
    }).catch((error: unknown) => {
      const normalized = normalizeUnknownError(error, {
        defaultCode: "HTTP_INTERNAL_ERROR",
        defaultMessage: "control tower request failed",
      });
      console.error(`[control-tower] ${operation} failed: ${normalized.message} (trace ${normalized.traceId})`);
      if (res.headersSent) {
        res.end();
        return;
      }
      writeJson(res, 500, createApiErrorResponse({ error: normalized, service: serviceName }));
    });
  });

  async function handleRequest(
    req: IncomingMessage,
    res: ServerResponse,
    setOperation: (name: string) => void,
  ): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    setOperation(`${req.method ?? "UNKNOWN"} ${normalizeHttpPath(url.pathname)}`);

    if ((url.pathname === "/api/health" || url.pathname === "/healthz") && req.method === "GET") {
      writeJson(res, 200, {
        status: draining ? "draining" : "healthy",
        service: serviceName,
        version: config.serviceVersion,
        visionUrl: config.visionAgentUrl,
        supplierUrl: config.supplierAgentUrl,
        observers: broadcaster.size,
        activeRuns: registry.countActive(),
      });
      return;
    }

    if (url.pathname === "/metrics" && req.method === "GET") {
      writeJson(res, 200, { ok: true, service: serviceName, metrics: metrics.snapshot() });
      return;
    }

    if (url.pathname === "/api/analyze" && req.method === "POST") {
      if (draining) {
        req.resume();
        writeHttpError(res, 503, {
          code: "CONTROL_TOWER_DRAINING",
          message: "control tower is shutting down and does not accept uploads",
        });
        return;
      }
      const upload = await readUpload(req, config.uploadMaxBytes);
      if (upload.tooLarge) {
        writeHttpError(res, 413, {
          code: "UPLOAD_TOO_LARGE",
          message: `upload exceeds ${config.uploadMaxBytes} bytes`,
          details: { receivedBytes: upload.receivedBytes, maxBytes: config.uploadMaxBytes },
        });
        return;
      }
      if (upload.bytes.length === 0) {
        writeHttpError(res, 400, { code: "UPLOAD_EMPTY", message: "request body must contain image bytes" });
        return;
      }
      const handle = orchestrator.start(upload.bytes);
      writeJson(res, 202, {
        ok: true,
        status: "processing",
        runId: handle.runId,
        message: "Workflow started. Follow progress on the /ws channel.",
      });
      return;
    }

    if (url.pathname === "/api/runs" && req.method === "GET") {
      const runs = registry.listRuns({
        status: parseRunStatus(url.searchParams.get("status")),
        limit: parseLimit(url.searchParams.get("limit")),
      });
      writeJson(res, 200, { ok: true, data: runs, total: runs.length });
      return;
    }

    if (url.pathname.startsWith("/api/runs/") && req.method === "GET") {
      const runId = decodeURIComponent(url.pathname.slice("/api/runs/".length));
      const run = registry.getRun(runId);
      if (!run) {
        writeHttpError(res, 404, { code: "RUN_NOT_FOUND", message: "run not found", details: { runId } });
        return;
      }
      writeJson(res, 200, { ok: true, data: run });
      return;
    }

    writeHttpError(res, 404, {
      code: "HTTP_NOT_FOUND",
      message: "Not found",
      details: { method: req.method ?? "UNKNOWN", path: url.pathname },
    });
  }

  const wss = new WebSocketServer({ server, path: "/ws" });
  const alive = new WeakMap<WebSocket, boolean>();

  wss.on("connection", (socket) => {
    const observer = new WebSocketObserver({
      id: randomUUID(),
      socket,
      maxBufferedBytes: config.observerMaxBufferedBytes,
    });
    if (!broadcaster.register(observer)) {
      metrics.record("ws.connection", 0, false);
      return;
    }
    metrics.record("ws.connection", 0, true);
    alive.set(socket, true);
    console.log(`[control-tower] observer ${observer.id} connected (total=${broadcaster.size})`);

    socket.on("pong", () => {
      alive.set(socket, true);
    });

    socket.on("message", (data, isBinary) => {
      if (isBinary || rawDataToText(data) !== "ping") {
        return;
      }
      socket.send(JSON.stringify(createWorkflowEvent({ type: "pong", payload: {} })), (error) => {
        if (error) {
          console.warn(`[control-tower] pong to observer ${observer.id} failed: ${errorMessage(error)}`);
        }
      });
    });

    socket.on("close", () => {
      if (broadcaster.unregister(observer)) {
        console.log(`[control-tower] observer ${observer.id} disconnected (total=${broadcaster.size})`);
      }
    });

    socket.on("error", (error) => {
      console.warn(`[control-tower] observer ${observer.id} socket error: ${errorMessage(error)}`);
      broadcaster.unregister(observer);
    });
  });

  const heartbeat = setInterval(() => {
    for (const socket of wss.clients) {
      if (alive.get(socket) === false) {
        socket.terminate();
        continue;
      }
      alive.set(socket, false);
      socket.ping();
    }
  }, config.observerHeartbeatMs);
  heartbeat.unref();

  return {
    server,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, () => {
          server.off("error", reject);
          const address = server.address();
          resolve(typeof address === "object" && address !== null ? address.port : port);
        });
      });
    },
    beginDrain(): void {
      draining = true;
    },
    close(): Promise<void> {
      draining = true;
      clearInterval(heartbeat);
      broadcaster.close();
      for (const socket of wss.clients) {
        socket.terminate();
      }
      return new Promise((resolve, reject) => {
        wss.close(() => {
          server.close((error) => {
            if (error) {
              reject(error);
              return;
            }
            resolve();
          });
          server.closeAllConnections();
        });
      });
    },
  };
}
