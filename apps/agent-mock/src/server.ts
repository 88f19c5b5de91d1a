import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { AGENT_CARD_PATHS, parseTaskRequest, type ReceivedTask } from "@sct/a2a";

export type MockSkill = {
  id: string;
  name: string;
  description?: string;
  tags?: string[];
};

export type MockAgentCard = {
  name: string;
  description?: string;
  version?: string;
  skills?: MockSkill[];
};

export type EnvelopeShape = "result" | "artifact" | "messages" | "task";

/** What the mock answers to one task. Every variant may be delayed. */
export type MockReply = { delayMs?: number } & (
  | { kind: "text"; text: string; envelope?: EnvelopeShape }
  | { kind: "status"; status: number; body?: string }
  | { kind: "rpcError"; code: number; message: string }
  | { kind: "raw"; body: unknown }
);

export type MockReplyHandler = (task: ReceivedTask) => MockReply | Promise<MockReply>;

export type MockAgentOptions = {
  port?: number;
  host?: string;
  /** A document to serve verbatim instead of a card built from `MockAgentCard`; null serves no card. */
  card: MockAgentCard | { document: unknown } | null;
  cardPath?: string;
  reply: MockReplyHandler;
  serviceName?: string;
};

export type MockAgent = {
  baseUrl: string;
  /** Tasks in arrival order. */
  received: ReceivedTask[];
  close(): Promise<void>;
};

function writeJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function textParts(text: string): Array<{ kind: "text"; text: string }> {
  return [{ kind: "text", text }];
}

/** Wraps reply text in one of the envelope layouts agents are known to emit. */
export function buildEnvelope(rpcId: string | number | null, text: string, shape: EnvelopeShape = "result"): Record<string, unknown> {
  switch (shape) {
    case "artifact":
      return { jsonrpc: "2.0", id: rpcId, artifact: { parts: textParts(text) } };
    case "messages":
      return { jsonrpc: "2.0", id: rpcId, messages: [{ role: "agent", parts: textParts(text) }] };
    case "task":
      return {
        jsonrpc: "2.0",
        id: rpcId,
        result: {
          kind: "task",
          id: randomUUID(),
          contextId: randomUUID(),
          status: { state: "completed" },
          artifacts: [{ artifactId: randomUUID(), parts: textParts(text) }],
        },
      };
    case "result":
      return {
        jsonrpc: "2.0",
        id: rpcId,
        result: {
          kind: "message",
          role: "agent",
          messageId: randomUUID(),
          parts: textParts(text),
        },
      };
  }
}

function buildCard(card: MockAgentCard, baseUrl: string): Record<string, unknown> {
  return {
    name: card.name,
    description: card.description ?? `${card.name} (mock)`,
    url: baseUrl,
    version: card.version ?? "0.1.0",
    protocolVersion: "0.3.0",
    defaultInputModes: ["text"],
    defaultOutputModes: ["text"],
    capabilities: { streaming: false },
    skills: (card.skills ?? []).map((skill) => ({
      id: skill.id,
      name: skill.name,
      description: skill.description ?? "",
      tags: skill.tags ?? [],
      examples: [],
    })),
  };
}

/**
 * Starts an in-process A2A agent on `port` (0 picks a free one). Serves a
 * discovery document, a JSON-RPC task endpoint at `/` and `/health`.
 */
export function startMockAgent(options: MockAgentOptions): Promise<MockAgent> {
  const serviceName = options.serviceName ?? "agent-mock";
  const cardPath = options.cardPath ?? AGENT_CARD_PATHS[0];
  const received: ReceivedTask[] = [];
  const timers = new Set<NodeJS.Timeout>();
  let baseUrl = "";

  const wait = (ms: number): Promise<void> =>
    new Promise((resolve) => {
      const timer = setTimeout(() => {
        timers.delete(timer);
        resolve();
      }, ms);
      timers.add(timer);
    });

  async function handleTask(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await readBody(req);
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      writeJson(res, 200, { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } });
      return;
    }
    const task = parseTaskRequest(body);
    if (!task) {
      writeJson(res, 200, { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } });
      return;
    }
    received.push(task);

    const reply = await options.reply(task);
    if (reply.delayMs && reply.delayMs > 0) {
      await wait(reply.delayMs);
    }
    if (res.destroyed) {
      return;
    }
    switch (reply.kind) {
      case "text":
        writeJson(res, 200, buildEnvelope(task.rpcId, reply.text, reply.envelope));
        return;
      case "status":
        res.statusCode = reply.status;
        res.setHeader("Content-Type", "text/plain");
        res.end(reply.body ?? "");
        return;
      case "rpcError":
        writeJson(res, 200, { jsonrpc: "2.0", id: task.rpcId, error: { code: reply.code, message: reply.message } });
        return;
      case "raw":
        writeJson(res, 200, reply.body);
        return;
    }
  }

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health" && req.method === "GET") {
      writeJson(res, 200, { status: "healthy", service: serviceName, tasks: received.length });
      return;
    }

    if (url.pathname === cardPath && req.method === "GET" && options.card) {
      writeJson(res, 200, "document" in options.card ? options.card.document : buildCard(options.card, baseUrl));
      return;
    }

    if (url.pathname === "/" && req.method === "POST") {
      handleTask(req, res).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : "mock agent failed";
        console.error(`[${serviceName}] task handler failed: ${message}`);
        if (!res.headersSent) {
          writeJson(res, 500, { ok: false, service: serviceName, error: message });
        }
      });
      return;
    }

    writeJson(res, 404, { ok: false, service: serviceName, error: "Not found", path: url.pathname });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    const host = options.host ?? "127.0.0.1";
    server.listen(options.port ?? 0, host, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port ?? 0;
      baseUrl = `http://${host.includes(":") ? "localhost" : host}:${port}`;
      resolve({
        baseUrl,
        received,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            for (const timer of timers) {
              clearTimeout(timer);
            }
            timers.clear();
            server.close((error) => {
              if (error) {
                rejectClose(error);
                return;
              }
              resolveClose();
            });
            server.closeAllConnections();
          }),
      });
    });
  });
}
