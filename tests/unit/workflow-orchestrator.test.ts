import test from "node:test";
import assert from "node:assert/strict";
import {
  CallError,
  DiscoveryError,
  PayloadError,
  RollingMetrics,
  type WorkflowEvent,
  type WorkflowEventPayloads,
  type WorkflowEventType,
} from "../../shared/contracts/src/index.js";
import {
  decodeTaskResponse,
  parseAgentDescriptor,
  readTextPayloads,
  type AgentDescriptor,
  type AgentTransport,
  type SendOptions,
  type TaskRequest,
  type TaskResponse,
} from "../../shared/a2a/src/index.js";
import type { EventPublisher, PublishReport } from "../../apps/control-tower/src/broadcaster.js";
import type { PayloadPreparer } from "../../apps/control-tower/src/payload.js";
import { RunRegistry } from "../../apps/control-tower/src/run-registry.js";
import { WorkflowOrchestrator, type WorkflowConfig } from "../../apps/control-tower/src/workflow.js";

const VISION_URL = "http://vision.test";
const SUPPLIER_URL = "http://supplier.test";
const PREPARED_BYTES = Buffer.from("prepared-jpeg");

const ANALYSIS_TEXT = "import cv2\nCode output: 2 boxes\n\nSearch terms: cardboard box";
const DETECTION_TEXT = '[BOUNDING_BOXES][{"box_2d":[10,20,30,40],"label":"box"}][/BOUNDING_BOXES]';
const SUPPLIER_TEXT = '{"part":"Cardboard box","supplier":"Northwind Packaging","match_confidence":0.9}';

type Payload = Record<string, unknown>;
type AgentHandler = (payload: Payload, options: SendOptions, request: TaskRequest) => Promise<string>;

type SentTask = {
  agent: "vision" | "supplier";
  payload: Payload;
  request: TaskRequest;
};

class FakeAgents implements AgentTransport {
  readonly discovered: string[] = [];
  readonly sent: SentTask[] = [];

  constructor(
    private readonly handlers: {
      discover?: (baseUrl: string) => Promise<void>;
      vision?: AgentHandler;
      supplier?: AgentHandler;
    },
  ) {}

  async discover(baseUrl: string): Promise<AgentDescriptor> {
    this.discovered.push(baseUrl);
    await this.handlers.discover?.(baseUrl);
    return parseAgentDescriptor(baseUrl, {
      name: baseUrl === VISION_URL ? "Vision Agent" : "Supplier Agent",
      version: "2.0.0",
      skills: [{ id: "main" }],
    });
  }

  async send(descriptor: AgentDescriptor, request: TaskRequest, options: SendOptions): Promise<TaskResponse> {
    const agent = descriptor.baseUrl === VISION_URL ? "vision" : "supplier";
    const payload = readTextPayloads(request)[0] ?? {};
    this.sent.push({ agent, payload, request });
    const handler = agent === "vision" ? this.handlers.vision ?? defaultVision : this.handlers.supplier ?? defaultSupplier;
    const text = await handler(payload, options, request);
    return decodeTaskResponse({ jsonrpc: "2.0", id: this.sent.length, result: { parts: [{ kind: "text", text }] } });
  }
}

function defaultVision(payload: Payload): Promise<string> {
  return Promise.resolve(payload.mode === "detect" ? DETECTION_TEXT : ANALYSIS_TEXT);
}

function defaultSupplier(): Promise<string> {
  return Promise.resolve(SUPPLIER_TEXT);
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new CallError("call was cancelled"));
      },
      { once: true },
    );
  });
}

class RecordingPublisher implements EventPublisher {
  readonly events: WorkflowEvent[] = [];
  readonly timestamps: number[] = [];

  publish(event: WorkflowEvent): PublishReport {
    this.events.push(event);
    this.timestamps.push(Date.now());
    return { delivered: 1, dropped: 0 };
  }

  types(): WorkflowEventType[] {
    return this.events.map((event) => event.type);
  }

  timeOf(type: WorkflowEventType): number {
    const index = this.events.findIndex((event) => event.type === type);
    const at = this.timestamps[index];
    assert.ok(at !== undefined, `missing ${type}`);
    return at;
  }

  payload<TType extends WorkflowEventType>(type: TType): WorkflowEventPayloads[TType] {
    const found = this.events.find((event): event is WorkflowEvent<TType> => event.type === type);
    assert.ok(found, `missing ${type}`);
    return found.payload;
  }
}

const fakePreparer: PayloadPreparer = async (input) => ({
  bytes: PREPARED_BYTES,
  mimeType: "image/jpeg",
  width: 640,
  height: 480,
  quality: 85,
  maxDimension: 1024,
  withinBudget: true,
  originalBytes: input.length,
  attempts: [{ maxDimension: 1024, quality: 85, sizeBytes: PREPARED_BYTES.length }],
});

function createHarness(params: {
  agents?: FakeAgents;
  config?: Partial<WorkflowConfig>;
  preparePayload?: PayloadPreparer;
}) {
  const publisher = new RecordingPublisher();
  const agents = params.agents ?? new FakeAgents({});
  const registry = new RunRegistry({ retentionMs: 60_000, maxEntries: 50 });
  const metrics = new RollingMetrics();
  const orchestrator = new WorkflowOrchestrator({
    config: {
      visionAgentUrl: VISION_URL,
      supplierAgentUrl: SUPPLIER_URL,
      callTimeoutMs: 2_000,
      phasePauseMs: 0,
      payloadMaxBytes: 500 * 1024,
      searchQueryMaxChars: 200,
      structureQueryEnabled: false,
      imagePartMode: "json",
      progressDelaysMs: [10_000, 20_000, 30_000],
      ...params.config,
    },
    agents,
    publisher,
    preparePayload: params.preparePayload ?? fakePreparer,
    registry,
    metrics,
  });
  return { orchestrator, publisher, agents, registry, metrics };
}

const IMAGE = Buffer.from("raw-upload-bytes");

test("workflow emits the full event sequence and places an order", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const { orchestrator, publisher, agents, registry, metrics } = createHarness({});

  const result = await orchestrator.run(IMAGE, "run-happy");

  assert.deepEqual(publisher.types(), [
    "upload_complete",
    "discovery_start",
    "discovery_complete",
    "vision_start",
    "vision_complete",
    "thinking_update",
    "discovery_start",
    "discovery_complete",
    "memory_start",
    "memory_complete",
    "thinking_update",
    "order_placed",
  ]);
  assert.ok(publisher.events.every((event) => event.runId === "run-happy"));
  assert.deepEqual(agents.discovered, [VISION_URL, SUPPLIER_URL]);

  assert.deepEqual(publisher.payload("upload_complete"), {
    message: "Image uploaded successfully",
    sizeBytes: IMAGE.length,
  });
  assert.deepEqual(publisher.payload("discovery_complete"), {
    agent: "vision",
    message: "Vision Agent discovered: Vision Agent",
    agentName: "Vision Agent",
    version: "2.0.0",
    skills: ["main"],
  });
  assert.deepEqual(publisher.payload("vision_complete"), {
    message: "Vision analysis complete",
    result: ANALYSIS_TEXT,
    codeOutput: "2 boxes",
    boxes: [{ box_2d: [10, 20, 30, 40], label: "box" }],
    detection: DETECTION_TEXT,
    payloadBytes: PREPARED_BYTES.length,
  });
  assert.equal(publisher.payload("thinking_update").steps.length, 4);
  assert.deepEqual(publisher.payload("memory_start"), {
    message: "Querying inventory with vector search...",
    details: "Search query: cardboard box",
    query: "cardboard box",
    querySource: "marker",
  });
  assert.deepEqual(publisher.payload("memory_complete"), {
    message: "Match found: Cardboard box",
    part: "Cardboard box",
    supplier: "Northwind Packaging",
    confidence: "0.9",
  });

  const order = publisher.payload("order_placed");
  assert.match(order.orderId, /^#9\d{3}$/);
  assert.equal(order.message, `Order ${order.orderId} placed autonomously`);
  assert.equal(order.supplier, "Northwind Packaging");

  const visionTasks = agents.sent.filter((task) => task.agent === "vision");
  assert.deepEqual(
    visionTasks.map((task) => task.payload.mode).sort(),
    ["analyze", "detect"],
  );
  for (const task of visionTasks) {
    assert.equal(task.payload.image_base64, PREPARED_BYTES.toString("base64"));
  }
  assert.deepEqual(
    agents.sent.filter((task) => task.agent === "supplier").map((task) => task.payload),
    [{ query: "cardboard box" }],
  );

  assert.equal(result.status, "completed");
  assert.equal(result.outcome, "order_placed");
  assert.equal(result.orderId, order.orderId);
  assert.equal(result.phase, "action_taken");
  assert.equal(registry.getRun("run-happy")?.status, "completed");
  assert.equal(registry.getRun("run-happy")?.orderId, order.orderId);
  assert.ok(metrics.snapshot().operations.some((operation) => operation.operation === "workflow.vision_analysis"));
});

test("analysis and detection calls run concurrently", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const agents = new FakeAgents({
    vision: async (payload) => {
      await delay(payload.mode === "detect" ? 90 : 100);
      return defaultVision(payload);
    },
  });
  const { orchestrator, publisher } = createHarness({ agents });

  await orchestrator.run(IMAGE);

  const elapsed = publisher.timeOf("vision_complete") - publisher.timeOf("vision_start");
  assert.ok(elapsed >= 95, `vision phase finished too early: ${elapsed}ms`);
  assert.ok(elapsed < 170, `vision calls look sequential: ${elapsed}ms`);
});

test("vision discovery failure stops the run before any supplier activity", async (t) => {
  t.mock.method(console, "log", () => undefined);
  t.mock.method(console, "error", () => undefined);
  const agents = new FakeAgents({
    discover: async (baseUrl) => {
      if (baseUrl === VISION_URL) {
        throw new DiscoveryError(baseUrl, `agent at ${baseUrl} is unreachable: connect ECONNREFUSED`);
      }
    },
  });
  const { orchestrator, publisher, registry } = createHarness({ agents });

  const result = await orchestrator.run(IMAGE, "run-no-vision");

  assert.deepEqual(publisher.types(), ["upload_complete", "discovery_start", "vision_error"]);
  assert.deepEqual(publisher.payload("vision_error"), {
    message: `Vision Agent error: agent at ${VISION_URL} is unreachable: connect ECONNREFUSED`,
    error: `agent at ${VISION_URL} is unreachable: connect ECONNREFUSED`,
    code: "AGENT_DISCOVERY_FAILED",
    phase: "vision_discovery",
  });
  assert.deepEqual(agents.discovered, [VISION_URL]);
  assert.equal(agents.sent.length, 0);
  assert.equal(result.status, "failed");
  assert.equal(result.outcome, "vision_failed");
  assert.equal(registry.getRun("run-no-vision")?.error, `agent at ${VISION_URL} is unreachable: connect ECONNREFUSED`);
});

test("progress events stop as soon as the analysis reply arrives", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const agents = new FakeAgents({
    vision: async (payload) => {
      if (payload.mode === "analyze") {
        await delay(80);
      }
      return defaultVision(payload);
    },
  });
  const { orchestrator, publisher } = createHarness({ agents, config: { progressDelaysMs: [10, 30, 250] } });

  await orchestrator.run(IMAGE);
  await delay(300);

  const types = publisher.types();
  const progress = publisher.events.filter((event): event is WorkflowEvent<"vision_progress"> => event.type === "vision_progress");
  assert.deepEqual(
    progress.map((event) => [event.payload.stage, event.payload.step, event.payload.totalSteps]),
    [
      ["generating", 1, 3],
      ["executing", 2, 3],
    ],
  );
  assert.ok(types.lastIndexOf("vision_progress") < types.indexOf("vision_complete"));
});

test("unparseable supplier text completes the run without an order", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const warn = t.mock.method(console, "warn", () => undefined);
  const agents = new FakeAgents({ supplier: async () => "Acme Corp stocks cardboard boxes" });
  const { orchestrator, publisher } = createHarness({ agents });

  const result = await orchestrator.run(IMAGE);

  assert.deepEqual(publisher.types().slice(-2), ["memory_start", "memory_complete"]);
  assert.deepEqual(publisher.payload("memory_complete"), {
    message: "Supplier response received",
    result: "Acme Corp stocks cardboard boxes",
  });
  assert.equal(result.status, "completed");
  assert.equal(result.outcome, "unstructured_match");
  assert.equal(result.orderId, null);
  assert.equal(warn.mock.callCount(), 1);
});

test("an empty supplier reply is reported as no match", async (t) => {
  t.mock.method(console, "log", () => undefined);
  t.mock.method(console, "warn", () => undefined);
  const agents = new FakeAgents({ supplier: async () => "" });
  const { orchestrator, publisher } = createHarness({ agents });

  const result = await orchestrator.run(IMAGE);

  assert.equal(publisher.types().at(-1), "memory_error");
  assert.deepEqual(publisher.payload("memory_error"), {
    message: "No matching supplier found",
    error: "supplier agent returned no text",
    code: "SUPPLIER_NO_RESULT",
    phase: "supplier_search",
  });
  assert.equal(result.status, "failed");
  assert.equal(result.outcome, "supplier_failed");
});

test("a payload error fails the vision phase before any agent call", async (t) => {
  t.mock.method(console, "log", () => undefined);
  t.mock.method(console, "error", () => undefined);
  const agents = new FakeAgents({});
  const { orchestrator, publisher } = createHarness({
    agents,
    preparePayload: async () => {
      throw new PayloadError("image has no readable dimensions");
    },
  });

  const result = await orchestrator.run(IMAGE);

  assert.deepEqual(publisher.types(), [
    "upload_complete",
    "discovery_start",
    "discovery_complete",
    "vision_start",
    "vision_error",
  ]);
  assert.equal(publisher.payload("vision_error").code, "PAYLOAD_INVALID");
  assert.equal(publisher.payload("vision_error").phase, "vision_analysis");
  assert.equal(agents.sent.length, 0);
  assert.equal(result.outcome, "vision_failed");
});

test("a failed detection call cancels the analysis call and fails the phase", async (t) => {
  t.mock.method(console, "log", () => undefined);
  t.mock.method(console, "error", () => undefined);
  let analysisCancelled = false;
  const agents = new FakeAgents({
    vision: async (payload, options) => {
      if (payload.mode === "detect") {
        throw new CallError("Vision Agent call failed: 500", { statusCode: 500 });
      }
      try {
        await delay(1_000, options.signal);
      } catch (error) {
        analysisCancelled = true;
        throw error;
      }
      return ANALYSIS_TEXT;
    },
  });
  const { orchestrator, publisher } = createHarness({ agents });

  const startedAt = Date.now();
  await orchestrator.run(IMAGE);

  await new Promise((resolve) => setImmediate(resolve));

  assert.ok(Date.now() - startedAt < 500);
  assert.equal(analysisCancelled, true);
  assert.equal(publisher.types().at(-1), "vision_error");
  assert.deepEqual(publisher.payload("vision_error"), {
    message: "Vision Agent error: Vision Agent call failed: 500",
    error: "Vision Agent call failed: 500",
    code: "AGENT_CALL_FAILED",
    phase: "vision_analysis",
  });
});

test("structuring sub-call supplies the search query when enabled", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const agents = new FakeAgents({
    vision: async (payload) =>
      payload.mode === "structure" ? "  cardboard shipping boxes\nignored second line" : defaultVision(payload),
  });
  const { orchestrator, publisher } = createHarness({ agents, config: { structureQueryEnabled: true } });

  await orchestrator.run(IMAGE);

  const structure = agents.sent.find((task) => task.payload.mode === "structure");
  assert.equal(structure?.payload.analysis, ANALYSIS_TEXT);
  assert.equal(publisher.payload("memory_start").query, "cardboard shipping boxes");
  assert.equal(publisher.payload("memory_start").querySource, "structured");
});

test("a failed structuring sub-call falls back to the raw analysis text", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const warn = t.mock.method(console, "warn", () => undefined);
  const agents = new FakeAgents({
    vision: async (payload) => {
      if (payload.mode === "structure") {
        throw new CallError("Vision Agent call timed out after 2000ms", { timedOut: true });
      }
      return defaultVision(payload);
    },
  });
  const { orchestrator, publisher } = createHarness({ agents, config: { structureQueryEnabled: true } });

  const result = await orchestrator.run(IMAGE);

  assert.equal(publisher.payload("memory_start").query, "cardboard box");
  assert.equal(publisher.payload("memory_start").querySource, "marker");
  assert.equal(result.outcome, "order_placed");
  assert.equal(warn.mock.callCount(), 1);
});

test("file part mode sends the image as an inline file part", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const { orchestrator, agents } = createHarness({ config: { imagePartMode: "file" } });

  await orchestrator.run(IMAGE);

  const analyze = agents.sent.find((task) => task.payload.mode === "analyze");
  assert.ok(analyze);
  assert.equal(analyze.payload.image_base64, undefined);
  const file = analyze.request.message.parts.find((part) => part.kind === "file");
  assert.deepEqual(file, {
    kind: "file",
    file: { bytes: PREPARED_BYTES.toString("base64"), mimeType: "image/jpeg" },
  });
});

test("started runs are tracked until they settle", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const agents = new FakeAgents({
    supplier: async () => {
      await delay(30);
      return SUPPLIER_TEXT;
    },
  });
  const { orchestrator, publisher } = createHarness({ agents });

  const handle = orchestrator.start(IMAGE);
  assert.equal(orchestrator.activeRuns, 1);
  assert.equal(await orchestrator.waitForIdle(2_000), true);

  const result = await handle.completion;
  assert.equal(result.runId, handle.runId);
  assert.equal(orchestrator.activeRuns, 0);
  assert.ok(publisher.events.every((event) => event.runId === handle.runId));
});

test("waiting for idle gives up after the grace period", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const agents = new FakeAgents({
    supplier: async () => {
      await delay(200);
      return SUPPLIER_TEXT;
    },
  });
  const { orchestrator } = createHarness({ agents });

  const handle = orchestrator.start(IMAGE);
  assert.equal(await orchestrator.waitForIdle(20), false);
  assert.equal((await handle.completion).status, "completed");
});

test("detection finishing after analysis yields the same vision result", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const agents = new FakeAgents({
    vision: async (payload) => {
      await delay(payload.mode === "detect" ? 100 : 10);
      return defaultVision(payload);
    },
  });
  const { orchestrator, publisher } = createHarness({ agents });

  const result = await orchestrator.run(IMAGE);

  const elapsed = publisher.timeOf("vision_complete") - publisher.timeOf("vision_start");
  assert.ok(elapsed >= 95, `vision phase did not wait for detection: ${elapsed}ms`);
  assert.ok(elapsed < 170, `vision calls look sequential: ${elapsed}ms`);
  assert.deepEqual(publisher.payload("vision_complete"), {
    message: "Vision analysis complete",
    result: ANALYSIS_TEXT,
    codeOutput: "2 boxes",
    boxes: [{ box_2d: [10, 20, 30, 40], label: "box" }],
    detection: DETECTION_TEXT,
    payloadBytes: PREPARED_BYTES.length,
  });
  assert.equal(result.outcome, "order_placed");
});

test("supplier discovery failure ends the run with a memory error", async (t) => {
  t.mock.method(console, "log", () => undefined);
  t.mock.method(console, "error", () => undefined);
  const agents = new FakeAgents({
    discover: async (baseUrl) => {
      if (baseUrl === SUPPLIER_URL) {
        throw new DiscoveryError(baseUrl, `no agent descriptor found at ${baseUrl}`);
      }
    },
  });
  const { orchestrator, publisher, registry } = createHarness({ agents });

  const result = await orchestrator.run(IMAGE, "run-no-supplier");

  assert.deepEqual(publisher.types(), [
    "upload_complete",
    "discovery_start",
    "discovery_complete",
    "vision_start",
    "vision_complete",
    "thinking_update",
    "discovery_start",
    "memory_error",
  ]);
  assert.deepEqual(publisher.payload("memory_error"), {
    message: `Supplier Agent error: no agent descriptor found at ${SUPPLIER_URL}`,
    error: `no agent descriptor found at ${SUPPLIER_URL}`,
    code: "AGENT_DISCOVERY_FAILED",
    phase: "supplier_discovery",
  });
  assert.equal(agents.sent.filter((task) => task.agent === "supplier").length, 0);
  assert.equal(result.status, "failed");
  assert.equal(result.outcome, "supplier_failed");
  assert.equal(registry.getRun("run-no-supplier")?.status, "failed");
});

test("a supplier call timeout ends the run with a memory error", async (t) => {
  t.mock.method(console, "log", () => undefined);
  t.mock.method(console, "error", () => undefined);
  const agents = new FakeAgents({
    supplier: async () => {
      throw new CallError("Supplier Agent call timed out after 2000ms", { timedOut: true });
    },
  });
  const { orchestrator, publisher } = createHarness({ agents });

  const result = await orchestrator.run(IMAGE);

  assert.deepEqual(publisher.types().slice(-3), ["discovery_complete", "memory_start", "memory_error"]);
  assert.deepEqual(publisher.payload("memory_error"), {
    message: "Supplier Agent error: Supplier Agent call timed out after 2000ms",
    error: "Supplier Agent call timed out after 2000ms",
    code: "AGENT_CALL_FAILED",
    phase: "supplier_search",
  });
  assert.ok(!publisher.types().includes("order_placed"));
  assert.equal(result.outcome, "supplier_failed");
  assert.equal(result.phase, "supplier_search");
});
