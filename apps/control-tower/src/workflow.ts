import { randomUUID } from "node:crypto";
import {
  buildTaskRequest,
  extractResponseText,
  filePart,
  jsonTextPart,
  type AgentDescriptor,
  type AgentTransport,
  type ContentPart,
} from "@sct/a2a";
import {
  createWorkflowEvent,
  errorMessage,
  ParseError,
  WorkflowError,
  type AgentRole,
  type RollingMetrics,
  type WorkflowEventPayloads,
  type WorkflowEventType,
  type WorkflowPhase,
} from "@sct/contracts";
import type { EventPublisher } from "./broadcaster.js";
import type { ControlTowerConfig } from "./config.js";
import type { PayloadPreparer, PreparedPayload } from "./payload.js";
import { buildProgressSteps, ProgressTicker, type ProgressStep } from "./progress.js";
import type { RunRegistry } from "./run-registry.js";
import {
  buildThinkingSteps,
  createOrderId,
  extractCodeOutput,
  fallbackSearchQuery,
  parseBoundingBoxes,
  parseSupplierMatch,
  type ResolvedSearchQuery,
  type SupplierMatch,
} from "./workflow-parsers.js";

export const ANALYZE_QUERY = "Write code to count the exact number of boxes on this shelf.";
export const DETECT_QUERY =
  "Return the 2D bounding box of every distinct object as " +
  '[BOUNDING_BOXES][{"box_2d": [ymin, xmin, ymax, xmax], "label": "..."}][/BOUNDING_BOXES], ' +
  "coordinates normalized to 0-1000.";
export const STRUCTURE_QUERY =
  "Reply with a 3-5 word supplier search query for the items described in `analysis`. Reply with the query only.";

export type WorkflowConfig = Pick<
  ControlTowerConfig,
  | "visionAgentUrl"
  | "supplierAgentUrl"
  | "callTimeoutMs"
  | "phasePauseMs"
  | "payloadMaxBytes"
  | "searchQueryMaxChars"
  | "structureQueryEnabled"
  | "imagePartMode"
  | "progressDelaysMs"
>;

export type WorkflowDependencies = {
  config: WorkflowConfig;
  agents: AgentTransport;
  publisher: EventPublisher;
  preparePayload: PayloadPreparer;
  registry?: RunRegistry;
  metrics?: RollingMetrics;
};

export type WorkflowOutcome = "order_placed" | "unstructured_match" | "vision_failed" | "supplier_failed";

export type WorkflowRunResult = {
  runId: string;
  status: "completed" | "failed";
  phase: WorkflowPhase;
  outcome: WorkflowOutcome;
  orderId: string | null;
  durationsMs: Partial<Record<WorkflowPhase, number>>;
};

export type RunHandle = {
  runId: string;
  completion: Promise<WorkflowRunResult>;
};

type RunState = {
  runId: string;
  phase: WorkflowPhase;
  durationsMs: Partial<Record<WorkflowPhase, number>>;
};

type VisionOutcome = {
  descriptor: AgentDescriptor;
  text: string;
};

const VISION_PHASES: ReadonlySet<WorkflowPhase> = new Set(["upload_received", "vision_discovery", "vision_analysis"]);

const AGENT_LABELS: Record<AgentRole, string> = {
  vision: "Vision Agent",
  supplier: "Supplier Agent",
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toKb(bytes: number): string {
  return (bytes / 1024).toFixed(1);
}

/**
 * Drives one upload through discover → analyze → search → act and reports
 * every step through the publisher. A phase failure ends the run with a
 * `*_error` event; `run` itself never rejects.
 */
export class WorkflowOrchestrator {
  private readonly config: WorkflowConfig;
  private readonly agents: AgentTransport;
  private readonly publisher: EventPublisher;
  private readonly preparePayload: PayloadPreparer;
  private readonly registry: RunRegistry | null;
  private readonly metrics: RollingMetrics | null;
  private readonly progressSteps: ProgressStep[];
  private readonly inFlight = new Map<string, Promise<WorkflowRunResult>>();

  constructor(deps: WorkflowDependencies) {
    this.config = deps.config;
    this.agents = deps.agents;
    this.publisher = deps.publisher;
    this.preparePayload = deps.preparePayload;
    this.registry = deps.registry ?? null;
    this.metrics = deps.metrics ?? null;
    this.progressSteps = buildProgressSteps(deps.config.progressDelaysMs);
  }

  get activeRuns(): number {
    return this.inFlight.size;
  }

  /** Starts a supervised run in the background and returns its handle. */
  start(image: Buffer): RunHandle {
    const runId = randomUUID();
    const completion = (async (): Promise<WorkflowRunResult> => {
      try {
        return await this.run(image, runId);
      } catch (error) {
        console.error(`[control-tower] run ${runId} crashed outside a phase boundary: ${errorMessage(error)}`);
        this.registry?.updateRun(runId, { status: "failed", error: errorMessage(error) });
        return {
          runId,
          status: "failed",
          phase: "upload_received",
          outcome: "vision_failed",
          orderId: null,
          durationsMs: {},
        };
      } finally {
        this.inFlight.delete(runId);
      }
    })();
    this.inFlight.set(runId, completion);
    return { runId, completion };
  }

  /** Resolves true once no run is in flight, false if `timeoutMs` passes first. */
  async waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.inFlight.values()]).then(() => true as const);
    try {
      return await Promise.race([settled, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  async run(image: Buffer, runId: string = randomUUID()): Promise<WorkflowRunResult> {
    const state: RunState = { runId, phase: "upload_received", durationsMs: {} };
    this.registry?.startRun(runId);
    console.log(`[control-tower] run ${runId} started (${toKb(image.length)}KB upload)`);

    try {
      this.emit(state, "upload_complete", {
        message: "Image uploaded successfully",
        sizeBytes: image.length,
      });
      await this.pause();

      const vision = await this.runVisionStage(state, image);
      if (!vision) {
        return this.finish(state, "vision_failed", null);
      }
      await this.pause();
      return await this.runSupplierStage(state, vision);
    } catch (error) {
      const eventType = VISION_PHASES.has(state.phase) ? "vision_error" : "memory_error";
      this.failPhase(state, eventType, "Workflow", error);
      return this.finish(state, eventType === "vision_error" ? "vision_failed" : "supplier_failed", null);
    }
  }

  private async runVisionStage(state: RunState, image: Buffer): Promise<VisionOutcome | null> {
    try {
      const descriptor = await this.discoverAgent(state, "vision", "vision_discovery", this.config.visionAgentUrl);
      await this.pause();

      this.enterPhase(state, "vision_analysis");
      this.emit(state, "vision_start", {
        message: "Vision Agent analyzing image...",
        details: "Analysis and object detection running in parallel",
      });

      const analysis = await this.timePhase(state, "vision_analysis", () => this.analyzeImage(state, descriptor, image));
      const boxes =
        this.readBoxes(state, analysis.detectionText) ?? this.readBoxes(state, analysis.analysisText) ?? [];

      this.emit(state, "vision_complete", {
        message: "Vision analysis complete",
        result: analysis.analysisText,
        codeOutput: extractCodeOutput(analysis.analysisText),
        boxes,
        detection: analysis.detectionText,
        payloadBytes: analysis.payload.bytes.length,
      });

      const steps = buildThinkingSteps(analysis.analysisText, "vision");
      if (steps.length > 0) {
        this.emit(state, "thinking_update", { agent: "vision", steps });
      }
      return { descriptor, text: analysis.analysisText };
    } catch (error) {
      this.failPhase(state, "vision_error", AGENT_LABELS.vision, error);
      return null;
    }
  }

  private async analyzeImage(
    state: RunState,
    descriptor: AgentDescriptor,
    image: Buffer,
  ): Promise<{ payload: PreparedPayload; analysisText: string; detectionText: string }> {
    const payload = await this.preparePayload(image, { maxBytes: this.config.payloadMaxBytes });
    console.log(
      `[control-tower] run ${state.runId} image prepared: ${toKb(payload.originalBytes)}KB -> ${toKb(payload.bytes.length)}KB ` +
        `(${payload.width}x${payload.height}, q${payload.quality}, attempts=${payload.attempts.length})`,
    );
    if (!payload.withinBudget) {
      console.warn(`[control-tower] run ${state.runId} image still above ${this.config.payloadMaxBytes} bytes; sending smallest candidate`);
    }

    const siblings = new AbortController();
    const ticker = new ProgressTicker(this.progressSteps, (step, index, total) => {
      this.emit(state, "vision_progress", {
        stage: step.stage,
        message: step.message,
        step: index + 1,
        totalSteps: total,
      });
    });
    ticker.start();

    try {
      const analysisCall = this.callAgent(descriptor, this.imageParts(payload, ANALYZE_QUERY, "analyze"), siblings.signal)
        .finally(() => ticker.stop());
      const detectionCall = this.callAgent(descriptor, this.imageParts(payload, DETECT_QUERY, "detect"), siblings.signal);
      const [analysisText, detectionText] = await Promise.all([analysisCall, detectionCall]);
      return { payload, analysisText, detectionText };
    } catch (error) {
      siblings.abort();
      throw error;
    } finally {
      ticker.stop();
    }
  }

  private async runSupplierStage(state: RunState, vision: VisionOutcome): Promise<WorkflowRunResult> {
    try {
      const descriptor = await this.discoverAgent(state, "supplier", "supplier_discovery", this.config.supplierAgentUrl);
      await this.pause();

      this.enterPhase(state, "supplier_search");
      const resolved = await this.resolveSearchQuery(state, vision);
      this.emit(state, "memory_start", {
        message: "Querying inventory with vector search...",
        details: `Search query: ${resolved.query}`,
        query: resolved.query,
        querySource: resolved.source,
      });

      const text = await this.timePhase(state, "supplier_search", () =>
        this.callAgent(descriptor, [jsonTextPart({ query: resolved.query })]),
      );
      if (text.trim().length === 0) {
        this.emit(state, "memory_error", {
          message: "No matching supplier found",
          error: "supplier agent returned no text",
          code: "SUPPLIER_NO_RESULT",
          phase: state.phase,
        });
        this.registry?.updateRun(state.runId, { error: "supplier agent returned no text" });
        return this.finish(state, "supplier_failed", null);
      }

      let match: SupplierMatch;
      try {
        match = parseSupplierMatch(text);
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        console.warn(`[control-tower] run ${state.runId} supplier reply kept as raw text: ${error.message}`);
        this.emit(state, "memory_complete", { message: "Supplier response received", result: text });
        return this.finish(state, "unstructured_match", null);
      }

      this.emit(state, "memory_complete", {
        message: `Match found: ${match.part}`,
        part: match.part,
        supplier: match.supplier,
        confidence: match.confidence,
      });
      this.emit(state, "thinking_update", { agent: "memory", steps: buildThinkingSteps(text, "memory") });
      await this.pause();

      this.enterPhase(state, "action_taken");
      const orderId = createOrderId();
      this.emit(state, "order_placed", {
        message: `Order ${orderId} placed autonomously`,
        orderId,
        part: match.part,
        supplier: match.supplier,
      });
      return this.finish(state, "order_placed", orderId);
    } catch (error) {
      this.failPhase(state, "memory_error", AGENT_LABELS.supplier, error);
      return this.finish(state, "supplier_failed", null);
    }
  }

  private async discoverAgent(
    state: RunState,
    agent: AgentRole,
    phase: "vision_discovery" | "supplier_discovery",
    baseUrl: string,
  ): Promise<AgentDescriptor> {
    this.enterPhase(state, phase);
    this.emit(state, "discovery_start", {
      agent,
      message: `Discovering ${AGENT_LABELS[agent]} via A2A protocol...`,
      baseUrl,
    });
    const descriptor = await this.timePhase(state, phase, () => this.agents.discover(baseUrl));
    this.emit(state, "discovery_complete", {
      agent,
      message: `${AGENT_LABELS[agent]} discovered: ${descriptor.name}`,
      agentName: descriptor.name,
      version: descriptor.version,
      skills: descriptor.skills.map((skill) => skill.id),
    });
    return descriptor;
  }

  /**
   * Optional structuring sub-call first, then the raw-text fallbacks. A
   * failed sub-call is logged and never fails the phase.
   */
  private async resolveSearchQuery(state: RunState, vision: VisionOutcome): Promise<ResolvedSearchQuery> {
    const maxChars = this.config.searchQueryMaxChars;
    if (this.config.structureQueryEnabled && vision.text.trim().length > 0) {
      try {
        const reply = await this.callAgent(vision.descriptor, [
          jsonTextPart({ query: STRUCTURE_QUERY, mode: "structure", analysis: vision.text }),
        ]);
        const firstLine = reply.trim().split("\n")[0]?.trim() ?? "";
        if (firstLine.length > 0) {
          return { query: firstLine.slice(0, maxChars), source: "structured" };
        }
        console.warn(`[control-tower] run ${state.runId} structuring sub-call returned no text; using raw analysis`);
      } catch (error) {
        console.warn(`[control-tower] run ${state.runId} structuring sub-call failed: ${errorMessage(error)}; using raw analysis`);
      }
    }
    return fallbackSearchQuery(vision.text, maxChars);
  }

  private imageParts(payload: PreparedPayload, query: string, mode: "analyze" | "detect"): ContentPart[] {
    if (this.config.imagePartMode === "file") {
      return [jsonTextPart({ query, mode }), filePart(payload.bytes, payload.mimeType)];
    }
    return [jsonTextPart({ image_base64: payload.bytes.toString("base64"), query, mode })];
  }

  private async callAgent(descriptor: AgentDescriptor, parts: ContentPart[], signal?: AbortSignal): Promise<string> {
    const response = await this.agents.send(descriptor, buildTaskRequest(parts), {
      timeoutMs: this.config.callTimeoutMs,
      signal,
    });
    return extractResponseText(response);
  }

  private readBoxes(state: RunState, text: string): ReturnType<typeof parseBoundingBoxes> {
    try {
      return parseBoundingBoxes(text);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      console.warn(`[control-tower] run ${state.runId} ignoring bounding boxes: ${error.message}`);
      return null;
    }
  }

  private emit<TType extends WorkflowEventType>(
    state: RunState,
    type: TType,
    payload: WorkflowEventPayloads[TType],
  ): void {
    this.publisher.publish(createWorkflowEvent({ type, runId: state.runId, payload }));
  }

  private enterPhase(state: RunState, phase: WorkflowPhase): void {
    state.phase = phase;
    this.registry?.updateRun(state.runId, { phase });
  }

  private async timePhase<T>(state: RunState, phase: WorkflowPhase, work: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    let ok = false;
    try {
      const result = await work();
      ok = true;
      return result;
    } finally {
      const durationMs = Date.now() - startedAt;
      state.durationsMs[phase] = durationMs;
      this.registry?.updateRun(state.runId, { durationMs: { phase, value: durationMs } });
      this.metrics?.record(`workflow.${phase}`, durationMs, ok);
    }
  }

  private failPhase(
    state: RunState,
    type: "vision_error" | "memory_error",
    label: string,
    error: unknown,
  ): void {
    const message = errorMessage(error);
    const code = error instanceof WorkflowError ? error.code : "WORKFLOW_UNEXPECTED_ERROR";
    console.error(`[control-tower] run ${state.runId} failed in ${state.phase}: ${message}`);
    this.registry?.updateRun(state.runId, { error: message });
    this.emit(state, type, {
      message: `${label} error: ${message}`,
      error: message,
      code,
      phase: state.phase,
    });
  }

  private finish(state: RunState, outcome: WorkflowOutcome, orderId: string | null): WorkflowRunResult {
    const status = outcome === "order_placed" || outcome === "unstructured_match" ? "completed" : "failed";
    this.registry?.updateRun(state.runId, { status, orderId });
    console.log(`[control-tower] run ${state.runId} ${status} (${outcome}) at ${state.phase}`);
    return {
      runId: state.runId,
      status,
      phase: state.phase,
      outcome,
      orderId,
      durationsMs: { ...state.durationsMs },
    };
  }

  private async pause(): Promise<void> {
    if (this.config.phasePauseMs > 0) {
      await sleep(this.config.phasePauseMs);
    }
  }
}
