import { randomUUID } from "node:crypto";
import type { WorkflowEvent, WorkflowEventPayloads, WorkflowEventType } from "./types.js";

const knownEventTypes: ReadonlySet<string> = new Set<WorkflowEventType>([
  "upload_complete",
  "discovery_start",
  "discovery_complete",
  "vision_start",
  "vision_progress",
  "vision_complete",
  "vision_error",
  "memory_start",
  "memory_complete",
  "memory_error",
  "order_placed",
  "thinking_update",
  "pong",
]);

export function isWorkflowEventType(value: unknown): value is WorkflowEventType {
  return typeof value === "string" && knownEventTypes.has(value);
}

export function createWorkflowEvent<TType extends WorkflowEventType>(params: {
  type: TType;
  runId?: string | null;
  payload: WorkflowEventPayloads[TType];
}): WorkflowEvent<TType> {
  return {
    id: randomUUID(),
    runId: params.runId ?? null,
    type: params.type,
    ts: new Date().toISOString(),
    payload: params.payload,
  };
}

export function safeParseWorkflowEvent(input: string): WorkflowEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const candidate = parsed as Partial<Record<keyof WorkflowEvent, unknown>>;
  if (
    typeof candidate.id !== "string" ||
    !isWorkflowEventType(candidate.type) ||
    typeof candidate.ts !== "string" ||
    (candidate.runId !== null && typeof candidate.runId !== "string") ||
    typeof candidate.payload !== "object" ||
    candidate.payload === null
  ) {
    return null;
  }
  return parsed as WorkflowEvent;
}
