export type AgentRole = "vision" | "supplier";

export type ThinkingAgent = "vision" | "memory";

export type WorkflowPhase =
  | "upload_received"
  | "vision_discovery"
  | "vision_analysis"
  | "supplier_discovery"
  | "supplier_search"
  | "action_taken";

export type WorkflowRunStatus = "running" | "completed" | "failed";

export type ThinkingStep = {
  step: number;
  thought: string;
  timestamp: string;
};

export type BoundingBox = {
  box_2d: [number, number, number, number];
  label: string;
};

export type PhaseErrorPayload = {
  message: string;
  error: string;
  code: string;
  phase: WorkflowPhase;
};

/**
 * Payload carried by each outbound event type. Observers switch on `type`
 * and read the matching payload.
 */
export type WorkflowEventPayloads = {
  upload_complete: {
    message: string;
    sizeBytes: number;
  };
  discovery_start: {
    agent: AgentRole;
    message: string;
    baseUrl: string;
  };
  discovery_complete: {
    agent: AgentRole;
    message: string;
    agentName: string;
    version: string;
    skills: string[];
  };
  vision_start: {
    message: string;
    details: string;
  };
  vision_progress: {
    stage: string;
    message: string;
    step: number;
    totalSteps: number;
  };
  vision_complete: {
    message: string;
    result: string;
    codeOutput: string | null;
    boxes: BoundingBox[];
    detection: string;
    payloadBytes: number;
  };
  vision_error: PhaseErrorPayload;
  memory_start: {
    message: string;
    details: string;
    query: string;
    querySource: SearchQuerySource;
  };
  memory_complete:
    | {
        message: string;
        part: string;
        supplier: string;
        confidence: string;
      }
    | {
        message: string;
        result: string;
      };
  memory_error: PhaseErrorPayload;
  order_placed: {
    message: string;
    orderId: string;
    part: string;
    supplier: string;
  };
  thinking_update: {
    agent: ThinkingAgent;
    steps: ThinkingStep[];
  };
  pong: Record<string, never>;
};

export type WorkflowEventType = keyof WorkflowEventPayloads;

export type SearchQuerySource = "structured" | "marker" | "truncated" | "default";

export type WorkflowEvent<TType extends WorkflowEventType = WorkflowEventType> = {
  id: string;
  runId: string | null;
  type: TType;
  ts: string;
  payload: WorkflowEventPayloads[TType];
};

export type NormalizedError = {
  code: string;
  message: string;
  traceId: string;
  details?: unknown;
};

export type ApiErrorResponse = {
  ok: false;
  error: NormalizedError;
  service?: string;
  runtime?: unknown;
};
