import type { FilePart, Message, TextPart } from "@a2a-js/sdk";

export type Skill = {
  id: string;
  name: string;
  description: string;
  tags: ReadonlySet<string>;
  examples: readonly string[];
};

/** Capability document fetched during discovery. Lives for one workflow run. */
export type AgentDescriptor = Readonly<{
  name: string;
  description: string;
  url: string;
  baseUrl: string;
  version: string;
  protocolVersion: string;
  defaultInputModes: readonly string[];
  defaultOutputModes: readonly string[];
  capabilities: Readonly<{
    streaming: boolean;
  }>;
  skills: readonly Skill[];
}>;

export type ContentPart = TextPart | FilePart;

export type TaskRequest = {
  message: Message;
};

/** A task as seen by the agent side, with the JSON-RPC id it arrived under. */
export type ReceivedTask = TaskRequest & {
  rpcId: string | number | null;
};

export type ResponsePart =
  | { kind: "text"; text: string }
  | { kind: "data"; data: unknown }
  | { kind: "file"; mimeType: string | null }
  | { kind: "unknown" };

/**
 * One recognized layout inside a task response. A single envelope can carry
 * several (a JSON-RPC result next to a legacy `artifact`, for instance).
 */
export type ResponseShape =
  | { shape: "result"; parts: ResponsePart[] }
  | { shape: "artifact"; parts: ResponsePart[] }
  | { shape: "messages"; messages: ResponsePart[][] }
  | { shape: "task"; artifacts: ResponsePart[][]; statusParts: ResponsePart[] };

export type TaskResponse = {
  rpcId: string | number | null;
  shapes: ResponseShape[];
};

export type SendOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export interface AgentTransport {
  discover(baseUrl: string): Promise<AgentDescriptor>;
  send(descriptor: AgentDescriptor, request: TaskRequest, options: SendOptions): Promise<TaskResponse>;
}
