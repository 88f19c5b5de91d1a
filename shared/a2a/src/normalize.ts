import type { ResponsePart, ResponseShape, TaskResponse } from "./types.js";

type ExtractionStrategy = {
  name: string;
  extract: (response: TaskResponse) => string | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNonEmptyString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  return value.length > 0 ? value : null;
}

// SDK serializers sometimes wrap a part or a result in `{ root: ... }`.
function unwrapRoot(value: unknown): unknown {
  if (isRecord(value) && isRecord(value.root)) {
    return value.root;
  }
  return value;
}

function decodePart(value: unknown): ResponsePart {
  if (!isRecord(value)) {
    return { kind: "unknown" };
  }
  const direct = toNonEmptyString(value.text);
  if (direct !== null) {
    return { kind: "text", text: direct };
  }
  const inner = unwrapRoot(value);
  if (!isRecord(inner)) {
    return { kind: "unknown" };
  }
  const wrapped = toNonEmptyString(inner.text);
  if (wrapped !== null) {
    return { kind: "text", text: wrapped };
  }
  if (inner.kind === "data" && "data" in inner) {
    return { kind: "data", data: inner.data };
  }
  if (inner.kind === "file" && isRecord(inner.file)) {
    const mimeType = toNonEmptyString(inner.file.mimeType) ?? toNonEmptyString(inner.file.mime_type);
    return { kind: "file", mimeType };
  }
  return { kind: "unknown" };
}

function decodePartList(value: unknown): ResponsePart[] | null {
  if (!isRecord(value) || !Array.isArray(value.parts)) {
    return null;
  }
  return value.parts.map((part) => decodePart(part));
}

function decodeResultShapes(result: unknown): ResponseShape[] {
  const shapes: ResponseShape[] = [];
  const unwrapped = unwrapRoot(result);
  const parts = decodePartList(unwrapped);
  if (parts) {
    shapes.push({ shape: "result", parts });
  }
  if (isRecord(unwrapped) && Array.isArray(unwrapped.artifacts)) {
    const artifacts = unwrapped.artifacts
      .map((artifact) => decodePartList(artifact))
      .filter((list): list is ResponsePart[] => list !== null);
    const statusParts = isRecord(unwrapped.status) ? decodePartList(unwrapped.status.message) ?? [] : [];
    shapes.push({ shape: "task", artifacts, statusParts });
  }
  return shapes;
}

/**
 * Classifies a raw response body into the closed set of layouts the
 * extraction strategies understand. Unknown members are ignored.
 */
export function decodeTaskResponse(raw: unknown): TaskResponse {
  if (!isRecord(raw)) {
    return { rpcId: null, shapes: [] };
  }
  const bare = !("result" in raw) && !("artifact" in raw) && !("messages" in raw);
  const envelope = bare && isRecord(raw.root) ? raw.root : raw;
  const rpcId =
    typeof envelope.id === "string" || typeof envelope.id === "number" ? envelope.id : null;

  const shapes: ResponseShape[] = [];
  if (isRecord(envelope.result)) {
    shapes.push(...decodeResultShapes(envelope.result));
  }

  const artifactParts = decodePartList(envelope.artifact);
  if (artifactParts) {
    shapes.push({ shape: "artifact", parts: artifactParts });
  }

  if (Array.isArray(envelope.messages)) {
    const messages = envelope.messages
      .map((message) => decodePartList(message))
      .filter((list): list is ResponsePart[] => list !== null);
    shapes.push({ shape: "messages", messages });
  }

  return { rpcId, shapes };
}

function joinText(parts: readonly ResponsePart[]): string {
  let text = "";
  for (const part of parts) {
    if (part.kind === "text") {
      text += part.text;
    }
  }
  return text;
}

function findShape<TName extends ResponseShape["shape"]>(
  response: TaskResponse,
  name: TName,
): Extract<ResponseShape, { shape: TName }> | null {
  const matches = (shape: ResponseShape): shape is Extract<ResponseShape, { shape: TName }> =>
    shape.shape === name;
  return response.shapes.find(matches) ?? null;
}

function nonEmpty(text: string): string | null {
  return text.length > 0 ? text : null;
}

// Order matters: the first strategy yielding text wins.
const extractionStrategies: readonly ExtractionStrategy[] = [
  {
    name: "result-parts",
    extract: (response) => {
      const shape = findShape(response, "result");
      return shape ? nonEmpty(joinText(shape.parts)) : null;
    },
  },
  {
    name: "artifact-parts",
    extract: (response) => {
      const shape = findShape(response, "artifact");
      return shape ? nonEmpty(joinText(shape.parts)) : null;
    },
  },
  {
    name: "message-list",
    extract: (response) => {
      const shape = findShape(response, "messages");
      return shape ? nonEmpty(shape.messages.map((parts) => joinText(parts)).join("")) : null;
    },
  },
  {
    name: "task-artifacts",
    extract: (response) => {
      const shape = findShape(response, "task");
      if (!shape) {
        return null;
      }
      return nonEmpty(shape.artifacts.map((parts) => joinText(parts)).join("")) ?? nonEmpty(joinText(shape.statusParts));
    },
  },
];

/**
 * Concatenated text of a task response, or "" when none of the known
 * layouts carries any.
 */
export function extractResponseText(response: TaskResponse): string {
  for (const strategy of extractionStrategies) {
    const text = strategy.extract(response);
    if (text !== null) {
      return text;
    }
  }
  const shapes = response.shapes.map((shape) => shape.shape).join(",") || "none";
  console.warn(`[a2a] no text found in task response (rpcId=${String(response.rpcId)}, shapes=${shapes})`);
  return "";
}

export function normalizeResponse(raw: unknown): string {
  return extractResponseText(decodeTaskResponse(raw));
}
