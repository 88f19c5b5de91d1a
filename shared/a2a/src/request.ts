import { randomUUID } from "node:crypto";
import type { FilePart, TextPart } from "@a2a-js/sdk";
import type { ContentPart, ReceivedTask, TaskRequest } from "./types.js";

export function textPart(text: string): TextPart {
  return { kind: "text", text };
}

export function jsonTextPart(value: Record<string, unknown>): TextPart {
  return textPart(JSON.stringify(value));
}

export function filePart(bytes: Buffer, mimeType: string): FilePart {
  return {
    kind: "file",
    file: {
      bytes: bytes.toString("base64"),
      mimeType,
    },
  };
}

/** Fresh message id on every call; requests are never shared between agents. */
export function buildTaskRequest(parts: ContentPart[]): TaskRequest {
  return {
    message: {
      kind: "message",
      role: "user",
      parts,
      messageId: randomUUID().replace(/-/g, ""),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeRequestPart(value: unknown): ContentPart | null {
  if (!isRecord(value)) {
    return null;
  }
  if (value.kind === "text" && typeof value.text === "string") {
    return textPart(value.text);
  }
  if (value.kind === "file" && isRecord(value.file) && typeof value.file.bytes === "string") {
    return {
      kind: "file",
      file: {
        bytes: value.file.bytes,
        mimeType: typeof value.file.mimeType === "string" ? value.file.mimeType : undefined,
      },
    };
  }
  return null;
}

/**
 * Server side of `buildTaskRequest`: validates a JSON-RPC `message/send`
 * body. Null when the body is not one; parts other than text and inline
 * files are dropped.
 */
export function parseTaskRequest(body: unknown): ReceivedTask | null {
  if (!isRecord(body) || body.method !== "message/send" || !isRecord(body.params)) {
    return null;
  }
  const message = body.params.message;
  if (!isRecord(message) || !Array.isArray(message.parts)) {
    return null;
  }
  const parts = message.parts
    .map((part) => decodeRequestPart(part))
    .filter((part): part is ContentPart => part !== null);
  return {
    rpcId: typeof body.id === "string" || typeof body.id === "number" ? body.id : null,
    message: {
      kind: "message",
      role: message.role === "agent" ? "agent" : "user",
      parts,
      messageId: typeof message.messageId === "string" ? message.messageId : "",
    },
  };
}

/**
 * JSON objects carried in the text parts of a request, in part order.
 * Text parts that are not JSON objects are returned under `text`.
 */
export function readTextPayloads(request: TaskRequest): Array<Record<string, unknown>> {
  const payloads: Array<Record<string, unknown>> = [];
  for (const part of request.message.parts) {
    if (part.kind !== "text") {
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(part.text);
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        payloads.push({ ...parsed });
        continue;
      }
    } catch {
      // plain text part
    }
    payloads.push({ text: part.text });
  }
  return payloads;
}
