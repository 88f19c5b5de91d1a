import { randomUUID } from "node:crypto";
import type { ApiErrorResponse, NormalizedError } from "./types.js";

export type WorkflowErrorCode =
  | "AGENT_DISCOVERY_FAILED"
  | "AGENT_CALL_FAILED"
  | "PAYLOAD_INVALID"
  | "AGENT_RESPONSE_UNPARSEABLE";

export abstract class WorkflowError extends Error {
  abstract readonly code: WorkflowErrorCode;
  readonly details?: unknown;

  constructor(message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options?.details;
  }
}

/** Agent endpoint unreachable, or its descriptor document is malformed. */
export class DiscoveryError extends WorkflowError {
  readonly code = "AGENT_DISCOVERY_FAILED";
  readonly baseUrl: string;

  constructor(baseUrl: string, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options);
    this.baseUrl = baseUrl;
  }
}

/** Timeout or transport failure while a task call was in flight. */
export class CallError extends WorkflowError {
  readonly code = "AGENT_CALL_FAILED";
  readonly timedOut: boolean;
  readonly statusCode: number | null;
  readonly rpcCode: number | null;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      timedOut?: boolean;
      statusCode?: number;
      rpcCode?: number;
      details?: unknown;
    },
  ) {
    super(message, options);
    this.timedOut = options?.timedOut === true;
    this.statusCode = options?.statusCode ?? null;
    this.rpcCode = options?.rpcCode ?? null;
  }
}

export class PayloadError extends WorkflowError {
  readonly code = "PAYLOAD_INVALID";
}

/** Response text present but not in the expected structured shape. Never fatal. */
export class ParseError extends WorkflowError {
  readonly code = "AGENT_RESPONSE_UNPARSEABLE";
  readonly rawText: string;

  constructor(message: string, rawText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rawText = rawText;
  }
}

function sanitizeMessage(value: string, fallback: string): string {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error) {
    return sanitizeMessage(error.message, fallback);
  }
  if (typeof error === "string") {
    return sanitizeMessage(error, fallback);
  }
  return fallback;
}

export function createNormalizedError(params: {
  code: string;
  message: string;
  traceId?: string;
  details?: unknown;
}): NormalizedError {
  const traceId = typeof params.traceId === "string" && params.traceId.trim().length > 0
    ? params.traceId.trim()
    : randomUUID();
  const normalized: NormalizedError = {
    code: sanitizeMessage(params.code, "UNKNOWN_ERROR"),
    message: sanitizeMessage(params.message, "Unknown error"),
    traceId,
  };
  if (params.details !== undefined) {
    normalized.details = params.details;
  }
  return normalized;
}

export function normalizeUnknownError(
  error: unknown,
  params: {
    defaultCode: string;
    defaultMessage: string;
    traceId?: string;
  },
): NormalizedError {
  if (error instanceof WorkflowError) {
    return createNormalizedError({
      code: error.code,
      message: sanitizeMessage(error.message, params.defaultMessage),
      traceId: params.traceId,
      details: error.details,
    });
  }
  return createNormalizedError({
    code: params.defaultCode,
    message: errorMessage(error, params.defaultMessage),
    traceId: params.traceId,
  });
}

export function createApiErrorResponse(params: {
  error: NormalizedError;
  service?: string;
  runtime?: unknown;
}): ApiErrorResponse {
  const response: ApiErrorResponse = {
    ok: false,
    error: params.error,
  };
  if (params.service) {
    response.service = params.service;
  }
  if (params.runtime !== undefined) {
    response.runtime = params.runtime;
  }
  return response;
}
