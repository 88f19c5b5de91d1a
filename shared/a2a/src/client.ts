import type { AgentCard, MessageSendParams } from "@a2a-js/sdk";
import { A2AClient } from "@a2a-js/sdk/client";
import { CallError, DiscoveryError, errorMessage } from "@sct/contracts";
import { decodeTaskResponse } from "./normalize.js";
import type { AgentDescriptor, AgentTransport, SendOptions, Skill, TaskRequest, TaskResponse } from "./types.js";

const DEFAULT_PROTOCOL_VERSION = "0.3.0";

export const AGENT_CARD_PATHS = ["/.well-known/agent-card.json", "/.well-known/agent.json"] as const;

type AgentClientOptions = {
  discoveryTimeoutMs: number;
  cardPaths?: readonly string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNonEmptyString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string" && item.trim().length > 0);
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

async function readErrorDetails(response: Response): Promise<string> {
  try {
    const details = await response.text();
    return details.slice(0, 300);
  } catch {
    return "";
  }
}

function parseSkill(value: unknown): Skill | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = toNonEmptyString(value.id);
  if (!id) {
    return null;
  }
  return {
    id,
    name: toNonEmptyString(value.name) ?? id,
    description: typeof value.description === "string" ? value.description : "",
    tags: new Set(toStringList(value.tags)),
    examples: toStringList(value.examples),
  };
}

/**
 * Validates a discovery document. Only `name` is mandatory; a missing `url`
 * means tasks are posted to the base URL itself.
 */
export function parseAgentDescriptor(baseUrl: string, document: unknown): AgentDescriptor {
  if (!isRecord(document)) {
    throw new DiscoveryError(baseUrl, `agent descriptor at ${baseUrl} is not a JSON object`);
  }
  const name = toNonEmptyString(document.name);
  if (!name) {
    throw new DiscoveryError(baseUrl, `agent descriptor at ${baseUrl} has no name`);
  }
  if (document.skills !== undefined && !Array.isArray(document.skills)) {
    throw new DiscoveryError(baseUrl, `agent descriptor at ${baseUrl} has a malformed skill list`);
  }
  const rawSkills: unknown[] = Array.isArray(document.skills) ? document.skills : [];
  const skills = rawSkills.map((skill) => parseSkill(skill));
  const capabilities: Record<string, unknown> = isRecord(document.capabilities) ? document.capabilities : {};

  return Object.freeze({
    name,
    description: typeof document.description === "string" ? document.description : "",
    url: toNonEmptyString(document.url) ?? trimTrailingSlash(baseUrl),
    baseUrl: trimTrailingSlash(baseUrl),
    version: toNonEmptyString(document.version) ?? "unknown",
    protocolVersion: toNonEmptyString(document.protocolVersion) ?? DEFAULT_PROTOCOL_VERSION,
    defaultInputModes: toStringList(document.defaultInputModes ?? document.default_input_modes),
    defaultOutputModes: toStringList(document.defaultOutputModes ?? document.default_output_modes),
    capabilities: Object.freeze({ streaming: capabilities.streaming === true }),
    skills: skills.filter((skill): skill is Skill => skill !== null),
  });
}

/**
 * Fetch handed to the SDK client. Binds every request to one abort signal
 * and keeps the status and body head of the last response, which the SDK
 * folds into plain error messages.
 */
class RecordingFetch {
  status: number | null = null;
  details = "";
  readonly fetchImpl: typeof fetch;

  constructor(signal: AbortSignal) {
    this.fetchImpl = async (input, init) => {
      const response = await fetch(input, { ...init, signal });
      this.status = response.status;
      if (!response.ok) {
        this.details = await readErrorDetails(response.clone());
      }
      return response;
    };
  }

  get failedStatus(): number | null {
    return this.status !== null && this.status >= 400 ? this.status : null;
  }
}

/** Inverse of `parseAgentDescriptor`, for handing a descriptor back to the SDK. */
export function toAgentCard(descriptor: AgentDescriptor): AgentCard {
  return {
    name: descriptor.name,
    description: descriptor.description,
    url: descriptor.url,
    version: descriptor.version,
    protocolVersion: descriptor.protocolVersion,
    defaultInputModes: [...descriptor.defaultInputModes],
    defaultOutputModes: [...descriptor.defaultOutputModes],
    capabilities: { streaming: descriptor.capabilities.streaming },
    skills: descriptor.skills.map((skill) => ({
      id: skill.id,
      name: skill.name,
      description: skill.description,
      tags: [...skill.tags],
      examples: [...skill.examples],
    })),
  };
}

/**
 * Talks to remote agents through the A2A SDK client: resolves their card
 * and posts `message/send`. No caching, no retries.
 */
export class AgentClient implements AgentTransport {
  private readonly discoveryTimeoutMs: number;
  private readonly cardPaths: readonly string[];

  constructor(options: AgentClientOptions) {
    this.discoveryTimeoutMs = options.discoveryTimeoutMs;
    this.cardPaths = options.cardPaths && options.cardPaths.length > 0 ? options.cardPaths : AGENT_CARD_PATHS;
  }

  async discover(baseUrl: string): Promise<AgentDescriptor> {
    const root = trimTrailingSlash(baseUrl);
    const misses: string[] = [];

    for (const cardPath of this.cardPaths) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.discoveryTimeoutMs);
      const recorder = new RecordingFetch(controller.signal);
      let card: AgentCard | null = null;
      let failure: { error: unknown } | null = null;
      try {
        const client = await A2AClient.fromCardUrl(`${root}${cardPath}`, { fetchImpl: recorder.fetchImpl });
        card = await client.getAgentCard();
      } catch (error) {
        failure = { error };
      } finally {
        clearTimeout(timeout);
      }

      const status = recorder.failedStatus;
      if (status === 404) {
        misses.push(cardPath);
        continue;
      }
      if (status !== null) {
        throw new DiscoveryError(baseUrl, `agent discovery failed: ${status} ${recorder.details}`.trim(), {
          cause: failure?.error,
          details: { path: cardPath, status },
        });
      }
      if (failure !== null || card === null) {
        const cause = failure?.error;
        if (controller.signal.aborted) {
          throw new DiscoveryError(baseUrl, `agent discovery timed out after ${this.discoveryTimeoutMs}ms`, { cause });
        }
        if (cause instanceof SyntaxError) {
          throw new DiscoveryError(baseUrl, `agent descriptor at ${root}${cardPath} is not valid JSON`, { cause });
        }
        throw new DiscoveryError(baseUrl, `agent at ${root} is unreachable: ${errorMessage(cause)}`, { cause });
      }
      return parseAgentDescriptor(baseUrl, card);
    }

    throw new DiscoveryError(baseUrl, `no agent descriptor found at ${root}`, {
      details: { triedPaths: misses },
    });
  }

  async send(descriptor: AgentDescriptor, request: TaskRequest, options: SendOptions): Promise<TaskResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onExternalAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const recorder = new RecordingFetch(controller.signal);
    const client = new A2AClient(toAgentCard(descriptor), { fetchImpl: recorder.fetchImpl });
    const params: MessageSendParams = { message: request.message };
    let body: unknown;
    try {
      body = await client.sendMessage(params);
    } catch (error) {
      const status = recorder.failedStatus;
      if (status !== null) {
        throw new CallError(
          recorder.details.length > 0
            ? `${descriptor.name} call failed: ${status} ${recorder.details}`
            : `${descriptor.name} call failed: ${status}`,
          { cause: error, statusCode: status },
        );
      }
      if (controller.signal.aborted) {
        throw timedOut
          ? new CallError(`${descriptor.name} call timed out after ${options.timeoutMs}ms`, {
              cause: error,
              timedOut: true,
            })
          : new CallError(`${descriptor.name} call was cancelled`, { cause: error });
      }
      if (error instanceof SyntaxError) {
        throw new CallError(`${descriptor.name} returned a non-JSON response`, { cause: error });
      }
      throw new CallError(`${descriptor.name} call failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onExternalAbort);
    }

    if (isRecord(body) && isRecord(body.error)) {
      const rpcCode = typeof body.error.code === "number" ? body.error.code : undefined;
      const message = toNonEmptyString(body.error.message) ?? "unknown JSON-RPC error";
      throw new CallError(`${descriptor.name} rejected the task: ${message}`, { rpcCode });
    }

    // The SDK returns the envelope as received, legacy top-level members included.
    return decodeTaskResponse(body);
  }
}
