import { randomInt } from "node:crypto";
import {
  ParseError,
  type BoundingBox,
  type SearchQuerySource,
  type ThinkingAgent,
  type ThinkingStep,
} from "@sct/contracts";

export const DEFAULT_SEARCH_QUERY = "warehouse inventory part";

const BOUNDING_BOX_BLOCK = /\[BOUNDING_BOXES\]([\s\S]*?)\[\/BOUNDING_BOXES\]/;
const SEARCH_TERMS_LINE = /search terms:[ \t]*([^\n]+)/i;
const CODE_OUTPUT_BLOCK = /Code output:[ \t]*([\s\S]*?)(?:\n[ \t]*\n|$)/;

export type SupplierMatch = {
  part: string;
  supplier: string;
  confidence: string;
};

export type ResolvedSearchQuery = {
  query: string;
  source: SearchQuerySource;
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

function isBoxTuple(value: unknown): value is [number, number, number, number] {
  return Array.isArray(value) && value.length === 4 && value.every((item) => typeof item === "number" && Number.isFinite(item));
}

/** Null when the text carries no code-execution output. */
export function extractCodeOutput(text: string): string | null {
  const block = CODE_OUTPUT_BLOCK.exec(text);
  if (block) {
    const output = (block[1] ?? "").trim();
    return output.length > 0 ? output : null;
  }
  return /result/i.test(text) ? text : null;
}

/**
 * Boxes from a `[BOUNDING_BOXES]…[/BOUNDING_BOXES]` block. Null when the
 * block is absent; entries without a four-number `box_2d` are skipped.
 */
export function parseBoundingBoxes(text: string): BoundingBox[] | null {
  const block = BOUNDING_BOX_BLOCK.exec(text);
  if (!block) {
    return null;
  }
  const body = (block[1] ?? "").trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.length > 0 ? body : "[]");
  } catch (error) {
    throw new ParseError("bounding box block is not valid JSON", body, { cause: error });
  }
  if (!Array.isArray(parsed)) {
    throw new ParseError("bounding box block is not a JSON array", body);
  }

  const boxes: BoundingBox[] = [];
  for (const entry of parsed) {
    if (!isRecord(entry) || !isBoxTuple(entry.box_2d)) {
      continue;
    }
    boxes.push({
      box_2d: entry.box_2d,
      label: toNonEmptyString(entry.label) ?? `object-${boxes.length + 1}`,
    });
  }
  return boxes;
}

/**
 * Search query from the raw analysis text when no structured query is
 * available: the agent's `Search terms:` line, else a truncated prefix of
 * the text. The prefix is a heuristic; nothing guarantees it reads as a
 * good query.
 */
export function fallbackSearchQuery(text: string, maxChars: number): ResolvedSearchQuery {
  const terms = SEARCH_TERMS_LINE.exec(text);
  const fromMarker = toNonEmptyString(terms?.[1]);
  if (fromMarker) {
    return { query: fromMarker.slice(0, maxChars).trim(), source: "marker" };
  }
  const truncated = text.slice(0, maxChars).trim();
  if (truncated.length > 0) {
    return { query: truncated, source: "truncated" };
  }
  return { query: DEFAULT_SEARCH_QUERY, source: "default" };
}

export function parseSupplierMatch(text: string): SupplierMatch {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ParseError("supplier response is not JSON", text, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ParseError("supplier response is not a JSON object", text);
  }
  const part = toNonEmptyString(parsed.part);
  const supplier = toNonEmptyString(parsed.supplier);
  if (!part || !supplier) {
    throw new ParseError("supplier response lacks part or supplier", text);
  }
  const rawConfidence = parsed.match_confidence ?? parsed.confidence;
  const confidence =
    typeof rawConfidence === "number" && Number.isFinite(rawConfidence)
      ? String(rawConfidence)
      : toNonEmptyString(rawConfidence) ?? "N/A";
  return { part, supplier, confidence };
}

function clockTime(now: Date): string {
  return now.toTimeString().slice(0, 8);
}

/** Synthetic reasoning steps shown next to each agent card in the UI. */
export function buildThinkingSteps(text: string, agent: ThinkingAgent, now = new Date()): ThinkingStep[] {
  const timestamp = clockTime(now);
  const thoughts: string[] = [];

  if (agent === "memory") {
    thoughts.push(
      "Generating embedding vector from query text",
      "Executing vector similarity search over inventory",
      "Ranking results by similarity score",
    );
  } else {
    if (text.includes("def ") || text.includes("import ")) {
      thoughts.push(
        "Analyzing image requirements and planning approach",
        "Writing detection code for the image",
        "Executing code in sandbox environment",
      );
    }
    const lowered = text.toLowerCase();
    if (lowered.includes("result") || lowered.includes("boxes")) {
      thoughts.push("Processing execution results and formatting output");
    }
  }

  return thoughts.map((thought, index) => ({ step: index + 1, thought, timestamp }));
}

export function createOrderId(): string {
  return `#${randomInt(9000, 10000)}`;
}
