import { readTextPayloads, type TaskRequest } from "@sct/a2a";
import type { MockReply, MockReplyHandler } from "./server.js";

type CatalogEntry = {
  part: string;
  supplier: string;
  keywords: string[];
};

const CATALOG: readonly CatalogEntry[] = [
  { part: "Corrugated shipping box 40x30x30", supplier: "Northwind Packaging", keywords: ["box", "boxes", "carton"] },
  { part: "Euro pallet 1200x800", supplier: "Palletworks Ltd", keywords: ["pallet", "pallets"] },
  { part: "Stretch wrap film 500mm", supplier: "Contoso Films", keywords: ["wrap", "film"] },
  { part: "Steel shelving upright 2m", supplier: "Fabrikam Racking", keywords: ["shelf", "shelving", "rack"] },
];

function firstString(task: TaskRequest, key: string): string | null {
  for (const payload of readTextPayloads(task)) {
    const value = payload[key];
    if (typeof value === "string") {
      return value;
    }
  }
  return null;
}

/** Canned vision replies keyed on the `mode` the control tower sends. */
export function visionReplies(options: { delayMs?: number } = {}): MockReplyHandler {
  return (task) => {
    const mode = firstString(task, "mode");
    const hasImage = firstString(task, "image_base64") !== null || task.message.parts.some((part) => part.kind === "file");
    let text: string;
    if (mode === "structure") {
      text = "cardboard shipping boxes";
    } else if (!hasImage) {
      text = "No image received.";
    } else if (mode === "detect") {
      text =
        "Detected 2 objects.\n[BOUNDING_BOXES]" +
        JSON.stringify([
          { box_2d: [120, 80, 480, 420], label: "box" },
          { box_2d: [130, 450, 470, 800], label: "box" },
        ]) +
        "[/BOUNDING_BOXES]";
    } else {
      text = [
        "import cv2",
        "def count_boxes(image): ...",
        "Code output: 2 boxes detected",
        "",
        "Result: the shelf holds 2 cardboard boxes.",
        "Search terms: cardboard shipping box",
      ].join("\n");
    }
    const reply: MockReply = { kind: "text", text, envelope: "result", delayMs: options.delayMs };
    return reply;
  };
}

/** Keyword lookup over a small in-memory catalog; no match yields an empty reply. */
export function supplierReplies(options: { delayMs?: number } = {}): MockReplyHandler {
  return (task) => {
    const query = (firstString(task, "query") ?? "").toLowerCase();
    const match = CATALOG.find((entry) => entry.keywords.some((keyword) => query.includes(keyword)));
    const text = match
      ? JSON.stringify({ part: match.part, supplier: match.supplier, match_confidence: 0.92 })
      : "";
    return { kind: "text", text, envelope: "task", delayMs: options.delayMs };
  };
}
