export type ImagePartMode = "json" | "file";

export type ControlTowerConfig = {
  port: number;
  serviceVersion: string;
  visionAgentUrl: string;
  supplierAgentUrl: string;
  discoveryTimeoutMs: number;
  callTimeoutMs: number;
  phasePauseMs: number;
  payloadMaxBytes: number;
  uploadMaxBytes: number;
  searchQueryMaxChars: number;
  structureQueryEnabled: boolean;
  imagePartMode: ImagePartMode;
  progressDelaysMs: number[];
  observerHeartbeatMs: number;
  observerMaxBufferedBytes: number;
  runRetentionMs: number;
  runMaxEntries: number;
  shutdownGraceMs: number;
};

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === "0") {
    return 0;
  }
  return parsePositiveInt(value, fallback);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}

function parseDelayList(value: string | undefined, fallback: number[]): number[] {
  if (!value) {
    return fallback;
  }
  const delays = value
    .split(",")
    .map((item) => Number(item.trim()))
    .filter((item) => Number.isFinite(item) && item >= 0)
    .map((item) => Math.floor(item));
  return delays.length > 0 ? delays : fallback;
}

function parseImagePartMode(value: string | undefined): ImagePartMode {
  return value?.trim().toLowerCase() === "file" ? "file" : "json";
}

function parseUrl(value: string | undefined, fallback: string): string {
  const normalized = value?.trim();
  return normalized && normalized.length > 0 ? normalized.replace(/\/+$/, "") : fallback;
}

export function loadControlTowerConfig(env: NodeJS.ProcessEnv = process.env): ControlTowerConfig {
  return {
    port: parsePositiveInt(env.CONTROL_TOWER_PORT ?? env.PORT, 8080),
    serviceVersion: env.CONTROL_TOWER_VERSION ?? "0.1.0",
    visionAgentUrl: parseUrl(env.VISION_AGENT_URL, "http://localhost:8081"),
    supplierAgentUrl: parseUrl(env.SUPPLIER_AGENT_URL, "http://localhost:8082"),
    discoveryTimeoutMs: parsePositiveInt(env.AGENT_DISCOVERY_TIMEOUT_MS, 10_000),
    callTimeoutMs: parsePositiveInt(env.AGENT_CALL_TIMEOUT_MS, 120_000),
    phasePauseMs: parseNonNegativeInt(env.WORKFLOW_PHASE_PAUSE_MS, 500),
    payloadMaxBytes: parsePositiveInt(env.PAYLOAD_MAX_BYTES, 500 * 1024),
    uploadMaxBytes: parsePositiveInt(env.UPLOAD_MAX_BYTES, 20 * 1024 * 1024),
    searchQueryMaxChars: parsePositiveInt(env.SEARCH_QUERY_MAX_CHARS, 200),
    structureQueryEnabled: parseBoolean(env.STRUCTURE_QUERY_ENABLED, false),
    imagePartMode: parseImagePartMode(env.AGENT_IMAGE_PART_MODE),
    progressDelaysMs: parseDelayList(env.VISION_PROGRESS_DELAYS_MS, [5_000, 15_000, 30_000]),
    observerHeartbeatMs: parsePositiveInt(env.OBSERVER_HEARTBEAT_MS, 30_000),
    observerMaxBufferedBytes: parsePositiveInt(env.OBSERVER_MAX_BUFFERED_BYTES, 1024 * 1024),
    runRetentionMs: parsePositiveInt(env.RUN_RETENTION_MS, 10 * 60 * 1000),
    runMaxEntries: parsePositiveInt(env.RUN_MAX_ENTRIES, 200),
    shutdownGraceMs: parsePositiveInt(env.SHUTDOWN_GRACE_MS, 10_000),
  };
}
