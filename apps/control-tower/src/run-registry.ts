import type { WorkflowPhase, WorkflowRunStatus } from "@sct/contracts";

export type RunRecord = {
  runId: string;
  status: WorkflowRunStatus;
  phase: WorkflowPhase;
  startedAt: string;
  updatedAt: string;
  error: string | null;
  orderId: string | null;
  durationsMs: Partial<Record<WorkflowPhase, number>>;
};

type UpdateRunParams = {
  status?: WorkflowRunStatus;
  phase?: WorkflowPhase;
  error?: string | null;
  orderId?: string | null;
  durationMs?: { phase: WorkflowPhase; value: number };
};

type RunRegistryConfig = {
  retentionMs: number;
  maxEntries: number;
};

function toIsoNow(): string {
  return new Date().toISOString();
}

function isTerminal(status: WorkflowRunStatus): boolean {
  return status === "completed" || status === "failed";
}

function cloneRecord(record: RunRecord): RunRecord {
  return { ...record, durationsMs: { ...record.durationsMs } };
}

/**
 * In-memory view of recent workflow runs for the status endpoints. Finished
 * runs expire after `retentionMs`; past `maxEntries` the oldest finished
 * runs go first. Running entries are never evicted.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private readonly retentionMs: number;
  private readonly maxEntries: number;

  constructor(config: RunRegistryConfig) {
    this.retentionMs = Math.max(1000, config.retentionMs);
    this.maxEntries = Math.max(1, config.maxEntries);
  }

  private cleanupExpired(nowMs: number): void {
    for (const [runId, run] of this.runs.entries()) {
      if (!isTerminal(run.status)) {
        continue;
      }
      const ageMs = nowMs - Date.parse(run.updatedAt);
      if (Number.isFinite(ageMs) && ageMs > this.retentionMs) {
        this.runs.delete(runId);
      }
    }
  }

  private enforceMaxEntries(): void {
    if (this.runs.size <= this.maxEntries) {
      return;
    }
    const finished = [...this.runs.values()]
      .filter((run) => isTerminal(run.status))
      .sort((left, right) => Date.parse(left.updatedAt) - Date.parse(right.updatedAt));
    let overflow = this.runs.size - this.maxEntries;
    for (const candidate of finished) {
      if (overflow <= 0) {
        break;
      }
      this.runs.delete(candidate.runId);
      overflow -= 1;
    }
  }

  private runMaintenance(): void {
    this.cleanupExpired(Date.now());
    this.enforceMaxEntries();
  }

  startRun(runId: string): RunRecord {
    const now = toIsoNow();
    const created: RunRecord = {
      runId,
      status: "running",
      phase: "upload_received",
      startedAt: now,
      updatedAt: now,
      error: null,
      orderId: null,
      durationsMs: {},
    };
    this.runs.set(runId, created);
    this.runMaintenance();
    return cloneRecord(created);
  }

  updateRun(runId: string, params: UpdateRunParams): RunRecord | null {
    const existing = this.runs.get(runId);
    if (!existing) {
      return null;
    }
    const durationsMs = { ...existing.durationsMs };
    if (params.durationMs) {
      durationsMs[params.durationMs.phase] = Math.max(0, Math.floor(params.durationMs.value));
    }
    const updated: RunRecord = {
      ...existing,
      status: params.status ?? existing.status,
      phase: params.phase ?? existing.phase,
      error: params.error !== undefined ? params.error : existing.error,
      orderId: params.orderId !== undefined ? params.orderId : existing.orderId,
      durationsMs,
      updatedAt: toIsoNow(),
    };
    this.runs.set(runId, updated);
    this.runMaintenance();
    return cloneRecord(updated);
  }

  getRun(runId: string): RunRecord | null {
    const found = this.runs.get(runId);
    return found ? cloneRecord(found) : null;
  }

  listRuns(params?: { status?: WorkflowRunStatus; limit?: number }): RunRecord[] {
    const limit = Math.max(1, Math.min(500, params?.limit ?? 50));
    return [...this.runs.values()]
      .filter((run) => (params?.status ? run.status === params.status : true))
      .sort((left, right) => Date.parse(right.startedAt) - Date.parse(left.startedAt))
      .slice(0, limit)
      .map((run) => cloneRecord(run));
  }

  countActive(): number {
    let count = 0;
    for (const run of this.runs.values()) {
      if (!isTerminal(run.status)) {
        count += 1;
      }
    }
    return count;
  }
}
