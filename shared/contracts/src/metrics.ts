type LatencyStats = {
  min: number | null;
  max: number | null;
  avg: number | null;
  p50: number | null;
  p95: number | null;
  sampleCount: number;
};

type MetricsBucket = {
  count: number;
  errorCount: number;
  durationsMs: number[];
  lastUpdatedAt: string;
};

export type OperationMetricsSnapshot = {
  operation: string;
  count: number;
  errorCount: number;
  errorRatePct: number;
  latencyMs: LatencyStats;
  lastUpdatedAt: string;
};

export type MetricsSnapshot = {
  startedAt: string;
  uptimeSec: number;
  totalCount: number;
  totalErrors: number;
  errorRatePct: number;
  operations: OperationMetricsSnapshot[];
};

function computeQuantile(sorted: number[], q: number): number | null {
  if (sorted.length === 0) {
    return null;
  }
  const idx = Math.max(0, Math.min(sorted.length - 1, Math.floor((sorted.length - 1) * q)));
  return sorted[idx] ?? null;
}

function computeLatencyStats(values: number[]): LatencyStats {
  if (values.length === 0) {
    return { min: null, max: null, avg: null, p50: null, p95: null, sampleCount: 0 };
  }
  const sorted = [...values].sort((left, right) => left - right);
  const sum = sorted.reduce((acc, value) => acc + value, 0);
  return {
    min: sorted[0] ?? null,
    max: sorted[sorted.length - 1] ?? null,
    avg: Math.round((sum / sorted.length) * 100) / 100,
    p50: computeQuantile(sorted, 0.5),
    p95: computeQuantile(sorted, 0.95),
    sampleCount: sorted.length,
  };
}

function toErrorRatePct(bucket: { count: number; errorCount: number }): number {
  return bucket.count > 0 ? Math.round((bucket.errorCount / bucket.count) * 10000) / 100 : 0;
}

/**
 * Per-operation latency and error counters over a bounded sample window.
 * Operations are HTTP routes (`GET /api/health`) or workflow phases
 * (`workflow.vision_analysis`).
 */
export class RollingMetrics {
  private readonly startedAtMs = Date.now();
  private readonly maxSamplesPerBucket: number;
  private readonly byOperation = new Map<string, MetricsBucket>();
  private totalCount = 0;
  private totalErrors = 0;

  constructor(config?: { maxSamplesPerBucket?: number }) {
    const raw = config?.maxSamplesPerBucket;
    this.maxSamplesPerBucket =
      typeof raw === "number" && Number.isFinite(raw) ? Math.max(50, Math.floor(raw)) : 1000;
  }

  record(operation: string, durationMs: number, ok: boolean): void {
    const normalized = operation.trim().length > 0 ? operation.trim() : "unknown";
    let bucket = this.byOperation.get(normalized);
    if (!bucket) {
      bucket = { count: 0, errorCount: 0, durationsMs: [], lastUpdatedAt: "" };
      this.byOperation.set(normalized, bucket);
    }

    bucket.count += 1;
    this.totalCount += 1;
    if (!ok) {
      bucket.errorCount += 1;
      this.totalErrors += 1;
    }
    bucket.lastUpdatedAt = new Date().toISOString();
    bucket.durationsMs.push(Number.isFinite(durationMs) ? Math.max(0, Math.floor(durationMs)) : 0);
    if (bucket.durationsMs.length > this.maxSamplesPerBucket) {
      bucket.durationsMs.splice(0, bucket.durationsMs.length - this.maxSamplesPerBucket);
    }
  }

  snapshot(): MetricsSnapshot {
    const operations = [...this.byOperation.entries()]
      .map(([operation, bucket]): OperationMetricsSnapshot => ({
        operation,
        count: bucket.count,
        errorCount: bucket.errorCount,
        errorRatePct: toErrorRatePct(bucket),
        latencyMs: computeLatencyStats(bucket.durationsMs),
        lastUpdatedAt: bucket.lastUpdatedAt,
      }))
      .sort((left, right) => right.count - left.count);

    return {
      startedAt: new Date(this.startedAtMs).toISOString(),
      uptimeSec: Math.floor((Date.now() - this.startedAtMs) / 1000),
      totalCount: this.totalCount,
      totalErrors: this.totalErrors,
      errorRatePct: toErrorRatePct({ count: this.totalCount, errorCount: this.totalErrors }),
      operations,
    };
  }
}
