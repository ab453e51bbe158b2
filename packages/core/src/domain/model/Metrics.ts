/** Raw counters for one time window. Response times are kept as a streaming sum/count. */
export interface WindowCounters {
  readonly requestCount: number;
  readonly errorCount: number;
  readonly responseTimeSum: number;
  readonly responseTimeCount: number;
}

/** Counters tagged with the window they belong to. */
export interface WindowPartial extends WindowCounters {
  /** Epoch ms of the window start (aligned to the window size). */
  readonly windowStart: number;
}

/** Per-window counters computed by a worker for one chunk; the payload of SubmitResult. */
export interface PartialMetrics {
  /** Window width the counters were bucketed with. Must match the coordinator's. */
  readonly windowSizeMs: number;
  readonly windows: readonly WindowPartial[];
  /** Lines in the chunk that could not be parsed. */
  readonly parseErrors: number;
  /** Lines parsed successfully. */
  readonly entryCount: number;
}

/** Derived metrics for one window as reported to operators. */
export interface WindowMetrics {
  readonly windowStart: number;
  readonly requestCount: number;
  readonly errorCount: number;
  /** `errorCount / requestCount`, or `0` for a window without requests. */
  readonly errorRate: number;
  /** Mean response time. Omitted when no entry in the window carried one. */
  readonly avgResponseTime?: number;
}

/** Totals across the reported windows. */
export interface MetricsTotals {
  readonly requestCount: number;
  readonly errorCount: number;
  readonly errorRate: number;
  readonly avgResponseTime?: number;
}

/** Optional restriction on window start: `from <= windowStart < to`. */
export interface TimeRange {
  readonly from?: number;
  readonly to?: number;
}

/** An unrecoverable byte range, reported alongside metrics. */
export interface CoverageGap {
  readonly sourceId: string;
  readonly sourceRef: string;
  readonly chunkId: string;
  readonly start: number;
  readonly end: number;
  readonly attemptCount: number;
  readonly lastError?: string;
}

/** Chunk counts by state. */
export interface ChunkProgress {
  readonly total: number;
  readonly pending: number;
  readonly inFlight: number;
  readonly completed: number;
  readonly failed: number;
}

/** Answer to QueryMetrics. */
export interface MetricsReport {
  readonly windowSizeMs: number;
  readonly windows: readonly WindowMetrics[];
  readonly totals: MetricsTotals;
  readonly parseErrors: number;
  readonly coverageGaps: readonly CoverageGap[];
  readonly progress: ChunkProgress;
  /** `true` once every chunk is `COMPLETED` or `FAILED`. */
  readonly complete: boolean;
}

/** Zero-valued counters. */
export function emptyCounters(): WindowCounters {
  return { requestCount: 0, errorCount: 0, responseTimeSum: 0, responseTimeCount: 0 };
}

/** Element-wise sum of two counter sets. Commutative and associative. */
export function addCounters(a: WindowCounters, b: WindowCounters): WindowCounters {
  return {
    requestCount: a.requestCount + b.requestCount,
    errorCount: a.errorCount + b.errorCount,
    responseTimeSum: a.responseTimeSum + b.responseTimeSum,
    responseTimeCount: a.responseTimeCount + b.responseTimeCount,
  };
}

/** Derive error rate and average response time from raw counters. */
export function deriveMetrics(counters: WindowCounters): Omit<WindowMetrics, 'windowStart'> {
  const errorRate = counters.requestCount > 0 ? counters.errorCount / counters.requestCount : 0;
  const base = { requestCount: counters.requestCount, errorCount: counters.errorCount, errorRate };
  if (counters.responseTimeCount === 0) return base;
  return { ...base, avgResponseTime: counters.responseTimeSum / counters.responseTimeCount };
}

/** Align a timestamp to the start of its window. */
export function windowStartFor(timestamp: number, windowSizeMs: number): number {
  return Math.floor(timestamp / windowSizeMs) * windowSizeMs;
}
