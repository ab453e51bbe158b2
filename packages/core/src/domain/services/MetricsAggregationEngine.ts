import type { LogEntry } from '../model/LogEntry.js';
import { isErrorEntry, RESPONSE_TIME_METRIC } from '../model/LogEntry.js';
import type {
  MetricsTotals,
  PartialMetrics,
  TimeRange,
  WindowCounters,
  WindowMetrics,
  WindowPartial,
} from '../model/Metrics.js';
import { addCounters, deriveMetrics, emptyCounters, windowStartFor } from '../model/Metrics.js';
import { InvalidPartialMetricsError } from '../errors/CoordinatorErrors.js';

export const DEFAULT_WINDOW_SIZE_MS = 60_000;

function inRange(windowStart: number, range: TimeRange | undefined): boolean {
  if (!range) return true;
  if (range.from !== undefined && windowStart < range.from) return false;
  if (range.to !== undefined && windowStart >= range.to) return false;
  return true;
}

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Windowed metrics table.
 *
 * Used on both sides of the wire: a worker folds raw entries into a local engine and
 * ships `toPartial()`; the coordinator folds those partials in with `merge()`. Every
 * mutating call validates first and applies second, so a reader never sees half of
 * one batch.
 */
export class MetricsAggregationEngine {
  readonly windowSizeMs: number;
  private readonly windows = new Map<number, WindowCounters>();
  private parseErrorCount = 0;
  private entries = 0;

  constructor(windowSizeMs: number = DEFAULT_WINDOW_SIZE_MS) {
    if (!Number.isSafeInteger(windowSizeMs) || windowSizeMs <= 0) {
      throw new RangeError(`windowSizeMs must be a positive integer, got ${String(windowSizeMs)}`);
    }
    this.windowSizeMs = windowSizeMs;
  }

  /** Fold a batch of parsed entries into the window table. */
  ingest(entries: readonly LogEntry[]): void {
    const delta = new Map<number, WindowCounters>();
    for (const entry of entries) {
      const key = windowStartFor(entry.timestamp, this.windowSizeMs);
      const responseTime = entry.metrics[RESPONSE_TIME_METRIC];
      const hasResponseTime = responseTime !== undefined && Number.isFinite(responseTime) && responseTime >= 0;
      const contribution: WindowCounters = {
        requestCount: 1,
        errorCount: isErrorEntry(entry) ? 1 : 0,
        responseTimeSum: hasResponseTime ? responseTime : 0,
        responseTimeCount: hasResponseTime ? 1 : 0,
      };
      delta.set(key, addCounters(delta.get(key) ?? emptyCounters(), contribution));
    }
    this.apply(delta);
    this.entries += entries.length;
  }

  /** Count lines that could not be parsed. */
  recordParseErrors(count: number): void {
    if (!isCount(count)) {
      throw new RangeError(`parse error count must be a non-negative integer, got ${String(count)}`);
    }
    this.parseErrorCount += count;
  }

  /**
   * Merge pre-aggregated counters (the element-wise sum of every window).
   *
   * @throws InvalidPartialMetricsError when the payload is inconsistent or was bucketed
   *   with a different window size. Nothing is applied in that case.
   */
  merge(partial: PartialMetrics): void {
    this.validate(partial);
    const delta = new Map<number, WindowCounters>();
    for (const window of partial.windows) {
      delta.set(window.windowStart, addCounters(delta.get(window.windowStart) ?? emptyCounters(), window));
    }
    this.apply(delta);
    this.parseErrorCount += partial.parseErrors;
    this.entries += partial.entryCount;
  }

  /** Derived metrics per window, ordered by window start. */
  snapshot(range?: TimeRange): WindowMetrics[] {
    return [...this.windows.entries()]
      .filter(([windowStart]) => inRange(windowStart, range))
      .sort(([a], [b]) => a - b)
      .map(([windowStart, counters]) => ({ windowStart, ...deriveMetrics(counters) }));
  }

  /** Derived metrics across all windows in the range. */
  totals(range?: TimeRange): MetricsTotals {
    let sum = emptyCounters();
    for (const [windowStart, counters] of this.windows) {
      if (inRange(windowStart, range)) sum = addCounters(sum, counters);
    }
    return deriveMetrics(sum);
  }

  get parseErrors(): number {
    return this.parseErrorCount;
  }

  get entryCount(): number {
    return this.entries;
  }

  /** Raw counters for shipping to the coordinator. */
  toPartial(): PartialMetrics {
    const windows: WindowPartial[] = [...this.windows.entries()]
      .sort(([a], [b]) => a - b)
      .map(([windowStart, counters]) => ({ windowStart, ...counters }));
    return {
      windowSizeMs: this.windowSizeMs,
      windows,
      parseErrors: this.parseErrorCount,
      entryCount: this.entries,
    };
  }

  private apply(delta: ReadonlyMap<number, WindowCounters>): void {
    for (const [windowStart, counters] of delta) {
      this.windows.set(windowStart, addCounters(this.windows.get(windowStart) ?? emptyCounters(), counters));
    }
  }

  private validate(partial: PartialMetrics): void {
    if (partial.windowSizeMs !== this.windowSizeMs) {
      throw new InvalidPartialMetricsError(
        `window size ${String(partial.windowSizeMs)}ms does not match ${String(this.windowSizeMs)}ms`,
      );
    }
    if (!isCount(partial.parseErrors) || !isCount(partial.entryCount)) {
      throw new InvalidPartialMetricsError('parseErrors and entryCount must be non-negative integers');
    }
    for (const window of partial.windows) {
      const label = `window ${String(window.windowStart)}`;
      if (!Number.isSafeInteger(window.windowStart) || window.windowStart % this.windowSizeMs !== 0) {
        throw new InvalidPartialMetricsError(`${label} is not aligned to ${String(this.windowSizeMs)}ms`);
      }
      if (!isCount(window.requestCount) || !isCount(window.errorCount) || !isCount(window.responseTimeCount)) {
        throw new InvalidPartialMetricsError(`${label} has a negative or fractional count`);
      }
      if (!Number.isFinite(window.responseTimeSum) || window.responseTimeSum < 0) {
        throw new InvalidPartialMetricsError(`${label} has an invalid response time sum`);
      }
      if (window.errorCount > window.requestCount || window.responseTimeCount > window.requestCount) {
        throw new InvalidPartialMetricsError(`${label} has more errors or timings than requests`);
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: Record<string, unknown>, field: string, context: string): number {
  const value = source[field];
  if (typeof value !== 'number') {
    throw new InvalidPartialMetricsError(`${context}.${field} must be a number`);
  }
  return value;
}

/**
 * Narrow an untrusted payload (e.g. a decoded request body) to `PartialMetrics`.
 * Only checks shape; value consistency is checked by `merge()`.
 */
export function parsePartialMetrics(value: unknown): PartialMetrics {
  if (!isRecord(value)) {
    throw new InvalidPartialMetricsError('metrics must be an object');
  }
  const rawWindows = value['windows'];
  if (!Array.isArray(rawWindows)) {
    throw new InvalidPartialMetricsError('metrics.windows must be an array');
  }
  const windows = rawWindows.map((raw: unknown, i): WindowPartial => {
    const context = `metrics.windows[${String(i)}]`;
    if (!isRecord(raw)) throw new InvalidPartialMetricsError(`${context} must be an object`);
    return {
      windowStart: numberField(raw, 'windowStart', context),
      requestCount: numberField(raw, 'requestCount', context),
      errorCount: numberField(raw, 'errorCount', context),
      responseTimeSum: numberField(raw, 'responseTimeSum', context),
      responseTimeCount: numberField(raw, 'responseTimeCount', context),
    };
  });
  return {
    windowSizeMs: numberField(value, 'windowSizeMs', 'metrics'),
    windows,
    parseErrors: numberField(value, 'parseErrors', 'metrics'),
    entryCount: numberField(value, 'entryCount', 'metrics'),
  };
}
