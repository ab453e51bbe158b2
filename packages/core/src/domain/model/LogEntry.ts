/** Severity as written in the log line, upper-cased (`INFO`, `ERROR`, ...). */
export type Severity = string;

/** Name of the metric the aggregation engine reads as the response time. */
export const RESPONSE_TIME_METRIC = 'response_time';

/** A parsed log line. Ephemeral: consumed by the metrics engine and never persisted. */
export interface LogEntry {
  /** Epoch ms. */
  readonly timestamp: number;
  readonly level: Severity;
  readonly message: string;
  /** Named numeric metrics carried by the entry (e.g. `response_time`). */
  readonly metrics: Readonly<Record<string, number>>;
}

/** `true` when the entry counts towards a window's error count. */
export function isErrorEntry(entry: LogEntry): boolean {
  return entry.level === 'ERROR';
}
