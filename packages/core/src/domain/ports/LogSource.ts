/** Metadata about a log source (for logging and reports). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading a log source as raw bytes.
 *
 * Offsets are byte offsets: chunk boundaries are computed on bytes so that a worker
 * reading `[start, end)` sees exactly the entries the coordinator accounted for.
 */
export interface LogSource {
  /** Reference a worker uses to open the same source (e.g. an absolute file path). */
  readonly sourceRef: string;
  /** Total length in bytes. */
  size(): Promise<number>;
  /** Stream the whole source from offset 0. */
  read(): AsyncIterable<Buffer>;
  /** Read the half-open byte range `[start, end)`. */
  readRange(start: number, end: number): Promise<Buffer>;
  metadata(): SourceMetadata;
}

/** Opens a source from the reference carried in an assignment. */
export type LogSourceResolver = (sourceRef: string) => LogSource;
