import type { ByteRange } from '../../domain/model/Chunk.js';
import type { LogEntry } from '../../domain/model/LogEntry.js';
import type { PartialMetrics } from '../../domain/model/Metrics.js';
import type { LogSource } from '../../domain/ports/LogSource.js';
import type { LogLineParser } from '../../domain/services/LogLineParser.js';
import { DefaultLogLineParser } from '../../domain/services/LogLineParser.js';
import { DEFAULT_WINDOW_SIZE_MS, MetricsAggregationEngine } from '../../domain/services/MetricsAggregationEngine.js';

export interface ProcessChunkOptions {
  /** Must match the coordinator's window size. Default: `60000`. */
  readonly windowSizeMs?: number;
  /** Default: `DefaultLogLineParser`. */
  readonly parser?: LogLineParser;
}

/**
 * Worker side of an assignment: read `[start, end)`, parse every line and fold the
 * entries into a local engine. Malformed lines are counted, never fatal. Blank lines
 * are neither entries nor parse errors.
 */
export async function processChunk(
  source: LogSource,
  range: ByteRange,
  options: ProcessChunkOptions = {},
): Promise<PartialMetrics> {
  const parser = options.parser ?? new DefaultLogLineParser();
  const engine = new MetricsAggregationEngine(options.windowSizeMs ?? DEFAULT_WINDOW_SIZE_MS);

  const data = await source.readRange(range.start, range.end);
  const entries: LogEntry[] = [];
  let parseErrors = 0;

  for (const line of data.toString('utf8').split('\n')) {
    if (line.trim() === '') continue;
    const entry = parser.parse(line);
    if (entry) entries.push(entry);
    else parseErrors++;
  }

  engine.ingest(entries);
  engine.recordParseErrors(parseErrors);
  return engine.toPartial();
}
