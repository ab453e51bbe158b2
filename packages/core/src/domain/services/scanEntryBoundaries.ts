import type { LogSource } from '../ports/LogSource.js';

const NEWLINE = 0x0a;

/**
 * Stream a source once and collect the byte offsets at which entries start:
 * `0` plus every offset that follows a newline and lies before the end.
 */
export async function scanEntryBoundaries(source: LogSource): Promise<number[]> {
  const boundaries: number[] = [];
  let offset = 0;

  for await (const chunk of source.read()) {
    if (offset === 0 && chunk.length > 0) boundaries.push(0);
    for (let i = chunk.indexOf(NEWLINE); i !== -1; i = chunk.indexOf(NEWLINE, i + 1)) {
      boundaries.push(offset + i + 1);
    }
    offset += chunk.length;
  }

  return boundaries.filter((b) => b < offset);
}
