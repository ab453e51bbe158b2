import { createReadStream, statSync } from 'node:fs';
import { open, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import type { LogSource, SourceMetadata } from '../../domain/ports/LogSource.js';

export interface FileLogSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Log source that reads a local file. Node.js only.
 *
 * `sourceRef` is the absolute path, so a worker on a host sharing the filesystem
 * can open the same file from an assignment.
 */
export class FileLogSource implements LogSource {
  readonly sourceRef: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FileLogSourceOptions) {
    this.sourceRef = resolve(filePath);
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async size(): Promise<number> {
    const stats = await stat(this.sourceRef);
    return stats.size;
  }

  async *read(): AsyncIterable<Buffer> {
    const stream = createReadStream(this.sourceRef, { highWaterMark: this.highWaterMark });
    for await (const chunk of stream) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  }

  async readRange(start: number, end: number): Promise<Buffer> {
    if (start < 0 || end < start) {
      throw new RangeError(`Invalid range [${String(start)}, ${String(end)})`);
    }
    const length = end - start;
    const buffer = Buffer.alloc(length);
    const handle = await open(this.sourceRef, 'r');
    try {
      let offset = 0;
      while (offset < length) {
        const { bytesRead } = await handle.read(buffer, offset, length - offset, start + offset);
        if (bytesRead === 0) {
          throw new RangeError(
            `Range [${String(start)}, ${String(end)}) extends past the end of ${this.sourceRef}`,
          );
        }
        offset += bytesRead;
      }
    } finally {
      await handle.close();
    }
    return buffer;
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.sourceRef);
    return { fileName: basename(this.sourceRef), fileSize: stats.size };
  }
}
