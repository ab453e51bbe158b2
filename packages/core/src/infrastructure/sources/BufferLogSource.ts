import type { LogSource, SourceMetadata } from '../../domain/ports/LogSource.js';

export interface BufferLogSourceOptions {
  /** Reference reported to workers. Default: `memory`. */
  readonly sourceRef?: string;
  /** Size of the pieces yielded by `read()`. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Log source backed by an in-memory buffer or string. */
export class BufferLogSource implements LogSource {
  readonly sourceRef: string;
  private readonly data: Buffer;
  private readonly highWaterMark: number;

  constructor(data: Buffer | string, options?: BufferLogSourceOptions) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.sourceRef = options?.sourceRef ?? 'memory';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  size(): Promise<number> {
    return Promise.resolve(this.data.length);
  }

  async *read(): AsyncIterable<Buffer> {
    for (let offset = 0; offset < this.data.length; offset += this.highWaterMark) {
      yield this.data.subarray(offset, offset + this.highWaterMark);
    }
  }

  readRange(start: number, end: number): Promise<Buffer> {
    if (start < 0 || end < start || end > this.data.length) {
      return Promise.reject(
        new RangeError(`Range [${String(start)}, ${String(end)}) is outside a source of ${String(this.data.length)} bytes`),
      );
    }
    return Promise.resolve(this.data.subarray(start, end));
  }

  metadata(): SourceMetadata {
    return { fileSize: this.data.length };
  }
}
