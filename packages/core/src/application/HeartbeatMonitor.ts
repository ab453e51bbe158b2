import type { Logger } from 'pino';
import type { ChunkScheduler } from './ChunkScheduler.js';
import type { WorkerRegistry } from './WorkerRegistry.js';

export interface HeartbeatMonitorOptions {
  readonly suspectTimeoutMs: number;
  readonly deadTimeoutMs: number;
  /** Interval between sweeps while started. */
  readonly sweepIntervalMs: number;
  readonly logger?: Logger;
  /** Called after every sweep that changed something. */
  readonly onSweep?: (result: SweepResult) => void;
}

/** Outcome of one liveness sweep. */
export interface SweepResult {
  readonly suspectedWorkerIds: readonly string[];
  readonly deadWorkerIds: readonly string[];
  /** Chunks returned to `PENDING` (or exhausted) because their worker died. */
  readonly reclaimedChunkIds: readonly string[];
}

/**
 * Periodic liveness sweep.
 *
 * Declaring a worker dead and reclaiming its chunks happen in one synchronous call,
 * so a completion for one of those chunks is applied either entirely before (its token
 * is still current) or entirely after (its token is stale).
 */
export class HeartbeatMonitor {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly registry: WorkerRegistry,
    private readonly scheduler: ChunkScheduler,
    private readonly options: HeartbeatMonitorOptions,
  ) {}

  sweep(now: number = Date.now()): SweepResult {
    const { suspected, dead } = this.registry.livenessSweep(
      now,
      this.options.suspectTimeoutMs,
      this.options.deadTimeoutMs,
    );

    const reclaimedChunkIds: string[] = [];
    for (const worker of dead) {
      const reclaimed = this.scheduler.reclaim(
        worker.chunkIds,
        `worker ${worker.workerId} (generation ${String(worker.generation)}) declared dead`,
      );
      reclaimedChunkIds.push(...reclaimed.map((chunk) => chunk.chunkId));
    }

    const result: SweepResult = {
      suspectedWorkerIds: suspected,
      deadWorkerIds: dead.map((worker) => worker.workerId),
      reclaimedChunkIds,
    };
    if (suspected.length > 0 || dead.length > 0) {
      this.options.onSweep?.(result);
    }
    return result;
  }

  /** Start sweeping every `sweepIntervalMs`. The timer does not keep the process alive. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.sweep();
      } catch (err) {
        this.options.logger?.error({ err }, 'Liveness sweep failed');
      }
    }, this.options.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
