import type { Logger } from 'pino';
import type { CoordinatorState, SourceDescriptor } from '../domain/model/CoordinatorState.js';
import type { CoverageGap } from '../domain/model/Metrics.js';
import type { AssignmentPolicy } from '../domain/ports/AssignmentPolicy.js';
import type { ChunkDispatcher } from '../domain/ports/ChunkDispatcher.js';
import type { StateStore } from '../domain/ports/StateStore.js';
import type { AnalysisSummary } from '../domain/events/DomainEvents.js';
import { MetricsAggregationEngine } from '../domain/services/MetricsAggregationEngine.js';
import { EventBus } from './EventBus.js';
import { WorkerRegistry } from './WorkerRegistry.js';
import { ChunkScheduler } from './ChunkScheduler.js';
import { HeartbeatMonitor } from './HeartbeatMonitor.js';
import type { SweepResult } from './HeartbeatMonitor.js';
import { ResultAggregator } from './ResultAggregator.js';

/** Settings after defaults have been applied. */
export interface ResolvedCoordinatorSettings {
  readonly coordinatorId: string;
  readonly windowSizeMs: number;
  readonly suspectTimeoutMs: number;
  readonly deadTimeoutMs: number;
  readonly sweepIntervalMs: number;
  readonly maxAttempts: number;
  readonly maxChunksPerWorker: number;
  readonly assignmentPolicy: AssignmentPolicy;
  readonly dispatcher: ChunkDispatcher | null;
  readonly stateStore: StateStore;
  readonly logger: Logger;
}

/**
 * State shared by the coordinator use cases.
 *
 * Internal: not exported from the package. Owns the registry, scheduler, engine and
 * aggregator, and the only path to the state store.
 */
export class CoordinatorContext {
  readonly eventBus: EventBus;
  readonly registry: WorkerRegistry;
  readonly scheduler: ChunkScheduler;
  readonly engine: MetricsAggregationEngine;
  readonly aggregator: ResultAggregator;
  readonly monitor: HeartbeatMonitor;

  sources: SourceDescriptor[] = [];
  startedAt = Date.now();
  /** Set once `analysis:completed` has been emitted for the current set of chunks. */
  completionAnnounced = false;
  /** Invoked after a sweep that changed something (set by the facade). */
  onSweep: ((result: SweepResult) => void) | null = null;

  private saveChain: Promise<void> = Promise.resolve();

  constructor(readonly settings: ResolvedCoordinatorSettings) {
    this.eventBus = new EventBus((err, event) => {
      settings.logger.error({ err, event: event.type }, 'Event handler failed');
    });
    this.registry = new WorkerRegistry(this.eventBus);
    this.scheduler = new ChunkScheduler(this.registry, this.eventBus, {
      maxAttempts: settings.maxAttempts,
      maxChunksPerWorker: settings.maxChunksPerWorker,
      policy: settings.assignmentPolicy,
    });
    this.engine = new MetricsAggregationEngine(settings.windowSizeMs);
    this.aggregator = new ResultAggregator(this.scheduler, this.engine, this.eventBus);
    this.monitor = new HeartbeatMonitor(this.registry, this.scheduler, {
      suspectTimeoutMs: settings.suspectTimeoutMs,
      deadTimeoutMs: settings.deadTimeoutMs,
      sweepIntervalMs: settings.sweepIntervalMs,
      logger: settings.logger,
      onSweep: (result) => this.onSweep?.(result),
    });
  }

  get coordinatorId(): string {
    return this.settings.coordinatorId;
  }

  /** Snapshot of the ledger. Metrics are deliberately absent. */
  buildState(): CoordinatorState {
    return {
      id: this.coordinatorId,
      windowSizeMs: this.settings.windowSizeMs,
      maxAttempts: this.settings.maxAttempts,
      sources: [...this.sources],
      chunks: this.scheduler.list(),
      workers: this.registry.list(),
      nextAttemptToken: this.scheduler.nextAttemptToken,
      startedAt: this.startedAt,
      updatedAt: Date.now(),
    };
  }

  /**
   * Queue a save of the current ledger.
   *
   * The snapshot is taken now and written after every earlier save, so the store sees
   * states in mutation order. A failed save rejects the returned promise but does not
   * break the chain for later saves.
   */
  persist(): Promise<void> {
    const state = this.buildState();
    const save = this.saveChain.then(() => this.settings.stateStore.saveState(state));
    this.saveChain = save.catch(() => undefined);
    return save;
  }

  /** Resolves once every queued save has settled. */
  async flush(): Promise<void> {
    await this.saveChain;
  }

  nextSourceId(): string {
    return `source-${String(this.sources.length + 1)}`;
  }

  coverageGaps(): CoverageGap[] {
    const refs = new Map(this.sources.map((source) => [source.sourceId, source.sourceRef]));
    return this.scheduler.failed().map((chunk) => {
      const gap: CoverageGap = {
        sourceId: chunk.sourceId,
        sourceRef: refs.get(chunk.sourceId) ?? chunk.sourceId,
        chunkId: chunk.chunkId,
        start: chunk.start,
        end: chunk.end,
        attemptCount: chunk.attemptCount,
      };
      return chunk.lastError === undefined ? gap : { ...gap, lastError: chunk.lastError };
    });
  }

  buildSummary(): AnalysisSummary {
    const progress = this.scheduler.progress();
    const totals = this.engine.totals();
    return {
      totalChunks: progress.total,
      completedChunks: progress.completed,
      failedChunks: progress.failed,
      requestCount: totals.requestCount,
      errorCount: totals.errorCount,
      parseErrors: this.engine.parseErrors,
      coverageGaps: this.coverageGaps(),
      elapsedMs: Date.now() - this.startedAt,
    };
  }

  /** Emit `analysis:completed` the first time every chunk is terminal. */
  checkCompletion(): void {
    if (this.completionAnnounced || !this.scheduler.isComplete()) return;
    this.completionAnnounced = true;
    this.eventBus.emit({
      type: 'analysis:completed',
      coordinatorId: this.coordinatorId,
      summary: this.buildSummary(),
      timestamp: Date.now(),
    });
  }
}
