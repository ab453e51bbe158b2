import type { Logger } from 'pino';
import type { Registration, RegistrationRequest, WorkerRecord } from './domain/model/Worker.js';
import type { MetricsReport, TimeRange } from './domain/model/Metrics.js';
import type { Chunk } from './domain/model/Chunk.js';
import { markChunkRequeued } from './domain/model/Chunk.js';
import { WorkerStatus } from './domain/model/WorkerStatus.js';
import type { AssignmentPolicy } from './domain/ports/AssignmentPolicy.js';
import type { ChunkAssignment, ChunkDispatcher } from './domain/ports/ChunkDispatcher.js';
import type { LogSource } from './domain/ports/LogSource.js';
import type { StateStore } from './domain/ports/StateStore.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import { ConfigurationError } from './domain/errors/CoordinatorErrors.js';
import { LeastAttemptsPolicy } from './domain/services/AssignmentPolicies.js';
import { DEFAULT_WINDOW_SIZE_MS } from './domain/services/MetricsAggregationEngine.js';
import { CoordinatorContext } from './application/CoordinatorContext.js';
import type { ResolvedCoordinatorSettings } from './application/CoordinatorContext.js';
import type { TransitionOutcome } from './application/ChunkScheduler.js';
import type { SweepResult } from './application/HeartbeatMonitor.js';
import type { SubmissionOutcome } from './application/ResultAggregator.js';
import { AddSource } from './application/usecases/AddSource.js';
import type { AddSourceOptions, AddSourceResult } from './application/usecases/AddSource.js';
import { RegisterWorker } from './application/usecases/RegisterWorker.js';
import { RecordHeartbeat } from './application/usecases/RecordHeartbeat.js';
import { AssignChunk } from './application/usecases/AssignChunk.js';
import { DispatchPending } from './application/usecases/DispatchPending.js';
import type { DispatchPassResult } from './application/usecases/DispatchPending.js';
import { ReportChunkProgress } from './application/usecases/ReportChunkProgress.js';
import { SubmitResult } from './application/usecases/SubmitResult.js';
import { QueryMetrics } from './application/usecases/QueryMetrics.js';
import { GetCoordinatorStatus } from './application/usecases/GetCoordinatorStatus.js';
import type { CoordinatorStatus } from './application/usecases/GetCoordinatorStatus.js';
import { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';
import { createLogger } from './infrastructure/logging/createLogger.js';
import { attachEventLogger } from './infrastructure/logging/attachEventLogger.js';

/** Configuration for a coordinator. */
export interface CoordinatorConfig {
  /** Identity used as the state store key. Default: a random UUID. */
  readonly coordinatorId?: string;
  /** Width of a metrics window. Default: `60000`. */
  readonly windowSizeMs?: number;
  /** Silence after which a worker is `SUSPECTED`. Default: `15000`. */
  readonly suspectTimeoutMs?: number;
  /** Silence after which a worker is `DEAD` and its chunks are reclaimed. Default: `30000`. */
  readonly deadTimeoutMs?: number;
  /** Interval of the liveness sweep started by `start()`. Default: `5000`. */
  readonly sweepIntervalMs?: number;
  /** Attempts before a chunk is permanently `FAILED`. Default: `3`. */
  readonly maxAttempts?: number;
  /** Chunks a worker may hold at once. Default: `1`. */
  readonly maxChunksPerWorker?: number;
  /** Default: `LeastAttemptsPolicy`. */
  readonly assignmentPolicy?: AssignmentPolicy;
  /**
   * Delivers assignments to workers. Without one the coordinator is pull-only:
   * workers ask for work with `assignChunk()`.
   */
  readonly dispatcher?: ChunkDispatcher;
  /** Persistence adapter for the ledger. Default: `InMemoryStateStore`. */
  readonly stateStore?: StateStore;
  /** Receives every domain event. Default: a pino logger named `coordinator`. */
  readonly logger?: Logger;
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function resolveSettings(config: CoordinatorConfig): ResolvedCoordinatorSettings {
  const suspectTimeoutMs = positiveInteger('suspectTimeoutMs', config.suspectTimeoutMs ?? 15_000);
  const deadTimeoutMs = positiveInteger('deadTimeoutMs', config.deadTimeoutMs ?? 30_000);
  if (suspectTimeoutMs >= deadTimeoutMs) {
    throw new ConfigurationError(
      `suspectTimeoutMs (${String(suspectTimeoutMs)}) must be lower than deadTimeoutMs (${String(deadTimeoutMs)})`,
    );
  }
  return {
    coordinatorId: config.coordinatorId ?? crypto.randomUUID(),
    windowSizeMs: positiveInteger('windowSizeMs', config.windowSizeMs ?? DEFAULT_WINDOW_SIZE_MS),
    suspectTimeoutMs,
    deadTimeoutMs,
    sweepIntervalMs: positiveInteger('sweepIntervalMs', config.sweepIntervalMs ?? 5_000),
    maxAttempts: positiveInteger('maxAttempts', config.maxAttempts ?? 3),
    maxChunksPerWorker: positiveInteger('maxChunksPerWorker', config.maxChunksPerWorker ?? 1),
    assignmentPolicy: config.assignmentPolicy ?? new LeastAttemptsPolicy(),
    dispatcher: config.dispatcher ?? null,
    stateStore: config.stateStore ?? new InMemoryStateStore(),
    logger: config.logger ?? createLogger({ name: 'coordinator' }),
  };
}

/**
 * Facade over the coordinator: worker registry, chunk scheduler, liveness monitor,
 * metrics engine and result aggregator.
 *
 * Delegates each operation to a use case in `application/usecases/`. State changes are
 * applied synchronously inside each call; persistence and dispatch follow.
 *
 * @example
 * ```typescript
 * const coordinator = new Coordinator({ dispatcher: new HttpChunkDispatcher() });
 * coordinator.start();
 * await coordinator.addSource(new FileLogSource('/var/log/app.log'), { targetChunkCount: 8 });
 * coordinator.on('analysis:completed', () => console.log(coordinator.queryMetrics()));
 * ```
 */
export class Coordinator {
  private readonly ctx: CoordinatorContext;
  private readonly background = new Set<Promise<void>>();

  constructor(config: CoordinatorConfig = {}) {
    this.ctx = new CoordinatorContext(resolveSettings(config));
    attachEventLogger(this.ctx.eventBus, this.ctx.settings.logger);
    this.ctx.onSweep = (result) => {
      if (result.reclaimedChunkIds.length > 0) this.ctx.checkCompletion();
      this.runInBackground(this.ctx.persist(), 'Failed to persist coordinator state');
      if (result.reclaimedChunkIds.length > 0) this.scheduleDispatch();
    };
  }

  /**
   * Rebuild a coordinator from its persisted ledger.
   *
   * Metrics are not persisted, so every chunk that is not permanently `FAILED` goes back
   * to `PENDING` (attempt counts are kept) and every worker is `DEAD` until it registers
   * again under a new generation. The attempt token counter continues where it stopped.
   *
   * @returns the coordinator, or `null` when the store holds nothing for `coordinatorId`.
   */
  static async restore(coordinatorId: string, config: CoordinatorConfig = {}): Promise<Coordinator | null> {
    const stateStore = config.stateStore ?? new InMemoryStateStore();
    const state = await stateStore.getState(coordinatorId);
    if (!state) return null;

    const instance = new Coordinator({
      ...config,
      windowSizeMs: config.windowSizeMs ?? state.windowSizeMs,
      maxAttempts: config.maxAttempts ?? state.maxAttempts,
      coordinatorId,
      stateStore,
    });
    const ctx = instance.ctx;

    const chunks: Chunk[] = state.chunks.map((chunk) => (chunk.status === 'FAILED' ? chunk : markChunkRequeued(chunk)));
    const workers: WorkerRecord[] = state.workers.map((worker) => ({
      ...worker,
      status: WorkerStatus.DEAD,
      assignedChunkIds: [],
    }));

    ctx.sources = [...state.sources];
    ctx.startedAt = state.startedAt;
    ctx.scheduler.restore(chunks, state.nextAttemptToken);
    ctx.registry.restore(workers);
    await ctx.persist();
    return instance;
  }

  get coordinatorId(): string {
    return this.ctx.coordinatorId;
  }

  /** Scan and split a source, then enqueue its chunks. */
  async addSource(source: LogSource, options: AddSourceOptions): Promise<AddSourceResult> {
    const result = await new AddSource(this.ctx).execute(source, options);
    this.scheduleDispatch();
    return result;
  }

  /** @throws DuplicateActiveWorkerError */
  async register(request: RegistrationRequest): Promise<Registration> {
    const registration = await new RegisterWorker(this.ctx).execute(request);
    this.scheduleDispatch();
    return registration;
  }

  /**
   * @throws UnknownWorkerError
   * @throws StaleGenerationError (the worker must register again)
   */
  heartbeat(workerId: string, generation: number): WorkerRecord {
    const wasSuspected = this.ctx.registry.get(workerId)?.status === WorkerStatus.SUSPECTED;
    const worker = new RecordHeartbeat(this.ctx).execute(workerId, generation);
    if (wasSuspected && this.ctx.scheduler.pending().length > 0) this.scheduleDispatch();
    return worker;
  }

  /** Pull-style assignment. `null` when nothing is pending or the worker cannot take more work. */
  async assignChunk(workerId: string): Promise<ChunkAssignment | null> {
    return new AssignChunk(this.ctx).execute(workerId);
  }

  /** Push pending chunks to assignable workers through the configured dispatcher. */
  async dispatchPending(): Promise<readonly ChunkAssignment[]> {
    const { assignments } = await this.runDispatchPass();
    return assignments;
  }

  async reportStarted(chunkId: string, attemptToken: number): Promise<TransitionOutcome> {
    return new ReportChunkProgress(this.ctx).started(chunkId, attemptToken);
  }

  async reportFailed(chunkId: string, attemptToken: number, reason: string): Promise<TransitionOutcome> {
    const outcome = await new ReportChunkProgress(this.ctx).failed(chunkId, attemptToken, reason);
    if (outcome.applied) this.scheduleDispatch();
    return outcome;
  }

  /** Accept a result submission. Never throws for stale or duplicate submissions. */
  async submitResult(chunkId: string, attemptToken: number, metrics: unknown): Promise<SubmissionOutcome> {
    const outcome = await new SubmitResult(this.ctx).execute(chunkId, attemptToken, metrics);
    if (outcome === 'ACCEPTED' || outcome === 'REJECTED') this.scheduleDispatch();
    return outcome;
  }

  queryMetrics(range?: TimeRange): MetricsReport {
    return new QueryMetrics(this.ctx).execute(range);
  }

  getStatus(): CoordinatorStatus {
    return new GetCoordinatorStatus(this.ctx).execute();
  }

  /** Run one liveness sweep now. `start()` runs it on a timer. */
  sweep(now?: number): SweepResult {
    return this.ctx.monitor.sweep(now);
  }

  /** Start the periodic liveness sweep. */
  start(): void {
    this.ctx.monitor.start();
  }

  /** Stop the sweep and wait for background dispatches and saves. */
  async stop(): Promise<void> {
    this.ctx.monitor.stop();
    await this.idle();
  }

  /** Resolves once background dispatch passes and queued saves have settled. */
  async idle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
    await this.ctx.flush();
  }

  /** Subscribe to a domain event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  private scheduleDispatch(): void {
    if (!this.ctx.settings.dispatcher) return;
    this.runInBackground(this.runDispatchPass(), 'Dispatch pass failed');
  }

  /** A pass whose deliveries failed is followed by another for the requeued chunks. */
  private async runDispatchPass(): Promise<DispatchPassResult> {
    const result = await new DispatchPending(this.ctx).execute();
    if (result.requeuedChunkIds.length > 0) this.scheduleDispatch();
    return result;
  }

  private runInBackground(task: Promise<unknown>, failureMessage: string): void {
    const tracked = task.then(
      () => undefined,
      (err: unknown) => {
        this.ctx.settings.logger.error({ err }, failureMessage);
      },
    );
    this.background.add(tracked);
    void tracked.finally(() => this.background.delete(tracked));
  }
}
