import type { Registration, RegistrationRequest, WorkerRecord } from '../domain/model/Worker.js';
import { WorkerStatus, canTransitionWorker, isAssignable, isLive } from '../domain/model/WorkerStatus.js';
import {
  ConfigurationError,
  DuplicateActiveWorkerError,
  InvalidTransitionError,
  StaleGenerationError,
  UnknownWorkerError,
} from '../domain/errors/CoordinatorErrors.js';
import type { EventBus } from './EventBus.js';

/** Outcome of `register()`. */
export interface RegistrationResult {
  readonly registration: Registration;
  /** `false` when the call repeated an existing registration. */
  readonly created: boolean;
  /** Chunks held by a generation this registration superseded; the caller must reclaim them. */
  readonly orphanedChunkIds: readonly string[];
}

/** A worker declared dead by a sweep, with the chunks it was holding. */
export interface DeadWorker {
  readonly workerId: string;
  readonly generation: number;
  readonly chunkIds: readonly string[];
}

/** Outcome of `livenessSweep()`. */
export interface LivenessSweepResult {
  readonly suspected: readonly string[];
  readonly dead: readonly DeadWorker[];
}

/**
 * Worker identities, addresses and liveness.
 *
 * Every method is synchronous: a call runs to completion before any other request
 * is handled, which is what makes registration and sweeps atomic.
 */
export class WorkerRegistry {
  private readonly workers = new Map<string, WorkerRecord>();

  constructor(
    private readonly eventBus: EventBus,
    private readonly generateId: () => string = () => crypto.randomUUID(),
  ) {}

  /**
   * Register a worker, or re-register a known identity.
   *
   * - unknown id: generation 1.
   * - live at the same address: idempotent, the current generation is returned.
   * - `DEAD`: a new generation; tokens of the old one are already void.
   * - live at another address: `ACTIVE` is rejected, `REGISTERED`/`SUSPECTED` is superseded.
   *
   * @throws DuplicateActiveWorkerError
   */
  register(request: RegistrationRequest, now: number = Date.now()): RegistrationResult {
    const workerId = request.workerId ?? this.generateId();
    const existing = this.workers.get(workerId);

    if (existing && isLive(existing.status)) {
      if (existing.address === request.address) {
        this.touch(existing, now);
        return {
          registration: { workerId, generation: existing.generation },
          created: false,
          orphanedChunkIds: [],
        };
      }
      if (existing.status === WorkerStatus.ACTIVE) {
        throw new DuplicateActiveWorkerError(workerId, existing.generation);
      }
    }

    const orphanedChunkIds = existing && isLive(existing.status) ? existing.assignedChunkIds : [];
    const record: WorkerRecord = {
      workerId,
      address: request.address,
      generation: existing ? existing.generation + 1 : 1,
      status: WorkerStatus.REGISTERED,
      registeredAt: now,
      lastHeartbeatAt: now,
      assignedChunkIds: [],
    };
    this.workers.set(workerId, record);

    this.eventBus.emit({
      type: 'worker:registered',
      workerId,
      address: record.address,
      generation: record.generation,
      reclaimedChunkIds: orphanedChunkIds,
      timestamp: now,
    });

    return { registration: { workerId, generation: record.generation }, created: true, orphanedChunkIds };
  }

  /**
   * Record a heartbeat for the given generation.
   *
   * @throws UnknownWorkerError when the id was never registered.
   * @throws StaleGenerationError when the generation is not current or the worker is `DEAD`.
   */
  heartbeat(workerId: string, generation: number, now: number = Date.now()): WorkerRecord {
    const worker = this.workers.get(workerId);
    if (!worker) throw new UnknownWorkerError(workerId);
    if (worker.status === WorkerStatus.DEAD) {
      throw new StaleGenerationError(workerId, generation, null);
    }
    if (worker.generation !== generation) {
      throw new StaleGenerationError(workerId, generation, worker.generation);
    }
    return this.touch(worker, now);
  }

  /**
   * Move silent workers to `SUSPECTED` or `DEAD`.
   *
   * A worker silent for longer than `deadTimeoutMs` is declared dead and its assigned
   * chunks are returned for the caller to reclaim in the same synchronous step.
   */
  livenessSweep(now: number, suspectTimeoutMs: number, deadTimeoutMs: number): LivenessSweepResult {
    if (suspectTimeoutMs >= deadTimeoutMs) {
      throw new ConfigurationError(
        `suspect timeout (${String(suspectTimeoutMs)}ms) must be lower than dead timeout (${String(deadTimeoutMs)}ms)`,
      );
    }

    const suspected: string[] = [];
    const dead: DeadWorker[] = [];

    for (const worker of this.workers.values()) {
      if (!isLive(worker.status)) continue;
      const silentForMs = now - worker.lastHeartbeatAt;

      if (silentForMs > deadTimeoutMs) {
        this.transition(worker, WorkerStatus.DEAD, { assignedChunkIds: [] });
        dead.push({ workerId: worker.workerId, generation: worker.generation, chunkIds: worker.assignedChunkIds });
        this.eventBus.emit({
          type: 'worker:dead',
          workerId: worker.workerId,
          generation: worker.generation,
          silentForMs,
          reclaimedChunkIds: worker.assignedChunkIds,
          timestamp: now,
        });
      } else if (silentForMs > suspectTimeoutMs && worker.status !== WorkerStatus.SUSPECTED) {
        this.suspectWorker(worker, silentForMs, now);
        suspected.push(worker.workerId);
      }
    }

    return { suspected, dead };
  }

  /**
   * Mark a live worker `SUSPECTED` ahead of the timeout (e.g. it could not be reached).
   * It stops receiving assignments until its next heartbeat. Returns `false` when the
   * worker is unknown or not in a state that can be suspected.
   */
  suspect(workerId: string, now: number = Date.now()): boolean {
    const worker = this.workers.get(workerId);
    if (!worker || !canTransitionWorker(worker.status, WorkerStatus.SUSPECTED)) return false;
    this.suspectWorker(worker, now - worker.lastHeartbeatAt, now);
    return true;
  }

  /** Record that a chunk has been handed to a worker. */
  attachChunk(workerId: string, chunkId: string): void {
    const worker = this.workers.get(workerId);
    if (!worker) throw new UnknownWorkerError(workerId);
    if (worker.assignedChunkIds.includes(chunkId)) return;
    this.workers.set(workerId, { ...worker, assignedChunkIds: [...worker.assignedChunkIds, chunkId] });
  }

  /** Forget a chunk a worker no longer holds. No-op when it was not attached. */
  detachChunk(workerId: string, chunkId: string): void {
    const worker = this.workers.get(workerId);
    if (!worker?.assignedChunkIds.includes(chunkId)) return;
    this.workers.set(workerId, {
      ...worker,
      assignedChunkIds: worker.assignedChunkIds.filter((id) => id !== chunkId),
    });
  }

  get(workerId: string): WorkerRecord | undefined {
    return this.workers.get(workerId);
  }

  /** All workers in registration order, dead ones included. */
  list(): readonly WorkerRecord[] {
    return [...this.workers.values()];
  }

  /** Workers that may receive new chunks. */
  assignable(): readonly WorkerRecord[] {
    return this.list().filter((worker) => isAssignable(worker.status));
  }

  /** Replace the table with persisted records. */
  restore(records: readonly WorkerRecord[]): void {
    this.workers.clear();
    for (const record of records) {
      this.workers.set(record.workerId, record);
    }
  }

  private touch(worker: WorkerRecord, now: number): WorkerRecord {
    let updated: WorkerRecord = { ...worker, lastHeartbeatAt: now };
    if (worker.status === WorkerStatus.REGISTERED || worker.status === WorkerStatus.SUSPECTED) {
      updated = { ...updated, status: WorkerStatus.ACTIVE };
    }
    this.workers.set(worker.workerId, updated);

    if (worker.status === WorkerStatus.SUSPECTED) {
      this.eventBus.emit({
        type: 'worker:recovered',
        workerId: worker.workerId,
        generation: worker.generation,
        timestamp: now,
      });
    }
    return updated;
  }

  private suspectWorker(worker: WorkerRecord, silentForMs: number, now: number): void {
    this.transition(worker, WorkerStatus.SUSPECTED);
    this.eventBus.emit({
      type: 'worker:suspected',
      workerId: worker.workerId,
      generation: worker.generation,
      silentForMs,
      timestamp: now,
    });
  }

  private transition(worker: WorkerRecord, to: WorkerStatus, changes: Partial<WorkerRecord> = {}): void {
    if (!canTransitionWorker(worker.status, to)) {
      throw new InvalidTransitionError('worker', worker.status, to);
    }
    this.workers.set(worker.workerId, { ...worker, ...changes, status: to });
  }
}
