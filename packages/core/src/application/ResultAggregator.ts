import type { PartialMetrics } from '../domain/model/Metrics.js';
import { isTerminal } from '../domain/model/ChunkStatus.js';
import { InvalidPartialMetricsError } from '../domain/errors/CoordinatorErrors.js';
import type { MetricsAggregationEngine } from '../domain/services/MetricsAggregationEngine.js';
import type { ChunkScheduler } from './ChunkScheduler.js';
import type { EventBus } from './EventBus.js';

/**
 * What happened to a result submission. Only `ACCEPTED` and `REJECTED` changed state;
 * the submitter is acknowledged the same way in every case.
 */
export type SubmissionOutcome = 'ACCEPTED' | 'DUPLICATE' | 'STALE' | 'UNKNOWN_CHUNK' | 'REJECTED';

type Discarded = 'DUPLICATE' | 'STALE' | 'UNKNOWN_CHUNK';

/** Correlates result submissions with chunk attempts and feeds accepted ones into the engine. */
export class ResultAggregator {
  /** Per chunk, the attempt tokens whose results were merged. */
  private readonly seen = new Map<string, Set<number>>();

  constructor(
    private readonly scheduler: ChunkScheduler,
    private readonly engine: MetricsAggregationEngine,
    private readonly eventBus: EventBus,
  ) {}

  /**
   * Merge a chunk's partial metrics and complete the chunk, when the token is current.
   *
   * Merge and completion run in one synchronous step. A payload that fails validation
   * is not merged and its attempt is recorded as failed.
   */
  submit(chunkId: string, attemptToken: number, partial: PartialMetrics): SubmissionOutcome {
    const discarded = this.classify(chunkId, attemptToken);
    if (discarded) return this.discard(chunkId, attemptToken, discarded);

    try {
      this.engine.merge(partial);
    } catch (error) {
      if (!(error instanceof InvalidPartialMetricsError)) throw error;
      return this.fail(chunkId, attemptToken, error.message);
    }

    const tokens = this.seen.get(chunkId) ?? new Set<number>();
    tokens.add(attemptToken);
    this.seen.set(chunkId, tokens);
    this.scheduler.markCompleted(chunkId, attemptToken);

    this.eventBus.emit({
      type: 'result:accepted',
      chunkId,
      attemptToken,
      requestCount: partial.windows.reduce((sum, window) => sum + window.requestCount, 0),
      parseErrors: partial.parseErrors,
      timestamp: Date.now(),
    });
    return 'ACCEPTED';
  }

  /**
   * Record a submission whose payload could not be decoded. Counts as a failed attempt
   * when the token is current; discarded like any other submission otherwise.
   */
  reject(chunkId: string, attemptToken: number, reason: string): SubmissionOutcome {
    const discarded = this.classify(chunkId, attemptToken);
    if (discarded) return this.discard(chunkId, attemptToken, discarded);
    return this.fail(chunkId, attemptToken, reason);
  }

  private classify(chunkId: string, attemptToken: number): Discarded | null {
    const chunk = this.scheduler.get(chunkId);
    if (!chunk) return 'UNKNOWN_CHUNK';
    if (this.seen.get(chunkId)?.has(attemptToken)) return 'DUPLICATE';
    if (chunk.attemptToken !== attemptToken || isTerminal(chunk.status)) return 'STALE';
    return null;
  }

  private fail(chunkId: string, attemptToken: number, reason: string): SubmissionOutcome {
    this.eventBus.emit({ type: 'result:rejected', chunkId, attemptToken, error: reason, timestamp: Date.now() });
    this.scheduler.markFailed(chunkId, attemptToken, reason);
    return 'REJECTED';
  }

  private discard(chunkId: string, attemptToken: number, outcome: Discarded): SubmissionOutcome {
    this.eventBus.emit({ type: 'result:discarded', chunkId, attemptToken, outcome, timestamp: Date.now() });
    return outcome;
  }
}
