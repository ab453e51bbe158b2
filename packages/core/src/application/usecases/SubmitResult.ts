import { InvalidPartialMetricsError } from '../../domain/errors/CoordinatorErrors.js';
import { parsePartialMetrics } from '../../domain/services/MetricsAggregationEngine.js';
import type { SubmissionOutcome } from '../ResultAggregator.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/** Use case: accept a worker's partial metrics for a chunk attempt. */
export class SubmitResult {
  constructor(private readonly ctx: CoordinatorContext) {}

  /** `metrics` is decoded here, so a transport can pass its request body through unchanged. */
  async execute(chunkId: string, attemptToken: number, metrics: unknown): Promise<SubmissionOutcome> {
    let outcome: SubmissionOutcome;
    try {
      outcome = this.ctx.aggregator.submit(chunkId, attemptToken, parsePartialMetrics(metrics));
    } catch (error) {
      if (!(error instanceof InvalidPartialMetricsError)) throw error;
      outcome = this.ctx.aggregator.reject(chunkId, attemptToken, error.message);
    }

    if (outcome === 'ACCEPTED' || outcome === 'REJECTED') {
      this.ctx.checkCompletion();
      await this.ctx.persist();
    }
    return outcome;
  }
}
