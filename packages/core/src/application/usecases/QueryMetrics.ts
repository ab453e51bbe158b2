import type { MetricsReport, TimeRange } from '../../domain/model/Metrics.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/** Use case: windowed metrics with coverage gaps and progress. */
export class QueryMetrics {
  constructor(private readonly ctx: CoordinatorContext) {}

  execute(range?: TimeRange): MetricsReport {
    const { engine, scheduler } = this.ctx;
    return {
      windowSizeMs: engine.windowSizeMs,
      windows: engine.snapshot(range),
      totals: engine.totals(range),
      parseErrors: engine.parseErrors,
      coverageGaps: this.ctx.coverageGaps(),
      progress: scheduler.progress(),
      complete: scheduler.isComplete(),
    };
  }
}
