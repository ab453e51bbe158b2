import type { WorkerRecord } from '../../domain/model/Worker.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/**
 * Use case: accept a heartbeat.
 *
 * Not persisted: a restored coordinator treats every worker as dead regardless.
 */
export class RecordHeartbeat {
  constructor(private readonly ctx: CoordinatorContext) {}

  execute(workerId: string, generation: number): WorkerRecord {
    return this.ctx.registry.heartbeat(workerId, generation);
  }
}
