import type { Registration, RegistrationRequest } from '../../domain/model/Worker.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/** Use case: register a worker, reclaiming whatever a superseded generation held. */
export class RegisterWorker {
  constructor(private readonly ctx: CoordinatorContext) {}

  async execute(request: RegistrationRequest): Promise<Registration> {
    const { registration, created, orphanedChunkIds } = this.ctx.registry.register(request);
    if (orphanedChunkIds.length > 0) {
      this.ctx.scheduler.reclaim(
        orphanedChunkIds,
        `worker ${registration.workerId} superseded by generation ${String(registration.generation)}`,
      );
      this.ctx.checkCompletion();
    }
    if (created) await this.ctx.persist();
    return registration;
  }
}
