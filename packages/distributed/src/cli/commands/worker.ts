import { Command } from 'commander';
import { createLogger } from '@logfleet/core';
import { loadWorkerSettings, withOverrides } from '../../config.js';
import { WorkerNode } from '../../worker/WorkerNode.js';

interface WorkerCommandOptions {
  readonly id?: string;
  readonly host?: string;
  readonly port?: string;
  readonly coordinator?: string;
  readonly advertise?: string;
}

export const workerCommand = new Command('worker')
  .description('Run a worker node that processes chunks pushed by the coordinator')
  .option('--id <workerId>', 'worker id (LOGFLEET_WORKER_ID)')
  .option('--host <host>', 'listen host (LOGFLEET_HOST)')
  .option('--port <port>', 'listen port (LOGFLEET_WORKER_PORT)')
  .option('--coordinator <url>', 'coordinator base URL (LOGFLEET_COORDINATOR_URL)')
  .option('--advertise <url>', 'address the coordinator should use to reach this worker')
  .action(async (options: WorkerCommandOptions) => {
    const settings = loadWorkerSettings(
      withOverrides(process.env, {
        LOGFLEET_WORKER_ID: options.id,
        LOGFLEET_HOST: options.host,
        LOGFLEET_WORKER_PORT: options.port,
        LOGFLEET_COORDINATOR_URL: options.coordinator,
      }),
    );
    const logger = createLogger({ name: 'worker' });
    const node = new WorkerNode({
      workerId: settings.workerId,
      coordinatorUrl: settings.coordinatorUrl,
      host: settings.host,
      port: settings.port,
      advertisedAddress: options.advertise,
      heartbeatIntervalMs: settings.heartbeatIntervalMs,
      requestTimeoutMs: settings.requestTimeoutMs,
      logger,
    });

    const registration = await node.start();
    logger.info({ ...registration, address: node.address }, 'Worker ready');

    const shutdown = (): void => {
      node.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
