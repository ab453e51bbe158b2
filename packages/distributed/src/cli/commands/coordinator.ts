import { setTimeout as delay } from 'node:timers/promises';
import { Command } from 'commander';
import { ConfigurationError, Coordinator, FileLogSource, FileStateStore, createLogger } from '@logfleet/core';
import type { CoordinatorConfig } from '@logfleet/core';
import { loadCoordinatorSettings, withOverrides } from '../../config.js';
import { CoordinatorServer } from '../../coordinator/CoordinatorServer.js';
import { HttpChunkDispatcher } from '../../coordinator/HttpChunkDispatcher.js';

interface CoordinatorCommandOptions {
  readonly id?: string;
  readonly host?: string;
  readonly port?: string;
  readonly source?: string[];
  readonly chunkCount?: string;
  readonly chunkSize?: string;
  readonly maxAttempts?: string;
  readonly windowSeconds?: string;
  readonly warmup: string;
  readonly stateDir?: string;
}

export const coordinatorCommand = new Command('coordinator')
  .description('Run the coordinator: split log files into chunks and aggregate worker results')
  .option('--id <coordinatorId>', 'coordinator id (key of the persisted ledger)')
  .option('--host <host>', 'listen host (LOGFLEET_HOST)')
  .option('--port <port>', 'listen port (LOGFLEET_PORT)')
  .option('--source <files...>', 'log files to analyse')
  .option('--chunk-count <n>', 'chunks per file (LOGFLEET_CHUNK_COUNT)')
  .option('--chunk-size <bytes>', 'target chunk size (LOGFLEET_CHUNK_SIZE_BYTES)')
  .option('--max-attempts <n>', 'attempts before a chunk is given up (LOGFLEET_MAX_ATTEMPTS)')
  .option('--window-seconds <n>', 'metrics window width (LOGFLEET_WINDOW_SECONDS)')
  .option('--warmup <ms>', 'delay before splitting, so workers can register', '2000')
  .option('--state-dir <dir>', 'persist the ledger as JSON in this directory and resume from it')
  .action(async (options: CoordinatorCommandOptions) => {
    const settings = loadCoordinatorSettings(
      withOverrides(process.env, {
        LOGFLEET_HOST: options.host,
        LOGFLEET_PORT: options.port,
        LOGFLEET_CHUNK_COUNT: options.chunkCount,
        LOGFLEET_CHUNK_SIZE_BYTES: options.chunkSize,
        LOGFLEET_MAX_ATTEMPTS: options.maxAttempts,
        LOGFLEET_WINDOW_SECONDS: options.windowSeconds,
      }),
    );
    const warmupMs = Number(options.warmup);
    if (!Number.isSafeInteger(warmupMs) || warmupMs < 0) {
      throw new ConfigurationError(`--warmup must be a non-negative integer, got '${options.warmup}'`);
    }
    const logger = createLogger({ name: 'coordinator' });

    const config: CoordinatorConfig = {
      coordinatorId: options.id,
      windowSizeMs: settings.windowSizeMs,
      suspectTimeoutMs: settings.suspectTimeoutMs,
      deadTimeoutMs: settings.deadTimeoutMs,
      sweepIntervalMs: settings.sweepIntervalMs,
      maxAttempts: settings.maxAttempts,
      dispatcher: new HttpChunkDispatcher({ timeoutMs: settings.requestTimeoutMs }),
      stateStore: options.stateDir === undefined ? undefined : new FileStateStore({ directory: options.stateDir }),
      logger,
    };
    const restored = options.id !== undefined && config.stateStore ? await Coordinator.restore(options.id, config) : null;
    const coordinator = restored ?? new Coordinator(config);
    if (restored) logger.info({ coordinatorId: coordinator.coordinatorId }, 'Resumed from saved ledger');

    const server = new CoordinatorServer(coordinator, { host: settings.host, port: settings.port, logger });
    await server.listen();

    const shutdown = (): void => {
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    coordinator.on('analysis:completed', () => {
      process.stdout.write(`${JSON.stringify(coordinator.queryMetrics(), null, 2)}\n`);
      shutdown();
    });

    const known = new Set(coordinator.getStatus().sources.map((source) => source.sourceRef));
    const sources = (options.source ?? [])
      .map((file) => new FileLogSource(file))
      .filter((source) => !known.has(source.sourceRef));
    if (sources.length === 0) return;

    await delay(warmupMs);
    for (const source of sources) {
      const { sourceId, chunks } = await coordinator.addSource(source, {
        targetChunkCount: settings.chunkCount,
        targetChunkSizeBytes: settings.chunkSizeBytes,
      });
      logger.info({ sourceId, sourceRef: source.sourceRef, chunks: chunks.length }, 'Source added');
    }
  });
