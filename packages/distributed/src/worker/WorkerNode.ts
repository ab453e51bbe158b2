import type { Server } from 'node:http';
import express from 'express';
import type { Logger } from 'pino';
import { FileLogSource, InvalidRequestError, createLogger, processChunk } from '@logfleet/core';
import type { ChunkAssignment, LogLineParser, LogSourceResolver, Registration } from '@logfleet/core';
import { createErrorHandler } from '../http/errorHandler.js';
import { requireInteger, requireObject, requireString } from '../http/requestBody.js';
import { CoordinatorClient, CoordinatorRequestError } from './CoordinatorClient.js';

/** Configuration for a worker node. */
export interface WorkerNodeConfig {
  /** Requested identity. Default: assigned by the coordinator. */
  readonly workerId?: string;
  readonly coordinatorUrl: string;
  /** Default: `127.0.0.1`. */
  readonly host?: string;
  /** `0` picks a free port. Default: `8001`. */
  readonly port?: number;
  /** Address the coordinator pushes assignments to. Default: the listening URL. */
  readonly advertisedAddress?: string;
  /** Default: `5000`. */
  readonly heartbeatIntervalMs?: number;
  /** Timeout of each call to the coordinator. Default: `5000`. */
  readonly requestTimeoutMs?: number;
  /** Default: `3`. */
  readonly maxRetries?: number;
  /** Default: `200`. */
  readonly retryDelayMs?: number;
  /** Opens the source named in an assignment. Default: a `FileLogSource` on the path. */
  readonly openSource?: LogSourceResolver;
  readonly parser?: LogLineParser;
  /** Default: a pino logger named `worker`. */
  readonly logger?: Logger;
}

const RE_REGISTER_CODES = new Set(['STALE_GENERATION', 'UNKNOWN_WORKER']);

function parseAssignment(body: unknown): ChunkAssignment {
  const payload = requireObject(body, 'assignment');
  const assignment: ChunkAssignment = {
    chunkId: requireString(payload, 'chunkId'),
    attemptToken: requireInteger(payload, 'attemptToken'),
    sourceId: requireString(payload, 'sourceId'),
    sourceRef: requireString(payload, 'sourceRef'),
    start: requireInteger(payload, 'start'),
    end: requireInteger(payload, 'end'),
    windowSizeMs: requireInteger(payload, 'windowSizeMs'),
    workerId: requireString(payload, 'workerId'),
    workerAddress: requireString(payload, 'workerAddress'),
  };
  if (assignment.start < 0 || assignment.end < assignment.start) {
    throw new InvalidRequestError(`Invalid byte range [${String(assignment.start)}, ${String(assignment.end)})`);
  }
  return assignment;
}

/**
 * A worker process: registers with the coordinator, heartbeats, and processes the
 * chunks pushed to `POST /assignments`.
 *
 * An assignment is acknowledged with 202 before it is processed. The result (or the
 * failure) travels back to the coordinator on its own request.
 */
export class WorkerNode {
  private readonly client: CoordinatorClient;
  private readonly logger: Logger;
  private readonly openSource: LogSourceResolver;
  private server: Server | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private current: Registration | null = null;
  private beating = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly config: WorkerNodeConfig) {
    this.logger = config.logger ?? createLogger({ name: 'worker' });
    this.openSource = config.openSource ?? ((sourceRef) => new FileLogSource(sourceRef));
    this.client = new CoordinatorClient({
      baseUrl: config.coordinatorUrl,
      timeoutMs: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      logger: this.logger,
    });
  }

  /** Listen, register and start heartbeating. */
  async start(): Promise<Registration> {
    if (!this.server) {
      const app = this.createApp();
      const host = this.config.host ?? '127.0.0.1';
      this.server = await new Promise<Server>((resolve, reject) => {
        const server = app.listen(this.config.port ?? 8001, host, () => {
          server.off('error', reject);
          resolve(server);
        });
        server.once('error', reject);
      });
    }

    const registration = await this.register();
    if (!this.heartbeatTimer) {
      this.heartbeatTimer = setInterval(() => {
        void this.beat();
      }, this.config.heartbeatIntervalMs ?? 5_000);
      this.heartbeatTimer.unref();
    }
    return registration;
  }

  /** Stop heartbeating, let in-flight chunks finish and close the listener. */
  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    await this.idle();

    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });
  }

  /** Resolves once every accepted assignment has been reported back. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get registration(): Registration | null {
    return this.current;
  }

  /** URL the coordinator uses to reach this node. */
  get address(): string {
    if (this.config.advertisedAddress) return this.config.advertisedAddress;
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Worker node is not listening');
    }
    const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
    return `http://${host}:${String(address.port)}`;
  }

  private createApp(): express.Express {
    const app = express();
    app.use(express.json());

    app.post('/assignments', (req, res) => {
      const assignment = parseAssignment(req.body);
      if (!this.isAddressedToMe(assignment)) {
        const workerId = this.current?.workerId ?? this.config.workerId ?? '(unregistered)';
        throw new InvalidRequestError(`Assignment for '${assignment.workerId}' reached worker '${workerId}'`);
      }
      res.status(202).json({ status: 'accepted' });
      this.track(this.process(assignment));
    });

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', registration: this.current, inFlight: this.inFlight.size });
    });

    app.use(createErrorHandler(this.logger));
    return app;
  }

  /**
   * The coordinator may push work before the register reply arrives here, so until then
   * the requested id (or, without one, the advertised address) identifies this node.
   */
  private isAddressedToMe(assignment: ChunkAssignment): boolean {
    const workerId = this.current?.workerId ?? this.config.workerId;
    if (workerId !== undefined) return assignment.workerId === workerId;
    return assignment.workerAddress === this.address;
  }

  private async register(): Promise<Registration> {
    const workerId = this.current?.workerId ?? this.config.workerId;
    const registration = await this.client.register({
      ...(workerId === undefined ? {} : { workerId }),
      address: this.address,
    });
    this.current = registration;
    this.logger.info({ workerId: registration.workerId, generation: registration.generation }, 'Registered');
    return registration;
  }

  private async beat(): Promise<void> {
    const registration = this.current;
    if (!registration || this.beating) return;
    this.beating = true;
    try {
      await this.client.heartbeat(registration.workerId, registration.generation);
    } catch (err) {
      if (err instanceof CoordinatorRequestError && err.code !== undefined && RE_REGISTER_CODES.has(err.code)) {
        this.logger.warn({ err }, 'Registration lost, registering again');
        await this.register().catch((registerErr: unknown) => {
          this.logger.error({ err: registerErr }, 'Re-registration failed');
        });
      } else {
        this.logger.error({ err }, 'Heartbeat failed');
      }
    } finally {
      this.beating = false;
    }
  }

  private async process(assignment: ChunkAssignment): Promise<void> {
    const { chunkId, attemptToken } = assignment;
    const log = this.logger.child({ chunkId, attemptToken });

    try {
      const started = await this.client.reportStarted(chunkId, attemptToken);
      if (!started.applied && started.reason !== 'ALREADY_PROCESSING') {
        log.info({ reason: started.reason }, 'Assignment withdrawn before processing');
        return;
      }

      const partial = await processChunk(this.openSource(assignment.sourceRef), assignment, {
        windowSizeMs: assignment.windowSizeMs,
        parser: this.config.parser,
      });
      const outcome = await this.client.submitResult(chunkId, attemptToken, partial);
      log.info({ outcome, entries: partial.entryCount, parseErrors: partial.parseErrors }, 'Chunk result submitted');
    } catch (err) {
      log.error({ err }, 'Chunk processing failed');
      const reason = err instanceof Error ? err.message : String(err);
      await this.client.reportFailed(chunkId, attemptToken, reason).catch((reportErr: unknown) => {
        log.error({ err: reportErr }, 'Could not report chunk failure');
      });
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }
}
