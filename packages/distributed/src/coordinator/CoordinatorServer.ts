import type { Server } from 'node:http';
import type { Logger } from 'pino';
import type { Coordinator } from '@logfleet/core';
import { createLogger } from '@logfleet/core';
import { createCoordinatorApp } from './createCoordinatorApp.js';

export interface CoordinatorServerOptions {
  /** Default: `127.0.0.1`. */
  readonly host?: string;
  /** `0` picks a free port. Default: `8000`. */
  readonly port?: number;
  /** Default: a pino logger named `coordinator-http`. */
  readonly logger?: Logger;
}

/** HTTP server around a coordinator. Starts and stops the liveness sweep with the server. */
export class CoordinatorServer {
  private server: Server | null = null;
  private readonly logger: Logger;

  constructor(
    readonly coordinator: Coordinator,
    private readonly options: CoordinatorServerOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: 'coordinator-http' });
  }

  /** Listen and start sweeping. Resolves with the base URL. */
  async listen(): Promise<string> {
    if (this.server) return this.url;
    const app = createCoordinatorApp(this.coordinator, this.logger);
    const host = this.options.host ?? '127.0.0.1';

    this.server = await new Promise<Server>((resolve, reject) => {
      const server = app.listen(this.options.port ?? 8000, host, () => {
        server.off('error', reject);
        resolve(server);
      });
      server.once('error', reject);
    });

    this.coordinator.start();
    this.logger.info({ url: this.url }, 'Coordinator listening');
    return this.url;
  }

  get url(): string {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Coordinator server is not listening');
    }
    const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
    return `http://${host}:${String(address.port)}`;
  }

  /** Stop sweeping, wait for background work and close the listener. */
  async close(): Promise<void> {
    await this.coordinator.stop();
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
}
