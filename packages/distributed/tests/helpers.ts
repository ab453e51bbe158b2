import type { Server } from 'node:http';
import type { Express } from 'express';
import pino from 'pino';
import type { Logger } from 'pino';

/** 2024-01-24 12:00:00 UTC. */
export const T0 = Date.UTC(2024, 0, 24, 12, 0, 0);

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** `2024-01-24 12:00:05.000 ERROR Request processed in 42ms` */
export function standardLine(timestamp: number, level: string, responseTimeMs: number): string {
  const stamp = new Date(timestamp).toISOString().slice(0, 23).replace('T', ' ');
  return `${stamp} ${level} Request processed in ${String(responseTimeMs)}ms`;
}

export interface JsonReply {
  readonly status: number;
  readonly body: unknown;
}

export async function postJson(baseUrl: string, path: string, body: unknown): Promise<JsonReply> {
  const response = await fetch(new URL(path, baseUrl), {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
  return { status: response.status, body: await response.json() };
}

export async function getJson(baseUrl: string, path: string): Promise<JsonReply> {
  const response = await fetch(new URL(path, baseUrl));
  return { status: response.status, body: await response.json() };
}

/** Listen on a free localhost port. `close()` also drops open connections. */
export async function listen(app: Express): Promise<{ url: string; close: () => Promise<void> }> {
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, '127.0.0.1', () => {
      resolve(started);
    });
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('expected a TCP address');
  return {
    url: `http://127.0.0.1:${String(address.port)}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server.closeAllConnections();
      }),
  };
}
