import { describe, it, expect, afterEach } from 'vitest';
import express from 'express';
import { CoordinatorClient, CoordinatorRequestError } from '../../src/worker/CoordinatorClient.js';
import { listen } from '../helpers.js';

describe('CoordinatorClient', () => {
  let close: (() => Promise<void>) | null = null;

  afterEach(async () => {
    await close?.();
    close = null;
  });

  async function serve(app: express.Express): Promise<string> {
    const listening = await listen(app);
    close = listening.close;
    return listening.url;
  }

  it('should retry a coordinator that is briefly unavailable', async () => {
    let calls = 0;
    const app = express();
    app.use(express.json());
    app.post('/workers/register', (req, res) => {
      calls++;
      if (calls < 3) {
        res.status(503).json({ error: 'starting up' });
        return;
      }
      res.json({ workerId: 'w1', generation: 2 });
    });
    const client = new CoordinatorClient({ baseUrl: await serve(app), retryDelayMs: 1 });

    const registration = await client.register({ workerId: 'w1', address: 'http://w1' });

    expect(registration).toEqual({ workerId: 'w1', generation: 2 });
    expect(calls).toBe(3);
  });

  it('should not retry a rejection', async () => {
    let calls = 0;
    const app = express();
    app.post('/workers/heartbeat', (_req, res) => {
      calls++;
      res.status(409).json({ error: 'Stale generation', code: 'STALE_GENERATION' });
    });
    const client = new CoordinatorClient({ baseUrl: await serve(app), retryDelayMs: 1 });

    const failure = await client.heartbeat('w1', 1).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(CoordinatorRequestError);
    expect(failure).toMatchObject({ status: 409, code: 'STALE_GENERATION', message: 'Stale generation' });
    expect(calls).toBe(1);
  });

  it('should give up after the configured retries', async () => {
    let calls = 0;
    const app = express();
    app.post('/results', (_req, res) => {
      calls++;
      res.status(500).send('boom');
    });
    const client = new CoordinatorClient({ baseUrl: await serve(app), maxRetries: 2, retryDelayMs: 1 });

    const failure = await client
      .submitResult('source-1/0', 1, { windowSizeMs: 60_000, windows: [], parseErrors: 0, entryCount: 0 })
      .catch((err: unknown) => err);

    expect(failure).toMatchObject({ status: 500, message: 'boom' });
    expect(calls).toBe(3);
  });

  it('should time out a coordinator that never answers', async () => {
    const app = express();
    app.post('/workers/heartbeat', () => {
      // never answers
    });
    const client = new CoordinatorClient({ baseUrl: await serve(app), timeoutMs: 50, maxRetries: 0 });

    const failure = await client.heartbeat('w1', 1).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(Error);
    expect(failure instanceof Error ? failure.name : null).toBe('TimeoutError');
  });

  it('should encode chunk ids in report paths', async () => {
    const paths: string[] = [];
    const app = express();
    app.use(express.json());
    app.post('/chunks/:chunkId/started', (req, res) => {
      paths.push(req.params['chunkId'] ?? '');
      res.json({ applied: false, reason: 'STALE_TOKEN' });
    });
    const client = new CoordinatorClient({ baseUrl: await serve(app) });

    const reply = await client.reportStarted('source-1/3', 4);

    expect(reply).toEqual({ applied: false, reason: 'STALE_TOKEN' });
    expect(paths).toEqual(['source-1/3']);
  });

  it('should reject a reply of the wrong shape', async () => {
    const app = express();
    app.post('/results', (_req, res) => {
      res.json({ status: 'acknowledged', outcome: 'MAYBE' });
    });
    const client = new CoordinatorClient({ baseUrl: await serve(app) });

    await expect(
      client.submitResult('source-1/0', 1, { windowSizeMs: 60_000, windows: [], parseErrors: 0, entryCount: 0 }),
    ).rejects.toThrow('Malformed response from coordinator for /results');
  });
});
