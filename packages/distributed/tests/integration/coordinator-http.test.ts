import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { BufferLogSource, Coordinator } from '@logfleet/core';
import { createCoordinatorApp } from '../../src/coordinator/createCoordinatorApp.js';
import { T0, getJson, listen, postJson, silentLogger } from '../helpers.js';

const CHUNK_PATH = `/chunks/${encodeURIComponent('source-1/0')}`;

describe('coordinator HTTP API', () => {
  let coordinator: Coordinator;
  let baseUrl: string;
  let close: () => Promise<void>;

  beforeEach(async () => {
    coordinator = new Coordinator({ coordinatorId: 'coord-http', logger: silentLogger() });
    const listening = await listen(createCoordinatorApp(coordinator, silentLogger()));
    baseUrl = listening.url;
    close = listening.close;
  });

  afterEach(async () => {
    await close();
    await coordinator.stop();
  });

  async function assignOne(): Promise<number> {
    await coordinator.addSource(new BufferLogSource('a\nb\n'), { targetChunkCount: 1 });
    await coordinator.register({ workerId: 'w1', address: 'http://w1' });
    const assignment = await coordinator.assignChunk('w1');
    if (!assignment) throw new Error('expected an assignment');
    return assignment.attemptToken;
  }

  it('should answer health checks', async () => {
    expect(await getJson(baseUrl, '/health')).toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('should register workers and accept their heartbeats', async () => {
    const registered = await postJson(baseUrl, '/workers/register', { workerId: 'w1', address: 'http://w1' });
    expect(registered).toEqual({ status: 200, body: { workerId: 'w1', generation: 1 } });

    const beat = await postJson(baseUrl, '/workers/heartbeat', { workerId: 'w1', generation: 1 });
    expect(beat).toEqual({ status: 200, body: { status: 'ok' } });
    expect(coordinator.getStatus().workers).toEqual([expect.objectContaining({ workerId: 'w1', status: 'ACTIVE' })]);
  });

  it('should assign an id when the worker brings none', async () => {
    const registered = await postJson(baseUrl, '/workers/register', { address: 'http://anonymous' });

    expect(registered.status).toBe(200);
    expect(registered.body).toEqual({ workerId: expect.any(String), generation: 1 });
  });

  it('should answer 409 for a heartbeat from a stale generation', async () => {
    await postJson(baseUrl, '/workers/register', { workerId: 'w1', address: 'http://w1' });

    const reply = await postJson(baseUrl, '/workers/heartbeat', { workerId: 'w1', generation: 7 });

    expect(reply.status).toBe(409);
    expect(reply.body).toMatchObject({ code: 'STALE_GENERATION' });
  });

  it('should answer 404 for a heartbeat from an unknown worker', async () => {
    const reply = await postJson(baseUrl, '/workers/heartbeat', { workerId: 'ghost', generation: 1 });

    expect(reply.status).toBe(404);
    expect(reply.body).toMatchObject({ code: 'UNKNOWN_WORKER' });
  });

  it('should answer 409 when an active worker id registers from another address', async () => {
    await postJson(baseUrl, '/workers/register', { workerId: 'w1', address: 'http://w1' });
    await postJson(baseUrl, '/workers/heartbeat', { workerId: 'w1', generation: 1 });

    const reply = await postJson(baseUrl, '/workers/register', { workerId: 'w1', address: 'http://elsewhere' });

    expect(reply.status).toBe(409);
    expect(reply.body).toMatchObject({ code: 'DUPLICATE_ACTIVE_WORKER' });
  });

  it('should answer 400 for a missing field', async () => {
    const reply = await postJson(baseUrl, '/workers/register', { workerId: 'w1' });

    expect(reply).toEqual({
      status: 400,
      body: { error: 'address must be a non-empty string', code: 'INVALID_REQUEST' },
    });
  });

  it('should answer 400 for a body that is not JSON', async () => {
    const reply = await postJson(baseUrl, '/workers/register', '{"workerId": ');

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ code: 'INVALID_REQUEST' });
  });

  it('should report started chunks and repeat reports idempotently', async () => {
    const attemptToken = await assignOne();

    expect(await postJson(baseUrl, `${CHUNK_PATH}/started`, { attemptToken })).toEqual({
      status: 200,
      body: { applied: true },
    });
    expect(await postJson(baseUrl, `${CHUNK_PATH}/started`, { attemptToken })).toEqual({
      status: 200,
      body: { applied: false, reason: 'ALREADY_PROCESSING' },
    });
  });

  it('should requeue a chunk reported as failed', async () => {
    const attemptToken = await assignOne();

    const reply = await postJson(baseUrl, `${CHUNK_PATH}/failed`, { attemptToken, error: 'disk unreadable' });

    expect(reply).toEqual({ status: 200, body: { applied: true } });
    expect(coordinator.getStatus().progress).toMatchObject({ pending: 1, inFlight: 0 });
  });

  it('should acknowledge results and classify a resubmission as duplicate', async () => {
    const attemptToken = await assignOne();
    const metrics = {
      windowSizeMs: 60_000,
      windows: [{ windowStart: T0, requestCount: 2, errorCount: 1, responseTimeSum: 30, responseTimeCount: 2 }],
      parseErrors: 0,
      entryCount: 2,
    };

    const first = await postJson(baseUrl, '/results', { chunkId: 'source-1/0', attemptToken, metrics });
    const second = await postJson(baseUrl, '/results', { chunkId: 'source-1/0', attemptToken, metrics });

    expect(first).toEqual({ status: 200, body: { status: 'acknowledged', outcome: 'ACCEPTED' } });
    expect(second).toEqual({ status: 200, body: { status: 'acknowledged', outcome: 'DUPLICATE' } });
  });

  it('should acknowledge results for unknown chunks without failing', async () => {
    const reply = await postJson(baseUrl, '/results', { chunkId: 'source-9/0', attemptToken: 1, metrics: {} });

    expect(reply).toEqual({ status: 200, body: { status: 'acknowledged', outcome: 'UNKNOWN_CHUNK' } });
  });

  it('should serve metrics restricted to a time range', async () => {
    const attemptToken = await assignOne();
    await coordinator.submitResult('source-1/0', attemptToken, {
      windowSizeMs: 60_000,
      windows: [
        { windowStart: T0, requestCount: 2, errorCount: 0, responseTimeSum: 0, responseTimeCount: 0 },
        { windowStart: T0 + 60_000, requestCount: 4, errorCount: 1, responseTimeSum: 40, responseTimeCount: 4 },
      ],
      parseErrors: 0,
      entryCount: 6,
    });

    const byEpoch = await getJson(baseUrl, `/metrics?from=${String(T0 + 60_000)}`);
    const byIso = await getJson(baseUrl, '/metrics?from=2024-01-24T12:01:00Z');

    expect(byEpoch.status).toBe(200);
    expect(byEpoch.body).toMatchObject({
      windows: [{ windowStart: T0 + 60_000, requestCount: 4, errorCount: 1, errorRate: 0.25, avgResponseTime: 10 }],
      totals: { requestCount: 4, errorCount: 1, errorRate: 0.25, avgResponseTime: 10 },
      complete: true,
    });
    expect(byIso.body).toEqual(byEpoch.body);
  });

  it('should read a zone-less minute-precision bound as UTC', async () => {
    const attemptToken = await assignOne();
    await coordinator.submitResult('source-1/0', attemptToken, {
      windowSizeMs: 60_000,
      windows: [
        { windowStart: T0, requestCount: 2, errorCount: 0, responseTimeSum: 0, responseTimeCount: 0 },
        { windowStart: T0 + 60_000, requestCount: 4, errorCount: 1, responseTimeSum: 40, responseTimeCount: 4 },
      ],
      parseErrors: 0,
      entryCount: 6,
    });

    const reply = await getJson(baseUrl, '/metrics?from=2024-01-24T12:01');

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      totals: { requestCount: 4, errorCount: 1, errorRate: 0.25, avgResponseTime: 10 },
    });
  });

  it('should reject a date without a time of day', async () => {
    const reply = await getJson(baseUrl, '/metrics?from=2024-01-24');

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ code: 'INVALID_REQUEST' });
  });

  it('should answer 400 for a time bound that does not parse', async () => {
    const reply = await getJson(baseUrl, '/metrics?from=yesterday');

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ code: 'INVALID_REQUEST' });
  });

  it('should report status', async () => {
    await assignOne();

    const reply = await getJson(baseUrl, '/status');

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      coordinatorId: 'coord-http',
      progress: { total: 1, pending: 0, inFlight: 1, completed: 0, failed: 0 },
      complete: false,
      workers: [{ workerId: 'w1', address: 'http://w1', generation: 1 }],
    });
  });

  it('should answer 404 for unknown routes', async () => {
    expect(await getJson(baseUrl, '/nowhere')).toEqual({
      status: 404,
      body: { error: 'Not Found', code: 'NOT_FOUND' },
    });
  });
});
