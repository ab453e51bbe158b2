import { ChunkStatus, WorkerStatus } from '@logfleet/core';
import type { Chunk, CoordinatorState, SourceDescriptor, WorkerRecord } from '@logfleet/core';
import type { CoordinatorRow } from '../models/CoordinatorModel.js';
import type { ChunkRow } from '../models/ChunkModel.js';
import type { WorkerRow } from '../models/WorkerModel.js';
import { parseJson } from '../utils/parseJson.js';

export interface StateRows {
  readonly coordinator: CoordinatorRow;
  readonly chunks: readonly ChunkRow[];
  readonly workers: readonly WorkerRow[];
}

function corrupt(coordinatorId: string, detail: string): Error {
  return new Error(`Corrupt state for coordinator '${coordinatorId}': ${detail}`);
}

function isChunkStatus(value: string): value is ChunkStatus {
  return Object.values(ChunkStatus).some((status) => status === value);
}

function isWorkerStatus(value: string): value is WorkerStatus {
  return Object.values(WorkerStatus).some((status) => status === value);
}

/** BIGINT columns come back as strings on some dialects. */
function toNumber(value: number | string): number {
  return typeof value === 'number' ? value : Number(value);
}

function toNullableNumber(value: number | string | null): number | null {
  return value === null ? null : toNumber(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSource(coordinatorId: string, value: unknown): SourceDescriptor {
  if (!isRecord(value)) throw corrupt(coordinatorId, 'source is not an object');
  const { sourceId, sourceRef, sourceLength, addedAt } = value;
  if (
    typeof sourceId !== 'string' ||
    typeof sourceRef !== 'string' ||
    typeof sourceLength !== 'number' ||
    typeof addedAt !== 'number'
  ) {
    throw corrupt(coordinatorId, 'source descriptor has missing fields');
  }
  return { sourceId, sourceRef, sourceLength, addedAt };
}

function toStringList(coordinatorId: string, value: unknown): string[] {
  const parsed = parseJson(value);
  if (!Array.isArray(parsed)) throw corrupt(coordinatorId, 'expected a JSON array');
  return parsed.map((item: unknown) => {
    if (typeof item !== 'string') throw corrupt(coordinatorId, 'expected an array of strings');
    return item;
  });
}

export function toRows(state: CoordinatorState): StateRows {
  return {
    coordinator: {
      id: state.id,
      windowSizeMs: state.windowSizeMs,
      maxAttempts: state.maxAttempts,
      sources: state.sources.map((source) => ({ ...source })),
      nextAttemptToken: state.nextAttemptToken,
      startedAt: state.startedAt,
      updatedAt: state.updatedAt,
    },
    chunks: state.chunks.map((chunk, position) => ({
      coordinatorId: state.id,
      chunkId: chunk.chunkId,
      position,
      sourceId: chunk.sourceId,
      chunkIndex: chunk.index,
      start: chunk.start,
      end: chunk.end,
      status: chunk.status,
      workerId: chunk.workerId,
      attemptCount: chunk.attemptCount,
      attemptToken: chunk.attemptToken,
      assignedAt: chunk.assignedAt,
      lastError: chunk.lastError ?? null,
    })),
    workers: state.workers.map((worker, position) => ({
      coordinatorId: state.id,
      workerId: worker.workerId,
      position,
      address: worker.address,
      generation: worker.generation,
      status: worker.status,
      registeredAt: worker.registeredAt,
      lastHeartbeatAt: worker.lastHeartbeatAt,
      assignedChunkIds: [...worker.assignedChunkIds],
    })),
  };
}

export function toChunk(row: ChunkRow): Chunk {
  if (!isChunkStatus(row.status)) throw corrupt(row.coordinatorId, `unknown chunk status '${row.status}'`);
  const chunk: Chunk = {
    chunkId: row.chunkId,
    sourceId: row.sourceId,
    index: row.chunkIndex,
    start: toNumber(row.start),
    end: toNumber(row.end),
    status: row.status,
    workerId: row.workerId,
    attemptCount: row.attemptCount,
    attemptToken: toNullableNumber(row.attemptToken),
    assignedAt: toNullableNumber(row.assignedAt),
  };
  return row.lastError === null ? chunk : { ...chunk, lastError: row.lastError };
}

export function toWorker(row: WorkerRow): WorkerRecord {
  if (!isWorkerStatus(row.status)) throw corrupt(row.coordinatorId, `unknown worker status '${row.status}'`);
  return {
    workerId: row.workerId,
    address: row.address,
    generation: row.generation,
    status: row.status,
    registeredAt: toNumber(row.registeredAt),
    lastHeartbeatAt: toNumber(row.lastHeartbeatAt),
    assignedChunkIds: toStringList(row.coordinatorId, row.assignedChunkIds),
  };
}

/** Rows must already be in ledger order. */
export function toDomain(rows: StateRows): CoordinatorState {
  const { coordinator } = rows;
  const sources = parseJson(coordinator.sources);
  if (!Array.isArray(sources)) throw corrupt(coordinator.id, 'sources is not a JSON array');

  return {
    id: coordinator.id,
    windowSizeMs: coordinator.windowSizeMs,
    maxAttempts: coordinator.maxAttempts,
    sources: sources.map((source: unknown) => toSource(coordinator.id, source)),
    chunks: rows.chunks.map(toChunk),
    workers: rows.workers.map(toWorker),
    nextAttemptToken: toNumber(coordinator.nextAttemptToken),
    startedAt: toNumber(coordinator.startedAt),
    updatedAt: toNumber(coordinator.updatedAt),
  };
}
