import type { WorkerStatus } from './WorkerStatus.js';

/** A worker as tracked by the coordinator's registry. */
export interface WorkerRecord {
  /** Opaque identity chosen by the worker or allocated at registration. */
  readonly workerId: string;
  /** Network address the coordinator uses to reach the worker (e.g. `http://host:port`). */
  readonly address: string;
  /** Incremented every time the identity is re-registered after being superseded or declared dead. */
  readonly generation: number;
  readonly status: WorkerStatus;
  /** Epoch ms of the registration that started this generation. */
  readonly registeredAt: number;
  /** Epoch ms of the last registration or accepted heartbeat. */
  readonly lastHeartbeatAt: number;
  /** Chunks currently held by this worker (`ASSIGNED` or `PROCESSING`). */
  readonly assignedChunkIds: readonly string[];
}

/** Answer to a registration request. */
export interface Registration {
  readonly workerId: string;
  readonly generation: number;
}

/** Request accepted by `register()`. */
export interface RegistrationRequest {
  /** Identity to (re-)use. When omitted a fresh identity is allocated. */
  readonly workerId?: string;
  readonly address: string;
}
