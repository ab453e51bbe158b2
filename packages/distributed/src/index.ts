// Coordinator side
export { createCoordinatorApp } from './coordinator/createCoordinatorApp.js';
export { CoordinatorServer } from './coordinator/CoordinatorServer.js';
export type { CoordinatorServerOptions } from './coordinator/CoordinatorServer.js';
export { HttpChunkDispatcher } from './coordinator/HttpChunkDispatcher.js';
export type { HttpChunkDispatcherOptions } from './coordinator/HttpChunkDispatcher.js';

// Worker side
export { WorkerNode } from './worker/WorkerNode.js';
export type { WorkerNodeConfig } from './worker/WorkerNode.js';
export { CoordinatorClient, CoordinatorRequestError, isTransient } from './worker/CoordinatorClient.js';
export type { CoordinatorClientOptions, TransitionReply } from './worker/CoordinatorClient.js';

// HTTP plumbing
export { createErrorHandler, asyncHandler, statusForCode } from './http/errorHandler.js';

// Configuration and retries
export { loadCoordinatorSettings, loadWorkerSettings, withOverrides, DEFAULT_CHUNK_SIZE_BYTES } from './config.js';
export type { CoordinatorSettings, WorkerSettings, Environment } from './config.js';
export { withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
