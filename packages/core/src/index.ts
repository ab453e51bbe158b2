// Main entry point
export { Coordinator } from './Coordinator.js';
export type { CoordinatorConfig } from './Coordinator.js';

// Domain model
export type { Chunk, ByteRange } from './domain/model/Chunk.js';
export {
  createPendingChunk,
  markChunkAssigned,
  markChunkProcessing,
  markChunkCompleted,
  markChunkAttemptFailed,
  markChunkRequeued,
  rangeLength,
} from './domain/model/Chunk.js';
export { ChunkStatus, canTransitionChunk, isTerminal, isInFlight } from './domain/model/ChunkStatus.js';
export type { WorkerRecord, Registration, RegistrationRequest } from './domain/model/Worker.js';
export { WorkerStatus, canTransitionWorker, isLive, isAssignable } from './domain/model/WorkerStatus.js';
export type { LogEntry, Severity } from './domain/model/LogEntry.js';
export { RESPONSE_TIME_METRIC, isErrorEntry } from './domain/model/LogEntry.js';
export type {
  WindowCounters,
  WindowPartial,
  PartialMetrics,
  WindowMetrics,
  MetricsTotals,
  TimeRange,
  CoverageGap,
  ChunkProgress,
  MetricsReport,
} from './domain/model/Metrics.js';
export { emptyCounters, addCounters, deriveMetrics, windowStartFor } from './domain/model/Metrics.js';
export type { CoordinatorState, SourceDescriptor } from './domain/model/CoordinatorState.js';

// Errors
export type { CoordinatorErrorCode } from './domain/errors/CoordinatorErrors.js';
export {
  CoordinatorError,
  DuplicateActiveWorkerError,
  StaleGenerationError,
  UnknownWorkerError,
  InvalidTransitionError,
  InvalidPartialMetricsError,
  ConfigurationError,
  InvalidRequestError,
  isCoordinatorError,
} from './domain/errors/CoordinatorErrors.js';

// Domain services
export { ChunkSplitter } from './domain/services/ChunkSplitter.js';
export { scanEntryBoundaries } from './domain/services/scanEntryBoundaries.js';
export type { LogLineParser } from './domain/services/LogLineParser.js';
export { DefaultLogLineParser, parseDateTime } from './domain/services/LogLineParser.js';
export {
  MetricsAggregationEngine,
  DEFAULT_WINDOW_SIZE_MS,
  parsePartialMetrics,
} from './domain/services/MetricsAggregationEngine.js';
export { LeastAttemptsPolicy, FifoRoundRobinPolicy } from './domain/services/AssignmentPolicies.js';

// Application components (for custom composition and extension packages)
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';
export { WorkerRegistry } from './application/WorkerRegistry.js';
export type { RegistrationResult, DeadWorker, LivenessSweepResult } from './application/WorkerRegistry.js';
export { ChunkScheduler } from './application/ChunkScheduler.js';
export type {
  ChunkSchedulerOptions,
  TransitionOutcome,
  TransitionRejection,
} from './application/ChunkScheduler.js';
export { HeartbeatMonitor } from './application/HeartbeatMonitor.js';
export type { HeartbeatMonitorOptions, SweepResult } from './application/HeartbeatMonitor.js';
export { ResultAggregator } from './application/ResultAggregator.js';
export type { SubmissionOutcome } from './application/ResultAggregator.js';

// Use case types
export type { AddSourceOptions, AddSourceResult } from './application/usecases/AddSource.js';
export type { CoordinatorStatus, WorkerSummary } from './application/usecases/GetCoordinatorStatus.js';
export { processChunk } from './application/usecases/ProcessChunk.js';
export type { ProcessChunkOptions } from './application/usecases/ProcessChunk.js';

// Ports (for custom implementations)
export type { LogSource, LogSourceResolver, SourceMetadata } from './domain/ports/LogSource.js';
export type { ChunkDispatcher, ChunkAssignment } from './domain/ports/ChunkDispatcher.js';
export type { AssignmentPolicy } from './domain/ports/AssignmentPolicy.js';
export type { StateStore } from './domain/ports/StateStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  AnalysisSummary,
  WorkerRegisteredEvent,
  WorkerSuspectedEvent,
  WorkerRecoveredEvent,
  WorkerDeadEvent,
  SourceSplitEvent,
  ChunkAssignedEvent,
  ChunkStartedEvent,
  ChunkCompletedEvent,
  ChunkRequeuedEvent,
  ChunkExhaustedEvent,
  DispatchFailedEvent,
  ResultAcceptedEvent,
  ResultDiscardedEvent,
  ResultRejectedEvent,
  AnalysisCompletedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources, state stores and logging)
export { BufferLogSource } from './infrastructure/sources/BufferLogSource.js';
export type { BufferLogSourceOptions } from './infrastructure/sources/BufferLogSource.js';
export { FileLogSource } from './infrastructure/sources/FileLogSource.js';
export type { FileLogSourceOptions } from './infrastructure/sources/FileLogSource.js';
export { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';
export { FileStateStore } from './infrastructure/state/FileStateStore.js';
export type { FileStateStoreOptions } from './infrastructure/state/FileStateStore.js';
export { createLogger } from './infrastructure/logging/createLogger.js';
export type { LoggerOptions } from './infrastructure/logging/createLogger.js';
export { attachEventLogger, EVENT_LOG_LEVELS } from './infrastructure/logging/attachEventLogger.js';
