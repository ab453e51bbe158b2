/** Machine-readable error codes raised by the coordinator. */
export type CoordinatorErrorCode =
  | 'DUPLICATE_ACTIVE_WORKER'
  | 'STALE_GENERATION'
  | 'UNKNOWN_WORKER'
  | 'INVALID_TRANSITION'
  | 'INVALID_PARTIAL_METRICS'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_REQUEST';

/** Base class for coordinator errors. The `code` survives serialization across the transport. */
export abstract class CoordinatorError extends Error {
  constructor(
    message: string,
    readonly code: CoordinatorErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A live worker already holds this identity at a different address. */
export class DuplicateActiveWorkerError extends CoordinatorError {
  constructor(
    readonly workerId: string,
    readonly generation: number,
  ) {
    super(`Worker '${workerId}' is already active under generation ${String(generation)}`, 'DUPLICATE_ACTIVE_WORKER');
  }
}

/** A heartbeat carried a generation the registry no longer honours. */
export class StaleGenerationError extends CoordinatorError {
  constructor(
    readonly workerId: string,
    readonly generation: number,
    readonly currentGeneration: number | null,
  ) {
    super(
      `Stale generation ${String(generation)} for worker '${workerId}'` +
        (currentGeneration === null ? ' (worker declared dead)' : ` (current: ${String(currentGeneration)})`),
      'STALE_GENERATION',
    );
  }
}

export class UnknownWorkerError extends CoordinatorError {
  constructor(readonly workerId: string) {
    super(`Unknown worker '${workerId}'`, 'UNKNOWN_WORKER');
  }
}

export class InvalidTransitionError extends CoordinatorError {
  constructor(entity: string, from: string, to: string) {
    super(`Invalid ${entity} transition: ${from} → ${to}`, 'INVALID_TRANSITION');
  }
}

/** A submitted partial-metrics payload failed validation. */
export class InvalidPartialMetricsError extends CoordinatorError {
  constructor(reason: string) {
    super(`Invalid partial metrics: ${reason}`, 'INVALID_PARTIAL_METRICS');
  }
}

export class ConfigurationError extends CoordinatorError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
  }
}

/** A transport message is missing a field or carries one of the wrong type. */
export class InvalidRequestError extends CoordinatorError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST');
  }
}

/** Narrow an unknown value to a coordinator error. */
export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}
