import type { Level, Logger } from 'pino';
import type { DomainEvent, EventType } from '../../domain/events/DomainEvents.js';
import type { EventBus } from '../../application/EventBus.js';

/** Log level per domain event. Worker death is informational; permanent chunk failure is a warning. */
export const EVENT_LOG_LEVELS: Readonly<Record<EventType, Level>> = {
  'worker:registered': 'info',
  'worker:suspected': 'warn',
  'worker:recovered': 'info',
  'worker:dead': 'info',
  'source:split': 'info',
  'chunk:assigned': 'debug',
  'chunk:started': 'debug',
  'chunk:completed': 'info',
  'chunk:requeued': 'info',
  'chunk:exhausted': 'warn',
  'dispatch:failed': 'warn',
  'result:accepted': 'debug',
  'result:discarded': 'debug',
  'result:rejected': 'warn',
  'analysis:completed': 'info',
};

/**
 * Log every event published on the bus.
 *
 * @returns a function that detaches the logger again.
 */
export function attachEventLogger(bus: EventBus, logger: Logger): () => void {
  const handler = (event: DomainEvent): void => {
    const { type, ...fields } = event;
    logger[EVENT_LOG_LEVELS[type]](fields, type);
  };
  bus.onAny(handler);
  return () => {
    bus.offAny(handler);
  };
}
