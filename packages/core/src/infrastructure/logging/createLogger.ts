import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  /** Component name stamped on every line (e.g. `coordinator`, `worker`). */
  readonly name: string;
  /** Defaults to `LOG_LEVEL`, then `info`. */
  readonly level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/** Build a pino logger writing JSON lines to stdout. */
export function createLogger(options: LoggerOptions): Logger {
  const fromEnv = process.env['LOG_LEVEL']?.toLowerCase();
  const level: LevelWithSilent = options.level ?? (isLevel(fromEnv) ? fromEnv : 'info');
  return pino({ name: options.name, level });
}
