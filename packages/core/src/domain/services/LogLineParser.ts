import type { LogEntry } from '../model/LogEntry.js';
import { RESPONSE_TIME_METRIC } from '../model/LogEntry.js';

/** Turns one line of a log source into an entry, or `null` when the line is malformed. */
export interface LogLineParser {
  parse(line: string): LogEntry | null;
}

const MONTHS: Readonly<Record<string, number>> = {
  Jan: 0, Feb: 1, Mar: 2, Apr: 3, May: 4, Jun: 5, Jul: 6, Aug: 7, Sep: 8, Oct: 9, Nov: 10, Dec: 11,
};

const STANDARD_LINE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))? +(\w+) +(.+)$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(?:Z|([+-])(\d{2}):?(\d{2}))?$/;
const ACCESS_TIMESTAMP = /\[(\d{2})\/([A-Z][a-z]{2})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?(?: ([+-])(\d{2})(\d{2}))?\]/;
const ACCESS_DURATION = /(\d+(?:\.\d+)?)ms\s*$/;
const PROCESSED_IN = /processed in (\d+(?:\.\d+)?)ms/;

function fractionToMs(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number(fraction.padEnd(3, '0').slice(0, 3));
}

/** Build a UTC timestamp, rejecting out-of-range components (e.g. month 13). */
function utc(year: number, month: number, day: number, hour: number, minute: number, second: number, ms: number): number | null {
  const timestamp = Date.UTC(year, month, day, hour, minute, second, ms);
  const date = new Date(timestamp);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return timestamp;
}

/**
 * Parse `YYYY-MM-DD HH:MM[:SS[.ffffff]][Z|±HH:MM]`. Zone-less values are read as UTC.
 */
export function parseDateTime(value: string): number | null {
  const m = DATE_TIME.exec(value);
  if (!m) return null;
  const timestamp = utc(
    Number(m[1]),
    Number(m[2]) - 1,
    Number(m[3]),
    Number(m[4]),
    Number(m[5]),
    Number(m[6] ?? '0'),
    fractionToMs(m[7]),
  );
  if (timestamp === null || m[8] === undefined) return timestamp;

  const offsetHours = Number(m[9]);
  const offsetMinutes = Number(m[10]);
  if (offsetHours > 23 || offsetMinutes > 59) return null;
  const offsetMs = (offsetHours * 60 + offsetMinutes) * 60_000;
  return m[8] === '+' ? timestamp - offsetMs : timestamp + offsetMs;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `undefined` when the field is absent, `null` when it holds no usable duration. */
function durationField(data: Record<string, unknown>, key: string): number | null | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : null;
}

/**
 * Default parser. A JSON line whose `response_time` or `duration_ms` is not a
 * non-negative number is malformed. Formats are tried in order:
 *
 * 1. JSON: `{"timestamp": "2024-01-24 10:15:33.001", "level": "INFO", "message": "...", "duration_ms": 95}`
 * 2. Standard: `2024-01-24 10:15:32.123 INFO Request processed in 127ms`
 * 3. Access log: `192.168.1.1 - - [24/Jan/2024:10:15:33.125] GET /api/data HTTP/1.1 200 105ms`
 */
export class DefaultLogLineParser implements LogLineParser {
  parse(line: string): LogEntry | null {
    const trimmed = line.trim();
    if (trimmed === '') return null;

    if (trimmed.startsWith('{')) {
      return this.parseJson(trimmed);
    }
    return this.parseStandard(trimmed) ?? this.parseAccessLog(trimmed);
  }

  private parseJson(line: string): LogEntry | null {
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch {
      return null;
    }
    if (!isRecord(data) || typeof data['timestamp'] !== 'string') return null;

    const timestamp = parseDateTime(data['timestamp']);
    if (timestamp === null) return null;

    const responseTime = durationField(data, 'response_time');
    const durationMs = durationField(data, 'duration_ms');
    if (responseTime === null || durationMs === null) return null;

    const metrics: Record<string, number> = {};
    if (durationMs !== undefined) metrics['duration_ms'] = durationMs;
    if (responseTime !== undefined) {
      metrics[RESPONSE_TIME_METRIC] = responseTime;
    } else if (durationMs !== undefined) {
      metrics[RESPONSE_TIME_METRIC] = durationMs;
    }

    return {
      timestamp,
      level: typeof data['level'] === 'string' ? data['level'].toUpperCase() : 'UNKNOWN',
      message: typeof data['message'] === 'string' ? data['message'] : '',
      metrics,
    };
  }

  private parseStandard(line: string): LogEntry | null {
    const m = STANDARD_LINE.exec(line);
    if (!m) return null;

    const timestamp = utc(
      Number(m[1]),
      Number(m[2]) - 1,
      Number(m[3]),
      Number(m[4]),
      Number(m[5]),
      Number(m[6]),
      fractionToMs(m[7]),
    );
    const level = m[8];
    const message = m[9];
    if (timestamp === null || level === undefined || message === undefined) return null;

    const metrics: Record<string, number> = {};
    const processed = PROCESSED_IN.exec(message);
    if (processed) metrics[RESPONSE_TIME_METRIC] = Number(processed[1]);

    return { timestamp, level: level.toUpperCase(), message, metrics };
  }

  private parseAccessLog(line: string): LogEntry | null {
    const ts = ACCESS_TIMESTAMP.exec(line);
    const duration = ACCESS_DURATION.exec(line);
    if (!ts || !duration) return null;

    const month = MONTHS[ts[2] ?? ''];
    if (month === undefined) return null;

    let timestamp = utc(
      Number(ts[3]),
      month,
      Number(ts[1]),
      Number(ts[4]),
      Number(ts[5]),
      Number(ts[6]),
      fractionToMs(ts[7]),
    );
    if (timestamp === null) return null;

    if (ts[8] !== undefined) {
      const offsetMs = (Number(ts[9]) * 60 + Number(ts[10])) * 60_000;
      timestamp = ts[8] === '+' ? timestamp - offsetMs : timestamp + offsetMs;
    }

    return {
      timestamp,
      level: 'INFO',
      message: line,
      metrics: { [RESPONSE_TIME_METRIC]: Number(duration[1]) },
    };
  }
}
