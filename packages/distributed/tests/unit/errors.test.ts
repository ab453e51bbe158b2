import { describe, it, expect } from 'vitest';
import { statusForCode } from '../../src/http/errorHandler.js';
import { CoordinatorRequestError, isTransient } from '../../src/worker/CoordinatorClient.js';

describe('statusForCode', () => {
  it('should map coordinator error codes to HTTP statuses', () => {
    expect(statusForCode('STALE_GENERATION')).toBe(409);
    expect(statusForCode('DUPLICATE_ACTIVE_WORKER')).toBe(409);
    expect(statusForCode('UNKNOWN_WORKER')).toBe(404);
    expect(statusForCode('INVALID_PARTIAL_METRICS')).toBe(400);
    expect(statusForCode('INVALID_REQUEST')).toBe(400);
  });
});

describe('isTransient', () => {
  it('should retry server errors but not client errors', () => {
    expect(isTransient(new CoordinatorRequestError(503, undefined, 'unavailable'))).toBe(true);
    expect(isTransient(new CoordinatorRequestError(409, 'STALE_GENERATION', 'stale'))).toBe(false);
  });

  it('should retry network failures and timeouts', () => {
    expect(isTransient(new TypeError('fetch failed'))).toBe(true);
    expect(isTransient(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }))).toBe(true);
  });

  it('should not retry anything else', () => {
    expect(isTransient(new Error('Malformed response'))).toBe(false);
    expect(isTransient('boom')).toBe(false);
  });
});
