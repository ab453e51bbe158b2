import { InvalidRequestError } from '@logfleet/core';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** @throws InvalidRequestError when the body is not a JSON object. */
export function requireObject(body: unknown, what = 'request body'): JsonObject {
  if (!isJsonObject(body)) {
    throw new InvalidRequestError(`${what} must be a JSON object`);
  }
  return body;
}

export function requireString(body: JsonObject, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value === '') {
    throw new InvalidRequestError(`${field} must be a non-empty string`);
  }
  return value;
}

export function optionalString(body: JsonObject, field: string): string | undefined {
  return body[field] === undefined || body[field] === null ? undefined : requireString(body, field);
}

export function requireInteger(body: JsonObject, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new InvalidRequestError(`${field} must be an integer`);
  }
  return value;
}
