import { EventParseError, errorMessage } from '../../../infra/errors.js';
import { isTable } from '../../../infra/validator.js';
import type { EventSource } from '../types.js';

export type Payload = Record<string, unknown>;

export function parsePayload(raw: string, source: EventSource): Payload {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (e) {
    throw new EventParseError(source, errorMessage(e), { cause: e });
  }
  if (!isTable(value)) throw new EventParseError(source, 'payload must be a JSON object');
  return value;
}

export function text(payload: Payload | undefined, key: string): string | undefined {
  const value = payload?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function object(payload: Payload | undefined, key: string): Payload | undefined {
  const value = payload?.[key];
  return isTable(value) ? value : undefined;
}

export const UNKNOWN_SESSION = 'unknown';

export function now(): string {
  return new Date().toISOString();
}
