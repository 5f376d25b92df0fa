/**
 * Schema Validator
 *
 * Pure validation of event payloads against the registry. Used on the
 * publish path (before anything reaches the broker) and on the subscribe
 * path (before a handler sees the payload).
 */

import type { ZodError } from 'zod';
import { SchemaError, UnknownEventKindError } from '../errors';
import type { SchemaIssue } from '../errors';
import { EVENT_SCHEMAS, isEventName } from './schemas';
import type { EventName, EventPayload } from './schemas';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: SchemaError };

/**
 * Validate a payload for a known event name.
 * Unknown keys are stripped from the returned payload.
 */
export function validatePayload<N extends EventName>(
  eventName: N,
  rawPayload: unknown
): ValidationResult<EventPayload<N>> {
  const schema = EVENT_SCHEMAS[eventName];
  const parsed = schema.safeParse(rawPayload);

  if (!parsed.success) {
    return { ok: false, error: new SchemaError(eventName, toIssues(parsed.error)) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Validate a payload for an event name that arrived as a plain string.
 * Names outside the registry fail with UnknownEventKindError.
 */
export function validate(
  eventName: string,
  rawPayload: unknown
): ValidationResult<EventPayload<EventName>> {
  if (!isEventName(eventName)) {
    return { ok: false, error: new UnknownEventKindError(eventName) };
  }
  return validatePayload(eventName, rawPayload);
}

export function toIssues(error: ZodError): SchemaIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
}
