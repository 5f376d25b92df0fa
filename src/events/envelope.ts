/**
 * Event Envelope
 *
 * The wrapper every message travels in. An envelope is built once, validated,
 * frozen, and serialized to UTF-8 JSON for the broker:
 *
 *   {
 *     "id": "6f1c…",
 *     "name": "trip.assigned",
 *     "payload": { "tripId": "T1", "driverId": "D1" },
 *     "timestamp": "2024-05-01T12:00:00.000Z",
 *     "correlationId": "c0ffee…",
 *     "source": "trip-service"
 *   }
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { SchemaError, UnknownEventKindError } from '../errors';
import { isEventName } from './schemas';
import type { EventName, EventPayload } from './schemas';
import { toIssues, validatePayload } from './validator';
import type { ValidationResult } from './validator';

// =============================================================================
// TYPES
// =============================================================================

export interface EventEnvelope<N extends EventName> {
  readonly id: string;
  readonly name: N;
  readonly payload: Readonly<EventPayload<N>>;
  /** ISO-8601 UTC */
  readonly timestamp: string;
  /** Shared by every event in one trip's chain */
  readonly correlationId: string;
  /** Name of the publishing service */
  readonly source: string;
}

/**
 * Discriminated union of envelopes, one member per event name.
 * Switching on `name` narrows `payload`.
 */
export type AnyEnvelope<N extends EventName = EventName> = {
  [K in N]: EventEnvelope<K>;
}[N];

const EnvelopeWireSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  timestamp: z.string().datetime(),
  correlationId: z.string().min(1),
  source: z.string().min(1),
  payload: z.unknown()
});

// =============================================================================
// CONSTRUCTION
// =============================================================================

export interface EnvelopeOptions {
  correlationId: string;
  source: string;
  /** Defaults to a fresh uuid */
  id?: string;
  now?: () => Date;
}

/**
 * Build a frozen envelope. Throws SchemaError when the payload is invalid.
 */
export function createEnvelope<N extends EventName>(
  name: N,
  payload: EventPayload<N>,
  options: EnvelopeOptions
): EventEnvelope<N> {
  const result = validatePayload(name, payload);
  if (!result.ok) {
    throw result.error;
  }

  const envelope: EventEnvelope<N> = {
    id: options.id ?? uuidv4(),
    name,
    payload: result.value,
    timestamp: (options.now ?? (() => new Date()))().toISOString(),
    correlationId: options.correlationId,
    source: options.source
  };
  return deepFreeze(envelope);
}

// =============================================================================
// WIRE FORMAT
// =============================================================================

export function encodeEnvelope<N extends EventName>(envelope: EventEnvelope<N>): Buffer {
  return Buffer.from(JSON.stringify(envelope), 'utf-8');
}

/**
 * Parse bytes from the broker into an envelope for the expected event name.
 *
 * Fails with SchemaError for malformed JSON, a malformed wrapper, a name
 * that does not match the subscription, or an invalid payload; and with
 * UnknownEventKindError for names outside the registry.
 */
export function decodeEnvelope<N extends EventName>(
  body: Buffer | string,
  expectedName: N
): ValidationResult<EventEnvelope<N>> {
  let raw: unknown;
  try {
    raw = JSON.parse(typeof body === 'string' ? body : body.toString('utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new SchemaError(expectedName, [{ path: '', message }], `Malformed JSON for ${expectedName}: ${message}`)
    };
  }

  const wrapper = EnvelopeWireSchema.safeParse(raw);
  if (!wrapper.success) {
    return { ok: false, error: new SchemaError(expectedName, toIssues(wrapper.error)) };
  }

  const { name } = wrapper.data;
  if (!isEventName(name)) {
    return { ok: false, error: new UnknownEventKindError(name) };
  }
  if (name !== expectedName) {
    return {
      ok: false,
      error: new SchemaError(
        expectedName,
        [{ path: 'name', message: `expected ${expectedName}, received ${name}` }]
      )
    };
  }

  const payload = validatePayload(expectedName, wrapper.data.payload);
  if (!payload.ok) {
    return payload;
  }

  return {
    ok: true,
    value: deepFreeze({
      id: wrapper.data.id,
      name: expectedName,
      payload: payload.value,
      timestamp: wrapper.data.timestamp,
      correlationId: wrapper.data.correlationId,
      source: wrapper.data.source
    })
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
