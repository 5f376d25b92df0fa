import { describe, it, expect } from 'vitest';
import { validate, validatePayload } from '../src/events/validator';
import { createEnvelope, decodeEnvelope, encodeEnvelope } from '../src/events/envelope';
import { SchemaError, UnknownEventKindError } from '../src/errors';
import { CancelInitiator, UnmatchedReason } from '../src/models/types';

const fixedNow = () => new Date('2024-05-01T12:00:00.000Z');

const wire = (overrides: Record<string, unknown> = {}): string =>
  JSON.stringify({
    id: 'evt-1',
    name: 'trip.assigned',
    payload: { tripId: 'T1', driverId: 'D1' },
    timestamp: '2024-05-01T12:00:00.000Z',
    correlationId: 'corr-1',
    source: 'matching-service',
    ...overrides
  });

// =============================================================================
// VALIDATOR
// =============================================================================

describe('validatePayload', () => {
  it('should accept a valid trip.requested payload and strip unknown keys', () => {
    const result = validatePayload('trip.requested', {
      tripId: 'T1',
      riderId: 'R1',
      origin: { lat: 1, lng: 2 },
      destination: { lat: 3, lng: 4 },
      promoCode: 'SPRING'
    });

    expect(result).toEqual({
      ok: true,
      value: {
        tripId: 'T1',
        riderId: 'R1',
        origin: { lat: 1, lng: 2 },
        destination: { lat: 3, lng: 4 }
      }
    });
  });

  it('should report the path of a missing field', () => {
    const result = validatePayload('trip.requested', {
      tripId: 'T1',
      origin: { lat: 1, lng: 2 },
      destination: { lat: 3, lng: 4 }
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaError);
    expect(result.error.eventName).toBe('trip.requested');
    expect(result.error.issues.map(i => i.path)).toEqual(['riderId']);
  });

  it('should reject coordinates out of range', () => {
    const result = validatePayload('trip.requested', {
      tripId: 'T1',
      riderId: 'R1',
      origin: { lat: 91, lng: 2 },
      destination: { lat: 3, lng: 4 }
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map(i => i.path)).toEqual(['origin.lat']);
  });

  it('should require prices in whole minor units', () => {
    expect(validatePayload('pricing.quoted', { tripId: 'T1', price: 1250 }).ok).toBe(true);
    expect(validatePayload('pricing.quoted', { tripId: 'T1', price: 12.5 }).ok).toBe(false);
    expect(validatePayload('pricing.quoted', { tripId: 'T1', price: -1 }).ok).toBe(false);
  });

  it('should allow trip.completed without a final price', () => {
    expect(validatePayload('trip.completed', { tripId: 'T1' })).toEqual({
      ok: true,
      value: { tripId: 'T1' }
    });
  });

  it('should only accept known unmatched reasons and initiators', () => {
    expect(validatePayload('trip.unmatched', { tripId: 'T1', reason: UnmatchedReason.OUT_OF_RANGE }).ok).toBe(true);
    expect(validatePayload('trip.unmatched', { tripId: 'T1', reason: 'bad_weather' }).ok).toBe(false);
    expect(validatePayload('trip.cancel_requested', { tripId: 'T1', initiator: CancelInitiator.OPS }).ok).toBe(true);
    expect(validatePayload('trip.cancel_requested', { tripId: 'T1', initiator: 'alien' }).ok).toBe(false);
  });
});

describe('validate', () => {
  it('should fail unknown event names with UnknownEventKindError', () => {
    const result = validate('trip.teleported', { tripId: 'T1' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownEventKindError);
    expect(result.error.message).toBe('Unknown event kind: trip.teleported');
  });

  it('should validate registered names given as strings', () => {
    expect(validate('trip.started', { tripId: 'T1' })).toEqual({ ok: true, value: { tripId: 'T1' } });
  });
});

// =============================================================================
// ENVELOPE
// =============================================================================

describe('createEnvelope', () => {
  it('should stamp id, timestamp, correlation id and source', () => {
    const envelope = createEnvelope('trip.assigned', { tripId: 'T1', driverId: 'D1' }, {
      correlationId: 'corr-1',
      source: 'trip-service',
      now: fixedNow
    });

    expect(envelope.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(envelope.name).toBe('trip.assigned');
    expect(envelope.timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(envelope.correlationId).toBe('corr-1');
    expect(envelope.source).toBe('trip-service');
    expect(envelope.payload).toEqual({ tripId: 'T1', driverId: 'D1' });
  });

  it('should give every envelope its own id', () => {
    const options = { correlationId: 'corr-1', source: 'trip-service' };
    const a = createEnvelope('trip.started', { tripId: 'T1' }, options);
    const b = createEnvelope('trip.started', { tripId: 'T1' }, options);

    expect(a.id).not.toBe(b.id);
  });

  it('should freeze the envelope and nested payload', () => {
    const envelope = createEnvelope('trip.requested', {
      tripId: 'T1',
      riderId: 'R1',
      origin: { lat: 1, lng: 2 },
      destination: { lat: 3, lng: 4 }
    }, { correlationId: 'corr-1', source: 'trip-service' });

    expect(Object.isFrozen(envelope)).toBe(true);
    expect(Object.isFrozen(envelope.payload)).toBe(true);
    expect(Object.isFrozen(envelope.payload.origin)).toBe(true);
  });

  it('should throw SchemaError for an invalid payload', () => {
    expect(() =>
      createEnvelope('pricing.quoted', { tripId: 'T1', price: -5 }, { correlationId: 'c', source: 's' })
    ).toThrow(SchemaError);
  });
});

describe('decodeEnvelope', () => {
  it('should decode what encodeEnvelope produced', () => {
    const envelope = createEnvelope('trip.cancelled', { tripId: 'T1', initiator: CancelInitiator.RIDER }, {
      correlationId: 'corr-9',
      source: 'trip-service',
      now: fixedNow
    });

    const result = decodeEnvelope(encodeEnvelope(envelope), 'trip.cancelled');

    expect(result).toEqual({ ok: true, value: envelope });
  });

  it('should decode a well-formed message from another service', () => {
    const result = decodeEnvelope(wire(), 'trip.assigned');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.source).toBe('matching-service');
    expect(result.value.payload).toEqual({ tripId: 'T1', driverId: 'D1' });
    expect(Object.isFrozen(result.value)).toBe(true);
  });

  it('should reject malformed JSON', () => {
    const result = decodeEnvelope('{"id": ', 'trip.assigned');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaError);
    expect(result.error.message.startsWith('Malformed JSON for trip.assigned')).toBe(true);
  });

  it('should reject a wrapper without a correlation id', () => {
    const result = decodeEnvelope(wire({ correlationId: undefined }), 'trip.assigned');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map(i => i.path)).toEqual(['correlationId']);
  });

  it('should reject a timestamp that is not ISO-8601', () => {
    const result = decodeEnvelope(wire({ timestamp: 'yesterday' }), 'trip.assigned');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map(i => i.path)).toEqual(['timestamp']);
  });

  it('should reject an unknown event name', () => {
    const result = decodeEnvelope(wire({ name: 'trip.teleported' }), 'trip.assigned');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownEventKindError);
  });

  it('should reject a known name that does not match the subscription', () => {
    const result = decodeEnvelope(wire({ name: 'trip.started', payload: { tripId: 'T1' } }), 'trip.assigned');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual([
      { path: 'name', message: 'expected trip.assigned, received trip.started' }
    ]);
  });

  it('should reject an invalid payload', () => {
    const result = decodeEnvelope(wire({ payload: { tripId: 'T1' } }), 'trip.assigned');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map(i => i.path)).toEqual(['driverId']);
  });
});
