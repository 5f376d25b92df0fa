/**
 * HTTP API tests against a running app on an ephemeral port,
 * backed by the in-process broker.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import { z } from 'zod';
import { createApp } from '../src/app';
import { createRuntime } from '../src/runtime';
import type { Runtime } from '../src/runtime';
import { InMemoryTransport } from '../src/bus/InMemoryTransport';
import { CriterionType, DriverStatus, TripStatus } from '../src/models/types';
import { createTestEnv, near, PICKUP } from './helpers';

let runtime: Runtime;
let server: Server;
let baseUrl: string;

beforeEach(async () => {
  runtime = createRuntime({ transport: new InMemoryTransport(), env: createTestEnv() });
  await runtime.start();

  const app = createApp(runtime);
  server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, () => resolve(listening));
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
  await runtime.stop();
});

// =============================================================================
// HELPERS
// =============================================================================

async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  return { status: res.status, body: await res.json() };
}

const AcceptedTripSchema = z.object({ tripId: z.string(), correlationId: z.string(), eventId: z.string() });

async function availableDriver(id: string): Promise<void> {
  await call('POST', '/api/drivers', { id, name: `Driver ${id}` });
  await call('POST', `/api/drivers/${id}/available`, { location: near(0.01) });
}

async function requestTrip(): Promise<string> {
  const { status, body } = await call('POST', '/api/trips', {
    riderId: 'rider-1',
    origin: PICKUP,
    destination: near(0.1)
  });
  expect(status).toBe(202);
  return AcceptedTripSchema.parse(body).tripId;
}

const waitForTrip = (tripId: string, status: TripStatus) =>
  vi.waitFor(async () => {
    const { body } = await call('GET', `/api/trips/${tripId}`);
    expect(body).toMatchObject({ success: true, trip: { id: tripId, status } });
  });

// =============================================================================
// HEALTH & ROOT
// =============================================================================

describe('Health', () => {
  it('should report healthy while the bus is connected', async () => {
    const { status, body } = await call('GET', '/api/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', service: 'trip-service', bus: 'connected' });
  });

  it('should report degraded once the bus is closed', async () => {
    await runtime.bus.close();

    const { status, body } = await call('GET', '/api/health');

    expect(status).toBe(503);
    expect(body).toMatchObject({ status: 'degraded', bus: 'closed' });
  });

  it('should list the orchestrator subscriptions in stats', async () => {
    const { status, body } = await call('GET', '/api/stats');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      bus: {
        state: 'connected',
        subscriptions: expect.arrayContaining([
          { eventName: 'trip.requested', queue: 'trip-service.orchestrator.trip.requested' },
          { eventName: 'driver.available', queue: 'trip-service.availability.driver.available' }
        ])
      }
    });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const { status, body } = await call('GET', '/api/nothing');

    expect(status).toBe(404);
    expect(body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Endpoint GET /api/nothing not found' }
    });
  });

  it('should reject a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/api/trips`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"riderId":'
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' }
    });
  });
});

// =============================================================================
// DRIVERS
// =============================================================================

describe('Drivers API', () => {
  it('should register a driver and take them online', async () => {
    const registered = await call('POST', '/api/drivers', { id: 'D1', name: 'Dana' });
    expect(registered.status).toBe(201);
    expect(registered.body).toMatchObject({
      driver: { id: 'D1', name: 'Dana', rating: 5, status: DriverStatus.OFFLINE }
    });

    const online = await call('POST', '/api/drivers/D1/available', { location: near(0.01) });
    expect(online.status).toBe(200);
    expect(online.body).toMatchObject({ driver: { status: DriverStatus.AVAILABLE, location: near(0.01) } });

    const listed = await call('GET', '/api/drivers');
    expect(listed.body).toMatchObject({ drivers: [{ id: 'D1', status: DriverStatus.AVAILABLE }] });
  });

  it('should validate the registration body', async () => {
    const { status, body } = await call('POST', '/api/drivers', { name: '' });

    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request body is invalid',
        details: [{ path: 'name', message: 'String must contain at least 1 character(s)' }]
      }
    });
  });

  it('should return 404 when taking an unknown driver offline', async () => {
    const { status, body } = await call('POST', '/api/drivers/ghost/offline');

    expect(status).toBe(404);
    expect(body).toMatchObject({ error: { code: 'DRIVER_NOT_FOUND' } });
  });
});

// =============================================================================
// TRIPS
// =============================================================================

describe('Trips API', () => {
  it('should accept a trip request and assign the nearby driver', async () => {
    await availableDriver('D1');

    const tripId = await requestTrip();

    await waitForTrip(tripId, TripStatus.ASSIGNED);
    const { body } = await call('GET', `/api/trips/${tripId}`);
    expect(body).toMatchObject({ trip: { assignedDriverId: 'D1', riderId: 'rider-1' } });
  });

  it('should refuse to put a driver on a trip back online', async () => {
    await availableDriver('D1');
    const tripId = await requestTrip();
    await waitForTrip(tripId, TripStatus.ASSIGNED);

    const { status, body } = await call('POST', '/api/drivers/D1/available', { location: near(0.02) });

    expect(status).toBe(409);
    expect(body).toMatchObject({ error: { code: 'DRIVER_BUSY', details: { activeTripId: tripId } } });
  });

  it('should cancel a trip through the bus', async () => {
    await availableDriver('D1');
    const tripId = await requestTrip();
    await waitForTrip(tripId, TripStatus.ASSIGNED);

    const cancel = await call('POST', `/api/trips/${tripId}/cancel`, {});
    expect(cancel.status).toBe(202);

    await waitForTrip(tripId, TripStatus.CANCELLED);
    const { body } = await call('GET', `/api/trips/${tripId}`);
    expect(body).toMatchObject({ trip: { cancelledBy: 'rider' } });
    expect(runtime.tracker.get('D1')?.status).toBe(DriverStatus.AVAILABLE);
  });

  it('should validate the trip request body', async () => {
    const { status, body } = await call('POST', '/api/trips', { riderId: 'rider-1', origin: PICKUP });

    expect(status).toBe(400);
    expect(body).toMatchObject({
      error: { code: 'VALIDATION_ERROR', details: [{ path: 'destination' }] }
    });
  });

  it('should return 404 for unknown trips', async () => {
    const fetched = await call('GET', '/api/trips/nope');
    expect(fetched.status).toBe(404);
    expect(fetched.body).toEqual({
      success: false,
      error: { code: 'TRIP_NOT_FOUND', message: 'Trip nope not found' }
    });

    const cancelled = await call('POST', '/api/trips/nope/cancel', {});
    expect(cancelled.status).toBe(404);
  });

  it('should answer 503 when the bus cannot take the request', async () => {
    await runtime.bus.close();

    const { status, body } = await call('POST', '/api/trips', {
      riderId: 'rider-1',
      origin: PICKUP,
      destination: near(0.1)
    });

    expect(status).toBe(503);
    expect(body).toMatchObject({ error: { code: 'PUBLISH_FAILED', details: { kind: 'ConnectionLost' } } });
  });
});

// =============================================================================
// CONFIG
// =============================================================================

describe('Config API', () => {
  it('should update the default priority order', async () => {
    const order = [CriterionType.RATING, CriterionType.PICKUP_DISTANCE, CriterionType.IDLE_TIME];

    const { status, body } = await call('PUT', '/api/config/default/priority', { priorityOrder: order });

    expect(status).toBe(200);
    expect(body).toMatchObject({ config: { id: 'default', priorityOrder: order } });
    expect(runtime.configManager.getDefaultConfig().priorityOrder).toEqual(order);
  });

  it('should reject an incomplete priority order', async () => {
    const { status, body } = await call('PUT', '/api/config/default/priority', {
      priorityOrder: [CriterionType.RATING]
    });

    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: { code: 'CONFIG_ERROR', message: 'Priority order must include all criterion types exactly once' }
    });
  });

  it('should create a configuration from the default settings', async () => {
    const { status, body } = await call('PUT', '/api/config/nearby', { maxPickupDistanceMiles: 3 });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      config: { id: 'nearby', name: 'nearby', maxPickupDistanceMiles: 3, candidatePoolSize: 25, isDefault: false }
    });
  });

  it('should return 404 for an unknown configuration', async () => {
    const { status } = await call('GET', '/api/config/missing');

    expect(status).toBe(404);
  });
});
