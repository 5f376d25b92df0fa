/**
 * Shared factories for the test suite.
 * Override any fields you need for your specific test.
 */

import { loadEnvironmentConfig } from '../src/config/config';
import type { EnvironmentConfig } from '../src/config/config';
import { EventBus } from '../src/bus/EventBus';
import type { EventBusOptions } from '../src/bus/EventBus';
import type { InMemoryTransport } from '../src/bus/InMemoryTransport';
import type { EventEnvelope } from '../src/events/envelope';
import type { EventName } from '../src/events/schemas';
import { TripStatus } from '../src/models/types';
import type { Coordinates, DriverCandidate, Trip } from '../src/models/types';
import { Counters } from '../src/utils/counters';

/** Short timings so failure paths finish quickly */
export const FAST_BUS: Omit<EventBusOptions, 'serviceName'> = {
  publishTimeoutMs: 100,
  handlerDeadlineMs: 2000,
  maxDeliveryAttempts: 2,
  requeueBaseDelayMs: 10,
  reconnectInitialDelayMs: 5,
  reconnectMaxDelayMs: 40
};

export function createTestEnv(): EnvironmentConfig {
  const env = loadEnvironmentConfig({ NODE_ENV: 'test' });
  return {
    ...env,
    bus: { ...env.bus, ...FAST_BUS }
  };
}

export function createBus(
  transport: InMemoryTransport,
  serviceName: string,
  overrides: Partial<EventBusOptions> = {}
): { bus: EventBus; counters: Counters } {
  const counters = new Counters();
  const bus = new EventBus(transport, { serviceName, ...FAST_BUS, ...overrides }, counters);
  return { bus, counters };
}

/**
 * A second service on the same broker that records what the orchestrator
 * emits and publishes inbound events on behalf of other services.
 */
export async function createPeerService(
  transport: InMemoryTransport,
  names: readonly EventName[] = ['trip.assigned', 'trip.unmatched', 'trip.cancelled', 'trip.completed']
): Promise<{ bus: EventBus; received: EventEnvelope<EventName>[]; of: (name: EventName) => EventEnvelope<EventName>[] }> {
  const { bus } = createBus(transport, 'peer-service');
  await bus.connect();

  const received: EventEnvelope<EventName>[] = [];
  for (const name of names) {
    await bus.subscribe(name, async envelope => {
      received.push(envelope);
    });
  }

  const of = (name: EventName): EventEnvelope<EventName>[] => received.filter(envelope => envelope.name === name);

  return { bus, received, of };
}

export const PICKUP: Coordinates = { lat: 40.7128, lng: -74.006 };

/**
 * Point `lngOffset` degrees east of the pickup.
 * At this latitude 0.01° of longitude is about 0.52 miles.
 */
export function near(lngOffset: number): Coordinates {
  return { lat: PICKUP.lat, lng: PICKUP.lng + lngOffset };
}

export const createCandidate = (overrides: Partial<DriverCandidate> = {}): DriverCandidate => ({
  id: 'driver-1',
  location: near(0.01),
  available: true,
  rating: 4.5,
  idleSince: '2024-05-01T12:00:00.000Z',
  ...overrides
});

export const createTrip = (overrides: Partial<Trip> = {}): Trip => ({
  id: 'trip-1',
  riderId: 'rider-1',
  origin: PICKUP,
  destination: near(0.1),
  status: TripStatus.REQUESTED,
  assignedDriverId: null,
  quotedPrice: null,
  finalPrice: null,
  unmatchedReason: null,
  cancelledBy: null,
  correlationId: 'corr-1',
  createdAt: '2024-05-01T12:00:00.000Z',
  updatedAt: '2024-05-01T12:00:00.000Z',
  ...overrides
});

/**
 * A promise resolved from outside, for holding a step open.
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
