/**
 * TripOrchestrator - drives every trip from request to a terminal status
 *
 * Consumes trip events from the bus, applies them to the stored trip
 * through the state graph in transitions.ts, and emits the resulting
 * events. It is the only writer of trips.
 *
 * CONCURRENCY:
 * - All reads-then-writes of one trip run through a per-trip serializer.
 *   Different trips progress concurrently.
 * - Matching is computed OUTSIDE the per-trip lock and committed inside it
 *   after re-reading the trip. A cancellation that lands while the engine
 *   runs wins: the commit sees the trip is no longer `matching` and drops
 *   the result.
 * - Driver assignment is a check-and-set in the AvailabilityTracker. If the
 *   chosen driver was taken meanwhile, matching runs once more against a
 *   fresh snapshot; a second miss ends the trip as unmatched.
 *
 * FAILURES:
 * - Events that arrive in the wrong status are protocol violations:
 *   logged, counted and dropped (acked). Redelivery cannot fix them.
 * - Events for unknown trips are logged, counted and dropped.
 * - Storage errors propagate, so the bus requeues the delivery.
 * - Emits are retried; if the bus still refuses, the stored trip remains
 *   authoritative and the failure is counted.
 */

import { v4 as uuidv4 } from 'uuid';
import { TripStatus, UnmatchedReason } from '../models/types';
import type { Trip } from '../models/types';
import type { AnyEnvelope, EventEnvelope } from '../events/envelope';
import type { EventName, EventPayload } from '../events/schemas';
import type { EventBus } from '../bus/EventBus';
import { publishWithRetry, DEFAULT_RETRY_OPTIONS } from '../bus/retry';
import type { RetryOptions } from '../bus/retry';
import type { TripRepository } from '../persistence/TripRepository';
import type { AvailabilityTracker } from '../state/AvailabilityTracker';
import type { DriverMatcher, MatchOutcome } from '../matchers/MatchingEngine';
import { DriverNoLongerAvailableError, ProtocolViolationError } from '../errors';
import { Counters } from '../utils/counters';
import { KeyedSerializer } from '../utils/KeyedSerializer';
import { ACCEPTING_STATUSES, applyTransition } from './transitions';

// =============================================================================
// TYPES
// =============================================================================

export const INBOUND_EVENTS = [
  'trip.requested',
  'pricing.quoted',
  'trip.started',
  'trip.completed',
  'trip.cancel_requested',
  'payment.charged'
] as const;

export type InboundEvent = typeof INBOUND_EVENTS[number];

export interface TripOrchestratorDeps {
  bus: EventBus;
  repository: TripRepository;
  tracker: AvailabilityTracker;
  matcher: DriverMatcher;
  counters?: Counters;
  clock?: () => Date;
  retry?: RetryOptions;
}

/** Attempts at matching one trip: the first plus one re-match */
const MAX_MATCH_ATTEMPTS = 2;

type CommitResult = 'committed' | 'preempted' | 'retry';

export const SUBSCRIBER_NAME = 'orchestrator';

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class TripOrchestrator {
  private readonly bus: EventBus;
  private readonly repository: TripRepository;
  private readonly tracker: AvailabilityTracker;
  private readonly matcher: DriverMatcher;
  private readonly counters: Counters;
  private readonly clock: () => Date;
  private readonly retry: RetryOptions;
  private readonly tripLocks = new KeyedSerializer();
  /** Trips whose matcher call is running in this process */
  private readonly matchingInFlight = new Set<string>();

  constructor(deps: TripOrchestratorDeps) {
    this.bus = deps.bus;
    this.repository = deps.repository;
    this.tracker = deps.tracker;
    this.matcher = deps.matcher;
    this.counters = deps.counters ?? new Counters();
    this.clock = deps.clock ?? (() => new Date());
    this.retry = deps.retry ?? DEFAULT_RETRY_OPTIONS;
  }

  /**
   * Subscribe to every inbound event. The bus must be connected.
   */
  async start(): Promise<void> {
    const options = { consumer: SUBSCRIBER_NAME };
    await this.bus.subscribe('trip.requested', envelope => this.handle(envelope), options);
    await this.bus.subscribe('pricing.quoted', envelope => this.handle(envelope), options);
    await this.bus.subscribe('trip.started', envelope => this.handle(envelope), options);
    await this.bus.subscribe('trip.completed', envelope => this.handle(envelope), options);
    await this.bus.subscribe('trip.cancel_requested', envelope => this.handle(envelope), options);
    await this.bus.subscribe('payment.charged', envelope => this.handle(envelope), options);
    console.log(`[TripOrchestrator] Listening for ${INBOUND_EVENTS.join(', ')}`);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  getTrip(tripId: string): Promise<Trip | null> {
    return this.repository.loadTrip(tripId);
  }

  listTrips(): Promise<Trip[]> {
    return this.repository.listTrips();
  }

  // ===========================================================================
  // DISPATCH
  // ===========================================================================

  /**
   * Apply one inbound event. Resolves once the event has been applied or
   * dropped; rejects only for failures worth redelivering.
   */
  async handle(envelope: AnyEnvelope<InboundEvent>): Promise<void> {
    switch (envelope.name) {
      case 'trip.requested':
        return this.onTripRequested(envelope);
      case 'pricing.quoted':
        return this.onPricingQuoted(envelope);
      case 'trip.started':
        return this.onTripStarted(envelope);
      case 'trip.completed':
        return this.onTripCompleted(envelope);
      case 'trip.cancel_requested':
        return this.onCancelRequested(envelope);
      case 'payment.charged':
        return this.onPaymentCharged(envelope);
      default:
        return assertNever(envelope);
    }
  }

  // ===========================================================================
  // REQUEST & MATCHING
  // ===========================================================================

  private async onTripRequested(envelope: EventEnvelope<'trip.requested'>): Promise<void> {
    const { tripId, riderId, origin, destination } = envelope.payload;

    let claimed = false;
    const claim = (): void => {
      claimed = true;
      this.matchingInFlight.add(tripId);
    };

    let trip: Trip | null;
    try {
      trip = await this.tripLocks.run(tripId, async () => {
        const existing = await this.repository.loadTrip(tripId);
        if (existing && this.isStalled(existing)) {
          // An earlier delivery failed between saving the trip and committing a match
          let matching = existing;
          if (existing.status === TripStatus.REQUESTED) {
            matching = applyTransition(existing, TripStatus.MATCHING, this.clock());
            await this.repository.saveTrip(matching);
          }
          claim();
          this.counters.increment('orchestrator.matching_resumed');
          console.warn(`[TripOrchestrator] Resuming matching for ${tripId} after a failed delivery`);
          return matching;
        }
        if (existing) {
          this.counters.increment('orchestrator.duplicate_requests');
          console.warn(`[TripOrchestrator] Duplicate trip.requested for ${tripId} (status ${existing.status}), ignoring`);
          return null;
        }

        const now = this.now();
        const requested: Trip = {
          id: tripId,
          riderId,
          origin: { ...origin },
          destination: { ...destination },
          status: TripStatus.REQUESTED,
          assignedDriverId: null,
          quotedPrice: null,
          finalPrice: null,
          unmatchedReason: null,
          cancelledBy: null,
          correlationId: envelope.correlationId,
          createdAt: now,
          updatedAt: now
        };
        claim();
        await this.repository.saveTrip(requested);

        const matching = applyTransition(requested, TripStatus.MATCHING, this.clock());
        await this.repository.saveTrip(matching);
        console.log(`[TripOrchestrator] Trip ${tripId} requested by ${riderId}, matching`);
        return matching;
      });
    } catch (error) {
      if (claimed) this.matchingInFlight.delete(tripId);
      throw error;
    }

    if (!trip) return;
    try {
      await this.matchTrip(trip);
    } finally {
      this.matchingInFlight.delete(tripId);
    }
  }

  private isStalled(trip: Trip): boolean {
    return (
      (trip.status === TripStatus.REQUESTED || trip.status === TripStatus.MATCHING) &&
      !this.matchingInFlight.has(trip.id)
    );
  }

  private async matchTrip(trip: Trip): Promise<void> {
    for (let attempt = 1; attempt <= MAX_MATCH_ATTEMPTS; attempt++) {
      if (attempt > 1) {
        this.counters.increment('orchestrator.rematch_attempts');
      }

      // Outside the lock: a cancellation may land while this runs
      const outcome = await this.matcher.match(trip, this.tracker.snapshot());

      const result = await this.tripLocks.run(trip.id, () => this.commitMatch(trip.id, outcome, attempt));
      if (result !== 'retry') return;
    }
  }

  private async commitMatch(tripId: string, outcome: MatchOutcome, attempt: number): Promise<CommitResult> {
    const trip = await this.repository.loadTrip(tripId);
    if (!trip || trip.status !== TripStatus.MATCHING) {
      this.counters.increment('orchestrator.matching_preempted');
      console.log(
        `[TripOrchestrator] Dropping match result for ${tripId}: trip is ${trip?.status ?? 'gone'}`
      );
      return 'preempted';
    }

    if (outcome.kind === 'no_match') {
      await this.markUnmatched(trip, outcome.reason);
      return 'committed';
    }

    try {
      await this.tracker.assign(outcome.driverId, tripId);
    } catch (error) {
      if (!(error instanceof DriverNoLongerAvailableError)) throw error;

      if (attempt < MAX_MATCH_ATTEMPTS) {
        console.warn(`[TripOrchestrator] ${error.message} for ${tripId}, re-matching`);
        return 'retry';
      }
      await this.markUnmatched(trip, UnmatchedReason.DRIVER_UNAVAILABLE);
      return 'committed';
    }

    const assigned = applyTransition(trip, TripStatus.ASSIGNED, this.clock(), {
      assignedDriverId: outcome.driverId
    });
    try {
      await this.repository.saveTrip(assigned);
    } catch (error) {
      await this.tracker.release(outcome.driverId, tripId);
      throw error;
    }

    console.log(`[TripOrchestrator] Trip ${tripId} assigned to ${outcome.driverId}`);
    await this.emit('trip.assigned', { tripId, driverId: outcome.driverId }, assigned.correlationId);
    return 'committed';
  }

  private async markUnmatched(trip: Trip, reason: UnmatchedReason): Promise<void> {
    const unmatched = applyTransition(trip, TripStatus.UNMATCHED, this.clock(), { unmatchedReason: reason });
    await this.repository.saveTrip(unmatched);
    console.log(`[TripOrchestrator] Trip ${trip.id} unmatched: ${reason}`);
    await this.emit('trip.unmatched', { tripId: trip.id, reason }, trip.correlationId);
  }

  // ===========================================================================
  // LIFECYCLE EVENTS
  // ===========================================================================

  private async onPricingQuoted(envelope: EventEnvelope<'pricing.quoted'>): Promise<void> {
    const { tripId, price } = envelope.payload;
    await this.withTrip('pricing.quoted', tripId, async trip => {
      await this.repository.saveTrip(
        applyTransition(trip, TripStatus.PRICED, this.clock(), { quotedPrice: price })
      );
      console.log(`[TripOrchestrator] Trip ${tripId} priced at ${price}`);
    });
  }

  private async onTripStarted(envelope: EventEnvelope<'trip.started'>): Promise<void> {
    const { tripId } = envelope.payload;
    await this.withTrip('trip.started', tripId, async trip => {
      await this.repository.saveTrip(applyTransition(trip, TripStatus.IN_PROGRESS, this.clock()));
      console.log(`[TripOrchestrator] Trip ${tripId} started`);
    });
  }

  private async onTripCompleted(envelope: EventEnvelope<'trip.completed'>): Promise<void> {
    if (envelope.source === this.bus.serviceName) {
      // Our own trip.completed coming back through the exchange
      this.counters.increment('orchestrator.self_echo');
      return;
    }

    const { tripId } = envelope.payload;
    await this.withTrip('trip.completed', tripId, async trip => {
      const finalPrice = envelope.payload.finalPrice ?? trip.quotedPrice ?? 0;
      const completed = applyTransition(trip, TripStatus.COMPLETED, this.clock(), { finalPrice });
      await this.repository.saveTrip(completed);

      if (trip.assignedDriverId) {
        await this.tracker.release(trip.assignedDriverId, tripId, trip.destination);
      }

      console.log(`[TripOrchestrator] Trip ${tripId} completed, final price ${finalPrice}`);
      await this.emit('trip.completed', { tripId, finalPrice }, trip.correlationId);
    });
  }

  private async onCancelRequested(envelope: EventEnvelope<'trip.cancel_requested'>): Promise<void> {
    const { tripId, initiator, reason } = envelope.payload;
    await this.withTrip('trip.cancel_requested', tripId, async trip => {
      const cancelled = applyTransition(trip, TripStatus.CANCELLED, this.clock(), { cancelledBy: initiator });
      await this.repository.saveTrip(cancelled);

      if (trip.assignedDriverId) {
        await this.tracker.release(trip.assignedDriverId, tripId);
      }

      console.log(
        `[TripOrchestrator] Trip ${tripId} cancelled by ${initiator} in ${trip.status}` +
        (reason ? ` (${reason})` : '')
      );
      await this.emit('trip.cancelled', { tripId, initiator }, trip.correlationId);
    });
  }

  private async onPaymentCharged(envelope: EventEnvelope<'payment.charged'>): Promise<void> {
    const { tripId, amount } = envelope.payload;
    await this.withTrip('payment.charged', tripId, async () => {
      this.counters.increment('orchestrator.payments_recorded');
      console.log(`[TripOrchestrator] Payment of ${amount} recorded for trip ${tripId}`);
    });
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /**
   * Load the trip under its lock and run `work` if the trip is in a status
   * that accepts `eventName`. Unknown trips and protocol violations are
   * counted and dropped.
   */
  private async withTrip(
    eventName: keyof typeof ACCEPTING_STATUSES,
    tripId: string,
    work: (trip: Trip) => Promise<void>
  ): Promise<void> {
    await this.tripLocks.run(tripId, async () => {
      const trip = await this.repository.loadTrip(tripId);
      if (!trip) {
        this.counters.increment('orchestrator.unknown_trip');
        console.warn(`[TripOrchestrator] ${eventName} for unknown trip ${tripId}, dropping`);
        return;
      }

      const accepted: readonly TripStatus[] = ACCEPTING_STATUSES[eventName];
      if (!accepted.includes(trip.status)) {
        const violation = new ProtocolViolationError(tripId, eventName, trip.status, accepted);
        this.counters.increment('orchestrator.protocol_violations');
        console.warn(`[TripOrchestrator] ${violation.message}, dropping`);
        return;
      }

      await work(trip);
    });
  }

  /**
   * Publish with retries. A publish that still fails is logged and counted;
   * it never undoes the stored transition.
   */
  private async emit<N extends EventName>(
    eventName: N,
    payload: EventPayload<N>,
    correlationId: string
  ): Promise<void> {
    try {
      await publishWithRetry(() => this.bus.publish(eventName, payload, correlationId), {
        ...this.retry,
        onRetry: (attempt, error) => {
          console.warn(`[TripOrchestrator] Retrying ${eventName} (attempt ${attempt}): ${error.message}`);
        }
      });
    } catch (error) {
      this.counters.increment('orchestrator.emit_failed');
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[TripOrchestrator] Could not emit ${eventName} (correlation ${correlationId}): ${message}`);
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

/**
 * Compile-time exhaustiveness check for the inbound event union.
 */
function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

/**
 * Fresh ids for trips created through the API.
 */
export function newTripId(): string {
  return `trip_${uuidv4()}`;
}
