/**
 * Trip state graph
 *
 *   requested → matching → assigned → priced → in_progress → completed
 *                  │
 *                  └──→ unmatched
 *
 *   requested | matching | assigned | priced → cancelled
 */

import { TripStatus } from '../models/types';
import type { Trip } from '../models/types';
import { InvalidTransitionError } from '../errors';
import type { EventName } from '../events/schemas';

export const TRIP_TRANSITIONS: Record<TripStatus, readonly TripStatus[]> = {
  [TripStatus.REQUESTED]: [TripStatus.MATCHING, TripStatus.CANCELLED],
  [TripStatus.MATCHING]: [TripStatus.ASSIGNED, TripStatus.UNMATCHED, TripStatus.CANCELLED],
  [TripStatus.ASSIGNED]: [TripStatus.PRICED, TripStatus.CANCELLED],
  [TripStatus.PRICED]: [TripStatus.IN_PROGRESS, TripStatus.CANCELLED],
  [TripStatus.IN_PROGRESS]: [TripStatus.COMPLETED],
  [TripStatus.COMPLETED]: [],
  [TripStatus.CANCELLED]: [],
  [TripStatus.UNMATCHED]: []
};

export const TERMINAL_STATUSES: readonly TripStatus[] = [
  TripStatus.COMPLETED,
  TripStatus.CANCELLED,
  TripStatus.UNMATCHED
];

/**
 * Inbound events that move a trip, and the statuses that accept them.
 */
export const ACCEPTING_STATUSES = {
  'pricing.quoted': [TripStatus.ASSIGNED],
  'trip.started': [TripStatus.PRICED],
  'trip.completed': [TripStatus.IN_PROGRESS],
  'trip.cancel_requested': [
    TripStatus.REQUESTED,
    TripStatus.MATCHING,
    TripStatus.ASSIGNED,
    TripStatus.PRICED
  ],
  'payment.charged': [TripStatus.COMPLETED]
} satisfies Partial<Record<EventName, readonly TripStatus[]>>;

export function isTerminal(status: TripStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: TripStatus, to: TripStatus): boolean {
  return TRIP_TRANSITIONS[from].includes(to);
}

/**
 * Return a copy of the trip in the new status. updatedAt never moves
 * backwards, even if the clock does.
 *
 * @throws InvalidTransitionError
 */
export function applyTransition(
  trip: Trip,
  to: TripStatus,
  now: Date,
  patch: Partial<Omit<Trip, 'id' | 'status' | 'createdAt' | 'updatedAt'>> = {}
): Trip {
  if (!canTransition(trip.status, to)) {
    throw new InvalidTransitionError(trip.id, trip.status, to);
  }

  const stamp = now.toISOString();
  return {
    ...trip,
    ...patch,
    status: to,
    updatedAt: stamp > trip.updatedAt ? stamp : trip.updatedAt
  };
}
