import { z } from 'zod';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * Lifecycle status of a trip.
 *
 * Happy path: REQUESTED → MATCHING → ASSIGNED → PRICED → IN_PROGRESS → COMPLETED
 * Terminal side exits: UNMATCHED (no driver found), CANCELLED.
 * The allowed edges live in orchestrator/transitions.ts.
 */
export enum TripStatus {
  REQUESTED = 'requested',
  MATCHING = 'matching',
  ASSIGNED = 'assigned',
  PRICED = 'priced',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  UNMATCHED = 'unmatched'
}

/**
 * Status of a driver as seen by the availability tracker.
 * A driver is eligible for matching only while AVAILABLE.
 */
export enum DriverStatus {
  OFFLINE = 'offline',
  AVAILABLE = 'available',
  ON_TRIP = 'on_trip'
}

/**
 * Why a trip could not be matched with a driver.
 */
export enum UnmatchedReason {
  /** No available driver at all when the snapshot was taken */
  NO_CANDIDATES = 'no_candidates',

  /** Drivers were available, but none within the pickup radius */
  OUT_OF_RANGE = 'out_of_range',

  /** The selected driver was taken twice in a row before assignment committed */
  DRIVER_UNAVAILABLE = 'driver_unavailable'
}

/**
 * Who asked for a trip to be cancelled.
 */
export enum CancelInitiator {
  RIDER = 'rider',
  DRIVER = 'driver',
  OPS = 'ops',
  SYSTEM = 'system'
}

/**
 * Ranking criteria the matching engine can apply.
 * The order in MatchingConfig.priorityOrder decides which one breaks ties first.
 */
export enum CriterionType {
  /** Distance from the driver to the pickup point (closer first) */
  PICKUP_DISTANCE = 'pickup_distance',

  /** Driver rating (higher first) */
  RATING = 'rating',

  /** Time spent waiting since the driver last became available (longer first) */
  IDLE_TIME = 'idle_time'
}

export const MIN_DRIVER_RATING = 0;
export const MAX_DRIVER_RATING = 5;

// =============================================================================
// LOCATION TYPES
// =============================================================================

/**
 * Geographic coordinates (latitude/longitude).
 */
export interface Coordinates {
  lat: number;
  lng: number;
}

// =============================================================================
// TRIP
// =============================================================================

/**
 * A single ride from request to a terminal status.
 * Only the orchestrator writes trips.
 */
export interface Trip {
  id: string;
  riderId: string;
  origin: Coordinates;
  destination: Coordinates;
  status: TripStatus;

  /** Set once a driver is committed to the trip */
  assignedDriverId: string | null;

  /** Price from pricing.quoted, in minor currency units */
  quotedPrice: number | null;

  /** Price reported on completion, in minor currency units */
  finalPrice: number | null;

  unmatchedReason: UnmatchedReason | null;
  cancelledBy: CancelInitiator | null;

  /** Correlation id of the request that created the trip; reused for every event it emits */
  correlationId: string;

  createdAt: string;
  updatedAt: string;
}

// =============================================================================
// DRIVER
// =============================================================================

/**
 * Static details supplied when a driver registers.
 */
export interface DriverProfile {
  id: string;
  name: string;
  rating: number;
}

/**
 * A driver and their live state.
 *
 * activeTripId is set exactly while status is ON_TRIP.
 */
export interface Driver extends DriverProfile {
  location: Coordinates | null;
  status: DriverStatus;
  activeTripId: string | null;

  /** When the driver last became AVAILABLE; null while not available */
  idleSince: string | null;

  updatedAt: string;
}

/**
 * The view of a driver the matching engine works from.
 * Taken from a tracker snapshot, never mutated by the engine.
 */
export interface DriverCandidate {
  id: string;
  location: Coordinates;
  available: boolean;
  rating: number;
  idleSince: string;
}

// =============================================================================
// ZOD VALIDATION SCHEMAS
// =============================================================================

export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180)
});

export const RatingSchema = z.number().min(MIN_DRIVER_RATING).max(MAX_DRIVER_RATING);

/** Integer amount in minor currency units (e.g. cents) */
export const MinorUnitsSchema = z.number().int().nonnegative();

export const TripRequestBodySchema = z.object({
  riderId: z.string().min(1),
  origin: CoordinatesSchema,
  destination: CoordinatesSchema
});

export const CancelRequestBodySchema = z.object({
  initiator: z.nativeEnum(CancelInitiator).default(CancelInitiator.RIDER),
  reason: z.string().min(1).optional()
});

export const DriverRegistrationSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  rating: RatingSchema.default(MAX_DRIVER_RATING)
});

export const DriverAvailableBodySchema = z.object({
  location: CoordinatesSchema
});

export type TripRequestBody = z.infer<typeof TripRequestBodySchema>;
export type DriverRegistration = z.infer<typeof DriverRegistrationSchema>;
