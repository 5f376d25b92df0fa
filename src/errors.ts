/**
 * Error types shared across the service.
 *
 * Each error carries the fields a log line or an HTTP response needs,
 * so callers never have to parse messages.
 */

import type { TripStatus } from './models/types';

// =============================================================================
// SCHEMA ERRORS
// =============================================================================

export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * A payload or envelope failed structural validation.
 */
export class SchemaError extends Error {
  readonly eventName: string;
  readonly issues: SchemaIssue[];

  constructor(eventName: string, issues: SchemaIssue[], message?: string) {
    super(message ?? `Invalid payload for ${eventName}: ${formatIssues(issues)}`);
    this.name = 'SchemaError';
    this.eventName = eventName;
    this.issues = issues;
  }
}

/**
 * The event name has no registered schema.
 */
export class UnknownEventKindError extends SchemaError {
  constructor(eventName: string) {
    super(eventName, [], `Unknown event kind: ${eventName}`);
    this.name = 'UnknownEventKindError';
  }
}

function formatIssues(issues: SchemaIssue[]): string {
  if (issues.length === 0) return 'no details';
  return issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
}

// =============================================================================
// BUS ERRORS
// =============================================================================

export type PublishFailureKind = 'Timeout' | 'ConnectionLost' | 'SchemaInvalid';

/**
 * A publish was not confirmed by the broker.
 * Timeout and ConnectionLost may be retried by the caller; SchemaInvalid never.
 */
export class PublishError extends Error {
  readonly kind: PublishFailureKind;
  readonly eventName: string;

  constructor(kind: PublishFailureKind, eventName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublishError';
    this.kind = kind;
    this.eventName = eventName;
  }

  get retryable(): boolean {
    return this.kind !== 'SchemaInvalid';
  }
}

/**
 * A subscription handler did not settle within its deadline.
 */
export class HandlerTimeoutError extends Error {
  readonly deadlineMs: number;

  constructor(eventName: string, deadlineMs: number) {
    super(`Handler for ${eventName} did not finish within ${deadlineMs}ms`);
    this.name = 'HandlerTimeoutError';
    this.deadlineMs = deadlineMs;
  }
}

// =============================================================================
// TRIP ERRORS
// =============================================================================

/**
 * An inbound event arrived while the trip was in a status that does not accept it.
 * Dropped and counted; repeating the event cannot make it valid.
 */
export class ProtocolViolationError extends Error {
  readonly tripId: string;
  readonly eventName: string;
  readonly currentStatus: TripStatus;
  readonly expectedStatuses: readonly TripStatus[];

  constructor(
    tripId: string,
    eventName: string,
    currentStatus: TripStatus,
    expectedStatuses: readonly TripStatus[]
  ) {
    super(
      `${eventName} is not valid for trip ${tripId} in status ${currentStatus} ` +
      `(expected ${expectedStatuses.join(' | ')})`
    );
    this.name = 'ProtocolViolationError';
    this.tripId = tripId;
    this.eventName = eventName;
    this.currentStatus = currentStatus;
    this.expectedStatuses = expectedStatuses;
  }
}

/**
 * A status change outside the trip state graph was attempted.
 */
export class InvalidTransitionError extends Error {
  readonly tripId: string;
  readonly from: TripStatus;
  readonly to: TripStatus;

  constructor(tripId: string, from: TripStatus, to: TripStatus) {
    super(`Invalid status transition for trip ${tripId} from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
    this.tripId = tripId;
    this.from = from;
    this.to = to;
  }
}

// =============================================================================
// DRIVER ERRORS
// =============================================================================

/**
 * The driver picked from a snapshot was taken or went offline before the
 * assignment committed. The orchestrator re-matches once on this error.
 */
export class DriverNoLongerAvailableError extends Error {
  readonly driverId: string;

  constructor(driverId: string) {
    super(`Driver ${driverId} is no longer available`);
    this.name = 'DriverNoLongerAvailableError';
    this.driverId = driverId;
  }
}

export class DriverBusyError extends Error {
  readonly driverId: string;
  readonly activeTripId: string;

  constructor(driverId: string, activeTripId: string) {
    super(`Driver ${driverId} is on trip ${activeTripId}`);
    this.name = 'DriverBusyError';
    this.driverId = driverId;
    this.activeTripId = activeTripId;
  }
}

export class DriverNotFoundError extends Error {
  readonly driverId: string;

  constructor(driverId: string) {
    super(`Driver ${driverId} not found`);
    this.name = 'DriverNotFoundError';
    this.driverId = driverId;
  }
}
