/**
 * Event Registry
 *
 * Every event the service publishes or consumes is listed here with the zod
 * schema its payload must satisfy. The list is closed: EventName is a union
 * of literals, and EVENT_SCHEMAS must have an entry for each one.
 *
 * Naming follows <domain>.<action>.
 */

import { z } from 'zod';
import {
  CancelInitiator,
  CoordinatesSchema,
  MinorUnitsSchema,
  RatingSchema,
  UnmatchedReason
} from '../models/types';

// =============================================================================
// PAYLOAD SCHEMAS
// =============================================================================

const TripIdSchema = z.string().min(1);

export const TripRequestedSchema = z.object({
  tripId: TripIdSchema,
  riderId: z.string().min(1),
  origin: CoordinatesSchema,
  destination: CoordinatesSchema
});

export const TripAssignedSchema = z.object({
  tripId: TripIdSchema,
  driverId: z.string().min(1)
});

export const TripUnmatchedSchema = z.object({
  tripId: TripIdSchema,
  reason: z.nativeEnum(UnmatchedReason)
});

export const PricingQuotedSchema = z.object({
  tripId: TripIdSchema,
  price: MinorUnitsSchema
});

export const TripStartedSchema = z.object({
  tripId: TripIdSchema
});

/**
 * finalPrice is optional when the driver app reports completion
 * (the quoted price is used), and always present when we emit it.
 */
export const TripCompletedSchema = z.object({
  tripId: TripIdSchema,
  finalPrice: MinorUnitsSchema.optional()
});

export const TripCancelRequestedSchema = z.object({
  tripId: TripIdSchema,
  initiator: z.nativeEnum(CancelInitiator),
  reason: z.string().min(1).optional()
});

export const TripCancelledSchema = z.object({
  tripId: TripIdSchema,
  initiator: z.nativeEnum(CancelInitiator).optional()
});

export const PaymentChargedSchema = z.object({
  tripId: TripIdSchema,
  amount: MinorUnitsSchema
});

export const DriverAvailableSchema = z.object({
  driverId: z.string().min(1),
  location: CoordinatesSchema,
  rating: RatingSchema.optional(),
  name: z.string().min(1).optional()
});

export const DriverOfflineSchema = z.object({
  driverId: z.string().min(1)
});

// =============================================================================
// REGISTRY
// =============================================================================

export const EVENT_NAMES = [
  'trip.requested',
  'trip.assigned',
  'trip.unmatched',
  'pricing.quoted',
  'trip.started',
  'trip.completed',
  'trip.cancel_requested',
  'trip.cancelled',
  'payment.charged',
  'driver.available',
  'driver.offline'
] as const;

export type EventName = typeof EVENT_NAMES[number];

export interface EventPayloads {
  'trip.requested': z.infer<typeof TripRequestedSchema>;
  'trip.assigned': z.infer<typeof TripAssignedSchema>;
  'trip.unmatched': z.infer<typeof TripUnmatchedSchema>;
  'pricing.quoted': z.infer<typeof PricingQuotedSchema>;
  'trip.started': z.infer<typeof TripStartedSchema>;
  'trip.completed': z.infer<typeof TripCompletedSchema>;
  'trip.cancel_requested': z.infer<typeof TripCancelRequestedSchema>;
  'trip.cancelled': z.infer<typeof TripCancelledSchema>;
  'payment.charged': z.infer<typeof PaymentChargedSchema>;
  'driver.available': z.infer<typeof DriverAvailableSchema>;
  'driver.offline': z.infer<typeof DriverOfflineSchema>;
}

export type EventPayload<N extends EventName> = EventPayloads[N];

type SchemaRegistry = {
  [N in EventName]: z.ZodType<EventPayloads[N], z.ZodTypeDef, unknown>;
};

export const EVENT_SCHEMAS: SchemaRegistry = {
  'trip.requested': TripRequestedSchema,
  'trip.assigned': TripAssignedSchema,
  'trip.unmatched': TripUnmatchedSchema,
  'pricing.quoted': PricingQuotedSchema,
  'trip.started': TripStartedSchema,
  'trip.completed': TripCompletedSchema,
  'trip.cancel_requested': TripCancelRequestedSchema,
  'trip.cancelled': TripCancelledSchema,
  'payment.charged': PaymentChargedSchema,
  'driver.available': DriverAvailableSchema,
  'driver.offline': DriverOfflineSchema
};

export function isEventName(name: string): name is EventName {
  return EVENT_NAMES.some(known => known === name);
}
