/**
 * Trip endpoints
 *
 * GET  /api/health                  - Health check with bus state
 * GET  /api/stats                   - Counters and subscriptions
 * GET  /api/trips                   - List trips
 * GET  /api/trips/:tripId           - Get one trip
 * POST /api/trips                   - Request a trip (publishes trip.requested)
 * POST /api/trips/:tripId/cancel    - Ask to cancel (publishes trip.cancel_requested)
 *
 * Requests and cancellations go through the bus like every other producer's;
 * the orchestrator applies them. Both answer 202.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { CancelRequestBodySchema, TripRequestBodySchema } from '../models/types';
import { newTripId } from '../orchestrator/TripOrchestrator';
import { PublishError } from '../errors';
import type { Runtime } from '../runtime';
import { sendError, sendValidationError } from './respond';

export function createTripRoutes(runtime: Runtime): Router {
  const router = Router();
  const { bus, orchestrator, counters } = runtime;

  // ===========================================================================
  // HEALTH & STATS
  // ===========================================================================

  router.get('/health', (req: Request, res: Response) => {
    const connected = bus.connectionState === 'connected';
    res.status(connected ? 200 : 503).json({
      status: connected ? 'healthy' : 'degraded',
      service: runtime.env.serviceName,
      bus: bus.connectionState,
      uptimeSeconds: Math.floor((Date.now() - runtime.startedAt.getTime()) / 1000),
      timestamp: new Date().toISOString()
    });
  });

  router.get('/stats', (req: Request, res: Response) => {
    res.json({
      success: true,
      counters: counters.snapshot(),
      bus: {
        state: bus.connectionState,
        subscriptions: bus.listSubscriptions()
      }
    });
  });

  // ===========================================================================
  // TRIPS
  // ===========================================================================

  router.get('/trips', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const trips = await orchestrator.listTrips();
      res.json({ success: true, trips });
    } catch (error) {
      next(error);
    }
  });

  router.get('/trips/:tripId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const trip = await orchestrator.getTrip(req.params.tripId);
      if (!trip) {
        return sendError(res, 404, 'TRIP_NOT_FOUND', `Trip ${req.params.tripId} not found`);
      }
      res.json({ success: true, trip });
    } catch (error) {
      next(error);
    }
  });

  router.post('/trips', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = TripRequestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    const tripId = newTripId();
    const correlationId = uuidv4();

    try {
      const ack = await bus.publish('trip.requested', { tripId, ...parsed.data }, correlationId);
      res.status(202).json({ success: true, tripId, correlationId, eventId: ack.eventId });
    } catch (error) {
      if (error instanceof PublishError) {
        return sendError(res, 503, 'PUBLISH_FAILED', error.message, { kind: error.kind });
      }
      next(error);
    }
  });

  router.post('/trips/:tripId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = CancelRequestBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const trip = await orchestrator.getTrip(req.params.tripId);
      if (!trip) {
        return sendError(res, 404, 'TRIP_NOT_FOUND', `Trip ${req.params.tripId} not found`);
      }

      const ack = await bus.publish(
        'trip.cancel_requested',
        { tripId: trip.id, ...parsed.data },
        trip.correlationId
      );
      res.status(202).json({ success: true, tripId: trip.id, eventId: ack.eventId });
    } catch (error) {
      if (error instanceof PublishError) {
        return sendError(res, 503, 'PUBLISH_FAILED', error.message, { kind: error.kind });
      }
      next(error);
    }
  });

  return router;
}
