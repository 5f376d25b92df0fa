/**
 * Driver endpoints
 *
 * GET  /api/drivers                       - List drivers with live state
 * POST /api/drivers                       - Register a driver
 * POST /api/drivers/:driverId/available   - Driver reports in at a location
 * POST /api/drivers/:driverId/offline     - Driver stops taking trips
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { DriverAvailableBodySchema, DriverRegistrationSchema } from '../models/types';
import { DriverBusyError, DriverNotFoundError } from '../errors';
import type { Runtime } from '../runtime';
import { sendError, sendValidationError } from './respond';

export function createDriverRoutes(runtime: Runtime): Router {
  const router = Router();
  const { tracker } = runtime;

  router.get('/drivers', (req: Request, res: Response) => {
    res.json({ success: true, drivers: tracker.list() });
  });

  router.post('/drivers', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = DriverRegistrationSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const { id, name, rating } = parsed.data;
      const driver = await tracker.register({ id: id ?? `drv_${uuidv4()}`, name, rating });
      res.status(201).json({ success: true, driver });
    } catch (error) {
      next(error);
    }
  });

  router.post('/drivers/:driverId/available', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = DriverAvailableBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const driver = await tracker.markAvailable(req.params.driverId, parsed.data.location);
      res.json({ success: true, driver });
    } catch (error) {
      if (error instanceof DriverBusyError) {
        return sendError(res, 409, 'DRIVER_BUSY', error.message, { activeTripId: error.activeTripId });
      }
      next(error);
    }
  });

  router.post('/drivers/:driverId/offline', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const driver = await tracker.markUnavailable(req.params.driverId);
      res.json({ success: true, driver });
    } catch (error) {
      if (error instanceof DriverNotFoundError) {
        return sendError(res, 404, 'DRIVER_NOT_FOUND', error.message);
      }
      if (error instanceof DriverBusyError) {
        return sendError(res, 409, 'DRIVER_BUSY', error.message, { activeTripId: error.activeTripId });
      }
      next(error);
    }
  });

  return router;
}
