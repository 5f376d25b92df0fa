import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Runtime } from './runtime';
import { createTripRoutes } from './routes/tripRoutes';
import { createDriverRoutes } from './routes/driverRoutes';
import { createConfigRoutes } from './routes/configRoutes';

/**
 * Build the express app for a runtime. Listening is left to the caller.
 */
export function createApp(runtime: Runtime): express.Express {
  const app = express();
  const envConfig = runtime.env;

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(cors({
    origin: envConfig.allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true
  }));

  app.use(express.json({ limit: '1mb' }));

  // Request logging (development)
  if (envConfig.nodeEnv === 'development') {
    app.use((req: Request, res: Response, next: NextFunction) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/api', createTripRoutes(runtime));
  app.use('/api', createDriverRoutes(runtime));
  app.use('/api', createConfigRoutes(runtime));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      name: 'Trip Orchestrator Service',
      version: '1.0.0',
      description: 'Event-driven trip lifecycle and driver matching',
      endpoints: {
        health: 'GET /api/health',
        stats: 'GET /api/stats',
        listTrips: 'GET /api/trips',
        getTrip: 'GET /api/trips/:tripId',
        requestTrip: 'POST /api/trips',
        cancelTrip: 'POST /api/trips/:tripId/cancel',
        listDrivers: 'GET /api/drivers',
        registerDriver: 'POST /api/drivers',
        driverAvailable: 'POST /api/drivers/:driverId/available',
        driverOffline: 'POST /api/drivers/:driverId/offline',
        listConfigs: 'GET /api/config',
        getConfig: 'GET /api/config/:configId',
        updateConfig: 'PUT /api/config/:configId',
        updatePriority: 'PUT /api/config/:configId/priority'
      }
    });
  });

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`
      }
    });
  });

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' }
      });
      return;
    }

    console.error('[App] Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: envConfig.nodeEnv === 'development' ? err.message : 'Internal server error'
      }
    });
  });

  return app;
}
