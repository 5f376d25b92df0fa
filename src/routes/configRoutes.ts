/**
 * Matching configuration endpoints
 *
 * GET /api/config                      - List all configurations
 * GET /api/config/:configId            - Get a specific configuration
 * PUT /api/config/:configId            - Create or update a configuration
 * PUT /api/config/:configId/priority   - Update criteria priority order
 *
 * The engine reads the default configuration on every match, so changes
 * apply to the next trip.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { CriterionType } from '../models/types';
import type { MatchingConfig } from '../config/config';
import type { Runtime } from '../runtime';
import { sendError, sendValidationError } from './respond';

const ConfigUpdateSchema = z.object({
  name: z.string().min(1).optional(),
  priorityOrder: z.array(z.nativeEnum(CriterionType)).optional(),
  maxPickupDistanceMiles: z.number().positive().optional(),
  candidatePoolSize: z.number().int().min(1).optional(),
  isDefault: z.boolean().optional()
});

const PriorityUpdateSchema = z.object({
  priorityOrder: z.array(z.nativeEnum(CriterionType))
});

export function createConfigRoutes(runtime: Runtime): Router {
  const router = Router();
  const { configManager } = runtime;

  /**
   * List all available configurations.
   */
  router.get('/config', (req: Request, res: Response) => {
    res.json({ success: true, configs: configManager.listConfigs() });
  });

  router.get('/config/:configId', (req: Request, res: Response) => {
    const config = configManager.findConfig(req.params.configId);
    if (!config) {
      return sendError(res, 404, 'CONFIG_NOT_FOUND', `Configuration ${req.params.configId} not found`);
    }
    res.json({ success: true, config });
  });

  /**
   * Update a configuration, or create it from the default's settings.
   */
  router.put('/config/:configId', (req: Request, res: Response) => {
    const parsed = ConfigUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    const { configId } = req.params;
    const existing: MatchingConfig = configManager.findConfig(configId) ?? {
      ...configManager.getDefaultConfig(),
      id: configId,
      name: configId,
      isDefault: false
    };

    try {
      const config = configManager.saveConfig({
        ...existing,
        ...parsed.data,
        priorityOrder: parsed.data.priorityOrder ?? existing.priorityOrder,
        id: configId
      });
      res.json({ success: true, config });
    } catch (error) {
      sendError(res, 400, 'CONFIG_ERROR', error instanceof Error ? error.message : 'Unknown error');
    }
  });

  /**
   * Update just the priority order of criteria.
   */
  router.put('/config/:configId/priority', (req: Request, res: Response) => {
    const parsed = PriorityUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    const { configId } = req.params;
    if (!configManager.findConfig(configId)) {
      return sendError(res, 404, 'CONFIG_NOT_FOUND', `Configuration ${configId} not found`);
    }

    try {
      const config = configManager.updatePriorityOrder(configId, parsed.data.priorityOrder);
      res.json({ success: true, config });
    } catch (error) {
      sendError(res, 400, 'CONFIG_ERROR', error instanceof Error ? error.message : 'Unknown error');
    }
  });

  return router;
}
