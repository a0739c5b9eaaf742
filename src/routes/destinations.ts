import express, { type NextFunction, type Request, type Response } from 'express';
import type { TravelCore } from '@/services/travel-core';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { destinationRequestSchema, validate } from '@/routes/validation';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

const log = logger.getSubLogger({ name: 'destinations-route' });

export function createDestinationRoutes(travel: TravelCore): express.Router {
  const router = express.Router();

  router.post('/recommend', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = validate(destinationRequestSchema, req.body);
    if (!parsed.success) {
      res.status(400).json(createErrorResponse('Invalid recommendation request', parsed.error, 'INVALID_INPUT'));
      return;
    }
    try {
      const { budget, topN, ...profile } = parsed.data;
      const result = await travel.recommendDestinations(budget, profile, topN);
      // The request-timeout middleware may already have answered.
      if (res.headersSent) return;
      res.json(createSuccessResponse(result));
    } catch (err) {
      if (res.headersSent) {
        log.warn('destinations:late_result_dropped', { error: errorMessage(err) });
        return;
      }
      next(err);
    }
  });

  router.post('/explore', (req: Request, res: Response, next: NextFunction) => {
    const parsed = validate(destinationRequestSchema, req.body);
    if (!parsed.success) {
      res.status(400).json(createErrorResponse('Invalid explore request', parsed.error, 'INVALID_INPUT'));
      return;
    }
    try {
      const { budget, topN, ...profile } = parsed.data;
      res.json(createSuccessResponse({ destinations: travel.exploreDestinations(budget, profile, topN) }));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
