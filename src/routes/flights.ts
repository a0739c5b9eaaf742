import express, { type NextFunction, type Request, type Response } from 'express';
import type { TravelCore } from '@/services/travel-core';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { flightSearchQuerySchema, validate } from '@/routes/validation';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

const log = logger.getSubLogger({ name: 'flights-route' });

export function createFlightRoutes(travel: TravelCore): express.Router {
  const router = express.Router();

  // GET /api/flights/search?origin=JFK&destination=LHR&months=3
  router.get('/search', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = validate(flightSearchQuerySchema, req.query);
    if (!parsed.success) {
      res.status(400).json(createErrorResponse('Invalid flight search', parsed.error, 'INVALID_INPUT'));
      return;
    }

    // Abandon the fan-out if the response closes first: client gone or request timed out.
    const controller = new AbortController();
    const onClose = () => controller.abort();
    res.on('close', onClose);

    try {
      const { origin, destination, months } = parsed.data;
      const result = await travel.searchFlights(origin, destination, months, { signal: controller.signal });
      if (res.headersSent) return;
      res.json(createSuccessResponse(result));
    } catch (err) {
      if (res.headersSent) {
        log.warn('flights:late_result_dropped', { error: errorMessage(err) });
        return;
      }
      next(err);
    } finally {
      res.off('close', onClose);
    }
  });

  return router;
}
