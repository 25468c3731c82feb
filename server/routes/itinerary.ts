/**
 * Itinerary Routes
 *
 * The session's current itinerary: generate from an inquiry, read it back,
 * reset it, list places per day and download it in three formats.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { inquiryRequestSchema, type Itinerary } from '@shared/schema';
import { toBudgetChart, toCsv, toJsonDocument, toTextReport } from '@shared/exportModel';
import type { Services } from '../services';
import { generationRateLimiter } from '../middleware/rateLimiter';
import { fileSlug, sendNotFound, sendRouteError, sendValidationError } from './respond';

const dayParamsSchema = z.object({
  day: z.coerce.number().int().positive(),
});

const dayQuerySchema = z.object({
  city: z.string().trim().min(1).optional(),
  count: z.coerce.number().int().min(1).max(20).optional(),
});

export function createItineraryRouter(services: Services): Router {
  const router = Router();
  const { planner } = services;

  /** Current itinerary, or a 404 already sent */
  function requireItinerary(res: Response): Itinerary | null {
    const itinerary = planner.current();
    if (!itinerary) {
      sendNotFound(res, 'No itinerary has been generated yet');
      return null;
    }
    return itinerary;
  }

  /**
   * POST /api/itinerary
   * Generate an itinerary from a free-text inquiry
   */
  router.post('/', generationRateLimiter, async (req: Request, res: Response) => {
    const validation = inquiryRequestSchema.safeParse(req.body);
    if (!validation.success) {
      return sendValidationError(res, 'Invalid request body', validation.error);
    }

    try {
      const itinerary = await planner.generate(validation.data.inquiry);
      res.json(itinerary);
    } catch (error) {
      sendRouteError(res, 'Itinerary', error, 'Failed to generate itinerary');
    }
  });

  /**
   * GET /api/itinerary
   */
  router.get('/', (_req: Request, res: Response) => {
    const itinerary = requireItinerary(res);
    if (itinerary) res.json(itinerary);
  });

  /**
   * DELETE /api/itinerary
   * Start over with a new itinerary
   */
  router.delete('/', (_req: Request, res: Response) => {
    planner.reset();
    res.json({ success: true });
  });

  /**
   * GET /api/itinerary/days/:day/places
   * Display-ready places for one day, rotated through the city's pool
   */
  router.get('/days/:day/places', async (req: Request, res: Response) => {
    const params = dayParamsSchema.safeParse(req.params);
    if (!params.success) {
      return sendValidationError(res, 'Invalid day', params.error);
    }
    const query = dayQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendValidationError(res, 'Invalid query parameters', query.error);
    }

    const itinerary = requireItinerary(res);
    if (!itinerary) return;

    try {
      const city = query.data.city ?? planner.cityForDay(itinerary, params.data.day);
      const places = await planner.placesForDay(itinerary, params.data.day, { city, count: query.data.count });
      res.json({ day: params.data.day, city, places });
    } catch (error) {
      sendRouteError(res, 'Itinerary', error, 'Failed to load places for day');
    }
  });

  /**
   * GET /api/itinerary/budget
   * Budget breakdown as chart series
   */
  router.get('/budget', (_req: Request, res: Response) => {
    const itinerary = requireItinerary(res);
    if (itinerary) res.json(toBudgetChart(itinerary.budgetBreakdown));
  });

  router.get('/export.json', (_req: Request, res: Response) => {
    const itinerary = requireItinerary(res);
    if (!itinerary) return;

    res
      .type('application/json')
      .attachment(`${fileSlug(itinerary.summary.destinationCountry)}_itinerary.json`)
      .send(toJsonDocument(itinerary));
  });

  router.get('/export.txt', (_req: Request, res: Response) => {
    const itinerary = requireItinerary(res);
    if (!itinerary) return;

    res
      .type('text/plain')
      .attachment(`${fileSlug(itinerary.summary.destinationCountry)}_travel_guide.txt`)
      .send(toTextReport(itinerary));
  });

  router.get('/export.csv', async (_req: Request, res: Response) => {
    const itinerary = requireItinerary(res);
    if (!itinerary) return;

    try {
      const rows = await planner.placeRows(itinerary);
      res
        .type('text/csv')
        .attachment(`${fileSlug(itinerary.summary.destinationCountry)}_places.csv`)
        .send(toCsv(rows));
    } catch (error) {
      sendRouteError(res, 'Itinerary', error, 'Failed to export places');
    }
  });

  return router;
}
