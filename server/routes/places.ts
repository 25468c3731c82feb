/**
 * Place Routes
 * Direct access to the lookup services behind the itinerary: places per city,
 * map markers, images and geocoding. All of them degrade to fallback data
 * instead of failing when providers are unavailable.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { toMapFeatureCollection } from '@shared/exportModel';
import type { Services } from '../services';
import { sendNotFound, sendRouteError, sendValidationError } from './respond';

// Validation schemas
const locationSchema = z.object({
  city: z.string().trim().min(1, 'City is required'),
  country: z.string().trim().default(''),
});

const searchSchema = locationSchema.extend({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const imageSchema = locationSchema.extend({
  place: z.string().trim().min(1, 'Place is required'),
  size: z.enum(['medium', 'large']).default('medium'),
});

export function createPlacesRouter(services: Services): Router {
  const router = Router();
  const { places, geocoder, images } = services;

  /**
   * GET /api/places?city=&country=&limit=
   */
  router.get('/', async (req: Request, res: Response) => {
    const validation = searchSchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, 'Invalid query parameters', validation.error);
    }

    const { city, country, limit } = validation.data;
    try {
      const results = await places.getPlaces(city, country, limit);
      res.json({ city, country, count: results.length, places: results });
    } catch (error) {
      sendRouteError(res, 'Places', error, 'Failed to load places');
    }
  });

  /**
   * GET /api/places/map?city=&country=
   * GeoJSON markers centred on the city
   */
  router.get('/map', async (req: Request, res: Response) => {
    const validation = searchSchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, 'Invalid query parameters', validation.error);
    }

    const { city, country, limit } = validation.data;
    try {
      const center = await geocoder.resolve(city, country);
      const results = await places.getPlaces(city, country, limit);
      res.json(toMapFeatureCollection(results, center));
    } catch (error) {
      sendRouteError(res, 'Places', error, 'Failed to build map');
    }
  });

  /**
   * GET /api/places/image?place=&city=&country=&size=
   */
  router.get('/image', async (req: Request, res: Response) => {
    const validation = imageSchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, 'Invalid query parameters', validation.error);
    }

    const { place, city, country, size } = validation.data;
    try {
      const image = await images.resolveImage(place, city, country, size);
      if (!image) {
        return sendNotFound(res, 'No image found');
      }
      res.json(image);
    } catch (error) {
      sendRouteError(res, 'Places', error, 'Failed to resolve image');
    }
  });

  /**
   * GET /api/places/geocode?city=&country=
   */
  router.get('/geocode', async (req: Request, res: Response) => {
    const validation = locationSchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, 'Invalid query parameters', validation.error);
    }

    const { city, country } = validation.data;
    try {
      res.json(await geocoder.resolve(city, country));
    } catch (error) {
      sendRouteError(res, 'Places', error, 'Failed to geocode');
    }
  });

  return router;
}
