/**
 * Place Repository
 *
 * Points of interest for a city: live providers first (results concatenated
 * in provider order), the static fallback table when they return nothing.
 * The final list is cached per city|country for the session, empty lists
 * included; `SessionCache.clear()` is the only way to retry. The first
 * lookup's limit decides the cached list, later limits reuse it.
 */

import type { Place } from '@shared/schema';
import { cacheKey } from '../utils/ttlCache';
import type { Geocoder } from './geocoder';
import type { PlaceProvider } from './placeProviders';
import type { SessionCache } from './sessionCache';
import { lookupCity } from './staticData';

export class PlaceRepository {
  constructor(
    private readonly providers: PlaceProvider[],
    private readonly geocoder: Geocoder,
    private readonly fallbackPlaces: Record<string, Place[]>,
    private readonly cache: SessionCache
  ) {}

  async getPlaces(city: string, country: string, limit = 10): Promise<Place[]> {
    const key = cacheKey(city, country);
    const cached = this.cache.places.get(key);
    if (cached) return cached;

    const coordinates = await this.geocoder.resolve(city, country);

    const places: Place[] = [];
    for (const provider of this.providers) {
      const found = await provider.lookup({ city, country, coordinates, limit });
      if (found.length > 0) {
        console.log(`[Places] ${provider.name}: ${found.length} places for ${city}`);
      }
      places.push(...found);
    }

    if (places.length === 0) {
      const fallback = lookupCity(this.fallbackPlaces, city);
      if (fallback) {
        console.log(`[Places] Using fallback table for ${city} (${fallback.length} places)`);
        places.push(...fallback.map((place) => ({ ...place })));
      } else {
        console.warn(`[Places] No places found for ${city}, ${country}`);
      }
    }

    this.cache.places.set(key, places);
    return places;
  }

  configuredProviders(): string[] {
    return this.providers.filter((p) => p.isConfigured()).map((p) => p.name);
  }
}
