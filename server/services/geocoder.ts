/**
 * Geocoder - resolve a city to coordinates.
 *
 * Resolution order:
 * 1. Static table of known cities (literal coordinates, no network)
 * 2. Live providers in order (Mapbox when a token is configured, then Nominatim)
 * 3. Default centroid
 *
 * Results are cached per city|country for 24 hours.
 */

import type { Coordinates } from '@shared/schema';
import { fetchJsonSoft, withQuery, type FetchFn } from '../utils/http';
import { asArray, asNumber, path } from '../utils/json';
import { cacheKey } from '../utils/ttlCache';
import type { SessionCache } from './sessionCache';
import { DEFAULT_CENTROID, lookupCity } from './staticData';

// ============================================================================
// PROVIDERS
// ============================================================================

export interface GeocodeProvider {
  readonly name: string;
  lookup(query: string): Promise<Coordinates | null>;
}

interface ProviderOptions {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * Mapbox forward geocoding (v6). Returns the best place match.
 */
export class MapboxGeocodeProvider implements GeocodeProvider {
  readonly name = 'Mapbox';

  constructor(
    private readonly accessToken: string | undefined,
    private readonly options: ProviderOptions = {}
  ) {}

  async lookup(query: string): Promise<Coordinates | null> {
    if (!this.accessToken) return null;

    const data = await fetchJsonSoft(
      withQuery('https://api.mapbox.com/search/geocode/v6/forward', {
        q: query,
        access_token: this.accessToken,
        limit: 1,
        types: 'place,locality,region',
      }),
      { tag: 'Mapbox', ...this.options }
    );

    const lng = asNumber(path(data, 'features', 0, 'geometry', 'coordinates', 0));
    const lat = asNumber(path(data, 'features', 0, 'geometry', 'coordinates', 1));
    if (lat === undefined || lng === undefined) return null;
    return { lat, lng };
  }
}

/**
 * OpenStreetMap Nominatim search. No key, but a User-Agent is mandatory.
 */
export class NominatimGeocodeProvider implements GeocodeProvider {
  readonly name = 'Nominatim';

  constructor(private readonly options: ProviderOptions = {}) {}

  async lookup(query: string): Promise<Coordinates | null> {
    const data = await fetchJsonSoft(
      withQuery('https://nominatim.openstreetmap.org/search', { q: query, format: 'json', limit: 1 }),
      { tag: 'Nominatim', headers: { 'User-Agent': 'itinerary-planner/1.0' }, ...this.options }
    );

    const first = asArray(data)[0];
    const lat = asNumber(path(first, 'lat'));
    const lng = asNumber(path(first, 'lon'));
    if (lat === undefined || lng === undefined) return null;
    return { lat, lng };
  }
}

// ============================================================================
// GEOCODER
// ============================================================================

export class Geocoder {
  constructor(
    private readonly providers: GeocodeProvider[],
    private readonly cityCoordinates: Record<string, Coordinates>,
    private readonly cache: SessionCache
  ) {}

  async resolve(city: string, country: string): Promise<Coordinates> {
    const key = cacheKey(city, country);
    const cached = this.cache.geocode.get(key);
    if (cached) return cached;

    const coordinates = await this.lookup(city, country);
    this.cache.geocode.set(key, coordinates);
    return coordinates;
  }

  private async lookup(city: string, country: string): Promise<Coordinates> {
    const known = lookupCity(this.cityCoordinates, city);
    if (known) return { ...known };

    const query = country ? `${city}, ${country}` : city;
    for (const provider of this.providers) {
      const result = await provider.lookup(query);
      if (result) {
        console.log(`[Geocoder] ${provider.name} resolved "${query}" → ${result.lat},${result.lng}`);
        return result;
      }
    }

    console.warn(`[Geocoder] Could not resolve "${query}", using default centroid`);
    return { ...DEFAULT_CENTROID };
  }
}
