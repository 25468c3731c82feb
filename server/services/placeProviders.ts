/**
 * Place Providers
 *
 * Each provider turns one external places API into a list of `Place`
 * records. Every failure mode (missing key, network error, non-2xx,
 * timeout, unexpected body) yields an empty list; nothing is thrown.
 */

import type { Coordinates, Place } from '@shared/schema';
import { fetchJsonSoft, withQuery, type FetchFn } from '../utils/http';
import { asArray, asNumber, asString, path } from '../utils/json';

export interface PlaceQuery {
  city: string;
  country: string;
  coordinates: Coordinates;
  limit: number;
}

export interface PlaceProvider {
  readonly name: string;
  isConfigured(): boolean;
  lookup(query: PlaceQuery): Promise<Place[]>;
}

export interface PlaceProviderOptions {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

const DESCRIPTION_MAX = 200;
const DEFAULT_RATING = 4.0;

function clampRating(value: number): number {
  return Math.round(Math.min(5, Math.max(0, value)) * 10) / 10;
}

// ============================================================================
// OPENTRIPMAP
// ============================================================================

const OTM_BASE = 'https://api.opentripmap.com/0.1/en/places';
const OTM_KINDS = 'historic,architecture,cultural,museums,religion,beaches,natural';
const OTM_RADIUS_M = 10_000;
/** Detail lookups are one request each, so only the first few are expanded */
const OTM_MAX_DETAILS = 10;

/**
 * Map OpenTripMap "kinds" (comma separated) to a display category.
 */
export function categoryFromKinds(kinds: string): string {
  const list = kinds.split(',').map((k) => k.trim());
  if (list.includes('historic')) return 'Historic Site';
  if (list.includes('museums') || list.includes('museum')) return 'Museum';
  if (list.includes('religion') || list.includes('religious')) return 'Religious Site';
  if (list.includes('beaches') || list.includes('beach')) return 'Beach';
  if (list.includes('natural')) return 'Natural';
  if (list.includes('architecture')) return 'Architecture';
  return 'Attraction';
}

/**
 * OpenTripMap "rate" is 0-3, with an "h" suffix for heritage sites ("3h").
 * Mapped onto 3.5-5.0.
 */
export function ratingFromOtmRate(rate: unknown): number {
  const numeric = asNumber(asString(rate).replace(/h$/i, ''));
  if (numeric === undefined) return DEFAULT_RATING;
  return clampRating(3.5 + numeric * 0.5);
}

export class OpenTripMapProvider implements PlaceProvider {
  readonly name = 'OpenTripMap';

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: PlaceProviderOptions = {}
  ) {}

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  async lookup(query: PlaceQuery): Promise<Place[]> {
    if (!this.apiKey) return [];

    const data = await fetchJsonSoft(
      withQuery(`${OTM_BASE}/radius`, {
        radius: OTM_RADIUS_M,
        lon: query.coordinates.lng,
        lat: query.coordinates.lat,
        format: 'json',
        limit: query.limit,
        apikey: this.apiKey,
        kinds: OTM_KINDS,
      }),
      { tag: 'OpenTripMap', ...this.options }
    );

    const places: Place[] = [];
    for (const item of asArray(data).slice(0, OTM_MAX_DETAILS)) {
      const xid = asString(path(item, 'xid'));
      if (!xid) continue;
      const details = await this.details(xid);
      if (details) places.push(details);
    }
    return places;
  }

  private async details(xid: string): Promise<Place | null> {
    const apiKey = this.apiKey ?? '';
    const data = await fetchJsonSoft(
      withQuery(`${OTM_BASE}/xid/${encodeURIComponent(xid)}`, { apikey: apiKey }),
      { tag: 'OpenTripMap', ...this.options }
    );
    if (data === null) return null;

    const name = asString(path(data, 'name')).trim();
    if (!name) return null;

    const extract = asString(path(data, 'wikipedia_extracts', 'text'), 'A popular tourist attraction.');
    const description = extract.length > DESCRIPTION_MAX ? `${extract.slice(0, DESCRIPTION_MAX)}...` : extract;

    return {
      name,
      type: categoryFromKinds(asString(path(data, 'kinds'))),
      rating: ratingFromOtmRate(path(data, 'rate')),
      description,
      coordinates: {
        lat: asNumber(path(data, 'point', 'lat')) ?? 0,
        lng: asNumber(path(data, 'point', 'lon')) ?? 0,
      },
    };
  }
}

// ============================================================================
// FOURSQUARE
// ============================================================================

const FOURSQUARE_URL = 'https://api.foursquare.com/v3/places/search';
/** Foursquare "Landmarks and Outdoors" top-level category */
const FOURSQUARE_CATEGORY = '16000';
const FOURSQUARE_LIMIT = 15;

export class FoursquareProvider implements PlaceProvider {
  readonly name = 'Foursquare';

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: PlaceProviderOptions = {}
  ) {}

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  async lookup(query: PlaceQuery): Promise<Place[]> {
    if (!this.apiKey) return [];

    const data = await fetchJsonSoft(
      withQuery(FOURSQUARE_URL, {
        query: 'tourist attraction',
        near: `${query.city}, ${query.country}`,
        limit: Math.min(query.limit, FOURSQUARE_LIMIT),
        categories: FOURSQUARE_CATEGORY,
        fields: 'name,categories,rating,geocodes,description',
      }),
      {
        tag: 'Foursquare',
        headers: { Authorization: this.apiKey, accept: 'application/json' },
        ...this.options,
      }
    );

    return asArray(path(data, 'results')).flatMap((venue): Place[] => {
      const name = asString(path(venue, 'name')).trim();
      if (!name) return [];

      // Foursquare rates on a 0-10 scale
      const rating = asNumber(path(venue, 'rating'));

      return [
        {
          name,
          type: asString(path(venue, 'categories', 0, 'name'), 'Attraction') || 'Attraction',
          rating: rating === undefined ? DEFAULT_RATING : clampRating(rating / 2),
          description: asString(path(venue, 'description')) || `A popular attraction in ${query.city}.`,
          coordinates: {
            lat: asNumber(path(venue, 'geocodes', 'main', 'latitude')) ?? 0,
            lng: asNumber(path(venue, 'geocodes', 'main', 'longitude')) ?? 0,
          },
        },
      ];
    });
  }
}

// ============================================================================
// GOOGLE PLACES
// ============================================================================

const GOOGLE_TEXTSEARCH_URL = 'https://maps.googleapis.com/maps/api/place/textsearch/json';
const GOOGLE_RADIUS_M = 15_000;

/**
 * "tourist_attraction" -> "Tourist Attraction"
 */
export function categoryFromGoogleTypes(types: unknown): string {
  const first = asArray(types)
    .map((t) => asString(t))
    .find((t) => t && t !== 'point_of_interest' && t !== 'establishment');
  if (!first) return 'Attraction';
  return first
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export class GooglePlacesProvider implements PlaceProvider {
  readonly name = 'GooglePlaces';

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: PlaceProviderOptions = {}
  ) {}

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  async lookup(query: PlaceQuery): Promise<Place[]> {
    if (!this.apiKey) return [];

    const data = await fetchJsonSoft(
      withQuery(GOOGLE_TEXTSEARCH_URL, {
        query: `tourist attractions in ${query.city}, ${query.country}`,
        location: `${query.coordinates.lat},${query.coordinates.lng}`,
        radius: GOOGLE_RADIUS_M,
        key: this.apiKey,
      }),
      { tag: 'GooglePlaces', ...this.options }
    );

    const status = asString(path(data, 'status'));
    if (data !== null && status !== 'OK' && status !== 'ZERO_RESULTS') {
      console.warn('[GooglePlaces] API error:', status, asString(path(data, 'error_message')));
      return [];
    }

    return asArray(path(data, 'results'))
      .slice(0, query.limit)
      .flatMap((result): Place[] => {
        const name = asString(path(result, 'name')).trim();
        if (!name) return [];
        const rating = asNumber(path(result, 'rating'));
        const address = asString(path(result, 'formatted_address'));

        return [
          {
            name,
            type: categoryFromGoogleTypes(path(result, 'types')),
            rating: rating === undefined ? DEFAULT_RATING : clampRating(rating),
            description: address ? `Located at ${address}.` : `A popular attraction in ${query.city}.`,
            coordinates: {
              lat: asNumber(path(result, 'geometry', 'location', 'lat')) ?? 0,
              lng: asNumber(path(result, 'geometry', 'location', 'lng')) ?? 0,
            },
          },
        ];
      });
  }
}
