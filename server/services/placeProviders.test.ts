import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  FoursquareProvider,
  GooglePlacesProvider,
  OpenTripMapProvider,
  categoryFromGoogleTypes,
  categoryFromKinds,
  ratingFromOtmRate,
  type PlaceQuery,
} from './placeProviders';

afterEach(() => {
  vi.restoreAllMocks();
});

const query: PlaceQuery = {
  city: 'Galle',
  country: 'Sri Lanka',
  coordinates: { lat: 6.0535, lng: 80.22 },
  limit: 10,
};

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// ============================================================================
// HELPERS
// ============================================================================

describe('categoryFromKinds', () => {
  it('picks the first matching category by priority', () => {
    expect(categoryFromKinds('natural,historic')).toBe('Historic Site');
    expect(categoryFromKinds('interesting_places,museums')).toBe('Museum');
    expect(categoryFromKinds('religion,temples')).toBe('Religious Site');
    expect(categoryFromKinds('beaches')).toBe('Beach');
    expect(categoryFromKinds('other')).toBe('Attraction');
  });
});

describe('ratingFromOtmRate', () => {
  it('maps the 0-3 scale onto 3.5-5', () => {
    expect(ratingFromOtmRate(1)).toBe(4);
    expect(ratingFromOtmRate('2')).toBe(4.5);
    expect(ratingFromOtmRate('3h')).toBe(5);
  });

  it('defaults to 4.0 when missing', () => {
    expect(ratingFromOtmRate(undefined)).toBe(4);
    expect(ratingFromOtmRate('n/a')).toBe(4);
  });
});

describe('categoryFromGoogleTypes', () => {
  it('title-cases the first specific type', () => {
    expect(categoryFromGoogleTypes(['point_of_interest', 'hindu_temple', 'establishment'])).toBe('Hindu Temple');
    expect(categoryFromGoogleTypes(['establishment'])).toBe('Attraction');
    expect(categoryFromGoogleTypes(undefined)).toBe('Attraction');
  });
});

// ============================================================================
// PROVIDERS
// ============================================================================

describe('OpenTripMapProvider', () => {
  it('expands search results into places', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const longText = 'x'.repeat(250);
    const fetchImpl = vi.fn(async (url: string) => {
      if (url.includes('/radius')) return jsonResponse([{ xid: 'N1' }, { xid: 'N2' }, { name: 'no xid' }]);
      if (url.includes('/xid/N1')) {
        return jsonResponse({
          name: 'Galle Fort',
          kinds: 'architecture,historic',
          rate: '3h',
          wikipedia_extracts: { text: longText },
          point: { lat: 6.0267, lon: 80.217 },
        });
      }
      return jsonResponse({ error: 'not found' }, 404);
    });

    const places = await new OpenTripMapProvider('test-secret', { fetchImpl }).lookup(query);

    expect(places).toEqual([
      {
        name: 'Galle Fort',
        type: 'Historic Site',
        rating: 5,
        description: `${'x'.repeat(200)}...`,
        coordinates: { lat: 6.0267, lng: 80.217 },
      },
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(fetchImpl.mock.calls[0][0]).toContain('radius=10000');
  });

  it('returns nothing without a key', async () => {
    const fetchImpl = vi.fn(async (_url: string) => jsonResponse([]));
    const provider = new OpenTripMapProvider(undefined, { fetchImpl });

    expect(provider.isConfigured()).toBe(false);
    expect(await provider.lookup(query)).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('FoursquareProvider', () => {
  it('halves the 0-10 rating and sends the key as Authorization', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({
        results: [
          {
            name: 'Dutch Reformed Church',
            categories: [{ name: 'Church' }],
            rating: 9,
            geocodes: { main: { latitude: 6.03, longitude: 80.216 } },
          },
          { name: 'Jungle Beach' },
          { categories: [{ name: 'Unnamed' }] },
        ],
      })
    );

    const places = await new FoursquareProvider('test-secret', { fetchImpl }).lookup(query);

    expect(places).toEqual([
      {
        name: 'Dutch Reformed Church',
        type: 'Church',
        rating: 4.5,
        description: 'A popular attraction in Galle.',
        coordinates: { lat: 6.03, lng: 80.216 },
      },
      {
        name: 'Jungle Beach',
        type: 'Attraction',
        rating: 4,
        description: 'A popular attraction in Galle.',
        coordinates: { lat: 0, lng: 0 },
      },
    ]);
    expect(fetchImpl.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'test-secret' });
  });

  it('returns nothing on a failed request', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchImpl = vi.fn(async (_url: string) => jsonResponse({ message: 'bad key' }, 401));

    expect(await new FoursquareProvider('test-secret', { fetchImpl }).lookup(query)).toEqual([]);
  });
});

describe('GooglePlacesProvider', () => {
  it('reads text search results', async () => {
    const fetchImpl = vi.fn(async (_url: string) =>
      jsonResponse({
        status: 'OK',
        results: [
          {
            name: 'Galle Lighthouse',
            types: ['tourist_attraction', 'point_of_interest'],
            rating: 4.6,
            formatted_address: 'Galle 80000',
            geometry: { location: { lat: 6.0247, lng: 80.2195 } },
          },
        ],
      })
    );

    const places = await new GooglePlacesProvider('test-secret', { fetchImpl }).lookup(query);

    expect(places).toEqual([
      {
        name: 'Galle Lighthouse',
        type: 'Tourist Attraction',
        rating: 4.6,
        description: 'Located at Galle 80000.',
        coordinates: { lat: 6.0247, lng: 80.2195 },
      },
    ]);
  });

  it('returns nothing when the API reports an error status', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchImpl = vi.fn(async (_url: string) =>
      jsonResponse({ status: 'REQUEST_DENIED', error_message: 'invalid key', results: [{ name: 'X' }] })
    );

    expect(await new GooglePlacesProvider('test-secret', { fetchImpl }).lookup(query)).toEqual([]);
  });
});
