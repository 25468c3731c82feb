/**
 * Service wiring: one SessionCache shared by every lookup service, real
 * provider chains built from config. Tests pass `overrides` to swap in
 * stub completion clients or providers.
 */

import type { AppConfig } from '../config';
import type { FetchFn } from '../utils/http';
import { createCompletionClient, type CompletionClient } from './aiClientFactory';
import { CountryService } from './countryService';
import { DayPlaces } from './dayPlaces';
import { Geocoder, MapboxGeocodeProvider, NominatimGeocodeProvider, type GeocodeProvider } from './geocoder';
import {
  ImageResolver,
  PexelsImageProvider,
  UnsplashImageProvider,
  WikipediaImageProvider,
  type ImageProvider,
} from './imageResolver';
import { InquiryParser } from './inquiryParser';
import { ItineraryAssembler } from './itineraryAssembler';
import { FoursquareProvider, GooglePlacesProvider, OpenTripMapProvider, type PlaceProvider } from './placeProviders';
import { PlaceRepository } from './placeRepository';
import { SessionCache } from './sessionCache';
import { loadStaticTables, type StaticTables } from './staticData';
import { TripPlanner } from './tripPlanner';

export interface Services {
  cache: SessionCache;
  geocoder: Geocoder;
  places: PlaceRepository;
  images: ImageResolver;
  countries: CountryService;
  dayPlaces: DayPlaces;
  planner: TripPlanner;
  aiConfigured: boolean;
}

export interface ServiceOverrides {
  cache?: SessionCache;
  tables?: StaticTables;
  fetchImpl?: FetchFn;
  geocodeProviders?: GeocodeProvider[];
  placeProviders?: PlaceProvider[];
  imageProviders?: ImageProvider[];
  extraction?: CompletionClient | null;
  generation?: CompletionClient | null;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const cache = overrides.cache ?? new SessionCache();
  const tables = overrides.tables ?? loadStaticTables();
  const http = { timeoutMs: config.HTTP_TIMEOUT_MS, fetchImpl: overrides.fetchImpl };

  const geocoder = new Geocoder(
    overrides.geocodeProviders ?? [
      new MapboxGeocodeProvider(config.MAPBOX_ACCESS_TOKEN, http),
      new NominatimGeocodeProvider(http),
    ],
    tables.cityCoordinates,
    cache
  );

  const places = new PlaceRepository(
    overrides.placeProviders ?? [
      new OpenTripMapProvider(config.OPENTRIPMAP_API_KEY, http),
      new FoursquareProvider(config.FOURSQUARE_API_KEY, http),
      new GooglePlacesProvider(config.GOOGLE_PLACES_API_KEY, http),
    ],
    geocoder,
    tables.fallbackPlaces,
    cache
  );

  const images = new ImageResolver(
    overrides.imageProviders ?? [
      new UnsplashImageProvider(config.UNSPLASH_ACCESS_KEY, http),
      new PexelsImageProvider(config.PEXELS_API_KEY, http),
      new WikipediaImageProvider(http),
    ],
    cache
  );

  const extraction = overrides.extraction !== undefined ? overrides.extraction : createCompletionClient(config, 'extraction');
  const generation = overrides.generation !== undefined ? overrides.generation : createCompletionClient(config, 'generation');

  const dayPlaces = new DayPlaces(places, tables.placeIcons);
  const planner = new TripPlanner({
    parser: extraction ? new InquiryParser(extraction) : null,
    assembler: generation ? new ItineraryAssembler(generation, places) : null,
    dayPlaces,
    knownCities: Object.keys(tables.fallbackPlaces),
  });

  return {
    cache,
    geocoder,
    places,
    images,
    countries: new CountryService(cache, http),
    dayPlaces,
    planner,
    aiConfigured: !!extraction && !!generation,
  };
}
