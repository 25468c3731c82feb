/**
 * Session cache
 *
 * One object holds every memoized lookup for the process: places, images,
 * geocoding and country profiles. It is constructed once and handed to each
 * service, so tests get a fresh cache per case and `clear()` resets all of
 * it at once (the only way to retry a lookup that came back empty).
 */

import type { Coordinates, ImageRef, Place } from "@shared/schema";
import { TtlCache } from "../utils/ttlCache";
import type { CountryProfile } from "./countryService";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

const MAX_ENTRIES = {
  places: 500,
  images: 2000,
  geocode: 1000,
  countries: 300,
};

export interface SessionCacheStats {
  places: number;
  images: number;
  geocode: number;
  countries: number;
}

export class SessionCache {
  /** city|country -> places; no TTL, lives as long as the session */
  readonly places: TtlCache<Place[]>;
  /** place|city|country|size -> image, null when every provider came up empty */
  readonly images: TtlCache<ImageRef | null>;
  /** city|country -> coordinates, 24h */
  readonly geocode: TtlCache<Coordinates>;
  /** country -> profile, 24h */
  readonly countries: TtlCache<CountryProfile | null>;

  constructor(now: () => number = Date.now) {
    this.places = new TtlCache({ maxSize: MAX_ENTRIES.places, now });
    this.images = new TtlCache({ maxSize: MAX_ENTRIES.images, now });
    this.geocode = new TtlCache({ maxSize: MAX_ENTRIES.geocode, ttlMs: DAY_MS, now });
    this.countries = new TtlCache({ maxSize: MAX_ENTRIES.countries, ttlMs: DAY_MS, now });
  }

  clear(): void {
    this.places.clear();
    this.images.clear();
    this.geocode.clear();
    this.countries.clear();
    console.log("[SessionCache] Cleared");
  }

  stats(): SessionCacheStats {
    return {
      places: this.places.size,
      images: this.images.size,
      geocode: this.geocode.size,
      countries: this.countries.size,
    };
  }
}
