/**
 * Image Resolver
 *
 * Finds a representative photo for a place. Providers are tried in a fixed
 * order (Unsplash, Pexels, Wikipedia), each with its own list of query
 * variants from most to least specific. The first usable image wins.
 *
 * When every provider comes up empty the resolver returns null, and the
 * null is cached like any other result for the rest of the session.
 */

import type { ImageRef, ImageSize } from '@shared/schema';
import { fetchJsonSoft, withQuery, type FetchFn } from '../utils/http';
import { asArray, asRecord, asString, path } from '../utils/json';
import { cacheKey } from '../utils/ttlCache';
import type { SessionCache } from './sessionCache';

export interface ImageQuery {
  placeName: string;
  city: string;
  country: string;
  size: ImageSize;
}

export interface ImageProvider {
  readonly name: string;
  isConfigured(): boolean;
  /** Query variants, most specific first */
  queries(query: ImageQuery): string[];
  search(text: string, query: ImageQuery): Promise<ImageRef | null>;
}

export interface ImageProviderOptions {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * Collapse the whitespace left behind by empty city/country parts.
 */
function compact(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// ============================================================================
// UNSPLASH
// ============================================================================

export class UnsplashImageProvider implements ImageProvider {
  readonly name = 'Unsplash';

  constructor(
    private readonly accessKey: string | undefined,
    private readonly options: ImageProviderOptions = {}
  ) {}

  isConfigured(): boolean {
    return !!this.accessKey;
  }

  queries({ placeName, city, country }: ImageQuery): string[] {
    return [
      `${placeName} ${city} ${country} tourism`,
      `${placeName} landmark`,
      `${city} ${placeName} tourist attraction`,
      `${placeName} travel`,
      placeName,
    ].map(compact);
  }

  async search(text: string, { placeName, city, size }: ImageQuery): Promise<ImageRef | null> {
    if (!this.accessKey) return null;

    const data = await fetchJsonSoft(
      withQuery('https://api.unsplash.com/search/photos', {
        query: text,
        per_page: 1,
        orientation: 'landscape',
        content_filter: 'high',
      }),
      {
        tag: 'Unsplash',
        headers: { Authorization: `Client-ID ${this.accessKey}`, 'Accept-Version': 'v1' },
        ...this.options,
      }
    );

    const photo = asArray(path(data, 'results'))[0];
    const url = asString(path(photo, 'urls', size === 'medium' ? 'regular' : 'full'));
    if (!url) return null;

    return {
      url,
      photographer: asString(path(photo, 'user', 'name'), 'Unsplash'),
      photographerUrl: asString(path(photo, 'user', 'links', 'html')) || undefined,
      alt: asString(path(photo, 'alt_description')) || `${placeName} in ${city}`,
      source: 'Unsplash',
    };
  }
}

// ============================================================================
// PEXELS
// ============================================================================

export class PexelsImageProvider implements ImageProvider {
  readonly name = 'Pexels';

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: ImageProviderOptions = {}
  ) {}

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  queries({ placeName, city, country }: ImageQuery): string[] {
    return [
      `${placeName} ${city} tourism`,
      `${placeName} landmark ${country}`,
      `${city} attractions`,
      placeName,
    ].map(compact);
  }

  async search(text: string, { placeName, city, size }: ImageQuery): Promise<ImageRef | null> {
    if (!this.apiKey) return null;

    const data = await fetchJsonSoft(
      withQuery('https://api.pexels.com/v1/search', { query: text, per_page: 1, orientation: 'landscape' }),
      { tag: 'Pexels', headers: { Authorization: this.apiKey }, ...this.options }
    );

    const photo = asArray(path(data, 'photos'))[0];
    const url = asString(path(photo, 'src', size === 'large' ? 'large' : 'medium'));
    if (!url) return null;

    return {
      url,
      photographer: asString(path(photo, 'photographer'), 'Pexels'),
      photographerUrl: asString(path(photo, 'photographer_url')) || undefined,
      alt: asString(path(photo, 'alt')) || `${placeName} in ${city}`,
      source: 'Pexels',
    };
  }
}

// ============================================================================
// WIKIPEDIA
// ============================================================================

/**
 * Page image of the Wikipedia article titled "{place} {city}". Needs no key.
 */
export class WikipediaImageProvider implements ImageProvider {
  readonly name = 'Wikipedia';

  constructor(private readonly options: ImageProviderOptions = {}) {}

  isConfigured(): boolean {
    return true;
  }

  queries({ placeName, city }: ImageQuery): string[] {
    return [compact(`${placeName} ${city}`)];
  }

  async search(text: string, { placeName }: ImageQuery): Promise<ImageRef | null> {
    const data = await fetchJsonSoft(
      withQuery('https://en.wikipedia.org/w/api.php', {
        action: 'query',
        format: 'json',
        prop: 'pageimages',
        piprop: 'original',
        titles: text,
      }),
      { tag: 'Wikipedia', ...this.options }
    );

    const pages = Object.values(asRecord(path(data, 'query', 'pages')));
    for (const page of pages) {
      const url = asString(path(page, 'original', 'source'));
      if (url) {
        return {
          url,
          photographer: 'Wikimedia Commons',
          photographerUrl: 'https://commons.wikimedia.org',
          alt: placeName,
          source: 'Wikimedia',
        };
      }
    }
    return null;
  }
}

// ============================================================================
// RESOLVER
// ============================================================================

export class ImageResolver {
  constructor(
    private readonly providers: ImageProvider[],
    private readonly cache: SessionCache
  ) {}

  async resolveImage(
    placeName: string,
    city: string,
    country: string,
    size: ImageSize = 'medium'
  ): Promise<ImageRef | null> {
    const key = cacheKey(placeName, city, country, size);
    if (this.cache.images.has(key)) {
      return this.cache.images.get(key) ?? null;
    }

    const query: ImageQuery = { placeName, city, country, size };
    const image = await this.search(query);

    if (!image) {
      console.debug(`[Images] No image for "${placeName}" (${city})`);
    }
    this.cache.images.set(key, image);
    return image;
  }

  configuredProviders(): string[] {
    return this.providers.filter((p) => p.isConfigured()).map((p) => p.name);
  }

  private async search(query: ImageQuery): Promise<ImageRef | null> {
    for (const provider of this.providers) {
      if (!provider.isConfigured()) continue;

      for (const text of provider.queries(query)) {
        const image = await provider.search(text, query);
        if (image) return image;
      }
    }
    return null;
  }
}
