/**
 * Country profiles from the REST Countries directory (no key needed).
 * Cached per country name for 24 hours; a miss is cached as null.
 */

import { fetchJsonSoft, type FetchFn } from '../utils/http';
import { asArray, asNumber, asRecord, asString, path } from '../utils/json';
import { cacheKey } from '../utils/ttlCache';
import type { SessionCache } from './sessionCache';

export interface CountryProfile {
  name: string;
  officialName: string;
  capital: string;
  region: string;
  subregion: string;
  population: number;
  area: number;
  languages: string[];
  currencies: string[];
  flag: string;
  timezones: string[];
  cca2: string;
  latlng: [number, number];
}

const REST_COUNTRIES_URL = 'https://restcountries.com/v3.1/name';
const FIELDS = 'name,capital,region,subregion,population,area,languages,currencies,flag,timezones,cca2,latlng';

export function toCountryProfile(raw: unknown): CountryProfile | null {
  const name = asString(path(raw, 'name', 'common'));
  if (!name) return null;

  return {
    name,
    officialName: asString(path(raw, 'name', 'official')),
    capital: asString(path(raw, 'capital', 0), 'N/A'),
    region: asString(path(raw, 'region'), 'N/A'),
    subregion: asString(path(raw, 'subregion'), 'N/A'),
    population: asNumber(path(raw, 'population')) ?? 0,
    area: asNumber(path(raw, 'area')) ?? 0,
    languages: Object.values(asRecord(path(raw, 'languages'))).map((l) => asString(l)).filter(Boolean),
    currencies: Object.keys(asRecord(path(raw, 'currencies'))),
    flag: asString(path(raw, 'flag'), '🏳️'),
    timezones: asArray(path(raw, 'timezones')).map((t) => asString(t)).filter(Boolean),
    cca2: asString(path(raw, 'cca2')),
    latlng: [asNumber(path(raw, 'latlng', 0)) ?? 0, asNumber(path(raw, 'latlng', 1)) ?? 0],
  };
}

export class CountryService {
  constructor(
    private readonly cache: SessionCache,
    private readonly options: { timeoutMs?: number; fetchImpl?: FetchFn } = {}
  ) {}

  async getCountryProfile(name: string): Promise<CountryProfile | null> {
    const key = cacheKey(name);
    if (this.cache.countries.has(key)) {
      return this.cache.countries.get(key) ?? null;
    }

    const data = await fetchJsonSoft(
      `${REST_COUNTRIES_URL}/${encodeURIComponent(name.trim())}?fullText=true&fields=${FIELDS}`,
      { tag: 'Countries', ...this.options }
    );

    const profile = toCountryProfile(asArray(data)[0]);
    this.cache.countries.set(key, profile);
    return profile;
  }
}
