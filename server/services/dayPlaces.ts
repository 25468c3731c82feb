/**
 * Derived-view helpers: which places to show on which day.
 */

import type { Place, PlaceWithDisplay } from '@shared/schema';
import type { PlaceRepository } from './placeRepository';
import { DEFAULT_ICON } from './staticData';

/** Pool size drawn from for day picks */
const DAY_POOL_LIMIT = 20;

const BEST_TIMES = [
  'Morning 9AM-12PM (Best for photos)',
  'Afternoon 2PM-5PM (Avoid crowds)',
  'Evening 6PM-9PM (Beautiful sunset views)',
] as const;

const DURATIONS = ['2-3 hours', '3-4 hours', '1-2 hours'] as const;

/**
 * Round-robin window: `count` places starting at (dayIndex-1)*count,
 * wrapping around the pool. Every day gets exactly `count` entries as long
 * as the pool is non-empty.
 */
export function selectWindow<T>(pool: readonly T[], dayIndex: number, count: number): T[] {
  if (pool.length === 0 || count <= 0) return [];

  const start = (Math.max(1, Math.floor(dayIndex)) - 1) * count;
  const selected: T[] = [];
  for (let i = 0; i < count; i++) {
    selected.push(pool[(start + i) % pool.length]);
  }
  return selected;
}

export function decoratePlace(place: Place, position: number, icons: Record<string, string>): PlaceWithDisplay {
  return {
    ...place,
    bestTime: BEST_TIMES[position % BEST_TIMES.length],
    duration: DURATIONS[position % DURATIONS.length],
    icon: icons[place.type] ?? DEFAULT_ICON,
    tags: [place.type, 'Popular', 'Must Visit'],
  };
}

export class DayPlaces {
  constructor(
    private readonly places: PlaceRepository,
    private readonly icons: Record<string, string>
  ) {}

  async pickForDay(dayIndex: number, city: string, country: string, count = 3): Promise<PlaceWithDisplay[]> {
    const pool = await this.places.getPlaces(city, country, DAY_POOL_LIMIT);
    return selectWindow(pool, dayIndex, count).map((place, i) => decoratePlace(place, i, this.icons));
  }
}

/**
 * Find which city a day title is about: "Day 2: Kandy's Temples" -> "Kandy".
 * Candidates are checked in order; a name also matches with its spaces
 * removed ("Arugam Bay" matches "arugambay").
 */
export function detectDayCity(title: string, candidates: readonly string[]): string | null {
  const lowerTitle = title.toLowerCase();
  for (const city of candidates) {
    const lower = city.trim().toLowerCase();
    if (!lower) continue;
    if (lowerTitle.includes(lower) || lowerTitle.includes(lower.replace(/\s+/g, ''))) {
      return city;
    }
  }
  return null;
}
