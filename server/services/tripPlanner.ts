/**
 * Trip Planner - the session.
 *
 * Runs inquiry -> extraction -> assembly and keeps the last generated
 * itinerary as a single snapshot until the next generation or reset.
 * Per-day place picks and exports are computed from that snapshot.
 */

import type { Itinerary, PlaceWithDisplay } from '@shared/schema';
import { ROW_DESCRIPTION_MAX, type PlaceRow } from '@shared/exportModel';
import { detectDayCity, type DayPlaces } from './dayPlaces';
import { AINotConfiguredError } from './errors';
import type { InquiryParser } from './inquiryParser';
import type { ItineraryAssembler } from './itineraryAssembler';

export interface TripPlannerDeps {
  /** Null when no completion provider is configured */
  parser: InquiryParser | null;
  assembler: ItineraryAssembler | null;
  dayPlaces: DayPlaces;
  /** Cities the day-title matcher knows besides the itinerary's own */
  knownCities: string[];
}

export class TripPlanner {
  private itinerary: Itinerary | null = null;

  constructor(private readonly deps: TripPlannerDeps) {}

  async generate(inquiry: string): Promise<Itinerary> {
    const { parser, assembler } = this.deps;
    if (!parser || !assembler) {
      throw new AINotConfiguredError();
    }

    const request = await parser.extract(inquiry);
    const itinerary = await assembler.assemble(request, inquiry);

    this.itinerary = itinerary;
    return itinerary;
  }

  current(): Itinerary | null {
    return this.itinerary;
  }

  reset(): void {
    this.itinerary = null;
  }

  /**
   * The city a day is spent in: detected from the day title, otherwise the
   * first destination.
   */
  cityForDay(itinerary: Itinerary, day: number): string {
    const destinations = itinerary.summary.destinations;
    const plan = itinerary.days.find((d) => d.day === day);
    const detected = plan ? detectDayCity(plan.title, [...destinations, ...this.deps.knownCities]) : null;
    return detected ?? destinations[0] ?? '';
  }

  async placesForDay(
    itinerary: Itinerary,
    day: number,
    options: { city?: string; count?: number } = {}
  ): Promise<PlaceWithDisplay[]> {
    const city = options.city || this.cityForDay(itinerary, day);
    if (!city) return [];
    return this.deps.dayPlaces.pickForDay(day, city, itinerary.summary.destinationCountry, options.count);
  }

  /**
   * One row per picked place per day, for the CSV export.
   */
  async placeRows(itinerary: Itinerary): Promise<PlaceRow[]> {
    const rows: PlaceRow[] = [];
    for (const day of itinerary.days) {
      const places = await this.placesForDay(itinerary, day.day);
      for (const place of places) {
        rows.push({
          day: day.day,
          place: place.name,
          type: place.type,
          rating: place.rating,
          bestTime: place.bestTime,
          duration: place.duration,
          description: place.description.slice(0, ROW_DESCRIPTION_MAX),
        });
      }
    }
    return rows;
  }
}
