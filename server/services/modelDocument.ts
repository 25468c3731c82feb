/**
 * Model document parsing
 *
 * Completion output is an untrusted document. These schemas read only the
 * known (snake_case) fields, give every field an explicit default and drop
 * everything else, then map onto the camelCase domain types. Parsing never
 * fails once the text is valid JSON.
 */

import { z } from 'zod';
import type {
  AccommodationTier,
  Attraction,
  BudgetBreakdown,
  CuisineItem,
  DayPlan,
  EmergencyInformation,
  Segment,
  TransportationGuide,
  TripRequest,
  TripSummary,
} from '@shared/schema';
import { isRecord } from '../utils/json';

// ============================================================================
// FIELD HELPERS
// ============================================================================

const text = (fallback = '') =>
  z
    .preprocess(
      (value) => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
      z.string().trim()
    )
    .catch(fallback);

const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .map((item) => (typeof item === 'string' || typeof item === 'number' ? String(item).trim() : ''))
      .filter((item) => item.length > 0)
  );

/** "5", 5, "5 days", 4.6 -> positive integer, otherwise the fallback */
const positiveInt = (fallback: number) =>
  z
    .preprocess(
      (value) => (typeof value === 'string' ? Number.parseInt(value, 10) : value),
      z.number().finite().positive().transform((n) => Math.max(1, Math.round(n)))
    )
    .catch(fallback);

const flag = z
  .preprocess((value) => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value), z.boolean())
  .catch(false);

function looseObject<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((value) => (isRecord(value) ? value : {}), z.object(shape));
}

function looseList<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => (Array.isArray(value) ? value.filter(isRecord) : []), z.array(item));
}

// ============================================================================
// EXTRACTION
// ============================================================================

export const TRIP_DEFAULTS = {
  durationDays: 5,
  travelers: 2,
  budget: 'Medium',
  interests: ['General'],
  travelDates: 'Not specified',
} as const;

const extractionSchema = looseObject({
  destination_country: text(),
  destinations: textList,
  destination_city: text(),
  duration_days: positiveInt(TRIP_DEFAULTS.durationDays),
  travelers: positiveInt(TRIP_DEFAULTS.travelers),
  budget: text(TRIP_DEFAULTS.budget),
  interests: textList,
  travel_dates: text(TRIP_DEFAULTS.travelDates),
});

/**
 * Extraction document -> TripRequest. A singular `destination_city` is
 * promoted when `destinations` is empty; the result may still have no
 * destinations, which the caller treats as a failed extraction.
 */
export function parseExtraction(raw: unknown): TripRequest {
  const doc = extractionSchema.parse(raw);

  const destinations =
    doc.destinations.length > 0 ? doc.destinations : doc.destination_city ? [doc.destination_city] : [];

  return {
    destinationCountry: doc.destination_country,
    destinations,
    durationDays: doc.duration_days,
    travelers: doc.travelers,
    budget: doc.budget || TRIP_DEFAULTS.budget,
    interests: doc.interests.length > 0 ? doc.interests : [...TRIP_DEFAULTS.interests],
    travelDates: doc.travel_dates || TRIP_DEFAULTS.travelDates,
  };
}

// ============================================================================
// GENERATION
// ============================================================================

const segmentDoc = looseObject({
  time: text(),
  activity: text(),
  description: text(),
  duration: text(),
  cost: text(),
  transportation: text(),
  tips: text(),
});

const dayDoc = looseObject({
  day: positiveInt(0),
  title: text(),
  overview: text(),
  morning: segmentDoc,
  afternoon: segmentDoc,
  evening: segmentDoc,
  accommodation_suggestion: text(),
  food_recommendations: textList,
});

const attractionDoc = looseObject({
  name: text(),
  city: text(),
  type: text('Attraction'),
  description: text(),
  best_time_to_visit: text(),
  ticket_price: text(),
  opening_hours: text(),
  duration_needed: text(),
  transportation: text(),
  tips: text(),
});

const cuisineDoc = looseObject({
  dish: text(),
  description: text(),
  where_to_try: text(),
  approximate_cost: text(),
  vegetarian_option: flag,
});

const generationSchema = looseObject({
  trip_summary: looseObject({
    destination_country: text(),
    destinations: textList,
    duration_days: positiveInt(0),
    travelers: positiveInt(0),
    budget: text(),
    trip_title: text(),
    trip_theme: text(),
    best_time_to_visit: text(),
    currency: text(),
    language: text(),
    time_zone: text(),
    visa_requirements: text(),
    vaccinations: text(),
    safety_tips: text(),
    packing_tips: text(),
  }),
  daily_itinerary: looseList(dayDoc),
  key_attractions: looseList(attractionDoc),
  local_cuisine: looseList(cuisineDoc),
  transportation_guide: looseObject({
    airport_transfer: text(),
    public_transportation: text(),
    taxi_services: text(),
    car_rental: text(),
    walking_tours: text(),
    transportation_tips: textList,
  }),
  accommodation_recommendations: looseList(
    looseObject({
      type: text(),
      suggestions: textList,
      average_price: text(),
      best_locations: textList,
    })
  ),
  cultural_tips: textList,
  budget_breakdown: looseObject({
    accommodation: text(),
    food: text(),
    transportation: text(),
    activities: text(),
    souvenirs: text(),
    miscellaneous: text(),
    total_estimate: text(),
  }),
  emergency_information: looseObject({
    emergency_number: text(),
    police: text(),
    ambulance: text(),
    tourist_police: text(),
    nearest_hospital: text(),
    embassy_contact: text(),
  }),
  seasonal_considerations: textList,
});

type SegmentDoc = z.infer<typeof segmentDoc>;
type DayDoc = z.infer<typeof dayDoc>;

export interface GeneratedDocument {
  summary: TripSummary;
  days: DayPlan[];
  keyAttractions: Attraction[];
  localCuisine: CuisineItem[];
  transportationGuide: TransportationGuide;
  accommodationRecommendations: AccommodationTier[];
  culturalTips: string[];
  budgetBreakdown: BudgetBreakdown;
  emergencyInformation: EmergencyInformation;
  seasonalConsiderations: string[];
}

function toSegment(doc: SegmentDoc): Segment {
  return { ...doc };
}

/**
 * Order days by their stated number (unnumbered days keep their position
 * after the numbered ones), drop repeated numbers and renumber 1..n so
 * day numbers are unique and contiguous.
 */
function normalizeDays(days: DayDoc[]): DayPlan[] {
  const seen = new Set<number>();
  const numbered = days
    .map((day, index) => ({ day, index }))
    .filter(({ day }) => {
      if (day.day === 0) return true;
      if (seen.has(day.day)) return false;
      seen.add(day.day);
      return true;
    })
    .sort((a, b) => {
      const aKey = a.day.day === 0 ? Number.POSITIVE_INFINITY : a.day.day;
      const bKey = b.day.day === 0 ? Number.POSITIVE_INFINITY : b.day.day;
      return aKey === bKey ? a.index - b.index : aKey - bKey;
    });

  return numbered.map(({ day }, position) => ({
    day: position + 1,
    title: day.title,
    overview: day.overview,
    morning: toSegment(day.morning),
    afternoon: toSegment(day.afternoon),
    evening: toSegment(day.evening),
    accommodationSuggestion: day.accommodation_suggestion,
    foodRecommendations: day.food_recommendations,
  }));
}

/**
 * Generation document -> itinerary body. Trip parameters the model leaves
 * out (or garbles) are taken from the extraction result.
 */
export function parseGeneration(raw: unknown, request: TripRequest): GeneratedDocument {
  const doc = generationSchema.parse(raw);
  const s = doc.trip_summary;

  return {
    summary: {
      destinationCountry: s.destination_country || request.destinationCountry,
      destinations: s.destinations.length > 0 ? s.destinations : [...request.destinations],
      durationDays: s.duration_days || request.durationDays,
      travelers: s.travelers || request.travelers,
      budget: s.budget || request.budget,
      interests: [...request.interests],
      travelDates: request.travelDates,
      tripTitle: s.trip_title,
      tripTheme: s.trip_theme,
      bestTimeToVisit: s.best_time_to_visit,
      currency: s.currency,
      language: s.language,
      timeZone: s.time_zone,
      visaRequirements: s.visa_requirements,
      vaccinations: s.vaccinations,
      safetyTips: s.safety_tips,
      packingTips: s.packing_tips,
    },
    days: normalizeDays(doc.daily_itinerary),
    keyAttractions: doc.key_attractions
      .filter((a) => a.name.length > 0)
      .map((a) => ({
        name: a.name,
        city: a.city,
        type: a.type || 'Attraction',
        description: a.description,
        bestTimeToVisit: a.best_time_to_visit,
        ticketPrice: a.ticket_price,
        openingHours: a.opening_hours,
        durationNeeded: a.duration_needed,
        transportation: a.transportation,
        tips: a.tips,
      })),
    localCuisine: doc.local_cuisine
      .filter((c) => c.dish.length > 0)
      .map((c) => ({
        dish: c.dish,
        description: c.description,
        whereToTry: c.where_to_try,
        approximateCost: c.approximate_cost,
        vegetarianOption: c.vegetarian_option,
      })),
    transportationGuide: {
      airportTransfer: doc.transportation_guide.airport_transfer,
      publicTransportation: doc.transportation_guide.public_transportation,
      taxiServices: doc.transportation_guide.taxi_services,
      carRental: doc.transportation_guide.car_rental,
      walkingTours: doc.transportation_guide.walking_tours,
      transportationTips: doc.transportation_guide.transportation_tips,
    },
    accommodationRecommendations: doc.accommodation_recommendations.map((tier) => ({
      type: tier.type,
      suggestions: tier.suggestions,
      averagePrice: tier.average_price,
      bestLocations: tier.best_locations,
    })),
    culturalTips: doc.cultural_tips,
    budgetBreakdown: {
      accommodation: doc.budget_breakdown.accommodation,
      food: doc.budget_breakdown.food,
      transportation: doc.budget_breakdown.transportation,
      activities: doc.budget_breakdown.activities,
      souvenirs: doc.budget_breakdown.souvenirs,
      miscellaneous: doc.budget_breakdown.miscellaneous,
      totalEstimate: doc.budget_breakdown.total_estimate,
    },
    emergencyInformation: {
      emergencyNumber: doc.emergency_information.emergency_number,
      police: doc.emergency_information.police,
      ambulance: doc.emergency_information.ambulance,
      touristPolice: doc.emergency_information.tourist_police,
      nearestHospital: doc.emergency_information.nearest_hospital,
      embassyContact: doc.emergency_information.embassy_contact,
    },
    seasonalConsiderations: doc.seasonal_considerations,
  };
}
