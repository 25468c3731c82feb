/**
 * Itinerary Assembler
 *
 * Trip parameters + real places per city -> generation prompt -> completion
 * -> normalized Itinerary. The model is told to use only the supplied place
 * names; attractions it names that are not in their city's list are
 * reported in `unmatchedAttractions` but not rejected.
 */

import type { Attraction, Itinerary, Place, TripRequest } from '@shared/schema';
import { isRecord } from '../utils/json';
import type { CompletionClient } from './aiClientFactory';
import { parseCompletionJson } from './completionJson';
import { GenerationFailure } from './errors';
import { parseGeneration } from './modelDocument';
import type { PlaceRepository } from './placeRepository';

/** Places fetched per city for the prompt */
const PLACES_PER_CITY = 10;

const OUTPUT_SHAPE = `{
  "trip_summary": {
    "destination_country": "string",
    "destinations": ["string"],
    "duration_days": number,
    "travelers": number,
    "budget": "string",
    "trip_title": "string",
    "trip_theme": "string",
    "best_time_to_visit": "string",
    "currency": "string",
    "language": "string",
    "time_zone": "string",
    "visa_requirements": "string",
    "vaccinations": "string",
    "safety_tips": "string",
    "packing_tips": "string"
  },
  "daily_itinerary": [
    {
      "day": 1,
      "title": "string (include city name)",
      "overview": "string",
      "morning": {
        "time": "9:00 AM - 12:00 PM",
        "activity": "string (use real place names)",
        "description": "detailed description",
        "duration": "3 hours",
        "cost": "string",
        "transportation": "string",
        "tips": "string"
      },
      "afternoon": {...},
      "evening": {...},
      "accommodation_suggestion": "string",
      "food_recommendations": ["string"]
    }
  ],
  "key_attractions": [
    {
      "name": "string (must be from real places list)",
      "city": "string (the city where this attraction is)",
      "type": "string",
      "description": "string",
      "best_time_to_visit": "string",
      "ticket_price": "string",
      "opening_hours": "string",
      "duration_needed": "string",
      "transportation": "string",
      "tips": "string"
    }
  ],
  "local_cuisine": [
    { "dish": "string", "description": "string", "where_to_try": "string", "approximate_cost": "string", "vegetarian_option": boolean }
  ],
  "transportation_guide": {
    "airport_transfer": "string",
    "public_transportation": "string",
    "taxi_services": "string",
    "car_rental": "string",
    "walking_tours": "string",
    "transportation_tips": ["string"]
  },
  "accommodation_recommendations": [
    { "type": "string (Budget/Mid-range/Luxury)", "suggestions": ["string"], "average_price": "string", "best_locations": ["string"] }
  ],
  "cultural_tips": ["string"],
  "budget_breakdown": {
    "accommodation": "string",
    "food": "string",
    "transportation": "string",
    "activities": "string",
    "souvenirs": "string",
    "miscellaneous": "string",
    "total_estimate": "string"
  },
  "emergency_information": {
    "emergency_number": "string",
    "police": "string",
    "ambulance": "string",
    "tourist_police": "string",
    "nearest_hospital": "string",
    "embassy_contact": "string"
  },
  "seasonal_considerations": ["string"]
}`;

export function buildGenerationPrompt(request: TripRequest, placesByCity: Record<string, Place[]>): string {
  const country = request.destinationCountry || 'the destination country';

  return `You are an expert travel planner with deep knowledge of global destinations.

Create a detailed, realistic multi-city travel itinerary for the route ${request.destinations.join(', ')} in ${country}.

Available real places by city:
${JSON.stringify(placesByCity, null, 2)}

Travel details:
- Duration: ${request.durationDays} days
- Travelers: ${request.travelers}
- Budget: ${request.budget}
- Interests: ${request.interests.join(', ')}
- Dates: ${request.travelDates}

IMPORTANT: Use the real places listed above, selecting from the appropriate city's list for each day. Number the days 1 to ${request.durationDays}. Include specific details like:
- Opening hours
- Ticket prices
- Best times to visit
- Transportation tips
- Local food recommendations
- Cultural insights

Return ONLY valid JSON with this structure:
${OUTPUT_SHAPE}

Make it practical, detailed, and based on actual tourism information.`;
}

/**
 * Names of attractions not found (case-insensitively) in the place list of
 * their city. Attractions with an unknown city are checked against every city.
 */
export function findUnmatchedAttractions(
  attractions: Attraction[],
  placesByCity: Record<string, Place[]>
): string[] {
  const namesByCity = new Map<string, Set<string>>();
  const allNames = new Set<string>();
  for (const [city, places] of Object.entries(placesByCity)) {
    const names = new Set(places.map((p) => p.name.trim().toLowerCase()));
    namesByCity.set(city.trim().toLowerCase(), names);
    names.forEach((name) => allNames.add(name));
  }

  return attractions
    .filter((attraction) => {
      const name = attraction.name.trim().toLowerCase();
      const cityNames = namesByCity.get(attraction.city.trim().toLowerCase());
      return !(cityNames ?? allNames).has(name);
    })
    .map((attraction) => attraction.name);
}

export class ItineraryAssembler {
  constructor(
    private readonly completion: CompletionClient,
    private readonly places: PlaceRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async assemble(request: TripRequest, rawText: string): Promise<Itinerary> {
    const placesByCity: Record<string, Place[]> = {};
    for (const city of request.destinations) {
      placesByCity[city] = await this.places.getPlaces(city, request.destinationCountry, PLACES_PER_CITY);
    }

    let content: string;
    try {
      content = await this.completion.completeJson({
        system: buildGenerationPrompt(request, placesByCity),
        user: `Create a comprehensive itinerary for this trip: ${rawText}`,
        temperature: 0.3,
        maxTokens: 8000,
      });
    } catch (error) {
      console.error('[ItineraryAssembler] Completion call failed:', error);
      throw new GenerationFailure('Completion call failed during generation', { cause: error });
    }

    let raw: unknown;
    try {
      raw = parseCompletionJson(content);
    } catch (error) {
      console.error('[ItineraryAssembler] Response was not valid JSON');
      throw new GenerationFailure('Generation response was not valid JSON', { cause: error });
    }

    if (!isRecord(raw)) {
      console.error('[ItineraryAssembler] Response was not a JSON object');
      throw new GenerationFailure('Generation response was not a JSON object');
    }

    const generated = parseGeneration(raw, request);
    const unmatchedAttractions = findUnmatchedAttractions(generated.keyAttractions, placesByCity);
    if (unmatchedAttractions.length > 0) {
      console.warn(`[ItineraryAssembler] Attractions not in supplied place lists: ${unmatchedAttractions.join(', ')}`);
    }

    console.log(
      `[ItineraryAssembler] Generated ${generated.days.length} days, ${generated.keyAttractions.length} key attractions`
    );

    return {
      ...generated,
      placesByCity,
      unmatchedAttractions,
      generatedAt: this.now().toISOString(),
    };
  }
}
