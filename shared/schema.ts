import { z } from "zod";

// ============================================================================
// PLACES
// ============================================================================

export const coordinatesSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

export type Coordinates = z.infer<typeof coordinatesSchema>;

export const placeSchema = z.object({
  name: z.string(),
  type: z.string(),
  rating: z.number().min(0).max(5),
  description: z.string(),
  /** Absent or 0,0 when the provider did not report a location */
  coordinates: coordinatesSchema.optional(),
});

export type Place = z.infer<typeof placeSchema>;

export const placeWithDisplaySchema = placeSchema.extend({
  bestTime: z.string(),
  duration: z.string(),
  icon: z.string(),
  tags: z.array(z.string()),
});

export type PlaceWithDisplay = z.infer<typeof placeWithDisplaySchema>;

export type ImageSize = "medium" | "large";

export interface ImageRef {
  url: string;
  photographer: string;
  photographerUrl?: string;
  alt: string;
  source: "Unsplash" | "Pexels" | "Wikimedia";
}

export function hasKnownLocation(place: Place): boolean {
  return !!place.coordinates && place.coordinates.lat !== 0 && place.coordinates.lng !== 0;
}

// ============================================================================
// TRIP
// ============================================================================

export const tripRequestSchema = z.object({
  destinationCountry: z.string(),
  destinations: z.array(z.string()).min(1),
  durationDays: z.number().int().positive(),
  travelers: z.number().int().positive(),
  budget: z.string(),
  interests: z.array(z.string()),
  travelDates: z.string(),
});

/** What the inquiry parser extracts from free text */
export type TripRequest = z.infer<typeof tripRequestSchema>;

export const tripSummarySchema = tripRequestSchema.extend({
  tripTitle: z.string(),
  tripTheme: z.string(),
  bestTimeToVisit: z.string(),
  currency: z.string(),
  language: z.string(),
  timeZone: z.string(),
  visaRequirements: z.string(),
  vaccinations: z.string(),
  safetyTips: z.string(),
  packingTips: z.string(),
});

export type TripSummary = z.infer<typeof tripSummarySchema>;

export const segmentSchema = z.object({
  time: z.string(),
  activity: z.string(),
  description: z.string(),
  duration: z.string(),
  cost: z.string(),
  transportation: z.string(),
  tips: z.string(),
});

export type Segment = z.infer<typeof segmentSchema>;

export const SEGMENT_KEYS = ["morning", "afternoon", "evening"] as const;
export type SegmentKey = (typeof SEGMENT_KEYS)[number];

export const dayPlanSchema = z.object({
  day: z.number().int().positive(),
  title: z.string(),
  overview: z.string(),
  morning: segmentSchema,
  afternoon: segmentSchema,
  evening: segmentSchema,
  accommodationSuggestion: z.string(),
  foodRecommendations: z.array(z.string()),
});

export type DayPlan = z.infer<typeof dayPlanSchema>;

export const attractionSchema = z.object({
  name: z.string(),
  city: z.string(),
  type: z.string(),
  description: z.string(),
  bestTimeToVisit: z.string(),
  ticketPrice: z.string(),
  openingHours: z.string(),
  durationNeeded: z.string(),
  transportation: z.string(),
  tips: z.string(),
});

export type Attraction = z.infer<typeof attractionSchema>;

export const cuisineItemSchema = z.object({
  dish: z.string(),
  description: z.string(),
  whereToTry: z.string(),
  approximateCost: z.string(),
  vegetarianOption: z.boolean(),
});

export type CuisineItem = z.infer<typeof cuisineItemSchema>;

export const transportationGuideSchema = z.object({
  airportTransfer: z.string(),
  publicTransportation: z.string(),
  taxiServices: z.string(),
  carRental: z.string(),
  walkingTours: z.string(),
  transportationTips: z.array(z.string()),
});

export type TransportationGuide = z.infer<typeof transportationGuideSchema>;

export const accommodationTierSchema = z.object({
  type: z.string(),
  suggestions: z.array(z.string()),
  averagePrice: z.string(),
  bestLocations: z.array(z.string()),
});

export type AccommodationTier = z.infer<typeof accommodationTierSchema>;

export const BUDGET_CATEGORIES = [
  "accommodation",
  "food",
  "transportation",
  "activities",
  "souvenirs",
  "miscellaneous",
] as const;

export type BudgetCategory = (typeof BUDGET_CATEGORIES)[number];

export const budgetBreakdownSchema = z.object({
  accommodation: z.string(),
  food: z.string(),
  transportation: z.string(),
  activities: z.string(),
  souvenirs: z.string(),
  miscellaneous: z.string(),
  totalEstimate: z.string(),
});

export type BudgetBreakdown = z.infer<typeof budgetBreakdownSchema>;

export const emergencyInformationSchema = z.object({
  emergencyNumber: z.string(),
  police: z.string(),
  ambulance: z.string(),
  touristPolice: z.string(),
  nearestHospital: z.string(),
  embassyContact: z.string(),
});

export type EmergencyInformation = z.infer<typeof emergencyInformationSchema>;

export const itinerarySchema = z.object({
  summary: tripSummarySchema,
  days: z.array(dayPlanSchema),
  keyAttractions: z.array(attractionSchema),
  localCuisine: z.array(cuisineItemSchema),
  transportationGuide: transportationGuideSchema,
  accommodationRecommendations: z.array(accommodationTierSchema),
  culturalTips: z.array(z.string()),
  budgetBreakdown: budgetBreakdownSchema,
  emergencyInformation: emergencyInformationSchema,
  seasonalConsiderations: z.array(z.string()),
  /** Places captured per city at generation time, so rendering never re-fetches */
  placesByCity: z.record(z.string(), z.array(placeSchema)),
  /** Key attractions whose name is not in their city's captured place list */
  unmatchedAttractions: z.array(z.string()),
  generatedAt: z.string(),
});

export type Itinerary = z.infer<typeof itinerarySchema>;

// ============================================================================
// REQUESTS
// ============================================================================

export const MIN_INQUIRY_LENGTH = 20;

export const inquiryRequestSchema = z.object({
  inquiry: z
    .string()
    .trim()
    .min(MIN_INQUIRY_LENGTH, `Please provide more details about your trip (minimum ${MIN_INQUIRY_LENGTH} characters)`),
});

export type InquiryRequest = z.infer<typeof inquiryRequestSchema>;
