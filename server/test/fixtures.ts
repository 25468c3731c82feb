/**
 * Shared test data: a two-city trip, the documents a completion service
 * would return for it and a fake completion client.
 */

import { vi } from 'vitest';
import type { Itinerary, Place, TripRequest } from '@shared/schema';
import type { CompletionClient, CompletionRequest } from '../services/aiClientFactory';

export const KANDY_GALLE_INQUIRY =
  '5 day trip to Kandy and Galle for 2 people, budget $1500, interested in culture and beaches';

export const extractionDocument = {
  destination_country: 'Sri Lanka',
  destinations: ['Kandy', 'Galle'],
  duration_days: 5,
  travelers: 2,
  budget: '$1500',
  interests: ['culture', 'beaches'],
  travel_dates: 'Not specified',
};

export const tripRequest: TripRequest = {
  destinationCountry: 'Sri Lanka',
  destinations: ['Kandy', 'Galle'],
  durationDays: 5,
  travelers: 2,
  budget: '$1500',
  interests: ['culture', 'beaches'],
  travelDates: 'Not specified',
};

function segmentDoc(activity: string) {
  return {
    time: '9:00 AM - 12:00 PM',
    activity,
    description: `Visit ${activity}`,
    duration: '3 hours',
    cost: '$10',
    transportation: 'Tuk-tuk',
    tips: 'Start early',
  };
}

export const generationDocument = {
  trip_summary: {
    destination_country: 'Sri Lanka',
    destinations: ['Kandy', 'Galle'],
    duration_days: 5,
    travelers: 2,
    budget: '$1500',
    trip_title: 'Hills and Forts',
    trip_theme: 'Culture and coast',
    best_time_to_visit: 'December to April',
    currency: 'LKR',
    language: 'Sinhala, Tamil',
    time_zone: 'UTC+5:30',
    visa_requirements: 'ETA required',
    vaccinations: 'None required',
    safety_tips: 'Watch traffic',
    packing_tips: 'Light clothing',
  },
  daily_itinerary: [
    {
      day: 1,
      title: 'Kandy Temples',
      overview: 'Arrive in Kandy',
      morning: segmentDoc('Temple of the Tooth'),
      afternoon: segmentDoc('Kandy Lake'),
      evening: segmentDoc('Cultural Show'),
      accommodation_suggestion: 'Lakeside guesthouse',
      food_recommendations: ['Rice and curry'],
    },
    {
      day: 2,
      title: 'Galle Fort Walk',
      overview: 'Coast day',
      morning: segmentDoc('Galle Fort'),
      afternoon: segmentDoc('Lighthouse'),
      evening: segmentDoc('Rampart sunset'),
      accommodation_suggestion: 'Fort boutique hotel',
      food_recommendations: ['Seafood', 'Hoppers'],
    },
  ],
  key_attractions: [
    {
      name: 'Temple of the Tooth',
      city: 'Kandy',
      type: 'Temple',
      description: 'Sacred relic temple',
      best_time_to_visit: 'Morning',
      ticket_price: '$10',
      opening_hours: '5:30 AM - 8 PM',
      duration_needed: '2 hours',
      transportation: 'Walk',
      tips: 'Cover shoulders',
    },
    {
      name: 'Invented Museum',
      city: 'Galle',
      type: 'Museum',
      description: 'Not a real place',
    },
  ],
  local_cuisine: [
    { dish: 'Kottu', description: 'Chopped roti', where_to_try: 'Street stalls', approximate_cost: '$2', vegetarian_option: true },
  ],
  transportation_guide: {
    airport_transfer: 'Taxi from Colombo',
    public_transportation: 'Trains and buses',
    taxi_services: 'PickMe',
    car_rental: 'With driver',
    walking_tours: 'Galle Fort',
    transportation_tips: ['Book train seats early'],
  },
  accommodation_recommendations: [
    { type: 'Mid-range', suggestions: ['Hotel A'], average_price: '$60', best_locations: ['Fort'] },
  ],
  cultural_tips: ['Remove shoes at temples'],
  budget_breakdown: {
    accommodation: '$600',
    food: '$300',
    transportation: '$200',
    activities: '$250',
    souvenirs: 'Not specified',
    miscellaneous: '$150',
    total_estimate: '$1500',
  },
  emergency_information: {
    emergency_number: '119',
    police: '119',
    ambulance: '1990',
    tourist_police: '1912',
    nearest_hospital: 'Kandy General',
    embassy_contact: 'Colombo',
  },
  seasonal_considerations: ['Monsoon on the south-west coast May to September'],
};

export const kandyPlaces: Place[] = [
  { name: 'Temple of the Tooth', type: 'Buddhist Temple', rating: 4.8, description: 'Sacred relic temple.' },
  { name: 'Kandy Lake', type: 'Lake', rating: 4.4, description: 'Lake in the town centre.' },
  { name: 'Royal Botanical Gardens', type: 'Garden', rating: 4.6, description: 'Gardens at Peradeniya.' },
];

export const gallePlaces: Place[] = [
  { name: 'Galle Fort', type: 'Historic Fort', rating: 4.7, description: 'Dutch colonial fort.' },
  { name: 'Galle Lighthouse', type: 'Landmark', rating: 4.5, description: 'Lighthouse on the ramparts.' },
];

export function makeItinerary(overrides: Partial<Itinerary> = {}): Itinerary {
  return {
    summary: {
      ...tripRequest,
      tripTitle: 'Hills and Forts',
      tripTheme: 'Culture and coast',
      bestTimeToVisit: 'December to April',
      currency: 'LKR',
      language: 'Sinhala, Tamil',
      timeZone: 'UTC+5:30',
      visaRequirements: 'ETA required',
      vaccinations: '',
      safetyTips: 'Watch traffic',
      packingTips: 'Light clothing',
    },
    days: [
      {
        day: 1,
        title: 'Kandy Temples',
        overview: 'Arrive in Kandy',
        morning: { time: '9:00 AM', activity: 'Temple of the Tooth', description: 'Relic temple', duration: '2 hours', cost: '$10', transportation: 'Walk', tips: '' },
        afternoon: { time: '2:00 PM', activity: 'Kandy Lake', description: 'Walk around the lake', duration: '1 hour', cost: 'Free', transportation: 'Walk', tips: '' },
        evening: { time: '6:00 PM', activity: 'Cultural Show', description: 'Dance performance', duration: '1 hour', cost: '$8', transportation: 'Tuk-tuk', tips: '' },
        accommodationSuggestion: 'Lakeside guesthouse',
        foodRecommendations: ['Rice and curry', 'Kottu'],
      },
      {
        day: 2,
        title: 'Galle Fort Walk',
        overview: 'Coast day',
        morning: { time: '9:00 AM', activity: 'Galle Fort', description: 'Ramparts walk', duration: '3 hours', cost: 'Free', transportation: 'Walk', tips: '' },
        afternoon: { time: '2:00 PM', activity: 'Galle Lighthouse', description: 'Photo stop', duration: '1 hour', cost: 'Free', transportation: 'Walk', tips: '' },
        evening: { time: '6:00 PM', activity: 'Sunset', description: '', duration: '1 hour', cost: '', transportation: 'Walk', tips: '' },
        accommodationSuggestion: '',
        foodRecommendations: [],
      },
    ],
    keyAttractions: [
      {
        name: 'Temple of the Tooth',
        city: 'Kandy',
        type: 'Temple',
        description: 'Sacred relic temple',
        bestTimeToVisit: 'Morning',
        ticketPrice: '',
        openingHours: '5:30 AM - 8 PM',
        durationNeeded: '2 hours',
        transportation: 'Walk',
        tips: 'Cover shoulders',
      },
    ],
    localCuisine: [],
    transportationGuide: {
      airportTransfer: '',
      publicTransportation: '',
      taxiServices: '',
      carRental: '',
      walkingTours: '',
      transportationTips: [],
    },
    accommodationRecommendations: [],
    culturalTips: [],
    budgetBreakdown: {
      accommodation: '$600',
      food: '$1,200',
      transportation: '300 USD',
      activities: 'LKR 5000',
      souvenirs: 'Not specified',
      miscellaneous: '',
      totalEstimate: '$2,100',
    },
    emergencyInformation: {
      emergencyNumber: '119',
      police: '119',
      ambulance: '1990',
      touristPolice: '1912',
      nearestHospital: '',
      embassyContact: '',
    },
    seasonalConsiderations: [],
    placesByCity: { Kandy: kandyPlaces, Galle: gallePlaces },
    unmatchedAttractions: [],
    generatedAt: '2026-01-15T10:00:00.000Z',
    ...overrides,
  };
}

/**
 * Completion client that answers each call with the next queued response
 * (a string is returned, an Error is thrown).
 */
export function fakeCompletion(...responses: Array<string | Error>) {
  const queue = [...responses];
  const completeJson = vi.fn(async (_request: CompletionRequest): Promise<string> => {
    const next = queue.shift();
    if (next === undefined) throw new Error('No fake completion queued');
    if (next instanceof Error) throw next;
    return next;
  });
  const client: CompletionClient = { completeJson };
  return { client, completeJson };
}
