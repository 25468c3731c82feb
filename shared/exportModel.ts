/**
 * exportModel.ts
 *
 * Pure projections of an Itinerary for download and charts:
 * - JSON document (lossless; parses back to the same Itinerary)
 * - Flat place rows (one per place per day) and their CSV
 * - Plain-text travel guide
 * - Budget chart series
 * - Map markers (GeoJSON)
 *
 * Missing optional fields are filled here with "N/A" / "Varies",
 * never in the stored itinerary.
 */

import {
  BUDGET_CATEGORIES,
  SEGMENT_KEYS,
  hasKnownLocation,
  itinerarySchema,
  type BudgetBreakdown,
  type Coordinates,
  type Itinerary,
  type Place,
} from "./schema";

// ============================================================================
// JSON
// ============================================================================

export function toJsonDocument(itinerary: Itinerary): string {
  return JSON.stringify(itinerary, null, 2);
}

/**
 * Throws when the text is not JSON or not an itinerary document.
 */
export function parseJsonDocument(text: string): Itinerary {
  return itinerarySchema.parse(JSON.parse(text));
}

// ============================================================================
// PLACE ROWS / CSV
// ============================================================================

export interface PlaceRow {
  day: number;
  place: string;
  type: string;
  rating: number;
  bestTime: string;
  duration: string;
  description: string;
}

export const PLACE_ROW_HEADERS = ["Day", "Place", "Type", "Rating", "Best Time", "Duration", "Description"] as const;

/** Row descriptions are cut to this many characters */
export const ROW_DESCRIPTION_MAX = 150;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(rows: PlaceRow[]): string {
  const lines = [PLACE_ROW_HEADERS.join(",")];
  for (const row of rows) {
    lines.push(
      [
        String(row.day),
        row.place,
        row.type,
        String(row.rating),
        row.bestTime,
        row.duration,
        row.description.slice(0, ROW_DESCRIPTION_MAX),
      ]
        .map(csvField)
        .join(",")
    );
  }
  return lines.join("\n") + "\n";
}

// ============================================================================
// TEXT REPORT
// ============================================================================

const RULE = "=".repeat(70);
const DAY_RULE = "-".repeat(50);
/** Key attractions listed in the text guide */
const REPORT_ATTRACTIONS = 5;

function orNA(value: string | undefined): string {
  return value && value.trim() ? value : "N/A";
}

function section(title: string): string[] {
  return [RULE, title, RULE];
}

const SEGMENT_LABELS: Record<(typeof SEGMENT_KEYS)[number], string> = {
  morning: "Morning",
  afternoon: "Afternoon",
  evening: "Evening",
};

export function toTextReport(itinerary: Itinerary): string {
  const { summary } = itinerary;
  const lines: string[] = [];

  lines.push(...section(`TRAVEL ITINERARY: ${orNA(summary.tripTitle || summary.destinations.join(", "))}`));
  lines.push(
    `Destination: ${summary.destinations.join(", ")}`,
    `Country: ${orNA(summary.destinationCountry)}`,
    `Duration: ${summary.durationDays} days`,
    `Travelers: ${summary.travelers}`,
    `Budget: ${orNA(summary.budget)}`,
    `Theme: ${orNA(summary.tripTheme)}`
  );

  lines.push(...section("TRIP SUMMARY"));
  lines.push(
    `• Best Time to Visit: ${orNA(summary.bestTimeToVisit)}`,
    `• Currency: ${orNA(summary.currency)}`,
    `• Language: ${orNA(summary.language)}`,
    `• Time Zone: ${orNA(summary.timeZone)}`,
    `• Visa Requirements: ${orNA(summary.visaRequirements)}`,
    `• Vaccinations: ${orNA(summary.vaccinations)}`,
    `• Packing Tips: ${orNA(summary.packingTips)}`
  );

  lines.push(...section("DAILY ITINERARY"));
  for (const day of itinerary.days) {
    lines.push("", `Day ${day.day}: ${orNA(day.title)}`, DAY_RULE);
    for (const key of SEGMENT_KEYS) {
      const segment = day[key];
      lines.push(
        `${SEGMENT_LABELS[key]} (${orNA(segment.time)}):`,
        `Activity: ${orNA(segment.activity)}`,
        `Description: ${orNA(segment.description)}`,
        `Cost: ${orNA(segment.cost)}`
      );
    }
    lines.push(
      `Accommodation: ${orNA(day.accommodationSuggestion)}`,
      `Food Recommendations: ${day.foodRecommendations.join(", ")}`
    );
  }

  lines.push("", ...section("KEY ATTRACTIONS"));
  for (const attraction of itinerary.keyAttractions.slice(0, REPORT_ATTRACTIONS)) {
    lines.push(
      "",
      `• ${attraction.name} (${attraction.type || "Attraction"}) in ${orNA(attraction.city)}`,
      `  Description: ${orNA(attraction.description)}`,
      `  Best Time: ${orNA(attraction.bestTimeToVisit)}`,
      `  Ticket: ${attraction.ticketPrice || "Varies"}`,
      `  Hours: ${orNA(attraction.openingHours)}`,
      `  Tips: ${orNA(attraction.tips)}`
    );
  }

  return lines.join("\n") + "\n";
}

// ============================================================================
// BUDGET CHART
// ============================================================================

export interface BudgetChart {
  total: string;
  items: Array<{ label: string; value: number }>;
}

/** Chart weight for an amount that cannot be read as a number */
const UNPARSEABLE_AMOUNT = 100;

/**
 * "$1,200" -> 1200, "300 USD" -> 300, "LKR 5000" -> 100 (unparseable)
 */
export function parseBudgetAmount(value: string): number {
  const cleaned = value.replace(/\$/g, "").replace(/,/g, "").replace(/USD/g, "").trim();
  if (!/^\d+$/.test(cleaned.replace(/\./g, ""))) return UNPARSEABLE_AMOUNT;
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : UNPARSEABLE_AMOUNT;
}

function titleCase(key: string): string {
  return key
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .replace(/_/g, " ")
    .replace(/\b\w/g, (c) => c.toUpperCase());
}

export function toBudgetChart(breakdown: BudgetBreakdown): BudgetChart {
  const items = BUDGET_CATEGORIES.flatMap((category) => {
    const value = breakdown[category].trim();
    if (!value || value.toLowerCase() === "not specified") return [];
    return [{ label: titleCase(category), value: parseBudgetAmount(value) }];
  });

  return { total: orNA(breakdown.totalEstimate), items };
}

// ============================================================================
// MAP MARKERS
// ============================================================================

export interface PlaceFeature {
  type: "Feature";
  /** GeoJSON order: [lng, lat] */
  geometry: { type: "Point"; coordinates: [number, number] };
  properties: { name: string; type: string; rating: number; description: string };
}

export interface PlaceFeatureCollection {
  type: "FeatureCollection";
  center: Coordinates;
  features: PlaceFeature[];
}

export function toMapFeatureCollection(places: Place[], center: Coordinates): PlaceFeatureCollection {
  const features = places.filter(hasKnownLocation).flatMap((place): PlaceFeature[] =>
    place.coordinates
      ? [
          {
            type: "Feature",
            geometry: { type: "Point", coordinates: [place.coordinates.lng, place.coordinates.lat] },
            properties: {
              name: place.name,
              type: place.type || "Attraction",
              rating: place.rating,
              description: place.description,
            },
          },
        ]
      : []
  );

  return { type: "FeatureCollection", center, features };
}
