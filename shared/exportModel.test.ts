import { describe, it, expect } from "vitest";
import {
  PLACE_ROW_HEADERS,
  parseBudgetAmount,
  parseJsonDocument,
  toBudgetChart,
  toCsv,
  toJsonDocument,
  toMapFeatureCollection,
  toTextReport,
  type PlaceRow,
} from "./exportModel";
import { makeItinerary } from "../server/test/fixtures";

// ============================================================================
// JSON
// ============================================================================

describe("JSON document", () => {
  it("round-trips an itinerary without losing fields", () => {
    const itinerary = makeItinerary();
    expect(parseJsonDocument(toJsonDocument(itinerary))).toEqual(itinerary);
  });

  it("rejects a document that is not an itinerary", () => {
    expect(() => parseJsonDocument('{"summary": {}}')).toThrow();
  });
});

// ============================================================================
// CSV
// ============================================================================

describe("toCsv", () => {
  const row: PlaceRow = {
    day: 1,
    place: "Temple of the Tooth",
    type: "Buddhist Temple",
    rating: 4.8,
    bestTime: "Morning 9AM-12PM (Best for photos)",
    duration: "2-3 hours",
    description: "Sacred relic temple.",
  };

  it("writes a header and one line per row", () => {
    expect(toCsv([row])).toBe(
      "Day,Place,Type,Rating,Best Time,Duration,Description\n" +
        "1,Temple of the Tooth,Buddhist Temple,4.8,Morning 9AM-12PM (Best for photos),2-3 hours,Sacred relic temple.\n"
    );
  });

  it("quotes fields with commas, quotes and newlines", () => {
    const csv = toCsv([{ ...row, place: 'The "Old" Fort, Galle', description: "line one\nline two", rating: 4.5 }]);
    expect(csv.split("\n").slice(1).join("\n")).toBe(
      '1,"The ""Old"" Fort, Galle",Buddhist Temple,4.5,Morning 9AM-12PM (Best for photos),2-3 hours,"line one\nline two"\n'
    );
  });

  it("cuts descriptions to 150 characters", () => {
    const csv = toCsv([{ ...row, description: "d".repeat(200) }]);
    expect(csv).toContain(`,${"d".repeat(150)}\n`);
    expect(csv).not.toContain("d".repeat(151));
  });

  it("writes only the header for no rows", () => {
    expect(toCsv([])).toBe(`${PLACE_ROW_HEADERS.join(",")}\n`);
  });
});

// ============================================================================
// TEXT REPORT
// ============================================================================

describe("toTextReport", () => {
  const lines = toTextReport(makeItinerary()).split("\n");

  it("opens with the title between rules", () => {
    expect(lines.slice(0, 3)).toEqual(["=".repeat(70), "TRAVEL ITINERARY: Hills and Forts", "=".repeat(70)]);
    expect(lines[3]).toBe("Destination: Kandy, Galle");
    expect(lines[5]).toBe("Duration: 5 days");
  });

  it("fills missing summary fields with N/A", () => {
    expect(lines).toContain("• Vaccinations: N/A");
    expect(lines).toContain("• Currency: LKR");
  });

  it("lists each day with its segments", () => {
    const day1 = lines.indexOf("Day 1: Kandy Temples");
    expect(lines.slice(day1, day1 + 6)).toEqual([
      "Day 1: Kandy Temples",
      "-".repeat(50),
      "Morning (9:00 AM):",
      "Activity: Temple of the Tooth",
      "Description: Relic temple",
      "Cost: $10",
    ]);
    expect(lines).toContain("Food Recommendations: Rice and curry, Kottu");
    expect(lines).toContain("Accommodation: N/A");
  });

  it("shows Varies for a missing ticket price", () => {
    expect(lines).toContain("• Temple of the Tooth (Temple) in Kandy");
    expect(lines).toContain("  Ticket: Varies");
  });

  it("ends with a newline", () => {
    expect(lines[lines.length - 1]).toBe("");
  });
});

// ============================================================================
// BUDGET
// ============================================================================

describe("parseBudgetAmount", () => {
  it("reads dollar amounts", () => {
    expect(parseBudgetAmount("$1,200")).toBe(1200);
    expect(parseBudgetAmount("300 USD")).toBe(300);
    expect(parseBudgetAmount("$99.50")).toBe(99.5);
  });

  it("uses 100 for amounts it cannot read", () => {
    expect(parseBudgetAmount("LKR 5000")).toBe(100);
    expect(parseBudgetAmount("$50-80 per day")).toBe(100);
    expect(parseBudgetAmount("")).toBe(100);
  });
});

describe("toBudgetChart", () => {
  it("skips empty and unspecified categories", () => {
    expect(toBudgetChart(makeItinerary().budgetBreakdown)).toEqual({
      total: "$2,100",
      items: [
        { label: "Accommodation", value: 600 },
        { label: "Food", value: 1200 },
        { label: "Transportation", value: 300 },
        { label: "Activities", value: 100 },
      ],
    });
  });
});

// ============================================================================
// MAP
// ============================================================================

describe("toMapFeatureCollection", () => {
  it("emits [lng, lat] points for places with a location", () => {
    const center = { lat: 6.0535, lng: 80.22 };
    const collection = toMapFeatureCollection(
      [
        { name: "Galle Fort", type: "Fort", rating: 4.7, description: "Ramparts", coordinates: { lat: 6.0267, lng: 80.217 } },
        { name: "Nowhere", type: "", rating: 4, description: "", coordinates: { lat: 0, lng: 0 } },
        { name: "Unknown", type: "Park", rating: 4, description: "" },
      ],
      center
    );

    expect(collection).toEqual({
      type: "FeatureCollection",
      center,
      features: [
        {
          type: "Feature",
          geometry: { type: "Point", coordinates: [80.217, 6.0267] },
          properties: { name: "Galle Fort", type: "Fort", rating: 4.7, description: "Ramparts" },
        },
      ],
    });
  });
});
