import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { coordinatesSchema, placeSchema, type Coordinates, type Place } from '@shared/schema';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Static Tables
 *
 * Curated data used when live lookups fail or are not configured:
 * - fallback-places.json: ~10 places for each of ~40 cities
 * - city-coordinates.json: coordinates for the same cities
 * - place-icons.json: place type -> display icon
 *
 * Files are read once and kept for the life of the process.
 */

const DATA_DIR = path.join(__dirname, '..', 'data');

/** Approximate centroid used when a city cannot be located at all */
export const DEFAULT_CENTROID: Coordinates = { lat: 7.8731, lng: 80.7718 };

export const DEFAULT_ICON = '📍';

const fallbackPlacesSchema = z.record(z.string(), z.array(placeSchema));
const cityCoordinatesSchema = z.record(z.string(), coordinatesSchema);
const placeIconsSchema = z.record(z.string(), z.string());

export interface StaticTables {
  fallbackPlaces: Record<string, Place[]>;
  cityCoordinates: Record<string, Coordinates>;
  placeIcons: Record<string, string>;
}

let tables: StaticTables | null = null;

function readTable<T>(fileName: string, schema: z.ZodType<T>): T {
  const filePath = path.join(DATA_DIR, fileName);
  const raw = fs.readFileSync(filePath, 'utf-8');
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`[StaticData] ${fileName} is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadStaticTables(): StaticTables {
  if (tables) return tables;

  tables = {
    fallbackPlaces: readTable('fallback-places.json', fallbackPlacesSchema),
    cityCoordinates: readTable('city-coordinates.json', cityCoordinatesSchema),
    placeIcons: readTable('place-icons.json', placeIconsSchema),
  };

  console.log(
    `[StaticData] Loaded ${Object.keys(tables.fallbackPlaces).length} fallback cities, ` +
      `${Object.keys(tables.cityCoordinates).length} coordinates, ` +
      `${Object.keys(tables.placeIcons).length} icons`
  );
  return tables;
}

/**
 * Case-insensitive lookup by city name.
 */
export function lookupCity<T>(table: Record<string, T>, city: string): T | undefined {
  const wanted = city.trim().toLowerCase();
  if (!wanted) return undefined;
  for (const [name, value] of Object.entries(table)) {
    if (name.toLowerCase() === wanted) return value;
  }
  return undefined;
}
