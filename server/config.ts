/**
 * Runtime configuration.
 *
 * Every provider key is optional: a provider without its key is skipped and
 * the pipeline degrades to the next provider or the static tables. Only the
 * completion service is required to generate itineraries.
 *
 * Env vars:
 *   GROQ_API_KEY / OPENAI_API_KEY / DEEPSEEK_API_KEY  completion service (first set wins)
 *   AI_EXTRACTION_MODEL, AI_GENERATION_MODEL          model overrides
 *   OPENTRIPMAP_API_KEY, FOURSQUARE_API_KEY, GOOGLE_PLACES_API_KEY
 *   MAPBOX_ACCESS_TOKEN                               geocoding
 *   UNSPLASH_ACCESS_KEY, PEXELS_API_KEY               images
 *   HTTP_TIMEOUT_MS                                   external call timeout (default 10000)
 *   PORT                                              default 5000
 */

import { z } from "zod";

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  GROQ_API_KEY: optionalKey,
  OPENAI_API_KEY: optionalKey,
  DEEPSEEK_API_KEY: optionalKey,
  AI_EXTRACTION_MODEL: optionalKey,
  AI_GENERATION_MODEL: optionalKey,

  OPENTRIPMAP_API_KEY: optionalKey,
  FOURSQUARE_API_KEY: optionalKey,
  GOOGLE_PLACES_API_KEY: optionalKey,
  MAPBOX_ACCESS_TOKEN: optionalKey,
  UNSPLASH_ACCESS_KEY: optionalKey,
  PEXELS_API_KEY: optionalKey,
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`[Config] Invalid environment: ${problems}`);
  }
  return parsed.data;
}
