/**
 * Shared response helpers for the API routers.
 */

import type { Response } from 'express';
import type { ZodError } from 'zod';
import { AINotConfiguredError, ItineraryPipelineError } from '../services/errors';

/** Shown for every extraction or generation failure */
export const GENERATION_FAILED_MESSAGE =
  'Sorry, we could not generate an itinerary for that request. Please try again.';

export function sendValidationError(res: Response, message: string, error: ZodError) {
  return res.status(400).json({
    error: 'validation_error',
    message,
    details: error.errors,
  });
}

export function sendNotFound(res: Response, message: string) {
  return res.status(404).json({ error: 'not_found', message });
}

/**
 * Maps a thrown error to the API's error body. Pipeline errors keep their
 * detail in the log only.
 */
export function sendRouteError(res: Response, tag: string, error: unknown, fallbackMessage: string) {
  if (error instanceof ItineraryPipelineError) {
    console.error(`[${tag}] ${error.name} (${error.stage}):`, error.message, error.cause ?? '');
    return res.status(502).json({ error: 'generation_failed', message: GENERATION_FAILED_MESSAGE });
  }

  if (error instanceof AINotConfiguredError) {
    console.error(`[${tag}]`, error.message);
    return res.status(503).json({ error: 'service_unavailable', message: error.message });
  }

  console.error(`[${tag}] Unexpected error:`, error);
  return res.status(500).json({ error: 'internal_error', message: fallbackMessage });
}

/** "Sri Lanka" -> "sri_lanka" for download file names */
export function fileSlug(value: string, fallback = 'trip'): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || fallback;
}
