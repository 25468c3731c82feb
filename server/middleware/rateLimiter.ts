/**
 * Rate Limiting Middleware
 *
 * Itinerary generation costs two completion calls, so it gets its own tier.
 *
 * Tiers:
 * - Itinerary generation: 10/min per IP
 * - Everything else under /api: 100/min per IP
 */

import rateLimit from "express-rate-limit";
import type { Request } from "express";

/**
 * Itinerary generation rate limiter
 * 10 requests per minute per IP
 */
export const generationRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 10,
  message: {
    error: "rate_limited",
    message: "Too many itinerary requests. Please wait before generating another one.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * General API rate limiter (fallback)
 * 100 requests per minute per IP
 */
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  message: {
    error: "rate_limited",
    message: "Too many requests. Please slow down.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * Get client IP address, handling proxies
 */
export function getClientIP(req: Request): string {
  const forwarded = req.headers["x-forwarded-for"];
  if (forwarded) {
    const ips = typeof forwarded === "string" ? forwarded : forwarded[0] ?? "";
    const first = ips.split(",")[0]?.trim();
    if (first) return first;
  }

  return req.ip || req.socket.remoteAddress || "unknown";
}
