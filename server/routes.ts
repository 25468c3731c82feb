import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import type { Services } from "./services";
import { generalRateLimiter } from "./middleware/rateLimiter";
import { createItineraryRouter } from "./routes/itinerary";
import { createPlacesRouter } from "./routes/places";
import { sendNotFound, sendRouteError, sendValidationError } from "./routes/respond";

const countryParamsSchema = z.object({
  name: z.string().trim().min(1, "Country name is required"),
});

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  services: Services
): Promise<Server> {
  app.use("/api", generalRateLimiter);

  app.use("/api/itinerary", createItineraryRouter(services));
  app.use("/api/places", createPlacesRouter(services));

  // Country profile for the trip summary panel
  app.get("/api/countries/:name", async (req: Request, res: Response) => {
    const validation = countryParamsSchema.safeParse(req.params);
    if (!validation.success) {
      return sendValidationError(res, "Invalid country name", validation.error);
    }

    try {
      const profile = await services.countries.getCountryProfile(validation.data.name);
      if (!profile) {
        return sendNotFound(res, `Country not found: ${validation.data.name}`);
      }
      res.json(profile);
    } catch (error) {
      sendRouteError(res, "Countries", error, "Failed to load country profile");
    }
  });

  // Drop every cached lookup so the next request hits the providers again
  app.post("/api/cache/clear", (_req: Request, res: Response) => {
    const before = services.cache.stats();
    services.cache.clear();
    res.json({ success: true, before, after: services.cache.stats() });
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      ai: services.aiConfigured,
      providers: {
        places: services.places.configuredProviders(),
        images: services.images.configuredProviders(),
      },
      cache: services.cache.stats(),
      hasItinerary: services.planner.current() !== null,
    });
  });

  return httpServer;
}
