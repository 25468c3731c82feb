import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import { createServer } from "http";
import { loadConfig } from "./config";
import { registerRoutes } from "./routes";
import { createServices } from "./services";
import { logAIConfig } from "./services/aiClientFactory";

const config = loadConfig();
const app = express();
const httpServer = createServer(app);

// Enable gzip compression for all responses
app.use(compression({
  level: 6, // Balanced speed/compression
  threshold: 1024, // Only compress responses > 1KB
}));

app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: false }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

/** Longest logged response body; itineraries run to tens of kilobytes */
const MAX_LOGGED_BODY = 200;

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        const body = JSON.stringify(capturedJsonResponse) ?? "";
        logLine += ` :: ${body.length > MAX_LOGGED_BODY ? `${body.slice(0, MAX_LOGGED_BODY)}…` : body}`;
      }

      log(logLine);
    }
  });

  next();
});

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

(async () => {
  logAIConfig(config);
  const services = createServices(config);

  await registerRoutes(httpServer, app, services);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    console.error(`[Server] Unhandled error (${status}):`, err);

    res.status(status).json({
      error: status === 500 ? "internal_error" : "request_error",
      message: status === 500 ? "Internal Server Error" : err instanceof Error ? err.message : "Request failed",
    });
  });

  const port = config.PORT;
  httpServer.listen({ port, host: "0.0.0.0" }, () => {
    log(`serving on port ${port}`);
  });
})().catch((error: unknown) => {
  console.error("[Startup] Failed to start server:", error);
  process.exit(1);
});
