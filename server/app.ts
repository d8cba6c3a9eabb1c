import express from "express";
import type { Request, Response, NextFunction } from "express";
import type { Server } from "node:http";
import { registerRoutes, type RouteDeps } from "./routes";
import { RouteEngineError, MatchExhaustionError } from "./services/errors";

const log = console.log;

export interface AppOptions {
  corsOrigins: string[];
  env: "development" | "production" | "test";
}

function setupCors(app: express.Application, options: AppOptions) {
  const origins = new Set(options.corsOrigins);

  app.use((req, res, next) => {
    const origin = req.header("origin");

    // Development: any origin (mobile devices and local tools send varying ones)
    if (origin && (origins.has(origin) || options.env === "development")) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
      res.header("Access-Control-Allow-Headers", "Content-Type");
      res.header("Access-Control-Allow-Credentials", "true");
    }

    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }
    next();
  });
}

// Cyrillic names in responses: always declare the charset
function setupCharset(app: express.Application) {
  app.use((_req, res, next) => {
    const originalJson = res.json.bind(res);
    res.json = (body) => {
      res.setHeader("Content-Type", "application/json; charset=utf-8");
      return originalJson(body);
    };
    next();
  });
}

function setupBodyParsing(app: express.Application) {
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));
}

function setupRequestLogging(app: express.Application) {
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      if (!path.startsWith("/api")) return;

      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > 120) {
        logLine = logLine.slice(0, 119) + "…";
      }
      log(logLine);
    });

    next();
  });
}

function setupErrorHandler(app: express.Application) {
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof RouteEngineError) {
      if (err.status >= 500) {
        console.error(`[API] ${req.method} ${req.path} → ${err.code}:`, err.message);
      }
      res.status(err.status).json({
        error: err.message,
        code: err.code,
        retryable: err.retryable,
        ...(err instanceof MatchExhaustionError ? { unmatchedNames: err.unmatchedNames } : {}),
      });
      return;
    }

    // body-parser errors carry their own 4xx status
    if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status < 500) {
      res.status(err.status).json({ error: err.message });
      return;
    }

    console.error(`[API] ❌ ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: "Internal Server Error" });
  });
}

export async function createApp(deps: RouteDeps, options: AppOptions): Promise<{ app: express.Express; server: Server }> {
  const app = express();

  setupCors(app, options);
  setupCharset(app);
  setupBodyParsing(app);
  setupRequestLogging(app);

  const server = await registerRoutes(app, deps);
  setupErrorHandler(app);

  return { app, server };
}
