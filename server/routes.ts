import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import { z } from "zod";
import {
  generateRouteRequestSchema,
  insertUserSchema,
  optimizeRouteRequestSchema,
  reconcileRouteRequestSchema,
  userPreferenceInputSchema,
} from "@shared/schema";
import type { GeoPoint, SuggestedStop } from "@shared/models";
import type { IStorage } from "./storage";
import type { RouteGenerator } from "./services/route-generator";
import type { ReconcileResult } from "./services/place-matcher";
import { AttractionNotFoundError, RouteNotFoundError, UserNotFoundError } from "./services/errors";

export interface RouteDeps {
  storage: IStorage;
  generator: RouteGenerator;
  storageKind: "postgres" | "memory";
}

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward async rejections: hand them to the error handler
const handle = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

const csvIds = z.string()
  .transform((value) => value.split(",").map((part) => Number(part.trim())))
  .pipe(z.array(z.number().int().positive()));

const attractionQuerySchema = z.object({
  categoryIds: csvIds.optional(),
  maxPrice: z.coerce.number().min(0).optional(),
});

const idParamSchema = z.coerce.number().int().positive();

function badRequest(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: "Invalid request", issues: error.flatten() });
}

function startPoint(latitude?: number, longitude?: number): GeoPoint | undefined {
  return latitude !== undefined && longitude !== undefined ? { latitude, longitude } : undefined;
}

const hasHalfStart = (body: { startLatitude?: number; startLongitude?: number }) =>
  (body.startLatitude === undefined) !== (body.startLongitude === undefined);

function summarizeMatches(matches: ReconcileResult[] | undefined) {
  return matches?.map((match) => ({
    name: match.suggestion.name,
    strategy: match.strategy,
    attractionId: match.strategy === "discarded" ? null : match.attraction.id,
  }));
}

export async function registerRoutes(app: Express, deps: RouteDeps): Promise<Server> {
  const { storage, generator } = deps;

  async function requireUser(userId: string) {
    const user = await storage.getUser(userId);
    if (!user) throw new UserNotFoundError(userId);
    return user;
  }

  // ===== Health =====
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", storage: deps.storageKind, llm: generator.llmAvailable });
  });

  // ===== Catalog =====
  app.get("/api/categories", handle(async (_req, res) => {
    res.json(await storage.getCategories());
  }));

  app.get("/api/attractions", handle(async (req, res) => {
    const query = attractionQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(res, query.error);

    res.json(await storage.queryAttractions({ activeOnly: true, ...query.data }));
  }));

  app.get("/api/attractions/:id", handle(async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return badRequest(res, id.error);

    const attraction = await storage.getAttraction(id.data);
    if (!attraction) throw new AttractionNotFoundError(id.data);
    res.json(attraction);
  }));

  // ===== Users =====
  app.post("/api/users", handle(async (req, res) => {
    const body = insertUserSchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    res.status(201).json(await storage.createUser(body.data));
  }));

  app.get("/api/users/:userId", handle(async (req, res) => {
    res.json(await requireUser(req.params.userId));
  }));

  app.get("/api/users/:userId/preferences", handle(async (req, res) => {
    const { userId } = req.params;
    await requireUser(userId);
    const preference = await storage.getUserPreference(userId);
    res.json(preference ?? { userId, ...userPreferenceInputSchema.parse({}) });
  }));

  app.put("/api/users/:userId/preferences", handle(async (req, res) => {
    const { userId } = req.params;
    const body = userPreferenceInputSchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    await requireUser(userId);
    res.json(await storage.upsertUserPreference(userId, body.data));
  }));

  app.get("/api/users/:userId/routes", handle(async (req, res) => {
    const { userId } = req.params;
    await requireUser(userId);
    res.json(await storage.getUserRoutes(userId, { favoritesOnly: req.query.favorites === "true" }));
  }));

  // ===== Route generation =====
  app.post("/api/routes/generate", handle(async (req, res) => {
    const body = generateRouteRequestSchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    if (hasHalfStart(body.data)) {
      return res.status(400).json({ error: "startLatitude and startLongitude must be given together" });
    }

    const { userId, generatorType, startLatitude, startLongitude, ...constraints } = body.data;
    const result = await generator.generate(userId, {
      ...constraints,
      mode: generatorType,
      start: startPoint(startLatitude, startLongitude),
    });

    res.status(201).json({
      route: result.route,
      mode: result.mode,
      fallbackReason: result.fallbackReason,
      matches: summarizeMatches(result.matches),
    });
  }));

  app.post("/api/routes/reconcile", handle(async (req, res) => {
    const body = reconcileRouteRequestSchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    const { userId, durationHours, name, description, stops } = body.data;
    const suggestions: SuggestedStop[] = stops;
    const { route, matches } = await generator.reconcileAndBuild(userId, suggestions, durationHours, { name, description });

    res.status(201).json({ route, matches: summarizeMatches(matches) });
  }));

  // ===== Stored routes =====
  app.get("/api/routes/:id", handle(async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return badRequest(res, id.error);

    const route = await storage.getRoute(id.data);
    if (!route) throw new RouteNotFoundError(id.data);
    res.json(route);
  }));

  app.post("/api/routes/:id/optimize", handle(async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return badRequest(res, id.error);
    const body = optimizeRouteRequestSchema.safeParse(req.body ?? {});
    if (!body.success) return badRequest(res, body.error);
    if (hasHalfStart(body.data)) {
      return res.status(400).json({ error: "startLatitude and startLongitude must be given together" });
    }

    res.json(await generator.reoptimize(id.data, startPoint(body.data.startLatitude, body.data.startLongitude)));
  }));

  app.post("/api/routes/:id/views", handle(async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return badRequest(res, id.error);

    const route = await storage.incrementRouteViews(id.data);
    if (!route) throw new RouteNotFoundError(id.data);
    res.json({ id: route.id, viewsCount: route.viewsCount });
  }));

  app.post("/api/routes/:id/favorite", handle(async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return badRequest(res, id.error);

    const route = await storage.toggleRouteFavorite(id.data);
    if (!route) throw new RouteNotFoundError(id.data);
    res.json({ id: route.id, isFavorite: route.isFavorite });
  }));

  const httpServer = createServer(app);
  return httpServer;
}
