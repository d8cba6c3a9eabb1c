import {
  type User, type InsertUser,
  type Category, type InsertCategory,
  type AttractionRow,
  type RouteRow,
  type UserPreferenceRow,
  type UserPreferenceInput,
  users, categories, attractions, routes, routeAttractions, userPreferences,
} from "@shared/schema";
import * as schema from "@shared/schema";
import type {
  Attraction, AttractionQuery, NewAttraction, NewRoute, NewRouteStop,
  Route, RouteStop, RouteWithStops, StopPosition, UserPreference,
} from "@shared/models";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import { eq, desc, asc, and, or, lte, inArray, sql, type SQL } from "drizzle-orm";

export interface UserRoutesFilter {
  favoritesOnly?: boolean;
}

export interface IStorage {
  // Users
  getUser(id: string): Promise<User | undefined>;
  createUser(user: InsertUser): Promise<User>;

  // Preferences
  getUserPreference(userId: string): Promise<UserPreference | undefined>;
  upsertUserPreference(userId: string, input: UserPreferenceInput): Promise<UserPreference>;

  // Catalog
  getCategories(): Promise<Category[]>;
  createCategory(category: InsertCategory): Promise<Category>;
  queryAttractions(query: AttractionQuery): Promise<Attraction[]>;
  getAttraction(id: number): Promise<Attraction | undefined>;
  createAttraction(attraction: NewAttraction): Promise<Attraction>;
  /** Atomic insert; resolves to undefined when the slug is already taken. */
  insertAttractionIfSlugFree(attraction: NewAttraction): Promise<Attraction | undefined>;

  // Routes
  getRoute(id: number): Promise<RouteWithStops | undefined>;
  getUserRoutes(userId: string, filter?: UserRoutesFilter): Promise<Route[]>;
  /** Route and all of its stops in one transaction. */
  createRouteWithStops(route: NewRoute, stops: NewRouteStop[]): Promise<RouteWithStops>;
  /** Rewrites stop positions and the route distance in one transaction. */
  reorderRouteStops(routeId: number, positions: StopPosition[], distanceKm: number): Promise<RouteWithStops>;
  incrementRouteViews(id: number): Promise<Route | undefined>;
  toggleRouteFavorite(id: number): Promise<Route | undefined>;
}

/**
 * A reorder must place every stop of the route exactly once on positions 1..k.
 */
export function assertCompleteReorder(routeId: number, stopIds: readonly number[], positions: readonly StopPosition[]): void {
  if (positions.length !== stopIds.length) {
    throw new Error(`Route ${routeId} has ${stopIds.length} stops, got ${positions.length} positions`);
  }
  const routeStopIds = new Set(stopIds);
  const seenStops = new Set<number>();
  const seenPositions = new Set<number>();
  for (const { stopId, position } of positions) {
    if (!routeStopIds.has(stopId)) {
      throw new Error(`Stop ${stopId} does not belong to route ${routeId}`);
    }
    if (seenStops.has(stopId)) {
      throw new Error(`Stop ${stopId} is listed twice`);
    }
    if (!Number.isInteger(position) || position < 1 || position > stopIds.length || seenPositions.has(position)) {
      throw new Error(`Positions of route ${routeId} must be 1..${stopIds.length}, each used once (got ${position})`);
    }
    seenStops.add(stopId);
    seenPositions.add(position);
  }
}

// ===== numeric columns arrive as strings =====
export function toAttraction(row: AttractionRow): Attraction {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    shortDescription: row.shortDescription,
    address: row.address,
    categoryId: row.categoryId,
    latitude: Number(row.latitude),
    longitude: Number(row.longitude),
    rating: Number(row.rating),
    visitDuration: row.visitDuration,
    price: Number(row.price),
    isFree: row.isFree,
    website: row.website,
    isActive: row.isActive,
  };
}

function toRoute(row: RouteRow): Route {
  return {
    id: row.id,
    userId: row.userId,
    name: row.name,
    description: row.description,
    durationHours: row.durationHours,
    budget: Number(row.budget),
    totalCost: Number(row.totalCost),
    distanceKm: Number(row.distanceKm),
    generatorType: row.generatorType,
    isPublic: row.isPublic,
    isFavorite: row.isFavorite,
    viewsCount: row.viewsCount,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toUserPreference(row: UserPreferenceRow): UserPreference {
  return {
    userId: row.userId,
    interests: row.interests,
    preferredDurationMin: row.preferredDurationMin,
    preferredDurationMax: row.preferredDurationMax,
    maxBudget: Number(row.maxBudget),
    preferredCategoryIds: row.preferredCategoryIds,
  };
}

function attractionValues(attraction: NewAttraction) {
  return {
    name: attraction.name,
    slug: attraction.slug,
    description: attraction.description,
    shortDescription: attraction.shortDescription ?? null,
    latitude: attraction.latitude.toFixed(6),
    longitude: attraction.longitude.toFixed(6),
    address: attraction.address ?? null,
    categoryId: attraction.categoryId ?? null,
    rating: (attraction.rating ?? 0).toFixed(2),
    visitDuration: attraction.visitDuration ?? 60,
    price: (attraction.price ?? 0).toFixed(2),
    isFree: attraction.isFree ?? false,
    website: attraction.website ?? null,
    isActive: attraction.isActive ?? true,
  };
}

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Executor) {}

  // Users
  async getUser(id: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user || undefined;
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    const [user] = await this.db.insert(users).values(insertUser).returning();
    return user;
  }

  // Preferences
  async getUserPreference(userId: string): Promise<UserPreference | undefined> {
    const [row] = await this.db.select().from(userPreferences).where(eq(userPreferences.userId, userId));
    return row ? toUserPreference(row) : undefined;
  }

  async upsertUserPreference(userId: string, input: UserPreferenceInput): Promise<UserPreference> {
    const values = {
      interests: input.interests,
      preferredDurationMin: input.preferredDurationMin,
      preferredDurationMax: input.preferredDurationMax,
      maxBudget: input.maxBudget.toFixed(2),
      preferredCategoryIds: input.preferredCategoryIds,
    };
    const [row] = await this.db.insert(userPreferences)
      .values({ userId, ...values })
      .onConflictDoUpdate({
        target: userPreferences.userId,
        set: { ...values, updatedAt: sql`CURRENT_TIMESTAMP` },
      })
      .returning();
    return toUserPreference(row);
  }

  // Catalog
  async getCategories(): Promise<Category[]> {
    return this.db.select().from(categories).orderBy(asc(categories.name));
  }

  async createCategory(category: InsertCategory): Promise<Category> {
    const [row] = await this.db.insert(categories).values(category).returning();
    return row;
  }

  async queryAttractions(query: AttractionQuery): Promise<Attraction[]> {
    const conditions: SQL[] = [];
    if (query.activeOnly !== false) {
      conditions.push(eq(attractions.isActive, true));
    }
    if (query.categoryIds && query.categoryIds.length > 0) {
      conditions.push(inArray(attractions.categoryId, query.categoryIds));
    }
    if (query.maxPrice !== undefined) {
      const priceCondition = or(eq(attractions.isFree, true), lte(attractions.price, query.maxPrice.toFixed(2)));
      if (priceCondition) conditions.push(priceCondition);
    }

    const rows = await this.db.select().from(attractions)
      .where(and(...conditions))
      .orderBy(desc(attractions.rating), asc(attractions.id));
    return rows.map(toAttraction);
  }

  async getAttraction(id: number): Promise<Attraction | undefined> {
    const [row] = await this.db.select().from(attractions).where(eq(attractions.id, id));
    return row ? toAttraction(row) : undefined;
  }

  async createAttraction(attraction: NewAttraction): Promise<Attraction> {
    const [row] = await this.db.insert(attractions).values(attractionValues(attraction)).returning();
    return toAttraction(row);
  }

  async insertAttractionIfSlugFree(attraction: NewAttraction): Promise<Attraction | undefined> {
    const [row] = await this.db.insert(attractions)
      .values(attractionValues(attraction))
      .onConflictDoNothing({ target: attractions.slug })
      .returning();
    return row ? toAttraction(row) : undefined;
  }

  // Routes
  async getRoute(id: number): Promise<RouteWithStops | undefined> {
    return loadRoute(this.db, id);
  }

  async getUserRoutes(userId: string, filter: UserRoutesFilter = {}): Promise<Route[]> {
    const conditions: SQL[] = [eq(routes.userId, userId)];
    if (filter.favoritesOnly) {
      conditions.push(eq(routes.isFavorite, true));
    }
    const rows = await this.db.select().from(routes)
      .where(and(...conditions))
      .orderBy(desc(routes.createdAt));
    return rows.map(toRoute);
  }

  async createRouteWithStops(route: NewRoute, stops: NewRouteStop[]): Promise<RouteWithStops> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx.insert(routes).values({
        userId: route.userId,
        name: route.name,
        description: route.description,
        durationHours: route.durationHours,
        budget: route.budget.toFixed(2),
        totalCost: route.totalCost.toFixed(2),
        distanceKm: route.distanceKm.toFixed(2),
        generatorType: route.generatorType,
        isPublic: route.isPublic ?? false,
      }).returning();

      if (stops.length > 0) {
        await tx.insert(routeAttractions).values(stops.map((stop) => ({
          routeId: row.id,
          attractionId: stop.attractionId,
          position: stop.position,
          visitDuration: stop.visitDuration,
          notes: stop.notes ?? null,
        })));
      }

      const created = await loadRoute(tx, row.id);
      if (!created) {
        throw new Error(`Route ${row.id} vanished inside its own transaction`);
      }
      return created;
    });
  }

  async reorderRouteStops(routeId: number, positions: StopPosition[], distanceKm: number): Promise<RouteWithStops> {
    return this.db.transaction(async (tx) => {
      const current = await tx.select({ id: routeAttractions.id })
        .from(routeAttractions)
        .where(eq(routeAttractions.routeId, routeId));
      assertCompleteReorder(routeId, current.map((s) => s.id), positions);

      // Park every stop on a negative position first so the (route, position) unique index never collides
      await tx.update(routeAttractions)
        .set({ position: sql`-1 * ${routeAttractions.position}` })
        .where(eq(routeAttractions.routeId, routeId));

      for (const { stopId, position } of positions) {
        await tx.update(routeAttractions)
          .set({ position })
          .where(and(eq(routeAttractions.id, stopId), eq(routeAttractions.routeId, routeId)));
      }

      await tx.update(routes)
        .set({ distanceKm: distanceKm.toFixed(2), updatedAt: sql`CURRENT_TIMESTAMP` })
        .where(eq(routes.id, routeId));

      const updated = await loadRoute(tx, routeId);
      if (!updated) {
        throw new Error(`Route ${routeId} vanished while reordering`);
      }
      return updated;
    });
  }

  async incrementRouteViews(id: number): Promise<Route | undefined> {
    const [row] = await this.db.update(routes)
      .set({ viewsCount: sql`${routes.viewsCount} + 1` })
      .where(eq(routes.id, id))
      .returning();
    return row ? toRoute(row) : undefined;
  }

  async toggleRouteFavorite(id: number): Promise<Route | undefined> {
    const [row] = await this.db.update(routes)
      .set({ isFavorite: sql`NOT ${routes.isFavorite}`, updatedAt: sql`CURRENT_TIMESTAMP` })
      .where(eq(routes.id, id))
      .returning();
    return row ? toRoute(row) : undefined;
  }
}

async function loadRoute(executor: Executor, id: number): Promise<RouteWithStops | undefined> {
  const [row] = await executor.select().from(routes).where(eq(routes.id, id));
  if (!row) return undefined;

  const stopRows = await executor
    .select({ stop: routeAttractions, attraction: attractions })
    .from(routeAttractions)
    .innerJoin(attractions, eq(routeAttractions.attractionId, attractions.id))
    .where(eq(routeAttractions.routeId, id))
    .orderBy(asc(routeAttractions.position));

  const stops: RouteStop[] = stopRows.map(({ stop, attraction }) => ({
    id: stop.id,
    routeId: stop.routeId,
    attractionId: stop.attractionId,
    position: stop.position,
    visitDuration: stop.visitDuration,
    notes: stop.notes,
    attraction: toAttraction(attraction),
  }));

  return { ...toRoute(row), stops };
}
