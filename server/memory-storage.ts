import { randomUUID } from "node:crypto";
import type { User, InsertUser, Category, InsertCategory, UserPreferenceInput } from "@shared/schema";
import type {
  Attraction, AttractionQuery, NewAttraction, NewRoute, NewRouteStop,
  Route, RouteWithStops, StopPosition, UserPreference,
} from "@shared/models";
import { assertCompleteReorder, type IStorage, type UserRoutesFilter } from "./storage";
import { roundTo } from "./services/geo";

interface StoredStop {
  id: number;
  routeId: number;
  attractionId: number;
  position: number;
  visitDuration: number;
  notes: string | null;
}

const round2 = (value: number) => roundTo(value, 2);

/**
 * In-process storage
 * - Used when DATABASE_URL is not set, and as the stand-in store in tests.
 * - Each method validates before it mutates, so a failed call leaves nothing behind.
 */
export class MemStorage implements IStorage {
  private users = new Map<string, User>();
  private preferences = new Map<string, UserPreference>();
  private categories = new Map<number, Category>();
  private attractions = new Map<number, Attraction>();
  private routes = new Map<number, Route>();
  private stops = new Map<number, StoredStop>();
  private nextId = { category: 1, attraction: 1, route: 1, stop: 1 };

  // Users
  async getUser(id: string): Promise<User | undefined> {
    return this.users.get(id);
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    for (const existing of this.users.values()) {
      if (existing.email === insertUser.email) {
        throw new Error(`User with email ${insertUser.email} already exists`);
      }
    }
    const user: User = {
      id: randomUUID(),
      email: insertUser.email,
      username: insertUser.username,
      displayName: insertUser.displayName ?? null,
      createdAt: new Date(),
    };
    this.users.set(user.id, user);
    return user;
  }

  // Preferences
  async getUserPreference(userId: string): Promise<UserPreference | undefined> {
    return this.preferences.get(userId);
  }

  async upsertUserPreference(userId: string, input: UserPreferenceInput): Promise<UserPreference> {
    if (!this.users.has(userId)) {
      throw new Error(`User ${userId} does not exist`);
    }
    const preference: UserPreference = { userId, ...input, maxBudget: round2(input.maxBudget) };
    this.preferences.set(userId, preference);
    return preference;
  }

  // Catalog
  async getCategories(): Promise<Category[]> {
    return [...this.categories.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async createCategory(category: InsertCategory): Promise<Category> {
    for (const existing of this.categories.values()) {
      if (existing.name === category.name || existing.slug === category.slug) {
        throw new Error(`Category ${category.slug} already exists`);
      }
    }
    const created: Category = {
      id: this.nextId.category++,
      name: category.name,
      slug: category.slug,
      description: category.description ?? null,
      icon: category.icon ?? null,
    };
    this.categories.set(created.id, created);
    return created;
  }

  async queryAttractions(query: AttractionQuery): Promise<Attraction[]> {
    const { activeOnly = true, categoryIds, maxPrice } = query;
    return [...this.attractions.values()]
      .filter((a) => !activeOnly || a.isActive)
      .filter((a) => !categoryIds || categoryIds.length === 0 ||
        (a.categoryId !== null && categoryIds.includes(a.categoryId)))
      .filter((a) => maxPrice === undefined || a.isFree || a.price <= maxPrice)
      .sort((a, b) => b.rating - a.rating || a.id - b.id);
  }

  async getAttraction(id: number): Promise<Attraction | undefined> {
    const attraction = this.attractions.get(id);
    return attraction ? { ...attraction } : undefined;
  }

  async createAttraction(attraction: NewAttraction): Promise<Attraction> {
    const created = this.insertSync(attraction);
    if (!created) {
      throw new Error(`Attraction slug "${attraction.slug}" already exists`);
    }
    return created;
  }

  async insertAttractionIfSlugFree(attraction: NewAttraction): Promise<Attraction | undefined> {
    return this.insertSync(attraction);
  }

  // Check-and-insert without an await in between: the slug check is atomic on the event loop
  private insertSync(attraction: NewAttraction): Attraction | undefined {
    for (const existing of this.attractions.values()) {
      if (existing.slug === attraction.slug) return undefined;
    }
    const created: Attraction = {
      id: this.nextId.attraction++,
      name: attraction.name,
      slug: attraction.slug,
      description: attraction.description,
      shortDescription: attraction.shortDescription ?? null,
      address: attraction.address ?? null,
      categoryId: attraction.categoryId ?? null,
      latitude: roundTo(attraction.latitude, 6),
      longitude: roundTo(attraction.longitude, 6),
      rating: round2(attraction.rating ?? 0),
      visitDuration: attraction.visitDuration ?? 60,
      price: round2(attraction.price ?? 0),
      isFree: attraction.isFree ?? false,
      website: attraction.website ?? null,
      isActive: attraction.isActive ?? true,
    };
    this.attractions.set(created.id, created);
    return created;
  }

  // Routes
  async getRoute(id: number): Promise<RouteWithStops | undefined> {
    return this.loadRoute(id);
  }

  async getUserRoutes(userId: string, filter: UserRoutesFilter = {}): Promise<Route[]> {
    return [...this.routes.values()]
      .filter((r) => r.userId === userId && (!filter.favoritesOnly || r.isFavorite))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((r) => ({ ...r }));
  }

  async createRouteWithStops(route: NewRoute, stops: NewRouteStop[]): Promise<RouteWithStops> {
    if (!this.users.has(route.userId)) {
      throw new Error(`User ${route.userId} does not exist`);
    }
    const seenPositions = new Set<number>();
    for (const stop of stops) {
      if (!this.attractions.has(stop.attractionId)) {
        throw new Error(`Attraction ${stop.attractionId} does not exist`);
      }
      if (seenPositions.has(stop.position)) {
        throw new Error(`Duplicate stop position ${stop.position}`);
      }
      seenPositions.add(stop.position);
    }

    const now = new Date();
    const created: Route = {
      id: this.nextId.route++,
      userId: route.userId,
      name: route.name,
      description: route.description,
      durationHours: route.durationHours,
      budget: round2(route.budget),
      totalCost: round2(route.totalCost),
      distanceKm: round2(route.distanceKm),
      generatorType: route.generatorType,
      isPublic: route.isPublic ?? false,
      isFavorite: false,
      viewsCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.routes.set(created.id, created);

    for (const stop of stops) {
      const id = this.nextId.stop++;
      this.stops.set(id, {
        id,
        routeId: created.id,
        attractionId: stop.attractionId,
        position: stop.position,
        visitDuration: stop.visitDuration,
        notes: stop.notes ?? null,
      });
    }

    return this.requireRoute(created.id);
  }

  async reorderRouteStops(routeId: number, positions: StopPosition[], distanceKm: number): Promise<RouteWithStops> {
    const route = this.routes.get(routeId);
    if (!route) {
      throw new Error(`Route ${routeId} does not exist`);
    }
    assertCompleteReorder(routeId, this.stopsOf(routeId).map((s) => s.id), positions);

    for (const { stopId, position } of positions) {
      const stop = this.stops.get(stopId);
      if (stop) stop.position = position;
    }
    route.distanceKm = round2(distanceKm);
    route.updatedAt = new Date();

    return this.requireRoute(routeId);
  }

  async incrementRouteViews(id: number): Promise<Route | undefined> {
    const route = this.routes.get(id);
    if (!route) return undefined;
    route.viewsCount += 1;
    return { ...route };
  }

  async toggleRouteFavorite(id: number): Promise<Route | undefined> {
    const route = this.routes.get(id);
    if (!route) return undefined;
    route.isFavorite = !route.isFavorite;
    route.updatedAt = new Date();
    return { ...route };
  }

  private stopsOf(routeId: number): StoredStop[] {
    return [...this.stops.values()].filter((s) => s.routeId === routeId);
  }

  private loadRoute(id: number): RouteWithStops | undefined {
    const route = this.routes.get(id);
    if (!route) return undefined;

    const stops = this.stopsOf(id)
      .sort((a, b) => a.position - b.position)
      .flatMap((stop) => {
        const attraction = this.attractions.get(stop.attractionId);
        return attraction ? [{ ...stop, attraction: { ...attraction } }] : [];
      });

    return { ...route, stops };
  }

  private requireRoute(id: number): RouteWithStops {
    const route = this.loadRoute(id);
    if (!route) {
      throw new Error(`Route ${id} does not exist`);
    }
    return route;
  }
}
