import { beforeEach, describe, expect, it } from "vitest";
import { MemStorage } from "./memory-storage";
import { addPlaces, createTestUser, exampleCatalog } from "./test-helpers";
import { readSeedCatalog, seedCatalog } from "./catalog-seed";

describe("MemStorage", () => {
  let storage: MemStorage;
  let userId: string;

  beforeEach(async () => {
    storage = new MemStorage();
    userId = (await createTestUser(storage)).id;
  });

  it("filters by price, keeping free places", async () => {
    await addPlaces(storage, exampleCatalog);
    const names = (await storage.queryAttractions({ maxPrice: 100 })).map((a) => a.name);
    expect(names).toEqual(["Place A", "Place C"]);
  });

  it("orders by rating, then id", async () => {
    await addPlaces(storage, [
      { name: "Low", latitude: 55.8, longitude: 49.1, rating: 3 },
      { name: "High", latitude: 55.8, longitude: 49.1, rating: 5 },
      { name: "Also high", latitude: 55.8, longitude: 49.1, rating: 5 },
    ]);
    expect((await storage.queryAttractions({})).map((a) => a.name)).toEqual(["High", "Also high", "Low"]);
  });

  it("hides inactive places unless asked", async () => {
    await storage.createAttraction({
      name: "Closed", slug: "closed", description: "", latitude: 55.8, longitude: 49.1, isActive: false,
    });
    expect(await storage.queryAttractions({})).toEqual([]);
    expect(await storage.queryAttractions({ activeOnly: false })).toHaveLength(1);
  });

  it("stores nothing when a stop references a missing attraction", async () => {
    const [place] = await addPlaces(storage, exampleCatalog);
    const route = {
      userId, name: "r", description: "", durationHours: 2, budget: 0, totalCost: 0, distanceKm: 0,
      generatorType: "manual" as const,
    };

    await expect(storage.createRouteWithStops(route, [
      { attractionId: place.id, position: 1, visitDuration: 60 },
      { attractionId: 9999, position: 2, visitDuration: 60 },
    ])).rejects.toThrow("Attraction 9999 does not exist");
    expect(await storage.getUserRoutes(userId)).toEqual([]);
  });

  it("reorders stops and updates the distance", async () => {
    const [a, b] = await addPlaces(storage, exampleCatalog);
    const route = await storage.createRouteWithStops(
      { userId, name: "r", description: "", durationHours: 2, budget: 0, totalCost: 0, distanceKm: 1, generatorType: "manual" },
      [
        { attractionId: a.id, position: 1, visitDuration: 60 },
        { attractionId: b.id, position: 2, visitDuration: 60 },
      ],
    );
    const [first, second] = route.stops;

    const updated = await storage.reorderRouteStops(route.id, [
      { stopId: first.id, position: 2 },
      { stopId: second.id, position: 1 },
    ], 2.346);

    expect(updated.stops.map((s) => s.id)).toEqual([second.id, first.id]);
    expect(updated.distanceKm).toBe(2.35);
  });

  it("rejects a reorder that does not place every stop on 1..k", async () => {
    const [a, b, c] = await addPlaces(storage, exampleCatalog);
    const route = await storage.createRouteWithStops(
      { userId, name: "r", description: "", durationHours: 3, budget: 0, totalCost: 0, distanceKm: 1, generatorType: "manual" },
      [a, b, c].map((place, i) => ({ attractionId: place.id, position: i + 1, visitDuration: 60 })),
    );
    const [first, second, third] = route.stops;

    await expect(storage.reorderRouteStops(route.id, [
      { stopId: second.id, position: 1 },
    ], 2)).rejects.toThrow(`Route ${route.id} has 3 stops, got 1 positions`);

    await expect(storage.reorderRouteStops(route.id, [
      { stopId: first.id, position: 1 },
      { stopId: second.id, position: 2 },
      { stopId: third.id, position: 4 },
    ], 2)).rejects.toThrow(`Positions of route ${route.id} must be 1..3, each used once (got 4)`);

    await expect(storage.reorderRouteStops(route.id, [
      { stopId: first.id, position: 1 },
      { stopId: first.id, position: 2 },
      { stopId: third.id, position: 3 },
    ], 2)).rejects.toThrow(`Stop ${first.id} is listed twice`);

    const unchanged = await storage.getRoute(route.id);
    expect(unchanged?.stops.map((s) => [s.id, s.position])).toEqual([[first.id, 1], [second.id, 2], [third.id, 3]]);
    expect(unchanged?.distanceKm).toBe(1);
  });

  it("toggles favorites and counts views", async () => {
    const route = await storage.createRouteWithStops(
      { userId, name: "r", description: "", durationHours: 2, budget: 0, totalCost: 0, distanceKm: 0, generatorType: "manual" },
      [],
    );
    expect((await storage.toggleRouteFavorite(route.id))?.isFavorite).toBe(true);
    expect((await storage.incrementRouteViews(route.id))?.viewsCount).toBe(1);
    expect(await storage.getUserRoutes(userId, { favoritesOnly: true })).toHaveLength(1);
    expect(await storage.toggleRouteFavorite(9999)).toBeUndefined();
  });

  it("loads the bundled seed catalog", async () => {
    const result = await seedCatalog(storage, readSeedCatalog());
    expect(result).toEqual({ categories: 6, attractions: 12 });

    const kremlin = (await storage.queryAttractions({}))[0];
    expect(kremlin).toMatchObject({ name: "Казанский Кремль", slug: "kazan-kremlin", isFree: true });
    expect(await seedCatalog(storage, readSeedCatalog())).toEqual({ categories: 0, attractions: 0 });
  });
});
