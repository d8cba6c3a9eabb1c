import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { Server } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { MemStorage } from "./memory-storage";
import { addPlaces, exampleCatalog } from "./test-helpers";
import { createRouteGenerator } from "./services";

let server: Server;
let baseUrl: string;

async function call(method: string, path: string, body?: unknown) {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const json: unknown = await response.json();
  return { status: response.status, json };
}

function field<T>(value: unknown, key: string): T {
  if (typeof value !== "object" || value === null || !(key in value)) {
    throw new Error(`missing field ${key}`);
  }
  return Reflect.get(value, key);
}

beforeAll(async () => {
  const storage = new MemStorage();
  await addPlaces(storage, exampleCatalog);
  const config = loadConfig({});
  const generator = createRouteGenerator(storage, config, null);

  ({ server } = await createApp({ storage, generator, storageKind: "memory" }, { corsOrigins: [], env: "test" }));
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

describe("HTTP API", () => {
  let userId: string;

  beforeAll(async () => {
    const created = await call("POST", "/api/users", { email: "walker@example.com", username: "walker" });
    expect(created.status).toBe(201);
    userId = field<string>(created.json, "id");
  });

  it("reports health", async () => {
    expect(await call("GET", "/api/health")).toEqual({
      status: 200,
      json: { status: "ok", storage: "memory", llm: false },
    });
  });

  it("lists attractions with a price filter", async () => {
    const { status, json } = await call("GET", "/api/attractions?maxPrice=100");
    expect(status).toBe(200);
    expect(Array.isArray(json) && json.map((a) => field<string>(a, "name"))).toEqual(["Place A", "Place C"]);
  });

  it("serves a single attraction", async () => {
    const { status, json } = await call("GET", "/api/attractions/2");
    expect(status).toBe(200);
    expect(json).toMatchObject({ id: 2, name: "Place B", price: 500, isFree: false });

    const missing = await call("GET", "/api/attractions/9999");
    expect(missing).toEqual({
      status: 404,
      json: { error: "Attraction 9999 not found", code: "ATTRACTION_NOT_FOUND", retryable: false },
    });
  });

  it("rejects a malformed category filter", async () => {
    expect((await call("GET", "/api/attractions?categoryIds=1,x")).status).toBe(400);
  });

  it("generates an algorithmic route", async () => {
    const { status, json } = await call("POST", "/api/routes/generate", {
      userId, generatorType: "algorithmic", durationHours: 4, maxBudget: 400,
    });

    expect(status).toBe(201);
    expect(field(json, "mode")).toBe("algorithmic");
    const stops = field<unknown[]>(field(json, "route"), "stops");
    expect(stops.map((s) => field<string>(field(s, "attraction"), "name"))).toEqual(["Place A", "Place C"]);
  });

  it("falls back to algorithmic for hybrid without an oracle", async () => {
    const { status, json } = await call("POST", "/api/routes/generate", { userId, durationHours: 2 });
    expect(status).toBe(201);
    expect(field(json, "mode")).toBe("algorithmic");
    expect(field(json, "fallbackReason")).toBe("no itinerary oracle configured");
  });

  it("returns 502 for llm mode without an oracle", async () => {
    const { status, json } = await call("POST", "/api/routes/generate", { userId, generatorType: "llm" });
    expect(status).toBe(502);
    expect(json).toMatchObject({ code: "UPSTREAM_ORACLE", retryable: true });
  });

  it("validates generate requests", async () => {
    expect((await call("POST", "/api/routes/generate", { userId, durationHours: 0 })).status).toBe(400);
    expect((await call("POST", "/api/routes/generate", { userId, startLatitude: 55.8 })).status).toBe(400);
  });

  it("returns 404 for unknown users", async () => {
    const { status, json } = await call("POST", "/api/routes/generate", { userId: "nobody" });
    expect(status).toBe(404);
    expect(json).toMatchObject({ code: "USER_NOT_FOUND" });
    expect((await call("GET", "/api/users/nobody/routes")).status).toBe(404);
  });

  it("reconciles client stops and reports each match", async () => {
    const { status, json } = await call("POST", "/api/routes/reconcile", {
      userId,
      durationHours: 3,
      name: "Client route",
      stops: [{ name: "place c" }, { name: "Nowhere" }, { name: "New spot", latitude: 55.81, longitude: 49.13 }],
    });

    expect(status).toBe(201);
    expect(field(json, "matches")).toEqual([
      { name: "place c", strategy: "exact", attractionId: 3 },
      { name: "Nowhere", strategy: "discarded", attractionId: null },
      { name: "New spot", strategy: "materialized", attractionId: 4 },
    ]);
    expect(field(field(json, "route"), "name")).toBe("Client route");
  });

  it("returns 422 when no stop can be matched", async () => {
    const { status, json } = await call("POST", "/api/routes/reconcile", {
      userId, durationHours: 1, stops: [{ name: "Nowhere" }],
    });
    expect(status).toBe(422);
    expect(json).toMatchObject({ code: "MATCH_EXHAUSTION", unmatchedNames: ["Nowhere"] });
  });

  it("serves, optimizes, favorites and counts a stored route", async () => {
    const generated = await call("POST", "/api/routes/generate", { userId, generatorType: "algorithmic" });
    const routeId = field<number>(field(generated.json, "route"), "id");

    expect((await call("GET", `/api/routes/${routeId}`)).status).toBe(200);

    const optimized = await call("POST", `/api/routes/${routeId}/optimize`, {});
    expect(optimized.status).toBe(200);
    expect(field<unknown[]>(optimized.json, "stops").map((s) => field(s, "position"))).toEqual([1, 2, 3]);

    expect(await call("POST", `/api/routes/${routeId}/favorite`)).toEqual({
      status: 200, json: { id: routeId, isFavorite: true },
    });
    expect(await call("POST", `/api/routes/${routeId}/views`)).toEqual({
      status: 200, json: { id: routeId, viewsCount: 1 },
    });

    const favorites = await call("GET", `/api/users/${userId}/routes?favorites=true`);
    expect(Array.isArray(favorites.json) && favorites.json.map((r) => field(r, "id"))).toEqual([routeId]);
  });

  it("returns 404 for unknown routes and 400 for bad ids", async () => {
    expect((await call("GET", "/api/routes/9999")).status).toBe(404);
    expect((await call("POST", "/api/routes/9999/optimize", {})).status).toBe(404);
    expect((await call("GET", "/api/routes/abc")).status).toBe(400);
  });

  it("reads and writes preferences", async () => {
    expect((await call("GET", `/api/users/${userId}/preferences`)).json).toEqual({
      userId,
      interests: [],
      preferredDurationMin: 60,
      preferredDurationMax: 480,
      maxBudget: 0,
      preferredCategoryIds: [],
    });

    const saved = await call("PUT", `/api/users/${userId}/preferences`, { interests: ["history"], maxBudget: 800 });
    expect(saved.status).toBe(200);
    expect(saved.json).toMatchObject({ interests: ["history"], maxBudget: 800 });

    const invalid = await call("PUT", `/api/users/${userId}/preferences`, {
      preferredDurationMin: 300, preferredDurationMax: 120,
    });
    expect(invalid.status).toBe(400);
  });
});
