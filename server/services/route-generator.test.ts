import { beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config/env";
import { MemStorage } from "../memory-storage";
import { addPlaces, createTestUser, exampleCatalog, ScriptedOracle } from "../test-helpers";
import { createRouteGenerator } from "./index";
import { UpstreamOracleError, UserNotFoundError } from "./errors";

const config = loadConfig({ ORACLE_MAX_ATTEMPTS: "1", ORACLE_TIMEOUT_MS: "500" });

const oracleReply = (names: string[]) => JSON.stringify({
  name: "Oracle walk",
  description: "Suggested by the oracle.",
  attractions: names.map((name, i) => ({ name, order: i + 1 })),
});

describe("RouteGenerator", () => {
  let storage: MemStorage;
  let userId: string;

  beforeEach(async () => {
    storage = new MemStorage();
    userId = (await createTestUser(storage)).id;
    await addPlaces(storage, exampleCatalog);
  });

  it("builds algorithmic routes from the catalog", async () => {
    const generator = createRouteGenerator(storage, config, null);
    const result = await generator.generate(userId, { mode: "algorithmic", durationHours: 2 });

    expect(result.mode).toBe("algorithmic");
    expect(result.route.generatorType).toBe("algorithmic");
    expect(result.route.stops.map((s) => s.attraction.name)).toEqual(["Place A"]);
  });

  it("builds llm routes from the oracle suggestion", async () => {
    const oracle = new ScriptedOracle([oracleReply(["Place C", "Place A"])]);
    const generator = createRouteGenerator(storage, config, oracle);
    const result = await generator.generate(userId, { mode: "llm", durationHours: 3 });

    expect(result.mode).toBe("llm");
    expect(result.route).toMatchObject({ name: "Oracle walk", generatorType: "llm", durationHours: 3 });
    expect(result.route.stops.map((s) => s.attraction.name)).toEqual(["Place C", "Place A"]);
    expect(result.matches?.map((m) => m.strategy)).toEqual(["exact", "exact"]);
  });

  it("prefers the requested route name over the oracle's", async () => {
    const oracle = new ScriptedOracle([oracleReply(["Place B"])]);
    const generator = createRouteGenerator(storage, config, oracle);
    const result = await generator.generate(userId, { mode: "llm", routeName: "Моя прогулка" });
    expect(result.route.name).toBe("Моя прогулка");
  });

  it("fails llm mode without an oracle", async () => {
    const generator = createRouteGenerator(storage, config, null);
    await expect(generator.generate(userId, { mode: "llm" })).rejects.toBeInstanceOf(UpstreamOracleError);
  });

  it("re-sequences hybrid routes", async () => {
    const oracle = new ScriptedOracle([oracleReply(["Place A", "Place C", "Place B"])]);
    const generator = createRouteGenerator(storage, config, oracle);
    const result = await generator.generate(userId, { mode: "hybrid", durationHours: 4 });

    expect(result.mode).toBe("hybrid");
    expect(result.route.generatorType).toBe("hybrid");
    expect(result.route.stops.map((s) => s.attraction.name)).toEqual(["Place A", "Place B", "Place C"]);
    expect(result.route.stops.map((s) => s.position)).toEqual([1, 2, 3]);
  });

  describe("hybrid fallback to algorithmic", () => {
    it("without an oracle", async () => {
      const generator = createRouteGenerator(storage, config, null);
      const result = await generator.generate(userId, { mode: "hybrid", durationHours: 4 });

      expect(result).toMatchObject({ mode: "algorithmic", fallbackReason: "no itinerary oracle configured" });
      expect(result.route.generatorType).toBe("hybrid");
      expect(result.route.stops).toHaveLength(3);
    });

    it("when the oracle fails", async () => {
      const generator = createRouteGenerator(storage, config, new ScriptedOracle([new Error("503")]));
      const result = await generator.generate(userId, { mode: "hybrid", durationHours: 4 });

      expect(result.mode).toBe("algorithmic");
      expect(result.fallbackReason).toContain("503");
    });

    it("when nothing the oracle names can be matched", async () => {
      const generator = createRouteGenerator(storage, config, new ScriptedOracle([oracleReply(["Nowhere"])]));
      const result = await generator.generate(userId, { mode: "hybrid", durationHours: 4 });

      expect(result.mode).toBe("algorithmic");
      expect(result.fallbackReason).toBe("None of the 1 suggested places could be matched");
      expect(await storage.getUserRoutes(userId)).toHaveLength(1);
    });
  });

  it("rejects unknown users", async () => {
    const generator = createRouteGenerator(storage, config, null);
    await expect(generator.generate("missing-user", { mode: "algorithmic" })).rejects.toBeInstanceOf(UserNotFoundError);
  });

  it("selectAndBuild and reconcileAndBuild persist routes", async () => {
    const generator = createRouteGenerator(storage, config, null);

    const selected = await generator.selectAndBuild(userId, { durationHours: 4, maxBudget: 400 });
    expect(selected.stops.map((s) => s.attraction.name)).toEqual(["Place A", "Place C"]);

    const { route } = await generator.reconcileAndBuild(userId, [{ name: "place b" }], 1);
    expect(route.generatorType).toBe("manual");
    expect(route.stops[0].notes).toBe("place b");
  });
});
