import type { AppConfig } from "../config/env";
import type { IStorage } from "../storage";
import { ItineraryAssembler } from "./itinerary-assembler";
import { PlaceMatcher } from "./place-matcher";
import { RouteGenerator } from "./route-generator";
import { routeOptimizer } from "./route-optimizer";
import { RouteSelector } from "./route-selector";
import { createItineraryOracle, ItinerarySuggester, type ItineraryOracle } from "./oracle";

export { routeOptimizer, RouteOptimizer } from "./route-optimizer";
export { RouteSelector } from "./route-selector";
export { PlaceMatcher, slugify } from "./place-matcher";
export { ItineraryAssembler } from "./itinerary-assembler";
export { RouteGenerator, type GeneratorMode, type GeneratedRoute } from "./route-generator";
export { createItineraryOracle, ItinerarySuggester } from "./oracle";
export * from "./errors";

/**
 * Wires the engine over a storage backend.
 * `oracle` overrides the configured provider (tests pass a fake; null disables LLM modes).
 */
export function createRouteGenerator(
  storage: IStorage,
  config: AppConfig,
  oracle: ItineraryOracle | null = createItineraryOracle(config.oracle),
): RouteGenerator {
  const matcher = new PlaceMatcher(storage, { cityName: config.routing.cityName });
  const suggester = oracle
    ? new ItinerarySuggester(oracle, {
        cityName: config.routing.cityName,
        timeoutMs: config.oracle.timeoutMs,
        maxAttempts: config.oracle.maxAttempts,
      })
    : null;

  return new RouteGenerator({
    storage,
    selector: new RouteSelector(storage, config.routing),
    assembler: new ItineraryAssembler(storage, matcher, routeOptimizer),
    suggester,
  });
}
