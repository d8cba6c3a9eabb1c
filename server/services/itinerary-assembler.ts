import type { GeneratorType } from "@shared/schema";
import type { Attraction, GeoPoint, NewRouteStop, RouteWithStops, SuggestedStop } from "@shared/models";
import type { IStorage } from "../storage";
import { PlaceMatcher, type ReconcileResult } from "./place-matcher";
import { RouteOptimizer, routeOptimizer } from "./route-optimizer";
import { attractionCostCents, type Selection } from "./route-selector";
import { MatchExhaustionError, RouteNotFoundError } from "./errors";

export interface RouteMeta {
  name?: string;
  description?: string;
  generatorType: GeneratorType;
  /** Declared money budget; 0 = none */
  budget?: number;
  isPublic?: boolean;
}

export interface ReconciledRoute {
  route: RouteWithStops;
  matches: ReconcileResult[];
}

interface BoundStop extends GeoPoint {
  attraction: Attraction;
  suggestion: SuggestedStop;
}

const defaultName = (durationHours: number) => `Route for ${durationHours} h`;
const defaultDescription = (stopCount: number) => `Walking route through ${stopCount} places`;

/**
 * Turns selections and reconciled suggestions into persisted routes,
 * and re-sequences stored routes.
 */
export class ItineraryAssembler {
  constructor(
    private readonly storage: IStorage,
    private readonly matcher: PlaceMatcher,
    private readonly optimizer: RouteOptimizer = routeOptimizer,
  ) {}

  async buildFromSelection(userId: string, selection: Selection, meta: RouteMeta): Promise<RouteWithStops> {
    const { stops, constraints } = selection;
    const route = await this.storage.createRouteWithStops(
      {
        userId,
        name: meta.name?.trim() || defaultName(constraints.durationHours),
        description: meta.description?.trim() || defaultDescription(stops.length),
        durationHours: constraints.durationHours,
        budget: meta.budget ?? constraints.maxBudget,
        totalCost: selection.totalCost,
        distanceKm: selection.totalDistanceKm,
        generatorType: meta.generatorType,
        isPublic: meta.isPublic,
      },
      stops.map((attraction, i) => ({
        attractionId: attraction.id,
        position: i + 1,
        visitDuration: attraction.visitDuration,
      })),
    );

    console.log(
      `[Assembler] 💾 route #${route.id} (${meta.generatorType}): ${route.stops.length} stops, ` +
      `${this.optimizer.formatDistance(selection.totalDistanceKm)}`,
    );
    return route;
  }

  async reconcileAndBuild(
    userId: string,
    suggestions: readonly SuggestedStop[],
    durationHours: number,
    meta: RouteMeta,
  ): Promise<ReconciledRoute> {
    const reconciled = await this.matcher.reconcile(suggestions);

    const bound: BoundStop[] = [];
    const boundIds = new Set<number>();
    const unmatched: string[] = [];
    const matches: ReconcileResult[] = [];

    for (const match of reconciled) {
      if (match.strategy === "discarded") {
        unmatched.push(match.suggestion.name);
        matches.push(match);
        continue;
      }
      const { attraction, suggestion } = match;
      if (boundIds.has(attraction.id)) {
        console.warn(`[Assembler] ⚠️ "${suggestion.name}" repeats "${attraction.name}", dropped`);
        matches.push({ suggestion, strategy: "discarded", reason: `repeats ${attraction.name}` });
        continue;
      }
      boundIds.add(attraction.id);
      bound.push({ latitude: attraction.latitude, longitude: attraction.longitude, attraction, suggestion });
      matches.push(match);
    }

    if (bound.length === 0) {
      throw new MatchExhaustionError(unmatched);
    }

    const tour = this.optimizer.sequence(bound);
    const totalCents = tour.ordered.reduce((sum, stop) => sum + attractionCostCents(stop.attraction), 0);

    const stops: NewRouteStop[] = tour.ordered.map(({ attraction, suggestion }, i) => {
      const suggestedName = suggestion.name.trim();
      return {
        attractionId: attraction.id,
        position: i + 1,
        visitDuration: suggestion.visitDuration ?? attraction.visitDuration,
        notes: suggestedName !== attraction.name ? suggestedName : null,
      };
    });

    const route = await this.storage.createRouteWithStops(
      {
        userId,
        name: meta.name?.trim() || defaultName(durationHours),
        description: meta.description?.trim() || defaultDescription(stops.length),
        durationHours,
        budget: meta.budget ?? 0,
        totalCost: totalCents / 100,
        distanceKm: tour.totalDistanceKm,
        generatorType: meta.generatorType,
        isPublic: meta.isPublic,
      },
      stops,
    );

    if (unmatched.length > 0) {
      console.warn(`[Assembler] ⚠️ ${unmatched.length} suggestion(s) left out: ${unmatched.join(", ")}`);
    }
    console.log(
      `[Assembler] 💾 route #${route.id} (${meta.generatorType}): ${route.stops.length}/${suggestions.length} stops bound, ` +
      `${this.optimizer.formatDistance(tour.totalDistanceKm)}`,
    );
    return { route, matches };
  }

  /**
   * Re-sequences a stored route. Stops are fed to the sequencer by stop id,
   * so repeated calls give the same order and distance.
   */
  async reoptimize(routeId: number, start?: GeoPoint): Promise<RouteWithStops> {
    const route = await this.storage.getRoute(routeId);
    if (!route) {
      throw new RouteNotFoundError(routeId);
    }
    if (route.stops.length === 0) {
      return route;
    }

    const canonical = [...route.stops]
      .sort((a, b) => a.id - b.id)
      .map((stop) => ({ latitude: stop.attraction.latitude, longitude: stop.attraction.longitude, stopId: stop.id }));

    const tour = this.optimizer.sequence(canonical, start);
    const updated = await this.storage.reorderRouteStops(
      routeId,
      tour.ordered.map(({ stopId }, i) => ({ stopId, position: i + 1 })),
      tour.totalDistanceKm,
    );

    console.log(`[Assembler] 🔀 route #${routeId} re-sequenced: ${this.optimizer.formatDistance(tour.totalDistanceKm)}`);
    return updated;
  }
}
