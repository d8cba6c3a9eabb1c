/**
 * Route generator
 *
 * algorithmic: catalog selection under time/money budgets
 * llm:         oracle suggestion reconciled against the catalog
 * hybrid:      llm, then re-sequenced; falls back to algorithmic when the oracle
 *              is missing, fails, or nothing it names can be matched
 */

import type { GeneratorType } from "@shared/schema";
import type { GeoPoint, RouteWithStops, SuggestedStop } from "@shared/models";
import type { IStorage } from "../storage";
import type { ItineraryAssembler } from "./itinerary-assembler";
import type { ReconcileResult } from "./place-matcher";
import type { RouteSelector, SelectionConstraints } from "./route-selector";
import type { ItinerarySuggester } from "./oracle";
import { MatchExhaustionError, UpstreamOracleError, UserNotFoundError } from "./errors";

export type GeneratorMode = Exclude<GeneratorType, "manual">;

export interface GenerateRouteOptions extends SelectionConstraints {
  mode: GeneratorMode;
  routeName?: string;
  routeDescription?: string;
}

export interface GeneratedRoute {
  route: RouteWithStops;
  /** The mode that actually produced the route */
  mode: GeneratorMode;
  fallbackReason?: string;
  matches?: ReconcileResult[];
}

export interface ReconcileRouteOptions {
  name?: string;
  description?: string;
}

interface RouteGeneratorDeps {
  storage: IStorage;
  selector: RouteSelector;
  assembler: ItineraryAssembler;
  /** null when no oracle is configured */
  suggester: ItinerarySuggester | null;
}

const SUGGESTION_CATALOG_SIZE = 50;

export class RouteGenerator {
  private readonly storage: IStorage;
  private readonly selector: RouteSelector;
  private readonly assembler: ItineraryAssembler;
  private readonly suggester: ItinerarySuggester | null;

  constructor(deps: RouteGeneratorDeps) {
    this.storage = deps.storage;
    this.selector = deps.selector;
    this.assembler = deps.assembler;
    this.suggester = deps.suggester;
  }

  get llmAvailable(): boolean {
    return this.suggester !== null;
  }

  // ===== Engine operations =====

  async selectAndBuild(
    userId: string,
    constraints: SelectionConstraints,
    meta: { name?: string; description?: string; generatorType?: GeneratorType } = {},
  ): Promise<RouteWithStops> {
    await this.requireUser(userId);
    const selection = await this.selector.select(userId, constraints);
    return this.assembler.buildFromSelection(userId, selection, {
      name: meta.name,
      description: meta.description,
      generatorType: meta.generatorType ?? "algorithmic",
    });
  }

  async reconcileAndBuild(
    userId: string,
    suggestions: readonly SuggestedStop[],
    durationHours: number,
    options: ReconcileRouteOptions = {},
  ): Promise<{ route: RouteWithStops; matches: ReconcileResult[] }> {
    await this.requireUser(userId);
    return this.assembler.reconcileAndBuild(userId, suggestions, durationHours, {
      name: options.name,
      description: options.description,
      generatorType: "manual",
    });
  }

  async reoptimize(routeId: number, start?: GeoPoint): Promise<RouteWithStops> {
    return this.assembler.reoptimize(routeId, start);
  }

  // ===== Generation =====

  async generate(userId: string, options: GenerateRouteOptions): Promise<GeneratedRoute> {
    await this.requireUser(userId);
    console.log(`[Generator] 🚀 ${options.mode} route for user ${userId}`);

    if (options.mode === "algorithmic") {
      return { route: await this.buildAlgorithmic(userId, options, "algorithmic"), mode: "algorithmic" };
    }

    if (options.mode === "llm") {
      return { ...(await this.buildWithOracle(userId, options, "llm")), mode: "llm" };
    }

    if (!this.suggester) {
      const fallbackReason = "no itinerary oracle configured";
      console.warn(`[Generator] ⚠️ hybrid: ${fallbackReason}, using algorithmic`);
      return { route: await this.buildAlgorithmic(userId, options, "hybrid"), mode: "algorithmic", fallbackReason };
    }

    try {
      const { route, matches } = await this.buildWithOracle(userId, options, "hybrid");
      const optimized = await this.assembler.reoptimize(route.id, options.start);
      return { route: optimized, mode: "hybrid", matches };
    } catch (error) {
      if (!(error instanceof UpstreamOracleError || error instanceof MatchExhaustionError)) {
        throw error;
      }
      console.warn(`[Generator] ⚠️ hybrid: ${error.message}, falling back to algorithmic`);
      return {
        route: await this.buildAlgorithmic(userId, options, "hybrid"),
        mode: "algorithmic",
        fallbackReason: error.message,
      };
    }
  }

  private async buildAlgorithmic(
    userId: string,
    options: GenerateRouteOptions,
    generatorType: GeneratorType,
  ): Promise<RouteWithStops> {
    const selection = await this.selector.select(userId, options);
    return this.assembler.buildFromSelection(userId, selection, {
      name: options.routeName,
      description: options.routeDescription,
      generatorType,
    });
  }

  private async buildWithOracle(
    userId: string,
    options: GenerateRouteOptions,
    generatorType: GeneratorType,
  ): Promise<{ route: RouteWithStops; matches: ReconcileResult[] }> {
    if (!this.suggester) {
      throw new UpstreamOracleError("No itinerary oracle configured");
    }

    const constraints = await this.selector.resolveConstraints(userId, options);
    const [catalog, categories] = await Promise.all([
      this.storage.queryAttractions({
        activeOnly: true,
        categoryIds: constraints.categoryIds.length > 0 ? constraints.categoryIds : undefined,
      }),
      this.storage.getCategories(),
    ]);

    const suggestion = await this.suggester.suggest({
      durationHours: constraints.durationHours,
      interests: constraints.interests,
      maxBudget: constraints.maxBudget,
      routeName: options.routeName,
      routeDescription: options.routeDescription,
      catalog: catalog.slice(0, SUGGESTION_CATALOG_SIZE),
      categories,
    });

    return this.assembler.reconcileAndBuild(userId, suggestion.stops, constraints.durationHours, {
      name: options.routeName?.trim() || suggestion.name,
      description: options.routeDescription?.trim() || suggestion.description,
      generatorType,
      budget: constraints.maxBudget,
    });
  }

  private async requireUser(userId: string): Promise<void> {
    const user = await this.storage.getUser(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
  }
}
