import type { Attraction, GeoPoint } from "@shared/models";
import type { IStorage } from "../storage";
import type { RoutingConfig } from "../config/env";
import { haversineKm } from "./geo";
import { nearestIndex, tourDistanceKm } from "./route-optimizer";
import { ConstraintInfeasibleError, NoCandidatesError } from "./errors";

export interface SelectionConstraints {
  durationHours?: number;
  categoryIds?: number[];
  /** 0 means unconstrained; omitted falls back to the stored preference. */
  maxBudget?: number;
  /** Advisory only: forwarded to the oracle prompt, never used as a filter. */
  interests?: string[];
  start?: GeoPoint;
}

export interface ResolvedConstraints {
  durationHours: number;
  categoryIds: number[];
  maxBudget: number;
  interests: string[];
  start?: GeoPoint;
}

export interface Selection {
  stops: Attraction[];
  totalMinutes: number;
  totalCost: number;
  totalDistanceKm: number;
  constraints: ResolvedConstraints;
}

export const toCents = (amount: number) => Math.round(amount * 100);

/** Free attractions cost nothing whatever their stored price. */
export function attractionCostCents(attraction: Attraction): number {
  return attraction.isFree ? 0 : toCents(attraction.price);
}

export class RouteSelector {
  constructor(
    private readonly storage: IStorage,
    private readonly config: RoutingConfig,
  ) {}

  /** Request value → stored user preference → system default. */
  async resolveConstraints(userId: string, constraints: SelectionConstraints): Promise<ResolvedConstraints> {
    const preference = await this.storage.getUserPreference(userId);

    const durationHours = constraints.durationHours
      ?? (preference ? Math.max(1, Math.floor(preference.preferredDurationMax / 60)) : this.config.defaultDurationHours);

    const categoryIds = constraints.categoryIds && constraints.categoryIds.length > 0
      ? constraints.categoryIds
      : preference?.preferredCategoryIds ?? [];

    const interests = constraints.interests && constraints.interests.length > 0
      ? constraints.interests
      : preference?.interests ?? [];

    return {
      durationHours,
      categoryIds,
      maxBudget: constraints.maxBudget ?? preference?.maxBudget ?? 0,
      interests,
      start: constraints.start,
    };
  }

  async select(userId: string, constraints: SelectionConstraints): Promise<Selection> {
    const resolved = await this.resolveConstraints(userId, constraints);
    const budgetMinutes = resolved.durationHours * 60;
    const budgetCents = toCents(resolved.maxBudget);
    const moneyConstrained = budgetCents > 0;

    const candidates = await this.storage.queryAttractions({
      activeOnly: true,
      categoryIds: resolved.categoryIds.length > 0 ? resolved.categoryIds : undefined,
      maxPrice: moneyConstrained ? resolved.maxBudget : undefined,
    });

    if (candidates.length === 0) {
      throw new NoCandidatesError();
    }

    // Seed: nearest to the start point, else the best rated (candidates arrive rating-sorted)
    const remaining = [...candidates];
    const seedIndex = resolved.start ? nearestIndex(resolved.start, remaining) : 0;
    const [seed] = remaining.splice(seedIndex, 1);

    let totalMinutes = seed.visitDuration;
    let totalCents = attractionCostCents(seed);

    if (totalMinutes > budgetMinutes || (moneyConstrained && totalCents > budgetCents)) {
      const message = `Seed stop "${seed.name}" alone needs ${totalMinutes} min / ${totalCents / 100}, ` +
        `budget is ${budgetMinutes} min / ${moneyConstrained ? resolved.maxBudget : "unlimited"}`;
      if (this.config.seedPolicy === "reject") {
        throw new ConstraintInfeasibleError(message);
      }
      console.warn(`[Selector] ⚠️ ${message}; keeping it as a single-stop route`);
    }

    const stops: Attraction[] = [seed];
    const minutesPerKm = this.config.travelMinutesPerKm;

    while (remaining.length > 0) {
      const current = stops[stops.length - 1];
      const feasible = remaining.filter((candidate) => {
        const travelMinutes = haversineKm(current, candidate) * minutesPerKm;
        const fitsTime = totalMinutes + travelMinutes + candidate.visitDuration <= budgetMinutes;
        const fitsMoney = !moneyConstrained || totalCents + attractionCostCents(candidate) <= budgetCents;
        return fitsTime && fitsMoney;
      });

      if (feasible.length === 0) break;

      const next = feasible[nearestIndex(current, feasible)];
      totalMinutes += haversineKm(current, next) * minutesPerKm + next.visitDuration;
      totalCents += attractionCostCents(next);
      stops.push(next);
      remaining.splice(remaining.indexOf(next), 1);
    }

    const totalDistanceKm = tourDistanceKm(stops);
    console.log(
      `[Selector] ✅ ${stops.length}/${candidates.length} places, ` +
      `${Math.round(totalMinutes)}/${budgetMinutes} min, cost ${totalCents / 100}, ${totalDistanceKm.toFixed(2)} km`,
    );

    return {
      stops,
      totalMinutes,
      totalCost: totalCents / 100,
      totalDistanceKm,
      constraints: resolved,
    };
  }
}
