import type { GeoPoint } from "@shared/models";
import { haversineKm } from "./geo";

export interface SequencedTour<T extends GeoPoint> {
  ordered: T[];
  totalDistanceKm: number;
}

/**
 * Index of the candidate nearest to `from`.
 * Strict comparison: on equal distances the earlier candidate wins.
 */
export function nearestIndex<T extends GeoPoint>(from: GeoPoint, candidates: readonly T[]): number {
  let nearest = -1;
  let nearestDistance = Infinity;

  for (let i = 0; i < candidates.length; i++) {
    const distance = haversineKm(from, candidates[i]);
    if (distance < nearestDistance) {
      nearestDistance = distance;
      nearest = i;
    }
  }

  return nearest;
}

/** Sum of the legs between consecutive points; 0 for fewer than two points. */
export function tourDistanceKm(points: readonly GeoPoint[]): number {
  let total = 0;
  for (let i = 0; i < points.length - 1; i++) {
    total += haversineKm(points[i], points[i + 1]);
  }
  return total;
}

export class RouteOptimizer {
  /**
   * Nearest-neighbor tour.
   * The first stop is the point nearest to `start` when one is given, otherwise the first input point
   * (callers pass rating-sorted lists, so that is the best rated one).
   */
  sequence<T extends GeoPoint>(points: readonly T[], start?: GeoPoint): SequencedTour<T> {
    if (points.length === 0) {
      return { ordered: [], totalDistanceKm: 0 };
    }

    const remaining = [...points];
    const firstIndex = start ? nearestIndex(start, remaining) : 0;
    const [first] = remaining.splice(firstIndex, 1);
    const ordered: T[] = [first];

    while (remaining.length > 0) {
      const current = ordered[ordered.length - 1];
      const next = nearestIndex(current, remaining);
      ordered.push(remaining[next]);
      remaining.splice(next, 1);
    }

    return { ordered, totalDistanceKm: tourDistanceKm(ordered) };
  }

  formatDistance(km: number): string {
    if (km >= 1) {
      return `${km.toFixed(1)}km`;
    }
    return `${Math.round(km * 1000)}m`;
  }
}

export const routeOptimizer = new RouteOptimizer();
