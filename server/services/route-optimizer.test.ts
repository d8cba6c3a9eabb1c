import { describe, expect, it } from "vitest";
import { haversineKm } from "./geo";
import { nearestIndex, RouteOptimizer, tourDistanceKm } from "./route-optimizer";

const point = (id: string, latitude: number, longitude: number) => ({ id, latitude, longitude });

// Along one meridian, so distances order the same way as latitude gaps
const line = [
  point("p3", 0.03, 0),
  point("p0", 0.0, 0),
  point("p1", 0.01, 0),
  point("p5", 0.05, 0),
  point("p2", 0.02, 0),
];

describe("nearestIndex", () => {
  it("returns -1 for no candidates", () => {
    expect(nearestIndex({ latitude: 0, longitude: 0 }, [])).toBe(-1);
  });

  it("keeps the earlier candidate on equal distances", () => {
    const candidates = [point("north", 0.01, 0), point("south", -0.01, 0)];
    expect(nearestIndex({ latitude: 0, longitude: 0 }, candidates)).toBe(0);
  });
});

describe("RouteOptimizer.sequence", () => {
  const optimizer = new RouteOptimizer();

  it("returns an empty tour for no points", () => {
    expect(optimizer.sequence([])).toEqual({ ordered: [], totalDistanceKm: 0 });
  });

  it("starts from the first point and walks to the nearest unvisited one", () => {
    const tour = optimizer.sequence(line);
    expect(tour.ordered.map((p) => p.id)).toEqual(["p3", "p2", "p1", "p0", "p5"]);
  });

  it("starts from the point nearest to the start location", () => {
    const tour = optimizer.sequence(line, { latitude: -0.5, longitude: 0 });
    expect(tour.ordered.map((p) => p.id)).toEqual(["p0", "p1", "p2", "p3", "p5"]);
  });

  it("returns a permutation of the input", () => {
    const tour = optimizer.sequence(line);
    expect([...tour.ordered].sort((a, b) => a.id.localeCompare(b.id))).toEqual(
      [...line].sort((a, b) => a.id.localeCompare(b.id)),
    );
  });

  it("reports the sum of consecutive legs, excluding the start location", () => {
    const start = { latitude: -0.5, longitude: 0 };
    const tour = optimizer.sequence(line, start);
    const legs = tour.ordered.slice(1).reduce((sum, p, i) => sum + haversineKm(tour.ordered[i], p), 0);
    expect(tour.totalDistanceKm).toBe(legs);
    expect(tour.totalDistanceKm).toBe(tourDistanceKm(tour.ordered));
  });

  it("gives the same tour for the same input", () => {
    expect(optimizer.sequence(line)).toEqual(optimizer.sequence(line));
  });
});

describe("RouteOptimizer.formatDistance", () => {
  const optimizer = new RouteOptimizer();

  it("uses meters below one kilometer", () => {
    expect(optimizer.formatDistance(0.4567)).toBe("457m");
  });

  it("uses kilometers with one decimal otherwise", () => {
    expect(optimizer.formatDistance(4.66)).toBe("4.7km");
  });
});
