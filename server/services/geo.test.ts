import { describe, expect, it } from "vitest";
import { haversineKm, isValidCoordinate, roundTo } from "./geo";

describe("haversineKm", () => {
  it("is zero for the same point", () => {
    expect(haversineKm({ latitude: 55.8, longitude: 49.1 }, { latitude: 55.8, longitude: 49.1 })).toBe(0);
  });

  it("measures one degree of latitude as R·π/180", () => {
    const km = haversineKm({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });
    expect(km).toBeCloseTo(6371 * Math.PI / 180, 6);
  });

  it("is symmetric", () => {
    const a = { latitude: 55.7987, longitude: 49.1055 };
    const b = { latitude: 55.79, longitude: 49.114 };
    expect(haversineKm(a, b)).toBeCloseTo(haversineKm(b, a), 12);
  });

  it("shrinks longitude legs away from the equator", () => {
    const atEquator = haversineKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 });
    const atKazan = haversineKm({ latitude: 55.8, longitude: 49 }, { latitude: 55.8, longitude: 50 });
    expect(atKazan).toBeLessThan(atEquator * 0.6);
  });
});

describe("isValidCoordinate", () => {
  it("accepts the boundaries", () => {
    expect(isValidCoordinate(90, 180)).toBe(true);
    expect(isValidCoordinate(-90, -180)).toBe(true);
  });

  it("rejects out-of-range and non-finite values", () => {
    expect(isValidCoordinate(91, 0)).toBe(false);
    expect(isValidCoordinate(0, -181)).toBe(false);
    expect(isValidCoordinate(Number.NaN, 0)).toBe(false);
  });
});

describe("roundTo", () => {
  it("rounds to the given digits", () => {
    expect(roundTo(4.6789, 2)).toBe(4.68);
    expect(roundTo(1.5, 0)).toBe(2);
  });
});
