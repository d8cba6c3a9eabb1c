import { describe, expect, it } from "vitest";
import { parseSuggestion, parseStops } from "./suggestion-parser";
import { repairTruncatedJSON, safeNumber } from "../json-utils";

describe("parseSuggestion", () => {
  it("reads JSON wrapped in a markdown fence", () => {
    const text = [
      "Here is your route:",
      "```json",
      JSON.stringify({
        name: "Old Kazan",
        description: "A walk through the old town.",
        attractions: [
          { name: "Казанский Кремль", order: 1, visit_duration: 90, latitude: 55.7987, longitude: 49.1055 },
          { name: "Улица Баумана", order: 2, visit_duration: "45", address: "ул. Баумана" },
        ],
      }),
      "```",
    ].join("\n");

    expect(parseSuggestion(text)).toEqual({
      name: "Old Kazan",
      description: "A walk through the old town.",
      stops: [
        { name: "Казанский Кремль", latitude: 55.7987, longitude: 49.1055, visitDuration: 90 },
        { name: "Улица Баумана", visitDuration: 45, address: "ул. Баумана" },
      ],
    });
  });

  it("returns null when there is no JSON", () => {
    expect(parseSuggestion("Sorry, I cannot help with that.")).toBeNull();
  });

  it("fills in a default name and accepts a bare list of stops", () => {
    expect(parseSuggestion(`[{"name": "Озеро Кабан"}]`)).toEqual({
      name: "Generated route",
      description: "",
      stops: [{ name: "Озеро Кабан" }],
    });
  });

  it("keeps the complete stops of a truncated answer", () => {
    const text = `{"name":"Walk","description":"d","attractions":[{"name":"A","latitude":55.8,"longitude":49.1},{"name":"B","lat`;
    expect(parseSuggestion(text)?.stops).toEqual([{ name: "A", latitude: 55.8, longitude: 49.1 }]);
  });
});

describe("parseStops", () => {
  it("drops entries without a name", () => {
    expect(parseStops([{ name: "" }, { latitude: 55.8 }, "Кремль", { name: "Кремль" }])).toEqual([{ name: "Кремль" }]);
  });

  it("drops out-of-range coordinates and non-positive durations", () => {
    expect(parseStops([{ name: "X", latitude: 95, longitude: 49.1, visit_duration: 0 }])).toEqual([{ name: "X" }]);
    expect(parseStops([{ name: "Y", latitude: 55.8, visitDuration: -10 }])).toEqual([{ name: "Y" }]);
  });

  it("orders by the order field, then by list position", () => {
    const stops = parseStops([
      { name: "third", order: 3 },
      { name: "first", order: 1 },
      { name: "unordered" },
      { name: "second", order: "2" },
    ]);
    expect(stops.map((s) => s.name)).toEqual(["first", "second", "third", "unordered"]);
  });
});

describe("json helpers", () => {
  it("repairs a truncated top-level array", () => {
    expect(repairTruncatedJSON(`[{"name":"A"},{"name":"B"},{"na`)).toEqual([{ name: "A" }, { name: "B" }]);
  });

  it("returns null when no element is complete", () => {
    expect(repairTruncatedJSON(`{"attractions":[{"name":"A`)).toBeNull();
  });

  it("parses numbers leniently", () => {
    expect(safeNumber("55,79")).toBe(55.79);
    expect(safeNumber("abc")).toBeUndefined();
    expect(safeNumber(7, 0, 5)).toBe(5);
    expect(safeNumber(null)).toBeUndefined();
  });
});
