import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Attraction } from "@shared/models";
import type { ItinerarySuggestion, SuggestionRequest } from "./types";

// ===== Place type table (server/config/place-types.json) =====

const placeTypeTableSchema = z.object({
  types: z.record(z.object({
    label: z.string(),
    keywords: z.array(z.string()),
  })),
  dayParts: z.array(z.object({
    label: z.string(),
    types: z.array(z.string()),
  })),
  defaultTypes: z.array(z.string()).min(1),
});

export type PlaceTypeTable = z.infer<typeof placeTypeTableSchema>;

const PLACE_TYPES_PATH = path.join(process.cwd(), "server", "config", "place-types.json");

let cachedTable: PlaceTypeTable | null = null;

export function loadPlaceTypes(filePath: string = PLACE_TYPES_PATH): PlaceTypeTable {
  if (filePath === PLACE_TYPES_PATH && cachedTable) return cachedTable;
  const table = placeTypeTableSchema.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
  if (filePath === PLACE_TYPES_PATH) cachedTable = table;
  return table;
}

/** Place types whose keywords occur in the text, in table order; the default set when none do. */
export function detectPlaceTypes(text: string, table: PlaceTypeTable): string[] {
  const lower = text.toLowerCase();
  const found = Object.entries(table.types)
    .filter(([, type]) => type.keywords.some((keyword) => lower.includes(keyword)))
    .map(([key]) => key);
  return found.length > 0 ? found : table.defaultTypes;
}

// ===== Prompts =====

const MAX_CATALOG_LINES = 50;

function catalogLines(request: SuggestionRequest): string {
  const categoryNames = new Map(request.categories.map((c) => [c.id, c.name]));
  return request.catalog.slice(0, MAX_CATALOG_LINES).map((a) => {
    const category = a.categoryId !== null ? categoryNames.get(a.categoryId) : undefined;
    const price = a.isFree ? "free" : `${a.price}`;
    return `- ${a.name}${category ? ` (${category})` : ""}, ${a.visitDuration} min, ${price}, ` +
      `${a.latitude.toFixed(4)},${a.longitude.toFixed(4)}`;
  }).join("\n");
}

function themeSection(request: SuggestionRequest, table: PlaceTypeTable): string {
  const themeText = [request.routeName, request.routeDescription, ...request.interests].filter(Boolean).join(" ");
  if (!themeText) return "";

  const wanted = detectPlaceTypes(themeText, table);
  const label = (key: string) => table.types[key]?.label ?? key;
  const schedule = table.dayParts
    .map((part) => {
      const types = part.types.filter((t) => wanted.includes(t));
      return types.length > 0 ? `- ${part.label}: ${types.map(label).join(", ")}` : null;
    })
    .filter((line): line is string => line !== null);

  return [
    `The route theme asks for: ${wanted.map(label).join(", ")}.`,
    "Only include places of these kinds, spread over the day like this:",
    ...schedule,
  ].join("\n");
}

const RESPONSE_FORMAT = `{"name": "Route name", "description": "2-3 sentences about the route", "attractions": [{"name": "Exact place name", "order": 1, "visit_duration": 60, "latitude": 55.7987, "longitude": 49.1055, "description": "Why it is worth a visit", "address": "Street, building"}]}`;

export function buildItineraryPrompt(request: SuggestionRequest, cityName: string, table: PlaceTypeTable): string {
  const sections = [
    `Plan a walking tourist route in ${cityName} lasting ${request.durationHours} hours.`,
    request.routeName ? `Route name: "${request.routeName}" (keep it or use a close variant).` : "",
    request.routeDescription ? `What the traveller wants: ${request.routeDescription}` : "",
    `Interests: ${request.interests.length > 0 ? request.interests.join(", ") : "not specified"}.`,
    request.maxBudget > 0 ? `Total entrance budget: ${request.maxBudget}.` : "No budget limit.",
    themeSection(request, table),
    request.catalog.length > 0
      ? `Known places (prefer these, use their exact names):\n${catalogLines(request)}`
      : "",
    `Pick 4-8 real places in ${cityName} in a sensible walking order. ` +
      "Visit durations plus walking time must fit the route length. Give coordinates for every place.",
    `Respond ONLY with JSON in this format, no markdown:\n${RESPONSE_FORMAT}`,
  ];
  return sections.filter(Boolean).join("\n\n");
}

/** Second pass: recover structured stops from a prose-only answer. */
export function buildExtractionPrompt(
  suggestion: ItinerarySuggestion,
  cityName: string,
  knownPlaces: readonly Attraction[],
): string {
  const known = knownPlaces.slice(0, 30).map((a) => a.name).join(", ");
  return [
    `Extract every concrete place in ${cityName} mentioned in this route description:`,
    `"""${suggestion.description}"""`,
    known ? `Known places, use these names when they match: ${known}` : "",
    "Respond ONLY with JSON, no markdown:",
    `{"attractions": [{"name": "Place name", "order": 1, "visit_duration": 60, "latitude": 55.7987, "longitude": 49.1055}]}`,
  ].filter(Boolean).join("\n\n");
}
