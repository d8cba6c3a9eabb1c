import { z } from "zod";
import type { SuggestedStop } from "@shared/models";
import { safeNumber, safeParseJSON, safeString } from "../json-utils";
import { isValidCoordinate } from "../geo";
import type { ItinerarySuggestion } from "./types";

// Field-level failures fall back to undefined instead of rejecting the whole stop
const looseNumber = z.unknown().transform((value) => safeNumber(value));
const looseText = z.unknown().transform((value) => safeString(value, 1000));

const rawStopSchema = z.object({
  name: z.string().trim().min(1),
  order: looseNumber,
  visit_duration: looseNumber,
  visitDuration: looseNumber,
  latitude: looseNumber,
  longitude: looseNumber,
  description: looseText,
  address: looseText,
});

const rawSuggestionSchema = z.object({
  name: looseText,
  description: looseText,
  attractions: z.array(z.unknown()).catch([]),
});

type RawStop = z.infer<typeof rawStopSchema>;

function toSuggestedStop(raw: RawStop): SuggestedStop {
  const stop: SuggestedStop = { name: raw.name };

  if (raw.latitude !== undefined && raw.longitude !== undefined &&
      isValidCoordinate(raw.latitude, raw.longitude)) {
    stop.latitude = raw.latitude;
    stop.longitude = raw.longitude;
  }

  const duration = raw.visit_duration ?? raw.visitDuration;
  if (duration !== undefined && duration > 0) {
    stop.visitDuration = Math.round(duration);
  }
  if (raw.description) stop.description = raw.description;
  if (raw.address) stop.address = raw.address;
  return stop;
}

/** Parses a list of stops; items without a usable name are dropped. */
export function parseStops(items: readonly unknown[]): SuggestedStop[] {
  const parsed = items.flatMap((item, index) => {
    const result = rawStopSchema.safeParse(item);
    return result.success ? [{ raw: result.data, rank: result.data.order ?? index + 1, index }] : [];
  });

  // Stable by the oracle's own "order" field, falling back to list position
  parsed.sort((a, b) => a.rank - b.rank || a.index - b.index);
  return parsed.map(({ raw }) => toSuggestedStop(raw));
}

/**
 * Oracle text → suggestion. Returns null when the text holds no JSON object.
 * An object with no usable stops yields an empty `stops` list.
 */
export function parseSuggestion(text: string, source = "Oracle"): ItinerarySuggestion | null {
  const json = safeParseJSON(text, source);
  // A bare list of stops is accepted as well
  const result = rawSuggestionSchema.safeParse(Array.isArray(json) ? { attractions: json } : json);
  if (!result.success) {
    return null;
  }

  return {
    name: result.data.name ?? "Generated route",
    description: result.data.description ?? "",
    stops: parseStops(result.data.attractions),
  };
}
