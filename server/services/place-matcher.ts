/**
 * Place Matcher
 *
 * Binds free-text place names (oracle output or client input) to catalog attractions.
 *
 * Matching order, first hit wins:
 * 1. exact name (case-insensitive)
 * 2. containment: shorter/longer when one name contains the other, accepted above 0.5
 * 3. keyword: first token of the suggestion (> 3 chars) found among catalog name tokens
 * 4. materialize a new attraction when the suggestion carries coordinates
 * 5. discard (logged)
 */

import type { Attraction, SuggestedStop } from "@shared/models";
import type { IStorage } from "../storage";
import { isValidCoordinate } from "./geo";
import { SlugExhaustionError } from "./errors";

// ===================================================================
// Types
// ===================================================================

export type MatchStrategy = "exact" | "fuzzy" | "keyword" | "materialized" | "discarded";

export interface CatalogIndex {
  /** Catalog entries in id order */
  entries: Attraction[];
  byName: Map<string, Attraction>;
  byKeyword: Map<string, Attraction[]>;
}

export interface NameMatch {
  attraction: Attraction;
  strategy: "exact" | "fuzzy" | "keyword";
  score: number;
}

export type ReconcileResult =
  | { suggestion: SuggestedStop; strategy: Exclude<MatchStrategy, "discarded">; attraction: Attraction }
  | { suggestion: SuggestedStop; strategy: "discarded"; reason: string };

export const FUZZY_THRESHOLD = 0.5;
export const MAX_SLUG_ATTEMPTS = 100;
const MAX_SLUG_LENGTH = 180;

// ===================================================================
// Index + name matching
// ===================================================================

const normalizeName = (name: string) => name.trim().toLowerCase();

export function keywordTokens(name: string): string[] {
  return normalizeName(name).split(/\s+/).filter((token) => token.length > 3);
}

/** shorter/longer when one string contains the other, else 0 */
export function containmentScore(a: string, b: string): number {
  if (!a || !b) return 0;
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  return longer.includes(shorter) ? shorter.length / longer.length : 0;
}

export function buildCatalogIndex(catalog: readonly Attraction[]): CatalogIndex {
  const entries = [...catalog].sort((a, b) => a.id - b.id);
  const byName = new Map<string, Attraction>();
  const byKeyword = new Map<string, Attraction[]>();

  for (const attraction of entries) {
    addToIndex(byName, byKeyword, attraction);
  }
  return { entries, byName, byKeyword };
}

function addToIndex(
  byName: Map<string, Attraction>,
  byKeyword: Map<string, Attraction[]>,
  attraction: Attraction,
): void {
  const key = normalizeName(attraction.name);
  if (!byName.has(key)) byName.set(key, attraction);

  for (const token of keywordTokens(attraction.name)) {
    const bucket = byKeyword.get(token);
    if (!bucket) {
      byKeyword.set(token, [attraction]);
    } else if (!bucket.includes(attraction)) {
      bucket.push(attraction);
    }
  }
}

export function matchName(name: string, index: CatalogIndex): NameMatch | undefined {
  const target = normalizeName(name);
  if (!target) return undefined;

  const exact = index.byName.get(target);
  if (exact) return { attraction: exact, strategy: "exact", score: 1 };

  let best: NameMatch | undefined;
  for (const [catalogName, attraction] of index.byName) {
    const score = containmentScore(target, catalogName);
    if (score > FUZZY_THRESHOLD && (!best || score > best.score)) {
      best = { attraction, strategy: "fuzzy", score };
    }
  }
  if (best) return best;

  for (const token of keywordTokens(target)) {
    const bucket = index.byKeyword.get(token);
    if (bucket && bucket.length > 0) {
      return { attraction: bucket[0], strategy: "keyword", score: 0 };
    }
  }
  return undefined;
}

// ===================================================================
// Slugs
// ===================================================================

export function slugify(value: string): string {
  const slug = value
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/^-+|-+$/g, "");
  return slug || "place";
}

// ===================================================================
// Reconciliation
// ===================================================================

interface PlaceMatcherOptions {
  cityName: string;
}

type LocatedSuggestion = SuggestedStop & { latitude: number; longitude: number };

function hasCoordinates(suggestion: SuggestedStop): suggestion is LocatedSuggestion {
  return suggestion.latitude !== undefined && suggestion.longitude !== undefined &&
    isValidCoordinate(suggestion.latitude, suggestion.longitude);
}

export class PlaceMatcher {
  constructor(
    private readonly storage: IStorage,
    private readonly options: PlaceMatcherOptions,
  ) {}

  async reconcile(suggestions: readonly SuggestedStop[]): Promise<ReconcileResult[]> {
    const catalog = await this.storage.queryAttractions({ activeOnly: true });
    const index = buildCatalogIndex(catalog);
    const results: ReconcileResult[] = [];

    for (const suggestion of suggestions) {
      const name = suggestion.name.trim();
      if (!name) {
        results.push({ suggestion, strategy: "discarded", reason: "empty name" });
        continue;
      }

      const match = matchName(name, index);
      if (match) {
        if (match.strategy !== "exact") {
          console.log(`[Matcher] ${match.strategy}: "${name}" → "${match.attraction.name}"`);
        }
        results.push({ suggestion, strategy: match.strategy, attraction: match.attraction });
        continue;
      }

      if (!hasCoordinates(suggestion)) {
        console.warn(`[Matcher] ⚠️ "${name}" not in catalog and has no coordinates, skipped`);
        results.push({ suggestion, strategy: "discarded", reason: "no catalog match and no coordinates" });
        continue;
      }

      const created = await this.materialize({ ...suggestion, name });
      // Later suggestions in the same batch resolve to the new entry instead of materializing again
      index.entries.push(created);
      addToIndex(index.byName, index.byKeyword, created);
      results.push({ suggestion, strategy: "materialized", attraction: created });
    }

    const counts = results.reduce<Record<string, number>>((acc, r) => {
      acc[r.strategy] = (acc[r.strategy] ?? 0) + 1;
      return acc;
    }, {});
    console.log(`[Matcher] ✅ ${suggestions.length} names reconciled:`, counts);
    return results;
  }

  /** Inserts a new catalog entry under the first free slug among base, base-1, base-2… */
  async materialize(suggestion: LocatedSuggestion): Promise<Attraction> {
    const name = suggestion.name.trim();
    const baseSlug = slugify(name);
    const [firstCategory] = await this.storage.getCategories();
    const description = suggestion.description?.trim() || `${name}, ${this.options.cityName}`;

    for (let attempt = 0; attempt < MAX_SLUG_ATTEMPTS; attempt++) {
      const slug = attempt === 0 ? baseSlug : `${baseSlug}-${attempt}`;
      const created = await this.storage.insertAttractionIfSlugFree({
        name,
        slug,
        description,
        shortDescription: description.slice(0, 200),
        latitude: suggestion.latitude,
        longitude: suggestion.longitude,
        address: suggestion.address?.trim() || null,
        categoryId: firstCategory?.id ?? null,
        visitDuration: suggestion.visitDuration ?? 60,
        price: 0,
        isFree: true,
        isActive: true,
      });
      if (created) {
        console.log(`[Matcher] ➕ new attraction "${name}" (${slug})`);
        return created;
      }
    }
    throw new SlugExhaustionError(baseSlug, MAX_SLUG_ATTEMPTS);
  }
}
