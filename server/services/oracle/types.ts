import type { Attraction, SuggestedStop } from "@shared/models";
import type { Category } from "@shared/schema";

export interface CompletionOptions {
  temperature: number;
  maxOutputTokens: number;
  signal?: AbortSignal;
}

/** A text-completion backend: prompt in, raw text out. */
export interface ItineraryOracle {
  readonly name: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface ItinerarySuggestion {
  name: string;
  description: string;
  stops: SuggestedStop[];
}

export interface SuggestionRequest {
  durationHours: number;
  interests: string[];
  /** 0 = no limit */
  maxBudget: number;
  routeName?: string;
  routeDescription?: string;
  /** Catalog sample shown to the oracle as preferred options */
  catalog: Attraction[];
  categories: Category[];
}
