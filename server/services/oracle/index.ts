import type { OracleConfig } from "../../config/env";
import { ChatCompletionsOracle } from "./chat-completions-oracle";
import { GeminiItineraryOracle } from "./gemini-oracle";
import type { ItineraryOracle } from "./types";

export { ItinerarySuggester, type SuggesterOptions } from "./itinerary-suggester";
export { parseSuggestion, parseStops } from "./suggestion-parser";
export type { ItineraryOracle, ItinerarySuggestion, SuggestionRequest, CompletionOptions } from "./types";

/** Oracle for the configured provider, or null when its API key is missing. */
export function createItineraryOracle(config: OracleConfig): ItineraryOracle | null {
  if (!config.apiKey) {
    console.warn(`[Oracle] ⚠️ No API key for "${config.provider}", LLM routes disabled (hybrid falls back to algorithmic)`);
    return null;
  }

  switch (config.provider) {
    case "gemini":
      return new GeminiItineraryOracle({ apiKey: config.apiKey, model: config.model });
    case "openai":
    case "perplexity":
      return new ChatCompletionsOracle({
        name: config.provider,
        apiKey: config.apiKey,
        model: config.model,
        baseURL: config.baseURL,
      });
  }
}
