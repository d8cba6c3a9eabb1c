import { UpstreamOracleError } from "../errors";
import { buildExtractionPrompt, buildItineraryPrompt, loadPlaceTypes, type PlaceTypeTable } from "./prompts";
import { parseSuggestion } from "./suggestion-parser";
import type { CompletionOptions, ItineraryOracle, ItinerarySuggestion, SuggestionRequest } from "./types";

export interface SuggesterOptions {
  cityName: string;
  timeoutMs: number;
  /** Total calls per request, first one included */
  maxAttempts: number;
}

const ITINERARY_CALL = { temperature: 0.7, maxOutputTokens: 4096 } satisfies CompletionOptions;
const EXTRACTION_CALL = { temperature: 0.2, maxOutputTokens: 2048 } satisfies CompletionOptions;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Asks the oracle for an itinerary and turns the answer into suggested stops.
 * Timeouts, transport errors and unparseable answers are retried up to `maxAttempts`,
 * then surface as UpstreamOracleError.
 */
export class ItinerarySuggester {
  private readonly placeTypes: PlaceTypeTable;

  constructor(
    private readonly oracle: ItineraryOracle,
    private readonly options: SuggesterOptions,
    placeTypes?: PlaceTypeTable,
  ) {
    this.placeTypes = placeTypes ?? loadPlaceTypes();
  }

  async suggest(request: SuggestionRequest): Promise<ItinerarySuggestion> {
    const prompt = buildItineraryPrompt(request, this.options.cityName, this.placeTypes);
    const started = Date.now();
    console.log(`[Suggester] 🤖 ${this.oracle.name}: ${request.durationHours}h route, prompt ${prompt.length} chars`);

    let lastError: unknown;
    let suggestion: ItinerarySuggestion | null = null;

    for (let attempt = 1; attempt <= this.options.maxAttempts && !suggestion; attempt++) {
      try {
        const text = await this.callWithTimeout(prompt, ITINERARY_CALL);
        suggestion = parseSuggestion(text, "Suggester");
        if (!suggestion) {
          lastError = new Error("response contained no JSON object");
        }
      } catch (error) {
        lastError = error;
      }
      if (!suggestion) {
        console.warn(`[Suggester] ⚠️ attempt ${attempt}/${this.options.maxAttempts} failed: ${errorMessage(lastError)}`);
      }
    }

    if (!suggestion) {
      throw new UpstreamOracleError(
        `Itinerary oracle "${this.oracle.name}" failed after ${this.options.maxAttempts} attempt(s): ${errorMessage(lastError)}`,
        lastError,
      );
    }

    if (suggestion.stops.length === 0 && suggestion.description) {
      suggestion = { ...suggestion, stops: await this.extractStops(suggestion, request) };
    }

    console.log(`[Suggester] ✅ ${suggestion.stops.length} places suggested (${Date.now() - started}ms)`);
    return suggestion;
  }

  // Best effort: a failed extraction leaves the stop list empty and the caller decides
  private async extractStops(suggestion: ItinerarySuggestion, request: SuggestionRequest) {
    console.log("[Suggester] 🔍 no structured stops, extracting from description...");
    try {
      const text = await this.callWithTimeout(
        buildExtractionPrompt(suggestion, this.options.cityName, request.catalog),
        EXTRACTION_CALL,
      );
      return parseSuggestion(text, "Suggester:extract")?.stops ?? [];
    } catch (error) {
      console.error(`[Suggester] ❌ extraction failed: ${errorMessage(error)}`);
      return [];
    }
  }

  private async callWithTimeout(prompt: string, options: CompletionOptions): Promise<string> {
    const controller = new AbortController();
    const { timeoutMs } = this.options;
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new Error(`timed out after ${timeoutMs}ms`)),
        { once: true },
      );
    });

    try {
      return await Promise.race([
        this.oracle.complete(prompt, { ...options, signal: controller.signal }),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
