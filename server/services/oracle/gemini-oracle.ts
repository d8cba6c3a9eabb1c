import { GoogleGenAI } from "@google/genai";
import type { CompletionOptions, ItineraryOracle } from "./types";

export class GeminiItineraryOracle implements ItineraryOracle {
  readonly name = "gemini";
  private ai: GoogleGenAI | null = null;

  constructor(private readonly options: { apiKey: string; model: string }) {}

  private getAI(): GoogleGenAI {
    if (!this.ai) {
      this.ai = new GoogleGenAI({ apiKey: this.options.apiKey });
    }
    return this.ai;
  }

  async complete(prompt: string, { temperature, maxOutputTokens, signal }: CompletionOptions): Promise<string> {
    const response = await this.getAI().models.generateContent({
      model: this.options.model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      config: {
        temperature,
        maxOutputTokens,
        abortSignal: signal,
      },
    });
    return response.text || "";
  }
}
