import OpenAI from "openai";
import type { CompletionOptions, ItineraryOracle } from "./types";

const SYSTEM_PROMPT =
  "You are a local travel guide who plans walking routes. Answer with a single JSON object and nothing else.";

interface ChatCompletionsOracleOptions {
  name: string;
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint, e.g. https://api.perplexity.ai */
  baseURL?: string;
}

/** Any OpenAI-compatible chat completions API (OpenAI, Perplexity). */
export class ChatCompletionsOracle implements ItineraryOracle {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: ChatCompletionsOracleOptions) {
    this.name = options.name;
    this.model = options.model;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(prompt: string, { temperature, maxOutputTokens, signal }: CompletionOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature,
        max_tokens: maxOutputTokens,
      },
      { signal },
    );
    return response.choices[0]?.message?.content ?? "";
  }
}
