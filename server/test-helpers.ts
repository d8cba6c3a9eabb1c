import type { Attraction } from "@shared/models";
import type { User } from "@shared/schema";
import type { RoutingConfig } from "./config/env";
import type { IStorage } from "./storage";
import { slugify } from "./services/place-matcher";
import type { CompletionOptions, ItineraryOracle } from "./services/oracle";

export const testRouting: RoutingConfig = {
  cityName: "Kazan",
  seedPolicy: "allow",
  defaultDurationHours: 4,
  travelMinutesPerKm: 2,
};

export interface TestPlace {
  name: string;
  latitude: number;
  longitude: number;
  rating?: number;
  price?: number;
  isFree?: boolean;
  visitDuration?: number;
  categoryId?: number | null;
}

export function createTestUser(storage: IStorage, email = "traveller@example.com"): Promise<User> {
  return storage.createUser({ email, username: email.split("@")[0], displayName: null });
}

export async function addPlaces(storage: IStorage, places: readonly TestPlace[]): Promise<Attraction[]> {
  const created: Attraction[] = [];
  for (const place of places) {
    created.push(await storage.createAttraction({
      ...place,
      slug: slugify(place.name),
      description: `${place.name} description`,
      isFree: place.isFree ?? false,
    }));
  }
  return created;
}

// A: best rated; B: nearest to A but priced 500; C: farther, free
export const exampleCatalog: TestPlace[] = [
  { name: "Place A", latitude: 55.80, longitude: 49.10, rating: 4.8, isFree: true },
  { name: "Place B", latitude: 55.79, longitude: 49.11, rating: 4.5, price: 500 },
  { name: "Place C", latitude: 55.82, longitude: 49.12, rating: 4.0, isFree: true },
];

type Reply = string | Error | (() => Promise<string>);

/** Oracle that plays back scripted replies in order and records every prompt. */
export class ScriptedOracle implements ItineraryOracle {
  readonly name = "scripted";
  readonly prompts: string[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[]) {
    this.replies = [...replies];
  }

  async complete(prompt: string, _options: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("no scripted reply left");
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply();
    return reply;
  }
}
