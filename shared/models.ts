import type { GeneratorType } from "./schema";

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// Catalog entry with numeric columns already converted
export interface Attraction extends GeoPoint {
  id: number;
  name: string;
  slug: string;
  description: string;
  shortDescription: string | null;
  address: string | null;
  categoryId: number | null;
  rating: number;
  visitDuration: number;
  price: number;
  isFree: boolean;
  website: string | null;
  isActive: boolean;
}

export interface NewAttraction {
  name: string;
  slug: string;
  description: string;
  shortDescription?: string | null;
  latitude: number;
  longitude: number;
  address?: string | null;
  categoryId?: number | null;
  rating?: number;
  visitDuration?: number;
  price?: number;
  isFree?: boolean;
  website?: string | null;
  isActive?: boolean;
}

export interface RouteStop {
  id: number;
  routeId: number;
  attractionId: number;
  position: number;
  visitDuration: number;
  notes: string | null;
  attraction: Attraction;
}

export interface Route {
  id: number;
  userId: string;
  name: string;
  description: string;
  durationHours: number;
  budget: number;
  totalCost: number;
  distanceKm: number;
  generatorType: GeneratorType;
  isPublic: boolean;
  isFavorite: boolean;
  viewsCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RouteWithStops extends Route {
  stops: RouteStop[];
}

export interface NewRoute {
  userId: string;
  name: string;
  description: string;
  durationHours: number;
  budget: number;
  totalCost: number;
  distanceKm: number;
  generatorType: GeneratorType;
  isPublic?: boolean;
}

export interface NewRouteStop {
  attractionId: number;
  position: number;
  visitDuration: number;
  notes?: string | null;
}

export interface StopPosition {
  stopId: number;
  position: number;
}

export interface UserPreference {
  userId: string;
  interests: string[];
  preferredDurationMin: number;
  preferredDurationMax: number;
  maxBudget: number;
  preferredCategoryIds: number[];
}

/** Filter accepted by the catalog accessor. */
export interface AttractionQuery {
  activeOnly?: boolean;
  categoryIds?: number[];
  /** Keeps attractions priced at or below this value, plus every free one. */
  maxPrice?: number;
}

/** A place proposed by the oracle or a client, before it is bound to the catalog. */
export interface SuggestedStop {
  name: string;
  latitude?: number;
  longitude?: number;
  description?: string;
  address?: string;
  visitDuration?: number;
}
