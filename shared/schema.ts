import { sql, relations } from "drizzle-orm";
import {
  pgTable, text, varchar, integer, serial, timestamp, numeric, boolean, jsonb, pgEnum, uniqueIndex, index,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Enums
export const generatorTypeEnum = pgEnum("generator_type", ["algorithmic", "llm", "hybrid", "manual"]);

// Users table
export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  email: text("email").notNull().unique(),
  username: text("username").notNull(),
  displayName: text("display_name"),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

// Attraction categories
export const categories = pgTable("categories", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
  slug: text("slug").notNull().unique(),
  description: text("description"),
  icon: text("icon"),
});

// Points of interest
export const attractions = pgTable("attractions", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  slug: text("slug").notNull().unique(),
  description: text("description").notNull().default(""),
  shortDescription: text("short_description"),
  latitude: numeric("latitude", { precision: 9, scale: 6 }).notNull(),
  longitude: numeric("longitude", { precision: 9, scale: 6 }).notNull(),
  address: text("address"),
  categoryId: integer("category_id").references(() => categories.id, { onDelete: "set null" }),
  rating: numeric("rating", { precision: 3, scale: 2 }).notNull().default("0"),
  visitDuration: integer("visit_duration").notNull().default(60),
  price: numeric("price", { precision: 10, scale: 2 }).notNull().default("0"),
  isFree: boolean("is_free").notNull().default(false),
  website: text("website"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => [
  index("attractions_coords_idx").on(table.latitude, table.longitude),
  index("attractions_category_idx").on(table.categoryId),
  index("attractions_rating_idx").on(table.rating),
]);

// User routes
export const routes = pgTable("routes", {
  id: serial("id").primaryKey(),
  userId: varchar("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  name: text("name").notNull(),
  description: text("description").notNull().default(""),
  durationHours: integer("duration_hours").notNull(),
  budget: numeric("budget", { precision: 10, scale: 2 }).notNull().default("0"),
  totalCost: numeric("total_cost", { precision: 10, scale: 2 }).notNull().default("0"),
  distanceKm: numeric("distance_km", { precision: 8, scale: 2 }).notNull().default("0"),
  generatorType: generatorTypeEnum("generator_type").notNull().default("manual"),
  isPublic: boolean("is_public").notNull().default(false),
  isFavorite: boolean("is_favorite").notNull().default(false),
  viewsCount: integer("views_count").notNull().default(0),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => [
  index("routes_user_idx").on(table.userId),
  index("routes_public_idx").on(table.isPublic),
]);

// Route stops (attractions in order)
export const routeAttractions = pgTable("route_attractions", {
  id: serial("id").primaryKey(),
  routeId: integer("route_id").notNull().references(() => routes.id, { onDelete: "cascade" }),
  attractionId: integer("attraction_id").notNull().references(() => attractions.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  visitDuration: integer("visit_duration").notNull().default(60),
  notes: text("notes"),
}, (table) => [
  uniqueIndex("route_attractions_route_position_idx").on(table.routeId, table.position),
]);

// Route generation preferences
export const userPreferences = pgTable("user_preferences", {
  id: serial("id").primaryKey(),
  userId: varchar("user_id").notNull().unique().references(() => users.id, { onDelete: "cascade" }),
  interests: jsonb("interests").$type<string[]>().notNull().default([]),
  preferredDurationMin: integer("preferred_duration_min").notNull().default(60),
  preferredDurationMax: integer("preferred_duration_max").notNull().default(480),
  maxBudget: numeric("max_budget", { precision: 10, scale: 2 }).notNull().default("0"),
  preferredCategoryIds: jsonb("preferred_category_ids").$type<number[]>().notNull().default([]),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

// Relations
export const categoriesRelations = relations(categories, ({ many }) => ({
  attractions: many(attractions),
}));

export const attractionsRelations = relations(attractions, ({ one, many }) => ({
  category: one(categories, {
    fields: [attractions.categoryId],
    references: [categories.id],
  }),
  routeAttractions: many(routeAttractions),
}));

export const routesRelations = relations(routes, ({ one, many }) => ({
  user: one(users, {
    fields: [routes.userId],
    references: [users.id],
  }),
  stops: many(routeAttractions),
}));

export const routeAttractionsRelations = relations(routeAttractions, ({ one }) => ({
  route: one(routes, {
    fields: [routeAttractions.routeId],
    references: [routes.id],
  }),
  attraction: one(attractions, {
    fields: [routeAttractions.attractionId],
    references: [attractions.id],
  }),
}));

export const userPreferencesRelations = relations(userPreferences, ({ one }) => ({
  user: one(users, {
    fields: [userPreferences.userId],
    references: [users.id],
  }),
}));

// Zod schemas for validation
export const insertUserSchema = createInsertSchema(users).pick({
  email: true,
  username: true,
  displayName: true,
});

export const insertCategorySchema = createInsertSchema(categories).omit({
  id: true,
});

// Row types
export type User = typeof users.$inferSelect;
export type InsertUser = z.infer<typeof insertUserSchema>;
export type Category = typeof categories.$inferSelect;
export type InsertCategory = z.infer<typeof insertCategorySchema>;
export type AttractionRow = typeof attractions.$inferSelect;
export type RouteRow = typeof routes.$inferSelect;
export type UserPreferenceRow = typeof userPreferences.$inferSelect;
export type GeneratorType = (typeof generatorTypeEnum.enumValues)[number];

// ===== API request schemas =====
const latitudeSchema = z.number().min(-90).max(90);
const longitudeSchema = z.number().min(-180).max(180);

export const generateRouteRequestSchema = z.object({
  userId: z.string().min(1),
  durationHours: z.number().int().min(1).max(24).optional(),
  generatorType: z.enum(["algorithmic", "llm", "hybrid"]).default("hybrid"),
  categoryIds: z.array(z.number().int().positive()).optional(),
  maxBudget: z.number().min(0).optional(),
  interests: z.array(z.string().min(1)).optional(),
  startLatitude: latitudeSchema.optional(),
  startLongitude: longitudeSchema.optional(),
  routeName: z.string().max(200).optional(),
  routeDescription: z.string().max(2000).optional(),
});

export const suggestedStopSchema = z.object({
  name: z.string().trim().min(1).max(200),
  latitude: latitudeSchema.optional(),
  longitude: longitudeSchema.optional(),
  description: z.string().optional(),
  address: z.string().optional(),
  visitDuration: z.number().int().positive().optional(),
});

export const reconcileRouteRequestSchema = z.object({
  userId: z.string().min(1),
  durationHours: z.number().int().min(1).max(24),
  name: z.string().max(200).optional(),
  description: z.string().optional(),
  stops: z.array(suggestedStopSchema).min(1),
});

export const optimizeRouteRequestSchema = z.object({
  startLatitude: latitudeSchema.optional(),
  startLongitude: longitudeSchema.optional(),
});

export const userPreferenceInputSchema = z.object({
  interests: z.array(z.string().min(1)).default([]),
  preferredDurationMin: z.number().int().min(30).default(60),
  preferredDurationMax: z.number().int().min(60).default(480),
  maxBudget: z.number().min(0).default(0),
  preferredCategoryIds: z.array(z.number().int().positive()).default([]),
}).refine((p) => p.preferredDurationMax >= p.preferredDurationMin, {
  message: "preferredDurationMax must not be lower than preferredDurationMin",
  path: ["preferredDurationMax"],
});

export type UserPreferenceInput = z.infer<typeof userPreferenceInputSchema>;
