import fs from "fs";
import path from "path";
import { z } from "zod";
import type { IStorage } from "./storage";
import { slugify } from "./services/place-matcher";

/**
 * Catalog seed file
 * - Categories and attractions for the default city, used by `npm run db:seed`
 *   and by the in-memory store when no database is configured.
 */
const SEED_FILE_PATH = path.join(process.cwd(), "server", "config", "seed-catalog.json");

const seedCatalogSchema = z.object({
  categories: z.array(z.object({
    name: z.string().min(1),
    slug: z.string().min(1),
    description: z.string().optional(),
    icon: z.string().optional(),
  })),
  attractions: z.array(z.object({
    name: z.string().min(1),
    slug: z.string().optional(),
    category: z.string().optional(),
    description: z.string().default(""),
    shortDescription: z.string().optional(),
    address: z.string().optional(),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    rating: z.number().min(0).max(5).default(0),
    visitDuration: z.number().int().positive().default(60),
    price: z.number().min(0).default(0),
    isFree: z.boolean().default(false),
    website: z.string().url().optional(),
  })),
});

export type SeedCatalog = z.infer<typeof seedCatalogSchema>;

export function readSeedCatalog(filePath: string = SEED_FILE_PATH): SeedCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return seedCatalogSchema.parse(raw);
}

export async function seedCatalog(storage: IStorage, catalog: SeedCatalog): Promise<{ categories: number; attractions: number }> {
  const existing = await storage.getCategories();
  const categoryIdBySlug = new Map(existing.map((c) => [c.slug, c.id]));

  let createdCategories = 0;
  for (const category of catalog.categories) {
    if (categoryIdBySlug.has(category.slug)) continue;
    const created = await storage.createCategory(category);
    categoryIdBySlug.set(created.slug, created.id);
    createdCategories++;
  }

  let createdAttractions = 0;
  for (const item of catalog.attractions) {
    const inserted = await storage.insertAttractionIfSlugFree({
      ...item,
      slug: item.slug ?? slugify(item.name),
      categoryId: item.category ? categoryIdBySlug.get(item.category) ?? null : null,
    });
    if (inserted) createdAttractions++;
  }

  console.log(`[Seed] ${createdCategories} categories, ${createdAttractions} attractions added`);
  return { categories: createdCategories, attractions: createdAttractions };
}
