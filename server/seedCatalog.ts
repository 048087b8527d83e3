import { z } from "zod";
import type { IStorage } from "./storage";
import { insertItemSchema } from "@shared/schema";
import { logger } from "./logger";

export const seedCatalogSchema = z.array(
  z.object({
    category: z.string().trim().min(1),
    items: z.array(insertItemSchema.omit({ category_id: true })),
  }),
);

export type SeedCatalog = z.infer<typeof seedCatalogSchema>;

export interface SeedResult {
  categoriesCreated: number;
  itemsCreated: number;
  itemsSkipped: number;
}

/**
 * Loads categories and their items. Existing category names are reused and
 * item codes already in the catalog are left untouched.
 */
export async function seedCatalog(storage: IStorage, catalog: SeedCatalog): Promise<SeedResult> {
  const result: SeedResult = { categoriesCreated: 0, itemsCreated: 0, itemsSkipped: 0 };

  for (const group of catalog) {
    let category = await storage.getCategoryByName(group.category);
    if (!category) {
      category = await storage.createCategory({ name: group.category });
      result.categoriesCreated++;
    }

    for (const item of group.items) {
      if (await storage.getItemByCode(item.item_code)) {
        result.itemsSkipped++;
        continue;
      }
      await storage.createItem({ ...item, category_id: category.id });
      result.itemsCreated++;
    }
  }

  logger.info("seed", "Catalog seed finished", result);
  return result;
}
