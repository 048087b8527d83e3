import type { IStorage } from "./storage";
import type { Category, InsertCategory, Item, InsertItem } from "@shared/schema";
import { ConflictError, NotFoundError, ValidationError } from "./errors";

export async function createCategory(storage: IStorage, data: InsertCategory): Promise<Category> {
  const existing = await storage.getCategoryByName(data.name);
  if (existing) {
    throw new ConflictError(`Category "${data.name}" already exists`);
  }
  return storage.createCategory(data);
}

export function listCategories(storage: IStorage): Promise<Category[]> {
  return storage.getCategories();
}

/**
 * Adds an item to the catalog. The category, when given, must exist and the
 * item code must be unused.
 */
export async function createItem(storage: IStorage, data: InsertItem): Promise<Item> {
  if (data.rate < 0) {
    throw new ValidationError("Rate must not be negative", { rate: ["Number must be greater than or equal to 0"] });
  }
  if (data.category_id != null) {
    const category = await storage.getCategory(data.category_id);
    if (!category) throw new NotFoundError(`Category ${data.category_id} not found`);
  }
  const existing = await storage.getItemByCode(data.item_code);
  if (existing) {
    throw new ConflictError(`Item code "${data.item_code}" already exists`);
  }
  return storage.createItem({ ...data, category_id: data.category_id ?? null });
}

export function listItems(storage: IStorage): Promise<Item[]> {
  return storage.getItems();
}

export async function getItem(storage: IStorage, itemId: number): Promise<Item> {
  const item = await storage.getItem(itemId);
  if (!item) throw new NotFoundError(`Item ${itemId} not found`);
  return item;
}
