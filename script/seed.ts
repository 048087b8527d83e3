/**
 * Seeds the catalog from script/seed-data.json into DATABASE_DIR.
 */
import { readFileSync } from "fs";
import { loadConfig } from "../server/config";
import { openDatabase } from "../server/db";
import { DatabaseStorage } from "../server/storage";
import { seedCatalog, seedCatalogSchema } from "../server/seedCatalog";

async function run() {
  const config = loadConfig();
  const raw: unknown = JSON.parse(readFileSync(new URL("./seed-data.json", import.meta.url), "utf-8"));
  const catalog = seedCatalogSchema.parse(raw);

  const database = await openDatabase(config.DATABASE_DIR);
  try {
    const result = await seedCatalog(new DatabaseStorage(database.db), catalog);
    console.log(
      `Catalog seed complete: ${result.categoriesCreated} categories, ${result.itemsCreated} items (${result.itemsSkipped} skipped).`,
    );
  } finally {
    await database.close();
  }
}

run()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error("Catalog seed failed:", err);
    process.exit(1);
  });
