import "dotenv/config";
import { loadConfig } from "../server/config/env";
import { connectDatabase } from "../server/db";
import { DatabaseStorage } from "../server/storage";
import { readSeedCatalog, seedCatalog } from "../server/catalog-seed";

async function main() {
  const config = loadConfig();
  const connection = connectDatabase(config.databaseUrl);
  if (!connection) {
    console.error("❌ DATABASE_URL is required to seed the catalog");
    process.exit(1);
  }

  try {
    await seedCatalog(new DatabaseStorage(connection.db), readSeedCatalog());
  } finally {
    await connection.pool.end();
  }
}

main().catch((error) => {
  console.error("❌ Catalog seed failed:", error);
  process.exit(1);
});
