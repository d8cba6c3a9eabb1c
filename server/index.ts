import "dotenv/config";
import { loadConfig } from "./config/env";
import { connectDatabase } from "./db";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./memory-storage";
import { readSeedCatalog, seedCatalog } from "./catalog-seed";
import { createRouteGenerator } from "./services";
import { createApp } from "./app";

const log = console.log;

async function openStorage(databaseUrl: string | undefined): Promise<{ storage: IStorage; kind: "postgres" | "memory" }> {
  const connection = connectDatabase(databaseUrl);
  if (connection) {
    return { storage: new DatabaseStorage(connection.db), kind: "postgres" };
  }

  const storage = new MemStorage();
  await seedCatalog(storage, readSeedCatalog());
  return { storage, kind: "memory" };
}

(async () => {
  const config = loadConfig();
  const { storage, kind } = await openStorage(config.databaseUrl);
  const generator = createRouteGenerator(storage, config);

  const { server } = await createApp(
    { storage, generator, storageKind: kind },
    { corsOrigins: config.corsOrigins, env: config.env },
  );

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.error(`❌ Port ${config.port} is already in use. Stop the other process or set PORT.`);
    } else {
      console.error("❌ Server error:", err);
    }
    process.exit(1);
  });

  server.listen(config.port, "0.0.0.0", () => {
    log(`express server serving on port ${config.port}`);
    log(`[Server] storage: ${kind}, oracle: ${generator.llmAvailable ? config.oracle.provider : "disabled"}, city: ${config.routing.cityName}`);
  });
})().catch((error) => {
  console.error("❌ Server failed to start:", error);
  process.exit(1);
});
