import { createServer } from "http";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { DatabaseStorage } from "./storage";
import { createApp } from "./app";
import pinoInstance, { logger } from "./logger";

async function main() {
  const config = loadConfig();
  pinoInstance.level = config.LOG_LEVEL;

  const database = await openDatabase(config.DATABASE_DIR);
  const storage = new DatabaseStorage(database.db);
  const app = createApp(storage, config);
  const httpServer = createServer(app);

  httpServer.listen({ port: config.PORT, host: config.HOST }, () => {
    logger.info("server", `serving on ${config.HOST}:${config.PORT}`, { database: config.DATABASE_DIR });
  });

  // Stop accepting connections, let in-flight requests finish, then close the database.
  function shutdown(signal: string) {
    logger.info("server", `${signal} received, shutting down gracefully`);
    httpServer.close(() => {
      database
        .close()
        .then(() => {
          logger.info("server", "Server closed");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error("server", "Failed to close database", err);
          process.exit(1);
        });
    });
    setTimeout(() => process.exit(1), 10000).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("server", "Startup failed", err);
  process.exit(1);
});
