import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { closeDatabaseConnection, connectDatabase, waitForDatabase } from "./db";
import { log } from "./log";
import { MemStorage } from "./mem-storage";
import { MinioObjectStorage } from "./object-storage";
import { createServices } from "./services";
import { DatabaseStorage, type IStorage } from "./storage";

async function main() {
  const config = loadConfig();

  let storage: IStorage;
  let shutdownDatabase: () => Promise<void> = async () => {};

  if (config.databaseUrl) {
    const { pool, db } = connectDatabase(config.databaseUrl);
    await waitForDatabase(pool);
    storage = new DatabaseStorage(db);
    shutdownDatabase = () => closeDatabaseConnection(pool);
  } else {
    console.warn("DATABASE_URL is not set, using in-memory storage; data is lost on restart");
    storage = new MemStorage();
  }

  const objectStorage = config.minio ? new MinioObjectStorage(config.minio) : null;
  if (!objectStorage) {
    console.warn("MINIO_ENDPOINT is not set, snapshots are stored inline");
  }

  const services = createServices(storage, objectStorage, {
    answerWriteRetries: config.answerWriteRetries,
    snapshotInlineThresholdBytes: config.snapshotInlineThresholdBytes,
  });

  const server = createServer(createApp(services));
  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    server.close(() => {
      shutdownDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("Shutdown failed:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
