import { createServer } from "http";
import { createApp } from "./app";
import { config } from "./config";
import { pool } from "./db";
import { logger } from "./logger";
import { sessionIdentityResolver } from "./middleware/identity";
import { createIntakeServices } from "./services/certificates";
import { setupSession } from "./session";
import { createStorage } from "./storage";

async function seedDefaultDeadline(storage: ReturnType<typeof createStorage>): Promise<void> {
  if (!config.DEFAULT_SUBMISSION_DEADLINE) return;
  const existing = await storage.gateway.getDeadline();
  if (existing) return;
  await storage.gateway.setDeadline(new Date(config.DEFAULT_SUBMISSION_DEADLINE), "system");
  logger.info({ deadline: config.DEFAULT_SUBMISSION_DEADLINE }, "Default submission deadline seeded");
}

async function main(): Promise<void> {
  logger.info({ env: config.NODE_ENV, port: config.PORT, database: Boolean(config.DATABASE_URL) }, "Starting server");

  const storage = createStorage(config);
  await seedDefaultDeadline(storage);

  const services = createIntakeServices(config, storage);
  const app = createApp({
    config,
    services,
    resolveIdentity: sessionIdentityResolver(storage.identities),
    beforeRoutes: (instance) => setupSession(instance, config),
  });

  const httpServer = createServer(app);
  httpServer.listen(config.PORT, "0.0.0.0", () => {
    logger.info({ port: config.PORT }, "Server listening");
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    httpServer.close((closeError) => {
      if (closeError) {
        logger.error({ err: closeError }, "HTTP server did not close cleanly");
      }
      const poolClosed = pool ? pool.end() : Promise.resolve();
      poolClosed
        .then(() => process.exit(closeError ? 1 : 0))
        .catch((error: unknown) => {
          logger.error({ err: error }, "Database pool did not close cleanly");
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exit(1);
});
