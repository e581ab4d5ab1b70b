import express, { type Express, type Request, type Response } from "express";
import helmet from "helmet";
import compression from "compression";
import type { AppConfig } from "./config";
import { isDatabaseAvailable } from "./db";
import { errorHandler } from "./errors";
import { httpLogger } from "./logger";
import { correlationIdMiddleware } from "./middleware/correlation-id";
import type { IdentityResolver } from "./middleware/identity";
import { registerRoutes } from "./routes";
import type { IntakeServices } from "./services/certificates";

export interface AppOptions {
  config: AppConfig;
  services: IntakeServices;
  resolveIdentity: IdentityResolver;
  /** Installs session handling ahead of the API routes. */
  beforeRoutes?: (app: Express) => void;
}

// base64 inflates uploads by 4/3; leave headroom for the rest of the body.
export function jsonBodyLimit(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 64 * 1024;
}

export function createApp({ config, services, resolveIdentity, beforeRoutes }: AppOptions): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      database: isDatabaseAvailable() ? "available" : "in-memory",
      timestamp: new Date().toISOString(),
    });
  });

  app.use(correlationIdMiddleware);
  app.use(httpLogger);
  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: jsonBodyLimit(config.MAX_UPLOAD_BYTES) }));

  beforeRoutes?.(app);
  registerRoutes(app, services, resolveIdentity);

  app.use(errorHandler);
  return app;
}
