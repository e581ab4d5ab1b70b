import type { Express } from "express";
import { notFoundHandler } from "./errors";
import { requireIdentity, type IdentityResolver } from "./middleware/identity";
import { createAdminRouter } from "./routes/admin.routes";
import { createCertificatesRouter } from "./routes/certificates.routes";
import { createDeadlineRouter } from "./routes/deadline.routes";
import type { IntakeServices } from "./services/certificates";

export function registerRoutes(app: Express, services: IntakeServices, resolveIdentity: IdentityResolver): void {
  const authenticated = requireIdentity(resolveIdentity);

  app.use("/api/deadline", createDeadlineRouter(services.submissions));
  app.use("/api/certificates", authenticated, createCertificatesRouter(services));
  app.use("/api/admin", authenticated, createAdminRouter(services.submissions));

  app.use("/api", notFoundHandler);
}
