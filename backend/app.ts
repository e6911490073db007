import cors from "cors";
import express, { type Express } from "express";
import { createAdminRouter } from "./admin/routes";
import type { TokenOptions } from "./auth/jwt";
import { resolveActor } from "./auth/middleware";
import { createAuthRouter } from "./auth/routes";
import { createEmployeesRouter } from "./employees/routes";
import { createFeedbackRouter } from "./feedback/routes";
import { createLeaveRequestsRouter } from "./leave-requests/routes";
import type { Services } from "./services";
import { errorHandler } from "./shared/http";
import { createWorkLogsRouter } from "./work-logs/routes";

export interface AppOptions {
  tokens: TokenOptions;
  corsOrigin?: string | true;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  app.use(cors({ origin: options.corsOrigin ?? true, credentials: true }));
  app.use(express.json());
  app.use(resolveActor(services.employees, options.tokens.secret));

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.use("/auth", createAuthRouter(services, options.tokens));
  app.use("/employees", createEmployeesRouter(services));
  app.use("/work-logs", createWorkLogsRouter(services));
  app.use("/leave-requests", createLeaveRequestsRouter(services));
  app.use("/feedback", createFeedbackRouter(services));
  app.use("/admin", createAdminRouter(services));

  app.use(errorHandler);

  return app;
}
