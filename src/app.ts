/**
 * @fileoverview Express application factory for the apps API.
 *
 * Creates and configures the Express application with all middleware and routes.
 * Collaborators are passed in, so tests can supply in-process stand-ins.
 *
 * @license Apache-2.0
 */

import express from "express";
import { config } from "./config";
import { apiV1Router } from "./routes";
import { createAppsService, type AppsServiceDeps } from "./services/apps.service";
import { requestLogger } from "./middleware/request-logger";
import { notFound } from "./middleware/not-found";
import { errorHandler } from "./middleware/error-handler";

/**
 * Creates and configures the Express application.
 *
 * Middleware order:
 * 1. Request logging (captures all requests)
 * 2. JSON body parser
 * 3. API v1 routes
 * 4. 404 handler
 * 5. Global error handler
 *
 * @param deps - App registry, functions platform client and logger
 * @returns Configured Express application instance
 */
export function createApp(deps: AppsServiceDeps): express.Express {
  const app = express();

  // Disable x-powered-by header for security
  app.disable("x-powered-by");

  app.use(requestLogger(deps.logger));

  app.use(express.json({ limit: config.FAAS_APPS_MAX_BODY_BYTES }));

  app.use("/v1", apiV1Router(createAppsService(deps)));

  // Handle 404 for unmatched routes
  app.use(notFound);

  // Global error handler
  app.use(errorHandler(deps.logger));

  return app;
}
