/**
 * @fileoverview API v1 router factory.
 *
 * Aggregates all API route modules under the /v1 prefix.
 *
 * @license Apache-2.0
 */

import { Router } from "express";
import type { AppsService } from "../services/apps.service";
import { createAppsController } from "../controllers";
import { appsRouter } from "./apps.routes";
import { healthRouter } from "./health.routes";

/**
 * Creates the main API v1 router.
 *
 * Route structure:
 * - /v1/health            - Liveness check
 * - /v1/:project_id/apps  - Project-scoped app management
 *
 * @returns Configured Express Router
 */
export function apiV1Router(appsService: AppsService): Router {
  const router = Router();

  router.use("/health", healthRouter());
  router.use("/:project_id/apps", appsRouter(createAppsController(appsService)));

  return router;
}
