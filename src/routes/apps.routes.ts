/**
 * @fileoverview Apps API routes.
 *
 * Defines routes for project-scoped App CRUD operations.
 *
 * @license Apache-2.0
 */

import { Router } from "express";
import type { AppsController } from "../controllers/apps.controller";

/**
 * Creates the apps router.
 *
 * Mounted under /v1/:project_id/apps; `mergeParams` exposes project_id.
 *
 * Routes:
 * - GET    /v1/:project_id/apps       - List apps
 * - POST   /v1/:project_id/apps       - Create an app
 * - GET    /v1/:project_id/apps/:app  - Get app by name
 * - PUT    /v1/:project_id/apps/:app  - Update the remote app
 * - DELETE /v1/:project_id/apps/:app  - Delete app (refused while it has routes)
 *
 * @returns Configured Express Router
 */
export function appsRouter(appsController: AppsController): Router {
  const router = Router({ mergeParams: true });

  router.get("/", appsController.listApps);
  router.post("/", appsController.createApp);
  router.get("/:app", appsController.getApp);
  router.put("/:app", appsController.updateApp);
  router.delete("/:app", appsController.deleteApp);

  return router;
}
