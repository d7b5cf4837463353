/**
 * @fileoverview Apps controller - HTTP request handlers for App endpoints.
 *
 * Handles all /v1/:project_id/apps routes by delegating to the apps service.
 * Responsible for:
 * - Extracting route parameters and body
 * - Calling appropriate service methods
 * - Formatting HTTP responses
 *
 * Failures are thrown by the service and rendered by the error handler.
 *
 * @license Apache-2.0
 */

import type { Request, Response } from "express";
import type { AppsService } from "../services/apps.service";

/**
 * Creates the controller for App CRUD operations.
 *
 * All handlers follow the pattern:
 * 1. Extract data from request
 * 2. Call service method
 * 3. Return JSON response with status and data
 */
export function createAppsController(appsService: AppsService) {
  return {
    /**
     * GET /v1/:project_id/apps
     *
     * Lists the project's apps merged with their remote apps.
     */
    listApps: async (req: Request, res: Response) => {
      const apps = await appsService.listApps(req.params.project_id);
      res.status(200).json({ apps, message: "Successfully listed applications" });
    },

    /**
     * POST /v1/:project_id/apps
     *
     * Creates a new app.
     * Body: { app: { name: string, description?: string } }
     */
    createApp: async (req: Request, res: Response) => {
      const app = await appsService.createApp(req.params.project_id, req.body);
      res.status(200).json({ app, message: "App successfully created" });
    },

    /**
     * GET /v1/:project_id/apps/:app
     */
    getApp: async (req: Request, res: Response) => {
      const app = await appsService.getApp(req.params.project_id, req.params.app);
      res.status(200).json({ app, message: "Successfully loaded app" });
    },

    /**
     * PUT /v1/:project_id/apps/:app
     *
     * Body is forwarded to the functions platform as update fields.
     */
    updateApp: async (req: Request, res: Response) => {
      const app = await appsService.updateApp(req.params.project_id, req.params.app, req.body);
      res.status(200).json({ app, message: "App successfully updated" });
    },

    /**
     * DELETE /v1/:project_id/apps/:app
     *
     * Refused with 403 while the remote app has routes.
     */
    deleteApp: async (req: Request, res: Response) => {
      await appsService.deleteApp(req.params.project_id, req.params.app);
      res.status(200).json({ message: "App successfully deleted" });
    },
  };
}

export type AppsController = ReturnType<typeof createAppsController>;
