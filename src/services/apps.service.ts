/**
 * @fileoverview Apps service - keeps local App records and remote apps in step.
 *
 * Every App exists twice: as a record in the AppRegistry and as an app on
 * the functions platform, both under the same derived name. Local
 * preconditions are checked before any remote call is made. Partial
 * failures are undone with a compensating action on the other store.
 *
 * @license Apache-2.0
 */

import { z } from "zod";

import { FunctionsApiError, type FunctionsPlatform, type RemoteFunctionApp } from "../clients/functions.client";
import { MAX_APP_NAME_LENGTH } from "../models/App";
import { DuplicateAppError, type AppRecord, type AppRegistry } from "../repositories/apps.repository";
import { httpError, type HttpError } from "../utils/http-error";
import type { Logger } from "../utils/logger";
import { toAppView, type AppView } from "../views/app.view";

// ============================================================================
// Validation Schemas
// ============================================================================

// Identifiers are opaque: no trimming or other normalisation
const projectIdSchema = z.string().min(1, { message: "Project ID is required" });

const appNameParamSchema = z.string().min(1, { message: "App name is required" });

/** Schema for creating a new app: { app: { name, description? } } */
const createAppSchema = z.preprocess(
  (v) => (v == null ? {} : v),
  z.object({
    app: z.object({
      name: z.string().min(1).max(200),
      description: z.string().trim().max(5_000).optional(),
    }),
  })
);

/** Update payloads are forwarded to the functions platform untouched */
const updateAppSchema = z.preprocess((v) => (v == null ? {} : v), z.record(z.string(), z.unknown()));

// ============================================================================
// Helpers
// ============================================================================

/**
 * Derives the name shared by the local record and the remote app.
 *
 * Long names are cut to MAX_APP_NAME_LENGTH characters, so two long names
 * in one project may collide.
 *
 * @example
 * deriveAppName("billing", "p1"); // "billing-p1"
 */
export function deriveAppName(name: string, projectId: string): string {
  return `${name}-${projectId}`.slice(0, MAX_APP_NAME_LENGTH);
}

export function defaultDescription(projectId: string): string {
  return `App for project ${projectId}`;
}

/**
 * Converts a functions platform failure into an HttpError carrying the
 * remote status and reason (500 and the error message when absent).
 */
export function remoteError(err: unknown): HttpError {
  if (err instanceof FunctionsApiError) return httpError(err.status, err.reason);
  return httpError(500, err instanceof Error ? err.message : String(err));
}

// ============================================================================
// Service
// ============================================================================

export type AppsServiceDeps = {
  registry: AppRegistry;
  functions: FunctionsPlatform;
  logger: Logger;
};

export type AppsService = ReturnType<typeof createAppsService>;

/**
 * Creates the apps service.
 *
 * All methods validate their input with Zod and throw HttpError for
 * expected failures.
 */
export function createAppsService({ registry, functions, logger }: AppsServiceDeps) {
  /**
   * Loads the local record for (projectId, name), or throws 404.
   */
  async function loadApp(projectId: string, name: string): Promise<AppRecord> {
    if (!(await registry.exists(name, projectId))) {
      logger.info(`[${projectId}] - App ${name} not found, aborting`);
      throw httpError(404, `App ${name} not found`);
    }
    const [stored] = await registry.findBy({ project_id: projectId, name });
    // Removed between the check and the read
    if (!stored) throw httpError(404, `App ${name} not found`);
    return stored;
  }

  /**
   * Runs a compensating action. Its failure is logged; the caller rethrows
   * the error that triggered it.
   */
  async function compensate(projectId: string, description: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
      logger.info(`[${projectId}] - Compensated: ${description}`);
    } catch (err) {
      logger.error(`[${projectId}] - Compensation failed (${description}), stores may be out of sync`, err);
    }
  }

  return {
    /**
     * Lists the apps of a project, each merged with its remote app.
     *
     * Remote lookups run one after another in registry order. The first
     * failing lookup aborts the listing with the remote status.
     */
    listApps: async (projectId: unknown): Promise<AppView[]> => {
      const project = projectIdSchema.parse(projectId);
      logger.info(`[${project}] - Listing apps`);

      const stored = await registry.findBy({ project_id: project });
      const views: AppView[] = [];
      for (const app of stored) {
        let fnApp: RemoteFunctionApp;
        try {
          fnApp = await functions.apps.show(app.name);
        } catch (err) {
          logger.error(`[${project}] - Fn app '${app.name}' lookup failed, aborting listing`, err);
          throw remoteError(err);
        }
        views.push(toAppView(app, fnApp));
      }

      logger.info(`[${project}] - Apps found: ${views.length}`);
      return views;
    },

    /**
     * Creates the remote app, then the local record.
     *
     * A remote creation failure is not mapped and surfaces as a 500.
     *
     * @throws HttpError 409 if the app already exists
     */
    createApp: async (projectId: unknown, body: unknown): Promise<AppView> => {
      const project = projectIdSchema.parse(projectId);
      const parsedBody = createAppSchema.parse(body);
      const name = deriveAppName(parsedBody.app.name, project);
      logger.info(`[${project}] - Creating app ${name}`);

      if (await registry.exists(name, project)) {
        logger.info(`[${project}] - Similar app was found, aborting`);
        throw httpError(409, `App ${name} already exists`);
      }

      const fnApp = await functions.apps.create(name);
      logger.debug(`[${project}] - Fn app created`);

      let stored: AppRecord;
      try {
        stored = await registry.save({
          name,
          project_id: project,
          description: parsedBody.app.description ?? defaultDescription(project),
        });
      } catch (err) {
        // A concurrent create won the race and owns the remote app: leave it
        if (err instanceof DuplicateAppError) {
          logger.info(`[${project}] - App ${name} was created concurrently, aborting`);
          throw httpError(409, `App ${name} already exists`);
        }
        await compensate(project, `delete fn app ${name}`, () => functions.apps.delete(name));
        throw err;
      }
      logger.debug(`[${project}] - App created`);

      return toAppView(stored, fnApp);
    },

    /**
     * Retrieves an app and its remote counterpart.
     *
     * @throws HttpError 404 if the local record is missing, or the remote status
     */
    getApp: async (projectId: unknown, appName: unknown): Promise<AppView> => {
      const project = projectIdSchema.parse(projectId);
      const name = appNameParamSchema.parse(appName);
      logger.info(`[${project}] - Searching for app with name ${name}`);

      const stored = await loadApp(project, name);

      let fnApp: RemoteFunctionApp;
      try {
        fnApp = await functions.apps.show(name);
      } catch (err) {
        logger.error(`[${project}] - Fn app '${name}' was not found`, err);
        throw remoteError(err);
      }
      logger.debug(`[${project}] - App '${name}' found`);

      return toAppView(stored, fnApp);
    },

    /**
     * Forwards the body to the remote app as update fields.
     *
     * The local record is re-read, not modified.
     *
     * @throws HttpError 404 if the local record is missing, or the remote status
     */
    updateApp: async (projectId: unknown, appName: unknown, body: unknown): Promise<AppView> => {
      const project = projectIdSchema.parse(projectId);
      const name = appNameParamSchema.parse(appName);
      const fields = updateAppSchema.parse(body);
      logger.info(`[${project}] - Setting up update procedure for app ${name}`);

      await loadApp(project, name);

      let fnApp: RemoteFunctionApp;
      try {
        fnApp = await functions.apps.update(name, fields);
      } catch (err) {
        logger.error(`[${project}] - Unable to update app ${name}, aborting`, err);
        throw remoteError(err);
      }

      const stored = await loadApp(project, name);
      logger.info(`[${project}] - App ${name} updated`);

      return toAppView(stored, fnApp);
    },

    /**
     * Deletes the local record, then the remote app.
     *
     * Apps that still have routes are kept. If the remote deletion fails the
     * local record is restored with the same name, project and description;
     * it is saved anew, so its created_at and updated_at are reset.
     *
     * @throws HttpError 404 if missing, 403 if the app has routes, or the remote status
     */
    deleteApp: async (projectId: unknown, appName: unknown): Promise<void> => {
      const project = projectIdSchema.parse(projectId);
      const name = appNameParamSchema.parse(appName);

      const stored = await loadApp(project, name);

      let routeCount: number;
      try {
        await functions.apps.show(name);
        routeCount = (await functions.routes.list(name)).length;
      } catch (err) {
        logger.info(`[${project}] - Unable to get app ${name}, aborting`);
        throw remoteError(err);
      }

      if (routeCount > 0) {
        logger.info(`[${project}] - App has routes, unable to delete it, aborting`);
        throw httpError(403, `Unable to delete app ${name} with routes`);
      }

      await registry.delete(project, name);
      logger.debug(`[${project}] - App model entry gone`);

      try {
        await functions.apps.delete(name);
      } catch (err) {
        await compensate(project, `restore app ${name}`, () =>
          registry.save({ name: stored.name, project_id: stored.project_id, description: stored.description })
        );
        throw remoteError(err);
      }
      logger.debug(`[${project}] - Fn app deleted`);
    },
  };
}
