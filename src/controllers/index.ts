/**
 * @fileoverview Barrel export for all controllers.
 *
 * @license Apache-2.0
 */

export { createAppsController, type AppsController } from "./apps.controller";
export { healthController } from "./health.controller";
