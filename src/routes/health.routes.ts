/**
 * @fileoverview Health check route.
 *
 * @license Apache-2.0
 */

import { Router } from "express";
import { healthController } from "../controllers";

/**
 * Creates the health router.
 *
 * Routes:
 * - GET /v1/health - Liveness check (returns { message: "ok" })
 *
 * @returns Configured Express Router
 */
export function healthRouter(): Router {
  const router = Router();

  router.get("/", healthController.getHealth);

  return router;
}
