/**
 * @fileoverview Request logging middleware.
 *
 * Logs all incoming HTTP requests with method, path, status code,
 * and response time in milliseconds.
 *
 * @license Apache-2.0
 */

import type { RequestHandler } from "express";
import type { Logger } from "../utils/logger";

/**
 * Creates a middleware logging HTTP requests with timing information.
 *
 * Log format: `{METHOD} {PATH} -> {STATUS} ({DURATION}ms)`
 *
 * @example
 * // Output: POST /v1/p1/apps -> 200 (15ms)
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();

    // Log after response is sent
    res.on("finish", () => {
      const ms = Date.now() - start;
      logger.info(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${ms}ms)`);
    });

    next();
  };
}
