/**
 * @fileoverview Global error handler middleware.
 *
 * Catches all errors thrown in route handlers and formats them as
 * `{ error: { message, details? } }` JSON responses:
 * - Body parser errors: invalid JSON (400), payload too large (413)
 * - ZodError: Validation errors (400)
 * - HttpError: Explicit status and message
 * - Anything else: Logged and returned as 500
 *
 * @license Apache-2.0
 */

import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { HttpError } from "../utils/http-error";
import type { Logger } from "../utils/logger";

/**
 * Formats a ZodError into a structured API response.
 *
 * Extracts field paths, error codes, and messages from Zod issues.
 */
function formatZodError(err: ZodError) {
  return {
    error: {
      message: "validation_error",
      details: err.issues.map((i) => ({
        field: i.path.length ? i.path.join(".") : undefined,
        code: i.code,
        message: i.message,
      })),
    },
  };
}

/**
 * Reads the `type` tag body-parser sets on the errors it raises.
 */
function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return undefined;
}

/**
 * Creates the Express error handling middleware.
 *
 * Must be registered last in the middleware chain.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err, req, res, _next) => {
    const parserError = bodyParserErrorType(err);
    if (parserError === "entity.too.large") {
      res.status(413).json({ error: { message: "payload_too_large" } });
      return;
    }
    if (parserError === "entity.parse.failed") {
      res.status(400).json({ error: { message: "invalid_json" } });
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json(formatZodError(err));
      return;
    }

    if (err instanceof HttpError) {
      res.status(err.status).json({
        error: err.details === undefined ? { message: err.message } : { message: err.message, details: err.details },
      });
      return;
    }

    // Don't expose internal error details for unhandled errors
    logger.error(`${req.method} ${req.originalUrl} failed with an unhandled error`, err);
    res.status(500).json({ error: { message: "an error occurred, please try again later." } });
  };
}
