/**
 * @fileoverview HTTP error helpers.
 *
 * Errors created here carry the status code the error handler responds with.
 * Anything thrown that is not an HttpError is treated as unhandled (500).
 *
 * @license Apache-2.0
 */

/**
 * Error with an HTTP status code and optional details.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    if (details !== undefined) this.details = details;
  }
}

/**
 * Creates an HTTP error with a status code and message.
 *
 * @example
 * throw httpError(404, "App billing-p1 not found");
 * throw httpError(409, "App billing-p1 already exists");
 */
export function httpError(status: number, message: string, details?: unknown): HttpError {
  return new HttpError(status, message, details);
}
