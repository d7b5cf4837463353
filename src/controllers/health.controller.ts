/**
 * @fileoverview Health controller - liveness check.
 *
 * @license Apache-2.0
 */

import type { Request, Response } from "express";

export const healthController = {
  /**
   * GET /v1/health
   *
   * Returns a static message to confirm the server is running.
   */
  getHealth: async (_req: Request, res: Response) => {
    res.status(200).json({ message: "ok" });
  },
};
