/**
 * @fileoverview App view - merges a local App record with its remote app.
 *
 * @license Apache-2.0
 */

import type { RemoteFunctionApp } from "../clients/functions.client";
import type { AppRecord } from "../repositories/apps.repository";

/**
 * App representation returned by the API.
 *
 * Local fields come from the registry; `config` comes from the functions platform.
 */
export type AppView = {
  name: string;
  project_id: string;
  description: string;
  config: Record<string, string>;
  created_at: string;
  updated_at: string;
};

export function toAppView(app: AppRecord, fnApp: RemoteFunctionApp): AppView {
  return {
    name: app.name,
    project_id: app.project_id,
    description: app.description,
    config: fnApp.config,
    created_at: app.createdAt.toISOString(),
    updated_at: app.updatedAt.toISOString(),
  };
}
