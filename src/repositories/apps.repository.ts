/**
 * @fileoverview App registry - persistence of local App records.
 *
 * The service talks to the registry through the AppRegistry interface;
 * the MongoDB implementation below is the one wired in production.
 *
 * @license Apache-2.0
 */

import type { HydratedDocument } from "mongoose";

import { AppModel, type App } from "../models/App";

// ============================================================================
// Types
// ============================================================================

/** Stored App record */
export type AppRecord = App;

/** Fields supplied when saving a new App record */
export type NewAppRecord = Pick<App, "name" | "project_id" | "description">;

/** Filter accepted by AppRegistry.findBy */
export type AppFilter = { project_id: string; name?: string };

/**
 * Thrown by AppRegistry.save when (project_id, name) is already taken.
 */
export class DuplicateAppError extends Error {
  constructor(
    readonly projectId: string,
    readonly appName: string
  ) {
    super(`App ${appName} already exists in project ${projectId}`);
    this.name = "DuplicateAppError";
  }
}

/**
 * Local App persistence.
 */
export interface AppRegistry {
  /** Returns matching records in insertion order */
  findBy(filter: AppFilter): Promise<AppRecord[]>;
  exists(name: string, projectId: string): Promise<boolean>;
  /**
   * Inserts a record. Must be an atomic conditional write.
   * @throws DuplicateAppError if the record already exists
   */
  save(record: NewAppRecord): Promise<AppRecord>;
  delete(projectId: string, name: string): Promise<void>;
}

// ============================================================================
// MongoDB implementation
// ============================================================================

/** MongoDB duplicate key error code */
const DUPLICATE_KEY_CODE = 11000;

/**
 * Checks whether an error raised by the driver is a unique index violation.
 */
export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === DUPLICATE_KEY_CODE;
}

function toRecord(doc: HydratedDocument<App>): AppRecord {
  return {
    name: doc.name,
    project_id: doc.project_id,
    description: doc.description,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

/**
 * Creates an AppRegistry backed by the App Mongoose model.
 *
 * Requires an established mongoose connection (see db/mongo).
 */
export function createMongoAppRegistry(): AppRegistry {
  return {
    findBy: async (filter) => {
      const query: AppFilter = { project_id: filter.project_id };
      if (filter.name !== undefined) query.name = filter.name;
      const docs = await AppModel.find(query).sort({ _id: 1 });
      return docs.map(toRecord);
    },

    exists: async (name, projectId) => {
      const found = await AppModel.exists({ project_id: projectId, name });
      return found !== null;
    },

    save: async (record) => {
      try {
        const doc = await AppModel.create(record);
        return toRecord(doc);
      } catch (err) {
        if (isDuplicateKeyError(err)) throw new DuplicateAppError(record.project_id, record.name);
        throw err;
      }
    },

    delete: async (projectId, name) => {
      await AppModel.deleteOne({ project_id: projectId, name });
    },
  };
}
