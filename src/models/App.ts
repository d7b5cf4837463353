/**
 * @fileoverview App model definition.
 *
 * Apps are project-scoped records mirroring an app on the functions
 * platform. The record name equals the remote app name.
 *
 * @license Apache-2.0
 */

import mongoose, { Schema } from "mongoose";

/** Longest app name accepted by the functions platform */
export const MAX_APP_NAME_LENGTH = 30;

/**
 * App document type.
 *
 * @property name - Derived name shared with the remote app (max 30 chars)
 * @property project_id - Opaque identifier of the owning project
 * @property description - Free-form description (max 5000 chars)
 * @property createdAt - Timestamp when the app was created
 * @property updatedAt - Timestamp when the app was last modified
 */
export type App = {
  name: string;
  project_id: string;
  description: string;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * Mongoose schema for the App collection.
 *
 * Features:
 * - Unique compound index on (project_id, name), so inserts double as the existence check
 * - Automatic timestamps (createdAt, updatedAt)
 */
export const appSchema = new Schema<App>(
  {
    // Stored byte-for-byte: the name keys the remote app and project_id is opaque
    name: { type: String, required: true, maxlength: MAX_APP_NAME_LENGTH, immutable: true },
    project_id: { type: String, required: true, immutable: true, index: true },
    description: { type: String, trim: true, maxlength: 5_000, default: "" },
  },
  { timestamps: true }
);

appSchema.index({ project_id: 1, name: 1 }, { unique: true });

/**
 * Mongoose model for App documents.
 *
 * Registered conditionally so re-evaluating this module reuses the model.
 */
export const AppModel = mongoose.modelNames().includes("App")
  ? mongoose.model<App>("App")
  : mongoose.model<App>("App", appSchema);
