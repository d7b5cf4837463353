/**
 * @fileoverview MongoDB connection management.
 *
 * Provides functions to establish and terminate the MongoDB connection.
 * Uses Mongoose as the ODM layer.
 *
 * @license Apache-2.0
 */

import mongoose from "mongoose";
import { config } from "../config";
import { AppModel } from "../models/App";

/**
 * Establishes a connection to MongoDB.
 *
 * Builds the App indexes before resolving: the unique (project_id, name)
 * index must exist before the first insert relies on it.
 *
 * @throws Error if the connection fails
 */
export async function connectMongo(): Promise<void> {
  await mongoose.connect(config.FAAS_APPS_MONGO_URI, {
    autoIndex: true,
    dbName: config.FAAS_APPS_MONGO_DB_NAME,
  });
  await AppModel.init();
}

/**
 * Closes the MongoDB connection gracefully.
 */
export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
