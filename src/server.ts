/**
 * @fileoverview Application entry point for the apps API.
 *
 * Bootstraps the application by:
 * 1. Connecting to MongoDB
 * 2. Building the functions platform client
 * 3. Starting the HTTP server
 * 4. Setting up graceful shutdown handlers
 *
 * @license Apache-2.0
 */

import { createApp } from "./app";
import { createFunctionsClient } from "./clients/functions.client";
import { config } from "./config";
import { connectMongo, disconnectMongo } from "./db/mongo";
import { createMongoAppRegistry } from "./repositories/apps.repository";
import { createLogger } from "./utils/logger";

/**
 * Main application bootstrap function.
 *
 * Registers signal handlers for graceful shutdown on SIGTERM/SIGINT.
 */
async function main(): Promise<void> {
  const logger = createLogger(config.FAAS_APPS_LOG_LEVEL);

  // Connect to MongoDB before accepting requests
  await connectMongo();

  const functions = createFunctionsClient({
    baseUrl: config.FAAS_APPS_FUNCTIONS_API_URL,
    apiVersion: config.FAAS_APPS_FUNCTIONS_API_VERSION,
    timeoutMs: config.FAAS_APPS_FUNCTIONS_TIMEOUT_MS,
  });

  const app = createApp({ registry: createMongoAppRegistry(), functions, logger });

  const server = app.listen(config.FAAS_APPS_PORT, config.FAAS_APPS_HOST, () => {
    logger.info(
      `Apps API listening on http://${config.FAAS_APPS_HOST}:${config.FAAS_APPS_PORT} (functions: ${config.FAAS_APPS_FUNCTIONS_API_URL})`
    );
  });

  /**
   * Closes the HTTP server, then the MongoDB connection.
   *
   * @param signal - The signal that triggered shutdown (SIGTERM or SIGINT)
   */
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    // Stop accepting new HTTP connections and wait for in-flight requests
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info("HTTP server closed");

    await disconnectMongo();

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error("Graceful shutdown failed", err);
      process.exit(1);
    });
  };

  // Register shutdown handlers for container orchestration (SIGTERM) and Ctrl+C (SIGINT)
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

// Start the application
main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
