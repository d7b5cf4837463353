/**
 * @fileoverview Environment configuration module for the apps API.
 *
 * Loads and validates all environment variables using Zod schemas.
 * Configuration is parsed once at startup and exported as a typed object.
 *
 * @see {@link .env.example} for available configuration options
 *
 * @license Apache-2.0
 */

import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables from .env file (if present)
dotenv.config();

/** Log levels accepted by FAAS_APPS_LOG_LEVEL, most verbose first */
export const LOG_LEVELS = ["debug", "info", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Zod schema defining all required and optional environment variables.
 * Each variable has sensible defaults for local development.
 */
const envSchema = z.object({
  /** Port number for the HTTP server */
  FAAS_APPS_PORT: z.coerce.number().int().min(0).max(65_535).default(8080),

  /** Host address to bind the server (0.0.0.0 for all interfaces) */
  FAAS_APPS_HOST: z.string().default("0.0.0.0"),

  /** MongoDB connection URI */
  FAAS_APPS_MONGO_URI: z.string().default("mongodb://localhost:27017/faas-apps"),

  /** MongoDB database name */
  FAAS_APPS_MONGO_DB_NAME: z.string().default("faas-apps"),

  /** Maximum allowed request body size in bytes (default: 1MB) */
  FAAS_APPS_MAX_BODY_BYTES: z.coerce.number().int().positive().default(1_048_576),

  /** Base URL of the functions platform API */
  FAAS_APPS_FUNCTIONS_API_URL: z.string().url().default("http://localhost:8090"),

  /** API version segment prepended to every functions platform path */
  FAAS_APPS_FUNCTIONS_API_VERSION: z.string().trim().min(1).default("v1"),

  /** Header and body timeout for functions platform calls */
  FAAS_APPS_FUNCTIONS_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  FAAS_APPS_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

/**
 * Typed configuration object inferred from the Zod schema.
 */
export type Config = z.infer<typeof envSchema>;

/**
 * Parses a set of environment variables into a validated configuration.
 *
 * @throws ZodError if a variable is present but invalid
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return envSchema.parse(env);
}

/**
 * Validated configuration object.
 * Throws a ZodError at startup if required variables are missing or invalid.
 */
export const config: Config = parseConfig(process.env);
