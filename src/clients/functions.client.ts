/**
 * @fileoverview Functions platform client.
 *
 * Talks to an Fn-compatible serverless functions API over HTTP using Undici.
 * Remote apps are keyed by name; routes hang off an app.
 *
 * API surface used:
 * - GET    /{version}/apps/{app}
 * - POST   /{version}/apps
 * - PATCH  /{version}/apps/{app}
 * - DELETE /{version}/apps/{app}
 * - GET    /{version}/apps/{app}/routes
 *
 * @license Apache-2.0
 */

import { request, type Dispatcher } from "undici";
import { z } from "zod";

// ============================================================================
// Constants
// ============================================================================

/** Default timeout for functions API requests (10 seconds) */
const DEFAULT_TIMEOUT_MS = 10_000;

/** Status reported when the platform answers with an unexpected body */
const BAD_GATEWAY = 502;

// ============================================================================
// Response Schemas
// ============================================================================

const remoteAppSchema = z.object({
  name: z.string(),
  config: z
    .record(z.string(), z.string())
    .nullish()
    .transform((c) => c ?? {}),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

const routeSchema = z.object({
  path: z.string(),
  image: z.string().optional(),
  type: z.string().optional(),
  memory: z.number().optional(),
  timeout: z.number().optional(),
  format: z.string().optional(),
  config: z.record(z.string(), z.string()).nullish(),
});

const appEnvelopeSchema = z.object({ app: remoteAppSchema });

const routesEnvelopeSchema = z.object({
  routes: z
    .array(routeSchema)
    .nullish()
    .transform((r) => r ?? []),
});

/** Error body shape used by the platform: { error: { message } } */
const errorEnvelopeSchema = z.object({ error: z.object({ message: z.string() }) });

// ============================================================================
// Types
// ============================================================================

/** App resource owned by the functions platform */
export type RemoteFunctionApp = z.infer<typeof remoteAppSchema>;

/** Route attached to a remote app */
export type Route = z.infer<typeof routeSchema>;

/**
 * Operations consumed from the functions platform.
 */
export interface FunctionsPlatform {
  apps: {
    show(name: string): Promise<RemoteFunctionApp>;
    create(name: string): Promise<RemoteFunctionApp>;
    update(name: string, fields: Record<string, unknown>): Promise<RemoteFunctionApp>;
    delete(name: string): Promise<void>;
  };
  routes: {
    list(appName: string): Promise<Route[]>;
  };
}

export type FunctionsClientOptions = {
  /** Platform base URL, e.g. http://localhost:8090 or http://gateway/fn; a path prefix is kept */
  baseUrl: string;
  /** Version path segment (default: "v1") */
  apiVersion?: string;
  /** Header and body timeout in milliseconds */
  timeoutMs?: number;
  /** Undici dispatcher, defaults to the global one */
  dispatcher?: Dispatcher;
};

/**
 * Failure reported by the functions platform.
 *
 * @property status - HTTP status returned by the platform
 * @property reason - Error message returned by the platform
 */
export class FunctionsApiError extends Error {
  readonly status: number;
  readonly reason: string;

  constructor(status: number, reason: string) {
    super(reason);
    this.name = "FunctionsApiError";
    this.status = status;
    this.reason = reason;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorReason(status: number, body: unknown): string {
  const parsed = errorEnvelopeSchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : `Functions API responded with status ${status}`;
}

function decode<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new FunctionsApiError(BAD_GATEWAY, "Unexpected response from functions API");
  return parsed.data;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Creates a functions platform client.
 *
 * Non-2xx responses are thrown as FunctionsApiError; transport failures
 * (connection refused, timeouts) propagate as Undici errors.
 */
export function createFunctionsClient(options: FunctionsClientOptions): FunctionsPlatform {
  const version = options.apiVersion ?? "v1";
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const appPath = (name: string) => `/${version}/apps/${encodeURIComponent(name)}`;

  async function call(method: Dispatcher.HttpMethod, path: string, payload?: unknown): Promise<unknown> {
    const response = await request(`${baseUrl}${path}`, {
      method,
      headers:
        payload === undefined
          ? { accept: "application/json" }
          : { accept: "application/json", "content-type": "application/json" },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      dispatcher: options.dispatcher,
    });

    const body = parseBody(await response.body.text());

    if (response.statusCode >= 400) {
      throw new FunctionsApiError(response.statusCode, errorReason(response.statusCode, body));
    }
    return body;
  }

  return {
    apps: {
      show: async (name) => decode(appEnvelopeSchema, await call("GET", appPath(name))).app,

      create: async (name) =>
        decode(appEnvelopeSchema, await call("POST", `/${version}/apps`, { app: { name } })).app,

      update: async (name, fields) =>
        decode(appEnvelopeSchema, await call("PATCH", appPath(name), { app: fields })).app,

      delete: async (name) => {
        await call("DELETE", appPath(name));
      },
    },

    routes: {
      list: async (appName) =>
        decode(routesEnvelopeSchema, await call("GET", `${appPath(appName)}/routes`)).routes,
    },
  };
}
